import { Match, Option } from "effect"

import type { Attr, AttrValue } from "./attr-value.js"

const VALUE_SEPARATOR = " "

/**
 * Renders any value to its display string.
 *
 * Records drop their keys and lists drop their brackets; nested values are
 * joined with a single space. Different values may render the same
 * (`Int 5` and `String "5"` both give `"5"`).
 *
 * @pure true
 * @complexity O(n) where n = number of leaves
 */
// CHANGE: render typed values through one total function
// WHY: sorting and filtering compare rendered strings, not typed values
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every AttrValue tag has exactly one rendering branch
// COMPLEXITY: O(n)/O(n)
export const attrValueToString = (value: AttrValue): string =>
  Match.value(value).pipe(
    Match.tag("String", (text) => text.value),
    Match.tag("Int", (int) => String(int.value)),
    Match.tag("Float", (float) => String(float.value)),
    Match.tag("Bool", (bool) => bool.value ? "true" : "false"),
    Match.tag("Record", (record) => record.attrs.map((entry) => attrValueToString(entry.value)).join(VALUE_SEPARATOR)),
    Match.tag("List", (list) => list.values.map(attrValueToString).join(VALUE_SEPARATOR)),
    Match.exhaustive
  )

export const attrToString = (found: Option.Option<Attr>): Option.Option<string> =>
  Option.map(found, (entry) => attrValueToString(entry.value))
