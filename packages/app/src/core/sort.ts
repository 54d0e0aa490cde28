import { Array as Arr, Option, Order, pipe } from "effect"

import type { TypedRecord } from "./attr-value.js"
import { getAttrByKey } from "./path.js"
import { attrToString } from "./render.js"

export type SortOrder = "Ascending" | "Descending"

export const ASCENDING_TOKEN = "asc"
export const DESCENDING_TOKEN = "dsc"

/**
 * Maps an order token to a direction.
 *
 * Only the exact token `"asc"` is ascending. Anything else, including
 * `"desc"`, `"DESC"` and typos, is descending.
 *
 * @pure true
 */
export const parseSortOrder = (token: string): SortOrder => token === ASCENDING_TOKEN ? "Ascending" : "Descending"

export const sortOrderToken = (order: SortOrder): string =>
  order === "Ascending" ? ASCENDING_TOKEN : DESCENDING_TOKEN

/**
 * Rendering of the attribute at `key`, or the empty string on a miss.
 *
 * @pure true
 */
export const renderedKey = (key: string, record: TypedRecord): string =>
  pipe(
    attrToString(getAttrByKey(key, record)),
    Option.getOrElse(() => "")
  )

const codePoints = (text: string): ReadonlyArray<number> => Array.from(text, (char) => char.codePointAt(0) ?? 0)

/**
 * Lexicographic order over Unicode code points, so astral characters sort
 * after every BMP character.
 *
 * @pure true
 */
export const codePointOrder: Order.Order<string> = Order.mapInput(Order.array(Order.number), codePoints)

const byRenderedKey = (key: string): Order.Order<TypedRecord> =>
  Order.mapInput(codePointOrder, (record: TypedRecord) => renderedKey(key, record))

/**
 * Sorts records by the rendered value at a dotted path.
 *
 * @param sortKey - `[path, orderToken]`; see {@link parseSortOrder} for the token rules.
 * @param records - Records to sort; left untouched.
 * @returns A new array. Records with equal renderings keep their input order.
 *
 * @pure true
 * @invariant result is a permutation of records
 * @invariant ties keep relative input order in both directions
 * @complexity O(n log n) comparisons, each O(d * w) for path resolution
 */
// CHANGE: stable sort of typed records by rendered attribute
// WHY: collections are ordered by the same string rendering shown to users
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unresolvable keys render as "" and sort as equals
// COMPLEXITY: O(n log n)/O(n)
export const sortedBy = (
  sortKey: readonly [key: string, order: string],
  records: ReadonlyArray<TypedRecord>
): ReadonlyArray<TypedRecord> => {
  const [key, token] = sortKey
  const ascending = byRenderedKey(key)
  const order = parseSortOrder(token) === "Ascending" ? ascending : Order.reverse(ascending)
  return Arr.sort(records, order)
}
