import type { TypedRecord } from "./attr-value.js"
import { renderedKey } from "./sort.js"

const normalize = (value: string): string => value.toLowerCase()

const matchesAnyKey = (
  keys: ReadonlyArray<string>,
  needle: string,
  record: TypedRecord
): boolean => keys.some((key) => normalize(renderedKey(key, record)).includes(needle))

/**
 * Keeps records where at least one path renders to a string containing
 * `query`, compared case-insensitively.
 *
 * @param keys - Dotted paths to check; no paths means no matches.
 * @param query - Substring to look for.
 * @param records - Records to scan; left untouched.
 * @returns Matching records in input order.
 *
 * @pure true
 * @invariant result is an order-preserving subsequence of records
 * @complexity O(n * k) path resolutions, n = |records|, k = |keys|
 */
// CHANGE: case-insensitive substring filter over rendered attributes
// WHY: search boxes match on what is displayed, across several columns
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: filteredBy([], q, rs) = []
// COMPLEXITY: O(n*k)/O(n)
export const filteredBy = (
  keys: ReadonlyArray<string>,
  query: string,
  records: ReadonlyArray<TypedRecord>
): ReadonlyArray<TypedRecord> => {
  const needle = normalize(query)
  return records.filter((record) => matchesAnyKey(keys, needle, record))
}
