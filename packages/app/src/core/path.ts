import { Array as Arr, Option, pipe } from "effect"

import { type Attr, isRecordValue, type TypedRecord } from "./attr-value.js"

export const PATH_SEPARATOR = "."

/**
 * Splits a dotted path into segments. The empty path has no segments.
 *
 * @pure true
 * @complexity O(|path|)
 */
export const splitPath = (path: string): ReadonlyArray<string> =>
  path.length === 0 ? [] : path.split(PATH_SEPARATOR)

const findAttr = (record: TypedRecord, key: string): Option.Option<Attr> =>
  Arr.findFirst(record, (candidate) => candidate.key === key)

const resolveSegments = (
  segments: ReadonlyArray<string>,
  record: TypedRecord
): Option.Option<Attr> =>
  Arr.matchLeft(segments, {
    onEmpty: () => Option.none(),
    onNonEmpty: (head, rest) =>
      pipe(
        findAttr(record, head),
        Option.flatMap((found) =>
          rest.length === 0
            ? Option.some(found)
            : pipe(
              Option.some(found.value),
              Option.filter(isRecordValue),
              Option.flatMap((nested) => resolveSegments(rest, nested.attrs))
            )
        )
      )
  })

/**
 * Resolves a dotted path against a record, descending through `Record` values.
 *
 * @param path - Dotted path such as `"address.city"`.
 * @param record - Record to search.
 * @returns The leaf attribute (keyed by the last segment), or none when a
 * segment is missing or an intermediate value is not a record.
 *
 * @pure true
 * @invariant getAttrByKey(k, r) returns the first attribute keyed k in r
 * @complexity O(d * w) where d = path depth, w = record width
 */
// CHANGE: resolve attributes by dotted path over nested typed records
// WHY: sorting and filtering address nested fields with one string key
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a miss is Option.none, never an exception
// COMPLEXITY: O(d*w)/O(d)
export const getAttrByKey = (
  path: string,
  record: TypedRecord
): Option.Option<Attr> => resolveSegments(splitPath(path), record)
