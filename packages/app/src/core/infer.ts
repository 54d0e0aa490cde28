import { Either, pipe, Predicate } from "effect"

import {
  attr,
  type AttrValue,
  boolValue,
  floatValue,
  intValue,
  listValue,
  recordValue,
  stringValue,
  type TypedRecord
} from "./attr-value.js"
import { type Decoder, decodeError, describeKind, listOf, prefixPath } from "./decode.js"

/**
 * Tags an arbitrary JSON value without a declared shape.
 *
 * Safe integers become `Int`, other numbers `Float`, matching what
 * `intAttr` accepts. `null` has no variant and fails at its path.
 *
 * @pure true
 * @complexity O(n) where n = number of JSON nodes
 */
// CHANGE: infer typed values for JSON documents that ship no decoder
// WHY: the query CLI works on any array of objects
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: inferAttrValue(x) is Right iff x contains no null
// COMPLEXITY: O(n)/O(n)
export const inferAttrValue: Decoder<AttrValue> = (input) => {
  if (Predicate.isString(input)) {
    return Either.right(stringValue(input))
  }
  if (Predicate.isNumber(input)) {
    return Either.right(Number.isSafeInteger(input) ? intValue(input) : floatValue(input))
  }
  if (Predicate.isBoolean(input)) {
    return Either.right(boolValue(input))
  }
  if (Array.isArray(input)) {
    return pipe(listOf(inferAttrValue)(input), Either.map(listValue))
  }
  if (Predicate.isRecord(input)) {
    return pipe(inferRecord(input), Either.map(recordValue))
  }
  return Either.left(decodeError([], `Cannot infer a value from ${describeKind(input)}`, input))
}

/**
 * Infers a record from a JSON object.
 *
 * Attributes follow the object's own key order, so integer-like keys come
 * first, as `Object.entries` yields them.
 */
export const inferRecord: Decoder<TypedRecord> = (input) => {
  if (!Predicate.isRecord(input)) {
    return Either.left(decodeError([], `Expected an object, actual ${describeKind(input)}`, input))
  }
  return Either.all(
    Object.entries(input).map(([key, value]) =>
      pipe(
        inferAttrValue(value),
        Either.mapLeft(prefixPath(key)),
        Either.map((inferred) => attr(key, inferred))
      )
    )
  )
}

export const inferRecords: Decoder<ReadonlyArray<TypedRecord>> = listOf(inferRecord)
