import { Either, ParseResult, pipe, Predicate, Schema } from "effect"

import {
  type Attr,
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

export type DecodePath = ReadonlyArray<PropertyKey>

export interface DecodeError {
  readonly _tag: "DecodeError"
  readonly path: DecodePath
  readonly message: string
  readonly actual: unknown
}

export type Decoder<A> = (input: unknown) => Either.Either<A, DecodeError>

export const decodeError = (
  path: DecodePath,
  message: string,
  actual: unknown
): DecodeError => ({
  _tag: "DecodeError",
  path,
  message,
  actual
})

export const prefixPath = (segment: PropertyKey) => (error: DecodeError): DecodeError => ({
  ...error,
  path: [segment, ...error.path]
})

export const describeKind = (value: unknown): string => {
  if (value === null) {
    return "null"
  }
  return Array.isArray(value) ? "array" : typeof value
}

const valueAt = (input: unknown, path: DecodePath): unknown =>
  path.reduce<unknown>((current, segment) => {
    if (Array.isArray(current) && typeof segment === "number") {
      const items: ReadonlyArray<unknown> = current
      return items[segment]
    }
    if (Predicate.isRecord(current) && typeof segment === "string") {
      return current[segment]
    }
    return undefined
  }, input)

// INVARIANT: actual is the value found at the issue path, not the decoder input
const fromParseError = (input: unknown) => (error: ParseResult.ParseError): DecodeError => {
  const [issue] = ParseResult.ArrayFormatter.formatErrorSync(error)
  return issue === undefined
    ? decodeError([], ParseResult.TreeFormatter.formatErrorSync(error), input)
    : decodeError(issue.path, issue.message, valueAt(input, issue.path))
}

/**
 * Lifts a schema into a decoder whose failures carry the issue path.
 *
 * @pure true
 */
export const decodeWith = <A, I>(schema: Schema.Schema<A, I>): Decoder<A> => {
  const decode = Schema.decodeUnknownEither(schema)
  return (input) => pipe(decode(input), Either.mapLeft(fromParseError(input)))
}

const field = (name: string): Decoder<unknown> => (input) => {
  if (!Predicate.isRecord(input)) {
    return Either.left(decodeError([], `Expected an object, actual ${describeKind(input)}`, input))
  }
  if (!Object.hasOwn(input, name)) {
    return Either.left(decodeError([name], "is missing", input))
  }
  return Either.right(input[name])
}

const fieldAttr = <A>(
  name: string,
  decodeValue: Decoder<A>,
  wrap: (value: A) => AttrValue
): Decoder<Attr> =>
(input) =>
  pipe(
    field(name)(input),
    Either.flatMap((raw) => pipe(decodeValue(raw), Either.mapLeft(prefixPath(name)))),
    Either.map((decoded) => attr(name, wrap(decoded)))
  )

const wrapList = <A>(wrap: (value: A) => AttrValue) => (values: ReadonlyArray<A>): AttrValue =>
  listValue(values.map((value) => wrap(value)))

const decodeString = decodeWith(Schema.String)
const decodeInt = decodeWith(Schema.Int)
const decodeFloat = decodeWith(Schema.Number)
const decodeBool = decodeWith(Schema.Boolean)

export const stringAttr = (name: string): Decoder<Attr> => fieldAttr(name, decodeString, stringValue)

/** Rejects numbers with a fractional part; `24` decodes to `Int 24`. */
export const intAttr = (name: string): Decoder<Attr> => fieldAttr(name, decodeInt, intValue)

export const floatAttr = (name: string): Decoder<Attr> => fieldAttr(name, decodeFloat, floatValue)

export const boolAttr = (name: string): Decoder<Attr> => fieldAttr(name, decodeBool, boolValue)

const decodeStringList = decodeWith(Schema.Array(Schema.String))
const decodeIntList = decodeWith(Schema.Array(Schema.Int))
const decodeFloatList = decodeWith(Schema.Array(Schema.Number))
const decodeBoolList = decodeWith(Schema.Array(Schema.Boolean))

export const stringListAttr = (name: string): Decoder<Attr> =>
  fieldAttr(name, decodeStringList, wrapList(stringValue))

export const intListAttr = (name: string): Decoder<Attr> => fieldAttr(name, decodeIntList, wrapList(intValue))

export const floatListAttr = (name: string): Decoder<Attr> =>
  fieldAttr(name, decodeFloatList, wrapList(floatValue))

export const boolListAttr = (name: string): Decoder<Attr> => fieldAttr(name, decodeBoolList, wrapList(boolValue))

/**
 * Decodes field `name` with a nested record decoder.
 *
 * @param name - Field holding the nested object.
 * @param decoder - Decoder producing the nested record, usually {@link recordOf}.
 * @returns Decoder of `Attr(name, Record nested)`; nested failures are
 * reported under `name`.
 *
 * @pure true
 */
export const recordAttr = (name: string, decoder: Decoder<TypedRecord>): Decoder<Attr> =>
  fieldAttr(name, decoder, recordValue)

/**
 * Runs attribute decoders against one object and keeps their declared order.
 *
 * @pure true
 * @invariant success implies result[i].key is the name decoders[i] reads
 * @complexity O(k) where k = |decoders|
 */
// CHANGE: compose independent attribute decoders into a record decoder
// WHY: a record is assembled field by field, in the order the caller declares
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the first failing decoder in declared order determines the error
// COMPLEXITY: O(k)/O(k)
export const recordOf = (decoders: ReadonlyArray<Decoder<Attr>>): Decoder<TypedRecord> => (input) =>
  Either.all(decoders.map((decoder) => decoder(input)))

export const listOf = <A>(decoder: Decoder<A>): Decoder<ReadonlyArray<A>> => (input) => {
  if (!Array.isArray(input)) {
    return Either.left(decodeError([], `Expected an array, actual ${describeKind(input)}`, input))
  }
  const items: ReadonlyArray<unknown> = input
  return Either.all(
    items.map((item, index) => pipe(decoder(item), Either.mapLeft(prefixPath(index))))
  )
}

const decodeJsonText = decodeWith(Schema.parseJson())

/**
 * Parses JSON text, then runs `decoder` on the parsed value.
 *
 * @pure true
 */
export const decodeJson = <A>(decoder: Decoder<A>) => (text: string): Either.Either<A, DecodeError> =>
  pipe(decodeJsonText(text), Either.flatMap(decoder))

const formatPath = (path: DecodePath): string =>
  path.reduce<string>((rendered, segment) => {
    if (typeof segment === "number") {
      return `${rendered}[${segment}]`
    }
    return rendered.length === 0 ? String(segment) : `${rendered}.${String(segment)}`
  }, "")

/**
 * Renders an error as `address.city: <message>` or `tags[1]: <message>`.
 *
 * @pure true
 */
export const formatDecodeError = (error: DecodeError): string => {
  const location = formatPath(error.path)
  return location.length === 0 ? error.message : `${location}: ${error.message}`
}
