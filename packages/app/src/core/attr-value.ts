export interface StringValue {
  readonly _tag: "String"
  readonly value: string
}

export interface IntValue {
  readonly _tag: "Int"
  readonly value: number
}

export interface FloatValue {
  readonly _tag: "Float"
  readonly value: number
}

export interface BoolValue {
  readonly _tag: "Bool"
  readonly value: boolean
}

export interface RecordValue {
  readonly _tag: "Record"
  readonly attrs: TypedRecord
}

export interface ListValue {
  readonly _tag: "List"
  readonly values: ReadonlyArray<AttrValue>
}

export type AttrValue =
  | StringValue
  | IntValue
  | FloatValue
  | BoolValue
  | RecordValue
  | ListValue

/**
 * A single key/value pair of a record.
 *
 * Keys must not contain `.` to stay reachable through dotted-path lookup.
 */
export interface Attr {
  readonly key: string
  readonly value: AttrValue
}

/**
 * Ordered attributes of one JSON-object-like entity, in insertion order.
 * Duplicate keys are allowed; lookups see the first one.
 */
export type TypedRecord = ReadonlyArray<Attr>

export const stringValue = (value: string): AttrValue => ({ _tag: "String", value })

export const intValue = (value: number): AttrValue => ({ _tag: "Int", value })

export const floatValue = (value: number): AttrValue => ({ _tag: "Float", value })

export const boolValue = (value: boolean): AttrValue => ({ _tag: "Bool", value })

export const recordValue = (attrs: TypedRecord): AttrValue => ({ _tag: "Record", attrs })

export const listValue = (values: ReadonlyArray<AttrValue>): AttrValue => ({ _tag: "List", values })

export const attr = (key: string, value: AttrValue): Attr => ({ key, value })

export const isRecordValue = (value: AttrValue): value is RecordValue => value._tag === "Record"
