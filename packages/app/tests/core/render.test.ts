import { describe, expect, it } from "@effect/vitest"
import { Option } from "effect"

import {
  attr,
  boolValue,
  floatValue,
  intValue,
  listValue,
  recordValue,
  stringValue
} from "../../src/core/attr-value.js"
import { attrToString, attrValueToString } from "../../src/core/render.js"

describe("attrValueToString", () => {
  it("renders scalars", () => {
    expect(attrValueToString(stringValue("Montreal"))).toBe("Montreal")
    expect(attrValueToString(intValue(24))).toBe("24")
    expect(attrValueToString(intValue(-3))).toBe("-3")
    expect(attrValueToString(floatValue(1.78))).toBe("1.78")
    expect(attrValueToString(floatValue(2))).toBe("2")
    expect(attrValueToString(boolValue(true))).toBe("true")
    expect(attrValueToString(boolValue(false))).toBe("false")
  })

  it("joins record values with a space and drops keys", () => {
    const user = recordValue([
      attr("name", recordValue([attr("first", stringValue("Ahmad")), attr("last", stringValue("Nasser"))])),
      attr("age", intValue(24))
    ])
    expect(attrValueToString(user)).toBe("Ahmad Nasser 24")
  })

  it("joins list elements with a space", () => {
    expect(attrValueToString(listValue([stringValue("admin"), stringValue("editor")]))).toBe("admin editor")
    expect(attrValueToString(listValue([listValue([intValue(1), intValue(2)]), listValue([intValue(3)])]))).toBe(
      "1 2 3"
    )
  })

  it("renders empty containers as the empty string", () => {
    expect(attrValueToString(listValue([]))).toBe("")
    expect(attrValueToString(recordValue([]))).toBe("")
  })

  it("renders Int 5 and String \"5\" identically", () => {
    expect(attrValueToString(intValue(5))).toBe(attrValueToString(stringValue("5")))
  })
})

describe("attrToString", () => {
  it("maps a missing attribute to none", () => {
    expect(Option.isNone(attrToString(Option.none()))).toBe(true)
  })

  it("renders the value of a found attribute", () => {
    expect(Option.getOrUndefined(attrToString(Option.some(attr("tags", listValue([stringValue("a")])))))).toBe("a")
  })
})
