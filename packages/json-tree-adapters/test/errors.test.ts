import { describe, expect, it } from "vitest"
import {
  AdapterError,
  FrozenArray,
  InvalidIteratorError,
  type JSONValue,
  LosslessJsonAdapter,
  type LosslessJsonNode,
  PlainJsonAdapter,
  PlainJsonArray,
  TypeMismatchError,
  UnsupportedValueError,
  YjsAdapter,
} from "../src/index"

function thrownBy(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error("expected the call to throw")
}

describe("AdapterError", () => {
  it("tags type mismatches", () => {
    const error = thrownBy(() => new PlainJsonAdapter("x").getObject())

    expect(error).toBeInstanceOf(TypeMismatchError)
    expect(error).toBeInstanceOf(AdapterError)
    expect(error).toMatchObject({
      code: "TypeMismatch",
      name: "TypeMismatchError",
      message: "PlainJsonAdapter string is not an object",
    })
  })

  it("tags unsupported values", () => {
    const error = thrownBy(() => new YjsAdapter([new Uint8Array(1)]).freeze())

    expect(error).toBeInstanceOf(UnsupportedValueError)
    expect(error).toMatchObject({ code: "UnsupportedValue", name: "UnsupportedValueError" })
  })

  it("refuses to freeze plain values outside the JSON model", () => {
    const withBigInt: JSONValue = JSON.parse('{"a":5}', (key, value) =>
      key === "a" ? 5n : value
    )
    const withDate: JSONValue = JSON.parse('{"when":0}', (key, value) =>
      key === "when" ? new Date(0) : value
    )

    expect(() => new PlainJsonAdapter({ a: undefined }).freeze()).toThrow(
      "PlainJsonAdapter cannot freeze undefined"
    )
    expect(() => new PlainJsonAdapter(withBigInt).freeze()).toThrow(
      "PlainJsonAdapter cannot freeze bigint"
    )
    expect(() => new PlainJsonAdapter(withDate).freeze()).toThrow(UnsupportedValueError)
    expect(() => new PlainJsonAdapter(withDate).freeze()).toThrow(
      "PlainJsonAdapter cannot freeze class instance"
    )
  })

  it("refuses to freeze lossless trees holding unparsed numbers", () => {
    const unparsed: LosslessJsonNode = JSON.parse('{"a":5}')

    expect(() => new LosslessJsonAdapter(unparsed).freeze()).toThrow(UnsupportedValueError)
    expect(() => new LosslessJsonAdapter(unparsed).freeze()).toThrow(
      "LosslessJsonAdapter cannot freeze unparsed number"
    )
  })

  it("tags invalid iterator use", () => {
    const error = thrownBy(() => new FrozenArray().begin().deref())

    expect(error).toBeInstanceOf(InvalidIteratorError)
    expect(error).toMatchObject({
      code: "InvalidIterator",
      message: "Cannot dereference an iterator positioned at end()",
    })
  })

  it("returns conversion failures instead of throwing", () => {
    const array = new PlainJsonArray([1.5])
    expect(() => array.begin().deref().getInteger()).not.toThrow()
    expect(array.begin().deref().getInteger()).toStrictEqual({
      ok: false,
      target: "integer",
      reason: "1.5 is not a whole number in the 64-bit range",
    })
  })
})
