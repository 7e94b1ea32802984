import { describe, expect, it } from "vitest"
import {
  InvalidIteratorError,
  type JSONValue,
  PlainJsonAdapter,
  PlainJsonArray,
  PlainJsonObject,
  TypeMismatchError,
  difference,
  parsePlainJson,
  YjsAdapter,
} from "../src/index"

describe("PlainJsonAdapter", () => {
  it("reports kinds of JSON values", () => {
    const root = new PlainJsonAdapter(parsePlainJson('{"n":null,"b":true,"i":3,"d":1.5,"s":"x","a":[],"o":{}}'))
    const object = root.getObject()

    const kinds: Record<string, string | undefined> = {}
    for (const [name, value] of object) {
      kinds[name] = value.kind()
    }

    expect(kinds).toStrictEqual({
      n: "null",
      b: "bool",
      i: "integer",
      d: "double",
      s: "string",
      a: "array",
      o: "object",
    })
  })

  it("treats every number as a double and whole numbers as integers too", () => {
    const whole = new PlainJsonAdapter(4)
    const fractional = new PlainJsonAdapter(4.5)

    expect(whole.hasStrictTypes).toBe(false)
    expect(whole.isInteger()).toBe(true)
    expect(whole.isDouble()).toBe(true)
    expect(fractional.isInteger()).toBe(false)
    expect(fractional.isDouble()).toBe(true)
    expect(whole.getDouble()).toStrictEqual({ ok: true, value: 4 })
  })

  it("reads integers as bigint and fails rather than truncate", () => {
    expect(new PlainJsonAdapter(42).getInteger()).toStrictEqual({ ok: true, value: 42n })
    expect(new PlainJsonAdapter(-7).getInteger()).toStrictEqual({ ok: true, value: -7n })

    const fractional = new PlainJsonAdapter(2.5).getInteger()
    expect(fractional.ok).toBe(false)
    if (!fractional.ok) {
      expect(fractional.target).toBe("integer")
    }

    // 2^63 is whole but above int64 max
    const tooLarge = new PlainJsonAdapter(2 ** 63)
    expect(tooLarge.getInteger().ok).toBe(false)
    expect(tooLarge.getBigInt()).toStrictEqual({ ok: true, value: 9223372036854775808n })
  })

  it("returns conversion failures for the wrong kind", () => {
    const text = new PlainJsonAdapter("hello")
    expect(text.getString()).toStrictEqual({ ok: true, value: "hello" })
    expect(text.getBool()).toStrictEqual({ ok: false, target: "bool", reason: "string is not a bool" })
    expect(text.getDouble()).toStrictEqual({
      ok: false,
      target: "double",
      reason: "string is not a number",
    })
  })

  it("throws TypeMismatch when a view is built over the wrong kind", () => {
    expect(() => new PlainJsonArray({ a: 1 })).toThrow(TypeMismatchError)
    expect(() => new PlainJsonObject([1, 2])).toThrow(TypeMismatchError)
    expect(() => new PlainJsonAdapter(1).getArray()).toThrow("PlainJsonAdapter integer is not an array")
    expect(() => new PlainJsonAdapter([]).getObject()).toThrow("PlainJsonAdapter array is not an object")
    expect(new PlainJsonAdapter(1).getArrayOptional()).toBeUndefined()
    expect(new PlainJsonAdapter(1).getObjectOptional()).toBeUndefined()
  })

  it("default-constructs views over shared empty containers", () => {
    const array = new PlainJsonArray()
    const object = new PlainJsonObject()

    expect(array.size()).toBe(0)
    expect(object.size()).toBe(0)
    expect(array.begin().equals(array.end())).toBe(true)
    expect(new PlainJsonArray().begin().equals(array.begin())).toBe(true)
    expect(new PlainJsonAdapter().isObject()).toBe(true)
  })

  describe("array iterators", () => {
    const items = [10, 20, 30]
    const array = new PlainJsonArray(items)

    it("walks begin() to end() in size() steps", () => {
      const cursor = array.begin()
      const seen: bigint[] = []
      while (!cursor.equals(array.end())) {
        const value = cursor.deref().getInteger()
        if (value.ok) seen.push(value.value)
        cursor.increment()
      }
      expect(seen).toStrictEqual([10n, 20n, 30n])
      expect(array.begin().advance(array.size()).equals(array.end())).toBe(true)
    })

    it("yields the same sequence from independent begin() calls", () => {
      const first = [...array].map((value) => value.getDouble())
      const second = [...array].map((value) => value.getDouble())
      expect(first).toStrictEqual(second)
    })

    it("measures signed distances", () => {
      expect(difference(array.begin(), array.end())).toBe(3)
      expect(array.end().distanceTo(array.begin())).toBe(-3)
      expect(array.end().decrement().deref().getDouble()).toStrictEqual({ ok: true, value: 30 })
    })

    it("clones into an independent cursor", () => {
      const cursor = array.begin()
      const copy = cursor.clone()
      cursor.increment()
      expect(cursor.position).toBe(1)
      expect(copy.position).toBe(0)
    })

    it("rejects invalid cursor use", () => {
      expect(() => array.end().deref()).toThrow(InvalidIteratorError)
      expect(() => array.begin().decrement()).toThrow(InvalidIteratorError)
      expect(() => array.end().increment()).toThrow(InvalidIteratorError)

      const other = new PlainJsonArray([10, 20, 30])
      expect(array.begin().equals(other.begin())).toBe(false)
      expect(() => array.begin().distanceTo(other.end())).toThrow(InvalidIteratorError)
    })
  })

  describe("find()", () => {
    it("locates members and returns end() when absent", () => {
      const object = new PlainJsonObject({ a: 1, b: 2 })

      const [name, value] = object.find("a").deref()
      expect(name).toBe("a")
      expect(value.getInteger()).toStrictEqual({ ok: true, value: 1n })
      expect(object.find("c").equals(object.end())).toBe(true)
    })

    it("keeps an empty object's end() apart from another object's end()", () => {
      const empty = new PlainJsonObject({})
      const nonEmpty = new PlainJsonObject({ a: 1 })

      expect(empty.find("a").equals(empty.end())).toBe(true)
      expect(empty.find("a").equals(nonEmpty.end())).toBe(false)
    })

    it("tells a missing key apart from a key holding undefined", () => {
      const object = new PlainJsonObject({ present: undefined })
      const present = object.find("present")

      expect(present.equals(object.end())).toBe(false)
      expect(present.deref()[1].kind()).toBeUndefined()
      expect(present.deref()[1].getObjectSize()).toBeUndefined()
      expect(object.find("absent").equals(object.end())).toBe(true)
    })

    it("ignores inherited properties but finds an own __proto__ member", () => {
      const object = new PlainJsonObject(parsePlainJson('{"__proto__":1,"x":2}'))

      expect(object.size()).toBe(2)
      expect(object.find("toString").equals(object.end())).toBe(true)
      expect(object.find("constructor").equals(object.end())).toBe(true)

      const found = object.find("__proto__")
      expect(found.equals(object.end())).toBe(false)
      expect(found.deref()[1].getInteger()).toStrictEqual({ ok: true, value: 1n })
    })
  })

  it("reads class instances as values with no kind", () => {
    const tree: JSONValue = JSON.parse('{"when":0}', (key, value) =>
      key === "when" ? new Date(0) : value
    )
    const when = new PlainJsonAdapter(tree).getObject().find("when").deref()[1]

    expect(when.isObject()).toBe(false)
    expect(when.kind()).toBeUndefined()
    expect(when.asObject()).toBeUndefined()
  })

  it("never equates undefined members, with itself or with an empty object", () => {
    const missing = new PlainJsonAdapter({ a: undefined })

    expect(missing.equalTo(new PlainJsonAdapter({ a: undefined }), true)).toBe(false)
    expect(missing.equalTo(new PlainJsonAdapter({ a: {} }), true)).toBe(false)
    expect(missing.equalTo(new YjsAdapter({ a: {} }), true)).toBe(false)
    expect(new YjsAdapter({ a: {} }).equalTo(new PlainJsonAdapter({ a: {} }), true)).toBe(true)
  })

  it("compares plain trees regardless of member order", () => {
    const left = new PlainJsonAdapter({ a: [1, 2], b: { c: "x" } })
    const right = new PlainJsonAdapter({ b: { c: "x" }, a: [1, 2] })

    expect(left.equalTo(right, true)).toBe(true)
    expect(left.equalTo(new PlainJsonAdapter({ a: [1, 2] }), false)).toBe(false)
  })
})
