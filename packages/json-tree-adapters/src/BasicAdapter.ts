import type {
  Adapter,
  ArrayView,
  DeclaredKind,
  ObjectView,
  ValueContract,
  ValueKind,
} from "./adapter"
import { type Conversion, conversionFailure, converted } from "./conversion"
import { typeMismatch } from "./error"
import type { FrozenValue } from "./frozen/FrozenValue"
import { type NumericValue, numbersEqual, parseDoubleText, parseInt64Text } from "./numbers"

/**
 * Primary kind of a node, or undefined when the native value is outside the contract.
 * Loose backends report whole numbers as "integer".
 */
export function kindOf(value: Adapter): ValueKind | undefined {
  if (value.isNull()) return "null"
  if (value.isBool()) return "bool"
  if (value.isInteger()) return "integer"
  if (value.isDouble()) return "double"
  if (value.isString()) return "string"
  if (value.isArray()) return "array"
  if (value.isObject()) return "object"
  return undefined
}

/**
 * Short diagnostic description, e.g. "PlainJsonAdapter object".
 */
export function describeValue(value: Adapter): string {
  return `${value.adapterName} ${kindOf(value) ?? "unsupported value"}`
}

/**
 * Reads a number without loss, keeping integers exact.
 */
export function readNumber(value: Adapter): NumericValue | undefined {
  if (value.isInteger()) {
    const integer = value.getBigInt()
    if (integer.ok) return { kind: "integer", value: integer.value }
  }
  if (value.isDouble()) {
    const double = value.getDouble()
    if (double.ok) return { kind: "double", value: double.value }
  }
  return undefined
}

/**
 * Recursive structural comparison shared by every backend.
 *
 * Numbers compare by exact value. When `strict` is set and either side comes from a
 * strict backend, both sides must also agree on being integers. Kind mismatches
 * (e.g. array vs object) are never equal.
 */
export function adaptersEqual(a: Adapter, b: Adapter, strict: boolean): boolean {
  if (a.isNull()) {
    return b.isNull()
  }

  if (a.isBool()) {
    const left = a.getBool()
    const right = b.getBool()
    return left.ok && right.ok && left.value === right.value
  }

  if (a.isNumber()) {
    if (!b.isNumber()) return false
    if (strict && (a.hasStrictTypes || b.hasStrictTypes) && a.isInteger() !== b.isInteger()) {
      return false
    }
    const left = readNumber(a)
    const right = readNumber(b)
    return left !== undefined && right !== undefined && numbersEqual(left, right)
  }

  if (a.isString()) {
    const left = a.getString()
    const right = b.getString()
    return left.ok && right.ok && left.value === right.value
  }

  if (a.isArray()) {
    const left = a.getArrayOptional()
    const right = b.getArrayOptional()
    if (!left || !right || left.size() !== right.size()) return false

    const cursor = right.begin()
    for (const element of left) {
      if (!element.equalTo(cursor.deref(), strict)) return false
      cursor.increment()
    }
    return true
  }

  if (a.isObject()) {
    const left = a.getObjectOptional()
    const right = b.getObjectOptional()
    if (!left || !right || left.size() !== right.size()) return false

    const rightEnd = right.end()
    for (const [name, value] of left) {
      const found = right.find(name)
      if (found.equals(rightEnd)) return false
      if (!value.equalTo(found.deref()[1], strict)) return false
    }
    return true
  }

  return false
}

/**
 * Shared semantics layer. Each backend extends it with its own value, view and
 * adapter types, so traversal stays on concrete classes.
 */
export abstract class BasicAdapter<
  TAdapter extends Adapter,
  TArray extends ArrayView<TAdapter>,
  TObject extends ObjectView<TAdapter>,
  TValue extends ValueContract<TArray, TObject>,
> implements Adapter
{
  protected constructor(protected readonly value: TValue) {}

  abstract get adapterName(): string

  /**
   * Default-constructed (empty singleton) views of this backend.
   */
  protected abstract emptyArray(): TArray
  protected abstract emptyObject(): TObject

  get hasStrictTypes(): boolean {
    return this.value.hasStrictTypes
  }

  // --- Kind predicates ---

  isNull(): boolean {
    return this.value.isNull()
  }

  isBool(): boolean {
    return this.value.isBool()
  }

  isInteger(): boolean {
    return this.value.isInteger()
  }

  isDouble(): boolean {
    return this.value.isDouble()
  }

  isNumber(): boolean {
    return this.value.isNumber()
  }

  isString(): boolean {
    return this.value.isString()
  }

  isArray(): boolean {
    return this.value.isArray()
  }

  isObject(): boolean {
    return this.value.isObject()
  }

  kind(): ValueKind | undefined {
    return kindOf(this)
  }

  /**
   * Whether this node satisfies a declared kind. On loose backends a whole-valued
   * double satisfies "integer"; on strict backends only an integer does.
   */
  satisfiesKind(kind: DeclaredKind): boolean {
    switch (kind) {
      case "null":
        return this.isNull()
      case "bool":
        return this.isBool()
      case "integer": {
        if (this.isInteger()) return true
        if (this.hasStrictTypes || !this.isDouble()) return false
        const double = this.getDouble()
        return double.ok && Number.isInteger(double.value)
      }
      case "double":
        return this.isDouble()
      case "number":
        return this.isNumber()
      case "string":
        return this.isString()
      case "array":
        return this.isArray()
      case "object":
        return this.isObject()
      default: {
        const exhaustive: never = kind
        return exhaustive
      }
    }
  }

  // --- Scalar getters ---

  getBool(): Conversion<boolean> {
    return this.value.getBool()
  }

  getDouble(): Conversion<number> {
    return this.value.getDouble()
  }

  getInteger(): Conversion<bigint> {
    return this.value.getInteger()
  }

  getBigInt(): Conversion<bigint> {
    return this.value.getBigInt()
  }

  /**
   * Any number as a JS number, integers included.
   */
  getNumber(): Conversion<number> {
    if (this.isDouble()) return this.getDouble()
    if (this.isInteger()) {
      const integer = this.getBigInt()
      return integer.ok ? converted(Number(integer.value)) : integer
    }
    return conversionFailure("number", `${describeValue(this)} is not a number`)
  }

  getString(): Conversion<string> {
    return this.value.getString()
  }

  // --- Structure ---

  getArray(): TArray {
    const array = this.value.getArrayOptional()
    if (!array) {
      typeMismatch(`${describeValue(this)} is not an array`)
    }
    return array
  }

  getArrayOptional(): TArray | undefined {
    return this.value.getArrayOptional()
  }

  getArraySize(): number | undefined {
    return this.value.getArraySize()
  }

  getObject(): TObject {
    const object = this.value.getObjectOptional()
    if (!object) {
      typeMismatch(`${describeValue(this)} is not an object`)
    }
    return object
  }

  getObjectOptional(): TObject | undefined {
    return this.value.getObjectOptional()
  }

  getObjectSize(): number | undefined {
    return this.value.getObjectSize()
  }

  /**
   * Array view if this node can be read as an array. An empty object reads as the
   * empty array.
   */
  asArray(): TArray | undefined {
    const array = this.value.getArrayOptional()
    if (array) return array
    return this.value.getObjectSize() === 0 ? this.emptyArray() : undefined
  }

  /**
   * Object view if this node can be read as an object. An empty array reads as the
   * empty object.
   */
  asObject(): TObject | undefined {
    const object = this.value.getObjectOptional()
    if (object) return object
    return this.value.getArraySize() === 0 ? this.emptyObject() : undefined
  }

  // --- Lenient predicates ---

  maybeArray(): boolean {
    return this.isArray() || this.getObjectSize() === 0
  }

  maybeObject(): boolean {
    return this.isObject() || this.getArraySize() === 0
  }

  maybeNull(): boolean {
    if (this.isNull()) return true
    const text = this.getString()
    return text.ok && text.value === ""
  }

  maybeBool(): boolean {
    if (this.isBool()) return true
    const text = this.getString()
    return text.ok && (text.value === "true" || text.value === "false")
  }

  maybeInteger(): boolean {
    if (this.isInteger()) return true
    const text = this.getString()
    return text.ok && parseInt64Text(text.value) !== undefined
  }

  maybeDouble(): boolean {
    if (this.isNumber()) return true
    const text = this.getString()
    return text.ok && parseDoubleText(text.value) !== undefined
  }

  maybeString(): boolean {
    return this.isString() || this.isBool() || this.isNumber()
  }

  // --- Lenient conversions ---

  asBool(): Conversion<boolean> {
    const bool = this.getBool()
    if (bool.ok) return bool
    const text = this.getString()
    if (text.ok && (text.value === "true" || text.value === "false")) {
      return converted(text.value === "true")
    }
    return conversionFailure("bool", `${describeValue(this)} cannot be read as a bool`)
  }

  asInteger(): Conversion<bigint> {
    if (this.isNumber()) return this.getInteger()
    const text = this.getString()
    if (text.ok) {
      const integer = parseInt64Text(text.value)
      if (integer !== undefined) return converted(integer)
    }
    return conversionFailure("integer", `${describeValue(this)} cannot be read as an integer`)
  }

  asDouble(): Conversion<number> {
    if (this.isNumber()) return this.getNumber()
    const text = this.getString()
    if (text.ok) {
      const double = parseDoubleText(text.value)
      if (double !== undefined) return converted(double)
    }
    return conversionFailure("double", `${describeValue(this)} cannot be read as a double`)
  }

  asString(): Conversion<string> {
    const text = this.getString()
    if (text.ok) return text
    if (this.isNull()) return converted("null")
    const bool = this.getBool()
    if (bool.ok) return converted(bool.value ? "true" : "false")
    const number = readNumber(this)
    if (number) return converted(String(number.value))
    return conversionFailure("string", `${describeValue(this)} cannot be read as a string`)
  }

  // --- Traversal ---

  /**
   * Calls `fn` for each element until it returns false.
   * Returns false if this node cannot be read as an array or `fn` stopped early.
   */
  applyToArray(fn: (element: TAdapter) => boolean): boolean {
    const array = this.asArray()
    if (!array) return false
    for (const element of array) {
      if (!fn(element)) return false
    }
    return true
  }

  /**
   * Calls `fn` for each member until it returns false.
   * Returns false if this node cannot be read as an object or `fn` stopped early.
   */
  applyToObject(fn: (name: string, value: TAdapter) => boolean): boolean {
    const object = this.asObject()
    if (!object) return false
    for (const [name, value] of object) {
      if (!fn(name, value)) return false
    }
    return true
  }

  equalTo(other: Adapter, strict: boolean): boolean {
    return adaptersEqual(this, other, strict)
  }

  freeze(): FrozenValue {
    return this.value.freeze()
  }
}
