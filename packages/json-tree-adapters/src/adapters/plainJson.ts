import type { AdapterTraits, ValueContract } from "../adapter"
import { BasicAdapter } from "../BasicAdapter"
import { type Conversion, conversionFailure, converted } from "../conversion"
import { typeMismatch, unsupportedValue } from "../error"
import { frozenNull, type FrozenNode, integerNode } from "../frozen/FrozenNode"
import { createFrozenValue, type FrozenValue } from "../frozen/FrozenValue"
import { isJSONArray, isJSONRecord, type JSONValue } from "../json"
import { integerFromNumber, isInt64 } from "../numbers"
import { emptyArray, emptyRecord, isPlainRecord } from "../utils"
import { JsArrayView, JsObjectView } from "./jsContainers"

export const PLAIN_JSON_ADAPTER_NAME = "PlainJsonAdapter"

const wrapPlain = (child: JSONValue) => new PlainJsonAdapter(child)

function describePlain(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  if (typeof value === "object") return isPlainRecord(value) ? "object" : "class instance"
  return typeof value
}

/**
 * Copies a plain JSON subtree into frozen nodes.
 */
function copyPlain(value: JSONValue): FrozenNode {
  if (value === null) return frozenNull
  if (typeof value === "boolean") return { kind: "bool", value }
  if (typeof value === "string") return { kind: "string", value }
  if (typeof value === "number") {
    const integer = integerFromNumber(value)
    return integer === undefined ? { kind: "double", value } : integerNode(integer)
  }
  if (isJSONArray(value)) {
    return { kind: "array", items: value.map(copyPlain) }
  }
  if (isJSONRecord(value)) {
    return {
      kind: "object",
      members: Object.keys(value).map((name) => [name, copyPlain(value[name])] as const),
    }
  }
  return unsupportedValue(`${PLAIN_JSON_ADAPTER_NAME} cannot freeze ${describePlain(value)}`)
}

export class PlainJsonArray extends JsArrayView<PlainJsonAdapter, JSONValue> {
  /** Without an argument, a view over the shared empty array. */
  constructor()
  constructor(value: JSONValue)
  constructor(...args: [] | [JSONValue]) {
    const value = args.length === 0 ? emptyArray() : args[0]
    if (!isJSONArray(value)) {
      typeMismatch(`${PLAIN_JSON_ADAPTER_NAME} ${describePlain(value)} is not an array`)
    }
    super(value, wrapPlain)
  }
}

export class PlainJsonObject extends JsObjectView<PlainJsonAdapter, JSONValue> {
  /** Without an argument, a view over the shared empty record. */
  constructor()
  constructor(value: JSONValue)
  constructor(...args: [] | [JSONValue]) {
    const value = args.length === 0 ? emptyRecord() : args[0]
    if (!isJSONRecord(value)) {
      typeMismatch(`${PLAIN_JSON_ADAPTER_NAME} ${describePlain(value)} is not an object`)
    }
    super(value, wrapPlain)
  }
}

/**
 * Value contract over values shaped like `JSON.parse` output.
 *
 * JS has a single number type, so the backend is loose: every number is a double,
 * and a whole number within the 64-bit range is an integer as well.
 *
 * The native type describes parser output, but a hand-built tree may hold other
 * values (undefined, bigint, class instances). Those have no kind and cannot be frozen.
 */
export class PlainJsonValue implements ValueContract<PlainJsonArray, PlainJsonObject> {
  constructor(readonly native: JSONValue) {}

  get hasStrictTypes(): boolean {
    return false
  }

  isNull(): boolean {
    return this.native === null
  }

  isBool(): boolean {
    return typeof this.native === "boolean"
  }

  isInteger(): boolean {
    return typeof this.native === "number" && integerFromNumber(this.native) !== undefined
  }

  isDouble(): boolean {
    return typeof this.native === "number"
  }

  isNumber(): boolean {
    return typeof this.native === "number"
  }

  isString(): boolean {
    return typeof this.native === "string"
  }

  isArray(): boolean {
    return isJSONArray(this.native)
  }

  isObject(): boolean {
    return isJSONRecord(this.native)
  }

  getBool(): Conversion<boolean> {
    return typeof this.native === "boolean"
      ? converted(this.native)
      : conversionFailure("bool", `${describePlain(this.native)} is not a bool`)
  }

  getDouble(): Conversion<number> {
    return typeof this.native === "number"
      ? converted(this.native)
      : conversionFailure("double", `${describePlain(this.native)} is not a number`)
  }

  getInteger(): Conversion<bigint> {
    const integer = this.getBigInt()
    if (!integer.ok || isInt64(integer.value)) return integer
    return conversionFailure("integer", `${integer.value} is outside the int64 range`)
  }

  getBigInt(): Conversion<bigint> {
    if (typeof this.native !== "number") {
      return conversionFailure("integer", `${describePlain(this.native)} is not a number`)
    }
    const integer = integerFromNumber(this.native)
    return integer === undefined
      ? conversionFailure("integer", `${this.native} is not a whole number in the 64-bit range`)
      : converted(integer)
  }

  getString(): Conversion<string> {
    return typeof this.native === "string"
      ? converted(this.native)
      : conversionFailure("string", `${describePlain(this.native)} is not a string`)
  }

  getArrayOptional(): PlainJsonArray | undefined {
    return isJSONArray(this.native) ? new PlainJsonArray(this.native) : undefined
  }

  getArraySize(): number | undefined {
    return isJSONArray(this.native) ? this.native.length : undefined
  }

  getObjectOptional(): PlainJsonObject | undefined {
    return isJSONRecord(this.native) ? new PlainJsonObject(this.native) : undefined
  }

  getObjectSize(): number | undefined {
    return isJSONRecord(this.native) ? Object.keys(this.native).length : undefined
  }

  freeze(): FrozenValue {
    return createFrozenValue(copyPlain(this.native), PLAIN_JSON_ADAPTER_NAME)
  }
}

export class PlainJsonAdapter extends BasicAdapter<
  PlainJsonAdapter,
  PlainJsonArray,
  PlainJsonObject,
  PlainJsonValue
> {
  /**
   * Without an argument, an adapter over the shared empty record. A child holding
   * undefined is passed on as is and reads as a value with no kind.
   */
  constructor()
  constructor(value: JSONValue)
  constructor(...args: [] | [JSONValue]) {
    super(new PlainJsonValue(args.length === 0 ? emptyRecord() : args[0]))
  }

  get adapterName(): string {
    return PLAIN_JSON_ADAPTER_NAME
  }

  get native(): JSONValue {
    return this.value.native
  }

  protected emptyArray(): PlainJsonArray {
    return new PlainJsonArray()
  }

  protected emptyObject(): PlainJsonObject {
    return new PlainJsonObject()
  }
}

export const plainJsonTraits = {
  adapterName: PLAIN_JSON_ADAPTER_NAME,
  hasStrictTypes: false,
  wrap: (document: JSONValue) => new PlainJsonAdapter(document),
} as const satisfies AdapterTraits<JSONValue, PlainJsonAdapter>
