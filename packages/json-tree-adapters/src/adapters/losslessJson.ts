import { LosslessNumber } from "lossless-json"
import type { AdapterTraits, ValueContract } from "../adapter"
import { BasicAdapter } from "../BasicAdapter"
import { type Conversion, conversionFailure, converted } from "../conversion"
import { typeMismatch, unsupportedValue } from "../error"
import { frozenNull, type FrozenNode, numberNode } from "../frozen/FrozenNode"
import { createFrozenValue, type FrozenValue } from "../frozen/FrozenValue"
import { isInt64, type NumericValue, parseNumberText } from "../numbers"
import { emptyArray, emptyRecord, isPlainRecord } from "../utils"
import { JsArrayView, JsObjectView } from "./jsContainers"

export const LOSSLESS_JSON_ADAPTER_NAME = "LosslessJsonAdapter"

export type LosslessJsonNodeRecord = { readonly [k: string]: LosslessJsonNode }

export type LosslessJsonNodeArray = readonly LosslessJsonNode[]

/**
 * Output of lossless-json's `parse`: numbers stay as their literal text.
 */
export type LosslessJsonNode =
  | null
  | boolean
  | string
  | LosslessNumber
  | LosslessJsonNodeArray
  | LosslessJsonNodeRecord

export function isLosslessNodeArray(value: LosslessJsonNode): value is LosslessJsonNodeArray {
  return Array.isArray(value)
}

export function isLosslessNodeRecord(value: LosslessJsonNode): value is LosslessJsonNodeRecord {
  return isPlainRecord(value)
}

/**
 * Checks that a parsed tree only holds the node kinds this backend reads.
 */
export function isLosslessJsonNode(value: unknown): value is LosslessJsonNode {
  if (value === null) return true
  switch (typeof value) {
    case "boolean":
    case "string":
      return true
    case "object":
      if (value instanceof LosslessNumber) return true
      if (Array.isArray(value)) return value.every(isLosslessJsonNode)
      return isPlainRecord(value) && Object.values(value).every(isLosslessJsonNode)
    default:
      return false
  }
}

const wrapLossless = (child: LosslessJsonNode) => new LosslessJsonAdapter(child)

function describeLossless(value: unknown): string {
  if (value === null) return "null"
  if (value instanceof LosslessNumber) return "number"
  if (Array.isArray(value)) return "array"
  if (typeof value === "object") return isPlainRecord(value) ? "object" : "class instance"
  // Raw JS numbers are not parser output
  return typeof value === "number" ? "unparsed number" : typeof value
}

function copyLossless(value: LosslessJsonNode): FrozenNode {
  if (value === null) return frozenNull
  if (typeof value === "boolean") return { kind: "bool", value }
  if (typeof value === "string") return { kind: "string", value }
  if (value instanceof LosslessNumber) return numberNode(parseNumberText(value.value))
  if (isLosslessNodeArray(value)) {
    return { kind: "array", items: value.map(copyLossless) }
  }
  if (isLosslessNodeRecord(value)) {
    return {
      kind: "object",
      members: Object.keys(value).map((name) => [name, copyLossless(value[name])] as const),
    }
  }
  return unsupportedValue(`${LOSSLESS_JSON_ADAPTER_NAME} cannot freeze ${describeLossless(value)}`)
}

export class LosslessJsonArray extends JsArrayView<LosslessJsonAdapter, LosslessJsonNode> {
  constructor()
  constructor(value: LosslessJsonNode)
  constructor(...args: [] | [LosslessJsonNode]) {
    const value = args.length === 0 ? emptyArray() : args[0]
    if (!isLosslessNodeArray(value)) {
      typeMismatch(`${LOSSLESS_JSON_ADAPTER_NAME} ${describeLossless(value)} is not an array`)
    }
    super(value, wrapLossless)
  }
}

export class LosslessJsonObject extends JsObjectView<LosslessJsonAdapter, LosslessJsonNode> {
  constructor()
  constructor(value: LosslessJsonNode)
  constructor(...args: [] | [LosslessJsonNode]) {
    const value = args.length === 0 ? emptyRecord() : args[0]
    if (!isLosslessNodeRecord(value)) {
      typeMismatch(`${LOSSLESS_JSON_ADAPTER_NAME} ${describeLossless(value)} is not an object`)
    }
    super(value, wrapLossless)
  }
}

/**
 * Value contract over lossless-json output. Integer and double literals are told
 * apart by their text, so the backend is strict. Integer literals beyond the
 * uint64 range read as doubles.
 */
export class LosslessJsonValue implements ValueContract<LosslessJsonArray, LosslessJsonObject> {
  private numeric?: NumericValue

  constructor(readonly native: LosslessJsonNode) {}

  get hasStrictTypes(): boolean {
    return true
  }

  /**
   * Parsed number, classified once per value.
   */
  private get number(): NumericValue | undefined {
    if (!(this.native instanceof LosslessNumber)) return undefined
    if (!this.numeric) {
      this.numeric = parseNumberText(this.native.value)
    }
    return this.numeric
  }

  isNull(): boolean {
    return this.native === null
  }

  isBool(): boolean {
    return typeof this.native === "boolean"
  }

  isInteger(): boolean {
    return this.number?.kind === "integer"
  }

  isDouble(): boolean {
    return this.number?.kind === "double"
  }

  isNumber(): boolean {
    return this.native instanceof LosslessNumber
  }

  isString(): boolean {
    return typeof this.native === "string"
  }

  isArray(): boolean {
    return isLosslessNodeArray(this.native)
  }

  isObject(): boolean {
    return isLosslessNodeRecord(this.native)
  }

  getBool(): Conversion<boolean> {
    return typeof this.native === "boolean"
      ? converted(this.native)
      : conversionFailure("bool", `${describeLossless(this.native)} is not a bool`)
  }

  getDouble(): Conversion<number> {
    const number = this.number
    return number?.kind === "double"
      ? converted(number.value)
      : conversionFailure("double", `${describeLossless(this.native)} is not a double`)
  }

  getInteger(): Conversion<bigint> {
    const integer = this.getBigInt()
    if (!integer.ok || isInt64(integer.value)) return integer
    return conversionFailure("integer", `${integer.value} is outside the int64 range`)
  }

  getBigInt(): Conversion<bigint> {
    const number = this.number
    if (number?.kind === "integer") return converted(number.value)
    const reason = number
      ? `${number.value} is not an integer`
      : `${describeLossless(this.native)} is not a number`
    return conversionFailure("integer", reason)
  }

  getString(): Conversion<string> {
    return typeof this.native === "string"
      ? converted(this.native)
      : conversionFailure("string", `${describeLossless(this.native)} is not a string`)
  }

  getArrayOptional(): LosslessJsonArray | undefined {
    return isLosslessNodeArray(this.native) ? new LosslessJsonArray(this.native) : undefined
  }

  getArraySize(): number | undefined {
    return isLosslessNodeArray(this.native) ? this.native.length : undefined
  }

  getObjectOptional(): LosslessJsonObject | undefined {
    return isLosslessNodeRecord(this.native) ? new LosslessJsonObject(this.native) : undefined
  }

  getObjectSize(): number | undefined {
    return isLosslessNodeRecord(this.native) ? Object.keys(this.native).length : undefined
  }

  freeze(): FrozenValue {
    return createFrozenValue(copyLossless(this.native), LOSSLESS_JSON_ADAPTER_NAME)
  }
}

export class LosslessJsonAdapter extends BasicAdapter<
  LosslessJsonAdapter,
  LosslessJsonArray,
  LosslessJsonObject,
  LosslessJsonValue
> {
  /**
   * Without an argument, an adapter over the shared empty record. An explicit
   * undefined stays undefined.
   */
  constructor()
  constructor(value: LosslessJsonNode)
  constructor(...args: [] | [LosslessJsonNode]) {
    super(new LosslessJsonValue(args.length === 0 ? emptyRecord() : args[0]))
  }

  get adapterName(): string {
    return LOSSLESS_JSON_ADAPTER_NAME
  }

  get native(): LosslessJsonNode {
    return this.value.native
  }

  protected emptyArray(): LosslessJsonArray {
    return new LosslessJsonArray()
  }

  protected emptyObject(): LosslessJsonObject {
    return new LosslessJsonObject()
  }
}

export const losslessJsonTraits = {
  adapterName: LOSSLESS_JSON_ADAPTER_NAME,
  hasStrictTypes: true,
  wrap: (document: LosslessJsonNode) => new LosslessJsonAdapter(document),
} as const satisfies AdapterTraits<LosslessJsonNode, LosslessJsonAdapter>
