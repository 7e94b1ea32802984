import * as Y from "yjs"
import type { AdapterTraits, ArrayView, ObjectMember, ObjectView, ValueContract } from "../adapter"
import { BasicAdapter } from "../BasicAdapter"
import { type Conversion, conversionFailure, converted } from "../conversion"
import { typeMismatch, unsupportedValue } from "../error"
import { frozenNull, type FrozenNode, numberNode } from "../frozen/FrozenNode"
import { createFrozenValue, type FrozenValue } from "../frozen/FrozenValue"
import { IndexedIterator } from "../iterators"
import {
  integerFromNumber,
  isInt64,
  isRepresentableInteger,
  type NumericValue,
} from "../numbers"
import { emptyArray, emptyRecord, indexNames, isPlainRecord, lazy } from "../utils"

export const YJS_ADAPTER_NAME = "YjsAdapter"

/**
 * Array-like nodes in a Yjs tree: shared arrays, or plain arrays stored as values.
 */
export type YjsArrayNode = Y.Array<unknown> | readonly unknown[]

/**
 * Object-like nodes in a Yjs tree: shared maps, or plain records stored as values.
 */
export type YjsMapNode = Y.Map<unknown> | Readonly<Record<string, unknown>>

/**
 * Root of a Yjs-backed document, as returned by `doc.getMap()` / `doc.getArray()`.
 */
export type YjsRoot = Y.Map<unknown> | Y.Array<unknown>

function isYjsArrayNode(value: unknown): value is YjsArrayNode {
  return value instanceof Y.Array || Array.isArray(value)
}

function isYjsMapNode(value: unknown): value is YjsMapNode {
  return value instanceof Y.Map || isPlainRecord(value)
}

function itemAt(items: YjsArrayNode, index: number): unknown {
  return items instanceof Y.Array ? items.get(index) : items[index]
}

function itemsOf(items: YjsArrayNode): readonly unknown[] {
  return items instanceof Y.Array ? items.toArray() : items
}

function memberNames(map: YjsMapNode): string[] {
  return map instanceof Y.Map ? Array.from(map.keys()) : Object.keys(map)
}

function memberValue(map: YjsMapNode, name: string): unknown {
  return map instanceof Y.Map ? map.get(name) : map[name]
}

function describeYjs(value: unknown): string {
  if (value === null) return "null"
  if (value instanceof Y.Map) return "Y.Map"
  if (value instanceof Y.Array) return "Y.Array"
  if (value instanceof Y.Text) return "Y.Text"
  if (Array.isArray(value)) return "array"
  if (isPlainRecord(value)) return "object"
  if (value instanceof Uint8Array) return "binary"
  return typeof value
}

function numericOf(value: unknown): NumericValue | undefined {
  if (typeof value === "number") {
    const integer = integerFromNumber(value)
    return integer === undefined ? { kind: "double", value } : { kind: "integer", value: integer }
  }
  if (typeof value === "bigint") {
    return isRepresentableInteger(value)
      ? { kind: "integer", value }
      : { kind: "double", value: Number(value) }
  }
  return undefined
}

function copyYjs(value: unknown): FrozenNode {
  if (value === null) return frozenNull
  if (typeof value === "boolean") return { kind: "bool", value }
  if (typeof value === "string") return { kind: "string", value }
  if (value instanceof Y.Text) return { kind: "string", value: value.toString() }

  const number = numericOf(value)
  if (number) return numberNode(number)

  if (isYjsArrayNode(value)) {
    return { kind: "array", items: itemsOf(value).map(copyYjs) }
  }
  if (isYjsMapNode(value)) {
    return {
      kind: "object",
      members: memberNames(value).map((name) => [name, copyYjs(memberValue(value, name))] as const),
    }
  }
  return unsupportedValue(`${YJS_ADAPTER_NAME} cannot freeze ${describeYjs(value)}`)
}

class YjsArrayIterator extends IndexedIterator<YjsAdapter> {
  constructor(
    private readonly items: YjsArrayNode,
    index: number
  ) {
    super(items, items.length, index)
  }

  protected at(index: number): YjsAdapter {
    return new YjsAdapter(itemAt(this.items, index))
  }

  clone(): YjsArrayIterator {
    return new YjsArrayIterator(this.items, this.position)
  }
}

class YjsMemberIterator extends IndexedIterator<ObjectMember<YjsAdapter>> {
  constructor(
    private readonly map: YjsMapNode,
    private readonly names: readonly string[],
    index: number
  ) {
    super(map, names.length, index)
  }

  protected at(index: number): ObjectMember<YjsAdapter> {
    const name = this.names[index]
    return [name, new YjsAdapter(memberValue(this.map, name))]
  }

  clone(): YjsMemberIterator {
    return new YjsMemberIterator(this.map, this.names, this.position)
  }
}

/**
 * View over a `Y.Array`, or over a plain array stored inside a Yjs tree.
 * Elements are read with `get(index)` on first dereference.
 */
export class YjsArray implements ArrayView<YjsAdapter> {
  private readonly items: YjsArrayNode

  constructor()
  constructor(value: unknown)
  constructor(...args: [] | [unknown]) {
    const value = args.length === 0 ? emptyArray() : args[0]
    if (!isYjsArrayNode(value)) {
      typeMismatch(`${YJS_ADAPTER_NAME} ${describeYjs(value)} is not an array`)
    }
    this.items = value
  }

  size(): number {
    return this.items.length
  }

  begin(): YjsArrayIterator {
    return new YjsArrayIterator(this.items, 0)
  }

  end(): YjsArrayIterator {
    return new YjsArrayIterator(this.items, this.items.length)
  }

  *[Symbol.iterator](): Generator<YjsAdapter> {
    for (let index = 0; index < this.items.length; index++) {
      yield new YjsAdapter(itemAt(this.items, index))
    }
  }
}

/**
 * View over a `Y.Map`, or over a plain record stored inside a Yjs tree.
 *
 * `Y.Map.get()` returns undefined both for a missing key and for a key holding
 * undefined, so find() goes through an explicit name index.
 */
export class YjsObject implements ObjectView<YjsAdapter> {
  private readonly map: YjsMapNode
  private readonly names = lazy(() => memberNames(this.map))
  private readonly positions = lazy(() => indexNames(this.names()))

  constructor()
  constructor(value: unknown)
  constructor(...args: [] | [unknown]) {
    const value = args.length === 0 ? emptyRecord() : args[0]
    if (!isYjsMapNode(value)) {
      typeMismatch(`${YJS_ADAPTER_NAME} ${describeYjs(value)} is not an object`)
    }
    this.map = value
  }

  size(): number {
    return this.map instanceof Y.Map ? this.map.size : this.names().length
  }

  begin(): YjsMemberIterator {
    return new YjsMemberIterator(this.map, this.names(), 0)
  }

  end(): YjsMemberIterator {
    return new YjsMemberIterator(this.map, this.names(), this.names().length)
  }

  find(name: string): YjsMemberIterator {
    const position = this.positions().get(name) ?? this.names().length
    return new YjsMemberIterator(this.map, this.names(), position)
  }

  *[Symbol.iterator](): Generator<ObjectMember<YjsAdapter>> {
    for (const name of this.names()) {
      yield [name, new YjsAdapter(memberValue(this.map, name))]
    }
  }
}

/**
 * Value contract over a node of a Yjs tree. `Y.Text` reads as a string.
 *
 * Yjs stores JS numbers, so the backend is loose. A bigint in the 64-bit range is
 * an integer only.
 */
export class YjsValue implements ValueContract<YjsArray, YjsObject> {
  constructor(readonly native: unknown) {}

  get hasStrictTypes(): boolean {
    return false
  }

  private get text(): string | undefined {
    if (typeof this.native === "string") return this.native
    return this.native instanceof Y.Text ? this.native.toString() : undefined
  }

  isNull(): boolean {
    return this.native === null
  }

  isBool(): boolean {
    return typeof this.native === "boolean"
  }

  isInteger(): boolean {
    return numericOf(this.native)?.kind === "integer"
  }

  isDouble(): boolean {
    return typeof this.native === "number" || numericOf(this.native)?.kind === "double"
  }

  isNumber(): boolean {
    return typeof this.native === "number" || typeof this.native === "bigint"
  }

  isString(): boolean {
    return typeof this.native === "string" || this.native instanceof Y.Text
  }

  isArray(): boolean {
    return isYjsArrayNode(this.native)
  }

  isObject(): boolean {
    return isYjsMapNode(this.native)
  }

  getBool(): Conversion<boolean> {
    return typeof this.native === "boolean"
      ? converted(this.native)
      : conversionFailure("bool", `${describeYjs(this.native)} is not a bool`)
  }

  getDouble(): Conversion<number> {
    if (typeof this.native === "number") return converted(this.native)
    const number = numericOf(this.native)
    return number?.kind === "double"
      ? converted(number.value)
      : conversionFailure("double", `${describeYjs(this.native)} is not a double`)
  }

  getInteger(): Conversion<bigint> {
    const integer = this.getBigInt()
    if (!integer.ok || isInt64(integer.value)) return integer
    return conversionFailure("integer", `${integer.value} is outside the int64 range`)
  }

  getBigInt(): Conversion<bigint> {
    const number = numericOf(this.native)
    if (number?.kind === "integer") return converted(number.value)
    const reason = number
      ? `${number.value} is not a whole number in the 64-bit range`
      : `${describeYjs(this.native)} is not a number`
    return conversionFailure("integer", reason)
  }

  getString(): Conversion<string> {
    const text = this.text
    return text === undefined
      ? conversionFailure("string", `${describeYjs(this.native)} is not a string`)
      : converted(text)
  }

  getArrayOptional(): YjsArray | undefined {
    return isYjsArrayNode(this.native) ? new YjsArray(this.native) : undefined
  }

  getArraySize(): number | undefined {
    return isYjsArrayNode(this.native) ? this.native.length : undefined
  }

  getObjectOptional(): YjsObject | undefined {
    return isYjsMapNode(this.native) ? new YjsObject(this.native) : undefined
  }

  getObjectSize(): number | undefined {
    if (this.native instanceof Y.Map) return this.native.size
    return isPlainRecord(this.native) ? Object.keys(this.native).length : undefined
  }

  freeze(): FrozenValue {
    return createFrozenValue(copyYjs(this.native), YJS_ADAPTER_NAME)
  }
}

/**
 * Adapter over any node of a Yjs tree. There is no default value: a member holding
 * undefined must stay undefined rather than read as an empty object.
 */
export class YjsAdapter extends BasicAdapter<YjsAdapter, YjsArray, YjsObject, YjsValue> {
  constructor(value: unknown) {
    super(new YjsValue(value))
  }

  get adapterName(): string {
    return YJS_ADAPTER_NAME
  }

  get native(): unknown {
    return this.value.native
  }

  protected emptyArray(): YjsArray {
    return new YjsArray()
  }

  protected emptyObject(): YjsObject {
    return new YjsObject()
  }
}

export const yjsTraits = {
  adapterName: YJS_ADAPTER_NAME,
  hasStrictTypes: false,
  wrap: (document: YjsRoot) => new YjsAdapter(document),
} as const satisfies AdapterTraits<YjsRoot, YjsAdapter>
