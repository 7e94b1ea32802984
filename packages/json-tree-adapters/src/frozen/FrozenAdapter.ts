import equal from "fast-deep-equal"
import type {
  Adapter,
  AdapterTraits,
  ArrayView,
  ObjectMember,
  ObjectView,
  ValueContract,
} from "../adapter"
import { BasicAdapter } from "../BasicAdapter"
import { type Conversion, conversionFailure, converted } from "../conversion"
import { typeMismatch } from "../error"
import { IndexedIterator } from "../iterators"
import { isInt64 } from "../numbers"
import { indexNames, lazy } from "../utils"
import {
  cloneNode,
  emptyFrozenArray,
  emptyFrozenObject,
  type FrozenArrayNode,
  type FrozenNode,
  type FrozenObjectNode,
} from "./FrozenNode"
import { createFrozenValue, type FrozenValue } from "./FrozenValue"

export const FROZEN_ADAPTER_NAME = "FrozenAdapter"

class FrozenArrayIterator extends IndexedIterator<FrozenAdapter> {
  constructor(
    private readonly node: FrozenArrayNode,
    index: number
  ) {
    super(node, node.items.length, index)
  }

  protected at(index: number): FrozenAdapter {
    return new FrozenAdapter(this.node.items[index])
  }

  clone(): FrozenArrayIterator {
    return new FrozenArrayIterator(this.node, this.position)
  }
}

class FrozenMemberIterator extends IndexedIterator<ObjectMember<FrozenAdapter>> {
  constructor(
    private readonly node: FrozenObjectNode,
    index: number
  ) {
    super(node, node.members.length, index)
  }

  protected at(index: number): ObjectMember<FrozenAdapter> {
    const [name, value] = this.node.members[index]
    return [name, new FrozenAdapter(value)]
  }

  clone(): FrozenMemberIterator {
    return new FrozenMemberIterator(this.node, this.position)
  }
}

export class FrozenArray implements ArrayView<FrozenAdapter> {
  private readonly node: FrozenArrayNode

  constructor(node: FrozenNode = emptyFrozenArray()) {
    if (node.kind !== "array") {
      typeMismatch(`${FROZEN_ADAPTER_NAME} ${node.kind} is not an array`)
    }
    this.node = node
  }

  size(): number {
    return this.node.items.length
  }

  begin(): FrozenArrayIterator {
    return new FrozenArrayIterator(this.node, 0)
  }

  end(): FrozenArrayIterator {
    return new FrozenArrayIterator(this.node, this.node.items.length)
  }

  *[Symbol.iterator](): Generator<FrozenAdapter> {
    for (const item of this.node.items) {
      yield new FrozenAdapter(item)
    }
  }
}

export class FrozenObject implements ObjectView<FrozenAdapter> {
  private readonly node: FrozenObjectNode
  private readonly positions = lazy(() => indexNames(this.node.members.map(([name]) => name)))

  constructor(node: FrozenNode = emptyFrozenObject()) {
    if (node.kind !== "object") {
      typeMismatch(`${FROZEN_ADAPTER_NAME} ${node.kind} is not an object`)
    }
    this.node = node
  }

  size(): number {
    return this.node.members.length
  }

  begin(): FrozenMemberIterator {
    return new FrozenMemberIterator(this.node, 0)
  }

  end(): FrozenMemberIterator {
    return new FrozenMemberIterator(this.node, this.node.members.length)
  }

  find(name: string): FrozenMemberIterator {
    return new FrozenMemberIterator(this.node, this.positions().get(name) ?? this.size())
  }

  *[Symbol.iterator](): Generator<ObjectMember<FrozenAdapter>> {
    for (const [name, value] of this.node.members) {
      yield [name, new FrozenAdapter(value)]
    }
  }
}

/**
 * Value contract over a frozen node. Frozen trees keep integers and doubles apart,
 * so the backend is strict whatever the source backend was.
 */
export class FrozenNodeValue implements ValueContract<FrozenArray, FrozenObject> {
  constructor(readonly node: FrozenNode) {}

  get hasStrictTypes(): boolean {
    return true
  }

  isNull(): boolean {
    return this.node.kind === "null"
  }

  isBool(): boolean {
    return this.node.kind === "bool"
  }

  isInteger(): boolean {
    return this.node.kind === "integer"
  }

  isDouble(): boolean {
    return this.node.kind === "double"
  }

  isNumber(): boolean {
    return this.node.kind === "integer" || this.node.kind === "double"
  }

  isString(): boolean {
    return this.node.kind === "string"
  }

  isArray(): boolean {
    return this.node.kind === "array"
  }

  isObject(): boolean {
    return this.node.kind === "object"
  }

  getBool(): Conversion<boolean> {
    return this.node.kind === "bool"
      ? converted(this.node.value)
      : conversionFailure("bool", `frozen ${this.node.kind} is not a bool`)
  }

  getDouble(): Conversion<number> {
    return this.node.kind === "double"
      ? converted(this.node.value)
      : conversionFailure("double", `frozen ${this.node.kind} is not a double`)
  }

  getInteger(): Conversion<bigint> {
    if (this.node.kind !== "integer") {
      return conversionFailure("integer", `frozen ${this.node.kind} is not an integer`)
    }
    return isInt64(this.node.value)
      ? converted(this.node.value)
      : conversionFailure("integer", `${this.node.value} is outside the int64 range`)
  }

  getBigInt(): Conversion<bigint> {
    return this.node.kind === "integer"
      ? converted(this.node.value)
      : conversionFailure("integer", `frozen ${this.node.kind} is not an integer`)
  }

  getString(): Conversion<string> {
    return this.node.kind === "string"
      ? converted(this.node.value)
      : conversionFailure("string", `frozen ${this.node.kind} is not a string`)
  }

  getArrayOptional(): FrozenArray | undefined {
    return this.node.kind === "array" ? new FrozenArray(this.node) : undefined
  }

  getArraySize(): number | undefined {
    return this.node.kind === "array" ? this.node.items.length : undefined
  }

  getObjectOptional(): FrozenObject | undefined {
    return this.node.kind === "object" ? new FrozenObject(this.node) : undefined
  }

  getObjectSize(): number | undefined {
    return this.node.kind === "object" ? this.node.members.length : undefined
  }

  freeze(): FrozenValue {
    return createFrozenValue(cloneNode(this.node), FROZEN_ADAPTER_NAME)
  }
}

export class FrozenAdapter extends BasicAdapter<
  FrozenAdapter,
  FrozenArray,
  FrozenObject,
  FrozenNodeValue
> {
  constructor(node: FrozenNode = emptyFrozenObject()) {
    super(new FrozenNodeValue(node))
  }

  get adapterName(): string {
    return FROZEN_ADAPTER_NAME
  }

  get node(): FrozenNode {
    return this.value.node
  }

  protected emptyArray(): FrozenArray {
    return new FrozenArray()
  }

  protected emptyObject(): FrozenObject {
    return new FrozenObject()
  }

  /**
   * Identical frozen trees are equal in either mode, so a fast-deep-equal match
   * short-circuits. Any other pair, including reordered members, takes the full walk.
   */
  override equalTo(other: Adapter, strict: boolean): boolean {
    if (other instanceof FrozenAdapter && equal(this.node, other.node)) {
      return true
    }
    return super.equalTo(other, strict)
  }
}

export const frozenTraits = {
  adapterName: FROZEN_ADAPTER_NAME,
  hasStrictTypes: true,
  wrap: (document: FrozenValue) => document.adapter(),
} as const satisfies AdapterTraits<FrozenValue, FrozenAdapter>
