import type { Conversion } from "./conversion"
import type { FrozenValue } from "./frozen/FrozenValue"

/**
 * Kinds a document node can have.
 */
export type ValueKind = "null" | "bool" | "integer" | "double" | "string" | "array" | "object"

/**
 * Kinds a constraint can declare. "number" accepts both integers and doubles.
 */
export type DeclaredKind = ValueKind | "number"

/**
 * Bidirectional cursor over a container view.
 * Only valid while the document it reads from is alive.
 */
export interface ViewIterator<T> {
  /** Offset from the container's begin(). */
  readonly position: number
  deref(): T
  increment(): this
  decrement(): this
  advance(n: number): this
  /** True if both iterators point at the same position of the same container. */
  equals(other: ViewIterator<T>): boolean
  /** Signed element count from this iterator to `other`. */
  distanceTo(other: ViewIterator<T>): number
  clone(): ViewIterator<T>
}

/**
 * An owned member name paired with a view of its value.
 */
export type ObjectMember<A> = readonly [name: string, value: A]

export interface ArrayView<A> extends Iterable<A> {
  size(): number
  begin(): ViewIterator<A>
  end(): ViewIterator<A>
}

export interface ObjectView<A> extends Iterable<ObjectMember<A>> {
  size(): number
  begin(): ViewIterator<ObjectMember<A>>
  end(): ViewIterator<ObjectMember<A>>
  /**
   * Iterator at the member called `name`, or exactly this view's end() when absent.
   */
  find(name: string): ViewIterator<ObjectMember<A>>
}

/**
 * Read-only primitives each backend implements over one native node.
 */
export interface ValueContract<TArray, TObject> {
  /**
   * Whether the backend keeps integers and doubles apart.
   * Must be the same for every value a backend produces.
   */
  readonly hasStrictTypes: boolean

  isNull(): boolean
  isBool(): boolean
  isInteger(): boolean
  isDouble(): boolean
  isNumber(): boolean
  isString(): boolean
  isArray(): boolean
  isObject(): boolean

  getBool(): Conversion<boolean>
  getDouble(): Conversion<number>
  /** Signed 64-bit value of any integer encoding. Fails rather than truncate. */
  getInteger(): Conversion<bigint>
  /** Exact value of any integer-kind node, uint64 values above int64 included. */
  getBigInt(): Conversion<bigint>
  getString(): Conversion<string>

  getArrayOptional(): TArray | undefined
  getArraySize(): number | undefined
  getObjectOptional(): TObject | undefined
  getObjectSize(): number | undefined

  freeze(): FrozenValue
}

/**
 * Uniform read-only node every backend presents to the constraint engine.
 */
export interface Adapter {
  /** Diagnostic name of the backend that produced this node. */
  readonly adapterName: string
  readonly hasStrictTypes: boolean

  isNull(): boolean
  isBool(): boolean
  isInteger(): boolean
  isDouble(): boolean
  isNumber(): boolean
  isString(): boolean
  isArray(): boolean
  isObject(): boolean
  kind(): ValueKind | undefined
  satisfiesKind(kind: DeclaredKind): boolean

  getBool(): Conversion<boolean>
  getDouble(): Conversion<number>
  getInteger(): Conversion<bigint>
  getBigInt(): Conversion<bigint>
  getNumber(): Conversion<number>
  getString(): Conversion<string>

  getArray(): ArrayView<Adapter>
  getArrayOptional(): ArrayView<Adapter> | undefined
  getArraySize(): number | undefined
  getObject(): ObjectView<Adapter>
  getObjectOptional(): ObjectView<Adapter> | undefined
  getObjectSize(): number | undefined

  asArray(): ArrayView<Adapter> | undefined
  asObject(): ObjectView<Adapter> | undefined
  asBool(): Conversion<boolean>
  asDouble(): Conversion<number>
  asInteger(): Conversion<bigint>
  asString(): Conversion<string>

  maybeArray(): boolean
  maybeBool(): boolean
  maybeDouble(): boolean
  maybeInteger(): boolean
  maybeNull(): boolean
  maybeObject(): boolean
  maybeString(): boolean

  applyToArray(fn: (element: Adapter) => boolean): boolean
  applyToObject(fn: (name: string, value: Adapter) => boolean): boolean

  equalTo(other: Adapter, strict: boolean): boolean
  freeze(): FrozenValue
}

/**
 * Static description of a backend: its diagnostic name, typing discipline and how to
 * wrap its native document root. Resolved at the call site, never registered at runtime.
 */
export interface AdapterTraits<TDocument, TAdapter extends Adapter> {
  readonly adapterName: string
  readonly hasStrictTypes: boolean
  wrap(document: TDocument): TAdapter
}
