import type { ArrayView, ObjectMember, ObjectView } from "../adapter"
import { IndexedIterator } from "../iterators"
import { indexNames, lazy } from "../utils"

/**
 * Wraps one native child into its backend's adapter.
 */
export type WrapChild<V, A> = (child: V) => A

export class JsArrayIterator<A, V> extends IndexedIterator<A> {
  constructor(
    private readonly items: readonly V[],
    private readonly wrap: WrapChild<V, A>,
    index: number
  ) {
    super(items, items.length, index)
  }

  protected at(index: number): A {
    return this.wrap(this.items[index])
  }

  clone(): JsArrayIterator<A, V> {
    return new JsArrayIterator(this.items, this.wrap, this.position)
  }
}

export class JsMemberIterator<A, V> extends IndexedIterator<ObjectMember<A>> {
  constructor(
    private readonly record: Readonly<Record<string, V>>,
    private readonly names: readonly string[],
    private readonly wrap: WrapChild<V, A>,
    index: number
  ) {
    super(record, names.length, index)
  }

  protected at(index: number): ObjectMember<A> {
    const name = this.names[index]
    return [name, this.wrap(this.record[name])]
  }

  clone(): JsMemberIterator<A, V> {
    return new JsMemberIterator(this.record, this.names, this.wrap, this.position)
  }
}

/**
 * View over a JS array produced by a parser. Holds a reference only.
 */
export class JsArrayView<A, V> implements ArrayView<A> {
  protected constructor(
    protected readonly items: readonly V[],
    private readonly wrap: WrapChild<V, A>
  ) {}

  size(): number {
    return this.items.length
  }

  begin(): JsArrayIterator<A, V> {
    return new JsArrayIterator(this.items, this.wrap, 0)
  }

  end(): JsArrayIterator<A, V> {
    return new JsArrayIterator(this.items, this.wrap, this.items.length)
  }

  *[Symbol.iterator](): Generator<A> {
    for (const item of this.items) {
      yield this.wrap(item)
    }
  }
}

/**
 * View over a JS record produced by a parser. Member names are listed once, on
 * first use, in `Object.keys` order.
 */
export class JsObjectView<A, V> implements ObjectView<A> {
  private readonly names = lazy(() => Object.keys(this.record))
  private readonly positions = lazy(() => indexNames(this.names()))

  protected constructor(
    protected readonly record: Readonly<Record<string, V>>,
    private readonly wrap: WrapChild<V, A>
  ) {}

  size(): number {
    return this.names().length
  }

  begin(): JsMemberIterator<A, V> {
    return new JsMemberIterator(this.record, this.names(), this.wrap, 0)
  }

  end(): JsMemberIterator<A, V> {
    return new JsMemberIterator(this.record, this.names(), this.wrap, this.size())
  }

  /**
   * Looks the name up in the own-member index rather than reading `record[name]`,
   * which would also see inherited properties such as `toString`.
   */
  find(name: string): JsMemberIterator<A, V> {
    const position = this.positions().get(name) ?? this.size()
    return new JsMemberIterator(this.record, this.names(), this.wrap, position)
  }

  *[Symbol.iterator](): Generator<ObjectMember<A>> {
    for (const name of this.names()) {
      yield [name, this.wrap(this.record[name])]
    }
  }
}
