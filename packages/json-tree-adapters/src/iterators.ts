import type { ViewIterator } from "./adapter"
import { invalidIterator } from "./error"

/**
 * Cursor over a container addressed by position.
 * Children are only materialized when dereferenced.
 */
export abstract class IndexedIterator<T> implements ViewIterator<T> {
  protected constructor(
    protected readonly container: object,
    private readonly length: number,
    private index: number
  ) {
    if (index < 0 || index > length) {
      invalidIterator(`Iterator position ${index} is outside [0, ${length}]`)
    }
  }

  get position(): number {
    return this.index
  }

  /**
   * Builds the element at an in-range position.
   */
  protected abstract at(index: number): T

  abstract clone(): IndexedIterator<T>

  deref(): T {
    if (this.index >= this.length) {
      invalidIterator("Cannot dereference an iterator positioned at end()")
    }
    return this.at(this.index)
  }

  increment(): this {
    return this.advance(1)
  }

  decrement(): this {
    return this.advance(-1)
  }

  advance(n: number): this {
    const next = this.index + n
    if (next < 0 || next > this.length) {
      invalidIterator(`Cannot move iterator to position ${next} of a container of size ${this.length}`)
    }
    this.index = next
    return this
  }

  equals(other: ViewIterator<T>): boolean {
    return (
      other instanceof IndexedIterator &&
      other.container === this.container &&
      other.position === this.index
    )
  }

  distanceTo(other: ViewIterator<T>): number {
    if (!(other instanceof IndexedIterator) || other.container !== this.container) {
      invalidIterator("Cannot measure the distance between iterators over different containers")
    }
    return other.position - this.index
  }
}

/**
 * Signed element count from `from` to `to`; both must iterate the same container.
 */
export function difference<T>(from: ViewIterator<T>, to: ViewIterator<T>): number {
  return from.distanceTo(to)
}
