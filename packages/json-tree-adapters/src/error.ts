export type AdapterErrorCode = "TypeMismatch" | "UnsupportedValue" | "InvalidIterator"

/**
 * Base class for contract violations raised by adapters, views and iterators.
 * These signal a programming error and are never meant to be caught and retried.
 */
export class AdapterError extends Error {
  constructor(
    readonly code: AdapterErrorCode,
    msg: string
  ) {
    super(msg)
    this.name = "AdapterError"

    // Set the prototype explicitly for better instanceof support
    Object.setPrototypeOf(this, AdapterError.prototype)
  }
}

/**
 * A view was requested over a value of another kind.
 */
export class TypeMismatchError extends AdapterError {
  constructor(msg: string) {
    super("TypeMismatch", msg)
    this.name = "TypeMismatchError"
    Object.setPrototypeOf(this, TypeMismatchError.prototype)
  }
}

/**
 * A native node falls outside the kinds the adapter contract defines.
 */
export class UnsupportedValueError extends AdapterError {
  constructor(msg: string) {
    super("UnsupportedValue", msg)
    this.name = "UnsupportedValueError"
    Object.setPrototypeOf(this, UnsupportedValueError.prototype)
  }
}

export class InvalidIteratorError extends AdapterError {
  constructor(msg: string) {
    super("InvalidIterator", msg)
    this.name = "InvalidIteratorError"
    Object.setPrototypeOf(this, InvalidIteratorError.prototype)
  }
}

export function typeMismatch(message: string): never {
  throw new TypeMismatchError(message)
}

export function unsupportedValue(message: string): never {
  throw new UnsupportedValueError(message)
}

export function invalidIterator(message: string): never {
  throw new InvalidIteratorError(message)
}
