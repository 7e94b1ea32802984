import { freeze } from "immer"

/**
 * Memoizes a factory: the first call builds the value, later calls return it.
 */
export function lazy<T>(factory: () => T): () => T {
  let cell: { value: T } | undefined
  return () => {
    if (!cell) {
      cell = { value: factory() }
    }
    return cell.value
  }
}

/**
 * Checks if a value is an object (typeof === "object" && !== null).
 */
export function isObject(value: unknown): value is object {
  return value !== null && typeof value === "object"
}

/**
 * Checks if a value is a plain record (an object literal or a null-prototype object).
 * Arrays, class instances and typed arrays are not.
 */
export function isPlainRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  if (!isObject(value) || Array.isArray(value)) return false
  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Process-wide empty array shared by default-constructed array views.
 */
export const emptyArray = lazy(() => freeze<readonly never[]>([], true))

/**
 * Process-wide empty record shared by default-constructed object views.
 */
export const emptyRecord = lazy(() => freeze<Readonly<Record<string, never>>>({}, true))

/**
 * Builds a name -> position index over member names.
 */
export function indexNames(names: readonly string[]): ReadonlyMap<string, number> {
  const index = new Map<string, number>()
  names.forEach((name, position) => {
    index.set(name, position)
  })
  return index
}
