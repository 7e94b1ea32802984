import type { Adapter } from "./adapter"
import type { Path } from "./json"

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/

/**
 * Walks `path` from `root` without throwing. String segments select object members,
 * numeric segments select array elements. Returns undefined as soon as a segment
 * does not resolve.
 */
export function descend(root: Adapter, path: Path): Adapter | undefined {
  let current: Adapter = root
  for (const segment of path) {
    if (typeof segment === "string") {
      const object = current.getObjectOptional()
      if (!object) return undefined
      const found = object.find(segment)
      if (found.equals(object.end())) return undefined
      current = found.deref()[1]
    } else {
      const array = current.getArrayOptional()
      if (!array) return undefined
      if (!Number.isInteger(segment) || segment < 0 || segment >= array.size()) {
        return undefined
      }
      current = array.begin().advance(segment).deref()
    }
  }
  return current
}

/**
 * Renders a path the way validation errors report it, e.g. `$.items[0]["a b"]`.
 */
export function formatPath(path: Path): string {
  let text = "$"
  for (const segment of path) {
    if (typeof segment === "number") {
      text += `[${segment}]`
    } else if (IDENTIFIER.test(segment)) {
      text += `.${segment}`
    } else {
      text += `[${JSON.stringify(segment)}]`
    }
  }
  return text
}
