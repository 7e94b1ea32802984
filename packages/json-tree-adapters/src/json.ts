import { isPlainRecord } from "./utils"

/**
 * A path to a value within a document: member names and array indices.
 */
export type Path = readonly (string | number)[]

/**
 * A JSON primitive.
 * Note: `undefined` may appear as an object property of a hand-built tree. It has no
 * kind, compares unequal to everything and cannot be frozen.
 */
export type JSONPrimitive = undefined | null | boolean | number | string

/**
 * A JSON record.
 */
export type JSONRecord = { readonly [k: string]: JSONValue }

/**
 * A JSON array.
 */
export type JSONArray = readonly JSONValue[]

/**
 * A JSON value, as produced by `JSON.parse`.
 * Documents are never mutated, so containers are typed read-only.
 */
export type JSONValue = JSONPrimitive | JSONArray | JSONRecord

export function isJSONArray(value: JSONValue): value is JSONArray {
  return Array.isArray(value)
}

/**
 * Only object literals and null-prototype objects count as records. Dates, maps and
 * other class instances do not.
 */
export function isJSONRecord(value: JSONValue): value is JSONRecord {
  return isPlainRecord(value)
}
