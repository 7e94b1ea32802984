import { isInteger as isIntegerText, isNumber as isNumberText } from "lossless-json"

export const INT32_MIN = -2147483648n
export const INT32_MAX = 2147483647n
export const UINT32_MAX = 4294967295n
export const INT64_MIN = -9223372036854775808n
export const INT64_MAX = 9223372036854775807n
export const UINT64_MAX = 18446744073709551615n

/**
 * Native integer encodings a frozen integer remembers.
 */
export type IntegerWidth = "int32" | "uint32" | "int64" | "uint64"

/**
 * A number read out of a document without loss: integers as bigint, everything else as double.
 */
export type NumericValue =
  | { readonly kind: "integer"; readonly value: bigint }
  | { readonly kind: "double"; readonly value: number }

export function isInt64(value: bigint): boolean {
  return value >= INT64_MIN && value <= INT64_MAX
}

/**
 * Whether an integer fits one of the native encodings (int64 or uint64).
 */
export function isRepresentableInteger(value: bigint): boolean {
  return value >= INT64_MIN && value <= UINT64_MAX
}

/**
 * Narrowest native encoding for an integer, tried in the order
 * int32, uint32, int64, uint64. Undefined when none fits.
 */
export function integerWidth(value: bigint): IntegerWidth | undefined {
  if (value >= INT32_MIN && value <= INT32_MAX) return "int32"
  if (value >= 0n && value <= UINT32_MAX) return "uint32"
  if (value >= INT64_MIN && value <= INT64_MAX) return "int64"
  if (value >= 0n && value <= UINT64_MAX) return "uint64"
  return undefined
}

/**
 * Exact integer value of a JS number, if it is whole and within the native integer range.
 * Loose backends use this to decide whether a double also counts as an integer.
 */
export function integerFromNumber(value: number): bigint | undefined {
  if (!Number.isInteger(value)) return undefined
  const exact = BigInt(value)
  return isRepresentableInteger(exact) ? exact : undefined
}

/**
 * Classifies a JSON number literal. Integer literals outside the native
 * integer range are read as doubles.
 */
export function parseNumberText(text: string): NumericValue {
  if (isIntegerText(text)) {
    const exact = BigInt(text)
    if (isRepresentableInteger(exact)) {
      return { kind: "integer", value: exact }
    }
  }
  return { kind: "double", value: Number(text) }
}

/**
 * Parses an integer literal held in a string, bounded to int64.
 */
export function parseInt64Text(text: string): bigint | undefined {
  if (!isIntegerText(text)) return undefined
  const exact = BigInt(text)
  return isInt64(exact) ? exact : undefined
}

/**
 * Parses a JSON number literal held in a string.
 */
export function parseDoubleText(text: string): number | undefined {
  return isNumberText(text) ? Number(text) : undefined
}

/**
 * Exact numeric equality. An integer and a double are equal only if the
 * double is whole and has exactly the integer's value.
 */
export function numbersEqual(a: NumericValue, b: NumericValue): boolean {
  if (a.kind === "integer") {
    return b.kind === "integer" ? a.value === b.value : integerEqualsDouble(a.value, b.value)
  }
  return b.kind === "double" ? a.value === b.value : integerEqualsDouble(b.value, a.value)
}

function integerEqualsDouble(integer: bigint, double: number): boolean {
  return Number.isInteger(double) && BigInt(double) === integer
}
