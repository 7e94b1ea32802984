/**
 * Representations a scalar getter can be asked for.
 */
export type ConversionTarget = "bool" | "integer" | "double" | "number" | "string"

export interface ConversionSuccess<T> {
  readonly ok: true
  readonly value: T
}

/**
 * A scalar getter could not produce the requested representation.
 * This is an expected outcome: it is returned, never thrown.
 */
export interface ConversionFailure {
  readonly ok: false
  readonly target: ConversionTarget
  readonly reason: string
}

/**
 * Outcome of a scalar extraction.
 */
export type Conversion<T> = ConversionSuccess<T> | ConversionFailure

export function converted<T>(value: T): ConversionSuccess<T> {
  return { ok: true, value }
}

export function conversionFailure(target: ConversionTarget, reason: string): ConversionFailure {
  return { ok: false, target, reason }
}

/**
 * Returns the converted value, or `fallback` when the conversion failed.
 */
export function valueOr<T>(conversion: Conversion<T>, fallback: T): T {
  return conversion.ok ? conversion.value : fallback
}
