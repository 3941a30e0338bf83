import type { SourceLocation } from "./error"

/**
 * What a conversion extracts from a foreign error value.
 */
export type OpaqueErrorInit = Readonly<{
  kindText: string
  description: string

  /** Omit to use the location of the site doing the wrapping */
  location?: SourceLocation

  /** Foreign value to convert next, continuing the chain */
  cause?: unknown
}>

/**
 * Conversion from an error type this library does not own into an opaque
 * chain link.
 *
 * @example
 * ```ts
 * const httpConversion: ForeignConversion<HttpError> = {
 *   name: "http",
 *   matches: (value): value is HttpError => value instanceof HttpError,
 *   toOpaque: (err) => ({ kindText: `Http${err.status}`, description: err.message }),
 * }
 * ```
 */
export interface ForeignConversion<E> {
  readonly name: string

  matches(value: unknown): value is E

  toOpaque(value: E): OpaqueErrorInit
}
