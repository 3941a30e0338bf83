import type { ForeignConversion, OpaqueErrorInit } from "../../ports/conversion"
import type { SourceLocation } from "../../ports/error"
import { OpaqueError } from "../opaque-error"
import { isOpaqueError, isTypedError } from "../utils/is-chainable"
import { resolveMaxDepth } from "../utils/max-depth"
import { nativeErrorConversion, nonErrorConversion } from "./conversions"

export const DEFAULT_CONVERSION_MAX_DEPTH = 50

export type ErrorConverterOptions = Readonly<{
  /** Links produced from one foreign value, causes included. Default: 50 */
  maxDepth?: number
}>

const BUILT_IN_CONVERSIONS: readonly ForeignConversion<unknown>[] = [
  nativeErrorConversion,
  nonErrorConversion,
]

/**
 * Turns any caught value into an {@link OpaqueError} so it can serve as a cause.
 *
 * Registered conversions are tried newest first, then the built-ins
 * (`Error` instances, then everything else).
 */
export class ErrorConverter {
  readonly maxDepth: number

  constructor(
    options: ErrorConverterOptions = {},
    private readonly conversions: readonly ForeignConversion<unknown>[] = [],
  ) {
    this.maxDepth = resolveMaxDepth(options.maxDepth, DEFAULT_CONVERSION_MAX_DEPTH)
  }

  /**
   * Returns a new converter that tries `conversion` before any already registered.
   */
  register<E>(conversion: ForeignConversion<E>): ErrorConverter {
    return new ErrorConverter({ maxDepth: this.maxDepth }, [
      conversion,
      ...this.conversions,
    ])
  }

  /**
   * Convert `value` and its foreign causes.
   *
   * - errors this library owns are erased (or passed through) and end the walk
   * - links without their own location get `location`
   * - a value seen twice ends the chain
   * - causes past `maxDepth` are dropped and the last link is marked `truncated`
   */
  convert(value: unknown, location: SourceLocation): OpaqueError {
    const owned = toOwned(value)
    if (owned) return owned

    const seen = new WeakSet<object>()
    remember(seen, value)

    const head = this.describe(value)
    const rest: OpaqueErrorInit[] = []

    let tail: OpaqueError | undefined
    let next = head.cause
    let truncated = false

    while (next !== undefined) {
      if (rest.length + 1 >= this.maxDepth) {
        truncated = true
        break
      }

      const ownedCause = toOwned(next)

      if (ownedCause) {
        tail = ownedCause
        break
      }

      if (!remember(seen, next)) break

      const init = this.describe(next)

      rest.push(init)
      next = init.cause
    }

    const last = rest.length - 1
    const cause = rest.reduceRight<OpaqueError | undefined>(
      (acc, init, index) => toOpaqueError(init, location, acc, truncated && index === last),
      tail,
    )

    return toOpaqueError(head, location, cause, truncated && last < 0)
  }

  private describe(value: unknown): OpaqueErrorInit {
    for (const conversion of this.conversions) {
      if (conversion.matches(value)) return conversion.toOpaque(value)
    }

    for (const conversion of BUILT_IN_CONVERSIONS) {
      if (conversion.matches(value)) return conversion.toOpaque(value)
    }

    return nonErrorConversion.toOpaque(value)
  }
}

function toOwned(value: unknown): OpaqueError | undefined {
  if (isOpaqueError(value)) return value
  if (isTypedError(value)) return value.erase()

  return undefined
}

function remember(seen: WeakSet<object>, value: unknown): boolean {
  if (typeof value !== "object" || value === null) return true
  if (seen.has(value)) return false

  seen.add(value)
  return true
}

function toOpaqueError(
  init: OpaqueErrorInit,
  fallback: SourceLocation,
  cause: OpaqueError | undefined,
  truncated: boolean,
): OpaqueError {
  return new OpaqueError({
    kindText: init.kindText,
    description: init.description,
    location: init.location ?? fallback,
    cause,
    truncated,
  })
}

export function createErrorConverter(options: ErrorConverterOptions = {}): ErrorConverter {
  return new ErrorConverter(options)
}

export const defaultErrorConverter: ErrorConverter = createErrorConverter()
