import { inspect } from "node:util"
import type { ForeignConversion } from "../../ports/conversion"

export const NON_ERROR_KIND = "NonErrorThrown"

/**
 * Built-in `Error` instances: the name becomes the kind, the message the
 * description. `error.cause` is followed when present.
 */
export const nativeErrorConversion: ForeignConversion<Error> = {
  name: "native-error",
  matches: (value): value is Error => value instanceof Error,
  toOpaque: (error) => ({
    kindText: error.name,
    description: error.message,
    ...(error.cause !== undefined && { cause: error.cause }),
  }),
}

/**
 * Anything thrown that is not an `Error`. Matches every value.
 */
export const nonErrorConversion: ForeignConversion<unknown> = {
  name: "non-error",
  matches: (value): value is unknown => true,
  toOpaque: (value) => ({
    kindText: NON_ERROR_KIND,
    description:
      typeof value === "string"
        ? value
        : inspect(value, { breakLength: Number.POSITIVE_INFINITY, compact: true }),
  }),
}
