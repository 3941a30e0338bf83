import {
  isChainable,
  renderError,
  type SerializedFrame,
  serializeError,
} from "@faultline/errors"
import { errWithCause } from "pino-std-serializers"

export type SerializeLogErrorOptions = Readonly<{
  /** Frames kept from the cause chain */
  maxDepth?: number
}>

/**
 * Log form of an error chain built by `@faultline/errors`.
 */
export type SerializedChainError = {
  type: string
  message: string
  kind: string
  location: string
  rendered: string
  chain: readonly SerializedFrame[]
  truncated: boolean
  stack?: string
}

/**
 * Serializer for the `err` field of a log entry.
 *
 * - error chains keep their kinds, locations and rendered text
 * - other `Error` values go through `errWithCause`
 * - anything else is returned unchanged
 */
export function serializeLogError(
  value: unknown,
  options: SerializeLogErrorOptions = {},
): unknown {
  if (isChainable(value)) {
    const { frames, truncated } = serializeError(value, options)
    const { file, line } = value.location

    const serialized: SerializedChainError = {
      type: value.name,
      message: value.description,
      kind: value.kindText,
      location: `${file}:${line}`,
      rendered: renderError(value, options),
      chain: frames,
      truncated,
    }

    if (value.stack !== undefined) serialized.stack = value.stack

    return serialized
  }

  if (value instanceof Error) return errWithCause(value)

  return value
}
