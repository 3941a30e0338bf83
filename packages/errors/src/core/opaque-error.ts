import type { ChainLink, SerializedErrorChain, SourceLocation } from "../ports/error"
import { renderError } from "./render"
import { serializeError } from "./serialize"
import { sourceLocation } from "./source-location"

export type OpaqueErrorOptions = Readonly<{
  kindText: string
  description: string
  location: SourceLocation
  cause?: OpaqueError
  /** Marks a link whose own causes were dropped, see {@link ChainLink.truncated} */
  truncated?: boolean
}>

/**
 * Type-erased link of a cause chain.
 *
 * Produced by erasing a {@link TypedError} or by converting a foreign error.
 * Only the printed kind survives, so links of unrelated kind types can be
 * chained together. Causes are shared by reference, never copied.
 */
export class OpaqueError extends Error implements ChainLink {
  readonly kindText: string
  /** Erased; only {@link kindText} remains */
  declare readonly kind?: never
  readonly description: string
  readonly location: SourceLocation
  declare readonly cause: OpaqueError | undefined
  readonly truncated: boolean

  constructor(options: OpaqueErrorOptions) {
    super(options.description, { cause: options.cause })

    this.name = this.constructor.name
    this.kindText = options.kindText
    this.description = options.description
    this.location = sourceLocation(options.location.file, options.location.line)
    this.truncated = options.truncated ?? false

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toString(): string {
    return renderError(this)
  }

  toJSON(): SerializedErrorChain {
    return serializeError(this)
  }
}
