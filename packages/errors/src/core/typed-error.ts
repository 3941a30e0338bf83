import type {
  ChainLink,
  ErrorKind,
  SerializedErrorChain,
  SourceLocation,
} from "../ports/error"
import { OpaqueError } from "./opaque-error"
import { printKind } from "./print-kind"
import { renderError } from "./render"
import { serializeError } from "./serialize"
import { sourceLocation } from "./source-location"

export type TypedErrorOptions = Readonly<{
  location: SourceLocation
  /** Defaults to the printed kind */
  description?: string
  cause?: OpaqueError
}>

/**
 * Error carrying a caller-defined, matchable kind.
 *
 * @example
 * ```ts
 * type StoreKind = "NotFound" | "Conflict"
 *
 * const err = new TypedError<StoreKind>("NotFound", {
 *   location: { file: "store.ts", line: 42 },
 *   description: "no user with that id",
 * })
 *
 * if (err.kind === "NotFound") {
 *   // ...
 * }
 * ```
 */
export class TypedError<K extends ErrorKind = string> extends Error implements ChainLink {
  readonly kind: K
  readonly description: string
  readonly location: SourceLocation
  declare readonly cause: OpaqueError | undefined

  constructor(kind: K, options: TypedErrorOptions) {
    const description = options.description ?? printKind(kind)

    super(description, { cause: options.cause })

    this.name = this.constructor.name
    this.kind = kind
    this.description = description
    this.location = sourceLocation(options.location.file, options.location.line)

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  get kindText(): string {
    return printKind(this.kind)
  }

  /**
   * Erase the kind, keeping description, location and cause.
   *
   * One-way: the kind value cannot be recovered from the result.
   */
  erase(): OpaqueError {
    return new OpaqueError({
      kindText: this.kindText,
      description: this.description,
      location: this.location,
      cause: this.cause,
    })
  }

  toString(): string {
    return renderError(this)
  }

  toJSON(): SerializedErrorChain {
    return serializeError(this)
  }
}
