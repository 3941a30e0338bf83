import type { ErrorKind, SourceLocation } from "../../ports/error"
import type { OpaqueError } from "../opaque-error"
import { TypedError } from "../typed-error"
import { type Chainable, isOpaqueError } from "./is-chainable"

/**
 * Fresh failure with no underlying cause.
 *
 * @example
 * ```ts
 * throw createError("NotFound", { file: "users.ts", line: 12 }, "no user with that id")
 * ```
 */
export function createError<K extends ErrorKind>(
  kind: K,
  location: SourceLocation,
  description?: string,
): TypedError<K> {
  return new TypedError(kind, { location, description })
}

/**
 * New classification for an error this library owns.
 *
 * A typed cause is erased here; an opaque one is attached as-is.
 */
export function wrapError<K extends ErrorKind>(
  kind: K,
  cause: Chainable,
  location: SourceLocation,
  description?: string,
): TypedError<K> {
  return new TypedError(kind, { location, description, cause: eraseError(cause) })
}

/**
 * Same classification, new location: kind and description are taken from
 * `previous`, which becomes the cause.
 *
 * Kinds are immutable values, so an object kind is shared by reference.
 */
export function propagateError<K extends ErrorKind>(
  previous: TypedError<K>,
  location: SourceLocation,
): TypedError<K> {
  return new TypedError(previous.kind, {
    location,
    description: previous.description,
    cause: previous.erase(),
  })
}

/**
 * Erase a typed error. Opaque errors are returned unchanged.
 */
export function eraseError(err: Chainable): OpaqueError {
  return isOpaqueError(err) ? err : err.erase()
}
