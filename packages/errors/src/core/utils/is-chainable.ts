import type { ErrorKind, SourceLocation } from "../../ports/error"
import { OpaqueError } from "../opaque-error"
import { TypedError } from "../typed-error"

/**
 * Any error this library owns: typed or already erased.
 */
export type Chainable = TypedError<ErrorKind> | OpaqueError

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isLocation(v: unknown): v is SourceLocation {
  return isRecord(v) && typeof v.file === "string" && Number.isInteger(v.line)
}

function hasLinkShape(v: Record<string, unknown>): boolean {
  return (
    typeof v.description === "string" &&
    typeof v.message === "string" &&
    isLocation(v.location) &&
    typeof v.toJSON === "function"
  )
}

/**
 * Type guard for {@link TypedError}.
 *
 * Also accepts instances created by another copy of this package.
 */
export function isTypedError(e: unknown): e is TypedError<ErrorKind> {
  if (e instanceof TypedError) return true
  if (!isRecord(e)) return false

  return "kind" in e && typeof e.erase === "function" && hasLinkShape(e)
}

/**
 * Type guard for {@link OpaqueError}.
 *
 * Also accepts instances created by another copy of this package.
 */
export function isOpaqueError(e: unknown): e is OpaqueError {
  if (e instanceof OpaqueError) return true
  if (!isRecord(e)) return false

  return (
    e.name === "OpaqueError" &&
    !("kind" in e) &&
    typeof e.kindText === "string" &&
    hasLinkShape(e)
  )
}

export function isChainable(e: unknown): e is Chainable {
  return isTypedError(e) || isOpaqueError(e)
}
