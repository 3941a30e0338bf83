import { inspect } from "node:util"
import type { ErrorKind } from "../ports/error"

/**
 * Canonical printed form of a kind, used for default descriptions and erasure.
 *
 * - strings verbatim
 * - numbers, bigints and booleans via `String`
 * - symbols as `Symbol(description)`
 * - objects through their own `toString` when they define one, otherwise
 *   `util.inspect` on a single line
 */
export function printKind(kind: ErrorKind): string {
  if (typeof kind === "string") return kind
  if (typeof kind === "symbol") return kind.toString()
  if (typeof kind === "number" || typeof kind === "bigint" || typeof kind === "boolean") {
    return String(kind)
  }

  return printObjectKind(kind)
}

function printObjectKind(kind: object): string {
  if (typeof kind !== "function" && !Array.isArray(kind) && hasCustomToString(kind)) {
    return String(kind)
  }

  return inspect(kind, { depth: null, breakLength: Number.POSITIVE_INFINITY, compact: true })
}

function hasCustomToString(kind: object): boolean {
  return typeof kind.toString === "function" && kind.toString !== Object.prototype.toString
}
