import type { ChainLink, SerializedErrorChain, SerializedFrame } from "../ports/error"
import { endsTruncated, errorChain } from "./utils/error-chain"
import { resolveMaxDepth } from "./utils/max-depth"

export const DEFAULT_SERIALIZE_MAX_DEPTH = 10_000

/**
 * Options for chain serialization.
 */
export type SerializeOptions = Readonly<{
  /** Frames kept before `truncated` is set. Default: 10 000 */
  maxDepth?: number
}>

/**
 * Flatten a chain into its serialized form, outermost frame first.
 */
export function serializeError(
  err: ChainLink,
  options?: SerializeOptions,
): SerializedErrorChain {
  const maxDepth = resolveMaxDepth(options?.maxDepth, DEFAULT_SERIALIZE_MAX_DEPTH)
  const chain = errorChain(err, maxDepth + 1)

  return {
    frames: chain.slice(0, maxDepth).map(toFrame),
    truncated: chain.length > maxDepth || endsTruncated(chain),
  }
}

function toFrame(link: ChainLink): SerializedFrame {
  return {
    kind: link.kindText,
    description: link.description,
    file: link.location.file,
    line: link.location.line,
  }
}
