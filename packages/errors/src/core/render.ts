import type { ChainLink } from "../ports/error"
import { endsTruncated, errorChain } from "./utils/error-chain"
import { resolveMaxDepth } from "./utils/max-depth"

export const DEFAULT_RENDER_MAX_DEPTH = 10_000

const CAUSE_SEPARATOR = "\n  - "
const TRUNCATION_MARKER = "..."

export type RenderOptions = Readonly<{
  /** Frames rendered before the output is cut with an ellipsis. Default: 10 000 */
  maxDepth?: number
}>

/**
 * Render a single level: `<kind>: <description> (at <file>:<line>)`.
 */
export function renderFrame(link: ChainLink): string {
  const { file, line } = link.location

  return `${link.kindText}: ${link.description} (at ${file}:${line})`
}

/**
 * Render a whole chain, one level per line, causes indented as `  - `.
 *
 * Ends with `  - ...` past `maxDepth` levels, or when the last link was
 * built with its causes dropped.
 *
 * @example
 * ```text
 * Parse: config invalid (at config.ts:20)
 *   - Io: file missing (at fs.ts:10)
 * ```
 */
export function renderError(err: ChainLink, options?: RenderOptions): string {
  const maxDepth = resolveMaxDepth(options?.maxDepth, DEFAULT_RENDER_MAX_DEPTH)
  const chain = errorChain(err, maxDepth + 1)

  const parts = chain.slice(0, maxDepth).map(renderFrame)

  if (chain.length > maxDepth || endsTruncated(chain)) {
    parts.push(TRUNCATION_MARKER)
  }

  return parts.join(CAUSE_SEPARATOR)
}
