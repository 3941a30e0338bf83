import type { ChainLink } from "../../ports/error"

/**
 * Walk a cause chain and return every link, outermost first.
 *
 * Safety:
 * - maxDepth guardrail (default: unbounded)
 * - cycle detection via WeakSet, for hand-built links that bypass the constructors
 *
 * @example
 * ```ts
 * for (const link of errorChain(err)) {
 *   console.log(link.kindText, link.description)
 * }
 * ```
 */
export function errorChain(
  err: ChainLink,
  maxDepth: number = Number.POSITIVE_INFINITY,
): ChainLink[] {
  const chain: ChainLink[] = []
  const seen = new WeakSet<ChainLink>()

  let current: ChainLink | undefined = err

  while (current !== undefined && chain.length < maxDepth) {
    if (seen.has(current)) break
    seen.add(current)

    chain.push(current)
    current = current.cause
  }

  return chain
}

/**
 * True when the last link of a walked chain records dropped causes.
 */
export function endsTruncated(chain: readonly ChainLink[]): boolean {
  return chain[chain.length - 1]?.truncated === true
}
