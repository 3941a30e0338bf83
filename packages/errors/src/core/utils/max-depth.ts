/**
 * Resolve a depth guardrail, falling back to `fallback` when unset.
 *
 * @throws RangeError when the value is not a positive integer
 */
export function resolveMaxDepth(value: number | undefined, fallback: number): number {
  const depth = value ?? fallback

  if (!Number.isInteger(depth) || depth < 1) {
    throw new RangeError(`maxDepth must be a positive integer, got ${depth}`)
  }

  return depth
}
