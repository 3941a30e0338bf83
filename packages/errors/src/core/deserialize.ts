import { z } from "zod"
import { OpaqueError } from "./opaque-error"

const frameSchema = z.object({
  kind: z.string(),
  description: z.string(),
  file: z.string().min(1),
  line: z.number().int().min(0).max(0xffff_ffff),
})

export const serializedErrorChainSchema = z.object({
  frames: z.array(frameSchema).min(1),
  truncated: z.boolean(),
})

/**
 * Rebuild an opaque chain from its serialized form (e.g. after crossing a
 * worker or process boundary).
 *
 * Kinds come back as text only. A `truncated` chain is rebuilt from the frames
 * that were kept, its last link marked `truncated` so it still renders with
 * the ellipsis.
 *
 * @throws TypeError when `input` does not match {@link serializedErrorChainSchema}
 */
export function deserializeError(input: unknown): OpaqueError {
  const result = serializedErrorChainSchema.safeParse(input)

  if (!result.success) {
    throw new TypeError(`Invalid serialized error chain:\n${z.prettifyError(result.error)}`)
  }

  const { frames, truncated } = result.data
  let chain: OpaqueError | undefined

  for (const frame of [...frames].reverse()) {
    chain = new OpaqueError({
      kindText: frame.kind,
      description: frame.description,
      location: { file: frame.file, line: frame.line },
      cause: chain,
      truncated: chain === undefined && truncated,
    })
  }

  if (!chain) {
    throw new TypeError("Invalid serialized error chain: no frames")
  }

  return chain
}
