import { locator } from "@faultline/errors"
import { type ZodType, z } from "zod"
import type { ConfigSource } from "../ports/source"
import type { ConfigErrorKind } from "./config-error"

const here = locator(import.meta.url)

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  sources: readonly ConfigSource[]
}

/**
 * Merge `sources` in order and validate the result.
 *
 * A later source overrides an earlier one key by key; `undefined` never
 * overrides. The validated value is frozen.
 *
 * @throws TypedError<ConfigErrorKind> `ConfigSourceFailed` when a source
 *   cannot be loaded, `ConfigInvalid` when validation fails
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<Readonly<T>> {
  const merged: Record<string, unknown> = {}

  for (const source of sources) {
    const values = await here(29).attemptAsync<Record<string, unknown>, ConfigErrorKind>(
      () => source.load(),
      "ConfigSourceFailed",
      `Failed to load config source ${source.name}`,
    )

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) merged[key] = value
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw here(43).create<ConfigErrorKind>(
      "ConfigInvalid",
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
    )
  }

  return Object.freeze(result.data)
}
