import type { ConfigSource } from "../../ports/source"

/**
 * Reads an environment map. An empty value counts as unset, so `LOG_LEVEL=`
 * leaves the key to earlier sources or the schema default.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"

  constructor(private readonly env: Readonly<Record<string, string | undefined>> = process.env) {}

  async load(): Promise<Record<string, string>> {
    const values: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (value !== undefined && value !== "") values[key] = value
    }

    return values
  }
}
