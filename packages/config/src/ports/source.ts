/**
 * One layer of raw settings, read before validation.
 *
 * Layers are merged in the order given to `loadConfig`; the last one to
 * define a key wins.
 */
export interface ConfigSource {
  /** Shown in `ConfigSourceFailed` descriptions, e.g. "env" or "dotenv:.env.test" */
  readonly name: string

  /** Raw values; coercion and defaults are left to the schema */
  load(): Promise<Record<string, unknown>>
}
