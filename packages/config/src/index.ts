export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource } from "./adapters/env/env-source"
export type { ConfigError, ConfigErrorKind } from "./core/config-error"
export {
  type FaultlineConfig,
  type FaultlineEnv,
  faultlineEnvSchema,
  loadFaultlineConfig,
} from "./core/faultline-config"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export type { ConfigSource } from "./ports/source"
