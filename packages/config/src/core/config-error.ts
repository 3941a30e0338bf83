import type { TypedError } from "@faultline/errors"

/**
 * Failures raised while loading settings.
 *
 * - `ConfigFileMissing`: a required dotenv file does not exist
 * - `ConfigSourceFailed`: a source could not be loaded
 * - `ConfigInvalid`: the merged values do not satisfy the schema
 */
export type ConfigErrorKind = "ConfigFileMissing" | "ConfigSourceFailed" | "ConfigInvalid"

export type ConfigError = TypedError<ConfigErrorKind>
