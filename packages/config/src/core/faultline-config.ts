import type { ErrorConverterOptions, RenderOptions } from "@faultline/errors"
import { type LoggerOptions, logLevelNames } from "@faultline/logger"
import { z } from "zod"
import { DotenvSource } from "../adapters/dotenv/dotenv-source"
import { EnvSource } from "../adapters/env/env-source"
import { loadConfig } from "./load"

export const faultlineEnvSchema = z.object({
  FAULTLINE_RENDER_MAX_DEPTH: z.coerce.number().int().positive().default(10_000),
  FAULTLINE_CONVERSION_MAX_DEPTH: z.coerce.number().int().positive().default(50),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
  SERVICE_NAME: z.string().min(1).default("faultline"),
})

export type FaultlineEnv = z.infer<typeof faultlineEnvSchema>

export type FaultlineConfig = {
  rendering: RenderOptions
  conversion: ErrorConverterOptions
  logging: LoggerOptions & { serviceName: string }
}

/**
 * Runtime settings for rendering, conversion and logging.
 *
 * Reads `.env.<NODE_ENV>` from `cwd` when present (NODE_ENV defaults to
 * "development"), then `env`, which wins. Log chains are cut at the render
 * depth.
 *
 * @throws TypedError<ConfigErrorKind> as {@link loadConfig}
 */
export async function loadFaultlineConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd(),
): Promise<FaultlineConfig> {
  const settings = await loadConfig({
    schema: faultlineEnvSchema,
    sources: [
      new DotenvSource({ file: `.env.${env.NODE_ENV ?? "development"}`, cwd }),
      new EnvSource(env),
    ],
  })

  return {
    rendering: { maxDepth: settings.FAULTLINE_RENDER_MAX_DEPTH },
    conversion: { maxDepth: settings.FAULTLINE_CONVERSION_MAX_DEPTH },
    logging: {
      level: settings.LOG_LEVEL,
      prettify: settings.LOG_PRETTY,
      serviceName: settings.SERVICE_NAME,
      errorDepth: settings.FAULTLINE_RENDER_MAX_DEPTH,
    },
  }
}
