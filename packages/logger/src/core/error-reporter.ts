import { isChainable, renderFrame } from "@faultline/errors"
import type { LogMeta } from "../ports/log-context"
import type { LogLevelName } from "../ports/log-level"
import type { Logger } from "../ports/logger"

export const NON_CHAIN_ERROR_MESSAGE = "Unhandled non-chain error"

export type ErrorReporterOptions = Readonly<{
  /** Level used when no per-kind level applies. Default: "error" */
  level?: LogLevelName

  /** Levels keyed by the printed kind of the outermost error */
  levels?: Readonly<Record<string, LogLevelName>>
}>

/**
 * Writes caught errors to a logger as one entry each.
 *
 * The message is the outermost frame; the whole chain travels in `err`.
 *
 * @example
 * ```ts
 * const reporter = createErrorReporter(logger, { levels: { NotFound: "warn" } })
 *
 * try {
 *   await handle(job)
 * } catch (err) {
 *   reporter.report(err, { op: "handle-job" })
 * }
 * ```
 */
export class ErrorReporter {
  private readonly level: LogLevelName
  private readonly levels: Readonly<Record<string, LogLevelName>>

  constructor(
    private readonly logger: Logger,
    options: ErrorReporterOptions = {},
  ) {
    this.level = options.level ?? "error"
    this.levels = options.levels ?? {}
  }

  report(error: unknown, meta: LogMeta = {}): void {
    if (!isChainable(error)) {
      this.logger[this.level](NON_CHAIN_ERROR_MESSAGE, { ...meta, err: error })
      return
    }

    const kind = error.kindText
    const level = Object.hasOwn(this.levels, kind) ? this.levels[kind] : undefined

    this.logger[level ?? this.level](renderFrame(error), {
      ...meta,
      errorKind: kind,
      err: error,
    })
  }
}

export function createErrorReporter(
  logger: Logger,
  options?: ErrorReporterOptions,
): ErrorReporter {
  return new ErrorReporter(logger, options)
}
