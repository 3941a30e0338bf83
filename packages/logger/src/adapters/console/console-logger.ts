import { isChainable, renderError } from "@faultline/errors"
import { serializeLogError } from "../../core/serialize-log-error"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import { type LogLevel, type LogLevelName, LogLevels } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type ConsoleWriter = Pick<Console, "trace" | "debug" | "info" | "warn" | "error">

export type ConsoleLoggerDeps = {
  console?: ConsoleWriter
}

type LevelRoute = Readonly<{ severity: LogLevel; method: keyof ConsoleWriter }>

const LEVELS: Record<LogLevelName, LevelRoute> = {
  trace: { severity: LogLevels.Trace, method: "trace" },
  debug: { severity: LogLevels.Debug, method: "debug" },
  info: { severity: LogLevels.Info, method: "info" },
  warn: { severity: LogLevels.Warn, method: "warn" },
  error: { severity: LogLevels.Error, method: "error" },
  fatal: { severity: LogLevels.Fatal, method: "error" },
}

/** Written by the logger itself; the same keys in meta or context are dropped */
const RESERVED_KEYS: readonly string[] = ["timestamp", "level", "message"]

type Entry = {
  timestamp: string
  level: LogLevelName
  message: string
  fields: Record<string, unknown>
}

/**
 * Logger on a console sink.
 *
 * Writes one JSON object per entry, or with `prettify` a single
 * `<timestamp> <LEVEL> <message> <fields>` line followed by the rendered
 * chain of `err` (a foreign error's stack) indented two spaces.
 */
export class ConsoleLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  private readonly sink: ConsoleWriter
  private readonly minSeverity: LogLevel
  private readonly context: Record<string, unknown>

  constructor(
    private readonly deps: ConsoleLoggerDeps = {},
    private readonly opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
  ) {
    this.sink = deps.console ?? globalThis.console
    this.minSeverity = LEVELS[opts.level ?? "info"].severity
    this.context = definedFields(context)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new ConsoleLogger<TContext & U>(this.deps, this.opts, {
      ...this.context,
      ...definedFields(context),
    })
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.write("fatal", message, meta)
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta<TContext>): void {
    const { severity, method } = LEVELS[level]
    if (severity < this.minSeverity) return

    const fields = { ...this.context, ...definedFields(meta ?? {}) }
    for (const key of RESERVED_KEYS) delete fields[key]

    const entry: Entry = { timestamp: new Date().toISOString(), level, message, fields }
    const format = this.opts.prettify ? formatPretty : formatJson

    this.sink[method](format(entry, this.opts.errorDepth))
  }
}

function formatJson(entry: Entry, maxDepth: number | undefined): string {
  const { fields, ...head } = entry
  const payload: Record<string, unknown> = { ...head, ...fields }

  if ("err" in fields) payload.err = serializeLogError(fields.err, { maxDepth })

  return stringify(payload) ?? stringify({ ...head, unserializable: true }) ?? ""
}

function formatPretty(entry: Entry, maxDepth: number | undefined): string {
  const { err, ...rest } = entry.fields
  const details = errorLines(err, maxDepth)
  const shown = details.length > 0 ? rest : entry.fields

  const tail = Object.keys(shown).length > 0 ? ` ${stringify(shown) ?? "[unserializable]"}` : ""
  const line = `${entry.timestamp} ${entry.level.toUpperCase()} ${entry.message}${tail}`

  return [line, ...details.map((detail) => `  ${detail}`)].join("\n")
}

function errorLines(err: unknown, maxDepth: number | undefined): string[] {
  if (isChainable(err)) return renderError(err, { maxDepth }).split("\n")
  if (err instanceof Error) return (err.stack ?? `${err.name}: ${err.message}`).split("\n")

  return []
}

function definedFields(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined))
}

function stringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value)
  } catch {
    return undefined
  }
}

export function createConsoleLogger<TContext extends LogContext = LogContext>(
  deps: ConsoleLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
  context: LogContextPatch = {},
): Logger<TContext> {
  return new ConsoleLogger<TContext>(deps, opts, context)
}
