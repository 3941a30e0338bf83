import { TypedError } from "@faultline/errors"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { LogLevelName } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import { createErrorReporter, NON_CHAIN_ERROR_MESSAGE } from "../error-reporter"

type Entry = { level: LogLevelName; message: string; meta: unknown }

class RecordingLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  readonly entries: Entry[] = []

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.entries.push({ level: "trace", message, meta })
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.entries.push({ level: "debug", message, meta })
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.entries.push({ level: "info", message, meta })
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.entries.push({ level: "warn", message, meta })
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.entries.push({ level: "error", message, meta })
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.entries.push({ level: "fatal", message, meta })
  }

  child<U extends LogContextPatch>(_context: U): Logger<TContext & U> {
    return new RecordingLogger<TContext & U>()
  }
}

describe("ErrorReporter", () => {
  const notFound = new TypedError("NotFound", {
    location: { file: "users.ts", line: 12 },
    description: "no user with id 7",
  })

  it("logs the outermost frame at error level by default", () => {
    const logger = new RecordingLogger()

    createErrorReporter(logger).report(notFound, { op: "get-user" })

    expect(logger.entries).toEqual([
      {
        level: "error",
        message: "NotFound: no user with id 7 (at users.ts:12)",
        meta: { op: "get-user", errorKind: "NotFound", err: notFound },
      },
    ])
  })

  it("uses the level configured for the kind", () => {
    const logger = new RecordingLogger()
    const reporter = createErrorReporter(logger, { levels: { NotFound: "warn" } })

    reporter.report(notFound)
    reporter.report(new TypedError("Conflict", { location: { file: "users.ts", line: 40 } }))

    expect(logger.entries.map((entry) => entry.level)).toEqual(["warn", "error"])
  })

  it("uses the configured default level", () => {
    const logger = new RecordingLogger()

    createErrorReporter(logger, { level: "fatal" }).report(notFound)

    expect(logger.entries[0]?.level).toBe("fatal")
  })

  it("ignores inherited keys of the level map", () => {
    const logger = new RecordingLogger()
    const reporter = createErrorReporter(logger)

    reporter.report(new TypedError("toString", { location: { file: "a.ts", line: 1 } }))

    expect(logger.entries[0]?.level).toBe("error")
  })

  it("logs values that are not error chains under a fixed message", () => {
    const logger = new RecordingLogger()
    const thrown = new Error("boom")

    createErrorReporter(logger).report(thrown)

    expect(logger.entries).toEqual([
      { level: "error", message: NON_CHAIN_ERROR_MESSAGE, meta: { err: thrown } },
    ])
  })
})
