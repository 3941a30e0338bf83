import {
  type CapturedLog,
  isLogLevelName,
  type LoggerHarness,
  parseLine,
} from "../../../ports/__tests__/logger-harness"
import { ConsoleLogger } from "../console-logger"

export function consoleHarness(): LoggerHarness {
  return {
    name: "ConsoleLogger",
    make: (opts) => {
      const captured: CapturedLog[] = []

      const capture = (line: string) => {
        const payload = parseLine(line)
        const level = isLogLevelName(payload.level) ? payload.level : "info"

        captured.push({ level, payload })
      }

      const fakeConsole = {
        trace: capture,
        debug: capture,
        info: capture,
        warn: capture,
        error: capture,
      }

      return {
        logger: new ConsoleLogger(
          { console: fakeConsole },
          { level: opts?.level ?? "trace", prettify: false, errorDepth: opts?.errorDepth },
          {},
        ),
        read: () => [...captured],
        clear: () => {
          captured.length = 0
        },
      }
    },
  }
}
