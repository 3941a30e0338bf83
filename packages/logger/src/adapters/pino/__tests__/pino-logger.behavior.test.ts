import { Writable } from "node:stream"
import { parseLine } from "../../../ports/__tests__/logger-harness"
import { createPinoLogger, PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = String(chunk).trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination (no base)", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { service: "billing" },
    )

    logger.info("hello", { userId: "u-1" })

    expect(lines).toHaveLength(1)

    const payload = parseLine(lines[0] ?? "")

    expect(payload).toMatchObject({
      msg: "hello",
      service: "billing",
      userId: "u-1",
    })

    expect(typeof payload.time).toBe("number")
    expect(payload.level).toBe(30)
  })

  it("child() inherits the base logger sink and config", () => {
    const { lines, destination } = makeLineDestination()

    const base = createPinoLogger(
      { destination },
      { level: "warn", prettify: false },
      { service: "billing" },
    )
    const child = base.child({ op: "charge" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(parseLine(lines[0] ?? "")).toMatchObject({
      msg: "logged",
      service: "billing",
      op: "charge",
    })
  })

  it("serializes plain errors with their causes", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" })

    logger.error("failed", { err: new Error("boom", { cause: new Error("root") }) })

    expect(parseLine(lines[0] ?? "").err).toMatchObject({
      type: "Error",
      message: "boom",
      cause: { type: "Error", message: "root" },
    })
  })

  it("prefers the destination over the pretty transport", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "info", prettify: true })

    logger.info("hello")

    expect(parseLine(lines[0] ?? "")).toMatchObject({ msg: "hello", level: 30 })
  })
})
