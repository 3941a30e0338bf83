import { OpaqueError, TypedError } from "@faultline/errors"
import { serializeLogError } from "../serialize-log-error"

describe("serializeLogError", () => {
  const root = new OpaqueError({
    kindText: "Io",
    description: "file missing",
    location: { file: "x.ts", line: 10 },
  })
  const err = new TypedError("Parse", {
    location: { file: "y.ts", line: 20 },
    description: "config invalid",
    cause: root,
  })

  it("keeps kind, location and rendered chain of typed errors", () => {
    expect(serializeLogError(err)).toEqual({
      type: "TypedError",
      message: "config invalid",
      kind: "Parse",
      location: "y.ts:20",
      rendered: "Parse: config invalid (at y.ts:20)\n  - Io: file missing (at x.ts:10)",
      chain: [
        { kind: "Parse", description: "config invalid", file: "y.ts", line: 20 },
        { kind: "Io", description: "file missing", file: "x.ts", line: 10 },
      ],
      truncated: false,
      stack: err.stack,
    })
  })

  it("serializes opaque errors the same way", () => {
    expect(serializeLogError(root)).toMatchObject({
      type: "OpaqueError",
      kind: "Io",
      location: "x.ts:10",
      rendered: "Io: file missing (at x.ts:10)",
    })
  })

  it("applies maxDepth to both chain and rendered text", () => {
    expect(serializeLogError(err, { maxDepth: 1 })).toMatchObject({
      rendered: "Parse: config invalid (at y.ts:20)\n  - ...",
      chain: [{ kind: "Parse", description: "config invalid", file: "y.ts", line: 20 }],
      truncated: true,
    })
  })

  it("serializes other errors with their causes", () => {
    const serialized = serializeLogError(new TypeError("bad", { cause: new Error("root") }))

    expect(serialized).toMatchObject({
      type: "TypeError",
      message: "bad",
      cause: { type: "Error", message: "root" },
    })
  })

  it("returns other values unchanged", () => {
    const value = { code: "E_CUSTOM" }

    expect(serializeLogError(value)).toBe(value)
    expect(serializeLogError("boom")).toBe("boom")
    expect(serializeLogError(undefined)).toBeUndefined()
  })
})
