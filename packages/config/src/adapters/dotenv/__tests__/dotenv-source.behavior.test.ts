import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { renderError, TypedError } from "@faultline/errors"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "faultline-dotenv-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("is named after its file", () => {
    expect(new DotenvSource({ file: ".env.test", cwd }).name).toBe("dotenv:.env.test")
  })

  it("parses the file", async () => {
    await fs.writeFile(
      path.join(cwd, ".env.test"),
      '# local overrides\nLOG_LEVEL=warn\nSERVICE_NAME="billing api"\n',
    )

    const values = await new DotenvSource({ file: ".env.test", cwd }).load()

    expect(values).toEqual({ LOG_LEVEL: "warn", SERVICE_NAME: "billing api" })
  })

  it("accepts an absolute path", async () => {
    const file = path.join(cwd, "settings.env")
    await fs.writeFile(file, "LOG_PRETTY=true")

    await expect(new DotenvSource({ file }).load()).resolves.toEqual({ LOG_PRETTY: "true" })
  })

  it("returns nothing for a missing optional file", async () => {
    await expect(new DotenvSource({ file: ".env.absent", cwd }).load()).resolves.toEqual({})
  })

  it("fails with ConfigFileMissing for a missing required file", async () => {
    const error: unknown = await new DotenvSource({ file: ".env.absent", required: true, cwd })
      .load()
      .then(
        () => undefined,
        (err: unknown) => err,
      )

    if (!(error instanceof TypedError)) throw new Error("expected a TypedError")

    const [head, cause] = renderError(error).split("\n")

    expect(error.kind).toBe("ConfigFileMissing")
    expect(error.description).toBe("dotenv:.env.absent not found")
    expect(error.location.file.endsWith("adapters/dotenv/dotenv-source.ts")).toBe(true)
    expect(head).toBe(`ConfigFileMissing: dotenv:.env.absent not found (at ${error.location.file}:45)`)
    expect(cause).toMatch(/^ {2}- Error: ENOENT: no such file or directory/)
  })

  it("passes other read failures through", async () => {
    await fs.mkdir(path.join(cwd, ".env.dir"))

    await expect(new DotenvSource({ file: ".env.dir", cwd }).load()).rejects.toMatchObject({
      code: "EISDIR",
    })
  })
})
