import fs from "node:fs/promises"
import path from "node:path"
import { locator } from "@faultline/errors"
import { parse } from "dotenv"
import type { ConfigErrorKind } from "../../core/config-error"
import type { ConfigSource } from "../../ports/source"

const here = locator(import.meta.url)

export type DotenvSourceOptions = {
  /** Absolute, or relative to `cwd` */
  file: string

  /** A missing required file fails with `ConfigFileMissing`. Default: false */
  required?: boolean

  /** Default: process.cwd() */
  cwd?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string
  private readonly filePath: string
  private readonly required: boolean

  constructor(options: DotenvSourceOptions) {
    this.name = `dotenv:${options.file}`
    this.filePath = path.resolve(options.cwd ?? process.cwd(), options.file)
    this.required = options.required ?? false
  }

  async load(): Promise<Record<string, string>> {
    const content = await this.read()

    return content === undefined ? {} : parse(content)
  }

  private async read(): Promise<string | undefined> {
    try {
      return await fs.readFile(this.filePath, "utf-8")
    } catch (err) {
      if (!isMissingFile(err)) throw err

      if (this.required) {
        throw here(45).wrapForeign<ConfigErrorKind>(
          "ConfigFileMissing",
          err,
          `${this.name} not found`,
        )
      }

      return undefined
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
