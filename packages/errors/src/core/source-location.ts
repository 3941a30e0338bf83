import path from "node:path"
import { fileURLToPath } from "node:url"
import type { SourceLocation } from "../ports/error"

const MAX_LINE = 0xffff_ffff

/**
 * Validate and freeze a source location.
 *
 * @throws RangeError when `file` is empty or `line` is not an integer in `[0, 2^32 - 1]`
 */
export function sourceLocation(file: string, line: number): SourceLocation {
  if (file.length === 0) {
    throw new RangeError("Source file must not be empty")
  }

  if (!Number.isInteger(line) || line < 0 || line > MAX_LINE) {
    throw new RangeError(`Invalid source line: ${line}`)
  }

  return Object.freeze({ file, line })
}

/**
 * Normalize a module reference to a source file name.
 *
 * `file://` URLs (as given by `import.meta.url`) become a path relative to the
 * working directory with forward slashes; anything else is returned as-is.
 */
export function sourceFile(fileOrUrl: string): string {
  if (!fileOrUrl.startsWith("file:")) return fileOrUrl

  const relative = path.relative(process.cwd(), fileURLToPath(fileOrUrl))

  return relative.split(path.sep).join("/")
}
