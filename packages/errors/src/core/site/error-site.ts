import type { ErrorKind, SourceLocation } from "../../ports/error"
import type { Result } from "../../ports/result"
import { type ErrorConverter, defaultErrorConverter } from "../conversion/error-converter"
import { sourceFile, sourceLocation } from "../source-location"
import type { TypedError } from "../typed-error"
import { createError, propagateError, wrapError } from "../utils/create-error"
import type { Chainable } from "../utils/is-chainable"

export type ErrorSiteOptions = Readonly<{
  /** Used for foreign values. Default: {@link defaultErrorConverter} */
  converter?: ErrorConverter
}>

/**
 * A call site that errors are created or rethrown at.
 *
 * Every error built through a site carries the site's location, so the
 * location has to be written once per call site and nowhere else.
 *
 * @example
 * ```ts
 * const here = locator(import.meta.url)
 *
 * function readConfig(path: string): Config {
 *   const text = here(12).attempt(() => fs.readFileSync(path, "utf8"), "Io")
 *   return here(13).attempt(() => parse(text), "Parse", "config invalid")
 * }
 * ```
 */
export class ErrorSite {
  readonly location: SourceLocation
  private readonly converter: ErrorConverter

  constructor(location: SourceLocation, options: ErrorSiteOptions = {}) {
    this.location = sourceLocation(location.file, location.line)
    this.converter = options.converter ?? defaultErrorConverter
  }

  /** Fresh failure, no cause. */
  create<K extends ErrorKind>(kind: K, description?: string): TypedError<K> {
    return createError(kind, this.location, description)
  }

  /** Fresh failure caused by a value this library does not own. */
  wrapForeign<K extends ErrorKind>(
    kind: K,
    foreign: unknown,
    description?: string,
  ): TypedError<K> {
    const cause = this.converter.convert(foreign, this.location)

    return wrapError(kind, cause, this.location, description)
  }

  /** New classification for one of our own errors. */
  wrap<K extends ErrorKind>(kind: K, cause: Chainable, description?: string): TypedError<K> {
    return wrapError(kind, cause, this.location, description)
  }

  /** Same classification, recorded again at this site. */
  propagate<K extends ErrorKind>(previous: TypedError<K>): TypedError<K> {
    return propagateError(previous, this.location)
  }

  fail<K extends ErrorKind>(kind: K, description?: string): never {
    throw this.create(kind, description)
  }

  rethrow<K extends ErrorKind>(kind: K, cause: Chainable, description?: string): never {
    throw this.wrap(kind, cause, description)
  }

  /**
   * Value of a successful result; otherwise the error is propagated with its
   * own kind and description.
   */
  unwrap<T, K extends ErrorKind>(result: Result<T, TypedError<K>>): T {
    if (result.success) return result.value

    throw this.propagate(result.error)
  }

  /**
   * Value of a successful result; otherwise a new error of `kind` caused by
   * the failure.
   */
  unwrapAs<T, K extends ErrorKind>(
    result: Result<T, unknown>,
    kind: K,
    description?: string,
  ): T {
    if (result.success) return result.value

    throw this.wrapForeign(kind, result.error, description)
  }

  /**
   * Run `fn`; anything it throws becomes the cause of a new error of `kind`.
   */
  attempt<T, K extends ErrorKind>(fn: () => T, kind: K, description?: string): T {
    try {
      return fn()
    } catch (caught) {
      throw this.wrapForeign(kind, caught, description)
    }
  }

  async attemptAsync<T, K extends ErrorKind>(
    fn: () => Promise<T>,
    kind: K,
    description?: string,
  ): Promise<T> {
    try {
      return await fn()
    } catch (caught) {
      throw this.wrapForeign(kind, caught, description)
    }
  }

  /**
   * Run `fn`; anything it throws is mapped to a kind by `toKind`. The thrown
   * value itself is not kept as a cause.
   */
  attemptConvert<T, K extends ErrorKind>(
    fn: () => T,
    toKind: (caught: unknown) => K,
    description?: string,
  ): T {
    try {
      return fn()
    } catch (caught) {
      throw this.create(toKind(caught), description)
    }
  }
}

/**
 * Site at `file:line`.
 *
 * @example
 * ```ts
 * throw at("users.ts", 12).create("NotFound")
 * ```
 */
export function at(file: string, line: number, options?: ErrorSiteOptions): ErrorSite {
  return new ErrorSite({ file: sourceFile(file), line }, options)
}

/**
 * Sites bound to one file, usually `import.meta.url`; only the line varies.
 */
export function locator(
  file: string,
  options?: ErrorSiteOptions,
): (line: number) => ErrorSite {
  const resolved = sourceFile(file)

  return (line) => new ErrorSite({ file: resolved, line }, options)
}
