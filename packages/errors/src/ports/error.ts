/**
 * Caller-defined discriminant of an error.
 *
 * Anything printable is accepted. String literal unions or string enums read
 * best once rendered: a numeric enum member prints as its number, so
 * `enum Fs { Io }` renders as `0: ...`.
 */
export type ErrorKind = string | number | bigint | boolean | symbol | object

/**
 * Where an error was created or rethrown.
 *
 * Always supplied by the caller; the library never inspects the stack to find it.
 */
export type SourceLocation = Readonly<{
  file: string
  line: number
}>

/**
 * One level of a cause chain, typed or opaque.
 */
export interface ChainLink {
  /** Printed form of the kind */
  readonly kindText: string

  readonly description: string

  readonly location: SourceLocation

  /** Next (older) level of the chain, if any */
  readonly cause?: ChainLink | undefined

  /** Older levels past this one were dropped before the chain was built */
  readonly truncated?: boolean
}

/**
 * A single level of a serialized chain.
 */
export type SerializedFrame = Readonly<{
  kind: string
  description: string
  file: string
  line: number
}>

/**
 * Serialized chain shape for logging, transport and worker boundaries.
 *
 * Frames run from the outermost error to the original failure.
 * Designed to be JSON.stringify-safe.
 */
export type SerializedErrorChain = Readonly<{
  frames: readonly SerializedFrame[]
  truncated: boolean
}>
