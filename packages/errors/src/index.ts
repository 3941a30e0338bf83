export {
  createErrorConverter,
  DEFAULT_CONVERSION_MAX_DEPTH,
  defaultErrorConverter,
  ErrorConverter,
  type ErrorConverterOptions,
} from "./core/conversion/error-converter"
export {
  NON_ERROR_KIND,
  nativeErrorConversion,
  nonErrorConversion,
} from "./core/conversion/conversions"
export { deserializeError, serializedErrorChainSchema } from "./core/deserialize"
export { OpaqueError, type OpaqueErrorOptions } from "./core/opaque-error"
export { printKind } from "./core/print-kind"
export {
  DEFAULT_RENDER_MAX_DEPTH,
  type RenderOptions,
  renderError,
  renderFrame,
} from "./core/render"
export { err, ok } from "./core/result"
export {
  DEFAULT_SERIALIZE_MAX_DEPTH,
  type SerializeOptions,
  serializeError,
} from "./core/serialize"
export { at, ErrorSite, type ErrorSiteOptions, locator } from "./core/site/error-site"
export { sourceFile, sourceLocation } from "./core/source-location"
export { TypedError, type TypedErrorOptions } from "./core/typed-error"
export {
  createError,
  eraseError,
  propagateError,
  wrapError,
} from "./core/utils/create-error"
export { errorChain } from "./core/utils/error-chain"
export {
  type Chainable,
  isChainable,
  isOpaqueError,
  isTypedError,
} from "./core/utils/is-chainable"
export type { ForeignConversion, OpaqueErrorInit } from "./ports/conversion"
export type {
  ChainLink,
  ErrorKind,
  SerializedErrorChain,
  SerializedFrame,
  SourceLocation,
} from "./ports/error"
export type { FailedResult, Result, SuccessfulResult } from "./ports/result"
