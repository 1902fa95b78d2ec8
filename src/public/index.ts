export * from '../core/ast.js';
export type { Diagnostic, DiagnosticSeverity, DiagnosticSource } from '../core/diagnostics.js';
export { formatParseError, type ParseError, type ParseWarning, type ParseWarningKind } from '../parser/errors.js';
export { parse, type ParseResult as CoreParseResult } from '../parser/parse.js';
export { serialize, type SerializeOptions } from '../serializer/serialize.js';
export { formatMusic } from '../serializer/serialize-music.js';
export { DUTCH_SPELLING, formatPitch, type PitchSpelling } from '../serializer/spelling.js';
export { validate, type ValidateOptions, type ValidationResult } from '../validator/validate.js';
export {
  formatValidationError,
  validationErrorCode,
  type SpanKind,
  type SpanPosition,
  type ValidationError,
  type ValidationErrorKind
} from '../validator/validation-errors.js';
export type { ParserMode } from './diagnostic-context.js';
export {
  PARSE_ERROR_CODES,
  PARSE_WARNING_CODES,
  parseLilyPond,
  roundTripLilyPond,
  serializeLilyPond,
  validateLilyPond,
  type ParseOptions,
  type ParseResult,
  type RoundTripResult
} from './api.js';
