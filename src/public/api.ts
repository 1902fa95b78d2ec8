import { isDeepStrictEqual } from 'node:util';

import type { LilyPondFile } from '../core/ast.js';
import type { Diagnostic } from '../core/diagnostics.js';
import type { ParseError, ParseWarningKind } from '../parser/errors.js';
import { parse } from '../parser/parse.js';
import { serialize, type SerializeOptions } from '../serializer/serialize.js';
import { formatValidationError, validationErrorCode } from '../validator/validation-errors.js';
import { validate, type ValidateOptions } from '../validator/validate.js';
import { addDiagnostic, createDiagnosticContext, type DiagnosticContext, type ParserMode } from './diagnostic-context.js';

/** Parser configuration for the diagnostics-first entry points. */
export interface ParseOptions {
  sourceName?: string;
  mode?: ParserMode;
  /** Run the validator after a successful parse. Always on in strict mode. */
  validate?: boolean;
  /** Check groups passed to the validator. */
  checks?: ValidateOptions;
}

/** Standard parser return envelope with diagnostics-first reporting. */
export interface ParseResult {
  file?: LilyPondFile;
  diagnostics: Diagnostic[];
}

/** Outcome of parse, serialize, reparse. */
export interface RoundTripResult {
  /** Canonical text from the first serialization. */
  text?: string;
  /** Reparsed AST equals the original and a second serialization is identical. */
  stable: boolean;
  diagnostics: Diagnostic[];
}

/** Diagnostic code for each parse warning kind. */
export const PARSE_WARNING_CODES: Record<ParseWarningKind, string> = {
  mixedOctaveMarks: 'LILYPOND_MIXED_OCTAVE_MARKS',
  octaveAfterDuration: 'LILYPOND_OCTAVE_AFTER_DURATION'
};

/** Diagnostic code for each fatal parse error kind. */
export const PARSE_ERROR_CODES: Record<ParseError['kind'], string> = {
  lex: 'LILYPOND_LEX_ERROR',
  unexpected: 'LILYPOND_UNEXPECTED_TOKEN',
  unexpectedEof: 'LILYPOND_UNEXPECTED_EOF',
  tooDeep: 'LILYPOND_NESTING_TOO_DEEP'
};

function parseErrorMessage(error: ParseError): string {
  switch (error.kind) {
    case 'lex':
      return error.message;
    case 'unexpected':
      return `Unexpected ${error.found}; expected ${error.expected}.`;
    case 'unexpectedEof':
      return `Unexpected end of input; expected ${error.expected}.`;
    case 'tooDeep':
      return `Music is nested deeper than ${error.limit} levels.`;
  }
}

function reportParseError(ctx: DiagnosticContext, error: ParseError): void {
  const offset = error.kind === 'unexpectedEof' ? ctx.text.length : error.offset;
  addDiagnostic(ctx, PARSE_ERROR_CODES[error.kind], 'error', parseErrorMessage(error), offset);
}

function reportValidation(ctx: DiagnosticContext, file: LilyPondFile, checks?: ValidateOptions): void {
  const result = validate(file, checks);
  if (result.ok) {
    return;
  }
  for (const error of result.errors) {
    addDiagnostic(ctx, validationErrorCode(error.kind), 'error', formatValidationError(error));
  }
}

/**
 * Parse LilyPond text into the AST.
 * The file is withheld when parsing fails, and in strict mode when any error was reported.
 */
export function parseLilyPond(text: string, options: ParseOptions = {}): ParseResult {
  const mode = options.mode ?? 'lenient';
  const ctx = createDiagnosticContext(mode, text, options.sourceName);

  const result = parse(text);
  for (const warning of result.warnings) {
    addDiagnostic(ctx, PARSE_WARNING_CODES[warning.kind], 'warning', warning.message, warning.offset);
  }

  if (!result.ok) {
    reportParseError(ctx, result.error);
    return { diagnostics: ctx.diagnostics };
  }

  if (mode === 'strict' || options.validate) {
    reportValidation(ctx, result.file, options.checks);
  }

  if (mode === 'strict' && ctx.failed) {
    return { diagnostics: ctx.diagnostics };
  }
  return { file: result.file, diagnostics: ctx.diagnostics };
}

/** Validate an AST and report every problem as an error diagnostic. */
export function validateLilyPond(file: LilyPondFile, checks?: ValidateOptions): Diagnostic[] {
  const ctx = createDiagnosticContext('lenient', '');
  reportValidation(ctx, file, checks);
  return ctx.diagnostics;
}

/** Render an AST as canonical LilyPond text. */
export function serializeLilyPond(file: LilyPondFile, options: SerializeOptions = {}): string {
  return serialize(file, options);
}

/**
 * Parse, serialize, and parse the output again.
 * Stable when both ASTs are structurally equal and re-serializing gives the same text.
 */
export function roundTripLilyPond(
  text: string,
  options: ParseOptions & SerializeOptions = {}
): RoundTripResult {
  const first = parseLilyPond(text, options);
  if (!first.file) {
    return { stable: false, diagnostics: first.diagnostics };
  }

  const canonical = serialize(first.file, options);
  const ctx = createDiagnosticContext(options.mode ?? 'lenient', canonical, options.sourceName);
  ctx.diagnostics.push(...first.diagnostics);

  const second = parse(canonical);
  if (!second.ok) {
    addDiagnostic(ctx, 'LILYPOND_ROUND_TRIP_REPARSE_FAILED', 'error', 'Serialized output does not parse.');
    reportParseError(ctx, second.error);
    return { text: canonical, stable: false, diagnostics: ctx.diagnostics };
  }

  const sameTree = isDeepStrictEqual(first.file, second.file);
  const sameText = serialize(second.file, options) === canonical;
  if (!sameTree) {
    addDiagnostic(ctx, 'LILYPOND_ROUND_TRIP_AST_MISMATCH', 'error', 'Reparsed AST differs from the original.');
  } else if (!sameText) {
    addDiagnostic(ctx, 'LILYPOND_ROUND_TRIP_TEXT_MISMATCH', 'error', 'Second serialization differs from the first.');
  }

  return { text: canonical, stable: sameTree && sameText, diagnostics: ctx.diagnostics };
}
