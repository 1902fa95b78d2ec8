/** Fatal parse failure, returned as a value from `parse`. */
export type ParseError =
  | { kind: 'lex'; message: string; offset: number }
  | { kind: 'unexpected'; found: string; offset: number; expected: string }
  | { kind: 'unexpectedEof'; expected: string }
  | { kind: 'tooDeep'; offset: number; limit: number };

/** Non-fatal oddities the parser accepts and normalizes. */
export type ParseWarningKind = 'mixedOctaveMarks' | 'octaveAfterDuration';

export interface ParseWarning {
  kind: ParseWarningKind;
  offset: number;
  message: string;
}

/** Human-readable one-line rendering of a parse error. */
export function formatParseError(error: ParseError): string {
  switch (error.kind) {
    case 'lex':
      return `lex error at offset ${error.offset}: ${error.message}`;
    case 'unexpected':
      return `unexpected ${error.found} at offset ${error.offset}, expected ${error.expected}`;
    case 'unexpectedEof':
      return `unexpected end of input, expected ${error.expected}`;
    case 'tooDeep':
      return `music nested deeper than ${error.limit} levels at offset ${error.offset}`;
  }
}

/**
 * Thrown inside the recursive-descent functions to unwind to `parse`,
 * which converts it back into a `ParseError` value.
 */
export class LilyPondSyntaxError extends Error {
  readonly detail: ParseError;

  constructor(detail: ParseError) {
    super(formatParseError(detail));
    this.name = 'LilyPondSyntaxError';
    this.detail = detail;
  }
}
