/** Half-open character range `[start, end)` into the source text. */
export interface Span {
  start: number;
  end: number;
}

/**
 * Token categories.
 * `keyword` and `escapedWord` carry the word without its backslash; `punct`
 * carries the literal punctuation text (`{`, `<<`, `\\(`, `--`, ...).
 */
export type TokenKind =
  | 'string'
  | 'unsigned'
  | 'real'
  | 'keyword'
  | 'escapedWord'
  | 'escapedUnsigned'
  | 'noteName'
  | 'symbol'
  | 'lyricWord'
  | 'scheme'
  | 'punct'
  | 'eof';

/** One lexed token. String tokens hold the unescaped value. */
export interface Token {
  kind: TokenKind;
  text: string;
  span: Span;
}

/** Lexer scanning modes; lyric bodies are scanned as syllables. */
export type LexerMode = 'notes' | 'lyrics';

/**
 * Escaped words the parser treats as grammar keywords everywhere. Words that
 * only mean something in one place, such as `\consists` inside `\with` or
 * `\rest` after a pitch, lex as escaped words and are matched there.
 */
export const KEYWORDS: ReadonlySet<string> = new Set([
  'acciaccatura',
  'addlyrics',
  'afterGrace',
  'alternative',
  'appoggiatura',
  'autoBeamOff',
  'autoBeamOn',
  'bar',
  'book',
  'bookpart',
  'breve',
  'change',
  'chordmode',
  'chords',
  'clef',
  'context',
  'drummode',
  'drums',
  'figuremode',
  'figures',
  'fixed',
  'grace',
  'header',
  'key',
  'layout',
  'longa',
  'lyricmode',
  'lyrics',
  'lyricsto',
  'mark',
  'markup',
  'markuplist',
  'maxima',
  'midi',
  'new',
  'once',
  'override',
  'paper',
  'partial',
  'relative',
  'repeat',
  'revert',
  'score',
  'sequential',
  'set',
  'simultaneous',
  'tempo',
  'textMark',
  'time',
  'times',
  'transpose',
  'tuplet',
  'tweak',
  'unset',
  'version',
  'with'
]);

/** Lexing failure raised at a specific character offset. */
export class LexError extends Error {
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(message);
    this.name = 'LexError';
    this.offset = offset;
  }
}

/** Human-readable token description used in parse error messages. */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case 'eof':
      return 'end of input';
    case 'string':
      return JSON.stringify(token.text);
    case 'keyword':
    case 'escapedWord':
    case 'escapedUnsigned':
      return `\\${token.text}`;
    case 'scheme':
      return `#${token.text}`;
    case 'punct':
      return `'${token.text}'`;
    default:
      return token.text;
  }
}
