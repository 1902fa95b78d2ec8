import { isNoteName } from '../core/pitch.js';
import { KEYWORDS, LexError, type LexerMode, type Token, type TokenKind } from './tokens.js';

const SINGLE_PUNCTUATION: ReadonlySet<string> = new Set([
  '{',
  '}',
  '[',
  ']',
  '(',
  ')',
  '~',
  '|',
  '=',
  '.',
  "'",
  ',',
  '!',
  '?',
  '-',
  '^',
  '_',
  '+',
  '*',
  '/',
  ':'
]);

/** Characters after `\` that form two-character punctuation tokens. */
const ESCAPED_PUNCTUATION: ReadonlySet<string> = new Set(['\\', '(', ')', '!', '<', '>', '+']);

/** Characters that stand alone in lyrics mode instead of starting a syllable. */
const LYRIC_PUNCTUATION: ReadonlySet<string> = new Set(['{', '}', '|', '=', '.', '*', '/']);

/** Characters that end a lyric syllable or markup word. */
const WORD_BREAKERS: ReadonlySet<string> = new Set(['{', '}', '"', '\\', '%', '#']);

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f' || ch === '\v';
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch.charCodeAt(0) >= 0x80;
}

/**
 * Tokenizer over one source string.
 * The scan offset and mode are its only state, so callers snapshot and restore
 * it with `position` and `seek` instead of building a new lexer.
 */
export class Lexer {
  readonly source: string;
  private offset: number;
  private scanMode: LexerMode;

  constructor(source: string, offset = 0, mode: LexerMode = 'notes') {
    this.source = source;
    this.offset = offset;
    this.scanMode = mode;
  }

  /** Current scan offset. */
  get position(): number {
    return this.offset;
  }

  get mode(): LexerMode {
    return this.scanMode;
  }

  /** Move the scan cursor, optionally switching mode. */
  seek(offset: number, mode: LexerMode = this.scanMode): void {
    this.offset = Math.max(0, Math.min(offset, this.source.length));
    this.scanMode = mode;
  }

  /** Scan the next token; returns an `eof` token once input is exhausted. */
  next(): Token {
    const src = this.source;
    const start = skipTrivia(src, this.offset);
    this.offset = start;

    if (start >= src.length) {
      return this.emit('eof', '', start);
    }

    const ch = src.charAt(start);

    if (ch === '"') {
      const { value, end } = scanString(src, start);
      this.offset = end;
      return this.emit('string', value, start);
    }

    if (ch === '#') {
      const end = scanSchemeDatum(src, start + 1);
      this.offset = end;
      return this.emit('scheme', src.slice(start + 1, end), start);
    }

    if (ch === '\\') {
      return this.lexEscaped(start);
    }

    if (isDigit(ch)) {
      return this.lexNumber(start);
    }

    if (this.scanMode === 'lyrics') {
      return this.lexLyricToken(start);
    }

    if (isLetter(ch)) {
      const end = scanWord(src, start);
      this.offset = end;
      const word = src.slice(start, end);
      return this.emit(isNoteName(word) ? 'noteName' : 'symbol', word, start);
    }

    if ((ch === '<' || ch === '>') && src.charAt(start + 1) === ch) {
      this.offset = start + 2;
      return this.emit('punct', ch + ch, start);
    }

    if (ch === '<' || ch === '>' || SINGLE_PUNCTUATION.has(ch)) {
      this.offset = start + 1;
      return this.emit('punct', ch, start);
    }

    throw new LexError(`unexpected character '${ch}'`, start);
  }

  private emit(kind: TokenKind, text: string, start: number): Token {
    return { kind, text, span: { start, end: this.offset } };
  }

  private lexEscaped(start: number): Token {
    const src = this.source;
    const next = src.charAt(start + 1);

    if (ESCAPED_PUNCTUATION.has(next)) {
      this.offset = start + 2;
      return this.emit('punct', `\\${next}`, start);
    }

    if (isDigit(next)) {
      let end = start + 1;
      while (end < src.length && isDigit(src.charAt(end))) {
        end += 1;
      }
      this.offset = end;
      return this.emit('escapedUnsigned', src.slice(start + 1, end), start);
    }

    if (isLetter(next)) {
      const end = scanWord(src, start + 1);
      this.offset = end;
      const word = src.slice(start + 1, end);
      return this.emit(KEYWORDS.has(word) ? 'keyword' : 'escapedWord', word, start);
    }

    throw new LexError('stray backslash', start);
  }

  private lexNumber(start: number): Token {
    const src = this.source;
    let end = start;
    while (end < src.length && isDigit(src.charAt(end))) {
      end += 1;
    }

    if (src.charAt(end) === '.' && isDigit(src.charAt(end + 1))) {
      end += 1;
      while (end < src.length && isDigit(src.charAt(end))) {
        end += 1;
      }
      this.offset = end;
      return this.emit('real', src.slice(start, end), start);
    }

    this.offset = end;
    return this.emit('unsigned', src.slice(start, end), start);
  }

  private lexLyricToken(start: number): Token {
    const src = this.source;
    const ch = src.charAt(start);
    const pair = src.slice(start, start + 2);

    if ((pair === '--' || pair === '__') && isLyricDelimiter(src, start + 2)) {
      this.offset = start + 2;
      return this.emit('punct', pair, start);
    }

    if (ch === '_' && isLyricDelimiter(src, start + 1)) {
      this.offset = start + 1;
      return this.emit('punct', '_', start);
    }

    if (LYRIC_PUNCTUATION.has(ch)) {
      this.offset = start + 1;
      return this.emit('punct', ch, start);
    }

    let end = start;
    while (end < src.length) {
      const current = src.charAt(end);
      if (isWhitespace(current) || isDigit(current) || WORD_BREAKERS.has(current)) {
        break;
      }
      end += 1;
    }

    this.offset = end;
    return this.emit('lyricWord', src.slice(start, end), start);
  }
}

/** True when `word` would lex back as one bare lyric syllable. */
export function isBareLyricWord(word: string): boolean {
  if (word === '' || word === '--' || word === '__') {
    return false;
  }

  const first = word.charAt(0);
  if (LYRIC_PUNCTUATION.has(first)) {
    return false;
  }

  for (const ch of word) {
    if (isWhitespace(ch) || isDigit(ch) || WORD_BREAKERS.has(ch)) {
      return false;
    }
  }

  return true;
}

/** True when `word` lexes back as one plain symbol or note name. */
export function isBareWord(word: string): boolean {
  return word !== '' && isLetter(word.charAt(0)) && scanWord(word, 0) === word.length;
}

function isLyricDelimiter(src: string, index: number): boolean {
  if (index >= src.length) {
    return true;
  }
  const ch = src.charAt(index);
  return isWhitespace(ch) || ch === '{' || ch === '}';
}

/** Letters with single inner `-` or `_` joiners (`ragged-right`, `Bar_engraver`). */
function scanWord(src: string, start: number): number {
  let end = start;
  while (end < src.length) {
    const ch = src.charAt(end);
    if (isLetter(ch)) {
      end += 1;
      continue;
    }
    if ((ch === '-' || ch === '_') && end > start && isLetter(src.charAt(end + 1))) {
      end += 1;
      continue;
    }
    break;
  }
  return end;
}

/** Skip whitespace, `%` line comments and `%{ %}` block comments. */
export function skipTrivia(src: string, start: number): number {
  let index = start;
  while (index < src.length) {
    const ch = src.charAt(index);
    if (isWhitespace(ch)) {
      index += 1;
      continue;
    }

    if (ch === '%') {
      if (src.charAt(index + 1) === '{') {
        const close = src.indexOf('%}', index + 2);
        if (close < 0) {
          throw new LexError('unterminated block comment', index);
        }
        index = close + 2;
        continue;
      }

      const newline = src.indexOf('\n', index);
      index = newline < 0 ? src.length : newline + 1;
      continue;
    }

    break;
  }
  return index;
}

const STRING_ESCAPES: ReadonlyMap<string, string> = new Map([
  ['"', '"'],
  ['\\', '\\'],
  ['n', '\n'],
  ['t', '\t']
]);

/** Scan a double-quoted string starting at its opening quote. */
export function scanString(src: string, start: number): { value: string; end: number } {
  let value = '';
  let index = start + 1;
  while (index < src.length) {
    const ch = src.charAt(index);
    if (ch === '"') {
      return { value, end: index + 1 };
    }

    if (ch === '\\' && index + 1 < src.length) {
      const escaped = src.charAt(index + 1);
      const replacement = STRING_ESCAPES.get(escaped);
      value += replacement ?? `\\${escaped}`;
      index += 2;
      continue;
    }

    value += ch;
    index += 1;
  }

  throw new LexError('unterminated string', start);
}

/**
 * Scan one Scheme datum beginning at `start` (just after `#`) and return its end.
 * Handles quote prefixes, parenthesized lists, strings, `#t`-style atoms and
 * bare atoms up to whitespace or a delimiter.
 */
export function scanSchemeDatum(src: string, start: number): number {
  if (start >= src.length) {
    throw new LexError('empty Scheme expression', start);
  }

  start = skipQuotePrefixes(src, start);
  if (start >= src.length) {
    throw new LexError('empty Scheme expression', start);
  }

  const ch = src.charAt(start);
  if (ch === '(') {
    return scanSchemeList(src, start);
  }
  if (ch === '"') {
    return scanString(src, start).end;
  }
  if (ch === '#' && src.charAt(start + 1) === '(') {
    return scanSchemeList(src, start + 1);
  }
  if (ch === '#' && src.charAt(start + 1) === '{') {
    throw new LexError('embedded LilyPond in Scheme is not supported', start);
  }

  let end = start;
  while (end < src.length) {
    const current = src.charAt(end);
    if (isWhitespace(current) || current === '(' || current === ')' || current === '{' || current === '}' || current === '"') {
      break;
    }
    end += 1;
  }

  if (end === start) {
    throw new LexError('empty Scheme expression', start);
  }
  return end;
}

/** Skip any run of `'`, `` ` ``, `,` and `,@` prefixes. */
function skipQuotePrefixes(src: string, start: number): number {
  let index = start;
  while (index < src.length) {
    const ch = src.charAt(index);
    if (ch === "'" || ch === '`') {
      index += 1;
    } else if (ch === ',') {
      index += src.charAt(index + 1) === '@' ? 2 : 1;
    } else {
      return index;
    }
  }
  return index;
}

function scanSchemeList(src: string, start: number): number {
  let depth = 0;
  let index = start;
  while (index < src.length) {
    const ch = src.charAt(index);
    if (ch === '(') {
      depth += 1;
      index += 1;
    } else if (ch === ')') {
      depth -= 1;
      index += 1;
      if (depth === 0) {
        return index;
      }
    } else if (ch === '"') {
      index = scanString(src, index).end;
    } else if (ch === ';') {
      const newline = src.indexOf('\n', index);
      index = newline < 0 ? src.length : newline + 1;
    } else if (ch === '#' && src.charAt(index + 1) === '\\') {
      index += 3;
    } else {
      index += 1;
    }
  }

  throw new LexError('unterminated Scheme expression', start);
}

/**
 * Find the end of the markup expression following `\markup` at `start`.
 * Commands (`\bold`) and Scheme arguments chain until a braced list, string or
 * word completes the expression. Returns `start` when no markup follows.
 */
export function scanMarkupExtent(src: string, start: number): number {
  let end = start;
  let index = start;
  let afterCommand = false;

  while (true) {
    index = skipTrivia(src, index);
    if (index >= src.length) {
      return end;
    }

    const ch = src.charAt(index);
    if (ch === '\\' && isLetter(src.charAt(index + 1))) {
      index = scanWord(src, index + 1);
      end = index;
      afterCommand = true;
      continue;
    }

    if (ch === '#') {
      index = scanSchemeDatum(src, index + 1);
      end = index;
      if (afterCommand) {
        continue;
      }
      return end;
    }

    if (ch === '{') {
      return scanBraces(src, index);
    }

    if (ch === '"') {
      return scanString(src, index).end;
    }

    if (!WORD_BREAKERS.has(ch)) {
      let wordEnd = index;
      while (wordEnd < src.length) {
        const current = src.charAt(wordEnd);
        if (isWhitespace(current) || WORD_BREAKERS.has(current)) {
          break;
        }
        wordEnd += 1;
      }
      return wordEnd;
    }

    return end;
  }
}

/** Scan a balanced `{ }` group, skipping strings and comments. */
function scanBraces(src: string, start: number): number {
  let depth = 0;
  let index = start;
  while (index < src.length) {
    const ch = src.charAt(index);
    if (ch === '{') {
      depth += 1;
      index += 1;
    } else if (ch === '}') {
      depth -= 1;
      index += 1;
      if (depth === 0) {
        return index;
      }
    } else if (ch === '"') {
      index = scanString(src, index).end;
    } else if (ch === '%') {
      index = skipTrivia(src, index);
    } else if (ch === '\\' && index + 1 < src.length) {
      index += 2;
    } else {
      index += 1;
    }
  }

  throw new LexError('unterminated markup braces', start);
}
