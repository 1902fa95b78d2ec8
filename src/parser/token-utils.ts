import { describeToken, type Token, type TokenKind } from '../lexer/tokens.js';
import { LilyPondSyntaxError } from './errors.js';
import type { ParseContext } from './parse-context.js';

/** Abort the parse at `token`, reporting what the grammar expected there. */
export function fail(token: Token, expected: string): never {
  if (token.kind === 'eof') {
    throw new LilyPondSyntaxError({ kind: 'unexpectedEof', expected });
  }

  throw new LilyPondSyntaxError({
    kind: 'unexpected',
    found: describeToken(token),
    offset: token.span.start,
    expected
  });
}

/** True when `token` is the punctuation `text`. */
export function isPunct(token: Token, text: string): boolean {
  return token.kind === 'punct' && token.text === text;
}

/** True when `token` is the keyword `\word`. */
export function isKeyword(token: Token, word: string): boolean {
  return token.kind === 'keyword' && token.text === word;
}

/** True when `token` is the escaped word `\word` outside the keyword set. */
export function isEscapedWord(token: Token, word: string): boolean {
  return token.kind === 'escapedWord' && token.text === word;
}

/** True for plain words usable as names (symbols and note names). */
export function isWordToken(token: Token): boolean {
  return token.kind === 'symbol' || token.kind === 'noteName';
}

/** Consume punctuation `text` or fail. */
export function expectPunct(ctx: ParseContext, text: string, expected = `'${text}'`): Token {
  const token = ctx.stream.peek();
  if (!isPunct(token, text)) {
    fail(token, expected);
  }
  return ctx.stream.next();
}

/** Consume a keyword `\word` or fail. */
export function expectKeyword(ctx: ParseContext, word: string): Token {
  const token = ctx.stream.peek();
  if (!isKeyword(token, word)) {
    fail(token, `\\${word}`);
  }
  return ctx.stream.next();
}

/** Consume a token of `kind` or fail. */
export function expectKind(ctx: ParseContext, kind: TokenKind, expected: string): Token {
  const token = ctx.stream.peek();
  if (token.kind !== kind) {
    fail(token, expected);
  }
  return ctx.stream.next();
}

/** Consume an unsigned integer literal. */
export function expectUnsigned(ctx: ParseContext, expected: string): number {
  return Number.parseInt(expectKind(ctx, 'unsigned', expected).text, 10);
}

/** Consume punctuation `text` when present. */
export function acceptPunct(ctx: ParseContext, text: string): boolean {
  if (isPunct(ctx.stream.peek(), text)) {
    ctx.stream.next();
    return true;
  }
  return false;
}

/** Consume a string literal or a bare word and return its text. */
export function expectSimpleString(ctx: ParseContext, expected: string): string {
  const token = ctx.stream.peek();
  if (token.kind === 'string' || isWordToken(token)) {
    ctx.stream.next();
    return token.text;
  }
  return fail(token, expected);
}
