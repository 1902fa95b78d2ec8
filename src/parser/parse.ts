import type {
  Assignment,
  BookItem,
  BookPartItem,
  HeaderBlock,
  LayoutBlock,
  LilyPondFile,
  MidiBlock,
  OutputDefItem,
  PaperBlock,
  ScoreBlock,
  SchemeItem,
  ScoreItem,
  ToplevelExpression
} from '../core/ast.js';
import { LexError, type Token } from '../lexer/tokens.js';
import { isAssignmentStart, parseAssignment } from './parse-assignments.js';
import { createParseContext, type ParseContext } from './parse-context.js';
import { LilyPondSyntaxError, type ParseError, type ParseWarning } from './errors.js';
import { parseMusicItem } from './parse-music.js';
import { parseContextBlock } from './parse-properties.js';
import { parseRawMarkup, parseScheme } from './parse-raw.js';
import { expectKind, expectPunct, fail, isKeyword, isPunct } from './token-utils.js';

/** Parser return value: the file on success, the first error otherwise. */
export type ParseResult =
  | { ok: true; file: LilyPondFile; warnings: ParseWarning[] }
  | { ok: false; error: ParseError; warnings: ParseWarning[] };

/**
 * Parse LilyPond source text into a `LilyPondFile`.
 * Parsing stops at the first grammar violation; there is no partial result.
 */
export function parse(source: string): ParseResult {
  const ctx = createParseContext(source);
  try {
    const file = parseFile(ctx);
    return { ok: true, file, warnings: ctx.warnings };
  } catch (error) {
    if (error instanceof LilyPondSyntaxError) {
      return { ok: false, error: error.detail, warnings: ctx.warnings };
    }
    if (error instanceof LexError) {
      return { ok: false, error: { kind: 'lex', message: error.message, offset: error.offset }, warnings: ctx.warnings };
    }
    throw error;
  }
}

function parseFile(ctx: ParseContext): LilyPondFile {
  const file: LilyPondFile = { items: [] };

  while (ctx.stream.peek().kind !== 'eof') {
    if (isKeyword(ctx.stream.peek(), 'version')) {
      ctx.stream.next();
      file.version = expectKind(ctx, 'string', 'version string').text;
      continue;
    }
    file.items.push(parseToplevel(ctx));
  }
  return file;
}

function parseToplevel(ctx: ParseContext): ToplevelExpression {
  const token = ctx.stream.peek();

  if (token.kind === 'keyword') {
    switch (token.text) {
      case 'score':
        return parseScore(ctx);
      case 'book':
        ctx.stream.next();
        return { kind: 'book', items: parseBlockItems(ctx, parseBookItem) };
      case 'bookpart':
        ctx.stream.next();
        return { kind: 'bookpart', items: parseBlockItems(ctx, parseBookPartItem) };
      case 'header':
        return parseHeader(ctx);
      case 'paper':
        return parsePaper(ctx);
      case 'layout':
      case 'midi':
        return parseOutputDef(ctx, token.text);
      case 'markup':
      case 'markuplist':
        return { kind: token.text, markup: parseRawMarkup(ctx, token.text) };
      default:
        break;
    }
  }

  if (token.kind === 'scheme') {
    return { kind: 'scheme', text: parseScheme(ctx) };
  }
  if (isAssignmentStart(ctx)) {
    return parseAssignment(ctx);
  }
  return { kind: 'music', music: parseMusicItem(ctx) };
}

/** `{ item... }` where each item is read by `parseItem`. */
function parseBlockItems<T>(ctx: ParseContext, parseItem: (ctx: ParseContext, token: Token) => T): T[] {
  expectPunct(ctx, '{');
  const items: T[] = [];
  while (true) {
    const token = ctx.stream.peek();
    if (isPunct(token, '}')) {
      ctx.stream.next();
      return items;
    }
    if (token.kind === 'eof') {
      return fail(token, "'}'");
    }
    items.push(parseItem(ctx, token));
  }
}

function parseScore(ctx: ParseContext): ScoreBlock {
  ctx.stream.next();
  return { kind: 'score', items: parseBlockItems(ctx, parseScoreItem) };
}

function parseScoreItem(ctx: ParseContext, token: Token): ScoreItem {
  if (isKeyword(token, 'header')) {
    return parseHeader(ctx);
  }
  if (isKeyword(token, 'layout') || isKeyword(token, 'midi')) {
    return parseOutputDef(ctx, token.text === 'layout' ? 'layout' : 'midi');
  }
  return { kind: 'music', music: parseMusicItem(ctx) };
}

function parseBookItem(ctx: ParseContext, token: Token): BookItem {
  if (isKeyword(token, 'bookpart')) {
    ctx.stream.next();
    return { kind: 'bookpart', items: parseBlockItems(ctx, parseBookPartItem) };
  }
  return parseBookPartItem(ctx, token);
}

function parseBookPartItem(ctx: ParseContext, token: Token): BookPartItem {
  if (token.kind === 'keyword') {
    switch (token.text) {
      case 'score':
        return parseScore(ctx);
      case 'header':
        return parseHeader(ctx);
      case 'paper':
        return parsePaper(ctx);
      case 'markup':
      case 'markuplist':
        return { kind: token.text, markup: parseRawMarkup(ctx, token.text) };
      default:
        break;
    }
  }

  if (isAssignmentStart(ctx)) {
    return parseAssignment(ctx);
  }
  return { kind: 'music', music: parseMusicItem(ctx) };
}

/** `\header { name = value ... }` */
function parseHeader(ctx: ParseContext): HeaderBlock {
  ctx.stream.next();
  return {
    kind: 'header',
    fields: parseBlockItems(ctx, (inner, token): Assignment => {
      if (!isAssignmentStart(inner)) {
        return fail(token, "header field or '}'");
      }
      return parseAssignment(inner);
    })
  };
}

/** `\paper { assignment | #scheme ... }` */
function parsePaper(ctx: ParseContext): PaperBlock {
  ctx.stream.next();
  return {
    kind: 'paper',
    items: parseBlockItems(ctx, (inner, token): Assignment | SchemeItem => {
      if (token.kind === 'scheme') {
        return { kind: 'scheme', text: parseScheme(inner) };
      }
      if (!isAssignmentStart(inner)) {
        return fail(token, "paper variable or '}'");
      }
      return parseAssignment(inner);
    })
  };
}

/** `\layout { ... }` or `\midi { ... }` */
function parseOutputDef(ctx: ParseContext, kind: 'layout' | 'midi'): LayoutBlock | MidiBlock {
  ctx.stream.next();
  const items = parseBlockItems(ctx, parseOutputDefItem);
  return kind === 'layout' ? { kind: 'layout', items } : { kind: 'midi', items };
}

function parseOutputDefItem(ctx: ParseContext, token: Token): OutputDefItem {
  if (isKeyword(token, 'context')) {
    return parseContextBlock(ctx);
  }
  if (token.kind === 'scheme') {
    return { kind: 'scheme', text: parseScheme(ctx) };
  }
  if (!isAssignmentStart(ctx)) {
    return fail(token, "output definition setting or '}'");
  }
  return parseAssignment(ctx);
}
