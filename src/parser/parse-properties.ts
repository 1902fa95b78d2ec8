import type {
  ContextBlock,
  ContextedMusic,
  ContextModItem,
  NamedContextModKind,
  PropertyOperation,
  PropertyPathSegment,
  PropertyValue
} from '../core/ast.js';
import type { Token } from '../lexer/tokens.js';
import { parseAssignment } from './parse-assignments.js';
import type { ParseContext } from './parse-context.js';
import { parseMusic } from './parse-music.js';
import { parseRawMarkup } from './parse-raw.js';
import {
  acceptPunct,
  expectKeyword,
  expectKind,
  expectPunct,
  expectSimpleString,
  fail,
  isKeyword,
  isPunct,
  isWordToken
} from './token-utils.js';

/** Context modifier keywords that take a single name; `defaultchild` is spelled in lower case. */
const NAMED_MODIFIERS: ReadonlyMap<string, NamedContextModKind> = new Map([
  ['consists', 'consists'],
  ['remove', 'remove'],
  ['accepts', 'accepts'],
  ['denies', 'denies'],
  ['alias', 'alias'],
  ['defaultchild', 'defaultChild'],
  ['name', 'name']
]);

const PROPERTY_KEYWORDS: ReadonlySet<string> = new Set(['override', 'revert', 'set', 'unset']);

/** `\new|\context Type [= name] [\with { ... }]... music` */
export function parseContextedMusic(ctx: ParseContext): ContextedMusic {
  const keyword = ctx.stream.next().text === 'new' ? 'new' : 'context';
  const contextType = expectSimpleString(ctx, 'context type');

  let name: string | undefined;
  if (acceptPunct(ctx, '=')) {
    name = expectSimpleString(ctx, 'context name');
  }

  const withBlock = parseWithBlocks(ctx);
  const body = parseMusic(ctx);
  const music: ContextedMusic = { kind: 'contextedMusic', keyword, contextType, body };
  if (name !== undefined) {
    music.name = name;
  }
  if (withBlock) {
    music.withBlock = withBlock;
  }
  return music;
}

/** Any number of `\with { ... }` blocks, merged in order; `undefined` when there are none. */
export function parseWithBlocks(ctx: ParseContext): ContextModItem[] | undefined {
  let withBlock: ContextModItem[] | undefined;
  while (isKeyword(ctx.stream.peek(), 'with')) {
    ctx.stream.next();
    const items = parseContextModBlock(ctx);
    withBlock = withBlock ? [...withBlock, ...items] : items;
  }
  return withBlock;
}

/** `\context { ... }` inside `\layout` or `\midi`. */
export function parseContextBlock(ctx: ParseContext): ContextBlock {
  ctx.stream.next();
  return { kind: 'contextBlock', items: parseContextModBlock(ctx) };
}

/** `{ modifier... }` */
function parseContextModBlock(ctx: ParseContext): ContextModItem[] {
  expectPunct(ctx, '{');
  const items: ContextModItem[] = [];
  while (!isPunct(ctx.stream.peek(), '}')) {
    items.push(parseContextModItem(ctx));
  }
  ctx.stream.next();
  return items;
}

function parseContextModItem(ctx: ParseContext): ContextModItem {
  const token = ctx.stream.peek();

  if (token.kind === 'keyword' && PROPERTY_KEYWORDS.has(token.text)) {
    return parsePropertyOperation(ctx);
  }

  if (token.kind === 'escapedWord') {
    ctx.stream.next();
    const named = NAMED_MODIFIERS.get(token.text);
    if (named) {
      return { kind: named, name: expectSimpleString(ctx, `${token.text} argument`) };
    }
    if (token.text === 'description') {
      return { kind: 'description', text: expectKind(ctx, 'string', 'description string').text };
    }
    return { kind: 'contextRef', name: token.text };
  }

  if (isWordToken(token) || token.kind === 'string') {
    return parseAssignment(ctx);
  }

  return fail(token, "context modifier or '}'");
}

/** `\override path = value`, `\set path = value`, `\revert path`, `\unset path` */
export function parsePropertyOperation(ctx: ParseContext): PropertyOperation {
  const keyword = ctx.stream.next();
  const path = parsePropertyPath(ctx);

  switch (keyword.text) {
    case 'override':
      expectPunct(ctx, '=');
      return { kind: 'override', path, value: parsePropertyValue(ctx) };
    case 'set':
      expectPunct(ctx, '=');
      return { kind: 'set', path, value: parsePropertyValue(ctx) };
    case 'revert':
      return { kind: 'revert', path };
    case 'unset':
      return { kind: 'unset', path };
    default:
      return fail(keyword, 'property operation');
  }
}

/**
 * `\tweak path value`. Without an `=` to end the path, a quoted Scheme symbol
 * only joins the path when a Scheme, string, number or markup value follows it.
 */
export function parseTweak(ctx: ParseContext): { path: PropertyPathSegment[]; value: PropertyValue } {
  expectKeyword(ctx, 'tweak');
  const path = parsePropertyPath(ctx, isTweakValueStart);
  return { path, value: parsePropertyValue(ctx) };
}

function isTweakValueStart(token: Token): boolean {
  switch (token.kind) {
    case 'scheme':
    case 'string':
    case 'unsigned':
    case 'real':
      return true;
    default:
      return isKeyword(token, 'markup');
  }
}

/**
 * Dotted property path (`Staff.TimeSignature.color`) optionally followed by
 * quoted Scheme symbols (`Stem #'direction`). Lyric-mode words arrive with
 * their dots inside and are split here. `valueFollows` vetoes a Scheme
 * segment by looking at the token after it.
 */
function parsePropertyPath(ctx: ParseContext, valueFollows: (next: Token) => boolean = () => true): PropertyPathSegment[] {
  const segments: PropertyPathSegment[] = [...parsePathNames(ctx)];
  while (acceptPunct(ctx, '.')) {
    segments.push(...parsePathNames(ctx));
  }

  let token = ctx.stream.peek();
  while (token.kind === 'scheme' && token.text.startsWith("'") && valueFollows(ctx.stream.peek(1))) {
    ctx.stream.next();
    segments.push({ kind: 'scheme', text: token.text });
    token = ctx.stream.peek();
  }
  return segments;
}

function parsePathNames(ctx: ParseContext): PropertyPathSegment[] {
  const token = ctx.stream.peek();
  if (isWordToken(token) || token.kind === 'string') {
    ctx.stream.next();
    return [{ kind: 'name', name: token.text }];
  }

  if (token.kind === 'lyricWord') {
    ctx.stream.next();
    return token.text
      .split('.')
      .filter((part) => part !== '')
      .map((name): PropertyPathSegment => ({ kind: 'name', name }));
  }

  return fail(token, 'property name');
}

export function parsePropertyValue(ctx: ParseContext): PropertyValue {
  const token = ctx.stream.peek();
  switch (token.kind) {
    case 'scheme':
      ctx.stream.next();
      return { kind: 'scheme', text: token.text };
    case 'string':
      ctx.stream.next();
      return { kind: 'string', value: token.text };
    case 'unsigned':
    case 'real':
      ctx.stream.next();
      return { kind: 'number', value: Number(token.text) };
    case 'escapedWord':
      ctx.stream.next();
      return { kind: 'identifier', name: token.text };
    case 'keyword':
      if (token.text === 'markup') {
        return { kind: 'markup', markup: parseRawMarkup(ctx, 'markup') };
      }
      return fail(token, 'property value');
    default:
      return fail(token, 'property value');
  }
}
