import type { Assignment, AssignmentValue } from '../core/ast.js';
import { NOTATION_NAMES } from '../core/notation-names.js';
import type { Token } from '../lexer/tokens.js';
import type { ParseContext } from './parse-context.js';
import { parseMusicItem } from './parse-music.js';
import { parseRawMarkup } from './parse-raw.js';
import { expectPunct, fail, isPunct, isWordToken } from './token-utils.js';

/**
 * Decide assignment-versus-music from lookahead alone: a name
 * (`word(.word)*` or a string) directly followed by `=`.
 */
export function isAssignmentStart(ctx: ParseContext): boolean {
  const stream = ctx.stream;
  const first = stream.peek();
  if (first.kind === 'string') {
    return isPunct(stream.peek(1), '=');
  }
  if (!isWordToken(first)) {
    return false;
  }

  let offset = 1;
  while (isPunct(stream.peek(offset), '.') && isWordToken(stream.peek(offset + 1))) {
    offset += 2;
  }
  return isPunct(stream.peek(offset), '=');
}

/** `name = value` */
export function parseAssignment(ctx: ParseContext): Assignment {
  const name = parseAssignmentName(ctx);
  expectPunct(ctx, '=');
  return { kind: 'assignment', name, value: parseAssignmentValue(ctx) };
}

function parseAssignmentName(ctx: ParseContext): string {
  const token = ctx.stream.peek();
  if (token.kind === 'string') {
    ctx.stream.next();
    return token.text;
  }
  if (!isWordToken(token)) {
    return fail(token, 'assignment name');
  }

  ctx.stream.next();
  const parts = [token.text];
  while (isPunct(ctx.stream.peek(), '.') && isWordToken(ctx.stream.peek(1))) {
    ctx.stream.next();
    parts.push(ctx.stream.next().text);
  }
  return parts.join('.');
}

/** Right-hand side of an assignment. */
export function parseAssignmentValue(ctx: ParseContext): AssignmentValue {
  const token = ctx.stream.peek();

  switch (token.kind) {
    case 'string':
      ctx.stream.next();
      return { kind: 'string', value: token.text };
    case 'unsigned':
    case 'real':
      ctx.stream.next();
      return withUnit(ctx, Number(token.text));
    case 'scheme':
      ctx.stream.next();
      return { kind: 'scheme', text: token.text };
    case 'keyword':
      if (token.text === 'markup' || token.text === 'markuplist') {
        return { kind: token.text, markup: parseRawMarkup(ctx, token.text) };
      }
      break;
    case 'punct':
      if (token.text === '-' && isNumberToken(ctx.stream.peek(1))) {
        ctx.stream.next();
        return withUnit(ctx, 0 - Number(ctx.stream.next().text));
      }
      break;
    default:
      break;
  }

  const music = parseMusicItem(ctx);
  if (music.kind === 'identifier') {
    return { kind: 'identifier', name: music.name };
  }
  return { kind: 'music', music };
}

function isNumberToken(token: Token): boolean {
  return token.kind === 'unsigned' || token.kind === 'real';
}

/** Attach a trailing dimension unit such as `\mm`. */
function withUnit(ctx: ParseContext, value: number): AssignmentValue {
  const token = ctx.stream.peek();
  if (token.kind === 'escapedWord' && NOTATION_NAMES.units.has(token.text)) {
    ctx.stream.next();
    return { kind: 'number', value, unit: token.text };
  }
  return { kind: 'number', value };
}
