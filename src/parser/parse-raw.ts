import type { Markup } from '../core/ast.js';
import { scanMarkupExtent } from '../lexer/lexer.js';
import type { ParseContext } from './parse-context.js';
import { expectKeyword, fail } from './token-utils.js';

/**
 * Consume `\markup` or `\markuplist` and capture the following markup source verbatim.
 * The token buffer is dropped and lexing resumes after the captured text.
 */
export function parseRawMarkup(ctx: ParseContext, keyword: 'markup' | 'markuplist'): Markup {
  const token = expectKeyword(ctx, keyword);
  const start = token.span.end;
  const end = scanMarkupExtent(ctx.source, start);
  const raw = ctx.source.slice(start, end).trim();
  ctx.stream.reset(end);

  if (raw === '') {
    return fail(ctx.stream.peek(), `${keyword} content`);
  }
  return { raw };
}

/** Consume a `#` Scheme token and return its text without the leading `#`. */
export function parseScheme(ctx: ParseContext): string {
  const token = ctx.stream.peek();
  if (token.kind !== 'scheme') {
    return fail(token, 'Scheme expression');
  }
  ctx.stream.next();
  return token.text;
}
