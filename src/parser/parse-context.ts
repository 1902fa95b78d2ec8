import { MAX_NESTING_DEPTH } from '../core/music-children.js';
import { LilyPondSyntaxError, type ParseWarning, type ParseWarningKind } from './errors.js';
import { TokenStream } from './token-stream.js';

/** Mutable parser state shared by the grammar helpers of one `parse` call. */
export interface ParseContext {
  source: string;
  stream: TokenStream;
  warnings: ParseWarning[];
  /** Music expressions currently open on the call stack. */
  depth: number;
}

/** Create a parser context for one parse invocation. */
export function createParseContext(source: string): ParseContext {
  return {
    source,
    stream: new TokenStream(source),
    warnings: [],
    depth: 0
  };
}

/** Record a non-fatal parse warning at a source offset. */
export function addWarning(ctx: ParseContext, kind: ParseWarningKind, offset: number, message: string): void {
  ctx.warnings.push({ kind, offset, message });
}

/**
 * Run `parseInner` one nesting level deeper. Fails with `tooDeep` at the
 * current token once `MAX_NESTING_DEPTH` expressions are open.
 */
export function nested<T>(ctx: ParseContext, parseInner: () => T): T {
  if (ctx.depth >= MAX_NESTING_DEPTH) {
    throw new LilyPondSyntaxError({
      kind: 'tooDeep',
      offset: ctx.stream.peek().span.start,
      limit: MAX_NESTING_DEPTH
    });
  }
  ctx.depth += 1;
  try {
    return parseInner();
  } finally {
    ctx.depth -= 1;
  }
}
