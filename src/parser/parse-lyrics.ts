import type { LyricEvent, Music, PostEvent } from '../core/ast.js';
import type { Token } from '../lexer/tokens.js';
import { nested, type ParseContext } from './parse-context.js';
import { parseMusicFunction } from './parse-music.js';
import { parseOptionalDuration } from './parse-note-events.js';
import { parsePropertyOperation } from './parse-properties.js';
import { parseRawMarkup, parseScheme } from './parse-raw.js';
import { expectPunct, fail, isKeyword, isPunct } from './token-utils.js';

/**
 * Body of `\lyricmode`, `\lyricsto` or `\addlyrics`: a braced lyric sequence,
 * an identifier, or a nested `\lyricmode`.
 */
export function parseLyricBody(ctx: ParseContext): Music {
  return nested(ctx, () => parseLyricBodyExpression(ctx));
}

function parseLyricBodyExpression(ctx: ParseContext): Music {
  const token = ctx.stream.peek();

  if (isPunct(token, '{')) {
    return parseLyricSequence(ctx);
  }
  if (token.kind === 'escapedWord') {
    ctx.stream.next();
    return { kind: 'identifier', name: token.text };
  }
  if (isKeyword(token, 'lyricmode')) {
    ctx.stream.next();
    return { kind: 'lyricMode', body: parseLyricBody(ctx) };
  }
  return fail(token, 'lyric body');
}

/**
 * `{ syllable... }` scanned in lyrics mode. The stream is re-seated just past
 * each brace so that the enclosing mode resumes after the closing one.
 */
function parseLyricSequence(ctx: ParseContext): Music {
  const outerMode = ctx.stream.mode;
  const open = expectPunct(ctx, '{');
  ctx.stream.reset(open.span.end, 'lyrics');

  const items = parseLyricItems(ctx);

  const close = expectPunct(ctx, '}', "lyric syllable or '}'");
  ctx.stream.reset(close.span.end, outerMode);
  return { kind: 'sequential', items };
}

function parseLyricItems(ctx: ParseContext): Music[] {
  const items: Music[] = [];
  while (true) {
    const token = ctx.stream.peek();
    if (isPunct(token, '}')) {
      return items;
    }
    if (token.kind === 'eof') {
      return fail(token, "lyric syllable or '}'");
    }
    items.push(parseLyricElement(ctx));
  }
}

function parseLyricElement(ctx: ParseContext): Music {
  return nested(ctx, () => parseLyricElementExpression(ctx));
}

function parseLyricElementExpression(ctx: ParseContext): Music {
  const token = ctx.stream.peek();

  switch (token.kind) {
    case 'punct':
      return parseLyricPunctuation(ctx, token);
    case 'lyricWord':
    case 'string':
      ctx.stream.next();
      return parseSyllable(ctx, token.text);
    case 'scheme':
      return { kind: 'scheme', text: parseScheme(ctx) };
    case 'escapedWord':
      return parseMusicFunction(ctx, parseLyricElement);
    case 'keyword':
      return parseLyricKeyword(ctx, token);
    default:
      return fail(token, 'lyric syllable');
  }
}

function parseLyricPunctuation(ctx: ParseContext, token: Token): Music {
  switch (token.text) {
    case '{': {
      ctx.stream.next();
      const items = parseLyricItems(ctx);
      ctx.stream.next();
      return { kind: 'sequential', items };
    }
    case '|':
      ctx.stream.next();
      return { kind: 'barCheck' };
    case '_':
      ctx.stream.next();
      return parseSyllable(ctx, '_');
    default:
      return fail(token, 'lyric syllable');
  }
}

function parseLyricKeyword(ctx: ParseContext, token: Token): Music {
  switch (token.text) {
    case 'override':
    case 'revert':
    case 'set':
    case 'unset':
      return parsePropertyOperation(ctx);
    case 'once':
      ctx.stream.next();
      return { kind: 'once', body: parseLyricElement(ctx) };
    case 'markup':
      return { kind: 'markup', markup: parseRawMarkup(ctx, 'markup') };
    default:
      return fail(token, 'lyric syllable');
  }
}

/** Syllable text followed by an optional duration and `--` / `__` markers. */
function parseSyllable(ctx: ParseContext, text: string): LyricEvent {
  const lyric: LyricEvent = { kind: 'lyric', text, postEvents: [] };
  const duration = parseOptionalDuration(ctx);
  if (duration) {
    lyric.duration = duration;
  }
  lyric.postEvents = parseLyricPostEvents(ctx);
  return lyric;
}

function parseLyricPostEvents(ctx: ParseContext): PostEvent[] {
  const events: PostEvent[] = [];
  while (true) {
    const token = ctx.stream.peek();
    if (isPunct(token, '--')) {
      events.push({ kind: 'lyricHyphen' });
    } else if (isPunct(token, '__')) {
      events.push({ kind: 'lyricExtender' });
    } else {
      return events;
    }
    ctx.stream.next();
  }
}
