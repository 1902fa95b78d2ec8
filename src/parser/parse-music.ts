import type {
  AfterGraceMusic,
  FunctionArgument,
  MarkLabel,
  Music,
  RelativeMusic,
  RepeatMusic,
  RepeatType,
  TempoMusic,
  TextValue,
  TupletMusic
} from '../core/ast.js';
import type { Token } from '../lexer/tokens.js';
import { nested, type ParseContext } from './parse-context.js';
import { parseLyricBody } from './parse-lyrics.js';
import {
  isRestLikeSymbol,
  parseChord,
  parseDuration,
  parseNoteEvent,
  parseOptionalDuration,
  parsePitch,
  parseRestLikeEvent
} from './parse-note-events.js';
import { parseModeMusic } from './parse-modes.js';
import { parseContextedMusic, parsePropertyOperation, parseTweak } from './parse-properties.js';
import { parseRawMarkup, parseScheme } from './parse-raw.js';
import {
  acceptPunct,
  expectKind,
  expectPunct,
  expectSimpleString,
  expectUnsigned,
  fail,
  isKeyword,
  isPunct
} from './token-utils.js';

export type MusicParser = (ctx: ParseContext) => Music;

const REPEAT_TYPES: ReadonlyMap<string, RepeatType> = new Map([
  ['volta', 'volta'],
  ['unfold', 'unfold'],
  ['percent', 'percent'],
  ['tremolo', 'tremolo'],
  ['segno', 'segno']
]);

/** Music expression followed by any `\addlyrics` attachments. */
export function parseMusicItem(ctx: ParseContext): Music {
  const music = parseMusic(ctx);
  if (!isKeyword(ctx.stream.peek(), 'addlyrics')) {
    return music;
  }

  const lyrics: Music[] = [];
  while (isKeyword(ctx.stream.peek(), 'addlyrics')) {
    ctx.stream.next();
    lyrics.push(parseLyricBody(ctx));
  }
  return { kind: 'addLyrics', music, lyrics };
}

/** Parse one music expression, dispatching on the current token. */
export function parseMusic(ctx: ParseContext): Music {
  return nested(ctx, () => parseMusicExpression(ctx));
}

function parseMusicExpression(ctx: ParseContext): Music {
  const token = ctx.stream.peek();

  switch (token.kind) {
    case 'punct':
      return parsePunctuationMusic(ctx, token);
    case 'noteName':
      return parseNoteEvent(ctx);
    case 'symbol':
      if (isRestLikeSymbol(token)) {
        return parseRestLikeEvent(ctx);
      }
      return fail(token, 'music expression');
    case 'scheme':
      return { kind: 'scheme', text: parseScheme(ctx) };
    case 'keyword':
      return parseKeywordMusic(ctx, token);
    case 'escapedWord':
      return parseMusicFunction(ctx);
    default:
      return fail(token, 'music expression');
  }
}

function parsePunctuationMusic(ctx: ParseContext, token: Token): Music {
  switch (token.text) {
    case '{':
      ctx.stream.next();
      return { kind: 'sequential', items: parseMusicList(ctx, '}') };
    case '<<':
      ctx.stream.next();
      return { kind: 'simultaneous', items: parseMusicList(ctx, '>>') };
    case '<':
      return parseChord(ctx);
    case '|':
      ctx.stream.next();
      return { kind: 'barCheck' };
    default:
      return fail(token, 'music expression');
  }
}

/** Items up to and including `close`; `\\` voice separators are kept inside `<< >>`. */
function parseMusicList(ctx: ParseContext, close: '}' | '>>'): Music[] {
  const items: Music[] = [];
  while (true) {
    const token = ctx.stream.peek();
    if (isPunct(token, close)) {
      ctx.stream.next();
      return items;
    }
    if (token.kind === 'eof') {
      return fail(token, `'${close}'`);
    }
    if (close === '>>' && isPunct(token, '\\\\')) {
      ctx.stream.next();
      items.push({ kind: 'voiceSeparator' });
      continue;
    }
    items.push(parseMusicItem(ctx));
  }
}

function parseKeywordMusic(ctx: ParseContext, token: Token): Music {
  switch (token.text) {
    case 'sequential':
      ctx.stream.next();
      expectPunct(ctx, '{');
      return { kind: 'sequential', items: parseMusicList(ctx, '}') };
    case 'simultaneous':
      ctx.stream.next();
      expectPunct(ctx, '{');
      return { kind: 'simultaneous', items: parseMusicList(ctx, '}') };
    case 'relative':
      return parseRelative(ctx);
    case 'fixed': {
      ctx.stream.next();
      const pitch = parsePitch(ctx, 'reference pitch');
      return { kind: 'fixed', pitch, body: parseMusic(ctx) };
    }
    case 'transpose': {
      ctx.stream.next();
      const from = parsePitch(ctx, 'source pitch');
      const to = parsePitch(ctx, 'target pitch');
      return { kind: 'transpose', from, to, body: parseMusic(ctx) };
    }
    case 'new':
    case 'context':
      return parseContextedMusic(ctx);
    case 'change': {
      ctx.stream.next();
      const contextType = expectSimpleString(ctx, 'context type');
      expectPunct(ctx, '=');
      return { kind: 'contextChange', contextType, name: expectSimpleString(ctx, 'context name') };
    }
    case 'clef':
      ctx.stream.next();
      return { kind: 'clef', name: expectSimpleString(ctx, 'clef name') };
    case 'key': {
      ctx.stream.next();
      const pitch = parsePitch(ctx, 'key tonic');
      const mode = expectKind(ctx, 'escapedWord', 'key mode such as \\major');
      return { kind: 'keySignature', pitch, mode: mode.text };
    }
    case 'time':
      return parseTimeSignature(ctx);
    case 'partial':
      ctx.stream.next();
      return { kind: 'partial', duration: parseDuration(ctx, 'partial duration') };
    case 'tuplet':
    case 'times':
      return parseTuplet(ctx);
    case 'grace':
    case 'acciaccatura':
    case 'appoggiatura':
      ctx.stream.next();
      return { kind: token.text, body: parseMusic(ctx) };
    case 'afterGrace':
      return parseAfterGrace(ctx);
    case 'repeat':
      return parseRepeat(ctx);
    case 'bar':
      ctx.stream.next();
      return { kind: 'barLine', barType: expectKind(ctx, 'string', 'bar line type string').text };
    case 'mark':
      ctx.stream.next();
      return { kind: 'mark', label: parseMarkLabel(ctx) };
    case 'textMark':
      ctx.stream.next();
      return { kind: 'textMark', text: parseTextValue(ctx, 'text mark') };
    case 'tempo':
      return parseTempo(ctx);
    case 'autoBeamOn':
    case 'autoBeamOff':
      ctx.stream.next();
      return { kind: token.text };
    case 'lyricmode':
      ctx.stream.next();
      return { kind: 'lyricMode', body: parseLyricBody(ctx) };
    case 'lyrics':
      ctx.stream.next();
      return {
        kind: 'contextedMusic',
        keyword: 'new',
        contextType: 'Lyrics',
        body: { kind: 'lyricMode', body: parseLyricBody(ctx) }
      };
    case 'lyricsto': {
      ctx.stream.next();
      const voiceId = expectSimpleString(ctx, 'voice name');
      return { kind: 'lyricsTo', voiceId, body: parseLyricBody(ctx) };
    }
    case 'markup':
      return { kind: 'markup', markup: parseRawMarkup(ctx, 'markup') };
    case 'override':
    case 'revert':
    case 'set':
    case 'unset':
      return parsePropertyOperation(ctx);
    case 'once':
      ctx.stream.next();
      return { kind: 'once', body: parseMusic(ctx) };
    case 'tweak': {
      const { path, value } = parseTweak(ctx);
      return { kind: 'tweak', path, value, body: parseMusic(ctx) };
    }
    case 'chordmode':
    case 'chords':
    case 'drummode':
    case 'drums':
    case 'figuremode':
    case 'figures':
      return parseModeMusic(ctx);
    default:
      return fail(token, 'music expression');
  }
}

/** `\relative [pitch] music` */
function parseRelative(ctx: ParseContext): RelativeMusic {
  ctx.stream.next();
  if (ctx.stream.peek().kind !== 'noteName') {
    return { kind: 'relative', body: parseMusic(ctx) };
  }
  const pitch = parsePitch(ctx, 'reference pitch');
  return { kind: 'relative', pitch, body: parseMusic(ctx) };
}

/** `\time n[+n...]/d` */
function parseTimeSignature(ctx: ParseContext): Music {
  ctx.stream.next();
  const numerators = [expectUnsigned(ctx, 'time signature numerator')];
  while (acceptPunct(ctx, '+')) {
    numerators.push(expectUnsigned(ctx, 'time signature numerator'));
  }
  expectPunct(ctx, '/');
  return { kind: 'timeSignature', numerators, denominator: expectUnsigned(ctx, 'time signature denominator') };
}

/** `\tuplet n/d [span] music`, or `\times d/n music` with the fraction inverted. */
function parseTuplet(ctx: ParseContext): TupletMusic {
  const keyword = ctx.stream.next();
  const first = expectUnsigned(ctx, 'tuplet fraction');
  expectPunct(ctx, '/');
  const second = expectUnsigned(ctx, 'tuplet fraction denominator');

  const inverted = keyword.text === 'times';
  const tuplet: TupletMusic = {
    kind: 'tuplet',
    numerator: inverted ? second : first,
    denominator: inverted ? first : second,
    body: { kind: 'sequential', items: [] }
  };

  if (!inverted) {
    const spanDuration = parseOptionalDuration(ctx);
    if (spanDuration) {
      tuplet.spanDuration = spanDuration;
    }
  }
  tuplet.body = parseMusic(ctx);
  return tuplet;
}

/** `\afterGrace [n[/d]] main grace` */
function parseAfterGrace(ctx: ParseContext): AfterGraceMusic {
  ctx.stream.next();
  let fraction: [number, number] | undefined;
  if (ctx.stream.peek().kind === 'unsigned') {
    const numerator = expectUnsigned(ctx, 'after-grace fraction');
    const denominator = acceptPunct(ctx, '/') ? expectUnsigned(ctx, 'after-grace fraction denominator') : 1;
    fraction = [numerator, denominator];
  }

  const main = parseMusic(ctx);
  const grace = parseMusic(ctx);
  const music: AfterGraceMusic = { kind: 'afterGrace', main, grace };
  if (fraction) {
    music.fraction = fraction;
  }
  return music;
}

/**
 * `\repeat type count music [\alternative { music... }]`.
 * Body and alternatives are read with `parseBody`, which note-entry modes replace.
 */
export function parseRepeat(ctx: ParseContext, parseBody: MusicParser = parseMusic): RepeatMusic {
  ctx.stream.next();
  const typeToken = ctx.stream.peek();
  const repeatType = typeToken.kind === 'symbol' ? REPEAT_TYPES.get(typeToken.text) : undefined;
  if (!repeatType) {
    return fail(typeToken, 'repeat type (volta, unfold, percent, tremolo, segno)');
  }
  ctx.stream.next();

  const count = expectUnsigned(ctx, 'repeat count');
  const body = parseBody(ctx);
  const repeat: RepeatMusic = { kind: 'repeat', repeatType, count, body };

  if (isKeyword(ctx.stream.peek(), 'alternative')) {
    ctx.stream.next();
    expectPunct(ctx, '{');
    const alternatives: Music[] = [];
    while (!isPunct(ctx.stream.peek(), '}')) {
      alternatives.push(parseBody(ctx));
    }
    ctx.stream.next();
    repeat.alternatives = alternatives;
  }
  return repeat;
}

function parseMarkLabel(ctx: ParseContext): MarkLabel {
  const token = ctx.stream.peek();
  switch (token.kind) {
    case 'escapedWord':
      if (token.text === 'default') {
        ctx.stream.next();
        return { kind: 'default' };
      }
      return fail(token, 'mark label');
    case 'keyword':
      if (token.text === 'markup') {
        return { kind: 'markup', markup: parseRawMarkup(ctx, 'markup') };
      }
      return fail(token, 'mark label');
    case 'unsigned':
      ctx.stream.next();
      return { kind: 'number', value: Number.parseInt(token.text, 10) };
    case 'string':
      ctx.stream.next();
      return { kind: 'string', value: token.text };
    case 'scheme':
      return { kind: 'scheme', text: parseScheme(ctx) };
    default:
      return fail(token, 'mark label');
  }
}

/** A string or `\markup` used as text. */
function parseTextValue(ctx: ParseContext, expected: string): TextValue {
  const token = ctx.stream.peek();
  if (token.kind === 'string') {
    ctx.stream.next();
    return { kind: 'string', value: token.text };
  }
  if (isKeyword(token, 'markup')) {
    return { kind: 'markup', markup: parseRawMarkup(ctx, 'markup') };
  }
  return fail(token, expected);
}

/** `\tempo ["text"|\markup ...] [duration = bpm[-bpm]]` */
function parseTempo(ctx: ParseContext): TempoMusic {
  ctx.stream.next();
  const tempo: TempoMusic = { kind: 'tempo' };

  const token = ctx.stream.peek();
  if (token.kind === 'string' || isKeyword(token, 'markup')) {
    tempo.text = parseTextValue(ctx, 'tempo text');
  }

  const duration = parseOptionalDuration(ctx);
  if (duration) {
    tempo.duration = duration;
    expectPunct(ctx, '=');
    const low = expectUnsigned(ctx, 'metronome value');
    tempo.bpm = acceptPunct(ctx, '-')
      ? { kind: 'range', low, high: expectUnsigned(ctx, 'metronome range end') }
      : { kind: 'single', value: low };
  }

  if (!tempo.text && !tempo.duration) {
    return fail(ctx.stream.peek(), 'tempo text or metronome mark');
  }
  return tempo;
}

/**
 * `\name arg...`; without arguments this is a plain identifier reference.
 * Braced arguments are read with `parseBody`, which lyric mode replaces.
 */
export function parseMusicFunction(ctx: ParseContext, parseBody: MusicParser = parseMusic): Music {
  const name = ctx.stream.next().text;
  const args: FunctionArgument[] = [];
  let arg = parseFunctionArgument(ctx, parseBody);
  while (arg) {
    args.push(arg);
    arg = parseFunctionArgument(ctx, parseBody);
  }
  return args.length === 0 ? { kind: 'identifier', name } : { kind: 'musicFunction', name, args };
}

function parseFunctionArgument(ctx: ParseContext, parseBody: MusicParser): FunctionArgument | undefined {
  const token = ctx.stream.peek();
  switch (token.kind) {
    case 'string':
      ctx.stream.next();
      return { kind: 'string', value: token.text };
    case 'unsigned':
    case 'real':
      ctx.stream.next();
      return { kind: 'number', value: Number(token.text) };
    case 'scheme':
      return { kind: 'scheme', text: parseScheme(ctx) };
    case 'escapedWord':
      if (token.text !== 'default') {
        return undefined;
      }
      ctx.stream.next();
      return { kind: 'default' };
    case 'punct':
      if (token.text === '{' || token.text === '<<') {
        return { kind: 'music', music: parseBody(ctx) };
      }
      return undefined;
    default:
      return undefined;
  }
}
