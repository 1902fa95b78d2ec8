import type {
  ChordEvent,
  Direction,
  Duration,
  DurationBase,
  LeafEvent,
  NoteEvent,
  Pitch,
  PostEvent,
  ScriptAbbreviation
} from '../core/ast.js';
import { NOTATION_NAMES } from '../core/notation-names.js';
import { parseNoteName } from '../core/pitch.js';
import type { Token } from '../lexer/tokens.js';
import { addWarning, type ParseContext } from './parse-context.js';
import { parseTweak } from './parse-properties.js';
import { parseRawMarkup } from './parse-raw.js';
import { acceptPunct, expectPunct, expectUnsigned, fail, isEscapedWord, isKeyword, isPunct } from './token-utils.js';

const LONG_DURATIONS: ReadonlySet<string> = new Set(['breve', 'longa', 'maxima']);

const SCRIPT_ABBREVIATIONS: ReadonlyMap<string, ScriptAbbreviation> = new Map([
  ['.', '.'],
  ['-', '-'],
  ['>', '>'],
  ['^', '^'],
  ['+', '+'],
  ['!', '!'],
  ['_', '_']
]);

const DIRECTION_PREFIXES: ReadonlyMap<string, Direction> = new Map([
  ['-', 'neutral'],
  ['^', 'up'],
  ['_', 'down']
]);

/** Punctuation post-events that take no argument. */
const SIMPLE_POST_EVENTS: ReadonlyMap<string, PostEvent> = new Map<string, PostEvent>([
  ['~', { kind: 'tie' }],
  ['(', { kind: 'slurStart' }],
  [')', { kind: 'slurEnd' }],
  ['\\(', { kind: 'phrasingSlurStart' }],
  ['\\)', { kind: 'phrasingSlurEnd' }],
  ['[', { kind: 'beamStart' }],
  [']', { kind: 'beamEnd' }],
  ['\\<', { kind: 'crescendo' }],
  ['\\>', { kind: 'decrescendo' }],
  ['\\!', { kind: 'hairpinEnd' }]
]);

/** Count a run of `'` and `,` marks; mixing both directions is accepted with a warning. */
function parseOctaveMarks(ctx: ParseContext): number {
  const start = ctx.stream.peek().span.start;
  let up = 0;
  let down = 0;

  while (true) {
    const token = ctx.stream.peek();
    if (isPunct(token, "'")) {
      up += 1;
    } else if (isPunct(token, ',')) {
      down += 1;
    } else {
      break;
    }
    ctx.stream.next();
  }

  if (up > 0 && down > 0) {
    addWarning(ctx, 'mixedOctaveMarks', start, `mixed octave marks (${up} up, ${down} down)`);
  }
  return up - down;
}

/** Parse a note name with octave marks, `!`, `?` and an optional `=` octave check. */
export function parsePitch(ctx: ParseContext, expected = 'pitch'): Pitch {
  const token = ctx.stream.peek();
  const parts = token.kind === 'noteName' ? parseNoteName(token.text) : undefined;
  if (!parts) {
    fail(token, expected);
  }
  ctx.stream.next();

  const pitch: Pitch = {
    step: parts.step,
    alter: parts.alter,
    octave: parseOctaveMarks(ctx),
    forceAccidental: false,
    cautionary: false
  };

  if (acceptPunct(ctx, '!')) {
    pitch.forceAccidental = true;
  }
  if (acceptPunct(ctx, '?')) {
    pitch.cautionary = true;
  }
  if (acceptPunct(ctx, '=')) {
    pitch.octaveCheck = parseOctaveMarks(ctx);
  }
  return pitch;
}

function isDurationStart(token: Token): boolean {
  return token.kind === 'unsigned' || (token.kind === 'keyword' && LONG_DURATIONS.has(token.text));
}

function readDurationBase(token: Token): DurationBase {
  switch (token.text) {
    case 'breve':
    case 'longa':
    case 'maxima':
      return token.text;
    default:
      return Number.parseInt(token.text, 10);
  }
}

/** Parse `base dots *n/m...` when a duration starts here. */
export function parseOptionalDuration(ctx: ParseContext): Duration | undefined {
  const token = ctx.stream.peek();
  if (!isDurationStart(token)) {
    return undefined;
  }
  ctx.stream.next();

  const duration: Duration = { base: readDurationBase(token), dots: 0, multipliers: [] };
  while (acceptPunct(ctx, '.')) {
    duration.dots += 1;
  }

  while (acceptPunct(ctx, '*')) {
    const numerator = expectUnsigned(ctx, 'duration multiplier');
    // A `/` not followed by a number belongs to a chord-mode inversion (`c4*2/e`).
    const hasDenominator = isPunct(ctx.stream.peek(), '/') && ctx.stream.peek(1).kind === 'unsigned';
    const denominator = hasDenominator ? parseDenominator(ctx) : 1;
    duration.multipliers.push([numerator, denominator]);
  }
  return duration;
}

function parseDenominator(ctx: ParseContext): number {
  expectPunct(ctx, '/');
  return expectUnsigned(ctx, 'multiplier denominator');
}

/** Parse a duration that the grammar requires. */
export function parseDuration(ctx: ParseContext, expected = 'duration'): Duration {
  const duration = parseOptionalDuration(ctx);
  if (!duration) {
    return fail(ctx.stream.peek(), expected);
  }
  return duration;
}

/** Note head plus suffixes: pitch, duration, stray octave marks, `\rest`, post-events. */
export function parseNoteEvent(ctx: ParseContext): NoteEvent {
  const pitch = parsePitch(ctx, 'note name');
  const duration = parseOptionalDuration(ctx);

  if (duration) {
    const token = ctx.stream.peek();
    if (isPunct(token, "'") || isPunct(token, ',')) {
      const extra = parseOctaveMarks(ctx);
      addWarning(ctx, 'octaveAfterDuration', token.span.start, 'octave marks written after the duration');
      pitch.octave += extra;
    }
  }

  let pitchedRest = false;
  if (isEscapedWord(ctx.stream.peek(), 'rest')) {
    ctx.stream.next();
    pitchedRest = true;
  }

  const note: NoteEvent = { kind: 'note', pitch, pitchedRest, postEvents: [] };
  if (duration) {
    note.duration = duration;
  }
  note.postEvents = parsePostEvents(ctx);
  return note;
}

/** Rest-like heads written as plain symbols. */
export function isRestLikeSymbol(token: Token): boolean {
  return token.kind === 'symbol' && (token.text === 'r' || token.text === 's' || token.text === 'R' || token.text === 'q');
}

/** Parse `r`, `s`, `R` or `q` followed by its duration and post-events. */
export function parseRestLikeEvent(ctx: ParseContext): LeafEvent {
  const token = ctx.stream.next();
  const duration = parseOptionalDuration(ctx);
  const postEvents = parsePostEvents(ctx);

  let event: LeafEvent;
  switch (token.text) {
    case 'r':
      event = { kind: 'rest', postEvents };
      break;
    case 's':
      event = { kind: 'skip', postEvents };
      break;
    case 'R':
      event = { kind: 'multiMeasureRest', postEvents };
      break;
    case 'q':
      event = { kind: 'chordRepetition', postEvents };
      break;
    default:
      return fail(token, 'rest, skip or chord repetition');
  }

  if (duration) {
    event.duration = duration;
  }
  return event;
}

/** `< pitch... >` with a shared duration and post-event list. */
export function parseChord(ctx: ParseContext): ChordEvent {
  expectPunct(ctx, '<');
  const pitches: Pitch[] = [];
  while (!isPunct(ctx.stream.peek(), '>')) {
    pitches.push(parsePitch(ctx, "chord pitch or '>'"));
  }
  ctx.stream.next();

  const chord: ChordEvent = { kind: 'chord', pitches, postEvents: [] };
  const duration = parseOptionalDuration(ctx);
  if (duration) {
    chord.duration = duration;
  }
  chord.postEvents = parsePostEvents(ctx);
  return chord;
}

/** Consume post-events in source order until a token that cannot start one. */
export function parsePostEvents(ctx: ParseContext): PostEvent[] {
  const events: PostEvent[] = [];
  let event = parsePostEvent(ctx);
  while (event) {
    events.push(event);
    event = parsePostEvent(ctx);
  }
  return events;
}

function parsePostEvent(ctx: ParseContext): PostEvent | undefined {
  const token = ctx.stream.peek();

  if (isKeyword(token, 'tweak')) {
    return parseAttachedTweak(ctx);
  }

  if (token.kind === 'punct') {
    const simple = SIMPLE_POST_EVENTS.get(token.text);
    if (simple) {
      ctx.stream.next();
      return { ...simple };
    }

    if (token.text === ':') {
      ctx.stream.next();
      const value = ctx.stream.peek();
      if (value.kind !== 'unsigned') {
        return { kind: 'tremolo', subdivision: 0 };
      }
      ctx.stream.next();
      return { kind: 'tremolo', subdivision: Number.parseInt(value.text, 10) };
    }

    const direction = DIRECTION_PREFIXES.get(token.text);
    return direction ? parseDirectedPostEvent(ctx, direction) : undefined;
  }

  if (token.kind === 'escapedWord') {
    if (NOTATION_NAMES.dynamics.has(token.text)) {
      ctx.stream.next();
      return { kind: 'dynamic', name: token.text };
    }
    if (NOTATION_NAMES.ornaments.has(token.text)) {
      ctx.stream.next();
      return { kind: 'namedArticulation', direction: 'neutral', name: token.text };
    }
    return undefined;
  }

  if (token.kind === 'escapedUnsigned') {
    ctx.stream.next();
    return { kind: 'stringNumber', direction: 'neutral', number: Number.parseInt(token.text, 10) };
  }

  return undefined;
}

/**
 * A bare `\tweak` after an event is a post-event only when another post-event
 * follows it. Otherwise it prefixes the next music expression, so the stream
 * rewinds to the `\tweak` and the post-event list ends.
 */
function parseAttachedTweak(ctx: ParseContext): PostEvent | undefined {
  const start = ctx.stream.peek().span.start;
  const tweak = parseTweak(ctx);
  if (startsPostEvent(ctx.stream.peek())) {
    return { kind: 'tweak', ...tweak };
  }
  ctx.stream.reset(start);
  return undefined;
}

function startsPostEvent(token: Token): boolean {
  switch (token.kind) {
    case 'punct':
      return SIMPLE_POST_EVENTS.has(token.text) || DIRECTION_PREFIXES.has(token.text) || token.text === ':';
    case 'escapedWord':
      return NOTATION_NAMES.dynamics.has(token.text) || NOTATION_NAMES.ornaments.has(token.text);
    case 'escapedUnsigned':
      return true;
    default:
      return false;
  }
}

/**
 * Parse what follows a `-`, `^` or `_` prefix. The prefix is only consumed
 * when the second token completes a post-event.
 */
function parseDirectedPostEvent(ctx: ParseContext, direction: Direction): PostEvent | undefined {
  const target = ctx.stream.peek(1);

  if (target.kind === 'punct') {
    const script = SCRIPT_ABBREVIATIONS.get(target.text);
    if (!script) {
      return undefined;
    }
    ctx.stream.next();
    ctx.stream.next();
    return { kind: 'articulation', direction, script };
  }

  switch (target.kind) {
    case 'unsigned':
      ctx.stream.next();
      ctx.stream.next();
      return { kind: 'fingering', direction, digit: Number.parseInt(target.text, 10) };
    case 'escapedWord':
      ctx.stream.next();
      ctx.stream.next();
      return { kind: 'namedArticulation', direction, name: target.text };
    case 'escapedUnsigned':
      ctx.stream.next();
      ctx.stream.next();
      return { kind: 'stringNumber', direction, number: Number.parseInt(target.text, 10) };
    case 'string':
      ctx.stream.next();
      ctx.stream.next();
      return { kind: 'textScript', direction, text: { kind: 'string', value: target.text } };
    case 'keyword':
      if (target.text === 'tweak' && direction === 'neutral') {
        ctx.stream.next();
        return { kind: 'tweak', ...parseTweak(ctx) };
      }
      if (target.text !== 'markup') {
        return undefined;
      }
      ctx.stream.next();
      return { kind: 'textScript', direction, text: { kind: 'markup', markup: parseRawMarkup(ctx, 'markup') } };
    default:
      return undefined;
  }
}
