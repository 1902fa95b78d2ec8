import type {
  BassFigure,
  ChordModeEntry,
  ChordModifier,
  ChordQualityItem,
  ChordStep,
  DrumChordEvent,
  DrumNoteEvent,
  FigureAlteration,
  FigureEvent,
  FigureModification,
  Music,
  RestEvent,
  SkipEvent,
  StepAlteration
} from '../core/ast.js';
import { NOTATION_NAMES } from '../core/notation-names.js';
import type { Token } from '../lexer/tokens.js';
import { nested, type ParseContext } from './parse-context.js';
import { parseMusic, parseRepeat, type MusicParser } from './parse-music.js';
import { isRestLikeSymbol, parseOptionalDuration, parsePitch, parsePostEvents, parseRestLikeEvent } from './parse-note-events.js';
import { parseWithBlocks } from './parse-properties.js';
import { acceptPunct, expectPunct, fail, isKeyword, isPunct, isWordToken } from './token-utils.js';

type ModeKind = 'chordMode' | 'drumMode' | 'figureMode';

interface NoteEntryMode {
  kind: ModeKind;
  /** Context created by the `\chords`-style shorthand. */
  contextType: string;
  parseElement: MusicParser;
}

const CHORD_MODIFIERS: ReadonlySet<string> = new Set<ChordModifier>(['m', 'min', 'aug', 'dim', 'maj', 'sus']);

function isChordModifier(name: string): name is ChordModifier {
  return CHORD_MODIFIERS.has(name);
}

const FIGURE_MODIFICATIONS: ReadonlyMap<string, FigureModification> = new Map([
  ['\\+', 'augmented'],
  ['\\!', 'noContinuation'],
  ['/', 'diminished'],
  ['\\\\', 'augmentedSlash']
]);

const CHORD_MODE: NoteEntryMode = {
  kind: 'chordMode',
  contextType: 'ChordNames',
  parseElement: (ctx) => nested(ctx, () => parseChordModeElement(ctx))
};

const DRUM_MODE: NoteEntryMode = {
  kind: 'drumMode',
  contextType: 'DrumStaff',
  parseElement: (ctx) => nested(ctx, () => parseDrumElement(ctx))
};

const FIGURE_MODE: NoteEntryMode = {
  kind: 'figureMode',
  contextType: 'FiguredBass',
  parseElement: (ctx) => nested(ctx, () => parseFigureElement(ctx))
};

const MODE_KEYWORDS: ReadonlyMap<string, { mode: NoteEntryMode; shorthand: boolean }> = new Map([
  ['chordmode', { mode: CHORD_MODE, shorthand: false }],
  ['chords', { mode: CHORD_MODE, shorthand: true }],
  ['drummode', { mode: DRUM_MODE, shorthand: false }],
  ['drums', { mode: DRUM_MODE, shorthand: true }],
  ['figuremode', { mode: FIGURE_MODE, shorthand: false }],
  ['figures', { mode: FIGURE_MODE, shorthand: true }]
]);

/**
 * `\chordmode`, `\drummode` or `\figuremode` and a body, or one of the
 * `\chords`, `\drums`, `\figures` shorthands, which read as
 * `\new ChordNames \chordmode ...` and may carry `\with` blocks.
 */
export function parseModeMusic(ctx: ParseContext): Music {
  const keyword = ctx.stream.next();
  const entry = MODE_KEYWORDS.get(keyword.text);
  if (!entry) {
    return fail(keyword, 'note entry mode');
  }

  const { mode, shorthand } = entry;
  if (!shorthand) {
    return { kind: mode.kind, body: parseModeBody(ctx, mode) };
  }

  const withBlock = parseWithBlocks(ctx);
  const body: Music = { kind: mode.kind, body: parseModeBody(ctx, mode) };
  return withBlock
    ? { kind: 'contextedMusic', keyword: 'new', contextType: mode.contextType, withBlock, body }
    : { kind: 'contextedMusic', keyword: 'new', contextType: mode.contextType, body };
}

/** A braced element list or an identifier. */
function parseModeBody(ctx: ParseContext, mode: NoteEntryMode): Music {
  return nested(ctx, () => {
    const token = ctx.stream.peek();
    if (token.kind === 'escapedWord') {
      ctx.stream.next();
      return { kind: 'identifier', name: token.text };
    }
    if (!isPunct(token, '{')) {
      return fail(token, `${mode.kind} body`);
    }
    ctx.stream.next();
    return { kind: 'sequential', items: parseElements(ctx, mode.parseElement, '}') };
  });
}

/** Elements up to and including `close`; `\\` separates voices inside `<< >>`. */
function parseElements(ctx: ParseContext, parseElement: MusicParser, close: '}' | '>>'): Music[] {
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
    items.push(parseElement(ctx));
  }
}

/**
 * Grouping, bar checks, identifiers and keyword music shared by the chord and
 * drum modes. Keyword music other than `\repeat` is read as ordinary music.
 */
function parseCommonElement(ctx: ParseContext, token: Token, parseElement: MusicParser): Music | undefined {
  if (isPunct(token, '{')) {
    ctx.stream.next();
    return { kind: 'sequential', items: parseElements(ctx, parseElement, '}') };
  }
  if (isPunct(token, '<<')) {
    ctx.stream.next();
    return { kind: 'simultaneous', items: parseElements(ctx, parseElement, '>>') };
  }
  if (isPunct(token, '|')) {
    ctx.stream.next();
    return { kind: 'barCheck' };
  }
  if (token.kind === 'escapedWord') {
    ctx.stream.next();
    return { kind: 'identifier', name: token.text };
  }
  if (isKeyword(token, 'repeat')) {
    return parseRepeat(ctx, parseElement);
  }
  if (token.kind === 'keyword') {
    return parseMusic(ctx);
  }
  return undefined;
}

function parseChordModeElement(ctx: ParseContext): Music {
  const token = ctx.stream.peek();
  if (token.kind === 'noteName') {
    return parseChordModeEntry(ctx);
  }
  if (isRestLikeSymbol(token)) {
    return parseRestLikeEvent(ctx);
  }
  return parseCommonElement(ctx, token, CHORD_MODE.parseElement) ?? fail(token, 'chord, rest or skip');
}

/**
 * `root[dur]` followed by `:quality`, `^removals`, `/inversion` and `/+bass`
 * in any order. A `^` only starts removals when it touches the preceding token
 * and a step number follows, so `c4 ^1` keeps its fingering.
 */
function parseChordModeEntry(ctx: ParseContext): ChordModeEntry {
  const root = parsePitch(ctx, 'chord root');
  const entry: ChordModeEntry = { kind: 'chordModeEntry', root, quality: [], removals: [], postEvents: [] };
  const duration = parseOptionalDuration(ctx);
  if (duration) {
    entry.duration = duration;
  }

  while (true) {
    const token = ctx.stream.peek();
    if (isPunct(token, ':')) {
      ctx.stream.next();
      entry.quality.push(...parseQualityItems(ctx));
    } else if (isPunct(token, '^') && touchesPrevious(ctx, token) && isStepToken(ctx.stream.peek(1))) {
      ctx.stream.next();
      entry.removals.push(...parseRemovals(ctx));
    } else if (isPunct(token, '/')) {
      ctx.stream.next();
      if (acceptPunct(ctx, '+')) {
        entry.bass = parsePitch(ctx, 'bass pitch');
      } else {
        entry.inversion = parsePitch(ctx, 'inversion pitch');
      }
    } else {
      break;
    }
  }

  entry.postEvents = parsePostEvents(ctx);
  return entry;
}

/** True when nothing separates `token` from the token consumed before it. */
function touchesPrevious(ctx: ParseContext, token: Token): boolean {
  const before = ctx.source.charAt(token.span.start - 1);
  return before !== '' && before !== ' ' && before !== '\t' && before !== '\n' && before !== '\r';
}

function isStepToken(token: Token): boolean {
  return token.kind === 'unsigned' || token.kind === 'real';
}

function isQualityStart(token: Token): boolean {
  return isStepToken(token) || (isWordToken(token) && isChordModifier(token.text));
}

/**
 * Modifiers and step numbers after `:`. Items may run together (`m7`) or be
 * joined with `.`; a number lexed as a decimal (`7.9`) is split into steps.
 */
function parseQualityItems(ctx: ParseContext): ChordQualityItem[] {
  const items: ChordQualityItem[] = [];
  while (true) {
    if (items.length > 0 && isPunct(ctx.stream.peek(), '.') && isQualityStart(ctx.stream.peek(1))) {
      ctx.stream.next();
    }

    const token = ctx.stream.peek();
    if (isWordToken(token) && isChordModifier(token.text)) {
      ctx.stream.next();
      items.push({ kind: 'modifier', name: token.text });
    } else if (isStepToken(token)) {
      items.push(...parseSteps(ctx).map((step): ChordQualityItem => ({ kind: 'step', ...step })));
    } else {
      return items;
    }
  }
}

/** Step numbers after `^`, joined with `.`. */
function parseRemovals(ctx: ParseContext): ChordStep[] {
  const removals = parseSteps(ctx);
  while (isPunct(ctx.stream.peek(), '.') && isStepToken(ctx.stream.peek(1))) {
    ctx.stream.next();
    removals.push(...parseSteps(ctx));
  }
  return removals;
}

/**
 * One step number token with its alteration. A decimal such as `7.9` yields
 * one step per part and the alteration applies to the last.
 */
function parseSteps(ctx: ParseContext): ChordStep[] {
  const token = ctx.stream.next();
  const steps = token.text.split('.').map((part): ChordStep => ({
    number: Number.parseInt(part, 10),
    alteration: 'natural'
  }));
  const last = steps[steps.length - 1];
  if (last) {
    last.alteration = parseStepAlteration(ctx);
  }
  return steps;
}

/** `+` or `-` written directly after the step number. */
function parseStepAlteration(ctx: ParseContext): StepAlteration {
  const token = ctx.stream.peek();
  if (!touchesPrevious(ctx, token)) {
    return 'natural';
  }
  if (isPunct(token, '+')) {
    ctx.stream.next();
    return 'sharp';
  }
  if (isPunct(token, '-')) {
    ctx.stream.next();
    return 'flat';
  }
  return 'natural';
}

function parseDrumElement(ctx: ParseContext): Music {
  const token = ctx.stream.peek();
  if (isWordToken(token) && NOTATION_NAMES.drumPitches.has(token.text)) {
    return parseDrumNote(ctx);
  }
  if (isRestLikeSymbol(token)) {
    return parseRestLikeEvent(ctx);
  }
  if (isPunct(token, '<')) {
    return parseDrumChord(ctx);
  }
  return parseCommonElement(ctx, token, DRUM_MODE.parseElement) ?? fail(token, 'drum pitch, rest or skip');
}

function parseDrumNote(ctx: ParseContext): DrumNoteEvent {
  const drumType = ctx.stream.next().text;
  const note: DrumNoteEvent = { kind: 'drumNote', drumType, postEvents: [] };
  const duration = parseOptionalDuration(ctx);
  if (duration) {
    note.duration = duration;
  }
  note.postEvents = parsePostEvents(ctx);
  return note;
}

/** `<bd hh>` with a shared duration and post-events. */
function parseDrumChord(ctx: ParseContext): DrumChordEvent {
  expectPunct(ctx, '<');
  const drumTypes: string[] = [];
  while (!isPunct(ctx.stream.peek(), '>')) {
    const token = ctx.stream.peek();
    if (!isWordToken(token) || !NOTATION_NAMES.drumPitches.has(token.text)) {
      return fail(token, "drum pitch or '>'");
    }
    ctx.stream.next();
    drumTypes.push(token.text);
  }
  ctx.stream.next();

  const chord: DrumChordEvent = { kind: 'drumChord', drumTypes, postEvents: [] };
  const duration = parseOptionalDuration(ctx);
  if (duration) {
    chord.duration = duration;
  }
  chord.postEvents = parsePostEvents(ctx);
  return chord;
}

/** Figure groups, rests, skips, bar checks and identifiers; nothing carries post-events. */
function parseFigureElement(ctx: ParseContext): Music {
  const token = ctx.stream.peek();
  if (isPunct(token, '\\<') || isPunct(token, '<')) {
    return parseFigureEvent(ctx);
  }
  if (token.kind === 'symbol' && (token.text === 'r' || token.text === 's')) {
    ctx.stream.next();
    const event: RestEvent | SkipEvent = token.text === 'r' ? { kind: 'rest', postEvents: [] } : { kind: 'skip', postEvents: [] };
    const duration = parseOptionalDuration(ctx);
    if (duration) {
      event.duration = duration;
    }
    return event;
  }
  if (isPunct(token, '|')) {
    ctx.stream.next();
    return { kind: 'barCheck' };
  }
  if (token.kind === 'escapedWord') {
    ctx.stream.next();
    return { kind: 'identifier', name: token.text };
  }
  return fail(token, 'figure group, rest or skip');
}

/** `\<6 4+\>4`; plain `<` and `>` are accepted as delimiters too. */
function parseFigureEvent(ctx: ParseContext): FigureEvent {
  const close = ctx.stream.next().text === '<' ? '>' : '\\>';
  const figures: BassFigure[] = [];
  while (!isPunct(ctx.stream.peek(), close)) {
    figures.push(parseBassFigure(ctx, close));
  }
  ctx.stream.next();

  const event: FigureEvent = { kind: 'figure', figures };
  const duration = parseOptionalDuration(ctx);
  if (duration) {
    event.duration = duration;
  }
  return event;
}

/** `[`? number or `_`, alteration, modifications, `]`? */
function parseBassFigure(ctx: ParseContext, close: string): BassFigure {
  const bracketStart = acceptPunct(ctx, '[');

  const token = ctx.stream.peek();
  let number: number | undefined;
  if (token.kind === 'unsigned') {
    number = Number.parseInt(token.text, 10);
  } else if (!isPunct(token, '_')) {
    return fail(token, `bass figure number, '_' or '${close}'`);
  }
  ctx.stream.next();

  const alteration = parseFigureAlteration(ctx);
  const modifications: FigureModification[] = [];
  let modification = FIGURE_MODIFICATIONS.get(punctText(ctx.stream.peek()));
  while (modification) {
    ctx.stream.next();
    modifications.push(modification);
    modification = FIGURE_MODIFICATIONS.get(punctText(ctx.stream.peek()));
  }

  const figure: BassFigure = { alteration, modifications, bracketStart, bracketStop: acceptPunct(ctx, ']') };
  if (number !== undefined) {
    figure.number = number;
  }
  return figure;
}

function punctText(token: Token): string {
  return token.kind === 'punct' ? token.text : '';
}

function parseFigureAlteration(ctx: ParseContext): FigureAlteration {
  if (acceptPunct(ctx, '+')) {
    return acceptPunct(ctx, '+') ? 'doubleSharp' : 'sharp';
  }
  if (acceptPunct(ctx, '-')) {
    return acceptPunct(ctx, '-') ? 'doubleFlat' : 'flat';
  }
  if (acceptPunct(ctx, '!')) {
    return 'forcedNatural';
  }
  return 'natural';
}
