import type {
  Assignment,
  AssignmentValue,
  BassFigure,
  ChordModeEntry,
  ChordQualityItem,
  ChordStep,
  ContextModItem,
  Direction,
  Duration,
  FigureAlteration,
  FigureEvent,
  FigureModification,
  FunctionArgument,
  LeafEvent,
  MarkLabel,
  Markup,
  Music,
  PostEvent,
  PropertyOperation,
  PropertyPathSegment,
  PropertyValue,
  StepAlteration,
  TempoMusic,
  TextValue
} from '../core/ast.js';
import { MAX_NESTING_DEPTH, musicDepth } from '../core/music-children.js';
import { DUTCH_SPELLING, formatPitch, type PitchSpelling } from './spelling.js';
import { dottedName, formatNumber, lyricText, quote, word } from './text.js';

const DIRECTION_PREFIX: Record<Direction, string> = {
  up: '^',
  down: '_',
  neutral: '-'
};

const STEP_ALTERATION: Record<StepAlteration, string> = {
  natural: '',
  sharp: '+',
  flat: '-'
};

const FIGURE_ALTERATION: Record<FigureAlteration, string> = {
  natural: '',
  sharp: '+',
  doubleSharp: '++',
  flat: '-',
  doubleFlat: '--',
  forcedNatural: '!'
};

const FIGURE_MODIFICATION: Record<FigureModification, string> = {
  augmented: '\\+',
  noContinuation: '\\!',
  diminished: '/',
  augmentedSlash: '\\\\'
};

/** Render state shared by the music printers. */
export interface MusicWriter {
  spelling: PitchSpelling;
}

export const DEFAULT_MUSIC_WRITER: MusicWriter = { spelling: DUTCH_SPELLING };

function markup(keyword: 'markup' | 'markuplist', value: Markup): string {
  return `\\${keyword} ${value.raw}`;
}

function textValue(value: TextValue): string {
  return value.kind === 'string' ? quote(value.value) : markup('markup', value.markup);
}

/** Base, dots and `*n/m` factors; `/1` is left implicit. */
export function formatDuration(duration: Duration): string {
  let text = typeof duration.base === 'number' ? formatNumber(duration.base) : `\\${duration.base}`;
  text += '.'.repeat(duration.dots);
  for (const [numerator, denominator] of duration.multipliers) {
    text += denominator === 1 ? `*${numerator}` : `*${numerator}/${denominator}`;
  }
  return text;
}

/** One post-event in its written form, including any direction prefix. */
export function formatPostEvent(event: PostEvent): string {
  switch (event.kind) {
    case 'tie':
      return '~';
    case 'slurStart':
      return '(';
    case 'slurEnd':
      return ')';
    case 'phrasingSlurStart':
      return '\\(';
    case 'phrasingSlurEnd':
      return '\\)';
    case 'beamStart':
      return '[';
    case 'beamEnd':
      return ']';
    case 'dynamic':
      return `\\${event.name}`;
    case 'crescendo':
      return '\\<';
    case 'decrescendo':
      return '\\>';
    case 'hairpinEnd':
      return '\\!';
    case 'articulation':
      return DIRECTION_PREFIX[event.direction] + event.script;
    case 'fingering':
      return DIRECTION_PREFIX[event.direction] + formatNumber(event.digit);
    case 'namedArticulation':
      return `${DIRECTION_PREFIX[event.direction]}\\${event.name}`;
    case 'stringNumber':
      return `${DIRECTION_PREFIX[event.direction]}\\${formatNumber(event.number)}`;
    case 'textScript':
      return DIRECTION_PREFIX[event.direction] + textValue(event.text);
    case 'tremolo':
      return event.subdivision === 0 ? ':' : `:${formatNumber(event.subdivision)}`;
    case 'lyricHyphen':
      return ' --';
    case 'lyricExtender':
      return ' __';
    case 'tweak':
      return `-\\tweak ${formatPropertyPath(event.path)} ${formatPropertyValue(event.value)}`;
  }
}

/** True when the written form of `event` would absorb an adjoining post-event. */
function needsTrailingBlank(event: PostEvent): boolean {
  return event.kind === 'tweak' || (event.kind === 'textScript' && event.text.kind === 'markup');
}

/**
 * Post-events in stored order with no separators. Raw markup and tweak values
 * run to the next blank, so those are followed by one.
 */
export function formatPostEvents(events: readonly PostEvent[]): string {
  let text = '';
  events.forEach((event, index) => {
    text += formatPostEvent(event);
    if (needsTrailingBlank(event) && index < events.length - 1) {
      text += ' ';
    }
  });
  return text;
}

function leafSuffix(event: LeafEvent): string {
  return (event.duration ? formatDuration(event.duration) : '') + formatPostEvents(event.postEvents);
}

function formatLeaf(event: LeafEvent, writer: MusicWriter): string {
  switch (event.kind) {
    case 'note': {
      const head = formatPitch(event.pitch, writer.spelling);
      const duration = event.duration ? formatDuration(event.duration) : '';
      const rest = event.pitchedRest ? '\\rest' : '';
      return head + duration + rest + formatPostEvents(event.postEvents);
    }
    case 'rest':
      return `r${leafSuffix(event)}`;
    case 'skip':
      return `s${leafSuffix(event)}`;
    case 'multiMeasureRest':
      return `R${leafSuffix(event)}`;
    case 'chordRepetition':
      return `q${leafSuffix(event)}`;
    case 'chord': {
      const pitches = event.pitches.map((pitch) => formatPitch(pitch, writer.spelling)).join(' ');
      return `<${pitches}>${leafSuffix(event)}`;
    }
    case 'lyric':
      return lyricText(event.text) + leafSuffix(event);
    case 'chordModeEntry':
      return formatChordModeEntry(event, writer);
    case 'drumNote':
      return event.drumType + leafSuffix(event);
    case 'drumChord':
      return `<${event.drumTypes.join(' ')}>${leafSuffix(event)}`;
  }
}

function formatChordStep(step: ChordStep): string {
  return formatNumber(step.number) + STEP_ALTERATION[step.alteration];
}

function formatQualityItem(item: ChordQualityItem): string {
  return item.kind === 'modifier' ? item.name : formatChordStep(item);
}

/**
 * `c4:m7^5/e/+g`. Post-events are set off by a blank since a `-` or `+`
 * touching the last step reads as its alteration.
 */
function formatChordModeEntry(entry: ChordModeEntry, writer: MusicWriter): string {
  let text = formatPitch(entry.root, writer.spelling);
  if (entry.duration) {
    text += formatDuration(entry.duration);
  }
  if (entry.quality.length > 0) {
    text += `:${entry.quality.map(formatQualityItem).join('.')}`;
  }
  if (entry.removals.length > 0) {
    text += `^${entry.removals.map(formatChordStep).join('.')}`;
  }
  if (entry.inversion) {
    text += `/${formatPitch(entry.inversion, writer.spelling)}`;
  }
  if (entry.bass) {
    text += `/+${formatPitch(entry.bass, writer.spelling)}`;
  }
  const postEvents = formatPostEvents(entry.postEvents);
  return postEvents === '' ? text : `${text} ${postEvents}`;
}

/** `[6+\\]`, or `_` in place of the number. */
function formatBassFigure(figure: BassFigure): string {
  let text = figure.bracketStart ? '[' : '';
  text += figure.number === undefined ? '_' : formatNumber(figure.number);
  text += FIGURE_ALTERATION[figure.alteration];
  text += figure.modifications.map((modification) => FIGURE_MODIFICATION[modification]).join('');
  return figure.bracketStop ? `${text}]` : text;
}

function formatFigure(event: FigureEvent): string {
  const figures = event.figures.length === 0 ? '' : ` ${event.figures.map(formatBassFigure).join(' ')} `;
  const duration = event.duration ? formatDuration(event.duration) : '';
  return `\\<${figures}\\>${duration}`;
}

function container(open: string, close: string, items: readonly Music[], writer: MusicWriter): string {
  if (items.length === 0) {
    return `${open} ${close}`;
  }
  return `${open} ${items.map((item) => renderMusic(item, writer)).join(' ')} ${close}`;
}

function formatMarkLabel(label: MarkLabel): string {
  switch (label.kind) {
    case 'default':
      return '\\default';
    case 'number':
      return formatNumber(label.value);
    case 'string':
      return quote(label.value);
    case 'markup':
      return markup('markup', label.markup);
    case 'scheme':
      return `#${label.text}`;
  }
}

function formatTempo(tempo: TempoMusic): string {
  const parts = ['\\tempo'];
  if (tempo.text) {
    parts.push(textValue(tempo.text));
  }
  if (tempo.duration) {
    parts.push(formatDuration(tempo.duration), '=');
    if (tempo.bpm) {
      parts.push(
        tempo.bpm.kind === 'single'
          ? formatNumber(tempo.bpm.value)
          : `${formatNumber(tempo.bpm.low)}-${formatNumber(tempo.bpm.high)}`
      );
    }
  }
  return parts.join(' ');
}

function formatFunctionArgument(arg: FunctionArgument, writer: MusicWriter): string {
  switch (arg.kind) {
    case 'string':
      return quote(arg.value);
    case 'number':
      return formatNumber(arg.value);
    case 'scheme':
      return `#${arg.text}`;
    case 'default':
      return '\\default';
    case 'music':
      return renderMusic(arg.music, writer);
  }
}

function formatPathSegment(segment: PropertyPathSegment): string {
  return segment.kind === 'name' ? word(segment.name) : `#${segment.text}`;
}

/** `Staff.TimeSignature.color`, with quoted Scheme segments set off by a blank. */
function formatPropertyPath(path: readonly PropertyPathSegment[]): string {
  let text = '';
  path.forEach((segment, index) => {
    const previous = path[index - 1];
    if (previous !== undefined) {
      text += segment.kind === 'name' && previous.kind === 'name' ? '.' : ' ';
    }
    text += formatPathSegment(segment);
  });
  return text;
}

function formatPropertyValue(value: PropertyValue): string {
  switch (value.kind) {
    case 'scheme':
      return `#${value.text}`;
    case 'string':
      return quote(value.value);
    case 'number':
      return formatNumber(value.value);
    case 'identifier':
      return `\\${value.name}`;
    case 'markup':
      return markup('markup', value.markup);
  }
}

export function formatPropertyOperation(operation: PropertyOperation): string {
  const path = formatPropertyPath(operation.path);
  switch (operation.kind) {
    case 'override':
    case 'set':
      return `\\${operation.kind} ${path} = ${formatPropertyValue(operation.value)}`;
    case 'revert':
    case 'unset':
      return `\\${operation.kind} ${path}`;
  }
}

/** One `\with` or `\context` block entry. */
export function formatContextModItem(item: ContextModItem, writer: MusicWriter): string {
  switch (item.kind) {
    case 'contextRef':
      return `\\${item.name}`;
    case 'defaultChild':
      return `\\defaultchild ${quote(item.name)}`;
    case 'consists':
    case 'remove':
    case 'accepts':
    case 'denies':
    case 'alias':
    case 'name':
      return `\\${item.kind} ${quote(item.name)}`;
    case 'description':
      return `\\description ${quote(item.text)}`;
    case 'assignment':
      return formatAssignment(item, writer);
    default:
      return formatPropertyOperation(item);
  }
}

export function formatAssignmentValue(value: AssignmentValue, writer: MusicWriter): string {
  switch (value.kind) {
    case 'string':
      return quote(value.value);
    case 'number':
      return value.unit === undefined ? formatNumber(value.value) : `${formatNumber(value.value)}\\${value.unit}`;
    case 'music':
      return formatMusic(value.music, writer);
    case 'identifier':
      return `\\${value.name}`;
    case 'markup':
    case 'markuplist':
      return markup(value.kind, value.markup);
    case 'scheme':
      return `#${value.text}`;
  }
}

/** `name = value` */
export function formatAssignment(assignment: Assignment, writer: MusicWriter): string {
  return `${dottedName(assignment.name)} = ${formatAssignmentValue(assignment.value, writer)}`;
}

/**
 * Thrown when an AST cannot be rendered as text the parser would read back,
 * such as music nested deeper than `MAX_NESTING_DEPTH`.
 */
export class LilyPondSerializeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LilyPondSerializeError';
  }
}

/** Render one music expression on a single line. */
export function formatMusic(music: Music, writer: MusicWriter = DEFAULT_MUSIC_WRITER): string {
  const depth = musicDepth(music);
  if (depth > MAX_NESTING_DEPTH) {
    throw new LilyPondSerializeError(`music nested ${depth} levels deep; at most ${MAX_NESTING_DEPTH} can be parsed back`);
  }
  return renderMusic(music, writer);
}

function renderMusic(music: Music, writer: MusicWriter): string {
  switch (music.kind) {
    case 'note':
    case 'rest':
    case 'skip':
    case 'multiMeasureRest':
    case 'chord':
    case 'chordRepetition':
    case 'lyric':
    case 'chordModeEntry':
    case 'drumNote':
    case 'drumChord':
      return formatLeaf(music, writer);
    case 'sequential':
      return container('{', '}', music.items, writer);
    case 'simultaneous':
      return container('<<', '>>', music.items, writer);
    case 'voiceSeparator':
      return '\\\\';
    case 'relative':
      return music.pitch
        ? `\\relative ${formatPitch(music.pitch, writer.spelling)} ${renderMusic(music.body, writer)}`
        : `\\relative ${renderMusic(music.body, writer)}`;
    case 'fixed':
      return `\\fixed ${formatPitch(music.pitch, writer.spelling)} ${renderMusic(music.body, writer)}`;
    case 'transpose':
      return `\\transpose ${formatPitch(music.from, writer.spelling)} ${formatPitch(music.to, writer.spelling)} ${renderMusic(music.body, writer)}`;
    case 'contextedMusic': {
      const parts = [`\\${music.keyword}`, word(music.contextType)];
      if (music.name !== undefined) {
        parts.push('=', quote(music.name));
      }
      if (music.withBlock) {
        const items = music.withBlock.map((item) => formatContextModItem(item, writer));
        parts.push(items.length === 0 ? '\\with { }' : `\\with { ${items.join(' ')} }`);
      }
      parts.push(renderMusic(music.body, writer));
      return parts.join(' ');
    }
    case 'contextChange':
      return `\\change ${word(music.contextType)} = ${quote(music.name)}`;
    case 'clef':
      return `\\clef ${quote(music.name)}`;
    case 'keySignature':
      return `\\key ${formatPitch(music.pitch, writer.spelling)} \\${music.mode}`;
    case 'timeSignature':
      return `\\time ${music.numerators.map(formatNumber).join('+')}/${formatNumber(music.denominator)}`;
    case 'partial':
      return `\\partial ${formatDuration(music.duration)}`;
    case 'tuplet': {
      const fraction = `${formatNumber(music.numerator)}/${formatNumber(music.denominator)}`;
      const span = music.spanDuration ? ` ${formatDuration(music.spanDuration)}` : '';
      return `\\tuplet ${fraction}${span} ${renderMusic(music.body, writer)}`;
    }
    case 'grace':
    case 'acciaccatura':
    case 'appoggiatura':
      return `\\${music.kind} ${renderMusic(music.body, writer)}`;
    case 'afterGrace': {
      const fraction = music.fraction ? ` ${formatNumber(music.fraction[0])}/${formatNumber(music.fraction[1])}` : '';
      return `\\afterGrace${fraction} ${renderMusic(music.main, writer)} ${renderMusic(music.grace, writer)}`;
    }
    case 'repeat': {
      const head = `\\repeat ${music.repeatType} ${formatNumber(music.count)} ${renderMusic(music.body, writer)}`;
      if (!music.alternatives) {
        return head;
      }
      return `${head} ${container('\\alternative {', '}', music.alternatives, writer)}`;
    }
    case 'barCheck':
      return '|';
    case 'barLine':
      return `\\bar ${quote(music.barType)}`;
    case 'lyricMode':
      return `\\lyricmode ${renderMusic(music.body, writer)}`;
    case 'chordMode':
      return `\\chordmode ${renderMusic(music.body, writer)}`;
    case 'drumMode':
      return `\\drummode ${renderMusic(music.body, writer)}`;
    case 'figureMode':
      return `\\figuremode ${renderMusic(music.body, writer)}`;
    case 'figure':
      return formatFigure(music);
    case 'tweak':
      return `\\tweak ${formatPropertyPath(music.path)} ${formatPropertyValue(music.value)} ${renderMusic(music.body, writer)}`;
    case 'lyricsTo':
      return `\\lyricsto ${quote(music.voiceId)} ${renderMusic(music.body, writer)}`;
    case 'addLyrics':
      return [renderMusic(music.music, writer), ...music.lyrics.map((lyrics) => `\\addlyrics ${renderMusic(lyrics, writer)}`)].join(' ');
    case 'tempo':
      return formatTempo(music);
    case 'mark':
      return `\\mark ${formatMarkLabel(music.label)}`;
    case 'textMark':
      return `\\textMark ${textValue(music.text)}`;
    case 'autoBeamOn':
    case 'autoBeamOff':
      return `\\${music.kind}`;
    case 'override':
    case 'revert':
    case 'set':
    case 'unset':
      return formatPropertyOperation(music);
    case 'once':
      return `\\once ${renderMusic(music.body, writer)}`;
    case 'identifier':
      return `\\${music.name}`;
    case 'musicFunction':
      return [`\\${music.name}`, ...music.args.map((arg) => formatFunctionArgument(arg, writer))].join(' ');
    case 'scheme':
      return `#${music.text}`;
    case 'markup':
      return markup('markup', music.markup);
  }
}
