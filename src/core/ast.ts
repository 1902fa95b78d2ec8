/** Root of a parsed LilyPond source file. */
export interface LilyPondFile {
  version?: string;
  items: ToplevelExpression[];
}

/** Anything that may appear at the top level of a file, in source order. */
export type ToplevelExpression =
  | ScoreBlock
  | BookBlock
  | BookPartBlock
  | HeaderBlock
  | PaperBlock
  | LayoutBlock
  | MidiBlock
  | Assignment
  | MusicItem
  | MarkupItem
  | MarkupListItem
  | SchemeItem;

/** `\score { ... }` */
export interface ScoreBlock {
  kind: 'score';
  items: ScoreItem[];
}

export type ScoreItem = MusicItem | HeaderBlock | LayoutBlock | MidiBlock;

/** `\book { ... }` */
export interface BookBlock {
  kind: 'book';
  items: BookItem[];
}

export type BookItem =
  | ScoreBlock
  | BookPartBlock
  | HeaderBlock
  | PaperBlock
  | MusicItem
  | Assignment
  | MarkupItem
  | MarkupListItem;

/** `\bookpart { ... }` */
export interface BookPartBlock {
  kind: 'bookpart';
  items: BookPartItem[];
}

export type BookPartItem = ScoreBlock | HeaderBlock | PaperBlock | MusicItem | Assignment | MarkupItem | MarkupListItem;

/** `\header { field = value ... }` */
export interface HeaderBlock {
  kind: 'header';
  fields: Assignment[];
}

/** `\paper { ... }` */
export interface PaperBlock {
  kind: 'paper';
  items: Array<Assignment | SchemeItem>;
}

/** `\layout { ... }` */
export interface LayoutBlock {
  kind: 'layout';
  items: OutputDefItem[];
}

/** `\midi { ... }` */
export interface MidiBlock {
  kind: 'midi';
  items: OutputDefItem[];
}

/** Items allowed inside `\layout` and `\midi`. */
export type OutputDefItem = Assignment | ContextBlock | SchemeItem;

/** `\context { \Staff \consists "..." }` inside an output definition. */
export interface ContextBlock {
  kind: 'contextBlock';
  items: ContextModItem[];
}

/** Music expression wrapped as a block or top-level item. */
export interface MusicItem {
  kind: 'music';
  music: Music;
}

/** Top-level `\markup ...` */
export interface MarkupItem {
  kind: 'markup';
  markup: Markup;
}

/** Top-level `\markuplist ...` */
export interface MarkupListItem {
  kind: 'markuplist';
  markup: Markup;
}

/** Top-level `#expr` */
export interface SchemeItem {
  kind: 'scheme';
  text: string;
}

/** `name = value`; names may be dotted (`system-system-spacing.padding`). */
export interface Assignment {
  kind: 'assignment';
  name: string;
  value: AssignmentValue;
}

export type AssignmentValue =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number; unit?: string }
  | { kind: 'music'; music: Music }
  | { kind: 'identifier'; name: string }
  | { kind: 'markup'; markup: Markup }
  | { kind: 'markuplist'; markup: Markup }
  | { kind: 'scheme'; text: string };

/**
 * Raw markup source captured after `\markup`/`\markuplist`, trimmed.
 * The text is kept verbatim and never parsed further.
 */
export interface Markup {
  raw: string;
}

/** Items of a `\with { }` block or an output-definition `\context { }` block. */
export type ContextModItem =
  | { kind: 'contextRef'; name: string }
  | { kind: 'consists'; name: string }
  | { kind: 'remove'; name: string }
  | { kind: 'accepts'; name: string }
  | { kind: 'denies'; name: string }
  | { kind: 'alias'; name: string }
  | { kind: 'defaultChild'; name: string }
  | { kind: 'description'; text: string }
  | { kind: 'name'; name: string }
  | Assignment
  | PropertyOperation;

/** Named context modifier kinds that carry a single name argument. */
export type NamedContextModKind = 'consists' | 'remove' | 'accepts' | 'denies' | 'alias' | 'defaultChild' | 'name';

/** One segment of a property path: a dotted name or a quoted Scheme symbol (`#'color`). */
export type PropertyPathSegment = { kind: 'name'; name: string } | { kind: 'scheme'; text: string };

/** Right-hand side of `\override` and `\set`. */
export type PropertyValue =
  | { kind: 'scheme'; text: string }
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'identifier'; name: string }
  | { kind: 'markup'; markup: Markup };

/** `\override`, `\revert`, `\set`, `\unset` */
export type PropertyOperation =
  | { kind: 'override'; path: PropertyPathSegment[]; value: PropertyValue }
  | { kind: 'revert'; path: PropertyPathSegment[] }
  | { kind: 'set'; path: PropertyPathSegment[]; value: PropertyValue }
  | { kind: 'unset'; path: PropertyPathSegment[] };

/** The seven diatonic note letters. */
export type Step = 'c' | 'd' | 'e' | 'f' | 'g' | 'a' | 'b';

/** Pitch spelling; `alter` counts half steps (quarter tones are `0.5` multiples). */
export interface Pitch {
  step: Step;
  alter: number;
  /** Octave marks relative to the reference octave (`'` = +1, `,` = -1). */
  octave: number;
  forceAccidental: boolean;
  cautionary: boolean;
  /** Present when the pitch carries an `=` octave check. */
  octaveCheck?: number;
}

/** Named long note values that LilyPond writes as escaped words. */
export type LongDurationBase = 'breve' | 'longa' | 'maxima';

export type DurationBase = number | LongDurationBase;

/** Written duration with dot count and a chain of `*n/m` scaling factors. */
export interface Duration {
  base: DurationBase;
  dots: number;
  multipliers: Array<[number, number]>;
}

/** Placement prefix of a post-event: `^`, `_`, or `-`. */
export type Direction = 'up' | 'down' | 'neutral';

/** Single-character articulation shorthands after a direction prefix. */
export type ScriptAbbreviation = '.' | '-' | '>' | '^' | '+' | '!' | '_';

/** Text attached through a direction prefix. */
export type TextValue = { kind: 'string'; value: string } | { kind: 'markup'; markup: Markup };

/** Marker attached to a leaf event, kept in source order. */
export type PostEvent =
  | { kind: 'tie' }
  | { kind: 'slurStart' }
  | { kind: 'slurEnd' }
  | { kind: 'phrasingSlurStart' }
  | { kind: 'phrasingSlurEnd' }
  | { kind: 'beamStart' }
  | { kind: 'beamEnd' }
  | { kind: 'dynamic'; name: string }
  | { kind: 'crescendo' }
  | { kind: 'decrescendo' }
  | { kind: 'hairpinEnd' }
  | { kind: 'articulation'; direction: Direction; script: ScriptAbbreviation }
  | { kind: 'fingering'; direction: Direction; digit: number }
  | { kind: 'namedArticulation'; direction: Direction; name: string }
  | { kind: 'stringNumber'; direction: Direction; number: number }
  | { kind: 'textScript'; direction: Direction; text: TextValue }
  | { kind: 'tremolo'; subdivision: number }
  | { kind: 'lyricHyphen' }
  | { kind: 'lyricExtender' }
  /** `-\tweak path value`, applying to the post-event after it. */
  | { kind: 'tweak'; path: PropertyPathSegment[]; value: PropertyValue };

export type PostEventKind = PostEvent['kind'];

export type RepeatType = 'volta' | 'unfold' | 'percent' | 'tremolo' | 'segno';

/** Argument of a generic music function call such as `\tag #'score { ... }`. */
export type FunctionArgument =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'scheme'; text: string }
  | { kind: 'default' }
  | { kind: 'music'; music: Music };

/** Label of a rehearsal mark. */
export type MarkLabel =
  | { kind: 'default' }
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'markup'; markup: Markup }
  | { kind: 'scheme'; text: string };

/** Metronome value: a single tempo or a `low-high` range. */
export type TempoBpm = { kind: 'single'; value: number } | { kind: 'range'; low: number; high: number };

export interface NoteEvent {
  kind: 'note';
  pitch: Pitch;
  duration?: Duration;
  /** `c4\rest` */
  pitchedRest: boolean;
  postEvents: PostEvent[];
}

export interface RestEvent {
  kind: 'rest';
  duration?: Duration;
  postEvents: PostEvent[];
}

export interface SkipEvent {
  kind: 'skip';
  duration?: Duration;
  postEvents: PostEvent[];
}

export interface MultiMeasureRestEvent {
  kind: 'multiMeasureRest';
  duration?: Duration;
  postEvents: PostEvent[];
}

export interface ChordEvent {
  kind: 'chord';
  pitches: Pitch[];
  duration?: Duration;
  postEvents: PostEvent[];
}

/** `q`: repeats the previous chord's pitches. */
export interface ChordRepetitionEvent {
  kind: 'chordRepetition';
  duration?: Duration;
  postEvents: PostEvent[];
}

/** One lyric syllable; `_` is stored as the text `_`. */
export interface LyricEvent {
  kind: 'lyric';
  text: string;
  duration?: Duration;
  postEvents: PostEvent[];
}

/** Chord-quality modifier names accepted after `:` in chord mode. */
export type ChordModifier = 'm' | 'min' | 'aug' | 'dim' | 'maj' | 'sus';

/** Chord step alteration: `+` raises, `-` lowers. */
export type StepAlteration = 'natural' | 'sharp' | 'flat';

/** Numbered chord step such as `7`, `9+` or `5-`. */
export interface ChordStep {
  number: number;
  alteration: StepAlteration;
}

export type ChordQualityItem = { kind: 'modifier'; name: ChordModifier } | ({ kind: 'step' } & ChordStep);

/** `root[dur][:quality][^removals][/inversion][/+bass]` inside `\chordmode`. */
export interface ChordModeEntry {
  kind: 'chordModeEntry';
  root: Pitch;
  duration?: Duration;
  quality: ChordQualityItem[];
  removals: ChordStep[];
  inversion?: Pitch;
  bass?: Pitch;
  postEvents: PostEvent[];
}

/** One drum instrument hit inside `\drummode`, such as `sn8`. */
export interface DrumNoteEvent {
  kind: 'drumNote';
  drumType: string;
  duration?: Duration;
  postEvents: PostEvent[];
}

/** Simultaneous drum hits, `<bd hh>4`. */
export interface DrumChordEvent {
  kind: 'drumChord';
  drumTypes: string[];
  duration?: Duration;
  postEvents: PostEvent[];
}

/** Accidental written after a bass figure number. */
export type FigureAlteration = 'natural' | 'sharp' | 'doubleSharp' | 'flat' | 'doubleFlat' | 'forcedNatural';

/** Modifier suffixes of a bass figure: `\+`, `\!`, `/` and `\\`. */
export type FigureModification = 'augmented' | 'noContinuation' | 'diminished' | 'augmentedSlash';

/** One number of a figure group; `number` is absent for `_`. */
export interface BassFigure {
  number?: number;
  alteration: FigureAlteration;
  modifications: FigureModification[];
  bracketStart: boolean;
  bracketStop: boolean;
}

/** `\<6 4+\>4` inside `\figuremode`. */
export interface FigureEvent {
  kind: 'figure';
  figures: BassFigure[];
  duration?: Duration;
}

/** Music leaves that own a post-event list. */
export type LeafEvent =
  | NoteEvent
  | RestEvent
  | SkipEvent
  | MultiMeasureRestEvent
  | ChordEvent
  | ChordRepetitionEvent
  | LyricEvent
  | ChordModeEntry
  | DrumNoteEvent
  | DrumChordEvent;

/** `\new|\context Type [= "name"] [\with { ... }] music` */
export interface ContextedMusic {
  kind: 'contextedMusic';
  keyword: 'new' | 'context';
  contextType: string;
  name?: string;
  withBlock?: ContextModItem[];
  body: Music;
}

/** `\relative [pitch] music` */
export interface RelativeMusic {
  kind: 'relative';
  pitch?: Pitch;
  body: Music;
}

/** `\tuplet n/d [span] music`; `\times d/n` normalizes to the same shape. */
export interface TupletMusic {
  kind: 'tuplet';
  numerator: number;
  denominator: number;
  spanDuration?: Duration;
  body: Music;
}

/** `\afterGrace [n/d] main grace` */
export interface AfterGraceMusic {
  kind: 'afterGrace';
  fraction?: [number, number];
  main: Music;
  grace: Music;
}

/** `\repeat type count body [\alternative { ... }]` */
export interface RepeatMusic {
  kind: 'repeat';
  repeatType: RepeatType;
  count: number;
  body: Music;
  alternatives?: Music[];
}

/** `\tempo ["text"] [duration = bpm[-bpm]]` */
export interface TempoMusic {
  kind: 'tempo';
  text?: TextValue;
  duration?: Duration;
  bpm?: TempoBpm;
}

/** Central recursive music type. */
export type Music =
  | LeafEvent
  | { kind: 'sequential'; items: Music[] }
  | { kind: 'simultaneous'; items: Music[] }
  | { kind: 'voiceSeparator' }
  | RelativeMusic
  | { kind: 'fixed'; pitch: Pitch; body: Music }
  | { kind: 'transpose'; from: Pitch; to: Pitch; body: Music }
  | ContextedMusic
  | { kind: 'contextChange'; contextType: string; name: string }
  | { kind: 'clef'; name: string }
  | { kind: 'keySignature'; pitch: Pitch; mode: string }
  | { kind: 'timeSignature'; numerators: number[]; denominator: number }
  | { kind: 'partial'; duration: Duration }
  | TupletMusic
  | { kind: 'grace'; body: Music }
  | { kind: 'acciaccatura'; body: Music }
  | { kind: 'appoggiatura'; body: Music }
  | AfterGraceMusic
  | RepeatMusic
  | { kind: 'barCheck' }
  | { kind: 'barLine'; barType: string }
  | { kind: 'lyricMode'; body: Music }
  | { kind: 'lyricsTo'; voiceId: string; body: Music }
  | { kind: 'addLyrics'; music: Music; lyrics: Music[] }
  | TempoMusic
  | { kind: 'mark'; label: MarkLabel }
  | { kind: 'textMark'; text: TextValue }
  | { kind: 'autoBeamOn' }
  | { kind: 'autoBeamOff' }
  | PropertyOperation
  | { kind: 'once'; body: Music }
  | { kind: 'tweak'; path: PropertyPathSegment[]; value: PropertyValue; body: Music }
  | { kind: 'chordMode'; body: Music }
  | { kind: 'drumMode'; body: Music }
  | { kind: 'figureMode'; body: Music }
  | FigureEvent
  | { kind: 'identifier'; name: string }
  | { kind: 'musicFunction'; name: string; args: FunctionArgument[] }
  | { kind: 'scheme'; text: string }
  | { kind: 'markup'; markup: Markup };

export type MusicKind = Music['kind'];

/** Narrow a music value to one of the leaf events carrying post-events. */
export function isLeafEvent(music: Music): music is LeafEvent {
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
      return true;
    default:
      return false;
  }
}
