import type {
  Assignment,
  BookItem,
  ContextModItem,
  Duration,
  LilyPondFile,
  Music,
  PostEvent,
  ScoreBlock,
  TempoMusic,
  ToplevelExpression
} from '../core/ast.js';
import { musicChildren } from '../core/music-children.js';
import { isKnownClef, NOTATION_NAMES } from '../core/notation-names.js';
import { checkSpanBalance } from './spans.js';
import type { ValidationError } from './validation-errors.js';

/** Independent check groups; each defaults to enabled. */
export interface ValidateOptions {
  /** Duration base, dot count and multiplier checks. */
  durations?: boolean;
  /** Slur, phrasing slur, beam and hairpin balance. */
  spans?: boolean;
  /** Context type names on `\new`, `\context` and `\change`. */
  contexts?: boolean;
  /** Tuplet and after-grace fractions. */
  fractions?: boolean;
  /** Chords, bar lines, repeats, tremolos, grace bodies, lyrics, time signatures and tempo. */
  structure?: boolean;
  /** Clef, key mode and dynamic names; fingering and string number ranges. */
  names?: boolean;
  /** Scores without music. */
  score?: boolean;
}

export type ValidationResult = { ok: true } | { ok: false; errors: ValidationError[] };

const MAX_DOTS = 4;
const MAX_DURATION_BASE = 128;

type ResolvedOptions = Required<ValidateOptions>;

interface ValidationContext {
  options: ResolvedOptions;
  errors: ValidationError[];
}

function isPowerOfTwo(value: number): boolean {
  return Number.isInteger(value) && value > 0 && (value & (value - 1)) === 0;
}

/** Walk the whole file and collect every structural violation. */
export function validate(file: LilyPondFile, options: ValidateOptions = {}): ValidationResult {
  const ctx: ValidationContext = {
    options: {
      durations: options.durations ?? true,
      spans: options.spans ?? true,
      contexts: options.contexts ?? true,
      fractions: options.fractions ?? true,
      structure: options.structure ?? true,
      names: options.names ?? true,
      score: options.score ?? true
    },
    errors: []
  };

  for (const item of file.items) {
    validateItem(item, ctx);
  }
  return ctx.errors.length === 0 ? { ok: true } : { ok: false, errors: ctx.errors };
}

function validateItem(item: ToplevelExpression | BookItem, ctx: ValidationContext): void {
  switch (item.kind) {
    case 'score':
      validateScore(item, ctx);
      return;
    case 'book':
    case 'bookpart':
      for (const child of item.items) {
        validateItem(child, ctx);
      }
      return;
    case 'header':
      item.fields.forEach((field) => validateAssignment(field, ctx));
      return;
    case 'paper':
      for (const child of item.items) {
        if (child.kind === 'assignment') {
          validateAssignment(child, ctx);
        }
      }
      return;
    case 'layout':
    case 'midi':
      for (const child of item.items) {
        if (child.kind === 'assignment') {
          validateAssignment(child, ctx);
        } else if (child.kind === 'contextBlock') {
          child.items.forEach((mod) => validateContextMod(mod, ctx));
        }
      }
      return;
    case 'assignment':
      validateAssignment(item, ctx);
      return;
    case 'music':
      validateMusicRoot(item.music, ctx);
      return;
    default:
      return;
  }
}

function validateScore(score: ScoreBlock, ctx: ValidationContext): void {
  let hasMusic = false;
  for (const item of score.items) {
    if (item.kind === 'music') {
      hasMusic = true;
      validateMusicRoot(item.music, ctx);
    } else {
      validateItem(item, ctx);
    }
  }

  if (ctx.options.score && !hasMusic) {
    ctx.errors.push({ kind: 'scoreNoMusic' });
  }
}

function validateAssignment(assignment: Assignment, ctx: ValidationContext): void {
  if (assignment.value.kind === 'music') {
    validateMusicRoot(assignment.value.music, ctx);
  }
}

function validateContextMod(item: ContextModItem, ctx: ValidationContext): void {
  if (item.kind === 'assignment') {
    validateAssignment(item, ctx);
  }
}

/** Per-node checks for the whole tree, then one span scan over the root. */
function validateMusicRoot(music: Music, ctx: ValidationContext): void {
  validateMusic(music, ctx);
  if (ctx.options.spans) {
    ctx.errors.push(...checkSpanBalance(music));
  }
}

/** Pre-order walk over `music` with an explicit stack. */
function validateMusic(music: Music, ctx: ValidationContext): void {
  const pending: Music[] = [music];
  for (let node = pending.pop(); node; node = pending.pop()) {
    validateNode(node, ctx);
    for (const child of [...musicChildren(node)].reverse()) {
      pending.push(child);
    }
  }
}

function validateNode(music: Music, ctx: ValidationContext): void {
  const { options, errors } = ctx;

  switch (music.kind) {
    case 'note':
    case 'rest':
    case 'skip':
    case 'multiMeasureRest':
    case 'chordRepetition':
    case 'chordModeEntry':
    case 'drumNote':
      validateOptionalDuration(music.duration, ctx);
      validatePostEvents(music.postEvents, ctx);
      return;
    case 'drumChord':
      if (options.structure && music.drumTypes.length === 0) {
        errors.push({ kind: 'emptyChord' });
      }
      validateOptionalDuration(music.duration, ctx);
      validatePostEvents(music.postEvents, ctx);
      return;
    case 'figure':
      validateOptionalDuration(music.duration, ctx);
      return;
    case 'chord':
      if (options.structure && music.pitches.length === 0) {
        errors.push({ kind: 'emptyChord' });
      }
      validateOptionalDuration(music.duration, ctx);
      validatePostEvents(music.postEvents, ctx);
      return;
    case 'lyric':
      if (options.structure && music.text === '') {
        errors.push({ kind: 'emptyLyricSyllable' });
      }
      validateOptionalDuration(music.duration, ctx);
      return;
    case 'contextedMusic':
      validateContextType(music.contextType, ctx);
      music.withBlock?.forEach((item) => validateContextMod(item, ctx));
      return;
    case 'contextChange':
      validateContextType(music.contextType, ctx);
      return;
    case 'clef':
      if (options.names && !isKnownClef(music.name)) {
        errors.push({ kind: 'unknownClefName', name: music.name });
      }
      return;
    case 'keySignature':
      if (options.names && !NOTATION_NAMES.keyModes.has(music.mode)) {
        errors.push({ kind: 'unknownKeyMode', mode: music.mode });
      }
      return;
    case 'timeSignature':
      if (options.structure) {
        for (const value of music.numerators) {
          if (value === 0) {
            errors.push({ kind: 'invalidTimeNumerator', value });
          }
        }
        if (!isPowerOfTwo(music.denominator)) {
          errors.push({ kind: 'invalidTimeDenominator', value: music.denominator });
        }
      }
      return;
    case 'partial':
      validateDuration(music.duration, ctx);
      return;
    case 'tuplet':
      if (options.fractions && (music.numerator === 0 || music.denominator === 0)) {
        errors.push({ kind: 'invalidTupletFraction', numerator: music.numerator, denominator: music.denominator });
      }
      validateOptionalDuration(music.spanDuration, ctx);
      return;
    case 'grace':
    case 'acciaccatura':
    case 'appoggiatura':
      if (options.structure && isEmptyContainer(music.body)) {
        errors.push({ kind: 'emptyGraceBody' });
      }
      return;
    case 'afterGrace':
      if (options.fractions && music.fraction && (music.fraction[0] === 0 || music.fraction[1] === 0)) {
        errors.push({ kind: 'invalidAfterGraceFraction', numerator: music.fraction[0], denominator: music.fraction[1] });
      }
      if (options.structure && isEmptyContainer(music.grace)) {
        errors.push({ kind: 'emptyGraceBody' });
      }
      return;
    case 'repeat':
      if (options.structure && music.count === 0) {
        errors.push({ kind: 'invalidRepeatCount' });
      }
      return;
    case 'barLine':
      if (options.structure && music.barType === '') {
        errors.push({ kind: 'emptyBarLineType' });
      }
      return;
    case 'tempo':
      validateTempo(music, ctx);
      return;
    default:
      return;
  }
}

function isEmptyContainer(music: Music): boolean {
  return (music.kind === 'sequential' || music.kind === 'simultaneous') && music.items.length === 0;
}

function validateContextType(name: string, ctx: ValidationContext): void {
  if (ctx.options.contexts && !NOTATION_NAMES.contextTypes.has(name)) {
    ctx.errors.push({ kind: 'unknownContextType', name });
  }
}

function validateTempo(tempo: TempoMusic, ctx: ValidationContext): void {
  validateOptionalDuration(tempo.duration, ctx);
  if (!ctx.options.structure) {
    return;
  }

  if (!tempo.text && !tempo.duration) {
    ctx.errors.push({ kind: 'emptyTempo' });
  }
  if (tempo.bpm?.kind === 'single' && tempo.bpm.value === 0) {
    ctx.errors.push({ kind: 'invalidTempoBpm' });
  }
  if (tempo.bpm?.kind === 'range') {
    const { low, high } = tempo.bpm;
    if (low === 0 || high === 0) {
      ctx.errors.push({ kind: 'invalidTempoBpm' });
    }
    if (low >= high) {
      ctx.errors.push({ kind: 'invalidTempoRange', low, high });
    }
  }
}

function validateOptionalDuration(duration: Duration | undefined, ctx: ValidationContext): void {
  if (duration) {
    validateDuration(duration, ctx);
  }
}

/** Base a power of two up to 128 (or a long name), at most four dots, non-zero multiplier denominators. */
function validateDuration(duration: Duration, ctx: ValidationContext): void {
  if (!ctx.options.durations) {
    return;
  }

  const { base } = duration;
  if (typeof base === 'number' && !(isPowerOfTwo(base) && base <= MAX_DURATION_BASE)) {
    ctx.errors.push({ kind: 'invalidDurationBase', base });
  }
  if (duration.dots > MAX_DOTS) {
    ctx.errors.push({ kind: 'excessiveDots', dots: duration.dots });
  }
  for (const [, denominator] of duration.multipliers) {
    if (denominator === 0) {
      ctx.errors.push({ kind: 'zeroMultiplierDenominator' });
    }
  }
}

function isValidTremolo(value: number): boolean {
  return value === 0 || (value >= 8 && isPowerOfTwo(value));
}

function validatePostEvents(events: readonly PostEvent[], ctx: ValidationContext): void {
  const { options, errors } = ctx;
  for (const event of events) {
    switch (event.kind) {
      case 'dynamic':
        if (options.names && !NOTATION_NAMES.dynamics.has(event.name)) {
          errors.push({ kind: 'unknownDynamic', name: event.name });
        }
        break;
      case 'fingering':
        if (options.names && event.digit > 9) {
          errors.push({ kind: 'invalidFingeringDigit', digit: event.digit });
        }
        break;
      case 'stringNumber':
        if (options.names && (event.number < 1 || event.number > 9)) {
          errors.push({ kind: 'invalidStringNumber', number: event.number });
        }
        break;
      case 'tremolo':
        if (options.structure && !isValidTremolo(event.subdivision)) {
          errors.push({ kind: 'invalidTremoloType', value: event.subdivision });
        }
        break;
      default:
        break;
    }
  }
}
