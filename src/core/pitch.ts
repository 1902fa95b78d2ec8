import type { Step } from './ast.js';

/** Step plus half-step alteration decoded from a Dutch note name. */
export interface NoteNameParts {
  step: Step;
  alter: number;
}

const STEPS: ReadonlySet<string> = new Set(['c', 'd', 'e', 'f', 'g', 'a', 'b']);

/** Alteration suffixes accepted after any step letter. */
const SUFFIX_ALTERATIONS: ReadonlyMap<string, number> = new Map([
  ['', 0],
  ['is', 1],
  ['isis', 2],
  ['es', -1],
  ['eses', -2],
  ['ih', 0.5],
  ['isih', 1.5],
  ['eh', -0.5],
  ['eseh', -1.5]
]);

/** Contracted flats written without the leading `e` (`as`, `es`, `ases`, `eses`). */
const VOWEL_STEP_SUFFIXES: ReadonlyMap<string, number> = new Map([
  ['s', -1],
  ['ses', -2]
]);

function isStep(value: string): value is Step {
  return STEPS.has(value);
}

/** Decode a Dutch note name (`cis`, `ees`, `as`, `beh`); `undefined` when the word is not a pitch. */
export function parseNoteName(name: string): NoteNameParts | undefined {
  const head = name.charAt(0);
  if (!isStep(head)) {
    return undefined;
  }

  const suffix = name.slice(1);
  const alter = SUFFIX_ALTERATIONS.get(suffix);
  if (alter !== undefined) {
    return { step: head, alter };
  }

  if (head === 'a' || head === 'e') {
    const contracted = VOWEL_STEP_SUFFIXES.get(suffix);
    if (contracted !== undefined) {
      return { step: head, alter: contracted };
    }
  }

  return undefined;
}

export function isNoteName(word: string): boolean {
  return parseNoteName(word) !== undefined;
}

/** Render an octave offset as a run of `'` or `,` marks. */
export function octaveMarks(octave: number): string {
  if (octave > 0) {
    return "'".repeat(octave);
  }
  if (octave < 0) {
    return ','.repeat(-octave);
  }
  return '';
}
