import type { Pitch } from '../core/ast.js';
import { octaveMarks } from '../core/pitch.js';

/**
 * Alteration suffix table used when printing pitches.
 * Keys are alterations in quarter tones (`alter * 2`).
 */
export interface PitchSpelling {
  suffixes: ReadonlyMap<number, string>;
  sharp: string;
  flat: string;
}

/**
 * Dutch note names with the full flat suffix on every step, so `e` flat
 * prints as `ees` and `a` flat as `aes`.
 */
export const DUTCH_SPELLING: PitchSpelling = {
  suffixes: new Map([
    [0, ''],
    [2, 'is'],
    [4, 'isis'],
    [-2, 'es'],
    [-4, 'eses'],
    [1, 'ih'],
    [3, 'isih'],
    [-1, 'eh'],
    [-3, 'eseh']
  ]),
  sharp: 'is',
  flat: 'es'
};

/** Suffix for `alter`, repeating whole sharps or flats when the table has no entry. */
export function alterationSuffix(alter: number, spelling: PitchSpelling = DUTCH_SPELLING): string {
  const known = spelling.suffixes.get(alter * 2);
  if (known !== undefined) {
    return known;
  }
  const steps = Math.round(Math.abs(alter));
  return (alter > 0 ? spelling.sharp : spelling.flat).repeat(steps);
}

/** Step, alteration, octave marks, `!`, `?` and the `=` octave check. */
export function formatPitch(pitch: Pitch, spelling: PitchSpelling = DUTCH_SPELLING): string {
  let text = pitch.step + alterationSuffix(pitch.alter, spelling) + octaveMarks(pitch.octave);
  if (pitch.forceAccidental) {
    text += '!';
  }
  if (pitch.cautionary) {
    text += '?';
  }
  if (pitch.octaveCheck !== undefined) {
    text += `=${octaveMarks(pitch.octaveCheck)}`;
  }
  return text;
}
