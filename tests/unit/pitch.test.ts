import { describe, expect, it } from 'vitest';

import type { Pitch } from '../../src/core/ast.js';
import { isNoteName, octaveMarks, parseNoteName } from '../../src/core/pitch.js';
import { alterationSuffix, DUTCH_SPELLING, formatPitch, type PitchSpelling } from '../../src/serializer/spelling.js';

function pitch(overrides: Partial<Pitch>): Pitch {
  return { step: 'c', alter: 0, octave: 0, forceAccidental: false, cautionary: false, ...overrides };
}

describe('Dutch note names', () => {
  it('decodes sharps, flats and quarter tones', () => {
    expect(parseNoteName('c')).toEqual({ step: 'c', alter: 0 });
    expect(parseNoteName('cis')).toEqual({ step: 'c', alter: 1 });
    expect(parseNoteName('disis')).toEqual({ step: 'd', alter: 2 });
    expect(parseNoteName('bes')).toEqual({ step: 'b', alter: -1 });
    expect(parseNoteName('geses')).toEqual({ step: 'g', alter: -2 });
    expect(parseNoteName('beh')).toEqual({ step: 'b', alter: -0.5 });
    expect(parseNoteName('fisih')).toEqual({ step: 'f', alter: 1.5 });
    expect(parseNoteName('deseh')).toEqual({ step: 'd', alter: -1.5 });
  });

  it('accepts the contracted flats of a and e', () => {
    expect(parseNoteName('es')).toEqual({ step: 'e', alter: -1 });
    expect(parseNoteName('ees')).toEqual({ step: 'e', alter: -1 });
    expect(parseNoteName('as')).toEqual({ step: 'a', alter: -1 });
    expect(parseNoteName('ases')).toEqual({ step: 'a', alter: -2 });
  });

  it('rejects words that are not pitches', () => {
    expect(parseNoteName('bs')).toBeUndefined();
    expect(parseNoteName('is')).toBeUndefined();
    expect(isNoteName('bass')).toBe(false);
    expect(isNoteName('r')).toBe(false);
    expect(isNoteName('fis')).toBe(true);
  });

  it('renders octave offsets as marks', () => {
    expect(octaveMarks(2)).toBe("''");
    expect(octaveMarks(-3)).toBe(',,,');
    expect(octaveMarks(0)).toBe('');
  });
});

describe('pitch spelling', () => {
  it('writes flats with the full suffix on every step', () => {
    expect(formatPitch(pitch({ step: 'e', alter: -1 }))).toBe('ees');
    expect(formatPitch(pitch({ step: 'a', alter: -2 }))).toBe('aeses');
    expect(formatPitch(pitch({ step: 'b', alter: -1 }))).toBe('bes');
  });

  it('writes quarter-tone suffixes', () => {
    expect(formatPitch(pitch({ alter: 0.5 }))).toBe('cih');
    expect(formatPitch(pitch({ alter: -0.5 }))).toBe('ceh');
    expect(formatPitch(pitch({ alter: 1.5 }))).toBe('cisih');
    expect(formatPitch(pitch({ alter: -1.5 }))).toBe('ceseh');
  });

  it('repeats whole-tone suffixes past the table', () => {
    expect(alterationSuffix(3)).toBe('isisis');
    expect(alterationSuffix(-3)).toBe('eseses');
  });

  it('appends octave marks, accidental flags and the octave check in order', () => {
    const text = formatPitch(
      pitch({ alter: 1, octave: 2, forceAccidental: true, cautionary: true, octaveCheck: -1 })
    );
    expect(text).toBe("cis''!?=,");
    expect(formatPitch(pitch({ octaveCheck: 0 }))).toBe('c=');
  });

  it('takes a replacement spelling table', () => {
    const english: PitchSpelling = {
      suffixes: new Map([
        [0, ''],
        [2, 's'],
        [-2, 'f']
      ]),
      sharp: 's',
      flat: 'f'
    };
    expect(formatPitch(pitch({ step: 'e', alter: -1 }), english)).toBe('ef');
    expect(formatPitch(pitch({ step: 'f', alter: 2 }), english)).toBe('fss');
    expect(DUTCH_SPELLING.suffixes.get(2)).toBe('is');
  });
});
