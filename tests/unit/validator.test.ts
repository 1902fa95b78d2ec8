import { describe, expect, it } from 'vitest';

import type { LilyPondFile, Music } from '../../src/core/ast.js';
import { formatParseError } from '../../src/parser/errors.js';
import { parse } from '../../src/parser/parse.js';
import { validate, type ValidateOptions } from '../../src/validator/validate.js';
import {
  formatValidationError,
  validationErrorCode,
  type ValidationError
} from '../../src/validator/validation-errors.js';

function parseFile(source: string): LilyPondFile {
  const result = parse(source);
  if (!result.ok) {
    throw new Error(formatParseError(result.error));
  }
  return result.file;
}

function errorsOf(source: string, options?: ValidateOptions): ValidationError[] {
  const result = validate(parseFile(source), options);
  return result.ok ? [] : result.errors;
}

describe('duration checks', () => {
  it('checks the duration of every leaf event kind', () => {
    expect(errorsOf('{ c3 r3 s3 R3 <c>3 q3 }')).toEqual(
      Array.from({ length: 6 }, () => ({ kind: 'invalidDurationBase', base: 3 }))
    );
  });

  it('limits dots and the largest base and rejects zero denominators', () => {
    expect(errorsOf('{ c4..... c256 c\\breve c4*1/0 }')).toEqual([
      { kind: 'excessiveDots', dots: 5 },
      { kind: 'invalidDurationBase', base: 256 },
      { kind: 'zeroMultiplierDenominator' }
    ]);
  });

  it('returns ok for well-formed music', () => {
    expect(validate(parseFile('{ c1 d2. e4*2/3 f128 g\\longa }'))).toEqual({ ok: true });
  });
});

const SPAN_SYNTAX = [
  { kind: 'unmatchedSlur', open: '(', close: ')' },
  { kind: 'unmatchedPhrasingSlur', open: '\\(', close: '\\)' },
  { kind: 'unmatchedBeam', open: '[', close: ']' },
  { kind: 'unmatchedHairpin', open: '\\<', close: '\\!' },
  { kind: 'unmatchedHairpin', open: '\\>', close: '\\!' }
] as const;

describe('span balance', () => {
  describe.each(SPAN_SYNTAX)('$open $close', ({ kind, open, close }) => {
    it('accepts the closed span', () => {
      expect(errorsOf(`{ c d${open} e f${close} g }`)).toEqual([]);
    });

    it('reports a dropped end at its start', () => {
      expect(errorsOf(`{ c d${open} e f g }`)).toEqual([{ kind, startIndex: 1 }]);
    });

    it('reports a dropped start at its end', () => {
      expect(errorsOf(`{ c d e f${close} g }`)).toEqual([{ kind, endIndex: 3 }]);
    });
  });

  it('lets spans of different kinds interleave', () => {
    expect(errorsOf('{ c( d\\( e) f\\) }')).toEqual([]);
    expect(errorsOf('{ c( d\\( e[ f\\< g) a\\) b] c\\! }')).toEqual([]);
  });

  it('counts chord names and drum notes as events', () => {
    expect(errorsOf('\\drummode { bd( sn) }')).toEqual([]);
    expect(errorsOf('\\chordmode { c1 d:m( }')).toEqual([{ kind: 'unmatchedSlur', startIndex: 1 }]);
  });

  it('reports the outermost unclosed slur', () => {
    expect(errorsOf('{ c( d( e) f }')).toEqual([{ kind: 'unmatchedSlur', startIndex: 0 }]);
  });

  it('reports an end with nothing open where it occurs', () => {
    expect(errorsOf('{ c) d }')).toEqual([{ kind: 'unmatchedSlur', endIndex: 0 }]);
  });

  it('does not close a hairpin with a dynamic', () => {
    expect(errorsOf('{ c\\< d\\f e\\! }')).toEqual([]);
    expect(errorsOf('{ c\\< d\\> e\\! }')).toEqual([{ kind: 'unmatchedHairpin', startIndex: 0 }]);
  });

  it('tracks each span kind separately', () => {
    expect(errorsOf('{ c[ d\\( e] }')).toEqual([{ kind: 'unmatchedPhrasingSlur', startIndex: 1 }]);
  });

  it('scans each music root on its own', () => {
    expect(errorsOf('upper = { c( }\nlower = { d) }')).toEqual([
      { kind: 'unmatchedSlur', startIndex: 0 },
      { kind: 'unmatchedSlur', endIndex: 0 }
    ]);
  });
});

describe('structure and name checks', () => {
  it('checks context types', () => {
    expect(errorsOf('\\new Stave { c4 \\change Staff = "down" }')).toEqual([{ kind: 'unknownContextType', name: 'Stave' }]);
  });

  it('checks tuplet and after-grace fractions', () => {
    expect(errorsOf('{ \\tuplet 0/2 { c8 } \\afterGrace 0/1 c4 { d16 } }')).toEqual([
      { kind: 'invalidTupletFraction', numerator: 0, denominator: 2 },
      { kind: 'invalidAfterGraceFraction', numerator: 0, denominator: 1 }
    ]);
  });

  it('rejects empty chords, bar lines and grace bodies', () => {
    expect(errorsOf('{ <>4 \\bar "" \\grace { } c4 \\afterGrace c4 { } }')).toEqual([
      { kind: 'emptyChord' },
      { kind: 'emptyBarLineType' },
      { kind: 'emptyGraceBody' },
      { kind: 'emptyGraceBody' }
    ]);
  });

  it('requires a positive repeat count', () => {
    expect(errorsOf('\\repeat volta 0 { c4 }')).toEqual([{ kind: 'invalidRepeatCount' }]);
  });

  it('accepts tremolo 0 and powers of two from 8', () => {
    expect(errorsOf('{ c4:4 c:0 c:8 c:12 }')).toEqual([
      { kind: 'invalidTremoloType', value: 4 },
      { kind: 'invalidTremoloType', value: 12 }
    ]);
  });

  it('accepts clefs with transposition suffixes', () => {
    expect(errorsOf('{ \\clef "treble_8" \\clef bass \\clef "G^15" \\clef wrong }')).toEqual([
      { kind: 'unknownClefName', name: 'wrong' }
    ]);
  });

  it('checks key modes and time signatures', () => {
    expect(errorsOf('{ \\key c \\weird \\key d \\minor \\time 3+2/8 \\time 0/3 }')).toEqual([
      { kind: 'unknownKeyMode', mode: 'weird' },
      { kind: 'invalidTimeNumerator', value: 0 },
      { kind: 'invalidTimeDenominator', value: 3 }
    ]);
  });

  it('checks tempo values and ranges', () => {
    expect(errorsOf('{ \\tempo 4 = 0 }')).toEqual([{ kind: 'invalidTempoBpm' }]);
    expect(errorsOf('{ \\tempo 4 = 132-120 }')).toEqual([{ kind: 'invalidTempoRange', low: 132, high: 120 }]);
    expect(errorsOf('{ \\tempo 4 = 0-0 }')).toEqual([
      { kind: 'invalidTempoBpm' },
      { kind: 'invalidTempoRange', low: 0, high: 0 }
    ]);
  });

  it('checks fingering digits and string numbers', () => {
    expect(errorsOf('{ c-12 d\\0 e-5 f\\9 }')).toEqual([
      { kind: 'invalidFingeringDigit', digit: 12 },
      { kind: 'invalidStringNumber', number: 0 }
    ]);
  });

  it('rejects empty lyric syllables', () => {
    expect(errorsOf('\\lyricmode { "" la }')).toEqual([{ kind: 'emptyLyricSyllable' }]);
  });

  it('reports problems only a constructed tree can have', () => {
    const file: LilyPondFile = {
      items: [
        {
          kind: 'music',
          music: {
            kind: 'sequential',
            items: [
              { kind: 'tempo' },
              {
                kind: 'note',
                pitch: { step: 'c', alter: 0, octave: 0, forceAccidental: false, cautionary: false },
                pitchedRest: false,
                postEvents: [{ kind: 'dynamic', name: 'loud' }]
              }
            ]
          }
        }
      ]
    };
    expect(validate(file)).toEqual({
      ok: false,
      errors: [{ kind: 'emptyTempo' }, { kind: 'unknownDynamic', name: 'loud' }]
    });
  });
});

describe('validation scope', () => {
  it('validates music stored in assignments', () => {
    expect(errorsOf('\\header { title = "x" }\nmelody = { c3 }')).toEqual([{ kind: 'invalidDurationBase', base: 3 }]);
  });

  it('requires music in every score', () => {
    expect(errorsOf('\\score { \\layout { } }')).toEqual([{ kind: 'scoreNoMusic' }]);
    expect(errorsOf('\\book { \\score { \\header { } } }')).toEqual([{ kind: 'scoreNoMusic' }]);
  });

  it('skips disabled check groups', () => {
    expect(errorsOf('{ c3( }', { durations: false })).toEqual([{ kind: 'unmatchedSlur', startIndex: 0 }]);
    expect(errorsOf('{ c3( }', { spans: false })).toEqual([{ kind: 'invalidDurationBase', base: 3 }]);
    expect(errorsOf('\\new Stave { c4 }', { contexts: false })).toEqual([]);
    expect(errorsOf('\\score { }', { score: false })).toEqual([]);
  });
});

describe('validation messages', () => {
  it('formats each error as one line', () => {
    expect(formatValidationError({ kind: 'invalidDurationBase', base: 3 })).toBe(
      'invalid duration base 3: must be a power of 2 (1..128)'
    );
    expect(formatValidationError({ kind: 'unmatchedSlur', startIndex: 2 })).toBe('slur opened at event 2 is never closed');
    expect(formatValidationError({ kind: 'unmatchedPhrasingSlur', endIndex: 0 })).toBe(
      'phrasing slur closed at event 0 was never opened'
    );
    expect(formatValidationError({ kind: 'unknownKeyMode', mode: 'weird' })).toBe("unknown key mode '\\weird'");
  });

  it('derives diagnostic codes from error kinds', () => {
    expect(validationErrorCode('unmatchedPhrasingSlur')).toBe('LILYPOND_UNMATCHED_PHRASING_SLUR');
    expect(validationErrorCode('scoreNoMusic')).toBe('LILYPOND_SCORE_NO_MUSIC');
  });
});

describe('deep trees', () => {
  function nestedSequences(depth: number, leaf: Music): Music {
    let music = leaf;
    for (let level = 0; level < depth; level += 1) {
      music = { kind: 'sequential', items: [music] };
    }
    return music;
  }

  it('walks trees far deeper than the parser reads', () => {
    const file: LilyPondFile = {
      items: [{ kind: 'music', music: nestedSequences(20000, { kind: 'rest', duration: { base: 3, dots: 0, multipliers: [] }, postEvents: [] }) }]
    };
    expect(validate(file)).toEqual({ ok: false, errors: [{ kind: 'invalidDurationBase', base: 3 }] });
  });
});
