import { describe, expect, it } from 'vitest';

import type { LilyPondFile, Music, Pitch } from '../../src/core/ast.js';
import { MAX_NESTING_DEPTH } from '../../src/core/music-children.js';
import { formatParseError } from '../../src/parser/errors.js';
import { parse } from '../../src/parser/parse.js';

function parseFile(source: string): LilyPondFile {
  const result = parse(source);
  if (!result.ok) {
    throw new Error(formatParseError(result.error));
  }
  return result.file;
}

/** First top-level music expression of `source`. */
function parseFirstMusic(source: string): Music {
  const item = parseFile(source).items[0];
  if (item?.kind !== 'music') {
    throw new Error(`expected a music item, got ${item?.kind ?? 'nothing'}`);
  }
  return item.music;
}

/** Items of a top-level `{ ... }` sequence. */
function parseSequenceItems(source: string): Music[] {
  const music = parseFirstMusic(source);
  if (music.kind !== 'sequential') {
    throw new Error(`expected a sequential block, got ${music.kind}`);
  }
  return music.items;
}

function pitch(step: Pitch['step'], octave = 0, alter = 0): Pitch {
  return { step, alter, octave, forceAccidental: false, cautionary: false };
}

const QUARTER = { base: 4, dots: 0, multipliers: [] };

describe('parse', () => {
  it('parses a single note in a sequential block', () => {
    expect(parseFile("{ c'4 }")).toEqual({
      items: [
        {
          kind: 'music',
          music: {
            kind: 'sequential',
            items: [{ kind: 'note', pitch: pitch('c', 1), duration: QUARTER, pitchedRest: false, postEvents: [] }]
          }
        }
      ]
    });
  });

  it('reads the version statement and chords with dotted durations', () => {
    const file = parseFile('\\version "2.24.0"\n{ <c ees g>2. }');
    expect(file.version).toBe('2.24.0');
    expect(file.items).toEqual([
      {
        kind: 'music',
        music: {
          kind: 'sequential',
          items: [
            {
              kind: 'chord',
              pitches: [pitch('c'), pitch('e', 0, -1), pitch('g')],
              duration: { base: 2, dots: 1, multipliers: [] },
              postEvents: []
            }
          ]
        }
      }
    ]);
  });

  it('tells assignments from music by lookahead', () => {
    const file = parseFile('melody = { c4 }\nsystem-system-spacing.padding = #1\n\\melody');
    expect(file.items).toEqual([
      {
        kind: 'assignment',
        name: 'melody',
        value: {
          kind: 'music',
          music: {
            kind: 'sequential',
            items: [{ kind: 'note', pitch: pitch('c'), duration: QUARTER, pitchedRest: false, postEvents: [] }]
          }
        }
      },
      { kind: 'assignment', name: 'system-system-spacing.padding', value: { kind: 'scheme', text: '1' } },
      { kind: 'music', music: { kind: 'identifier', name: 'melody' } }
    ]);
  });

  it('reads signed dimensions with units', () => {
    expect(parseFile('\\paper { indent = -2\\cm }').items).toEqual([
      { kind: 'paper', items: [{ kind: 'assignment', name: 'indent', value: { kind: 'number', value: -2, unit: 'cm' } }] }
    ]);
  });

  it('normalizes times to the tuplet form', () => {
    const tuplet = parseFirstMusic('\\tuplet 3/2 { c8 d e }');
    const times = parseFirstMusic('\\times 2/3 { c8 d e }');
    expect(times).toEqual(tuplet);
    expect(tuplet).toMatchObject({ kind: 'tuplet', numerator: 3, denominator: 2 });
    expect(parseFirstMusic('\\tuplet 3/2 4 { c8 d e }')).toMatchObject({ spanDuration: QUARTER });
  });

  it('keeps post-events in source order', () => {
    const [note] = parseSequenceItems('{ c4~( -. ^"hi" \\f\\< :16 -1 \\3 }');
    expect(note).toMatchObject({
      kind: 'note',
      postEvents: [
        { kind: 'tie' },
        { kind: 'slurStart' },
        { kind: 'articulation', direction: 'neutral', script: '.' },
        { kind: 'textScript', direction: 'up', text: { kind: 'string', value: 'hi' } },
        { kind: 'dynamic', name: 'f' },
        { kind: 'crescendo' },
        { kind: 'tremolo', subdivision: 16 },
        { kind: 'fingering', direction: 'neutral', digit: 1 },
        { kind: 'stringNumber', direction: 'neutral', number: 3 }
      ]
    });
  });

  it('captures markup verbatim and resumes after it', () => {
    const items = parseSequenceItems('{ c4^\\markup \\bold { Hi there } d4 }');
    expect(items).toHaveLength(2);
    expect(items[0]).toMatchObject({
      postEvents: [{ kind: 'textScript', direction: 'up', text: { kind: 'markup', markup: { raw: '\\bold { Hi there }' } } }]
    });
    expect(items[1]).toMatchObject({ kind: 'note', pitch: pitch('d') });
  });

  it('returns to note mode after a lyric block', () => {
    const items = parseSequenceItems('{ \\lyricmode { la4 -- la } c4 }');
    expect(items).toEqual([
      {
        kind: 'lyricMode',
        body: {
          kind: 'sequential',
          items: [
            { kind: 'lyric', text: 'la', duration: QUARTER, postEvents: [{ kind: 'lyricHyphen' }] },
            { kind: 'lyric', text: 'la', postEvents: [] }
          ]
        }
      },
      { kind: 'note', pitch: pitch('c'), duration: QUARTER, pitchedRest: false, postEvents: [] }
    ]);
  });

  it('attaches addlyrics to the preceding music', () => {
    const music = parseFirstMusic('{ c4 } \\addlyrics { la }');
    expect(music).toMatchObject({
      kind: 'addLyrics',
      music: { kind: 'sequential' },
      lyrics: [{ kind: 'sequential', items: [{ kind: 'lyric', text: 'la', postEvents: [] }] }]
    });
  });

  it('accepts relative music with and without a reference pitch', () => {
    expect(parseFirstMusic('\\relative { c4 }')).toEqual({
      kind: 'relative',
      body: { kind: 'sequential', items: [{ kind: 'note', pitch: pitch('c'), duration: QUARTER, pitchedRest: false, postEvents: [] }] }
    });
    expect(parseFirstMusic("\\relative c' { c4 }")).toMatchObject({ kind: 'relative', pitch: pitch('c', 1) });
  });

  it('reads context names and with blocks', () => {
    expect(parseFirstMusic('\\new Staff = "up" \\with { \\consists "Foo_engraver" } { c4 }')).toMatchObject({
      kind: 'contextedMusic',
      keyword: 'new',
      contextType: 'Staff',
      name: 'up',
      withBlock: [{ kind: 'consists', name: 'Foo_engraver' }],
      body: { kind: 'sequential' }
    });
  });

  it('reads context modifier words only inside with blocks', () => {
    expect(
      parseFirstMusic('\\new Staff \\with { \\name "Upper" \\alias "Staff" \\description "top" \\Voice \\remove "Bar_engraver" } { c4 }')
    ).toMatchObject({
      withBlock: [
        { kind: 'name', name: 'Upper' },
        { kind: 'alias', name: 'Staff' },
        { kind: 'description', text: 'top' },
        { kind: 'contextRef', name: 'Voice' },
        { kind: 'remove', name: 'Bar_engraver' }
      ]
    });
  });

  it('treats context modifier words as identifiers in music', () => {
    expect(parseSequenceItems('{ \\name \\description \\alias }')).toEqual([
      { kind: 'identifier', name: 'name' },
      { kind: 'identifier', name: 'description' },
      { kind: 'identifier', name: 'alias' }
    ]);
  });

  it('keeps \\rest and \\default meaningful where they apply', () => {
    expect(parseSequenceItems('{ c4\\rest \\mark \\default \\rest }')).toEqual([
      { kind: 'note', pitch: pitch('c'), duration: QUARTER, pitchedRest: true, postEvents: [] },
      { kind: 'mark', label: { kind: 'default' } },
      { kind: 'identifier', name: 'rest' }
    ]);
  });

  it('splits property paths into names and Scheme symbols', () => {
    const items = parseSequenceItems("{ \\override Staff.TimeSignature.color = #red \\override Stem #'direction = #UP }");
    expect(items).toEqual([
      {
        kind: 'override',
        path: [
          { kind: 'name', name: 'Staff' },
          { kind: 'name', name: 'TimeSignature' },
          { kind: 'name', name: 'color' }
        ],
        value: { kind: 'scheme', text: 'red' }
      },
      {
        kind: 'override',
        path: [
          { kind: 'name', name: 'Stem' },
          { kind: 'scheme', text: "'direction" }
        ],
        value: { kind: 'scheme', text: 'UP' }
      }
    ]);
  });

  it('reads repeats with alternatives', () => {
    expect(parseFirstMusic('\\repeat volta 2 { c4 } \\alternative { { d4 } { e4 } }')).toMatchObject({
      kind: 'repeat',
      repeatType: 'volta',
      count: 2,
      body: { kind: 'sequential' },
      alternatives: [{ kind: 'sequential' }, { kind: 'sequential' }]
    });
  });

  it('reads tempo text with a metronome range', () => {
    const [tempo] = parseSequenceItems('{ \\tempo "Allegro" 4 = 120-132 }');
    expect(tempo).toEqual({
      kind: 'tempo',
      text: { kind: 'string', value: 'Allegro' },
      duration: QUARTER,
      bpm: { kind: 'range', low: 120, high: 132 }
    });
  });

  it('collects music function arguments', () => {
    const [call] = parseSequenceItems("{ \\tag #'score { c4 } }");
    expect(call).toMatchObject({
      kind: 'musicFunction',
      name: 'tag',
      args: [{ kind: 'scheme', text: "'score" }, { kind: 'music', music: { kind: 'sequential' } }]
    });
  });
});

describe('note entry modes', () => {
  it('reads chord names with quality, removals, inversion and bass', () => {
    expect(parseFirstMusic('\\chordmode { c1:m7.9^5/e/+g }')).toEqual({
      kind: 'chordMode',
      body: {
        kind: 'sequential',
        items: [
          {
            kind: 'chordModeEntry',
            root: pitch('c'),
            duration: { base: 1, dots: 0, multipliers: [] },
            quality: [
              { kind: 'modifier', name: 'm' },
              { kind: 'step', number: 7, alteration: 'natural' },
              { kind: 'step', number: 9, alteration: 'natural' }
            ],
            removals: [{ number: 5, alteration: 'natural' }],
            inversion: pitch('e'),
            bass: pitch('g'),
            postEvents: []
          }
        ]
      }
    });
  });

  it('attaches a touching sign to the step and a spaced one to the post-events', () => {
    const [first, second] = parseSequenceItems('{ \\chordmode { g:7+.9- d:7 -. } }').flatMap((item) =>
      item.kind === 'chordMode' && item.body.kind === 'sequential' ? item.body.items : []
    );
    expect(first).toMatchObject({
      quality: [
        { kind: 'step', number: 7, alteration: 'sharp' },
        { kind: 'step', number: 9, alteration: 'flat' }
      ],
      postEvents: []
    });
    expect(second).toMatchObject({
      quality: [{ kind: 'step', number: 7, alteration: 'natural' }],
      postEvents: [{ kind: 'articulation', direction: 'neutral', script: '.' }]
    });
  });

  it('wraps the chords shorthand in a ChordNames context', () => {
    expect(parseFirstMusic('\\chords \\with { \\consists "Foo" } { r2 f:sus4 }')).toEqual({
      kind: 'contextedMusic',
      keyword: 'new',
      contextType: 'ChordNames',
      withBlock: [{ kind: 'consists', name: 'Foo' }],
      body: {
        kind: 'chordMode',
        body: {
          kind: 'sequential',
          items: [
            { kind: 'rest', duration: { base: 2, dots: 0, multipliers: [] }, postEvents: [] },
            {
              kind: 'chordModeEntry',
              root: pitch('f'),
              quality: [
                { kind: 'modifier', name: 'sus' },
                { kind: 'step', number: 4, alteration: 'natural' }
              ],
              removals: [],
              postEvents: []
            }
          ]
        }
      }
    });
  });

  it('reads drum names and drum chords', () => {
    expect(parseFirstMusic('\\drums { bd4 <bd hh>8-> }')).toEqual({
      kind: 'contextedMusic',
      keyword: 'new',
      contextType: 'DrumStaff',
      body: {
        kind: 'drumMode',
        body: {
          kind: 'sequential',
          items: [
            { kind: 'drumNote', drumType: 'bd', duration: QUARTER, postEvents: [] },
            {
              kind: 'drumChord',
              drumTypes: ['bd', 'hh'],
              duration: { base: 8, dots: 0, multipliers: [] },
              postEvents: [{ kind: 'articulation', direction: 'neutral', script: '>' }]
            }
          ]
        }
      }
    });
  });

  it('reads figure groups with alterations, brackets and modifications', () => {
    expect(parseFirstMusic('\\figures { <6 4+> \\<[_- 7\\+]\\>2 r4 }')).toEqual({
      kind: 'contextedMusic',
      keyword: 'new',
      contextType: 'FiguredBass',
      body: {
        kind: 'figureMode',
        body: {
          kind: 'sequential',
          items: [
            {
              kind: 'figure',
              figures: [
                { number: 6, alteration: 'natural', modifications: [], bracketStart: false, bracketStop: false },
                { number: 4, alteration: 'sharp', modifications: [], bracketStart: false, bracketStop: false }
              ]
            },
            {
              kind: 'figure',
              figures: [
                { alteration: 'flat', modifications: [], bracketStart: true, bracketStop: false },
                { number: 7, alteration: 'natural', modifications: ['augmented'], bracketStart: false, bracketStop: true }
              ],
              duration: { base: 2, dots: 0, multipliers: [] }
            },
            { kind: 'rest', duration: QUARTER, postEvents: [] }
          ]
        }
      }
    });
  });

  it('reads repeats inside a mode with the mode element parser', () => {
    expect(parseFirstMusic('\\drummode { \\repeat unfold 2 { sn8 } }')).toEqual({
      kind: 'drumMode',
      body: {
        kind: 'sequential',
        items: [
          {
            kind: 'repeat',
            repeatType: 'unfold',
            count: 2,
            body: {
              kind: 'sequential',
              items: [{ kind: 'drumNote', drumType: 'sn', duration: { base: 8, dots: 0, multipliers: [] }, postEvents: [] }]
            }
          }
        ]
      }
    });
  });

  it('rejects words that are not drum names', () => {
    expect(parse('\\drummode { xyz4 }')).toMatchObject({
      ok: false,
      error: { kind: 'unexpected', offset: 12, expected: 'drum pitch, rest or skip' }
    });
  });
});

describe('tweaks', () => {
  it('prefixes a music expression', () => {
    expect(parseFirstMusic('\\tweak color #red c4')).toEqual({
      kind: 'tweak',
      path: [{ kind: 'name', name: 'color' }],
      value: { kind: 'scheme', text: 'red' },
      body: { kind: 'note', pitch: pitch('c'), duration: QUARTER, pitchedRest: false, postEvents: [] }
    });
  });

  it('attaches to a note as a post-event with or without a dash', () => {
    const [dashed, bare] = parseSequenceItems("{ c4-\\tweak color #red -. d4\\tweak Script #'padding 2 -> }");
    expect(dashed).toMatchObject({
      kind: 'note',
      postEvents: [
        { kind: 'tweak', path: [{ kind: 'name', name: 'color' }], value: { kind: 'scheme', text: 'red' } },
        { kind: 'articulation', direction: 'neutral', script: '.' }
      ]
    });
    expect(bare).toMatchObject({
      kind: 'note',
      postEvents: [
        {
          kind: 'tweak',
          path: [
            { kind: 'name', name: 'Script' },
            { kind: 'scheme', text: "'padding" }
          ],
          value: { kind: 'number', value: 2 }
        },
        { kind: 'articulation', direction: 'neutral', script: '>' }
      ]
    });
  });

  it('leaves a bare tweak before the next note to that note', () => {
    const items = parseSequenceItems('{ c4 \\tweak color #red d4 }');
    expect(items.map((item) => item.kind)).toEqual(['note', 'tweak']);
    expect(items[0]).toMatchObject({ postEvents: [] });
  });
});

describe('parse errors', () => {
  it('reports an unclosed block at end of input', () => {
    expect(parse('{ c4')).toMatchObject({ ok: false, error: { kind: 'unexpectedEof', expected: "'}'" } });
  });

  it('reports the offset of an unexpected token', () => {
    expect(parse('{ c4 } }')).toMatchObject({
      ok: false,
      error: { kind: 'unexpected', found: "'}'", offset: 7, expected: 'music expression' }
    });
  });

  it('converts lexing failures into errors', () => {
    expect(parse('{ c4 @ }')).toMatchObject({
      ok: false,
      error: { kind: 'lex', message: "unexpected character '@'", offset: 5 }
    });
  });

  it('requires tempo text or a metronome mark', () => {
    expect(parse('{ \\tempo }')).toMatchObject({
      ok: false,
      error: { kind: 'unexpected', offset: 9, expected: 'tempo text or metronome mark' }
    });
  });

  it('stops at the nesting limit instead of exhausting the call stack', () => {
    const source = `${'{'.repeat(20000)} c4 ${'}'.repeat(20000)}`;
    expect(parse(source)).toMatchObject({
      ok: false,
      error: { kind: 'tooDeep', offset: MAX_NESTING_DEPTH, limit: MAX_NESTING_DEPTH }
    });
  });

  it('accepts music nested right up to the limit', () => {
    const depth = MAX_NESTING_DEPTH - 1;
    const result = parse(`${'{'.repeat(depth)} c4 ${'}'.repeat(depth)}`);
    expect(result.ok).toBe(true);
  });

  it('applies the nesting limit inside lyrics', () => {
    const source = `\\lyricmode ${'{ '.repeat(5000)}la${' }'.repeat(5000)}`;
    expect(parse(source)).toMatchObject({ ok: false, error: { kind: 'tooDeep', limit: MAX_NESTING_DEPTH } });
  });

  it('formats errors as one line', () => {
    expect(formatParseError({ kind: 'unexpectedEof', expected: "'}'" })).toBe("unexpected end of input, expected '}'");
    expect(formatParseError({ kind: 'lex', message: 'bad', offset: 3 })).toBe('lex error at offset 3: bad');
    expect(formatParseError({ kind: 'tooDeep', offset: 9, limit: 256 })).toBe(
      'music nested deeper than 256 levels at offset 9'
    );
  });
});

describe('parse warnings', () => {
  it('accepts mixed octave marks with a warning', () => {
    const result = parse("{ c','4 }");
    expect(result.warnings).toEqual([
      { kind: 'mixedOctaveMarks', offset: 3, message: 'mixed octave marks (2 up, 1 down)' }
    ]);
    expect(result.ok && result.file.items[0]).toMatchObject({
      music: { items: [{ pitch: pitch('c', 1) }] }
    });
  });

  it('moves octave marks written after the duration onto the pitch', () => {
    const result = parse("{ c4'' }");
    expect(result.warnings).toEqual([
      { kind: 'octaveAfterDuration', offset: 4, message: 'octave marks written after the duration' }
    ]);
    expect(result.ok && result.file.items[0]).toMatchObject({
      music: { items: [{ pitch: pitch('c', 2), duration: QUARTER }] }
    });
  });
});
