import { describe, expect, it } from 'vitest';

import { isKnownClef, NOTATION_NAMES, parseNotationNames } from '../../src/core/notation-names.js';

const MINIMAL_TABLES = {
  dynamics: ['p'],
  ornaments: ['trill'],
  contextTypes: ['Staff'],
  clefs: ['bass'],
  keyModes: ['major'],
  drumPitches: ['bd'],
  units: ['mm']
};

describe('notation name tables', () => {
  it('loads the bundled tables', () => {
    expect(NOTATION_NAMES.dynamics.has('sfz')).toBe(true);
    expect(NOTATION_NAMES.drumPitches.has('hihat')).toBe(true);
    expect(NOTATION_NAMES.drumPitches.has('sn')).toBe(true);
    expect(NOTATION_NAMES.units.has('cm')).toBe(true);
  });

  it('builds lookup sets from well-formed input', () => {
    const tables = parseNotationNames(MINIMAL_TABLES);
    expect([...tables.drumPitches]).toEqual(['bd']);
    expect(tables.keyModes.has('minor')).toBe(false);
  });

  it('rejects input that is not an object', () => {
    expect(() => parseNotationNames(['p'])).toThrow('notation name tables must be a JSON object');
    expect(() => parseNotationNames(null)).toThrow('notation name tables must be a JSON object');
  });

  it('names the table with the wrong shape', () => {
    expect(() => parseNotationNames({ ...MINIMAL_TABLES, clefs: 'bass' })).toThrow(
      "notation name table 'clefs' must be an array of strings"
    );
    expect(() => parseNotationNames({ ...MINIMAL_TABLES, units: ['mm', 3] })).toThrow(
      "notation name table 'units' must be an array of strings"
    );
  });

  it('requires every table', () => {
    const { drumPitches: _omitted, ...partial } = MINIMAL_TABLES;
    expect(() => parseNotationNames(partial)).toThrow("notation name table 'drumPitches' must be an array of strings");
  });

  it('recognizes clefs with transposition suffixes', () => {
    expect(isKnownClef('treble_8')).toBe(true);
    expect(isKnownClef('bass^(15)')).toBe(true);
    expect(isKnownClef('treble_9')).toBe(false);
  });
});
