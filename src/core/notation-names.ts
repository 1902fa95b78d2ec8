import { readFileSync } from 'node:fs';

/** Read-only lookup tables of recognized LilyPond names. */
export interface NotationNameTables {
  dynamics: ReadonlySet<string>;
  ornaments: ReadonlySet<string>;
  contextTypes: ReadonlySet<string>;
  clefs: ReadonlySet<string>;
  keyModes: ReadonlySet<string>;
  /** Drum instrument names written as note heads in `\drummode`. */
  drumPitches: ReadonlySet<string>;
  units: ReadonlySet<string>;
}

type TableKey = keyof NotationNameTables;

const TABLES_URL = new URL('../../data/notation-names.json', import.meta.url);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function readNameList(input: Record<string, unknown>, key: TableKey): ReadonlySet<string> {
  const value = input[key];
  if (!isStringArray(value)) {
    throw new Error(`notation name table '${key}' must be an array of strings`);
  }
  return new Set(value);
}

/** Check the shape of decoded table JSON and build the lookup sets. */
export function parseNotationNames(input: unknown): NotationNameTables {
  if (!isRecord(input)) {
    throw new Error('notation name tables must be a JSON object');
  }

  return {
    dynamics: readNameList(input, 'dynamics'),
    ornaments: readNameList(input, 'ornaments'),
    contextTypes: readNameList(input, 'contextTypes'),
    clefs: readNameList(input, 'clefs'),
    keyModes: readNameList(input, 'keyModes'),
    drumPitches: readNameList(input, 'drumPitches'),
    units: readNameList(input, 'units')
  };
}

export const NOTATION_NAMES: NotationNameTables = parseNotationNames(JSON.parse(readFileSync(TABLES_URL, 'utf8')));

/** Clef transposition suffix such as `_8`, `^15` or `_(8)`. */
const CLEF_TRANSPOSITION = /[_^]\(?(?:8|15)\)?$/;

/** True for a recognized clef, with or without an octave transposition suffix. */
export function isKnownClef(name: string): boolean {
  return NOTATION_NAMES.clefs.has(name.replace(CLEF_TRANSPOSITION, ''));
}
