import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';

import type { ParserMode } from '../public/diagnostic-context.js';

/** Pipeline stage a fixture run can stop at. */
export type PipelineStage = 'lex' | 'syntax' | 'validation' | 'roundTrip';

export const PIPELINE_STAGES: readonly PipelineStage[] = ['lex', 'syntax', 'validation', 'roundTrip'];

/** Sidecar `<name>.meta.yaml` describing one `.ly` or `.ily` fixture. */
export interface FixtureMeta {
  id: string;
  source: string;
  category: string;
  expected: 'pass' | 'fail';
  status: 'active' | 'skip';
  parse_mode?: ParserMode;
  /** First stage expected to report an error. */
  fails_at?: PipelineStage;
  /** Codes that must be among the reported diagnostics. */
  expected_codes?: string[];
  /** Run the serialize and reparse cycle. Defaults to true. */
  round_trip?: boolean;
  notes?: string;
}

export interface ConformanceFixture {
  metaPath: string;
  sourcePath: string;
  meta: FixtureMeta;
}

export class ConformanceMetadataError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`${filePath}: ${message}`);
    this.name = 'ConformanceMetadataError';
    this.filePath = filePath;
  }
}

interface FieldRule<T> {
  accepts: (value: unknown) => value is T;
  description: string;
}

const text: FieldRule<string> = {
  accepts: (value): value is string => typeof value === 'string' && value.trim() !== '',
  description: 'a non-empty string'
};

const flag: FieldRule<boolean> = {
  accepts: (value): value is boolean => typeof value === 'boolean',
  description: 'true or false'
};

const codeList: FieldRule<string[]> = {
  accepts: (value): value is string[] => Array.isArray(value) && value.every((item) => typeof item === 'string'),
  description: 'a list of diagnostic codes'
};

function oneOf<T extends string>(options: readonly T[]): FieldRule<T> {
  return {
    accepts: (value): value is T => options.some((option) => option === value),
    description: `one of ${options.join(', ')}`
  };
}

const META_SUFFIX = '.meta.yaml';
const SOURCE_EXTENSIONS = ['.ly', '.ily'];

function readField<T>(filePath: string, input: Record<string, unknown>, key: string, rule: FieldRule<T>): T {
  const value = input[key];
  if (!rule.accepts(value)) {
    throw new ConformanceMetadataError(filePath, `'${key}' must be ${rule.description}`);
  }
  return value;
}

function readOptionalField<T>(
  filePath: string,
  input: Record<string, unknown>,
  key: string,
  rule: FieldRule<T>
): T | undefined {
  return input[key] === undefined || input[key] === null ? undefined : readField(filePath, input, key, rule);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Check decoded sidecar YAML against the metadata fields. */
export function parseFixtureMeta(filePath: string, input: unknown): FixtureMeta {
  if (!isRecord(input)) {
    throw new ConformanceMetadataError(filePath, 'metadata must be a YAML mapping');
  }

  const meta: FixtureMeta = {
    id: readField(filePath, input, 'id', text),
    source: readField(filePath, input, 'source', text),
    category: readField(filePath, input, 'category', text),
    expected: readField(filePath, input, 'expected', oneOf(['pass', 'fail'])),
    status: readField(filePath, input, 'status', oneOf(['active', 'skip']))
  };

  const parseMode = readOptionalField(filePath, input, 'parse_mode', oneOf<ParserMode>(['strict', 'lenient']));
  if (parseMode !== undefined) {
    meta.parse_mode = parseMode;
  }
  const failsAt = readOptionalField(filePath, input, 'fails_at', oneOf(PIPELINE_STAGES));
  if (failsAt !== undefined) {
    meta.fails_at = failsAt;
  }
  const expectedCodes = readOptionalField(filePath, input, 'expected_codes', codeList);
  if (expectedCodes !== undefined) {
    meta.expected_codes = expectedCodes;
  }
  const roundTrip = readOptionalField(filePath, input, 'round_trip', flag);
  if (roundTrip !== undefined) {
    meta.round_trip = roundTrip;
  }
  const notes = readOptionalField(filePath, input, 'notes', text);
  if (notes !== undefined) {
    meta.notes = notes;
  }

  if (meta.fails_at !== undefined && meta.expected === 'pass') {
    throw new ConformanceMetadataError(filePath, "'fails_at' needs 'expected: fail'");
  }
  return meta;
}

/** Every sidecar under `rootDir` with the source file beside it, sorted by id. */
export async function loadConformanceFixtures(rootDir: string): Promise<ConformanceFixture[]> {
  const files = new Set(await readdir(rootDir, { recursive: true }));
  const fixtures: ConformanceFixture[] = [];

  for (const file of [...files].filter((name) => name.endsWith(META_SUFFIX))) {
    const metaPath = path.join(rootDir, file);
    const stem = file.slice(0, -META_SUFFIX.length);
    const source = SOURCE_EXTENSIONS.map((extension) => stem + extension).find((name) => files.has(name));
    if (source === undefined) {
      throw new ConformanceMetadataError(metaPath, `no ${SOURCE_EXTENSIONS.join(' or ')} file beside the metadata`);
    }

    const meta = parseFixtureMeta(metaPath, parseYaml(await readFile(metaPath, 'utf8')));
    fixtures.push({ metaPath, sourcePath: path.join(rootDir, source), meta });
  }

  return fixtures.sort((left, right) => left.meta.id.localeCompare(right.meta.id));
}
