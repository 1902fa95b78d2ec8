import { readFile } from 'node:fs/promises';

import type { Diagnostic } from '../core/diagnostics.js';
import type { ParseError } from '../parser/errors.js';
import { PARSE_ERROR_CODES, PARSE_WARNING_CODES, parseLilyPond, roundTripLilyPond } from '../public/api.js';
import { PIPELINE_STAGES, type ConformanceFixture, type FixtureMeta, type PipelineStage } from './conformance.js';

const PARSE_ERROR_STAGES: Record<ParseError['kind'], PipelineStage> = {
  lex: 'lex',
  unexpected: 'syntax',
  unexpectedEof: 'syntax',
  tooDeep: 'syntax'
};

const PARSE_ERROR_KINDS: readonly ParseError['kind'][] = ['lex', 'unexpected', 'unexpectedEof', 'tooDeep'];

/** Codes meaning the text produced no AST. */
const PARSE_ERROR_CODE_SET: ReadonlySet<string> = new Set(PARSE_ERROR_KINDS.map((kind) => PARSE_ERROR_CODES[kind]));

/**
 * Stage owning each parser diagnostic code. Warnings count as syntax when
 * strict mode escalates them; every other code comes from the validator.
 */
const PARSER_CODE_STAGES: ReadonlyMap<string, PipelineStage> = new Map([
  ...Object.values(PARSE_WARNING_CODES).map((code): [string, PipelineStage] => [code, 'syntax']),
  ...PARSE_ERROR_KINDS.map((kind): [string, PipelineStage] => [PARSE_ERROR_CODES[kind], PARSE_ERROR_STAGES[kind]])
]);

/** Diagnostic tagged with the pipeline stage that reported it. */
export interface StagedDiagnostic {
  stage: PipelineStage;
  diagnostic: Diagnostic;
}

export interface FixtureRun {
  fixture: ConformanceFixture;
  /** Parse, validation and round-trip diagnostics in the order reported. */
  diagnostics: StagedDiagnostic[];
  /** Earliest stage with an error; undefined when every stage passed. */
  failedStage?: PipelineStage;
  /** Undefined when the round trip did not run. */
  roundTripStable?: boolean;
  /** Disagreements with the fixture metadata; empty when the run conforms. */
  mismatches: string[];
}

export interface ConformanceSummary {
  runs: FixtureRun[];
  conforming: number;
  /** Active fixture count per earliest failing stage, with `none` for clean runs. */
  failedStages: Record<PipelineStage | 'none', number>;
}

function parserStage(code: string): PipelineStage {
  return PARSER_CODE_STAGES.get(code) ?? 'validation';
}

/**
 * Parse with validation, then serialize and reparse unless the text never
 * produced an AST, and compare the outcome with the fixture metadata.
 */
export async function runConformanceFixture(fixture: ConformanceFixture): Promise<FixtureRun> {
  const { meta, sourcePath } = fixture;
  const text = await readFile(sourcePath, 'utf8');

  const parsed = parseLilyPond(text, { sourceName: sourcePath, mode: meta.parse_mode ?? 'lenient', validate: true });
  const diagnostics = parsed.diagnostics.map((diagnostic): StagedDiagnostic => ({
    stage: parserStage(diagnostic.code),
    diagnostic
  }));

  let roundTripStable: boolean | undefined;
  const producedTree = !parsed.diagnostics.some((diagnostic) => PARSE_ERROR_CODE_SET.has(diagnostic.code));
  if (meta.round_trip !== false && producedTree) {
    const roundTrip = roundTripLilyPond(text, { sourceName: sourcePath });
    roundTripStable = roundTrip.stable;
    for (const diagnostic of roundTrip.diagnostics) {
      if (diagnostic.severity === 'error') {
        diagnostics.push({ stage: 'roundTrip', diagnostic });
      }
    }
  }

  const errorStages = new Set(
    diagnostics.filter((entry) => entry.diagnostic.severity === 'error').map((entry) => entry.stage)
  );
  const failedStage = PIPELINE_STAGES.find((stage) => errorStages.has(stage));

  return {
    fixture,
    diagnostics,
    failedStage,
    roundTripStable,
    mismatches: compareWithMeta(fixture.meta, diagnostics, failedStage)
  };
}

function compareWithMeta(
  meta: FixtureMeta,
  diagnostics: readonly StagedDiagnostic[],
  failedStage: PipelineStage | undefined
): string[] {
  const mismatches: string[] = [];

  const observed = failedStage === undefined ? 'pass' : 'fail';
  if (observed !== meta.expected) {
    const firstError = diagnostics.find((entry) => entry.diagnostic.severity === 'error');
    mismatches.push(
      firstError
        ? `expected ${meta.expected} but ${firstError.stage} reported ${firstError.diagnostic.code}`
        : `expected ${meta.expected} but every stage passed`
    );
  } else if (meta.fails_at !== undefined && meta.fails_at !== failedStage) {
    mismatches.push(`expected to fail at ${meta.fails_at} but failed at ${failedStage ?? 'no stage'}`);
  }

  const reported = new Set(diagnostics.map((entry) => entry.diagnostic.code));
  const missing = (meta.expected_codes ?? []).filter((code) => !reported.has(code));
  if (missing.length > 0) {
    mismatches.push(`missing ${missing.join(', ')}`);
  }
  return mismatches;
}

/** Run every active fixture in order. */
export async function runConformanceSuite(fixtures: readonly ConformanceFixture[]): Promise<ConformanceSummary> {
  const runs: FixtureRun[] = [];
  for (const fixture of fixtures) {
    if (fixture.meta.status === 'active') {
      runs.push(await runConformanceFixture(fixture));
    }
  }

  const failedStages: Record<PipelineStage | 'none', number> = { none: 0, lex: 0, syntax: 0, validation: 0, roundTrip: 0 };
  for (const run of runs) {
    failedStages[run.failedStage ?? 'none'] += 1;
  }

  return { runs, conforming: runs.filter((run) => run.mismatches.length === 0).length, failedStages };
}

/** `id: ok`, or the id followed by each mismatch and the error diagnostics with their positions. */
export function formatFixtureRun(run: FixtureRun): string {
  if (run.mismatches.length === 0) {
    return `${run.fixture.meta.id}: ok`;
  }

  const lines = [`${run.fixture.meta.id}: ${run.mismatches.join('; ')}`];
  for (const { stage, diagnostic } of run.diagnostics) {
    if (diagnostic.severity !== 'error') {
      continue;
    }
    const where = diagnostic.source ? ` at ${diagnostic.source.line}:${diagnostic.source.column}` : '';
    lines.push(`  ${stage} ${diagnostic.code}${where}: ${diagnostic.message}`);
  }
  return lines.join('\n');
}
