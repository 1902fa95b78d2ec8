import { mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { loadConformanceFixtures, type ConformanceFixture, type FixtureMeta } from '../../src/testkit/conformance.js';
import { formatFixtureRun, runConformanceFixture, runConformanceSuite } from '../../src/testkit/conformance-execution.js';

async function tempFixture(source: string, meta: Partial<FixtureMeta>): Promise<ConformanceFixture> {
  const tempDir = await mkdtemp(path.join(os.tmpdir(), 'lilypond-execution-'));
  const sourcePath = path.join(tempDir, 'case.ly');
  await writeFile(sourcePath, source, 'utf8');
  return {
    metaPath: path.join(tempDir, 'case.meta.yaml'),
    sourcePath,
    meta: { id: 'temp-case', source: 'test', category: 'temp', expected: 'pass', status: 'active', ...meta }
  };
}

describe('repository conformance suite', () => {
  it('matches every active fixture', async () => {
    const fixtures = await loadConformanceFixtures(path.resolve('fixtures/conformance'));
    const summary = await runConformanceSuite(fixtures);

    expect(summary.runs.filter((run) => run.mismatches.length > 0).map(formatFixtureRun)).toEqual([]);
    expect(summary.runs).toHaveLength(31);
    expect(summary.conforming).toBe(31);
    expect(summary.failedStages).toEqual({ none: 21, lex: 1, syntax: 4, validation: 5, roundTrip: 0 });
  });

  it('tags diagnostics with the stage that reported them', async () => {
    const fixtures = await loadConformanceFixtures(path.resolve('fixtures/conformance'));
    const byId = (id: string): ConformanceFixture | undefined => fixtures.find((fixture) => fixture.meta.id === id);

    const lexFixture = byId('errors-lex-error');
    const strictFixture = byId('validation-strict-warning');
    if (!lexFixture || !strictFixture) {
      throw new Error('missing repository fixtures');
    }

    const lexRun = await runConformanceFixture(lexFixture);
    expect(lexRun.failedStage).toBe('lex');
    expect(lexRun.roundTripStable).toBeUndefined();
    expect(lexRun.diagnostics.map((entry) => [entry.stage, entry.diagnostic.code])).toEqual([
      ['lex', 'LILYPOND_LEX_ERROR']
    ]);

    const strictRun = await runConformanceFixture(strictFixture);
    expect(strictRun.failedStage).toBe('syntax');
    expect(strictRun.roundTripStable).toBe(true);
    expect(strictRun.diagnostics.map((entry) => [entry.stage, entry.diagnostic.severity])).toEqual([['syntax', 'error']]);
  });
});

describe('fixture runs', () => {
  it('explains an unexpected failure with the stage and its diagnostics', async () => {
    const run = await runConformanceFixture(await tempFixture('{ c4 @ }', {}));

    expect(run.mismatches).toEqual(['expected pass but lex reported LILYPOND_LEX_ERROR']);
    expect(formatFixtureRun(run)).toBe(
      "temp-case: expected pass but lex reported LILYPOND_LEX_ERROR\n  lex LILYPOND_LEX_ERROR at 1:6: unexpected character '@'"
    );
  });

  it('reports an expected failure that did not happen', async () => {
    const run = await runConformanceFixture(await tempFixture('{ c4 }', { expected: 'fail' }));

    expect(run.failedStage).toBeUndefined();
    expect(run.mismatches).toEqual(['expected fail but every stage passed']);
  });

  it('checks the failing stage and the expected codes', async () => {
    const run = await runConformanceFixture(
      await tempFixture('{ c3 }', {
        expected: 'fail',
        fails_at: 'syntax',
        expected_codes: ['LILYPOND_INVALID_DURATION_BASE', 'LILYPOND_EXCESSIVE_DOTS']
      })
    );

    expect(run.failedStage).toBe('validation');
    expect(run.roundTripStable).toBe(true);
    expect(run.mismatches).toEqual([
      'expected to fail at syntax but failed at validation',
      'missing LILYPOND_EXCESSIVE_DOTS'
    ]);
  });

  it('skips the round trip when the fixture opts out', async () => {
    const run = await runConformanceFixture(await tempFixture('{ c4 }', { round_trip: false }));

    expect(run.roundTripStable).toBeUndefined();
    expect(run.diagnostics).toEqual([]);
    expect(formatFixtureRun(run)).toBe('temp-case: ok');
  });

  it('runs only active fixtures and counts the failing stages', async () => {
    const passing = await tempFixture('{ c4 }', {});
    const failing = await tempFixture('{ c4', { id: 'temp-broken' });
    const skipped = await tempFixture('{ c4 }', { id: 'temp-skipped', status: 'skip' });
    const summary = await runConformanceSuite([passing, failing, skipped]);

    expect(summary.runs.map((run) => run.fixture.meta.id)).toEqual(['temp-case', 'temp-broken']);
    expect(summary.conforming).toBe(1);
    expect(summary.failedStages).toEqual({ none: 1, lex: 0, syntax: 1, validation: 0, roundTrip: 0 });
    expect(summary.runs[1]?.mismatches).toEqual(['expected pass but syntax reported LILYPOND_UNEXPECTED_EOF']);
  });
});
