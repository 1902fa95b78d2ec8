import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { parseLilyPond, roundTripLilyPond } from '../../src/public/index.js';
import { loadConformanceFixtures } from '../../src/testkit/conformance.js';

const fixtures = await loadConformanceFixtures(path.resolve('fixtures/conformance'));

describe('fixture round trips', () => {
  const active = fixtures.filter((fixture) => fixture.meta.status === 'active');

  it.each(active.map((fixture): [string, string] => [fixture.meta.id, fixture.sourcePath]))(
    '%s serializes to text that parses back to the same tree',
    async (_id, sourcePath) => {
      const text = await readFile(sourcePath, 'utf8');
      if (!parseLilyPond(text).file) {
        return;
      }

      const result = roundTripLilyPond(text);
      expect(result.diagnostics.filter((diagnostic) => diagnostic.severity === 'error')).toEqual([]);
      expect(result.stable).toBe(true);
    }
  );

  it('covers every parseable fixture', async () => {
    let parseable = 0;
    for (const fixture of active) {
      const text = await readFile(fixture.sourcePath, 'utf8');
      if (parseLilyPond(text).file) {
        parseable += 1;
      }
    }
    expect(parseable).toBe(active.length - 4);
  });
});
