import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { BenchmarkRun } from './benchmarkRunner';
import { summarize } from './benchmarkRunner';
import { ResultWriter, toJson } from './resultWriter';

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), 'quest-results-'));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

const run: BenchmarkRun = {
  runId: 'run-1',
  candidate: 'replay',
  seed: 42,
  chainId: 56,
  startedAt: '2024-01-01T00:00:00.000Z',
  finishedAt: '2024-01-01T00:01:00.000Z',
  summary: summarize([]),
  results: [],
};

describe('toJson', () => {
  it('writes bigints as decimal strings', () => {
    expect(JSON.parse(toJson({ wei: 10n ** 18n, nested: [1n] }))).toEqual({
      wei: '1000000000000000000',
      nested: ['1'],
    });
  });
});

describe('ResultWriter', () => {
  it('writes results/<runId>.json into a directory it creates', async () => {
    const writer = new ResultWriter(join(dir, 'nested', 'results'));

    const path = await writer.write(run);

    expect(path).toBe(join(dir, 'nested', 'results', 'run-1.json'));
    const saved = JSON.parse(await readFile(path, 'utf8'));
    expect(saved.runId).toBe('run-1');
    expect(saved.summary.total).toBe(0);
    expect(saved.results).toEqual([]);
  });
});
