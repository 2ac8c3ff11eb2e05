/**
 * Result Writer
 * Persists a benchmark run as results/<runId>.json.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { BenchmarkRun } from './benchmarkRunner';

export interface RunWriter {
  write(run: BenchmarkRun): Promise<string>;
}

// bigint has no JSON form; wei values are written as decimal strings
function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, bigintReplacer, 2) + '\n';
}

export class ResultWriter implements RunWriter {
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  pathFor(runId: string): string {
    return join(this.dir, `${runId}.json`);
  }

  async write(run: BenchmarkRun): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const path = this.pathFor(run.runId);
    await writeFile(path, toJson(run), 'utf8');
    console.log(`[bench] Results written to ${path}`);
    return path;
  }
}
