/**
 * Candidate that replays stored solutions from disk:
 *   <dir>/<problem-id>.ts              atomic
 *   <dir>/<problem-id>/plan.json       composite plan (optional)
 *   <dir>/<problem-id>/step-<n>.ts     composite steps; the first missing step ends the run
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { AtomicRequest, Candidate, CandidateStep, PlanningRequest, StepRequest } from './types';

const PlanFileSchema = z.array(z.string());

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
}

export class ReplayCandidate implements Candidate {
  readonly name = 'replay';
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  async generate(request: AtomicRequest): Promise<string> {
    const path = join(this.dir, `${request.problem.id}.ts`);
    const source = await readOptional(path);
    if (source === null) {
      throw new Error(`No stored solution at ${path}`);
    }
    return source;
  }

  async plan(request: PlanningRequest): Promise<string[]> {
    const path = join(this.dir, request.problem.id, 'plan.json');
    const text = await readOptional(path);
    if (text === null) return [];
    const parsed = PlanFileSchema.safeParse(JSON.parse(text));
    if (!parsed.success) {
      throw new Error(`${path} must be a JSON array of strings`);
    }
    return parsed.data;
  }

  async nextStep(request: StepRequest): Promise<CandidateStep> {
    const source = await readOptional(join(this.dir, request.problem.id, `step-${request.step}.ts`));
    return source === null ? { done: true } : { done: false, source };
  }
}
