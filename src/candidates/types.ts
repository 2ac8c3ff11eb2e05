/**
 * Sources of candidate code. A candidate only produces source text; running
 * and scoring it is the harness's job.
 */

import type { AttemptEnvironment, ProblemDefinition } from '../types/harness';

export interface AtomicRequest {
  problem: ProblemDefinition;
  systemPrompt: string;
  prompt: string;
  env: AttemptEnvironment;
}

export interface PlanningRequest {
  problem: ProblemDefinition;
  systemPrompt: string;
  prompt: string;
}

export interface StepHistoryEntry {
  step: number;
  resultKind: 'transaction' | 'query' | 'failure';
  feedback: string;
}

export interface StepRequest {
  problem: ProblemDefinition;
  systemPrompt: string;
  prompt: string;
  /** 1-based */
  step: number;
  plan: readonly string[];
  history: readonly StepHistoryEntry[];
  env: AttemptEnvironment;
}

export type CandidateStep = { done: true } | { done: false; source: string };

export interface AtomicCandidate {
  readonly name: string;
  generate(request: AtomicRequest): Promise<string>;
}

export interface CompositeCandidate {
  readonly name: string;
  plan(request: PlanningRequest): Promise<string[]>;
  nextStep(request: StepRequest): Promise<CandidateStep>;
}

export type Candidate = AtomicCandidate & CompositeCandidate;
