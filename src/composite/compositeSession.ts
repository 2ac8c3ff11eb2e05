/**
 * Composite Session State Machine
 *
 * PLANNING -> EXECUTING -> FINALIZED
 *
 * Planning is unscored and costs no steps. Every step that reaches execution
 * is counted, successful or not. Finalization applies the efficiency factor
 * min(1, optimal / actual) to the goal score.
 */

import type { ValidationReport } from '../types/harness';

// ============================================
// States
// ============================================

export enum CompositeState {
  PLANNING = 'PLANNING',
  EXECUTING = 'EXECUTING',
  FINALIZED = 'FINALIZED',
}

const ALLOWED_TRANSITIONS: Record<CompositeState, readonly CompositeState[]> = {
  [CompositeState.PLANNING]: [CompositeState.EXECUTING],
  [CompositeState.EXECUTING]: [CompositeState.FINALIZED],
  [CompositeState.FINALIZED]: [],
};

export class InvalidTransitionError extends Error {
  constructor(from: CompositeState, to: CompositeState) {
    super(`Invalid composite session transition ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export interface CompositeOutcome {
  baseScore: number;
  maxScore: number;
  efficiencyFactor: number;
  finalScore: number;
  goalReport: ValidationReport;
}

// ============================================
// Scoring
// ============================================

export function computeEfficiencyFactor(optimalSteps: number, actualSteps: number): number {
  if (actualSteps <= 0) return 0;
  return Math.min(1, optimalSteps / actualSteps);
}

const roundScore = (value: number): number => Math.round(value * 100) / 100;

export function computeFinalScore(baseScore: number, optimalSteps: number, actualSteps: number): number {
  return roundScore(baseScore * computeEfficiencyFactor(optimalSteps, actualSteps));
}

// ============================================
// Session
// ============================================

export class CompositeSession {
  readonly problemId: string;
  readonly optimalSteps: number;
  readonly maxSteps: number;

  private current = CompositeState.PLANNING;
  private planned: readonly string[] = [];
  private readonly reports: ValidationReport[] = [];
  private outcome: CompositeOutcome | null = null;

  constructor(options: { problemId: string; optimalSteps: number; stepMultiplier: number }) {
    if (!Number.isInteger(options.optimalSteps) || options.optimalSteps < 1) {
      throw new Error(`optimalSteps must be a positive integer, got ${options.optimalSteps}`);
    }
    this.problemId = options.problemId;
    this.optimalSteps = options.optimalSteps;
    this.maxSteps = Math.max(options.optimalSteps, Math.floor(options.optimalSteps * options.stepMultiplier));
  }

  get state(): CompositeState {
    return this.current;
  }

  get plan(): readonly string[] {
    return this.planned;
  }

  get stepReports(): readonly ValidationReport[] {
    return this.reports;
  }

  get actualSteps(): number {
    return this.reports.length;
  }

  get atStepCap(): boolean {
    return this.reports.length >= this.maxSteps;
  }

  get result(): CompositeOutcome {
    if (!this.outcome) {
      throw new Error(`Composite session ${this.problemId} is not finalized`);
    }
    return this.outcome;
  }

  private transition(to: CompositeState): void {
    if (!ALLOWED_TRANSITIONS[this.current].includes(to)) {
      throw new InvalidTransitionError(this.current, to);
    }
    this.current = to;
  }

  private require(state: CompositeState, action: string): void {
    if (this.current !== state) {
      throw new Error(`Cannot ${action} while ${this.current}`);
    }
  }

  recordPlan(plan: readonly string[]): void {
    this.require(CompositeState.PLANNING, 'record a plan');
    this.planned = Object.freeze([...plan]);
  }

  beginExecution(): void {
    this.transition(CompositeState.EXECUTING);
  }

  recordStep(report: ValidationReport): void {
    this.require(CompositeState.EXECUTING, 'record a step');
    if (this.atStepCap) {
      throw new Error(`Composite session ${this.problemId} already reached ${this.maxSteps} steps`);
    }
    this.reports.push(report);
  }

  finalize(goalReport: ValidationReport): CompositeOutcome {
    this.transition(CompositeState.FINALIZED);
    const efficiencyFactor = computeEfficiencyFactor(this.optimalSteps, this.actualSteps);
    this.outcome = Object.freeze({
      baseScore: goalReport.score,
      maxScore: goalReport.maxScore,
      efficiencyFactor,
      finalScore: computeFinalScore(goalReport.score, this.optimalSteps, this.actualSteps),
      goalReport,
    });
    return this.outcome;
  }
}
