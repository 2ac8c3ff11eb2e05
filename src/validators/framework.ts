/**
 * Validator Framework
 *
 * A validator is an ordered list of weighted checks. Each check is a pure
 * function of the evidence collected for one attempt; running them yields
 * an append-only report with a score breakdown and feedback text.
 */

import { errorMessage } from '../errors';
import type { PreparedTransaction } from '../ledger/ledgerClient';
import type {
  AttemptEnvironment,
  CheckResult,
  FailureKind,
  ParameterInstance,
  QueryPayload,
  ReceiptInfo,
  StateSnapshot,
  TransactionIntent,
  ValidationReport,
} from '../types/harness';

// ============================================
// Types
// ============================================

export interface Evidence {
  intent?: TransactionIntent;
  /** The intent after normalization; absent when it never reached submission. */
  request?: PreparedTransaction;
  query?: QueryPayload;
  receipt?: ReceiptInfo;
  before?: StateSnapshot;
  after?: StateSnapshot;
  params: ParameterInstance;
  env: AttemptEnvironment;
}

export interface CheckOutcome {
  passed: boolean;
  message: string;
}

export interface CheckDefinition {
  readonly name: string;
  readonly weight: number;
  readonly critical: boolean;
  run(evidence: Evidence): CheckOutcome;
}

export function defineCheck(definition: {
  name: string;
  weight: number;
  critical?: boolean;
  run: (evidence: Evidence) => CheckOutcome;
}): CheckDefinition {
  if (!Number.isFinite(definition.weight) || definition.weight < 0) {
    throw new Error(`Check "${definition.name}" has an invalid weight: ${definition.weight}`);
  }
  return Object.freeze({
    name: definition.name,
    weight: definition.weight,
    critical: definition.critical ?? false,
    run: definition.run,
  });
}

export const pass = (message: string): CheckOutcome => ({ passed: true, message });
export const fail = (message: string): CheckOutcome => ({ passed: false, message });

export function asCritical(check: CheckDefinition): CheckDefinition {
  return check.critical ? check : defineCheck({ ...check, critical: true });
}

/** Re-weight checks by name; names with no matching check are ignored. */
export function withWeights(
  checks: readonly CheckDefinition[],
  overrides: Readonly<Record<string, number>> | undefined
): CheckDefinition[] {
  if (!overrides) return [...checks];
  return checks.map((check) => {
    const weight = overrides[check.name];
    return weight === undefined ? check : defineCheck({ ...check, weight });
  });
}

// ============================================
// Reports
// ============================================

export class ReportBuilder {
  private readonly results: CheckResult[] = [];

  add(result: CheckResult): this {
    this.results.push(Object.freeze({ ...result }));
    return this;
  }

  get checks(): readonly CheckResult[] {
    return this.results;
  }

  build(preamble?: string): ValidationReport {
    const checks = Object.freeze([...this.results]);
    const score = checks.reduce((sum, check) => sum + check.points, 0);
    const maxScore = checks.reduce((sum, check) => sum + check.maxPoints, 0);
    const passed = checks.length > 0 && checks.every((check) => !check.critical || check.passed);

    const lines: string[] = [];
    if (preamble) lines.push(preamble);
    const failed = checks.filter((check) => !check.passed);
    if (failed.length === 0) {
      lines.push('All checks passed.');
    } else {
      for (const check of failed) {
        lines.push(`- ${check.name}${check.critical ? ' (critical)' : ''}: ${check.message}`);
      }
    }
    lines.push(`Score: ${score}/${maxScore}`);

    return Object.freeze({ checks, score, maxScore, passed, feedback: lines.join('\n') });
  }
}

function evaluate(check: CheckDefinition, evidence: Evidence): CheckResult {
  let outcome: CheckOutcome;
  try {
    outcome = check.run(evidence);
  } catch (error) {
    outcome = fail(`check threw: ${errorMessage(error)}`);
  }
  return {
    name: check.name,
    passed: outcome.passed,
    critical: check.critical,
    points: outcome.passed ? check.weight : 0,
    maxPoints: check.weight,
    message: outcome.message,
  };
}

export function runChecks(checks: readonly CheckDefinition[], evidence: Evidence): ValidationReport {
  const builder = new ReportBuilder();
  for (const check of checks) {
    builder.add(evaluate(check, evidence));
  }
  return builder.build();
}

const DIAGNOSTICS_TAIL = 2000;

/**
 * Report for an attempt that never produced a usable result: every check
 * fails and the score is zero.
 */
export function failedReport(
  checks: readonly CheckDefinition[],
  failure: { kind: FailureKind; message: string; diagnostics?: string }
): ValidationReport {
  const builder = new ReportBuilder();
  for (const check of checks) {
    builder.add({
      name: check.name,
      passed: false,
      critical: check.critical,
      points: 0,
      maxPoints: check.weight,
      message: `not evaluated (${failure.kind})`,
    });
  }

  let preamble = `Execution failed (${failure.kind}): ${failure.message}`;
  if (failure.diagnostics) {
    const tail = failure.diagnostics.slice(-DIAGNOSTICS_TAIL).trimEnd();
    preamble += `\n--- diagnostics ---\n${tail}`;
  }
  return builder.build(preamble);
}
