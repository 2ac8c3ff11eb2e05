/**
 * Attempt Runner
 * Drives one atomic problem: generate code, run it inside the isolation
 * bracket, validate, and fold the outcome into a single ResultArtifact.
 *
 * Error categories:
 *   execution  - generation error, bridge failure or malformed intent; score 0
 *   submission - the transaction was rejected or reverted; scored by the checks
 *   validation - checks ran and some failed
 *   none       - full score
 */

import { v4 as uuidv4 } from 'uuid';
import type { AtomicCandidate } from '../candidates/types';
import type { SystemPrompts } from '../catalogue/catalogueLoader';
import { buildSystemPrompt } from '../catalogue/promptBuilder';
import { errorMessage, isEnvironmentFatal } from '../errors';
import { createAttemptLogger } from '../telemetry/logger';
import type {
  AttemptEnvironment,
  ErrorCategory,
  ExecutionResult,
  ParameterInstance,
  ProblemDefinition,
  ReceiptInfo,
  ResultArtifact,
  ValidationReport,
} from '../types/harness';
import { failedReport, runChecks } from '../validators/framework';
import type { ValidatorRegistry } from '../validators/registry';
import type { Tolerances } from '../validators/types';
import type { StepDependencies } from './stepExecution';
import { executeSource } from './stepExecution';

export interface AttemptRunnerOptions extends StepDependencies {
  registry: ValidatorRegistry;
  tolerances: Tolerances;
  runId?: string;
}

export interface AttemptInput {
  problem: ProblemDefinition;
  params: ParameterInstance;
  taskPrompt: string;
  system: SystemPrompts;
  env: AttemptEnvironment;
}

export function categorize(result: ExecutionResult, receipt: ReceiptInfo | undefined, report: ValidationReport): ErrorCategory {
  if (result.kind === 'failure') return 'execution';
  if (receipt && !receipt.success) return 'submission';
  return report.score < report.maxScore ? 'validation' : 'none';
}

export class AttemptRunner {
  private readonly options: AttemptRunnerOptions;

  constructor(options: AttemptRunnerOptions) {
    this.options = options;
  }

  async run(input: AttemptInput, candidate: AtomicCandidate): Promise<ResultArtifact> {
    const { problem, params, taskPrompt, env } = input;
    const startedAt = Date.now();
    const logger = createAttemptLogger({ runId: this.options.runId, attemptId: uuidv4(), problemId: problem.id });

    const bound = this.options.registry.bind(problem, this.options.tolerances);
    const ctx = bound.context(params, env);
    const checks = bound.checks(ctx);
    const targets = bound.stateTargets(ctx);

    const base = {
      problemId: problem.id,
      category: problem.category,
      prompt: taskPrompt,
      parameters: params,
    };

    let source: string;
    try {
      source = await candidate.generate({
        problem,
        systemPrompt: buildSystemPrompt(input.system, env, 'atomic'),
        prompt: taskPrompt,
        env,
      });
    } catch (error) {
      if (isEnvironmentFatal(error)) throw error;
      const message = errorMessage(error);
      console.warn(`[bench] ${problem.id}: candidate ${candidate.name} failed to generate code: ${message}`);
      const report = failedReport(checks, { kind: 'generation', message });
      logger.log('attempt_scored', { resultKind: 'none', failureKind: 'generation', score: 0, maxScore: report.maxScore });
      return {
        ...base,
        executionSuccess: false,
        resultKind: 'none',
        errorCategory: 'execution',
        error: message,
        score: 0,
        maxScore: report.maxScore,
        passed: false,
        checks: report.checks,
        feedback: report.feedback,
        durationMs: Date.now() - startedAt,
        warnings: [],
      };
    }

    const { result, report, receipt } = await this.options.host.isolate(async () => {
      await bound.prepare(this.options.host, ctx);
      const step = await executeSource(source, env, targets, this.options, logger);
      const validation =
        step.result.kind === 'failure'
          ? failedReport(checks, {
              kind: step.result.failureKind,
              message: step.result.message,
              diagnostics: step.result.diagnostics,
            })
          : runChecks(checks, { ...step.evidence, params, env });
      return { result: step.result, report: validation, receipt: step.evidence.receipt };
    });

    const errorCategory = categorize(result, receipt, report);
    const error = result.kind === 'failure' ? result.message : receipt?.success === false ? receipt.error : undefined;

    logger.log('attempt_scored', {
      resultKind: result.kind,
      failureKind: result.kind === 'failure' ? result.failureKind : undefined,
      txHash: receipt?.transactionHash,
      success: report.passed,
      score: report.score,
      maxScore: report.maxScore,
    });

    return {
      ...base,
      executionSuccess: result.kind !== 'failure',
      resultKind: result.kind,
      errorCategory,
      error,
      score: report.score,
      maxScore: report.maxScore,
      passed: report.passed,
      checks: report.checks,
      feedback: report.feedback,
      durationMs: Date.now() - startedAt,
      warnings: result.warnings,
      transactionHash: receipt?.transactionHash,
    };
  }
}
