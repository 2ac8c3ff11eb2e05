/**
 * Composite Workflow Orchestrator
 *
 * Flow, all inside one isolation bracket:
 * 1. Problem setup, then read the goal's state targets (initial snapshot)
 * 2. Optional planning round (unscored, costs no steps)
 * 3. Execution rounds until the candidate signals done or the step cap.
 *    Step n is scored by the n-th catalogue step validator, when one is named
 * 4. Read final state, run the goal checks over initial vs final, finalize
 */

import { v4 as uuidv4 } from 'uuid';
import type { CandidateStep, CompositeCandidate, StepHistoryEntry } from '../candidates/types';
import { buildPlanningPrompt, buildStepPrompt, buildSystemPrompt } from '../catalogue/promptBuilder';
import { errorMessage, isEnvironmentFatal } from '../errors';
import type { AttemptInput } from '../harness/attemptRunner';
import type { StepDependencies } from '../harness/stepExecution';
import { executeSource } from '../harness/stepExecution';
import { createAttemptLogger } from '../telemetry/logger';
import type { AttemptLogger } from '../telemetry/logger';
import type {
  ErrorCategory,
  ExecutionResult,
  ParameterInstance,
  ReceiptInfo,
  ResultArtifact,
  StateTarget,
  ValidationReport,
} from '../types/harness';
import { querySucceeded, transactionSucceeded } from '../validators/checks';
import type { CheckDefinition, Evidence } from '../validators/framework';
import { failedReport, runChecks } from '../validators/framework';
import type { ValidatorRegistry } from '../validators/registry';
import type { Tolerances } from '../validators/types';
import { CompositeSession } from './compositeSession';
import { resolveStepParams } from './stepParams';

export interface CompositeOrchestratorOptions extends StepDependencies {
  registry: ValidatorRegistry;
  tolerances: Tolerances;
  stepMultiplier: number;
  runId?: string;
}

interface StepRecord {
  validator: string | null;
  result: ExecutionResult;
  receipt?: ReceiptInfo;
  report: ValidationReport;
}

/** Checks and state targets for one catalogue step, bound to this attempt. */
interface StepScoring {
  validator: string;
  params: ParameterInstance;
  targets: StateTarget[];
  checks: CheckDefinition[];
}

const STEP_WEIGHT = 100;

function genericChecks(result: ExecutionResult): CheckDefinition[] {
  return [result.kind === 'query' ? querySucceeded(STEP_WEIGHT) : transactionSucceeded(STEP_WEIGHT)];
}

function scoreStep(result: ExecutionResult, evidence: Evidence, scoring: StepScoring | undefined): ValidationReport {
  const checks = scoring ? scoring.checks : genericChecks(result);
  if (result.kind === 'failure') {
    return failedReport(checks, {
      kind: result.failureKind,
      message: result.message,
      diagnostics: result.diagnostics,
    });
  }
  return runChecks(checks, evidence);
}

function compositeCategory(goal: ValidationReport, steps: readonly StepRecord[]): ErrorCategory {
  if (steps.length === 0) return 'execution';
  if (goal.score >= goal.maxScore) return 'none';
  if (steps.some((step) => step.result.kind === 'failure')) return 'execution';
  if (steps.some((step) => step.receipt !== undefined && !step.receipt.success)) return 'submission';
  return 'validation';
}

export class CompositeOrchestrator {
  private readonly options: CompositeOrchestratorOptions;

  constructor(options: CompositeOrchestratorOptions) {
    this.options = options;
  }

  async run(input: AttemptInput, candidate: CompositeCandidate): Promise<ResultArtifact> {
    const { problem, params, taskPrompt, env, system } = input;
    const { host } = this.options;
    if (problem.optimalStepCount === undefined) {
      throw new Error(`Composite problem ${problem.id} has no optimalStepCount`);
    }

    const startedAt = Date.now();
    const logger = createAttemptLogger({ runId: this.options.runId, attemptId: uuidv4(), problemId: problem.id });
    const bound = this.options.registry.bind(problem, this.options.tolerances);
    const ctx = bound.context(params, env);
    const goalChecks = bound.checks(ctx);
    const targets = bound.stateTargets(ctx);
    const stepScoring = (problem.steps ?? []).map((step): StepScoring => {
      const stepBound = this.options.registry.bindStep(problem, step, this.options.tolerances);
      const stepCtx = stepBound.context(resolveStepParams(step, params, env), env);
      return {
        validator: stepBound.validatorId,
        params: stepCtx.params,
        targets: stepBound.stateTargets(stepCtx),
        checks: stepBound.checks(stepCtx),
      };
    });

    const session = new CompositeSession({
      problemId: problem.id,
      optimalSteps: problem.optimalStepCount,
      stepMultiplier: this.options.stepMultiplier,
    });
    const warnings: string[] = [];
    const records: StepRecord[] = [];
    let signalledDone = false;

    await host.isolate(async () => {
      await bound.prepare(host, ctx);
      const initial = await host.readState(targets);

      if (problem.planning) {
        session.recordPlan(await this.plan(input, candidate, warnings, logger));
      }
      session.beginExecution();

      const history: StepHistoryEntry[] = [];
      const stepSystemPrompt = buildSystemPrompt(system, env, 'step');

      while (!session.atStepCap) {
        const step = session.actualSteps + 1;
        let next: CandidateStep;
        try {
          next = await candidate.nextStep({
            problem,
            systemPrompt: stepSystemPrompt,
            prompt: buildStepPrompt({ taskPrompt, step, maxSteps: session.maxSteps, plan: session.plan, history }),
            step,
            plan: session.plan,
            history: [...history],
            env,
          });
        } catch (error) {
          if (isEnvironmentFatal(error)) throw error;
          warnings.push(`step ${step}: candidate failed to produce code: ${errorMessage(error)}`);
          console.warn(`[composite] ${problem.id} step ${step}: ${errorMessage(error)}`);
          break;
        }
        if (next.done) {
          signalledDone = true;
          break;
        }

        const scoring = stepScoring.at(step - 1);
        const execution = await executeSource(next.source, env, scoring?.targets ?? [], this.options, logger);
        const report = scoreStep(
          execution.result,
          { ...execution.evidence, params: scoring?.params ?? params, env },
          scoring
        );
        session.recordStep(report);
        records.push({
          validator: scoring?.validator ?? null,
          result: execution.result,
          receipt: execution.evidence.receipt,
          report,
        });
        warnings.push(...execution.result.warnings);
        history.push({ step, resultKind: execution.result.kind, feedback: report.feedback });

        logger.log('composite_step', {
          step,
          resultKind: execution.result.kind,
          failureKind: execution.result.kind === 'failure' ? execution.result.failureKind : undefined,
          txHash: execution.evidence.receipt?.transactionHash,
          validator: scoring?.validator,
          score: report.score,
          success: report.passed,
        });
      }

      const final = await host.readState(targets);
      session.finalize(runChecks(goalChecks, { before: initial, after: final, params, env }));
    });

    const outcome = session.result;
    const hitStepCap = session.atStepCap && !signalledDone;
    if (hitStepCap) {
      console.warn(`[composite] ${problem.id} reached the step cap (${session.maxSteps})`);
    }
    logger.log('composite_finalized', {
      step: session.actualSteps,
      score: outcome.finalScore,
      maxScore: outcome.maxScore,
      success: outcome.goalReport.passed,
    });

    const last = records.at(-1);
    const lastTransaction = [...records].reverse().find((record) => record.receipt !== undefined);
    const efficiencyNote = `Steps: ${session.actualSteps}/${session.optimalSteps} optimal (efficiency ${outcome.efficiencyFactor.toFixed(2)}), final score ${outcome.finalScore}/${outcome.maxScore}`;

    return {
      problemId: problem.id,
      category: problem.category,
      prompt: taskPrompt,
      parameters: params,
      executionSuccess: records.length > 0 && records.every((record) => record.result.kind !== 'failure'),
      resultKind: last ? last.result.kind : 'none',
      errorCategory: compositeCategory(outcome.goalReport, records),
      error: records.length === 0 ? 'no step was executed' : undefined,
      score: outcome.finalScore,
      maxScore: outcome.maxScore,
      passed: outcome.goalReport.passed && outcome.efficiencyFactor === 1,
      checks: outcome.goalReport.checks,
      feedback: `${outcome.goalReport.feedback}\n${efficiencyNote}`,
      durationMs: Date.now() - startedAt,
      warnings,
      transactionHash: lastTransaction?.receipt?.transactionHash,
      composite: {
        steps: session.actualSteps,
        optimalSteps: session.optimalSteps,
        maxSteps: session.maxSteps,
        efficiencyFactor: outcome.efficiencyFactor,
        baseScore: outcome.baseScore,
        plan: session.plan,
        stepReports: session.stepReports,
        stepValidators: records.map((record) => record.validator),
        hitStepCap,
      },
    };
  }

  private async plan(
    input: AttemptInput,
    candidate: CompositeCandidate,
    warnings: string[],
    logger: AttemptLogger
  ): Promise<string[]> {
    try {
      const plan = await candidate.plan({
        problem: input.problem,
        systemPrompt: buildSystemPrompt(input.system, input.env, 'planning'),
        prompt: buildPlanningPrompt(input.taskPrompt),
      });
      logger.log('composite_planned', { notes: plan });
      return plan;
    } catch (error) {
      if (isEnvironmentFatal(error)) throw error;
      warnings.push(`planning failed: ${errorMessage(error)}`);
      console.warn(`[composite] ${input.problem.id} planning failed: ${errorMessage(error)}`);
      return [];
    }
  }
}
