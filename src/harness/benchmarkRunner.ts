/**
 * Benchmark Runner
 * Runs a selection of catalogue problems against one candidate: atomic
 * problems first, then composites, one ResultArtifact each.
 *
 * An EnvironmentFatalError halts the batch. The results gathered so far are
 * written before the error is rethrown.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Candidate } from '../candidates/types';
import type { Catalogue } from '../catalogue/catalogueLoader';
import { generateParameters } from '../catalogue/parameterGenerator';
import { renderTaskPrompt } from '../catalogue/promptBuilder';
import { CompositeOrchestrator } from '../composite/compositeOrchestrator';
import type { EnvironmentFatalCode } from '../errors';
import { errorMessage, isEnvironmentFatal } from '../errors';
import { logEvent } from '../telemetry/logger';
import type {
  ErrorCategory,
  ParameterInstance,
  ProblemCategory,
  ProblemDefinition,
  ResultArtifact,
} from '../types/harness';
import { createRandom } from '../utils/seededRandom';
import type { ValidatorRegistry } from '../validators/registry';
import type { Tolerances } from '../validators/types';
import { AttemptRunner } from './attemptRunner';
import type { RunWriter } from './resultWriter';
import type { StepDependencies } from './stepExecution';
import { environmentOf } from './stepExecution';

// ============================================
// Types
// ============================================

export interface ProblemSelection {
  problemIds?: readonly string[];
  category?: ProblemCategory;
}

export interface CategoryTotals {
  total: number;
  passed: number;
  averageScore: number;
}

export interface RunSummary {
  total: number;
  passed: number;
  failed: number;
  /** Percentage of artifacts that passed, 0-100. */
  passRate: number;
  totalScore: number;
  averageScore: number;
  errorCategories: Record<ErrorCategory, number>;
  atomic: CategoryTotals;
  composite: CategoryTotals;
}

export interface RunHalt {
  code: EnvironmentFatalCode;
  message: string;
  problemId: string;
}

export interface BenchmarkRun {
  runId: string;
  candidate: string;
  seed: number;
  chainId: number;
  startedAt: string;
  finishedAt: string;
  halted?: RunHalt;
  summary: RunSummary;
  results: ResultArtifact[];
}

export interface BenchmarkRunnerOptions extends StepDependencies {
  catalogue: Catalogue;
  registry: ValidatorRegistry;
  tolerances: Tolerances;
  stepMultiplier: number;
  seed: number;
  runId?: string;
  writer?: RunWriter;
}

// ============================================
// Selection and summary
// ============================================

/**
 * Catalogue order, atomic before composite. Unknown ids throw CatalogueError.
 */
export function selectProblems(catalogue: Catalogue, selection: ProblemSelection = {}): ProblemDefinition[] {
  const wanted = selection.problemIds ? new Set(selection.problemIds.map((id) => catalogue.get(id).id)) : null;
  const picked = catalogue.problems.filter(
    (problem) =>
      (wanted === null || wanted.has(problem.id)) &&
      (selection.category === undefined || problem.category === selection.category)
  );
  return [
    ...picked.filter((problem) => problem.category === 'atomic'),
    ...picked.filter((problem) => problem.category === 'composite'),
  ];
}

const round2 = (value: number): number => Math.round(value * 100) / 100;

function totalsFor(results: readonly ResultArtifact[]): CategoryTotals {
  const score = results.reduce((sum, result) => sum + result.score, 0);
  return {
    total: results.length,
    passed: results.filter((result) => result.passed).length,
    averageScore: results.length === 0 ? 0 : round2(score / results.length),
  };
}

export function summarize(results: readonly ResultArtifact[]): RunSummary {
  const errorCategories: Record<ErrorCategory, number> = { none: 0, validation: 0, submission: 0, execution: 0 };
  for (const result of results) {
    errorCategories[result.errorCategory] += 1;
  }
  const overall = totalsFor(results);
  const totalScore = round2(results.reduce((sum, result) => sum + result.score, 0));

  return {
    total: overall.total,
    passed: overall.passed,
    failed: overall.total - overall.passed,
    passRate: overall.total === 0 ? 0 : round2((overall.passed / overall.total) * 100),
    totalScore,
    averageScore: overall.averageScore,
    errorCategories,
    atomic: totalsFor(results.filter((result) => result.category === 'atomic')),
    composite: totalsFor(results.filter((result) => result.category === 'composite')),
  };
}

const ABORTED_MAX_SCORE = 100;

/**
 * Artifact for an attempt that threw before it could be scored, such as a
 * parameter that names an undeployed fixture.
 */
function abortedArtifact(
  problem: ProblemDefinition,
  params: ParameterInstance,
  prompt: string,
  error: unknown,
  startedAt: number
): ResultArtifact {
  const message = errorMessage(error);
  return {
    problemId: problem.id,
    category: problem.category,
    prompt,
    parameters: params,
    executionSuccess: false,
    resultKind: 'none',
    errorCategory: 'execution',
    error: message,
    score: 0,
    maxScore: ABORTED_MAX_SCORE,
    passed: false,
    checks: [],
    feedback: `Attempt aborted: ${message}`,
    durationMs: Date.now() - startedAt,
    warnings: [],
  };
}

// ============================================
// Runner
// ============================================

export class BenchmarkRunner {
  private readonly options: BenchmarkRunnerOptions;

  constructor(options: BenchmarkRunnerOptions) {
    this.options = options;
  }

  async run(candidate: Candidate, selection: ProblemSelection = {}): Promise<BenchmarkRun> {
    const { catalogue, seed, host } = this.options;
    const runId = this.options.runId ?? uuidv4();
    const problems = selectProblems(catalogue, selection);
    const random = createRandom(seed);
    const env = environmentOf(host);
    const startedAt = new Date().toISOString();

    const stepOptions = { ...this.options, runId };
    const attempts = new AttemptRunner(stepOptions);
    const composites = new CompositeOrchestrator(stepOptions);
    const results: ResultArtifact[] = [];

    const record = (halted?: RunHalt): BenchmarkRun => ({
      runId,
      candidate: candidate.name,
      seed,
      chainId: env.chainId,
      startedAt,
      finishedAt: new Date().toISOString(),
      halted,
      summary: summarize(results),
      results: [...results],
    });

    console.log(`[bench] Run ${runId}: ${problems.length} problems, candidate ${candidate.name}, seed ${seed}`);

    for (const [index, problem] of problems.entries()) {
      const attemptStart = Date.now();
      let params: ParameterInstance = {};
      let prompt = '';
      let artifact: ResultArtifact;

      try {
        params = generateParameters(problem.parameters, random, env);
        prompt = renderTaskPrompt(problem, params, random);
        const input = { problem, params, taskPrompt: prompt, system: catalogue.system, env };
        artifact =
          problem.category === 'composite'
            ? await composites.run(input, candidate)
            : await attempts.run(input, candidate);
      } catch (error) {
        if (isEnvironmentFatal(error)) {
          console.error(`[bench] Environment failure on ${problem.id} (${error.code}): ${error.message}`);
          logEvent('error', { runId, problemId: problem.id, error: error.message });
          const partial = record({ code: error.code, message: error.message, problemId: problem.id });
          try {
            await this.persist(partial);
          } catch (writeError) {
            console.error('[bench] Could not write partial results:', writeError);
          }
          throw error;
        }
        console.warn(`[bench] ${problem.id} aborted: ${errorMessage(error)}`);
        artifact = abortedArtifact(problem, params, prompt, error, attemptStart);
      }

      results.push(artifact);
      console.log(
        `[bench] (${index + 1}/${problems.length}) ${problem.id}: ${artifact.score}/${artifact.maxScore} [${artifact.errorCategory}]`
      );
    }

    const run = record();
    logEvent('run_complete', {
      runId,
      score: run.summary.averageScore,
      notes: [`${run.summary.passed}/${run.summary.total} passed`],
    });
    await this.persist(run);
    return run;
  }

  private async persist(run: BenchmarkRun): Promise<void> {
    if (this.options.writer) {
      await this.options.writer.write(run);
    }
  }
}
