#!/usr/bin/env npx tsx
/**
 * Benchmark CLI
 *
 * Starts a fork, deploys the fixtures, runs the selected catalogue problems
 * against one candidate and writes results/<runId>.json.
 *
 * Usage:
 *   npx tsx scripts/run-bench.ts --candidate replay --solutions solutions/
 *   npx tsx scripts/run-bench.ts --candidate llm --problems native-transfer,erc20-approve --seed 7
 *
 * Flags:
 *   --candidate replay|llm    where code comes from (default: replay)
 *   --solutions <dir>         replay directory (default: solutions)
 *   --problems a,b            only these problem ids
 *   --category atomic|composite
 *   --seed <n>                parameter/template seed (default: QUEST_SEED or the clock)
 *   --run-id <id>             results file name (default: a uuid)
 *
 * Exit codes: 0 run complete, 1 environment failure or bad arguments.
 */

import { resolve } from 'path';
import { parseEther } from 'viem';
import { generatePrivateKey, privateKeyToAccount } from 'viem/accounts';
import type { Candidate } from '../src/candidates/types';
import { LlmCandidate } from '../src/candidates/llmCandidate';
import { ReplayCandidate } from '../src/candidates/replayCandidate';
import { loadCatalogue } from '../src/catalogue/catalogueLoader';
import { COMPOSITE_GOALS } from '../src/composite/goals';
import { PROJECT_ROOT, getLoadedEnvFile, loadHarnessConfig } from '../src/config';
import { errorMessage, isEnvironmentFatal } from '../src/errors';
import { foundryArtifactLoader, loadFixtureManifest } from '../src/fork/fixtureManifest';
import { LedgerForkController, forkSettingsFromConfig } from '../src/fork/forkController';
import type { ProblemSelection } from '../src/harness/benchmarkRunner';
import { BenchmarkRunner } from '../src/harness/benchmarkRunner';
import { ResultWriter } from '../src/harness/resultWriter';
import { getProvider } from '../src/services/llmClient';
import { CodeExecutionBridge } from '../src/skill/skillBridge';
import { configureTelemetry } from '../src/telemetry/logger';
import type { ProblemCategory } from '../src/types/harness';
import { BUILTIN_VALIDATORS } from '../src/validators/problems';
import { ValidatorRegistry } from '../src/validators/registry';

function argValue(flag: string): string | undefined {
  const index = process.argv.indexOf(flag);
  return index >= 0 ? process.argv[index + 1] : undefined;
}

function usage(message: string): never {
  console.error(`[bench] ${message}`);
  console.error('Usage: npx tsx scripts/run-bench.ts [--candidate replay|llm] [--solutions dir] [--problems a,b]');
  console.error('                                     [--category atomic|composite] [--seed n] [--run-id id]');
  process.exit(1);
}

function parseCategory(value: string | undefined): ProblemCategory | undefined {
  if (value === undefined) return undefined;
  if (value === 'atomic' || value === 'composite') return value;
  return usage(`--category must be atomic or composite, got "${value}"`);
}

function parseSeed(value: string | undefined, fallback: number | undefined): number {
  if (value === undefined) return fallback ?? Date.now() % 2 ** 32;
  const seed = Number(value);
  if (!Number.isSafeInteger(seed)) {
    return usage(`--seed must be an integer, got "${value}"`);
  }
  return seed;
}

function createCandidate(kind: string, solutionsDir: string): Candidate {
  switch (kind) {
    case 'replay':
      return new ReplayCandidate(resolve(solutionsDir));
    case 'llm':
      return new LlmCandidate({ name: `llm:${getProvider()}` });
    default:
      return usage(`unknown candidate "${kind}"`);
  }
}

async function main() {
  const config = loadHarnessConfig();
  configureTelemetry({ logDir: config.paths.logDir, enabled: config.telemetryEnabled });

  const candidate = createCandidate(argValue('--candidate') ?? 'replay', argValue('--solutions') ?? 'solutions');
  const selection: ProblemSelection = {
    problemIds: argValue('--problems')
      ?.split(',')
      .map((id) => id.trim())
      .filter((id) => id.length > 0),
    category: parseCategory(argValue('--category')),
  };
  const seed = parseSeed(argValue('--seed'), config.seed);

  console.log('='.repeat(80));
  console.log('Quest Bench');
  console.log('='.repeat(80));
  console.log(`Env file:      ${getLoadedEnvFile() ?? '(none)'}`);
  console.log(`Fork source:   ${config.forkUrl}`);
  console.log(`Candidate:     ${candidate.name}`);
  console.log(`Seed:          ${seed}`);
  console.log('='.repeat(80));

  const registry = new ValidatorRegistry([...BUILTIN_VALIDATORS, ...COMPOSITE_GOALS]);
  const catalogue = await loadCatalogue(config.paths.catalogueDir, (id) => registry.has(id));
  const manifest = await loadFixtureManifest(config.paths.fixtureManifest);

  const identity = privateKeyToAccount(config.identityKey ?? generatePrivateKey());
  const controller = new LedgerForkController({
    settings: forkSettingsFromConfig(config),
    identity,
    manifest,
    artifactLoader: foundryArtifactLoader(config.paths.artifactsDir),
  });

  await controller.start();
  try {
    await controller.fundAccount(identity.address, parseEther(config.fundingNative));
    const fixtures = await controller.deployFixtures();
    console.log(`[bench] Identity ${identity.address}, ${Object.keys(fixtures).length} fixtures`);

    const runner = new BenchmarkRunner({
      host: controller,
      bridge: new CodeExecutionBridge({
        workDir: config.paths.skillWorkDir,
        cwd: PROJECT_ROOT,
        timeoutMs: config.timeouts.skillMs,
        killGraceMs: config.timeouts.killGraceMs,
      }),
      catalogue,
      registry,
      tolerances: config.tolerances,
      stepMultiplier: config.compositeStepMultiplier,
      seed,
      runId: argValue('--run-id'),
      submissionTimeoutMs: config.timeouts.submissionMs,
      receiptPollMs: config.timeouts.receiptPollMs,
      writer: new ResultWriter(config.paths.resultsDir),
    });

    const run = await runner.run(candidate, selection);
    const { summary } = run;

    console.log('\n' + '='.repeat(80));
    console.log('SUMMARY');
    console.log('='.repeat(80));
    console.log(`Problems:        ${summary.total} (atomic ${summary.atomic.total}, composite ${summary.composite.total})`);
    console.log(`Passed:          ${summary.passed} (${summary.passRate}%)`);
    console.log(`Average score:   ${summary.averageScore}`);
    console.log(
      `Errors:          execution ${summary.errorCategories.execution}, submission ${summary.errorCategories.submission}, validation ${summary.errorCategories.validation}`
    );
  } finally {
    await controller.stop();
  }
}

main()
  .then(() => process.exit(0))
  .catch((error) => {
    if (isEnvironmentFatal(error)) {
      console.error(`[bench] Environment failure (${error.code}): ${error.message}`);
    } else {
      console.error('[bench] Fatal error:', errorMessage(error));
    }
    process.exit(1);
  });
