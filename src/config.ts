/**
 * Harness Configuration
 * Centralized config for the fork, the skill runner and scoring tolerances
 *
 * Values come from the environment, validated once at load time.
 */

import type { Address, Hex } from 'viem';
import { isAddress, isHex } from 'viem';
import { z } from 'zod';

// Load environment variables FIRST (before reading process.env)
import { config } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const PROJECT_ROOT = resolve(__dirname, '..');

// Precedence: .env.local → .env (first successful load wins)
const envFiles = [resolve(PROJECT_ROOT, '.env.local'), resolve(PROJECT_ROOT, '.env')];

let loadedEnvFile: string | null = null;
for (const envFile of envFiles) {
  const result = config({ path: envFile });
  if (!result.error) {
    loadedEnvFile = envFile;
    break;
  }
}

export function getLoadedEnvFile(): string | null {
  return loadedEnvFile;
}

// ============================================
// Schema
// ============================================

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const ratioFromEnv = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

const addressFromEnv = (fallback: Address) =>
  z
    .string()
    .default(fallback)
    .refine((value) => isAddress(value), { message: 'must be a 20-byte hex address' })
    .transform((value): Address => (isAddress(value) ? value : fallback));

const privateKeyFromEnv = z
  .string()
  .optional()
  .refine((value) => value === undefined || (isHex(value) && value.length === 66), {
    message: 'must be a 32-byte 0x-prefixed hex key',
  })
  .transform((value): Hex | undefined => (value !== undefined && isHex(value) ? value : undefined));

const decimalString = z
  .string()
  .regex(/^\d+(\.\d+)?$/, 'must be a non-negative decimal amount');

const HarnessEnvSchema = z.object({
  QUEST_FORK_URL: z.string().url().default('https://bsc-dataseed.binance.org'),
  QUEST_CHAIN_ID: intFromEnv(56, 1),
  QUEST_ANVIL_BIN: z.string().min(1).default('anvil'),
  QUEST_ANVIL_HOST: z.string().min(1).default('127.0.0.1'),
  QUEST_ANVIL_PORT: intFromEnv(0),
  QUEST_ANVIL_CUPS: intFromEnv(1000, 1),
  QUEST_STARTUP_TIMEOUT_MS: intFromEnv(30000, 1),
  QUEST_SKILL_TIMEOUT_MS: intFromEnv(60000, 1),
  QUEST_KILL_GRACE_MS: intFromEnv(2000),
  QUEST_SUBMISSION_TIMEOUT_MS: intFromEnv(30000, 1),
  QUEST_RECEIPT_POLL_MS: intFromEnv(250, 1),
  QUEST_FUNDING_NATIVE: decimalString.default('100'),
  QUEST_FIXTURE_MANIFEST: z.string().default('fixtures/fixtures.json'),
  QUEST_ARTIFACTS_DIR: z.string().default('contracts/out'),
  QUEST_CATALOGUE_DIR: z.string().default('catalogue'),
  QUEST_RESULTS_DIR: z.string().default('results'),
  QUEST_LOG_DIR: z.string().default('logs'),
  QUEST_SKILL_WORKDIR: z.string().default('.skill-runs'),
  QUEST_COMPOSITE_STEP_MULTIPLIER: intFromEnv(2, 1),
  QUEST_AMOUNT_TOLERANCE: ratioFromEnv(0.001),
  QUEST_BALANCE_TOLERANCE: ratioFromEnv(0.01),
  QUEST_WRAPPED_NATIVE: addressFromEnv('0xbb4CdB9CBd36B01bD1cBaEBF2De08d9173bc095c'),
  QUEST_IDENTITY_KEY: privateKeyFromEnv,
  QUEST_SEED: z.coerce.number().int().optional(),
  QUEST_TELEMETRY: z.enum(['on', 'off']).default('on'),
});

export interface HarnessConfig {
  forkUrl: string;
  chainId: number;
  anvil: {
    bin: string;
    host: string;
    port: number;
    computeUnitsPerSecond: number;
  };
  timeouts: {
    startupMs: number;
    skillMs: number;
    killGraceMs: number;
    submissionMs: number;
    receiptPollMs: number;
  };
  fundingNative: string;
  paths: {
    fixtureManifest: string;
    artifactsDir: string;
    catalogueDir: string;
    resultsDir: string;
    logDir: string;
    skillWorkDir: string;
  };
  compositeStepMultiplier: number;
  tolerances: {
    amount: number;
    balance: number;
  };
  wrappedNative: Address;
  identityKey?: Hex;
  seed?: number;
  telemetryEnabled: boolean;
}

function fromRoot(path: string): string {
  return resolve(PROJECT_ROOT, path);
}

/**
 * Validate an environment map into a frozen HarnessConfig.
 * Throws with every offending key listed when validation fails.
 */
export function loadHarnessConfig(
  env: Record<string, string | undefined> = process.env
): HarnessConfig {
  const parsed = HarnessEnvSchema.safeParse(pickQuestKeys(env));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`[config] Invalid harness configuration: ${issues}`);
  }
  const e = parsed.data;

  return Object.freeze({
    forkUrl: e.QUEST_FORK_URL,
    chainId: e.QUEST_CHAIN_ID,
    anvil: Object.freeze({
      bin: e.QUEST_ANVIL_BIN,
      host: e.QUEST_ANVIL_HOST,
      port: e.QUEST_ANVIL_PORT,
      computeUnitsPerSecond: e.QUEST_ANVIL_CUPS,
    }),
    timeouts: Object.freeze({
      startupMs: e.QUEST_STARTUP_TIMEOUT_MS,
      skillMs: e.QUEST_SKILL_TIMEOUT_MS,
      killGraceMs: e.QUEST_KILL_GRACE_MS,
      submissionMs: e.QUEST_SUBMISSION_TIMEOUT_MS,
      receiptPollMs: e.QUEST_RECEIPT_POLL_MS,
    }),
    fundingNative: e.QUEST_FUNDING_NATIVE,
    paths: Object.freeze({
      fixtureManifest: fromRoot(e.QUEST_FIXTURE_MANIFEST),
      artifactsDir: fromRoot(e.QUEST_ARTIFACTS_DIR),
      catalogueDir: fromRoot(e.QUEST_CATALOGUE_DIR),
      resultsDir: fromRoot(e.QUEST_RESULTS_DIR),
      logDir: fromRoot(e.QUEST_LOG_DIR),
      skillWorkDir: fromRoot(e.QUEST_SKILL_WORKDIR),
    }),
    compositeStepMultiplier: e.QUEST_COMPOSITE_STEP_MULTIPLIER,
    tolerances: Object.freeze({
      amount: e.QUEST_AMOUNT_TOLERANCE,
      balance: e.QUEST_BALANCE_TOLERANCE,
    }),
    wrappedNative: e.QUEST_WRAPPED_NATIVE,
    identityKey: e.QUEST_IDENTITY_KEY,
    seed: e.QUEST_SEED,
    telemetryEnabled: e.QUEST_TELEMETRY === 'on',
  });
}

// Empty strings from .env files count as unset
function pickQuestKeys(env: Record<string, string | undefined>): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('QUEST_') && value !== undefined && value.trim() !== '') {
      picked[key] = value.trim();
    }
  }
  return picked;
}
