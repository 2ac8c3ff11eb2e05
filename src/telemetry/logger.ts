/**
 * Telemetry Logger
 * Writes JSON lines to logs/telemetry.jsonl for run observability.
 * Fail open: a logging problem never aborts a benchmark run.
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { join, dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

// ESM-safe __dirname equivalent
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Repo-relative default: src/telemetry -> logs
const DEFAULT_LOG_DIR = resolve(__dirname, '../../logs');

let logDir = process.env.QUEST_LOG_DIR ? resolve(process.env.QUEST_LOG_DIR) : DEFAULT_LOG_DIR;
let enabled = process.env.QUEST_TELEMETRY !== 'off';
let logDirReady: boolean | null = null;

/**
 * Telemetry event types
 */
export type TelemetryEventType =
  | 'fork_started'
  | 'fork_stopped'
  | 'fork_restarted'
  | 'account_funded'
  | 'fixtures_deployed'
  | 'snapshot_taken'
  | 'snapshot_reverted'
  | 'skill_started'
  | 'skill_finished'
  | 'skill_timeout'
  | 'tx_submitted'
  | 'tx_confirmed'
  | 'tx_failed'
  | 'tx_timeout'
  | 'attempt_scored'
  | 'composite_planned'
  | 'composite_step'
  | 'composite_finalized'
  | 'run_complete'
  | 'error';

/**
 * Telemetry event payload
 */
export interface TelemetryPayload {
  runId?: string;
  attemptId?: string;
  problemId?: string;

  // Fork
  rpcUrl?: string;
  pid?: number;
  snapshotId?: string;

  // Skill execution
  resultKind?: string;
  failureKind?: string;

  // Transaction info
  txHash?: string;
  blockNumber?: string;
  gasUsed?: string;

  // Outcome
  validator?: string;
  success?: boolean;
  score?: number;
  maxScore?: number;
  step?: number;
  error?: string;

  latencyMs?: number;
  notes?: string[];
}

/**
 * Point telemetry at another directory, or switch it off.
 */
export function configureTelemetry(options: { logDir?: string; enabled?: boolean }): void {
  if (options.logDir !== undefined) {
    logDir = resolve(options.logDir);
    logDirReady = null;
  }
  if (options.enabled !== undefined) {
    enabled = options.enabled;
  }
}

export function getTelemetryFile(): string {
  return join(logDir, 'telemetry.jsonl');
}

function ensureLogDir(): boolean {
  if (logDirReady !== null) return logDirReady;
  try {
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
    logDirReady = true;
  } catch (e) {
    console.warn('[telemetry] Could not create log directory (telemetry disabled):', e);
    logDirReady = false;
  }
  return logDirReady;
}

/**
 * Log a telemetry event
 */
export function logEvent(type: TelemetryEventType, payload: TelemetryPayload = {}): void {
  if (!enabled || !ensureLogDir()) {
    return;
  }

  const line = JSON.stringify({ ts: new Date().toISOString(), type, ...payload }) + '\n';

  try {
    appendFileSync(getTelemetryFile(), line, { encoding: 'utf8' });
  } catch (writeError) {
    console.warn('[telemetry] Write failed, disabling telemetry for this session:', writeError);
    logDirReady = false;
    return;
  }

  if (process.env.QUEST_TELEMETRY_CONSOLE === 'true') {
    console.log(`[telemetry] ${type}:`, JSON.stringify(payload));
  }
}

/**
 * Create a scoped logger for one scoring attempt
 */
export function createAttemptLogger(context: {
  runId?: string;
  attemptId: string;
  problemId: string;
}) {
  const startTime = Date.now();

  return {
    log: (type: TelemetryEventType, payload: TelemetryPayload = {}) => {
      logEvent(type, {
        runId: context.runId,
        attemptId: context.attemptId,
        problemId: context.problemId,
        latencyMs: Date.now() - startTime,
        ...payload,
      });
    },
  };
}

export type AttemptLogger = ReturnType<typeof createAttemptLogger>;
