/**
 * Code Execution Bridge
 * Runs one candidate source unit in a fresh Node.js process (tsx loader),
 * enforces the wall-clock limit and normalizes the outcome.
 */

import type { ChildProcess } from 'child_process';
import { spawn } from 'child_process';
import { mkdir, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { v4 as uuidv4 } from 'uuid';
import type { Address } from 'viem';
import { z } from 'zod';
import { logEvent } from '../telemetry/logger';
import type { ExecutionResult, FailureKind, FixtureRegistry } from '../types/harness';
import { classifyResult } from './resultClassifier';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_RUNNER_PATH = join(__dirname, 'skillRunner.ts');

const OUTPUT_CAP_BYTES = 1024 * 1024;
const DIAGNOSTICS_CAP = 16 * 1024;

export interface SkillRunRequest {
  source: string;
  rpcUrl: string;
  agentAddress: Address;
  fixtures: FixtureRegistry;
  timeoutMs?: number;
}

export type SkillLauncher = (command: string, args: string[], cwd: string) => ChildProcess;

export interface CodeExecutionBridgeOptions {
  workDir: string;
  /** Directory the child runs in; packages imported by candidate code resolve from here. */
  cwd: string;
  timeoutMs: number;
  killGraceMs?: number;
  runnerPath?: string;
  keepFiles?: boolean;
  launcher?: SkillLauncher;
}

const RunnerEnvelopeSchema = z.discriminatedUnion('success', [
  z.object({ success: z.literal(true), result: z.unknown() }),
  z.object({
    success: z.literal(false),
    error: z.string(),
    stack: z.string().optional(),
    errorKind: z.enum(['timeout', 'runtime', 'entry_point', 'protocol']),
  }),
]);

const defaultLauncher: SkillLauncher = (command, args, cwd) =>
  spawn(command, args, {
    cwd,
    stdio: ['ignore', 'pipe', 'pipe'],
    env: { ...process.env },
  });

function tail(text: string, max = DIAGNOSTICS_CAP): string {
  return text.length > max ? text.slice(-max) : text;
}

function failure(
  failureKind: FailureKind,
  message: string,
  durationMs: number,
  diagnostics?: string
): ExecutionResult {
  return {
    kind: 'failure',
    failureKind,
    message,
    diagnostics: diagnostics ? tail(diagnostics) : undefined,
    warnings: [],
    durationMs,
  };
}

/**
 * Interpret the runner's stdout. Only the last non-empty line is data;
 * everything before it, and all of stderr, is diagnostics.
 */
export function parseRunnerOutput(
  stdout: string,
  stderr: string,
  durationMs: number,
  exitCode: number | null = 0
): ExecutionResult {
  const lines = stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  const last = lines.at(-1);

  if (last === undefined) {
    return failure('protocol', `Runner produced no result line (exit code ${exitCode ?? 'signal'})`, durationMs, stderr);
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(last);
  } catch {
    return failure('protocol', `Runner's last stdout line is not JSON: ${last.slice(0, 200)}`, durationMs, stderr);
  }

  const envelope = RunnerEnvelopeSchema.safeParse(decoded);
  if (!envelope.success) {
    return failure('protocol', `Runner envelope is malformed: ${envelope.error.issues[0]?.message ?? 'unknown'}`, durationMs, stderr);
  }

  if (!envelope.data.success) {
    const { errorKind, error, stack } = envelope.data;
    const diagnostics = [stack, stderr].filter((part): part is string => Boolean(part)).join('\n--- stderr ---\n');
    return failure(errorKind, error, durationMs, diagnostics);
  }

  return classifyResult(envelope.data.result, { durationMs, diagnostics: stderr ? tail(stderr) : undefined });
}

export class CodeExecutionBridge {
  private readonly options: Required<Omit<CodeExecutionBridgeOptions, 'launcher'>> & { launcher: SkillLauncher };

  constructor(options: CodeExecutionBridgeOptions) {
    this.options = {
      killGraceMs: 2000,
      runnerPath: DEFAULT_RUNNER_PATH,
      keepFiles: false,
      launcher: defaultLauncher,
      ...options,
    };
  }

  async run(request: SkillRunRequest): Promise<ExecutionResult> {
    const timeoutMs = request.timeoutMs ?? this.options.timeoutMs;
    const runId = uuidv4();
    const runDir = join(this.options.workDir, runId);
    const codeFile = join(runDir, 'skill.ts');

    await mkdir(runDir, { recursive: true });
    await writeFile(codeFile, request.source, 'utf8');
    logEvent('skill_started', { attemptId: runId });

    try {
      return await this.spawnRunner(codeFile, request, timeoutMs);
    } finally {
      if (!this.options.keepFiles) {
        await rm(runDir, { recursive: true, force: true }).catch((error: unknown) => {
          console.warn(`[bridge] Could not remove ${runDir}:`, error);
        });
      }
    }
  }

  private spawnRunner(codeFile: string, request: SkillRunRequest, timeoutMs: number): Promise<ExecutionResult> {
    const args = [
      '--import',
      'tsx',
      this.options.runnerPath,
      codeFile,
      request.rpcUrl,
      request.agentAddress,
      JSON.stringify(request.fixtures),
      String(timeoutMs),
    ];
    const startedAt = Date.now();
    const hardLimitMs = timeoutMs + this.options.killGraceMs;

    return new Promise<ExecutionResult>((resolvePromise) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const settle = (result: ExecutionResult) => {
        if (settled) return;
        settled = true;
        if (killTimer !== undefined) {
          clearTimeout(killTimer);
        }
        if (result.kind === 'failure' && result.failureKind === 'timeout') {
          logEvent('skill_timeout', { latencyMs: result.durationMs });
        }
        logEvent('skill_finished', {
          resultKind: result.kind,
          failureKind: result.kind === 'failure' ? result.failureKind : undefined,
          latencyMs: result.durationMs,
        });
        resolvePromise(result);
      };

      let child: ChildProcess;
      try {
        child = this.options.launcher(process.execPath, args, this.options.cwd);
      } catch (error) {
        settle(failure('spawn', `Could not start runner: ${error instanceof Error ? error.message : String(error)}`, 0));
        return;
      }

      killTimer = setTimeout(() => {
        timedOut = true;
        console.warn(`[bridge] Skill exceeded ${hardLimitMs}ms, killing pid ${child.pid ?? 'n/a'}`);
        child.kill('SIGKILL');
      }, hardLimitMs);

      child.stdout?.on('data', (chunk: Buffer) => {
        stdout = tail(stdout + chunk.toString(), OUTPUT_CAP_BYTES);
      });
      child.stderr?.on('data', (chunk: Buffer) => {
        stderr = tail(stderr + chunk.toString(), OUTPUT_CAP_BYTES);
      });

      child.on('error', (error) => {
        settle(failure('spawn', `Runner process error: ${error.message}`, Date.now() - startedAt, stderr));
      });

      child.on('close', (code) => {
        const durationMs = Date.now() - startedAt;
        if (timedOut) {
          settle(failure('timeout', `Skill killed after exceeding ${timeoutMs}ms`, durationMs, stderr));
          return;
        }
        settle(parseRunnerOutput(stdout, stderr, durationMs, code));
      });
    });
  }
}
