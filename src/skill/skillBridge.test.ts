import { tmpdir } from 'os';
import { join } from 'path';
import { describe, expect, it } from 'vitest';
import type { Address } from 'viem';
import { readQuantity } from '../utils/amounts';
import { CodeExecutionBridge, parseRunnerOutput } from './skillBridge';

const AGENT: Address = '0x00000000000000000000000000000000000000a1';
const TOKEN: Address = '0x00000000000000000000000000000000000000f1';

describe('parseRunnerOutput', () => {
  it('uses only the last non-empty stdout line', () => {
    const stdout = 'stray output\n{"success":true,"result":{"balances":{"BNB":"1"}}}\n\n';
    const result = parseRunnerOutput(stdout, '', 12);
    expect(result.kind).toBe('query');
    expect(result.durationMs).toBe(12);
  });

  it('reports a protocol failure when stdout is empty', () => {
    const result = parseRunnerOutput('', 'segfault', 5, 139);
    expect(result).toMatchObject({
      kind: 'failure',
      failureKind: 'protocol',
      message: 'Runner produced no result line (exit code 139)',
      diagnostics: 'segfault',
    });
  });

  it('reports a protocol failure when the last line is not JSON', () => {
    const result = parseRunnerOutput('{"success":true}\nhello', '', 1);
    expect(result).toMatchObject({
      kind: 'failure',
      failureKind: 'protocol',
      message: "Runner's last stdout line is not JSON: hello",
    });
  });

  it('rejects envelopes without a known shape', () => {
    const result = parseRunnerOutput('{"success":false,"error":"x","errorKind":"weird"}', '', 1);
    expect(result).toMatchObject({ kind: 'failure', failureKind: 'protocol' });
  });

  it('maps a failure envelope onto the failure kind and joins stack with stderr', () => {
    const stdout = JSON.stringify({ success: false, error: 'boom', stack: 'Error: boom', errorKind: 'runtime' });
    const result = parseRunnerOutput(stdout, 'log line', 3);
    expect(result).toMatchObject({
      kind: 'failure',
      failureKind: 'runtime',
      message: 'boom',
      diagnostics: 'Error: boom\n--- stderr ---\nlog line',
    });
  });
});

describe('CodeExecutionBridge', () => {
  const bridge = new CodeExecutionBridge({
    workDir: join(tmpdir(), 'quest-bridge-test'),
    cwd: process.cwd(),
    timeoutMs: 10_000,
    killGraceMs: 1000,
  });

  const run = (source: string, timeoutMs?: number) =>
    bridge.run({
      source,
      rpcUrl: 'http://127.0.0.1:8545',
      agentAddress: AGENT,
      fixtures: { 'fixture-token': TOKEN },
      timeoutMs,
    });

  it('returns a transaction intent with bigint values re-encoded as decimal strings', async () => {
    const result = await run(`
      export async function executeSkill(providerUrl: string, agent: string, contracts: Record<string, string>) {
        console.log('building transfer for', agent);
        return { to: contracts['fixture-token'], value: 10n ** 18n, data: '0x' };
      }
    `);

    expect(result.kind).toBe('transaction');
    if (result.kind !== 'transaction') return;
    expect(result.intent.to).toBe(TOKEN);
    expect(result.intent.value).toBe('1000000000000000000');
    expect(readQuantity(result.intent.value)).toBe(10n ** 18n);
  });

  it('passes the provider URL and agent address through', async () => {
    const result = await run(`
      export async function executeSkill(providerUrl: string, agent: string) {
        return JSON.stringify({ query_result: true, providerUrl, agent });
      }
    `);

    expect(result.kind).toBe('query');
    if (result.kind !== 'query') return;
    expect(result.payload.providerUrl).toBe('http://127.0.0.1:8545');
    expect(result.payload.agent).toBe(AGENT);
  });

  it('ignores noise the candidate writes straight to stdout', async () => {
    const result = await run(`
      export async function executeSkill() {
        process.stdout.write('partial line without newline');
        return { success: true, balance_raw: '5' };
      }
    `);
    expect(result.kind).toBe('query');
  });

  it('reports thrown errors as runtime failures with the stack attached', async () => {
    const result = await run(`
      export async function executeSkill() {
        throw new Error('boom');
      }
    `);

    expect(result).toMatchObject({ kind: 'failure', failureKind: 'runtime', message: 'boom' });
    if (result.kind !== 'failure') return;
    expect(result.diagnostics).toContain('Error: boom');
  });

  it('reports a module without an entry point', async () => {
    const result = await run(`export const answer = 42;`);
    expect(result).toMatchObject({ kind: 'failure', failureKind: 'entry_point' });
  });

  it('times out a promise that never settles', async () => {
    const result = await run(
      `export function executeSkill() { return new Promise(() => undefined); }`,
      500
    );
    expect(result).toMatchObject({ kind: 'failure', failureKind: 'timeout' });
  });

  it('kills a candidate that blocks the event loop', async () => {
    const result = await run(
      `export function executeSkill() { for (;;) { /* spin */ } }`,
      300
    );

    expect(result).toMatchObject({
      kind: 'failure',
      failureKind: 'timeout',
      message: 'Skill killed after exceeding 300ms',
    });
    expect(result.durationMs).toBeLessThan(15_000);
  });

  it('reports a spawn failure from the launcher', async () => {
    const failing = new CodeExecutionBridge({
      workDir: join(tmpdir(), 'quest-bridge-test'),
      cwd: process.cwd(),
      timeoutMs: 1000,
      launcher: () => {
        throw new Error('EMFILE');
      },
    });
    const result = await failing.run({
      source: 'export function executeSkill() { return {}; }',
      rpcUrl: 'http://127.0.0.1:8545',
      agentAddress: AGENT,
      fixtures: {},
    });
    expect(result).toMatchObject({
      kind: 'failure',
      failureKind: 'spawn',
      message: 'Could not start runner: EMFILE',
    });
  });
});
