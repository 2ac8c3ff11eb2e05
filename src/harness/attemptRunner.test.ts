import { describe, expect, it } from 'vitest';
import type { Address } from 'viem';
import { getAddress, parseEther, parseGwei } from 'viem';
import type { AtomicCandidate } from '../candidates/types';
import type { SystemPrompts } from '../catalogue/catalogueLoader';
import { ScriptedBridge } from '../testing/scriptedBridge';
import { startTestFork } from '../testing/testFork';
import type { ProblemDefinition } from '../types/harness';
import { BUILTIN_VALIDATORS } from '../validators/problems';
import { ValidatorRegistry } from '../validators/registry';
import { AttemptRunner } from './attemptRunner';

const RECIPIENT: Address = '0x00000000000000000000000000000000000000cc';
const STRANGER: Address = '0x00000000000000000000000000000000000000dd';

const system: SystemPrompts = {
  role: 'role',
  entryPoint: 'entry',
  atomicInstructions: 'atomic',
  planningInstructions: 'planning',
  stepInstructions: 'step',
};

const nativeTransfer: ProblemDefinition = {
  id: 'native-transfer',
  category: 'atomic',
  group: 'native',
  description: 'Send native currency',
  templates: ['Send {amount} BNB to {to_address}'],
  parameters: {},
  validation: { validator: 'native-transfer' },
};

const queryBalance: ProblemDefinition = {
  id: 'query-native-balance',
  category: 'atomic',
  group: 'query',
  description: 'Read the native balance',
  templates: ['What is my balance?'],
  parameters: {},
  validation: { validator: 'query-native-balance' },
};

const SOURCE = 'export async function executeSkill() { return {}; }';
const fixedCandidate: AtomicCandidate = { name: 'fixed', generate: async () => SOURCE };

async function setup() {
  const fork = await startTestFork();
  const bridge = new ScriptedBridge();
  const runner = new AttemptRunner({
    host: fork.controller,
    bridge,
    registry: new ValidatorRegistry(BUILTIN_VALIDATORS),
    tolerances: { amount: 0.001, balance: 0.01 },
    submissionTimeoutMs: 1000,
    receiptPollMs: 5,
  });
  const transferInput = (amount: string) => ({
    problem: nativeTransfer,
    params: { to_address: RECIPIENT, amount },
    taskPrompt: `Send ${amount} BNB to ${RECIPIENT}`,
    system,
    env: fork.env,
  });
  return { ...fork, bridge, runner, transferInput };
}

describe('AttemptRunner', () => {
  it('scores a correct native transfer in full and reverts its effects', async () => {
    const { runner, bridge, ledger, identity, transferInput } = await setup();
    bridge.returns({ to: RECIPIENT, value: '100000000000000000' });

    const artifact = await runner.run(transferInput('0.1'), fixedCandidate);

    expect(artifact.score).toBe(100);
    expect(artifact.maxScore).toBe(100);
    expect(artifact.passed).toBe(true);
    expect(artifact.errorCategory).toBe('none');
    expect(artifact.resultKind).toBe('transaction');
    expect(artifact.feedback).toBe('All checks passed.\nScore: 100/100');
    expect(artifact.transactionHash).toMatch(/^0x/);
    expect(bridge.requests[0].source).toBe(SOURCE);
    expect(bridge.requests[0].agentAddress).toBe(identity.address);

    expect(await ledger.getBalance(RECIPIENT)).toBe(0n);
    expect(await ledger.getBalance(identity.address)).toBe(parseEther('10'));
  });

  it('gives partial credit but fails the attempt when the amount is wrong', async () => {
    const { runner, bridge, transferInput } = await setup();
    bridge.returns({ to: RECIPIENT, value: '50000000000000000' });

    const artifact = await runner.run(transferInput('0.1'), fixedCandidate);

    expect(artifact.score).toBe(60);
    expect(artifact.passed).toBe(false);
    expect(artifact.errorCategory).toBe('validation');
    expect(artifact.checks.filter((check) => !check.passed).map((check) => check.name)).toEqual([
      'Transfer Amount',
      'Sender Balance Change',
      'Recipient Balance Change',
    ]);
  });

  it('fails the attempt when the transfer goes to the wrong recipient', async () => {
    const { runner, bridge, ledger, transferInput } = await setup();
    bridge.returns({ to: STRANGER, value: '100000000000000000' });

    const artifact = await runner.run(transferInput('0.1'), fixedCandidate);

    expect(artifact.passed).toBe(false);
    expect(artifact.score).toBe(70);
    expect(artifact.checks.filter((check) => !check.passed).map((check) => check.name)).toEqual([
      'Target Address',
      'Recipient Balance Change',
    ]);
    expect(artifact.feedback.split('\n')[0]).toBe(`- Target Address (critical): expected ${getAddress(RECIPIENT)}, got ${STRANGER}`);
    expect(await ledger.getBalance(STRANGER)).toBe(0n);
  });

  it('credits the recipient with exactly the amount sent', async () => {
    const { runner, bridge, transferInput } = await setup();
    bridge.returns({ to: RECIPIENT, value: '250000000000000000' });

    const artifact = await runner.run(transferInput('0.25'), fixedCandidate);

    expect(artifact.passed).toBe(true);
    expect(artifact.checks.find((check) => check.name === 'Recipient Balance Change')).toMatchObject({
      passed: true,
      critical: true,
      message: `changed by ${parseEther('0.25')}`,
    });
  });

  it('scores a rejected submission through the checks', async () => {
    const { runner, bridge, ledger, transferInput } = await setup();
    bridge.returns({ to: RECIPIENT, value: '100000000000000000' });
    ledger.rejectNextSubmission('insufficient funds for gas * price + value');

    const artifact = await runner.run(transferInput('0.1'), fixedCandidate);

    expect(artifact.errorCategory).toBe('submission');
    expect(artifact.executionSuccess).toBe(true);
    expect(artifact.passed).toBe(false);
    expect(artifact.score).toBe(50);
    expect(artifact.error).toBe('Submission rejected (insufficient_funds): insufficient funds for gas * price + value');
  });

  it('scores zero with diagnostics when the skill fails', async () => {
    const { runner, bridge, ledger, transferInput } = await setup();
    bridge.fails({ failureKind: 'runtime', message: 'boom', diagnostics: 'Error: boom\n    at executeSkill' });

    const artifact = await runner.run(transferInput('0.1'), fixedCandidate);

    expect(artifact.score).toBe(0);
    expect(artifact.executionSuccess).toBe(false);
    expect(artifact.errorCategory).toBe('execution');
    expect(artifact.error).toBe('boom');
    expect(artifact.checks.every((check) => check.message === 'not evaluated (runtime)')).toBe(true);
    expect(artifact.feedback.split('\n').slice(0, 4)).toEqual([
      'Execution failed (runtime): boom',
      '--- diagnostics ---',
      'Error: boom',
      '    at executeSkill',
    ]);
    expect(ledger.submitted).toHaveLength(0);
  });

  it('treats a malformed intent as an execution failure', async () => {
    const { runner, bridge, ledger, transferInput } = await setup();
    bridge.returns({ to: 'recipient', value: '1' });

    const artifact = await runner.run(transferInput('0.1'), fixedCandidate);

    expect(artifact.errorCategory).toBe('execution');
    expect(artifact.score).toBe(0);
    expect(artifact.feedback.startsWith('Execution failed (malformed_intent): Malformed transaction intent (to)')).toBe(true);
    expect(ledger.submitted).toHaveLength(0);
  });

  it('records a generation error without running the bridge', async () => {
    const { runner, bridge, transferInput } = await setup();
    const broken: AtomicCandidate = {
      name: 'broken',
      generate: async () => {
        throw new Error('model unavailable');
      },
    };

    const artifact = await runner.run(transferInput('0.1'), broken);

    expect(artifact.resultKind).toBe('none');
    expect(artifact.errorCategory).toBe('execution');
    expect(artifact.feedback.startsWith('Execution failed (generation): model unavailable')).toBe(true);
    expect(bridge.requests).toHaveLength(0);
  });

  it('never sends a query result to the executor', async () => {
    const { runner, bridge, ledger, env } = await setup();
    bridge.returns({ type: 'QUERY_RESULT', success: true, balance_wei: parseEther('10').toString() });

    const artifact = await runner.run(
      { problem: queryBalance, params: {}, taskPrompt: 'What is my balance?', system, env },
      fixedCandidate
    );

    expect(artifact.resultKind).toBe('query');
    expect(artifact.score).toBe(100);
    expect(artifact.transactionHash).toBeUndefined();
    expect(ledger.submitted).toHaveLength(0);
  });

  it('counts the candidate gas price in the sender balance check', async () => {
    const { runner, bridge, ledger, identity, transferInput } = await setup();
    bridge.returns({ to: RECIPIENT, value: '100000000000000000', gasPrice: parseGwei('2').toString() });

    const artifact = await runner.run(transferInput('0.1'), fixedCandidate);

    expect(artifact.score).toBe(100);
    expect(artifact.checks.find((check) => check.name === 'Sender Balance Change')?.message).toBe(
      `changed by ${-(parseEther('0.1') + 21000n * parseGwei('2'))}`
    );
    expect(await ledger.getBalance(identity.address)).toBe(parseEther('10'));
  });
});
