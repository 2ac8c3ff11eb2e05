import { describe, expect, it } from 'vitest';
import { createRandom } from '../utils/seededRandom';
import {
  buildStepPrompt,
  buildSystemPrompt,
  describeEnvironment,
  fillTemplate,
  renderTaskPrompt,
} from './promptBuilder';
import type { ProblemDefinition } from '../types/harness';

const env = {
  rpcUrl: 'http://127.0.0.1:8545',
  chainId: 56,
  agentAddress: '0x00000000000000000000000000000000000000aa',
  fixtures: {
    'simple-counter': '0x00000000000000000000000000000000000000c2',
    'fixture-token': '0x00000000000000000000000000000000000000c1',
  },
} as const;

describe('fillTemplate', () => {
  it('substitutes parameters and formats booleans', () => {
    expect(fillTemplate('Send {amount} to {to}, urgent: {urgent}', { amount: '0.05', to: '0xabc', urgent: false })).toBe(
      'Send 0.05 to 0xabc, urgent: false'
    );
  });

  it('leaves unknown placeholders untouched', () => {
    expect(fillTemplate('Call {method}', {})).toBe('Call {method}');
  });
});

describe('renderTaskPrompt', () => {
  it('picks templates deterministically for a seed', () => {
    const problem: ProblemDefinition = {
      id: 'counter-increment',
      category: 'atomic',
      group: 'contract',
      description: 'Increment the counter',
      templates: ['Increment the counter', 'Bump the counter by one', 'Call increment()'],
      parameters: {},
      validation: { validator: 'counter-increment' },
    };
    expect(renderTaskPrompt(problem, {}, createRandom(3))).toBe(renderTaskPrompt(problem, {}, createRandom(3)));
  });
});

describe('buildSystemPrompt', () => {
  it('lists fixtures sorted by key', () => {
    expect(describeEnvironment(env)).toBe(
      [
        'Environment:',
        '- Chain id: 56',
        '- Your address (agentAddress): 0x00000000000000000000000000000000000000aa',
        '- Deployed contracts (deployedContracts):',
        '  - fixture-token: 0x00000000000000000000000000000000000000c1',
        '  - simple-counter: 0x00000000000000000000000000000000000000c2',
      ].join('\n')
    );
  });

  it('ends with the instructions for the requested mode', () => {
    const system = {
      role: 'role',
      entryPoint: 'entry',
      atomicInstructions: 'atomic',
      planningInstructions: 'planning',
      stepInstructions: 'step',
    };
    expect(buildSystemPrompt(system, env, 'planning').endsWith('entry\n\nplanning')).toBe(true);
    expect(buildSystemPrompt(system, env, 'step').startsWith('role\n\nEnvironment:')).toBe(true);
  });
});

describe('buildStepPrompt', () => {
  it('includes the plan and the previous step feedback', () => {
    const prompt = buildStepPrompt({
      taskPrompt: 'Approve then stake 1 token',
      step: 2,
      maxSteps: 4,
      plan: ['approve', 'deposit'],
      history: [{ step: 1, resultKind: 'transaction', feedback: 'All checks passed.' }],
    });
    expect(prompt).toBe(
      [
        'Task:\nApprove then stake 1 token',
        'Plan:\n1. approve\n2. deposit',
        'Previous steps:\nStep 1 [transaction]:\nAll checks passed.',
        'This is step 2 of at most 4. Reply with DONE if the task is complete; otherwise return the code for this step.',
      ].join('\n\n')
    );
  });
});
