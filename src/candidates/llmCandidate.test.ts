import { describe, expect, it, vi } from 'vitest';
import type { ProblemDefinition } from '../types/harness';
import { LlmCandidate, extractCode, parsePlan } from './llmCandidate';

const problem: ProblemDefinition = {
  id: 'counter-increment',
  category: 'atomic',
  group: 'contract',
  description: 'Increment the counter',
  templates: ['Increment the counter'],
  parameters: {},
  validation: { validator: 'counter-increment' },
};

const env = {
  rpcUrl: 'http://127.0.0.1:8545',
  chainId: 56,
  agentAddress: '0x00000000000000000000000000000000000000aa',
  fixtures: {},
} as const;

const reply = (text: string) => vi.fn(async () => ({ provider: 'stub' as const, model: 'stub', text }));

describe('extractCode', () => {
  it('takes the first TypeScript block', () => {
    const text = 'Here you go:\n```json\n{"a":1}\n```\n```typescript\nexport const x = 1;\n```\n```ts\nlater\n```';
    expect(extractCode(text)).toBe('export const x = 1;');
  });

  it('accepts an unlabelled fence', () => {
    expect(extractCode('```\nreturn 1;\n```')).toBe('return 1;');
  });

  it('returns null without a code block', () => {
    expect(extractCode('I cannot help with that.')).toBeNull();
  });
});

describe('parsePlan', () => {
  it('reads a plain array of steps', () => {
    expect(parsePlan('Plan:\n["approve the pool", "deposit"]')).toEqual(['approve the pool', 'deposit']);
  });

  it('reads subtasks with descriptions', () => {
    const text = '```json\n{"plan": {"total_steps": 2, "subtasks": [{"step": 1, "description": "approve"}, {"step": 2, "description": "stake"}]}}\n```';
    expect(parsePlan(text)).toEqual(['approve', 'stake']);
  });

  it('throws when nothing parses', () => {
    expect(() => parsePlan('first approve, then stake')).toThrow('Could not find a plan in the model reply');
  });
});

describe('LlmCandidate', () => {
  it('passes the prompts through and returns the code', async () => {
    const chat = reply('```typescript\nexport async function executeSkill() {}\n```');
    const candidate = new LlmCandidate({ chat });

    const source = await candidate.generate({ problem, systemPrompt: 'sys', prompt: 'Increment the counter', env });

    expect(source).toBe('export async function executeSkill() {}');
    expect(chat).toHaveBeenCalledWith({ systemPrompt: 'sys', userPrompt: 'Increment the counter' });
  });

  it('fails generation when the reply has no code', async () => {
    const candidate = new LlmCandidate({ chat: reply('Sorry.') });
    await expect(candidate.generate({ problem, systemPrompt: 's', prompt: 'p', env })).rejects.toThrow(
      'stub reply contains no TypeScript code block'
    );
  });

  it('recognises DONE as the end of a composite run', async () => {
    const candidate = new LlmCandidate({ chat: reply('DONE - both transfers confirmed') });
    const step = await candidate.nextStep({ problem, systemPrompt: 's', prompt: 'p', step: 3, plan: [], history: [], env });
    expect(step).toEqual({ done: true });
  });
});
