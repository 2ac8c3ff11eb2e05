import { describe, expect, it } from 'vitest';
import { callLlm, getProvider } from './llmClient';

describe('llmClient', () => {
  it('falls back to the stub provider', () => {
    expect(getProvider({})).toBe('stub');
    expect(getProvider({ QUEST_MODEL_PROVIDER: 'mystery' })).toBe('stub');
    expect(getProvider({ QUEST_MODEL_PROVIDER: 'anthropic' })).toBe('anthropic');
  });

  it('answers from the stub without a network call', async () => {
    const output = await callLlm({ systemPrompt: 's', userPrompt: 'u' }, {});
    expect(output.provider).toBe('stub');
    expect(output.text).toContain('No model is configured');
  });

  it('requires an API key for a real provider', async () => {
    await expect(callLlm({ systemPrompt: 's', userPrompt: 'u' }, { QUEST_MODEL_PROVIDER: 'openai' })).rejects.toThrow(
      'QUEST_OPENAI_API_KEY is not set'
    );
  });
});
