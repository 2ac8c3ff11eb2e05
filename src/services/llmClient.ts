/**
 * LLM Client Service
 * Supports OpenAI, Anthropic, or stub mode
 */

import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import { errorMessage } from '../errors';
import { withRetry } from '../utils/retryHandler';

export interface LlmChatInput {
  systemPrompt: string;
  userPrompt: string;
}

export interface LlmChatOutput {
  provider: ModelProvider;
  model: string;
  text: string;
}

export type ModelProvider = 'openai' | 'anthropic' | 'stub';

type Env = Record<string, string | undefined>;

const STUB_MESSAGE =
  'This is a stubbed response. No model is configured. Set QUEST_MODEL_PROVIDER and an API key to generate code.';

export function getProvider(env: Env = process.env): ModelProvider {
  const provider = env.QUEST_MODEL_PROVIDER;
  if (provider === 'openai' || provider === 'anthropic') {
    return provider;
  }
  return 'stub';
}

const LLM_RETRY = { maxRetries: 2, baseDelayMs: 1000, timeout: 120_000 };

function temperature(env: Env): number {
  const parsed = Number(env.QUEST_LLM_TEMPERATURE ?? '0');
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Call the configured model with one system and one user message
 */
export async function callLlm(input: LlmChatInput, env: Env = process.env): Promise<LlmChatOutput> {
  const provider = getProvider(env);

  if (provider === 'openai') {
    return withRetry(() => callOpenAI(input, env), LLM_RETRY);
  }

  if (provider === 'anthropic') {
    return withRetry(() => callAnthropic(input, env), LLM_RETRY);
  }

  return { provider: 'stub', model: 'stub', text: STUB_MESSAGE };
}

/**
 * Call OpenAI API
 */
async function callOpenAI(input: LlmChatInput, env: Env): Promise<LlmChatOutput> {
  const apiKey = env.QUEST_OPENAI_API_KEY;
  if (!apiKey) {
    throw new Error('QUEST_OPENAI_API_KEY is not set');
  }

  const model = env.QUEST_OPENAI_MODEL || 'gpt-4o-mini';
  const client = new OpenAI({ apiKey, baseURL: env.QUEST_OPENAI_BASE_URL || undefined });

  try {
    const response = await client.chat.completions.create({
      model,
      messages: [
        { role: 'system', content: input.systemPrompt },
        { role: 'user', content: input.userPrompt },
      ],
      temperature: temperature(env),
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('No content in OpenAI response');
    }

    return { provider: 'openai', model, text: content };
  } catch (error) {
    console.error('[llm] OpenAI API error:', errorMessage(error));
    throw new Error(`OpenAI API error: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Call Anthropic API
 */
async function callAnthropic(input: LlmChatInput, env: Env): Promise<LlmChatOutput> {
  const apiKey = env.QUEST_ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new Error('QUEST_ANTHROPIC_API_KEY is not set');
  }

  const model = env.QUEST_ANTHROPIC_MODEL || 'claude-3-5-sonnet-20241022';
  const client = new Anthropic({ apiKey });

  try {
    const response = await client.messages.create({
      model,
      max_tokens: 4096,
      temperature: temperature(env),
      system: input.systemPrompt,
      messages: [{ role: 'user', content: input.userPrompt }],
    });

    const text = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();
    if (!text) {
      throw new Error('No text content in Anthropic response');
    }

    return { provider: 'anthropic', model, text };
  } catch (error) {
    console.error('[llm] Anthropic API error:', errorMessage(error));
    throw new Error(`Anthropic API error: ${errorMessage(error)}`, { cause: error });
  }
}
