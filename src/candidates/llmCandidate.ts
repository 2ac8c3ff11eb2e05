/**
 * Candidate backed by a chat model. Code is taken from the first fenced
 * TypeScript block of the reply; plans from the first JSON array.
 */

import { z } from 'zod';
import type { LlmChatInput, LlmChatOutput } from '../services/llmClient';
import { callLlm } from '../services/llmClient';
import type { AtomicRequest, Candidate, CandidateStep, PlanningRequest, StepRequest } from './types';

const CODE_BLOCK_RE = /```([a-zA-Z]*)[^\n]*\n([\s\S]*?)```/g;
const CODE_LANGUAGES = new Set(['typescript', 'ts', 'javascript', 'js', '']);
const DONE_RE = /^\s*DONE\b/i;

const PlanSchema = z.array(z.union([z.string(), z.object({ description: z.string() }).passthrough()]));
const WrappedPlanSchema = z.object({
  plan: z.union([PlanSchema, z.object({ subtasks: PlanSchema })]),
});

export function extractCode(text: string): string | null {
  for (const match of text.matchAll(CODE_BLOCK_RE)) {
    const [, language, body] = match;
    if (CODE_LANGUAGES.has(language.toLowerCase()) && body.trim().length > 0) {
      return body.trim();
    }
  }
  return null;
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function jsonCandidates(text: string): unknown[] {
  const found: unknown[] = [];
  const fenced = [...text.matchAll(CODE_BLOCK_RE)].filter(([, language]) => language.toLowerCase() === 'json');
  const sources = [...fenced.map(([, , body]) => body), text];
  for (const source of sources) {
    for (const [open, close] of [
      ['[', ']'],
      ['{', '}'],
    ]) {
      const start = source.indexOf(open);
      const end = source.lastIndexOf(close);
      if (start === -1 || end <= start) continue;
      const parsed = tryParseJson(source.slice(start, end + 1));
      if (parsed.ok) found.push(parsed.value);
    }
  }
  return found;
}

/**
 * Accepts `["step", ...]`, `[{ description }, ...]` or `{ plan: { subtasks: [...] } }`.
 */
export function parsePlan(text: string): string[] {
  for (const candidate of jsonCandidates(text)) {
    const direct = PlanSchema.safeParse(candidate);
    const wrapped = WrappedPlanSchema.safeParse(candidate);
    const entries = direct.success
      ? direct.data
      : wrapped.success
        ? Array.isArray(wrapped.data.plan)
          ? wrapped.data.plan
          : wrapped.data.plan.subtasks
        : null;
    if (entries) {
      return entries.map((entry) => (typeof entry === 'string' ? entry : entry.description));
    }
  }
  throw new Error(`Could not find a plan in the model reply: ${text.slice(0, 200)}`);
}

export type ChatFn = (input: LlmChatInput) => Promise<LlmChatOutput>;

export class LlmCandidate implements Candidate {
  readonly name: string;
  private readonly chat: ChatFn;

  constructor(options: { chat?: ChatFn; name?: string } = {}) {
    this.chat = options.chat ?? ((input) => callLlm(input));
    this.name = options.name ?? 'llm';
  }

  private async code(systemPrompt: string, userPrompt: string): Promise<string> {
    const reply = await this.chat({ systemPrompt, userPrompt });
    const code = extractCode(reply.text);
    if (code === null) {
      throw new Error(`${reply.provider} reply contains no TypeScript code block`);
    }
    return code;
  }

  generate(request: AtomicRequest): Promise<string> {
    return this.code(request.systemPrompt, request.prompt);
  }

  async plan(request: PlanningRequest): Promise<string[]> {
    const reply = await this.chat({ systemPrompt: request.systemPrompt, userPrompt: request.prompt });
    return parsePlan(reply.text);
  }

  async nextStep(request: StepRequest): Promise<CandidateStep> {
    const reply = await this.chat({ systemPrompt: request.systemPrompt, userPrompt: request.prompt });
    const code = extractCode(reply.text);
    if (code !== null) {
      return { done: false, source: code };
    }
    if (DONE_RE.test(reply.text)) {
      return { done: true };
    }
    throw new Error(`${reply.provider} reply contains neither code nor DONE`);
  }
}
