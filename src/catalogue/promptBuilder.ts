/**
 * Prompt Builder
 * Renders task prompts from catalogue templates and assembles the system,
 * planning and step prompts handed to a candidate.
 */

import type { StepHistoryEntry } from '../candidates/types';
import type { AttemptEnvironment, ParameterInstance, ParameterValue, ProblemDefinition } from '../types/harness';
import type { RandomSource } from '../utils/seededRandom';
import type { SystemPrompts } from './catalogueLoader';

export type PromptMode = 'atomic' | 'planning' | 'step';

const PLACEHOLDER_RE = /\{([a-z_][a-z0-9_]*)\}/gi;

export function formatParameterValue(value: ParameterValue): string {
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return String(value);
}

/**
 * Fill every `{name}` with its parameter. Unknown placeholders are left as
 * written; the catalogue loader already rejects them.
 */
export function fillTemplate(template: string, params: ParameterInstance): string {
  return template.replace(PLACEHOLDER_RE, (whole, name: string) => {
    const value = params[name];
    return value === undefined ? whole : formatParameterValue(value);
  });
}

export function renderTaskPrompt(problem: ProblemDefinition, params: ParameterInstance, random: RandomSource): string {
  return fillTemplate(random.pick(problem.templates), params);
}

export function describeEnvironment(env: AttemptEnvironment): string {
  const fixtureLines = Object.entries(env.fixtures)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, address]) => `  - ${key}: ${address}`);
  return [
    'Environment:',
    `- Chain id: ${env.chainId}`,
    `- Your address (agentAddress): ${env.agentAddress}`,
    '- Deployed contracts (deployedContracts):',
    ...(fixtureLines.length > 0 ? fixtureLines : ['  (none)']),
  ].join('\n');
}

const INSTRUCTIONS: Record<PromptMode, (system: SystemPrompts) => string> = {
  atomic: (system) => system.atomicInstructions,
  planning: (system) => system.planningInstructions,
  step: (system) => system.stepInstructions,
};

export function buildSystemPrompt(system: SystemPrompts, env: AttemptEnvironment, mode: PromptMode): string {
  return [system.role, describeEnvironment(env), system.entryPoint, INSTRUCTIONS[mode](system)].join('\n\n');
}

export function buildPlanningPrompt(taskPrompt: string): string {
  return `Task:\n${taskPrompt}\n\nReturn the plan as a JSON array of short step descriptions.`;
}

export function buildStepPrompt(options: {
  taskPrompt: string;
  step: number;
  maxSteps: number;
  plan: readonly string[];
  history: readonly StepHistoryEntry[];
}): string {
  const { taskPrompt, step, maxSteps, plan, history } = options;
  const sections = [`Task:\n${taskPrompt}`];

  if (plan.length > 0) {
    sections.push(`Plan:\n${plan.map((entry, i) => `${i + 1}. ${entry}`).join('\n')}`);
  }
  if (history.length > 0) {
    const lines = history.map(
      (entry) => `Step ${entry.step} [${entry.resultKind}]:\n${entry.feedback}`
    );
    sections.push(`Previous steps:\n${lines.join('\n\n')}`);
  }
  sections.push(
    `This is step ${step} of at most ${maxSteps}. Reply with DONE if the task is complete; otherwise return the code for this step.`
  );
  return sections.join('\n\n');
}
