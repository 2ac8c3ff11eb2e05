/**
 * Problem Catalogue
 * Loads catalogue/problems.json and catalogue/system.json, validated with zod.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { CatalogueError, errorMessage } from '../errors';
import type { ProblemDefinition } from '../types/harness';

// ============================================
// Schemas
// ============================================

const ParameterGenerationSchema = z.object({
  method: z.enum(['random', 'fixed', 'from_list', 'fixture', 'agent_address']),
  value: z.union([z.string(), z.number(), z.boolean()]).optional(),
  values: z.array(z.union([z.string(), z.number()])).min(1).optional(),
  addresses: z.array(z.string()).min(1).optional(),
  fixture: z.string().optional(),
  min: z.number().optional(),
  max: z.number().optional(),
  decimals: z.number().int().min(0).max(18).optional(),
  length: z.number().int().positive().optional(),
  charset: z.string().min(1).optional(),
  probability: z.number().min(0).max(1).optional(),
});

const ParameterSchemaSchema = z.object({
  type: z.enum(['address', 'number', 'integer', 'string', 'boolean']),
  generation: ParameterGenerationSchema,
  unit: z.string().optional(),
  description: z.string().optional(),
});

const ValidationSchema = z.object({
  validator: z.string().min(1),
  weights: z.record(z.number().nonnegative()).optional(),
  tolerances: z
    .object({
      amount: z.number().min(0).max(1).optional(),
      balance: z.number().min(0).max(1).optional(),
    })
    .optional(),
});

const CompositeStepSchema = z.object({
  validator: z.string().min(1),
  params: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
});

export const ProblemDefinitionSchema = z
  .object({
    id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'ids are lowercase kebab-case'),
    category: z.enum(['atomic', 'composite']),
    group: z.string().min(1),
    description: z.string().min(1),
    templates: z.array(z.string().min(1)).min(1),
    parameters: z.record(ParameterSchemaSchema).default({}),
    validation: ValidationSchema,
    optimalStepCount: z.number().int().positive().optional(),
    planning: z.boolean().optional(),
    steps: z.array(CompositeStepSchema).min(1).optional(),
  })
  .superRefine((problem, ctx) => {
    if (problem.category === 'composite' && problem.optimalStepCount === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'composite problems need optimalStepCount' });
    }
    if (problem.category === 'atomic' && problem.steps !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'only composite problems declare steps' });
    }
    for (const step of problem.steps ?? []) {
      for (const value of Object.values(step.params)) {
        const name = typeof value === 'string' ? /^\{([a-z_][a-z0-9_]*)\}$/i.exec(value)?.[1] : undefined;
        if (name !== undefined && name !== 'agent' && !(name in problem.parameters)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `step ${step.validator} references unknown parameter {${name}}`,
          });
        }
      }
    }
    const placeholders = problem.templates.flatMap((template) =>
      [...template.matchAll(/\{([a-z_][a-z0-9_]*)\}/gi)].map((match) => match[1])
    );
    for (const name of placeholders) {
      if (!(name in problem.parameters)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `template references unknown parameter {${name}}` });
      }
    }
  });

const CatalogueFileSchema = z.object({
  problems: z.array(ProblemDefinitionSchema).min(1),
});

export const SystemPromptsSchema = z.object({
  role: z.string().min(1),
  entryPoint: z.string().min(1),
  atomicInstructions: z.string().min(1),
  planningInstructions: z.string().min(1),
  stepInstructions: z.string().min(1),
});

export type SystemPrompts = z.infer<typeof SystemPromptsSchema>;

export interface Catalogue {
  readonly problems: readonly ProblemDefinition[];
  readonly system: SystemPrompts;
  get(id: string): ProblemDefinition;
}

// ============================================
// Loading
// ============================================

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

async function readJson(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new CatalogueError(path, `cannot read file: ${errorMessage(error)}`);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new CatalogueError(path, `invalid JSON: ${errorMessage(error)}`);
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate raw catalogue data. `knownValidators` is checked so a typo fails
 * at load, not halfway through a run.
 */
export function parseCatalogue(
  rawProblems: unknown,
  rawSystem: unknown,
  knownValidators: (id: string) => boolean,
  source = 'catalogue'
): Catalogue {
  const problemsResult = CatalogueFileSchema.safeParse(rawProblems);
  if (!problemsResult.success) {
    throw new CatalogueError(`${source}/problems.json`, describeIssues(problemsResult.error));
  }
  const systemResult = SystemPromptsSchema.safeParse(rawSystem);
  if (!systemResult.success) {
    throw new CatalogueError(`${source}/system.json`, describeIssues(systemResult.error));
  }

  const seen = new Set<string>();
  for (const problem of problemsResult.data.problems) {
    if (seen.has(problem.id)) {
      throw new CatalogueError(`${source}/problems.json`, `duplicate problem id "${problem.id}"`);
    }
    seen.add(problem.id);
    for (const validator of [problem.validation.validator, ...(problem.steps ?? []).map((step) => step.validator)]) {
      if (!knownValidators(validator)) {
        throw new CatalogueError(
          `${source}/problems.json`,
          `problem "${problem.id}" names unknown validator "${validator}"`
        );
      }
    }
  }

  const problems: readonly ProblemDefinition[] = deepFreeze(problemsResult.data.problems);
  const byId = new Map(problems.map((problem) => [problem.id, problem]));
  const system = deepFreeze(systemResult.data);

  return Object.freeze({
    problems,
    system,
    get(id: string): ProblemDefinition {
      const problem = byId.get(id);
      if (!problem) {
        throw new CatalogueError(source, `unknown problem "${id}"`);
      }
      return problem;
    },
  });
}

export async function loadCatalogue(dir: string, knownValidators: (id: string) => boolean): Promise<Catalogue> {
  const [rawProblems, rawSystem] = await Promise.all([
    readJson(join(dir, 'problems.json')),
    readJson(join(dir, 'system.json')),
  ]);
  return parseCatalogue(rawProblems, rawSystem, knownValidators, dir);
}
