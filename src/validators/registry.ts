/**
 * Validator Registry
 * Dispatch from a catalogue entry's `validation.validator` to its validator,
 * with the entry's weight and tolerance overrides applied.
 */

import type {
  AttemptEnvironment,
  CompositeStep,
  ParameterInstance,
  ProblemDefinition,
  StateTarget,
  ValidationConfig,
} from '../types/harness';
import type { CheckDefinition } from './framework';
import { withWeights } from './framework';
import type { PreparationHost, ProblemValidator, Tolerances, ValidatorContext, ValidatorMode } from './types';

/**
 * A validator specialised to one catalogue entry.
 */
export interface BoundValidator {
  readonly problemId: string;
  readonly validatorId: string;
  readonly mode: ValidatorMode;
  context(params: ParameterInstance, env: AttemptEnvironment): ValidatorContext;
  stateTargets(ctx: ValidatorContext): StateTarget[];
  checks(ctx: ValidatorContext): CheckDefinition[];
  prepare(host: PreparationHost, ctx: ValidatorContext): Promise<void>;
}

export class ValidatorRegistry {
  private readonly validators = new Map<string, ProblemValidator>();

  constructor(validators: readonly ProblemValidator[] = []) {
    for (const validator of validators) {
      this.register(validator);
    }
  }

  register(validator: ProblemValidator): void {
    if (this.validators.has(validator.id)) {
      throw new Error(`Validator "${validator.id}" is already registered`);
    }
    this.validators.set(validator.id, validator);
  }

  has(id: string): boolean {
    return this.validators.has(id);
  }

  get(id: string): ProblemValidator {
    const validator = this.validators.get(id);
    if (!validator) {
      throw new Error(`Unknown validator "${id}"`);
    }
    return validator;
  }

  ids(): string[] {
    return [...this.validators.keys()];
  }

  bind(problem: ProblemDefinition, defaults: Tolerances): BoundValidator {
    return this.bindValidator(problem.id, problem.validation, defaults);
  }

  /**
   * Bind the validator that scores one step of a composite problem. The
   * problem's tolerance overrides apply; its weight overrides name goal
   * checks and do not.
   */
  bindStep(problem: ProblemDefinition, step: CompositeStep, defaults: Tolerances): BoundValidator {
    return this.bindValidator(problem.id, { validator: step.validator, tolerances: problem.validation.tolerances }, defaults);
  }

  private bindValidator(problemId: string, validation: ValidationConfig, defaults: Tolerances): BoundValidator {
    const validator = this.get(validation.validator);
    const tolerances: Tolerances = {
      amount: validation.tolerances?.amount ?? defaults.amount,
      balance: validation.tolerances?.balance ?? defaults.balance,
    };
    const weights = validation.weights;

    return Object.freeze({
      problemId,
      validatorId: validator.id,
      mode: validator.mode,
      context: (params: ParameterInstance, env: AttemptEnvironment): ValidatorContext => ({ params, env, tolerances }),
      stateTargets: (ctx: ValidatorContext) => validator.stateTargets(ctx),
      checks: (ctx: ValidatorContext) => withWeights(validator.checks(ctx), weights),
      prepare: async (host: PreparationHost, ctx: ValidatorContext) => {
        if (validator.prepare) {
          await validator.prepare(host, ctx);
        }
      },
    });
  }
}
