/**
 * Resolve the parameter references of a composite step against the attempt.
 */

import type { AttemptEnvironment, CompositeStep, ParameterInstance, ParameterValue } from '../types/harness';

const REFERENCE = /^\{([a-z_][a-z0-9_]*|fixture:[a-z0-9-]+)\}$/i;

function resolveValue(value: ParameterValue, params: ParameterInstance, env: AttemptEnvironment): ParameterValue {
  if (typeof value !== 'string') return value;
  const reference = REFERENCE.exec(value)?.[1];
  if (reference === undefined) return value;

  if (reference === 'agent') return env.agentAddress;
  if (reference.startsWith('fixture:')) {
    const key = reference.slice('fixture:'.length);
    const address = env.fixtures[key];
    if (!address) {
      throw new Error(`fixture "${key}" is not deployed`);
    }
    return address;
  }
  const resolved = params[reference];
  if (resolved === undefined) {
    throw new Error(`step references unknown parameter {${reference}}`);
  }
  return resolved;
}

export function resolveStepParams(
  step: CompositeStep,
  params: ParameterInstance,
  env: AttemptEnvironment
): ParameterInstance {
  return Object.fromEntries(
    Object.entries(step.params).map(([name, value]) => [name, resolveValue(value, params, env)])
  );
}
