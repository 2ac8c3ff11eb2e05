/**
 * Parameter Generator
 * Produces one frozen ParameterInstance per problem run from the catalogue's
 * generation rules. All randomness comes from the injected RandomSource.
 */

import type { Address } from 'viem';
import { getAddress, isAddress, toHex } from 'viem';
import { CatalogueError } from '../errors';
import type {
  FixtureRegistry,
  ParameterGeneration,
  ParameterInstance,
  ParameterSchema,
  ParameterValue,
} from '../types/harness';
import { fromBaseUnits, toBaseUnits } from '../utils/amounts';
import type { RandomSource } from '../utils/seededRandom';

export interface GenerationEnvironment {
  agentAddress: Address;
  fixtures: FixtureRegistry;
}

const CHARSETS: Record<string, string> = {
  alphanumeric: 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789',
  alphanumeric_space: 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789 ',
  alpha: 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz',
  numeric: '0123456789',
};

const DEFAULT_NUMBER = { min: 0.001, max: 1, decimals: 3 };
const DEFAULT_INTEGER = { min: 1, max: 100 };
const DEFAULT_STRING_LENGTH = 10;

class ParameterError extends CatalogueError {
  constructor(name: string, message: string) {
    super(`parameter "${name}"`, message);
  }
}

/**
 * Uniform bigint in [min, max]. Ranges wider than 2^53 lose low bits, which
 * is fine for amount generation.
 */
function randomBigInt(random: RandomSource, min: bigint, max: bigint): bigint {
  const span = max - min + 1n;
  const offset = BigInt(Math.floor(random.next() * Number(span)));
  return min + (offset >= span ? span - 1n : offset);
}

function requireValue(name: string, generation: ParameterGeneration): string | number | boolean {
  if (generation.value === undefined) {
    throw new ParameterError(name, `method "fixed" needs a value`);
  }
  return generation.value;
}

// ============================================
// Per-type generators
// ============================================

function generateAddress(
  name: string,
  generation: ParameterGeneration,
  random: RandomSource,
  env: GenerationEnvironment
): Address {
  const checked = (candidate: string): Address => {
    if (!isAddress(candidate, { strict: false })) {
      throw new ParameterError(name, `"${candidate}" is not an address`);
    }
    return getAddress(candidate);
  };

  switch (generation.method) {
    case 'random':
      return getAddress(toHex(random.bytes(20)));
    case 'fixed':
      return checked(String(requireValue(name, generation)));
    case 'from_list': {
      const addresses = generation.addresses ?? [];
      if (addresses.length === 0) {
        throw new ParameterError(name, 'method "from_list" needs addresses');
      }
      return checked(random.pick(addresses));
    }
    case 'fixture': {
      const key = generation.fixture;
      if (!key) {
        throw new ParameterError(name, 'method "fixture" needs a fixture key');
      }
      const address = env.fixtures[key];
      if (!address) {
        throw new ParameterError(name, `fixture "${key}" is not deployed`);
      }
      return address;
    }
    case 'agent_address':
      return env.agentAddress;
    default:
      throw new ParameterError(name, `unsupported address method "${generation.method}"`);
  }
}

/** Decimal amounts come back as exact decimal strings. */
function generateNumber(name: string, generation: ParameterGeneration, random: RandomSource): string {
  if (generation.method === 'fixed') {
    const value = requireValue(name, generation);
    if (typeof value === 'boolean' || !/^\d+(\.\d+)?$/.test(String(value))) {
      throw new ParameterError(name, `fixed value ${String(value)} is not a non-negative decimal`);
    }
    return String(value);
  }
  if (generation.method !== 'random') {
    throw new ParameterError(name, `unsupported number method "${generation.method}"`);
  }

  const decimals = generation.decimals ?? DEFAULT_NUMBER.decimals;
  const min = generation.min ?? DEFAULT_NUMBER.min;
  const max = generation.max ?? DEFAULT_NUMBER.max;
  if (min < 0 || max < min) {
    throw new ParameterError(name, `invalid range [${min}, ${max}]`);
  }
  const low = toBaseUnits(min.toFixed(decimals), decimals);
  const high = toBaseUnits(max.toFixed(decimals), decimals);
  return fromBaseUnits(randomBigInt(random, low, high), decimals);
}

function generateInteger(name: string, generation: ParameterGeneration, random: RandomSource): number {
  const asInteger = (value: unknown): number => {
    const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed)) {
      throw new ParameterError(name, `${String(value)} is not an integer`);
    }
    return parsed;
  };

  switch (generation.method) {
    case 'fixed':
      return asInteger(requireValue(name, generation));
    case 'from_list': {
      const values = generation.values ?? [];
      if (values.length === 0) {
        throw new ParameterError(name, 'method "from_list" needs values');
      }
      return asInteger(random.pick(values));
    }
    case 'random':
      return random.int(generation.min ?? DEFAULT_INTEGER.min, generation.max ?? DEFAULT_INTEGER.max);
    default:
      throw new ParameterError(name, `unsupported integer method "${generation.method}"`);
  }
}

function generateString(name: string, generation: ParameterGeneration, random: RandomSource): string {
  switch (generation.method) {
    case 'fixed':
      return String(requireValue(name, generation));
    case 'from_list': {
      const values = generation.values ?? [];
      if (values.length === 0) {
        throw new ParameterError(name, 'method "from_list" needs values');
      }
      return String(random.pick(values));
    }
    case 'random': {
      const charsetName = generation.charset ?? 'alphanumeric';
      const chars = [...(CHARSETS[charsetName] ?? charsetName)];
      const length = generation.length ?? DEFAULT_STRING_LENGTH;
      let out = '';
      for (let i = 0; i < length; i++) {
        out += random.pick(chars);
      }
      return out;
    }
    default:
      throw new ParameterError(name, `unsupported string method "${generation.method}"`);
  }
}

function generateBoolean(name: string, generation: ParameterGeneration, random: RandomSource): boolean {
  switch (generation.method) {
    case 'fixed': {
      const value = requireValue(name, generation);
      if (typeof value !== 'boolean') {
        throw new ParameterError(name, `fixed value ${String(value)} is not a boolean`);
      }
      return value;
    }
    case 'random':
      return random.next() < (generation.probability ?? 0.5);
    default:
      throw new ParameterError(name, `unsupported boolean method "${generation.method}"`);
  }
}

// ============================================
// Entry point
// ============================================

export function generateParameter(
  name: string,
  schema: ParameterSchema,
  random: RandomSource,
  env: GenerationEnvironment
): ParameterValue {
  switch (schema.type) {
    case 'address':
      return generateAddress(name, schema.generation, random, env);
    case 'number':
      return generateNumber(name, schema.generation, random);
    case 'integer':
      return generateInteger(name, schema.generation, random);
    case 'string':
      return generateString(name, schema.generation, random);
    case 'boolean':
      return generateBoolean(name, schema.generation, random);
  }
}

/**
 * Parameters are generated in declaration order so a seed reproduces the
 * same instance.
 */
export function generateParameters(
  parameters: Readonly<Record<string, ParameterSchema>>,
  random: RandomSource,
  env: GenerationEnvironment
): ParameterInstance {
  const instance: Record<string, ParameterValue> = {};
  for (const [name, schema] of Object.entries(parameters)) {
    instance[name] = generateParameter(name, schema, random, env);
  }
  return Object.freeze(instance);
}
