import type { Address } from 'viem';
import { isAddress } from 'viem';
import type { AttemptEnvironment } from '../../types/harness';
import type { ProblemValidator } from '../types';

export function fixtureAddress(env: AttemptEnvironment, key: string): Address {
  const address = env.fixtures[key];
  if (!address) {
    throw new Error(`fixture "${key}" is not deployed`);
  }
  return address;
}

export function defineValidator(validator: ProblemValidator): ProblemValidator {
  return Object.freeze(validator);
}

/** floor(balance * percentage / 100) */
export function percentageOf(balance: bigint, percentage: number): bigint {
  return (balance * BigInt(Math.round(percentage * 100))) / 10_000n;
}

export const sameAddress = (value: unknown, expected: Address): boolean =>
  typeof value === 'string' && isAddress(value, { strict: false }) && value.toLowerCase() === expected.toLowerCase();
