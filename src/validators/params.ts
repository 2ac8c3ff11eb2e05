/**
 * Typed accessors over a generated ParameterInstance.
 */

import type { Address } from 'viem';
import { getAddress, isAddress } from 'viem';
import type { ParameterInstance, ParameterValue } from '../types/harness';
import { toBaseUnits } from '../utils/amounts';

function required(params: ParameterInstance, name: string): ParameterValue {
  const value = params[name];
  if (value === undefined) {
    throw new Error(`missing parameter "${name}"`);
  }
  return value;
}

export function paramAddress(params: ParameterInstance, name: string): Address {
  const value = required(params, name);
  if (typeof value !== 'string' || !isAddress(value, { strict: false })) {
    throw new Error(`parameter "${name}" is not an address: ${String(value)}`);
  }
  return getAddress(value);
}

export function paramString(params: ParameterInstance, name: string): string {
  return String(required(params, name));
}

export function paramInteger(params: ParameterInstance, name: string): number {
  const value = Number(required(params, name));
  if (!Number.isSafeInteger(value)) {
    throw new Error(`parameter "${name}" is not an integer: ${String(params[name])}`);
  }
  return value;
}

/** Token ids and other whole-number arguments passed to contracts. */
export function paramBigInt(params: ParameterInstance, name: string): bigint {
  return BigInt(paramInteger(params, name));
}

/** Decimal amount parameter ("0.125") converted to base units. */
export function paramAmount(params: ParameterInstance, name: string, decimals = 18): bigint {
  const value = required(params, name);
  if (typeof value === 'boolean') {
    throw new Error(`parameter "${name}" is not an amount`);
  }
  return toBaseUnits(value, decimals);
}

export function paramDecimals(params: ParameterInstance, name = 'token_decimals', fallback = 18): number {
  return params[name] === undefined ? fallback : paramInteger(params, name);
}
