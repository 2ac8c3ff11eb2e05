/**
 * StateTarget builders used by validators to declare what must be read
 * before and after an attempt.
 */

import type { Address, Hex } from 'viem';
import type { StateTarget } from '../types/harness';

export const nativeBalance = (address: Address): StateTarget => ({ kind: 'nativeBalance', address });

export const nonceOf = (address: Address): StateTarget => ({ kind: 'nonce', address });

export const tokenBalance = (token: Address, owner: Address): StateTarget => ({
  kind: 'tokenBalance',
  token,
  owner,
});

export const allowance = (token: Address, owner: Address, spender: Address): StateTarget => ({
  kind: 'allowance',
  token,
  owner,
  spender,
});

export const storageSlot = (address: Address, slot: Hex): StateTarget => ({ kind: 'storage', address, slot });

export const codeSize = (address: Address): StateTarget => ({ kind: 'codeSize', address });

export const gasPrice = (): StateTarget => ({ kind: 'gasPrice' });

export function contractRead(
  address: Address,
  signature: string,
  args: readonly (string | bigint | boolean)[] = [],
  resultIndex?: number
): StateTarget {
  return { kind: 'contractRead', address, signature, args, resultIndex };
}
