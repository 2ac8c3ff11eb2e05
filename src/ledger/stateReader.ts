/**
 * State reads around an attempt.
 * Every target maps to a stable address+slot key so before/after snapshots
 * line up entry by entry.
 */

import type { Address, Hex } from 'viem';
import type { StateSnapshot, StateTarget, StateValue } from '../types/harness';
import type { LedgerClient } from './ledgerClient';

const BALANCE_OF = 'function balanceOf(address owner) view returns (uint256)';
const ALLOWANCE = 'function allowance(address owner, address spender) view returns (uint256)';

const lower = (address: Address): string => address.toLowerCase();

export function stateKey(target: StateTarget): string {
  switch (target.kind) {
    case 'nativeBalance':
      return `nativeBalance:${lower(target.address)}`;
    case 'nonce':
      return `nonce:${lower(target.address)}`;
    case 'tokenBalance':
      return `tokenBalance:${lower(target.token)}:${lower(target.owner)}`;
    case 'allowance':
      return `allowance:${lower(target.token)}:${lower(target.owner)}:${lower(target.spender)}`;
    case 'storage':
      return `storage:${lower(target.address)}:${target.slot.toLowerCase()}`;
    case 'codeSize':
      return `codeSize:${lower(target.address)}`;
    case 'gasPrice':
      return 'gasPrice';
    case 'contractRead': {
      const args = target.args
        .map((arg) => (typeof arg === 'string' ? arg.toLowerCase() : String(arg)))
        .join(',');
      const index = target.resultIndex === undefined ? '' : `#${target.resultIndex}`;
      return `contractRead:${lower(target.address)}:${target.signature}(${args})${index}`;
    }
  }
}

/**
 * Read one value from a snapshot. Missing keys read as null.
 */
export function snapshotValue(snapshot: StateSnapshot | undefined, target: StateTarget): StateValue {
  if (!snapshot) return null;
  return snapshot.values[stateKey(target)] ?? null;
}

export function snapshotBigInt(
  snapshot: StateSnapshot | undefined,
  target: StateTarget
): bigint | null {
  const value = snapshotValue(snapshot, target);
  return typeof value === 'bigint' ? value : null;
}

function normalizeReadValue(raw: unknown, resultIndex?: number): StateValue {
  const picked: unknown = Array.isArray(raw) && resultIndex !== undefined ? raw[resultIndex] : raw;
  if (typeof picked === 'bigint' || typeof picked === 'string' || typeof picked === 'boolean') {
    return picked;
  }
  if (typeof picked === 'number' && Number.isInteger(picked)) {
    return BigInt(picked);
  }
  if (picked === null || picked === undefined) {
    return null;
  }
  return JSON.stringify(picked, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  );
}

function hexToBigInt(value: Hex): bigint {
  return value === '0x' ? 0n : BigInt(value);
}

async function readTarget(client: LedgerClient, target: StateTarget): Promise<StateValue> {
  switch (target.kind) {
    case 'nativeBalance':
      return client.getBalance(target.address);
    case 'nonce':
      return BigInt(await client.getNonce(target.address));
    case 'tokenBalance':
      return normalizeReadValue(
        await client.readContract({ address: target.token, signature: BALANCE_OF, args: [target.owner] })
      );
    case 'allowance':
      return normalizeReadValue(
        await client.readContract({
          address: target.token,
          signature: ALLOWANCE,
          args: [target.owner, target.spender],
        })
      );
    case 'storage':
      return hexToBigInt(await client.getStorageAt(target.address, target.slot));
    case 'codeSize': {
      const code = await client.getCode(target.address);
      return BigInt((code.length - 2) / 2);
    }
    case 'gasPrice':
      return client.getGasPrice();
    case 'contractRead':
      return normalizeReadValue(
        await client.readContract({
          address: target.address,
          signature: target.signature,
          args: target.args,
        }),
        target.resultIndex
      );
  }
}

/**
 * Batched, read-only capture of the given targets. A target whose read fails
 * is recorded as null rather than failing the whole snapshot.
 */
export async function readState(
  client: LedgerClient,
  targets: readonly StateTarget[]
): Promise<StateSnapshot> {
  const blockNumber = await client.getBlockNumber();
  const entries = await Promise.all(
    targets.map(async (target): Promise<[string, StateValue]> => {
      try {
        return [stateKey(target), await readTarget(client, target)];
      } catch (error) {
        console.warn(`[state] Read failed for ${stateKey(target)}:`, error instanceof Error ? error.message : error);
        return [stateKey(target), null];
      }
    })
  );

  return {
    blockNumber,
    values: Object.freeze(Object.fromEntries(entries)),
  };
}
