/**
 * Human-readable ABI helpers.
 * Signatures look like "function balanceOf(address owner) view returns (uint256)".
 */

import type { AbiFunction, Hex } from 'viem';
import { encodeFunctionData, parseAbiItem } from 'viem';

const cache = new Map<string, AbiFunction>();

export function parseFunctionSignature(signature: string): AbiFunction {
  const normalized = signature.trim().startsWith('function ')
    ? signature.trim()
    : `function ${signature.trim()}`;

  const cached = cache.get(normalized);
  if (cached) return cached;

  const item = parseAbiItem(normalized);
  if (item.type !== 'function') {
    throw new Error(`Not a function signature: ${signature}`);
  }
  cache.set(normalized, item);
  return item;
}

export function encodeSignatureCall(signature: string, args: readonly unknown[] = []): Hex {
  const fn = parseFunctionSignature(signature);
  return encodeFunctionData({ abi: [fn], functionName: fn.name, args });
}
