/**
 * EVM Receipt Watcher
 * Polls for transaction receipts to confirm execution on the fork.
 */

import type { Hex } from 'viem';
import type { ReceiptInfo } from '../types/harness';
import { sleep } from '../utils/retryHandler';
import type { LedgerClient } from './ledgerClient';

/**
 * Wait for a transaction receipt with polling.
 * Never throws for a missing receipt: running out of time yields status 'timeout'.
 */
export async function waitForReceipt(
  client: LedgerClient,
  txHash: Hex,
  options: {
    timeoutMs?: number;
    pollMs?: number;
  } = {}
): Promise<ReceiptInfo> {
  const { timeoutMs = 30000, pollMs = 250 } = options;
  const startTime = Date.now();

  while (Date.now() - startTime < timeoutMs) {
    try {
      const receipt = await client.getReceipt(txHash);
      if (receipt) {
        return receipt;
      }
    } catch (error) {
      // Continue polling on transient errors
      console.warn('[waitForReceipt] Poll error:', error instanceof Error ? error.message : error);
    }
    await sleep(pollMs);
  }

  return timeoutReceipt(txHash, timeoutMs);
}

export function timeoutReceipt(txHash: Hex, timeoutMs: number): ReceiptInfo {
  return {
    status: 'timeout',
    success: false,
    submitted: true,
    transactionHash: txHash,
    gasUsed: 0n,
    effectiveGasPrice: 0n,
    logs: [],
    error: `Transaction not confirmed within ${timeoutMs / 1000}s`,
  };
}
