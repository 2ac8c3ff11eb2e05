/**
 * Transaction Executor
 * Signs a candidate's transaction intent with the test identity, submits it
 * to the fork and captures state on either side of it.
 */

import type { Address, Hex, LocalAccount } from 'viem';
import { isAddress, isHex, parseGwei } from 'viem';
import { MalformedIntentError, errorMessage } from '../errors';
import { waitForReceipt } from '../ledger/evmReceipt';
import type { FeeFields, LedgerClient, PreparedTransaction } from '../ledger/ledgerClient';
import { readState } from '../ledger/stateReader';
import type { AttemptLogger } from '../telemetry/logger';
import type { ReceiptInfo, StateSnapshot, StateTarget, TransactionIntent } from '../types/harness';
import { readQuantity } from '../utils/amounts';

export const DEFAULT_GAS_LIMIT = 500_000n;
export const DEFAULT_GAS_PRICE = parseGwei('1');
export const DEFAULT_MAX_FEE = parseGwei('2');
export const DEFAULT_PRIORITY_FEE = parseGwei('1');

export type RejectionBucket = 'insufficient_funds' | 'nonce' | 'gas' | 'chain_id' | 'unknown';

export interface ExecutionOutcome {
  receipt: ReceiptInfo;
  before: StateSnapshot;
  after: StateSnapshot;
  request: PreparedTransaction;
}

export interface TransactionExecutorOptions {
  ledger: LedgerClient;
  identity: LocalAccount;
  chainId: number;
  submissionTimeoutMs: number;
  receiptPollMs?: number;
  logger?: AttemptLogger;
}

// ============================================
// Intent preparation
// ============================================

function quantity(intent: TransactionIntent, field: string): bigint | undefined {
  const raw = intent[field];
  if (raw === undefined || raw === null) return undefined;
  const parsed = readQuantity(raw);
  if (parsed === null) {
    throw new MalformedIntentError(field, `expected a non-negative integer quantity, got ${JSON.stringify(raw)}`);
  }
  return parsed;
}

function isEip1559(intent: TransactionIntent): boolean {
  const type = intent.type;
  if (type === 2 || type === '2' || type === '0x2' || type === 'eip1559') return true;
  return intent.maxFeePerGas !== undefined || intent.maxPriorityFeePerGas !== undefined;
}

/**
 * Validate and normalize a raw intent. Throws MalformedIntentError without
 * touching the ledger.
 */
export function prepareTransaction(intent: TransactionIntent): PreparedTransaction {
  const to = intent.to;
  if (typeof to !== 'string' || !isAddress(to, { strict: false })) {
    throw new MalformedIntentError('to', `not an address: ${JSON.stringify(to)}`);
  }

  const rawData = intent.data;
  let data: Hex = '0x';
  if (rawData !== undefined && rawData !== null && rawData !== '') {
    if (typeof rawData !== 'string' || !isHex(rawData) || rawData.length % 2 !== 0) {
      throw new MalformedIntentError('data', 'expected 0x-prefixed hex bytes');
    }
    data = rawData;
  }

  const value = quantity(intent, 'value') ?? 0n;
  const gas = quantity(intent, 'gasLimit') ?? quantity(intent, 'gas') ?? DEFAULT_GAS_LIMIT;

  const nonceRaw = quantity(intent, 'nonce');
  if (nonceRaw !== undefined && nonceRaw > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new MalformedIntentError('nonce', 'nonce out of range');
  }

  let fee: FeeFields;
  if (isEip1559(intent)) {
    fee = {
      type: 'eip1559',
      maxFeePerGas: quantity(intent, 'maxFeePerGas') ?? DEFAULT_MAX_FEE,
      maxPriorityFeePerGas: quantity(intent, 'maxPriorityFeePerGas') ?? DEFAULT_PRIORITY_FEE,
    };
    if (fee.maxPriorityFeePerGas > fee.maxFeePerGas) {
      throw new MalformedIntentError('maxPriorityFeePerGas', 'priority fee exceeds max fee');
    }
  } else {
    fee = { type: 'legacy', gasPrice: quantity(intent, 'gasPrice') ?? DEFAULT_GAS_PRICE };
  }

  const address: Address = to;
  return {
    to: address,
    value,
    data,
    gas,
    nonce: nonceRaw === undefined ? undefined : Number(nonceRaw),
    fee,
  };
}

export function classifyRejection(message: string): RejectionBucket {
  const text = message.toLowerCase();
  if (text.includes('insufficient funds') || text.includes('insufficient balance')) return 'insufficient_funds';
  if (text.includes('nonce')) return 'nonce';
  if (text.includes('intrinsic gas') || text.includes('gas limit') || text.includes('out of gas')) return 'gas';
  if (text.includes('chain id') || text.includes('chainid')) return 'chain_id';
  return 'unknown';
}

function rejectedReceipt(message: string): ReceiptInfo {
  return {
    status: 'rejected',
    success: false,
    submitted: false,
    gasUsed: 0n,
    effectiveGasPrice: 0n,
    logs: [],
    error: `Submission rejected (${classifyRejection(message)}): ${message}`,
  };
}

// ============================================
// Executor
// ============================================

export class TransactionExecutor {
  private readonly options: TransactionExecutorOptions;

  constructor(options: TransactionExecutorOptions) {
    this.options = options;
  }

  async execute(intent: TransactionIntent, stateTargets: readonly StateTarget[]): Promise<ExecutionOutcome> {
    const { ledger, identity, chainId, logger } = this.options;
    const request = prepareTransaction(intent);

    const before = await readState(ledger, stateTargets);
    const nonce = request.nonce ?? (await ledger.getNonce(identity.address));
    const receipt = await this.submit({ ...request, nonce, chainId }, logger);
    const after = await readState(ledger, stateTargets);
    return { receipt, before, after, request };
  }

  private async submit(
    tx: PreparedTransaction & { nonce: number; chainId: number },
    logger: AttemptLogger | undefined
  ): Promise<ReceiptInfo> {
    const { ledger, identity } = this.options;
    const startedAt = Date.now();

    let hash: Hex;
    try {
      hash = await ledger.sendSignedTransaction(identity, tx);
    } catch (error) {
      const message = errorMessage(error);
      console.warn(`[executor] Submission rejected: ${message}`);
      const receipt = rejectedReceipt(message);
      logger?.log('tx_failed', { error: receipt.error });
      return receipt;
    }
    logger?.log('tx_submitted', { txHash: hash });

    const receipt = await waitForReceipt(ledger, hash, {
      timeoutMs: this.options.submissionTimeoutMs,
      pollMs: this.options.receiptPollMs,
    });
    this.logReceipt(receipt, Date.now() - startedAt);
    return receipt;
  }

  private logReceipt(receipt: ReceiptInfo, latencyMs: number): void {
    const { logger } = this.options;
    if (receipt.status === 'timeout') {
      console.warn(`[executor] ${receipt.error ?? 'receipt timeout'}`);
      logger?.log('tx_timeout', { txHash: receipt.transactionHash, latencyMs });
      return;
    }
    logger?.log(receipt.success ? 'tx_confirmed' : 'tx_failed', {
      txHash: receipt.transactionHash,
      blockNumber: receipt.blockNumber?.toString(),
      gasUsed: receipt.gasUsed.toString(),
      success: receipt.success,
      latencyMs,
      error: receipt.error,
    });
  }
}
