/**
 * Ledger Client
 * The harness's view of one simulated chain: reads, signed submission and
 * the simulator's privileged methods (balances, storage, impersonation,
 * snapshots).
 */

import type { Abi, Address, Hex, LocalAccount, TransactionReceipt } from 'viem';
import {
  createPublicClient,
  createTestClient,
  createWalletClient,
  encodeDeployData,
  http,
  TransactionReceiptNotFoundError,
} from 'viem';
import type { ReceiptInfo } from '../types/harness';
import { parseFunctionSignature } from './abiSignature';
import { RPC_TIMEOUT_MS, evmRevert, evmSnapshot } from './evmRpc';

export type FeeFields =
  | { type: 'eip1559'; maxFeePerGas: bigint; maxPriorityFeePerGas: bigint }
  | { type: 'legacy'; gasPrice: bigint };

export interface PreparedTransaction {
  to: Address;
  value: bigint;
  data: Hex;
  gas: bigint;
  nonce?: number;
  fee: FeeFields;
}

export interface ContractCall {
  address: Address;
  signature: string;
  args?: readonly unknown[];
}

export interface ContractDeployment {
  abi: Abi;
  bytecode: Hex;
  args?: readonly unknown[];
}

export interface LedgerClient {
  readonly rpcUrl: string;

  getChainId(): Promise<number>;
  getBlockNumber(): Promise<bigint>;
  getBalance(address: Address): Promise<bigint>;
  getNonce(address: Address): Promise<number>;
  getCode(address: Address): Promise<Hex>;
  getStorageAt(address: Address, slot: Hex): Promise<Hex>;
  getGasPrice(): Promise<bigint>;
  readContract(call: ContractCall): Promise<unknown>;

  sendSignedTransaction(
    account: LocalAccount,
    tx: PreparedTransaction & { nonce: number; chainId: number }
  ): Promise<Hex>;
  sendImpersonatedTransaction(
    from: Address,
    tx: { to: Address; data?: Hex; value?: bigint }
  ): Promise<Hex>;
  getReceipt(hash: Hex): Promise<ReceiptInfo | null>;
  deployContract(account: LocalAccount, deployment: ContractDeployment): Promise<Address>;

  // Privileged simulator methods
  mine(blocks: number): Promise<void>;
  setBalance(address: Address, value: bigint): Promise<void>;
  setStorageAt(address: Address, slot: Hex, value: Hex): Promise<void>;
  impersonate(address: Address): Promise<void>;
  stopImpersonating(address: Address): Promise<void>;
  snapshot(): Promise<string>;
  revert(snapshotId: string): Promise<boolean>;
}

export type LedgerClientFactory = (rpcUrl: string) => LedgerClient;

export function toReceiptInfo(receipt: TransactionReceipt): ReceiptInfo {
  const success = receipt.status === 'success';
  return {
    status: success ? 'success' : 'reverted',
    success,
    submitted: true,
    transactionHash: receipt.transactionHash,
    blockNumber: receipt.blockNumber,
    gasUsed: receipt.gasUsed,
    effectiveGasPrice: receipt.effectiveGasPrice,
    logs: receipt.logs.map((log) => ({
      address: log.address,
      topics: [...log.topics],
      data: log.data,
    })),
    error: success ? undefined : 'Transaction reverted on-chain',
  };
}

function createClients(rpcUrl: string, timeoutMs: number) {
  const transport = http(rpcUrl, { batch: true, retryCount: 2, timeout: timeoutMs });
  return {
    publicClient: createPublicClient({ transport }),
    testClient: createTestClient({ mode: 'anvil', transport }),
    walletClient: createWalletClient({ transport }),
  };
}

type ViemClients = ReturnType<typeof createClients>;

/**
 * LedgerClient backed by viem against an anvil endpoint
 */
export class ViemLedgerClient implements LedgerClient {
  readonly rpcUrl: string;
  private readonly publicClient: ViemClients['publicClient'];
  private readonly testClient: ViemClients['testClient'];
  private readonly walletClient: ViemClients['walletClient'];
  private readonly timeoutMs: number;

  constructor(rpcUrl: string, options: { timeoutMs?: number } = {}) {
    this.rpcUrl = rpcUrl;
    this.timeoutMs = options.timeoutMs ?? RPC_TIMEOUT_MS;
    const clients = createClients(rpcUrl, this.timeoutMs);
    this.publicClient = clients.publicClient;
    this.testClient = clients.testClient;
    this.walletClient = clients.walletClient;
  }

  getChainId(): Promise<number> {
    return this.publicClient.getChainId();
  }

  getBlockNumber(): Promise<bigint> {
    return this.publicClient.getBlockNumber({ cacheTime: 0 });
  }

  getBalance(address: Address): Promise<bigint> {
    return this.publicClient.getBalance({ address });
  }

  getNonce(address: Address): Promise<number> {
    return this.publicClient.getTransactionCount({ address, blockTag: 'pending' });
  }

  async getCode(address: Address): Promise<Hex> {
    return (await this.publicClient.getCode({ address })) ?? '0x';
  }

  async getStorageAt(address: Address, slot: Hex): Promise<Hex> {
    return (await this.publicClient.getStorageAt({ address, slot })) ?? '0x';
  }

  getGasPrice(): Promise<bigint> {
    return this.publicClient.getGasPrice();
  }

  readContract(call: ContractCall): Promise<unknown> {
    const fn = parseFunctionSignature(call.signature);
    return this.publicClient.readContract({
      address: call.address,
      abi: [fn],
      functionName: fn.name,
      args: call.args ?? [],
    });
  }

  async sendSignedTransaction(
    account: LocalAccount,
    tx: PreparedTransaction & { nonce: number; chainId: number }
  ): Promise<Hex> {
    const serializedTransaction =
      tx.fee.type === 'eip1559'
        ? await account.signTransaction({
            type: 'eip1559',
            chainId: tx.chainId,
            nonce: tx.nonce,
            to: tx.to,
            value: tx.value,
            data: tx.data,
            gas: tx.gas,
            maxFeePerGas: tx.fee.maxFeePerGas,
            maxPriorityFeePerGas: tx.fee.maxPriorityFeePerGas,
          })
        : await account.signTransaction({
            type: 'legacy',
            chainId: tx.chainId,
            nonce: tx.nonce,
            to: tx.to,
            value: tx.value,
            data: tx.data,
            gas: tx.gas,
            gasPrice: tx.fee.gasPrice,
          });

    return this.publicClient.sendRawTransaction({ serializedTransaction });
  }

  sendImpersonatedTransaction(
    from: Address,
    tx: { to: Address; data?: Hex; value?: bigint }
  ): Promise<Hex> {
    return this.walletClient.sendTransaction({
      account: from,
      chain: null,
      to: tx.to,
      data: tx.data,
      value: tx.value,
    });
  }

  async getReceipt(hash: Hex): Promise<ReceiptInfo | null> {
    try {
      const receipt = await this.publicClient.getTransactionReceipt({ hash });
      return toReceiptInfo(receipt);
    } catch (error) {
      if (error instanceof TransactionReceiptNotFoundError) {
        return null;
      }
      throw error;
    }
  }

  async deployContract(account: LocalAccount, deployment: ContractDeployment): Promise<Address> {
    const data = encodeDeployData({
      abi: deployment.abi,
      bytecode: deployment.bytecode,
      args: deployment.args ?? [],
    });
    const [chainId, nonce, gasPrice, gas] = await Promise.all([
      this.getChainId(),
      this.getNonce(account.address),
      this.getGasPrice(),
      this.publicClient.estimateGas({ account: account.address, data }),
    ]);

    const serializedTransaction = await account.signTransaction({
      type: 'legacy',
      chainId,
      nonce,
      data,
      gas: (gas * 12n) / 10n,
      gasPrice,
    });
    const hash = await this.publicClient.sendRawTransaction({ serializedTransaction });
    const receipt = await this.publicClient.waitForTransactionReceipt({ hash, timeout: 60_000 });

    if (receipt.status !== 'success' || !receipt.contractAddress) {
      throw new Error(`Deployment transaction ${hash} failed`);
    }
    return receipt.contractAddress;
  }

  mine(blocks: number): Promise<void> {
    return this.testClient.mine({ blocks });
  }

  setBalance(address: Address, value: bigint): Promise<void> {
    return this.testClient.setBalance({ address, value });
  }

  setStorageAt(address: Address, slot: Hex, value: Hex): Promise<void> {
    return this.testClient.setStorageAt({ address, index: slot, value });
  }

  impersonate(address: Address): Promise<void> {
    return this.testClient.impersonateAccount({ address });
  }

  stopImpersonating(address: Address): Promise<void> {
    return this.testClient.stopImpersonatingAccount({ address });
  }

  snapshot(): Promise<string> {
    return evmSnapshot(this.rpcUrl, { timeoutMs: this.timeoutMs });
  }

  revert(snapshotId: string): Promise<boolean> {
    return evmRevert(this.rpcUrl, snapshotId, { timeoutMs: this.timeoutMs });
  }
}

export const createViemLedgerClient: LedgerClientFactory = (rpcUrl) => new ViemLedgerClient(rpcUrl);
