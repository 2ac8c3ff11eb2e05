/**
 * Ledger Fork Controller
 * Owns one anvil fork: launch, readiness, funding, fixture deployment and
 * snapshot/revert isolation. One attempt at a time per controller.
 */

import type { Address, Hex, LocalAccount } from 'viem';
import { encodeAbiParameters, encodeFunctionData, erc20Abi, keccak256, pad, parseEther, toHex } from 'viem';
import type { HarnessConfig } from '../config';
import { EnvironmentFatalError, errorMessage } from '../errors';
import { encodeSignatureCall } from '../ledger/abiSignature';
import { waitForReceipt } from '../ledger/evmReceipt';
import type { LedgerClient, LedgerClientFactory } from '../ledger/ledgerClient';
import { createViemLedgerClient } from '../ledger/ledgerClient';
import { readState } from '../ledger/stateReader';
import { logEvent } from '../telemetry/logger';
import type { FixtureRegistry, ReceiptInfo, StateSnapshot, StateTarget } from '../types/harness';
import { calculateBackoffDelay, sleep } from '../utils/retryHandler';
import type { ForkLauncher, ForkProcess } from './anvilLauncher';
import { findFreePort, spawnAnvil } from './anvilLauncher';
import type { ArtifactLoader, FixtureManifest } from './fixtureManifest';
import { resolveFixtureArg } from './fixtureManifest';

export interface TokenGrant {
  token: Address;
  amount: bigint;
  /** Mapping slot of balanceOf; the balance is written directly when given. */
  balanceSlot?: number;
  /** Account holding enough tokens to transfer the shortfall from. */
  holder?: Address;
}

export interface ForkSettings {
  forkUrl: string;
  expectedChainId?: number;
  anvil: {
    bin: string;
    host: string;
    port: number;
    computeUnitsPerSecond: number;
  };
  startupTimeoutMs: number;
  submissionTimeoutMs: number;
  receiptPollMs: number;
  wrappedNative?: Address;
}

export interface ForkHandle {
  readonly rpcUrl: string;
  readonly port: number;
  readonly chainId: number;
  readonly pid: number | undefined;
}

export interface ForkControllerOptions {
  settings: ForkSettings;
  identity: LocalAccount;
  manifest?: FixtureManifest;
  artifactLoader?: ArtifactLoader;
  launcher?: ForkLauncher;
  clientFactory?: LedgerClientFactory;
  portFinder?: (host: string) => Promise<number>;
}

interface FundingRecord {
  address: Address;
  nativeAmount: bigint;
  grants: readonly TokenGrant[];
}

const SETUP_GAS = 1_000_000n;
const HOLDER_GAS_BALANCE = parseEther('10');

export function forkSettingsFromConfig(config: HarnessConfig): ForkSettings {
  return {
    forkUrl: config.forkUrl,
    expectedChainId: config.chainId,
    anvil: { ...config.anvil },
    startupTimeoutMs: config.timeouts.startupMs,
    submissionTimeoutMs: config.timeouts.submissionMs,
    receiptPollMs: config.timeouts.receiptPollMs,
    wrappedNative: config.wrappedNative,
  };
}

export class LedgerForkController {
  readonly identity: LocalAccount;
  private readonly settings: ForkSettings;
  private readonly manifest?: FixtureManifest;
  private readonly artifactLoader?: ArtifactLoader;
  private readonly launcher: ForkLauncher;
  private readonly clientFactory: LedgerClientFactory;
  private readonly portFinder: (host: string) => Promise<number>;

  private process: ForkProcess | null = null;
  private client: LedgerClient | null = null;
  private currentHandle: ForkHandle | null = null;
  private forkSourceUrl: string;
  private fixtures: FixtureRegistry | null = null;
  private fundings: FundingRecord[] = [];

  constructor(options: ForkControllerOptions) {
    this.settings = options.settings;
    this.identity = options.identity;
    this.manifest = options.manifest;
    this.artifactLoader = options.artifactLoader;
    this.launcher = options.launcher ?? spawnAnvil;
    this.clientFactory = options.clientFactory ?? createViemLedgerClient;
    this.portFinder = options.portFinder ?? findFreePort;
    this.forkSourceUrl = options.settings.forkUrl;
  }

  get handle(): ForkHandle {
    if (!this.currentHandle) {
      throw new Error('[fork] Controller not started');
    }
    return this.currentHandle;
  }

  get ledger(): LedgerClient {
    if (!this.client) {
      throw new Error('[fork] Controller not started');
    }
    return this.client;
  }

  get fixtureRegistry(): FixtureRegistry {
    if (!this.fixtures) {
      throw new Error('[fork] Fixtures not deployed');
    }
    return this.fixtures;
  }

  isRunning(): boolean {
    return this.process !== null && !this.process.hasExited();
  }

  // ============================================
  // Lifecycle
  // ============================================

  async start(forkSourceUrl: string = this.settings.forkUrl): Promise<ForkHandle> {
    if (this.process) {
      throw new Error('[fork] Controller already started');
    }
    this.forkSourceUrl = forkSourceUrl;

    const { host } = this.settings.anvil;
    const port = this.settings.anvil.port > 0 ? this.settings.anvil.port : await this.portFinder(host);
    const rpcUrl = `http://${host}:${port}`;

    let proc: ForkProcess;
    try {
      proc = this.launcher({
        bin: this.settings.anvil.bin,
        forkUrl: forkSourceUrl,
        host,
        port,
        computeUnitsPerSecond: this.settings.anvil.computeUnitsPerSecond,
      });
    } catch (error) {
      throw new EnvironmentFatalError('FORK_LAUNCH_FAILED', `Could not launch ${this.settings.anvil.bin}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    this.process = proc;
    const client = this.clientFactory(rpcUrl);
    const startedAt = Date.now();

    let chainId: number;
    try {
      chainId = await this.waitUntilReady(proc, client);
    } catch (error) {
      proc.kill();
      this.process = null;
      throw error;
    }

    if (this.settings.expectedChainId !== undefined && chainId !== this.settings.expectedChainId) {
      console.warn(`[fork] Chain id ${chainId} differs from expected ${this.settings.expectedChainId}`);
    }

    this.client = client;
    this.currentHandle = Object.freeze({ rpcUrl, port, chainId, pid: proc.pid });
    console.log(`[fork] Ready at ${rpcUrl} (chain ${chainId}, pid ${proc.pid ?? 'n/a'})`);
    logEvent('fork_started', { rpcUrl, pid: proc.pid, latencyMs: Date.now() - startedAt });
    return this.currentHandle;
  }

  private async waitUntilReady(proc: ForkProcess, client: LedgerClient): Promise<number> {
    const deadline = Date.now() + this.settings.startupTimeoutMs;
    let attempt = 0;
    let lastError = 'no response';

    while (Date.now() < deadline) {
      if (proc.hasExited()) {
        throw new EnvironmentFatalError(
          'FORK_EXITED',
          `Fork process exited during startup. Output:\n${proc.output().slice(-2000)}`
        );
      }
      try {
        return await client.getChainId();
      } catch (error) {
        lastError = errorMessage(error);
      }
      const delay = Math.min(
        calculateBackoffDelay(attempt++, 100, 2000, 0.2),
        Math.max(0, deadline - Date.now())
      );
      await Promise.race([sleep(delay), proc.exited]);
    }

    if (proc.hasExited()) {
      throw new EnvironmentFatalError('FORK_EXITED', `Fork process exited during startup. Output:\n${proc.output().slice(-2000)}`);
    }
    throw new EnvironmentFatalError(
      'FORK_START_TIMEOUT',
      `Fork did not answer within ${this.settings.startupTimeoutMs}ms (last error: ${lastError})`
    );
  }

  async stop(): Promise<void> {
    const proc = this.process;
    this.process = null;
    this.client = null;
    this.currentHandle = null;
    if (!proc) return;

    proc.kill();
    await Promise.race([proc.exited, sleep(5000)]);
    logEvent('fork_stopped', { pid: proc.pid });
  }

  // ============================================
  // Funding
  // ============================================

  async fundAccount(address: Address, nativeAmount: bigint, tokenGrants: readonly TokenGrant[] = []): Promise<void> {
    const client = this.ledger;
    try {
      await client.setBalance(address, nativeAmount);
      for (const grant of tokenGrants) {
        await this.applyTokenGrant(client, address, grant);
      }
    } catch (error) {
      if (error instanceof EnvironmentFatalError) throw error;
      throw new EnvironmentFatalError('FUNDING_FAILED', `Funding ${address} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!this.fundings.some((f) => f.address.toLowerCase() === address.toLowerCase())) {
      this.fundings.push({ address, nativeAmount, grants: tokenGrants });
    }
    logEvent('account_funded', { notes: [address, nativeAmount.toString()] });
  }

  private async tokenBalance(client: LedgerClient, token: Address, owner: Address): Promise<bigint> {
    const raw = await client.readContract({
      address: token,
      signature: 'function balanceOf(address owner) view returns (uint256)',
      args: [owner],
    });
    return typeof raw === 'bigint' ? raw : 0n;
  }

  private async applyTokenGrant(client: LedgerClient, owner: Address, grant: TokenGrant): Promise<void> {
    const current = await this.tokenBalance(client, grant.token, owner);
    if (current >= grant.amount) {
      return;
    }

    if (grant.balanceSlot !== undefined) {
      const slot = keccak256(
        encodeAbiParameters([{ type: 'address' }, { type: 'uint256' }], [owner, BigInt(grant.balanceSlot)])
      );
      await client.setStorageAt(grant.token, slot, pad(toHex(grant.amount), { size: 32 }));
    } else if (grant.holder) {
      await client.impersonate(grant.holder);
      try {
        await client.setBalance(grant.holder, HOLDER_GAS_BALANCE);
        const hash = await client.sendImpersonatedTransaction(grant.holder, {
          to: grant.token,
          data: encodeFunctionData({ abi: erc20Abi, functionName: 'transfer', args: [owner, grant.amount - current] }),
        });
        const receipt = await this.waitFor(hash);
        if (!receipt.success) {
          throw new Error(`holder transfer ${hash} ${receipt.status}`);
        }
      } finally {
        await client.stopImpersonating(grant.holder);
      }
    } else {
      throw new Error(`token grant for ${grant.token} needs a balanceSlot or a holder`);
    }

    const after = await this.tokenBalance(client, grant.token, owner);
    if (after < grant.amount) {
      throw new EnvironmentFatalError(
        'FUNDING_FAILED',
        `Token ${grant.token} balance for ${owner} is ${after} after funding, wanted ${grant.amount}`
      );
    }
  }

  // ============================================
  // Fixtures
  // ============================================

  async deployFixtures(): Promise<FixtureRegistry> {
    if (this.fixtures) {
      return this.fixtures;
    }
    const client = this.ledger;
    const deployed: Record<string, Address> = {};

    if (this.settings.wrappedNative) {
      deployed['wrapped-native'] = this.settings.wrappedNative;
    }

    try {
      if (this.manifest) {
        if (!this.artifactLoader) {
          throw new Error('a fixture manifest needs an artifact loader');
        }
        Object.assign(deployed, this.manifest.external);

        for (const entry of this.manifest.fixtures) {
          const artifact = await this.artifactLoader(entry.contract);
          const args = entry.args.map((arg) => resolveFixtureArg(arg, this.identity.address, deployed));
          deployed[entry.key] = await client.deployContract(this.identity, {
            abi: artifact.abi,
            bytecode: artifact.bytecode,
            args,
          });
          console.log(`[fork] Deployed ${entry.key} (${entry.contract}) at ${deployed[entry.key]}`);
        }

        for (const call of this.manifest.setup) {
          const args = call.args.map((arg) => resolveFixtureArg(arg, this.identity.address, deployed));
          const receipt = await this.sendAsIdentity({
            to: deployed[call.target],
            data: encodeSignatureCall(call.signature, args),
            value: call.value === undefined ? 0n : BigInt(call.value),
          });
          if (!receipt.success) {
            throw new Error(`setup call ${call.signature} on ${call.target} ${receipt.status}: ${receipt.error ?? ''}`);
          }
        }
      }
    } catch (error) {
      throw new EnvironmentFatalError('FIXTURE_DEPLOY_FAILED', `Fixture deployment failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    this.fixtures = Object.freeze({ ...deployed });
    logEvent('fixtures_deployed', { notes: Object.keys(this.fixtures) });
    return this.fixtures;
  }

  /**
   * Sign and send a call from the test identity, waiting for its receipt.
   * Used for fixture setup and per-problem preparation.
   */
  async sendAsIdentity(call: { to: Address; data?: Hex; value?: bigint }): Promise<ReceiptInfo> {
    const client = this.ledger;
    const [nonce, gasPrice] = await Promise.all([client.getNonce(this.identity.address), client.getGasPrice()]);
    const hash = await client.sendSignedTransaction(this.identity, {
      to: call.to,
      value: call.value ?? 0n,
      data: call.data ?? '0x',
      gas: SETUP_GAS,
      nonce,
      chainId: this.handle.chainId,
      fee: { type: 'legacy', gasPrice },
    });
    return this.waitFor(hash);
  }

  /**
   * Send a call from an arbitrary account through impersonation. The account
   * is topped up to HOLDER_GAS_BALANCE when it holds less.
   */
  async sendAs(from: Address, call: { to: Address; data?: Hex; value?: bigint }): Promise<ReceiptInfo> {
    const client = this.ledger;
    await client.impersonate(from);
    try {
      if ((await client.getBalance(from)) < HOLDER_GAS_BALANCE) {
        await client.setBalance(from, HOLDER_GAS_BALANCE);
      }
      const hash = await client.sendImpersonatedTransaction(from, call);
      return await this.waitFor(hash);
    } finally {
      await client.stopImpersonating(from);
    }
  }

  private waitFor(hash: Hex): Promise<ReceiptInfo> {
    return waitForReceipt(this.ledger, hash, {
      timeoutMs: this.settings.submissionTimeoutMs,
      pollMs: this.settings.receiptPollMs,
    });
  }

  // ============================================
  // Isolation
  // ============================================

  async snapshot(): Promise<string> {
    try {
      const id = await this.ledger.snapshot();
      logEvent('snapshot_taken', { snapshotId: id });
      return id;
    } catch (error) {
      throw new EnvironmentFatalError('SNAPSHOT_FAILED', `evm_snapshot failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Restore a snapshot. Any failure restarts the fork and is fatal for the batch.
   */
  async revert(snapshotId: string): Promise<void> {
    let reverted = false;
    let cause: unknown;
    try {
      reverted = await this.ledger.revert(snapshotId);
    } catch (error) {
      cause = error;
    }

    if (reverted) {
      logEvent('snapshot_reverted', { snapshotId });
      return;
    }

    const reason = cause === undefined ? `snapshot ${snapshotId} unknown or expired` : errorMessage(cause);
    console.error(`[fork] Revert failed (${reason}); restarting the fork`);
    try {
      await this.restart();
    } catch (restartError) {
      throw new EnvironmentFatalError('REVERT_FAILED', `Revert failed (${reason}) and restart failed: ${errorMessage(restartError)}`, {
        cause: restartError,
      });
    }
    throw new EnvironmentFatalError('REVERT_FAILED', `Revert failed (${reason}); fork was restarted`, {
      cause,
      restarted: true,
    });
  }

  /**
   * Run fn between a snapshot and a revert of that snapshot.
   */
  async isolate<T>(fn: (snapshotId: string) => Promise<T>): Promise<T> {
    const snapshotId = await this.snapshot();
    try {
      return await fn(snapshotId);
    } finally {
      await this.revert(snapshotId);
    }
  }

  readState(targets: readonly StateTarget[]): Promise<StateSnapshot> {
    return readState(this.ledger, targets);
  }

  private async restart(): Promise<void> {
    const previousFixtures = this.fixtures;
    const fundings = [...this.fundings];

    await this.stop();
    await this.start(this.forkSourceUrl);

    for (const funding of fundings) {
      await this.fundAccount(funding.address, funding.nativeAmount, funding.grants);
    }

    if (previousFixtures) {
      this.fixtures = null;
      const redeployed = await this.deployFixtures();
      const moved = Object.keys(previousFixtures).filter(
        (key) => redeployed[key]?.toLowerCase() !== previousFixtures[key].toLowerCase()
      );
      if (moved.length > 0) {
        throw new Error(`fixtures moved after restart: ${moved.join(', ')}`);
      }
    }
    logEvent('fork_restarted', { rpcUrl: this.handle.rpcUrl });
  }
}
