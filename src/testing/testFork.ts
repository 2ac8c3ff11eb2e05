/**
 * Test wiring for LedgerForkController: a launcher that never spawns a
 * process, and a started controller backed by InMemoryLedger.
 */

import type { LocalAccount } from 'viem';
import { parseEther } from 'viem';
import { generatePrivateKey, privateKeyToAccount } from 'viem/accounts';
import type { ForkLauncher, ForkLaunchOptions } from '../fork/anvilLauncher';
import type { ForkSettings } from '../fork/forkController';
import { LedgerForkController } from '../fork/forkController';
import type { AttemptEnvironment, FixtureRegistry } from '../types/harness';
import { InMemoryLedger } from './inMemoryLedger';

export const TEST_FORK_SETTINGS: ForkSettings = {
  forkUrl: 'http://fork-source.invalid',
  anvil: { bin: 'anvil', host: '127.0.0.1', port: 18545, computeUnitsPerSecond: 1000 },
  startupTimeoutMs: 2000,
  submissionTimeoutMs: 1000,
  receiptPollMs: 5,
  wrappedNative: '0xbb4CdB9CBd36B01bD1cBaEBF2De08d9173bc095c',
};

export function fakeForkLauncher(options: { exitImmediately?: boolean } = {}) {
  const launches: ForkLaunchOptions[] = [];
  const launcher: ForkLauncher = (launchOptions) => {
    launches.push(launchOptions);
    let exited = false;
    let resolveExit: (code: number | null) => void = () => undefined;
    const exitedPromise = new Promise<number | null>((resolve) => {
      resolveExit = resolve;
    });
    if (options.exitImmediately) {
      exited = true;
      resolveExit(1);
    }
    return {
      pid: 4242,
      exited: exitedPromise,
      hasExited: () => exited,
      kill: () => {
        if (!exited) {
          exited = true;
          resolveExit(null);
        }
      },
      output: () => 'Error: failed to get fork block number',
    };
  };
  return { launcher, launches };
}

export interface TestFork {
  controller: LedgerForkController;
  ledger: InMemoryLedger;
  identity: LocalAccount;
  env: AttemptEnvironment;
}

/**
 * A started controller whose identity holds `nativeFunding` (10 ether by default).
 */
export async function startTestFork(
  options: { fixtures?: FixtureRegistry; nativeFunding?: bigint; settings?: Partial<ForkSettings> } = {}
): Promise<TestFork> {
  const identity = privateKeyToAccount(generatePrivateKey());
  const ledgers: InMemoryLedger[] = [];
  const controller = new LedgerForkController({
    settings: { ...TEST_FORK_SETTINGS, ...options.settings },
    identity,
    launcher: fakeForkLauncher().launcher,
    clientFactory: (rpcUrl) => {
      const ledger = new InMemoryLedger({ rpcUrl });
      ledgers.push(ledger);
      return ledger;
    },
  });
  const handle = await controller.start();
  await controller.fundAccount(identity.address, options.nativeFunding ?? parseEther('10'));

  const ledger = ledgers[0];
  return {
    controller,
    ledger,
    identity,
    env: {
      rpcUrl: handle.rpcUrl,
      chainId: handle.chainId,
      agentAddress: identity.address,
      fixtures: options.fixtures ?? {},
    },
  };
}
