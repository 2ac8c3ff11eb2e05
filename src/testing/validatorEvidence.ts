/**
 * Evidence builders for validator tests: snapshots keyed the way the state
 * reader keys them, a mined receipt, a prepared call and a recording
 * preparation host.
 */

import type { Address, Hex } from 'viem';
import { generatePrivateKey, privateKeyToAccount } from 'viem/accounts';
import type { PreparedTransaction } from '../ledger/ledgerClient';
import { stateKey } from '../ledger/stateReader';
import type {
  AttemptEnvironment,
  ParameterInstance,
  ProblemDefinition,
  ReceiptInfo,
  StateSnapshot,
  StateTarget,
  StateValue,
} from '../types/harness';
import type { Evidence } from '../validators/framework';
import { runChecks } from '../validators/framework';
import type { ValidatorRegistry } from '../validators/registry';
import type { PreparationHost } from '../validators/types';
import { InMemoryLedger } from './inMemoryLedger';

export const TEST_TOLERANCES = { amount: 0.001, balance: 0.01 };

export function testEnvironment(agentAddress: Address, fixtures: Record<string, Address> = {}): AttemptEnvironment {
  return { rpcUrl: 'http://127.0.0.1:8545', chainId: 56, agentAddress, fixtures };
}

export function atomicProblem(validator: string): ProblemDefinition {
  return {
    id: validator,
    category: 'atomic',
    group: 'test',
    description: validator,
    templates: [validator],
    parameters: {},
    validation: { validator },
  };
}

export function snapshotOf(entries: Array<[StateTarget, StateValue]>, blockNumber = 100n): StateSnapshot {
  return {
    blockNumber,
    values: Object.fromEntries(entries.map(([target, value]) => [stateKey(target), value])),
  };
}

/** 50 000 gas at 1 gwei. */
export const MINED_RECEIPT: ReceiptInfo = {
  status: 'success',
  success: true,
  submitted: true,
  transactionHash: '0x01',
  blockNumber: 101n,
  gasUsed: 50_000n,
  effectiveGasPrice: 1_000_000_000n,
  logs: [],
};

export function preparedCall(to: Address, data: Hex, value = 0n): PreparedTransaction {
  return { to, value, data, gas: 100_000n, fee: { type: 'legacy', gasPrice: 1_000_000_000n } };
}

export function scoreWith(
  registry: ValidatorRegistry,
  validator: string,
  params: ParameterInstance,
  env: AttemptEnvironment,
  evidence: Omit<Evidence, 'params' | 'env'>
) {
  const bound = registry.bind(atomicProblem(validator), TEST_TOLERANCES);
  const checks = bound.checks(bound.context(params, env));
  return runChecks(checks, { ...evidence, params, env });
}

export interface RecordedCall {
  from: Address | 'identity';
  to: Address;
  data?: Hex;
  value?: bigint;
}

/** A host that mines nothing and answers every call with `receipt`. */
export function recordingHost(receipt: ReceiptInfo = MINED_RECEIPT) {
  const calls: RecordedCall[] = [];
  const host: PreparationHost = {
    ledger: new InMemoryLedger(),
    identity: privateKeyToAccount(generatePrivateKey()),
    sendAsIdentity: async (call) => {
      calls.push({ from: 'identity', ...call });
      return receipt;
    },
    sendAs: async (from, call) => {
      calls.push({ from, ...call });
      return receipt;
    },
  };
  return { host, calls };
}

export async function prepareWith(
  registry: ValidatorRegistry,
  host: PreparationHost,
  validator: string,
  params: ParameterInstance,
  env: AttemptEnvironment
): Promise<void> {
  const bound = registry.bind(atomicProblem(validator), TEST_TOLERANCES);
  await bound.prepare(host, bound.context(params, env));
}
