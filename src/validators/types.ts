import type { Address, Hex, LocalAccount } from 'viem';
import type { LedgerClient } from '../ledger/ledgerClient';
import type {
  AttemptEnvironment,
  ParameterInstance,
  ReceiptInfo,
  StateTarget,
} from '../types/harness';
import type { CheckDefinition } from './framework';

export interface Tolerances {
  amount: number;
  balance: number;
}

export interface ValidatorContext {
  params: ParameterInstance;
  env: AttemptEnvironment;
  tolerances: Tolerances;
}

/**
 * What problem setup may use: the fork's client and the test identity.
 * LedgerForkController satisfies this.
 */
export interface PreparationHost {
  readonly ledger: LedgerClient;
  readonly identity: LocalAccount;
  sendAsIdentity(call: { to: Address; data?: Hex; value?: bigint }): Promise<ReceiptInfo>;
  /** Send from any account through fork impersonation, topping up its gas money first. */
  sendAs(from: Address, call: { to: Address; data?: Hex; value?: bigint }): Promise<ReceiptInfo>;
}

export type ValidatorMode = 'transaction' | 'query';

export interface ProblemValidator {
  readonly id: string;
  readonly mode: ValidatorMode;
  stateTargets(ctx: ValidatorContext): StateTarget[];
  checks(ctx: ValidatorContext): CheckDefinition[];
  /** Setup run inside the isolation bracket, before the candidate code. */
  prepare?(host: PreparationHost, ctx: ValidatorContext): Promise<void>;
}
