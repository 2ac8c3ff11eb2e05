/**
 * Core harness types shared across the fork controller, the skill bridge,
 * the executor, validators and the composite orchestrator.
 */

import type { Address, Hex } from 'viem';

// ============================================
// Catalogue
// ============================================

export type ProblemCategory = 'atomic' | 'composite';

export type ParameterType = 'address' | 'number' | 'integer' | 'string' | 'boolean';

export interface ParameterGeneration {
  method: string;
  value?: string | number | boolean;
  values?: ReadonlyArray<string | number>;
  addresses?: readonly string[];
  fixture?: string;
  min?: number;
  max?: number;
  decimals?: number;
  length?: number;
  charset?: string;
  probability?: number;
}

export interface ParameterSchema {
  type: ParameterType;
  generation: ParameterGeneration;
  unit?: string;
  description?: string;
}

export interface ValidationConfig {
  validator: string;
  weights?: Readonly<Record<string, number>>;
  tolerances?: {
    amount?: number;
    balance?: number;
  };
}

/**
 * One expected operation of a composite problem. String params of the form
 * `{name}` are taken from the problem's parameters, `{fixture:key}` from the
 * fixture registry and `{agent}` is the test identity.
 */
export interface CompositeStep {
  readonly validator: string;
  readonly params: Readonly<Record<string, ParameterValue>>;
}

export interface ProblemDefinition {
  readonly id: string;
  readonly category: ProblemCategory;
  readonly group: string;
  readonly description: string;
  readonly templates: readonly string[];
  readonly parameters: Readonly<Record<string, ParameterSchema>>;
  readonly validation: ValidationConfig;
  readonly optimalStepCount?: number;
  readonly planning?: boolean;
  /** Composite only: validators that score each submitted step, in order. */
  readonly steps?: readonly CompositeStep[];
}

export type ParameterValue = string | number | boolean;

export type ParameterInstance = Readonly<Record<string, ParameterValue>>;

// ============================================
// Environment handed to candidate code
// ============================================

export type FixtureRegistry = Readonly<Record<string, Address>>;

export interface AttemptEnvironment {
  rpcUrl: string;
  chainId: number;
  agentAddress: Address;
  fixtures: FixtureRegistry;
}

// ============================================
// Execution results
// ============================================

/**
 * Raw field set returned by candidate code. Nothing here is validated yet;
 * the transaction executor decides whether it can be signed.
 */
export interface TransactionIntent {
  to: unknown;
  value?: unknown;
  data?: unknown;
  gas?: unknown;
  gasLimit?: unknown;
  gasPrice?: unknown;
  maxFeePerGas?: unknown;
  maxPriorityFeePerGas?: unknown;
  nonce?: unknown;
  type?: unknown;
  [extra: string]: unknown;
}

export type QueryPayload = Readonly<Record<string, unknown>>;

export type FailureKind =
  | 'timeout'
  | 'runtime'
  | 'entry_point'
  | 'parse'
  | 'non_object'
  | 'unclassifiable'
  | 'spawn'
  | 'protocol'
  | 'malformed_intent'
  | 'generation';

interface ResultBase {
  warnings: readonly string[];
  durationMs: number;
}

export interface TransactionResult extends ResultBase {
  kind: 'transaction';
  intent: TransactionIntent;
}

export interface QueryResult extends ResultBase {
  kind: 'query';
  payload: QueryPayload;
}

export interface FailureResult extends ResultBase {
  kind: 'failure';
  failureKind: FailureKind;
  message: string;
  diagnostics?: string;
}

export type ExecutionResult = TransactionResult | QueryResult | FailureResult;

// ============================================
// Ledger state
// ============================================

export type StateTarget =
  | { kind: 'nativeBalance'; address: Address }
  | { kind: 'nonce'; address: Address }
  | { kind: 'tokenBalance'; token: Address; owner: Address }
  | { kind: 'allowance'; token: Address; owner: Address; spender: Address }
  | { kind: 'storage'; address: Address; slot: Hex }
  | { kind: 'codeSize'; address: Address }
  | { kind: 'gasPrice' }
  | {
      kind: 'contractRead';
      address: Address;
      signature: string;
      args: readonly (string | bigint | boolean)[];
      resultIndex?: number;
    };

export type StateValue = bigint | string | boolean | null;

export interface StateSnapshot {
  blockNumber: bigint;
  values: Readonly<Record<string, StateValue>>;
}

export interface LogEntry {
  address: Address;
  topics: readonly Hex[];
  data: Hex;
}

export type ReceiptStatus = 'success' | 'reverted' | 'rejected' | 'timeout';

export interface ReceiptInfo {
  status: ReceiptStatus;
  success: boolean;
  submitted: boolean;
  transactionHash?: Hex;
  blockNumber?: bigint;
  gasUsed: bigint;
  effectiveGasPrice: bigint;
  logs: readonly LogEntry[];
  error?: string;
}

// ============================================
// Validation
// ============================================

export interface CheckResult {
  name: string;
  passed: boolean;
  critical: boolean;
  points: number;
  maxPoints: number;
  message: string;
}

export interface ValidationReport {
  checks: readonly CheckResult[];
  score: number;
  maxScore: number;
  passed: boolean;
  feedback: string;
}

// ============================================
// Results
// ============================================

export type ErrorCategory = 'execution' | 'submission' | 'validation' | 'none';

export interface CompositeSummary {
  steps: number;
  optimalSteps: number;
  maxSteps: number;
  efficiencyFactor: number;
  baseScore: number;
  plan: readonly string[];
  stepReports: readonly ValidationReport[];
  /** Validator that scored each step; null where only success was checked. */
  stepValidators: readonly (string | null)[];
  hitStepCap: boolean;
}

export interface ResultArtifact {
  problemId: string;
  category: ProblemCategory;
  prompt: string;
  parameters: ParameterInstance;
  executionSuccess: boolean;
  resultKind: ExecutionResult['kind'] | 'none';
  errorCategory: ErrorCategory;
  error?: string;
  score: number;
  maxScore: number;
  passed: boolean;
  checks: readonly CheckResult[];
  feedback: string;
  durationMs: number;
  warnings: readonly string[];
  transactionHash?: Hex;
  composite?: CompositeSummary;
}
