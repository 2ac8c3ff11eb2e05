/**
 * Step Execution
 * One candidate source unit through the bridge and, for a transaction, the
 * executor. Shared by the atomic attempt runner and the composite orchestrator.
 */

import { MalformedIntentError } from '../errors';
import { TransactionExecutor } from '../executors/transactionExecutor';
import type { SkillRunRequest } from '../skill/skillBridge';
import type { AttemptLogger } from '../telemetry/logger';
import type {
  AttemptEnvironment,
  ExecutionResult,
  FixtureRegistry,
  StateSnapshot,
  StateTarget,
} from '../types/harness';
import type { Evidence } from '../validators/framework';
import type { PreparationHost } from '../validators/types';

/**
 * The fork as the harness sees it. LedgerForkController satisfies this.
 */
export interface HarnessHost extends PreparationHost {
  readonly handle: { readonly rpcUrl: string; readonly chainId: number };
  readonly fixtureRegistry: FixtureRegistry;
  isolate<T>(fn: (snapshotId: string) => Promise<T>): Promise<T>;
  readState(targets: readonly StateTarget[]): Promise<StateSnapshot>;
}

export interface SkillRunner {
  run(request: SkillRunRequest): Promise<ExecutionResult>;
}

export interface StepDependencies {
  host: HarnessHost;
  bridge: SkillRunner;
  submissionTimeoutMs: number;
  receiptPollMs?: number;
}

export type StepEvidence = Omit<Evidence, 'params' | 'env'>;

export interface StepExecution {
  result: ExecutionResult;
  evidence: StepEvidence;
}

export function environmentOf(host: HarnessHost): AttemptEnvironment {
  return {
    rpcUrl: host.handle.rpcUrl,
    chainId: host.handle.chainId,
    agentAddress: host.identity.address,
    fixtures: host.fixtureRegistry,
  };
}

/**
 * Run `source` and collect evidence over `targets`. Queries are read around
 * the bridge run and never reach the executor.
 */
export async function executeSource(
  source: string,
  env: AttemptEnvironment,
  targets: readonly StateTarget[],
  deps: StepDependencies,
  logger?: AttemptLogger
): Promise<StepExecution> {
  const { host, bridge } = deps;
  const before = await host.readState(targets);

  const result = await bridge.run({
    source,
    rpcUrl: env.rpcUrl,
    agentAddress: env.agentAddress,
    fixtures: env.fixtures,
  });

  switch (result.kind) {
    case 'failure':
      return { result, evidence: { before } };

    case 'query': {
      const after = await host.readState(targets);
      return { result, evidence: { query: result.payload, before, after } };
    }

    case 'transaction': {
      const executor = new TransactionExecutor({
        ledger: host.ledger,
        identity: host.identity,
        chainId: env.chainId,
        submissionTimeoutMs: deps.submissionTimeoutMs,
        receiptPollMs: deps.receiptPollMs,
        logger,
      });
      try {
        const outcome = await executor.execute(result.intent, targets);
        return {
          result,
          evidence: {
            intent: result.intent,
            request: outcome.request,
            receipt: outcome.receipt,
            before: outcome.before,
            after: outcome.after,
          },
        };
      } catch (error) {
        if (!(error instanceof MalformedIntentError)) throw error;
        return {
          result: {
            kind: 'failure',
            failureKind: 'malformed_intent',
            message: error.message,
            warnings: result.warnings,
            durationMs: result.durationMs,
          },
          evidence: { intent: result.intent, before },
        };
      }
    }
  }
}
