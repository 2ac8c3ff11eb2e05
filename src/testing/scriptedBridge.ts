/**
 * Stand-in for CodeExecutionBridge that replays canned skill results.
 */

import type { SkillRunner } from '../harness/stepExecution';
import type { SkillRunRequest } from '../skill/skillBridge';
import { classifyResult } from '../skill/resultClassifier';
import type { ExecutionResult } from '../types/harness';

export class ScriptedBridge implements SkillRunner {
  readonly requests: SkillRunRequest[] = [];
  private readonly queue: ExecutionResult[];

  constructor(results: readonly ExecutionResult[] = []) {
    this.queue = [...results];
  }

  /** Queue whatever a skill would have returned; it is classified like real output. */
  returns(raw: unknown): this {
    this.queue.push(classifyResult(raw, { durationMs: 5 }));
    return this;
  }

  fails(result: Omit<Extract<ExecutionResult, { kind: 'failure' }>, 'kind' | 'warnings' | 'durationMs'>): this {
    this.queue.push({ kind: 'failure', warnings: [], durationMs: 5, ...result });
    return this;
  }

  async run(request: SkillRunRequest): Promise<ExecutionResult> {
    this.requests.push(request);
    const next = this.queue.shift();
    if (!next) {
      throw new Error('ScriptedBridge has no result left');
    }
    return next;
  }
}
