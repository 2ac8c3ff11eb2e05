/**
 * Result Classifier
 * Turns whatever a skill returned into TransactionIntent, QueryResult or
 * Failure. Precedence is fixed:
 *   1. strings are parsed as JSON
 *   2. non-objects (and arrays) fail
 *   3. query markers win over transaction fields
 *   4. a `to` key makes a transaction intent
 *   5. anything else fails as unclassifiable
 */

import type { ExecutionResult, FailureKind, TransactionIntent } from '../types/harness';

const QUERY_TYPE_MARKER = 'query_result';

export interface ClassifyContext {
  durationMs?: number;
  diagnostics?: string;
}

function failure(kind: FailureKind, message: string, context: ClassifyContext): ExecutionResult {
  return {
    kind: 'failure',
    failureKind: kind,
    message,
    diagnostics: context.diagnostics,
    warnings: [],
    durationMs: context.durationMs ?? 0,
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function isQueryShaped(value: Record<string, unknown>): boolean {
  if (QUERY_TYPE_MARKER in value) return true;
  if (typeof value.type === 'string' && value.type.toLowerCase() === QUERY_TYPE_MARKER) return true;
  if ('balances' in value) return true;
  return value.success === true && !('to' in value) && !('data' in value);
}

function toIntent(value: Record<string, unknown>): TransactionIntent {
  return { ...value, to: value.to };
}

export function classifyResult(raw: unknown, context: ClassifyContext = {}): ExecutionResult {
  let value = raw;

  if (typeof value === 'string') {
    try {
      value = JSON.parse(value);
    } catch (error) {
      return failure(
        'parse',
        `Returned string is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        context
      );
    }
  }

  if (!isPlainObject(value)) {
    return failure('non_object', `Expected an object result, got ${describe(value)}`, context);
  }

  if (isQueryShaped(value)) {
    return {
      kind: 'query',
      payload: Object.freeze({ ...value }),
      warnings: [],
      durationMs: context.durationMs ?? 0,
    };
  }

  if ('to' in value) {
    const warnings: string[] = [];
    if (!('value' in value)) warnings.push('transaction intent has no "value" field');
    if (!('data' in value)) warnings.push('transaction intent has no "data" field');
    for (const warning of warnings) {
      console.warn(`[bridge] ${warning}`);
    }
    return {
      kind: 'transaction',
      intent: toIntent(value),
      warnings,
      durationMs: context.durationMs ?? 0,
    };
  }

  return failure(
    'unclassifiable',
    `Result has neither query markers nor a "to" field (keys: ${Object.keys(value).join(', ') || 'none'})`,
    context
  );
}
