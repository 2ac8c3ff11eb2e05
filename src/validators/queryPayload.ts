/**
 * Query results arrive in a few shapes:
 *   { success, data: { ... } }
 *   { query_result: { success, data: { ... } } }
 *   { type: 'QUERY_RESULT', ...fields }
 * These helpers flatten them so checks can look fields up by name.
 */

import type { QueryPayload } from '../types/harness';
import { readQuantity } from '../utils/amounts';

function asRecord(value: unknown): Record<string, unknown> | null {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : null;
}

export function queryData(payload: QueryPayload): Record<string, unknown> {
  const nested = asRecord(payload.query_result);
  return {
    ...payload,
    ...(nested ?? {}),
    ...(asRecord(payload.data) ?? {}),
    ...(asRecord(nested?.data) ?? {}),
  };
}

export function queryReportedSuccess(payload: QueryPayload): { success: boolean; error?: string } {
  const nested = asRecord(payload.query_result);
  const flag = nested && 'success' in nested ? nested.success : payload.success;
  const error = nested?.error ?? payload.error;
  if (flag === false) {
    return { success: false, error: typeof error === 'string' ? error : undefined };
  }
  return { success: true };
}

export function queryQuantity(payload: QueryPayload, field: string): bigint | null {
  return readQuantity(queryData(payload)[field]);
}
