/**
 * EVM RPC Utilities
 * Lightweight JSON-RPC helpers for the simulator's privileged methods
 */

/**
 * JSON-RPC Response type
 */
type JsonRpcResponse<T = unknown> = {
  result?: T;
  error?: { message?: string; code?: number; data?: unknown };
};

let requestId = 0;

export const RPC_TIMEOUT_MS = 10_000;

export interface RpcRequestOptions {
  timeoutMs?: number;
}

function isJsonRpcResponse(value: unknown): value is JsonRpcResponse {
  return typeof value === 'object' && value !== null && ('result' in value || 'error' in value);
}

/**
 * Send one JSON-RPC request and return its raw result.
 * Throws on transport failures, on RPC-level errors and when no response
 * arrives within the timeout.
 */
export async function rpcRequest(
  rpcUrl: string,
  method: string,
  params: readonly unknown[] = [],
  options: RpcRequestOptions = {}
): Promise<unknown> {
  const timeoutMs = options.timeoutMs ?? RPC_TIMEOUT_MS;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(rpcUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        jsonrpc: '2.0',
        id: ++requestId,
        method,
        params,
      }),
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(`RPC request failed: ${response.status} ${response.statusText}`);
    }

    const jsonResult: unknown = await response.json();
    if (!isJsonRpcResponse(jsonResult)) {
      throw new Error(`RPC error: malformed response to ${method}`);
    }

    if (jsonResult.error) {
      throw new Error(`RPC error (${method}): ${jsonResult.error.message || 'Unknown error'}`);
    }

    return jsonResult.result;
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error(`RPC request timed out: ${method} after ${timeoutMs}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * evm_snapshot returns a hex id
 */
export async function evmSnapshot(rpcUrl: string, options?: RpcRequestOptions): Promise<string> {
  const result = await rpcRequest(rpcUrl, 'evm_snapshot', [], options);
  if (typeof result !== 'string') {
    throw new Error(`RPC error: evm_snapshot returned ${JSON.stringify(result)}`);
  }
  return result;
}

/**
 * evm_revert returns false for unknown or already consumed ids
 */
export async function evmRevert(rpcUrl: string, snapshotId: string, options?: RpcRequestOptions): Promise<boolean> {
  const result = await rpcRequest(rpcUrl, 'evm_revert', [snapshotId], options);
  return result === true;
}
