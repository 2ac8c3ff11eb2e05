import { afterEach, describe, expect, it, vi } from 'vitest';
import { evmRevert, evmSnapshot, rpcRequest } from './evmRpc';
import { ViemLedgerClient } from './ledgerClient';

const RPC_URL = 'http://127.0.0.1:18545';

function respondWith(body: unknown, status = 200) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
  );
}

/** A fetch that never answers and only settles when its signal aborts. */
function hangingFetch() {
  return vi.fn(
    (_input: string | URL | Request, init?: RequestInit) =>
      new Promise<Response>((_, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
      })
  );
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('rpcRequest', () => {
  it('returns the result of a JSON-RPC response', async () => {
    const fetchMock = respondWith({ jsonrpc: '2.0', id: 1, result: '0x2a' });
    vi.stubGlobal('fetch', fetchMock);

    await expect(rpcRequest(RPC_URL, 'evm_snapshot')).resolves.toBe('0x2a');
    const init = fetchMock.mock.calls[0][1];
    expect(typeof init?.body === 'string' ? JSON.parse(init.body) : null).toMatchObject({
      jsonrpc: '2.0',
      method: 'evm_snapshot',
      params: [],
    });
  });

  it('surfaces RPC-level errors', async () => {
    vi.stubGlobal('fetch', respondWith({ jsonrpc: '2.0', id: 1, error: { code: -32601, message: 'method not found' } }));

    await expect(rpcRequest(RPC_URL, 'evm_revert', ['0x1'])).rejects.toThrow('RPC error (evm_revert): method not found');
  });

  it('surfaces HTTP failures', async () => {
    vi.stubGlobal('fetch', respondWith('bad gateway', 502));

    await expect(rpcRequest(RPC_URL, 'evm_snapshot')).rejects.toThrow('RPC request failed: 502');
  });

  it('gives up on an endpoint that never answers', async () => {
    vi.stubGlobal('fetch', hangingFetch());

    await expect(rpcRequest(RPC_URL, 'evm_snapshot', [], { timeoutMs: 25 })).rejects.toThrow(
      'RPC request timed out: evm_snapshot after 25ms'
    );
  });
});

describe('evmSnapshot / evmRevert', () => {
  it('rejects a non-string snapshot id', async () => {
    vi.stubGlobal('fetch', respondWith({ jsonrpc: '2.0', id: 1, result: 7 }));

    await expect(evmSnapshot(RPC_URL)).rejects.toThrow('RPC error: evm_snapshot returned 7');
  });

  it('reports whether the revert was applied', async () => {
    vi.stubGlobal('fetch', respondWith({ jsonrpc: '2.0', id: 1, result: false }));

    await expect(evmRevert(RPC_URL, '0x1')).resolves.toBe(false);
  });
});

describe('ViemLedgerClient isolation calls', () => {
  it('fails snapshot and revert on a hung fork instead of waiting forever', async () => {
    vi.stubGlobal('fetch', hangingFetch());
    const client = new ViemLedgerClient(RPC_URL, { timeoutMs: 30 });

    await expect(client.snapshot()).rejects.toThrow('RPC request timed out: evm_snapshot after 30ms');
    await expect(client.revert('0x1')).rejects.toThrow('RPC request timed out: evm_revert after 30ms');
  });
});
