import { describe, expect, it, vi } from 'vitest';
import { pad } from 'viem';
import { InMemoryLedger } from '../testing/inMemoryLedger';
import {
  allowance,
  codeSize,
  contractRead,
  gasPrice,
  nativeBalance,
  nonceOf,
  storageSlot,
  tokenBalance,
} from '../validators/targets';
import { readState, snapshotBigInt, snapshotValue, stateKey } from './stateReader';

const OWNER = '0x00000000000000000000000000000000000000aa';
const SPENDER = '0x00000000000000000000000000000000000000bb';
const TOKEN = '0x0000000000000000000000000000000000000011';
const POOL = '0x0000000000000000000000000000000000000022';
const VAULT = '0x0000000000000000000000000000000000000033';

const USER_INFO = 'function userInfo(address user) view returns (uint256 amount, uint256 rewardDebt)';

describe('stateKey', () => {
  it('ignores address case', () => {
    expect(stateKey(nativeBalance('0x00000000000000000000000000000000000000AA'))).toBe(stateKey(nativeBalance(OWNER)));
    expect(stateKey(allowance(TOKEN, OWNER, SPENDER))).toBe(`allowance:${TOKEN}:${OWNER}:${SPENDER}`);
  });

  it('distinguishes view call arguments and result index', () => {
    expect(stateKey(contractRead(POOL, USER_INFO, [OWNER], 0))).toBe(`contractRead:${POOL}:${USER_INFO}(${OWNER})#0`);
    expect(stateKey(contractRead(POOL, USER_INFO, [OWNER], 0))).not.toBe(stateKey(contractRead(POOL, USER_INFO, [OWNER], 1)));
  });
});

describe('readState', () => {
  it('reads every target kind', async () => {
    const ledger = new InMemoryLedger();
    await ledger.setBalance(OWNER, 5n);
    ledger.addToken(TOKEN);
    ledger.setTokenBalance(TOKEN, OWNER, 7n);
    ledger.setAllowance(TOKEN, OWNER, SPENDER, 3n);
    const slot = pad('0x01', { size: 32 });
    await ledger.setStorageAt(VAULT, slot, pad('0x2a', { size: 32 }));
    ledger.onRead(POOL, 'userInfo', () => [10n, 20n]);

    const targets = [
      nativeBalance(OWNER),
      nonceOf(OWNER),
      tokenBalance(TOKEN, OWNER),
      allowance(TOKEN, OWNER, SPENDER),
      storageSlot(VAULT, slot),
      codeSize(TOKEN),
      gasPrice(),
      contractRead(POOL, USER_INFO, [OWNER], 1),
      contractRead(TOKEN, 'function decimals() view returns (uint8)'),
    ];
    const snapshot = await readState(ledger, targets);

    expect(snapshot.blockNumber).toBe(1000n);
    expect(targets.map((target) => snapshotValue(snapshot, target))).toEqual([
      5n,
      0n,
      7n,
      3n,
      42n,
      2n,
      1_000_000_000n,
      20n,
      18n,
    ]);
  });

  it('records a failed read as null without failing the snapshot', async () => {
    const ledger = new InMemoryLedger();
    await ledger.setBalance(OWNER, 1n);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const missing = contractRead(POOL, 'function totalStaked() view returns (uint256)');
    const snapshot = await readState(ledger, [nativeBalance(OWNER), missing]);

    expect(snapshotValue(snapshot, missing)).toBeNull();
    expect(snapshotBigInt(snapshot, nativeBalance(OWNER))).toBe(1n);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('never changes ledger state', async () => {
    const ledger = new InMemoryLedger();
    ledger.addToken(TOKEN);
    const before = await ledger.getBlockNumber();

    await readState(ledger, [tokenBalance(TOKEN, OWNER), nonceOf(OWNER)]);

    expect(await ledger.getBlockNumber()).toBe(before);
    expect(ledger.submitted).toHaveLength(0);
  });
});

describe('snapshot accessors', () => {
  it('read missing snapshots and non-numeric values as null', () => {
    const target = contractRead(POOL, 'function name() view returns (string)');
    const snapshot = { blockNumber: 1n, values: { [stateKey(target)]: 'Pool' } };

    expect(snapshotValue(undefined, target)).toBeNull();
    expect(snapshotValue(snapshot, target)).toBe('Pool');
    expect(snapshotBigInt(snapshot, target)).toBeNull();
  });
});
