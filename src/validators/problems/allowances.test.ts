import { describe, expect, it } from 'vitest';
import type { Address, Hex } from 'viem';
import { encodeFunctionData, erc20Abi, parseEther } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { encodeSignatureCall } from '../../ledger/abiSignature';
import {
  MINED_RECEIPT,
  prepareWith,
  preparedCall,
  recordingHost,
  scoreWith,
  snapshotOf,
  testEnvironment,
} from '../../testing/validatorEvidence';
import type { ParameterInstance } from '../../types/harness';
import { CALLBACK_TOKEN, TOKEN as TOKEN_ABI } from '../fixtureAbi';
import type { Evidence } from '../framework';
import { ValidatorRegistry } from '../registry';
import { allowance, tokenBalance } from '../targets';
import { BUILTIN_VALIDATORS } from './index';

const AGENT: Address = '0x00000000000000000000000000000000000000aa';
const TOKEN: Address = '0x0000000000000000000000000000000000000011';
const SPENDER: Address = '0x0000000000000000000000000000000000000022';
const OWNER: Address = '0x0000000000000000000000000000000000000033';
const RECIPIENT: Address = '0x0000000000000000000000000000000000000044';
const STRANGER: Address = '0x0000000000000000000000000000000000000055';
const CALLBACK: Address = '0x0000000000000000000000000000000000000066';
const RECEIVER: Address = '0x0000000000000000000000000000000000000077';

const OWNER_KEY: Hex = '0x0000000000000000000000000000000000000000000000000000000000000001';

const registry = new ValidatorRegistry(BUILTIN_VALIDATORS);
const env = testEnvironment(AGENT, { 'fixture-token': TOKEN, 'callback-token': CALLBACK });

const score = (validator: string, params: ParameterInstance, evidence: Omit<Evidence, 'params' | 'env'>) =>
  scoreWith(registry, validator, params, env, evidence);

const failedNames = (report: { checks: readonly { name: string; passed: boolean }[] }) =>
  report.checks.filter((check) => !check.passed).map((check) => check.name);

describe('erc20-transfer-from', () => {
  const amount = parseEther('5');
  const params = { token_address: TOKEN, from_address: OWNER, to_address: RECIPIENT, amount: '5' };
  const before = snapshotOf([
    [allowance(TOKEN, OWNER, AGENT), amount],
    [tokenBalance(TOKEN, OWNER), amount],
    [tokenBalance(TOKEN, RECIPIENT), 0n],
  ]);
  const transferFrom = (from: Address) =>
    preparedCall(
      TOKEN,
      encodeFunctionData({ abi: erc20Abi, functionName: 'transferFrom', args: [from, RECIPIENT, amount] })
    );

  it('scores a transfer that spends the allowance in full', () => {
    const report = score('erc20-transfer-from', params, {
      request: transferFrom(OWNER),
      receipt: MINED_RECEIPT,
      before,
      after: snapshotOf([
        [allowance(TOKEN, OWNER, AGENT), 0n],
        [tokenBalance(TOKEN, OWNER), 0n],
        [tokenBalance(TOKEN, RECIPIENT), amount],
      ]),
    });

    expect(report.score).toBe(100);
    expect(report.passed).toBe(true);
  });

  it('names the wrong owner', () => {
    const report = score('erc20-transfer-from', params, {
      request: transferFrom(STRANGER),
      receipt: MINED_RECEIPT,
      before,
      after: before,
    });

    expect(report.score).toBe(30);
    expect(report.passed).toBe(false);
    expect(report.checks.find((check) => check.name === 'Correct Function Called')?.message).toBe(
      `pulled from ${STRANGER} instead of ${OWNER}`
    );
  });

  it('funds the owner and approves the agent before the attempt', async () => {
    const { host, calls } = recordingHost();
    await prepareWith(registry, host, 'erc20-transfer-from', params, env);

    expect(calls).toEqual([
      { from: 'identity', to: TOKEN, data: encodeSignatureCall(TOKEN_ABI.mint, [OWNER, amount]) },
      { from: OWNER, to: TOKEN, data: encodeSignatureCall(TOKEN_ABI.approve, [AGENT, amount]) },
    ]);
  });

  it('stops the attempt when a preparation call reverts', async () => {
    const { host } = recordingHost({ ...MINED_RECEIPT, status: 'reverted', success: false, error: 'boom' });

    await expect(prepareWith(registry, host, 'erc20-transfer-from', params, env)).rejects.toMatchObject({
      code: 'PREPARE_FAILED',
      message: 'Preparation step "mint" failed: boom',
    });
  });
});

describe('erc20-increase-allowance / erc20-decrease-allowance', () => {
  const held = tokenBalance(TOKEN, AGENT);
  const granted = allowance(TOKEN, AGENT, SPENDER);

  it('credits an increase by the requested amount', () => {
    const report = score(
      'erc20-increase-allowance',
      { token_address: TOKEN, spender_address: SPENDER, current_allowance: '10', amount: '2.5' },
      {
        request: preparedCall(TOKEN, encodeSignatureCall(TOKEN_ABI.increaseAllowance, [SPENDER, parseEther('2.5')])),
        receipt: MINED_RECEIPT,
        before: snapshotOf([
          [granted, parseEther('10')],
          [held, parseEther('100')],
        ]),
        after: snapshotOf([
          [granted, parseEther('12.5')],
          [held, parseEther('100')],
        ]),
      }
    );

    expect(report.score).toBe(100);
  });

  it('rejects a plain approve that lands on the same allowance', () => {
    const report = score(
      'erc20-increase-allowance',
      { token_address: TOKEN, spender_address: SPENDER, current_allowance: '10', amount: '2.5' },
      {
        request: preparedCall(
          TOKEN,
          encodeFunctionData({ abi: erc20Abi, functionName: 'approve', args: [SPENDER, parseEther('12.5')] })
        ),
        receipt: MINED_RECEIPT,
        before: snapshotOf([
          [granted, parseEther('10')],
          [held, parseEther('100')],
        ]),
        after: snapshotOf([
          [granted, parseEther('12.5')],
          [held, parseEther('100')],
        ]),
      }
    );

    expect(report.score).toBe(80);
    expect(report.passed).toBe(false);
    expect(report.checks[1].message).toBe('calldata does not decode as increaseAllowance');
  });

  it('credits a decrease by the requested amount', () => {
    const report = score(
      'erc20-decrease-allowance',
      { token_address: TOKEN, spender_address: SPENDER, current_allowance: '60', amount: '10' },
      {
        request: preparedCall(TOKEN, encodeSignatureCall(TOKEN_ABI.decreaseAllowance, [SPENDER, parseEther('10')])),
        receipt: MINED_RECEIPT,
        before: snapshotOf([
          [granted, parseEther('60')],
          [held, parseEther('100')],
        ]),
        after: snapshotOf([
          [granted, parseEther('50')],
          [held, parseEther('100')],
        ]),
      }
    );

    expect(report.score).toBe(100);
    expect(report.checks[2]).toMatchObject({ name: 'Allowance Decreased', critical: true });
  });

  it('sets the starting allowance before the attempt', async () => {
    const { host, calls } = recordingHost();
    await prepareWith(
      registry,
      host,
      'erc20-decrease-allowance',
      { token_address: TOKEN, spender_address: SPENDER, current_allowance: '60', amount: '10' },
      env
    );

    expect(calls).toEqual([
      { from: 'identity', to: TOKEN, data: encodeSignatureCall(TOKEN_ABI.approve, [SPENDER, parseEther('60')]) },
    ]);
  });
});

describe('erc20-permit', () => {
  const owner = privateKeyToAccount(OWNER_KEY).address;
  const amount = parseEther('7');
  const params = { token_address: TOKEN, owner_key: OWNER_KEY, spender_address: SPENDER, amount: '7' };
  const granted = allowance(TOKEN, owner, SPENDER);
  const signature = { v: 27, r: `0x${'11'.repeat(32)}`, s: `0x${'22'.repeat(32)}` } as const;
  const permit = (spender: Address) =>
    preparedCall(
      TOKEN,
      encodeSignatureCall(TOKEN_ABI.permit, [owner, spender, amount, 2_000_000_000n, signature.v, signature.r, signature.s])
    );

  it('reads the allowance of the key holder', () => {
    const report = score('erc20-permit', params, {
      request: permit(SPENDER),
      receipt: MINED_RECEIPT,
      before: snapshotOf([[granted, 0n]]),
      after: snapshotOf([[granted, amount]]),
    });

    expect(report.score).toBe(100);
  });

  it('names the wrong spender', () => {
    const report = score('erc20-permit', params, {
      request: permit(STRANGER),
      receipt: MINED_RECEIPT,
      before: snapshotOf([[granted, 0n]]),
      after: snapshotOf([[granted, 0n]]),
    });

    expect(report.score).toBe(30);
    expect(report.checks[1].message).toBe(`permit names spender ${STRANGER} instead of ${SPENDER}`);
  });

  it('refuses an owner key that is not 32 bytes', () => {
    expect(() =>
      score('erc20-permit', { ...params, owner_key: '0x1234' }, { before: snapshotOf([]), after: snapshotOf([]) })
    ).toThrow('parameter "owner_key" is not a 32-byte hex private key');
  });
});

describe('erc20-approve-and-call', () => {
  const granted = allowance(CALLBACK, AGENT, RECEIVER);
  const params = { spender_address: RECEIVER, amount: '3' };

  it('scores approveAndCall on the callback token', () => {
    const report = score('erc20-approve-and-call', params, {
      request: preparedCall(CALLBACK, encodeSignatureCall(CALLBACK_TOKEN.approveAndCall, [RECEIVER, parseEther('3'), '0x'])),
      receipt: MINED_RECEIPT,
      before: snapshotOf([[granted, 0n]]),
      after: snapshotOf([[granted, parseEther('3')]]),
    });

    expect(report.score).toBe(100);
  });

  it('fails a plain approve, which never notifies the spender', () => {
    const report = score('erc20-approve-and-call', params, {
      request: preparedCall(
        CALLBACK,
        encodeFunctionData({ abi: erc20Abi, functionName: 'approve', args: [RECEIVER, parseEther('3')] })
      ),
      receipt: MINED_RECEIPT,
      before: snapshotOf([[granted, 0n]]),
      after: snapshotOf([[granted, parseEther('3')]]),
    });

    expect(report.score).toBe(80);
    expect(report.passed).toBe(false);
    expect(failedNames(report)).toEqual(['Function Signature']);
  });
});
