/**
 * Calls into the fixture contracts: plain and payable functions, a
 * delegatecall proxy, a receive() hook and a flash loan.
 */

import {
  calldataArgs,
  selectorIs,
  stateAfter,
  stateDelta,
  stateUnchanged,
  targetAddress,
  transactionSucceeded,
  valueWithin,
} from '../checks';
import { COUNTER, DELEGATE_CALL, DONATION_BOX, FLASH_LOAN_POOL, MESSAGE_BOARD } from '../fixtureAbi';
import { asCritical, defineCheck, fail, pass } from '../framework';
import { paramAmount, paramBigInt, paramString } from '../params';
import { approveToken } from '../setup';
import { contractRead, nativeBalance, tokenBalance } from '../targets';
import { defineValidator, fixtureAddress, sameAddress } from './shared';

export const counterIncrement = defineValidator({
  id: 'counter-increment',
  mode: 'transaction',
  stateTargets: ({ env }) => [contractRead(fixtureAddress(env, 'simple-counter'), COUNTER.count)],
  checks: ({ env }) => {
    const counter = fixtureAddress(env, 'simple-counter');
    return [
      transactionSucceeded(40),
      asCritical(targetAddress('Contract Address', 20, counter)),
      asCritical(selectorIs('Function Signature', 20, COUNTER.increment)),
      asCritical(stateDelta('Counter Incremented', 20, contractRead(counter, COUNTER.count), () => 1n, 0)),
    ];
  },
});

export const messageBoardPost = defineValidator({
  id: 'message-board-post',
  mode: 'transaction',
  stateTargets: ({ env }) => [contractRead(fixtureAddress(env, 'message-board'), MESSAGE_BOARD.message)],
  checks: ({ params, env }) => {
    const board = fixtureAddress(env, 'message-board');
    const message = paramString(params, 'message');
    return [
      transactionSucceeded(40),
      asCritical(targetAddress('Contract Address', 20, board)),
      asCritical(selectorIs('Function Signature', 20, MESSAGE_BOARD.setMessage)),
      asCritical(
        stateAfter('Message Stored', 20, contractRead(board, MESSAGE_BOARD.message), (after) =>
          after === message ? pass(`stored "${message}"`) : fail(`expected "${message}", board holds ${JSON.stringify(after)}`)
        )
      ),
    ];
  },
});

export const donation = defineValidator({
  id: 'donation',
  mode: 'transaction',
  stateTargets: ({ env }) => [nativeBalance(fixtureAddress(env, 'donation-box'))],
  checks: ({ params, env }) => {
    const box = fixtureAddress(env, 'donation-box');
    const amount = paramAmount(params, 'amount');
    return [
      transactionSucceeded(30),
      asCritical(targetAddress('Contract Address', 20, box)),
      asCritical(selectorIs('Function Signature', 20, DONATION_BOX.donate)),
      asCritical(valueWithin('Value Sent', 15, amount, 0)),
      asCritical(stateDelta('Contract Balance', 15, nativeBalance(box), () => amount, 0)),
    ];
  },
});

/** setValue sent to the proxy runs in the proxy's storage through delegatecall. */
export const contractDelegateCall = defineValidator({
  id: 'contract-delegate-call',
  mode: 'transaction',
  stateTargets: ({ env }) => [
    contractRead(fixtureAddress(env, 'delegate-proxy'), DELEGATE_CALL.value),
    contractRead(fixtureAddress(env, 'delegate-implementation'), DELEGATE_CALL.value),
  ],
  checks: ({ params, env }) => {
    const proxy = fixtureAddress(env, 'delegate-proxy');
    const implementation = fixtureAddress(env, 'delegate-implementation');
    const value = paramBigInt(params, 'value');
    return [
      transactionSucceeded(30),
      asCritical(targetAddress('Proxy Address', 20, proxy)),
      asCritical(selectorIs('Function Signature', 20, DELEGATE_CALL.setValue)),
      asCritical(
        stateAfter('Proxy Storage Updated', 15, contractRead(proxy, DELEGATE_CALL.value), (after) =>
          after === value ? pass(`proxy value ${value}`) : fail(`expected proxy value ${value}, got ${String(after)}`)
        )
      ),
      stateUnchanged('Implementation Unchanged', 15, contractRead(implementation, DELEGATE_CALL.value)),
    ];
  },
});

export const contractPayableFallback = defineValidator({
  id: 'contract-payable-fallback',
  mode: 'transaction',
  stateTargets: ({ env }) => [nativeBalance(fixtureAddress(env, 'fallback-receiver'))],
  checks: ({ params, env }) => {
    const receiver = fixtureAddress(env, 'fallback-receiver');
    const amount = paramAmount(params, 'amount');
    return [
      transactionSucceeded(30),
      asCritical(targetAddress('Contract Address', 20, receiver)),
      asCritical(valueWithin('Transfer Amount', 20, amount, 0)),
      defineCheck({
        name: 'Empty Calldata',
        weight: 15,
        run: ({ request }) => {
          if (!request) return fail('no transaction was prepared');
          return request.data === '0x' ? pass('plain transfer') : fail(`calldata ${request.data.slice(0, 10)}... sent`);
        },
      }),
      asCritical(stateDelta('Contract Balance', 15, nativeBalance(receiver), () => amount, 0)),
    ];
  },
});

const FLASH_LOAN_FEE_BPS = 30n;

export const flashLoanFee = (amount: bigint): bigint => (amount * FLASH_LOAN_FEE_BPS) / 10_000n;

/** The pool pulls back loan plus fee, so the borrower ends down exactly the fee. */
export const erc20FlashLoan = defineValidator({
  id: 'erc20-flashloan',
  mode: 'transaction',
  stateTargets: ({ env }) => [tokenBalance(fixtureAddress(env, 'fixture-token'), env.agentAddress)],
  checks: ({ params, env }) => {
    const token = fixtureAddress(env, 'fixture-token');
    const pool = fixtureAddress(env, 'flashloan-pool');
    const amount = paramAmount(params, 'amount');
    return [
      transactionSucceeded(30),
      asCritical(targetAddress('Contract Address', 20, pool)),
      asCritical(
        calldataArgs('Function Signature', 20, FLASH_LOAN_POOL.executeFlashLoan, ([asset, borrowed]) => {
          if (!sameAddress(asset, token)) return fail(`borrowed ${String(asset)} instead of ${token}`);
          return borrowed === amount
            ? pass(`executeFlashLoan(${token}, ${amount})`)
            : fail(`borrowed ${String(borrowed)}, expected ${amount}`);
        })
      ),
      asCritical(stateDelta('Fee Paid', 30, tokenBalance(token, env.agentAddress), () => -flashLoanFee(amount), 0)),
    ];
  },
  prepare: (host, { params, env }) => {
    const amount = paramAmount(params, 'amount');
    const repayment = amount + flashLoanFee(amount);
    return approveToken(host, fixtureAddress(env, 'fixture-token'), fixtureAddress(env, 'flashloan-pool'), repayment);
  },
});
