/**
 * ERC20, wrapped-native and callback-token problems.
 */

import { snapshotBigInt } from '../../ledger/stateReader';
import type { StateTarget } from '../../types/harness';
import {
  calldataArgs,
  gasCost,
  selectorIs,
  selectorOneOf,
  stateAfter,
  stateDelta,
  stateUnchanged,
  targetAddress,
  transactionSucceeded,
  valueWithin,
} from '../checks';
import { CALLBACK_TOKEN, TOKEN, WRAPPED_NATIVE } from '../fixtureAbi';
import type { CheckDefinition } from '../framework';
import { asCritical, fail, pass } from '../framework';
import { paramAddress, paramAmount, paramDecimals, paramInteger } from '../params';
import { wrapNative } from '../setup';
import { allowance, contractRead, nativeBalance, tokenBalance } from '../targets';
import { withinTolerance } from '../tolerance';
import { defineValidator, fixtureAddress, percentageOf, sameAddress } from './shared';

export function allowanceIs(name: string, weight: number, target: StateTarget, expected: bigint, tolerance = 0.01): CheckDefinition {
  return stateAfter(name, weight, target, (after) => {
    if (typeof after !== 'bigint') return fail('allowance could not be read');
    return withinTolerance(after, expected, tolerance)
      ? pass(`allowance ${after}`)
      : fail(`expected allowance ${expected}, got ${after}`);
  });
}

export const erc20Transfer = defineValidator({
  id: 'erc20-transfer',
  mode: 'transaction',
  stateTargets: ({ params, env }) => {
    const token = paramAddress(params, 'token_address');
    return [tokenBalance(token, env.agentAddress), tokenBalance(token, paramAddress(params, 'to_address'))];
  },
  checks: ({ params, env, tolerances }) => {
    const token = paramAddress(params, 'token_address');
    const recipient = paramAddress(params, 'to_address');
    const amount = paramAmount(params, 'amount', paramDecimals(params));
    return [
      transactionSucceeded(30),
      asCritical(targetAddress('Contract Address', 20, token)),
      asCritical(selectorIs('Function Signature', 20, TOKEN.transfer)),
      asCritical(stateDelta('Sender Token Balance', 15, tokenBalance(token, env.agentAddress), () => -amount, tolerances.amount)),
      asCritical(stateDelta('Recipient Token Balance', 15, tokenBalance(token, recipient), () => amount, tolerances.amount)),
    ];
  },
});

export const erc20Approve = defineValidator({
  id: 'erc20-approve',
  mode: 'transaction',
  stateTargets: ({ params, env }) => {
    const token = paramAddress(params, 'token_address');
    return [
      allowance(token, env.agentAddress, paramAddress(params, 'spender_address')),
      tokenBalance(token, env.agentAddress),
    ];
  },
  checks: ({ params, env }) => {
    const token = paramAddress(params, 'token_address');
    const spender = paramAddress(params, 'spender_address');
    const amount = paramAmount(params, 'amount', paramDecimals(params));
    return [
      transactionSucceeded(30),
      asCritical(
        calldataArgs('Correct Function Called', 20, TOKEN.approve, ([to]) =>
          sameAddress(to, spender) ? pass(`approve(${spender}, ...)`) : fail(`approved ${String(to)} instead of ${spender}`)
        )
      ),
      asCritical(allowanceIs('Allowance Set', 40, allowance(token, env.agentAddress, spender), amount)),
      stateUnchanged('No Token Transfer', 10, tokenBalance(token, env.agentAddress)),
    ];
  },
});

export const erc20TransferPercentage = defineValidator({
  id: 'erc20-transfer-percentage',
  mode: 'transaction',
  stateTargets: ({ params, env }) => {
    const token = paramAddress(params, 'token_address');
    return [tokenBalance(token, env.agentAddress), tokenBalance(token, paramAddress(params, 'to_address'))];
  },
  checks: ({ params, env }) => {
    const token = paramAddress(params, 'token_address');
    const recipient = paramAddress(params, 'to_address');
    const percentage = paramInteger(params, 'percentage');
    const tolerance = 0.02;
    const expectedFrom = (before: bigint | null) => (before === null ? null : percentageOf(before, percentage));

    return [
      transactionSucceeded(30),
      asCritical(targetAddress('Contract Address', 20, token)),
      asCritical(selectorIs('Function Signature', 10, TOKEN.transfer)),
      asCritical(
        calldataArgs('Percentage Amount', 30, TOKEN.transfer, ([, amount], { before }) => {
          const expected = expectedFrom(snapshotBigInt(before, tokenBalance(token, env.agentAddress)));
          if (expected === null) return fail('sender balance could not be read');
          if (typeof amount !== 'bigint') return fail('amount argument is missing');
          return withinTolerance(amount, expected, tolerance)
            ? pass(`transferred ${amount}, ${percentage}% of the balance`)
            : fail(`expected ${expected} (${percentage}% of the balance), got ${amount}`);
        })
      ),
      asCritical(
        stateDelta(
          'Recipient Token Balance',
          10,
          tokenBalance(token, recipient),
          ({ before }) => expectedFrom(snapshotBigInt(before, tokenBalance(token, env.agentAddress))) ?? 0n,
          tolerance
        )
      ),
    ];
  },
});

export const erc20Burn = defineValidator({
  id: 'erc20-burn',
  mode: 'transaction',
  stateTargets: ({ params, env }) => {
    const token = paramAddress(params, 'token_address');
    return [tokenBalance(token, env.agentAddress), contractRead(token, TOKEN.totalSupply)];
  },
  checks: ({ params, env, tolerances }) => {
    const token = paramAddress(params, 'token_address');
    const amount = paramAmount(params, 'amount', paramDecimals(params));
    return [
      transactionSucceeded(30),
      asCritical(targetAddress('Contract Address', 20, token)),
      asCritical(selectorIs('Function Signature', 20, TOKEN.burn)),
      asCritical(stateDelta('Balance Decrease', 20, tokenBalance(token, env.agentAddress), () => -amount, tolerances.amount)),
      stateDelta('Total Supply Decrease', 10, contractRead(token, TOKEN.totalSupply), () => -amount, tolerances.amount),
    ];
  },
});

/** Send the whole token balance held before the attempt. */
export const erc20TransferMaxAmount = defineValidator({
  id: 'erc20-transfer-max-amount',
  mode: 'transaction',
  stateTargets: ({ params, env }) => {
    const token = paramAddress(params, 'token_address');
    return [tokenBalance(token, env.agentAddress), tokenBalance(token, paramAddress(params, 'to_address'))];
  },
  checks: ({ params, env }) => {
    const token = paramAddress(params, 'token_address');
    const sender = tokenBalance(token, env.agentAddress);
    return [
      transactionSucceeded(30),
      asCritical(targetAddress('Contract Address', 20, token)),
      asCritical(selectorIs('Function Signature', 10, TOKEN.transfer)),
      asCritical(
        stateDelta(
          'Maximum Amount Transferred',
          20,
          tokenBalance(token, paramAddress(params, 'to_address')),
          ({ before }) => snapshotBigInt(before, sender) ?? 0n,
          0
        )
      ),
      stateAfter('Sender Balance Emptied', 20, sender, (after) =>
        after === 0n ? pass('no tokens left') : fail(`${String(after)} left behind`)
      ),
    ];
  },
});

export const wrapNativeValidator = defineValidator({
  id: 'wrap-native',
  mode: 'transaction',
  stateTargets: ({ env }) => [tokenBalance(fixtureAddress(env, 'wrapped-native'), env.agentAddress)],
  checks: ({ params, env, tolerances }) => {
    const wrapped = fixtureAddress(env, 'wrapped-native');
    const amount = paramAmount(params, 'amount');
    return [
      transactionSucceeded(30),
      asCritical(targetAddress('Contract Address', 20, wrapped)),
      asCritical(selectorIs('Function Signature', 20, WRAPPED_NATIVE.deposit)),
      asCritical(valueWithin('Deposit Amount', 20, amount, tolerances.amount)),
      asCritical(stateDelta('Wrapped Balance', 10, tokenBalance(wrapped, env.agentAddress), () => amount, tolerances.amount)),
    ];
  },
});

export const unwrapNativeValidator = defineValidator({
  id: 'unwrap-native',
  mode: 'transaction',
  stateTargets: ({ env }) => [
    tokenBalance(fixtureAddress(env, 'wrapped-native'), env.agentAddress),
    nativeBalance(env.agentAddress),
  ],
  checks: ({ params, env, tolerances }) => {
    const wrapped = fixtureAddress(env, 'wrapped-native');
    const amount = paramAmount(params, 'amount');
    return [
      transactionSucceeded(30),
      asCritical(targetAddress('Contract Address', 20, wrapped)),
      asCritical(selectorIs('Function Signature', 20, WRAPPED_NATIVE.withdraw)),
      asCritical(stateDelta('Wrapped Balance', 15, tokenBalance(wrapped, env.agentAddress), () => -amount, tolerances.amount)),
      stateDelta(
        'Native Balance',
        15,
        nativeBalance(env.agentAddress),
        ({ receipt }) => amount - gasCost(receipt),
        tolerances.balance
      ),
    ];
  },
  prepare: (host, { params, env }) => wrapNative(host, fixtureAddress(env, 'wrapped-native'), paramAmount(params, 'amount')),
});

export const callbackTransferAndCall = defineValidator({
  id: 'callback-transfer-and-call',
  mode: 'transaction',
  stateTargets: ({ params, env }) => {
    const token = fixtureAddress(env, 'callback-token');
    return [tokenBalance(token, env.agentAddress), tokenBalance(token, paramAddress(params, 'to_address'))];
  },
  checks: ({ params, env, tolerances }) => {
    const token = fixtureAddress(env, 'callback-token');
    const receiver = paramAddress(params, 'to_address');
    const amount = paramAmount(params, 'amount');
    return [
      transactionSucceeded(30),
      asCritical(stateDelta('Sender Token Balance', 40, tokenBalance(token, env.agentAddress), () => -amount, tolerances.amount)),
      asCritical(stateDelta('Receiver Token Balance', 20, tokenBalance(token, receiver), () => amount, tolerances.amount)),
      asCritical(
        selectorOneOf('Function Signature', 10, [CALLBACK_TOKEN.transferAndCall, CALLBACK_TOKEN.transferAndCallNoData])
      ),
    ];
  },
});
