/**
 * Native currency transfers.
 */

import { stringToHex } from 'viem';
import { snapshotBigInt } from '../../ledger/stateReader';
import {
  describeEther,
  gasCost,
  gasReasonable,
  stateAfter,
  stateDelta,
  targetAddress,
  transactionSucceeded,
  valueWithin,
} from '../checks';
import { asCritical, defineCheck, fail, pass } from '../framework';
import { paramAddress, paramAmount, paramInteger, paramString } from '../params';
import { nativeBalance } from '../targets';
import { withinTolerance } from '../tolerance';
import { defineValidator, percentageOf } from './shared';

export const nativeTransfer = defineValidator({
  id: 'native-transfer',
  mode: 'transaction',
  stateTargets: ({ params, env }) => [nativeBalance(env.agentAddress), nativeBalance(paramAddress(params, 'to_address'))],
  checks: ({ params, env, tolerances }) => {
    const amount = paramAmount(params, 'amount');
    const recipient = paramAddress(params, 'to_address');
    return [
      transactionSucceeded(30),
      asCritical(targetAddress('Target Address', 20, recipient)),
      asCritical(valueWithin('Transfer Amount', 20, amount, tolerances.amount)),
      gasReasonable(10),
      stateDelta(
        'Sender Balance Change',
        10,
        nativeBalance(env.agentAddress),
        ({ receipt }) => -(amount + gasCost(receipt)),
        tolerances.balance
      ),
      asCritical(stateDelta('Recipient Balance Change', 10, nativeBalance(recipient), () => amount, tolerances.amount)),
    ];
  },
});

export const nativeTransferWithMessage = defineValidator({
  id: 'native-transfer-with-message',
  mode: 'transaction',
  stateTargets: ({ params }) => [nativeBalance(paramAddress(params, 'to_address'))],
  checks: ({ params, tolerances }) => {
    const amount = paramAmount(params, 'amount');
    const message = paramString(params, 'message');
    const encoded = stringToHex(message).slice(2).toLowerCase();
    return [
      transactionSucceeded(20),
      asCritical(targetAddress('Recipient Address', 20, paramAddress(params, 'to_address'))),
      asCritical(valueWithin('Transfer Amount', 20, amount, tolerances.amount)),
      defineCheck({
        name: 'Message In Data',
        weight: 30,
        critical: true,
        run: ({ request }) => {
          if (!request || request.data === '0x') return fail('transaction carries no data');
          return request.data.toLowerCase().includes(encoded)
            ? pass(`data carries "${message}"`)
            : fail(`data does not contain the UTF-8 bytes of "${message}"`);
        },
      }),
      asCritical(
        stateDelta('Recipient Balance Change', 10, nativeBalance(paramAddress(params, 'to_address')), () => amount, tolerances.amount)
      ),
    ];
  },
});

export const nativeTransferPercentage = defineValidator({
  id: 'native-transfer-percentage',
  mode: 'transaction',
  stateTargets: ({ params, env }) => [nativeBalance(env.agentAddress), nativeBalance(paramAddress(params, 'to_address'))],
  checks: ({ params, env }) => {
    const percentage = paramInteger(params, 'percentage');
    const recipient = paramAddress(params, 'to_address');
    const expectedFrom = (before: bigint | null) => (before === null ? null : percentageOf(before, percentage));
    // Balance reads and the candidate's own read can differ slightly
    const tolerance = 0.02;

    return [
      transactionSucceeded(30),
      asCritical(targetAddress('Recipient Address', 20, recipient)),
      defineCheck({
        name: 'Percentage Amount',
        weight: 30,
        critical: true,
        run: ({ request, before }) => {
          const expected = expectedFrom(snapshotBigInt(before, nativeBalance(env.agentAddress)));
          if (expected === null) return fail('sender balance could not be read');
          if (!request) return fail('no transaction was prepared');
          return withinTolerance(request.value, expected, tolerance)
            ? pass(`sent ${describeEther(request.value)}, ${percentage}% of the balance`)
            : fail(`expected ${percentage}% of the balance = ${describeEther(expected)}, got ${describeEther(request.value)}`);
        },
      }),
      asCritical(
        stateDelta(
          'Recipient Balance Change',
          20,
          nativeBalance(recipient),
          ({ before }) => expectedFrom(snapshotBigInt(before, nativeBalance(env.agentAddress))) ?? 0n,
          tolerance
        )
      ),
    ];
  },
});

/** Everything but the gas: at least 99% of what is spendable once gas is paid. */
export const nativeTransferMaxAmount = defineValidator({
  id: 'native-transfer-max-amount',
  mode: 'transaction',
  stateTargets: ({ params, env }) => [nativeBalance(env.agentAddress), nativeBalance(paramAddress(params, 'to_address'))],
  checks: ({ params, env }) => {
    const recipient = paramAddress(params, 'to_address');
    const sender = nativeBalance(env.agentAddress);
    return [
      transactionSucceeded(30),
      asCritical(targetAddress('Recipient Address', 20, recipient)),
      defineCheck({
        name: 'Maximum Amount Transferred',
        weight: 30,
        critical: true,
        run: ({ request, receipt, before }) => {
          const balance = snapshotBigInt(before, sender);
          if (balance === null) return fail('sender balance could not be read');
          if (!request) return fail('no transaction was prepared');
          const spendable = balance - gasCost(receipt);
          return request.value * 100n >= spendable * 99n
            ? pass(`sent ${describeEther(request.value)} of ${describeEther(balance)}`)
            : fail(`sent ${describeEther(request.value)}, expected close to ${describeEther(spendable)}`);
        },
      }),
      stateAfter('Sender Balance Minimal', 20, sender, (after, before) => {
        if (typeof after !== 'bigint' || typeof before !== 'bigint') return fail('sender balance could not be read');
        return after * 100n <= before ? pass(`${describeEther(after)} left`) : fail(`${describeEther(after)} left behind`);
      }),
    ];
  },
});
