/**
 * Composite goals. Their checks run once, over the state captured before the
 * first step and after the last one.
 */

import { snapshotBigInt } from '../ledger/stateReader';
import { stateDelta } from '../validators/checks';
import { asCritical, defineCheck, fail, pass } from '../validators/framework';
import { paramAddress, paramAmount } from '../validators/params';
import { defineValidator, fixtureAddress } from '../validators/problems/shared';
import { pendingReward, stakedAmount } from '../validators/problems/staking';
import { nativeBalance, tokenBalance } from '../validators/targets';
import type { ProblemValidator, ValidatorContext } from '../validators/types';

const singlePool = (ctx: ValidatorContext) => ({
  pool: fixtureAddress(ctx.env, 'single-token-staking-pool'),
  token: fixtureAddress(ctx.env, 'fixture-token'),
});

export const approveAndStake = defineValidator({
  id: 'approve-and-stake',
  mode: 'transaction',
  stateTargets: (ctx) => {
    const { pool, token } = singlePool(ctx);
    return [tokenBalance(token, ctx.env.agentAddress), stakedAmount(pool, ctx.env.agentAddress)];
  },
  checks: (ctx) => {
    const { pool, token } = singlePool(ctx);
    const amount = paramAmount(ctx.params, 'amount');
    return [
      asCritical(
        stateDelta('Staked Amount Increase', 60, stakedAmount(pool, ctx.env.agentAddress), () => amount, ctx.tolerances.balance)
      ),
      stateDelta('Token Balance Decrease', 40, tokenBalance(token, ctx.env.agentAddress), () => -amount, ctx.tolerances.amount),
    ];
  },
});

const rewardPool = (ctx: ValidatorContext) => ({
  pool: fixtureAddress(ctx.env, 'reward-pool'),
  stakeToken: fixtureAddress(ctx.env, 'lp-token'),
  rewardToken: fixtureAddress(ctx.env, 'fixture-token'),
});

export const stakeAndHarvest = defineValidator({
  id: 'stake-and-harvest',
  mode: 'transaction',
  stateTargets: (ctx) => {
    const { pool, rewardToken } = rewardPool(ctx);
    const agent = ctx.env.agentAddress;
    return [stakedAmount(pool, agent), tokenBalance(rewardToken, agent), pendingReward(pool, agent)];
  },
  checks: (ctx) => {
    const { pool, rewardToken } = rewardPool(ctx);
    const agent = ctx.env.agentAddress;
    const amount = paramAmount(ctx.params, 'amount');
    const rewards = tokenBalance(rewardToken, agent);
    return [
      asCritical(stateDelta('Staked Amount Increase', 50, stakedAmount(pool, agent), () => amount, ctx.tolerances.balance)),
      defineCheck({
        name: 'Rewards Harvested',
        weight: 50,
        critical: true,
        run: ({ before, after }) => {
          const start = snapshotBigInt(before, rewards);
          const end = snapshotBigInt(after, rewards);
          if (start === null || end === null) return fail('reward balance could not be read');
          return end > start ? pass(`harvested ${end - start} reward units`) : fail('no rewards were harvested');
        },
      }),
    ];
  },
});

export const splitNativeTransfer = defineValidator({
  id: 'split-native-transfer',
  mode: 'transaction',
  stateTargets: ({ params }) => [
    nativeBalance(paramAddress(params, 'first_recipient')),
    nativeBalance(paramAddress(params, 'second_recipient')),
  ],
  checks: ({ params, tolerances }) =>
    [
      stateDelta(
        'First Recipient Balance',
        50,
        nativeBalance(paramAddress(params, 'first_recipient')),
        () => paramAmount(params, 'first_amount'),
        tolerances.amount
      ),
      stateDelta(
        'Second Recipient Balance',
        50,
        nativeBalance(paramAddress(params, 'second_recipient')),
        () => paramAmount(params, 'second_amount'),
        tolerances.amount
      ),
    ].map(asCritical),
});

export const wrapAndTransfer = defineValidator({
  id: 'wrap-and-transfer',
  mode: 'transaction',
  stateTargets: ({ params, env }) => {
    const wrapped = fixtureAddress(env, 'wrapped-native');
    return [tokenBalance(wrapped, paramAddress(params, 'to_address')), tokenBalance(wrapped, env.agentAddress)];
  },
  checks: ({ params, env, tolerances }) => {
    const wrapped = fixtureAddress(env, 'wrapped-native');
    const amount = paramAmount(params, 'amount');
    return [
      asCritical(
        stateDelta('Recipient Wrapped Balance', 70, tokenBalance(wrapped, paramAddress(params, 'to_address')), () => amount, tolerances.amount)
      ),
      stateDelta('Sender Wrapped Balance Unchanged', 30, tokenBalance(wrapped, env.agentAddress), () => 0n, 0),
    ];
  },
});

export const COMPOSITE_GOALS: readonly ProblemValidator[] = [
  approveAndStake,
  stakeAndHarvest,
  splitNativeTransfer,
  wrapAndTransfer,
];
