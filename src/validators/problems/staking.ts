/**
 * Staking pool problems. The pools follow the MasterChef shape:
 * deposit/withdraw/harvest/emergencyWithdraw with per-block rewards.
 */

import type { Address } from 'viem';
import { snapshotBigInt } from '../../ledger/stateReader';
import { selectorIs, stateAfter, stateDelta, stateUnchanged, transactionSucceeded } from '../checks';
import { STAKING_POOL } from '../fixtureAbi';
import { asCritical, defineCheck, fail, pass } from '../framework';
import { paramAmount } from '../params';
import { approveToken, mineBlocks, stakeInPool } from '../setup';
import { contractRead, tokenBalance } from '../targets';
import type { ProblemValidator, ValidatorContext } from '../types';
import { defineValidator, fixtureAddress } from './shared';

export const REWARD_BLOCKS = 10;

export const stakedAmount = (pool: Address, user: Address) => contractRead(pool, STAKING_POOL.userInfo, [user], 0);
export const pendingReward = (pool: Address, user: Address) => contractRead(pool, STAKING_POOL.pendingReward, [user]);

interface PoolKeys {
  pool: string;
  token: string;
}

function poolAddresses(keys: PoolKeys, { env }: ValidatorContext) {
  return { pool: fixtureAddress(env, keys.pool), token: fixtureAddress(env, keys.token) };
}

function stakeValidator(id: string, keys: PoolKeys): ProblemValidator {
  return defineValidator({
    id,
    mode: 'transaction',
    stateTargets: (ctx) => {
      const { pool, token } = poolAddresses(keys, ctx);
      return [tokenBalance(token, ctx.env.agentAddress), stakedAmount(pool, ctx.env.agentAddress)];
    },
    checks: (ctx) => {
      const { pool, token } = poolAddresses(keys, ctx);
      const amount = paramAmount(ctx.params, 'amount');
      const agent = ctx.env.agentAddress;
      return [
        transactionSucceeded(25),
        asCritical(selectorIs('Deposit Call', 20, STAKING_POOL.deposit)),
        asCritical(stateDelta('Token Balance Decrease', 25, tokenBalance(token, agent), () => -amount, 0.001)),
        asCritical(stateDelta('Staked Amount Increase', 30, stakedAmount(pool, agent), () => amount, 0.01)),
      ];
    },
    // Approval happens here so the candidate's deposit is a single transaction
    prepare: async (host, ctx) => {
      const { pool, token } = poolAddresses(keys, ctx);
      await approveToken(host, token, pool, paramAmount(ctx.params, 'amount'));
    },
  });
}

export const stakeSingleToken = stakeValidator('stake-single-token', {
  pool: 'single-token-staking-pool',
  token: 'fixture-token',
});

export const stakeLpToken = stakeValidator('stake-lp-token', { pool: 'lp-staking-pool', token: 'lp-token' });

const REWARD_POOL: PoolKeys = { pool: 'reward-pool', token: 'lp-token' };

export const stakeRewardPool = stakeValidator('stake-reward-pool', REWARD_POOL);

const rewardToken = (ctx: ValidatorContext) => fixtureAddress(ctx.env, 'fixture-token');

export const unstake = defineValidator({
  id: 'unstake',
  mode: 'transaction',
  stateTargets: (ctx) => {
    const { pool, token } = poolAddresses(REWARD_POOL, ctx);
    return [tokenBalance(token, ctx.env.agentAddress), stakedAmount(pool, ctx.env.agentAddress)];
  },
  checks: (ctx) => {
    const { pool, token } = poolAddresses(REWARD_POOL, ctx);
    const amount = paramAmount(ctx.params, 'amount');
    const agent = ctx.env.agentAddress;
    return [
      transactionSucceeded(30),
      asCritical(stateDelta('LP Balance Increase', 40, tokenBalance(token, agent), () => amount, 0.01)),
      asCritical(stateDelta('Staked Amount Decrease', 30, stakedAmount(pool, agent), () => -amount, 0.01)),
    ];
  },
  prepare: async (host, ctx) => {
    const { pool, token } = poolAddresses(REWARD_POOL, ctx);
    await stakeInPool(host, token, pool, paramAmount(ctx.params, 'amount') * 2n);
  },
});

export const harvestRewards = defineValidator({
  id: 'harvest-rewards',
  mode: 'transaction',
  stateTargets: (ctx) => {
    const { pool } = poolAddresses(REWARD_POOL, ctx);
    return [tokenBalance(rewardToken(ctx), ctx.env.agentAddress), pendingReward(pool, ctx.env.agentAddress)];
  },
  checks: (ctx) => {
    const { pool } = poolAddresses(REWARD_POOL, ctx);
    const agent = ctx.env.agentAddress;
    const rewards = tokenBalance(rewardToken(ctx), agent);
    return [
      transactionSucceeded(30),
      defineCheck({
        name: 'Reward Balance Increase',
        weight: 70,
        critical: true,
        run: ({ before, after }) => {
          const pending = snapshotBigInt(before, pendingReward(pool, agent));
          const start = snapshotBigInt(before, rewards);
          const end = snapshotBigInt(after, rewards);
          if (pending === null || start === null || end === null) return fail('reward state could not be read');
          const gained = end - start;
          return gained > 0n && gained >= pending
            ? pass(`received ${gained} reward units`)
            : fail(`expected at least ${pending} reward units, received ${gained}`);
        },
      }),
    ];
  },
  prepare: async (host, ctx) => {
    const { pool, token } = poolAddresses(REWARD_POOL, ctx);
    await stakeInPool(host, token, pool, paramAmount(ctx.params, 'amount'));
    await mineBlocks(host, REWARD_BLOCKS);
  },
});

export const emergencyWithdraw = defineValidator({
  id: 'emergency-withdraw',
  mode: 'transaction',
  stateTargets: (ctx) => {
    const { pool, token } = poolAddresses(REWARD_POOL, ctx);
    const agent = ctx.env.agentAddress;
    return [tokenBalance(token, agent), stakedAmount(pool, agent), tokenBalance(rewardToken(ctx), agent)];
  },
  checks: (ctx) => {
    const { pool, token } = poolAddresses(REWARD_POOL, ctx);
    const agent = ctx.env.agentAddress;
    return [
      transactionSucceeded(30),
      asCritical(
        stateDelta(
          'LP Full Return',
          40,
          tokenBalance(token, agent),
          ({ before }) => snapshotBigInt(before, stakedAmount(pool, agent)) ?? 0n,
          0
        )
      ),
      asCritical(
        stateAfter('Staking Record Cleared', 20, stakedAmount(pool, agent), (after) =>
          after === 0n ? pass('staked amount is zero') : fail(`staked amount is still ${String(after)}`)
        )
      ),
      stateUnchanged('Rewards Not Claimed', 10, tokenBalance(rewardToken(ctx), agent)),
    ];
  },
  prepare: async (host, ctx) => {
    const { pool, token } = poolAddresses(REWARD_POOL, ctx);
    await stakeInPool(host, token, pool, paramAmount(ctx.params, 'amount'));
    await mineBlocks(host, REWARD_BLOCKS);
  },
});
