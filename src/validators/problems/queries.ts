/**
 * Read-only problems. The candidate returns a query result; each value is
 * compared against what the harness reads from the fork itself.
 */

import type { Address } from 'viem';
import { snapshotBigInt, snapshotValue } from '../../ledger/stateReader';
import type { StateTarget } from '../../types/harness';
import { queryAddressEquals, queryHasFields, queryQuantityMatches, querySucceeded, queryValueEquals } from '../checks';
import { MULTI_TOKEN, NFT, TOKEN } from '../fixtureAbi';
import type { CheckDefinition } from '../framework';
import { asCritical } from '../framework';
import { paramAddress, paramAmount, paramBigInt } from '../params';
import { approveNft, approveToken, mineBlocks, stakeInPool } from '../setup';
import { allowance, contractRead, gasPrice, nativeBalance, nonceOf, tokenBalance } from '../targets';
import type { ProblemValidator, ValidatorContext } from '../types';
import { defineValidator, fixtureAddress } from './shared';
import { REWARD_BLOCKS, pendingReward, stakedAmount } from './staking';

/**
 * Success 30, format 30, value 40: the common shape of a single-value query.
 */
function singleValueQuery(options: {
  id: string;
  field: string;
  target: (ctx: ValidatorContext) => StateTarget;
  tolerance?: number;
  prepare?: ProblemValidator['prepare'];
}): ProblemValidator {
  return defineValidator({
    id: options.id,
    mode: 'query',
    stateTargets: (ctx) => [options.target(ctx)],
    checks: (ctx): CheckDefinition[] => {
      const target = options.target(ctx);
      return [
        querySucceeded(30),
        queryHasFields(30, [options.field]),
        asCritical(
          queryQuantityMatches('Value Correctness', 40, options.field, ({ before }) => snapshotBigInt(before, target), {
            tolerance: options.tolerance,
          })
        ),
      ];
    },
    prepare: options.prepare,
  });
}

const queryAddress = ({ params, env }: ValidatorContext): Address =>
  params.query_address === undefined ? env.agentAddress : paramAddress(params, 'query_address');

export const queryNativeBalance = singleValueQuery({
  id: 'query-native-balance',
  field: 'balance_wei',
  target: (ctx) => nativeBalance(queryAddress(ctx)),
});

export const queryErc20Balance = singleValueQuery({
  id: 'query-erc20-balance',
  field: 'balance_raw',
  target: (ctx) => tokenBalance(paramAddress(ctx.params, 'token_address'), queryAddress(ctx)),
});

export const queryErc20Allowance = singleValueQuery({
  id: 'query-erc20-allowance',
  field: 'allowance_raw',
  target: (ctx) =>
    allowance(paramAddress(ctx.params, 'token_address'), ctx.env.agentAddress, paramAddress(ctx.params, 'spender_address')),
  prepare: (host, ctx) =>
    approveToken(
      host,
      paramAddress(ctx.params, 'token_address'),
      paramAddress(ctx.params, 'spender_address'),
      paramAmount(ctx.params, 'amount')
    ),
});

export const queryNonce = singleValueQuery({
  id: 'query-nonce',
  field: 'nonce',
  target: (ctx) => nonceOf(queryAddress(ctx)),
});

export const queryGasPrice = singleValueQuery({
  id: 'query-gas-price',
  field: 'gas_price',
  target: () => gasPrice(),
  tolerance: 0.5,
});

export const queryStakedAmount = singleValueQuery({
  id: 'query-staked-amount',
  field: 'staked_amount',
  target: (ctx) => stakedAmount(fixtureAddress(ctx.env, 'single-token-staking-pool'), ctx.env.agentAddress),
  tolerance: 0.01,
  prepare: (host, ctx) =>
    stakeInPool(
      host,
      fixtureAddress(ctx.env, 'fixture-token'),
      fixtureAddress(ctx.env, 'single-token-staking-pool'),
      paramAmount(ctx.params, 'amount')
    ),
});

export const queryPendingRewards = singleValueQuery({
  id: 'query-pending-rewards',
  field: 'pending_rewards',
  target: (ctx) => pendingReward(fixtureAddress(ctx.env, 'reward-pool'), ctx.env.agentAddress),
  tolerance: 0.05,
  prepare: async (host, ctx) => {
    await stakeInPool(
      host,
      fixtureAddress(ctx.env, 'lp-token'),
      fixtureAddress(ctx.env, 'reward-pool'),
      paramAmount(ctx.params, 'amount')
    );
    await mineBlocks(host, REWARD_BLOCKS);
  },
});

const BLOCK_SLACK = 5n;

export const queryBlockNumber = defineValidator({
  id: 'query-block-number',
  mode: 'query',
  stateTargets: () => [],
  checks: () => [
    querySucceeded(30),
    queryHasFields(30, ['block_number']),
    asCritical(
      queryQuantityMatches('Value Correctness', 40, 'block_number', ({ before }) => before?.blockNumber ?? null, {
        slack: BLOCK_SLACK,
      })
    ),
  ],
});

export const queryTokenMetadata = defineValidator({
  id: 'query-token-metadata',
  mode: 'query',
  stateTargets: ({ params }) => {
    const token = paramAddress(params, 'token_address');
    return [contractRead(token, TOKEN.name), contractRead(token, TOKEN.symbol), contractRead(token, TOKEN.decimals)];
  },
  checks: ({ params }) => {
    const token = paramAddress(params, 'token_address');
    const read = (signature: string) => contractRead(token, signature);
    return [
      querySucceeded(25),
      queryHasFields(25, ['name', 'symbol', 'decimals']),
      asCritical(queryValueEquals('Name', 15, 'name', ({ before }) => snapshotValue(before, read(TOKEN.name)))),
      asCritical(queryValueEquals('Symbol', 15, 'symbol', ({ before }) => snapshotValue(before, read(TOKEN.symbol)))),
      asCritical(queryValueEquals('Decimals', 20, 'decimals', ({ before }) => snapshotValue(before, read(TOKEN.decimals)))),
    ];
  },
});

export const queryTokenTotalSupply = singleValueQuery({
  id: 'query-token-total-supply',
  field: 'total_supply',
  target: (ctx) => contractRead(paramAddress(ctx.params, 'token_address'), TOKEN.totalSupply),
});

export const queryNftBalance = singleValueQuery({
  id: 'query-nft-balance',
  field: 'balance',
  target: (ctx) => contractRead(fixtureAddress(ctx.env, 'fixture-nft'), NFT.balanceOf, [queryAddress(ctx)]),
});

export const queryMultiTokenBalance = singleValueQuery({
  id: 'query-erc1155-balance',
  field: 'balance',
  target: (ctx) =>
    contractRead(fixtureAddress(ctx.env, 'multi-token'), MULTI_TOKEN.balanceOf, [
      paramBigInt(ctx.params, 'token_id'),
      queryAddress(ctx),
    ]),
});

/** Like singleValueQuery, for a field holding an address or a string. */
function exactValueQuery(options: {
  id: string;
  field: string;
  target: (ctx: ValidatorContext) => StateTarget;
  addressValued: boolean;
  prepare?: ProblemValidator['prepare'];
}): ProblemValidator {
  const compare = options.addressValued ? queryAddressEquals : queryValueEquals;
  return defineValidator({
    id: options.id,
    mode: 'query',
    stateTargets: (ctx) => [options.target(ctx)],
    checks: (ctx): CheckDefinition[] => {
      const target = options.target(ctx);
      return [
        querySucceeded(30),
        queryHasFields(30, [options.field]),
        asCritical(compare('Value Correctness', 40, options.field, ({ before }) => snapshotValue(before, target))),
      ];
    },
    prepare: options.prepare,
  });
}

const nftRead = (ctx: ValidatorContext, signature: string): StateTarget =>
  contractRead(fixtureAddress(ctx.env, 'fixture-nft'), signature, [paramBigInt(ctx.params, 'token_id')]);

export const queryNftOwner = exactValueQuery({
  id: 'query-nft-owner',
  field: 'owner',
  target: (ctx) => nftRead(ctx, NFT.ownerOf),
  addressValued: true,
});

export const queryNftApproval = exactValueQuery({
  id: 'query-nft-approval',
  field: 'approved_address',
  target: (ctx) => nftRead(ctx, NFT.getApproved),
  addressValued: true,
  prepare: (host, ctx) =>
    approveNft(
      host,
      fixtureAddress(ctx.env, 'fixture-nft'),
      paramAddress(ctx.params, 'spender_address'),
      paramBigInt(ctx.params, 'token_id')
    ),
});

export const queryNftTokenUri = exactValueQuery({
  id: 'query-nft-token-uri',
  field: 'token_uri',
  target: (ctx) => nftRead(ctx, NFT.tokenURI),
  addressValued: false,
});
