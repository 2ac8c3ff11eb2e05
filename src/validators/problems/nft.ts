/**
 * ERC721 and ERC1155 fixture problems. Token ids 1-5 of fixture-nft and
 * ids 1-3 of multi-token belong to the test identity after setup.
 */

import { stringToHex } from 'viem';
import type { StateTarget } from '../../types/harness';
import {
  calldataArgs,
  selectorIs,
  selectorOneOf,
  stateAfter,
  stateDelta,
  targetAddress,
  transactionSucceeded,
} from '../checks';
import { MULTI_TOKEN, NFT } from '../fixtureAbi';
import { asCritical, fail, pass } from '../framework';
import { paramAddress, paramBigInt, paramString } from '../params';
import { contractRead } from '../targets';
import type { ValidatorContext } from '../types';
import { defineValidator, fixtureAddress, sameAddress } from './shared';

export const erc721Transfer = defineValidator({
  id: 'erc721-transfer',
  mode: 'transaction',
  stateTargets: ({ params, env }) => [
    contractRead(fixtureAddress(env, 'fixture-nft'), NFT.ownerOf, [paramBigInt(params, 'token_id')]),
  ],
  checks: ({ params, env }) => {
    const nft = fixtureAddress(env, 'fixture-nft');
    const recipient = paramAddress(params, 'to_address');
    const tokenId = paramBigInt(params, 'token_id');
    return [
      transactionSucceeded(30),
      asCritical(
        stateAfter('Ownership Transferred', 40, contractRead(nft, NFT.ownerOf, [tokenId]), (after) =>
          sameAddress(after, recipient)
            ? pass(`token ${tokenId} now belongs to ${recipient}`)
            : fail(`token ${tokenId} belongs to ${String(after)}, expected ${recipient}`)
        )
      ),
      asCritical(selectorOneOf('Function Signature', 30, [NFT.safeTransferFrom, NFT.safeTransferFromWithData])),
    ];
  },
});

export const erc721Approve = defineValidator({
  id: 'erc721-approve',
  mode: 'transaction',
  stateTargets: ({ params, env }) => [
    contractRead(fixtureAddress(env, 'fixture-nft'), NFT.getApproved, [paramBigInt(params, 'token_id')]),
  ],
  checks: ({ params, env }) => {
    const nft = fixtureAddress(env, 'fixture-nft');
    const spender = paramAddress(params, 'spender_address');
    const tokenId = paramBigInt(params, 'token_id');
    return [
      transactionSucceeded(30),
      asCritical(
        stateAfter('Approval Set', 50, contractRead(nft, NFT.getApproved, [tokenId]), (after) =>
          sameAddress(after, spender)
            ? pass(`${spender} may move token ${tokenId}`)
            : fail(`token ${tokenId} is approved for ${String(after)}, expected ${spender}`)
        )
      ),
      asCritical(selectorIs('Function Signature', 20, NFT.approve)),
    ];
  },
});

export const erc721SetApprovalForAll = defineValidator({
  id: 'erc721-set-approval-for-all',
  mode: 'transaction',
  stateTargets: ({ params, env }) => [
    contractRead(fixtureAddress(env, 'fixture-nft'), NFT.isApprovedForAll, [
      env.agentAddress,
      paramAddress(params, 'operator_address'),
    ]),
  ],
  checks: ({ params, env }) => {
    const nft = fixtureAddress(env, 'fixture-nft');
    const operator = paramAddress(params, 'operator_address');
    return [
      transactionSucceeded(30),
      asCritical(
        stateAfter('Operator Approved', 50, contractRead(nft, NFT.isApprovedForAll, [env.agentAddress, operator]), (after) =>
          after === true ? pass(`${operator} is an operator`) : fail(`${operator} is not approved for all tokens`)
        )
      ),
      asCritical(
        calldataArgs('Function Signature', 20, NFT.setApprovalForAll, ([to, approved]) => {
          if (!sameAddress(to, operator)) return fail(`approved ${String(to)} instead of ${operator}`);
          return approved === true ? pass(`setApprovalForAll(${operator}, true)`) : fail('approved flag is false');
        })
      ),
    ];
  },
});

function recipientBalance({ params, env }: ValidatorContext): StateTarget {
  return contractRead(fixtureAddress(env, 'multi-token'), MULTI_TOKEN.balanceOf, [
    paramBigInt(params, 'token_id'),
    paramAddress(params, 'to_address'),
  ]);
}

export const erc1155TransferSingle = defineValidator({
  id: 'erc1155-transfer-single',
  mode: 'transaction',
  stateTargets: (ctx) => [recipientBalance(ctx)],
  checks: (ctx) => {
    const { params, env } = ctx;
    const token = fixtureAddress(env, 'multi-token');
    const balance = recipientBalance(ctx);
    const amount = paramBigInt(params, 'amount');
    return [
      transactionSucceeded(30),
      asCritical(targetAddress('Contract Address', 20, token)),
      asCritical(selectorIs('Function Signature', 20, MULTI_TOKEN.safeTransferFrom)),
      asCritical(stateDelta('Balance Transfer', 30, balance, () => amount, 0)),
    ];
  },
});

export const erc1155TransferWithData = defineValidator({
  id: 'erc1155-transfer-with-data',
  mode: 'transaction',
  stateTargets: (ctx) => [recipientBalance(ctx)],
  checks: (ctx) => {
    const { params, env } = ctx;
    const token = fixtureAddress(env, 'multi-token');
    const balance = recipientBalance(ctx);
    const amount = paramBigInt(params, 'amount');
    const data = stringToHex(paramString(params, 'message')).toLowerCase();
    return [
      transactionSucceeded(30),
      asCritical(targetAddress('Contract Address', 15, token)),
      asCritical(selectorIs('Function Signature', 15, MULTI_TOKEN.safeTransferFrom)),
      asCritical(
        calldataArgs('Data Parameter', 10, MULTI_TOKEN.safeTransferFrom, (args) => {
          const actual = args[4];
          return typeof actual === 'string' && actual.toLowerCase() === data
            ? pass(`data ${actual}`)
            : fail(`expected data ${data}, got ${String(actual)}`);
        })
      ),
      asCritical(stateDelta('Balance Transfer', 30, balance, () => amount, 0)),
    ];
  },
});
