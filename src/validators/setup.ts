/**
 * Problem preparation steps. They run from the test identity (or an
 * impersonated account) inside the attempt's isolation bracket, so nothing
 * here outlives the attempt.
 */

import type { Address } from 'viem';
import { EnvironmentFatalError } from '../errors';
import { encodeSignatureCall } from '../ledger/abiSignature';
import type { ReceiptInfo } from '../types/harness';
import { NFT, STAKING_POOL, TOKEN, WRAPPED_NATIVE } from './fixtureAbi';
import type { PreparationHost } from './types';

function ensureSuccess(step: string, receipt: ReceiptInfo): void {
  if (!receipt.success) {
    throw new EnvironmentFatalError('PREPARE_FAILED', `Preparation step "${step}" failed: ${receipt.error ?? receipt.status}`);
  }
}

export async function approveToken(
  host: PreparationHost,
  token: Address,
  spender: Address,
  amount: bigint
): Promise<void> {
  const receipt = await host.sendAsIdentity({
    to: token,
    data: encodeSignatureCall(TOKEN.approve, [spender, amount]),
  });
  ensureSuccess('approve', receipt);
}

export async function stakeInPool(host: PreparationHost, token: Address, pool: Address, amount: bigint): Promise<void> {
  await approveToken(host, token, pool, amount);
  const receipt = await host.sendAsIdentity({
    to: pool,
    data: encodeSignatureCall(STAKING_POOL.deposit, [amount]),
  });
  ensureSuccess('deposit', receipt);
}

export async function wrapNative(host: PreparationHost, wrapped: Address, amount: bigint): Promise<void> {
  const receipt = await host.sendAsIdentity({
    to: wrapped,
    data: encodeSignatureCall(WRAPPED_NATIVE.deposit, []),
    value: amount,
  });
  ensureSuccess('wrap', receipt);
}

export async function mineBlocks(host: PreparationHost, blocks: number): Promise<void> {
  await host.ledger.mine(blocks);
}

export async function mintToken(host: PreparationHost, token: Address, to: Address, amount: bigint): Promise<void> {
  const receipt = await host.sendAsIdentity({
    to: token,
    data: encodeSignatureCall(TOKEN.mint, [to, amount]),
  });
  ensureSuccess('mint', receipt);
}

/** Give `owner` a balance of `amount` and let `spender` pull all of it. */
export async function grantAllowanceFrom(
  host: PreparationHost,
  token: Address,
  owner: Address,
  spender: Address,
  amount: bigint
): Promise<void> {
  await mintToken(host, token, owner, amount);
  const receipt = await host.sendAs(owner, {
    to: token,
    data: encodeSignatureCall(TOKEN.approve, [spender, amount]),
  });
  ensureSuccess('approve from owner', receipt);
}

export async function approveNft(host: PreparationHost, nft: Address, spender: Address, tokenId: bigint): Promise<void> {
  const receipt = await host.sendAsIdentity({
    to: nft,
    data: encodeSignatureCall(NFT.approve, [spender, tokenId]),
  });
  ensureSuccess('approve token', receipt);
}
