/**
 * ERC20 allowance problems, including permit signatures and approveAndCall.
 */

import type { Address } from 'viem';
import { isHex, size } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { parseFunctionSignature } from '../../ledger/abiSignature';
import type { ParameterInstance } from '../../types/harness';
import {
  calldataArgs,
  selectorIs,
  stateDelta,
  stateUnchanged,
  transactionSucceeded,
} from '../checks';
import { CALLBACK_TOKEN, TOKEN } from '../fixtureAbi';
import type { CheckDefinition } from '../framework';
import { asCritical, fail, pass } from '../framework';
import { paramAddress, paramAmount, paramDecimals, paramString } from '../params';
import { approveToken, grantAllowanceFrom } from '../setup';
import { allowance, tokenBalance } from '../targets';
import { allowanceIs } from './erc20';
import { defineValidator, fixtureAddress, sameAddress } from './shared';

function spenderArgument(signature: string, spender: Address): CheckDefinition {
  const fn = parseFunctionSignature(signature).name;
  return asCritical(
    calldataArgs('Correct Function Called', 20, signature, ([to]) =>
      sameAddress(to, spender) ? pass(`${fn}(${spender}, ...)`) : fail(`${fn} names ${String(to)} instead of ${spender}`)
    )
  );
}

export const erc20TransferFrom = defineValidator({
  id: 'erc20-transfer-from',
  mode: 'transaction',
  stateTargets: ({ params, env }) => {
    const token = paramAddress(params, 'token_address');
    const owner = paramAddress(params, 'from_address');
    return [
      allowance(token, owner, env.agentAddress),
      tokenBalance(token, owner),
      tokenBalance(token, paramAddress(params, 'to_address')),
    ];
  },
  checks: ({ params, env, tolerances }) => {
    const token = paramAddress(params, 'token_address');
    const owner = paramAddress(params, 'from_address');
    const recipient = paramAddress(params, 'to_address');
    const amount = paramAmount(params, 'amount', paramDecimals(params));
    return [
      transactionSucceeded(30),
      asCritical(
        calldataArgs('Correct Function Called', 20, TOKEN.transferFrom, ([from, to]) => {
          if (!sameAddress(from, owner)) return fail(`pulled from ${String(from)} instead of ${owner}`);
          if (!sameAddress(to, recipient)) return fail(`sent to ${String(to)} instead of ${recipient}`);
          return pass(`transferFrom(${owner}, ${recipient}, ...)`);
        })
      ),
      asCritical(
        stateDelta('Allowance Decreased', 15, allowance(token, owner, env.agentAddress), () => -amount, tolerances.amount)
      ),
      asCritical(stateDelta('Owner Token Balance', 15, tokenBalance(token, owner), () => -amount, tolerances.amount)),
      asCritical(stateDelta('Recipient Token Balance', 20, tokenBalance(token, recipient), () => amount, tolerances.amount)),
    ];
  },
  prepare: (host, { params, env }) =>
    grantAllowanceFrom(
      host,
      paramAddress(params, 'token_address'),
      paramAddress(params, 'from_address'),
      env.agentAddress,
      paramAmount(params, 'amount', paramDecimals(params))
    ),
});

function allowanceAdjustment(id: string, signature: string, direction: 1n | -1n) {
  return defineValidator({
    id,
    mode: 'transaction',
    stateTargets: ({ params, env }) => {
      const token = paramAddress(params, 'token_address');
      return [
        allowance(token, env.agentAddress, paramAddress(params, 'spender_address')),
        tokenBalance(token, env.agentAddress),
      ];
    },
    checks: ({ params, env, tolerances }) => {
      const token = paramAddress(params, 'token_address');
      const spender = paramAddress(params, 'spender_address');
      const amount = paramAmount(params, 'amount', paramDecimals(params));
      return [
        transactionSucceeded(30),
        spenderArgument(signature, spender),
        asCritical(
          stateDelta(
            direction > 0n ? 'Allowance Increased' : 'Allowance Decreased',
            40,
            allowance(token, env.agentAddress, spender),
            () => direction * amount,
            tolerances.amount
          )
        ),
        stateUnchanged('No Token Transfer', 10, tokenBalance(token, env.agentAddress)),
      ];
    },
    prepare: (host, { params }) =>
      approveToken(
        host,
        paramAddress(params, 'token_address'),
        paramAddress(params, 'spender_address'),
        paramAmount(params, 'current_allowance', paramDecimals(params))
      ),
  });
}

export const erc20IncreaseAllowance = allowanceAdjustment('erc20-increase-allowance', TOKEN.increaseAllowance, 1n);
export const erc20DecreaseAllowance = allowanceAdjustment('erc20-decrease-allowance', TOKEN.decreaseAllowance, -1n);

/** The account whose signature the permit carries, derived from its test key. */
export function permitOwner(params: ParameterInstance): Address {
  const key = paramString(params, 'owner_key');
  if (!isHex(key) || size(key) !== 32) {
    throw new Error('parameter "owner_key" is not a 32-byte hex private key');
  }
  return privateKeyToAccount(key).address;
}

export const erc20Permit = defineValidator({
  id: 'erc20-permit',
  mode: 'transaction',
  stateTargets: ({ params }) => [
    allowance(paramAddress(params, 'token_address'), permitOwner(params), paramAddress(params, 'spender_address')),
  ],
  checks: ({ params }) => {
    const token = paramAddress(params, 'token_address');
    const owner = permitOwner(params);
    const spender = paramAddress(params, 'spender_address');
    const amount = paramAmount(params, 'amount', paramDecimals(params));
    return [
      transactionSucceeded(30),
      asCritical(
        calldataArgs('Permit Call', 20, TOKEN.permit, ([signer, to]) => {
          if (!sameAddress(signer, owner)) return fail(`permit names owner ${String(signer)} instead of ${owner}`);
          if (!sameAddress(to, spender)) return fail(`permit names spender ${String(to)} instead of ${spender}`);
          return pass(`permit(${owner}, ${spender}, ...)`);
        })
      ),
      asCritical(allowanceIs('Allowance Set', 50, allowance(token, owner, spender), amount, 0)),
    ];
  },
});

export const erc20ApproveAndCall = defineValidator({
  id: 'erc20-approve-and-call',
  mode: 'transaction',
  stateTargets: ({ params, env }) => [
    allowance(fixtureAddress(env, 'callback-token'), env.agentAddress, paramAddress(params, 'spender_address')),
  ],
  checks: ({ params, env }) => {
    const token = fixtureAddress(env, 'callback-token');
    const spender = paramAddress(params, 'spender_address');
    const amount = paramAmount(params, 'amount');
    return [
      transactionSucceeded(30),
      asCritical(allowanceIs('Allowance Set', 50, allowance(token, env.agentAddress, spender), amount)),
      asCritical(selectorIs('Function Signature', 20, CALLBACK_TOKEN.approveAndCall)),
    ];
  },
});
