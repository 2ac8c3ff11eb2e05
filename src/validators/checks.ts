/**
 * Reusable check builders shared by the problem validators.
 */

import type { Address, Hex } from 'viem';
import { decodeFunctionData, formatEther, parseGwei, toFunctionSelector } from 'viem';
import { parseFunctionSignature } from '../ledger/abiSignature';
import { snapshotBigInt, snapshotValue } from '../ledger/stateReader';
import type { ReceiptInfo, StateTarget, StateValue } from '../types/harness';
import { absDiff } from '../utils/amounts';
import type { CheckDefinition, CheckOutcome, Evidence } from './framework';
import { defineCheck, fail, pass } from './framework';
import { queryData, queryReportedSuccess, queryQuantity } from './queryPayload';
import { describeTolerance, withinTolerance } from './tolerance';

const MIN_GAS = 21_000n;
const MAX_GAS = 30_000_000n;
const MAX_REASONABLE_PRICE = parseGwei('100');

export const gasCost = (receipt: ReceiptInfo | undefined): bigint =>
  receipt ? receipt.gasUsed * receipt.effectiveGasPrice : 0n;

export function selectorOf(signature: string): Hex {
  return toFunctionSelector(parseFunctionSignature(signature));
}

function sameAddress(a: string | undefined, b: string): boolean {
  return a !== undefined && a.toLowerCase() === b.toLowerCase();
}

// ============================================
// Transaction checks
// ============================================

export function transactionSucceeded(weight: number, critical = true): CheckDefinition {
  return defineCheck({
    name: 'Transaction Success',
    weight,
    critical,
    run: ({ receipt }) => {
      if (!receipt) return fail('no receipt was produced');
      if (receipt.success) return pass(`confirmed in block ${receipt.blockNumber ?? '?'}`);
      return fail(receipt.error ?? `transaction ${receipt.status}`);
    },
  });
}

export function targetAddress(name: string, weight: number, expected: Address): CheckDefinition {
  return defineCheck({
    name,
    weight,
    run: ({ request, intent }) => {
      const actual = request?.to ?? (typeof intent?.to === 'string' ? intent.to : undefined);
      return sameAddress(actual, expected)
        ? pass(`sent to ${expected}`)
        : fail(`expected ${expected}, got ${actual ?? 'nothing'}`);
    },
  });
}

export function valueWithin(name: string, weight: number, expected: bigint, tolerance: number): CheckDefinition {
  return defineCheck({
    name,
    weight,
    run: ({ request }) => {
      if (!request) return fail('no transaction was prepared');
      return withinTolerance(request.value, expected, tolerance)
        ? pass(`value ${request.value} wei`)
        : fail(`expected ${expected} wei (±${describeTolerance(tolerance)}), got ${request.value}`);
    },
  });
}

export function selectorIs(name: string, weight: number, signature: string): CheckDefinition {
  const expected = selectorOf(signature);
  return defineCheck({
    name,
    weight,
    run: ({ request }) => {
      const actual = request ? request.data.slice(0, 10).toLowerCase() : '';
      return actual === expected
        ? pass(`called ${parseFunctionSignature(signature).name} (${expected})`)
        : fail(`expected selector ${expected}, got ${actual || 'empty calldata'}`);
    },
  });
}

/** Any of several selectors is accepted, e.g. the overloads of one function. */
export function selectorOneOf(name: string, weight: number, signatures: readonly string[]): CheckDefinition {
  const expected = signatures.map(selectorOf);
  return defineCheck({
    name,
    weight,
    run: ({ request }) => {
      const actual = request ? request.data.slice(0, 10).toLowerCase() : '';
      const index = expected.findIndex((selector) => selector === actual);
      return index >= 0
        ? pass(`called ${parseFunctionSignature(signatures[index]).name} (${actual})`)
        : fail(`expected one of ${expected.join(', ')}, got ${actual || 'empty calldata'}`);
    },
  });
}

/**
 * Decode the calldata against one function signature and hand the
 * arguments to verify.
 */
export function calldataArgs(
  name: string,
  weight: number,
  signature: string,
  verify: (args: readonly unknown[], evidence: Evidence) => CheckOutcome
): CheckDefinition {
  const fn = parseFunctionSignature(signature);
  return defineCheck({
    name,
    weight,
    run: (evidence) => {
      const data = evidence.request?.data;
      if (!data || data === '0x') return fail('transaction has no calldata');
      let args: readonly unknown[];
      try {
        args = decodeFunctionData({ abi: [fn], data }).args ?? [];
      } catch {
        return fail(`calldata does not decode as ${fn.name}`);
      }
      return verify(args, evidence);
    },
  });
}

export function gasReasonable(weight: number): CheckDefinition {
  return defineCheck({
    name: 'Gas Settings',
    weight,
    run: ({ request }) => {
      if (!request) return fail('no transaction was prepared');
      if (request.gas < MIN_GAS || request.gas > MAX_GAS) {
        return fail(`gas limit ${request.gas} is outside [${MIN_GAS}, ${MAX_GAS}]`);
      }
      const price = request.fee.type === 'legacy' ? request.fee.gasPrice : request.fee.maxFeePerGas;
      if (price === 0n || price > MAX_REASONABLE_PRICE) {
        return fail(`gas price ${price} wei is not reasonable`);
      }
      return pass(`gas ${request.gas} at ${price} wei`);
    },
  });
}

// ============================================
// State checks
// ============================================

function readPair(evidence: Evidence, target: StateTarget): { before: bigint; after: bigint } | null {
  const before = snapshotBigInt(evidence.before, target);
  const after = snapshotBigInt(evidence.after, target);
  return before === null || after === null ? null : { before, after };
}

/**
 * after − before must equal expected (signed) within the tolerance.
 */
export function stateDelta(
  name: string,
  weight: number,
  target: StateTarget,
  expected: (evidence: Evidence) => bigint,
  tolerance: number
): CheckDefinition {
  return defineCheck({
    name,
    weight,
    run: (evidence) => {
      const pair = readPair(evidence, target);
      if (!pair) return fail('state could not be read');
      const delta = pair.after - pair.before;
      const want = expected(evidence);
      return withinTolerance(delta, want, tolerance)
        ? pass(`changed by ${delta}`)
        : fail(`expected change ${want} (±${describeTolerance(tolerance)}), got ${delta}`);
    },
  });
}

export function stateUnchanged(name: string, weight: number, target: StateTarget): CheckDefinition {
  return defineCheck({
    name,
    weight,
    run: (evidence) => {
      const pair = readPair(evidence, target);
      if (!pair) return fail('state could not be read');
      return pair.after === pair.before ? pass('unchanged') : fail(`changed by ${pair.after - pair.before}`);
    },
  });
}

export function stateAfter(
  name: string,
  weight: number,
  target: StateTarget,
  verify: (after: StateValue, before: StateValue, evidence: Evidence) => CheckOutcome
): CheckDefinition {
  return defineCheck({
    name,
    weight,
    run: (evidence) => verify(snapshotValue(evidence.after, target), snapshotValue(evidence.before, target), evidence),
  });
}

// ============================================
// Query checks
// ============================================

export function querySucceeded(weight: number): CheckDefinition {
  return defineCheck({
    name: 'Query Execution Success',
    weight,
    critical: true,
    run: ({ query }) => {
      if (!query) return fail('no query result was returned');
      const reported = queryReportedSuccess(query);
      return reported.success ? pass('query returned a result') : fail(`query failed: ${reported.error ?? 'no reason given'}`);
    },
  });
}

export function queryHasFields(weight: number, fields: readonly string[]): CheckDefinition {
  return defineCheck({
    name: 'Return Format',
    weight,
    run: ({ query }) => {
      if (!query) return fail('no query result was returned');
      const data = queryData(query);
      const missing = fields.filter((field) => !(field in data));
      return missing.length === 0
        ? pass(`has ${fields.join(', ')}`)
        : fail(`missing ${missing.join(', ')} (got ${Object.keys(data).join(', ') || 'nothing'})`);
    },
  });
}

/**
 * Compare a numeric query field against a value read from chain state.
 * `slack` is an absolute allowance on top of the relative tolerance.
 */
export function queryQuantityMatches(
  name: string,
  weight: number,
  field: string,
  expected: (evidence: Evidence) => bigint | null,
  options: { tolerance?: number; slack?: bigint } = {}
): CheckDefinition {
  const tolerance = options.tolerance ?? 0;
  const slack = options.slack ?? 0n;
  return defineCheck({
    name,
    weight,
    run: (evidence) => {
      if (!evidence.query) return fail('no query result was returned');
      const actual = queryQuantity(evidence.query, field);
      if (actual === null) return fail(`${field} is not an integer quantity`);
      const want = expected(evidence);
      if (want === null) return fail('reference value could not be read');
      const ok = absDiff(actual, want) <= slack || withinTolerance(actual, want, tolerance);
      return ok ? pass(`${field} = ${actual}`) : fail(`expected ${field} ${want}, got ${actual}`);
    },
  });
}

export function queryValueEquals(
  name: string,
  weight: number,
  field: string,
  expected: (evidence: Evidence) => StateValue
): CheckDefinition {
  return defineCheck({
    name,
    weight,
    run: (evidence) => {
      if (!evidence.query) return fail('no query result was returned');
      const actual = queryData(evidence.query)[field];
      const want = expected(evidence);
      if (want === null) return fail('reference value could not be read');
      const matches = typeof want === 'bigint' ? String(actual) === want.toString() : actual === want;
      return matches ? pass(`${field} = ${String(actual)}`) : fail(`expected ${field} ${String(want)}, got ${String(actual)}`);
    },
  });
}

/** Address-valued query field, compared without regard to checksum case. */
export function queryAddressEquals(
  name: string,
  weight: number,
  field: string,
  expected: (evidence: Evidence) => StateValue
): CheckDefinition {
  return defineCheck({
    name,
    weight,
    run: (evidence) => {
      if (!evidence.query) return fail('no query result was returned');
      const actual = queryData(evidence.query)[field];
      const want = expected(evidence);
      if (typeof want !== 'string') return fail('reference value could not be read');
      return typeof actual === 'string' && sameAddress(actual, want)
        ? pass(`${field} = ${actual}`)
        : fail(`expected ${field} ${want}, got ${String(actual)}`);
    },
  });
}

export const describeEther = (wei: bigint): string => `${formatEther(wei)} (${wei} wei)`;
