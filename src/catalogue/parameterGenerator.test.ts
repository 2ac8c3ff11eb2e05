import { describe, expect, it } from 'vitest';
import { isAddress } from 'viem';
import { CatalogueError } from '../errors';
import type { ParameterSchema } from '../types/harness';
import { toBaseUnits } from '../utils/amounts';
import { createRandom } from '../utils/seededRandom';
import { generateParameter, generateParameters } from './parameterGenerator';

const AGENT = '0x00000000000000000000000000000000000000aa';
const TOKEN = '0x00000000000000000000000000000000000000bb';
const env = { agentAddress: AGENT, fixtures: { 'fixture-token': TOKEN } } as const;

const schemas: Record<string, ParameterSchema> = {
  to_address: { type: 'address', generation: { method: 'random' } },
  amount: { type: 'number', generation: { method: 'random', min: 0.001, max: 0.5, decimals: 4 } },
  count: { type: 'integer', generation: { method: 'random', min: 2, max: 9 } },
  message: { type: 'string', generation: { method: 'random', length: 12, charset: 'alpha' } },
  flag: { type: 'boolean', generation: { method: 'random', probability: 0.5 } },
};

describe('generateParameters', () => {
  it('reproduces the same instance for the same seed', () => {
    const first = generateParameters(schemas, createRandom(42), env);
    const second = generateParameters(schemas, createRandom(42), env);
    expect(second).toEqual(first);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('keeps every generated value inside its declared shape', () => {
    for (let seed = 1; seed <= 25; seed++) {
      const params = generateParameters(schemas, createRandom(seed), env);

      expect(typeof params.to_address === 'string' && isAddress(params.to_address)).toBe(true);

      const amount = String(params.amount);
      expect(amount).toMatch(/^\d+(\.\d{1,4})?$/);
      const units = toBaseUnits(amount, 4);
      expect(units >= 10n && units <= 5000n).toBe(true);

      expect(Number.isInteger(params.count)).toBe(true);
      expect(Number(params.count)).toBeGreaterThanOrEqual(2);
      expect(Number(params.count)).toBeLessThanOrEqual(9);

      expect(params.message).toMatch(/^[A-Za-z]{12}$/);
      expect(typeof params.flag).toBe('boolean');
    }
  });
});

describe('generateParameter', () => {
  const random = () => createRandom(7);

  it('resolves fixture and agent addresses from the environment', () => {
    expect(
      generateParameter('token', { type: 'address', generation: { method: 'fixture', fixture: 'fixture-token' } }, random(), env)
    ).toBe(TOKEN);
    expect(generateParameter('me', { type: 'address', generation: { method: 'agent_address' } }, random(), env)).toBe(AGENT);
  });

  it('checksums fixed addresses', () => {
    const value = generateParameter(
      'to',
      { type: 'address', generation: { method: 'fixed', value: '0xd8da6bf26964af9d7eed9e03e53415d37aa96045' } },
      random(),
      env
    );
    expect(value).toBe('0xd8dA6BF26964aF9D7eEd9e03E53415D37aA96045');
  });

  it('keeps fixed numbers as decimal strings', () => {
    expect(generateParameter('amount', { type: 'number', generation: { method: 'fixed', value: 0.25 } }, random(), env)).toBe('0.25');
  });

  it('picks from a list', () => {
    const value = generateParameter(
      'message',
      { type: 'string', generation: { method: 'from_list', values: ['gm', 'hello'] } },
      random(),
      env
    );
    expect(['gm', 'hello']).toContain(value);
  });

  it('honours probability extremes for booleans', () => {
    expect(generateParameter('flag', { type: 'boolean', generation: { method: 'random', probability: 1 } }, random(), env)).toBe(true);
    expect(generateParameter('flag', { type: 'boolean', generation: { method: 'random', probability: 0 } }, random(), env)).toBe(false);
  });

  it('rejects an undeployed fixture', () => {
    expect(() =>
      generateParameter('pool', { type: 'address', generation: { method: 'fixture', fixture: 'missing-pool' } }, random(), env)
    ).toThrow('parameter "pool": fixture "missing-pool" is not deployed');
  });

  it('rejects unsupported methods', () => {
    expect(() =>
      generateParameter('flag', { type: 'boolean', generation: { method: 'from_list', values: [1] } }, random(), env)
    ).toThrow(CatalogueError);
  });
});
