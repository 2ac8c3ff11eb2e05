import { describe, expect, it } from 'vitest';
import type { AttemptEnvironment } from '../types/harness';
import { resolveStepParams } from './stepParams';

const env: AttemptEnvironment = {
  rpcUrl: 'http://127.0.0.1:8545',
  chainId: 56,
  agentAddress: '0x00000000000000000000000000000000000000aa',
  fixtures: { 'fixture-token': '0x0000000000000000000000000000000000000011' },
};

describe('resolveStepParams', () => {
  it('resolves parameter, fixture and agent references and keeps literals', () => {
    const resolved = resolveStepParams(
      {
        validator: 'erc20-transfer',
        params: {
          token_address: '{fixture:fixture-token}',
          to_address: '{recipient}',
          owner: '{agent}',
          amount: '{amount}',
          token_decimals: 18,
          note: 'pay {recipient}',
        },
      },
      { recipient: '0x00000000000000000000000000000000000000cc', amount: '1.5' },
      env
    );

    expect(resolved).toEqual({
      token_address: '0x0000000000000000000000000000000000000011',
      to_address: '0x00000000000000000000000000000000000000cc',
      owner: '0x00000000000000000000000000000000000000aa',
      amount: '1.5',
      token_decimals: 18,
      note: 'pay {recipient}',
    });
  });

  it('rejects a fixture that is not deployed', () => {
    expect(() =>
      resolveStepParams({ validator: 'erc20-transfer', params: { token_address: '{fixture:lp-token}' } }, {}, env)
    ).toThrow('fixture "lp-token" is not deployed');
  });

  it('rejects a parameter the problem does not define', () => {
    expect(() => resolveStepParams({ validator: 'native-transfer', params: { amount: '{total}' } }, {}, env)).toThrow(
      'step references unknown parameter {total}'
    );
  });
});
