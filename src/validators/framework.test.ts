import { describe, expect, it } from 'vitest';
import type { Evidence } from './framework';
import { asCritical, defineCheck, fail, failedReport, pass, runChecks, withWeights } from './framework';

const evidence: Evidence = {
  params: {},
  env: {
    rpcUrl: 'http://127.0.0.1:8545',
    chainId: 56,
    agentAddress: '0x00000000000000000000000000000000000000aa',
    fixtures: {},
  },
};

const passing = (name: string, weight: number, critical = false) =>
  defineCheck({ name, weight, critical, run: () => pass('ok') });
const failing = (name: string, weight: number, critical = false) =>
  defineCheck({ name, weight, critical, run: () => fail('wrong') });

describe('runChecks', () => {
  it('sums the points of passing checks', () => {
    const report = runChecks([passing('A', 60, true), failing('B', 40)], evidence);

    expect(report.score).toBe(60);
    expect(report.maxScore).toBe(100);
    expect(report.passed).toBe(true);
    expect(report.feedback).toBe('- B: wrong\nScore: 60/100');
  });

  it('fails the report when a critical check fails, whatever the score', () => {
    const report = runChecks([failing('A', 10, true), passing('B', 90)], evidence);

    expect(report.score).toBe(90);
    expect(report.passed).toBe(false);
    expect(report.feedback).toBe('- A (critical): wrong\nScore: 90/100');
  });

  it('turns a throwing check into a failure', () => {
    const throwing = defineCheck({
      name: 'Throws',
      weight: 10,
      run: () => {
        throw new Error('boom');
      },
    });

    const [result] = runChecks([throwing], evidence).checks;

    expect(result).toEqual({
      name: 'Throws',
      passed: false,
      critical: false,
      points: 0,
      maxPoints: 10,
      message: 'check threw: boom',
    });
  });

  it('never passes an empty check list', () => {
    const report = runChecks([], evidence);
    expect(report.passed).toBe(false);
    expect(report.feedback).toBe('All checks passed.\nScore: 0/0');
  });

  it('returns a frozen report', () => {
    const report = runChecks([passing('A', 1)], evidence);
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.checks)).toBe(true);
  });
});

describe('check definitions', () => {
  it('rejects negative weights', () => {
    expect(() => passing('Bad', -1)).toThrow('Check "Bad" has an invalid weight: -1');
  });

  it('re-weights checks by name', () => {
    const [a, b] = withWeights([passing('A', 60), passing('B', 40)], { B: 10, Missing: 5 });
    expect(a.weight).toBe(60);
    expect(b.weight).toBe(10);
  });

  it('marks a check critical without changing it otherwise', () => {
    const check = passing('A', 25);
    const critical = asCritical(check);
    expect(critical.critical).toBe(true);
    expect(critical.weight).toBe(25);
    expect(asCritical(critical)).toBe(critical);
  });
});

describe('failedReport', () => {
  it('scores zero and reports every check as not evaluated', () => {
    const report = failedReport([passing('A', 60, true), passing('B', 40)], {
      kind: 'timeout',
      message: 'skill exceeded 60000ms',
    });

    expect(report.score).toBe(0);
    expect(report.maxScore).toBe(100);
    expect(report.passed).toBe(false);
    expect(report.checks.map((check) => check.message)).toEqual(['not evaluated (timeout)', 'not evaluated (timeout)']);
    expect(report.feedback.split('\n')[0]).toBe('Execution failed (timeout): skill exceeded 60000ms');
  });
});
