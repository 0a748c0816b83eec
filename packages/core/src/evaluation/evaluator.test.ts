import { describe, it, expect } from 'vitest';
import type { GoldAnswer, TestCase } from '@graphgate/shared/src/types/evaluation.types.js';
import type { SystemAdapter } from './adapters/system-adapter.js';
import { createStubAdapter } from './adapters/stub-adapter.js';
import { evaluateCases } from './evaluator.js';

function makeCase(id: string, gold: GoldAnswer, label: TestCase['label']): TestCase {
  return {
    id,
    facts: [],
    question: `Question ${id}?`,
    gold,
    label,
    claim: { subj: 'http://example.org/s', pred: 'http://example.org/p', obj: 'http://example.org/o' },
  };
}

const CASES: readonly TestCase[] = [
  makeCase('E_000000', 'YES', 'E'),
  makeCase('C_000001', 'NO', 'C'),
  makeCase('U_000002', 'UNKNOWN', 'U'),
  makeCase('U_000003', 'UNKNOWN', 'U'),
];

describe('evaluateCases', () => {
  it('should record one result per case with pass flags', async () => {
    const { results, summary } = await evaluateCases(CASES, createStubAdapter());

    expect(results[0]).toEqual({
      id: 'E_000000',
      gold: 'YES',
      pred: 'UNKNOWN',
      pass: false,
      system: 'stub',
      label: 'E',
    });
    expect(results.map((r) => r.pass)).toEqual([false, false, true, true]);
    expect(summary).toEqual({
      system: 'stub',
      total: 4,
      correct: 2,
      accuracy: 0.5,
      byLabel: {
        E: { total: 1, correct: 0, accuracy: 0 },
        C: { total: 1, correct: 0, accuracy: 0 },
        U: { total: 2, correct: 2, accuracy: 1 },
      },
    });
  });

  it('should record UNKNOWN when the adapter throws', async () => {
    const failing: SystemAdapter = {
      name: 'flaky',
      answer: (testCase) =>
        testCase.id === 'C_000001'
          ? Promise.reject(new Error('upstream timeout'))
          : Promise.resolve(testCase.gold),
    };

    const { results, summary } = await evaluateCases(CASES, failing);

    expect(results[1]).toMatchObject({ id: 'C_000001', pred: 'UNKNOWN', pass: false });
    expect(summary.correct).toBe(3);
  });

  it('should report null accuracy and no labels for an empty run', async () => {
    const { results, summary } = await evaluateCases([], createStubAdapter('none'));
    expect(results).toEqual([]);
    expect(summary).toEqual({ system: 'none', total: 0, correct: 0, accuracy: null, byLabel: {} });
  });
});
