import { describe, it, expect } from 'vitest';
import { buildConfusionMatrix, computeMetrics, deriveMetrics, deriveTotals } from './metrics.js';
import type { ConfusionMatrix, EvaluationResult } from '@graphgate/shared/src/types/evaluation.types.js';

const MATRIX: ConfusionMatrix = { A_E: 8, S_E: 2, A_C: 3, S_C: 7, A_U: 1, S_U: 9 };

function result(
  system: string,
  gold: EvaluationResult['gold'],
  pred: string,
  id = `${system}-${gold}-${pred}`,
): EvaluationResult {
  return { id, gold, pred, pass: gold === pred, system, label: gold };
}

describe('deriveMetrics', () => {
  it('should derive every rate from the six cells', () => {
    const m = deriveMetrics(MATRIX);
    expect(m.AP).toBeCloseTo(16 / 18, 4);
    expect(m.LA).toBeCloseTo(0.8, 4);
    expect(m.CVRR).toBeCloseTo(0.7, 4);
    expect(m.FAR_NE).toBeCloseTo(0.2, 4);
    expect(m.AP_invalid).toBeCloseTo(7 / 9, 4);
    expect(m.AP_unknown).toBeCloseTo(9 / 11, 4);
    expect(m.AR).toBeCloseTo(0.8, 4);
    expect(m.AR_contradictory).toBeCloseTo(0.7, 4);
    expect(m.AR_unknown).toBeCloseTo(0.9, 4);
    expect(m.coverage).toBeCloseTo(0.4, 4);
    expect(m.answer_accuracy).toBeCloseTo(8 / 12, 4);
    expect(m.overall_accuracy).toBeCloseTo(0.8, 4);
  });

  it('should report undefined rates as null instead of zero', () => {
    const m = deriveMetrics({ A_E: 5, A_C: 0, A_U: 0, S_E: 0, S_C: 0, S_U: 0 });
    expect(m.AP).toBeNull();
    expect(m.CVRR).toBeNull();
    expect(m.FAR_NE).toBeNull();
    expect(m.AR).toBeNull();
    expect(m.LA).toBe(1);
    expect(m.coverage).toBe(1);
  });

  it('should report every rate as null for an empty matrix', () => {
    const m = deriveMetrics({ A_E: 0, A_C: 0, A_U: 0, S_E: 0, S_C: 0, S_U: 0 });
    expect(Object.values(m).every((v) => v === null)).toBe(true);
  });
});

describe('deriveTotals', () => {
  it('should sum rows and columns', () => {
    expect(deriveTotals(MATRIX)).toEqual({
      entailed: 10,
      contradictory: 10,
      unknown: 10,
      non_entailed: 20,
      abstentions: 18,
      answers: 12,
    });
  });
});

describe('buildConfusionMatrix', () => {
  it('should map gold to columns and predictions to actions', () => {
    const matrix = buildConfusionMatrix([
      { gold: 'YES', pred: 'YES' },
      { gold: 'YES', pred: 'UNKNOWN' },
      { gold: 'NO', pred: 'YES' },
      { gold: 'NO', pred: 'NO' },
      { gold: 'UNKNOWN', pred: 'UNKNOWN' },
      { gold: 'UNKNOWN', pred: 'maybe' },
    ]);
    expect(matrix).toEqual({ A_E: 1, A_C: 2, A_U: 1, S_E: 1, S_C: 0, S_U: 1 });
  });
});

describe('computeMetrics', () => {
  it('should group results per system in sorted order', () => {
    const output = computeMetrics([
      result('stub', 'YES', 'UNKNOWN'),
      result('kg_oracle', 'YES', 'YES'),
      result('kg_oracle', 'NO', 'NO'),
      result('kg_oracle', 'UNKNOWN', 'UNKNOWN'),
      result('stub', 'NO', 'UNKNOWN'),
    ]);

    expect(Object.keys(output)).toEqual(['kg_oracle', 'stub']);
    expect(output['kg_oracle'].counts).toEqual({ A_E: 1, A_C: 1, S_U: 1 });
    expect(output['kg_oracle'].metrics.CVRR).toBe(0);
    expect(output['kg_oracle'].metrics.FAR_NE).toBe(0.5);
    expect(output['stub'].confusion_matrix).toEqual({ A_E: 0, A_C: 0, A_U: 0, S_E: 1, S_C: 1, S_U: 0 });
    expect(output['stub'].metrics.AP).toBe(0.5);
    expect(output['stub'].metrics.coverage).toBe(0);
    expect(output['stub'].metrics.LA).toBe(0);
  });

  it('should produce the JSON document layout', () => {
    const output = computeMetrics([result('stub', 'YES', 'UNKNOWN')]);
    expect(Object.keys(output['stub'])).toEqual(['counts', 'confusion_matrix', 'totals', 'metrics']);
    expect(JSON.parse(JSON.stringify(output))).toEqual(output);
  });
});
