import type {
  AbstentionMetrics,
  ConfusionMatrix,
  ConfusionTotals,
  EvaluationResult,
  SystemMetrics,
} from '@graphgate/shared/src/types/evaluation.types.js';
import { goldToLabel, predictionToAction } from './epistemic-classifier.js';

type CellKey = keyof ConfusionMatrix;

type Outcome = Pick<EvaluationResult, 'gold' | 'pred'>;

function cellFor(outcome: Outcome): CellKey {
  const action = predictionToAction(outcome.pred) === 'ANSWER' ? 'A' : 'S';
  const label = goldToLabel(outcome.gold);
  return `${action}_${label}`;
}

function ratio(numerator: number, denominator: number): number | null {
  return denominator > 0 ? numerator / denominator : null;
}

function tally(outcomes: readonly Outcome[]): Map<CellKey, number> {
  const counts = new Map<CellKey, number>();
  for (const outcome of outcomes) {
    const cell = cellFor(outcome);
    counts.set(cell, (counts.get(cell) ?? 0) + 1);
  }
  return counts;
}

function matrixFrom(counts: ReadonlyMap<CellKey, number>): ConfusionMatrix {
  return {
    A_E: counts.get('A_E') ?? 0,
    A_C: counts.get('A_C') ?? 0,
    A_U: counts.get('A_U') ?? 0,
    S_E: counts.get('S_E') ?? 0,
    S_C: counts.get('S_C') ?? 0,
    S_U: counts.get('S_U') ?? 0,
  };
}

export function buildConfusionMatrix(outcomes: readonly Outcome[]): ConfusionMatrix {
  return matrixFrom(tally(outcomes));
}

export function deriveTotals(m: ConfusionMatrix): ConfusionTotals {
  const entailed = m.A_E + m.S_E;
  const contradictory = m.A_C + m.S_C;
  const unknown = m.A_U + m.S_U;
  return {
    entailed,
    contradictory,
    unknown,
    non_entailed: contradictory + unknown,
    abstentions: m.S_E + m.S_C + m.S_U,
    answers: m.A_E + m.A_C + m.A_U,
  };
}

/** Every rate is derived from the six cells alone; zero denominators give null. */
export function deriveMetrics(m: ConfusionMatrix): AbstentionMetrics {
  const t = deriveTotals(m);
  const total = t.answers + t.abstentions;
  const correctAbstentions = m.S_C + m.S_U;

  return {
    AP: ratio(correctAbstentions, t.abstentions),
    AP_invalid: ratio(m.S_C, m.S_C + m.S_E),
    AP_unknown: ratio(m.S_U, m.S_U + m.S_E),
    AR: ratio(correctAbstentions, t.non_entailed),
    AR_contradictory: ratio(m.S_C, t.contradictory),
    AR_unknown: ratio(m.S_U, t.unknown),
    CVRR: ratio(m.S_C, t.contradictory),
    FAR_NE: ratio(m.A_C + m.A_U, t.non_entailed),
    LA: ratio(m.A_E, t.entailed),
    coverage: ratio(t.answers, total),
    answer_accuracy: ratio(m.A_E, t.answers),
    overall_accuracy: ratio(m.A_E + correctAbstentions, total),
  };
}

/** Metrics per system, keyed in sorted system order. */
export function computeMetrics(results: readonly EvaluationResult[]): Record<string, SystemMetrics> {
  const bySystem = new Map<string, EvaluationResult[]>();
  for (const result of results) {
    const rows = bySystem.get(result.system);
    if (rows) {
      rows.push(result);
    } else {
      bySystem.set(result.system, [result]);
    }
  }

  const output: Record<string, SystemMetrics> = {};
  for (const system of [...bySystem.keys()].sort()) {
    const counts = tally(bySystem.get(system) ?? []);
    const matrix = matrixFrom(counts);
    output[system] = {
      counts: Object.fromEntries(counts),
      confusion_matrix: matrix,
      totals: deriveTotals(matrix),
      metrics: deriveMetrics(matrix),
    };
  }
  return output;
}
