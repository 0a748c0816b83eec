import type {
  EpistemicLabel,
  EvaluationResult,
  GoldAnswer,
  TestCase,
} from '@graphgate/shared/src/types/evaluation.types.js';
import type { SystemAdapter } from './adapters/system-adapter.js';
import { createChildLogger } from '@graphgate/shared/src/logger.js';
import { toError } from '@graphgate/shared/src/utils/errors.js';

const log = createChildLogger('evaluation:evaluator');

const PROGRESS_INTERVAL = 100;

export interface LabelStats {
  readonly total: number;
  readonly correct: number;
  readonly accuracy: number;
}

export interface EvaluationSummary {
  readonly system: string;
  readonly total: number;
  readonly correct: number;
  readonly accuracy: number | null;
  readonly byLabel: Partial<Record<EpistemicLabel, LabelStats>>;
}

export interface EvaluationRun {
  readonly results: readonly EvaluationResult[];
  readonly summary: EvaluationSummary;
}

const LABELS: readonly EpistemicLabel[] = ['E', 'C', 'U'];

function summarize(system: string, results: readonly EvaluationResult[]): EvaluationSummary {
  const correct = results.filter((r) => r.pass).length;
  const byLabel: Partial<Record<EpistemicLabel, LabelStats>> = {};
  for (const label of LABELS) {
    const rows = results.filter((r) => r.label === label);
    if (rows.length === 0) continue;
    const labelCorrect = rows.filter((r) => r.pass).length;
    byLabel[label] = { total: rows.length, correct: labelCorrect, accuracy: labelCorrect / rows.length };
  }
  return {
    system,
    total: results.length,
    correct,
    accuracy: results.length > 0 ? correct / results.length : null,
    byLabel,
  };
}

async function answerSafely(adapter: SystemAdapter, testCase: TestCase): Promise<GoldAnswer> {
  try {
    return await adapter.answer(testCase);
  } catch (error) {
    log.warn(
      { system: adapter.name, id: testCase.id, error: toError(error).message },
      'Adapter failed, recording UNKNOWN',
    );
    return 'UNKNOWN';
  }
}

/** Runs every case through the adapter in order; failures degrade to UNKNOWN. */
export async function evaluateCases(
  cases: readonly TestCase[],
  adapter: SystemAdapter,
): Promise<EvaluationRun> {
  const results: EvaluationResult[] = [];

  for (const testCase of cases) {
    const pred = await answerSafely(adapter, testCase);
    results.push({
      id: testCase.id,
      gold: testCase.gold,
      pred,
      pass: pred === testCase.gold,
      system: adapter.name,
      label: testCase.label,
    });

    if (results.length % PROGRESS_INTERVAL === 0) {
      log.info({ system: adapter.name, processed: results.length }, 'Evaluation progress');
    }
  }

  const summary = summarize(adapter.name, results);
  log.info(
    { system: summary.system, total: summary.total, correct: summary.correct },
    'Evaluation complete',
  );
  return { results, summary };
}
