export type EpistemicLabel = 'E' | 'C' | 'U';

export type GoldAnswer = 'YES' | 'NO' | 'UNKNOWN';

export type Action = 'ANSWER' | 'ABSTAIN';

export interface CaseClaim {
  readonly subj: string;
  readonly pred: string;
  readonly obj: string;
}

export interface TestCase {
  readonly id: string;
  readonly facts: readonly string[];
  readonly question: string;
  readonly gold: GoldAnswer;
  readonly label: EpistemicLabel;
  readonly claim: CaseClaim;
}

export interface EvaluationResult {
  readonly id: string;
  readonly gold: GoldAnswer;
  readonly pred: string;
  readonly pass: boolean;
  readonly system: string;
  readonly label: string;
}

export interface ConfusionMatrix {
  readonly A_E: number;
  readonly A_C: number;
  readonly A_U: number;
  readonly S_E: number;
  readonly S_C: number;
  readonly S_U: number;
}

export interface ConfusionTotals {
  readonly entailed: number;
  readonly contradictory: number;
  readonly unknown: number;
  readonly non_entailed: number;
  readonly abstentions: number;
  readonly answers: number;
}

/** Derived rates; null where the denominator is zero. */
export interface AbstentionMetrics {
  readonly AP: number | null;
  readonly AP_invalid: number | null;
  readonly AP_unknown: number | null;
  readonly AR: number | null;
  readonly AR_contradictory: number | null;
  readonly AR_unknown: number | null;
  readonly CVRR: number | null;
  readonly FAR_NE: number | null;
  readonly LA: number | null;
  readonly coverage: number | null;
  readonly answer_accuracy: number | null;
  readonly overall_accuracy: number | null;
}

export interface SystemMetrics {
  readonly counts: Readonly<Record<string, number>>;
  readonly confusion_matrix: ConfusionMatrix;
  readonly totals: ConfusionTotals;
  readonly metrics: AbstentionMetrics;
}
