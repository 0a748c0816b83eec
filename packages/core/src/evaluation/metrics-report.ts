import type { AbstentionMetrics, SystemMetrics } from '@graphgate/shared/src/types/evaluation.types.js';

const RULE = '='.repeat(70);

export function formatMetric(value: number | null, precision = 3): string {
  return value === null ? 'N/A' : value.toFixed(precision);
}

const METRIC_LINES: ReadonlyArray<readonly [string, keyof AbstentionMetrics]> = [
  ['  Abstention Precision (AP):        ', 'AP'],
  ['    - AP on invalid (C):             ', 'AP_invalid'],
  ['    - AP on unknown (U):             ', 'AP_unknown'],
  ['  Abstention Recall (AR):           ', 'AR'],
  ['    - AR on contradictory (C):       ', 'AR_contradictory'],
  ['    - AR on unknown (U):             ', 'AR_unknown'],
  ['  Constraint Violation Reject Rate: ', 'CVRR'],
  ['  False Answer Rate (Non-Entailed): ', 'FAR_NE'],
  ['  Licensed Answer Accuracy (LA):    ', 'LA'],
];

const COVERAGE_LINES: ReadonlyArray<readonly [string, keyof AbstentionMetrics]> = [
  ['  Coverage (% answered):            ', 'coverage'],
  ['  Accuracy when answering:          ', 'answer_accuracy'],
  ['  Overall accuracy:                 ', 'overall_accuracy'],
];

function row(label: string, cells: readonly (string | number)[]): string {
  return [label.padEnd(10), ...cells.map((c) => String(c).padStart(10))].join(' ');
}

export function formatMetricsReport(metrics: Readonly<Record<string, SystemMetrics>>): string {
  const lines: string[] = [];

  for (const [system, data] of Object.entries(metrics)) {
    const cm = data.confusion_matrix;
    const m = data.metrics;
    lines.push('', RULE, `System: ${system}`, RULE);
    lines.push('', 'Confusion Matrix (Action × Truth):');
    lines.push(row('', ['E', 'C', 'U']));
    lines.push(row('ANSWER', [cm.A_E, cm.A_C, cm.A_U]));
    lines.push(row('ABSTAIN', [cm.S_E, cm.S_C, cm.S_U]));
    lines.push('', 'Key Metrics:');
    lines.push(...METRIC_LINES.map(([label, key]) => `${label}${formatMetric(m[key])}`));
    lines.push('', 'Coverage & Accuracy:');
    lines.push(...COVERAGE_LINES.map(([label, key]) => `${label}${formatMetric(m[key])}`));
  }

  return lines.join('\n');
}

/** One line of headline metrics per system. */
export function formatMetricsSummary(metrics: Readonly<Record<string, SystemMetrics>>): string {
  return Object.entries(metrics)
    .map(([system, { metrics: m }]) =>
      [
        `${system}:`,
        `  AP=${formatMetric(m.AP)}, CVRR=${formatMetric(m.CVRR)}, FAR-NE=${formatMetric(m.FAR_NE)}, LA=${formatMetric(m.LA)}`,
      ].join('\n'),
    )
    .join('\n\n');
}
