import { writeFile } from 'node:fs/promises';
import type { EvaluationResult } from '@graphgate/shared/src/types/evaluation.types.js';
import { EvaluationResultSchema } from '@graphgate/schemas/src/evaluation.schema.js';
import { readJsonLines } from '@graphgate/core/src/io/jsonl.js';
import { computeMetrics } from '@graphgate/core/src/evaluation/metrics.js';
import {
  formatMetricsReport,
  formatMetricsSummary,
} from '@graphgate/core/src/evaluation/metrics-report.js';

async function main(): Promise<void> {
  const outPath = process.argv[2];
  const inputs = process.argv.slice(3);

  if (!outPath || inputs.length === 0) {
    console.error('Usage: compute-metrics <metrics.json> <results.jsonl> [more results.jsonl...]');
    process.exit(1);
  }

  const results: EvaluationResult[] = [];
  for (const input of inputs) {
    results.push(...(await readJsonLines(input, EvaluationResultSchema)));
  }

  const metrics = computeMetrics(results);
  await writeFile(outPath, `${JSON.stringify(metrics, null, 2)}\n`, 'utf-8');

  console.log(formatMetricsReport(metrics));
  console.log('\n=== Summary ===\n');
  console.log(formatMetricsSummary(metrics));
  console.log(`\nMetrics written to ${outPath}`);
}

main().catch((error: unknown) => {
  console.error('Metrics computation failed:', error);
  process.exit(1);
});
