import { resolve } from 'node:path';
import { loadOracleRuntime } from '@graphgate/core/src/oracle-runtime.js';
import { writeJsonLines } from '@graphgate/core/src/io/jsonl.js';
import {
  generateContextCases,
  generateNearMissCases,
} from '@graphgate/core/src/evaluation/case-generator.js';
import { auditCaseLabels } from '@graphgate/core/src/evaluation/case-quality.js';

async function main(): Promise<void> {
  const predicate = process.argv[2];
  const predicateLabel = process.argv[3] ?? 'related to';
  const outPath = process.argv[4] ?? resolve(process.cwd(), 'cases', 'cases.jsonl');
  const numPerType = Number(process.argv[5] ?? '200');
  const configDir = process.argv[6] ?? resolve(process.cwd(), 'config');

  if (!predicate || !Number.isInteger(numPerType) || numPerType <= 0) {
    console.error('Usage: generate-cases <predicateIri> [predicateLabel] [cases.jsonl] [numPerType] [configDir]');
    process.exit(1);
  }

  const { graph, config } = await loadOracleRuntime(configDir);
  const negationMarker = config.evaluation.negationMarker;

  const cases = [
    ...generateContextCases(graph, { predicate, predicateLabel, numPerType, negationMarker }),
    ...generateNearMissCases(graph, { predicate, predicateLabel, count: numPerType }),
  ];

  const issues = auditCaseLabels(cases, graph);
  for (const issue of issues) {
    console.warn(`  mislabeled ${issue.id}: label ${issue.label}, in graph: ${String(issue.inGraph)}`);
  }

  await writeJsonLines(outPath, cases);
  console.log(`Wrote ${String(cases.length)} cases to ${outPath} (${String(issues.length)} label issues)`);
}

main().catch((error: unknown) => {
  console.error('Case generation failed:', error);
  process.exit(1);
});
