import { resolve } from 'node:path';
import { TestCaseSchema } from '@graphgate/schemas/src/evaluation.schema.js';
import { loadOracleRuntime } from '@graphgate/core/src/oracle-runtime.js';
import { readJsonLines, writeJsonLines } from '@graphgate/core/src/io/jsonl.js';
import { evaluateCases } from '@graphgate/core/src/evaluation/evaluator.js';
import { createOracleAdapter } from '@graphgate/core/src/evaluation/adapters/oracle-adapter.js';
import { createStubAdapter } from '@graphgate/core/src/evaluation/adapters/stub-adapter.js';
import type { SystemAdapter } from '@graphgate/core/src/evaluation/adapters/system-adapter.js';

const SYSTEMS = ['kg_oracle', 'graph_oracle', 'stub'] as const;
type SystemName = (typeof SYSTEMS)[number];

function isSystemName(value: string): value is SystemName {
  return SYSTEMS.some((name) => name === value);
}

async function createAdapter(system: SystemName, configDir: string): Promise<SystemAdapter> {
  switch (system) {
    case 'stub':
      return createStubAdapter();
    case 'kg_oracle':
      return createOracleAdapter();
    case 'graph_oracle': {
      const runtime = await loadOracleRuntime(configDir);
      return createOracleAdapter({
        graph: runtime.graph,
        negationMarker: runtime.config.evaluation.negationMarker,
        constraintCheck:
          runtime.auditor.mode === 'conformance'
            ? (claim) => runtime.auditor.audit(runtime.graph, claim)
            : undefined,
      });
    }
  }
}

async function main(): Promise<void> {
  const casesPath = process.argv[2];
  const system = process.argv[3] ?? 'kg_oracle';
  const outPath = process.argv[4] ?? resolve(process.cwd(), 'results', `${system}.jsonl`);
  const configDir = process.argv[5] ?? resolve(process.cwd(), 'config');

  if (!casesPath || !isSystemName(system)) {
    console.error(
      `Usage: run-evaluation <cases.jsonl> [${SYSTEMS.join('|')}] [results.jsonl] [configDir]`,
    );
    process.exit(1);
  }

  console.log('=== Graphgate Evaluation ===\n');
  console.log(`Cases: ${casesPath}`);
  console.log(`System: ${system}\n`);

  const cases = await readJsonLines(casesPath, TestCaseSchema);
  const adapter = await createAdapter(system, configDir);
  const { results, summary } = await evaluateCases(cases, adapter);
  await writeJsonLines(outPath, results);

  const pct = (value: number | null): string =>
    value === null ? 'N/A' : `${(value * 100).toFixed(1)}%`;

  console.log(`Overall: ${String(summary.correct)}/${String(summary.total)} (${pct(summary.accuracy)})`);
  for (const label of ['E', 'C', 'U'] as const) {
    const stats = summary.byLabel[label];
    if (!stats) continue;
    console.log(`  ${label}: ${String(stats.correct)}/${String(stats.total)} (${pct(stats.accuracy)})`);
  }
  console.log(`\nResults written to ${outPath}`);
}

main().catch((error: unknown) => {
  console.error('Evaluation failed:', error);
  process.exit(1);
});
