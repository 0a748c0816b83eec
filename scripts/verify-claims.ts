import { resolve } from 'node:path';
import { ClaimRecordSchema } from '@graphgate/schemas/src/evaluation.schema.js';
import { loadOracleRuntime } from '@graphgate/core/src/oracle-runtime.js';
import { readJsonLines, writeJsonLines } from '@graphgate/core/src/io/jsonl.js';

async function main(): Promise<void> {
  const claimsPath = process.argv[2];
  const outPath = process.argv[3] ?? resolve(process.cwd(), 'results', 'decisions.jsonl');
  const configDir = process.argv[4] ?? resolve(process.cwd(), 'config');

  if (!claimsPath) {
    console.error('Usage: verify-claims <claims.jsonl> [decisions.jsonl] [configDir]');
    process.exit(1);
  }

  const { oracle, auditor } = await loadOracleRuntime(configDir);
  const records = await readJsonLines(claimsPath, ClaimRecordSchema);

  const { decisions, summary } = oracle.verifyClaims(records);
  await writeJsonLines(outPath, decisions);

  console.log(`=== Claim Verification (${auditor.mode}) ===\n`);
  console.log(`Total: ${String(summary.total)}`);
  console.log(`Licensed: ${String(summary.licensed)}`);
  console.log(`Answered: ${String(summary.answered)}`);
  console.log(`Abstained: ${String(summary.abstained)}`);
  console.log(`\nDecisions written to ${outPath}`);
}

main().catch((error: unknown) => {
  console.error('Claim verification failed:', error);
  process.exit(1);
});
