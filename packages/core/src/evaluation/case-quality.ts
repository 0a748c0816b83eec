import type { KnowledgeGraph } from '@graphgate/shared/src/types/graph.types.js';
import type { EpistemicLabel, TestCase } from '@graphgate/shared/src/types/evaluation.types.js';
import { claimToTriple } from '@graphgate/shared/src/rdf/terms.js';

export interface CaseLabelIssue {
  readonly id: string;
  readonly label: EpistemicLabel;
  readonly inGraph: boolean;
}

/**
 * Entailed cases must be in the graph; contradictory and unknown cases must
 * not be. Returns the cases that break this.
 */
export function auditCaseLabels(
  cases: readonly TestCase[],
  graph: KnowledgeGraph,
): CaseLabelIssue[] {
  const issues: CaseLabelIssue[] = [];
  for (const testCase of cases) {
    const { subj, pred, obj } = testCase.claim;
    const candidate = claimToTriple({ subject: subj, predicate: pred, object: obj });
    const inGraph = candidate !== null && graph.has(candidate);
    const expected = testCase.label === 'E';
    if (inGraph !== expected) {
      issues.push({ id: testCase.id, label: testCase.label, inGraph });
    }
  }
  return issues;
}
