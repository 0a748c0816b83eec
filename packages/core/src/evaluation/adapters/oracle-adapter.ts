import type { KnowledgeGraph } from '@graphgate/shared/src/types/graph.types.js';
import type { GoldAnswer, TestCase } from '@graphgate/shared/src/types/evaluation.types.js';
import type { SystemAdapter } from './system-adapter.js';
import { extractLabel } from '@graphgate/shared/src/rdf/terms.js';
import { classifyClaim, DEFAULT_NEGATION_MARKER, labelToGold } from '../epistemic-classifier.js';
import type { ClassifyOptions } from '../epistemic-classifier.js';

export interface OracleAdapterOptions {
  readonly name?: string;
  /** With a graph, membership decides YES; without one, a positive mention in the facts does. */
  readonly graph?: KnowledgeGraph;
  readonly negationMarker?: string;
  readonly constraintCheck?: ClassifyOptions['constraintCheck'];
}

function answerFromFacts(testCase: TestCase, marker: string): GoldAnswer {
  const subject = extractLabel(testCase.claim.subj);
  const object = extractLabel(testCase.claim.obj);
  const mentions = testCase.facts.filter((f) => f.includes(subject) && f.includes(object));

  if (mentions.some((f) => f.includes(marker))) return 'NO';
  if (mentions.length > 0) return 'YES';
  return 'UNKNOWN';
}

export function createOracleAdapter(options: OracleAdapterOptions = {}): SystemAdapter {
  const { graph, negationMarker = DEFAULT_NEGATION_MARKER, constraintCheck } = options;
  const name = options.name ?? (graph ? 'graph_oracle' : 'kg_oracle');

  return {
    name,
    answer(testCase: TestCase): Promise<GoldAnswer> {
      if (!graph) {
        return Promise.resolve(answerFromFacts(testCase, negationMarker));
      }
      const { subj, pred, obj } = testCase.claim;
      const label = classifyClaim(
        graph,
        { subject: subj, predicate: pred, object: obj },
        testCase.facts,
        { negationMarker, constraintCheck },
      );
      return Promise.resolve(labelToGold(label));
    },
  };
}
