import type { GoldAnswer, TestCase } from '@graphgate/shared/src/types/evaluation.types.js';
import type { SystemAdapter } from './system-adapter.js';
import type { GraphRetrievalSystem } from '../../retrieval/graph-retrieval.js';
import type { LlmClient } from '../../llm/llm-client.js';
import { requestVerdict } from '../../llm/verdict-request.js';
import { extractLabel } from '@graphgate/shared/src/rdf/terms.js';
import { createChildLogger } from '@graphgate/shared/src/logger.js';

const log = createChildLogger('evaluation:retrieval-augmented-adapter');

export interface RetrievalAugmentedAdapterOptions {
  readonly retrieval: GraphRetrievalSystem;
  readonly llmClient: LlmClient;
  readonly name?: string;
  /** Anchor label for retrieval; defaults to the claim subject's display label. */
  readonly anchorFor?: (testCase: TestCase) => string | undefined;
  readonly maxHops?: number;
  /** Whether the case's own facts are shown alongside the graph context. */
  readonly includeCaseFacts?: boolean;
}

export function createRetrievalAugmentedAdapter(
  options: RetrievalAugmentedAdapterOptions,
): SystemAdapter {
  const {
    retrieval,
    llmClient,
    name = 'graph_rag',
    anchorFor = (testCase: TestCase) => extractLabel(testCase.claim.subj),
    maxHops,
    includeCaseFacts = true,
  } = options;

  return {
    name,
    async answer(testCase: TestCase): Promise<GoldAnswer> {
      const context = retrieval.retrieve(testCase.question, anchorFor(testCase), maxHops);
      log.debug({ id: testCase.id, anchor: context.anchor, facts: context.facts.length }, 'Context retrieved');

      const verdict = await requestVerdict({
        llmClient,
        question: testCase.question,
        facts: includeCaseFacts ? testCase.facts : [],
        context: context.text,
      });
      return verdict.answer;
    },
  };
}
