import { describe, it, expect, vi } from 'vitest';
import type { TestCase } from '@graphgate/shared/src/types/evaluation.types.js';
import type { GraphRetrievalSystem } from '../../retrieval/graph-retrieval.js';
import { BATTLES, BATTLES_TTL, graphFromTurtle } from '../../test-helpers.js';
import { createOracleAdapter } from './oracle-adapter.js';
import { createStubAdapter } from './stub-adapter.js';
import { createRetrievalAugmentedAdapter } from './retrieval-augmented-adapter.js';

const COMMANDER = `${BATTLES}hasCommander`;

function makeCase(overrides: Partial<TestCase> & Pick<TestCase, 'facts'>): TestCase {
  return {
    id: 'E_000000',
    question: 'Does BattleX have commander: GeneralY?',
    gold: 'YES',
    label: 'E',
    claim: { subj: `${BATTLES}BattleX`, pred: COMMANDER, obj: `${BATTLES}GeneralY` },
    ...overrides,
  };
}

describe('createOracleAdapter without a graph', () => {
  const adapter = createOracleAdapter();

  it('should answer NO when a fact negates the claim', async () => {
    const testCase = makeCase({ facts: ['BattleX DOES NOT have commander: GeneralY (not in database)'] });
    expect(await adapter.answer(testCase)).toBe('NO');
  });

  it('should answer YES on a positive mention of both labels', async () => {
    expect(await adapter.answer(makeCase({ facts: ['BattleX commander GeneralY'] }))).toBe('YES');
  });

  it('should answer UNKNOWN when the facts are silent', async () => {
    expect(await adapter.answer(makeCase({ facts: ['Battle of Foo commander GeneralY'] }))).toBe('UNKNOWN');
  });

  it('should default its name to kg_oracle', () => {
    expect(adapter.name).toBe('kg_oracle');
  });
});

describe('createOracleAdapter with a graph', () => {
  const graph = graphFromTurtle(BATTLES_TTL);
  const adapter = createOracleAdapter({ graph });

  it('should answer YES for a claim the graph holds', async () => {
    expect(await adapter.answer(makeCase({ facts: [] }))).toBe('YES');
  });

  it('should let a negated context override graph membership', async () => {
    const testCase = makeCase({ facts: ['BattleX DOES NOT have commander: GeneralY (not in database)'] });
    expect(await adapter.answer(testCase)).toBe('NO');
  });

  it('should answer UNKNOWN for an absent claim', async () => {
    const testCase = makeCase({
      facts: [],
      claim: { subj: `${BATTLES}BattleX`, pred: COMMANDER, obj: `${BATTLES}Colonel_Q` },
    });
    expect(await adapter.answer(testCase)).toBe('UNKNOWN');
  });

  it('should answer NO when the constraint check rejects the claim', async () => {
    const constrained = createOracleAdapter({ graph, constraintCheck: () => false });
    const testCase = makeCase({
      facts: [],
      claim: { subj: `${BATTLES}BattleX`, pred: COMMANDER, obj: `${BATTLES}Colonel_Q` },
    });
    expect(await constrained.answer(testCase)).toBe('NO');
    expect(constrained.name).toBe('graph_oracle');
  });
});

describe('createStubAdapter', () => {
  it('should always abstain', async () => {
    const adapter = createStubAdapter();
    expect(adapter.name).toBe('stub');
    expect(await adapter.answer(makeCase({ facts: ['BattleX commander GeneralY'] }))).toBe('UNKNOWN');
  });
});

describe('createRetrievalAugmentedAdapter', () => {
  function fakeRetrieval(text: string): GraphRetrievalSystem {
    return {
      resolveAnchor: vi.fn(),
      collectSubgraph: vi.fn(),
      formatContext: vi.fn(),
      retrieve: vi.fn().mockReturnValue({ question: '', anchor: `${BATTLES}BattleX`, facts: [], text }),
    };
  }

  it('should retrieve around the claim subject and return the verdict', async () => {
    const retrieval = fakeRetrieval('=== STRUCTURED FACTS ===');
    const invoke = vi.fn().mockResolvedValue({ content: '{"answer":"YES","reasoning":"listed"}' });
    const adapter = createRetrievalAugmentedAdapter({ retrieval, llmClient: { invoke } });

    const testCase = makeCase({ facts: ['BattleX commander GeneralY'] });
    expect(await adapter.answer(testCase)).toBe('YES');
    expect(adapter.name).toBe('graph_rag');
    expect(retrieval.retrieve).toHaveBeenCalledWith(testCase.question, 'BattleX', undefined);

    const userMessage: string = invoke.mock.calls[0][0].userMessage;
    expect(userMessage).toContain('GRAPH CONTEXT:\n=== STRUCTURED FACTS ===');
    expect(userMessage).toContain('1. BattleX commander GeneralY');
  });

  it('should leave case facts out when asked to', async () => {
    const invoke = vi.fn().mockResolvedValue({ content: '{"answer":"NO"}' });
    const adapter = createRetrievalAugmentedAdapter({
      retrieval: fakeRetrieval('ctx'),
      llmClient: { invoke },
      includeCaseFacts: false,
      anchorFor: () => 'Battle of Foo',
    });

    expect(await adapter.answer(makeCase({ facts: ['BattleX commander GeneralY'] }))).toBe('NO');
    expect(invoke.mock.calls[0][0].userMessage).not.toContain('FACTS:\n1.');
  });
});
