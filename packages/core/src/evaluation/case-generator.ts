import type { KnowledgeGraph } from '@graphgate/shared/src/types/graph.types.js';
import type { TestCase } from '@graphgate/shared/src/types/evaluation.types.js';
import { extractLabel, namedNode } from '@graphgate/shared/src/rdf/terms.js';
import { createSeededRandom } from '@graphgate/shared/src/utils/random.js';
import { createChildLogger } from '@graphgate/shared/src/logger.js';
import { DEFAULT_NEGATION_MARKER } from './epistemic-classifier.js';

const log = createChildLogger('evaluation:case-generator');

export interface ContextCaseOptions {
  readonly predicate: string;
  readonly predicateLabel?: string;
  readonly numPerType?: number;
  readonly seed?: number;
  /** Keep only subjects whose IRI contains this substring. */
  readonly subjectHint?: string;
  readonly negationMarker?: string;
}

export interface NearMissOptions {
  readonly predicate: string;
  readonly predicateLabel?: string;
  readonly count?: number;
  readonly seed?: number;
  /** Adds the true fact plus a marker line to the context. */
  readonly includeTrueFact?: boolean;
}

type Pair = readonly [subject: string, object: string];

interface PredicatePairs {
  readonly pairs: readonly Pair[];
  readonly objects: readonly string[];
  has(subject: string, object: string): boolean;
}

const pairKey = (subject: string, object: string): string => `${subject}\n${object}`;

function collectPairs(graph: KnowledgeGraph, predicate: string, subjectHint?: string): PredicatePairs {
  const pairs: Pair[] = [];
  const objects = new Set<string>();
  const keys = new Set<string>();

  for (const t of graph.match({ predicate: namedNode(predicate) })) {
    if (t.subject.kind !== 'iri' || t.object.kind !== 'iri') continue;
    if (subjectHint !== undefined && !t.subject.value.includes(subjectHint)) continue;
    pairs.push([t.subject.value, t.object.value]);
    objects.add(t.object.value);
    keys.add(pairKey(t.subject.value, t.object.value));
  }

  return {
    pairs,
    objects: [...objects],
    has: (subject, object) => keys.has(pairKey(subject, object)),
  };
}

export function formatCaseFact(subject: string, predicateLabel: string, object: string): string {
  return `${extractLabel(subject)} ${predicateLabel} ${extractLabel(object)}`;
}

export function formatCaseQuestion(subject: string, predicateLabel: string, object: string): string {
  return `Is ${extractLabel(object)} the ${predicateLabel} of ${extractLabel(subject)}?`;
}

function caseId(prefix: string, index: number): string {
  return `${prefix}${String(index).padStart(6, '0')}`;
}

/**
 * Builds labelled context cases for one predicate: entailed (E), explicitly
 * negated (C), partial context (U) and distractor pairings (D, labelled C).
 * Ids carry the running index across all kinds.
 */
export function generateContextCases(graph: KnowledgeGraph, options: ContextCaseOptions): TestCase[] {
  const {
    predicate,
    predicateLabel = 'related to',
    numPerType = 200,
    seed = 1337,
    subjectHint,
    negationMarker = DEFAULT_NEGATION_MARKER,
  } = options;

  const { pairs, objects, has } = collectPairs(graph, predicate, subjectHint);
  if (pairs.length === 0) {
    log.warn({ predicate, subjectHint }, 'No entity pairs found for predicate');
    return [];
  }

  const random = createSeededRandom(seed);
  const cases: TestCase[] = [];
  const fact = (s: string, o: string): string => formatCaseFact(s, predicateLabel, o);
  const question = (s: string, o: string): string => formatCaseQuestion(s, predicateLabel, o);

  const entailedCount = Math.min(numPerType, pairs.length);
  for (let i = 0; i < entailedCount; i++) {
    const [s, o] = random.choice(pairs);
    cases.push({
      id: caseId('CARD_E_', cases.length),
      facts: [fact(s, o)],
      question: question(s, o),
      gold: 'YES',
      label: 'E',
      claim: { subj: s, pred: predicate, obj: o },
    });
  }

  for (let i = 0; i < entailedCount; i++) {
    const [s, trueObject] = random.choice(pairs);
    const falseCandidates = objects.filter((x) => x !== trueObject);
    if (falseCandidates.length === 0) continue;
    const falseObject = random.choice(falseCandidates);
    cases.push({
      id: caseId('CARD_C_', cases.length),
      facts: [
        fact(s, trueObject),
        `${extractLabel(s)} ${negationMarker} have ${predicateLabel}: ${extractLabel(falseObject)} (not in database)`,
      ],
      question: question(s, falseObject),
      gold: 'NO',
      label: 'C',
      claim: { subj: s, pred: predicate, obj: falseObject },
    });
  }

  let unknownCount = 0;
  const maxAttempts = numPerType * 10;
  for (let attempt = 0; unknownCount < numPerType && attempt < maxAttempts; attempt++) {
    const [s] = random.choice(pairs);
    const candidates = objects.filter((x) => !has(s, x));
    if (candidates.length === 0) continue;
    const o = random.choice(candidates);
    const subjectFacts = pairs.filter(([s2]) => s2 === s).map(([s2, o2]) => fact(s2, o2));
    cases.push({
      id: caseId('CARD_U_', cases.length),
      facts: random.sample(subjectFacts, 3),
      question: question(s, o),
      gold: 'UNKNOWN',
      label: 'U',
      claim: { subj: s, pred: predicate, obj: o },
    });
    unknownCount++;
  }

  if (pairs.length >= 2) {
    for (let i = 0; i < numPerType; i++) {
      const [s1, o1] = random.choice(pairs);
      const [s2, o2] = random.choice(pairs);
      if (s1 === s2 || has(s1, o2)) continue;
      cases.push({
        id: caseId('CARD_D_', cases.length),
        facts: [fact(s1, o1), fact(s2, o2)],
        question: question(s1, o2),
        gold: 'NO',
        label: 'C',
        claim: { subj: s1, pred: predicate, obj: o2 },
      });
    }
  }

  log.info({ predicate, pairs: pairs.length, cases: cases.length }, 'Context cases generated');
  return cases;
}

/** Coherent but false pairings of a subject with another subject's object. */
export function generateNearMissCases(graph: KnowledgeGraph, options: NearMissOptions): TestCase[] {
  const {
    predicate,
    predicateLabel = 'related to',
    count = 500,
    seed = 2027,
    includeTrueFact = false,
  } = options;

  const { pairs, objects, has } = collectPairs(graph, predicate);
  if (pairs.length === 0) {
    log.warn({ predicate }, 'No entity pairs found for predicate');
    return [];
  }

  const random = createSeededRandom(seed);
  const cases: TestCase[] = [];
  const maxAttempts = count * 10;

  for (let attempt = 0; cases.length < count && attempt < maxAttempts; attempt++) {
    const [s, trueObject] = random.choice(pairs);
    const candidates = objects.filter((x) => x !== trueObject && !has(s, x));
    if (candidates.length === 0) continue;
    const falseObject = random.choice(candidates);

    const trueFact = formatCaseFact(s, predicateLabel, trueObject);
    cases.push({
      id: caseId('NEG_', cases.length),
      facts: includeTrueFact ? [trueFact, '(Testing: the following is FALSE)'] : [trueFact],
      question: formatCaseQuestion(s, predicateLabel, falseObject),
      gold: 'NO',
      label: 'C',
      claim: { subj: s, pred: predicate, obj: falseObject },
    });
  }

  log.info({ predicate, cases: cases.length }, 'Near-miss cases generated');
  return cases;
}
