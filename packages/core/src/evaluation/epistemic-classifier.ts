import type { Claim, KnowledgeGraph, Literal } from '@graphgate/shared/src/types/graph.types.js';
import type { Action, EpistemicLabel, GoldAnswer } from '@graphgate/shared/src/types/evaluation.types.js';
import { claimToTriple, extractLabel } from '@graphgate/shared/src/rdf/terms.js';

export const DEFAULT_NEGATION_MARKER = 'DOES NOT';

export interface ClassifyOptions {
  readonly negationMarker?: string;
  /** Display label of an entity IRI as it appears in context facts. */
  readonly labelFor?: (iri: string) => string;
  /** Returns false when the constraints forbid adding the claim. */
  readonly constraintCheck?: (claim: Claim) => boolean;
}

function componentLabel(
  value: string | Literal | null | undefined,
  labelFor: (iri: string) => string,
): string | null {
  if (value === null || value === undefined) return null;
  const label = typeof value === 'string' ? labelFor(value) : value.value;
  return label.length > 0 ? label : null;
}

export function isNegatedInContext(
  claim: Claim,
  contextFacts: readonly string[],
  options: ClassifyOptions = {},
): boolean {
  const marker = options.negationMarker ?? DEFAULT_NEGATION_MARKER;
  const labelFor = options.labelFor ?? extractLabel;
  const subject = componentLabel(claim.subject, labelFor);
  const object = componentLabel(claim.object, labelFor);
  if (subject === null || object === null) {
    return false;
  }
  return contextFacts.some(
    (fact) => fact.includes(marker) && fact.includes(subject) && fact.includes(object),
  );
}

/**
 * Negation in context wins over graph membership: a claim the context
 * explicitly denies is contradictory even when the graph holds it.
 */
export function classifyClaim(
  graph: KnowledgeGraph,
  claim: Claim,
  contextFacts: readonly string[],
  options: ClassifyOptions = {},
): EpistemicLabel {
  if (isNegatedInContext(claim, contextFacts, options)) {
    return 'C';
  }

  const candidate = claimToTriple(claim);
  if (!candidate) {
    return 'U';
  }
  if (graph.has(candidate)) {
    return 'E';
  }
  if (options.constraintCheck && !options.constraintCheck(claim)) {
    return 'C';
  }
  return 'U';
}

export function labelToGold(label: EpistemicLabel): GoldAnswer {
  switch (label) {
    case 'E':
      return 'YES';
    case 'C':
      return 'NO';
    case 'U':
      return 'UNKNOWN';
  }
}

/** Anything other than YES or NO counts as unknown. */
export function goldToLabel(gold: string): EpistemicLabel {
  if (gold === 'YES') return 'E';
  if (gold === 'NO') return 'C';
  return 'U';
}

/** A prediction of UNKNOWN is an abstention; anything else is an answer. */
export function predictionToAction(pred: string): Action {
  return pred === 'UNKNOWN' ? 'ABSTAIN' : 'ANSWER';
}
