import type { KnowledgeGraph } from '@graphgate/shared/src/types/graph.types.js';
import { namedNode } from '@graphgate/shared/src/rdf/terms.js';
import { RDFS_LABEL } from '@graphgate/shared/src/rdf/vocabulary.js';
import { sequenceSimilarity } from '@graphgate/shared/src/utils/math.js';

export const DEFAULT_FUZZY_THRESHOLD = 0.85;

/** Normalized label → entity ids, in the order the entities were first seen. */
export type LabelIndex = ReadonlyMap<string, readonly string[]>;

export type MatchTier = 'exact' | 'variant' | 'fuzzy';

export interface LabelMatch {
  readonly entityId: string;
  readonly key: string;
  readonly tier: MatchTier;
  readonly similarity: number;
}

export interface LinkOptions {
  readonly threshold?: number;
}

const COMBINING_MARKS = /\p{M}/gu;

export function normalizeLabel(label: string): string {
  return label.normalize('NFKD').replace(COMBINING_MARKS, '').trim().toLowerCase();
}

export function buildLabelIndex(
  graph: KnowledgeGraph,
  type: string,
  labelPredicate: string = RDFS_LABEL,
): LabelIndex {
  const index = new Map<string, string[]>();
  const predicate = namedNode(labelPredicate);

  for (const entity of graph.subjectsOfType(type)) {
    if (entity.kind !== 'iri') continue;
    const label = graph.objects(entity, predicate).find((term) => term.kind === 'literal');
    if (!label) continue;

    const key = normalizeLabel(label.value);
    const ids = index.get(key);
    if (!ids) {
      index.set(key, [entity.value]);
    } else if (!ids.includes(entity.value)) {
      ids.push(entity.value);
    }
  }

  return index;
}

function firstId(index: LabelIndex, key: string): string | undefined {
  return index.get(key)?.[0];
}

function nearestKey(key: string, index: LabelIndex): { key: string; similarity: number } | null {
  let best: { key: string; similarity: number } | null = null;
  for (const candidate of index.keys()) {
    const similarity = sequenceSimilarity(candidate, key);
    if (
      !best ||
      similarity > best.similarity ||
      (similarity === best.similarity && candidate > best.key)
    ) {
      best = { key: candidate, similarity };
    }
  }
  return best;
}

/**
 * Resolves a label against the index: exact normalized key, then the
 * underscore/space variants, then the single nearest key by similarity.
 * When several entities share a key the first one wins.
 */
export function matchLabel(
  label: string | null | undefined,
  index: LabelIndex,
  options: LinkOptions = {},
): LabelMatch | null {
  if (!label) return null;
  const threshold = options.threshold ?? DEFAULT_FUZZY_THRESHOLD;
  const key = normalizeLabel(label);
  if (!key) return null;

  const exact = firstId(index, key);
  if (exact) {
    return { entityId: exact, key, tier: 'exact', similarity: 1 };
  }

  for (const variant of [key.replaceAll('_', ' '), key.replaceAll(' ', '_')]) {
    const id = firstId(index, variant);
    if (id) {
      return { entityId: id, key: variant, tier: 'variant', similarity: 1 };
    }
  }

  const nearest = nearestKey(key, index);
  if (nearest && nearest.similarity >= threshold) {
    const id = firstId(index, nearest.key);
    if (id) {
      return { entityId: id, key: nearest.key, tier: 'fuzzy', similarity: nearest.similarity };
    }
  }

  return null;
}

export function linkLabel(
  label: string | null | undefined,
  index: LabelIndex,
  options: LinkOptions = {},
): string | null {
  return matchLabel(label, index, options)?.entityId ?? null;
}
