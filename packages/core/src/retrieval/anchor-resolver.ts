import type { KnowledgeGraph } from '@graphgate/shared/src/types/graph.types.js';
import { namedNode } from '@graphgate/shared/src/rdf/terms.js';

export interface AnchorScope {
  readonly rootType: string;
  readonly labelPredicate: string;
}

interface LabeledEntity {
  readonly id: string;
  readonly label: string;
}

function labeledEntities(graph: KnowledgeGraph, scope: AnchorScope): LabeledEntity[] {
  const predicate = namedNode(scope.labelPredicate);
  const entities: LabeledEntity[] = [];
  for (const subject of graph.subjectsOfType(scope.rootType)) {
    if (subject.kind !== 'iri') continue;
    for (const label of graph.objects(subject, predicate)) {
      if (label.kind === 'literal') {
        entities.push({ id: subject.value, label: label.value });
      }
    }
  }
  return entities;
}

/**
 * Resolves a label to an entity of the root type. Tiers, first hit wins:
 * exact label, parenthetical-free prefix against labels that also carry a
 * parenthetical, then a plain case-insensitive prefix. Within a tier the
 * first entity encountered wins.
 */
export function resolveAnchor(
  graph: KnowledgeGraph,
  label: string,
  scope: AnchorScope,
): string | null {
  const cleaned = label.toLowerCase().trim();
  if (cleaned.length === 0) {
    return null;
  }

  const entities = labeledEntities(graph, scope);

  const exact = entities.find((e) => e.label === label);
  if (exact) {
    return exact.id;
  }

  const hasParenthetical = label.includes('(');
  // Empty for a bare parenthetical such as "(Ohio)", which then matches any qualified label.
  const prefix = hasParenthetical ? cleaned.split('(')[0].trim() : cleaned;

  if (hasParenthetical) {
    const qualified = entities.find(
      (e) => e.label.toLowerCase().startsWith(prefix) && e.label.includes('('),
    );
    if (qualified) {
      return qualified.id;
    }
  }

  return entities.find((e) => e.label.toLowerCase().startsWith(prefix))?.id ?? null;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Capitalized phrases directly followed by one of the anchor nouns, e.g.
 * "Mississippi" from "... of the Mississippi River?". Returns the phrase
 * without the noun, in order of appearance.
 */
export function extractAnchorCandidates(
  question: string,
  anchorNouns: readonly string[],
  limit: number,
): string[] {
  if (anchorNouns.length === 0 || limit <= 0) {
    return [];
  }
  const nouns = anchorNouns.map(escapeRegExp).join('|');
  const pattern = new RegExp(`\\b([A-Z][a-z]+(?:\\s+[A-Z][a-z]+)*)\\s+(?:${nouns})\\b`, 'g');

  const candidates: string[] = [];
  for (const match of question.matchAll(pattern)) {
    candidates.push(match[1]);
    if (candidates.length >= limit) break;
  }
  return candidates;
}
