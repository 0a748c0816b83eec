import type {
  EntityTerm,
  KnowledgeGraph,
  RetrievalContext,
  RetrievedFact,
  Triple,
} from '@graphgate/shared/src/types/graph.types.js';
import type { RetrievalConfig } from '@graphgate/schemas/src/oracle-config.schema.js';
import { localName, namedNode, tripleKey } from '@graphgate/shared/src/rdf/terms.js';
import { RDF_TYPE } from '@graphgate/shared/src/rdf/vocabulary.js';
import { createChildLogger } from '@graphgate/shared/src/logger.js';
import { extractAnchorCandidates, resolveAnchor } from './anchor-resolver.js';
import { formatContext, RELATED_ENTITY_HOP } from './context-formatter.js';

const log = createChildLogger('retrieval:graph-retrieval');

export interface Subgraph {
  readonly anchor: string | null;
  readonly facts: readonly RetrievedFact[];
}

export interface GraphRetrievalSystem {
  resolveAnchor(label: string): string | null;
  collectSubgraph(anchorLabel: string, maxHops?: number): Subgraph;
  retrieve(question: string, anchorLabel?: string, maxHops?: number): RetrievalContext;
  formatContext(facts: readonly RetrievedFact[], anchor: string | null): string;
}

export interface GraphRetrievalDeps {
  readonly graph: KnowledgeGraph;
  readonly config: RetrievalConfig;
}

interface FactCollector {
  readonly facts: readonly RetrievedFact[];
  add(t: Triple, hop: number): void;
  addAll(facts: readonly RetrievedFact[]): void;
}

/** Appends facts, skipping core and related duplicates separately. */
function createFactCollector(): FactCollector {
  const core = new Set<string>();
  const related = new Set<string>();
  const facts: RetrievedFact[] = [];

  function add(t: Triple, hop: number): void {
    const seen = hop === RELATED_ENTITY_HOP ? related : core;
    const key = tripleKey(t);
    if (seen.has(key)) return;
    seen.add(key);
    facts.push({ triple: t, hop });
  }

  return {
    facts,
    add,
    addAll(more: readonly RetrievedFact[]): void {
      for (const fact of more) add(fact.triple, fact.hop);
    },
  };
}

export function createGraphRetrievalSystem(deps: GraphRetrievalDeps): GraphRetrievalSystem {
  const { graph, config } = deps;
  const relationships = new Set(config.relationshipPredicates);
  const relatedAttributes = new Set(config.relatedAttributePredicates);
  const rootTypeTerm = namedNode(config.rootType);
  const typePredicate = namedNode(RDF_TYPE);

  function isRootEntity(term: EntityTerm): boolean {
    return graph.has({ subject: term, predicate: typePredicate, object: rootTypeTerm });
  }

  function resolve(label: string): string | null {
    return resolveAnchor(graph, label, config);
  }

  function collectSubgraph(anchorLabel: string, maxHops: number = config.maxHops): Subgraph {
    const anchor = resolve(anchorLabel);
    if (anchor === null) {
      log.debug({ anchorLabel }, 'Anchor not resolved');
      return { anchor: null, facts: [] };
    }

    const collector = createFactCollector();
    const visited = new Set<string>();
    const relatedEntities = new Map<string, EntityTerm>();
    const queue: Array<{ node: EntityTerm; hop: number }> = [{ node: namedNode(anchor), hop: 0 }];

    while (queue.length > 0) {
      const next = queue.shift();
      if (!next) break;
      const { node, hop } = next;
      if (visited.has(node.value) || hop > maxHops) continue;
      visited.add(node.value);

      for (const t of graph.match({ subject: node })) {
        collector.add(t, hop);

        const object = t.object;
        if (object.kind !== 'iri') continue;
        if (relationships.has(localName(t.predicate.value)) && isRootEntity(object)) {
          relatedEntities.set(object.value, object);
        }
        if (!visited.has(object.value)) {
          queue.push({ node: object, hop: hop + 1 });
        }
      }

      for (const t of graph.match({ object: node })) {
        collector.add(t, hop);
      }
    }

    for (const entity of relatedEntities.values()) {
      for (const t of graph.match({ subject: entity })) {
        if (relatedAttributes.has(localName(t.predicate.value))) {
          collector.add(t, RELATED_ENTITY_HOP);
        }
      }
    }

    log.debug(
      { anchor, facts: collector.facts.length, visited: visited.size, related: relatedEntities.size },
      'Subgraph collected',
    );
    return { anchor, facts: collector.facts };
  }

  function format(facts: readonly RetrievedFact[], anchor: string | null): string {
    return formatContext(facts, anchor, config);
  }

  return {
    resolveAnchor: resolve,
    collectSubgraph,
    formatContext: format,

    retrieve(question: string, anchorLabel?: string, maxHops: number = config.maxHops): RetrievalContext {
      const collector = createFactCollector();
      let anchor: string | null = null;

      if (anchorLabel !== undefined) {
        const primary = collectSubgraph(anchorLabel, maxHops);
        collector.addAll(primary.facts);
        anchor = primary.anchor;
      }

      if (collector.facts.length < config.minTriples) {
        const candidates = extractAnchorCandidates(
          question,
          config.anchorNouns,
          config.maxAlternateAnchors,
        );
        for (const candidate of candidates) {
          const alternate = collectSubgraph(candidate, maxHops);
          if (alternate.facts.length === 0) continue;
          collector.addAll(alternate.facts);
          anchor ??= alternate.anchor;
        }
        if (candidates.length > 0) {
          log.debug({ candidates, facts: collector.facts.length }, 'Fallback anchors tried');
        }
      }

      const facts = collector.facts;
      return { question, anchor, facts, text: format(facts, anchor) };
    },
  };
}

