import type {
  EntityTerm,
  KnowledgeGraph,
  NamedNode,
  Term,
  Triple,
  TriplePattern,
} from '@graphgate/shared/src/types/graph.types.js';
import { namedNode, termKey, tripleKey } from '@graphgate/shared/src/rdf/terms.js';
import { RDF_TYPE } from '@graphgate/shared/src/rdf/vocabulary.js';

function matchesPattern(t: Triple, pattern: TriplePattern): boolean {
  return (
    (!pattern.subject || termKey(t.subject) === termKey(pattern.subject)) &&
    (!pattern.predicate || t.predicate.value === pattern.predicate.value) &&
    (!pattern.object || termKey(t.object) === termKey(pattern.object))
  );
}

/**
 * Copy-on-write view: the base graph plus pending additions. The base is
 * only read, so concurrent overlays over one graph never see each other.
 */
export function createGraphOverlay(
  base: KnowledgeGraph,
  additions: readonly Triple[],
): KnowledgeGraph {
  const pending = new Map<string, Triple>();
  for (const t of additions) {
    if (!base.has(t)) pending.set(tripleKey(t), t);
  }
  const added = [...pending.values()];

  function match(pattern: TriplePattern): readonly Triple[] {
    const fromBase = base.match(pattern);
    const fromPending = added.filter((t) => matchesPattern(t, pattern));
    return fromPending.length === 0 ? fromBase : [...fromBase, ...fromPending];
  }

  return {
    size: base.size + added.length,

    has(t: Triple): boolean {
      return pending.has(tripleKey(t)) || base.has(t);
    },

    match,

    objects(subject: EntityTerm, predicate: NamedNode): readonly Term[] {
      return match({ subject, predicate }).map((t) => t.object);
    },

    subjects(predicate: NamedNode, object: Term): readonly EntityTerm[] {
      return match({ predicate, object }).map((t) => t.subject);
    },

    subjectsOfType(type: string): readonly EntityTerm[] {
      return match({ predicate: namedNode(RDF_TYPE), object: namedNode(type) }).map(
        (t) => t.subject,
      );
    },

    triples(): readonly Triple[] {
      return added.length === 0 ? base.triples() : [...base.triples(), ...added];
    },
  };
}
