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

const RDF_TYPE_NODE = namedNode(RDF_TYPE);

function addToIndex(index: Map<string, string[]>, key: string, value: string): void {
  const bucket = index.get(key);
  if (bucket) {
    bucket.push(value);
  } else {
    index.set(key, [value]);
  }
}

/**
 * Builds an immutable graph with subject, predicate and object indexes.
 * Duplicate triples collapse; iteration follows first insertion.
 */
export function createIndexedGraph(input: Iterable<Triple>): KnowledgeGraph {
  const byKey = new Map<string, Triple>();
  const bySubject = new Map<string, string[]>();
  const byPredicate = new Map<string, string[]>();
  const byObject = new Map<string, string[]>();

  for (const t of input) {
    const key = tripleKey(t);
    if (byKey.has(key)) continue;
    byKey.set(key, t);
    addToIndex(bySubject, termKey(t.subject), key);
    addToIndex(byPredicate, termKey(t.predicate), key);
    addToIndex(byObject, termKey(t.object), key);
  }

  const all = [...byKey.values()];

  function resolve(keys: readonly string[]): Triple[] {
    const result: Triple[] = [];
    for (const key of keys) {
      const t = byKey.get(key);
      if (t) result.push(t);
    }
    return result;
  }

  function match(pattern: TriplePattern): readonly Triple[] {
    const { subject, predicate, object } = pattern;
    const buckets: Array<readonly string[]> = [];
    if (subject) buckets.push(bySubject.get(termKey(subject)) ?? []);
    if (predicate) buckets.push(byPredicate.get(termKey(predicate)) ?? []);
    if (object) buckets.push(byObject.get(termKey(object)) ?? []);

    if (buckets.length === 0) {
      return all;
    }

    // Scan the narrowest index, filter by the rest.
    let narrowest = buckets[0];
    for (const bucket of buckets) {
      if (bucket.length < narrowest.length) narrowest = bucket;
    }

    return resolve(narrowest).filter(
      (t) =>
        (!subject || termKey(t.subject) === termKey(subject)) &&
        (!predicate || t.predicate.value === predicate.value) &&
        (!object || termKey(t.object) === termKey(object)),
    );
  }

  return {
    size: byKey.size,

    has(t: Triple): boolean {
      return byKey.has(tripleKey(t));
    },

    match,

    objects(subject: EntityTerm, predicate: NamedNode): readonly Term[] {
      return match({ subject, predicate }).map((t) => t.object);
    },

    subjects(predicate: NamedNode, object: Term): readonly EntityTerm[] {
      return match({ predicate, object }).map((t) => t.subject);
    },

    subjectsOfType(type: string): readonly EntityTerm[] {
      return match({ predicate: RDF_TYPE_NODE, object: namedNode(type) }).map((t) => t.subject);
    },

    triples(): readonly Triple[] {
      return all;
    },
  };
}
