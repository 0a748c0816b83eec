export interface NamedNode {
  readonly kind: 'iri';
  readonly value: string;
}

export interface BlankNode {
  readonly kind: 'blank';
  readonly value: string;
}

export interface Literal {
  readonly kind: 'literal';
  readonly value: string;
  readonly datatype: string;
  readonly language?: string;
}

export type EntityTerm = NamedNode | BlankNode;

export type Term = EntityTerm | Literal;

export interface Triple {
  readonly subject: EntityTerm;
  readonly predicate: NamedNode;
  readonly object: Term;
}

export interface TriplePattern {
  readonly subject?: EntityTerm;
  readonly predicate?: NamedNode;
  readonly object?: Term;
}

/**
 * Read-only view over a set of triples. Implementations never change after
 * construction; hypothetical additions go through an overlay instead.
 */
export interface KnowledgeGraph {
  readonly size: number;
  has(triple: Triple): boolean;
  match(pattern: TriplePattern): readonly Triple[];
  objects(subject: EntityTerm, predicate: NamedNode): readonly Term[];
  subjects(predicate: NamedNode, object: Term): readonly EntityTerm[];
  subjectsOfType(type: string): readonly EntityTerm[];
  triples(): readonly Triple[];
}

/**
 * A claim before or after linking. Components left null could not be
 * resolved; a string object is read as an entity IRI.
 */
export interface Claim {
  readonly subject?: string | null;
  readonly predicate?: string | null;
  readonly object?: string | Literal | null;
}

export interface RetrievedFact {
  readonly triple: Triple;
  readonly hop: number;
}

export interface RetrievalContext {
  readonly question: string;
  readonly anchor: string | null;
  readonly facts: readonly RetrievedFact[];
  readonly text: string;
}
