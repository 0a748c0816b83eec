import type {
  BlankNode,
  Claim,
  EntityTerm,
  Literal,
  NamedNode,
  Term,
  Triple,
} from '../types/graph.types.js';
import { NUMERIC_DATATYPES, RDF_LANG_STRING, XSD } from './vocabulary.js';

export function namedNode(value: string): NamedNode {
  return { kind: 'iri', value };
}

export function blankNode(value: string): BlankNode {
  return { kind: 'blank', value };
}

export function literal(value: string, datatype: string = XSD.string, language?: string): Literal {
  if (language) {
    return { kind: 'literal', value, datatype: RDF_LANG_STRING, language };
  }
  return { kind: 'literal', value, datatype };
}

export function doubleLiteral(value: number): Literal {
  return literal(String(value), XSD.double);
}

export function triple(subject: EntityTerm | string, predicate: NamedNode | string, object: Term | string): Triple {
  return {
    subject: typeof subject === 'string' ? namedNode(subject) : subject,
    predicate: typeof predicate === 'string' ? namedNode(predicate) : predicate,
    object: typeof object === 'string' ? namedNode(object) : object,
  };
}

export function termKey(term: Term): string {
  switch (term.kind) {
    case 'iri':
      return `<${term.value}>`;
    case 'blank':
      return `_:${term.value}`;
    case 'literal':
      return term.language
        ? `"${term.value}"@${term.language}`
        : `"${term.value}"^^<${term.datatype}>`;
  }
}

export function tripleKey(t: Triple): string {
  return `${termKey(t.subject)} ${termKey(t.predicate)} ${termKey(t.object)}`;
}

export function termsEqual(a: Term, b: Term): boolean {
  return termKey(a) === termKey(b);
}

export function isEntity(term: Term): term is EntityTerm {
  return term.kind === 'iri' || term.kind === 'blank';
}

export function isNamedNode(term: Term): term is NamedNode {
  return term.kind === 'iri';
}

/** Last `#` or `/` segment of an IRI. */
export function localName(iri: string): string {
  if (iri.includes('#')) {
    return iri.slice(iri.lastIndexOf('#') + 1);
  }
  if (iri.includes('/')) {
    return iri.slice(iri.lastIndexOf('/') + 1);
  }
  return iri;
}

/** Human-readable label derived from an IRI: local name with underscores as spaces. */
export function extractLabel(iri: string): string {
  return localName(iri).replaceAll('_', ' ');
}

export function termDisplayValue(term: Term): string {
  return term.kind === 'literal' ? term.value : localName(term.value);
}

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseNumber(value: string): number | undefined {
  const trimmed = value.trim();
  if (!NUMBER_PATTERN.test(trimmed)) {
    return undefined;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function parseNumericLiteral(term: Term): number | undefined {
  if (term.kind !== 'literal') {
    return undefined;
  }
  if (!NUMERIC_DATATYPES.has(term.datatype) && term.datatype !== XSD.string) {
    return undefined;
  }
  return parseNumber(term.value);
}

const DATE_PATTERN = /^-?\d{4,}-\d{2}-\d{2}/;

export function parseDateLiteral(term: Term): Date | undefined {
  if (term.kind !== 'literal' || !DATE_PATTERN.test(term.value)) {
    return undefined;
  }
  const parsed = new Date(term.value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

/** Resolves a claim into a triple, or null when any component is missing. */
export function claimToTriple(claim: Claim): Triple | null {
  const { subject, predicate, object } = claim;
  if (!subject || !predicate || object === null || object === undefined) {
    return null;
  }
  if (typeof object === 'string' && object.length === 0) {
    return null;
  }
  return triple(subject, predicate, object);
}
