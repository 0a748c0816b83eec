import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { Parser } from 'n3';
import type { Quad } from 'n3';
import type { EntityTerm, KnowledgeGraph, Term, Triple } from '@graphgate/shared/src/types/graph.types.js';
import { blankNode, literal, namedNode } from '@graphgate/shared/src/rdf/terms.js';
import { createChildLogger } from '@graphgate/shared/src/logger.js';
import { GraphLoadError, toError } from '@graphgate/shared/src/utils/errors.js';
import { createIndexedGraph } from './indexed-graph.js';

const log = createChildLogger('graph:store');

export type GraphFormat = 'Turtle' | 'N-Triples' | 'N3' | 'N-Quads' | 'TriG';

export interface GraphParseOptions {
  readonly format?: GraphFormat;
  readonly baseIri?: string;
}

export interface GraphStore {
  readonly source: string;
  getGraph(): KnowledgeGraph;
}

const FORMATS_BY_EXTENSION: Readonly<Record<string, GraphFormat>> = {
  '.ttl': 'Turtle',
  '.nt': 'N-Triples',
  '.n3': 'N3',
  '.nq': 'N-Quads',
  '.trig': 'TriG',
};

export function formatForPath(path: string): GraphFormat {
  return FORMATS_BY_EXTENSION[extname(path).toLowerCase()] ?? 'Turtle';
}

function toEntity(term: Quad['subject']): EntityTerm | null {
  if (term.termType === 'NamedNode') return namedNode(term.value);
  if (term.termType === 'BlankNode') return blankNode(term.value);
  return null;
}

function toTerm(term: Quad['object']): Term | null {
  switch (term.termType) {
    case 'NamedNode':
      return namedNode(term.value);
    case 'BlankNode':
      return blankNode(term.value);
    case 'Literal':
      return literal(term.value, term.datatype.value, term.language || undefined);
    default:
      return null;
  }
}

function toTriple(quad: Quad): Triple | null {
  const subject = toEntity(quad.subject);
  const object = toTerm(quad.object);
  if (!subject || !object || quad.predicate.termType !== 'NamedNode') {
    return null;
  }
  return { subject, predicate: namedNode(quad.predicate.value), object };
}

/** Parses a serialized graph; throws whatever the parser throws. */
export function parseGraphDocument(content: string, options: GraphParseOptions = {}): KnowledgeGraph {
  const parser = new Parser({ format: options.format ?? 'Turtle', baseIRI: options.baseIri });
  const quads = parser.parse(content);

  const triples: Triple[] = [];
  let skipped = 0;
  for (const quad of quads) {
    const t = toTriple(quad);
    if (t) {
      triples.push(t);
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    log.debug({ skipped }, 'Skipped quads with unsupported terms');
  }

  return createIndexedGraph(triples);
}

/**
 * Reads and parses the graph document once. The returned store hands out
 * the same graph instance for its whole lifetime.
 */
export async function loadGraphStore(
  path: string,
  options: GraphParseOptions = {},
): Promise<GraphStore> {
  log.info({ path }, 'Loading knowledge graph');

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    const cause = toError(error);
    const missing = 'code' in cause && cause.code === 'ENOENT';
    throw new GraphLoadError(
      missing
        ? `Knowledge graph file not found at ${path}`
        : `Failed to read knowledge graph ${path}: ${cause.message}`,
      path,
      cause,
    );
  }

  let graph: KnowledgeGraph;
  try {
    graph = parseGraphDocument(content, { ...options, format: options.format ?? formatForPath(path) });
  } catch (error) {
    const cause = toError(error);
    throw new GraphLoadError(`Malformed graph document ${path}: ${cause.message}`, path, cause);
  }

  log.info({ path, triples: graph.size }, 'Knowledge graph loaded');

  return {
    source: path,
    getGraph(): KnowledgeGraph {
      return graph;
    },
  };
}
