import { describe, it, expect } from 'vitest';
import { extractAnchorCandidates, resolveAnchor } from './anchor-resolver.js';
import { RDFS_LABEL } from '@graphgate/shared/src/rdf/vocabulary.js';
import { RIVERS, RIVERS_TTL, graphFromTurtle } from '../test-helpers.js';

const graph = graphFromTurtle(RIVERS_TTL);
const scope = { rootType: `${RIVERS}River`, labelPredicate: RDFS_LABEL };

describe('resolveAnchor', () => {
  it('should prefer an exact label match', () => {
    expect(resolveAnchor(graph, 'Abrams Creek (Ohio)', scope)).toBe(`${RIVERS}Abrams_Creek_Ohio`);
  });

  it('should match the first qualified label sharing the parenthetical-free prefix', () => {
    expect(resolveAnchor(graph, 'Abrams Creek (Kentucky)', scope)).toBe(
      `${RIVERS}Abrams_Creek_Tennessee`,
    );
  });

  it('should match a bare parenthetical to the first qualified label', () => {
    expect(resolveAnchor(graph, '(Ohio)', scope)).toBe(`${RIVERS}Abrams_Creek_Tennessee`);
  });

  it('should fall back to a case-insensitive prefix match', () => {
    expect(resolveAnchor(graph, 'missouri', scope)).toBe(`${RIVERS}Missouri_River`);
  });

  it('should only consider entities of the root type', () => {
    expect(resolveAnchor(graph, 'Gulf of Mexico', scope)).toBeNull();
  });

  it('should return null for blank or unmatched labels', () => {
    expect(resolveAnchor(graph, '   ', scope)).toBeNull();
    expect(resolveAnchor(graph, 'Danube', scope)).toBeNull();
  });
});

describe('extractAnchorCandidates', () => {
  const nouns = ['River', 'Creek', 'Stream'];

  it('should extract capitalized phrases before an anchor noun', () => {
    expect(
      extractAnchorCandidates('Does the Bear Creek feed the Mississippi River?', nouns, 2),
    ).toEqual(['Bear', 'Mississippi']);
  });

  it('should keep multi-word phrases together', () => {
    expect(extractAnchorCandidates('Where does the Big Muddy River end?', nouns, 2)).toEqual([
      'Big Muddy',
    ]);
  });

  it('should respect the limit', () => {
    expect(
      extractAnchorCandidates('Rank the Red River, Blue Creek and Green Stream.', nouns, 2),
    ).toEqual(['Red', 'Blue']);
  });

  it('should find nothing without an anchor noun', () => {
    expect(extractAnchorCandidates('How long is the Nile?', nouns, 2)).toEqual([]);
  });
});
