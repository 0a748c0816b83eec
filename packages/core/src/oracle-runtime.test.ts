import { describe, it, expect } from 'vitest';
import { validateConstraintSet, validateOracleConfig } from '@graphgate/schemas/src/validators.js';
import { ConfigurationError } from '@graphgate/shared/src/utils/errors.js';
import { BATTLES, BATTLES_TTL, RIVERS, RIVERS_TTL, graphFromTurtle } from './test-helpers.js';
import { buildLabelIndex } from './linking/label-resolver.js';
import { createOracleRuntime } from './oracle-runtime.js';

const graph = graphFromTurtle(RIVERS_TTL);

const constraints = validateConstraintSet({
  shapes: [
    {
      id: 'RiverShape',
      targetClass: `${RIVERS}River`,
      properties: [{ path: `${RIVERS}flowsInto`, maxCount: 1 }],
    },
  ],
});

function configFor(mode: 'membership' | 'conformance', fuzzyThreshold?: number) {
  return validateOracleConfig({
    graphPath: 'rivers.ttl',
    audit: { mode },
    linking: { fuzzyThreshold },
    retrieval: { rootType: `${RIVERS}River`, rootLabel: 'River' },
  });
}

describe('createOracleRuntime', () => {
  it('should wire a membership oracle', () => {
    const runtime = createOracleRuntime(configFor('membership'), graph);
    expect(runtime.auditor.mode).toBe('membership');
    expect(
      runtime.oracle.evaluate({
        subject: `${RIVERS}Missouri_River`,
        predicate: `${RIVERS}flowsInto`,
        object: `${RIVERS}Mississippi_River`,
      }),
    ).toEqual({ licensed: true, action: 'ANSWER' });
  });

  it('should wire a conformance oracle that rejects a second outlet', () => {
    const runtime = createOracleRuntime(configFor('conformance'), graph, constraints);
    expect(runtime.auditor.mode).toBe('conformance');
    expect(
      runtime.oracle.evaluate({
        subject: `${RIVERS}Missouri_River`,
        predicate: `${RIVERS}flowsInto`,
        object: `${RIVERS}Bear_Creek`,
      }),
    ).toEqual({ licensed: false, action: 'ABSTAIN' });
  });

  it('should share the graph with the retrieval system', () => {
    const runtime = createOracleRuntime(configFor('membership'), graph);
    expect(runtime.retrieval.resolveAnchor('Missouri River')).toBe(`${RIVERS}Missouri_River`);
  });

  it('should refuse conformance mode without constraints', () => {
    expect(() => createOracleRuntime(configFor('conformance'), graph)).toThrow(ConfigurationError);
  });

  it('should link claims with the configured fuzzy threshold', () => {
    const battles = graphFromTurtle(BATTLES_TTL);
    const indexes = {
      subjects: buildLabelIndex(battles, `${BATTLES}Battle`),
      objects: buildLabelIndex(battles, `${BATTLES}Agent`),
    };
    const labeled = {
      subjectLabel: 'Batle of Foo',
      predicate: `${BATTLES}hasCommander`,
      objectLabel: 'GeneralY',
    };

    const lenient = createOracleRuntime(configFor('membership'), battles);
    expect(lenient.linkOptions).toEqual({ threshold: 0.85 });
    expect(lenient.linkClaim(labeled, indexes).subject).toBe(`${BATTLES}Battle_of_Foo`);

    const strict = createOracleRuntime(configFor('membership', 0.97), battles);
    expect(strict.linkOptions).toEqual({ threshold: 0.97 });
    expect(strict.linkClaim(labeled, indexes)).toEqual({
      subject: null,
      predicate: `${BATTLES}hasCommander`,
      object: `${BATTLES}GeneralY`,
    });
  });
});
