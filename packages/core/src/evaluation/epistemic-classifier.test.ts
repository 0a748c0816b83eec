import { describe, it, expect, vi } from 'vitest';
import {
  classifyClaim,
  goldToLabel,
  isNegatedInContext,
  labelToGold,
  predictionToAction,
} from './epistemic-classifier.js';
import { createConsistencyAuditor } from '../audit/consistency-auditor.js';
import { createLicensePolicy } from '../policy/abstention-policy.js';
import { literal, triple } from '@graphgate/shared/src/rdf/terms.js';
import { XSD } from '@graphgate/shared/src/rdf/vocabulary.js';
import { BATTLES, BATTLES_TTL, graphFromTurtle } from '../test-helpers.js';

const graph = graphFromTurtle(BATTLES_TTL);
const auditor = createConsistencyAuditor({ mode: 'membership' });
const policy = createLicensePolicy();

const commandedBy = (battle: string, agent: string) => ({
  subject: `${BATTLES}${battle}`,
  predicate: `${BATTLES}hasCommander`,
  object: `${BATTLES}${agent}`,
});

describe('classifyClaim', () => {
  it('should classify a claim present in the graph as entailed and answer it', () => {
    const claim = commandedBy('BattleX', 'GeneralY');
    expect(classifyClaim(graph, claim, [])).toBe('E');
    expect(auditor.audit(graph, claim)).toBe(true);
    expect(policy.decide(auditor.audit(graph, claim))).toBe('ANSWER');
  });

  it('should classify an absent claim without negation as unknown and abstain', () => {
    const claim = commandedBy('BattleX', 'GeneralZ');
    expect(classifyClaim(graph, claim, [])).toBe('U');
    expect(policy.decide(auditor.audit(graph, claim))).toBe('ABSTAIN');
  });

  it('should classify an explicitly negated claim as contradictory', () => {
    const claim = commandedBy('BattleX', 'GeneralZ');
    const facts = ['BattleX DOES NOT have commander: GeneralZ'];
    expect(classifyClaim(graph, claim, facts)).toBe('C');
    expect(policy.decide(auditor.audit(graph, claim))).toBe('ABSTAIN');
  });

  it('should check negation before graph membership', () => {
    const claim = commandedBy('BattleX', 'GeneralY');
    expect(graph.has(triple(claim.subject, claim.predicate, claim.object))).toBe(true);
    expect(classifyClaim(graph, claim, ['BattleX DOES NOT have commander: GeneralY'])).toBe('C');
  });

  it('should ignore negations that do not mention both labels', () => {
    const claim = commandedBy('BattleX', 'GeneralZ');
    expect(classifyClaim(graph, claim, ['BattleX DOES NOT have commander: Colonel Q'])).toBe('U');
    expect(classifyClaim(graph, claim, ['BattleX has commander GeneralZ'])).toBe('U');
  });

  it('should match labels derived from local names with underscores as spaces', () => {
    const claim = commandedBy('Battle_of_Foo', 'Colonel_Q');
    expect(classifyClaim(graph, claim, ['Battle of Foo DOES NOT have commander: Colonel Q'])).toBe('C');
  });

  it('should honour a custom negation marker and label function', () => {
    const claim = commandedBy('BattleX', 'GeneralZ');
    const options = { negationMarker: 'NEVER', labelFor: (iri: string) => iri.slice(iri.indexOf('#') + 1).toLowerCase() };
    expect(classifyClaim(graph, claim, ['battlex NEVER had generalz'], options)).toBe('C');
  });

  it('should use literal values as object labels', () => {
    const claim = {
      subject: `${BATTLES}BattleX`,
      predicate: `${BATTLES}startDate`,
      object: literal('1815-06-18', XSD.date),
    };
    expect(classifyClaim(graph, claim, [])).toBe('E');
    expect(classifyClaim(graph, claim, ['BattleX DOES NOT have start date: 1815-06-18'])).toBe('C');
  });

  it('should fall through to unknown for incomplete claims', () => {
    expect(classifyClaim(graph, { subject: `${BATTLES}BattleX`, predicate: null, object: null }, [])).toBe('U');
  });

  it('should report constraint violations as contradictory', () => {
    const constraintCheck = vi.fn().mockReturnValue(false);
    const claim = commandedBy('BattleX', 'GeneralZ');
    expect(classifyClaim(graph, claim, [], { constraintCheck })).toBe('C');
    expect(constraintCheck).toHaveBeenCalledWith(claim);
  });

  it('should not consult constraints for entailed claims', () => {
    const constraintCheck = vi.fn().mockReturnValue(false);
    expect(classifyClaim(graph, commandedBy('BattleX', 'GeneralY'), [], { constraintCheck })).toBe('E');
    expect(constraintCheck).not.toHaveBeenCalled();
  });
});

describe('isNegatedInContext', () => {
  it('should require both labels', () => {
    expect(isNegatedInContext({ subject: `${BATTLES}BattleX` }, ['BattleX DOES NOT exist'])).toBe(false);
  });
});

describe('label mappings', () => {
  it('should map labels to gold answers and back', () => {
    expect(labelToGold('E')).toBe('YES');
    expect(labelToGold('C')).toBe('NO');
    expect(labelToGold('U')).toBe('UNKNOWN');
    expect(goldToLabel('YES')).toBe('E');
    expect(goldToLabel('NO')).toBe('C');
    expect(goldToLabel('UNKNOWN')).toBe('U');
    expect(goldToLabel('MAYBE')).toBe('U');
  });

  it('should treat only UNKNOWN predictions as abstentions', () => {
    expect(predictionToAction('UNKNOWN')).toBe('ABSTAIN');
    expect(predictionToAction('YES')).toBe('ANSWER');
    expect(predictionToAction('NO')).toBe('ANSWER');
    expect(predictionToAction('garbled')).toBe('ANSWER');
  });
});
