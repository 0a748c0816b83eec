import type { Action } from '@graphgate/shared/src/types/evaluation.types.js';

/**
 * Maps an audit verdict to an action. Kept apart from the auditor so that
 * other policies can be swapped in without touching entailment logic.
 */
export interface AbstentionPolicy {
  decide(isLicensed: boolean): Action;
}

export function createLicensePolicy(): AbstentionPolicy {
  return {
    decide(isLicensed: boolean): Action {
      return isLicensed ? 'ANSWER' : 'ABSTAIN';
    },
  };
}
