import type { Claim } from '@graphgate/shared/src/types/graph.types.js';
import { createChildLogger } from '@graphgate/shared/src/logger.js';
import { linkLabel } from './label-resolver.js';
import type { LabelIndex, LinkOptions } from './label-resolver.js';

const log = createChildLogger('linking:claim-linker');

/** Claim as extracted from free text: entity labels, not identifiers. */
export interface LabeledClaim {
  readonly subjectLabel?: string | null;
  readonly predicate: string;
  readonly objectLabel?: string | null;
}

export interface ClaimIndexes {
  readonly subjects: LabelIndex;
  readonly objects: LabelIndex;
}

/**
 * Links both labels of an extracted claim. Components that cannot be
 * resolved stay null, so the auditor treats the claim as unlicensed.
 */
export function linkClaim(
  claim: LabeledClaim,
  indexes: ClaimIndexes,
  options: LinkOptions = {},
): Claim {
  const subject = linkLabel(claim.subjectLabel, indexes.subjects, options);
  const object = linkLabel(claim.objectLabel, indexes.objects, options);

  if (!subject || !object) {
    log.debug(
      {
        subjectLabel: claim.subjectLabel,
        objectLabel: claim.objectLabel,
        subjectResolved: subject !== null,
        objectResolved: object !== null,
      },
      'Claim left partially unresolved',
    );
  }

  return { subject, predicate: claim.predicate, object };
}
