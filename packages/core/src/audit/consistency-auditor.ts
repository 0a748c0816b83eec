import type { Claim, EntityTerm, KnowledgeGraph } from '@graphgate/shared/src/types/graph.types.js';
import type { ConstraintSet } from '@graphgate/schemas/src/constraint.schema.js';
import type { AuditMode } from '@graphgate/schemas/src/oracle-config.schema.js';
import { claimToTriple, isEntity } from '@graphgate/shared/src/rdf/terms.js';
import { createChildLogger } from '@graphgate/shared/src/logger.js';
import { toError } from '@graphgate/shared/src/utils/errors.js';
import { createGraphOverlay } from '../graph/graph-overlay.js';
import { createShapeValidator } from './shape-validator.js';
import type { ConstraintValidator } from './shape-validator.js';

const log = createChildLogger('audit:consistency-auditor');

export type AuditorOptions =
  | { readonly mode: 'membership' }
  | {
      readonly mode: 'conformance';
      readonly constraints: ConstraintSet;
      readonly validator?: ConstraintValidator;
    };

/**
 * Licensing oracle core. `audit` always answers with a boolean: incomplete
 * claims and validator failures count as not licensed.
 */
export interface ConsistencyAuditor {
  readonly mode: AuditMode;
  audit(graph: KnowledgeGraph, claim: Claim): boolean;
}

export function createConsistencyAuditor(options: AuditorOptions): ConsistencyAuditor {
  if (options.mode === 'membership') {
    return {
      mode: 'membership',
      audit(graph: KnowledgeGraph, claim: Claim): boolean {
        const candidate = claimToTriple(claim);
        if (!candidate) {
          log.debug({ claim }, 'Incomplete claim, not licensed');
          return false;
        }
        return graph.has(candidate);
      },
    };
  }

  const { constraints } = options;
  const validator = options.validator ?? createShapeValidator();
  log.info({ shapes: constraints.shapes.length }, 'Consistency auditor initialized with constraints');

  return {
    mode: 'conformance',
    audit(graph: KnowledgeGraph, claim: Claim): boolean {
      const candidate = claimToTriple(claim);
      if (!candidate) {
        log.debug({ claim }, 'Incomplete claim, not licensed');
        return false;
      }

      // The base graph is validated at build time; only nodes touched by the
      // candidate can change conformance.
      const focusNodes: EntityTerm[] = [candidate.subject];
      if (isEntity(candidate.object)) {
        focusNodes.push(candidate.object);
      }

      try {
        const report = validator.validate(createGraphOverlay(graph, [candidate]), constraints, {
          focusNodes,
          stopOnFirstViolation: true,
        });
        if (!report.conforms) {
          log.debug(
            { subject: candidate.subject.value, violation: report.violations[0]?.message },
            'Claim violates constraints',
          );
        }
        return report.conforms;
      } catch (error) {
        log.warn(
          { subject: candidate.subject.value, error: toError(error).message },
          'Constraint validation failed, treating claim as not licensed',
        );
        return false;
      }
    },
  };
}
