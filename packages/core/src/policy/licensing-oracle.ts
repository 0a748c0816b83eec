import type { Claim, KnowledgeGraph } from '@graphgate/shared/src/types/graph.types.js';
import type { Action } from '@graphgate/shared/src/types/evaluation.types.js';
import type { ConsistencyAuditor } from '../audit/consistency-auditor.js';
import type { AbstentionPolicy } from './abstention-policy.js';
import { createChildLogger } from '@graphgate/shared/src/logger.js';

const log = createChildLogger('policy:licensing-oracle');

export interface LicenseDecision {
  readonly licensed: boolean;
  readonly action: Action;
}

export interface ClaimDecision extends LicenseDecision {
  readonly id: string | null;
  readonly claim: Claim;
}

export interface VerificationSummary {
  readonly total: number;
  readonly licensed: number;
  readonly answered: number;
  readonly abstained: number;
}

export interface VerificationReport {
  readonly decisions: readonly ClaimDecision[];
  readonly summary: VerificationSummary;
}

export interface ClaimInput {
  readonly id?: string | null;
  readonly claim: Claim;
}

export interface LicensingOracle {
  evaluate(claim: Claim): LicenseDecision;
  verifyClaims(records: readonly ClaimInput[]): VerificationReport;
}

export interface LicensingOracleDeps {
  readonly graph: KnowledgeGraph;
  readonly auditor: ConsistencyAuditor;
  readonly policy: AbstentionPolicy;
}

export function createLicensingOracle(deps: LicensingOracleDeps): LicensingOracle {
  const { graph, auditor, policy } = deps;

  function evaluate(claim: Claim): LicenseDecision {
    const licensed = auditor.audit(graph, claim);
    return { licensed, action: policy.decide(licensed) };
  }

  return {
    evaluate,

    verifyClaims(records: readonly ClaimInput[]): VerificationReport {
      const decisions = records.map((record) => ({
        id: record.id ?? null,
        claim: record.claim,
        ...evaluate(record.claim),
      }));

      const summary: VerificationSummary = {
        total: decisions.length,
        licensed: decisions.filter((d) => d.licensed).length,
        answered: decisions.filter((d) => d.action === 'ANSWER').length,
        abstained: decisions.filter((d) => d.action === 'ABSTAIN').length,
      };

      log.info({ mode: auditor.mode, ...summary }, 'Claims verified');
      return { decisions, summary };
    },
  };
}
