import type { Claim, KnowledgeGraph } from '@graphgate/shared/src/types/graph.types.js';
import type { OracleConfig } from '@graphgate/schemas/src/oracle-config.schema.js';
import type { ConstraintSet } from '@graphgate/schemas/src/constraint.schema.js';
import { loadConstraints, loadOracleConfig } from '@graphgate/schemas/src/config-loader.js';
import { ConfigurationError } from '@graphgate/shared/src/utils/errors.js';
import { createChildLogger } from '@graphgate/shared/src/logger.js';
import { loadGraphStore } from './graph/graph-store.js';
import { createConsistencyAuditor } from './audit/consistency-auditor.js';
import type { ConsistencyAuditor } from './audit/consistency-auditor.js';
import { createLicensePolicy } from './policy/abstention-policy.js';
import { createLicensingOracle } from './policy/licensing-oracle.js';
import type { LicensingOracle } from './policy/licensing-oracle.js';
import { linkClaim } from './linking/claim-linker.js';
import type { ClaimIndexes, LabeledClaim } from './linking/claim-linker.js';
import type { LinkOptions } from './linking/label-resolver.js';
import { createGraphRetrievalSystem } from './retrieval/graph-retrieval.js';
import type { GraphRetrievalSystem } from './retrieval/graph-retrieval.js';

const log = createChildLogger('core:oracle-runtime');

/** Everything a runner needs, wired from one configuration. */
export interface OracleRuntime {
  readonly config: OracleConfig;
  readonly graph: KnowledgeGraph;
  readonly auditor: ConsistencyAuditor;
  readonly oracle: LicensingOracle;
  readonly retrieval: GraphRetrievalSystem;
  /** Fuzzy threshold from `linking.fuzzyThreshold`. */
  readonly linkOptions: LinkOptions;
  linkClaim(claim: LabeledClaim, indexes: ClaimIndexes): Claim;
}

export function createOracleRuntime(
  config: OracleConfig,
  graph: KnowledgeGraph,
  constraints?: ConstraintSet,
): OracleRuntime {
  if (config.audit.mode === 'conformance' && !constraints) {
    throw new ConfigurationError('Audit mode "conformance" requires constraintsPath');
  }

  const auditor =
    config.audit.mode === 'conformance' && constraints
      ? createConsistencyAuditor({ mode: 'conformance', constraints })
      : createConsistencyAuditor({ mode: 'membership' });

  const linkOptions: LinkOptions = { threshold: config.linking.fuzzyThreshold };

  return {
    config,
    graph,
    auditor,
    oracle: createLicensingOracle({ graph, auditor, policy: createLicensePolicy() }),
    retrieval: createGraphRetrievalSystem({ graph, config: config.retrieval }),
    linkOptions,
    linkClaim(claim: LabeledClaim, indexes: ClaimIndexes): Claim {
      return linkClaim(claim, indexes, linkOptions);
    },
  };
}

export async function loadOracleRuntime(configDir: string): Promise<OracleRuntime> {
  const config = await loadOracleConfig(configDir);
  const store = await loadGraphStore(config.graphPath);
  const constraints =
    config.constraintsPath === undefined ? undefined : await loadConstraints(config.constraintsPath);

  log.info(
    { configDir, mode: config.audit.mode, triples: store.getGraph().size },
    'Oracle runtime ready',
  );
  return createOracleRuntime(config, store.getGraph(), constraints);
}
