export * from './graph/indexed-graph.js';
export * from './graph/graph-overlay.js';
export * from './graph/graph-store.js';
export * from './linking/label-resolver.js';
export * from './linking/claim-linker.js';
export * from './audit/shape-validator.js';
export * from './audit/consistency-auditor.js';
export * from './policy/abstention-policy.js';
export * from './policy/licensing-oracle.js';
export * from './retrieval/anchor-resolver.js';
export * from './retrieval/context-formatter.js';
export * from './retrieval/graph-retrieval.js';
export * from './evaluation/epistemic-classifier.js';
export * from './evaluation/metrics.js';
export * from './evaluation/metrics-report.js';
export * from './evaluation/case-generator.js';
export * from './evaluation/case-quality.js';
export * from './evaluation/evaluator.js';
export * from './evaluation/adapters/system-adapter.js';
export * from './evaluation/adapters/oracle-adapter.js';
export * from './evaluation/adapters/stub-adapter.js';
export * from './evaluation/adapters/retrieval-augmented-adapter.js';
export * from './llm/llm-client.js';
export * from './llm/verdict-request.js';
export * from './io/jsonl.js';
export * from './oracle-runtime.js';
