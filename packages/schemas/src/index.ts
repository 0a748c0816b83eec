export * from './oracle-config.schema.js';
export * from './constraint.schema.js';
export * from './evaluation.schema.js';
export * from './validators.js';
export * from './config-loader.js';
