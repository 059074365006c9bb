export * from './artifact.schema.js';
export * from './result-value.schema.js';
export * from './when.schema.js';
export * from './run-result.schema.js';
export * from './step-config.schema.js';
