export * from './run-result.js';
export * from './artifact.js';
export * from './when.js';
export type * from './step-request.js';
export type * from './outcome.js';
