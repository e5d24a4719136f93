export type * from './app-error.js';
export * from './factories.js';
export * from './formatter.js';
export * from './boundary-validation.js';
