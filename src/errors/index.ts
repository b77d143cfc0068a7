/**
 * Barrel export for all custom error classes
 */

export * from './validation-error';
export * from './coverage-threshold-error';
export * from './substitution-error';
export * from './discovery-error';
export * from './execution-state-error';
export * from './script-exit';
