/**
 * Barrel export for all type definitions
 */

export * from './test-case';
export * from './execution-result';
export * from './substitution';
export * from './coverage';
export * from './tap';
export * from './config';
