/**
 * Barrel export for utility functions
 */

export * from './logger';
export * from './sanitize';
export * from './glob';
export * from './temp-workspace';
