/**
 * Library entry point; the CLI lives in src/cli
 */

export * from './catalog/index.js';
export * from './hash/index.js';
export * from './grouping/index.js';
export * from './results/index.js';
export * from './deletion/index.js';
export * from './core/index.js';
export * from './utils/index.js';
