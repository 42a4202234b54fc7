/**
 * Main type exports
 */

export * from './load-test.js';
export * from './schemas/index.js';
