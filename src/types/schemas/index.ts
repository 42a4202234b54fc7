/**
 * Zod schema exports
 *
 * @example
 * ```typescript
 * import { LoadTestConfigSchema } from 'inference-loadtest';
 *
 * const result = LoadTestConfigSchema.safeParse(rawConfig);
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Config schemas
export * from './config.js';

// Endpoint response schemas
export * from './responses.js';
