/**
 * Common Zod schema primitives
 */

import { z } from 'zod';

/**
 * Non-empty string validator
 */
export const NonEmptyString = z.string().min(1, 'Cannot be empty');

/**
 * Positive integer validator
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer');

/**
 * Non-negative integer validator
 */
export const NonNegativeInteger = z
  .number()
  .int('Must be an integer')
  .min(0, 'Must be non-negative');

/**
 * Temperature parameter (0-2 range)
 */
export const ClampedTemperature = z
  .number()
  .min(0, 'Temperature must be at least 0')
  .max(2, 'Temperature cannot exceed 2');

/**
 * Token count reported by an endpoint. Some servers send null for
 * fields they do not track.
 */
export const ReportedTokenCount = NonNegativeInteger.nullish();

export const LogLevel = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'], {
  errorMap: () => ({ message: 'Log level must be one of: trace, debug, info, warn, error, fatal, silent' }),
});
