/**
 * Load test configuration schemas
 *
 * Zod schemas for validating loadtest.yaml. Field names follow the YAML
 * file (snake_case); the loader converts the validated object into
 * camelCase settings.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import {
  ClampedTemperature,
  LogLevel,
  NonEmptyString,
  NonNegativeInteger,
  PositiveInteger,
} from './common.js';

export const EndpointFormatName = z.enum(['auto', 'openai-chat', 'openai-completions', 'azure-score'], {
  errorMap: () => ({
    message: 'Format must be one of: auto, openai-chat, openai-completions, azure-score',
  }),
});

export const RetryableKind = z.enum(['timeout', 'transport_error', 'endpoint_error', 'parse_error']);

/**
 * Target endpoint
 */
export const EndpointConfigSchema = z.object({
  url: z.string().url('Endpoint URL must be a valid URL'),
  auth_token: z.string(),
  model: NonEmptyString,
  format: EndpointFormatName,
  timeout_ms: PositiveInteger,
  preflight_timeout_ms: PositiveInteger,
  max_tokens: PositiveInteger,
  temperature: ClampedTemperature,
});

/**
 * Runner-level retry policy
 */
export const RetryConfigSchema = z.object({
  max_retries: NonNegativeInteger,
  initial_delay_ms: NonNegativeInteger,
  max_delay_ms: NonNegativeInteger,
  backoff_multiplier: z.number().min(1, 'must be >= 1'),
  jitter: z.number().min(0).max(1, 'must be 0-1'),
  retryable_errors: z.array(RetryableKind),
}).refine(
  (data) => data.max_delay_ms >= data.initial_delay_ms,
  {
    message: 'must be >= initial_delay_ms',
    path: ['max_delay_ms'],
  }
);

/**
 * Sweep shape
 */
export const SweepConfigSchema = z.object({
  concurrency_levels: z
    .array(PositiveInteger)
    .min(1, 'At least one concurrency level is required')
    .refine((levels) => new Set(levels).size === levels.length, {
      message: 'Concurrency levels must be unique',
    }),
  repetitions: PositiveInteger,
  warmup_requests: NonNegativeInteger,
  requests_per_run: PositiveInteger.nullable(),
  cooldown_ms: NonNegativeInteger,
  repetition_cooldown_ms: NonNegativeInteger,
  run_duration_ms: PositiveInteger.nullable(),
  run_deadline_ms: PositiveInteger.nullable(),
  failed_request_policy: z.enum(['exclude', 'include']),
  retry: RetryConfigSchema,
});

export const PromptConfigSchema = z.object({
  pool_size: PositiveInteger,
  target_tokens: PositiveInteger,
  base_prompt: NonEmptyString,
  exhaustion_policy: z.enum(['cycle', 'replenish']),
});

export const OutputConfigSchema = z.object({
  directory: NonEmptyString,
  save_raw_outcomes: z.boolean(),
  formats: z.array(z.enum(['csv', 'json'])),
});

export const LoggingConfigSchema = z.object({
  level: LogLevel,
});

/**
 * Complete configuration (after environment overrides are merged)
 */
export const LoadTestConfigSchema = z.object({
  endpoint: EndpointConfigSchema,
  sweep: SweepConfigSchema,
  prompts: PromptConfigSchema,
  output: OutputConfigSchema,
  logging: LoggingConfigSchema,
});

export type LoadTestConfigShape = z.infer<typeof LoadTestConfigSchema>;
