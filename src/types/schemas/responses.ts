/**
 * Completion response schemas
 *
 * Only the fields the load tester reads are declared; everything else in
 * the body is ignored.
 */

import { z } from 'zod';
import { ReportedTokenCount } from './common.js';

const UsageSchema = z
  .object({
    prompt_tokens: ReportedTokenCount,
    completion_tokens: ReportedTokenCount,
  })
  .nullish();

/**
 * OpenAI-compatible /v1/chat/completions
 */
export const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
        }),
      })
    )
    .min(1, 'Response contains no choices'),
  usage: UsageSchema,
});

/**
 * OpenAI-compatible /v1/completions
 */
export const TextCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        text: z.string().nullish(),
      })
    )
    .min(1, 'Response contains no choices'),
  usage: UsageSchema,
});

/**
 * Azure ML managed online endpoint (/score)
 */
export const ScoreResponseSchema = z.object({
  output: z.string().nullish(),
  token_count: UsageSchema,
});
