/**
 * Endpoint Formats
 *
 * Request body builders and response parsers for the completion APIs the
 * load tester understands:
 * - openai-chat: OpenAI-compatible /v1/chat/completions
 * - openai-completions: OpenAI-compatible /v1/completions
 * - azure-score: Azure ML managed online endpoint (/score)
 */

import type { ZodType, ZodTypeDef } from 'zod';
import {
  ChatCompletionResponseSchema,
  ScoreResponseSchema,
  TextCompletionResponseSchema,
} from '../types/schemas/responses.js';
import { attempt, Err, Ok, type Result } from '../utils/result-helpers.js';
import type { TransportSettings } from './types.js';

export type EndpointFormatName = 'openai-chat' | 'openai-completions' | 'azure-score';

/**
 * Completion extracted from a response body. Token counts are undefined
 * when the endpoint did not report them.
 */
export interface ParsedCompletion {
  text: string;
  promptTokens?: number;
  completionTokens?: number;
}

export class ResponseParseError extends Error {
  constructor(message: string, public readonly format: EndpointFormatName) {
    super(message);
    this.name = 'ResponseParseError';
  }
}

export interface EndpointFormat {
  readonly name: EndpointFormatName;
  buildBody(prompt: string, settings: TransportSettings): Record<string, unknown>;
  parse(body: string): Result<ParsedCompletion, ResponseParseError>;
}

interface Usage {
  prompt_tokens?: number | null;
  completion_tokens?: number | null;
}

function fromUsage(text: string | null | undefined, usage: Usage | null | undefined): ParsedCompletion {
  return {
    text: text ?? '',
    promptTokens: usage?.prompt_tokens ?? undefined,
    completionTokens: usage?.completion_tokens ?? undefined,
  };
}

/**
 * JSON.parse + schema validation, both failures mapped to ResponseParseError
 */
function parseWith<T>(
  format: EndpointFormatName,
  body: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  extract: (value: T) => ParsedCompletion
): Result<ParsedCompletion, ResponseParseError> {
  const json = attempt((): unknown => JSON.parse(body));
  if (json.err) {
    return Err(new ResponseParseError(`Response body is not valid JSON: ${json.val.message}`, format));
  }

  const validated = schema.safeParse(json.val);
  if (!validated.success) {
    const issues = validated.error.issues
      .map((issue) => `${issue.path.join('.') || 'root'} ${issue.message}`)
      .join('; ');
    return Err(new ResponseParseError(`Unexpected response shape: ${issues}`, format));
  }

  return Ok(extract(validated.data));
}

const openAiChat: EndpointFormat = {
  name: 'openai-chat',
  buildBody: (prompt, settings) => ({
    model: settings.model,
    messages: [{ role: 'user', content: prompt }],
    max_tokens: settings.maxTokens,
    temperature: settings.temperature,
  }),
  parse: (body) =>
    parseWith('openai-chat', body, ChatCompletionResponseSchema, (value) =>
      fromUsage(value.choices[0]?.message.content, value.usage)
    ),
};

const openAiCompletions: EndpointFormat = {
  name: 'openai-completions',
  buildBody: (prompt, settings) => ({
    model: settings.model,
    prompt,
    max_tokens: settings.maxTokens,
    temperature: settings.temperature,
  }),
  parse: (body) =>
    parseWith('openai-completions', body, TextCompletionResponseSchema, (value) =>
      fromUsage(value.choices[0]?.text, value.usage)
    ),
};

const azureScore: EndpointFormat = {
  name: 'azure-score',
  buildBody: (prompt, settings) => ({
    input_data: {
      input_string: [{ role: 'user', content: prompt }],
      parameters: {
        temperature: settings.temperature,
        max_tokens: settings.maxTokens,
      },
    },
  }),
  parse: (body) =>
    parseWith('azure-score', body, ScoreResponseSchema, (value) =>
      fromUsage(value.output, value.token_count)
    ),
};

const FORMATS: Readonly<Record<EndpointFormatName, EndpointFormat>> = {
  'openai-chat': openAiChat,
  'openai-completions': openAiCompletions,
  'azure-score': azureScore,
};

/**
 * Pick a format from the endpoint URL path
 */
export function detectEndpointFormat(url: string): EndpointFormatName {
  const path = new URL(url).pathname;
  if (path.includes('/score')) {
    return 'azure-score';
  }
  if (/\/completions\/?$/.test(path) && !path.includes('/chat/')) {
    return 'openai-completions';
  }
  return 'openai-chat';
}

/**
 * Resolve a configured format name ('auto' inspects the URL)
 */
export function resolveEndpointFormat(name: EndpointFormatName | 'auto', url: string): EndpointFormat {
  return FORMATS[name === 'auto' ? detectEndpointFormat(url) : name];
}

/**
 * Deterministic token estimate: whitespace-delimited word count
 */
export function estimateTokenCount(text: string): number {
  const trimmed = text.trim();
  return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}
