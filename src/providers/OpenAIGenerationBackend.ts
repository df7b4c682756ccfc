/**
 * OpenAI-compatible generation backend.
 * Talks to any chat-completions endpoint (OpenAI, Groq, Gemini's OpenAI
 * surface, local servers) through the official SDK and `baseURL`.
 * The SDK's own retries are disabled: the pool decides what happens next.
 */

import OpenAI from 'openai';
import { BackendError } from '../errors.js';
import type { GenerationRequest, IGenerationBackend } from './IGenerationBackend.js';

type ChatCompletion = OpenAI.Chat.Completions.ChatCompletion;
type ChatCompletionParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;

export type ChatCompletionFn = (
  params: ChatCompletionParams,
  options: { signal: AbortSignal }
) => Promise<ChatCompletion>;

export interface OpenAIGenerationBackendOptions {
  model: string;
  apiKey?: string;
  baseURL?: string;
  /** Ask for `response_format: json_object`. Default: true. */
  jsonMode?: boolean;
  /** Replaces the SDK call; used by tests. */
  create?: ChatCompletionFn;
}

/** Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds. */
export function parseRetryAfter(
  headers: Record<string, string | null | undefined> | undefined,
  now = Date.now()
): number | undefined {
  const ms = headers?.['retry-after-ms'];
  if (ms && Number.isFinite(Number(ms))) return Math.max(Number(ms), 0);

  const value = headers?.['retry-after'];
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.max(seconds * 1000, 0);
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(date - now, 0);
}

/** Classify an SDK failure. Order matters: the timeout error is a connection error. */
export function classifyOpenAIError(err: unknown): BackendError {
  if (err instanceof BackendError) return err;
  if (err instanceof OpenAI.RateLimitError) {
    return new BackendError('rate_limit', err.message, parseRetryAfter(err.headers));
  }
  if (err instanceof OpenAI.AuthenticationError || err instanceof OpenAI.PermissionDeniedError) {
    return new BackendError('auth', err.message);
  }
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return new BackendError('timeout', err.message);
  }
  if (err instanceof OpenAI.APIError) {
    return new BackendError('network', err.message);
  }
  return new BackendError('network', err instanceof Error ? err.message : String(err));
}

export class OpenAIGenerationBackend implements IGenerationBackend {
  private readonly model: string;
  private readonly jsonMode: boolean;
  private readonly create: ChatCompletionFn;

  constructor(opts: OpenAIGenerationBackendOptions) {
    this.model = opts.model;
    this.jsonMode = opts.jsonMode ?? true;

    if (opts.create) {
      this.create = opts.create;
    } else {
      const client = new OpenAI({
        apiKey: opts.apiKey ?? process.env.OPENAI_API_KEY,
        baseURL: opts.baseURL,
        maxRetries: 0,
      });
      this.create = (params, options) => client.chat.completions.create(params, options);
    }
  }

  async complete(request: GenerationRequest): Promise<string> {
    let completion: ChatCompletion;
    try {
      completion = await this.create(
        {
          model: this.model,
          temperature: request.temperature,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.prompt },
          ],
          response_format: this.jsonMode ? { type: 'json_object' } : undefined,
        },
        { signal: request.signal }
      );
    } catch (err) {
      throw classifyOpenAIError(err);
    }

    const choice = completion.choices[0];
    if (!choice) {
      throw new BackendError('malformed', 'Completion contained no choices');
    }
    return choice.message.content ?? '';
  }
}
