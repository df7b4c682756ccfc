import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import OpenAI from 'openai';
import { BackendError } from '../../src/errors.js';
import {
  OpenAIGenerationBackend,
  classifyOpenAIError,
  parseRetryAfter,
  type ChatCompletionFn,
} from '../../src/providers/OpenAIGenerationBackend.js';
import type { GenerationRequest } from '../../src/providers/IGenerationBackend.js';

type ChatCompletion = OpenAI.Chat.Completions.ChatCompletion;

function completion(content: string | null): ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 1_700_000_000,
    model: 'test-model',
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null },
      },
    ],
  };
}

function request(overrides: Partial<GenerationRequest> = {}): GenerationRequest {
  return {
    system: 'You route requests.',
    prompt: 'Write one example.',
    temperature: 0.7,
    signal: new AbortController().signal,
    ...overrides,
  };
}

describe('parseRetryAfter', () => {
  it('should prefer retry-after-ms', () => {
    expect(parseRetryAfter({ 'retry-after-ms': '1500', 'retry-after': '9' })).toBe(1500);
  });

  it('should read retry-after as seconds', () => {
    expect(parseRetryAfter({ 'retry-after': '2' })).toBe(2000);
  });

  it('should read retry-after as an HTTP date', () => {
    const now = Date.parse('2026-01-15T12:00:00.000Z');
    expect(parseRetryAfter({ 'retry-after': 'Thu, 15 Jan 2026 12:00:05 GMT' }, now)).toBe(5000);
  });

  it('should return undefined when nothing usable is present', () => {
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter({})).toBeUndefined();
    expect(parseRetryAfter({ 'retry-after': 'soon' })).toBeUndefined();
  });
});

describe('classifyOpenAIError', () => {
  it('should map rate limits with their retry hint', () => {
    const err = new OpenAI.RateLimitError(429, undefined, 'Too many requests', { 'retry-after': '3' });
    const mapped = classifyOpenAIError(err);
    expect(mapped.kind).toBe('rate_limit');
    expect(mapped.retryAfterMs).toBe(3000);
  });

  it('should map authentication and permission failures to auth', () => {
    expect(classifyOpenAIError(new OpenAI.AuthenticationError(401, undefined, 'bad key', {})).kind).toBe(
      'auth'
    );
    expect(classifyOpenAIError(new OpenAI.PermissionDeniedError(403, undefined, 'denied', {})).kind).toBe(
      'auth'
    );
  });

  it('should map connection timeouts to timeout', () => {
    expect(classifyOpenAIError(new OpenAI.APIConnectionTimeoutError()).kind).toBe('timeout');
  });

  it('should map other API errors and plain errors to network', () => {
    expect(classifyOpenAIError(new OpenAI.InternalServerError(500, undefined, 'oops', {})).kind).toBe(
      'network'
    );
    expect(classifyOpenAIError(new Error('socket closed')).kind).toBe('network');
  });

  it('should keep an existing BackendError', () => {
    const original = new BackendError('malformed', 'x');
    expect(classifyOpenAIError(original)).toBe(original);
  });
});

describe('OpenAIGenerationBackend', () => {
  let create: Mock<ChatCompletionFn>;

  beforeEach(() => {
    create = vi.fn<ChatCompletionFn>();
  });

  it('should send system and user messages with the request temperature', async () => {
    create.mockResolvedValue(completion('{"query":"x"}'));
    const backend = new OpenAIGenerationBackend({ model: 'llama-3.1-8b-instant', create });
    const signal = new AbortController().signal;

    const text = await backend.complete(request({ signal }));

    expect(text).toBe('{"query":"x"}');
    expect(create).toHaveBeenCalledTimes(1);
    const [params, options] = create.mock.calls[0];
    expect(params).toMatchObject({
      model: 'llama-3.1-8b-instant',
      temperature: 0.7,
      messages: [
        { role: 'system', content: 'You route requests.' },
        { role: 'user', content: 'Write one example.' },
      ],
      response_format: { type: 'json_object' },
    });
    expect(options.signal).toBe(signal);
  });

  it('should leave out response_format when JSON mode is off', async () => {
    create.mockResolvedValue(completion('{}'));
    const backend = new OpenAIGenerationBackend({ model: 'm', jsonMode: false, create });

    await backend.complete(request());

    expect(create.mock.calls[0][0].response_format).toBeUndefined();
  });

  it('should return an empty string for null content', async () => {
    create.mockResolvedValue(completion(null));
    const backend = new OpenAIGenerationBackend({ model: 'm', create });

    expect(await backend.complete(request())).toBe('');
  });

  it('should throw malformed when there are no choices', async () => {
    create.mockResolvedValue({ ...completion('x'), choices: [] });
    const backend = new OpenAIGenerationBackend({ model: 'm', create });

    await expect(backend.complete(request())).rejects.toMatchObject({ kind: 'malformed' });
  });

  it('should classify SDK errors into BackendErrors', async () => {
    create.mockRejectedValue(new OpenAI.RateLimitError(429, undefined, 'slow down', { 'retry-after-ms': '250' }));
    const backend = new OpenAIGenerationBackend({ model: 'm', create });

    await expect(backend.complete(request())).rejects.toMatchObject({
      kind: 'rate_limit',
      retryAfterMs: 250,
    });
  });
});
