/**
 * Generator: one outbound request per call, never retries.
 *
 * The backend call runs through the middleware pipeline:
 *   logging → errorHandler → timeout → callBackend
 * so every failure comes back as a typed BackendError result.
 */

import { BackendError } from '../errors.js';
import { pipeline, type GenerationResult, type Handler } from '../middleware/pipeline.js';
import { errorHandler } from '../middleware/error-handler.js';
import { createTimeoutMiddleware } from '../middleware/timeout.js';
import { createLoggingMiddleware } from '../middleware/logging.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { BackendLease } from './BackendPool.js';
import type { PromptBuilder } from './PromptBuilder.js';
import type { GenerationTask } from '../types/models.js';

export interface GeneratorOptions {
  timeoutMs: number;
  /** Used when the backend sets no temperature of its own. */
  temperature: number;
}

/** Innermost handler: the actual backend request. */
export const callBackend: Handler = async (ctx) => {
  const raw = await ctx.lease.backend.complete({
    system: ctx.system,
    prompt: ctx.prompt,
    temperature: ctx.temperature,
    signal: ctx.signal,
  });

  if (raw.trim() === '') {
    return {
      ok: false,
      error: new BackendError('malformed', 'Backend returned an empty response'),
      backendId: ctx.lease.id,
    };
  }
  return { ok: true, raw, backendId: ctx.lease.id };
};

export class Generator {
  private readonly handler: Handler;

  constructor(
    private readonly prompts: PromptBuilder,
    logProvider: ILogProvider,
    private readonly options: GeneratorOptions
  ) {
    this.handler = pipeline(
      createLoggingMiddleware(logProvider),
      errorHandler,
      createTimeoutMiddleware(options.timeoutMs)
    )(callBackend);
  }

  async generate(
    task: GenerationTask,
    lease: BackendLease,
    signal: AbortSignal = new AbortController().signal
  ): Promise<GenerationResult> {
    const { system, prompt } = this.prompts.build(task);
    return this.handler({
      task,
      lease,
      system,
      prompt,
      temperature: lease.temperature ?? this.options.temperature,
      signal,
    });
  }
}
