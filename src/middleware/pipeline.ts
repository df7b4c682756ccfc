/**
 * Composable middleware pipeline for generation calls.
 * Middleware wraps handlers in order (left to right), forming an onion model.
 */

import type { BackendError } from '../errors.js';
import type { BackendLease } from '../services/BackendPool.js';
import type { GenerationTask } from '../types/models.js';

export interface GenerationContext {
  task: GenerationTask;
  lease: BackendLease;
  system: string;
  prompt: string;
  temperature: number;
  /** Aborts the outbound request; inner middleware may narrow it. */
  signal: AbortSignal;
}

export type GenerationResult =
  | { ok: true; raw: string; backendId: string }
  | { ok: false; error: BackendError; backendId: string };

export type Handler = (ctx: GenerationContext) => Promise<GenerationResult>;
export type Middleware = (next: Handler) => Handler;

/**
 * Compose middleware into a function that wraps a handler.
 * Middleware is applied left-to-right:
 *   pipeline(logging, errorHandler)(handler)
 *   → logging wraps (errorHandler wraps handler)
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler => {
    return middlewares.reduceRight<Handler>(
      (next, mw) => mw(next),
      handler
    );
  };
}
