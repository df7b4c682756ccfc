/**
 * Timeout middleware.
 * Gives each call its own abort signal, linked to the caller's, and resolves
 * with a `timeout` failure when the deadline passes first.
 */

import { BackendError } from '../errors.js';
import type { GenerationResult, Middleware } from './pipeline.js';

export function createTimeoutMiddleware(timeoutMs: number): Middleware {
  return (next) => {
    return async (ctx) => {
      const controller = new AbortController();
      const forward = () => controller.abort(ctx.signal.reason);
      if (ctx.signal.aborted) forward();
      else ctx.signal.addEventListener('abort', forward, { once: true });

      let timer: ReturnType<typeof setTimeout> | undefined;
      const deadline = new Promise<GenerationResult>((resolve) => {
        timer = setTimeout(() => {
          controller.abort();
          resolve({
            ok: false,
            error: new BackendError('timeout', `No response within ${timeoutMs}ms`),
            backendId: ctx.lease.id,
          });
        }, timeoutMs);
      });

      try {
        return await Promise.race([next({ ...ctx, signal: controller.signal }), deadline]);
      } finally {
        clearTimeout(timer);
        ctx.signal.removeEventListener('abort', forward);
      }
    };
  };
}
