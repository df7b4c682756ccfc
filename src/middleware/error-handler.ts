/**
 * Error handler middleware.
 * Catches errors thrown by backends and turns them into failed results.
 * BackendError instances keep their kind; anything else counts as a network failure.
 */

import { BackendError } from '../errors.js';
import type { Handler } from './pipeline.js';

export function toBackendError(err: unknown): BackendError {
  if (err instanceof BackendError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new BackendError('network', message);
}

export function errorHandler(next: Handler): Handler {
  return async (ctx) => {
    try {
      return await next(ctx);
    } catch (err) {
      return { ok: false, error: toBackendError(err), backendId: ctx.lease.id };
    }
  };
}
