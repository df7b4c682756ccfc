/**
 * Generation logging middleware.
 * Captures task, backend, variant, outcome and duration for every call.
 * Logs are sent to the configured ILogProvider (Axiom, console, etc).
 *
 * Level mapping:
 *   ok                        → info
 *   timeout / rate_limit      → warn
 *   other backend errors      → error
 *   handler exception         → error (re-thrown)
 */

import type { BackendErrorKind } from '../errors.js';
import type { GenerationLogEvent, ILogProvider, LogLevel } from '../providers/ILogProvider.js';
import type { Handler, Middleware } from './pipeline.js';

function levelForKind(kind: BackendErrorKind): LogLevel {
  return kind === 'timeout' || kind === 'rate_limit' ? 'warn' : 'error';
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (ctx) => {
      const start = performance.now();
      const base = {
        taskId: ctx.task.id,
        backendId: ctx.lease.id,
        model: ctx.lease.model,
        variant: ctx.task.variant,
      };

      try {
        const result = await next(ctx);
        const durationMs = Math.round(performance.now() - start);
        const outcome = result.ok ? 'ok' : result.error.kind;

        const event: GenerationLogEvent = {
          level: result.ok ? 'info' : levelForKind(result.error.kind),
          message: `${ctx.task.id} ${ctx.lease.id} → ${outcome} (${durationMs}ms)`,
          ...base,
          outcome,
          durationMs,
          ...(!result.ok && { fields: { error: result.error.message } }),
        };

        logProvider.log(event);
        return result;
      } catch (err) {
        const durationMs = Math.round(performance.now() - start);

        const event: GenerationLogEvent = {
          level: 'error',
          message: `${ctx.task.id} ${ctx.lease.id} → exception (${durationMs}ms)`,
          ...base,
          outcome: 'exception',
          durationMs,
          fields: {
            error: err instanceof Error ? err.message : String(err),
          },
        };

        logProvider.log(event);
        throw err;
      }
    };
  };
}
