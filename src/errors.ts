/**
 * Application error hierarchy.
 * Recoverable pipeline failures travel as data (results and outcomes);
 * these classes cover the cases that have to surface as exceptions or
 * as typed errors inside a result.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid or incomplete configuration. */
export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIG_ERROR', message, details);
  }
}

export type BackendErrorKind = 'timeout' | 'rate_limit' | 'network' | 'malformed' | 'auth';

export const BACKEND_ERROR_KINDS: readonly BackendErrorKind[] = [
  'timeout',
  'rate_limit',
  'network',
  'malformed',
  'auth',
];

/** A single failed request to a generation backend. */
export class BackendError extends AppError {
  constructor(
    readonly kind: BackendErrorKind,
    message: string,
    readonly retryAfterMs?: number
  ) {
    super(
      'BACKEND_ERROR',
      message,
      retryAfterMs !== undefined ? { kind, retryAfterMs } : { kind }
    );
  }
}

/** Every backend in the pool is permanently out of rotation. */
export class BackendsUnavailableError extends AppError {
  constructor(backendIds: string[]) {
    super(
      'BACKENDS_UNAVAILABLE',
      `No generation backend is available (unavailable: ${backendIds.join(', ') || 'none configured'})`,
      { backendIds }
    );
  }
}

/**
 * A record reached a stage whose preconditions it does not meet.
 * Always a defect upstream, never a user-facing condition.
 */
export class ContractViolationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONTRACT_VIOLATION', message, details);
  }
}

export class PersistenceError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PERSISTENCE_ERROR', message, details);
  }
}
