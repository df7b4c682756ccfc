import { describe, it, expect } from 'vitest';
import { BackendError } from '../../src/errors.js';
import { errorHandler, toBackendError } from '../../src/middleware/error-handler.js';
import type { Handler } from '../../src/middleware/pipeline.js';
import { makeContext } from '../mocks/fixtures.js';

describe('toBackendError', () => {
  it('should keep a BackendError as it is', () => {
    const original = new BackendError('rate_limit', 'slow down', 2000);
    expect(toBackendError(original)).toBe(original);
  });

  it('should map other errors to a network failure', () => {
    const mapped = toBackendError(new TypeError('fetch failed'));
    expect(mapped.kind).toBe('network');
    expect(mapped.message).toBe('fetch failed');
  });

  it('should map thrown non-errors to a network failure', () => {
    const mapped = toBackendError('socket hang up');
    expect(mapped.kind).toBe('network');
    expect(mapped.message).toBe('socket hang up');
  });
});

describe('errorHandler', () => {
  it('should pass successful results through unchanged', async () => {
    const handler: Handler = async () => ({ ok: true, raw: '{}', backendId: 'backend-a' });

    const result = await errorHandler(handler)(makeContext());

    expect(result).toEqual({ ok: true, raw: '{}', backendId: 'backend-a' });
  });

  it('should turn a thrown BackendError into a failed result', async () => {
    const handler: Handler = async () => {
      throw new BackendError('auth', 'invalid api key');
    };

    const result = await errorHandler(handler)(makeContext());

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('auth');
      expect(result.error.message).toBe('invalid api key');
      expect(result.backendId).toBe('backend-a');
    }
  });

  it('should turn an unexpected error into a network failure', async () => {
    const handler: Handler = async () => {
      throw new Error('ECONNRESET');
    };

    const result = await errorHandler(handler)(makeContext());

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('network');
      expect(result.error.code).toBe('BACKEND_ERROR');
    }
  });
});
