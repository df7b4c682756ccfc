import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AxiomLogProvider } from '../../src/providers/AxiomLogProvider.js';

// We mock global fetch for all tests.
const mockFetch = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

function sentBatch(call: number): Array<Record<string, unknown>> {
  return JSON.parse(String(mockFetch.mock.calls[call][1]?.body));
}

describe('AxiomLogProvider', () => {
  let provider: AxiomLogProvider;

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    mockFetch.mockResolvedValue(new Response(null, { status: 200 }));
    provider = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      // Low thresholds for testing
      flushIntervalMs: 60_000,
      flushThreshold: 5,
    });
  });

  afterEach(async () => {
    await provider.dispose();
    vi.unstubAllGlobals();
  });

  // --- buffering ---

  it('should buffer events without sending until flush', () => {
    provider.info('hello');
    provider.warn('world');
    expect(mockFetch).not.toHaveBeenCalled();
    expect(provider.pending).toBe(2);
  });

  // --- flush() ---

  it('should send buffered events to Axiom on flush', async () => {
    provider.info('one');
    provider.warn('two', { backendId: 'a' });
    await provider.flush();

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://api.axiom.co/v1/datasets/test-dataset/ingest');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-token',
    });

    const body = sentBatch(0);
    expect(body).toHaveLength(2);
    expect(body[0]).toMatchObject({ level: 'info', message: 'one' });
    expect(body[1]).toMatchObject({ level: 'warn', message: 'two', fields: { backendId: 'a' } });
    expect(body[0].timestamp).toBeDefined();
    expect(body[1].timestamp).toBeDefined();
  });

  it('should not call fetch when buffer is empty', async () => {
    await provider.flush();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should clear buffer after successful flush', async () => {
    provider.info('event');
    await provider.flush();
    expect(provider.pending).toBe(0);

    await provider.flush();
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  // --- auto-flush on threshold ---

  it('should auto-flush when buffer reaches threshold', async () => {
    provider.info('1');
    provider.info('2');
    provider.info('3');
    provider.info('4');
    expect(mockFetch).not.toHaveBeenCalled();

    provider.info('5'); // hits threshold
    await new Promise((r) => setTimeout(r, 10));
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(sentBatch(0)).toHaveLength(5);
  });

  // --- error resilience ---

  it('should record the status when Axiom returns an error', async () => {
    mockFetch.mockResolvedValueOnce(new Response('Server Error', { status: 500 }));
    provider.error('bad');

    await expect(provider.flush()).resolves.toBeUndefined();
    expect(provider.lastFlushError).toBe('Axiom ingest returned 500');
    expect(provider.pending).toBe(1);
  });

  it('should record the cause when fetch itself rejects', async () => {
    mockFetch.mockRejectedValueOnce(new Error('Network down'));
    provider.error('bad');

    await expect(provider.flush()).resolves.toBeUndefined();
    expect(provider.lastFlushError).toBe('Network down');
  });

  it('should retain events when flush fails so they can be retried', async () => {
    mockFetch.mockRejectedValueOnce(new Error('Network down'));
    provider.info('important');
    await provider.flush();

    await provider.flush();
    expect(mockFetch).toHaveBeenCalledTimes(2);
    const body = sentBatch(1);
    expect(body).toHaveLength(1);
    expect(body[0].message).toBe('important');
    expect(provider.lastFlushError).toBeNull();
  });

  // --- buffer bound ---

  it('should drop the oldest events beyond maxBufferSize', async () => {
    const bounded = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      flushIntervalMs: 0,
      flushThreshold: 100,
      maxBufferSize: 3,
    });
    for (const n of [1, 2, 3, 4, 5]) bounded.info(`event ${n}`);

    expect(bounded.pending).toBe(3);
    expect(bounded.dropped).toBe(2);

    await bounded.flush();
    expect(sentBatch(0).map((e) => e.message)).toEqual(['event 3', 'event 4', 'event 5']);
    await bounded.dispose();
  });

  it('should keep counting drops while Axiom is unreachable', async () => {
    mockFetch.mockRejectedValue(new Error('Network down'));
    const bounded = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      flushIntervalMs: 0,
      flushThreshold: 100,
      maxBufferSize: 2,
    });
    for (const n of [1, 2, 3]) bounded.info(`event ${n}`);
    await bounded.flush();
    bounded.info('event 4');

    expect(bounded.lastFlushError).toBe('Network down');
    expect(bounded.dropped).toBe(2);
    expect(bounded.pending).toBe(2);

    mockFetch.mockResolvedValue(new Response(null, { status: 200 }));
    await bounded.dispose();
    expect(sentBatch(1).map((e) => e.message)).toEqual(['event 3', 'event 4']);
    expect(bounded.lastFlushError).toBeNull();
    expect(bounded.pending).toBe(0);
  });

  it('should stop the interval flush once disposed', async () => {
    vi.useFakeTimers();
    const options = { apiToken: 'test-token', dataset: 'test-dataset', flushIntervalMs: 1_000, flushThreshold: 100 };
    const active = new AxiomLogProvider(options);
    const disposed = new AxiomLogProvider(options);
    try {
      await disposed.dispose();
      disposed.info('after dispose');
      active.info('on timer');

      await vi.advanceTimersByTimeAsync(1_000);

      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(sentBatch(0).map((e) => e.message)).toEqual(['on timer']);
      expect(disposed.pending).toBe(1);
    } finally {
      await active.dispose();
      vi.useRealTimers();
    }
  });

  // --- convenience methods ---

  it('info/warn/error/debug should log at correct levels', async () => {
    provider.info('i');
    provider.warn('w');
    provider.error('e');
    provider.debug('d');
    await provider.flush();

    expect(sentBatch(0).map((e) => e.level)).toEqual(['info', 'warn', 'error', 'debug']);
  });

  it('should accept a full LogEvent with custom timestamp and fields', async () => {
    const ts = '2026-01-20T00:00:00.000Z';
    provider.log({ level: 'warn', message: 'custom', timestamp: ts, fields: { x: 1 } });
    await provider.flush();

    expect(sentBatch(0)[0]).toMatchObject({
      level: 'warn',
      message: 'custom',
      timestamp: ts,
      fields: { x: 1 },
    });
  });

  // --- dispose ---

  it('dispose() should flush remaining events', async () => {
    provider.info('final');
    await provider.dispose();
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  // --- disabled mode (no token) ---

  it('should silently no-op when apiToken is empty', async () => {
    const disabled = new AxiomLogProvider({ apiToken: '', dataset: 'x' });
    disabled.info('ignored');
    await disabled.flush();
    expect(mockFetch).not.toHaveBeenCalled();
    expect(disabled.pending).toBe(0);
    await disabled.dispose();
  });
});
