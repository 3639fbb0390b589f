import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AxiomLogProvider } from '../../src/providers/AxiomLogProvider.js';

// We mock global fetch for all tests.
const mockFetch = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

function sentBody(call: number): Array<Record<string, unknown>> {
  return JSON.parse(String(mockFetch.mock.calls[call]?.[1]?.body));
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
  });

  // --- flush() ---

  it('should send buffered events to the dataset ingest endpoint', async () => {
    provider.info('one');
    provider.warn('two', { queryId: 'q-1' });
    await provider.flush();

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(url).toBe('https://api.axiom.co/v1/datasets/test-dataset/ingest');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-token',
    });

    const body = sentBody(0);
    expect(body).toHaveLength(2);
    expect(body[0]).toMatchObject({ level: 'info', message: 'one' });
    expect(body[1]).toMatchObject({ level: 'warn', message: 'two', queryId: 'q-1' });
    expect(body[0]?._time).toEqual(expect.any(String));
    expect(body[0]).not.toHaveProperty('fields');
  });

  it('should flatten resolution event properties into columns', async () => {
    provider.log({
      level: 'info',
      message: 'Query resolved',
      timestamp: '2026-01-20T00:00:00.000Z',
      fields: { state: 'RESOLVED' },
      ...{ queryId: 'q-7', tier: 'cache', confidence: 0.95, lowConfidence: false, durationMs: 12 },
    });
    await provider.flush();

    expect(sentBody(0)[0]).toEqual({
      _time: '2026-01-20T00:00:00.000Z',
      level: 'info',
      message: 'Query resolved',
      queryId: 'q-7',
      tier: 'cache',
      confidence: 0.95,
      lowConfidence: false,
      durationMs: 12,
      state: 'RESOLVED',
    });
  });

  it('should attach base fields to every event', async () => {
    const withBase = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      flushIntervalMs: 0,
      baseFields: { service: 'resolver' },
    });
    withBase.info('started', { rulesVersion: 'v1' });
    await withBase.flush();

    expect(sentBody(0)[0]).toMatchObject({ service: 'resolver', rulesVersion: 'v1' });
    await withBase.dispose();
  });

  it('should not call fetch when buffer is empty', async () => {
    await provider.flush();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should clear buffer after successful flush', async () => {
    provider.info('event');
    await provider.flush();
    await provider.flush();
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('should share one request between concurrent flushes', async () => {
    provider.info('event');
    await Promise.all([provider.flush(), provider.flush()]);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  // --- auto-flush on threshold ---

  it('should auto-flush when buffer reaches threshold', async () => {
    provider.info('1');
    provider.info('2');
    provider.info('3');
    provider.info('4');
    expect(mockFetch).not.toHaveBeenCalled();

    provider.info('5');
    await new Promise((r) => setTimeout(r, 10));
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(sentBody(0)).toHaveLength(5);
  });

  // --- level filter ---

  it('should drop events below the minimum level', async () => {
    const quiet = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      flushIntervalMs: 0,
      minLevel: 'warn',
    });
    quiet.debug('d');
    quiet.info('i');
    quiet.warn('w');
    await quiet.flush();

    expect(sentBody(0).map((e) => e.level)).toEqual(['warn']);
    await quiet.dispose();
  });

  // --- error resilience ---

  it('should not throw when Axiom returns an error', async () => {
    mockFetch.mockResolvedValueOnce(new Response('Server Error', { status: 500 }));
    provider.error('bad');
    await expect(provider.flush()).resolves.toBeUndefined();
  });

  it('should retain events when flush fails so they can be retried', async () => {
    mockFetch.mockRejectedValueOnce(new Error('Network down'));
    provider.info('important');
    await provider.flush();
    expect(mockFetch).toHaveBeenCalledTimes(1);

    await provider.flush();
    expect(mockFetch).toHaveBeenCalledTimes(2);
    const body = sentBody(1);
    expect(body).toHaveLength(1);
    expect(body[0]?.message).toBe('important');
  });

  it('should keep only the newest events beyond maxBufferedEvents', async () => {
    const bounded = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      flushIntervalMs: 0,
      flushThreshold: 100,
      maxBufferedEvents: 2,
    });
    bounded.info('a');
    bounded.info('b');
    bounded.info('c');
    await bounded.flush();

    expect(sentBody(0).map((e) => e.message)).toEqual(['b', 'c']);
    await bounded.dispose();
  });

  // --- child loggers ---

  it('should merge bound fields from child loggers', async () => {
    provider.child({ queryId: 'q-9' }).warn('slow', { tier: 'general' });
    await provider.flush();

    expect(sentBody(0)[0]).toMatchObject({ message: 'slow', queryId: 'q-9', tier: 'general' });
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
    await disabled.dispose();
  });
});
