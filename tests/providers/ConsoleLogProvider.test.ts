import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { ResolutionLogEvent } from '../../src/providers/ILogProvider.js';

describe('ConsoleLogProvider', () => {
  let provider: ConsoleLogProvider;

  beforeEach(() => {
    provider = new ConsoleLogProvider();
  });

  // --- log() ---

  it('should auto-set an ISO timestamp if omitted', () => {
    provider.log({ level: 'info', message: 'no ts' });
    const ts = provider.events[0]?.timestamp;
    expect(ts).toEqual(expect.any(String));
    expect(new Date(String(ts)).toISOString()).toBe(ts);
  });

  it('should preserve provided timestamp and fields', () => {
    provider.log({
      level: 'warn',
      message: 'with ts',
      timestamp: '2026-01-15T12:00:00.000Z',
      fields: { tier: 'general' },
    });
    expect(provider.events[0]).toEqual({
      level: 'warn',
      message: 'with ts',
      timestamp: '2026-01-15T12:00:00.000Z',
      fields: { tier: 'general' },
    });
  });

  it('should keep the extra properties of a resolution event', () => {
    const event: ResolutionLogEvent = {
      level: 'info',
      message: 'Query resolved',
      queryId: 'q-1',
      tier: 'cache',
      confidence: 0.97,
      lowConfidence: false,
      durationMs: 4,
    };
    provider.log(event);
    expect(provider.events[0]).toMatchObject({ queryId: 'q-1', tier: 'cache', durationMs: 4 });
  });

  // --- convenience methods ---

  it('should log each convenience method at its own level', () => {
    provider.info('i');
    provider.warn('w', { detail: 'x' });
    provider.error('e');
    provider.debug('d');
    expect(provider.events.map((e) => e.level)).toEqual(['info', 'warn', 'error', 'debug']);
    expect(provider.events[1]?.fields).toEqual({ detail: 'x' });
  });

  // --- filtering and retention ---

  it('should drop events below minLevel', () => {
    const quiet = new ConsoleLogProvider({ minLevel: 'warn' });
    quiet.debug('d');
    quiet.info('i');
    quiet.error('e');
    expect(quiet.events.map((e) => e.message)).toEqual(['e']);
  });

  it('should keep at most maxBufferedEvents, newest last', () => {
    const bounded = new ConsoleLogProvider({ maxBufferedEvents: 2 });
    bounded.info('one');
    bounded.info('two');
    bounded.info('three');
    expect(bounded.events.map((e) => e.message)).toEqual(['two', 'three']);
  });

  // --- child() ---

  it('should merge bound fields into child events, event fields winning', () => {
    const child = provider.child({ queryId: 'q-2', tier: 'cache' });
    child.info('hit', { tier: 'specialized' });
    expect(provider.events[0]?.fields).toEqual({ queryId: 'q-2', tier: 'specialized' });
  });

  it('should nest child loggers', () => {
    provider.child({ a: 1 }).child({ b: 2 }).warn('nested');
    expect(provider.events[0]).toMatchObject({ level: 'warn', fields: { a: 1, b: 2 } });
  });

  // --- flush() ---

  it('flush() should resolve immediately', async () => {
    provider.info('test');
    await expect(provider.flush()).resolves.toBeUndefined();
  });

  // --- console output ---

  it('should write level, message and fields to console when enabled', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const loud = new ConsoleLogProvider({ outputToConsole: true });
    loud.info('hello console', { queryId: 'q-3' });
    expect(spy).toHaveBeenCalledWith('[INFO] hello console {"queryId":"q-3"}');
    spy.mockRestore();
  });

  it('should not write to console by default', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    provider.info('silent');
    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });

  // --- clear() ---

  it('clear() should empty the events buffer', () => {
    provider.info('one');
    provider.clear();
    expect(provider.events).toHaveLength(0);
  });
});
