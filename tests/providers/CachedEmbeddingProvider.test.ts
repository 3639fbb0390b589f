import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CachedEmbeddingProvider } from '../../src/providers/CachedEmbeddingProvider.js';
import { MockEmbeddingProvider } from '../mocks/MockEmbeddingProvider.js';

describe('CachedEmbeddingProvider', () => {
  let inner: MockEmbeddingProvider;
  let cached: CachedEmbeddingProvider;

  beforeEach(() => {
    inner = new MockEmbeddingProvider();
    cached = new CachedEmbeddingProvider(inner, 2);
  });

  it('should expose the inner dimensions', () => {
    expect(cached.dimensions).toBe(64);
  });

  it('should call the inner provider once per distinct text', async () => {
    const first = await cached.generate('List all staff');
    const second = await cached.generate('List all staff');

    expect(second).toEqual(first);
    expect(inner.callCount).toBe(1);
    expect(cached.stats()).toEqual({ size: 1, hits: 1, misses: 1 });
  });

  it('should key on trimmed text', async () => {
    await cached.generate('List all staff');
    await cached.generate('  List all staff  ');
    expect(inner.callCount).toBe(1);
  });

  it('should share one in-flight request between concurrent callers', async () => {
    inner.delayMs = 5;
    const [a, b] = await Promise.all([cached.generate('drops'), cached.generate('drops')]);

    expect(a).toEqual(b);
    expect(inner.callCount).toBe(1);
  });

  it('should keep serving other callers when one caller aborts', async () => {
    inner.delayMs = 100;
    const impatient = new AbortController();
    setTimeout(() => impatient.abort(new Error('caller gave up')), 20);

    const first = cached.generate('drops', impatient.signal);
    const second = cached.generate('drops');

    await expect(first).rejects.toThrow('caller gave up');
    await expect(second).resolves.toEqual(inner.vectorFor('drops'));
    expect(inner.callCount).toBe(1);
    expect(cached.stats().size).toBe(1);
  });

  it('should abort the upstream call once every caller has aborted', async () => {
    const spy = vi.spyOn(inner, 'generate');
    inner.delayMs = 100;
    const a = new AbortController();
    const b = new AbortController();

    const first = cached.generate('drops', a.signal);
    const second = cached.generate('drops', b.signal);
    a.abort(new Error('a gave up'));
    expect(spy.mock.calls[0]?.[1]?.aborted).toBe(false);
    b.abort(new Error('b gave up'));

    await expect(first).rejects.toThrow('a gave up');
    await expect(second).rejects.toThrow('b gave up');
    expect(spy.mock.calls[0]?.[1]?.aborted).toBe(true);

    inner.delayMs = 0;
    await expect(cached.generate('drops')).resolves.toHaveLength(64);
    expect(inner.callCount).toBe(2);
  });

  it('should reject at once for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new Error('too late'));

    await expect(cached.generate('drops', controller.signal)).rejects.toThrow('too late');
    expect(inner.callCount).toBe(0);
  });

  it('should evict the least recently used entry', async () => {
    await cached.generate('a');
    await cached.generate('b');
    await cached.generate('a'); // a is now most recent
    await cached.generate('c'); // evicts b

    inner.resetCallCount();
    await cached.generate('a');
    expect(inner.callCount).toBe(0);
    await cached.generate('b');
    expect(inner.callCount).toBe(1);
  });

  it('should not cache failures', async () => {
    inner.failWith = new Error('provider down');
    await expect(cached.generate('x')).rejects.toThrow('provider down');

    inner.failWith = null;
    await expect(cached.generate('x')).resolves.toHaveLength(64);
    expect(cached.stats().misses).toBe(2);
  });

  it('should fetch only uncached texts in a batch, preserving order', async () => {
    const a = await cached.generate('a');
    inner.resetCallCount();

    const result = await cached.generateBatch(['b', 'a', 'b']);

    expect(inner.callCount).toBe(1);
    expect(result[1]).toEqual(a);
    expect(result[0]).toEqual(inner.vectorFor('b'));
    expect(result[2]).toEqual(result[0]);
  });

  it('clear() should drop entries and statistics', async () => {
    await cached.generate('a');
    cached.clear();
    expect(cached.stats()).toEqual({ size: 0, hits: 0, misses: 0 });
  });
});
