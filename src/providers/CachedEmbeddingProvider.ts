/**
 * LRU cache in front of an embedding provider, keyed by a SHA-256 of the
 * text. Concurrent requests for the same text share one upstream call,
 * which runs under its own signal: a caller that aborts only stops waiting,
 * and the upstream call is aborted once no caller is left.
 */

import { createHash } from 'node:crypto';
import type { IEmbeddingProvider } from './IEmbeddingProvider.js';

export interface EmbeddingCacheStats {
  size: number;
  hits: number;
  misses: number;
}

interface SharedRequest {
  promise: Promise<number[]>;
  controller: AbortController;
  waiters: number;
}

export class CachedEmbeddingProvider implements IEmbeddingProvider {
  readonly dimensions: number;

  // Map iteration order doubles as recency order: oldest first.
  private readonly cache = new Map<string, number[]>();
  private readonly inFlight = new Map<string, SharedRequest>();
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly inner: IEmbeddingProvider,
    private readonly maxEntries = 1000
  ) {
    this.dimensions = inner.dimensions;
  }

  async generate(text: string, signal?: AbortSignal): Promise<number[]> {
    const key = cacheKey(text);

    const cached = this.cache.get(key);
    if (cached) {
      this.hits++;
      this.cache.delete(key);
      this.cache.set(key, cached);
      return cached;
    }

    if (signal?.aborted) throw abortReason(signal);

    let shared = this.inFlight.get(key);
    if (shared) {
      this.hits++;
    } else {
      this.misses++;
      shared = this.startRequest(key, text);
    }
    return this.wait(key, shared, signal);
  }

  async generateBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const resolved = new Map<string, number[]>();
    const missing: string[] = [];

    for (const text of texts) {
      const key = cacheKey(text);
      if (resolved.has(key)) continue;
      const cached = this.cache.get(key);
      if (cached) {
        this.hits++;
        resolved.set(key, cached);
      } else if (!missing.some((m) => cacheKey(m) === key)) {
        missing.push(text);
      }
    }

    if (missing.length > 0) {
      this.misses += missing.length;
      const fresh = await this.inner.generateBatch(missing, signal);
      missing.forEach((text, i) => {
        const key = cacheKey(text);
        resolved.set(key, fresh[i]);
        this.remember(key, fresh[i]);
      });
    }

    return texts.map((text) => resolved.get(cacheKey(text)) ?? []);
  }

  stats(): EmbeddingCacheStats {
    return { size: this.cache.size, hits: this.hits, misses: this.misses };
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  private startRequest(key: string, text: string): SharedRequest {
    const controller = new AbortController();
    const release = () => {
      if (this.inFlight.get(key)?.controller === controller) this.inFlight.delete(key);
    };
    const promise = this.inner.generate(text, controller.signal).then(
      (embedding) => {
        release();
        this.remember(key, embedding);
        return embedding;
      },
      (err: unknown) => {
        release();
        throw err;
      }
    );
    const shared: SharedRequest = { promise, controller, waiters: 0 };
    this.inFlight.set(key, shared);
    return shared;
  }

  private wait(key: string, shared: SharedRequest, signal?: AbortSignal): Promise<number[]> {
    shared.waiters++;
    if (!signal) return shared.promise;

    return new Promise<number[]>((resolve, reject) => {
      const onAbort = () => {
        shared.waiters--;
        if (shared.waiters === 0) {
          if (this.inFlight.get(key) === shared) this.inFlight.delete(key);
          shared.controller.abort();
        }
        reject(abortReason(signal));
      };
      signal.addEventListener('abort', onAbort, { once: true });
      shared.promise.then(
        (embedding) => {
          signal.removeEventListener('abort', onAbort);
          resolve(embedding);
        },
        (err: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        }
      );
    });
  }

  private remember(key: string, embedding: number[]): void {
    if (this.maxEntries === 0) return;
    this.cache.set(key, embedding);
    while (this.cache.size > this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error('Embedding request aborted');
}

function cacheKey(text: string): string {
  return createHash('sha256').update(text.trim()).digest('hex');
}
