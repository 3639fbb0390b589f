/**
 * Embedding provider interface.
 * Implementations must return vectors of exactly `dimensions` length.
 */

export interface IEmbeddingProvider {
  readonly dimensions: number;

  generate(text: string, signal?: AbortSignal): Promise<number[]>;

  generateBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}
