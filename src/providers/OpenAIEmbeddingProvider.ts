/**
 * OpenAI embedding provider.
 * Wraps the OpenAI API for text-embedding-3-small (1536 dimensions).
 */

import OpenAI from 'openai';
import type { IEmbeddingProvider } from './IEmbeddingProvider.js';
import { EmbeddingDimensionError } from '../errors.js';

const DEFAULT_MODEL = 'text-embedding-3-small';
const DEFAULT_DIMENSIONS = 1536;

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  private client: OpenAI;
  private model: string;
  readonly dimensions: number;

  constructor(opts?: {
    apiKey?: string;
    model?: string;
    dimensions?: number;
    client?: OpenAI;
  }) {
    this.client =
      opts?.client ??
      new OpenAI({
        apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
        maxRetries: 0, // the router owns retry policy
      });
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.dimensions = opts?.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async generate(text: string, signal?: AbortSignal): Promise<number[]> {
    const [embedding] = await this.generateBatch([text], signal);
    if (!embedding) throw new Error('OpenAI returned no embedding');
    return embedding;
  }

  async generateBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await this.client.embeddings.create(
      {
        model: this.model,
        input: texts,
        dimensions: this.dimensions,
      },
      { signal }
    );

    // OpenAI returns embeddings in the same order as input
    return response.data
      .sort((a, b) => a.index - b.index)
      .map((d) => {
        if (d.embedding.length !== this.dimensions) {
          throw new EmbeddingDimensionError(this.dimensions, d.embedding.length);
        }
        return d.embedding;
      });
  }
}
