/**
 * Specialized backend reached over HTTP.
 * Posts the question and schema to a text-to-query service and validates
 * the JSON answer over native fetch.
 */

import { z } from 'zod';
import type { ISpecializedBackend, SpecializedResult } from './ISpecializedBackend.js';
import type { SchemaContext } from './ISchemaContextProvider.js';
import { BackendError } from '../errors.js';

const ResponseSchema = z.object({
  artifact: z.string(),
  confidence: z.number(),
});

export class HttpSpecializedBackend implements ISpecializedBackend {
  readonly name = 'specialized';
  private readonly url: string;
  private readonly apiKey: string;

  constructor(opts?: { url?: string; apiKey?: string }) {
    this.url = opts?.url ?? process.env.SPECIALIZED_BACKEND_URL ?? '';
    this.apiKey = opts?.apiKey ?? process.env.SPECIALIZED_BACKEND_API_KEY ?? '';
  }

  async generate(
    question: string,
    schema: SchemaContext,
    signal?: AbortSignal
  ): Promise<SpecializedResult> {
    if (!this.url) {
      throw new BackendError(this.name, 'no endpoint configured');
    }

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const res = await fetch(this.url, {
      method: 'POST',
      headers,
      body: JSON.stringify({ question, schema }),
      signal,
    });

    if (!res.ok) {
      const detail = await res.text().catch(() => '');
      throw new BackendError(this.name, `HTTP ${res.status}${detail ? `: ${detail}` : ''}`);
    }

    const parsed = ResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new BackendError(this.name, 'malformed response', parsed.error);
    }
    return parsed.data;
  }
}
