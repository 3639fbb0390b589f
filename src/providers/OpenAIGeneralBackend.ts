/**
 * General backend on OpenAI chat completions.
 */

import OpenAI from 'openai';
import type { IGeneralBackend } from './IGeneralBackend.js';
import { BackendError } from '../errors.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const SYSTEM_PROMPT =
  'You translate questions into a single read-only query. ' +
  'Answer with the query only, without explanations.';

export class OpenAIGeneralBackend implements IGeneralBackend {
  readonly name = 'general';
  private client: OpenAI;
  private model: string;
  private temperature: number;

  constructor(opts?: {
    apiKey?: string;
    model?: string;
    temperature?: number;
    client?: OpenAI;
  }) {
    this.client =
      opts?.client ??
      new OpenAI({
        apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
        maxRetries: 0,
      });
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.temperature = opts?.temperature ?? 0.1;
  }

  async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: this.temperature,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
      },
      { signal }
    );

    const content = completion.choices[0]?.message.content ?? '';
    const artifact = stripCodeFence(content);
    if (!artifact) {
      throw new BackendError(this.name, 'empty completion');
    }
    return artifact;
  }
}

/** Models like to wrap answers in ```sql fences; keep what is inside. */
export function stripCodeFence(text: string): string {
  const fenced = /```[a-zA-Z]*\s*([\s\S]*?)```/.exec(text);
  return (fenced ? fenced[1] : text).trim();
}
