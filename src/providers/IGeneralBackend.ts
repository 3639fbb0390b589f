/**
 * General generative backend: the last-resort tier.
 * Receives a fully assembled prompt and always answers with an artifact.
 */

export interface IGeneralBackend {
  readonly name: string;

  generate(prompt: string, signal?: AbortSignal): Promise<string>;
}
