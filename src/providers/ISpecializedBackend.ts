/**
 * Specialized backend: a generator trained on this domain's schema and
 * question/artifact pairs. Reports its own confidence.
 */

import type { SchemaContext } from './ISchemaContextProvider.js';

export interface SpecializedResult {
  artifact: string;
  /** Backend-reported score; the router calibrates it into [0,1]. */
  confidence: number;
}

export interface ISpecializedBackend {
  readonly name: string;

  generate(
    question: string,
    schema: SchemaContext,
    signal?: AbortSignal
  ): Promise<SpecializedResult>;
}
