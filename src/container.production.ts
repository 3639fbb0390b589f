/**
 * Production container: Supabase persistence, OpenAI embeddings and general
 * backend, HTTP specialized backend, Axiom logging when configured.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig } from './config.js';
import { getSupabaseClient } from './db.js';
import {
  SupabasePatternRepository,
  assertVectorDimensions,
} from './repositories/SupabasePatternRepository.js';
import { SupabaseQueryRecordRepository } from './repositories/SupabaseQueryRecordRepository.js';
import { SupabaseFeedbackRepository } from './repositories/SupabaseFeedbackRepository.js';
import { OpenAIEmbeddingProvider } from './providers/OpenAIEmbeddingProvider.js';
import { CachedEmbeddingProvider } from './providers/CachedEmbeddingProvider.js';
import { OpenAIGeneralBackend } from './providers/OpenAIGeneralBackend.js';
import { HttpSpecializedBackend } from './providers/HttpSpecializedBackend.js';
import { SupabaseSchemaContextProvider } from './providers/SupabaseSchemaContextProvider.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import { RuleTableSource } from './rules/RuleTableSource.js';

export interface ProductionContainer extends Container {
  rules: RuleTableSource;
}

let cached: Promise<ProductionContainer> | null = null;

export function getProductionContainer(): Promise<ProductionContainer> {
  cached ??= build().catch((err: unknown) => {
    cached = null;
    throw err;
  });
  return cached;
}

async function build(): Promise<ProductionContainer> {
  const hasSupabase = process.env.SUPABASE_URL && process.env.SUPABASE_SERVICE_ROLE_KEY;
  const hasOpenAI = process.env.OPENAI_API_KEY;

  if (!hasSupabase || !hasOpenAI) {
    throw new Error(
      'Missing required environment variables: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY, OPENAI_API_KEY'
    );
  }

  const config = loadConfig();
  assertVectorDimensions(config.embeddingDimensions);
  const db = getSupabaseClient();
  const logProvider = createLogProvider();

  const rules = new RuleTableSource(logProvider, process.env.RESOLVER_RULES_PATH || undefined);
  const table = await rules.load();

  const embeddingProvider = new CachedEmbeddingProvider(
    new OpenAIEmbeddingProvider({ dimensions: config.embeddingDimensions }),
    config.embeddingCacheSize
  );

  const container = createContainer({
    config,
    rules: table,
    patternRepo: new SupabasePatternRepository(db),
    queryRepo: new SupabaseQueryRecordRepository(db),
    feedbackRepo: new SupabaseFeedbackRepository(db),
    embeddingProvider,
    specializedBackend: new HttpSpecializedBackend(),
    generalBackend: new OpenAIGeneralBackend(),
    schemaContext: new SupabaseSchemaContextProvider(db),
    logProvider,
  });

  rules.watch((next) => container.classifier.setRuleTable(next));
  logProvider.info('Resolution engine started', {
    rulesVersion: table.version,
    embeddingDimensions: config.embeddingDimensions,
  });

  return {
    ...container,
    rules,
    async shutdown() {
      await rules.close();
      await container.shutdown();
    },
  };
}

/** Axiom when configured, console otherwise. */
function createLogProvider(): ILogProvider {
  const apiToken = process.env.AXIOM_API_KEY;
  const dataset = process.env.AXIOM_DATASET;
  if (apiToken && dataset) {
    return new AxiomLogProvider({
      apiToken,
      dataset,
      baseFields: { service: 'tiered-query-resolver' },
    });
  }
  return new ConsoleLogProvider({ outputToConsole: true });
}
