export type { IEmbeddingProvider } from './IEmbeddingProvider.js';
export { OpenAIEmbeddingProvider } from './OpenAIEmbeddingProvider.js';
export { CachedEmbeddingProvider } from './CachedEmbeddingProvider.js';
export type { ISpecializedBackend, SpecializedResult } from './ISpecializedBackend.js';
export { HttpSpecializedBackend } from './HttpSpecializedBackend.js';
export type { IGeneralBackend } from './IGeneralBackend.js';
export { OpenAIGeneralBackend } from './OpenAIGeneralBackend.js';
export type {
  ISchemaContextProvider,
  SchemaContext,
  SchemaTable,
  SchemaColumn,
} from './ISchemaContextProvider.js';
export { SupabaseSchemaContextProvider } from './SupabaseSchemaContextProvider.js';
export type { ILogProvider, LogEvent, LogLevel, ResolutionLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
