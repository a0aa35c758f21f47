export * from './services/extraction';
export { loadConfig, getConfig, clearConfigCache, DEFAULT_SEMANTIC_MODELS } from './config';
export type { ExtractionConfig, SemanticConfig, ModelFallbackPolicy, ColumnConvention } from './config';
export {
  ExtractionError,
  DocumentReadError,
  ConfigurationError,
  SemanticServiceError,
  isExtractionError,
} from './errors';
export type { ProblemDetail, SemanticFailureKind } from './errors';
export { logger, createContextLogger } from './logger';
