import { z } from 'zod';
import { ConfigurationError } from './errors';

export const DEFAULT_SEMANTIC_MODELS = [
  'claude-sonnet-4-20250514',
  'claude-3-7-sonnet-20250219',
  'claude-3-5-haiku-20241022',
];

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const envSchema = z.object({
  NODE_ENV: z.preprocess(emptyAsUndefined, z.enum(['development', 'production', 'test']).default('development')),
  ANTHROPIC_API_KEY: z.preprocess(emptyAsUndefined, z.string().optional()),
  ENABLE_SEMANTIC_FALLBACK: z.preprocess(
    emptyAsUndefined,
    z.enum(['true', 'false']).default('true').transform(v => v === 'true')
  ),
  SEMANTIC_MODELS: z.preprocess(
    emptyAsUndefined,
    z.string()
      .transform(v => v.split(',').map(m => m.trim()).filter(m => m.length > 0))
      .pipe(z.array(z.string()).min(1, 'at least one model is required'))
      .optional()
  ),
  SEMANTIC_MAX_ATTEMPTS: z.preprocess(emptyAsUndefined, z.coerce.number().int().min(1).max(10).default(3)),
  SEMANTIC_TIMEOUT_MS: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(60000)),
  SEMANTIC_MAX_CHARS: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(50000)),
  SEMANTIC_MAX_TOKENS: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(2048)),
  VALIDATION_TOLERANCE: z.preprocess(emptyAsUndefined, z.coerce.number().nonnegative().default(100)),
  EXTRACTION_CONCURRENCY: z.preprocess(emptyAsUndefined, z.coerce.number().int().min(1).max(16).default(2)),
  COLUMN_CONVENTION: z.preprocess(emptyAsUndefined, z.enum(['leftmost', 'none']).default('leftmost')),
});

export type ColumnConvention = 'leftmost' | 'none';

export interface ModelFallbackPolicy {
  models: readonly string[];
  maxAttempts: number;
}

export interface SemanticConfig {
  enabled: boolean;
  apiKey: string | null;
  policy: ModelFallbackPolicy;
  timeoutMs: number;
  maxChars: number;
  maxTokens: number;
}

export interface ExtractionConfig {
  environment: 'development' | 'production' | 'test';
  semantic: SemanticConfig;
  validationTolerance: number;
  concurrency: number;
  columnConvention: ColumnConvention;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExtractionConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw ConfigurationError.fromZodError(parsed.error, 'Environment configuration');
  }
  const values = parsed.data;
  const apiKey = values.ANTHROPIC_API_KEY ?? null;

  return {
    environment: values.NODE_ENV,
    semantic: {
      enabled: values.ENABLE_SEMANTIC_FALLBACK && apiKey !== null,
      apiKey,
      policy: {
        models: values.SEMANTIC_MODELS ?? DEFAULT_SEMANTIC_MODELS,
        maxAttempts: values.SEMANTIC_MAX_ATTEMPTS,
      },
      timeoutMs: values.SEMANTIC_TIMEOUT_MS,
      maxChars: values.SEMANTIC_MAX_CHARS,
      maxTokens: values.SEMANTIC_MAX_TOKENS,
    },
    validationTolerance: values.VALIDATION_TOLERANCE,
    concurrency: values.EXTRACTION_CONCURRENCY,
    columnConvention: values.COLUMN_CONVENTION,
  };
}

let cachedConfig: ExtractionConfig | null = null;

export function getConfig(): ExtractionConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function clearConfigCache(): void {
  cachedConfig = null;
}
