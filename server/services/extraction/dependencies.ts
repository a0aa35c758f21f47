import { v4 as uuidv4 } from 'uuid';
import { getConfig, loadConfig, type ExtractionConfig } from '../../config';
import { ClaudeTextService } from './claude-text';
import { readDocumentPages as realReadDocumentPages } from './document-reader';
import { getFieldCatalog } from './field-catalog';
import { createPatternStrategy } from './pattern-matcher';
import { createSemanticStrategy } from './semantic-extractor';
import { createStructuralStrategy } from './table-structure';
import type { ExtractionStrategy, FieldCatalog, PageText, ReportDocument } from './types';

export interface ExtractionDependencies {
  catalog: FieldCatalog;
  config: ExtractionConfig;
  readDocumentPages: (document: ReportDocument) => Promise<PageText[]>;
  // Tried in this order; never reprioritised per document.
  strategies: readonly ExtractionStrategy[];
  createRunId: () => string;
}

export function createStrategies(config: ExtractionConfig): ExtractionStrategy[] {
  const { semantic } = config;
  const service = semantic.enabled && semantic.apiKey
    ? new ClaudeTextService({ apiKey: semantic.apiKey, timeoutMs: semantic.timeoutMs })
    : null;

  return [
    createStructuralStrategy({ columnConvention: config.columnConvention }),
    createPatternStrategy(),
    createSemanticStrategy({
      service,
      policy: semantic.policy,
      timeoutMs: semantic.timeoutMs,
      maxChars: semantic.maxChars,
      maxTokens: semantic.maxTokens,
    }),
  ];
}

export function createProductionDependencies(): ExtractionDependencies {
  const config = getConfig();
  return {
    catalog: getFieldCatalog(),
    config,
    readDocumentPages: realReadDocumentPages,
    strategies: createStrategies(config),
    createRunId: uuidv4,
  };
}

let currentDependencies: ExtractionDependencies | null = null;

export function setDependencies(deps: ExtractionDependencies): void {
  currentDependencies = deps;
}

export function getDependencies(): ExtractionDependencies {
  if (!currentDependencies) {
    currentDependencies = createProductionDependencies();
  }
  return currentDependencies;
}

export function resetDependencies(): void {
  currentDependencies = null;
}

export function createTestDependencies(overrides: Partial<ExtractionDependencies> = {}): ExtractionDependencies {
  const config = loadConfig({ NODE_ENV: 'test' });
  const defaults: ExtractionDependencies = {
    catalog: getFieldCatalog(),
    config,
    readDocumentPages: realReadDocumentPages,
    strategies: createStrategies(config),
    createRunId: () => 'test-run',
  };
  return { ...defaults, ...overrides };
}
