export * from './types';
export { getFieldCatalog, loadFieldCatalog, valueFields, findField, EXPECTED_FIELD_COUNT } from './field-catalog';
export { readDocumentPages } from './document-reader';
export { parseReportNumber, parsePeriodHeader } from './numbers';
export { selectCurrentPeriodColumn, type ColumnSelection } from './column-selector';
export { extractTables, bindTable, createStructuralStrategy } from './table-structure';
export { matchPatterns, createPatternStrategy } from './pattern-matcher';
export { ClaudeTextService, type SemanticService, type SemanticRequest } from './claude-text';
export { buildSemanticPrompt, parseSemanticResponse, createSemanticStrategy, type SemanticExtractorOptions } from './semantic-extractor';
export { validateRecord, BALANCE_RULES, type BalanceRule } from './validator';
export { toOrderedRow, type OutputColumn } from './record-output';
export {
  createProductionDependencies,
  createTestDependencies,
  createStrategies,
  getDependencies,
  setDependencies,
  resetDependencies,
  type ExtractionDependencies,
} from './dependencies';
export { extractDocument, extractDocuments, documentIdentity } from './reconciler';
