export type SourceTier =
  | 'metadata'       // Document metadata (reporting year)
  | 'structural'     // Table structure extraction (free)
  | 'pattern'        // Label/value text patterns (free)
  | 'semantic';      // Language-model extraction (paid, rate-limited)

export type CascadeTier = Exclude<SourceTier, 'metadata'>;

export type ReportKind = 'half-year' | 'annual' | 'year-end';

export type FieldKind = 'period' | 'value';

export type StatementKind = 'balance-sheet' | 'key-ratios';

export type SectionKind = 'assets' | 'liabilities' | 'fund-capital';

export type ReportUnit = 'SEK million' | 'SEK billion';

export interface ExpectedRange {
  min?: number;
  max?: number;
}

export interface FieldSpec {
  identifier: string;
  ordinal: number;
  seriesCode: string;
  description: string;
  kind: FieldKind;
  statement: StatementKind | null;
  section: SectionKind | null;
  unit: ReportUnit | null;
  hints: readonly string[];
  expectedRange?: ExpectedRange;
}

export interface FieldCatalog {
  version: number;
  defaultSection: SectionKind | null;
  sectionMarkers: Readonly<Record<SectionKind, readonly string[]>>;
  fields: readonly FieldSpec[];
}

export interface ReportDocument {
  bytes: Uint8Array;
  year: number;
  reportKind: ReportKind;
  sourceName?: string;
}

export interface PageText {
  pageNumber: number;
  lines: string[];
}

export interface RawTable {
  pageNumber: number;
  rows: string[][];
  headerRowIndex: number | null;
  unit: ReportUnit | null;
  quality: number;
}

export interface FieldCandidate {
  identifier: string;
  value: number;
  evidence: string;
  confidence: number;
}

export interface FieldResult {
  identifier: string;
  value: number | null;
  source: SourceTier | null;
  evidence: string | null;
  confidence: number;
}

export interface TierAttempt {
  candidates: FieldCandidate[];
  modelsAttempted?: string[];
  cancelled?: boolean;
  escalationReason?: string | null;
}

export interface ExtractionContext {
  document: ReportDocument;
  pages: readonly PageText[];
  catalog: FieldCatalog;
  signal?: AbortSignal;
}

export interface ExtractionStrategy {
  readonly tier: CascadeTier;
  attempt(remaining: readonly FieldSpec[], context: ExtractionContext): Promise<TierAttempt>;
}

export type CheckStatus = 'pass' | 'fail' | 'not-applicable';

export interface ValidationCheck {
  name: string;
  description: string;
  status: CheckStatus;
  expected: number | null;
  actual: number | null;
  difference: number | null;
}

export interface ValidationOutcome {
  checks: ValidationCheck[];
  passed: number;
  failed: number;
  notApplicable: number;
}

export type RecordStatus = 'complete' | 'partial' | 'failed';

export interface TierAuditEntry {
  tier: CascadeTier;
  attemptedAt: Date;
  processingTimeMs: number;
  requestedFieldCount: number;
  resolvedFieldCount: number;
  escalationReason: string | null;
}

export interface RunMetadata {
  runId: string;
  documentId: string;
  sourceName: string | null;
  year: number;
  reportKind: ReportKind;
  pageCount: number;
  tierUsage: Record<SourceTier, number>;
  tierAudit: TierAuditEntry[];
  modelsAttempted: string[];
  cancelled: boolean;
  elapsedMs: number;
}

export interface ExtractionRecord {
  fields: FieldResult[];
  status: RecordStatus;
  validation: ValidationOutcome;
  metadata: RunMetadata;
}

export interface ExtractionOptions {
  signal?: AbortSignal;
  skipTiers?: CascadeTier[];
}
