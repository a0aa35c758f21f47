import { createHash } from 'node:crypto';
import { extractionLogger } from '../../logger';
import { mapWithConcurrency, type SettledOutcome } from '../../utils/resilience';
import { getDependencies, type ExtractionDependencies } from './dependencies';
import { validateRecord } from './validator';
import type {
  ExtractionOptions,
  ExtractionRecord,
  FieldResult,
  FieldSpec,
  RecordStatus,
  ReportDocument,
  SourceTier,
  TierAttempt,
  TierAuditEntry,
} from './types';

export function documentIdentity(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

function unresolved(field: FieldSpec): FieldResult {
  return { identifier: field.identifier, value: null, source: null, evidence: null, confidence: 0 };
}

function recordStatus(fields: readonly FieldResult[], catalogFields: readonly FieldSpec[]): RecordStatus {
  const valueIdentifiers = new Set(catalogFields.filter(f => f.kind === 'value').map(f => f.identifier));
  const resolved = fields.filter(f => valueIdentifiers.has(f.identifier) && f.value !== null).length;
  if (resolved === 0) return 'failed';
  return resolved < valueIdentifiers.size ? 'partial' : 'complete';
}

/**
 * Runs the tier cascade over one document. Each field is written at most
 * once: a strategy only ever sees fields no earlier tier resolved, and a
 * candidate for any other field is ignored.
 *
 * Throws DocumentReadError only when the bytes cannot be read at all. A
 * document without a text layer yields a failed record; every other failure
 * leaves fields unresolved.
 */
export async function extractDocument(
  document: ReportDocument,
  options: ExtractionOptions = {},
  deps: ExtractionDependencies = getDependencies()
): Promise<ExtractionRecord> {
  const startTime = Date.now();
  const runId = deps.createRunId();
  const documentId = documentIdentity(document.bytes);
  const { catalog, config } = deps;
  const log = extractionLogger.child({ runId, documentId: documentId.substring(0, 12), year: document.year });

  const pages = await deps.readDocumentPages(document);
  log.info({ pageCount: pages.length, reportKind: document.reportKind }, 'Starting tiered extraction');

  const results = new Map<string, FieldResult>();
  const tierUsage: Record<SourceTier, number> = { metadata: 0, structural: 0, pattern: 0, semantic: 0 };
  const tierAudit: TierAuditEntry[] = [];
  const modelsAttempted: string[] = [];
  let cancelled = false;

  for (const field of catalog.fields) {
    if (field.kind !== 'period') continue;
    results.set(field.identifier, {
      identifier: field.identifier,
      value: document.year,
      source: 'metadata',
      evidence: `${document.reportKind} report ${document.year}`,
      confidence: 1,
    });
    tierUsage.metadata++;
  }

  const context = { document, pages, catalog, signal: options.signal };

  for (const strategy of deps.strategies) {
    if (options.skipTiers?.includes(strategy.tier)) continue;
    if (options.signal?.aborted) {
      cancelled = true;
      break;
    }

    const remaining = catalog.fields.filter(field => !results.has(field.identifier));
    if (remaining.length === 0) break;

    const tierStart = Date.now();
    let attempt: TierAttempt;
    try {
      attempt = await strategy.attempt(remaining, context);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error({ tier: strategy.tier, error: message }, 'Extraction tier threw, escalating');
      attempt = { candidates: [], escalationReason: `Tier error: ${message}` };
    }

    modelsAttempted.push(...(attempt.modelsAttempted ?? []));

    let resolvedCount = 0;
    if (attempt.cancelled) {
      cancelled = true;
    } else {
      const requested = new Set(remaining.map(field => field.identifier));
      for (const candidate of attempt.candidates) {
        if (!requested.has(candidate.identifier) || results.has(candidate.identifier)) {
          log.debug({ tier: strategy.tier, field: candidate.identifier }, 'Ignoring candidate for a field that was not requested');
          continue;
        }
        results.set(candidate.identifier, {
          identifier: candidate.identifier,
          value: candidate.value,
          source: strategy.tier,
          evidence: candidate.evidence,
          confidence: candidate.confidence,
        });
        tierUsage[strategy.tier]++;
        resolvedCount++;
      }
    }

    const stillMissing = remaining.length - resolvedCount;
    tierAudit.push({
      tier: strategy.tier,
      attemptedAt: new Date(tierStart),
      processingTimeMs: Date.now() - tierStart,
      requestedFieldCount: remaining.length,
      resolvedFieldCount: resolvedCount,
      escalationReason: attempt.escalationReason
        ?? (attempt.cancelled ? 'Cancelled' : stillMissing > 0 ? `${stillMissing} fields unresolved` : null),
    });

    log.debug({ tier: strategy.tier, requested: remaining.length, resolved: resolvedCount }, 'Tier attempt complete');
    if (cancelled) break;
  }

  const fields = catalog.fields.map(field => results.get(field.identifier) ?? unresolved(field));
  const validation = validateRecord(fields, config.validationTolerance);
  const status = recordStatus(fields, catalog.fields);
  const elapsedMs = Date.now() - startTime;

  const summary = { status, tierUsage, cancelled, elapsedMs, failedChecks: validation.failed };
  if (status === 'failed') {
    log.warn(summary, 'Extraction resolved no fields');
  } else {
    log.info(summary, 'Extraction complete');
  }

  return {
    fields,
    status,
    validation,
    metadata: {
      runId,
      documentId,
      sourceName: document.sourceName ?? null,
      year: document.year,
      reportKind: document.reportKind,
      pageCount: pages.length,
      tierUsage,
      tierAudit,
      modelsAttempted,
      cancelled,
      elapsedMs,
    },
  };
}

/**
 * Extracts several documents with at most `config.concurrency` in flight.
 * Outcomes keep input order; an unreadable document rejects only its own
 * entry.
 */
export async function extractDocuments(
  documents: readonly ReportDocument[],
  options: ExtractionOptions = {},
  deps: ExtractionDependencies = getDependencies()
): Promise<SettledOutcome<ExtractionRecord>[]> {
  return mapWithConcurrency(documents, deps.config.concurrency, document => extractDocument(document, options, deps));
}
