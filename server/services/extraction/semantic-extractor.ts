import { z } from 'zod';
import type { ModelFallbackPolicy } from '../../config';
import { SemanticServiceError } from '../../errors';
import { semanticLogger } from '../../logger';
import { AbortedError, TimeoutError, withTimeout } from '../../utils/resilience';
import { toSemanticServiceError, type SemanticService } from './claude-text';
import { isWithinExpectedRange } from './field-catalog';
import { parseReportNumber } from './numbers';
import { buildExcerpt } from './page-relevance';
import type { ExtractionContext, ExtractionStrategy, FieldCandidate, FieldSpec, ReportDocument, TierAttempt } from './types';

export const SEMANTIC_CONFIDENCE = 0.6;

export interface SemanticExtractorOptions {
  service: SemanticService | null;
  policy: ModelFallbackPolicy;
  timeoutMs: number;
  maxChars: number;
  maxTokens: number;
}

export function buildSemanticPrompt(
  fields: readonly FieldSpec[],
  excerpt: string,
  document: Pick<ReportDocument, 'year' | 'reportKind'>
): string {
  const fieldLines = fields
    .map(field => `- ${field.identifier} (${field.unit ?? 'number'}): ${field.description}`)
    .join('\n');

  return `You are reading text extracted from a Swedish national pension fund ${document.reportKind} report for ${document.year}.
Extract the following ${fields.length} fields. Return ONLY a JSON object whose keys are these exact field identifiers and whose values are numbers, or null when the figure is not in the text.

Fields:
${fieldLines}

Rules:
1. When several periods are shown side by side, use the value for the current period (the most recent reporting date), never a comparison period.
2. Report each value in the unit given for its field. If the text gives a SEK billion field in SEK million, divide by 1000.
3. Preserve negative signs. Figures in parentheses are negative.
4. "Derivative instruments" appears in both the assets and the liabilities section. Use the side named in the field description.
5. Return ONLY valid JSON, no markdown, no explanations.

Document text:

${excerpt}`;
}

const responseSchema = z.record(z.union([z.number(), z.string(), z.null()]));

/**
 * Reads the service reply into candidates for the requested fields only.
 * Returns null when the reply holds no usable JSON object.
 */
export function parseSemanticResponse(reply: string, fields: readonly FieldSpec[]): FieldCandidate[] | null {
  let jsonText = reply.replace(/```(?:json)?/g, '').trim();
  const jsonMatch = jsonText.match(/\{[\s\S]*\}/);
  if (!jsonMatch) return null;
  jsonText = jsonMatch[0];

  let raw: unknown;
  try {
    raw = JSON.parse(jsonText);
  } catch (error) {
    semanticLogger.debug({ error: error instanceof Error ? error.message : String(error) }, 'Semantic reply is not valid JSON');
    return null;
  }

  const parsed = responseSchema.safeParse(raw);
  if (!parsed.success) return null;

  const candidates: FieldCandidate[] = [];
  for (const field of fields) {
    const rawValue = parsed.data[field.identifier];
    if (rawValue === undefined || rawValue === null) continue;

    const value = typeof rawValue === 'number' ? rawValue : parseReportNumber(rawValue);
    if (value === null || !Number.isFinite(value)) continue;
    if (!isWithinExpectedRange(field, value)) continue;

    candidates.push({
      identifier: field.identifier,
      value,
      evidence: `${field.identifier}: ${JSON.stringify(rawValue)}`,
      confidence: SEMANTIC_CONFIDENCE,
    });
  }
  return candidates;
}

function classifyFailure(error: unknown, model: string): SemanticServiceError {
  if (error instanceof AbortedError) {
    return new SemanticServiceError('cancelled', error.message, model);
  }
  if (error instanceof TimeoutError) {
    return new SemanticServiceError('timeout', error.message, model);
  }
  return toSemanticServiceError(error, model);
}

async function callModel(
  service: SemanticService,
  request: { model: string; prompt: string },
  options: SemanticExtractorOptions,
  signal: AbortSignal | undefined
): Promise<string> {
  // One controller per attempt so a timed-out request is torn down too.
  const controller = new AbortController();
  const forwardAbort = () => controller.abort();
  signal?.addEventListener('abort', forwardAbort, { once: true });

  try {
    return await withTimeout(
      () => service.complete({ ...request, maxTokens: options.maxTokens, signal: controller.signal }),
      {
        timeoutMs: options.timeoutMs,
        timeoutMessage: `${request.model} did not answer within ${options.timeoutMs}ms`,
        signal,
      }
    );
  } catch (error) {
    controller.abort();
    throw error;
  } finally {
    signal?.removeEventListener('abort', forwardAbort);
  }
}

/**
 * One request for every outstanding field, retried on the next model of the
 * fallback chain after a rate limit or timeout. The field list never changes
 * between attempts.
 */
export async function extractSemantically(
  remaining: readonly FieldSpec[],
  context: Pick<ExtractionContext, 'document' | 'pages' | 'signal'>,
  options: SemanticExtractorOptions
): Promise<TierAttempt> {
  const { service, policy } = options;
  if (!service) {
    return { candidates: [], modelsAttempted: [], escalationReason: 'Semantic service not configured' };
  }

  if (!context.pages.some(page => page.lines.length > 0)) {
    return { candidates: [], modelsAttempted: [], escalationReason: 'Document has no text' };
  }

  const prompt = buildSemanticPrompt(remaining, buildExcerpt(context.pages, options.maxChars), context.document);
  const models = policy.models.slice(0, policy.maxAttempts);
  const modelsAttempted: string[] = [];

  for (const model of models) {
    if (context.signal?.aborted) {
      return { candidates: [], modelsAttempted, cancelled: true };
    }
    modelsAttempted.push(model);
    const startTime = Date.now();

    let reply: string;
    try {
      reply = await callModel(service, { model, prompt }, options, context.signal);
    } catch (error) {
      const failure = classifyFailure(error, model);
      if (failure.kind === 'cancelled') {
        semanticLogger.info({ model }, 'Semantic extraction cancelled');
        return { candidates: [], modelsAttempted, cancelled: true };
      }
      if (failure.retryable) {
        semanticLogger.warn({ model, kind: failure.kind, error: failure.detail }, 'Semantic model unavailable, falling back');
        continue;
      }
      semanticLogger.warn({ model, kind: failure.kind, error: failure.detail }, 'Semantic service failed');
      return { candidates: [], modelsAttempted, escalationReason: `Semantic service failed: ${failure.detail}` };
    }

    if (context.signal?.aborted) {
      return { candidates: [], modelsAttempted, cancelled: true };
    }

    const candidates = parseSemanticResponse(reply, remaining);
    if (candidates === null) {
      semanticLogger.warn({ model, replyLength: reply.length }, 'Malformed semantic reply');
      return { candidates: [], modelsAttempted, escalationReason: 'Malformed semantic reply' };
    }

    semanticLogger.info({
      model,
      requestedFieldCount: remaining.length,
      resolvedFieldCount: candidates.length,
      processingTimeMs: Date.now() - startTime,
    }, 'Semantic extraction complete');
    return { candidates, modelsAttempted };
  }

  return { candidates: [], modelsAttempted, escalationReason: 'Model fallback chain exhausted' };
}

export function createSemanticStrategy(options: SemanticExtractorOptions): ExtractionStrategy {
  return {
    tier: 'semantic',
    attempt(remaining, context) {
      return extractSemantically(remaining, context, options);
    },
  };
}
