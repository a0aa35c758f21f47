import Anthropic from "@anthropic-ai/sdk";
import { SemanticServiceError } from '../../errors';
import { semanticLogger } from '../../logger';

export interface SemanticRequest {
  model: string;
  prompt: string;
  maxTokens: number;
  signal?: AbortSignal;
}

/**
 * A text-understanding backend. Implementations return the raw reply text
 * and throw SemanticServiceError for every transport failure.
 */
export interface SemanticService {
  complete(request: SemanticRequest): Promise<string>;
}

export function toSemanticServiceError(error: unknown, model: string): SemanticServiceError {
  if (error instanceof SemanticServiceError) return error;

  if (error instanceof Anthropic.APIUserAbortError) {
    return new SemanticServiceError('cancelled', 'Request was cancelled', model);
  }
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new SemanticServiceError('timeout', error.message, model);
  }
  if (error instanceof Anthropic.RateLimitError) {
    return new SemanticServiceError('rate-limit', error.message, model);
  }
  if (error instanceof Anthropic.APIError) {
    // 529: the API is overloaded, which the fallback chain treats like a rate limit.
    const kind = error.status === 529 ? 'rate-limit' : 'unavailable';
    return new SemanticServiceError(kind, error.message, model);
  }
  const message = error instanceof Error ? error.message : 'Unknown error';
  return new SemanticServiceError('unavailable', message, model);
}

export class ClaudeTextService implements SemanticService {
  private readonly client: Anthropic;

  constructor(options: { apiKey: string; timeoutMs: number }) {
    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      // Model fallback replaces the SDK's own retries.
      maxRetries: 0,
    });
  }

  async complete(request: SemanticRequest): Promise<string> {
    const startTime = Date.now();

    try {
      const response = await this.client.messages.create(
        {
          model: request.model,
          max_tokens: request.maxTokens,
          temperature: 0,
          messages: [{ role: "user", content: request.prompt }],
        },
        { signal: request.signal }
      );

      const inputTokens = response.usage?.input_tokens || 0;
      const outputTokens = response.usage?.output_tokens || 0;

      semanticLogger.info({
        model: request.model,
        inputTokens,
        outputTokens,
        stopReason: response.stop_reason,
        processingTimeMs: Date.now() - startTime,
      }, 'Claude Text completion received');

      return response.content.flatMap(block => (block.type === 'text' ? [block.text] : [])).join('\n');
    } catch (error) {
      const serviceError = toSemanticServiceError(error, request.model);
      semanticLogger.warn({
        model: request.model,
        kind: serviceError.kind,
        error: serviceError.detail,
      }, 'Claude Text completion failed');
      throw serviceError;
    }
  }
}
