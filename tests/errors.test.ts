import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  DocumentReadError,
  isExtractionError,
  SemanticServiceError,
} from '../server/errors';

describe('Extraction errors', () => {
  it('should describe an unreadable document', () => {
    const error = new DocumentReadError();

    expect(error.name).toBe('DocumentReadError');
    expect(error).toBeInstanceOf(Error);
    expect(error.toProblemDetail()).toMatchObject({
      type: 'urn:report-extraction:errors:document-unreadable',
      title: 'Document Unreadable',
      detail: 'Document could not be read',
    });
  });

  it('should carry validation errors on a configuration error', () => {
    const error = new ConfigurationError('Environment configuration failed validation', [
      { path: 'EXTRACTION_CONCURRENCY', message: 'Number must be greater than or equal to 1' },
    ]);

    expect(error.toProblemDetail().errors).toEqual([
      { path: 'EXTRACTION_CONCURRENCY', message: 'Number must be greater than or equal to 1' },
    ]);
  });

  it('should only retry rate limits and timeouts', () => {
    expect(new SemanticServiceError('rate-limit', 'Too many requests').retryable).toBe(true);
    expect(new SemanticServiceError('timeout', 'No answer').retryable).toBe(true);
    expect(new SemanticServiceError('unavailable', 'Service down').retryable).toBe(false);
    expect(new SemanticServiceError('cancelled', 'Stopped').retryable).toBe(false);
  });

  it('should name the failure kind and model in its problem detail', () => {
    expect(new SemanticServiceError('rate-limit', 'Too many requests', 'model-a').toProblemDetail().detail)
      .toBe('[rate-limit model-a] Too many requests');
    expect(new SemanticServiceError('timeout', 'No answer').toProblemDetail().detail).toBe('[timeout] No answer');
  });

  it('should recognise extraction errors', () => {
    expect(isExtractionError(new DocumentReadError())).toBe(true);
    expect(isExtractionError(new Error('plain'))).toBe(false);
    expect(isExtractionError('not an error')).toBe(false);
  });
});
