import { ZodError } from 'zod';

export interface ProblemDetail {
  type: string;
  title: string;
  detail?: string;
  errors?: Array<{ path: string; message: string }>;
  timestamp?: string;
}

export abstract class ExtractionError extends Error {
  abstract readonly type: string;
  abstract readonly title: string;
  readonly detail?: string;
  readonly errors?: Array<{ path: string; message: string }>;

  constructor(message: string, detail?: string, errors?: Array<{ path: string; message: string }>) {
    super(message);
    this.name = this.constructor.name;
    this.detail = detail;
    this.errors = errors;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toProblemDetail(): ProblemDetail {
    return {
      type: `urn:report-extraction:errors:${this.type}`,
      title: this.title,
      detail: this.detail || this.message,
      errors: this.errors,
      timestamp: new Date().toISOString(),
    };
  }
}

export class DocumentReadError extends ExtractionError {
  readonly type = 'document-unreadable';
  readonly title = 'Document Unreadable';

  constructor(detail: string = 'Document could not be read') {
    super('Document Unreadable', detail);
  }
}

export class ConfigurationError extends ExtractionError {
  readonly type = 'configuration-error';
  readonly title = 'Configuration Error';

  constructor(detail?: string, errors?: Array<{ path: string; message: string }>) {
    super('Configuration Error', detail, errors);
  }

  static fromZodError(error: ZodError, source: string): ConfigurationError {
    const errors = error.errors.map(e => ({
      path: e.path.join('.'),
      message: e.message,
    }));
    return new ConfigurationError(`${source} failed validation`, errors);
  }
}

export type SemanticFailureKind = 'rate-limit' | 'timeout' | 'unavailable' | 'cancelled';

export class SemanticServiceError extends ExtractionError {
  readonly type = 'semantic-service-error';
  readonly title = 'Semantic Service Error';
  readonly kind: SemanticFailureKind;
  readonly model: string | null;

  constructor(kind: SemanticFailureKind, detail: string, model: string | null = null) {
    super('Semantic Service Error', detail);
    this.kind = kind;
    this.model = model;
  }

  get retryable(): boolean {
    return this.kind === 'rate-limit' || this.kind === 'timeout';
  }

  override toProblemDetail(): ProblemDetail {
    const base = super.toProblemDetail();
    return { ...base, detail: `[${this.kind}${this.model ? ` ${this.model}` : ''}] ${base.detail}` };
  }
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}
