// Context attached to every failure so callers can log it and build a user-facing message
export interface ErrorContext {
  filename?: string;
  sessionId?: string;
  operation?: string;
}

// Error types
export class RagError extends Error {
  public context: ErrorContext;

  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    context: ErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RagError';
    this.context = { ...context };
  }

  /**
   * Fill in context fields the raising component did not know about
   */
  withContext(context: ErrorContext): this {
    this.context = { ...context, ...this.context };
    return this;
  }
}

export class ValidationError extends RagError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'VALIDATION_ERROR', 400, context);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends RagError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', 500);
    this.name = 'ConfigurationError';
  }
}

export class NotFoundError extends RagError {
  constructor(resource: string, context?: ErrorContext) {
    super(`${resource} not found`, 'NOT_FOUND', 404, context);
    this.name = 'NotFoundError';
  }
}

export class LoadError extends RagError {
  constructor(public filename: string, reason: string, cause?: unknown) {
    super(`Failed to load ${filename}: ${reason}`, 'LOAD_ERROR', 422, { filename, operation: 'load' }, { cause });
    this.name = 'LoadError';
  }
}

export class EmbeddingError extends RagError {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super(message, 'EMBEDDING_ERROR', 502, { operation: 'embed', ...context }, { cause });
    this.name = 'EmbeddingError';
  }
}

export class GenerationError extends RagError {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super(message, 'GENERATION_ERROR', 502, { operation: 'generate', ...context }, { cause });
    this.name = 'GenerationError';
  }
}

export class IndexError extends RagError {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super(message, 'INDEX_ERROR', 500, context, { cause });
    this.name = 'IndexError';
  }
}

export class TimeoutError extends RagError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT', 504, { operation });
    this.name = 'TimeoutError';
  }
}

/**
 * Thrown by service providers for failures worth another attempt
 * (rate limits, overloaded upstream, dropped connections).
 */
export class TransientServiceError extends RagError {
  constructor(message: string, cause?: unknown) {
    super(message, 'TRANSIENT_SERVICE_ERROR', 503, {}, { cause });
    this.name = 'TransientServiceError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
