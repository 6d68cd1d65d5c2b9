/**
 * Error Handling
 *
 * Every failure inside a document run is caught at the narrowest boundary
 * that can absorb it (page, record, document) and logged with its category.
 * Only configuration and input-path errors reach the CLI.
 *
 * @module utils/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory =
  // Page rasterisation / PDF access
  | 'RENDER_FAILED'

  // Inference service
  | 'INFERENCE_FAILED'
  | 'INFERENCE_TIMEOUT'

  // Classification pattern engine
  | 'CLASSIFICATION_FAILED'

  // Result table read/write
  | 'STORE_FAILED'

  // Whole-document unit of work
  | 'PIPELINE_FAILED'

  // Start-up
  | 'CONFIGURATION_ERROR'
  | 'PATH_NOT_FOUND'

  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// BASE CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Base class for all typed errors raised by the extractor.
 */
export class ExtractionError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ExtractionError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Wrap any caught value. Typed errors pass through untouched.
   */
  static fromUnknown(
    error: unknown,
    defaultCategory: ErrorCategory = 'INTERNAL_ERROR'
  ): ExtractionError {
    if (error instanceof ExtractionError) {
      return error;
    }
    if (error instanceof Error) {
      return new ExtractionError(defaultCategory, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }
    return new ExtractionError(defaultCategory, String(error), { originalValue: error });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SPECIFIC ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

/** Page or document could not be rasterised. The page is skipped. */
export class RenderError extends ExtractionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('RENDER_FAILED', message, details);
    this.name = 'RenderError';
  }
}

/** Network failure, timeout or unusable response from an inference endpoint. */
export class InferError extends ExtractionError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    category: 'INFERENCE_FAILED' | 'INFERENCE_TIMEOUT' = 'INFERENCE_FAILED'
  ) {
    super(category, message, details);
    this.name = 'InferError';
  }

  get isTimeout(): boolean {
    return this.category === 'INFERENCE_TIMEOUT';
  }
}

/** Pattern engine failure while classifying a document. */
export class ClassificationError extends ExtractionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CLASSIFICATION_FAILED', message, details);
    this.name = 'ClassificationError';
  }
}

/** Result table could not be read or written. */
export class StoreError extends ExtractionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('STORE_FAILED', message, details);
    this.name = 'StoreError';
  }
}

/** Uncaught failure inside one document's unit of work. */
export class PipelineError extends ExtractionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PIPELINE_FAILED', message, details);
    this.name = 'PipelineError';
  }
}

/** Invalid configuration file, environment or CLI value. */
export class ConfigurationError extends ExtractionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, details);
    this.name = 'ConfigurationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One-line rendering of any thrown value for stderr logs.
 */
export function formatError(error: unknown): string {
  if (error instanceof ExtractionError) {
    return `${error.name} [${error.category}]: ${error.message}`;
  }
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function pathNotFoundError(path: string): ExtractionError {
  return new ExtractionError('PATH_NOT_FOUND', `Input path does not exist: ${path}`, { path });
}
