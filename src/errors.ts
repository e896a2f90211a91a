/**
 * Error taxonomy
 * Every failure the pipeline distinguishes has its own class so callers can
 * decide between skip, retry and escalate with `instanceof`
 */
export class AppError extends Error {
  constructor(
    message: string,
    readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid or missing configuration. Fatal at startup.
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
  }
}

/**
 * A vector that cannot take part in a similarity computation
 * (empty, all-zero, non-finite or of a different dimension than its peer)
 */
export class InvalidVectorError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_VECTOR');
  }
}

/**
 * Failure of the external embedding service: rate limits, timeouts, rejected input.
 * Always retried with backoff, then the posting or CV is skipped.
 */
export class EmbeddingServiceError extends AppError {
  readonly status: number | undefined;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, 'EMBEDDING_SERVICE_ERROR', options);
    this.status = options?.status;
  }
}

/**
 * Raised by the store when a uniqueness constraint rejects an insert.
 * For match records this is the expected outcome of a repeated run.
 */
export class StoreConstraintViolation extends AppError {
  constructor(
    message: string,
    readonly constraint: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'STORE_CONSTRAINT_VIOLATION', options);
  }
}

export class NotificationDeliveryError extends AppError {
  constructor(
    message: string,
    readonly retryable: boolean = true,
    options?: { cause?: unknown }
  ) {
    super(message, 'NOTIFICATION_DELIVERY_ERROR', options);
  }
}

export class CvExtractionError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CV_EXTRACTION_ERROR', options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
