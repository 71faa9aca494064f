/**
 * Custom Error Classes
 *
 * Standardized error types for better error handling and debugging.
 */

/**
 * Base error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error for validation failures (game ids, configuration, correction rules)
 */
export class ValidationError extends AppError {
  constructor(message: string, public field: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

/**
 * Error for a single failed HTTP exchange
 */
export class ApiError extends AppError {
  constructor(
    message: string,
    public url: string,
    public statusCode: number,
    cause?: Error
  ) {
    super(message, 'API_ERROR', statusCode, cause);
  }
}

/**
 * A source could not be fetched within the retry budget.
 * Fatal for the game it belongs to, never for the collection.
 */
export class FetchFailureError extends AppError {
  constructor(
    message: string,
    public url: string,
    public attempts: number,
    public lastStatus: number,
    cause?: Error
  ) {
    super(message, 'FETCH_FAILURE', 502, cause);
  }
}

/**
 * A source payload does not have the expected structure
 */
export class ParseDefectError extends AppError {
  constructor(
    message: string,
    public gameId: string,
    public source: string,
    cause?: Error
  ) {
    super(message, 'PARSE_DEFECT', 422, cause);
  }
}

/**
 * Error for cache/Redis operations
 */
export class CacheError extends AppError {
  constructor(message: string, public operation: string, cause?: Error) {
    super(message, 'CACHE_ERROR', 500, cause);
  }
}

/**
 * Error for Kafka operations
 */
export class KafkaError extends AppError {
  constructor(message: string, public operation: string, cause?: Error) {
    super(message, 'KAFKA_ERROR', 500, cause);
  }
}

/**
 * Normalizes an unknown throwable into an Error instance
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
