/**
 * Base application error class.
 * Extends Error with status code and error code for callers that map to responses.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code?: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Validation error (400).
 * Use when caller input is invalid or missing.
 */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/**
 * Configuration error (500).
 * Thrown at construction time when required settings are missing.
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

/**
 * External service error (502).
 * Use when the model endpoint, search index or document store fails.
 */
export class ExternalServiceError extends AppError {
  constructor(
    public service: string,
    message: string,
    public httpStatus?: number
  ) {
    super(`${service}: ${message}`, 502, 'EXTERNAL_SERVICE_ERROR');
    this.name = 'ExternalServiceError';
  }
}

/**
 * Rate limit error (429).
 * Raised by model providers when the endpoint throttles or the quota runs out.
 */
export class RateLimitError extends AppError {
  constructor(message: string = 'Rate limit exceeded') {
    super(message, 429, 'RATE_LIMIT_ERROR');
    this.name = 'RateLimitError';
  }
}

/** Message text of any thrown value. */
export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Assert a condition and throw ValidationError if false.
 */
export function assertValid(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new ValidationError(message);
  }
}

