import { ModelErrorClass } from '@/lib/core/types';
import { AppError, RateLimitError, toErrorMessage } from '@/lib/utils/errors';

const QUOTA_PATTERN = /quota|billing|insufficient[_ ]credits?/i;
const RATE_LIMIT_PATTERN = /\b429\b|rate[ _-]?limit|too many requests|resource[ _-]?exhausted/i;

/**
 * Classify a failed model call exactly once.
 * Quota wording wins over throttling wording.
 */
export function classifyModelError(error: unknown): ModelErrorClass {
  const message = toErrorMessage(error);

  if (QUOTA_PATTERN.test(message)) return ModelErrorClass.QuotaExceeded;
  if (error instanceof RateLimitError) return ModelErrorClass.RateLimited;
  if (error instanceof AppError && error.statusCode === 429) return ModelErrorClass.RateLimited;
  if (RATE_LIMIT_PATTERN.test(message)) return ModelErrorClass.RateLimited;

  return ModelErrorClass.Other;
}

/** Throttling and quota failures are expected under load and logged at WARN. */
export function isCapacityError(errorClass: ModelErrorClass): boolean {
  return errorClass === ModelErrorClass.RateLimited || errorClass === ModelErrorClass.QuotaExceeded;
}
