import type { AppError } from "./app-error.js";
import { InvalidRequestError, RateLimitedError, ServiceUnavailableError } from "./errors.js";

/**
 * Map a failed HTTP response from a remote service onto our error taxonomy.
 * `retryAfter` is the raw Retry-After header, in seconds.
 */
export function fromHttpStatus(
  service: string,
  status: number,
  message: string,
  retryAfter?: string | null,
  cause?: unknown,
): AppError {
  if (status === 429) {
    const seconds = retryAfter ? Number(retryAfter) : NaN;
    return new RateLimitedError(message, Number.isFinite(seconds) ? seconds : undefined, { cause });
  }
  if (status >= 500) {
    return new ServiceUnavailableError(message, service, { statusCode: status, cause });
  }
  return new InvalidRequestError(message, { statusCode: status, cause, details: { service } });
}
