import { setTimeout as sleepFor } from "node:timers/promises";
import { AppError } from "./app-error.js";

/**
 * How a failed remote call should be treated.
 * rate_limited, connectivity and server are retried; client and not_configured fail at once.
 */
export type RetryErrorKind =
  | "rate_limited"
  | "connectivity"
  | "server"
  | "client"
  | "not_configured";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export interface RetryFailure {
  kind: RetryErrorKind;
  /** Number of calls made, including the first. */
  attempts: number;
  lastError: unknown;
  reason: "fatal" | "exhausted" | "aborted";
}

export interface RetryAttemptInfo {
  /** 1-based number of the attempt that just failed. */
  attempt: number;
  maxRetries: number;
  delayMs: number;
  kind: RetryErrorKind;
  error: unknown;
}

export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 3 */
  maxRetries?: number;
  /** Base delay in milliseconds before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds between retries. Default: 600000 */
  maxDelayMs?: number;
  /** Scale each delay by a random factor in [0.5, 1.0). Default: false */
  jitter?: boolean;
  /** Aborting cancels a pending backoff sleep and stops further attempts. */
  signal?: AbortSignal;
  classify?: (error: unknown) => RetryErrorKind;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onRetry?: (info: RetryAttemptInfo) => void;
}

type RetryDefaults = Required<
  Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs" | "jitter">
>;

const DEFAULT_RETRY_OPTIONS: RetryDefaults = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 600_000,
  jitter: false,
};

const RETRYABLE_KINDS: ReadonlySet<RetryErrorKind> = new Set([
  "rate_limited",
  "connectivity",
  "server",
]);

const NETWORK_ERROR_CODES: ReadonlySet<string> = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_SOCKET",
]);

export function isRetryableKind(kind: RetryErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

function readStatus(error: object): number | undefined {
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  if ("status" in error && typeof error.status === "number") return error.status;
  return undefined;
}

function kindFromStatus(status: number): RetryErrorKind {
  if (status === 429) return "rate_limited";
  if (status >= 500) return "server";
  if (status === 408) return "connectivity";
  return "client";
}

/**
 * Classify any thrown value. Works on our AppErrors, SDK errors carrying a
 * numeric `status`/`statusCode`, and Node/undici network errors (also when
 * wrapped as `cause`, as `fetch` does).
 */
export function classifyError(error: unknown): RetryErrorKind {
  if (AppError.isAppError(error)) {
    switch (error.code) {
      case "RATE_LIMITED":
        return "rate_limited";
      case "NOT_CONFIGURED":
        return "not_configured";
      case "SERVICE_UNAVAILABLE":
        return "server";
      case "INVALID_REQUEST":
        return "client";
      default:
        if (error.statusCode !== undefined) return kindFromStatus(error.statusCode);
        // Wrappers without a status of their own defer to what they wrap
        return error.cause !== undefined ? classifyError(error.cause) : "client";
    }
  }

  if (typeof error !== "object" || error === null) {
    return "connectivity";
  }

  const status = readStatus(error);
  if (status !== undefined) {
    return kindFromStatus(status);
  }

  if ("code" in error && typeof error.code === "string" && NETWORK_ERROR_CODES.has(error.code)) {
    return "connectivity";
  }

  if ("cause" in error && typeof error.cause === "object" && error.cause !== null) {
    return classifyError(error.cause);
  }

  // Unknown failures (timeouts, dropped sockets without a code) are treated as transient
  return "connectivity";
}

/**
 * delay = min(maxDelay, baseDelay * 2^attempt), optionally scaled by random(0.5, 1.0)
 */
export function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitter = false,
): number {
  const cappedDelay = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt));
  if (!jitter) return cappedDelay;
  return Math.floor(cappedDelay * (0.5 + Math.random() * 0.5));
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await sleepFor(ms, undefined, { signal });
}

/**
 * Run `fn` until it succeeds, fails with a non-retryable kind, exhausts
 * `maxRetries` retries, or `signal` aborts. Never throws.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options?: RetryOptions,
): Promise<Result<T, RetryFailure>> {
  const maxRetries = options?.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries;
  const baseDelayMs = options?.baseDelayMs ?? DEFAULT_RETRY_OPTIONS.baseDelayMs;
  const maxDelayMs = options?.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs;
  const jitter = options?.jitter ?? DEFAULT_RETRY_OPTIONS.jitter;
  const classify = options?.classify ?? classifyError;
  const sleep = options?.sleep ?? defaultSleep;
  const signal = options?.signal;

  for (let attempt = 0; ; attempt++) {
    try {
      return ok(await fn(attempt));
    } catch (error: unknown) {
      const kind = classify(error);
      const attempts = attempt + 1;

      if (!isRetryableKind(kind)) {
        return fail({ kind, attempts, lastError: error, reason: "fatal" });
      }
      if (attempt >= maxRetries) {
        return fail({ kind, attempts, lastError: error, reason: "exhausted" });
      }
      if (signal?.aborted) {
        return fail({ kind, attempts, lastError: error, reason: "aborted" });
      }

      const delayMs = calculateDelay(attempt, baseDelayMs, maxDelayMs, jitter);
      options?.onRetry?.({ attempt: attempts, maxRetries, delayMs, kind, error });

      try {
        await sleep(delayMs, signal);
      } catch {
        return fail({ kind, attempts, lastError: error, reason: "aborted" });
      }
    }
  }
}

/**
 * Throwing variant of {@link retryWithBackoff}: resolves with the value or
 * rethrows the last underlying error.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const result = await retryWithBackoff(fn, options);
  if (result.ok) return result.value;
  throw result.error.lastError;
}
