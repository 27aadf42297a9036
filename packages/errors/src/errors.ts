import { AppError } from "./app-error.js";

type ErrorExtras = { details?: Record<string, unknown>; cause?: unknown };

export class ConfigurationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(
    message = "Invalid configuration",
    fields: Record<string, string> = {},
    options?: ErrorExtras,
  ) {
    super({ message, code: "CONFIGURATION_ERROR", ...options });
    this.fields = fields;
  }
}

export class UnsupportedSourceKindError extends AppError {
  public readonly kind: string;

  constructor(kind: string, supported: readonly string[]) {
    super({
      message: `Unsupported source kind: ${kind}. Supported: ${supported.join(", ")}`,
      code: "UNSUPPORTED_SOURCE_KIND",
      details: { supported: [...supported] },
    });
    this.kind = kind;
  }
}

export class SourceNotFoundError extends AppError {
  constructor(message = "Source not found", options?: ErrorExtras) {
    super({ message, code: "SOURCE_NOT_FOUND", statusCode: 404, ...options });
  }
}

export class SourceUnreachableError extends AppError {
  constructor(message = "Source unreachable", options?: ErrorExtras & { statusCode?: number }) {
    super({ message, code: "SOURCE_UNREACHABLE", ...options });
  }
}

export class RateLimitedError extends AppError {
  /** Seconds the service asked us to wait, when it said. */
  public readonly retryAfter?: number;

  constructor(message = "Rate limited", retryAfter?: number, options?: ErrorExtras) {
    super({ message, code: "RATE_LIMITED", statusCode: 429, ...options });
    this.retryAfter = retryAfter;
  }
}

export class ServiceUnavailableError extends AppError {
  public readonly service: string;

  constructor(
    message = "Service unavailable",
    service: string,
    options?: ErrorExtras & { statusCode?: number },
  ) {
    super({ message, code: "SERVICE_UNAVAILABLE", statusCode: 503, ...options });
    this.service = service;
  }
}

export class InvalidRequestError extends AppError {
  constructor(message = "Invalid request", options?: ErrorExtras & { statusCode?: number }) {
    super({ message, code: "INVALID_REQUEST", statusCode: 400, ...options });
  }
}

export class NotConfiguredError extends AppError {
  constructor(message = "Service not configured", options?: ErrorExtras) {
    super({ message, code: "NOT_CONFIGURED", ...options });
  }
}

export class EmbeddingServiceError extends AppError {
  public readonly attempts: number;

  constructor(message: string, attempts: number, options?: ErrorExtras) {
    super({ message, code: "EMBEDDING_SERVICE_ERROR", ...options });
    this.attempts = attempts;
  }
}

export class CollectionNotFoundError extends AppError {
  public readonly collection: string;

  constructor(collection: string, options?: ErrorExtras) {
    super({
      message: `Collection ${collection} not found`,
      code: "COLLECTION_NOT_FOUND",
      statusCode: 404,
      ...options,
    });
    this.collection = collection;
  }
}

export class DimensionMismatchError extends AppError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number, context?: string) {
    const where = context ? ` (${context})` : "";
    super({
      message: `Dimension mismatch${where}: expected ${String(expected)}, got ${String(actual)}`,
      code: "DIMENSION_MISMATCH",
      isOperational: false,
      details: { expected, actual },
    });
    this.expected = expected;
    this.actual = actual;
  }
}

export class UpsertFailedError extends AppError {
  public readonly pointCount: number;

  constructor(collection: string, pointCount: number, options?: ErrorExtras) {
    super({
      message: `Upsert of ${String(pointCount)} points into ${collection} failed`,
      code: "UPSERT_FAILED",
      ...options,
    });
    this.pointCount = pointCount;
  }
}

export class AliasNotFoundError extends AppError {
  public readonly alias: string;

  constructor(alias: string, options?: ErrorExtras) {
    super({
      message: `Alias ${alias} not found`,
      code: "ALIAS_NOT_FOUND",
      statusCode: 404,
      ...options,
    });
    this.alias = alias;
  }
}

export class IndexStoreError extends AppError {
  constructor(message: string, options?: ErrorExtras & { statusCode?: number }) {
    super({ message, code: "INDEX_STORE_ERROR", ...options });
  }
}
