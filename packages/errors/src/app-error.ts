export type ErrorCode =
  | "CONFIGURATION_ERROR"
  | "UNSUPPORTED_SOURCE_KIND"
  | "SOURCE_NOT_FOUND"
  | "SOURCE_UNREACHABLE"
  | "RATE_LIMITED"
  | "SERVICE_UNAVAILABLE"
  | "INVALID_REQUEST"
  | "NOT_CONFIGURED"
  | "EMBEDDING_SERVICE_ERROR"
  | "COLLECTION_NOT_FOUND"
  | "DIMENSION_MISMATCH"
  | "UPSERT_FAILED"
  | "ALIAS_NOT_FOUND"
  | "INDEX_STORE_ERROR";

export interface AppErrorOptions {
  message: string;
  code: ErrorCode;
  /** HTTP status of the remote call that produced the error, when there was one. */
  statusCode?: number;
  isOperational?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode?: number;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor({
    message,
    code,
    statusCode,
    isOperational = true,
    details,
    cause,
  }: AppErrorOptions) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;

    // Restore prototype chain (necessary when extending built-ins in TS)
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }
}

/** Best-effort message of any thrown value. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}
