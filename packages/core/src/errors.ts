/**
 * @fileoverview Error taxonomy shared by every manager in the client core
 */

export enum ApiErrorType {
  TRANSPORT = 'transport',
  HTTP_STATUS = 'http_status',
  DECODE = 'decode',
  DUPLICATE_SELECTION = 'duplicate_selection',
  UNAUTHENTICATED = 'unauthenticated',
}

export interface ApiErrorOptions {
  status?: number;
  /** Server-provided `detail` string, or the offending value for decode errors. */
  detail?: string;
  /** Transport failures caused by the caller-enforced timeout. */
  timedOut?: boolean;
  original?: unknown;
}

export class ApiError extends Error {
  readonly type: ApiErrorType;
  readonly status?: number;
  readonly detail?: string;
  readonly timedOut: boolean;
  readonly original?: unknown;

  constructor(type: ApiErrorType, message: string, options: ApiErrorOptions = {}) {
    super(message);
    this.name = 'ApiError';
    this.type = type;
    this.status = options.status;
    this.detail = options.detail;
    this.timedOut = options.timedOut ?? false;
    this.original = options.original;
  }

  /** Whether re-issuing the same call could succeed (user-triggered retry only). */
  get retryable(): boolean {
    if (this.type === ApiErrorType.TRANSPORT) return true;
    return this.type === ApiErrorType.HTTP_STATUS && (this.status ?? 0) >= 500;
  }

  get isNotFound(): boolean {
    return this.type === ApiErrorType.HTTP_STATUS && this.status === 404;
  }
}

export function transportError(message: string, options: ApiErrorOptions = {}): ApiError {
  return new ApiError(ApiErrorType.TRANSPORT, message, options);
}

export function httpStatusError(status: number, detail?: string, original?: unknown): ApiError {
  return new ApiError(ApiErrorType.HTTP_STATUS, `HTTP ${status}${detail ? `: ${detail}` : ''}`, { status, detail, original });
}

export function decodeError(message: string, detail?: string): ApiError {
  return new ApiError(ApiErrorType.DECODE, message, { detail });
}

/** `name` is the display name of the already-selected interest. */
export function duplicateSelectionError(name: string): ApiError {
  return new ApiError(ApiErrorType.DUPLICATE_SELECTION, `"${name}" is already selected`, { detail: name });
}

export function unauthenticatedError(message = 'Missing or expired access token', status?: number): ApiError {
  return new ApiError(ApiErrorType.UNAUTHENTICATED, message, { status });
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

/** Normalize anything thrown into an ApiError. Unknown failures count as transport errors. */
export function toApiError(error: unknown): ApiError {
  if (isApiError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return transportError(message, { original: error });
}

export type MutationResult<T> = { ok: true; value: T } | { ok: false; error: ApiError };
