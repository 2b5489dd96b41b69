export type FetchErrorKind = 'not-found' | 'unauthorized' | 'rate-limited' | 'transient-network';

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly status?: number;

  constructor(kind: FetchErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'FetchError';
    this.kind = kind;
    this.status = status;
  }
}

// Thrown instead of starting work once the cycle that asked for it was aborted.
export class CancelledError extends Error {
  constructor(message = 'cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

// Errors surfaced to API callers carry an HTTP status and a short code.
export class ApiError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.code = code;
  }
}

export class ValidationError extends ApiError {
  constructor(message: string) {
    super(400, 'validation', message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string) {
    super(404, 'not-found', message);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends ApiError {
  constructor(message: string) {
    super(409, 'conflict', message);
    this.name = 'ConflictError';
  }
}

export class DuplicateSentRecordError extends Error {
  constructor(postId: string, channelId: string) {
    super(`post ${postId} already recorded for channel ${channelId}`);
    this.name = 'DuplicateSentRecordError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
