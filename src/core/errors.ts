/**
 * Error taxonomy for timer sync and control operations.
 *
 * Every failure surfaced to a caller is one of these, so the route layer can
 * answer with a specific status and the remote system that failed.
 */

// ============================================================================
// Types
// ============================================================================

export type RemoteName = 'singular' | 'tricaster';

export type SyncErrorKind =
  | 'not_configured'
  | 'remote_unavailable'
  | 'parse_failure'
  | 'field_not_resolved'
  | 'not_found'
  | 'invalid_argument';

export interface ErrorBody {
  error: string;
  kind: SyncErrorKind | 'internal';
  remote?: RemoteName;
}

// ============================================================================
// Error Classes
// ============================================================================

export abstract class SyncError extends Error {
  abstract readonly kind: SyncErrorKind;
  abstract readonly httpStatus: number;
  readonly remote: RemoteName | undefined;

  protected constructor(message: string, remote?: RemoteName) {
    super(message);
    this.remote = remote;
  }
}

/**
 * Missing token, host or field mapping. Fixable by the operator.
 */
export class NotConfiguredError extends SyncError {
  readonly kind = 'not_configured';
  readonly httpStatus = 400;

  constructor(message: string, remote?: RemoteName) {
    super(message, remote);
    this.name = 'NotConfiguredError';
    Error.captureStackTrace?.(this, NotConfiguredError);
  }
}

/**
 * Network failure, timeout or non-success status from a remote system.
 */
export class RemoteUnavailableError extends SyncError {
  readonly kind = 'remote_unavailable';
  readonly httpStatus = 503;
  /** HTTP status when the remote answered, undefined on transport failure */
  readonly status: number | undefined;

  constructor(remote: RemoteName, message: string, status?: number) {
    super(`${remote} unavailable: ${message}`, remote);
    this.name = 'RemoteUnavailableError';
    this.status = status;
    Error.captureStackTrace?.(this, RemoteUnavailableError);
  }
}

/**
 * Response body that could not be parsed (likely a protocol/firmware mismatch).
 */
export class ParseFailureError extends SyncError {
  readonly kind = 'parse_failure';
  readonly httpStatus = 502;

  constructor(remote: RemoteName, message: string) {
    super(`${remote} response could not be parsed: ${message}`, remote);
    this.name = 'ParseFailureError';
    Error.captureStackTrace?.(this, ParseFailureError);
  }
}

/**
 * Field ids absent from the control app model, usually stale configuration.
 */
export class FieldNotResolvedError extends SyncError {
  readonly kind = 'field_not_resolved';
  readonly httpStatus = 409;
  readonly fieldIds: readonly string[];

  constructor(fieldIds: readonly string[]) {
    super(`Field(s) not found in control app model: ${fieldIds.join(', ')}`, 'singular');
    this.name = 'FieldNotResolvedError';
    this.fieldIds = fieldIds;
    Error.captureStackTrace?.(this, FieldNotResolvedError);
  }
}

/**
 * Unknown subcomposition slug/id, field, or DDR data.
 */
export class NotFoundError extends SyncError {
  readonly kind = 'not_found';
  readonly httpStatus = 404;

  constructor(message: string, remote?: RemoteName) {
    super(message, remote);
    this.name = 'NotFoundError';
    Error.captureStackTrace?.(this, NotFoundError);
  }
}

/**
 * Request that cannot apply to its target, e.g. a time control on a text field.
 */
export class InvalidArgumentError extends SyncError {
  readonly kind = 'invalid_argument';
  readonly httpStatus = 400;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
    Error.captureStackTrace?.(this, InvalidArgumentError);
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Render an error for an API response.
 */
export function toErrorBody(error: unknown): ErrorBody {
  if (isSyncError(error)) {
    return error.remote
      ? { error: error.message, kind: error.kind, remote: error.remote }
      : { error: error.message, kind: error.kind };
  }
  return { error: errorMessage(error), kind: 'internal' };
}

export function httpStatusOf(error: unknown): number {
  return isSyncError(error) ? error.httpStatus : 500;
}
