/**
 * Error classes for the Notion client
 *
 * Every public operation either resolves or throws one of these. API errors
 * carry a `kind` discriminant so callers can branch on the failure domain.
 */

export type ApiErrorKind = 'transport' | 'upload_failure' | 'page_operation_failure';

export interface ApiErrorDetails {
  statusCode?: number;
  rawBody?: string;
  code?: string;
  cause?: Error;
}

export abstract class ApiError extends Error {
  abstract readonly kind: ApiErrorKind;
  readonly statusCode?: number;
  readonly rawBody?: string;
  readonly code?: string;

  constructor(message: string, details: ApiErrorDetails = {}) {
    super(message, details.cause ? { cause: details.cause } : undefined);
    this.name = new.target.name;
    this.statusCode = details.statusCode;
    this.rawBody = details.rawBody;
    this.code = details.code;
  }
}

/**
 * Connection failure, timeout, or a success response that could not be read
 */
export class TransportError extends ApiError {
  readonly kind = 'transport' as const;

  constructor(
    message: string,
    details: ApiErrorDetails = {},
    public readonly timedOut: boolean = false
  ) {
    super(message, details);
  }
}

/**
 * Which step of an upload failed:
 * - request: creating the upload or completing it
 * - transfer: sending the file body or one of its parts
 * - rejected: the server reported the import as failed
 * - timeout: polling gave up before a terminal status
 */
export type UploadFailureReason = 'request' | 'transfer' | 'rejected' | 'timeout';

export interface UploadFailureDetails extends ApiErrorDetails {
  uploadId?: string;
  reason?: UploadFailureReason;
}

export class UploadFailureError extends ApiError {
  readonly kind = 'upload_failure' as const;
  readonly uploadId?: string;
  readonly reason: UploadFailureReason;

  constructor(message: string, details: UploadFailureDetails = {}) {
    super(message, details);
    this.uploadId = details.uploadId;
    this.reason = details.reason ?? 'request';
  }
}

export interface PageOperationDetails extends ApiErrorDetails {
  /** Set when the page exists but a later step on it failed */
  pageId?: string;
}

export class PageOperationError extends ApiError {
  readonly kind = 'page_operation_failure' as const;
  readonly pageId?: string;

  constructor(message: string, details: PageOperationDetails = {}) {
    super(message, details);
    this.pageId = details.pageId;
  }
}

/**
 * Caller passed something malformed; raised before any request is sent
 */
export class InvalidArgumentError extends Error {
  readonly kind = 'invalid_argument' as const;

  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export type ClientError =
  | TransportError
  | UploadFailureError
  | PageOperationError
  | InvalidArgumentError;

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
