/**
 * Turns transport outcomes into parsed bodies or typed API errors
 */

import type { ErrorResponse } from '../types/api.js';
import {
  type ApiError,
  PageOperationError,
  TransportError,
  UploadFailureError,
} from '../utils/errors.js';
import type { TransportOutcome } from './transport.js';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Requests against the file upload endpoints, including the send URLs the
 * server hands out, fail as upload errors; everything else is a page operation.
 */
export function isUploadUrl(requestUrl: string): boolean {
  let pathname: string;
  try {
    pathname = new URL(requestUrl).pathname;
  } catch {
    pathname = requestUrl;
  }
  return pathname.split('/').includes('file_uploads');
}

/**
 * Split an API message into sentences and list them one per line
 */
export function formatErrorMessage(message: string): string {
  const sentences = message
    .trim()
    .replace(/\.$/, '')
    .split(/\.\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);

  return `Error details:\n${sentences.map((sentence) => `- ${sentence}`).join('\n')}`;
}

function parseErrorBody(body: string): Pick<ErrorResponse, 'message' | 'code'> | null {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      return null;
    }
    return {
      message: 'message' in parsed && typeof parsed.message === 'string' ? parsed.message : undefined,
      code: 'code' in parsed && typeof parsed.code === 'string' ? parsed.code : undefined,
    };
  } catch {
    return null;
  }
}

export function classify(
  outcome: TransportOutcome,
  requestUrl: string
): Result<unknown, ApiError> {
  if (outcome.type === 'failure') {
    return {
      ok: false,
      error: new TransportError(
        `Request to ${requestUrl} failed: ${outcome.error.message}`,
        { cause: outcome.error },
        outcome.timedOut
      ),
    };
  }

  const { status, statusText, body } = outcome;

  if (status >= 200 && status < 300) {
    if (body.trim().length === 0) {
      return { ok: true, value: {} };
    }
    try {
      return { ok: true, value: JSON.parse(body) };
    } catch (error) {
      return {
        ok: false,
        error: new TransportError(`Malformed response from ${requestUrl}`, {
          statusCode: status,
          rawBody: body,
          cause: error instanceof Error ? error : undefined,
        }),
      };
    }
  }

  const upload = isUploadUrl(requestUrl);
  const prefix = upload ? 'File upload failed' : 'Page operation failed';
  const errorBody = parseErrorBody(body);

  let detail: string;
  let code: string | undefined;
  if (errorBody) {
    detail = formatErrorMessage(errorBody.message || 'Unknown error');
    code = errorBody.code ?? 'unknown_error';
  } else {
    detail = `${status} ${statusText}`.trim();
  }

  const message = `${prefix}: ${detail}`;
  const details = { statusCode: status, rawBody: body, code };

  return {
    ok: false,
    error: upload
      ? new UploadFailureError(message, { ...details, reason: 'request' })
      : new PageOperationError(message, details),
  };
}
