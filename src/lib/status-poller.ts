/**
 * Polls an upload job until the server reports a terminal state
 */

import type { FileUploadStatusResponse } from '../types/api.js';
import type { PollOptions, UploadStatus } from '../types/upload.js';
import { type ApiError, UploadFailureError, isApiError } from '../utils/errors.js';
import { getLogger, shortId } from '../utils/logger.js';
import { backoffDelays, sleep as defaultSleep, type Sleep } from '../utils/retry.js';
import type { ApiClient } from './api-client.js';
import { validateNonNegativeNumber, validatePositiveInteger } from './validation.js';

const logger = getLogger();

export const DEFAULT_POLL_ATTEMPTS = 6;
export const DEFAULT_POLL_INITIAL_DELAY = 5000; // 5 seconds

/**
 * Map the server's status string onto the three upload states.
 * 'expired' can never become 'uploaded', so it counts as a failure.
 */
export function toUploadStatus(response: FileUploadStatusResponse): UploadStatus {
  switch (response.status) {
    case 'uploaded':
      return { state: 'uploaded', serverStatus: response.status };
    case 'failed':
    case 'expired': {
      const error = response.file_import_result?.error;
      return {
        state: 'failed',
        serverStatus: response.status,
        errorDetail: {
          message: error?.message ?? (response.status === 'expired' ? 'Upload expired' : 'Unknown error'),
          code: error?.code,
        },
      };
    }
    default:
      return { state: 'pending', serverStatus: response.status };
  }
}

export interface StatusPollerOptions extends PollOptions {
  sleep?: Sleep;
}

export class StatusPoller {
  private readonly maxAttempts: number;
  private readonly initialDelayMs: number;
  private readonly sleep: Sleep;

  constructor(
    private readonly api: ApiClient,
    options: StatusPollerOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_POLL_ATTEMPTS;
    this.initialDelayMs = options.initialDelayMs ?? DEFAULT_POLL_INITIAL_DELAY;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Resolve once the upload is 'uploaded'.
   * Bad attempt counts or delays raise InvalidArgumentError before the first poll.
   *
   * Each poll is one attempt, whether it returned a pending status or an API
   * error. A 'failed' status ends polling at once; running out of attempts
   * ends it with a timeout.
   */
  async waitForCompletion(uploadId: string, options: PollOptions = {}): Promise<UploadStatus> {
    const maxAttempts = options.maxAttempts ?? this.maxAttempts;
    const initialDelay = options.initialDelayMs ?? this.initialDelayMs;
    validatePositiveInteger(maxAttempts, 'maxAttempts');
    validateNonNegativeNumber(initialDelay, 'initialDelayMs');

    const delays = backoffDelays({ initialDelay, multiplier: 2 });

    logger.debug(`Waiting for file upload ${shortId(uploadId)}`, { maxAttempts });

    let lastError: ApiError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      let status: UploadStatus | undefined;

      try {
        status = toUploadStatus(await this.api.getFileUpload(uploadId));
        lastError = undefined;
      } catch (error) {
        if (!isApiError(error)) {
          throw error;
        }
        lastError = error;
        logger.warn(`Error checking status of upload ${shortId(uploadId)}`, {
          attempt: `${attempt}/${maxAttempts}`,
          kind: error.kind,
          error: error.message,
        });
      }

      if (status?.state === 'uploaded') {
        logger.info(`File upload completed: ${shortId(uploadId)}`);
        return status;
      }

      if (status?.state === 'failed') {
        const detail = status.errorDetail;
        logger.error(`File upload failed: ${shortId(uploadId)}`, { error: detail });
        throw new UploadFailureError(`File upload failed: ${detail?.message ?? 'Unknown error'}`, {
          uploadId,
          reason: 'rejected',
          code: detail?.code,
        });
      }

      if (attempt < maxAttempts) {
        const delay = delays.next().value;
        if (status) {
          logger.debug(`File upload still ${status.serverStatus}: ${shortId(uploadId)}`, {
            attempt: `${attempt}/${maxAttempts}`,
            delay,
          });
        }
        await this.sleep(delay);
      }
    }

    const suffix = lastError ? `: ${lastError.message}` : '';
    throw new UploadFailureError(
      `Timed out waiting for file upload ${uploadId} after ${maxAttempts} attempts${suffix}`,
      {
        uploadId,
        reason: 'timeout',
        statusCode: lastError?.statusCode,
        rawBody: lastError?.rawBody,
        cause: lastError,
      }
    );
  }
}
