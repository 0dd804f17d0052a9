/**
 * Runs an upload plan against the server: create the job, send the bytes,
 * complete multi-part jobs, then wait for the import to finish
 */

import type { FileSource } from '../platforms/common.js';
import type { CreateFileUploadRequest, CreateFileUploadResponse } from '../types/api.js';
import type {
  CompletedUpload,
  PollOptions,
  UploadHandle,
  UploadPlan,
  UploadRequest,
} from '../types/upload.js';
import {
  InvalidArgumentError,
  UploadFailureError,
  errorMessage,
  isApiError,
  type UploadFailureReason,
} from '../utils/errors.js';
import { getLogger, shortId } from '../utils/logger.js';
import type { ApiClient } from './api-client.js';
import { uploadMultiPart, type PartCallback } from './multi-part.js';
import { uploadSinglePart } from './single-part.js';
import type { StatusPoller } from './status-poller.js';
import { formatBytes } from './validation.js';

const logger = getLogger();

export interface ExecuteOptions {
  onPart?: PartCallback;
  poll?: PollOptions;
}

/**
 * Re-raise any failure as an upload failure, keeping status code and body
 */
function toUploadFailure(
  error: unknown,
  reason: UploadFailureReason,
  uploadId?: string
): UploadFailureError | InvalidArgumentError {
  if (error instanceof UploadFailureError || error instanceof InvalidArgumentError) {
    return error;
  }

  return new UploadFailureError(`File upload failed: ${errorMessage(error)}`, {
    uploadId,
    reason,
    statusCode: isApiError(error) ? error.statusCode : undefined,
    rawBody: isApiError(error) ? error.rawBody : undefined,
    code: isApiError(error) ? error.code : undefined,
    cause: error instanceof Error ? error : undefined,
  });
}

function createRequestFor(request: UploadRequest, plan: UploadPlan): CreateFileUploadRequest {
  switch (plan.mode) {
    case 'external_url':
      return { mode: plan.mode, filename: request.fileName, external_url: plan.externalUrl };
    case 'single_part':
      return { mode: plan.mode, filename: request.fileName, content_type: request.contentType };
    case 'multi_part':
      return {
        mode: plan.mode,
        filename: request.fileName,
        content_type: request.contentType,
        number_of_parts: plan.numberOfParts,
      };
  }
}

export class UploadDriver {
  constructor(
    private readonly api: ApiClient,
    private readonly poller: StatusPoller
  ) {}

  /**
   * Step 1: Submit the plan and get an upload handle
   */
  async submit(request: UploadRequest, plan: UploadPlan): Promise<UploadHandle> {
    logger.debug('Creating file upload', {
      mode: plan.mode,
      contentType: request.contentType,
      size: request.fileSizeBytes !== undefined ? formatBytes(request.fileSizeBytes) : undefined,
      numberOfParts: plan.mode === 'multi_part' ? plan.numberOfParts : undefined,
    });

    let response: CreateFileUploadResponse;
    try {
      response = await this.api.createFileUpload(createRequestFor(request, plan));
    } catch (error) {
      throw toUploadFailure(error, 'request');
    }

    if (plan.mode !== 'external_url' && !response.upload_url) {
      throw new UploadFailureError('File upload created without an upload URL', {
        uploadId: response.id,
        reason: 'request',
      });
    }

    logger.info(`File upload created: ${shortId(response.id)}`, { mode: plan.mode });

    return {
      uploadId: response.id,
      uploadUrl: response.upload_url ?? '',
      plan,
    };
  }

  /**
   * Drive a plan to a server-confirmed upload
   */
  async execute(
    request: UploadRequest,
    plan: UploadPlan,
    source?: FileSource,
    options: ExecuteOptions = {}
  ): Promise<CompletedUpload> {
    this.checkSource(request, plan, source);

    const handle = await this.submit(request, plan);
    const { uploadId, uploadUrl } = handle;

    try {
      // Step 2: Send bytes
      if (plan.mode === 'single_part' && source) {
        await uploadSinglePart(this.api, source, {
          uploadUrl,
          fileName: request.fileName,
          contentType: request.contentType,
        });
        logger.debug(`File body sent: ${shortId(uploadId)}`);
      } else if (plan.mode === 'multi_part' && source) {
        await uploadMultiPart(
          this.api,
          source,
          {
            uploadId,
            uploadUrl,
            fileName: request.fileName,
            contentType: request.contentType,
            numberOfParts: plan.numberOfParts,
            partSizeBytes: plan.partSizeBytes,
          },
          options.onPart
        );
      }
    } catch (error) {
      throw toUploadFailure(error, 'transfer', uploadId);
    }

    // Step 3: Complete multi-part upload
    if (plan.mode === 'multi_part') {
      try {
        await this.api.completeFileUpload(uploadId);
      } catch (error) {
        throw toUploadFailure(error, 'request', uploadId);
      }
      logger.info(`Multi-part upload completed: ${shortId(uploadId)}`, {
        parts: plan.numberOfParts,
      });
    }

    // Step 4: Wait for the server-side import
    const status = await this.poller.waitForCompletion(uploadId, options.poll);

    return {
      uploadId,
      fileName: request.fileName,
      contentType: request.contentType,
      mode: plan.mode,
      status,
    };
  }

  /**
   * Everything but external uploads needs bytes, and their size must match the plan
   */
  private checkSource(request: UploadRequest, plan: UploadPlan, source?: FileSource): void {
    if (plan.mode === 'external_url') {
      return;
    }

    if (!source) {
      throw new InvalidArgumentError(`A file source is required for ${plan.mode} uploads`, 'source');
    }

    const expected = plan.mode === 'multi_part' ? plan.fileSizeBytes : request.fileSizeBytes;
    if (expected !== undefined && expected !== source.size) {
      throw new InvalidArgumentError(
        `File size mismatch: planned ${expected} bytes, source has ${source.size}`,
        'fileSizeBytes'
      );
    }
  }
}
