/**
 * Multi-part upload for files above 20 MB
 */

import type { FileSource } from '../platforms/common.js';
import { errorMessage, isApiError, UploadFailureError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { ApiClient } from './api-client.js';
import { partRange } from './planner.js';

const logger = getLogger();

export interface MultiPartUpload {
  uploadId: string;
  uploadUrl: string;
  fileName: string;
  contentType: string;
  numberOfParts: number;
  partSizeBytes: number;
}

export type PartCallback = (partNumber: number, bytes: number) => void;

/**
 * Upload every part in ascending order, one at a time.
 * The first failing part aborts the upload; parts already sent stay on the server.
 */
export async function uploadMultiPart(
  api: ApiClient,
  source: FileSource,
  upload: MultiPartUpload,
  onPart?: PartCallback
): Promise<void> {
  for (let partNumber = 1; partNumber <= upload.numberOfParts; partNumber++) {
    const { start, end } = partRange(partNumber, upload.partSizeBytes, source.size);
    await uploadPart(api, source, upload, partNumber, start, end);
    onPart?.(partNumber, end - start);
  }
}

/**
 * Upload a single part
 */
async function uploadPart(
  api: ApiClient,
  source: FileSource,
  upload: MultiPartUpload,
  partNumber: number,
  start: number,
  end: number
): Promise<void> {
  logger.debug(`Uploading part ${partNumber}/${upload.numberOfParts}`, {
    bytes: end - start,
  });

  try {
    const data = await source.read(start, end);

    await api.sendFileUpload(upload.uploadUrl, {
      file: {
        field: 'file',
        data,
        fileName: upload.fileName,
        contentType: upload.contentType,
      },
      fields: { part_number: String(partNumber) },
    });
  } catch (error) {
    logger.error(`Part ${partNumber} upload failed`, { error: errorMessage(error) });

    throw new UploadFailureError(`Part ${partNumber} upload failed: ${errorMessage(error)}`, {
      uploadId: upload.uploadId,
      reason: 'transfer',
      statusCode: isApiError(error) ? error.statusCode : undefined,
      rawBody: isApiError(error) ? error.rawBody : undefined,
      code: isApiError(error) ? error.code : undefined,
      cause: error instanceof Error ? error : undefined,
    });
  }
}
