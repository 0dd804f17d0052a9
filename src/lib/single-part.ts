/**
 * Single request upload for files up to the multi-part threshold
 */

import type { FileSource } from '../platforms/common.js';
import type { ApiClient } from './api-client.js';

export interface SinglePartUpload {
  uploadUrl: string;
  fileName: string;
  contentType: string;
}

/**
 * Send the whole file as one multipart form request
 */
export async function uploadSinglePart(
  api: ApiClient,
  source: FileSource,
  upload: SinglePartUpload
): Promise<void> {
  const data = await source.read(0, source.size);

  await api.sendFileUpload(upload.uploadUrl, {
    file: {
      field: 'file',
      data,
      fileName: upload.fileName,
      contentType: upload.contentType,
    },
    fields: {},
  });
}
