/**
 * Upload mode selection
 */

import type { UploadPlan } from '../types/upload.js';
import { validateExternalUrl, validateFileSize } from './validation.js';

export const MULTIPART_THRESHOLD = 20 * 1024 * 1024; // 20 MB
export const PART_SIZE = 10 * 1024 * 1024; // 10 MB

/**
 * Choose how a file reaches the server.
 *
 * An external URL always wins; otherwise files above the threshold are split
 * into parts and everything else (including files of unknown size) goes up in
 * one request.
 */
export function plan(fileSizeBytes?: number, externalUrl?: string): UploadPlan {
  if (externalUrl !== undefined) {
    validateExternalUrl(externalUrl);
    return { mode: 'external_url', partSizeBytes: PART_SIZE, externalUrl };
  }

  if (fileSizeBytes === undefined) {
    return { mode: 'single_part', partSizeBytes: PART_SIZE };
  }

  validateFileSize(fileSizeBytes);

  if (fileSizeBytes <= MULTIPART_THRESHOLD) {
    return { mode: 'single_part', partSizeBytes: PART_SIZE };
  }

  return {
    mode: 'multi_part',
    partSizeBytes: PART_SIZE,
    numberOfParts: Math.ceil(fileSizeBytes / PART_SIZE),
    fileSizeBytes,
  };
}

/**
 * Byte range [start, end) of a 1-based part
 */
export function partRange(
  partNumber: number,
  partSizeBytes: number,
  fileSizeBytes: number
): { start: number; end: number } {
  const start = (partNumber - 1) * partSizeBytes;
  return { start, end: Math.min(fileSizeBytes, start + partSizeBytes) };
}
