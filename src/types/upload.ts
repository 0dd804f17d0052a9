/**
 * Upload planning and status types
 */

export type UploadMode = 'single_part' | 'multi_part' | 'external_url';

export interface UploadRequest {
  /** File name sent to the server and used as the block caption */
  fileName: string;

  /** MIME type of the file; also decides the block type */
  contentType: string;

  /** Size in bytes; required for anything but external uploads */
  fileSizeBytes?: number;

  /** https:// URL the server fetches the file from */
  externalUrl?: string;
}

export type UploadPlan =
  | { mode: 'single_part'; partSizeBytes: number }
  | { mode: 'external_url'; partSizeBytes: number; externalUrl: string }
  | { mode: 'multi_part'; partSizeBytes: number; numberOfParts: number; fileSizeBytes: number };

export interface UploadHandle {
  uploadId: string;
  uploadUrl: string;
  plan: UploadPlan;
}

export type UploadState = 'pending' | 'uploaded' | 'failed';

export interface UploadStatus {
  state: UploadState;
  /** Raw status string reported by the server */
  serverStatus: string;
  errorDetail?: {
    message: string;
    code?: string;
  };
}

export interface CompletedUpload {
  uploadId: string;
  fileName: string;
  contentType: string;
  mode: UploadMode;
  status: UploadStatus;
}

export interface PollOptions {
  /** @default 6 */
  maxAttempts?: number;

  /** Delay after the first pending attempt, doubled after each one. @default 5000 */
  initialDelayMs?: number;
}
