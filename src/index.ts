/**
 * Notion page ingest client
 * Creates database pages, updates their properties, and attaches uploaded files
 */

// Main client class
export { NotionClient, DEFAULT_BASE_URL, DEFAULT_NOTION_VERSION } from './client.js';
export type { NotionClientOptions, UploadFromPathOptions } from './client.js';
export { loadConfig } from './config.js';

// Building blocks
export { plan, partRange, MULTIPART_THRESHOLD, PART_SIZE } from './lib/planner.js';
export { classify, formatErrorMessage, isUploadUrl, type Result } from './lib/classifier.js';
export { StatusPoller, toUploadStatus } from './lib/status-poller.js';
export { UploadDriver, type ExecuteOptions } from './lib/upload-driver.js';
export { ApiClient } from './lib/api-client.js';
export {
  HttpTransport,
  type Transport,
  type TransportRequest,
  type TransportOutcome,
  type MultipartBody,
} from './lib/transport.js';
export {
  buildPageProperties,
  buildCreatePayload,
  buildUpdatePayload,
  parsePageProperties,
  chunkText,
  paragraphBlocks,
  fileBlock,
  determineBlockType,
  PROPERTY_NAMES,
  type ParsedPage,
} from './lib/page-builder.js';

// File sources
export { BufferFileSource, getMimeType, type FileSource } from './platforms/common.js';
export { PathFileSource } from './platforms/node.js';

// Type exports
export type {
  ClientConfig,
  UploadMode,
  UploadRequest,
  UploadPlan,
  UploadHandle,
  UploadState,
  UploadStatus,
  CompletedUpload,
  PollOptions,
  PageProperties,
  CreatePageOptions,
  PageResponse,
  Block,
  WirePageProperties,
} from './types/index.js';

// Error classes
export {
  ApiError,
  TransportError,
  UploadFailureError,
  PageOperationError,
  InvalidArgumentError,
  isApiError,
  type ApiErrorKind,
  type ClientError,
  type UploadFailureReason,
  type PageOperationDetails,
} from './utils/errors.js';

// Logging
export { initLogger, getLogger, type Logger, type LogLevel } from './utils/logger.js';
