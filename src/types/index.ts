/**
 * Type Definitions Export
 */

// Client Configuration Types
export type { ClientConfig, ResolvedClientConfig } from './config.js';

// Notion API Types
export type {
  HttpMethod,
  CreateFileUploadRequest,
  CreateFileUploadResponse,
  FileUploadStatusResponse,
  FileImportError,
  ErrorResponse,
  RichTextItem,
  SelectOption,
  PropertyValue,
  WirePageProperties,
  BlockType,
  FileBlockType,
  ParagraphBlock,
  FileBlock,
  FileUploadBlockContent,
  Block,
  CreatePageRequest,
  UpdatePageRequest,
  AppendBlocksRequest,
  PageResponse,
} from './api.js';

// Upload Types
export type {
  UploadMode,
  UploadRequest,
  UploadPlan,
  UploadHandle,
  UploadState,
  UploadStatus,
  CompletedUpload,
  PollOptions,
} from './upload.js';

// Page Types
export type { PageProperties, CreatePageOptions } from './page.js';
