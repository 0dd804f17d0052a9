/**
 * Request and response bodies of the Notion REST API, limited to the fields this client reads or writes
 */

import type { UploadMode } from './upload.js';

export type HttpMethod = 'GET' | 'POST' | 'PATCH';

export interface CreateFileUploadRequest {
  mode: UploadMode;
  filename: string;
  content_type?: string;
  number_of_parts?: number;
  external_url?: string;
}

export interface CreateFileUploadResponse {
  id: string;
  upload_url?: string;
}

export interface FileImportError {
  message?: string;
  code?: string;
  type?: string;
}

export interface FileUploadStatusResponse {
  id: string;
  /** 'pending' | 'uploaded' | 'failed' | 'expired' ... */
  status: string;
  file_import_result?: {
    type?: string;
    error?: FileImportError;
  };
}

export interface ErrorResponse {
  object?: 'error';
  status?: number;
  code?: string;
  message?: string;
}

export interface RichTextItem {
  type: 'text';
  text: {
    content: string;
    link?: { url: string } | null;
  };
  plain_text?: string;
}

export interface SelectOption {
  name: string;
}

export type PropertyValue =
  | { title: RichTextItem[] }
  | { rich_text: RichTextItem[] }
  | { select: SelectOption | null }
  | { multi_select: SelectOption[] }
  | { checkbox: boolean }
  | { url: string | null }
  | { date: { start: string; end?: string | null } | null }
  | { number: number | null };

export type WirePageProperties = Record<string, PropertyValue>;

export type BlockType = 'paragraph' | 'image' | 'video' | 'audio' | 'pdf' | 'file';

export interface ParagraphBlock {
  object: 'block';
  type: 'paragraph';
  paragraph: {
    rich_text: RichTextItem[];
  };
}

export interface FileUploadBlockContent {
  type: 'file_upload';
  file_upload: { id: string };
  caption?: RichTextItem[];
}

export type FileBlockType = Exclude<BlockType, 'paragraph'>;

/** The content sits under the key named by `type` */
export type FileBlock = {
  object: 'block';
  type: FileBlockType;
} & Partial<Record<FileBlockType, FileUploadBlockContent>>;

export type Block = ParagraphBlock | FileBlock;

export interface CreatePageRequest {
  parent: {
    type: 'database_id';
    database_id: string;
  };
  properties: WirePageProperties;
  children?: Block[];
}

export interface UpdatePageRequest {
  properties: WirePageProperties;
}

export interface AppendBlocksRequest {
  children: Block[];
}

export interface PageResponse {
  object?: 'page';
  id: string;
  /** Unvalidated; read through parsePageProperties */
  properties?: Record<string, unknown>;
  url?: string;
}
