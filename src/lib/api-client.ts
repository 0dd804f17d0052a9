/**
 * Client for the Notion REST endpoints used by page creation and file uploads
 */

import type {
  AppendBlocksRequest,
  CreateFileUploadRequest,
  CreateFileUploadResponse,
  CreatePageRequest,
  FileUploadStatusResponse,
  HttpMethod,
  PageResponse,
  UpdatePageRequest,
} from '../types/api.js';
import { TransportError } from '../utils/errors.js';
import { isRecord, readString } from '../utils/guards.js';
import { classify } from './classifier.js';
import type { MultipartBody, Transport } from './transport.js';

export interface ApiClientConfig {
  baseUrl: string;
  apiKey: string;
  notionVersion: string;
}

export interface RequestBody {
  json?: unknown;
  multipart?: MultipartBody;
}

export class ApiClient {
  private readonly baseUrl: string;

  constructor(
    private readonly transport: Transport,
    private readonly config: ApiClientConfig
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  /**
   * Absolute URL for an API path; absolute URLs pass through unchanged
   */
  url(pathOrUrl: string): string {
    return /^https?:\/\//.test(pathOrUrl) ? pathOrUrl : `${this.baseUrl}${pathOrUrl}`;
  }

  private headers(body: RequestBody): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.config.apiKey}`,
      'Notion-Version': this.config.notionVersion,
    };

    // Multipart bodies carry their own boundary header
    if (body.json !== undefined && !body.multipart) {
      headers['Content-Type'] = 'application/json';
    }

    return headers;
  }

  /**
   * Send a request and return the parsed body, or throw the classified error
   */
  async request(method: HttpMethod, pathOrUrl: string, body: RequestBody = {}): Promise<unknown> {
    const url = this.url(pathOrUrl);

    const outcome = await this.transport.request({
      method,
      url,
      headers: this.headers(body),
      json: body.json,
      multipart: body.multipart,
    });

    const result = classify(outcome, url);
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }

  /**
   * Create an upload job
   */
  async createFileUpload(params: CreateFileUploadRequest): Promise<CreateFileUploadResponse> {
    const url = this.url('/file_uploads');
    const data = await this.request('POST', url, { json: params });
    const id = isRecord(data) ? readString(data, 'id') : undefined;
    if (!isRecord(data) || !id) {
      throw this.malformed(url, 'upload id', data);
    }
    return { id, upload_url: readString(data, 'upload_url') };
  }

  /**
   * Send file bytes (the whole file or one part) to an upload URL
   */
  async sendFileUpload(uploadUrl: string, multipart: MultipartBody): Promise<void> {
    await this.request('POST', uploadUrl, { multipart });
  }

  /**
   * Mark a multi-part upload as complete
   */
  async completeFileUpload(uploadId: string): Promise<void> {
    await this.request('POST', `/file_uploads/${uploadId}/complete`);
  }

  /**
   * Fetch the current state of an upload job
   */
  async getFileUpload(uploadId: string): Promise<FileUploadStatusResponse> {
    const url = this.url(`/file_uploads/${uploadId}`);
    const data = await this.request('GET', url);
    if (!isRecord(data)) {
      throw this.malformed(url, 'upload status', data);
    }

    const response: FileUploadStatusResponse = {
      id: readString(data, 'id') ?? uploadId,
      status: readString(data, 'status') ?? 'pending',
    };

    const importResult = data.file_import_result;
    if (isRecord(importResult)) {
      const error = importResult.error;
      response.file_import_result = {
        type: readString(importResult, 'type'),
        error: isRecord(error)
          ? { message: readString(error, 'message'), code: readString(error, 'code'), type: readString(error, 'type') }
          : undefined,
      };
    }

    return response;
  }

  async createPage(params: CreatePageRequest): Promise<PageResponse> {
    return this.page('POST', '/pages', params);
  }

  async getPage(pageId: string): Promise<PageResponse> {
    return this.page('GET', `/pages/${pageId}`);
  }

  async updatePage(pageId: string, params: UpdatePageRequest): Promise<PageResponse> {
    return this.page('PATCH', `/pages/${pageId}`, params);
  }

  async appendBlocks(blockId: string, params: AppendBlocksRequest): Promise<void> {
    await this.request('PATCH', `/blocks/${blockId}/children`, { json: params });
  }

  private async page(method: HttpMethod, path: string, json?: unknown): Promise<PageResponse> {
    const url = this.url(path);
    const data = await this.request(method, url, json === undefined ? {} : { json });
    if (!isRecord(data)) {
      throw this.malformed(url, 'page', data);
    }

    const page: PageResponse = { id: readString(data, 'id') ?? '' };
    const pageUrl = readString(data, 'url');
    if (pageUrl) page.url = pageUrl;
    if (isRecord(data.properties)) page.properties = data.properties;
    return page;
  }

  private malformed(url: string, expected: string, data: unknown): TransportError {
    return new TransportError(`Malformed response from ${url}: missing ${expected}`, {
      rawBody: JSON.stringify(data),
    });
  }
}
