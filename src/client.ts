/**
 * Main NotionClient class
 */

import type { ResolvedClientConfig, ClientConfig } from './types/config.js';
import type { Block, PageResponse } from './types/api.js';
import type { CreatePageOptions, PageProperties } from './types/page.js';
import type {
  CompletedUpload,
  PollOptions,
  UploadHandle,
  UploadPlan,
  UploadRequest,
  UploadStatus,
} from './types/upload.js';
import { ApiClient } from './lib/api-client.js';
import { HttpTransport, type Transport } from './lib/transport.js';
import { plan } from './lib/planner.js';
import { StatusPoller, DEFAULT_POLL_ATTEMPTS, DEFAULT_POLL_INITIAL_DELAY } from './lib/status-poller.js';
import { UploadDriver, type ExecuteOptions } from './lib/upload-driver.js';
import {
  batchBlocks,
  buildCreatePayload,
  buildUpdatePayload,
  fileBlock,
  paragraphBlocks,
  parsePageProperties,
  type ParsedPage,
} from './lib/page-builder.js';
import { validateClientConfig, validateId } from './lib/validation.js';
import type { FileSource } from './platforms/common.js';
import { PathFileSource } from './platforms/node.js';
import { PageOperationError, errorMessage, isApiError } from './utils/errors.js';
import { getLogger, shortId } from './utils/logger.js';
import type { Sleep } from './utils/retry.js';

export const DEFAULT_BASE_URL = 'https://api.notion.com/v1';
export const DEFAULT_NOTION_VERSION = '2022-06-28';
export const DEFAULT_TIMEOUT = 30000; // 30 seconds

export interface NotionClientOptions {
  /**
   * Replaces the axios transport
   */
  transport?: Transport;

  /**
   * Replaces the timer used between status polls
   */
  sleep?: Sleep;
}

export interface UploadFromPathOptions extends ExecuteOptions {
  /** Defaults to a type guessed from the file extension */
  contentType?: string;
  /** Defaults to the file's base name */
  fileName?: string;
}

/**
 * Client for creating and updating database pages and attaching uploaded files
 *
 * Connections are opened on the first request and held until close();
 * NotionClient.use() closes them on every exit path.
 */
export class NotionClient {
  private readonly config: ResolvedClientConfig;
  private readonly transport: Transport;
  private readonly api: ApiClient;
  private readonly poller: StatusPoller;
  private readonly driver: UploadDriver;
  private logger = getLogger();
  private parentOverride: string | null = null;

  constructor(config: ClientConfig, options: NotionClientOptions = {}) {
    validateClientConfig(config);

    this.config = {
      apiKey: config.apiKey,
      databaseId: config.databaseId,
      notionVersion: config.notionVersion ?? DEFAULT_NOTION_VERSION,
      baseUrl: config.baseUrl ?? DEFAULT_BASE_URL,
      timeout: config.timeout ?? DEFAULT_TIMEOUT,
      pollAttempts: config.pollAttempts ?? DEFAULT_POLL_ATTEMPTS,
      pollInitialDelay: config.pollInitialDelay ?? DEFAULT_POLL_INITIAL_DELAY,
    };

    this.transport = options.transport ?? new HttpTransport({ timeout: this.config.timeout });
    this.api = new ApiClient(this.transport, {
      baseUrl: this.config.baseUrl,
      apiKey: this.config.apiKey,
      notionVersion: this.config.notionVersion,
    });
    this.poller = new StatusPoller(this.api, {
      maxAttempts: this.config.pollAttempts,
      initialDelayMs: this.config.pollInitialDelay,
      sleep: options.sleep,
    });
    this.driver = new UploadDriver(this.api, this.poller);

    this.logger.debug('NotionClient initialized', {
      databaseId: this.config.databaseId,
      version: this.config.notionVersion,
    });
  }

  /**
   * Run fn with a client that is closed afterwards, whether fn resolves or throws
   */
  static async use<T>(
    config: ClientConfig,
    fn: (client: NotionClient) => Promise<T>,
    options: NotionClientOptions = {}
  ): Promise<T> {
    const client = new NotionClient(config, options);
    try {
      return await fn(client);
    } finally {
      await client.close();
    }
  }

  /**
   * Database new pages go under: the override if set, else the configured one
   */
  get parentId(): string {
    const id = this.parentOverride ?? this.config.databaseId;
    if (!id) {
      throw new PageOperationError('No parent database configured');
    }
    return id;
  }

  set parentId(value: string) {
    validateId(value, 'parentId');
    this.logger.debug(`Setting parent database: ${value}`);
    this.parentOverride = value;
  }

  /**
   * Release pooled connections
   */
  async close(): Promise<void> {
    await this.transport.close();
  }

  // Pages

  /**
   * Create a page in the parent database, with optional body text
   * @returns id of the new page
   */
  async createPage(title: string, options: CreatePageOptions = {}): Promise<string> {
    const parentId = options.parentId ?? this.parentId;
    validateId(parentId, 'parentId');

    const blocks = options.content ? paragraphBlocks(options.content) : [];
    const [firstBatch = [], ...remaining] = batchBlocks(blocks);

    this.logger.debug('Creating page', {
      titleLength: title.length,
      blocks: blocks.length,
      parentId,
    });

    try {
      const page = await this.api.createPage(
        buildCreatePayload(title, options.properties, parentId, firstBatch)
      );
      if (!page.id) {
        throw new PageOperationError('Page creation failed: no page id returned');
      }

      await this.appendRemaining(page.id, remaining);

      this.logger.info(`Created page: ${page.id}`, { title, parentId });
      return page.id;
    } catch (error) {
      this.logger.error('Failed to create page', {
        error: errorMessage(error),
        parentId,
        title,
        pageId: error instanceof PageOperationError ? error.pageId : undefined,
      });
      throw error;
    }
  }

  /**
   * The page already exists here, so a failed append reports its id
   */
  private async appendRemaining(pageId: string, batches: Block[][]): Promise<void> {
    for (const [index, children] of batches.entries()) {
      try {
        await this.api.appendBlocks(pageId, { children });
      } catch (error) {
        throw new PageOperationError(
          `Page ${pageId} was created but appending content batch ${index + 2} failed: ${errorMessage(error)}`,
          {
            pageId,
            statusCode: isApiError(error) ? error.statusCode : undefined,
            rawBody: isApiError(error) ? error.rawBody : undefined,
            code: isApiError(error) ? error.code : undefined,
            cause: error instanceof Error ? error : undefined,
          }
        );
      }
    }
  }

  /**
   * Append text to a page as paragraph blocks
   */
  async appendText(pageId: string, text: string): Promise<void> {
    validateId(pageId, 'pageId');

    const blocks = paragraphBlocks(text);
    for (const children of batchBlocks(blocks)) {
      await this.api.appendBlocks(pageId, { children });
    }

    this.logger.debug(`Text appended to page ${shortId(pageId)}`, { blocks: blocks.length });
  }

  async getPage(pageId: string): Promise<PageResponse> {
    validateId(pageId, 'pageId');
    return this.api.getPage(pageId);
  }

  /**
   * Fetch a page and read its properties through the fixed schema
   */
  async getPageProperties(pageId: string): Promise<ParsedPage> {
    const page = await this.getPage(pageId);
    return parsePageProperties(page.properties ?? {});
  }

  async updatePage(pageId: string, properties: PageProperties & { title?: string }): Promise<PageResponse> {
    validateId(pageId, 'pageId');

    try {
      const page = await this.api.updatePage(pageId, buildUpdatePayload(properties));
      this.logger.info(`Updated page properties: ${shortId(pageId)}`, {
        properties: Object.keys(properties),
      });
      return page;
    } catch (error) {
      this.logger.error('Failed to update page properties', {
        error: errorMessage(error),
        pageId,
      });
      throw error;
    }
  }

  // Uploads

  planUpload(request: UploadRequest): UploadPlan {
    return plan(request.fileSizeBytes, request.externalUrl);
  }

  /**
   * Create the upload job only; bytes are sent by uploadFile
   */
  async createFileUpload(request: UploadRequest): Promise<UploadHandle> {
    return this.driver.submit(request, this.planUpload(request));
  }

  /**
   * Upload a file and wait until the server has imported it
   * @param source - bytes of the file; not needed for external URLs
   */
  async uploadFile(
    request: UploadRequest,
    source?: FileSource,
    options: ExecuteOptions = {}
  ): Promise<CompletedUpload> {
    const uploadPlan = this.planUpload(request);
    return this.driver.execute(request, uploadPlan, source, options);
  }

  /**
   * Upload a file from disk
   */
  async uploadFileFromPath(
    filePath: string,
    options: UploadFromPathOptions = {}
  ): Promise<CompletedUpload> {
    const source = await PathFileSource.open(filePath);
    const { contentType, fileName, ...executeOptions } = options;

    return this.uploadFile(
      {
        fileName: fileName ?? source.fileName,
        contentType: contentType ?? source.contentType,
        fileSizeBytes: source.size,
      },
      source,
      executeOptions
    );
  }

  async waitForFileUpload(uploadId: string, options: PollOptions = {}): Promise<UploadStatus> {
    validateId(uploadId, 'uploadId');
    return this.poller.waitForCompletion(uploadId, options);
  }

  /**
   * Append a block referencing a completed upload to a page
   */
  async attachFile(pageId: string, upload: CompletedUpload): Promise<void> {
    validateId(pageId, 'pageId');

    const block = fileBlock(upload);
    try {
      await this.api.appendBlocks(pageId, { children: [block] });
      this.logger.info(`File block appended to page ${shortId(pageId)}`, {
        blockType: block.type,
        uploadId: shortId(upload.uploadId),
      });
    } catch (error) {
      this.logger.error('Failed to append file block', {
        error: errorMessage(error),
        pageId,
        blockType: block.type,
      });
      throw error;
    }
  }

  /**
   * Upload a file and attach it to a page
   */
  async uploadAndAttach(
    pageId: string,
    request: UploadRequest,
    source?: FileSource,
    options: ExecuteOptions = {}
  ): Promise<CompletedUpload> {
    validateId(pageId, 'pageId');
    const upload = await this.uploadFile(request, source, options);
    await this.attachFile(pageId, upload);
    return upload;
  }
}
