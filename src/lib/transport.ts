/**
 * HTTP transport (axios-based)
 *
 * Never throws for HTTP statuses: every request resolves to either the raw
 * response or a transport failure, and classification happens elsewhere.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import http from 'http';
import https from 'https';
import type { HttpMethod } from '../types/api.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

export interface MultipartFile {
  field: string;
  data: Uint8Array;
  fileName: string;
  contentType: string;
}

export interface MultipartBody {
  file: MultipartFile;
  fields: Record<string, string>;
}

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  json?: unknown;
  multipart?: MultipartBody;
}

export type TransportOutcome =
  | { type: 'response'; status: number; statusText: string; body: string }
  | { type: 'failure'; error: Error; timedOut: boolean };

export interface Transport {
  request(request: TransportRequest): Promise<TransportOutcome>;
  /**
   * Release pooled connections; the next request opens a new pool
   */
  close(): Promise<void>;
}

export interface HttpTransportOptions {
  /**
   * Request timeout in milliseconds
   * @default 30000
   */
  timeout?: number;

  /**
   * Replaces axios' network adapter
   */
  adapter?: AxiosAdapter;
}

interface Session {
  client: AxiosInstance;
  httpAgent: http.Agent;
  httpsAgent: https.Agent;
}

export class HttpTransport implements Transport {
  private readonly timeout: number;
  private readonly adapter?: AxiosAdapter;
  private session: Session | null = null;

  constructor(options: HttpTransportOptions = {}) {
    this.timeout = options.timeout ?? 30000; // 30 seconds
    this.adapter = options.adapter;
  }

  get isOpen(): boolean {
    return this.session !== null;
  }

  /**
   * Create the axios instance and its keep-alive agents on first use
   */
  private open(): Session {
    if (this.session) {
      return this.session;
    }

    const httpAgent = new http.Agent({ keepAlive: true });
    const httpsAgent = new https.Agent({ keepAlive: true });
    const client = axios.create({
      timeout: this.timeout,
      httpAgent,
      httpsAgent,
      adapter: this.adapter,
      responseType: 'text',
      // Keep the body as text; parsing belongs to the classifier
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      maxBodyLength: Infinity,
      maxContentLength: Infinity,
    });

    this.session = { client, httpAgent, httpsAgent };
    logger.debug('HTTP session opened');
    return this.session;
  }

  async request(request: TransportRequest): Promise<TransportOutcome> {
    const { client } = this.open();

    logger.debug(`HTTP Request: ${request.method} ${request.url}`, {
      hasJson: request.json !== undefined,
      multipart: request.multipart ? Object.keys(request.multipart.fields) : undefined,
    });

    try {
      const response = await client.request<unknown>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: this.encodeBody(request),
      });

      const body = typeof response.data === 'string' ? response.data : '';
      logger.debug(`HTTP Response: ${response.status}`, { url: request.url });

      return {
        type: 'response',
        status: response.status,
        statusText: response.statusText,
        body,
      };
    } catch (error) {
      return this.toFailure(error);
    }
  }

  async close(): Promise<void> {
    if (!this.session) {
      return;
    }

    this.session.httpAgent.destroy();
    this.session.httpsAgent.destroy();
    this.session = null;
    logger.debug('HTTP session closed');
  }

  private encodeBody(request: TransportRequest): string | FormData | undefined {
    if (request.multipart) {
      const { file, fields } = request.multipart;
      const form = new FormData();
      form.append(file.field, new Blob([file.data], { type: file.contentType }), file.fileName);
      for (const [name, value] of Object.entries(fields)) {
        form.append(name, value);
      }
      return form;
    }

    if (request.json !== undefined) {
      return JSON.stringify(request.json);
    }

    return undefined;
  }

  private toFailure(error: unknown): TransportOutcome {
    if (axios.isAxiosError(error)) {
      const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
      return {
        type: 'failure',
        error: timedOut ? new Error(`Request timeout after ${this.timeout}ms`, { cause: error }) : error,
        timedOut,
      };
    }

    return {
      type: 'failure',
      error: error instanceof Error ? error : new Error(String(error)),
      timedOut: false,
    };
  }
}
