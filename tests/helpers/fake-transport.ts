/**
 * Scripted in-process Transport for tests
 */

import type { HttpMethod } from '../../src/types/api.js';
import type { Transport, TransportOutcome, TransportRequest } from '../../src/lib/transport.js';

export const API = 'https://api.notion.com/v1';

export function jsonReply(status: number, body: unknown, statusText = 'OK'): TransportOutcome {
  return { type: 'response', status, statusText, body: JSON.stringify(body) };
}

export function textReply(status: number, body: string, statusText: string): TransportOutcome {
  return { type: 'response', status, statusText, body };
}

export function failureReply(message: string, timedOut = false): TransportOutcome {
  return { type: 'failure', error: new Error(message), timedOut };
}

interface Route {
  method: HttpMethod;
  url: string;
  replies: TransportOutcome[];
  served: number;
}

export class FakeTransport implements Transport {
  readonly calls: TransportRequest[] = [];
  closeCount = 0;
  private routes: Route[] = [];

  /**
   * Replies are served in order; the last one repeats
   */
  on(method: HttpMethod, url: string, ...replies: TransportOutcome[]): this {
    this.routes.push({ method, url, replies, served: 0 });
    return this;
  }

  async request(request: TransportRequest): Promise<TransportOutcome> {
    this.calls.push(request);

    const route = this.routes.find((r) => r.method === request.method && r.url === request.url);
    if (!route || route.replies.length === 0) {
      return jsonReply(404, { message: `No route for ${request.method} ${request.url}` }, 'Not Found');
    }

    const reply = route.replies[Math.min(route.served, route.replies.length - 1)];
    route.served++;
    return reply;
  }

  async close(): Promise<void> {
    this.closeCount++;
  }

  callsTo(method: HttpMethod, url: string): TransportRequest[] {
    return this.calls.filter((call) => call.method === method && call.url === url);
  }

  /** "METHOD url" for every call, in order */
  get log(): string[] {
    return this.calls.map((call) => `${call.method} ${call.url}`);
  }
}

export function uploadStatus(status: string, error?: { message: string }): TransportOutcome {
  return jsonReply(200, {
    object: 'file_upload',
    id: 'up-1',
    status,
    ...(error ? { file_import_result: { type: 'error', error } } : {}),
  });
}
