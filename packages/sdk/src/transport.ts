/**
 * HTTP transport: owns the client's keep-alive agent.
 *
 * One agent per client instance; never shared across clients.
 * close() destroys the agent exactly once.
 */

import {
  Agent as HttpAgent,
  request as httpRequest,
  type Agent,
  type IncomingMessage,
  type OutgoingHttpHeaders,
  type RequestOptions,
} from 'node:http';
import { Agent as HttpsAgent, request as httpsRequest } from 'node:https';
import type { HttpMethod, QueryValue } from './types.js';

export interface TransportRequest {
  method: HttpMethod;
  /** Endpoint path, already encoded, starting with '/' */
  path: string;
  query?: Record<string, QueryValue>;
  /** JSON body. Omitted entirely when undefined. */
  body?: Record<string, unknown>;
}

export interface TransportResponse {
  status: number;
  statusText: string;
  body: string;
}

export class HttpTransport {
  private agent: Agent;
  private destroyed = false;

  constructor(
    private baseUrl: string,
    private timeout: number,
    agent?: Agent,
  ) {
    // Scheme compared after URL parsing, which lowercases it
    const secure = new URL(baseUrl).protocol === 'https:';
    this.agent = agent || (secure ? new HttpsAgent({ keepAlive: true }) : new HttpAgent({ keepAlive: true }));
  }

  get closed(): boolean {
    return this.destroyed;
  }

  /** Build the absolute request URL, with query parameters appended. */
  buildUrl(path: string, query?: Record<string, QueryValue>): URL {
    const url = new URL(`${this.baseUrl}${path}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }

  /**
   * Execute one request. Resolves with any HTTP status; rejects only on
   * transport failure (refused, reset, timeout).
   */
  send(req: TransportRequest): Promise<TransportResponse> {
    const url = this.buildUrl(req.path, req.query);
    const payload = req.body === undefined ? undefined : JSON.stringify(req.body);
    const headers: OutgoingHttpHeaders = { 'Accept': 'application/json' };
    if (payload !== undefined) {
      headers['Content-Type'] = 'application/json';
      headers['Content-Length'] = Buffer.byteLength(payload);
    }

    const options: RequestOptions = { method: req.method, headers, agent: this.agent };

    return new Promise((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | null = null;
      const settle = (): void => {
        if (timer) {
          clearTimeout(timer);
          timer = null;
        }
      };

      const onResponse = (res: IncomingMessage): void => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('end', () => {
          settle();
          resolve({
            status: res.statusCode ?? 0,
            statusText: res.statusMessage ?? '',
            body: Buffer.concat(chunks).toString('utf-8'),
          });
        });
        res.on('error', (err) => {
          settle();
          reject(err);
        });
      };

      const request = url.protocol === 'https:'
        ? httpsRequest(url, options, onResponse)
        : httpRequest(url, options, onResponse);

      request.on('error', (err) => {
        settle();
        reject(err);
      });

      timer = setTimeout(() => {
        request.destroy(new Error(`Request timed out after ${this.timeout}ms`));
      }, this.timeout);

      if (payload !== undefined) request.write(payload);
      request.end();
    });
  }

  /** Release the agent's sockets. Safe to call more than once. */
  close(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.agent.destroy();
  }
}
