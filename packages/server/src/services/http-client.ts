/**
 * HTTP Client
 *
 * One keep-alive connection pool per process, shared by the catalog
 * providers and the media fetcher. Supports an optional HTTP proxy:
 * plain http targets are sent in absolute-URI form, https targets go
 * through a CONNECT tunnel.
 */

import * as http from 'http';
import * as https from 'https';
import * as tls from 'tls';
import type { Readable } from 'stream';
import { PipelineError, log } from '@tunedrop/core';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
const MAX_REDIRECTS = 5;
const REQUEST_TIMEOUT_MS = 30000;

// ========================================
// Types
// ========================================

export interface HttpResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: Readable;
}

export interface HttpRequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  /** Idle socket timeout */
  timeoutMs?: number;
}

/**
 * A single request/response exchange. Redirects are handled by HttpClient.
 */
export interface HttpTransport {
  request(target: URL, options: HttpRequestOptions): Promise<HttpResponse>;
  close(): void;
}

export class HttpStatusError extends PipelineError {
  constructor(readonly status: number, readonly url: string) {
    super('TransportFailure', `HTTP ${status} for ${url}`);
    this.name = 'HttpStatusError';
  }
}

export async function readBody(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

// ========================================
// Node transport
// ========================================

export class NodeHttpTransport implements HttpTransport {
  private httpAgent = new http.Agent({ keepAlive: true, maxSockets: 16 });
  private httpsAgent = new https.Agent({ keepAlive: true, maxSockets: 16 });
  private proxy: URL | null;

  constructor(proxy?: string) {
    this.proxy = proxy ? new URL(proxy) : null;
    if (this.proxy) {
      log.info('HttpClient', `Using proxy ${this.proxy.host}`);
    }
  }

  async request(target: URL, options: HttpRequestOptions): Promise<HttpResponse> {
    const isHttps = target.protocol === 'https:';
    const headers: http.OutgoingHttpHeaders = { ...options.headers };
    if (options.body !== undefined) {
      headers['Content-Length'] = Buffer.byteLength(options.body);
    }

    let requestOptions: http.RequestOptions;
    if (!this.proxy) {
      requestOptions = {
        protocol: target.protocol,
        hostname: target.hostname,
        port: target.port || (isHttps ? 443 : 80),
        path: target.pathname + target.search,
        agent: isHttps ? this.httpsAgent : this.httpAgent
      };
    } else if (!isHttps) {
      // Absolute-URI form through the proxy
      requestOptions = {
        protocol: 'http:',
        hostname: this.proxy.hostname,
        port: this.proxy.port || 80,
        path: target.href,
        agent: this.httpAgent
      };
      headers.Host = target.host;
      this.addProxyAuth(headers);
    } else {
      const socket = await this.tunnel(target);
      requestOptions = {
        protocol: 'https:',
        hostname: target.hostname,
        port: target.port || 443,
        path: target.pathname + target.search,
        agent: false,
        createConnection: () => socket
      };
    }

    const transport = requestOptions.protocol === 'https:' ? https : http;

    return new Promise<HttpResponse>((resolve, reject) => {
      const request = transport.request(
        { ...requestOptions, method: options.method ?? 'GET', headers },
        (response) => {
          resolve({
            status: response.statusCode ?? 0,
            headers: response.headers,
            body: response
          });
        }
      );

      request.setTimeout(options.timeoutMs ?? REQUEST_TIMEOUT_MS, () => {
        request.destroy(new Error(`Request timed out: ${target.host}`));
      });
      request.on('error', reject);

      if (options.body !== undefined) {
        request.write(options.body);
      }
      request.end();
    });
  }

  close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  private addProxyAuth(headers: http.OutgoingHttpHeaders): void {
    if (!this.proxy?.username) return;
    const credentials = `${decodeURIComponent(this.proxy.username)}:${decodeURIComponent(this.proxy.password)}`;
    headers['Proxy-Authorization'] = `Basic ${Buffer.from(credentials).toString('base64')}`;
  }

  private tunnel(target: URL): Promise<tls.TLSSocket> {
    const proxy = this.proxy;
    if (!proxy) {
      return Promise.reject(new Error('No proxy configured'));
    }

    const authority = `${target.hostname}:${target.port || 443}`;
    const headers: http.OutgoingHttpHeaders = { Host: authority };
    this.addProxyAuth(headers);

    return new Promise<tls.TLSSocket>((resolve, reject) => {
      const connect = http.request({
        hostname: proxy.hostname,
        port: proxy.port || 80,
        method: 'CONNECT',
        path: authority,
        headers,
        agent: false
      });

      connect.once('connect', (response, socket) => {
        if (response.statusCode !== 200) {
          socket.destroy();
          reject(new PipelineError('TransportFailure', `Proxy CONNECT failed: HTTP ${response.statusCode}`));
          return;
        }
        resolve(tls.connect({ socket, servername: target.hostname }));
      });
      connect.once('error', reject);
      connect.end();
    });
  }
}

// ========================================
// Client
// ========================================

export interface HttpClientOptions {
  proxy?: string;
  /** Replace the network transport (tests) */
  transport?: HttpTransport;
  userAgent?: string;
  maxRedirects?: number;
}

export class HttpClient {
  private transport: HttpTransport;
  private userAgent: string;
  private maxRedirects: number;

  constructor(options: HttpClientOptions = {}) {
    this.transport = options.transport ?? new NodeHttpTransport(options.proxy);
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.maxRedirects = options.maxRedirects ?? MAX_REDIRECTS;
  }

  /**
   * Issue a request, following redirects. The body of the final response is
   * left unread; callers must consume or destroy it.
   */
  async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    let target = new URL(url);
    let current: HttpRequestOptions = {
      ...options,
      headers: {
        'User-Agent': this.userAgent,
        'Accept': '*/*',
        'Accept-Encoding': 'identity',
        ...options.headers
      }
    };

    for (let hops = 0; ; hops++) {
      const response = await this.transport.request(target, current);
      const location = response.headers.location;

      if (response.status < 300 || response.status >= 400 || !location) {
        return response;
      }

      response.body.resume();
      if (hops >= this.maxRedirects) {
        throw new PipelineError('TransportFailure', `Too many redirects for ${url}`);
      }

      target = new URL(location, target);
      // 303 and the historical 301/302 handling turn POST into GET
      if (response.status !== 307 && response.status !== 308 && current.method === 'POST') {
        current = { ...current, method: 'GET', body: undefined };
      }
    }
  }

  /**
   * Whole body in memory; non-2xx throws HttpStatusError
   */
  async getBuffer(url: string, options: HttpRequestOptions = {}): Promise<Buffer> {
    const response = await this.request(url, options);
    if (response.status < 200 || response.status >= 300) {
      response.body.resume();
      throw new HttpStatusError(response.status, url);
    }
    return readBody(response.body);
  }

  async getJson(url: string, options: HttpRequestOptions = {}): Promise<unknown> {
    const body = await this.getBuffer(url, {
      ...options,
      headers: { 'Accept': 'application/json', ...options.headers }
    });
    return JSON.parse(body.toString('utf-8'));
  }

  async postForm(url: string, form: Record<string, string>, options: HttpRequestOptions = {}): Promise<unknown> {
    return this.getJson(url, {
      ...options,
      method: 'POST',
      body: new URLSearchParams(form).toString(),
      headers: { 'Content-Type': 'application/x-www-form-urlencoded', ...options.headers }
    });
  }

  close(): void {
    this.transport.close();
  }
}
