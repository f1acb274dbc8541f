/**
 * HTTP Client: base plumbing for the REST transport
 *
 * Owns the pooled connection, attaches authentication, applies the retry
 * policy and maps failures to TransportError.
 */

import { randomUUID } from 'node:crypto';
import { Agent, fetch as undiciFetch } from 'undici';
import type { Dispatcher, Headers, RequestInit, Response } from 'undici';
import { TransportError } from '../../types';
import type { LakeQuerySettings } from '../../config';
import type { Clock } from '../../clock';
import { isAbortError, raceAbort } from '../../abort';
import { componentLogger, type Logger } from '../../logger';
import {
  isDevelopmentEnvironment,
  logTlsBypassInitialization,
  logTlsBypassRequest,
  validateTlsBypassClient,
} from '../../security';
import { getUserAgent } from '../../user-agent';
import { RetryPolicy } from './retry';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

/** Connection pool the client sends through */
export interface ConnectionPool {
  readonly dispatcher: Dispatcher;
  close(): Promise<void>;
}

export type HttpClientSettings = Pick<
  LakeQuerySettings,
  'httpTimeout' | 'maxTimeoutSeconds' | 'httpMaxRetries' | 'skipTlsVerify' | 'environment'
>;

export interface HttpClientOptions {
  settings: HttpClientSettings;
  fetch?: FetchLike;
  pool?: ConnectionPool;
  clock?: Clock;
  /** Random source for retry jitter */
  random?: () => number;
  /** Correlation id for each request's log entries */
  requestId?: () => string;
  logger?: Logger;
}

/** A 2xx response with its body already read */
export interface HttpResponse {
  status: number;
  headers: Headers;
  body: string;
}

export interface HttpRequest {
  method: HttpMethod;
  path: string;
  authToken: string;
  headers?: Record<string, string>;
  query?: Record<string, string | number>;
  body?: unknown;
  signal?: AbortSignal;
}

function createAgentPool(settings: HttpClientSettings): ConnectionPool {
  const agent = new Agent({
    connect: {
      timeout: settings.httpTimeout * 1000,
      rejectUnauthorized: !settings.skipTlsVerify,
    },
    headersTimeout: settings.maxTimeoutSeconds * 1000,
    bodyTimeout: settings.maxTimeoutSeconds * 1000,
  });
  return {
    dispatcher: agent,
    close: () => agent.close(),
  };
}

/**
 * Low-level HTTP client for the query service.
 *
 * Open from construction; call close() when done with it.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly skipTlsVerify: boolean;
  private readonly environment: string;
  private readonly requestTimeoutMs: number;
  private readonly pool: ConnectionPool;
  private readonly fetchImpl: FetchLike;
  private readonly retryPolicy: RetryPolicy;
  private readonly nextRequestId: () => string;
  private readonly logger: Logger;
  private _closed = false;

  constructor(url: string, options: HttpClientOptions) {
    const { settings } = options;
    this.baseUrl = url.replace(/\/+$/, '');
    this.skipTlsVerify = settings.skipTlsVerify;
    this.environment = settings.environment;
    this.requestTimeoutMs = settings.maxTimeoutSeconds * 1000;
    this.logger = componentLogger('http-client', options.logger);

    validateTlsBypassClient(this.skipTlsVerify, this.baseUrl, this.environment, this.logger);
    if (this.skipTlsVerify) {
      logTlsBypassInitialization(this.baseUrl, this.environment, this.logger);
    }

    this.retryPolicy = new RetryPolicy(
      { maxRetries: settings.httpMaxRetries },
      { clock: options.clock, random: options.random, logger: options.logger }
    );
    this.pool = options.pool ?? createAgentPool(settings);
    this.fetchImpl = options.fetch ?? undiciFetch;
    this.nextRequestId = options.requestId ?? randomUUID;
  }

  isClosed(): boolean {
    return this._closed;
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  /**
   * Send a request, retrying connection-level failures.
   *
   * Resolves with any 2xx response once its body has been read; other
   * statuses reject with a TransportError carrying the status. A failure
   * while reading the body counts as a connection failure.
   */
  async request(req: HttpRequest): Promise<HttpResponse> {
    if (this._closed) {
      throw new TransportError('HTTP client is closed');
    }
    if (this.skipTlsVerify) {
      logTlsBypassRequest(req.method, req.path, this.logger);
    }

    const requestId = this.nextRequestId();
    return this.retryPolicy.execute(
      (attempt) => this.send(req, requestId, attempt),
      { signal: req.signal, label: `${req.method} ${req.path}` }
    );
  }

  private buildUrl(path: string, query?: Record<string, string | number>): string {
    const url = `${this.baseUrl}${path}`;
    if (!query) return url;
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      params.set(key, String(value));
    }
    return `${url}?${params.toString()}`;
  }

  private async send(req: HttpRequest, requestId: string, attempt: number): Promise<HttpResponse> {
    req.signal?.throwIfAborted();

    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': getUserAgent(),
      ...req.headers,
      Authorization: req.authToken,
    };
    if (req.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort(req.signal?.reason);
    req.signal?.addEventListener('abort', onAbort, { once: true });
    const timeoutId = setTimeout(
      () => controller.abort(new TransportError(`Request timeout after ${this.requestTimeoutMs}ms`)),
      this.requestTimeoutMs
    );

    this.logger.debug({ requestId, method: req.method, path: req.path, attempt }, 'Sending request');

    let response: Response;
    let body: string;
    try {
      response = await this.fetchImpl(this.buildUrl(req.path, req.query), {
        method: req.method,
        headers,
        body: req.body !== undefined ? JSON.stringify(req.body) : undefined,
        signal: controller.signal,
        dispatcher: this.pool.dispatcher,
      });

      if (!response.ok) {
        const details = await response.text().catch(() => '');
        this.logger.error(
          { requestId, method: req.method, path: req.path, status: response.status },
          'Request rejected by server'
        );
        throw new TransportError(`HTTP ${response.status}`, {
          status: response.status,
          details: details || undefined,
        });
      }

      body = await response.text();
    } catch (error) {
      if (req.signal?.aborted) {
        throw req.signal.reason;
      }
      if (error instanceof TransportError) {
        throw error;
      }
      throw new TransportError(
        `Request failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { cause: error }
      );
    } finally {
      clearTimeout(timeoutId);
      req.signal?.removeEventListener('abort', onAbort);
    }

    this.logger.debug({ requestId, status: response.status }, 'Request completed');
    return { status: response.status, headers: response.headers, body };
  }

  /**
   * Close the connection pool. Safe to call more than once.
   *
   * Cancellation is always rethrown. Other cleanup failures are logged and
   * suppressed, except in development environments where they are rethrown.
   */
  async close(signal?: AbortSignal): Promise<void> {
    if (this._closed) return;
    this._closed = true;

    try {
      await raceAbort(this.pool.close(), signal);
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) {
        throw error;
      }
      this.logger.warn({ err: error }, 'Error during HTTP client cleanup');
      if (isDevelopmentEnvironment(this.environment)) {
        throw error;
      }
    }
  }
}
