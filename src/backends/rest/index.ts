/**
 * REST Transport Facade
 *
 * Implements QueryTransport by delegating to the query operations module.
 * Import { RestQueryTransport } from './backends/rest'.
 */

import type {
  QueryPage,
  QueryTransport,
  RequestOptions,
  SubmitQueryRequest,
  SubmitResult,
} from '../../types';
import { componentLogger, type Logger } from '../../logger';
import { HttpClient, type HttpClientOptions } from './http-client';
import * as queryOps from './query';

/**
 * REST Transport
 *
 * Speaks the asynchronous query protocol over one pooled HTTP connection.
 */
export class RestQueryTransport implements QueryTransport {
  private readonly client: HttpClient;
  private readonly logger: Logger;

  constructor(baseUrl: string, options: HttpClientOptions) {
    this.client = new HttpClient(baseUrl, options);
    this.logger = componentLogger('query-transport', options.logger);
  }

  // ========================================================================
  // Lifecycle
  // ========================================================================

  isClosed(): boolean {
    return this.client.isClosed();
  }

  async close(signal?: AbortSignal): Promise<void> {
    return this.client.close(signal);
  }

  // ========================================================================
  // Queries
  // ========================================================================

  async submit(
    authToken: string,
    request: SubmitQueryRequest,
    options?: RequestOptions
  ): Promise<SubmitResult> {
    return queryOps.submitQuery(this.client, this.logger, authToken, request, options);
  }

  async ping(
    authToken: string,
    queryId: string,
    forwardTag: string,
    lastStepSeen: number,
    options?: RequestOptions
  ): Promise<QueryPage> {
    return queryOps.pingQuery(this.client, this.logger, authToken, queryId, forwardTag, lastStepSeen, options);
  }

  async delete(
    authToken: string,
    queryId: string,
    forwardTag: string,
    options?: RequestOptions
  ): Promise<boolean> {
    return queryOps.deleteQuery(this.client, this.logger, authToken, queryId, forwardTag, options);
  }
}

export { HttpClient } from './http-client';
export type {
  ConnectionPool,
  FetchLike,
  HttpClientOptions,
  HttpClientSettings,
  HttpResponse,
} from './http-client';
export { RetryPolicy, isRetryableTransportError } from './retry';
export type { RetryOptions } from './retry';
export { FORWARD_TAG_HEADER, QUERIES_PATH } from './query';
