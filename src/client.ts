/**
 * LakeQueryClient
 *
 * Entry point bound to validated settings. Creates one handler per query.
 *
 * @example
 * ```ts
 * const client = new LakeQueryClient(
 *   createSettings({ baseUrl: 'https://lake.example.com', authToken: 'my-token' })
 * );
 * const { results, partial } = await client.runPowerQuery({
 *   query: "filter event.type == 'DNS' | group count() by src.ip",
 *   startTime: '24h',
 *   endTime: '0',
 * });
 * ```
 */

import type { QueryTransport, RequestOptions, TableResultData } from './types';
import type { LakeQuerySettings } from './config';
import type { Clock } from './clock';
import { componentLogger, type Logger } from './logger';
import type { FetchLike } from './backends/rest';
import { PowerQueryHandler, type PowerQueryRequest } from './handlers/power-query-handler';

export interface LakeQueryClientOptions {
  clock?: Clock;
  logger?: Logger;
  fetch?: FetchLike;
  /** Builds the transport of each handler; defaults to a RestQueryTransport */
  transportFactory?: () => QueryTransport;
}

export interface HandlerOverrides {
  pollTimeoutMs?: number;
  pollIntervalMs?: number;
  maxQueryResults?: number;
}

export interface PowerQueryOutcome {
  results: TableResultData;
  /** The server or the client row cap left rows out */
  partial: boolean;
}

export class LakeQueryClient {
  private readonly logger: Logger;

  constructor(
    readonly settings: LakeQuerySettings,
    private readonly options: LakeQueryClientOptions = {}
  ) {
    this.logger = componentLogger('client', options.logger);
  }

  createPowerQueryHandler(overrides: HandlerOverrides = {}): PowerQueryHandler {
    return new PowerQueryHandler(this.settings.authToken, this.settings.baseUrl, {
      settings: this.settings,
      transport: this.options.transportFactory?.(),
      clock: this.options.clock,
      logger: this.options.logger,
      fetch: this.options.fetch,
      ...overrides,
    });
  }

  /** Submit a PowerQuery and poll it to completion */
  async runPowerQuery(
    request: PowerQueryRequest,
    options: RequestOptions & HandlerOverrides = {}
  ): Promise<PowerQueryOutcome> {
    const { signal, headers, ...overrides } = options;
    const handler = this.createPowerQueryHandler(overrides);

    let results: TableResultData;
    try {
      await handler.submitPowerQuery(request, { signal, headers });
      results = await handler.pollUntilComplete({ signal, headers });
    } catch (error) {
      await handler.close();
      throw error;
    }
    const partial = handler.isResultPartial();

    this.logger.info(
      { queryId: handler.queryId, rows: results.values.length, matchCount: results.matchCount, partial },
      'PowerQuery finished'
    );
    return { results, partial };
  }
}
