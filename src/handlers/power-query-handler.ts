/**
 * PowerQuery handler
 */

import type {
  PowerQueryFrequency,
  PowerQueryResultType,
  QueryPage,
  QueryPriority,
  RequestOptions,
  TableResultData,
} from '../types';
import type { Logger } from '../logger';
import type { TimeParam } from '../time';
import { ResultAccumulator } from './result-accumulator';
import { QueryHandler, type QueryHandlerOptions, type ResultProcessor } from './query-handler';

/** Below this, `omittedEvents` is treated as zero */
const OMITTED_EVENTS_EPSILON = 1e-9;

/** Collects tabular pages of a PowerQuery into one capped result */
export class PowerQueryResultProcessor implements ResultProcessor<TableResultData> {
  private readonly accumulator: ResultAccumulator;

  constructor(maxQueryResults: number, logger?: Logger) {
    this.accumulator = new ResultAccumulator(maxQueryResults, logger);
  }

  get results(): TableResultData {
    return this.accumulator.results;
  }

  processResults(page: QueryPage): void {
    this.accumulator.accumulate(page.data);
  }

  isResultPartial(): boolean {
    const { truncatedAtLimit, partialResultsDueToTimeLimit, discardedArrayItems, omittedEvents } =
      this.accumulator.results;
    return (
      truncatedAtLimit ||
      partialResultsDueToTimeLimit === true ||
      (discardedArrayItems ?? 0) !== 0 ||
      Math.abs(omittedEvents ?? 0) > OMITTED_EVENTS_EPSILON
    );
  }
}

export interface PowerQueryRequest {
  query: string;
  startTime: TimeParam;
  endTime: TimeParam;
  /** Only TABLE results are supported */
  resultType?: PowerQueryResultType;
  frequency?: PowerQueryFrequency;
  tenant?: boolean;
  accountIds?: string[];
  queryPriority?: QueryPriority;
}

export interface PowerQueryHandlerOptions extends QueryHandlerOptions {
  /** Client-side row cap; defaults to `settings.maxQueryResults` */
  maxQueryResults?: number;
}

/**
 * Runs one PowerQuery and accumulates its table.
 *
 * A handler serves a single query; create a new one per query.
 */
export class PowerQueryHandler extends QueryHandler<TableResultData> {
  constructor(authToken: string, baseUrl: string, options: PowerQueryHandlerOptions) {
    super(
      authToken,
      baseUrl,
      new PowerQueryResultProcessor(
        options.maxQueryResults ?? options.settings.maxQueryResults,
        options.logger
      ),
      options
    );
  }

  /**
   * Submit a PowerQuery.
   *
   * @throws HandlerPreconditionError for result types other than TABLE
   */
  async submitPowerQuery(
    request: PowerQueryRequest,
    options: RequestOptions = {}
  ): Promise<void> {
    const resultType = request.resultType ?? 'TABLE';
    if (resultType !== 'TABLE') {
      throw await this.preconditionFailure(
        `Unsupported PowerQuery result type: ${resultType}. Only TABLE results are supported.`,
        options.signal
      );
    }

    this.logger.debug({ query: request.query }, 'Submitting PowerQuery');

    await this.submit(
      {
        startTime: request.startTime,
        endTime: request.endTime,
        tenant: request.tenant,
        accountIds: request.accountIds,
        queryPriority: request.queryPriority ?? 'LOW',
        pq: {
          query: request.query,
          resultType,
          frequency: request.frequency ?? 'LOW',
        },
      },
      options
    );
  }
}
