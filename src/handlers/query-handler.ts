/**
 * Query handler
 *
 * Drives one query through submit → {ping → sleep}* → delete and enforces the
 * polling time budget. What a page of results means is left to a
 * ResultProcessor, one per query kind, so the lifecycle below stays the same
 * for every kind.
 *
 * @example
 * ```ts
 * const handler = new PowerQueryHandler(settings.authToken, settings.baseUrl, { settings });
 * await handler.submitPowerQuery({
 *   query: "filter event.type == 'DNS' | columns src.ip",
 *   startTime: { hours: 1 },
 *   endTime: new Date(),
 * });
 * const results = await handler.pollUntilComplete();
 * ```
 */

import type {
  PowerQueryAttributes,
  QueryPage,
  QueryPriority,
  QueryTransport,
  RequestOptions,
  SubmitQueryRequest,
  SubmitResult,
} from '../types';
import { HandlerPreconditionError, HandlerTimeoutError } from '../types';
import type { LakeQuerySettings } from '../config';
import { systemClock, type Clock } from '../clock';
import { isCancellation } from '../abort';
import { componentLogger, type Logger } from '../logger';
import { parseTimeParam, type TimeParam } from '../time';
import { RestQueryTransport } from '../backends/rest';
import type { FetchLike } from '../backends/rest';
import { QueryState } from './query-state';

export type QueryPhase = 'not_submitted' | 'submitted' | 'polling' | 'complete' | 'failed';

/** Interprets result pages for one kind of query */
export interface ResultProcessor<TResult> {
  processResults(page: QueryPage): void;
  isResultPartial(): boolean;
  readonly results: TResult;
}

export interface QueryHandlerOptions {
  settings: LakeQuerySettings;
  /** Defaults to a RestQueryTransport for the handler's base URL */
  transport?: QueryTransport;
  /** Polling budget; defaults to `settings.defaultPollTimeoutMs` */
  pollTimeoutMs?: number;
  /** Pause between pings; defaults to `settings.defaultPollIntervalMs` */
  pollIntervalMs?: number;
  clock?: Clock;
  logger?: Logger;
  /** Used by the default transport */
  fetch?: FetchLike;
}

export interface QuerySubmission {
  startTime: TimeParam;
  endTime: TimeParam;
  tenant?: boolean;
  accountIds?: string[];
  queryPriority?: QueryPriority;
  pq?: PowerQueryAttributes;
}

const NOT_SUBMITTED_MESSAGE = 'Query has not been submitted yet or submitting the query failed.';
const MISSING_TAG_MESSAGE =
  'Routing tag is missing. Query has not been submitted yet or submitting the query failed.';
const TRANSPORT_CLOSED_MESSAGE = 'Query transport is closed. Cannot perform operations.';

function positiveInterval(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive number of milliseconds, got ${value}`);
  }
  return value;
}

export class QueryHandler<TResult> {
  readonly pollTimeoutMs: number;
  readonly pollIntervalMs: number;
  protected readonly transport: QueryTransport;
  protected readonly state = new QueryState();
  protected readonly logger: Logger;
  private readonly clock: Clock;
  private phase: QueryPhase = 'not_submitted';
  private deleteOutcome: boolean | null = null;
  private pollStartedAt: number | null = null;

  constructor(
    private readonly authToken: string,
    baseUrl: string,
    protected readonly processor: ResultProcessor<TResult>,
    options: QueryHandlerOptions
  ) {
    const { settings } = options;
    this.logger = componentLogger('query-handler', options.logger);
    this.clock = options.clock ?? systemClock;
    this.pollTimeoutMs = positiveInterval(
      'pollTimeoutMs',
      options.pollTimeoutMs ?? settings.defaultPollTimeoutMs
    );
    this.pollIntervalMs = positiveInterval(
      'pollIntervalMs',
      options.pollIntervalMs ?? settings.defaultPollIntervalMs
    );
    this.transport =
      options.transport ??
      new RestQueryTransport(baseUrl, {
        settings,
        fetch: options.fetch,
        clock: options.clock,
        logger: options.logger,
      });

    // Pings must arrive well within the server-side TTL
    if (this.pollIntervalMs * 2 > settings.queryTtlSeconds * 1000) {
      this.logger.warn(
        { pollIntervalMs: this.pollIntervalMs, queryTtlSeconds: settings.queryTtlSeconds },
        'Poll interval exceeds half the query TTL; the query may expire between pings'
      );
    }
  }

  getPhase(): QueryPhase {
    return this.phase;
  }

  get queryId(): string | null {
    return this.state.queryId;
  }

  get lastStepSeen(): number {
    return this.state.lastStepSeen;
  }

  get totalSteps(): number {
    return this.state.totalSteps;
  }

  isQueryCompleted(): boolean {
    return this.state.isCompleted();
  }

  isResultPartial(): boolean {
    return this.processor.isResultPartial();
  }

  /**
   * Launch the query. Results carried by the submit response are processed
   * right away; a query that is already complete is deleted and the transport
   * closed.
   */
  protected async submit(submission: QuerySubmission, options: RequestOptions = {}): Promise<void> {
    if (this.state.submitted) {
      throw await this.preconditionFailure('Query already submitted.', options.signal);
    }
    if (this.transport.isClosed()) {
      throw await this.preconditionFailure(TRANSPORT_CLOSED_MESSAGE, options.signal);
    }

    let result: SubmitResult;
    try {
      result = await this.transport.submit(this.authToken, this.buildRequest(submission), options);
    } catch (error) {
      this.phase = 'failed';
      await this.transport.close(options.signal);
      throw error;
    }

    const { response, forwardTag } = result;
    if (!forwardTag) {
      throw await this.preconditionFailure(
        'Routing tag missing from submit response. Submitting the query failed.',
        options.signal
      );
    }
    if (!response.id) {
      const reason = response.error ? `: ${response.error.message}` : '';
      throw await this.preconditionFailure(
        `Submit response carried no query id${reason}. Submitting the query failed.`,
        options.signal
      );
    }

    this.state.begin(response.id, forwardTag);
    this.phase = 'submitted';
    this.logger.info(
      { queryId: response.id, totalSteps: response.totalSteps, stepsCompleted: response.stepsCompleted },
      'Query submitted'
    );

    this.absorb(response);
    if (this.isQueryCompleted()) {
      await this.release(options);
    }
  }

  /**
   * Fetch the next page of results. The server drops queries that are not
   * pinged for about 30 seconds; pinging every second is recommended.
   */
  async ping(options: RequestOptions = {}): Promise<QueryPage> {
    const { queryId, forwardTag } = this.state;
    if (queryId === null) {
      throw await this.preconditionFailure(NOT_SUBMITTED_MESSAGE, options.signal);
    }
    if (!forwardTag) {
      throw await this.preconditionFailure(MISSING_TAG_MESSAGE, options.signal);
    }
    if (this.isQueryCompleted()) {
      throw await this.preconditionFailure(
        'Query is already completed. Cannot ping for results.',
        options.signal
      );
    }
    if (this.transport.isClosed()) {
      throw await this.preconditionFailure(TRANSPORT_CLOSED_MESSAGE, options.signal);
    }

    this.phase = 'polling';
    let page: QueryPage;
    try {
      page = await this.transport.ping(
        this.authToken,
        queryId,
        forwardTag,
        this.state.lastStepSeen,
        options
      );
    } catch (error) {
      if (isCancellation(error, options.signal)) throw error;
      this.phase = 'failed';
      await this.teardown(options.signal);
      throw error;
    }

    this.absorb(page);
    if (this.isQueryCompleted()) {
      await this.release(options);
    }
    return page;
  }

  /**
   * Ping until the query completes, sleeping `pollIntervalMs` between pings.
   *
   * @throws HandlerTimeoutError once more than `pollTimeoutMs` has elapsed
   * since the first call; server-side state is released first
   */
  async pollUntilComplete(options: RequestOptions = {}): Promise<TResult> {
    const startedAt = (this.pollStartedAt ??= this.clock.now());

    while (!this.isQueryCompleted()) {
      await this.ping(options);
      if (this.isQueryCompleted()) break;

      await this.clock.sleep(this.pollIntervalMs, options.signal);

      const elapsedMs = this.clock.now() - startedAt;
      if (elapsedMs > this.pollTimeoutMs) {
        this.phase = 'failed';
        this.logger.warn(
          { queryId: this.state.queryId, elapsedMs, timeoutMs: this.pollTimeoutMs },
          'Query polling timed out'
        );
        await this.teardown(options.signal);
        throw new HandlerTimeoutError(elapsedMs, this.pollTimeoutMs);
      }
    }

    return this.processor.results;
  }

  /**
   * Release server-side query state. Only the first call reaches the
   * server; later calls return its outcome.
   */
  async delete(options: RequestOptions = {}): Promise<boolean> {
    if (this.deleteOutcome !== null) {
      return this.deleteOutcome;
    }

    const { queryId, forwardTag } = this.state;
    if (queryId === null) {
      throw await this.preconditionFailure(NOT_SUBMITTED_MESSAGE, options.signal);
    }
    if (!forwardTag) {
      throw await this.preconditionFailure(MISSING_TAG_MESSAGE, options.signal);
    }
    if (this.transport.isClosed()) {
      throw await this.preconditionFailure(TRANSPORT_CLOSED_MESSAGE, options.signal);
    }

    let deleted: boolean;
    try {
      deleted = await this.transport.delete(this.authToken, queryId, forwardTag, options);
    } catch (error) {
      if (!isCancellation(error, options.signal)) {
        await this.transport.close(options.signal);
      }
      throw error;
    }

    this.deleteOutcome = deleted;
    this.logger.debug({ queryId, deleted }, 'Query deleted');
    return deleted;
  }

  getResults(): TResult {
    if (!this.state.submitted) {
      throw new HandlerPreconditionError('Query has not been submitted yet. Cannot get results.');
    }
    if (!this.isQueryCompleted()) {
      throw new HandlerPreconditionError('Query is not completed yet. Cannot get results.');
    }
    return this.processor.results;
  }

  async close(signal?: AbortSignal): Promise<void> {
    return this.transport.close(signal);
  }

  private buildRequest(submission: QuerySubmission): SubmitQueryRequest {
    const now = Date.now();
    return {
      startTime: parseTimeParam(submission.startTime, now),
      endTime: parseTimeParam(submission.endTime, now),
      tenant: submission.tenant,
      accountIds: submission.accountIds,
      queryPriority: submission.queryPriority ?? 'LOW',
      pq: submission.pq,
    };
  }

  private absorb(page: QueryPage): void {
    this.state.record(page);
    this.processor.processResults(page);

    this.logger.debug(
      {
        queryId: this.state.queryId,
        stepsCompleted: this.state.stepsCompleted,
        totalSteps: this.state.totalSteps,
      },
      'Query progress'
    );

    if (this.state.isCompleted()) {
      this.phase = 'complete';
      this.logger.info({ queryId: this.state.queryId }, 'Query completed');
    }
  }

  private async release(options: RequestOptions): Promise<void> {
    await this.delete(options);
    await this.transport.close(options.signal);
  }

  /** Best-effort delete, then close. Only cancellation escapes the delete. */
  private async teardown(signal?: AbortSignal): Promise<void> {
    const { queryId, forwardTag } = this.state;
    if (this.deleteOutcome === null && queryId !== null && forwardTag && !this.transport.isClosed()) {
      try {
        await this.delete({ signal });
      } catch (error) {
        if (isCancellation(error, signal)) throw error;
        this.logger.warn({ queryId, err: error }, 'Failed to delete query during teardown');
      }
    }
    await this.transport.close(signal);
  }

  protected async preconditionFailure(
    message: string,
    signal?: AbortSignal
  ): Promise<HandlerPreconditionError> {
    this.phase = 'failed';
    await this.transport.close(signal);
    return new HandlerPreconditionError(message);
  }
}
