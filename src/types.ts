/**
 * Public types for the data-lake query client
 */

// ============================================================================
// Enumerations
// ============================================================================

/** Query categories understood by the queries endpoint */
export type QueryType = 'LOG' | 'TOP_FACETS' | 'FACET_VALUES' | 'PLOT' | 'PQ' | 'DISTRIBUTION';

/**
 * Scheduler priority. LOW has more generous rate limits and suits background
 * work where a delay of a second or so is acceptable.
 */
export type QueryPriority = 'LOW' | 'HIGH';

/** Output representation of a PowerQuery run */
export type PowerQueryResultType = 'TABLE' | 'PLOT';

/** Sampling frequency of a PowerQuery run */
export type PowerQueryFrequency = 'LOW' | 'HIGH';

/** Value type of a column in a tabular result */
export type ColumnType = 'NUMBER' | 'PERCENTAGE' | 'STRING' | 'TIMESTAMP';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// ============================================================================
// Requests
// ============================================================================

/** PowerQuery attributes sent in the `pq` field of a submit request */
export interface PowerQueryAttributes {
  query: string;
  resultType: PowerQueryResultType;
  frequency: PowerQueryFrequency;
}

/**
 * Submit request as the transport sends it.
 *
 * `startTime`/`endTime` are already normalised: a relative literal such as
 * `24h`, `7d`, `30m`, `25s`, or an epoch timestamp in s, ms or ns.
 */
export interface SubmitQueryRequest {
  startTime: string;
  endTime: string;
  queryPriority?: QueryPriority;
  /** Query across all data the token can reach; must be false when `accountIds` is set */
  tenant?: boolean;
  accountIds?: string[];
  pq?: PowerQueryAttributes;
}

/** Options accepted by every transport and handler call */
export interface RequestOptions {
  /** Cancels the call; the signal's reason is rethrown unchanged */
  signal?: AbortSignal;
  /** Extra request headers */
  headers?: Record<string, string>;
}

// ============================================================================
// Responses
// ============================================================================

export interface Column {
  name: string;
  type: ColumnType;
  decimalPlaces?: number;
}

/** One incremental page of tabular data */
export interface TableResultPage {
  /** Server's authoritative total, independent of the rows returned */
  matchCount: number;
  values: JsonValue[][];
  columns: Column[];
  keyColumns?: number;
  omittedEvents?: number;
  partialResultsDueToTimeLimit?: boolean;
  discardedArrayItems?: number;
  warnings: string[];
}

/** Accumulated tabular result of a query */
export interface TableResultData extends TableResultPage {
  /** Rows were dropped because the client-side result cap was reached */
  truncatedAtLimit: boolean;
}

export interface TimeRange {
  start: number;
  end: number;
}

/** A submit or ping response */
export interface QueryPage {
  /** Null when the server reports an error */
  id: string | null;
  stepsCompleted: number;
  totalSteps: number;
  resolvedTimeRange?: TimeRange;
  error?: { message: string; details?: Record<string, JsonValue> };
  /** CPU time spent by the server, in nanoseconds */
  cpuUsage: number;
  data: TableResultPage | null;
}

export interface SubmitResult {
  response: QueryPage;
  /** Value of the routing-tag response header, null when absent */
  forwardTag: string | null;
}

// ============================================================================
// Transport interface
// ============================================================================

/**
 * The three wire operations of the query protocol.
 *
 * A transport may serve several queries one after another; a routing tag
 * belongs to a single query.
 */
export interface QueryTransport {
  submit(authToken: string, request: SubmitQueryRequest, options?: RequestOptions): Promise<SubmitResult>;
  ping(
    authToken: string,
    queryId: string,
    forwardTag: string,
    lastStepSeen: number,
    options?: RequestOptions
  ): Promise<QueryPage>;
  delete(authToken: string, queryId: string, forwardTag: string, options?: RequestOptions): Promise<boolean>;
  close(signal?: AbortSignal): Promise<void>;
  isClosed(): boolean;
}

// ============================================================================
// Errors
// ============================================================================

export type LakeQueryErrorKind =
  | 'transport'
  | 'malformed_response'
  | 'handler_precondition'
  | 'handler_timeout'
  | 'security_config'
  | 'config';

/** Base error for the query client */
export class LakeQueryError extends Error {
  readonly kind: LakeQueryErrorKind;
  readonly details?: string;

  constructor(
    message: string,
    kind: LakeQueryErrorKind,
    options?: { details?: string; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'LakeQueryError';
    this.kind = kind;
    this.details = options?.details;
  }

  override toString(): string {
    if (this.details) {
      return `${this.name}: ${this.message}. Details: ${this.details}`;
    }
    return `${this.name}: ${this.message}`;
  }
}

/**
 * Request failed on the wire.
 *
 * `status` is set for HTTP status failures, which are terminal. Without a
 * status the failure happened at the connection level and may be retried.
 */
export class TransportError extends LakeQueryError {
  declare readonly kind: 'transport';
  readonly status?: number;

  constructor(message: string, options?: { status?: number; details?: string; cause?: unknown }) {
    super(message, 'transport', options);
    this.name = 'TransportError';
    this.status = options?.status;
  }

  get retryable(): boolean {
    return this.status === undefined;
  }
}

/** A response arrived but its body does not match the expected schema */
export class MalformedResponseError extends LakeQueryError {
  declare readonly kind: 'malformed_response';

  constructor(message: string, options?: { details?: string; cause?: unknown }) {
    super(message, 'malformed_response', options);
    this.name = 'MalformedResponseError';
  }
}

/** Handler operation called out of sequence */
export class HandlerPreconditionError extends LakeQueryError {
  declare readonly kind: 'handler_precondition';

  constructor(message: string, options?: { details?: string; cause?: unknown }) {
    super(message, 'handler_precondition', options);
    this.name = 'HandlerPreconditionError';
  }
}

/** Polling exceeded its time budget */
export class HandlerTimeoutError extends LakeQueryError {
  declare readonly kind: 'handler_timeout';
  readonly elapsedMs: number;
  readonly timeoutMs: number;

  constructor(elapsedMs: number, timeoutMs: number) {
    super(
      `Query timed out after ${(elapsedMs / 1000).toFixed(1)} seconds. ` +
        'This usually means the time range was too long or the query was too complex. ' +
        'Try reducing the time range (e.g., use 24 hours instead of multiple days) ' +
        'or simplifying the query (e.g., add more specific filters).',
      'handler_timeout'
    );
    this.name = 'HandlerTimeoutError';
    this.elapsedMs = elapsedMs;
    this.timeoutMs = timeoutMs;
  }
}

/** TLS verification bypass requested where it is forbidden */
export class SecurityConfigError extends LakeQueryError {
  declare readonly kind: 'security_config';

  constructor(message: string) {
    super(message, 'security_config');
    this.name = 'SecurityConfigError';
  }
}

/** Settings failed validation */
export class ConfigError extends LakeQueryError {
  declare readonly kind: 'config';

  constructor(message: string, options?: { details?: string; cause?: unknown }) {
    super(message, 'config', options);
    this.name = 'ConfigError';
  }
}

export type AnyLakeQueryError =
  | TransportError
  | MalformedResponseError
  | HandlerPreconditionError
  | HandlerTimeoutError
  | SecurityConfigError
  | ConfigError;
