/**
 * Client for the asynchronous data-lake query protocol
 *
 * @packageDocumentation
 */

export * from './types';

export { createSettings, SettingsSchema } from './config';
export type { LakeQuerySettings, LakeQuerySettingsInput } from './config';

export {
  getSecurityContext,
  isDevelopmentEnvironment,
  isProductionEnvironment,
  validateTlsBypassClient,
  validateTlsBypassConfig,
} from './security';

export { createLogger, defaultLogger } from './logger';
export type { Logger } from './logger';

export { systemClock } from './clock';
export type { Clock } from './clock';

export { parseTimeParam } from './time';
export type { TimeOffset, TimeParam } from './time';

export { toRecords } from './table';
export type { TableCell, TableRecord } from './table';

export { getUserAgent, VERSION } from './user-agent';

export {
  FORWARD_TAG_HEADER,
  HttpClient,
  QUERIES_PATH,
  RestQueryTransport,
  RetryPolicy,
  isRetryableTransportError,
} from './backends/rest';
export type {
  ConnectionPool,
  FetchLike,
  HttpClientOptions,
  HttpClientSettings,
  HttpResponse,
  RetryOptions,
} from './backends/rest';

export { QueryState } from './handlers/query-state';
export { ResultAccumulator } from './handlers/result-accumulator';
export { QueryHandler } from './handlers/query-handler';
export type {
  QueryHandlerOptions,
  QueryPhase,
  QuerySubmission,
  ResultProcessor,
} from './handlers/query-handler';
export { PowerQueryHandler, PowerQueryResultProcessor } from './handlers/power-query-handler';
export type { PowerQueryHandlerOptions, PowerQueryRequest } from './handlers/power-query-handler';

export { LakeQueryClient } from './client';
export type { HandlerOverrides, LakeQueryClientOptions, PowerQueryOutcome } from './client';
