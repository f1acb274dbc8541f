/**
 * Query operations for the REST transport (submit, ping, delete)
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type {
  Column,
  QueryPage,
  RequestOptions,
  SubmitQueryRequest,
  SubmitResult,
  TableResultPage,
} from '../../types';
import { MalformedResponseError } from '../../types';
import type { Logger } from '../../logger';
import type { HttpClient, HttpResponse } from './http-client';
import {
  ServerPingResponseSchema,
  ServerSubmitQueryResponseSchema,
  type ServerColumn,
  type ServerQueryResult,
  type ServerTableResult,
} from './server-types';

/** Routes follow-up requests to the worker holding the query's state */
export const FORWARD_TAG_HEADER = 'X-Dataset-Query-Forward-Tag';

export const QUERIES_PATH = '/v2/api/queries';

const HTTP_NO_CONTENT = 204;

function mapColumn(column: ServerColumn): Column {
  // The schema guarantees one of the two is present
  const type = column.cellType ?? column.type ?? 'STRING';
  return {
    name: column.name,
    type,
    ...(column.decimalPlaces != null && { decimalPlaces: column.decimalPlaces }),
  };
}

function mapTable(data: ServerTableResult): TableResultPage {
  return {
    matchCount: data.matchCount,
    values: data.values,
    columns: data.columns.map(mapColumn),
    ...(data.keyColumns != null && { keyColumns: data.keyColumns }),
    ...(data.omittedEvents != null && { omittedEvents: data.omittedEvents }),
    ...(data.partialResultsDueToTimeLimit != null && {
      partialResultsDueToTimeLimit: data.partialResultsDueToTimeLimit,
    }),
    ...(data.discardedArrayItems != null && { discardedArrayItems: data.discardedArrayItems }),
    warnings: data.warnings ?? [],
  };
}

function mapQueryPage(data: ServerQueryResult): QueryPage {
  return {
    id: data.id ?? null,
    stepsCompleted: data.stepsCompleted,
    totalSteps: data.totalSteps,
    ...(data.resolvedTimeRange != null && { resolvedTimeRange: data.resolvedTimeRange }),
    ...(data.error != null && {
      error: {
        message: data.error.message,
        ...(data.error.details != null && { details: data.error.details }),
      },
    }),
    cpuUsage: data.cpuUsage,
    data: data.data != null ? mapTable(data.data) : null,
  };
}

function parseBody<T>(
  response: HttpResponse,
  schema: ZodType<T, ZodTypeDef, unknown>,
  what: string,
  logger: Logger
): T {
  let body: unknown;
  try {
    body = JSON.parse(response.body);
  } catch (error) {
    logger.error({ err: error }, `Response body of ${what} is not JSON`);
    throw new MalformedResponseError(`Failed to validate ${what} response.`, { cause: error });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    logger.error({ responseData: body, issues: details }, `Failed to validate ${what} response`);
    throw new MalformedResponseError(`Failed to validate ${what} response.`, {
      details,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

function withForwardTag(forwardTag: string, headers?: Record<string, string>): Record<string, string> {
  if (!forwardTag) {
    throw new TypeError(`${FORWARD_TAG_HEADER} is required for follow-up query requests`);
  }
  return { ...headers, [FORWARD_TAG_HEADER]: forwardTag };
}

/**
 * Launch a query.
 * Calls `POST /v2/api/queries`; the routing tag comes back in a response header.
 */
export async function submitQuery(
  client: HttpClient,
  logger: Logger,
  authToken: string,
  request: SubmitQueryRequest,
  options: RequestOptions = {}
): Promise<SubmitResult> {
  const body: Record<string, unknown> = {
    startTime: request.startTime,
    endTime: request.endTime,
    queryType: 'PQ',
    queryPriority: request.queryPriority ?? 'LOW',
  };
  if (request.tenant !== undefined) {
    body.tenant = request.tenant;
  }
  if (request.accountIds !== undefined) {
    body.accountIds = request.accountIds;
  }
  if (request.pq !== undefined) {
    body.pq = {
      query: request.pq.query,
      resultType: request.pq.resultType,
      frequency: request.pq.frequency,
    };
  }

  const response = await client.request({
    method: 'POST',
    path: QUERIES_PATH,
    authToken,
    headers: options.headers,
    body,
    signal: options.signal,
  });

  const forwardTag = response.headers.get(FORWARD_TAG_HEADER);
  const data = parseBody(response, ServerSubmitQueryResponseSchema, 'submit query', logger);
  return { response: mapQueryPage(data), forwardTag };
}

/**
 * Fetch query progress and the next page of results.
 * Calls `GET /v2/api/queries/{id}?lastStepSeen={n}`.
 *
 * @throws TypeError when the routing tag is empty
 */
export async function pingQuery(
  client: HttpClient,
  logger: Logger,
  authToken: string,
  queryId: string,
  forwardTag: string,
  lastStepSeen: number,
  options: RequestOptions = {}
): Promise<QueryPage> {
  const headers = withForwardTag(forwardTag, options.headers);

  const response = await client.request({
    method: 'GET',
    path: `${QUERIES_PATH}/${encodeURIComponent(queryId)}`,
    authToken,
    headers,
    query: { lastStepSeen },
    signal: options.signal,
  });

  const data = parseBody(response, ServerPingResponseSchema, 'query ping', logger);
  return mapQueryPage(data);
}

/**
 * Release server-side query state.
 * Calls `DELETE /v2/api/queries/{id}`. Only 204 counts as success; other
 * successful statuses are logged and reported as `false`.
 */
export async function deleteQuery(
  client: HttpClient,
  logger: Logger,
  authToken: string,
  queryId: string,
  forwardTag: string,
  options: RequestOptions = {}
): Promise<boolean> {
  const headers = withForwardTag(forwardTag, options.headers);

  const response = await client.request({
    method: 'DELETE',
    path: `${QUERIES_PATH}/${encodeURIComponent(queryId)}`,
    authToken,
    headers,
    signal: options.signal,
  });

  if (response.status !== HTTP_NO_CONTENT) {
    logger.error({ queryId, status: response.status }, 'Failed to delete query');
    return false;
  }
  return true;
}
