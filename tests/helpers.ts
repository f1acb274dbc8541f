/**
 * Shared test fixtures: virtual clock, log capture, fake transport and
 * response builders.
 */

import { vi, type Mock } from 'vitest';
import { MockAgent, Response } from 'undici';
import { z } from 'zod';
import type { Clock } from '../src/clock';
import { createSettings, type LakeQuerySettings, type LakeQuerySettingsInput } from '../src/config';
import { createLogger, type Logger } from '../src/logger';
import type { ConnectionPool } from '../src/backends/rest';
import type {
  JsonValue,
  QueryPage,
  QueryTransport,
  RequestOptions,
  SubmitQueryRequest,
  SubmitResult,
  TableResultPage,
} from '../src/types';

export const BASE_URL = 'https://lake.example.test';
export const AUTH_TOKEN = 'Bearer test-token';

// ============================================================================
// Clock
// ============================================================================

/** Clock whose time only moves when something sleeps */
export class VirtualClock implements Clock {
  current = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.sleeps.push(ms);
    this.current += ms;
  }
}

/** Reason a cancelled caller aborts with */
export function abortReason(): Error {
  const error = new Error('cancelled by caller');
  error.name = 'AbortError';
  return error;
}

// ============================================================================
// Logging
// ============================================================================

export const silentLogger: Logger = createLogger({ level: 'silent' });

const LogEntrySchema = z
  .object({
    level: z.number(),
    msg: z.string(),
  })
  .passthrough();

export type LogEntry = z.infer<typeof LogEntrySchema>;

export const LEVEL = { debug: 20, info: 30, warn: 40, error: 50, fatal: 60 } as const;

/** Logger that keeps every entry in memory */
export function captureLogs(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = createLogger(
    { level: 'trace' },
    {
      write(line: string) {
        entries.push(LogEntrySchema.parse(JSON.parse(line)));
      },
    }
  );
  return { logger, entries };
}

// ============================================================================
// Settings
// ============================================================================

export function testSettings(overrides: Partial<LakeQuerySettingsInput> = {}): LakeQuerySettings {
  return createSettings(
    {
      baseUrl: BASE_URL,
      authToken: 'test-token',
      environment: 'test',
      ...overrides,
    },
    { logger: silentLogger }
  );
}

// ============================================================================
// HTTP
// ============================================================================

/** Pool backed by a MockAgent that refuses real connections */
export function fakePool(): ConnectionPool & { close: Mock<() => Promise<void>> } {
  const agent = new MockAgent();
  agent.disableNetConnect();
  return {
    dispatcher: agent,
    close: vi.fn(() => agent.close()),
  };
}

export function jsonResponse(
  body: unknown,
  init: { status?: number; headers?: Record<string, string> } = {}
): Response {
  return new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    headers: { 'Content-Type': 'application/json', ...init.headers },
  });
}

export function emptyResponse(status: number): Response {
  return new Response(null, { status });
}

// ============================================================================
// Query pages
// ============================================================================

export function tablePage(
  rows: JsonValue[][],
  overrides: Partial<TableResultPage> = {}
): TableResultPage {
  return {
    matchCount: rows.length,
    values: rows,
    columns: [{ name: 'value', type: 'NUMBER' }],
    warnings: [],
    ...overrides,
  };
}

export function queryPage(
  stepsCompleted: number,
  totalSteps: number,
  data: TableResultPage | null = null,
  overrides: Partial<QueryPage> = {}
): QueryPage {
  return {
    id: 'q-1',
    stepsCompleted,
    totalSteps,
    cpuUsage: 0,
    data,
    ...overrides,
  };
}

export function rows(from: number, count: number): JsonValue[][] {
  return Array.from({ length: count }, (_, i) => [from + i]);
}

// ============================================================================
// Transport
// ============================================================================

type Outcome<T> = T | Error;

function settle<T>(outcome: Outcome<T>): T {
  if (outcome instanceof Error) throw outcome;
  return outcome;
}

/** In-memory QueryTransport with scripted responses */
export class FakeTransport implements QueryTransport {
  submitOutcome: Outcome<SubmitResult> = { response: queryPage(0, 1), forwardTag: 'tag-1' };
  readonly pingOutcomes: Outcome<QueryPage>[] = [];
  /** Returned once `pingOutcomes` is exhausted */
  fallbackPing: QueryPage = queryPage(0, 1);
  deleteOutcome: Outcome<boolean> = true;

  readonly submitted: SubmitQueryRequest[] = [];
  readonly pinged: { queryId: string; forwardTag: string; lastStepSeen: number }[] = [];
  readonly deleted: { queryId: string; forwardTag: string }[] = [];
  closeCount = 0;
  private closed = false;

  async submit(
    _authToken: string,
    request: SubmitQueryRequest,
    options: RequestOptions = {}
  ): Promise<SubmitResult> {
    options.signal?.throwIfAborted();
    this.submitted.push(request);
    return settle(this.submitOutcome);
  }

  async ping(
    _authToken: string,
    queryId: string,
    forwardTag: string,
    lastStepSeen: number,
    options: RequestOptions = {}
  ): Promise<QueryPage> {
    options.signal?.throwIfAborted();
    this.pinged.push({ queryId, forwardTag, lastStepSeen });
    return settle(this.pingOutcomes.shift() ?? this.fallbackPing);
  }

  async delete(
    _authToken: string,
    queryId: string,
    forwardTag: string,
    options: RequestOptions = {}
  ): Promise<boolean> {
    options.signal?.throwIfAborted();
    this.deleted.push({ queryId, forwardTag });
    return settle(this.deleteOutcome);
  }

  async close(signal?: AbortSignal): Promise<void> {
    this.closeCount++;
    this.closed = true;
    signal?.throwIfAborted();
  }

  isClosed(): boolean {
    return this.closed;
  }
}
