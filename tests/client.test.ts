/**
 * LakeQueryClient Tests
 */

import { describe, it, expect } from 'vitest';
import { LakeQueryClient } from '../src/client';
import { PowerQueryHandler } from '../src/handlers/power-query-handler';
import {
  abortReason,
  FakeTransport,
  VirtualClock,
  queryPage,
  rows,
  silentLogger,
  tablePage,
  testSettings,
} from './helpers';

describe('LakeQueryClient', () => {
  function createClient(transport: FakeTransport): LakeQueryClient {
    return new LakeQueryClient(testSettings({ maxQueryResults: 3 }), {
      clock: new VirtualClock(),
      logger: silentLogger,
      transportFactory: () => transport,
    });
  }

  it('should run a PowerQuery to completion', async () => {
    const transport = new FakeTransport();
    transport.submitOutcome = { response: queryPage(0, 2), forwardTag: 'tag-1' };
    transport.pingOutcomes.push(
      queryPage(1, 2, tablePage(rows(0, 2))),
      queryPage(2, 2, tablePage(rows(2, 1), { matchCount: 3 }))
    );

    const { results, partial } = await createClient(transport).runPowerQuery({
      query: 'group count() by src.ip',
      startTime: '24h',
      endTime: '0',
    });

    expect(results.values).toEqual(rows(0, 3));
    expect(results.matchCount).toBe(3);
    expect(partial).toBe(false);
    expect(transport.deleted).toHaveLength(1);
    expect(transport.isClosed()).toBe(true);
  });

  it('should report partial results when the row cap is hit', async () => {
    const transport = new FakeTransport();
    transport.submitOutcome = { response: queryPage(1, 1, tablePage(rows(0, 5))), forwardTag: 'tag-1' };

    const { results, partial } = await createClient(transport).runPowerQuery({
      query: 'columns src.ip',
      startTime: '1h',
      endTime: '0',
    });

    expect(results.values).toEqual(rows(0, 3));
    expect(results.truncatedAtLimit).toBe(true);
    expect(partial).toBe(true);
  });

  it('should close the transport when a run fails', async () => {
    const transport = new FakeTransport();
    const reason = abortReason();
    const controller = new AbortController();
    controller.abort(reason);

    await expect(
      createClient(transport).runPowerQuery(
        { query: 'columns src.ip', startTime: '1h', endTime: '0' },
        { signal: controller.signal }
      )
    ).rejects.toBe(reason);
    expect(transport.isClosed()).toBe(true);
  });

  it('should pass handler overrides through', () => {
    const handler = createClient(new FakeTransport()).createPowerQueryHandler({
      pollTimeoutMs: 5000,
      pollIntervalMs: 1000,
    });

    expect(handler).toBeInstanceOf(PowerQueryHandler);
    expect(handler.pollTimeoutMs).toBe(5000);
    expect(handler.pollIntervalMs).toBe(1000);
  });
});
