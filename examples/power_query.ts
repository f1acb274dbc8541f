/**
 * PowerQuery Examples
 *
 * Demonstrates:
 * - One-shot runs through LakeQueryClient
 * - Driving a PowerQueryHandler step by step with a time budget
 * - Turning the table into records
 *
 * Point LAKEQUERY_URL and LAKEQUERY_TOKEN at a query service to run it.
 */

import {
  HandlerTimeoutError,
  LakeQueryClient,
  createLogger,
  createSettings,
  toRecords,
  type LakeQuerySettings,
} from '../src';

const logger = createLogger({ level: 'warn' });

/**
 * Example 1: run a query to completion in one call
 */
async function exampleRunPowerQuery(client: LakeQueryClient): Promise<void> {
  console.log('\n=== Example 1: runPowerQuery ===');

  const { results, partial } = await client.runPowerQuery({
    query: "filter event.type == 'DNS' | group count() by src.ip | sort -count | limit 10",
    startTime: '24h',
    endTime: '0',
  });

  console.log(`Rows: ${results.values.length} of ${results.matchCount} matches`);
  if (partial) {
    console.log('Result is partial; narrow the time range or the query');
  }
  console.table(toRecords(results));
}

/**
 * Example 2: drive a handler with its own budget and cancellation
 */
async function exampleHandlerLifecycle(client: LakeQueryClient): Promise<void> {
  console.log('\n=== Example 2: PowerQueryHandler ===');

  const handler = client.createPowerQueryHandler({ pollTimeoutMs: 10_000, pollIntervalMs: 1000 });
  const controller = new AbortController();
  const stop = setTimeout(() => controller.abort(), 15_000);

  try {
    await handler.submitPowerQuery(
      {
        query: 'columns timestamp, src.ip, dst.port | limit 100',
        startTime: { hours: 1 },
        endTime: new Date(),
      },
      { signal: controller.signal }
    );
    console.log(`Submitted ${handler.queryId}, step ${handler.lastStepSeen}/${handler.totalSteps}`);

    const results = await handler.pollUntilComplete({ signal: controller.signal });
    console.log(`Completed with ${results.values.length} rows`);
  } catch (error) {
    if (error instanceof HandlerTimeoutError) {
      console.log(error.message);
      return;
    }
    throw error;
  } finally {
    clearTimeout(stop);
    await handler.close();
  }
}

async function main(): Promise<void> {
  const baseUrl = process.env.LAKEQUERY_URL;
  const authToken = process.env.LAKEQUERY_TOKEN;
  if (!baseUrl || !authToken) {
    console.log('(Skipped: set LAKEQUERY_URL and LAKEQUERY_TOKEN)');
    return;
  }

  const settings: LakeQuerySettings = createSettings(
    { baseUrl, authToken, environment: 'development' },
    { logger }
  );
  const client = new LakeQueryClient(settings, { logger });

  await exampleRunPowerQuery(client);
  await exampleHandlerLifecycle(client);

  console.log('\nDone.');
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});

export { exampleRunPowerQuery, exampleHandlerLifecycle };
