/**
 * ResultAccumulator Tests
 */

import { describe, it, expect } from 'vitest';
import { ResultAccumulator } from '../src/handlers/result-accumulator';
import { captureLogs, rows, silentLogger, tablePage, LEVEL } from './helpers';

describe('ResultAccumulator', () => {
  it('should append rows in order below the cap', () => {
    const accumulator = new ResultAccumulator(100, silentLogger);

    accumulator.accumulate(tablePage(rows(0, 60)));
    accumulator.accumulate(tablePage(rows(60, 30)));

    expect(accumulator.rowCount).toBe(90);
    expect(accumulator.truncatedAtLimit).toBe(false);
    expect(accumulator.results.values[89]).toEqual([89]);
  });

  it('should clip the page that crosses the cap', () => {
    const { logger, entries } = captureLogs();
    const accumulator = new ResultAccumulator(100, logger);

    accumulator.accumulate(tablePage(rows(0, 60)));
    accumulator.accumulate(tablePage(rows(60, 30)));
    accumulator.accumulate(tablePage(rows(1000, 30)));

    expect(accumulator.rowCount).toBe(100);
    expect(accumulator.truncatedAtLimit).toBe(true);
    expect(accumulator.results.values.slice(90)).toEqual(rows(1000, 10));
    expect(entries).toContainEqual(
      expect.objectContaining({
        level: LEVEL.warn,
        msg: 'Query result limit reached, truncating results',
        currentCount: 90,
        newCount: 30,
        limit: 100,
        truncatingTo: 10,
      })
    );
  });

  it('should keep refreshing metadata after the cap is reached', () => {
    const accumulator = new ResultAccumulator(10, silentLogger);
    accumulator.accumulate(tablePage(rows(0, 10)));

    accumulator.accumulate(
      tablePage(rows(10, 5), {
        matchCount: 200,
        warnings: ['sampling applied'],
        partialResultsDueToTimeLimit: true,
      })
    );

    expect(accumulator.rowCount).toBe(10);
    expect(accumulator.truncatedAtLimit).toBe(true);
    expect(accumulator.results.matchCount).toBe(200);
    expect(accumulator.results.warnings).toEqual(['sampling applied']);
    expect(accumulator.results.partialResultsDueToTimeLimit).toBe(true);
  });

  it('should warn once when pages keep arriving past the cap', () => {
    const { logger, entries } = captureLogs();
    const accumulator = new ResultAccumulator(5, logger);

    accumulator.accumulate(tablePage(rows(0, 5)));
    accumulator.accumulate(tablePage(rows(5, 5)));
    accumulator.accumulate(tablePage(rows(10, 5)));

    const skipped = entries.filter(
      (entry) => entry.msg === 'Query result limit reached, skipping additional results'
    );
    expect(skipped).toHaveLength(1);
    expect(skipped[0]).toMatchObject({ level: LEVEL.warn, currentCount: 5, limit: 5 });
  });

  it('should not flag truncation when a full result meets the cap exactly', () => {
    const accumulator = new ResultAccumulator(5, silentLogger);

    accumulator.accumulate(tablePage(rows(0, 5)));
    accumulator.accumulate(tablePage([], { matchCount: 5 }));

    expect(accumulator.rowCount).toBe(5);
    expect(accumulator.truncatedAtLimit).toBe(false);
  });

  it('should ignore pages without tabular data', () => {
    const accumulator = new ResultAccumulator(5, silentLogger);
    accumulator.accumulate(tablePage(rows(0, 2), { warnings: ['first'] }));

    accumulator.accumulate(null);

    expect(accumulator.rowCount).toBe(2);
    expect(accumulator.results.warnings).toEqual(['first']);
  });

  it('should keep optional metadata that a later page omits', () => {
    const accumulator = new ResultAccumulator(50, silentLogger);

    accumulator.accumulate(tablePage(rows(0, 1), { keyColumns: 1, omittedEvents: 3 }));
    accumulator.accumulate(tablePage(rows(1, 1), { columns: [{ name: 'n', type: 'NUMBER' }] }));

    expect(accumulator.results.keyColumns).toBe(1);
    expect(accumulator.results.omittedEvents).toBe(3);
    expect(accumulator.results.columns).toEqual([{ name: 'n', type: 'NUMBER' }]);
  });

  it('should reject a cap below one', () => {
    expect(() => new ResultAccumulator(0)).toThrow(RangeError);
  });
});
