/**
 * Result accumulation with a client-side row cap
 *
 * Rows are appended until `maxQueryResults` is reached. Metadata (match count,
 * warnings, partial indicators, columns) is taken from every page, including
 * pages whose rows are dropped, because it reflects the server's running view
 * rather than what the client kept.
 */

import type { TableResultData, TableResultPage } from '../types';
import { componentLogger, type Logger } from '../logger';

export class ResultAccumulator {
  private readonly data: TableResultData = {
    matchCount: 0,
    values: [],
    columns: [],
    warnings: [],
    truncatedAtLimit: false,
  };
  private readonly logger: Logger;

  constructor(
    readonly maxQueryResults: number,
    logger?: Logger
  ) {
    if (!Number.isInteger(maxQueryResults) || maxQueryResults < 1) {
      throw new RangeError(`maxQueryResults must be a positive integer, got ${maxQueryResults}`);
    }
    this.logger = componentLogger('result-accumulator', logger);
  }

  get rowCount(): number {
    return this.data.values.length;
  }

  get truncatedAtLimit(): boolean {
    return this.data.truncatedAtLimit;
  }

  get results(): TableResultData {
    return this.data;
  }

  accumulate(page: TableResultPage | null): void {
    if (page === null) return;

    this.refreshMetadata(page);

    const currentCount = this.data.values.length;
    const newCount = page.values.length;

    if (currentCount >= this.maxQueryResults) {
      if (newCount > 0) {
        if (!this.data.truncatedAtLimit) {
          this.logger.warn(
            { currentCount, limit: this.maxQueryResults, truncated: true },
            'Query result limit reached, skipping additional results'
          );
        }
        this.data.truncatedAtLimit = true;
      }
      return;
    }

    if (currentCount + newCount > this.maxQueryResults) {
      const remaining = this.maxQueryResults - currentCount;
      this.logger.warn(
        {
          currentCount,
          newCount,
          limit: this.maxQueryResults,
          truncatingTo: remaining,
          truncated: true,
        },
        'Query result limit reached, truncating results'
      );
      this.append(page.values.slice(0, remaining));
      this.data.truncatedAtLimit = true;
      return;
    }

    this.append(page.values);
  }

  private append(rows: TableResultPage['values']): void {
    for (const row of rows) {
      this.data.values.push(row);
    }
  }

  private refreshMetadata(page: TableResultPage): void {
    this.data.columns = page.columns;
    this.data.matchCount = page.matchCount;
    this.data.warnings = page.warnings;

    if (page.keyColumns !== undefined) {
      this.data.keyColumns = page.keyColumns;
    }
    if (page.partialResultsDueToTimeLimit !== undefined) {
      this.data.partialResultsDueToTimeLimit = page.partialResultsDueToTimeLimit;
    }
    if (page.discardedArrayItems !== undefined) {
      this.data.discardedArrayItems = page.discardedArrayItems;
    }
    if (page.omittedEvents !== undefined) {
      this.data.omittedEvents = page.omittedEvents;
    }
  }
}
