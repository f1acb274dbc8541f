import type { QueryPage } from '../types';

/**
 * Progress of one in-flight query.
 *
 * Owned by a single handler; `lastStepSeen` mirrors `stepsCompleted` after
 * every processed response.
 */
export class QueryState {
  queryId: string | null = null;
  forwardTag: string | null = null;
  totalSteps = 0;
  stepsCompleted = 0;
  lastStepSeen = 0;
  private progressObserved = false;

  get submitted(): boolean {
    return this.queryId !== null;
  }

  begin(queryId: string, forwardTag: string): void {
    this.queryId = queryId;
    this.forwardTag = forwardTag;
  }

  record(page: QueryPage): void {
    this.totalSteps = page.totalSteps;
    this.stepsCompleted = Math.max(this.stepsCompleted, page.stepsCompleted);
    this.lastStepSeen = this.stepsCompleted;
    this.progressObserved = true;
  }

  /** Complete once the last step seen reaches the server's step count */
  isCompleted(): boolean {
    return this.progressObserved && this.lastStepSeen === this.totalSteps;
  }
}
