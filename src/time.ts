/**
 * Time bounds for submit requests
 */

/** Offset into the past, relative to now */
export interface TimeOffset {
  days?: number;
  hours?: number;
  minutes?: number;
  seconds?: number;
  milliseconds?: number;
}

/**
 * A query time bound: an absolute `Date`, an offset into the past, or a
 * literal the server understands (`24h`, `7d`, `30m`, `25s`, or epoch s/ms/ns).
 */
export type TimeParam = Date | TimeOffset | string;

const RELATIVE_LITERAL = /^\d+[smhd]$/;
const EPOCH_LITERAL = /^\d+$/;

export function isTimeLiteral(value: string): boolean {
  return RELATIVE_LITERAL.test(value) || EPOCH_LITERAL.test(value);
}

export function offsetToMilliseconds(offset: TimeOffset): number {
  return (
    (offset.days ?? 0) * 86_400_000 +
    (offset.hours ?? 0) * 3_600_000 +
    (offset.minutes ?? 0) * 60_000 +
    (offset.seconds ?? 0) * 1000 +
    (offset.milliseconds ?? 0)
  );
}

/**
 * Normalise a time bound to the string the submit endpoint expects.
 * Dates and offsets become epoch milliseconds.
 *
 * @param now - Current epoch milliseconds, used for offsets
 */
export function parseTimeParam(value: TimeParam, now: number = Date.now()): string {
  if (typeof value === 'string') {
    if (!isTimeLiteral(value)) {
      throw new RangeError(`Unsupported time literal: '${value}'`);
    }
    return value;
  }

  if (value instanceof Date) {
    const epochMs = value.getTime();
    if (Number.isNaN(epochMs)) {
      throw new RangeError('Invalid Date passed as time parameter');
    }
    return String(epochMs);
  }

  const offsetMs = offsetToMilliseconds(value);
  if (!Number.isFinite(offsetMs) || offsetMs < 0) {
    throw new RangeError('Time offset must be a non-negative duration');
  }
  return String(Math.trunc(now - offsetMs));
}
