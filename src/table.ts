/**
 * Conversion of tabular results into plain records
 */

import type { Column, JsonValue, TableResultPage } from './types';

export type TableCell = string | number | boolean | null;

export type TableRecord = Record<string, TableCell>;

/** Epoch unit by digit count (ns, µs, ms, s), converted to microseconds */
const TO_MICROS_BY_DIGITS = new Map<number, (value: bigint) => bigint>([
  [19, (ns) => ns / 1000n],
  [16, (us) => us],
  [13, (ms) => ms * 1000n],
  [10, (s) => s * 1_000_000n],
]);

const INTEGER_STRING = /^-?\d+$/;

function toEpochInteger(value: JsonValue | undefined): bigint | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return BigInt(Math.trunc(value));
  }
  if (typeof value === 'string' && INTEGER_STRING.test(value)) {
    return BigInt(value);
  }
  return null;
}

function floorDiv(a: bigint, b: bigint): bigint {
  const quotient = a / b;
  return a % b !== 0n && a < 0n !== b < 0n ? quotient - 1n : quotient;
}

/** `YYYY-MM-DDTHH:MM:SS.ffffff+0000` */
function formatMicros(micros: bigint): string | null {
  const seconds = floorDiv(micros, 1_000_000n);
  const fraction = micros - seconds * 1_000_000n;
  const date = new Date(Number(seconds) * 1000);
  if (Number.isNaN(date.getTime())) return null;
  return `${date.toISOString().slice(0, 19)}.${fraction.toString().padStart(6, '0')}+0000`;
}

function convertTimestamps(cells: (JsonValue | undefined)[]): TableCell[] | null {
  const epochs = cells.map(toEpochInteger);

  let digits = 0;
  for (const epoch of epochs) {
    if (epoch !== null) digits = Math.max(digits, epoch.toString().length);
  }

  const toMicros = TO_MICROS_BY_DIGITS.get(digits);
  if (!toMicros) return null;

  return epochs.map((epoch) => (epoch === null ? null : formatMicros(toMicros(epoch))));
}

function toNumberCell(value: JsonValue | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toStringCell(value: JsonValue | undefined): TableCell {
  if (value === undefined || value === null) return null;
  if (typeof value === 'boolean' || typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

function passThrough(value: JsonValue | undefined): TableCell {
  if (value === undefined || value === null) return null;
  if (typeof value === 'object') return JSON.stringify(value);
  return value;
}

function convertColumn(column: Column, cells: (JsonValue | undefined)[]): TableCell[] {
  switch (column.type) {
    case 'TIMESTAMP':
      // Unknown precision: keep the raw values
      return convertTimestamps(cells) ?? cells.map(passThrough);
    case 'NUMBER':
    case 'PERCENTAGE':
      return cells.map(toNumberCell);
    case 'STRING':
      return cells.map(toStringCell);
  }
}

/**
 * Turn a table into one record per row, keyed by column name.
 *
 * TIMESTAMP columns are rendered in UTC with microsecond precision; the epoch
 * unit (s, ms, µs or ns) is inferred from the longest value in the column.
 * NUMBER and PERCENTAGE cells that do not parse become null.
 */
export function toRecords(table: Pick<TableResultPage, 'columns' | 'values'>): TableRecord[] {
  const converted = table.columns.map((column, index) =>
    convertColumn(
      column,
      table.values.map((row) => row[index])
    )
  );

  return table.values.map((_, rowIndex) => {
    const record: TableRecord = {};
    table.columns.forEach((column, columnIndex) => {
      record[column.name] = converted[columnIndex]?.[rowIndex] ?? null;
    });
    return record;
  });
}
