import { inspect } from 'node:util';
import type { OutputEntry } from '../control-plane/types.js';

const CELL_SEPARATOR = ', ';

export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return 'NULL';
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return value.toString('hex');
  if (Array.isArray(value)) return value.map(formatCell).join(CELL_SEPARATOR);
  if (typeof value === 'object') return formatObject(value);
  return String(value);
}

function formatObject(value: object): string {
  try {
    const json = JSON.stringify(value);
    if (json !== undefined) return json;
  } catch {
    // Circular references and BigInt members have no JSON form.
    return inspect(value, { breakLength: Infinity });
  }
  return String(value);
}

export function formatEntry(entry: OutputEntry): string {
  if (typeof entry === 'string') return entry;
  return entry.map(formatCell).join(CELL_SEPARATOR);
}

export function formatOutput(output: readonly OutputEntry[]): string {
  return output.map(formatEntry).join('\n');
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** `YYYYMMDD_HHMMSS` in local time, used in output file names. */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function displayTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
