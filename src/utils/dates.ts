/**
 * ISO 8601 date helpers
 */

import { CellValue } from '../types/dataset.js';
import { isMissing } from './dataset.js';

const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse the leading YYYY-MM-DD of a value into a UTC date.
 * Returns null for missing values, malformed strings and impossible
 * calendar dates such as 2024-02-30.
 */
export function parseIsoDate(value: CellValue | undefined): Date | null {
  if (isMissing(value)) {
    return null;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }

  const match = ISO_DATE_PREFIX.exec(String(value).slice(0, 10));
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

export function isIsoDate(value: CellValue | undefined): boolean {
  return parseIsoDate(value) !== null;
}

/**
 * Compare two present values in time order. Full ISO timestamps compare by
 * instant; anything else falls back to string order.
 */
export function compareTemporal(a: CellValue, b: CellValue): number {
  const left = toInstant(a);
  const right = toInstant(b);
  if (left !== null && right !== null) {
    return left - right;
  }
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

function toInstant(value: CellValue): number | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.getTime();
  }
  if (typeof value === 'string' && parseIsoDate(value) !== null) {
    const instant = Date.parse(value);
    return Number.isNaN(instant) ? null : instant;
  }
  return null;
}
