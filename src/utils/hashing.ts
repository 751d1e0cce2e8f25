/**
 * Deterministic identifiers used for audit trails
 */

import { createHash } from 'node:crypto';

export function md5Hex(input: string): string {
  return createHash('md5').update(input).digest('hex');
}

/**
 * Hash of (name, type, nullable) triples sorted by name; first 8 hex chars
 */
export function schemaHash(
  columns: ReadonlyArray<{ name: string; dtype: string; nullable: boolean }>
): string {
  const triples = [...columns]
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map(column => `[${JSON.stringify(column.name)}, ${JSON.stringify(column.dtype)}, ${column.nullable}]`);
  return md5Hex(`[${triples.join(', ')}]`).slice(0, 8);
}

/**
 * Asset identifier derived from its location; first 12 hex chars
 */
export function assetIdFor(location: string): string {
  return md5Hex(location).slice(0, 12);
}
