/**
 * Tabular dataset types
 */

import { ColumnType } from './common.js';

/**
 * A single cell; null marks a missing value
 */
export type CellValue = string | number | boolean | Date | null;

/**
 * One row keyed by column name
 */
export type DataRow = Readonly<Record<string, CellValue>>;

/**
 * Fully materialized, column-named table. Engines never mutate it.
 */
export interface Dataset {
  readonly columns: readonly string[];
  readonly rows: readonly DataRow[];
  /** Declared physical types; inferred from values when absent */
  readonly columnTypes?: Readonly<Record<string, ColumnType>>;
}

/**
 * Identifier value reported for a failing record
 */
export type RecordId = string | number | null;
