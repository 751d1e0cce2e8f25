/**
 * Dataset helpers shared by the validation and contract engines
 */

import { ColumnType } from '../types/common.js';
import { CellValue, Dataset, DataRow, RecordId } from '../types/dataset.js';
import { MissingColumnError } from '../types/error-handling.js';

/**
 * Build a dataset from row objects. Column order follows first appearance.
 */
export function createDataset(
  rows: Array<Record<string, CellValue>>,
  options: { columns?: string[]; columnTypes?: Record<string, ColumnType> } = {}
): Dataset {
  const columns = options.columns ? [...options.columns] : collectColumns(rows);
  const normalized: DataRow[] = rows.map(row => {
    const copy: Record<string, CellValue> = {};
    for (const column of columns) {
      copy[column] = row[column] ?? null;
    }
    return Object.freeze(copy);
  });

  return Object.freeze({
    columns: Object.freeze(columns),
    rows: Object.freeze(normalized),
    ...(options.columnTypes ? { columnTypes: Object.freeze({ ...options.columnTypes }) } : {})
  });
}

/**
 * Build a dataset from column arrays; all arrays must share one length
 */
export function datasetFromColumns(
  columnData: Record<string, CellValue[]>,
  columnTypes?: Record<string, ColumnType>
): Dataset {
  const columns = Object.keys(columnData);
  const lengths = new Set(columns.map(column => columnData[column].length));
  if (lengths.size > 1) {
    throw new Error(`Column arrays differ in length: ${[...lengths].join(', ')}`);
  }
  const rowCount = columns.length > 0 ? columnData[columns[0]].length : 0;

  const rows: Array<Record<string, CellValue>> = [];
  for (let i = 0; i < rowCount; i++) {
    const row: Record<string, CellValue> = {};
    for (const column of columns) {
      row[column] = columnData[column][i];
    }
    rows.push(row);
  }

  return createDataset(rows, { columns, columnTypes });
}

function collectColumns(rows: Array<Record<string, CellValue>>): string[] {
  const seen = new Set<string>();
  const columns: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return columns;
}

export function hasColumn(dataset: Dataset, column: string): boolean {
  return dataset.columns.includes(column);
}

/**
 * Throws MissingColumnError when any column is absent
 */
export function requireColumns(dataset: Dataset, ...columns: string[]): void {
  for (const column of columns) {
    if (!hasColumn(dataset, column)) {
      throw new MissingColumnError(column);
    }
  }
}

/**
 * Values of one column in row order
 */
export function columnValues(dataset: Dataset, column: string): CellValue[] {
  requireColumns(dataset, column);
  return dataset.rows.map(row => row[column] ?? null);
}

/**
 * Missing value test: null, undefined and NaN are all missing
 */
export function isMissing(value: CellValue | undefined): boolean {
  return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));
}

export function isNumeric(value: CellValue | undefined): value is number {
  return typeof value === 'number' && !Number.isNaN(value);
}

/**
 * Key used to compare cell values for equality across types
 */
export function valueKey(value: CellValue): string {
  if (isMissing(value)) {
    return 'null:';
  }
  if (value instanceof Date) {
    return `date:${value.getTime()}`;
  }
  return `${typeof value}:${String(value)}`;
}

/**
 * Observed column type; declared columnTypes win over inference.
 *
 * Inference looks only at non-missing values: integers -> int64, other
 * numbers -> float64, booleans -> boolean, dates -> datetime64, mixed and
 * text columns -> string. Undefined when the column has no present values.
 */
export function observedColumnType(dataset: Dataset, column: string): ColumnType | undefined {
  const declared = dataset.columnTypes?.[column];
  if (declared) {
    return declared;
  }

  const values = columnValues(dataset, column).filter(value => !isMissing(value));
  if (values.length === 0) {
    return undefined;
  }
  if (values.every(value => typeof value === 'number')) {
    return values.every(value => Number.isInteger(value)) ? 'int64' : 'float64';
  }
  if (values.every(value => typeof value === 'boolean')) {
    return 'boolean';
  }
  if (values.every(value => value instanceof Date)) {
    return 'datetime64';
  }
  return 'string';
}

/**
 * Identifier of a row for failure reporting
 */
export function toRecordId(value: CellValue | undefined): RecordId {
  if (isMissing(value)) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}
