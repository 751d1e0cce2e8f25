/**
 * Rule Predicates
 *
 * Building blocks for validation rules. Each builder returns a pure
 * RulePredicate that reports the rows it rejects. Reading a column the
 * dataset does not carry throws MissingColumnError, which the validation
 * engine turns into a failed result.
 */

import { CellValue, Dataset, DataRow } from '../types/dataset.js';
import { RuleOutcome, RulePredicate } from '../types/data-quality.js';
import { isMissing, isNumeric, requireColumns, valueKey } from '../utils/dataset.js';
import { compareTemporal, isIsoDate } from '../utils/dates.js';

function outcome(failedRows: DataRow[]): RuleOutcome {
  return { passed: failedRows.length === 0, failedRows };
}

/**
 * Rows where the column is missing
 */
export function notNull(column: string): RulePredicate {
  return (dataset: Dataset) => {
    requireColumns(dataset, column);
    return outcome(dataset.rows.filter(row => isMissing(row[column])));
  };
}

/**
 * Every row that shares its value with another row, first occurrence
 * included
 */
export function uniqueValues(column: string): RulePredicate {
  return (dataset: Dataset) => {
    requireColumns(dataset, column);
    const counts = new Map<string, number>();
    for (const row of dataset.rows) {
      const key = valueKey(row[column]);
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    return outcome(dataset.rows.filter(row => (counts.get(valueKey(row[column])) ?? 0) > 1));
  };
}

/**
 * Numeric values outside [min, max]; missing values are not flagged
 */
export function numericRange(column: string, min: number, max: number): RulePredicate {
  return (dataset: Dataset) => {
    requireColumns(dataset, column);
    return outcome(
      dataset.rows.filter(row => {
        const value = row[column];
        return isNumeric(value) && (value < min || value > max);
      })
    );
  };
}

/**
 * Numeric values below zero
 */
export function nonNegative(column: string): RulePredicate {
  return (dataset: Dataset) => {
    requireColumns(dataset, column);
    return outcome(
      dataset.rows.filter(row => {
        const value = row[column];
        return isNumeric(value) && value < 0;
      })
    );
  };
}

/**
 * Values not in a controlled vocabulary after upper-casing.
 * Missing and non-string values fail unless skipMissing is set, in which
 * case missing values are excluded from the check.
 */
export function controlledVocabulary(
  column: string,
  allowed: readonly string[],
  options: { skipMissing?: boolean } = {}
): RulePredicate {
  const vocabulary = new Set(allowed.map(term => term.toUpperCase()));
  return (dataset: Dataset) => {
    requireColumns(dataset, column);
    return outcome(
      dataset.rows.filter(row => {
        const value = row[column];
        if (isMissing(value)) {
          return !options.skipMissing;
        }
        return typeof value !== 'string' || !vocabulary.has(value.toUpperCase());
      })
    );
  };
}

/**
 * Values that are not valid YYYY-MM-DD dates; missing values fail
 */
export function isoDateFormat(column: string): RulePredicate {
  return (dataset: Dataset) => {
    requireColumns(dataset, column);
    return outcome(dataset.rows.filter(row => !isIsoDate(row[column])));
  };
}

/**
 * Rows where later < earlier. Rows missing either field are excluded from
 * this rule's failure set.
 */
export function temporalOrder(earlierColumn: string, laterColumn: string): RulePredicate {
  return (dataset: Dataset) => {
    requireColumns(dataset, earlierColumn, laterColumn);
    return outcome(
      dataset.rows.filter(row => {
        const earlier = row[earlierColumn];
        const later = row[laterColumn];
        if (isMissing(earlier) || isMissing(later)) {
          return false;
        }
        return compareTemporal(later, earlier) < 0;
      })
    );
  };
}

/**
 * Rows where low >= high, evaluated only where both values are numeric
 */
export function strictlyLess(lowColumn: string, highColumn: string): RulePredicate {
  return (dataset: Dataset) => {
    requireColumns(dataset, lowColumn, highColumn);
    return outcome(
      dataset.rows.filter(row => {
        const low = row[lowColumn];
        const high = row[highColumn];
        return isNumeric(low) && isNumeric(high) && low >= high;
      })
    );
  };
}

/**
 * Numeric range that applies only to rows whose code column equals code
 */
export interface CodedRange {
  code: string;
  min: number;
  max: number;
}

export function codedNumericRanges(
  codeColumn: string,
  valueColumn: string,
  ranges: readonly CodedRange[]
): RulePredicate {
  const byCode = new Map(ranges.map(range => [range.code, range] as const));
  return (dataset: Dataset) => {
    requireColumns(dataset, codeColumn, valueColumn);
    return outcome(
      dataset.rows.filter(row => {
        const code: CellValue = row[codeColumn];
        const value = row[valueColumn];
        if (typeof code !== 'string' || !isNumeric(value)) {
          return false;
        }
        const range = byCode.get(code);
        return range !== undefined && (value < range.min || value > range.max);
      })
    );
  };
}
