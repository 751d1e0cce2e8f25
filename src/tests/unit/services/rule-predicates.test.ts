/**
 * Unit tests for rule predicates and the dataset helpers they use
 */

import { describe, it, expect } from 'vitest';
import {
  codedNumericRanges,
  controlledVocabulary,
  isoDateFormat,
  nonNegative,
  notNull,
  numericRange,
  strictlyLess,
  temporalOrder,
  uniqueValues
} from '../../../services/rule-predicates.js';
import {
  createDataset,
  datasetFromColumns,
  isMissing,
  observedColumnType,
  valueKey
} from '../../../utils/dataset.js';
import { compareTemporal, isIsoDate, parseIsoDate } from '../../../utils/dates.js';
import { MissingColumnError } from '../../../types/index.js';

describe('Rule Predicates', () => {
  it('should treat null and NaN as missing', () => {
    const dataset = createDataset([{ A: null }, { A: Number.NaN }, { A: 0 }, { A: '' }]);

    const outcome = notNull('A')(dataset);

    expect(outcome.passed).toBe(false);
    expect(outcome.failedRows).toHaveLength(2);
  });

  it('should throw MissingColumnError for an absent column', () => {
    expect(() => notNull('B')(createDataset([{ A: 1 }]))).toThrow(MissingColumnError);
  });

  it('should keep string and number values distinct when checking uniqueness', () => {
    const dataset = createDataset([{ A: '1' }, { A: 1 }, { A: null }, { A: null }]);

    expect(uniqueValues('A')(dataset).failedRows).toEqual([{ A: null }, { A: null }]);
  });

  it('should ignore non-numeric values in ranges', () => {
    const dataset = createDataset([{ A: -1 }, { A: 0 }, { A: 120 }, { A: 121 }, { A: '500' }, { A: null }]);

    expect(numericRange('A', 0, 120)(dataset).failedRows).toEqual([{ A: -1 }, { A: 121 }]);
    expect(nonNegative('A')(dataset).failedRows).toEqual([{ A: -1 }]);
  });

  it('should match vocabularies case-insensitively', () => {
    const dataset = createDataset([{ A: 'low' }, { A: 'High' }, { A: 'odd' }, { A: 3 }, { A: null }]);

    expect(controlledVocabulary('A', ['LOW', 'HIGH'])(dataset).failedRows).toHaveLength(3);
    expect(controlledVocabulary('A', ['LOW', 'HIGH'], { skipMissing: true })(dataset).failedRows).toHaveLength(2);
  });

  it('should reject impossible calendar dates', () => {
    const dataset = createDataset([
      { D: '2024-02-29' },
      { D: '2023-02-29' },
      { D: '2024-1-05' },
      { D: '2024-06-01T08:30:00' },
      { D: null }
    ]);

    expect(isoDateFormat('D')(dataset).failedRows).toEqual([{ D: '2023-02-29' }, { D: '2024-1-05' }, { D: null }]);
  });

  it('should exclude rows missing either date from the order check', () => {
    const dataset = createDataset([
      { S: '2024-01-10', E: '2024-01-09' },
      { S: '2024-01-10', E: '2024-01-10' },
      { S: null, E: '2024-01-01' },
      { S: '2024-01-10T10:00:00Z', E: '2024-01-10T09:00:00Z' }
    ]);

    expect(temporalOrder('S', 'E')(dataset).failedRows).toHaveLength(2);
  });

  it('should flag equal bounds as not strictly ordered', () => {
    const dataset = createDataset([{ LO: 1, HI: 2 }, { LO: 2, HI: 2 }, { LO: 3, HI: null }]);

    expect(strictlyLess('LO', 'HI')(dataset).failedRows).toEqual([{ LO: 2, HI: 2 }]);
  });

  it('should apply coded ranges only to listed codes', () => {
    const dataset = createDataset([
      { CODE: 'HR', VALUE: 10 },
      { CODE: 'HR', VALUE: 60 },
      { CODE: 'BMI', VALUE: 900 },
      { CODE: null, VALUE: 900 }
    ]);

    const predicate = codedNumericRanges('CODE', 'VALUE', [{ code: 'HR', min: 20, max: 250 }]);

    expect(predicate(dataset).failedRows).toEqual([{ CODE: 'HR', VALUE: 10 }]);
  });
});

describe('Dataset helpers', () => {
  it('should fill absent keys with null and keep first-seen column order', () => {
    const dataset = createDataset([{ A: 1 }, { B: 'x', A: 2 }]);

    expect(dataset.columns).toEqual(['A', 'B']);
    expect(dataset.rows[0]).toEqual({ A: 1, B: null });
  });

  it('should build rows from column arrays', () => {
    const dataset = datasetFromColumns({ A: [1, 2], B: ['x', null] });

    expect(dataset.rows).toEqual([{ A: 1, B: 'x' }, { A: 2, B: null }]);
    expect(() => datasetFromColumns({ A: [1], B: [] })).toThrow('Column arrays differ in length: 1, 0');
  });

  it('should infer column types from present values only', () => {
    const dataset = createDataset([
      { I: 1, F: 1.5, B: true, D: new Date('2024-01-01T00:00:00Z'), S: 'a', M: 1, E: null },
      { I: null, F: 2, B: false, D: null, S: null, M: 'b', E: null }
    ]);

    expect(observedColumnType(dataset, 'I')).toBe('int64');
    expect(observedColumnType(dataset, 'F')).toBe('float64');
    expect(observedColumnType(dataset, 'B')).toBe('boolean');
    expect(observedColumnType(dataset, 'D')).toBe('datetime64');
    expect(observedColumnType(dataset, 'S')).toBe('string');
    expect(observedColumnType(dataset, 'M')).toBe('string');
    expect(observedColumnType(dataset, 'E')).toBeUndefined();
  });

  it('should prefer declared column types', () => {
    const dataset = createDataset([{ A: 1 }], { columnTypes: { A: 'float64' } });

    expect(observedColumnType(dataset, 'A')).toBe('float64');
  });

  it('should key values by type', () => {
    expect(valueKey('1')).toBe('string:1');
    expect(valueKey(1)).toBe('number:1');
    expect(valueKey(null)).toBe('null:');
    expect(isMissing(undefined)).toBe(true);
  });
});

describe('Date helpers', () => {
  it('should parse the leading calendar date', () => {
    expect(parseIsoDate('2024-03-05T10:00:00')?.toISOString()).toBe('2024-03-05T00:00:00.000Z');
    expect(isIsoDate('2024-04-31')).toBe(false);
    expect(isIsoDate(20240101)).toBe(false);
  });

  it('should order timestamps by instant and other values as strings', () => {
    expect(compareTemporal('2024-01-10', '2024-01-09')).toBeGreaterThan(0);
    expect(compareTemporal('2024-01-10T01:00:00+02:00', '2024-01-09T23:30:00Z')).toBeLessThan(0);
    expect(compareTemporal('b', 'a')).toBe(1);
  });
});
