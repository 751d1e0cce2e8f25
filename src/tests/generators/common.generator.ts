/**
 * Common test generators for property-based testing
 */

import fc from 'fast-check';
import {
  CellValue,
  COMPATIBILITY_MODES,
  CompatibilityMode,
  SEVERITIES,
  Severity
} from '../../types/index.js';

export const severityGenerator = (): fc.Arbitrary<Severity> =>
  fc.constantFrom(...SEVERITIES);

export const compatibilityModeGenerator = (): fc.Arbitrary<CompatibilityMode> =>
  fc.constantFrom(...COMPATIBILITY_MODES);

/**
 * Upper-case identifier such as a column or rule name
 */
export const identifierGenerator = (): fc.Arbitrary<string> =>
  fc.stringOf(fc.constantFrom(...'ABCDEFGHIJKLMNOPQRSTUVWXYZ'.split('')), { minLength: 2, maxLength: 8 });

/**
 * YYYY-MM-DD between 2020-01-01 and roughly mid 2025
 */
export const isoDateGenerator = (): fc.Arbitrary<string> =>
  fc.integer({ min: 0, max: 2000 }).map(days =>
    new Date(Date.UTC(2020, 0, 1) + days * 86400000).toISOString().slice(0, 10)
  );

/**
 * Cell drawn from a small pool so duplicates and nulls are common
 */
export const cellValueGenerator = (): fc.Arbitrary<CellValue> =>
  fc.oneof(
    fc.constant(null),
    fc.constantFrom('A', 'B', 'C'),
    fc.integer({ min: -5, max: 5 })
  );
