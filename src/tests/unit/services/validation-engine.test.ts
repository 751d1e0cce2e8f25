/**
 * Unit tests for Validation Engine
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ValidationEngine,
  deriveStatus,
  failurePercentage,
  summarizeReport,
  withSource
} from '../../../services/validation-engine.js';
import { notNull, numericRange, uniqueValues } from '../../../services/rule-predicates.js';
import { createDataset } from '../../../utils/dataset.js';
import { DuplicateRuleError, RuleRegistryLockedError } from '../../../types/index.js';

describe('ValidationEngine', () => {
  const dataset = createDataset([
    { USUBJID: 'S1', AGE: 30 },
    { USUBJID: 'S2', AGE: 150 },
    { USUBJID: 'S3', AGE: null }
  ]);

  let engine: ValidationEngine;

  beforeEach(() => {
    engine = new ValidationEngine('DM', { failedRecordIdLimit: 100, idColumn: 'USUBJID' });
  });

  describe('Rule Registration', () => {
    it('should keep rules in registration order', () => {
      engine
        .addRule('R2', 'second', notNull('AGE'))
        .addRule('R1', 'first', notNull('USUBJID'), 'warning');

      expect(engine.getRules().map(rule => rule.name)).toEqual(['R2', 'R1']);
      expect(engine.getRules()[1].severity).toBe('warning');
    });

    it('should default severity to error', () => {
      engine.addRule('R1', 'ages', numericRange('AGE', 0, 120));

      expect(engine.getRules()[0].severity).toBe('error');
    });

    it('should reject a duplicate rule name', () => {
      engine.addRule('R1', 'ages', numericRange('AGE', 0, 120));

      expect(() => engine.addRule('R1', 'again', notNull('AGE'))).toThrow(DuplicateRuleError);
    });

    it('should reject rules once sealed', () => {
      engine.seal();

      expect(engine.isSealed()).toBe(true);
      expect(() => engine.addRule('R1', 'ages', notNull('AGE'))).toThrow(RuleRegistryLockedError);
    });
  });

  describe('Validation', () => {
    it('should report failing rows and their identifiers', () => {
      engine.addRule('R1', 'AGE must be between 0 and 120', numericRange('AGE', 0, 120));

      const report = engine.validate(dataset);
      const [result] = report.results;

      expect(report.totalRecords).toBe(3);
      expect(report.status).toBe('failed');
      expect(result.passed).toBe(false);
      expect(result.recordsChecked).toBe(3);
      expect(result.recordsFailed).toBe(1);
      expect(result.failurePercentage).toBeCloseTo(33.3333, 3);
      expect(result.failedRecordIds).toEqual(['S2']);
      expect(result.details).toEqual({});
    });

    it('should record a throwing rule as a failed error result', () => {
      engine
        .addRule('R1', 'USUBJID present', notNull('USUBJID'))
        .addRule('R2', 'ARM present', notNull('ARM'), 'warning');

      const report = engine.validate(dataset);
      const broken = report.results[1];

      expect(report.results).toHaveLength(2);
      expect(report.results[0].passed).toBe(true);
      expect(broken.severity).toBe('error');
      expect(broken.passed).toBe(false);
      expect(broken.recordsFailed).toBe(3);
      expect(broken.failurePercentage).toBe(100);
      expect(broken.failedRecordIds).toEqual([]);
      expect(broken.details.error).toBe("Column 'ARM' not found in dataset");
      expect(report.status).toBe('failed');
    });

    it('should report 0% for an empty dataset', () => {
      engine.addRule('R1', 'USUBJID present', notNull('USUBJID'));

      const report = engine.validate(createDataset([], { columns: ['USUBJID'] }));

      expect(report.totalRecords).toBe(0);
      expect(report.results[0].passed).toBe(true);
      expect(report.results[0].failurePercentage).toBe(0);
      expect(report.status).toBe('passed');
    });

    it('should cap failed record ids at the configured limit', () => {
      const limited = new ValidationEngine('DM', { failedRecordIdLimit: 2 });
      limited.addRule('R1', 'AGE present', notNull('AGE'));

      const report = limited.validate(
        createDataset([
          { USUBJID: 'A', AGE: null },
          { USUBJID: 'B', AGE: null },
          { USUBJID: 'C', AGE: null }
        ])
      );

      expect(report.results[0].recordsFailed).toBe(3);
      expect(report.results[0].failedRecordIds).toEqual(['A', 'B']);
    });

    it('should omit identifiers when the id column is absent', () => {
      engine.addRule('R1', 'AGE in range', numericRange('AGE', 0, 120));

      const report = engine.validate(createDataset([{ SUBJ: 'S1', AGE: 200 }]));

      expect(report.results[0].recordsFailed).toBe(1);
      expect(report.results[0].failedRecordIds).toEqual([]);
    });

    it('should use an explicit id column and source path', () => {
      engine.addRule('R1', 'AGE in range', numericRange('AGE', 0, 120));

      const report = engine.validate(
        createDataset([{ SUBJ: 'S9', AGE: 200 }]),
        'SUBJ',
        's3://lake/landing/dm.csv'
      );

      expect(report.sourcePath).toBe('s3://lake/landing/dm.csv');
      expect(report.results[0].failedRecordIds).toEqual(['S9']);
    });

    it('should derive passed_with_warnings from a failing warning', () => {
      engine
        .addRule('R1', 'USUBJID present', notNull('USUBJID'))
        .addRule('R2', 'AGE present', notNull('AGE'), 'warning');

      expect(engine.validate(dataset).status).toBe('passed_with_warnings');
    });

    it('should leave status passed when only info rules fail', () => {
      engine.addRule('R1', 'AGE present', notNull('AGE'), 'info');

      const report = engine.validate(dataset);

      expect(report.results[0].passed).toBe(false);
      expect(report.status).toBe('passed');
    });

    it('should flag every row of a duplicated value', () => {
      engine.addRule('R1', 'USUBJID unique', uniqueValues('USUBJID'));

      const report = engine.validate(
        createDataset([{ USUBJID: 'S1' }, { USUBJID: 'S1' }, { USUBJID: 'S2' }])
      );

      expect(report.results[0].recordsFailed).toBe(2);
      expect(report.results[0].failedRecordIds).toEqual(['S1', 'S1']);
    });
  });

  describe('Report helpers', () => {
    it('should summarize counts by outcome and severity', () => {
      engine
        .addRule('R1', 'USUBJID present', notNull('USUBJID'))
        .addRule('R2', 'AGE present', notNull('AGE'), 'warning')
        .addRule('R3', 'AGE in range', numericRange('AGE', 0, 120));

      expect(summarizeReport(engine.validate(dataset))).toEqual({
        totalChecks: 3,
        passed: 1,
        failed: 2,
        errors: 1,
        warnings: 1
      });
    });

    it('should attach a source path and metadata without touching the original', () => {
      engine.addRule('R1', 'USUBJID present', notNull('USUBJID'));
      const report = engine.validate(dataset);

      const tagged = withSource(report, 's3://lake/bronze/dm', { batch: '7' });

      expect(tagged.sourcePath).toBe('s3://lake/bronze/dm');
      expect(tagged.metadata).toEqual({ batch: '7' });
      expect(report.sourcePath).toBe('');
    });

    it('should compute failure percentages', () => {
      expect(failurePercentage(0, 0)).toBe(0);
      expect(failurePercentage(1, 4)).toBe(25);
    });

    it('should treat an empty result list as passed', () => {
      expect(deriveStatus([])).toBe('passed');
    });
  });
});
