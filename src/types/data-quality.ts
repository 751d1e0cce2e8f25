/**
 * Data Quality types for the Clinical Data Governance Core
 */

import { Severity, ValidationStatus } from './common.js';
import { Dataset, DataRow, RecordId } from './dataset.js';

/**
 * Outcome of evaluating one rule predicate
 */
export interface RuleOutcome {
  passed: boolean;
  failedRows: readonly DataRow[];
}

/**
 * Pure predicate over a dataset
 */
export type RulePredicate = (dataset: Dataset) => RuleOutcome;

/**
 * Named, severity-tagged validation rule
 */
export interface ValidationRule {
  readonly name: string;
  readonly description: string;
  readonly severity: Severity;
  readonly predicate: RulePredicate;
}

/**
 * Fixed, ordered list of rules for one logical domain
 */
export interface RuleSet {
  readonly domain: string;
  readonly description: string;
  readonly rules: readonly ValidationRule[];
}

/**
 * Result of executing a single rule
 */
export interface ValidationResult {
  readonly ruleName: string;
  readonly description: string;
  readonly severity: Severity;
  readonly passed: boolean;
  readonly recordsChecked: number;
  readonly recordsFailed: number;
  readonly failurePercentage: number;
  readonly failedRecordIds: readonly RecordId[];
  readonly details: Readonly<Record<string, string>>;
  readonly timestamp: string;
}

/**
 * Counts derived from the results of a report
 */
export interface QualityReportSummary {
  totalChecks: number;
  passed: number;
  failed: number;
  errors: number;
  warnings: number;
}

/**
 * Complete quality report for one validation run
 */
export interface QualityReport {
  readonly domain: string;
  readonly sourcePath: string;
  readonly validationTimestamp: string;
  readonly totalRecords: number;
  readonly status: ValidationStatus;
  readonly results: readonly ValidationResult[];
  readonly metadata: Readonly<Record<string, string>>;
}
