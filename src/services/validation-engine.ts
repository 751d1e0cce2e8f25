/**
 * Validation Engine
 *
 * Runs an ordered registry of rules against a fully materialized dataset
 * and aggregates the results into a QualityReport. A rule that throws is
 * recorded as a failed ERROR result; it never aborts the run.
 */

import { IValidationEngine } from '../interfaces/services.js';
import { Severity, ValidationStatus, assertNever } from '../types/common.js';
import { Dataset, DataRow, RecordId } from '../types/dataset.js';
import {
  QualityReport,
  QualityReportSummary,
  RulePredicate,
  RuleSet,
  ValidationResult,
  ValidationRule
} from '../types/data-quality.js';
import {
  DuplicateRuleError,
  RuleRegistryLockedError,
  describeError
} from '../types/error-handling.js';
import { hasColumn, toRecordId } from '../utils/dataset.js';
import { GovernanceConfig, resolveGovernanceConfig } from './governance-config.js';

/**
 * Implementation of the Validation Engine
 */
export class ValidationEngine implements IValidationEngine {
  readonly domain: string;
  private readonly rules: ValidationRule[] = [];
  private readonly ruleNames = new Set<string>();
  private sealed = false;
  private readonly config: GovernanceConfig;

  constructor(domain: string, config?: Partial<GovernanceConfig>) {
    this.domain = domain;
    this.config = resolveGovernanceConfig(config);
  }

  /**
   * Build a sealed engine from a pre-built rule set
   */
  static fromRuleSet(ruleSet: RuleSet, config?: Partial<GovernanceConfig>): ValidationEngine {
    const engine = new ValidationEngine(ruleSet.domain, config);
    for (const rule of ruleSet.rules) {
      engine.addRule(rule.name, rule.description, rule.predicate, rule.severity);
    }
    return engine.seal();
  }

  /**
   * Register a rule; names are unique per engine
   */
  addRule(
    name: string,
    description: string,
    predicate: RulePredicate,
    severity: Severity = 'error'
  ): this {
    if (this.sealed) {
      throw new RuleRegistryLockedError(name, this.domain);
    }
    if (this.ruleNames.has(name)) {
      throw new DuplicateRuleError(name);
    }
    this.ruleNames.add(name);
    this.rules.push(Object.freeze({ name, description, severity, predicate }));
    return this;
  }

  /**
   * Freeze the registry; later addRule calls throw
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  getRules(): readonly ValidationRule[] {
    return [...this.rules];
  }

  /**
   * Run every registered rule, in registration order
   */
  validate(
    dataset: Dataset,
    idColumn: string = this.config.idColumn,
    sourcePath = ''
  ): QualityReport {
    const totalRecords = dataset.rows.length;
    const results = this.rules.map(rule => this.runRule(rule, dataset, idColumn, totalRecords));

    return Object.freeze({
      domain: this.domain,
      sourcePath,
      validationTimestamp: new Date().toISOString(),
      totalRecords,
      status: deriveStatus(results),
      results: Object.freeze(results),
      metadata: Object.freeze({})
    });
  }

  private runRule(
    rule: ValidationRule,
    dataset: Dataset,
    idColumn: string,
    totalRecords: number
  ): ValidationResult {
    try {
      const { passed, failedRows } = rule.predicate(dataset);
      const recordsFailed = failedRows.length;

      return Object.freeze({
        ruleName: rule.name,
        description: rule.description,
        severity: rule.severity,
        passed,
        recordsChecked: totalRecords,
        recordsFailed,
        failurePercentage: failurePercentage(recordsFailed, totalRecords),
        failedRecordIds: Object.freeze(this.collectFailedIds(dataset, failedRows, idColumn)),
        details: Object.freeze({}),
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      return Object.freeze({
        ruleName: rule.name,
        description: rule.description,
        severity: 'error',
        passed: false,
        recordsChecked: totalRecords,
        recordsFailed: totalRecords,
        failurePercentage: 100,
        failedRecordIds: Object.freeze([]),
        details: Object.freeze({ error: describeError(error) }),
        timestamp: new Date().toISOString()
      });
    }
  }

  private collectFailedIds(dataset: Dataset, failedRows: readonly DataRow[], idColumn: string): RecordId[] {
    if (failedRows.length === 0 || !hasColumn(dataset, idColumn)) {
      return [];
    }
    return failedRows
      .slice(0, this.config.failedRecordIdLimit)
      .map(row => toRecordId(row[idColumn]));
  }
}

/**
 * Percentage of failed records; 0 when nothing was checked
 */
export function failurePercentage(recordsFailed: number, recordsChecked: number): number {
  return recordsChecked > 0 ? (recordsFailed / recordsChecked) * 100 : 0;
}

/**
 * FAILED if any ERROR failed; PASSED_WITH_WARNINGS if any WARNING failed;
 * otherwise PASSED. INFO failures never change the status.
 */
export function deriveStatus(results: readonly ValidationResult[]): ValidationStatus {
  let hasErrors = false;
  let hasWarnings = false;

  for (const result of results) {
    if (result.passed) {
      continue;
    }
    switch (result.severity) {
      case 'error':
        hasErrors = true;
        break;
      case 'warning':
        hasWarnings = true;
        break;
      case 'info':
        break;
      default:
        assertNever(result.severity, 'severity');
    }
  }

  if (hasErrors) {
    return 'failed';
  }
  return hasWarnings ? 'passed_with_warnings' : 'passed';
}

/**
 * Aggregate counts for a report
 */
export function summarizeReport(report: QualityReport): QualityReportSummary {
  const failed = report.results.filter(result => !result.passed);
  return {
    totalChecks: report.results.length,
    passed: report.results.length - failed.length,
    failed: failed.length,
    errors: failed.filter(result => result.severity === 'error').length,
    warnings: failed.filter(result => result.severity === 'warning').length
  };
}

/**
 * Copy of a report with a source path and metadata attached
 */
export function withSource(
  report: QualityReport,
  sourcePath: string,
  metadata: Record<string, string> = {}
): QualityReport {
  return Object.freeze({
    ...report,
    sourcePath,
    metadata: Object.freeze({ ...report.metadata, ...metadata })
  });
}
