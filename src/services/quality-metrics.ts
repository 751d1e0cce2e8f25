/**
 * Quality Metrics
 *
 * Aggregates validation artifacts into per-domain metrics and a
 * pipeline-wide summary with threshold alerts. Rates are rounded to four
 * decimals.
 */

import { ContractValidationResult } from '../types/contracts.js';
import { QualityReport } from '../types/data-quality.js';
import { DomainMetrics, PipelineSummary, QualityThresholds } from '../types/quality-metrics.js';
import { decidePromotion } from './promotion-policy.js';

export const DEFAULT_QUALITY_THRESHOLDS: QualityThresholds = {
  minimumPassRate: 0.98,
  maximumQuarantineRate: 0.05,
};

function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/**
 * Failed cells over cells read, for one contract check kind
 */
function checkRate(
  contractResult: ContractValidationResult | undefined,
  check: 'not_null' | 'unique'
): number {
  if (!contractResult) {
    return 0;
  }
  let failed = 0;
  let columns = 0;
  for (const validation of Object.values(contractResult.valueValidation)) {
    for (const result of validation.checks) {
      if (result.check === check) {
        failed += result.failedCount;
        columns++;
      }
    }
  }
  const cells = columns * contractResult.totalRecords;
  return cells > 0 ? round4(failed / cells) : 0;
}

/**
 * Metrics for one domain run. A quarantined dataset counts every record as
 * quarantined.
 */
export function computeDomainMetrics(
  report: QualityReport,
  contractResult?: ContractValidationResult
): DomainMetrics {
  const { decision } = decidePromotion(report, contractResult);
  const passedChecks = report.results.filter(result => result.passed).length;

  return {
    domain: report.domain,
    sourcePath: report.sourcePath,
    status: report.status,
    ...(contractResult ? { contractAction: contractResult.action } : {}),
    recordsReceived: report.totalRecords,
    recordsQuarantined: decision === 'quarantine' ? report.totalRecords : 0,
    validationPassRate: report.results.length > 0 ? round4(passedChecks / report.results.length) : 1,
    nullRate: checkRate(contractResult, 'not_null'),
    duplicateRate: checkRate(contractResult, 'unique'),
    schemaChangesDetected: contractResult ? contractResult.schemaChanges.length : 0,
    breakingChangesDetected: contractResult
      ? contractResult.schemaChanges.filter(change => change.isBreaking).length
      : 0,
  };
}

/**
 * Pipeline-wide totals; the overall pass rate is weighted by records received
 */
export function summarizePipeline(
  metrics: readonly DomainMetrics[],
  thresholds: QualityThresholds = DEFAULT_QUALITY_THRESHOLDS,
  generatedAt: Date = new Date()
): PipelineSummary {
  const totalReceived = metrics.reduce((sum, m) => sum + m.recordsReceived, 0);
  const totalQuarantined = metrics.reduce((sum, m) => sum + m.recordsQuarantined, 0);

  const overallPassRate = totalReceived > 0
    ? round4(metrics.reduce((sum, m) => sum + m.validationPassRate * m.recordsReceived, 0) / totalReceived)
    : 1;
  const quarantineRate = round4(totalQuarantined / Math.max(totalReceived, 1));
  const belowThreshold = metrics.filter(m => m.validationPassRate < thresholds.minimumPassRate);
  const qualitySloCompliance = metrics.length > 0
    ? round4((metrics.length - belowThreshold.length) / metrics.length)
    : 1;

  const alerts: string[] = [];
  if (belowThreshold.length > 0) {
    alerts.push(`Validation pass rate below target in: ${belowThreshold.map(m => m.domain).join(', ')}`);
  }
  if (metrics.some(m => m.breakingChangesDetected > 0)) {
    alerts.push('Breaking schema changes detected - review quarantine');
  }
  if (quarantineRate > thresholds.maximumQuarantineRate) {
    alerts.push(`High quarantine rate: ${(quarantineRate * 100).toFixed(1)}%`);
  }

  return {
    generatedAt,
    domains: metrics.length,
    totalRecordsProcessed: totalReceived,
    totalRecordsQuarantined: totalQuarantined,
    overallPassRate,
    quarantineRate,
    qualitySloCompliance,
    alerts,
  };
}
