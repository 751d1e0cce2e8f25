/**
 * Quality metric types aggregated from validation artifacts
 */

import { ValidationStatus, ContractAction } from './common.js';

/**
 * Quality metrics for a single domain run
 */
export interface DomainMetrics {
  domain: string;
  sourcePath: string;
  status: ValidationStatus;
  contractAction?: ContractAction;
  recordsReceived: number;
  recordsQuarantined: number;
  /** Share of checks that passed, 0.0 - 1.0 */
  validationPassRate: number;
  /** Null cells found by contract not-null checks over the cells those checks read */
  nullRate: number;
  /** Duplicates found by contract uniqueness checks over the cells those checks read */
  duplicateRate: number;
  schemaChangesDetected: number;
  breakingChangesDetected: number;
}

/**
 * Thresholds that raise pipeline alerts
 */
export interface QualityThresholds {
  minimumPassRate: number;
  maximumQuarantineRate: number;
}

/**
 * Pipeline-wide aggregate of domain metrics
 */
export interface PipelineSummary {
  generatedAt: Date;
  domains: number;
  totalRecordsProcessed: number;
  totalRecordsQuarantined: number;
  overallPassRate: number;
  quarantineRate: number;
  qualitySloCompliance: number;
  alerts: string[];
}
