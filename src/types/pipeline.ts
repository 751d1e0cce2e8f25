/**
 * Promotion gate types
 */

import { PromotionDecision } from './common.js';
import { ContractValidationResult } from './contracts.js';
import { Dataset } from './dataset.js';
import { QualityReport } from './data-quality.js';
import { DataAsset, LineageEvent } from './lineage.js';

/**
 * One dataset offered for promotion between tiers
 */
export interface PromotionRequest {
  dataset: Dataset;
  /** Domain key selecting the rule set and contract */
  domain: string;
  sourcePath: string;
  /** Asset the dataset was read from */
  input: DataAsset;
  /** Asset the dataset is written to when promoted */
  output: DataAsset;
  /** Asset the dataset is written to when quarantined */
  quarantine?: DataAsset;
  triggeredBy: string;
  executionId?: string;
}

/**
 * Everything the gate produced for one request
 */
export interface PromotionOutcome {
  decision: PromotionDecision;
  qualityReport: QualityReport;
  contractResult?: ContractValidationResult;
  lineageEvent: LineageEvent;
  reasons: string[];
}
