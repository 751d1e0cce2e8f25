/**
 * Governance Pipeline interface for the Clinical Data Governance Core
 */

import { PromotionOutcome, PromotionRequest } from '../types/pipeline.js';
import { ILineageIndex } from './services.js';

/**
 * Governance Pipeline interface
 * Gates promotion between storage tiers and records the lineage of every decision
 */
export interface IGovernancePipeline {
  evaluate(request: PromotionRequest): PromotionOutcome;
  buildLineageIndex(): ILineageIndex;
}
