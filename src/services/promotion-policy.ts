/**
 * Promotion policy: combines a quality verdict and a contract action into
 * one decision for the dataset
 */

import { ContractAction, PromotionDecision, ValidationStatus, assertNever } from '../types/common.js';
import { ContractValidationResult } from '../types/contracts.js';
import { QualityReport } from '../types/data-quality.js';

export interface PromotionVerdict {
  decision: PromotionDecision;
  reasons: string[];
}

function decisionForStatus(status: ValidationStatus): PromotionDecision {
  switch (status) {
    case 'failed':
      return 'quarantine';
    case 'passed_with_warnings':
      return 'alert';
    case 'passed':
      return 'promote';
    default:
      return assertNever(status, 'validation status');
  }
}

function decisionForAction(action: ContractAction): PromotionDecision {
  switch (action) {
    case 'quarantine':
      return 'quarantine';
    case 'alert':
      return 'alert';
    case 'accept':
      return 'promote';
    default:
      return assertNever(action, 'contract action');
  }
}

const RANK: Record<PromotionDecision, number> = { promote: 0, alert: 1, quarantine: 2 };

/**
 * Quarantine if either side quarantines, alert if either side alerts,
 * promote otherwise
 */
export function decidePromotion(
  report: QualityReport,
  contractResult?: ContractValidationResult
): PromotionVerdict {
  const reasons: string[] = [];

  const fromReport = decisionForStatus(report.status);
  if (fromReport !== 'promote') {
    const failed = report.results.filter(result => !result.passed).map(result => result.ruleName);
    reasons.push(`Validation ${report.status}: ${failed.join(', ')}`);
  }

  let decision = fromReport;
  if (contractResult) {
    const fromContract = decisionForAction(contractResult.action);
    if (fromContract !== 'promote') {
      const breaking = contractResult.schemaChanges.filter(change => change.isBreaking).length;
      reasons.push(
        `Contract ${contractResult.contractName} ${contractResult.action}: `
          + `${breaking} breaking change(s), ${contractResult.failedRecords} failed value check(s)`
      );
    }
    if (RANK[fromContract] > RANK[decision]) {
      decision = fromContract;
    }
  }

  return { decision, reasons };
}
