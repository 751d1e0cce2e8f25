/**
 * Clinical Rule Sets
 *
 * Pre-built, ordered rule sets for the SDTM domains handled by the
 * pipeline: DM (demographics), AE (adverse events), VS (vital signs) and
 * LB (laboratory results).
 */

import { Severity } from '../types/common.js';
import { Dataset } from '../types/dataset.js';
import { QualityReport, RulePredicate, RuleSet, ValidationRule } from '../types/data-quality.js';
import { DomainError } from '../types/error-handling.js';
import { GovernanceConfig } from './governance-config.js';
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
} from './rule-predicates.js';
import { ValidationEngine } from './validation-engine.js';

function rule(
  name: string,
  description: string,
  predicate: RulePredicate,
  severity: Severity = 'error'
): ValidationRule {
  return Object.freeze({ name, description, severity, predicate });
}

function ruleSet(domain: string, description: string, rules: ValidationRule[]): RuleSet {
  return Object.freeze({ domain, description, rules: Object.freeze(rules) });
}

// ==================== Rule Sets ====================

export const DM_RULES: RuleSet = ruleSet('DM', 'Demographics', [
  rule('DM_001', 'USUBJID must be unique', uniqueValues('USUBJID')),
  rule('DM_002', 'USUBJID must not be null', notNull('USUBJID')),
  rule('DM_003', 'AGE must be between 0 and 120', numericRange('AGE', 0, 120)),
  rule('DM_004', 'SEX must be M, F, U, or UNDIFFERENTIATED',
    controlledVocabulary('SEX', ['M', 'F', 'U', 'UNDIFFERENTIATED'])),
  rule('DM_005', 'ARM should not be null', notNull('ARM'), 'warning'),
  rule('DM_006', 'RFSTDTC must be valid ISO 8601 date', isoDateFormat('RFSTDTC'))
]);

export const AE_RULES: RuleSet = ruleSet('AE', 'Adverse Events', [
  rule('AE_001', 'USUBJID must not be null', notNull('USUBJID')),
  rule('AE_002', 'AETERM must not be null', notNull('AETERM')),
  rule('AE_003', 'AESEV must be MILD, MODERATE, or SEVERE',
    controlledVocabulary('AESEV', ['MILD', 'MODERATE', 'SEVERE'])),
  rule('AE_004', 'AESER must be Y or N', controlledVocabulary('AESER', ['Y', 'N'])),
  rule('AE_005', 'AEENDTC must be >= AESTDTC', temporalOrder('AESTDTC', 'AEENDTC'))
]);

export const VS_RULES: RuleSet = ruleSet('VS', 'Vital Signs', [
  rule('VS_001', 'USUBJID must not be null', notNull('USUBJID')),
  rule('VS_002', 'VSTESTCD must not be null', notNull('VSTESTCD')),
  rule('VS_003', 'VSSTRESN should be non-negative', nonNegative('VSSTRESN'), 'warning'),
  rule('VS_004', 'Vital signs should be within physiological ranges',
    codedNumericRanges('VSTESTCD', 'VSSTRESN', [
      { code: 'HR', min: 20, max: 250 },
      { code: 'SYSBP', min: 50, max: 250 },
      { code: 'TEMP', min: 30, max: 45 }
    ]),
    'warning')
]);

export const LB_RULES: RuleSet = ruleSet('LB', 'Laboratory Test Results', [
  rule('LB_001', 'USUBJID must not be null', notNull('USUBJID')),
  rule('LB_002', 'LBTESTCD must not be null', notNull('LBTESTCD')),
  rule('LB_003', 'LBNRIND must be LOW, NORMAL, HIGH, or ABNORMAL',
    controlledVocabulary('LBNRIND', ['LOW', 'NORMAL', 'HIGH', 'ABNORMAL'], { skipMissing: true }),
    'warning'),
  rule('LB_004', 'LBORNRLO must be below LBORNRHI', strictlyLess('LBORNRLO', 'LBORNRHI'))
]);

const RULE_SETS: ReadonlyMap<string, RuleSet> = new Map([
  ['DM', DM_RULES],
  ['AE', AE_RULES],
  ['VS', VS_RULES],
  ['LB', LB_RULES]
]);

export const SUPPORTED_DOMAINS: readonly string[] = [...RULE_SETS.keys()];

// ==================== Lookup ====================

/**
 * Rule set for a domain key; unknown keys raise DomainError
 */
export function getRuleSet(domain: string): RuleSet {
  const found = RULE_SETS.get(domain.toUpperCase());
  if (!found) {
    throw new DomainError(domain, SUPPORTED_DOMAINS);
  }
  return found;
}

/**
 * Sealed validation engine for a domain
 */
export function createValidationEngine(
  domain: string,
  config?: Partial<GovernanceConfig>
): ValidationEngine {
  return ValidationEngine.fromRuleSet(getRuleSet(domain), config);
}

/**
 * Validate a dataset with the pre-built rules of its domain
 */
export function validateClinicalData(
  dataset: Dataset,
  domain: string,
  sourcePath = '',
  config?: Partial<GovernanceConfig>
): QualityReport {
  return createValidationEngine(domain, config).validate(dataset, undefined, sourcePath);
}
