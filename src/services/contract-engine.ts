/**
 * Contract Engine
 *
 * Compares incoming data to a data contract: schema drift classified as
 * breaking or not under the contract's compatibility mode, value-level
 * constraint counts, and the resulting accept/alert/quarantine action.
 */

import { IContractEngine } from '../interfaces/services.js';
import { ColumnType, CompatibilityMode, ContractAction, assertNever } from '../types/common.js';
import {
  ColumnCheckResult,
  ColumnContract,
  ColumnValidation,
  ContractValidationResult,
  DataContract,
  SchemaChange
} from '../types/contracts.js';
import { CellValue, Dataset } from '../types/dataset.js';
import { columnValues, hasColumn, isMissing, isNumeric, observedColumnType, valueKey } from '../utils/dataset.js';
import { contractSchemaHash } from './data-contracts.js';
import { GovernanceConfig, resolveGovernanceConfig } from './governance-config.js';

// ==================== Compatibility ====================

function addedColumnIsBreaking(mode: CompatibilityMode): boolean {
  switch (mode) {
    case 'forward':
      return true;
    case 'backward':
    case 'full':
    case 'none':
      return false;
    default:
      return assertNever(mode, 'compatibility mode');
  }
}

function removedColumnIsBreaking(mode: CompatibilityMode): boolean {
  switch (mode) {
    case 'backward':
    case 'full':
      return true;
    case 'forward':
    case 'none':
      return false;
    default:
      return assertNever(mode, 'compatibility mode');
  }
}

/**
 * Declared and observed types are compatible when equal. The only upcast
 * accepted is int64 data in a float64 column.
 */
export function typesCompatible(declared: ColumnType, observed: ColumnType): boolean {
  if (declared === observed) {
    return true;
  }
  return declared === 'float64' && observed === 'int64';
}

// ==================== Value checks ====================

function check(
  kind: ColumnCheckResult['check'],
  failedCount: number,
  extra: Partial<ColumnCheckResult> = {}
): ColumnCheckResult {
  return Object.freeze({ check: kind, passed: failedCount === 0, failedCount, ...extra });
}

function countDuplicates(values: readonly CellValue[]): number {
  const seen = new Set<string>();
  let duplicates = 0;
  for (const value of values) {
    const key = valueKey(value);
    if (seen.has(key)) {
      duplicates++;
    } else {
      seen.add(key);
    }
  }
  return duplicates;
}

function validateColumn(column: ColumnContract, values: readonly CellValue[]): ColumnValidation {
  const checks: ColumnCheckResult[] = [];

  if (!column.nullable) {
    checks.push(check('not_null', values.filter(value => isMissing(value)).length));
  }

  if (column.unique) {
    checks.push(check('unique', countDuplicates(values)));
  }

  if (column.allowedValues.length > 0) {
    const allowed = new Set(column.allowedValues);
    const invalid = values.filter(
      value => !isMissing(value) && !(typeof value === 'string' && allowed.has(value))
    ).length;
    checks.push(check('allowed_values', invalid, { allowed: column.allowedValues }));
  }

  if (column.minValue !== undefined) {
    const min = column.minValue;
    checks.push(check('min_value', values.filter(value => isNumeric(value) && value < min).length, { min }));
  }

  if (column.maxValue !== undefined) {
    const max = column.maxValue;
    checks.push(check('max_value', values.filter(value => isNumeric(value) && value > max).length, { max }));
  }

  return Object.freeze({
    column: column.name,
    checks: Object.freeze(checks),
    failedCount: checks.reduce((sum, result) => sum + result.failedCount, 0)
  });
}

// ==================== Engine ====================

/**
 * Implementation of the Contract Engine
 */
export class ContractEngine implements IContractEngine {
  private readonly config: GovernanceConfig;

  constructor(config?: Partial<GovernanceConfig>) {
    this.config = resolveGovernanceConfig(config);
  }

  /**
   * Added columns (dataset order), then removed columns and type changes
   * (contract order)
   */
  detectSchemaChanges(dataset: Dataset, contract: DataContract): SchemaChange[] {
    const declared = new Set(contract.columns.map(column => column.name));
    const changes: SchemaChange[] = [];

    for (const name of dataset.columns) {
      if (!declared.has(name)) {
        changes.push(Object.freeze({
          changeType: 'column_added',
          columnName: name,
          oldValue: null,
          newValue: observedColumnType(dataset, name) ?? null,
          isBreaking: addedColumnIsBreaking(contract.compatibilityMode),
          description: `New column '${name}' detected in incoming data`
        }));
      }
    }

    for (const column of contract.columns) {
      if (!hasColumn(dataset, column.name)) {
        changes.push(Object.freeze({
          changeType: 'column_removed',
          columnName: column.name,
          oldValue: column.dtype,
          newValue: null,
          isBreaking: removedColumnIsBreaking(contract.compatibilityMode),
          description: `Required column '${column.name}' missing from incoming data`
        }));
      }
    }

    for (const column of contract.columns) {
      if (!hasColumn(dataset, column.name)) {
        continue;
      }
      const observed = observedColumnType(dataset, column.name);
      // a column with no present values carries no type evidence
      if (observed !== undefined && !typesCompatible(column.dtype, observed)) {
        changes.push(Object.freeze({
          changeType: 'type_changed',
          columnName: column.name,
          oldValue: column.dtype,
          newValue: observed,
          isBreaking: true,
          description: `Column '${column.name}' type changed from ${column.dtype} to ${observed}`
        }));
      }
    }

    return changes;
  }

  /**
   * Value checks for every declared column the dataset carries. A declared
   * pattern is documentation only and is not checked.
   */
  validateValues(dataset: Dataset, contract: DataContract): Record<string, ColumnValidation> {
    const results: Record<string, ColumnValidation> = {};
    for (const column of contract.columns) {
      if (hasColumn(dataset, column.name)) {
        results[column.name] = validateColumn(column, columnValues(dataset, column.name));
      }
    }
    return results;
  }

  validateAgainstContract(dataset: Dataset, contract: DataContract): ContractValidationResult {
    const schemaChanges = this.detectSchemaChanges(dataset, contract);
    const hasBreakingChanges = schemaChanges.some(change => change.isBreaking);
    const valueValidation = this.validateValues(dataset, contract);
    const failedRecords = Object.values(valueValidation).reduce(
      (sum, validation) => sum + validation.failedCount,
      0
    );
    const totalRecords = dataset.rows.length;
    const action = this.decideAction(hasBreakingChanges, failedRecords, totalRecords, schemaChanges.length);

    return Object.freeze({
      contractName: contract.name,
      contractVersion: contract.version,
      schemaHash: contractSchemaHash(contract),
      timestamp: new Date().toISOString(),
      schemaChanges: Object.freeze(schemaChanges),
      hasBreakingChanges,
      valueValidation: Object.freeze(valueValidation),
      totalRecords,
      failedRecords,
      isValid: action !== 'quarantine',
      action
    });
  }

  /**
   * Breaking change, then failure ratio above threshold, then any failure,
   * then any change; first match wins
   */
  decideAction(
    hasBreakingChanges: boolean,
    failedRecords: number,
    totalRecords: number,
    changeCount: number
  ): ContractAction {
    if (hasBreakingChanges) {
      return 'quarantine';
    }
    if (failedRecords > 0) {
      const ratio = totalRecords > 0 ? failedRecords / totalRecords : 0;
      return ratio > this.config.quarantineThreshold ? 'quarantine' : 'alert';
    }
    return changeCount > 0 ? 'alert' : 'accept';
  }
}

/**
 * Validate a dataset against a contract with the default configuration
 */
export function validateAgainstContract(
  dataset: Dataset,
  contract: DataContract,
  config?: Partial<GovernanceConfig>
): ContractValidationResult {
  return new ContractEngine(config).validateAgainstContract(dataset, contract);
}
