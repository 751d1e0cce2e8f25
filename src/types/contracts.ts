/**
 * Data contract types
 */

import {
  ChangeType,
  ColumnCheckType,
  ColumnType,
  CompatibilityMode,
  ContractAction
} from './common.js';

/**
 * Constraint specification for a single column
 */
export interface ColumnContract {
  readonly name: string;
  readonly dtype: ColumnType;
  readonly nullable: boolean;
  readonly unique: boolean;
  /** Empty means unconstrained */
  readonly allowedValues: readonly string[];
  readonly minValue?: number;
  readonly maxValue?: number;
  readonly pattern?: string;
  readonly description: string;
}

/**
 * Versioned contract for a dataset
 */
export interface DataContract {
  readonly name: string;
  readonly version: string;
  readonly domain: string;
  readonly description: string;
  readonly owner: string;
  readonly columns: readonly ColumnContract[];
  readonly compatibilityMode: CompatibilityMode;
  readonly primaryKey: readonly string[];
  /** column -> "table.column" */
  readonly foreignKeys: Readonly<Record<string, string>>;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/**
 * Input accepted by defineDataContract; omitted fields take contract defaults
 */
export interface ColumnContractInput {
  name: string;
  dtype: ColumnType;
  nullable?: boolean;
  unique?: boolean;
  allowedValues?: string[];
  minValue?: number;
  maxValue?: number;
  pattern?: string;
  description?: string;
}

export interface DataContractInput {
  name: string;
  version: string;
  domain: string;
  description?: string;
  owner: string;
  columns: ColumnContractInput[];
  compatibilityMode?: CompatibilityMode;
  primaryKey?: string[];
  foreignKeys?: Record<string, string>;
  createdAt?: string;
  updatedAt?: string;
}

/**
 * Detected difference between a contract and incoming data
 */
export interface SchemaChange {
  readonly changeType: ChangeType;
  readonly columnName: string;
  readonly oldValue: string | null;
  readonly newValue: string | null;
  readonly isBreaking: boolean;
  readonly description: string;
}

/**
 * Result of one value-level check on one column
 */
export interface ColumnCheckResult {
  readonly check: ColumnCheckType;
  readonly passed: boolean;
  readonly failedCount: number;
  readonly allowed?: readonly string[];
  readonly min?: number;
  readonly max?: number;
}

/**
 * All value checks for one column
 */
export interface ColumnValidation {
  readonly column: string;
  readonly checks: readonly ColumnCheckResult[];
  readonly failedCount: number;
}

/**
 * Complete result of validating a dataset against a contract
 */
export interface ContractValidationResult {
  readonly contractName: string;
  readonly contractVersion: string;
  readonly schemaHash: string;
  readonly timestamp: string;
  readonly schemaChanges: readonly SchemaChange[];
  readonly hasBreakingChanges: boolean;
  readonly valueValidation: Readonly<Record<string, ColumnValidation>>;
  readonly totalRecords: number;
  readonly failedRecords: number;
  readonly isValid: boolean;
  readonly action: ContractAction;
}
