/**
 * Record serialization
 *
 * Converts governance artifacts to their snake_case JSON records and parses
 * records back through the zod schemas in records.schema.ts. A record that
 * fails its schema raises RecordParseError with one line per zod issue.
 */

import { z } from 'zod';
import {
  ColumnCheckResult,
  ColumnContract,
  ColumnValidation,
  ContractValidationResult,
  DataContract,
  SchemaChange
} from '../types/contracts.js';
import { QualityReport, ValidationResult } from '../types/data-quality.js';
import { RecordParseError } from '../types/error-handling.js';
import { DataAsset, LineageEvent } from '../types/lineage.js';
import {
  ColumnContractRecord,
  ColumnValidationRecord,
  ContractValidationResultRecord,
  ContractValidationResultRecordSchema,
  DataAssetRecord,
  DataAssetRecordSchema,
  DataContractRecord,
  DataContractRecordSchema,
  LineageEventRecord,
  LineageEventRecordSchema,
  QualityReportRecord,
  QualityReportRecordSchema,
  SchemaChangeRecord,
  ValidationResultRecord
} from '../types/records.schema.js';
import { defineDataContract } from './data-contracts.js';
import { summarizeReport } from './validation-engine.js';

// ==================== Helpers ====================

function parseRecord<Output, Def extends z.ZodTypeDef, Input>(
  schema: z.ZodType<Output, Def, Input>,
  recordType: string,
  input: unknown
): Output {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new RecordParseError(
      recordType,
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

// ==================== Quality Report ====================

function validationResultToRecord(result: ValidationResult): ValidationResultRecord {
  return {
    rule_name: result.ruleName,
    description: result.description,
    severity: result.severity,
    passed: result.passed,
    records_checked: result.recordsChecked,
    records_failed: result.recordsFailed,
    failure_percentage: roundTo2(result.failurePercentage),
    failed_record_ids: [...result.failedRecordIds],
    details: { ...result.details },
    timestamp: result.timestamp,
  };
}

function validationResultFromRecord(record: ValidationResultRecord): ValidationResult {
  return Object.freeze({
    ruleName: record.rule_name,
    description: record.description,
    severity: record.severity,
    passed: record.passed,
    recordsChecked: record.records_checked,
    recordsFailed: record.records_failed,
    failurePercentage: record.failure_percentage,
    failedRecordIds: Object.freeze([...record.failed_record_ids]),
    details: Object.freeze({ ...record.details }),
    timestamp: record.timestamp,
  });
}

export function qualityReportToRecord(report: QualityReport): QualityReportRecord {
  const summary = summarizeReport(report);
  return {
    domain: report.domain,
    source_path: report.sourcePath,
    validation_timestamp: report.validationTimestamp,
    total_records: report.totalRecords,
    status: report.status,
    summary: {
      total_checks: summary.totalChecks,
      passed: summary.passed,
      failed: summary.failed,
      errors: summary.errors,
      warnings: summary.warnings,
    },
    results: report.results.map(validationResultToRecord),
    metadata: { ...report.metadata },
  };
}

/**
 * Parse a quality report record; the summary is derived data and is not read back
 */
export function qualityReportFromRecord(input: unknown): QualityReport {
  const record = parseRecord(QualityReportRecordSchema, 'QualityReport', input);
  return Object.freeze({
    domain: record.domain,
    sourcePath: record.source_path,
    validationTimestamp: record.validation_timestamp,
    totalRecords: record.total_records,
    status: record.status,
    results: Object.freeze(record.results.map(validationResultFromRecord)),
    metadata: Object.freeze({ ...record.metadata }),
  });
}

// ==================== Data Contract ====================

function columnContractToRecord(column: ColumnContract): ColumnContractRecord {
  return {
    name: column.name,
    dtype: column.dtype,
    nullable: column.nullable,
    unique: column.unique,
    description: column.description,
    ...(column.allowedValues.length > 0 ? { allowed_values: [...column.allowedValues] } : {}),
    ...(column.minValue !== undefined ? { min_value: column.minValue } : {}),
    ...(column.maxValue !== undefined ? { max_value: column.maxValue } : {}),
    ...(column.pattern !== undefined ? { pattern: column.pattern } : {}),
  };
}

export function dataContractToRecord(contract: DataContract): DataContractRecord {
  return {
    name: contract.name,
    version: contract.version,
    domain: contract.domain,
    description: contract.description,
    owner: contract.owner,
    compatibility_mode: contract.compatibilityMode,
    primary_key: [...contract.primaryKey],
    foreign_keys: { ...contract.foreignKeys },
    columns: contract.columns.map(columnContractToRecord),
    created_at: contract.createdAt,
    updated_at: contract.updatedAt,
  };
}

/**
 * Parse a contract record and check its structural invariants
 */
export function dataContractFromRecord(input: unknown): DataContract {
  const record = parseRecord(DataContractRecordSchema, 'DataContract', input);
  return defineDataContract({
    name: record.name,
    version: record.version,
    domain: record.domain,
    description: record.description,
    owner: record.owner,
    compatibilityMode: record.compatibility_mode,
    primaryKey: record.primary_key,
    foreignKeys: record.foreign_keys,
    createdAt: record.created_at,
    updatedAt: record.updated_at,
    columns: record.columns.map(column => ({
      name: column.name,
      dtype: column.dtype,
      nullable: column.nullable,
      unique: column.unique,
      allowedValues: column.allowed_values,
      minValue: column.min_value,
      maxValue: column.max_value,
      pattern: column.pattern,
      description: column.description,
    })),
  });
}

// ==================== Contract Validation Result ====================

function schemaChangeToRecord(change: SchemaChange): SchemaChangeRecord {
  return {
    change_type: change.changeType,
    column_name: change.columnName,
    old_value: change.oldValue,
    new_value: change.newValue,
    is_breaking: change.isBreaking,
    description: change.description,
  };
}

function columnValidationToRecord(validation: ColumnValidation): ColumnValidationRecord {
  return {
    column: validation.column,
    checks: validation.checks.map(result => ({
      check: result.check,
      passed: result.passed,
      failed_count: result.failedCount,
      ...(result.allowed !== undefined ? { allowed: [...result.allowed] } : {}),
      ...(result.min !== undefined ? { min: result.min } : {}),
      ...(result.max !== undefined ? { max: result.max } : {}),
    })),
    failed_count: validation.failedCount,
  };
}

function columnValidationFromRecord(record: ColumnValidationRecord): ColumnValidation {
  const checks: ColumnCheckResult[] = record.checks.map(result => Object.freeze({
    check: result.check,
    passed: result.passed,
    failedCount: result.failed_count,
    ...(result.allowed !== undefined ? { allowed: Object.freeze([...result.allowed]) } : {}),
    ...(result.min !== undefined ? { min: result.min } : {}),
    ...(result.max !== undefined ? { max: result.max } : {}),
  }));
  return Object.freeze({
    column: record.column,
    checks: Object.freeze(checks),
    failedCount: record.failed_count,
  });
}

export function contractResultToRecord(result: ContractValidationResult): ContractValidationResultRecord {
  const valueValidation: Record<string, ColumnValidationRecord> = {};
  for (const [column, validation] of Object.entries(result.valueValidation)) {
    valueValidation[column] = columnValidationToRecord(validation);
  }

  return {
    contract_name: result.contractName,
    contract_version: result.contractVersion,
    schema_hash: result.schemaHash,
    timestamp: result.timestamp,
    schema_changes: result.schemaChanges.map(schemaChangeToRecord),
    has_breaking_changes: result.hasBreakingChanges,
    value_validation: valueValidation,
    total_records: result.totalRecords,
    failed_records: result.failedRecords,
    is_valid: result.isValid,
    action: result.action,
  };
}

export function contractResultFromRecord(input: unknown): ContractValidationResult {
  const record = parseRecord(ContractValidationResultRecordSchema, 'ContractValidationResult', input);
  const valueValidation: Record<string, ColumnValidation> = {};
  for (const [column, validation] of Object.entries(record.value_validation)) {
    valueValidation[column] = columnValidationFromRecord(validation);
  }

  return Object.freeze({
    contractName: record.contract_name,
    contractVersion: record.contract_version,
    schemaHash: record.schema_hash,
    timestamp: record.timestamp,
    schemaChanges: Object.freeze(record.schema_changes.map(change => Object.freeze({
      changeType: change.change_type,
      columnName: change.column_name,
      oldValue: change.old_value,
      newValue: change.new_value,
      isBreaking: change.is_breaking,
      description: change.description,
    }))),
    hasBreakingChanges: record.has_breaking_changes,
    valueValidation: Object.freeze(valueValidation),
    totalRecords: record.total_records,
    failedRecords: record.failed_records,
    isValid: record.is_valid,
    action: record.action,
  });
}

// ==================== Lineage ====================

export function dataAssetToRecord(asset: DataAsset): DataAssetRecord {
  return {
    asset_id: asset.assetId,
    name: asset.name,
    asset_type: asset.assetType,
    location: asset.location,
    layer: asset.layer,
    schema_hash: asset.schemaHash ?? null,
    record_count: asset.recordCount ?? null,
    created_at: asset.createdAt,
    metadata: { ...asset.metadata },
  };
}

function dataAssetFromParsed(record: DataAssetRecord): DataAsset {
  return Object.freeze({
    assetId: record.asset_id,
    name: record.name,
    assetType: record.asset_type,
    location: record.location,
    layer: record.layer,
    ...(record.schema_hash != null ? { schemaHash: record.schema_hash } : {}),
    ...(record.record_count != null ? { recordCount: record.record_count } : {}),
    createdAt: record.created_at,
    metadata: Object.freeze({ ...record.metadata }),
  });
}

export function dataAssetFromRecord(input: unknown): DataAsset {
  return dataAssetFromParsed(parseRecord(DataAssetRecordSchema, 'DataAsset', input));
}

export function lineageEventToRecord(event: LineageEvent): LineageEventRecord {
  return {
    event_id: event.eventId,
    event_type: event.eventType,
    timestamp: event.timestamp,
    triggered_by: event.triggeredBy,
    input_assets: event.inputAssets.map(dataAssetToRecord),
    output_assets: event.outputAssets.map(dataAssetToRecord),
    transformation_logic: event.transformationLogic ?? null,
    parameters: { ...event.parameters },
    validation_status: event.validationStatus ?? null,
    records_in: event.recordsIn,
    records_out: event.recordsOut,
    records_rejected: event.recordsRejected,
    execution_id: event.executionId ?? null,
    duration_seconds: event.durationSeconds,
  };
}

export function lineageEventFromRecord(input: unknown): LineageEvent {
  const record = parseRecord(LineageEventRecordSchema, 'LineageEvent', input);
  return Object.freeze({
    eventId: record.event_id,
    eventType: record.event_type,
    timestamp: record.timestamp,
    triggeredBy: record.triggered_by,
    inputAssets: Object.freeze(record.input_assets.map(dataAssetFromParsed)),
    outputAssets: Object.freeze(record.output_assets.map(dataAssetFromParsed)),
    ...(record.transformation_logic != null ? { transformationLogic: record.transformation_logic } : {}),
    parameters: Object.freeze({ ...record.parameters }),
    ...(record.validation_status != null ? { validationStatus: record.validation_status } : {}),
    recordsIn: record.records_in,
    recordsOut: record.records_out,
    recordsRejected: record.records_rejected,
    ...(record.execution_id != null ? { executionId: record.execution_id } : {}),
    durationSeconds: record.duration_seconds,
  });
}
