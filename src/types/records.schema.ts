/**
 * Serialized record schemas
 *
 * JSON-compatible shapes written by callers for quality reports, contract
 * results, contracts and lineage events. Field names are snake_case and
 * enums serialize to their lower-case tag.
 */

import { z } from 'zod';
import {
  CHANGE_TYPES,
  COLUMN_CHECK_TYPES,
  COLUMN_TYPES,
  COMPATIBILITY_MODES,
  CONTRACT_ACTIONS,
  DATA_LAYERS,
  LINEAGE_EVENT_TYPES,
  SEVERITIES,
  VALIDATION_STATUSES
} from './common.js';

// =============================================================================
// ENUM TAGS
// =============================================================================

export const SeveritySchema = z.enum(SEVERITIES);
export const ValidationStatusSchema = z.enum(VALIDATION_STATUSES);
export const CompatibilityModeSchema = z.enum(COMPATIBILITY_MODES);
export const ChangeTypeSchema = z.enum(CHANGE_TYPES);
export const ContractActionSchema = z.enum(CONTRACT_ACTIONS);
export const DataLayerSchema = z.enum(DATA_LAYERS);
export const LineageEventTypeSchema = z.enum(LINEAGE_EVENT_TYPES);
export const ColumnTypeSchema = z.enum(COLUMN_TYPES);
export const ColumnCheckTypeSchema = z.enum(COLUMN_CHECK_TYPES);

const StringMapSchema = z.record(z.string());

// =============================================================================
// QUALITY REPORT
// =============================================================================

export const ValidationResultRecordSchema = z.object({
  rule_name: z.string().min(1),
  description: z.string(),
  severity: SeveritySchema,
  passed: z.boolean(),
  records_checked: z.number().int().nonnegative(),
  records_failed: z.number().int().nonnegative(),
  failure_percentage: z.number().min(0).max(100),
  failed_record_ids: z.array(z.union([z.string(), z.number(), z.null()])),
  details: StringMapSchema.default({}),
  timestamp: z.string(),
});

export type ValidationResultRecord = z.infer<typeof ValidationResultRecordSchema>;

export const QualityReportSummaryRecordSchema = z.object({
  total_checks: z.number().int().nonnegative(),
  passed: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  errors: z.number().int().nonnegative(),
  warnings: z.number().int().nonnegative(),
});

export const QualityReportRecordSchema = z.object({
  domain: z.string(),
  source_path: z.string(),
  validation_timestamp: z.string(),
  total_records: z.number().int().nonnegative(),
  status: ValidationStatusSchema,
  summary: QualityReportSummaryRecordSchema,
  results: z.array(ValidationResultRecordSchema),
  metadata: StringMapSchema.default({}),
});

export type QualityReportRecord = z.infer<typeof QualityReportRecordSchema>;

// =============================================================================
// DATA CONTRACT
// =============================================================================

export const ColumnContractRecordSchema = z.object({
  name: z.string().min(1),
  dtype: ColumnTypeSchema,
  nullable: z.boolean().default(true),
  unique: z.boolean().default(false),
  allowed_values: z.array(z.string()).optional(),
  min_value: z.number().optional(),
  max_value: z.number().optional(),
  pattern: z.string().optional(),
  description: z.string().default(''),
});

export type ColumnContractRecord = z.infer<typeof ColumnContractRecordSchema>;

export const DataContractRecordSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  domain: z.string().min(1),
  description: z.string().default(''),
  owner: z.string(),
  compatibility_mode: CompatibilityModeSchema.default('backward'),
  primary_key: z.array(z.string()).default([]),
  foreign_keys: StringMapSchema.default({}),
  columns: z.array(ColumnContractRecordSchema).min(1),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

export type DataContractRecord = z.infer<typeof DataContractRecordSchema>;

// =============================================================================
// CONTRACT VALIDATION RESULT
// =============================================================================

export const SchemaChangeRecordSchema = z.object({
  change_type: ChangeTypeSchema,
  column_name: z.string(),
  old_value: z.string().nullable(),
  new_value: z.string().nullable(),
  is_breaking: z.boolean(),
  description: z.string(),
});

export type SchemaChangeRecord = z.infer<typeof SchemaChangeRecordSchema>;

export const ColumnCheckRecordSchema = z.object({
  check: ColumnCheckTypeSchema,
  passed: z.boolean(),
  failed_count: z.number().int().nonnegative(),
  allowed: z.array(z.string()).optional(),
  min: z.number().optional(),
  max: z.number().optional(),
});

export const ColumnValidationRecordSchema = z.object({
  column: z.string(),
  checks: z.array(ColumnCheckRecordSchema),
  failed_count: z.number().int().nonnegative(),
});

export type ColumnValidationRecord = z.infer<typeof ColumnValidationRecordSchema>;

export const ContractValidationResultRecordSchema = z.object({
  contract_name: z.string(),
  contract_version: z.string(),
  schema_hash: z.string(),
  timestamp: z.string(),
  schema_changes: z.array(SchemaChangeRecordSchema),
  has_breaking_changes: z.boolean(),
  value_validation: z.record(ColumnValidationRecordSchema),
  total_records: z.number().int().nonnegative(),
  failed_records: z.number().int().nonnegative(),
  is_valid: z.boolean(),
  action: ContractActionSchema,
});

export type ContractValidationResultRecord = z.infer<typeof ContractValidationResultRecordSchema>;

// =============================================================================
// LINEAGE
// =============================================================================

export const DataAssetRecordSchema = z.object({
  asset_id: z.string(),
  name: z.string(),
  asset_type: z.string(),
  location: z.string().min(1),
  layer: DataLayerSchema,
  schema_hash: z.string().nullable().optional(),
  record_count: z.number().int().nonnegative().nullable().optional(),
  created_at: z.string(),
  metadata: StringMapSchema.default({}),
});

export type DataAssetRecord = z.infer<typeof DataAssetRecordSchema>;

export const LineageEventRecordSchema = z.object({
  event_id: z.string().min(1),
  event_type: LineageEventTypeSchema,
  timestamp: z.string(),
  triggered_by: z.string(),
  input_assets: z.array(DataAssetRecordSchema),
  output_assets: z.array(DataAssetRecordSchema),
  transformation_logic: z.string().nullable().optional(),
  parameters: z.record(z.unknown()).default({}),
  validation_status: z.string().nullable().optional(),
  records_in: z.number().int().nonnegative(),
  records_out: z.number().int().nonnegative(),
  records_rejected: z.number().int().nonnegative(),
  execution_id: z.string().nullable().optional(),
  duration_seconds: z.number().nonnegative(),
});

export type LineageEventRecord = z.infer<typeof LineageEventRecordSchema>;
