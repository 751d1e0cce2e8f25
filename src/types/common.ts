/**
 * Common types and enums used across the Clinical Data Governance Core
 */

// Validation severity levels
export type Severity = 'error' | 'warning' | 'info';

// Aggregate status of a quality report
export type ValidationStatus = 'passed' | 'failed' | 'passed_with_warnings';

// Schema evolution compatibility modes
export type CompatibilityMode = 'backward' | 'forward' | 'full' | 'none';

// Schema change types
export type ChangeType =
  | 'column_added'
  | 'column_removed'
  | 'type_changed'
  | 'nullable_changed';

// Contract evaluation action
export type ContractAction = 'accept' | 'alert' | 'quarantine';

// Promotion decision taken by the pipeline gate
export type PromotionDecision = 'promote' | 'alert' | 'quarantine';

// Storage tiers of the pipeline
export type DataLayer = 'landing' | 'bronze' | 'silver' | 'gold' | 'export';

// Lineage event types
export type LineageEventType =
  | 'ingestion'
  | 'transformation'
  | 'validation'
  | 'promotion'
  | 'export';

// Column types understood by contracts
export type ColumnType = 'string' | 'int64' | 'float64' | 'datetime64' | 'boolean';

// Value-level contract checks
export type ColumnCheckType =
  | 'not_null'
  | 'unique'
  | 'allowed_values'
  | 'min_value'
  | 'max_value';

// Actor types
export type ActorType = 'agent' | 'human' | 'system';

// Serialized tags, in declaration order
export const SEVERITIES = ['error', 'warning', 'info'] as const satisfies readonly Severity[];
export const VALIDATION_STATUSES = ['passed', 'failed', 'passed_with_warnings'] as const satisfies readonly ValidationStatus[];
export const COMPATIBILITY_MODES = ['backward', 'forward', 'full', 'none'] as const satisfies readonly CompatibilityMode[];
export const CHANGE_TYPES = [
  'column_added',
  'column_removed',
  'type_changed',
  'nullable_changed'
] as const satisfies readonly ChangeType[];
export const CONTRACT_ACTIONS = ['accept', 'alert', 'quarantine'] as const satisfies readonly ContractAction[];
export const DATA_LAYERS = ['landing', 'bronze', 'silver', 'gold', 'export'] as const satisfies readonly DataLayer[];
export const LINEAGE_EVENT_TYPES = [
  'ingestion',
  'transformation',
  'validation',
  'promotion',
  'export'
] as const satisfies readonly LineageEventType[];
export const COLUMN_TYPES = ['string', 'int64', 'float64', 'datetime64', 'boolean'] as const satisfies readonly ColumnType[];
export const COLUMN_CHECK_TYPES = [
  'not_null',
  'unique',
  'allowed_values',
  'min_value',
  'max_value'
] as const satisfies readonly ColumnCheckType[];

/**
 * Compile-time exhaustiveness guard for switch statements over closed unions
 */
export function assertNever(value: never, label: string): never {
  throw new Error(`Unhandled ${label}: ${String(value)}`);
}
