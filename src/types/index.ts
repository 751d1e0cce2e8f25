/**
 * Main types export for the Clinical Data Governance Core
 */

// Common types and enums
export * from './common.js';

// Tabular dataset types
export * from './dataset.js';

// Audit types
export * from './audit.js';

// Data quality types
export * from './data-quality.js';

// Data contract types
export * from './contracts.js';

// Lineage types
export * from './lineage.js';

// OpenLineage types
export * from './openlineage.js';

// Quality metric types
export * from './quality-metrics.js';

// Error Handling types
export * from './error-handling.js';

// Promotion gate types
export * from './pipeline.js';

// Serialized record schemas
export * from './records.schema.js';
