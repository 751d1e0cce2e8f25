/**
 * Clinical Data Governance Core
 *
 * Main entry point: quality validation, data contracts and lineage for a
 * tiered clinical data pipeline
 */

// Export all types
export * from './types/index.js';

// Export all interfaces
export * from './interfaces/index.js';

// Export services
export * from './services/index.js';

// Export repository
export * from './repository/index.js';

// Export orchestrator
export * from './orchestrator/index.js';

// Export dataset helpers
export * from './utils/dataset.js';
export * from './utils/dates.js';
export * from './utils/hashing.js';
