/**
 * Repository exports for the Clinical Data Governance Core
 */

export * from './lineage-repository.js';
