/**
 * Service exports for the Clinical Data Governance Core
 */

export * from './governance-config.js';
export * from './rule-predicates.js';
export * from './validation-engine.js';
export * from './rule-sets.js';
export * from './data-contracts.js';
export * from './contract-engine.js';
export * from './contract-registry.js';
export * from './serialization.js';
export * from './lineage-tracker.js';
export * from './lineage-index.js';
export * from './promotion-policy.js';
export * from './quality-metrics.js';
export * from './openlineage-emitter.js';
export * from './audit-trail-service.js';
