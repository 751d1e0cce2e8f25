/**
 * Orchestrator exports for the Clinical Data Governance Core
 */

export * from './governance-pipeline.js';
