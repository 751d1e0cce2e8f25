/**
 * Interfaces export for the Clinical Data Governance Core
 */

export * from './services.js';
export * from './orchestrator.js';
