/**
 * Service interfaces for the Clinical Data Governance Core
 */

import {
  Dataset,
  DataAsset,
  DataContract,
  ColumnValidation,
  ContractValidationResult,
  ImpactAnalysis,
  LineageEvent,
  QualityReport,
  RulePredicate,
  SchemaChange,
  Severity,
  TrackerState
} from '../types/index.js';

/**
 * Validation Engine interface
 * Runs registered rules and aggregates a quality verdict
 */
export interface IValidationEngine {
  readonly domain: string;
  addRule(name: string, description: string, predicate: RulePredicate, severity?: Severity): this;
  validate(dataset: Dataset, idColumn?: string, sourcePath?: string): QualityReport;
}

/**
 * Contract Engine interface
 * Detects schema drift and derives an accept/alert/quarantine action
 */
export interface IContractEngine {
  detectSchemaChanges(dataset: Dataset, contract: DataContract): SchemaChange[];
  validateValues(dataset: Dataset, contract: DataContract): Record<string, ColumnValidation>;
  validateAgainstContract(dataset: Dataset, contract: DataContract): ContractValidationResult;
}

/**
 * Lineage Tracker interface
 * Single-use builder for one lineage event
 */
export interface ILineageTracker {
  readonly eventId: string;
  readonly state: TrackerState;
  addInput(asset: DataAsset): this;
  addOutput(asset: DataAsset): this;
  setTransformation(description: string, parameters?: Record<string, unknown>): this;
  setValidationStatus(status: string, rejectedCount?: number): this;
  setExecutionId(executionId: string): this;
  buildEvent(): LineageEvent;
}

/**
 * Lineage Index interface
 * Read-only reachability queries over a batch of events
 */
export interface ILineageIndex {
  readonly size: number;
  getUpstream(location: string, maxDepth?: number): LineageEvent[];
  getDownstream(location: string, maxDepth?: number): LineageEvent[];
  analyzeImpact(location: string, maxDepth?: number): ImpactAnalysis;
  getOrigins(location: string, maxDepth?: number): string[];
}
