/**
 * Lineage types for the Clinical Data Governance Core
 */

import { DataLayer, LineageEventType } from './common.js';

/**
 * Node in the lineage graph; identified by its location
 */
export interface DataAsset {
  readonly assetId: string;
  readonly name: string;
  /** "file", "table", "dataset" */
  readonly assetType: string;
  /** Object-store path, database.table, etc. Globally unique. */
  readonly location: string;
  readonly layer: DataLayer;
  readonly schemaHash?: string;
  readonly recordCount?: number;
  readonly createdAt: string;
  readonly metadata: Readonly<Record<string, string>>;
}

/**
 * Options for createDataAsset
 */
export interface DataAssetOptions {
  name?: string;
  assetType?: string;
  schemaHash?: string;
  recordCount?: number;
  createdAt?: string;
  metadata?: Record<string, string>;
}

/**
 * Directed hyperedge: every input location feeds every output location
 */
export interface LineageEvent {
  readonly eventId: string;
  readonly eventType: LineageEventType;
  readonly timestamp: string;
  /** "lambda:ingestion", "glue:bronze_to_silver", "user:manual" */
  readonly triggeredBy: string;
  readonly inputAssets: readonly DataAsset[];
  readonly outputAssets: readonly DataAsset[];
  readonly transformationLogic?: string;
  readonly parameters: Readonly<Record<string, unknown>>;
  readonly validationStatus?: string;
  readonly recordsIn: number;
  readonly recordsOut: number;
  readonly recordsRejected: number;
  readonly executionId?: string;
  readonly durationSeconds: number;
}

/**
 * Lifecycle of a lineage tracker
 */
export type TrackerState = 'open' | 'finalized';

/**
 * Traversal direction for lineage queries
 */
export type LineageDirection = 'upstream' | 'downstream';

/**
 * Downstream impact of a change to one asset
 */
export interface ImpactAnalysis {
  changedLocation: string;
  impactedEvents: LineageEvent[];
  impactedLocations: string[];
  impactedLayers: DataLayer[];
  analyzedAt: Date;
}
