/**
 * Lineage Tracker
 *
 * Single-use builder for one lineage event. A pipeline step creates a
 * tracker when it starts, registers what it read and wrote, and calls
 * buildEvent() once it is done. After that the tracker is finalized and
 * every mutator throws TrackerFinalizedError.
 */

import { v4 as uuidv4 } from 'uuid';
import { ILineageTracker } from '../interfaces/services.js';
import { DataLayer, LineageEventType } from '../types/common.js';
import { TrackerFinalizedError } from '../types/error-handling.js';
import { DataAsset, DataAssetOptions, LineageEvent, TrackerState } from '../types/lineage.js';
import { assetIdFor } from '../utils/hashing.js';

/**
 * Asset for a location; id and name are derived from the location
 */
export function createDataAsset(
  location: string,
  layer: DataLayer,
  options: DataAssetOptions = {}
): DataAsset {
  const segments = location.split('/');
  return Object.freeze({
    assetId: assetIdFor(location),
    name: options.name ?? segments[segments.length - 1],
    assetType: options.assetType ?? 'file',
    location,
    layer,
    ...(options.schemaHash !== undefined ? { schemaHash: options.schemaHash } : {}),
    ...(options.recordCount !== undefined ? { recordCount: options.recordCount } : {}),
    createdAt: options.createdAt ?? new Date().toISOString(),
    metadata: Object.freeze({ ...(options.metadata ?? {}) })
  });
}

export interface LineageTrackerOptions {
  eventType?: LineageEventType;
  /** Time source; defaults to the system clock */
  clock?: () => Date;
  /** Fixed event id; a v4 uuid is generated otherwise */
  eventId?: string;
}

/**
 * Implementation of the Lineage Tracker
 */
export class LineageTracker implements ILineageTracker {
  readonly eventId: string;
  readonly eventType: LineageEventType;
  readonly triggeredBy: string;

  private readonly clock: () => Date;
  private readonly startTime: Date;
  private readonly inputAssets: DataAsset[] = [];
  private readonly outputAssets: DataAsset[] = [];
  private transformationLogic?: string;
  private parameters: Record<string, unknown> = {};
  private validationStatus?: string;
  private executionId?: string;
  private recordsIn = 0;
  private recordsOut = 0;
  private recordsRejected = 0;
  private builtEvent?: LineageEvent;

  constructor(triggeredBy: string, options: LineageTrackerOptions = {}) {
    this.triggeredBy = triggeredBy;
    this.eventType = options.eventType ?? 'transformation';
    this.eventId = options.eventId ?? uuidv4();
    this.clock = options.clock ?? (() => new Date());
    this.startTime = this.clock();
  }

  get state(): TrackerState {
    return this.builtEvent ? 'finalized' : 'open';
  }

  addInput(asset: DataAsset): this {
    this.assertOpen('addInput');
    this.inputAssets.push(asset);
    if (asset.recordCount) {
      this.recordsIn += asset.recordCount;
    }
    return this;
  }

  addOutput(asset: DataAsset): this {
    this.assertOpen('addOutput');
    this.outputAssets.push(asset);
    if (asset.recordCount) {
      this.recordsOut += asset.recordCount;
    }
    return this;
  }

  /**
   * Describe the transformation; empty parameters leave earlier ones in place
   */
  setTransformation(description: string, parameters?: Record<string, unknown>): this {
    this.assertOpen('setTransformation');
    this.transformationLogic = description;
    if (parameters && Object.keys(parameters).length > 0) {
      this.parameters = { ...parameters };
    }
    return this;
  }

  setValidationStatus(status: string, rejectedCount = 0): this {
    this.assertOpen('setValidationStatus');
    this.validationStatus = status;
    this.recordsRejected = rejectedCount;
    return this;
  }

  setExecutionId(executionId: string): this {
    this.assertOpen('setExecutionId');
    this.executionId = executionId;
    return this;
  }

  /**
   * Finalize the tracker. Later calls return the same event.
   */
  buildEvent(): LineageEvent {
    if (this.builtEvent) {
      return this.builtEvent;
    }

    const durationSeconds = Math.max(0, (this.clock().getTime() - this.startTime.getTime()) / 1000);
    this.builtEvent = Object.freeze({
      eventId: this.eventId,
      eventType: this.eventType,
      timestamp: this.startTime.toISOString(),
      triggeredBy: this.triggeredBy,
      inputAssets: Object.freeze([...this.inputAssets]),
      outputAssets: Object.freeze([...this.outputAssets]),
      ...(this.transformationLogic !== undefined ? { transformationLogic: this.transformationLogic } : {}),
      parameters: Object.freeze({ ...this.parameters }),
      ...(this.validationStatus !== undefined ? { validationStatus: this.validationStatus } : {}),
      recordsIn: this.recordsIn,
      recordsOut: this.recordsOut,
      recordsRejected: this.recordsRejected,
      ...(this.executionId !== undefined ? { executionId: this.executionId } : {}),
      durationSeconds
    });
    return this.builtEvent;
  }

  private assertOpen(operation: string): void {
    if (this.builtEvent) {
      throw new TrackerFinalizedError(this.eventId, operation);
    }
  }
}
