/**
 * Lineage Repository for the Clinical Data Governance Core
 * Append-only log of finalized lineage events; indices are built from it per query session
 */

import { LineageEventType } from '../types/common.js';
import { ErrorCategory, GovernanceError } from '../types/error-handling.js';
import { LineageEvent } from '../types/lineage.js';
import { LineageEventRecord } from '../types/records.schema.js';
import { GovernanceConfig } from '../services/governance-config.js';
import { LineageIndex } from '../services/lineage-index.js';
import { lineageEventFromRecord, lineageEventToRecord } from '../services/serialization.js';

/**
 * Filter for listing lineage events
 */
export interface LineageEventFilter {
  eventType?: LineageEventType;
  triggeredBy?: string;
  /** Events reading or writing this location */
  location?: string;
  executionId?: string;
}

/**
 * Interface for the Lineage Repository
 */
export interface ILineageRepository {
  append(event: LineageEvent): LineageEvent;
  get(eventId: string): LineageEvent | undefined;
  list(filter?: LineageEventFilter): LineageEvent[];
  count(): number;
  buildIndex(config?: Partial<GovernanceConfig>): LineageIndex;
  exportRecords(): LineageEventRecord[];
  importRecords(records: readonly unknown[]): number;
}

function touches(event: LineageEvent, location: string): boolean {
  return event.inputAssets.some(asset => asset.location === location)
    || event.outputAssets.some(asset => asset.location === location);
}

/**
 * In-memory implementation of the Lineage Repository
 */
export class InMemoryLineageRepository implements ILineageRepository {
  private events: LineageEvent[] = [];
  private eventsById: Map<string, LineageEvent> = new Map();

  /**
   * Record a finalized event; an event id can be recorded once
   */
  append(event: LineageEvent): LineageEvent {
    if (this.eventsById.has(event.eventId)) {
      throw new GovernanceError(
        `Lineage event ${event.eventId} is already recorded`,
        ErrorCategory.INVALID_RECORD
      );
    }
    this.events.push(event);
    this.eventsById.set(event.eventId, event);
    return event;
  }

  get(eventId: string): LineageEvent | undefined {
    return this.eventsById.get(eventId);
  }

  list(filter: LineageEventFilter = {}): LineageEvent[] {
    let events = this.events;
    if (filter.eventType) {
      events = events.filter(e => e.eventType === filter.eventType);
    }
    if (filter.triggeredBy) {
      events = events.filter(e => e.triggeredBy === filter.triggeredBy);
    }
    if (filter.executionId) {
      events = events.filter(e => e.executionId === filter.executionId);
    }
    const location = filter.location;
    if (location) {
      events = events.filter(e => touches(e, location));
    }
    return [...events];
  }

  count(): number {
    return this.events.length;
  }

  /**
   * Snapshot index over every event recorded so far
   */
  buildIndex(config?: Partial<GovernanceConfig>): LineageIndex {
    return new LineageIndex(this.events, config);
  }

  exportRecords(): LineageEventRecord[] {
    return this.events.map(lineageEventToRecord);
  }

  /**
   * Append serialized events; returns how many were added
   */
  importRecords(records: readonly unknown[]): number {
    const events = records.map(lineageEventFromRecord);
    for (const event of events) {
      this.append(event);
    }
    return events.length;
  }
}
