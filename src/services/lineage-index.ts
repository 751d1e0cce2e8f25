/**
 * Lineage Index
 *
 * Read-only reachability queries over a batch of finalized lineage events.
 * Two maps are built once: by_input (location -> events that consumed it)
 * and by_output (location -> events that produced it). Traversal is
 * breadth-first from the seed location, bounded by a maximum depth, with a
 * location marked visited as soon as it is queued so it is expanded at
 * most once. Results are in discovery order and each event appears once.
 */

import { ILineageIndex } from '../interfaces/services.js';
import { DataLayer } from '../types/common.js';
import { DataAsset, ImpactAnalysis, LineageDirection, LineageEvent } from '../types/lineage.js';
import { GovernanceConfig, resolveGovernanceConfig } from './governance-config.js';
import { lineageEventFromRecord } from './serialization.js';

type LocationIndex = Map<string, LineageEvent[]>;

function addToIndex(index: LocationIndex, location: string, event: LineageEvent): void {
  const events = index.get(location);
  if (events) {
    events.push(event);
  } else {
    index.set(location, [event]);
  }
}

function uniqueInOrder<T>(values: Iterable<T>): T[] {
  return [...new Set(values)];
}

/**
 * Implementation of the Lineage Index
 */
export class LineageIndex implements ILineageIndex {
  private readonly events: readonly LineageEvent[];
  private readonly byInput: LocationIndex = new Map();
  private readonly byOutput: LocationIndex = new Map();
  private readonly config: GovernanceConfig;

  constructor(events: readonly LineageEvent[], config?: Partial<GovernanceConfig>) {
    this.events = Object.freeze([...events]);
    this.config = resolveGovernanceConfig(config);

    for (const event of this.events) {
      for (const asset of event.inputAssets) {
        addToIndex(this.byInput, asset.location, event);
      }
      for (const asset of event.outputAssets) {
        addToIndex(this.byOutput, asset.location, event);
      }
    }
  }

  /**
   * Build an index from serialized lineage records
   */
  static fromRecords(records: readonly unknown[], config?: Partial<GovernanceConfig>): LineageIndex {
    return new LineageIndex(records.map(lineageEventFromRecord), config);
  }

  get size(): number {
    return this.events.length;
  }

  getEvents(): readonly LineageEvent[] {
    return this.events;
  }

  /**
   * Events that produced the location, then the events that produced their
   * inputs, up to maxDepth hops away
   */
  getUpstream(location: string, maxDepth: number = this.config.lineageMaxDepth): LineageEvent[] {
    return this.traverse(location, maxDepth, 'upstream');
  }

  /**
   * Events that consumed the location, then the consumers of their outputs,
   * up to maxDepth hops away
   */
  getDownstream(location: string, maxDepth: number = this.config.lineageMaxDepth): LineageEvent[] {
    return this.traverse(location, maxDepth, 'downstream');
  }

  /**
   * Everything downstream of a changed asset: the events, the locations they
   * write (the changed location excluded) and the layers those locations sit in
   */
  analyzeImpact(location: string, maxDepth: number = this.config.lineageMaxDepth): ImpactAnalysis {
    const impactedEvents = this.getDownstream(location, maxDepth);
    const impactedAssets: DataAsset[] = impactedEvents
      .flatMap(event => [...event.outputAssets])
      .filter(asset => asset.location !== location);

    return {
      changedLocation: location,
      impactedEvents,
      impactedLocations: uniqueInOrder(impactedAssets.map(asset => asset.location)),
      impactedLayers: uniqueInOrder<DataLayer>(impactedAssets.map(asset => asset.layer)),
      analyzedAt: new Date(),
    };
  }

  /**
   * Upstream input locations that no indexed event produced
   */
  getOrigins(location: string, maxDepth: number = this.config.lineageMaxDepth): string[] {
    const inputs = this.getUpstream(location, maxDepth)
      .flatMap(event => event.inputAssets.map(asset => asset.location));
    return uniqueInOrder(inputs.filter(input => !this.byOutput.has(input)));
  }

  private traverse(seed: string, maxDepth: number, direction: LineageDirection): LineageEvent[] {
    if (maxDepth < 0) {
      return [];
    }

    const index = direction === 'upstream' ? this.byOutput : this.byInput;
    const result: LineageEvent[] = [];
    const emitted = new Set<string>();
    const visited = new Set<string>([seed]);
    const queue: Array<[string, number]> = [[seed, 0]];

    for (let head = 0; head < queue.length; head++) {
      const [location, depth] = queue[head];

      for (const event of index.get(location) ?? []) {
        if (!emitted.has(event.eventId)) {
          emitted.add(event.eventId);
          result.push(event);
        }

        if (depth + 1 > maxDepth) {
          continue;
        }
        const neighbours = direction === 'upstream' ? event.inputAssets : event.outputAssets;
        for (const asset of neighbours) {
          if (!visited.has(asset.location)) {
            visited.add(asset.location);
            queue.push([asset.location, depth + 1]);
          }
        }
      }
    }

    return result;
  }
}
