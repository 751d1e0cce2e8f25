/**
 * Unit tests for Lineage Index
 */

import { describe, it, expect } from 'vitest';
import { LineageIndex } from '../../../services/lineage-index.js';
import { lineageEventToRecord } from '../../../services/serialization.js';
import { LineageTracker, createDataAsset } from '../../../services/lineage-tracker.js';
import { buildLineageEvents } from '../../generators/index.js';
import { LineageEvent, RecordParseError } from '../../../types/index.js';

function ids(events: readonly LineageEvent[]): string[] {
  return events.map(event => event.eventId);
}

describe('LineageIndex', () => {
  describe('Chains', () => {
    // evt-0: A -> B, evt-1: B -> C
    const index = new LineageIndex(buildLineageEvents([
      { inputs: ['A'], outputs: ['B'] },
      { inputs: ['B'], outputs: ['C'] }
    ]));

    it('should walk upstream in discovery order', () => {
      expect(ids(index.getUpstream('C', 10))).toEqual(['evt-1', 'evt-0']);
    });

    it('should walk downstream in discovery order', () => {
      expect(ids(index.getDownstream('A', 10))).toEqual(['evt-0', 'evt-1']);
    });

    it('should return only direct events at depth 0', () => {
      expect(ids(index.getUpstream('C', 0))).toEqual(['evt-1']);
      expect(ids(index.getDownstream('A', 0))).toEqual(['evt-0']);
    });

    it('should return nothing for a negative depth', () => {
      expect(index.getUpstream('C', -1)).toEqual([]);
    });

    it('should return nothing for an unknown location', () => {
      expect(index.getUpstream('Z')).toEqual([]);
      expect(index.getDownstream('Z')).toEqual([]);
    });

    it('should find the origins of a location', () => {
      expect(index.getOrigins('C')).toEqual(['A']);
      expect(index.getOrigins('A')).toEqual([]);
    });

    it('should count indexed events', () => {
      expect(index.size).toBe(2);
      expect(ids(index.getEvents())).toEqual(['evt-0', 'evt-1']);
    });
  });

  describe('Cycles', () => {
    // evt-0: A -> B, evt-1: B -> A
    const index = new LineageIndex(buildLineageEvents([
      { inputs: ['A'], outputs: ['B'] },
      { inputs: ['B'], outputs: ['A'] }
    ]));

    it('should terminate and emit each event once', () => {
      expect(ids(index.getUpstream('A', 5))).toEqual(['evt-1', 'evt-0']);
      expect(ids(index.getDownstream('A', 5))).toEqual(['evt-0', 'evt-1']);
    });

    it('should handle a self loop', () => {
      const selfLoop = new LineageIndex(buildLineageEvents([{ inputs: ['A'], outputs: ['A'] }]));

      expect(ids(selfLoop.getUpstream('A', 3))).toEqual(['evt-0']);
    });
  });

  describe('Fan-in and fan-out', () => {
    // evt-0: A,B -> C; evt-1: C -> D,E; evt-2: D -> F; evt-3: E -> F
    const index = new LineageIndex(buildLineageEvents([
      { inputs: ['A', 'B'], outputs: ['C'] },
      { inputs: ['C'], outputs: ['D', 'E'] },
      { inputs: ['D'], outputs: ['F'] },
      { inputs: ['E'], outputs: ['F'] }
    ]));

    it('should visit each location once', () => {
      expect(ids(index.getUpstream('F', 10))).toEqual(['evt-2', 'evt-3', 'evt-1', 'evt-0']);
      expect(ids(index.getDownstream('A', 10))).toEqual(['evt-0', 'evt-1', 'evt-2', 'evt-3']);
    });

    it('should bound traversal by depth', () => {
      expect(ids(index.getUpstream('F', 1))).toEqual(['evt-2', 'evt-3', 'evt-1']);
    });

    it('should report origins in discovery order', () => {
      expect(index.getOrigins('F')).toEqual(['A', 'B']);
    });

    it('should analyze downstream impact', () => {
      const impact = index.analyzeImpact('C');

      expect(impact.changedLocation).toBe('C');
      expect(ids(impact.impactedEvents)).toEqual(['evt-1', 'evt-2', 'evt-3']);
      expect(impact.impactedLocations).toEqual(['D', 'E', 'F']);
      expect(impact.impactedLayers).toEqual(['silver']);
    });
  });

  describe('Records', () => {
    it('should build from serialized events', () => {
      const records = buildLineageEvents([{ inputs: ['A'], outputs: ['B'] }]).map(lineageEventToRecord);

      const index = LineageIndex.fromRecords(JSON.parse(JSON.stringify(records)));

      expect(ids(index.getDownstream('A'))).toEqual(['evt-0']);
    });

    it('should reject a malformed record', () => {
      expect(() => LineageIndex.fromRecords([{ event_id: 'evt-0' }])).toThrow(RecordParseError);
    });

    it('should use the configured default depth', () => {
      const events = buildLineageEvents([
        { inputs: ['A'], outputs: ['B'] },
        { inputs: ['B'], outputs: ['C'] },
        { inputs: ['C'], outputs: ['D'] }
      ]);

      expect(ids(new LineageIndex(events, { lineageMaxDepth: 1 }).getUpstream('D'))).toEqual(['evt-2', 'evt-1']);
    });

    it('should index events built with mixed layers', () => {
      const event = new LineageTracker('glue:silver_to_gold', { eventId: 'evt-g' })
        .addInput(createDataAsset('s3://lake/silver/dm', 'silver'))
        .addOutput(createDataAsset('s3://lake/gold/dm', 'gold'))
        .addOutput(createDataAsset('s3://lake/export/dm.xpt', 'export'))
        .buildEvent();

      expect(new LineageIndex([event]).analyzeImpact('s3://lake/silver/dm').impactedLayers).toEqual(['gold', 'export']);
    });
  });
});
