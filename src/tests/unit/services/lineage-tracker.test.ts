/**
 * Unit tests for Lineage Tracker
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { LineageTracker, createDataAsset } from '../../../services/lineage-tracker.js';
import { TrackerFinalizedError } from '../../../types/index.js';

describe('LineageTracker', () => {
  let now: Date;
  const clock = (): Date => now;

  beforeEach(() => {
    now = new Date('2024-03-01T12:00:00.000Z');
  });

  describe('createDataAsset', () => {
    it('should derive id and name from the location', () => {
      const asset = createDataAsset('s3://lake/bronze/dm/2024-01-15.parquet', 'bronze', {
        recordCount: 120,
        createdAt: '2024-03-01T00:00:00.000Z'
      });

      expect(asset.assetId).toBe('6f0e6f475045');
      expect(asset.name).toBe('2024-01-15.parquet');
      expect(asset.assetType).toBe('file');
      expect(asset.recordCount).toBe(120);
      expect(asset.metadata).toEqual({});
    });

    it('should keep an explicit name and type', () => {
      const asset = createDataAsset('warehouse.silver_dm', 'silver', { name: 'silver_dm', assetType: 'table' });

      expect(asset.name).toBe('silver_dm');
      expect(asset.assetType).toBe('table');
      expect('schemaHash' in asset).toBe(false);
    });
  });

  describe('Building events', () => {
    it('should accumulate record counts from assets', () => {
      const event = new LineageTracker('lambda:ingestion', { eventType: 'ingestion', clock, eventId: 'evt-1' })
        .addInput(createDataAsset('s3://lake/landing/a.csv', 'landing', { recordCount: 40 }))
        .addInput(createDataAsset('s3://lake/landing/b.csv', 'landing', { recordCount: 60 }))
        .addInput(createDataAsset('s3://lake/landing/c.csv', 'landing'))
        .addOutput(createDataAsset('s3://lake/bronze/dm', 'bronze', { recordCount: 100 }))
        .buildEvent();

      expect(event.eventId).toBe('evt-1');
      expect(event.eventType).toBe('ingestion');
      expect(event.triggeredBy).toBe('lambda:ingestion');
      expect(event.inputAssets).toHaveLength(3);
      expect(event.recordsIn).toBe(100);
      expect(event.recordsOut).toBe(100);
      expect(event.recordsRejected).toBe(0);
      expect(event.parameters).toEqual({});
      expect(event.transformationLogic).toBeUndefined();
      expect(event.validationStatus).toBeUndefined();
    });

    it('should stamp the start time and measure the duration', () => {
      const tracker = new LineageTracker('glue:bronze_to_silver', { clock });
      now = new Date('2024-03-01T12:00:02.500Z');

      const event = tracker.buildEvent();

      expect(event.timestamp).toBe('2024-03-01T12:00:00.000Z');
      expect(event.durationSeconds).toBe(2.5);
      expect(event.eventType).toBe('transformation');
    });

    it('should clamp a negative duration to zero', () => {
      const tracker = new LineageTracker('glue:bronze_to_silver', { clock });
      now = new Date('2024-03-01T11:59:00.000Z');

      expect(tracker.buildEvent().durationSeconds).toBe(0);
    });

    it('should keep earlier parameters when new ones are empty', () => {
      const event = new LineageTracker('user:manual', { clock })
        .setTransformation('first', { mode: 'merge' })
        .setTransformation('second', {})
        .buildEvent();

      expect(event.transformationLogic).toBe('second');
      expect(event.parameters).toEqual({ mode: 'merge' });
    });

    it('should record validation status and execution id', () => {
      const event = new LineageTracker('user:manual', { clock })
        .setValidationStatus('failed', 7)
        .setExecutionId('exec-42')
        .buildEvent();

      expect(event.validationStatus).toBe('failed');
      expect(event.recordsRejected).toBe(7);
      expect(event.executionId).toBe('exec-42');
    });

    it('should generate an event id when none is given', () => {
      const tracker = new LineageTracker('user:manual');

      expect(tracker.eventId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    });
  });

  describe('State', () => {
    it('should move from open to finalized', () => {
      const tracker = new LineageTracker('user:manual', { clock });

      expect(tracker.state).toBe('open');
      tracker.buildEvent();
      expect(tracker.state).toBe('finalized');
    });

    it('should return the same frozen event on a second build', () => {
      const tracker = new LineageTracker('user:manual', { clock });

      const first = tracker.buildEvent();

      expect(tracker.buildEvent()).toBe(first);
      expect(Object.isFrozen(first)).toBe(true);
      expect(Object.isFrozen(first.inputAssets)).toBe(true);
    });

    it('should reject every mutation after the event is built', () => {
      const tracker = new LineageTracker('user:manual', { clock, eventId: 'evt-9' });
      const asset = createDataAsset('s3://lake/silver/dm', 'silver');
      tracker.buildEvent();

      expect(() => tracker.addInput(asset)).toThrow(TrackerFinalizedError);
      expect(() => tracker.addOutput(asset)).toThrow(TrackerFinalizedError);
      expect(() => tracker.setTransformation('late')).toThrow(TrackerFinalizedError);
      expect(() => tracker.setValidationStatus('passed')).toThrow(TrackerFinalizedError);
      expect(() => tracker.setExecutionId('exec-1')).toThrow(
        'Lineage tracker for event evt-9 is finalized; setExecutionId is not allowed'
      );
    });
  });
});
