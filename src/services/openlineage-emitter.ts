/**
 * OpenLineage Emitter
 *
 * Builds OpenLineage run events (START, RUNNING, COMPLETE, FAIL) for one
 * job run, so lineage tools such as Marquez can consume what the pipeline
 * records. Events are returned and kept in memory; shipping them anywhere
 * is the caller's job.
 */

import { v4 as uuidv4 } from 'uuid';
import { QualityReport } from '../types/data-quality.js';
import { LineageEvent } from '../types/lineage.js';
import {
  FacetMap,
  OpenLineageDataset,
  OpenLineageEmitterOptions,
  OpenLineageEventType,
  OpenLineageFacet,
  OpenLineageJob,
  OpenLineageRunEvent,
  SchemaField
} from '../types/openlineage.js';
import { resolveGovernanceConfig } from './governance-config.js';

export const OPENLINEAGE_SCHEMA_URL = 'https://openlineage.io/spec/1-0-5/OpenLineage.json';

const FACET_SCHEMAS = {
  schema: 'https://openlineage.io/spec/facets/1-0-0/SchemaDatasetFacet.json',
  dataQuality: 'https://openlineage.io/spec/facets/1-0-0/DataQualityMetricsInputDatasetFacet.json',
  nominalTime: 'https://openlineage.io/spec/facets/1-0-0/NominalTimeRunFacet.json',
  errorMessage: 'https://openlineage.io/spec/facets/1-0-0/ErrorMessageRunFacet.json',
  sourceCodeLocation: 'https://openlineage.io/spec/facets/1-0-0/SourceCodeLocationJobFacet.json',
  documentation: 'https://openlineage.io/spec/facets/1-0-0/DocumentationJobFacet.json',
} as const;

// ==================== Dataset helpers ====================

export function createOpenLineageDataset(namespace: string, name: string, facets: FacetMap = {}): OpenLineageDataset {
  return Object.keys(facets).length > 0 ? { namespace, name, facets: { ...facets } } : { namespace, name };
}

/**
 * Copy of a dataset with one facet set
 */
export function withFacet(dataset: OpenLineageDataset, key: string, facet: OpenLineageFacet): OpenLineageDataset {
  return { ...dataset, facets: { ...(dataset.facets ?? {}), [key]: facet } };
}

export function schemaFacet(fields: readonly SchemaField[], producer: string): OpenLineageFacet {
  return {
    _producer: producer,
    _schemaURL: FACET_SCHEMAS.schema,
    fields: fields.map(field => ({ name: field.name, type: field.type, description: field.description ?? '' })),
  };
}

export function dataQualityFacet(metrics: Record<string, unknown>, producer: string): OpenLineageFacet {
  return {
    _producer: producer,
    _schemaURL: FACET_SCHEMAS.dataQuality,
    ...metrics,
  };
}

/**
 * Data quality facet summarizing a validation report
 */
export function dataQualityFacetFromReport(report: QualityReport, producer: string): OpenLineageFacet {
  const failed = report.results.filter(result => !result.passed);
  return dataQualityFacet({
    rowCount: report.totalRecords,
    validationStatus: report.status,
    checksRun: report.results.length,
    checksFailed: failed.length,
    failedRules: failed.map(result => result.ruleName),
  }, producer);
}

// ==================== Emitter ====================

export interface ProcessingStats {
  rowsRead: number;
  rowsWritten: number;
  bytesRead?: number;
  bytesWritten?: number;
}

export class OpenLineageEmitter {
  readonly namespace: string;
  readonly jobName: string;
  readonly runId: string;
  readonly producer: string;

  private readonly job: OpenLineageJob;
  private readonly clock: () => Date;
  private runFacets: FacetMap = {};
  private readonly events: OpenLineageRunEvent[] = [];

  constructor(namespace: string, jobName: string, options: OpenLineageEmitterOptions = {}) {
    this.namespace = namespace;
    this.jobName = jobName;
    this.runId = options.runId ?? uuidv4();
    this.producer = options.producer ?? resolveGovernanceConfig().openLineageProducer;
    this.clock = options.clock ?? (() => new Date());

    this.job = { namespace, name: jobName };
    if (options.sourceCodeLocation && options.sourceCodeVersion) {
      this.job.facets = {
        sourceCodeLocation: {
          _producer: this.producer,
          _schemaURL: FACET_SCHEMAS.sourceCodeLocation,
          type: 'git',
          url: options.sourceCodeLocation,
          version: options.sourceCodeVersion,
        },
      };
    }
  }

  /**
   * START event; stamps the nominal start time on the run
   */
  emitStart(inputs: OpenLineageDataset[], outputs: OpenLineageDataset[]): OpenLineageRunEvent {
    const eventTime = this.now();
    this.runFacets.nominalTime = {
      _producer: this.producer,
      _schemaURL: FACET_SCHEMAS.nominalTime,
      nominalStartTime: eventTime,
    };
    return this.createEvent('START', inputs, outputs, eventTime);
  }

  emitRunning(
    inputs: OpenLineageDataset[],
    outputs: OpenLineageDataset[],
    progressPct?: number
  ): OpenLineageRunEvent {
    if (progressPct !== undefined) {
      this.runFacets.progress = { _producer: this.producer, percentComplete: progressPct };
    }
    return this.createEvent('RUNNING', inputs, outputs);
  }

  emitComplete(
    inputs: OpenLineageDataset[],
    outputs: OpenLineageDataset[],
    stats?: ProcessingStats
  ): OpenLineageRunEvent {
    if (stats) {
      this.runFacets.processingStats = {
        _producer: this.producer,
        rowsRead: stats.rowsRead,
        rowsWritten: stats.rowsWritten,
        bytesRead: stats.bytesRead ?? null,
        bytesWritten: stats.bytesWritten ?? null,
      };
    }
    return this.createEvent('COMPLETE', inputs, outputs);
  }

  emitFail(
    inputs: OpenLineageDataset[],
    outputs: OpenLineageDataset[],
    errorMessage: string,
    stackTrace?: string
  ): OpenLineageRunEvent {
    this.runFacets.errorMessage = {
      _producer: this.producer,
      _schemaURL: FACET_SCHEMAS.errorMessage,
      message: errorMessage,
      programmingLanguage: 'TypeScript',
      ...(stackTrace ? { stackTrace } : {}),
    };
    return this.createEvent('FAIL', inputs, outputs);
  }

  getAllEvents(): OpenLineageRunEvent[] {
    return [...this.events];
  }

  /**
   * Run facets are copied into each event as they stand when it is emitted
   */
  private createEvent(
    eventType: OpenLineageEventType,
    inputs: OpenLineageDataset[],
    outputs: OpenLineageDataset[],
    eventTime: string = this.now()
  ): OpenLineageRunEvent {
    const runFacets = { ...this.runFacets };
    const event: OpenLineageRunEvent = {
      eventType,
      eventTime,
      producer: this.producer,
      schemaURL: OPENLINEAGE_SCHEMA_URL,
      job: this.job,
      run: Object.keys(runFacets).length > 0 ? { runId: this.runId, facets: runFacets } : { runId: this.runId },
      inputs: [...inputs],
      outputs: [...outputs],
    };
    this.events.push(event);
    return event;
  }

  private now(): string {
    return this.clock().toISOString();
  }
}

// ==================== Conversion ====================

function assetDataset(namespace: string, location: string, recordCount: number | undefined, producer: string): OpenLineageDataset {
  const dataset = createOpenLineageDataset(namespace, location);
  return recordCount !== undefined
    ? withFacet(dataset, 'dataQuality', dataQualityFacet({ rowCount: recordCount }, producer))
    : dataset;
}

/**
 * COMPLETE run event describing a finalized lineage event. The run id is
 * the lineage event id and the job is named after what triggered it.
 */
export function toOpenLineageEvent(
  event: LineageEvent,
  namespace: string,
  producer: string = resolveGovernanceConfig().openLineageProducer
): OpenLineageRunEvent {
  const start = new Date(event.timestamp);
  const end = new Date(start.getTime() + event.durationSeconds * 1000);

  const job: OpenLineageJob = event.transformationLogic
    ? {
        namespace,
        name: event.triggeredBy,
        facets: {
          documentation: {
            _producer: producer,
            _schemaURL: FACET_SCHEMAS.documentation,
            description: event.transformationLogic,
          },
        },
      }
    : { namespace, name: event.triggeredBy };

  return {
    eventType: 'COMPLETE',
    eventTime: end.toISOString(),
    producer,
    schemaURL: OPENLINEAGE_SCHEMA_URL,
    job,
    run: {
      runId: event.eventId,
      facets: {
        nominalTime: {
          _producer: producer,
          _schemaURL: FACET_SCHEMAS.nominalTime,
          nominalStartTime: start.toISOString(),
          nominalEndTime: end.toISOString(),
        },
        processingStats: {
          _producer: producer,
          rowsRead: event.recordsIn,
          rowsWritten: event.recordsOut,
          rowsRejected: event.recordsRejected,
        },
      },
    },
    inputs: event.inputAssets.map(asset => assetDataset(namespace, asset.location, asset.recordCount, producer)),
    outputs: event.outputAssets.map(asset => assetDataset(namespace, asset.location, asset.recordCount, producer)),
  };
}
