/**
 * OpenLineage run event types (1-0-5 layout)
 */

export type OpenLineageEventType = 'START' | 'RUNNING' | 'COMPLETE' | 'ABORT' | 'FAIL';

/**
 * Facet payload; every facet names its producer
 */
export interface OpenLineageFacet {
  _producer: string;
  _schemaURL?: string;
  [key: string]: unknown;
}

export type FacetMap = Record<string, OpenLineageFacet>;

export interface SchemaField {
  name: string;
  type: string;
  description?: string;
}

export interface OpenLineageDataset {
  namespace: string;
  name: string;
  facets?: FacetMap;
}

export interface OpenLineageJob {
  namespace: string;
  name: string;
  facets?: FacetMap;
}

export interface OpenLineageRun {
  runId: string;
  facets?: FacetMap;
}

export interface OpenLineageRunEvent {
  eventType: OpenLineageEventType;
  eventTime: string;
  producer: string;
  schemaURL: string;
  job: OpenLineageJob;
  run: OpenLineageRun;
  inputs: OpenLineageDataset[];
  outputs: OpenLineageDataset[];
}

/**
 * Options for OpenLineageEmitter
 */
export interface OpenLineageEmitterOptions {
  producer?: string;
  sourceCodeLocation?: string;
  sourceCodeVersion?: string;
  runId?: string;
  clock?: () => Date;
}
