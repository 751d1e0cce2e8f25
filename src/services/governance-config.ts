/**
 * Governance Configuration
 *
 * Environment-driven defaults for the engines, the lineage index and the
 * audit trail. Every service accepts a Partial<GovernanceConfig> that is
 * merged over these defaults.
 */

import { fileURLToPath } from 'node:url';

// ==================== Types ====================

export interface GovernanceConfig {
  /** Failed-record ratio above which contract evaluation quarantines */
  quarantineThreshold: number;
  /** Default depth for upstream/downstream traversal */
  lineageMaxDepth: number;
  /** Maximum number of failed record ids kept per rule result */
  failedRecordIdLimit: number;
  /** Column carrying record identifiers */
  idColumn: string;
  /** Maximum audit entries kept in memory */
  auditMaxEntries: number;
  /** Whether audit entries are echoed to the console */
  logToConsole: boolean;
  /** Directory holding <DOMAIN>.contract.json files */
  contractsDir: string;
  /** Producer URI stamped on OpenLineage events */
  openLineageProducer: string;
}

// ==================== Default Configuration ====================

const DEFAULT_CONTRACTS_DIR = fileURLToPath(new URL('../../contracts/', import.meta.url));

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Get default configuration from the environment
 */
export function getDefaultGovernanceConfig(): GovernanceConfig {
  return {
    quarantineThreshold: numberFromEnv('GOVERNANCE_QUARANTINE_THRESHOLD', 0.05),
    lineageMaxDepth: numberFromEnv('GOVERNANCE_LINEAGE_MAX_DEPTH', 10),
    failedRecordIdLimit: numberFromEnv('GOVERNANCE_FAILED_ID_LIMIT', 100),
    idColumn: process.env.GOVERNANCE_ID_COLUMN || 'USUBJID',
    auditMaxEntries: numberFromEnv('GOVERNANCE_AUDIT_MAX_ENTRIES', 10000),
    logToConsole: process.env.NODE_ENV === 'development',
    contractsDir: process.env.GOVERNANCE_CONTRACTS_DIR || DEFAULT_CONTRACTS_DIR,
    openLineageProducer: process.env.GOVERNANCE_OPENLINEAGE_PRODUCER || 'urn:clinical-governance-core',
  };
}

/**
 * Merge overrides over the environment defaults; an override left undefined
 * keeps the default
 */
export function resolveGovernanceConfig(overrides: Partial<GovernanceConfig> = {}): GovernanceConfig {
  const defaults = getDefaultGovernanceConfig();
  return {
    quarantineThreshold: overrides.quarantineThreshold ?? defaults.quarantineThreshold,
    lineageMaxDepth: overrides.lineageMaxDepth ?? defaults.lineageMaxDepth,
    failedRecordIdLimit: overrides.failedRecordIdLimit ?? defaults.failedRecordIdLimit,
    idColumn: overrides.idColumn ?? defaults.idColumn,
    auditMaxEntries: overrides.auditMaxEntries ?? defaults.auditMaxEntries,
    logToConsole: overrides.logToConsole ?? defaults.logToConsole,
    contractsDir: overrides.contractsDir ?? defaults.contractsDir,
    openLineageProducer: overrides.openLineageProducer ?? defaults.openLineageProducer,
  };
}
