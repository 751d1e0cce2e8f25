/**
 * Audit Trail Service for the Clinical Data Governance Core
 *
 * Keeps a bounded, in-memory trail of governance decisions:
 * - Quality validation runs
 * - Contract evaluations
 * - Promotion decisions
 * - Lineage events recorded
 *
 * Persisting the trail is left to the caller (see getAllEntries).
 */

import { v4 as uuidv4 } from 'uuid';
import { AuditEntry, CreateAuditEntryParams, GovernanceAuditAction } from '../types/audit.js';
import { ActorType, PromotionDecision } from '../types/common.js';
import { ContractValidationResult } from '../types/contracts.js';
import { QualityReport } from '../types/data-quality.js';
import { LineageEvent } from '../types/lineage.js';
import { resolveGovernanceConfig } from './governance-config.js';

// ==================== Types ====================

/**
 * Configuration for the audit trail service
 */
export interface AuditTrailServiceConfig {
  /** Whether to enable audit logging */
  enabled: boolean;
  /** Whether to log to console (for debugging) */
  logToConsole: boolean;
  /** Maximum entries to keep in memory */
  maxInMemoryEntries: number;
}

// ==================== Default Configuration ====================

function defaultConfig(): AuditTrailServiceConfig {
  const governance = resolveGovernanceConfig();
  return {
    enabled: true,
    logToConsole: governance.logToConsole,
    maxInMemoryEntries: governance.auditMaxEntries,
  };
}

// ==================== Actor Type Constants ====================

const ACTOR_SYSTEM: ActorType = 'system';

// ==================== Audit Trail Service ====================

/**
 * Service for logging audit trail entries
 */
export class AuditTrailService {
  private config: AuditTrailServiceConfig;
  private entries: AuditEntry[] = [];

  constructor(config: Partial<AuditTrailServiceConfig> = {}) {
    this.config = { ...defaultConfig(), ...config };
  }

  // ==================== Core Audit Methods ====================

  /**
   * Create an audit entry
   */
  createAuditEntry(params: CreateAuditEntryParams): AuditEntry {
    const entry: AuditEntry = {
      id: uuidv4(),
      timestamp: new Date(),
      ...params,
    };

    if (this.config.enabled) {
      this.entries.push(entry);

      // Trim in-memory entries if needed
      if (this.entries.length > this.config.maxInMemoryEntries) {
        this.entries = this.entries.slice(-this.config.maxInMemoryEntries);
      }

      if (this.config.logToConsole) {
        console.log('[AUDIT]', JSON.stringify(entry, null, 2));
      }
    }

    return entry;
  }

  /**
   * Log a quality validation run
   */
  logQualityValidation(actor: string, report: QualityReport): AuditEntry {
    const failed = report.results.filter(result => !result.passed).map(result => result.ruleName);
    return this.createAuditEntry({
      actor,
      actorType: ACTOR_SYSTEM,
      action: 'quality_validation',
      entityType: 'dataset',
      entityId: report.sourcePath || report.domain,
      newState: {
        domain: report.domain,
        status: report.status,
        totalRecords: report.totalRecords,
        failedRules: failed,
      },
      rationale: `${report.domain} validation ${report.status} with ${failed.length} failed rule(s)`,
    });
  }

  /**
   * Log a contract evaluation
   */
  logContractValidation(actor: string, entityId: string, result: ContractValidationResult): AuditEntry {
    return this.createAuditEntry({
      actor,
      actorType: ACTOR_SYSTEM,
      action: 'contract_validation',
      entityType: 'dataset',
      entityId,
      newState: {
        contract: `${result.contractName}@${result.contractVersion}`,
        schemaHash: result.schemaHash,
        action: result.action,
        schemaChanges: result.schemaChanges.length,
        breaking: result.hasBreakingChanges,
        failedRecords: result.failedRecords,
      },
      rationale: `Contract ${result.contractName} evaluated: ${result.action}`,
    });
  }

  /**
   * Log a promotion decision
   */
  logPromotionDecision(
    actor: string,
    entityId: string,
    decision: PromotionDecision,
    reasons: readonly string[]
  ): AuditEntry {
    return this.createAuditEntry({
      actor,
      actorType: ACTOR_SYSTEM,
      action: 'promotion_decision',
      entityType: 'dataset',
      entityId,
      previousState: { decision: 'pending' },
      newState: { decision, reasons: [...reasons] },
      rationale: reasons.length > 0 ? reasons.join('; ') : `Decision: ${decision}`,
    });
  }

  /**
   * Log a lineage event being recorded
   */
  logLineageRecorded(actor: string, event: LineageEvent): AuditEntry {
    return this.createAuditEntry({
      actor,
      actorType: ACTOR_SYSTEM,
      action: 'lineage_recorded',
      entityType: 'lineage_event',
      entityId: event.eventId,
      newState: {
        eventType: event.eventType,
        inputs: event.inputAssets.map(asset => asset.location),
        outputs: event.outputAssets.map(asset => asset.location),
        recordsIn: event.recordsIn,
        recordsOut: event.recordsOut,
        recordsRejected: event.recordsRejected,
      },
      rationale: `Lineage event ${event.eventType} recorded by ${event.triggeredBy}`,
    });
  }

  /**
   * Log an error
   */
  logError(actor: string, error: Error, operation: string): AuditEntry {
    return this.createAuditEntry({
      actor,
      actorType: ACTOR_SYSTEM,
      action: 'error_occurred',
      entityType: 'error',
      entityId: operation,
      newState: {
        errorMessage: error.message,
        errorName: error.name,
        operation,
      },
      rationale: `Error in ${operation}: ${error.message}`,
    });
  }

  // ==================== Query Methods ====================

  /**
   * Get audit entries for an entity
   */
  getEntriesForEntity(entityType: string, entityId: string): AuditEntry[] {
    return this.entries.filter(
      entry => entry.entityType === entityType && entry.entityId === entityId
    );
  }

  /**
   * Get audit entries by action type
   */
  getEntriesByAction(action: GovernanceAuditAction): AuditEntry[] {
    return this.entries.filter(entry => entry.action === action);
  }

  /**
   * Get audit entries in a time range
   */
  getEntriesInRange(startDate: Date, endDate: Date): AuditEntry[] {
    return this.entries.filter(
      entry => entry.timestamp >= startDate && entry.timestamp <= endDate
    );
  }

  /**
   * Get all audit entries
   */
  getAllEntries(): AuditEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }
}
