/**
 * Audit trail types for the Clinical Data Governance Core
 */

import { ActorType } from './common.js';

/**
 * Governance actions recorded in the audit trail
 */
export type GovernanceAuditAction =
  | 'quality_validation'
  | 'contract_validation'
  | 'promotion_decision'
  | 'lineage_recorded'
  | 'error_occurred';

/**
 * Represents an entry in the audit log
 */
export interface AuditEntry {
  id: string;
  timestamp: Date;
  actor: string;
  actorType: ActorType;
  action: GovernanceAuditAction;
  entityType: string;
  entityId: string;
  previousState?: unknown;
  newState?: unknown;
  rationale?: string;
}

/**
 * Parameters for creating an audit entry
 */
export interface CreateAuditEntryParams {
  actor: string;
  actorType: ActorType;
  action: GovernanceAuditAction;
  entityType: string;
  entityId: string;
  previousState?: unknown;
  newState?: unknown;
  rationale?: string;
}
