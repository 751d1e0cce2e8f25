/**
 * Governance Pipeline for the Clinical Data Governance Core
 * Promotion gate between storage tiers: validates a dataset, checks it
 * against its domain contract, decides promote/alert/quarantine and records
 * the lineage of that decision
 */

import {
  ContractValidationResult,
  DataAsset,
  PromotionOutcome,
  PromotionRequest,
  QualityReport,
  logError
} from '../types/index.js';
import { IGovernancePipeline } from '../interfaces/index.js';
import { ILineageRepository } from '../repository/index.js';
import { AuditTrailService } from '../services/audit-trail-service.js';
import { ContractEngine } from '../services/contract-engine.js';
import { ContractRegistry } from '../services/contract-registry.js';
import { GovernanceConfig, resolveGovernanceConfig } from '../services/governance-config.js';
import { LineageIndex } from '../services/lineage-index.js';
import { LineageTracker, createDataAsset } from '../services/lineage-tracker.js';
import { decidePromotion } from '../services/promotion-policy.js';
import { createValidationEngine } from '../services/rule-sets.js';

/**
 * Collaborators of the pipeline; each defaults to a fresh instance
 */
export interface GovernancePipelineOptions {
  config?: Partial<GovernanceConfig>;
  auditTrail?: AuditTrailService;
  contractRegistry?: ContractRegistry;
  /** Time source for lineage trackers */
  clock?: () => Date;
}

/**
 * Where a quarantined dataset lands when the request names no quarantine asset
 */
export function defaultQuarantineAsset(domain: string, input: DataAsset): DataAsset {
  return createDataAsset(`quarantine/${domain.toUpperCase()}/${input.name}`, input.layer, {
    assetType: input.assetType,
    ...(input.recordCount !== undefined ? { recordCount: input.recordCount } : {}),
    metadata: { quarantinedFrom: input.location },
  });
}

/**
 * Implementation of the Governance Pipeline
 */
export class GovernancePipeline implements IGovernancePipeline {
  private readonly config: GovernanceConfig;
  private readonly auditTrail: AuditTrailService;
  private readonly contractRegistry: ContractRegistry;
  private readonly contractEngine: ContractEngine;
  private readonly clock?: () => Date;

  constructor(private repository: ILineageRepository, options: GovernancePipelineOptions = {}) {
    this.config = resolveGovernanceConfig(options.config);
    this.auditTrail = options.auditTrail ?? new AuditTrailService({
      logToConsole: this.config.logToConsole,
      maxInMemoryEntries: this.config.auditMaxEntries,
    });
    this.contractRegistry = options.contractRegistry ?? new ContractRegistry(this.config);
    this.contractEngine = new ContractEngine(this.config);
    this.clock = options.clock;
  }

  /**
   * Gate one dataset. Unknown domains and malformed contracts are raised;
   * data problems only shape the decision.
   */
  evaluate(request: PromotionRequest): PromotionOutcome {
    try {
      return this.runGate(request);
    } catch (error) {
      logError(error, { domain: request.domain, sourcePath: request.sourcePath });
      this.auditTrail.logError(
        request.triggeredBy,
        error instanceof Error ? error : new Error(String(error)),
        `evaluate:${request.domain}`
      );
      throw error;
    }
  }

  /**
   * Snapshot index over every lineage event recorded so far
   */
  buildLineageIndex(): LineageIndex {
    return this.repository.buildIndex(this.config);
  }

  getAuditTrail(): AuditTrailService {
    return this.auditTrail;
  }

  private runGate(request: PromotionRequest): PromotionOutcome {
    const { dataset, domain, sourcePath, triggeredBy } = request;

    const qualityReport = createValidationEngine(domain, this.config).validate(dataset, undefined, sourcePath);
    const contractResult = this.contractRegistry.hasContract(domain)
      ? this.contractEngine.validateAgainstContract(dataset, this.contractRegistry.getContract(domain))
      : undefined;
    const { decision, reasons } = decidePromotion(qualityReport, contractResult);

    const destination = decision === 'quarantine'
      ? request.quarantine ?? defaultQuarantineAsset(domain, request.input)
      : request.output;

    const tracker = new LineageTracker(triggeredBy, {
      eventType: 'validation',
      ...(this.clock ? { clock: this.clock } : {}),
    });
    tracker
      .addInput(request.input)
      .addOutput(destination)
      .setTransformation(this.describeGate(qualityReport, contractResult), {
        domain: qualityReport.domain,
        rules: qualityReport.results.map(result => result.ruleName),
        decision,
        ...(contractResult
          ? { contract: `${contractResult.contractName}@${contractResult.contractVersion}`, schemaHash: contractResult.schemaHash }
          : {}),
      })
      .setValidationStatus(qualityReport.status, decision === 'quarantine' ? qualityReport.totalRecords : 0);
    if (request.executionId) {
      tracker.setExecutionId(request.executionId);
    }
    const lineageEvent = this.repository.append(tracker.buildEvent());

    const entityId = sourcePath || request.input.location;
    this.auditTrail.logQualityValidation(triggeredBy, qualityReport);
    if (contractResult) {
      this.auditTrail.logContractValidation(triggeredBy, entityId, contractResult);
    }
    this.auditTrail.logPromotionDecision(triggeredBy, entityId, decision, reasons);
    this.auditTrail.logLineageRecorded(triggeredBy, lineageEvent);

    return {
      decision,
      qualityReport,
      ...(contractResult ? { contractResult } : {}),
      lineageEvent,
      reasons,
    };
  }

  private describeGate(report: QualityReport, contractResult?: ContractValidationResult): string {
    const contract = contractResult
      ? ` and contract ${contractResult.contractName}@${contractResult.contractVersion}`
      : '';
    return `Validate ${report.domain} against ${report.results.length} rules${contract}`;
  }
}
