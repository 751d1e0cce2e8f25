/**
 * Error Handling Types for the Clinical Data Governance Core
 *
 * Only programmer and configuration errors are raised as exceptions.
 * Data-quality problems and schema drift are reported as counted outcomes
 * and never reach these classes.
 */

// ==================== Error Category Enum ====================

/**
 * Error category enum for categorizing errors
 */
export enum ErrorCategory {
  /** Domain or contract key is not registered */
  UNKNOWN_DOMAIN = 'UNKNOWN_DOMAIN',
  /** Contract definition violates its own invariants */
  INVALID_CONTRACT = 'INVALID_CONTRACT',
  /** Rule registry misuse (duplicate name, sealed registry) */
  INVALID_RULE_REGISTRATION = 'INVALID_RULE_REGISTRATION',
  /** A rule predicate raised while evaluating a dataset */
  RULE_EXECUTION_FAILED = 'RULE_EXECUTION_FAILED',
  /** A lineage tracker was used after it was finalized */
  INVALID_TRACKER_STATE = 'INVALID_TRACKER_STATE',
  /** A serialized record did not match its schema */
  INVALID_RECORD = 'INVALID_RECORD',
  /** Unknown error */
  UNKNOWN = 'UNKNOWN',
}

// ==================== Error Response Interface ====================

/**
 * Structured error description for callers and audit logs
 */
export interface ErrorResponse {
  /** Error category */
  category: ErrorCategory;
  /** Short message safe to surface to operators */
  userMessage: string;
  /** Technical details (for logging) */
  technicalDetails?: string;
  /** Suggested remediation */
  suggestedActions: string[];
  /** Error code for programmatic handling */
  errorCode: string;
  /** Timestamp when error occurred */
  timestamp?: Date;
  /** Correlation ID for tracking */
  correlationId?: string;
}

// ==================== Error Handlers ====================

/**
 * Default error responses for each category
 */
export const ERROR_HANDLERS: Record<ErrorCategory, Omit<ErrorResponse, 'technicalDetails' | 'timestamp' | 'correlationId'>> = {
  [ErrorCategory.UNKNOWN_DOMAIN]: {
    category: ErrorCategory.UNKNOWN_DOMAIN,
    userMessage: 'No rule set or contract is registered for the requested domain.',
    suggestedActions: ['Check the domain code', 'Register a rule set or contract'],
    errorCode: 'ERR_UNKNOWN_DOMAIN',
  },
  [ErrorCategory.INVALID_CONTRACT]: {
    category: ErrorCategory.INVALID_CONTRACT,
    userMessage: 'The data contract definition is malformed.',
    suggestedActions: ['Fix the contract definition', 'Publish a new contract version'],
    errorCode: 'ERR_INVALID_CONTRACT',
  },
  [ErrorCategory.INVALID_RULE_REGISTRATION]: {
    category: ErrorCategory.INVALID_RULE_REGISTRATION,
    userMessage: 'The validation rule could not be registered.',
    suggestedActions: ['Use a unique rule name', 'Register rules before sealing the engine'],
    errorCode: 'ERR_RULE_REGISTRATION',
  },
  [ErrorCategory.RULE_EXECUTION_FAILED]: {
    category: ErrorCategory.RULE_EXECUTION_FAILED,
    userMessage: 'A validation rule failed to execute and was recorded as a failed check.',
    suggestedActions: ['Inspect the rule predicate', 'Check the dataset columns'],
    errorCode: 'ERR_RULE_EXECUTION',
  },
  [ErrorCategory.INVALID_TRACKER_STATE]: {
    category: ErrorCategory.INVALID_TRACKER_STATE,
    userMessage: 'The lineage tracker has already produced its event.',
    suggestedActions: ['Create a new tracker for each pipeline step'],
    errorCode: 'ERR_TRACKER_FINALIZED',
  },
  [ErrorCategory.INVALID_RECORD]: {
    category: ErrorCategory.INVALID_RECORD,
    userMessage: 'The serialized record does not match the expected schema.',
    suggestedActions: ['Check the record producer', 'Re-export the record'],
    errorCode: 'ERR_INVALID_RECORD',
  },
  [ErrorCategory.UNKNOWN]: {
    category: ErrorCategory.UNKNOWN,
    userMessage: 'Something unexpected happened.',
    suggestedActions: ['Retry', 'Contact the data platform team'],
    errorCode: 'ERR_UNKNOWN',
  },
};

// ==================== Custom Error Classes ====================

/**
 * Base error class for governance errors
 */
export class GovernanceError extends Error {
  public readonly category: ErrorCategory;
  public readonly correlationId: string;
  public readonly timestamp: Date;

  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    correlationId?: string
  ) {
    super(message);
    this.name = 'GovernanceError';
    this.category = category;
    this.correlationId = correlationId || generateCorrelationId();
    this.timestamp = new Date();
  }

  /**
   * Convert to ErrorResponse for logging and callers
   */
  toErrorResponse(): ErrorResponse {
    const handler = ERROR_HANDLERS[this.category];
    return {
      ...handler,
      technicalDetails: this.message,
      timestamp: this.timestamp,
      correlationId: this.correlationId,
    };
  }
}

/**
 * Unknown domain or contract key
 */
export class DomainError extends GovernanceError {
  public readonly domain: string;
  public readonly supported: readonly string[];

  constructor(domain: string, supported: readonly string[], correlationId?: string) {
    super(
      `Unknown domain: ${domain}. Supported: ${supported.join(', ')}`,
      ErrorCategory.UNKNOWN_DOMAIN,
      correlationId
    );
    this.name = 'DomainError';
    this.domain = domain;
    this.supported = supported;
  }
}

/**
 * Malformed contract definition, raised at load time
 */
export class ContractDefinitionError extends GovernanceError {
  public readonly contractName: string;
  public readonly violations: readonly string[];

  constructor(contractName: string, violations: readonly string[], correlationId?: string) {
    super(
      `Contract '${contractName}' is invalid: ${violations.join('; ')}`,
      ErrorCategory.INVALID_CONTRACT,
      correlationId
    );
    this.name = 'ContractDefinitionError';
    this.contractName = contractName;
    this.violations = violations;
  }
}

/**
 * Rule name already registered on this engine
 */
export class DuplicateRuleError extends GovernanceError {
  public readonly ruleName: string;

  constructor(ruleName: string, correlationId?: string) {
    super(`Rule '${ruleName}' is already registered`, ErrorCategory.INVALID_RULE_REGISTRATION, correlationId);
    this.name = 'DuplicateRuleError';
    this.ruleName = ruleName;
  }
}

/**
 * Rule added to an engine whose registry was sealed
 */
export class RuleRegistryLockedError extends GovernanceError {
  public readonly ruleName: string;

  constructor(ruleName: string, domain: string, correlationId?: string) {
    super(
      `Cannot add rule '${ruleName}': the ${domain} rule registry is sealed`,
      ErrorCategory.INVALID_RULE_REGISTRATION,
      correlationId
    );
    this.name = 'RuleRegistryLockedError';
    this.ruleName = ruleName;
  }
}

/**
 * A predicate read a column the dataset does not carry
 */
export class MissingColumnError extends GovernanceError {
  public readonly column: string;

  constructor(column: string, correlationId?: string) {
    super(`Column '${column}' not found in dataset`, ErrorCategory.RULE_EXECUTION_FAILED, correlationId);
    this.name = 'MissingColumnError';
    this.column = column;
  }
}

/**
 * Mutation of a lineage tracker after buildEvent()
 */
export class TrackerFinalizedError extends GovernanceError {
  public readonly eventId: string;
  public readonly operation: string;

  constructor(eventId: string, operation: string, correlationId?: string) {
    super(
      `Lineage tracker for event ${eventId} is finalized; ${operation} is not allowed`,
      ErrorCategory.INVALID_TRACKER_STATE,
      correlationId
    );
    this.name = 'TrackerFinalizedError';
    this.eventId = eventId;
    this.operation = operation;
  }
}

/**
 * Serialized record failed schema validation
 */
export class RecordParseError extends GovernanceError {
  public readonly recordType: string;
  public readonly issues: readonly string[];

  constructor(recordType: string, issues: readonly string[], correlationId?: string) {
    super(`Invalid ${recordType} record: ${issues.join('; ')}`, ErrorCategory.INVALID_RECORD, correlationId);
    this.name = 'RecordParseError';
    this.recordType = recordType;
    this.issues = issues;
  }
}

// ==================== Utility Functions ====================

/**
 * Generate a correlation ID for error tracking
 */
export function generateCorrelationId(): string {
  return `err-${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Categorize an error based on its type
 */
export function categorizeError(error: unknown): ErrorCategory {
  if (error instanceof GovernanceError) {
    return error.category;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (message.includes('unknown domain')) {
      return ErrorCategory.UNKNOWN_DOMAIN;
    }
    if (message.includes('contract')) {
      return ErrorCategory.INVALID_CONTRACT;
    }
    if (message.includes('not found in dataset') || message.includes('column')) {
      return ErrorCategory.RULE_EXECUTION_FAILED;
    }
  }

  return ErrorCategory.UNKNOWN;
}

/**
 * Create an ErrorResponse from any error
 */
export function createErrorResponse(
  error: unknown,
  correlationId?: string
): ErrorResponse {
  if (error instanceof GovernanceError) {
    return error.toErrorResponse();
  }

  const category = categorizeError(error);
  const handler = ERROR_HANDLERS[category];
  const technicalDetails = error instanceof Error ? error.message : String(error);

  return {
    ...handler,
    technicalDetails,
    timestamp: new Date(),
    correlationId: correlationId || generateCorrelationId(),
  };
}

/**
 * Describe a thrown value in one line
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Log error for operators
 */
export function logError(
  error: unknown,
  context: Record<string, unknown> = {}
): void {
  const errorResponse = createErrorResponse(error);

  console.error('[GovernanceError]', {
    category: errorResponse.category,
    errorCode: errorResponse.errorCode,
    correlationId: errorResponse.correlationId,
    timestamp: errorResponse.timestamp,
    technicalDetails: errorResponse.technicalDetails,
    context,
  });
}
