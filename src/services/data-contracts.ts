/**
 * Data contract definition
 *
 * Normalizes contract input and checks its structural invariants up front,
 * so a malformed contract fails at load time instead of during evaluation.
 */

import { ColumnContract, ColumnContractInput, DataContract, DataContractInput } from '../types/contracts.js';
import { ContractDefinitionError } from '../types/error-handling.js';
import { schemaHash } from '../utils/hashing.js';

const FOREIGN_KEY_TARGET = /^[A-Za-z_][\w]*\.[A-Za-z_][\w]*$/;

function defineColumn(input: ColumnContractInput): ColumnContract {
  return Object.freeze({
    name: input.name,
    dtype: input.dtype,
    nullable: input.nullable ?? true,
    unique: input.unique ?? false,
    allowedValues: Object.freeze([...(input.allowedValues ?? [])]),
    ...(input.minValue !== undefined ? { minValue: input.minValue } : {}),
    ...(input.maxValue !== undefined ? { maxValue: input.maxValue } : {}),
    ...(input.pattern !== undefined ? { pattern: input.pattern } : {}),
    description: input.description ?? ''
  });
}

/**
 * Collect every structural problem of a contract; empty when well formed
 */
export function findContractViolations(input: DataContractInput): string[] {
  const violations: string[] = [];
  const names = new Set<string>();

  for (const column of input.columns) {
    if (names.has(column.name)) {
      violations.push(`Duplicate column '${column.name}'`);
    }
    names.add(column.name);

    if (column.minValue !== undefined && column.maxValue !== undefined && column.minValue > column.maxValue) {
      violations.push(`Column '${column.name}' has min_value above max_value`);
    }
    if (column.pattern !== undefined) {
      try {
        new RegExp(column.pattern);
      } catch {
        violations.push(`Column '${column.name}' has an invalid pattern: ${column.pattern}`);
      }
    }
  }

  for (const key of input.primaryKey ?? []) {
    if (!names.has(key)) {
      violations.push(`Primary key column '${key}' is not declared`);
    }
  }

  for (const [column, target] of Object.entries(input.foreignKeys ?? {})) {
    if (!names.has(column)) {
      violations.push(`Foreign key column '${column}' is not declared`);
    }
    if (!FOREIGN_KEY_TARGET.test(target)) {
      violations.push(`Foreign key '${column}' target '${target}' is not of the form table.column`);
    }
  }

  return violations;
}

/**
 * Build an immutable contract; throws ContractDefinitionError listing every
 * violation found
 */
export function defineDataContract(input: DataContractInput): DataContract {
  const violations = findContractViolations(input);
  if (violations.length > 0) {
    throw new ContractDefinitionError(input.name, violations);
  }

  const now = new Date().toISOString();
  return Object.freeze({
    name: input.name,
    version: input.version,
    domain: input.domain,
    description: input.description ?? '',
    owner: input.owner,
    columns: Object.freeze(input.columns.map(defineColumn)),
    compatibilityMode: input.compatibilityMode ?? 'backward',
    primaryKey: Object.freeze([...(input.primaryKey ?? [])]),
    foreignKeys: Object.freeze({ ...(input.foreignKeys ?? {}) }),
    createdAt: input.createdAt ?? now,
    updatedAt: input.updatedAt ?? now
  });
}

export function contractSchemaHash(contract: DataContract): string {
  return schemaHash(contract.columns);
}

export function getColumn(contract: DataContract, name: string): ColumnContract | undefined {
  return contract.columns.find(column => column.name === name);
}
