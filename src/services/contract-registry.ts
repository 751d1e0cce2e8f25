/**
 * Contract Registry
 *
 * Loads pre-built data contracts from <DOMAIN>.contract.json files in the
 * configured contracts directory. Contracts are parsed and checked when
 * first requested, so a malformed definition fails before any dataset is
 * evaluated against it.
 */

import { existsSync, readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { DataContract } from '../types/contracts.js';
import {
  ContractDefinitionError,
  DomainError,
  RecordParseError,
  describeError
} from '../types/error-handling.js';
import { GovernanceConfig, resolveGovernanceConfig } from './governance-config.js';
import { dataContractFromRecord } from './serialization.js';

const CONTRACT_FILE_SUFFIX = '.contract.json';

export class ContractRegistry {
  private readonly contractsDir: string;
  private readonly cache = new Map<string, DataContract>();

  constructor(config?: Partial<GovernanceConfig>) {
    this.contractsDir = resolveGovernanceConfig(config).contractsDir;
  }

  /**
   * Domain keys with a contract file, sorted
   */
  listDomains(): string[] {
    if (!existsSync(this.contractsDir)) {
      return [];
    }
    return readdirSync(this.contractsDir)
      .filter(file => file.endsWith(CONTRACT_FILE_SUFFIX))
      .map(file => file.slice(0, -CONTRACT_FILE_SUFFIX.length))
      .sort();
  }

  hasContract(domain: string): boolean {
    return this.listDomains().includes(domain.toUpperCase());
  }

  /**
   * Contract for a domain key; unknown keys raise DomainError
   */
  getContract(domain: string): DataContract {
    const key = domain.toUpperCase();
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const file = join(this.contractsDir, `${key}${CONTRACT_FILE_SUFFIX}`);
    if (!existsSync(file)) {
      throw new DomainError(domain, this.listDomains());
    }

    const contract = this.parseFile(file);
    if (contract.domain !== key) {
      throw new ContractDefinitionError(contract.name, [
        `Declared domain '${contract.domain}' does not match file key '${key}'`
      ]);
    }
    this.cache.set(key, contract);
    return contract;
  }

  /**
   * Load every contract in the directory; throws on the first malformed one
   */
  loadAll(): DataContract[] {
    return this.listDomains().map(domain => this.getContract(domain));
  }

  private parseFile(file: string): DataContract {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(file, 'utf-8'));
    } catch (error) {
      throw new ContractDefinitionError(file, [describeError(error)]);
    }

    try {
      return dataContractFromRecord(raw);
    } catch (error) {
      if (error instanceof RecordParseError) {
        throw new ContractDefinitionError(file, error.issues);
      }
      throw error;
    }
  }
}

let defaultRegistry: ContractRegistry | undefined;

/**
 * Contract for a domain key from the default contracts directory
 */
export function getContract(domain: string): DataContract {
  if (!defaultRegistry) {
    defaultRegistry = new ContractRegistry();
  }
  return defaultRegistry.getContract(domain);
}
