/**
 * **Feature: clinical-data-governance, Property 2: Contract Compatibility and Action**
 *
 * For any dataset checked against a contract, schema drift is classified by
 * the compatibility mode, and the action is quarantine exactly when a
 * breaking change exists or the failed-record ratio exceeds the threshold.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { compatibilityModeGenerator, identifierGenerator, validAeDatasetGenerator } from '../generators/index.js';
import { ContractEngine } from '../../services/contract-engine.js';
import { ContractRegistry } from '../../services/contract-registry.js';
import { defineDataContract } from '../../services/data-contracts.js';
import { createDataset } from '../../utils/dataset.js';
import { CompatibilityMode, DataContract } from '../../types/index.js';

const propertyConfig = {
  numRuns: 100,
  verbose: false
};

const engine = new ContractEngine({ quarantineThreshold: 0.05 });

function codeContract(compatibilityMode: CompatibilityMode): DataContract {
  return defineDataContract({
    name: 'code_contract',
    version: '1.0.0',
    domain: 'TS',
    owner: 'qa',
    compatibilityMode,
    columns: [
      { name: 'ID', dtype: 'string', nullable: false },
      { name: 'CODE', dtype: 'string', allowedValues: ['X', 'Y'] }
    ]
  });
}

const rowCountGenerator = (): fc.Arbitrary<number> => fc.integer({ min: 1, max: 40 });

describe('Property 2: Contract Compatibility and Action', () => {
  it('should treat an added column as non-breaking except under forward compatibility', () => {
    fc.assert(
      fc.property(
        compatibilityModeGenerator(),
        identifierGenerator().filter(name => name !== 'ID' && name !== 'CODE'),
        rowCountGenerator(),
        (mode, extra, rows) => {
          const dataset = createDataset(
            Array.from({ length: rows }, (_, i) => ({ ID: `S${i}`, CODE: 'X', [extra]: 'value' }))
          );

          const result = engine.validateAgainstContract(dataset, codeContract(mode));

          expect(result.schemaChanges).toHaveLength(1);
          expect(result.schemaChanges[0].changeType).toBe('column_added');
          expect(result.hasBreakingChanges).toBe(mode === 'forward');
          expect(result.action).toBe(mode === 'forward' ? 'quarantine' : 'alert');
        }
      ),
      propertyConfig
    );
  });

  it('should quarantine a removed column under backward and full compatibility', () => {
    fc.assert(
      fc.property(compatibilityModeGenerator(), rowCountGenerator(), (mode, rows) => {
        const dataset = createDataset(Array.from({ length: rows }, (_, i) => ({ ID: `S${i}` })));

        const result = engine.validateAgainstContract(dataset, codeContract(mode));
        const breaking = mode === 'backward' || mode === 'full';

        expect(result.schemaChanges.map(change => change.changeType)).toEqual(['column_removed']);
        expect(result.hasBreakingChanges).toBe(breaking);
        expect(result.action).toBe(breaking ? 'quarantine' : 'alert');
        expect(result.isValid).toBe(!breaking);
      }),
      propertyConfig
    );
  });

  it('should quarantine exactly when the failure ratio exceeds the threshold', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 200 }).chain(total =>
          fc.tuple(fc.constant(total), fc.integer({ min: 0, max: total }))
        ),
        ([total, invalid]) => {
          const dataset = createDataset(
            Array.from({ length: total }, (_, i) => ({ ID: `S${i}`, CODE: i < invalid ? 'Z' : 'Y' }))
          );

          const result = engine.validateAgainstContract(dataset, codeContract('backward'));
          const expected = invalid === 0 ? 'accept' : invalid / total > 0.05 ? 'quarantine' : 'alert';

          expect(result.failedRecords).toBe(invalid);
          expect(result.action).toBe(expected);
          expect(result.isValid).toBe(expected !== 'quarantine');
        }
      ),
      propertyConfig
    );
  });

  it('should accept conforming adverse events against the bundled contract', () => {
    const contract = new ContractRegistry().getContract('AE');

    fc.assert(
      fc.property(validAeDatasetGenerator(), dataset => {
        const result = engine.validateAgainstContract(dataset, contract);

        expect(result.schemaChanges).toEqual([]);
        expect(result.failedRecords).toBe(0);
        expect(result.action).toBe('accept');
      }),
      propertyConfig
    );
  });
});
