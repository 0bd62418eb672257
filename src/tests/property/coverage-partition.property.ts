/**
 * **Property 1: Coverage Partition**
 *
 * For any set of applicable controls, any evidence and any sequence of
 * overrides, every control sits in exactly one of the five lists, and the
 * list it sits in matches its status.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { allEntries, assertPartition } from '../../services/coverage-calculator.js';
import { buildScenarioCoverage, coverageScenarioGenerator } from '../generators/index.js';

const propertyConfig = {
  numRuns: 100,
  verbose: false
};

describe('Property 1: Coverage Partition', () => {
  it('should place every control in exactly one list', () => {
    fc.assert(
      fc.property(coverageScenarioGenerator(), (scenario) => {
        const coverage = buildScenarioCoverage(scenario);
        const ids = allEntries(coverage).map(entry => entry.controlId);

        expect(ids.slice().sort()).toEqual(scenario.controls.map(c => c.id).sort());
        expect(new Set(ids).size).toBe(ids.length);
        expect(() => assertPartition(coverage, scenario.controls.map(c => c.id))).not.toThrow();
      }),
      propertyConfig
    );
  });

  it('should keep list sizes consistent with the summary counts', () => {
    fc.assert(
      fc.property(coverageScenarioGenerator(), (scenario) => {
        const coverage = buildScenarioCoverage(scenario);

        expect(coverage.summary.notApplicableCount).toBe(coverage.notApplicable.length);
        expect(coverage.summary.rejectedEvidenceCount).toBe(coverage.rejectedEvidence.length);
        expect(coverage.summary.machineVerifiableCount + coverage.summary.humanCuratedCount).toBe(
          coverage.fullCoverage.length + coverage.partialCoverage.length
        );
      }),
      propertyConfig
    );
  });

  it('should only hold evidenced controls in the full and partial lists', () => {
    fc.assert(
      fc.property(coverageScenarioGenerator(), (scenario) => {
        const coverage = buildScenarioCoverage(scenario);

        for (const entry of [...coverage.fullCoverage, ...coverage.partialCoverage]) {
          expect(entry.evidence.length).toBeGreaterThan(0);
        }
        for (const entry of coverage.fullCoverage) {
          expect(entry.evidence.some(j => j.coverageLevel === 'full')).toBe(true);
        }
        for (const entry of coverage.partialCoverage) {
          expect(entry.evidence.some(j => j.coverageLevel === 'full')).toBe(false);
        }
      }),
      propertyConfig
    );
  });
});
