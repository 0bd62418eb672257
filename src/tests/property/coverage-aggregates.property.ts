/**
 * **Property 2: Coverage Aggregates**
 *
 * Percentages stay within 0..100, an assessment with nothing left to assess
 * scores zero, and the summary is a function of the lists alone.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  allEntries,
  calculateTotals,
  computeCoverage,
  recomputeCoverage,
} from '../../services/coverage-calculator.js';
import { mergeEvidence } from '../../services/evidence-merger.js';
import { applyOverride } from '../../services/override-manager.js';
import { buildScenarioCoverage, coverageScenarioGenerator } from '../generators/index.js';

const propertyConfig = {
  numRuns: 100,
  verbose: false
};

describe('Property 2: Coverage Aggregates', () => {
  it('should keep coverage and quality within 0..100', () => {
    fc.assert(
      fc.property(coverageScenarioGenerator(), (scenario) => {
        const { summary } = buildScenarioCoverage(scenario);

        expect(summary.coveragePercentage).toBeGreaterThanOrEqual(0);
        expect(summary.coveragePercentage).toBeLessThanOrEqual(100);
        expect(summary.qualityScore).toBeGreaterThanOrEqual(0);
        expect(summary.qualityScore).toBeLessThanOrEqual(100);
      }),
      propertyConfig
    );
  });

  it('should score zero when every control is excluded', () => {
    fc.assert(
      fc.property(coverageScenarioGenerator(), (scenario) => {
        let coverage = buildScenarioCoverage(scenario);
        for (const entry of allEntries(coverage)) {
          if (entry.status !== 'not_applicable') {
            coverage = applyOverride(coverage, entry.controlId, 'mark_not_applicable', 'Out of scope');
          }
        }

        expect(calculateTotals(coverage).effectiveTotal).toBe(0);
        expect(coverage.summary.coveragePercentage).toBe(0);
        expect(coverage.summary.qualityScore).toBe(0);
      }),
      propertyConfig
    );
  });

  it('should never give a partially covered control more than half marks', () => {
    fc.assert(
      fc.property(coverageScenarioGenerator(), (scenario) => {
        const coverage = buildScenarioCoverage(scenario);

        for (const entry of coverage.partialCoverage) {
          expect(entry.bestEffectiveScore).toBeLessThanOrEqual(50);
        }
        for (const entry of coverage.fullCoverage) {
          expect(entry.bestEffectiveScore).toBeLessThanOrEqual(100);
        }
      }),
      propertyConfig
    );
  });

  it('should derive the same summary when recomputed from the lists', () => {
    fc.assert(
      fc.property(coverageScenarioGenerator(), (scenario) => {
        const coverage = buildScenarioCoverage(scenario);

        expect(recomputeCoverage(coverage)).toEqual(coverage);
      }),
      propertyConfig
    );
  });

  it('should not depend on the order evidence arrives in', () => {
    fc.assert(
      fc.property(coverageScenarioGenerator({ maxOverrides: 0 }), (scenario) => {
        const forward = computeCoverage(scenario.controls, mergeEvidence(new Map(), scenario.judgements));
        const backward = computeCoverage(
          scenario.controls,
          mergeEvidence(new Map(), [...scenario.judgements].reverse())
        );

        expect(backward.summary.coveragePercentage).toBe(forward.summary.coveragePercentage);
        expect(backward.summary.qualityScore).toBe(forward.summary.qualityScore);
        expect(backward.fullCoverage.map(e => e.controlId)).toEqual(forward.fullCoverage.map(e => e.controlId));
        expect(backward.partialCoverage.map(e => e.controlId)).toEqual(
          forward.partialCoverage.map(e => e.controlId)
        );
      }),
      propertyConfig
    );
  });
});
