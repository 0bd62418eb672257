/**
 * Property-based test generators for assessment coverage
 */

import fc from 'fast-check';
import {
  AssessmentCoverage,
  Control,
  EvidenceJudgement,
  OverrideAction
} from '../../types/index.js';
import { computeCoverage, findEntry } from '../../services/coverage-calculator.js';
import { mergeEvidence } from '../../services/evidence-merger.js';
import { applyOverride } from '../../services/override-manager.js';
import { controlSetGenerator } from './control.generator.js';
import { judgementBatchGenerator } from './evidence.generator.js';
import { overrideActionGenerator, reasonGenerator } from './common.generator.js';

export interface OverrideStep {
  index: number;
  action: OverrideAction;
  reason: string;
}

export interface CoverageScenario {
  controls: Control[];
  judgements: EvidenceJudgement[];
  overrides: OverrideStep[];
}

/**
 * Whether the action may start from the control's current list
 */
export function isValidOverride(coverage: AssessmentCoverage, controlId: string, action: OverrideAction): boolean {
  const entry = findEntry(coverage, controlId);
  if (!entry) return false;
  switch (action) {
    case 'mark_not_applicable':
      return entry.status !== 'not_applicable';
    case 'reject_evidence':
      return entry.status === 'full_coverage' || entry.status === 'partial_coverage';
    case 'restore':
      return entry.status === 'not_applicable' || entry.status === 'rejected_evidence';
  }
}

/**
 * Applies the steps whose transition is legal and skips the rest
 */
export function applyValidOverrides(
  coverage: AssessmentCoverage,
  controls: readonly Control[],
  steps: readonly OverrideStep[]
): AssessmentCoverage {
  let current = coverage;
  for (const step of steps) {
    const control = controls[step.index % controls.length];
    if (isValidOverride(current, control.id, step.action)) {
      current = applyOverride(current, control.id, step.action, step.reason);
    }
  }
  return current;
}

export const overrideStepGenerator = (): fc.Arbitrary<OverrideStep> =>
  fc.record({
    index: fc.nat({ max: 1000 }),
    action: overrideActionGenerator(),
    reason: reasonGenerator(),
  });

/**
 * Controls, evidence about them and a sequence of attempted overrides
 */
export const coverageScenarioGenerator = (
  options: { minControls?: number; maxControls?: number; maxOverrides?: number } = {}
): fc.Arbitrary<CoverageScenario> =>
  controlSetGenerator({ minLength: options.minControls ?? 1, maxLength: options.maxControls ?? 15 }).chain(controls =>
    fc.record({
      controls: fc.constant(controls),
      judgements: judgementBatchGenerator(controls),
      overrides: fc.array(overrideStepGenerator(), { maxLength: options.maxOverrides ?? 10 }),
    })
  );

/**
 * Builds the coverage a scenario describes
 */
export function buildScenarioCoverage(scenario: CoverageScenario): AssessmentCoverage {
  const classified = computeCoverage(scenario.controls, mergeEvidence(new Map(), scenario.judgements));
  return applyValidOverrides(classified, scenario.controls, scenario.overrides);
}
