/**
 * Coverage Calculator
 *
 * Classifies applicable controls from their accumulated evidence and derives
 * the assessment aggregates. Everything here is pure: the same lists always
 * produce the same summary.
 */

import { CoverageLevel, StrengthTier } from '../types/common.js';
import { Control } from '../types/controls.js';
import { EvidenceJudgement, EvidenceMap } from '../types/evidence.js';
import {
  AssessedCoverageEntry,
  AssessmentCoverage,
  ControlCoverageEntry,
  CoverageLists,
  CoverageSummary,
  CoverageTotals,
} from '../types/coverage.js';
import { CorruptedStateError } from '../types/error-handling.js';

export const STRENGTH_SCORES: Readonly<Record<StrengthTier, number>> = {
  1: 100,
  2: 90,
  3: 80,
  4: 70,
  5: 50,
  6: 30,
  7: 20,
};

export const COVERAGE_MULTIPLIERS: Readonly<Record<CoverageLevel, number>> = {
  full: 1.0,
  partial: 0.5,
  mentions: 0.25,
};

export const DEFAULT_MACHINE_VERIFIABLE_MAX_TIER: StrengthTier = 4;

export interface CoverageOptions {
  /** Weakest tier still counted as machine-verifiable */
  machineVerifiableMaxTier?: StrengthTier;
  /** Notes carried onto the resulting coverage */
  notes?: readonly string[];
}

export function scoreJudgement(judgement: EvidenceJudgement): number {
  return STRENGTH_SCORES[judgement.strengthTier] * COVERAGE_MULTIPLIERS[judgement.coverageLevel];
}

/**
 * Rounds to one decimal place
 */
export function roundPercentage(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Builds the assessed entry for one control. The first judgement wins a tie
 * on the best score.
 */
export function classifyControl(
  controlId: string,
  evidence: readonly EvidenceJudgement[],
  machineVerifiableMaxTier: StrengthTier = DEFAULT_MACHINE_VERIFIABLE_MAX_TIER
): AssessedCoverageEntry {
  if (evidence.length === 0) {
    return {
      controlId,
      status: 'no_coverage',
      evidence: [],
      bestStrengthTier: null,
      bestEffectiveScore: 0,
      isMachineVerifiable: false,
    };
  }

  let bestScore = -1;
  let bestTier: StrengthTier = evidence[0].strengthTier;
  for (const judgement of evidence) {
    const score = scoreJudgement(judgement);
    if (score > bestScore) {
      bestScore = score;
      bestTier = judgement.strengthTier;
    }
  }

  return {
    controlId,
    status: evidence.some(j => j.coverageLevel === 'full') ? 'full_coverage' : 'partial_coverage',
    evidence: [...evidence],
    bestStrengthTier: bestTier,
    bestEffectiveScore: bestScore,
    isMachineVerifiable: bestTier <= machineVerifiableMaxTier,
  };
}

export function calculateTotals(lists: CoverageLists): CoverageTotals {
  const totalRequired =
    lists.fullCoverage.length +
    lists.partialCoverage.length +
    lists.noCoverage.length +
    lists.notApplicable.length +
    lists.rejectedEvidence.length;

  return {
    totalRequired,
    // Rejected controls still count towards the denominator
    effectiveTotal: totalRequired - lists.notApplicable.length,
    fullCount: lists.fullCoverage.length,
    partialCount: lists.partialCoverage.length,
    noCoverageCount: lists.noCoverage.length,
  };
}

/**
 * Derives every aggregate from the five lists
 */
export function summarizeCoverage(lists: CoverageLists): CoverageSummary {
  const totals = calculateTotals(lists);
  const evidenced = [...lists.fullCoverage, ...lists.partialCoverage];
  const machineVerifiableCount = evidenced.filter(e => e.isMachineVerifiable).length;

  let coveragePercentage = 0;
  let qualityScore = 0;
  if (totals.effectiveTotal > 0) {
    coveragePercentage = roundPercentage(
      ((totals.fullCount + 0.5 * totals.partialCount) / totals.effectiveTotal) * 100
    );
    const scoreSum = evidenced.reduce((sum, e) => sum + e.bestEffectiveScore, 0);
    qualityScore = roundPercentage((scoreSum / (totals.effectiveTotal * 100)) * 100);
  }

  return {
    coveragePercentage,
    qualityScore,
    machineVerifiableCount,
    humanCuratedCount: evidenced.length - machineVerifiableCount,
    notApplicableCount: lists.notApplicable.length,
    rejectedEvidenceCount: lists.rejectedEvidence.length,
  };
}

/**
 * Classifies each applicable control against the evidence map. Evidence for
 * controls outside the applicable set is ignored.
 */
export function computeCoverage(
  applicableControls: readonly Control[],
  evidenceMap: EvidenceMap,
  options: CoverageOptions = {}
): AssessmentCoverage {
  const maxTier = options.machineVerifiableMaxTier ?? DEFAULT_MACHINE_VERIFIABLE_MAX_TIER;
  const fullCoverage: AssessedCoverageEntry[] = [];
  const partialCoverage: AssessedCoverageEntry[] = [];
  const noCoverage: AssessedCoverageEntry[] = [];

  for (const control of applicableControls) {
    const entry = classifyControl(control.id, evidenceMap.get(control.id) ?? [], maxTier);
    switch (entry.status) {
      case 'full_coverage':
        fullCoverage.push(entry);
        break;
      case 'partial_coverage':
        partialCoverage.push(entry);
        break;
      case 'no_coverage':
        noCoverage.push(entry);
        break;
    }
  }

  return recomputeCoverage({
    fullCoverage,
    partialCoverage,
    noCoverage,
    notApplicable: [],
    rejectedEvidence: [],
    notes: options.notes ?? [],
  });
}

/**
 * Rebuilds the summary from the lists; the old summary is never consulted
 */
export function recomputeCoverage(
  coverage: CoverageLists & { readonly notes?: readonly string[] }
): AssessmentCoverage {
  return {
    fullCoverage: coverage.fullCoverage,
    partialCoverage: coverage.partialCoverage,
    noCoverage: coverage.noCoverage,
    notApplicable: coverage.notApplicable,
    rejectedEvidence: coverage.rejectedEvidence,
    summary: summarizeCoverage(coverage),
    notes: coverage.notes ?? [],
  };
}

export function allEntries(lists: CoverageLists): ControlCoverageEntry[] {
  return [
    ...lists.fullCoverage,
    ...lists.partialCoverage,
    ...lists.noCoverage,
    ...lists.notApplicable,
    ...lists.rejectedEvidence,
  ];
}

export function findEntry(lists: CoverageLists, controlId: string): ControlCoverageEntry | undefined {
  return allEntries(lists).find(entry => entry.controlId === controlId);
}

/**
 * Throws CorruptedStateError unless every control sits in exactly one list
 * and in the list matching its status
 */
export function assertPartition(lists: CoverageLists, expectedControlIds?: Iterable<string>): void {
  const violations: string[] = [];
  const seen = new Map<string, string>();

  const check = (listName: string, expectedStatus: string, entries: readonly ControlCoverageEntry[]): void => {
    for (const entry of entries) {
      if (entry.status !== expectedStatus) {
        violations.push(`${entry.controlId} has status ${entry.status} in ${listName}`);
      }
      const previous = seen.get(entry.controlId);
      if (previous !== undefined) {
        violations.push(`${entry.controlId} appears in both ${previous} and ${listName}`);
      } else {
        seen.set(entry.controlId, listName);
      }
    }
  };

  check('fullCoverage', 'full_coverage', lists.fullCoverage);
  check('partialCoverage', 'partial_coverage', lists.partialCoverage);
  check('noCoverage', 'no_coverage', lists.noCoverage);
  check('notApplicable', 'not_applicable', lists.notApplicable);
  check('rejectedEvidence', 'rejected_evidence', lists.rejectedEvidence);

  if (expectedControlIds !== undefined) {
    const expected = new Set(expectedControlIds);
    for (const id of expected) {
      if (!seen.has(id)) violations.push(`${id} is missing from every list`);
    }
    for (const id of seen.keys()) {
      if (!expected.has(id)) violations.push(`${id} is not a required control`);
    }
  }

  if (violations.length > 0) {
    throw new CorruptedStateError('Coverage lists do not partition the required controls', violations);
  }
}
