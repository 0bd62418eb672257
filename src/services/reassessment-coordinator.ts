/**
 * Reassessment Coordinator
 *
 * Folds newly extracted evidence into a completed coverage. Controls that
 * are not applicable take no part; prior exclusions and rejections are laid
 * back over the fresh classification with their override metadata intact.
 */

import { EvidenceJudgement } from '../types/evidence.js';
import {
  AssessedCoverageEntry,
  AssessmentCoverage,
  RejectedEvidenceEntry,
} from '../types/coverage.js';
import {
  classifyControl,
  CoverageOptions,
  DEFAULT_MACHINE_VERIFIABLE_MAX_TIER,
  recomputeCoverage,
} from './coverage-calculator.js';
import { evidenceMapFromCoverage, mergeEvidence } from './evidence-merger.js';

export interface ReassessmentResult {
  coverage: AssessmentCoverage;
  /** The prior coverage, as it was before this run */
  historySnapshot: AssessmentCoverage;
  /** Judgements dropped because their control is not a candidate */
  ignoredJudgements: number;
}

/**
 * Controls that new evidence may apply to, in list order
 */
export function candidateControlIds(coverage: AssessmentCoverage): string[] {
  return [
    ...coverage.fullCoverage,
    ...coverage.partialCoverage,
    ...coverage.noCoverage,
    ...coverage.rejectedEvidence,
  ].map(entry => entry.controlId);
}

export function reassess(
  priorCoverage: AssessmentCoverage,
  newJudgements: readonly EvidenceJudgement[],
  options: CoverageOptions = {}
): ReassessmentResult {
  const maxTier = options.machineVerifiableMaxTier ?? DEFAULT_MACHINE_VERIFIABLE_MAX_TIER;
  const candidates = new Set(candidateControlIds(priorCoverage));
  const accepted = newJudgements.filter(j => candidates.has(j.controlId));
  const evidenceMap = mergeEvidence(evidenceMapFromCoverage(priorCoverage), accepted);

  const fullCoverage: AssessedCoverageEntry[] = [];
  const partialCoverage: AssessedCoverageEntry[] = [];
  const noCoverage: AssessedCoverageEntry[] = [];
  const assessedIds = [...priorCoverage.fullCoverage, ...priorCoverage.partialCoverage, ...priorCoverage.noCoverage]
    .map(entry => entry.controlId);

  for (const controlId of assessedIds) {
    const entry = classifyControl(controlId, evidenceMap.get(controlId) ?? [], maxTier);
    if (entry.status === 'full_coverage') fullCoverage.push(entry);
    else if (entry.status === 'partial_coverage') partialCoverage.push(entry);
    else noCoverage.push(entry);
  }

  // Rejections keep their status and reason; only the evidence they hold grows
  const rejectedEvidence = priorCoverage.rejectedEvidence.map((prior): RejectedEvidenceEntry => {
    const refreshed = classifyControl(prior.controlId, evidenceMap.get(prior.controlId) ?? [], maxTier);
    return {
      controlId: prior.controlId,
      status: 'rejected_evidence',
      evidence: refreshed.evidence,
      bestStrengthTier: refreshed.bestStrengthTier,
      bestEffectiveScore: refreshed.bestEffectiveScore,
      isMachineVerifiable: refreshed.isMachineVerifiable,
      rejection: prior.rejection,
    };
  });

  const coverage = recomputeCoverage({
    fullCoverage,
    partialCoverage,
    noCoverage,
    notApplicable: priorCoverage.notApplicable,
    rejectedEvidence,
    notes: options.notes ?? priorCoverage.notes,
  });

  return {
    coverage,
    historySnapshot: priorCoverage,
    ignoredJudgements: newJudgements.length - accepted.length,
  };
}
