/**
 * Override Manager
 *
 * Human overrides move a single control between lists. The input coverage
 * is never modified: validation happens first, then new lists are built and
 * the summary recomputed.
 */

import { AssessedStatus, CoverageStatus, OverrideAction } from '../types/common.js';
import {
  AssessedCoverageEntry,
  AssessmentCoverage,
  ControlCoverageEntry,
  NotApplicableEntry,
  RejectedEvidenceEntry,
} from '../types/coverage.js';
import { InvalidTransitionError, NotFoundError, ValidationError } from '../types/error-handling.js';
import { findEntry, recomputeCoverage } from './coverage-calculator.js';

export interface OverrideOptions {
  timestamp?: Date;
}

function requireReason(action: OverrideAction, reason: string | undefined): string {
  const trimmed = reason?.trim() ?? '';
  if (trimmed === '') {
    throw new ValidationError(`A reason is required to ${action.replace(/_/g, ' ')}`, 'MISSING_REASON', { action });
  }
  return trimmed;
}

function requireEntry(coverage: AssessmentCoverage, controlId: string, action: OverrideAction): ControlCoverageEntry {
  const entry = findEntry(coverage, controlId);
  if (!entry) {
    throw new NotFoundError(`Control ${controlId} is not part of this assessment`, { controlId, action });
  }
  return entry;
}

/**
 * Status a manually excluded entry returns to. An exclusion taken from the
 * rejected list has no rejection reason left, so it is reclassified from its
 * evidence.
 */
function statusFromEvidence(entry: ControlCoverageEntry): AssessedStatus {
  if (entry.evidence.length === 0) return 'no_coverage';
  return entry.evidence.some(j => j.coverageLevel === 'full') ? 'full_coverage' : 'partial_coverage';
}

function restoredStatus(entry: NotApplicableEntry | RejectedEvidenceEntry): AssessedStatus {
  if (entry.status === 'rejected_evidence') {
    return entry.rejection.rejectedFrom;
  }
  if (entry.override.autoDetermined) {
    return 'no_coverage';
  }
  const origin = entry.override.originStatus;
  return origin === 'rejected_evidence' ? statusFromEvidence(entry) : origin;
}

function baseFields(entry: ControlCoverageEntry) {
  return {
    controlId: entry.controlId,
    evidence: entry.evidence,
    bestStrengthTier: entry.bestStrengthTier,
    bestEffectiveScore: entry.bestEffectiveScore,
    isMachineVerifiable: entry.isMachineVerifiable,
  };
}

function withoutControl(coverage: AssessmentCoverage, controlId: string) {
  return {
    fullCoverage: coverage.fullCoverage.filter(e => e.controlId !== controlId),
    partialCoverage: coverage.partialCoverage.filter(e => e.controlId !== controlId),
    noCoverage: coverage.noCoverage.filter(e => e.controlId !== controlId),
    notApplicable: coverage.notApplicable.filter(e => e.controlId !== controlId),
    rejectedEvidence: coverage.rejectedEvidence.filter(e => e.controlId !== controlId),
    notes: coverage.notes,
  };
}

function placeAssessed(coverage: AssessmentCoverage, entry: AssessedCoverageEntry): AssessmentCoverage {
  const lists = withoutControl(coverage, entry.controlId);
  switch (entry.status) {
    case 'full_coverage':
      return recomputeCoverage({ ...lists, fullCoverage: [...lists.fullCoverage, entry] });
    case 'partial_coverage':
      return recomputeCoverage({ ...lists, partialCoverage: [...lists.partialCoverage, entry] });
    case 'no_coverage':
      return recomputeCoverage({ ...lists, noCoverage: [...lists.noCoverage, entry] });
  }
}

/**
 * Applies one override and returns the recomputed coverage
 */
export function applyOverride(
  coverage: AssessmentCoverage,
  controlId: string,
  action: OverrideAction,
  reason?: string,
  options: OverrideOptions = {}
): AssessmentCoverage {
  const timestamp = options.timestamp ?? new Date();

  if (action === 'restore') {
    const entry = requireEntry(coverage, controlId, action);
    if (entry.status !== 'not_applicable' && entry.status !== 'rejected_evidence') {
      throw new InvalidTransitionError(controlId, entry.status, action);
    }
    return placeAssessed(coverage, { ...baseFields(entry), status: restoredStatus(entry) });
  }

  const validReason = requireReason(action, reason);
  const entry = requireEntry(coverage, controlId, action);
  const lists = withoutControl(coverage, controlId);

  if (action === 'mark_not_applicable') {
    if (entry.status === 'not_applicable') {
      throw new InvalidTransitionError(controlId, entry.status, action);
    }
    const updated: NotApplicableEntry = {
      ...baseFields(entry),
      status: 'not_applicable',
      override: { reason: validReason, timestamp, autoDetermined: false, originStatus: entry.status },
    };
    return recomputeCoverage({ ...lists, notApplicable: [...lists.notApplicable, updated] });
  }

  if (entry.status !== 'full_coverage' && entry.status !== 'partial_coverage') {
    throw new InvalidTransitionError(controlId, entry.status, action);
  }
  const updated: RejectedEvidenceEntry = {
    ...baseFields(entry),
    status: 'rejected_evidence',
    rejection: { reason: validReason, timestamp, rejectedFrom: entry.status },
  };
  return recomputeCoverage({ ...lists, rejectedEvidence: [...lists.rejectedEvidence, updated] });
}

/**
 * Status a control ends up in after an override, for reporting
 */
export function statusOf(coverage: AssessmentCoverage, controlId: string): CoverageStatus | undefined {
  return findEntry(coverage, controlId)?.status;
}
