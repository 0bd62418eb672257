/**
 * Coverage state types for the Control Coverage Engine
 *
 * A control's classification is a tagged union on `status`; override
 * metadata only exists on the variants that need it, so a not-applicable
 * entry without its origin or a rejection without `rejectedFrom` cannot be
 * constructed.
 */

import { AssessedStatus, EvidencedStatus, StrengthTier } from './common.js';
import { EvidenceJudgement } from './evidence.js';

interface CoverageEntryBase {
  readonly controlId: string;
  readonly evidence: readonly EvidenceJudgement[];
  /** Tier of the highest scoring judgement, null without evidence */
  readonly bestStrengthTier: StrengthTier | null;
  readonly bestEffectiveScore: number;
  readonly isMachineVerifiable: boolean;
}

export interface AssessedCoverageEntry extends CoverageEntryBase {
  readonly status: AssessedStatus;
}

/**
 * Auto-determined exclusions restore to no_coverage; manual ones restore to
 * the list they came from.
 */
export type NotApplicableOverride =
  | {
      readonly reason: string;
      readonly timestamp: Date;
      readonly autoDetermined: true;
    }
  | {
      readonly reason: string;
      readonly timestamp: Date;
      readonly autoDetermined: false;
      readonly originStatus: AssessedStatus | 'rejected_evidence';
    };

export interface NotApplicableEntry extends CoverageEntryBase {
  readonly status: 'not_applicable';
  readonly override: NotApplicableOverride;
}

export interface EvidenceRejection {
  readonly reason: string;
  readonly timestamp: Date;
  readonly rejectedFrom: EvidencedStatus;
}

export interface RejectedEvidenceEntry extends CoverageEntryBase {
  readonly status: 'rejected_evidence';
  readonly rejection: EvidenceRejection;
}

export type ControlCoverageEntry =
  | AssessedCoverageEntry
  | NotApplicableEntry
  | RejectedEvidenceEntry;

/**
 * Derived aggregates; always rebuilt from the lists
 */
export interface CoverageSummary {
  coveragePercentage: number;
  qualityScore: number;
  machineVerifiableCount: number;
  humanCuratedCount: number;
  notApplicableCount: number;
  rejectedEvidenceCount: number;
}

/**
 * The five disjoint status lists
 */
export interface CoverageLists {
  readonly fullCoverage: readonly AssessedCoverageEntry[];
  readonly partialCoverage: readonly AssessedCoverageEntry[];
  readonly noCoverage: readonly AssessedCoverageEntry[];
  readonly notApplicable: readonly NotApplicableEntry[];
  readonly rejectedEvidence: readonly RejectedEvidenceEntry[];
}

export interface AssessmentCoverage extends CoverageLists {
  readonly summary: CoverageSummary;
  /** Recoverable degradations recorded during the run */
  readonly notes: readonly string[];
}

/**
 * Counts that feed the aggregates, exposed for reporting
 */
export interface CoverageTotals {
  totalRequired: number;
  effectiveTotal: number;
  fullCount: number;
  partialCount: number;
  noCoverageCount: number;
}

// ==================== Wire shape ====================

export interface EvidenceJudgementWire {
  controlId: string;
  sourceDocument: string;
  coverageLevel: string;
  strengthTier: number;
  summary: string;
  excerpt: string;
  evidenceType?: string;
}

export interface CoverageEntryWire {
  controlId: string;
  status: string;
  evidence: EvidenceJudgementWire[];
  bestStrengthTier: number | null;
  bestEffectiveScore: number;
  isMachineVerifiable: boolean;
  reason?: string;
  timestamp?: string;
  autoDetermined?: boolean;
  originStatus?: string;
  rejectedFrom?: string;
}

export interface AssessmentCoverageWire {
  fullCoverage: CoverageEntryWire[];
  partialCoverage: CoverageEntryWire[];
  noCoverage: CoverageEntryWire[];
  notApplicable: CoverageEntryWire[];
  rejectedEvidence: CoverageEntryWire[];
  summary: CoverageSummary;
  notes: string[];
}
