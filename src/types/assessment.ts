/**
 * Assessment, applicability and gap analysis types
 */

import {
  AssessmentStatus,
  ComplianceStatus,
  ControlFamily,
  CoverageStatus,
  EffortEstimate,
  GapSeverity,
  GapType,
  RemediationTimeline,
  SecurityProfile
} from './common.js';
import { Control } from './controls.js';
import { AssessmentCoverage } from './coverage.js';

/**
 * Classifier verdict for one control
 */
export interface ApplicabilityDecision {
  controlId: string;
  reason: string;
}

/**
 * Outcome of partitioning the required controls
 */
export interface ApplicabilityResolution {
  applicable: Control[];
  notApplicable: ApplicabilityDecision[];
  notes: string[];
  degraded: boolean;
}

/**
 * Identified gap in control implementation or evidence
 */
export interface Gap {
  controlId: string;
  controlName: string;
  family: ControlFamily;
  status: CoverageStatus;
  gapType: GapType;
  severity: GapSeverity;
  description: string;
  recommendation: string;
  timeline: RemediationTimeline;
  priority: 1 | 2 | 3 | 4;
  effort: EffortEstimate;
}

export interface GapAnalysisResult {
  totalGaps: number;
  bySeverity: Record<GapSeverity, number>;
  gaps: Gap[];
  complianceStatus: ComplianceStatus;
  recommendations: string[];
}

/**
 * Persisted state of one assessment
 */
export interface AssessmentRecord {
  assessmentId: string;
  clientId: string;
  projectName: string;
  profile: SecurityProfile;
  status: AssessmentStatus;
  systemContext: string;
  /** Data classification used to weight gap severity, e.g. "Protected B" */
  dataClassification?: string;
  requiredControlIds: string[];
  coverage?: AssessmentCoverage;
  documents: string[];
  gaps: Gap[];
  recommendations: string[];
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Prior coverage kept when a run replaces it
 */
export interface CoverageSnapshot {
  assessmentId: string;
  version: number;
  recordedAt: Date;
  coverage: AssessmentCoverage;
}
