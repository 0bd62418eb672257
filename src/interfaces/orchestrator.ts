/**
 * Assessment Orchestrator interface for the Control Coverage Engine
 */

import {
  AssessmentCoverage,
  AssessmentCoverageWire,
  AssessmentRecord,
  AuditEntry,
  CoverageSnapshot,
  CoverageStatus,
  ExtractionError,
  GapAnalysisResult,
  OverrideAction,
  SubmittedDocument,
  SystemCategorization
} from '../types/index.js';

/**
 * Request to open a new assessment. Either a profile or a categorization
 * to derive it from must be given.
 */
export interface StartAssessmentRequest {
  clientId: string;
  projectName: string;
  systemContext: string;
  profile?: number;
  categorization?: SystemCategorization;
  actor?: string;
}

export interface SubmissionResult {
  assessmentId: string;
  coverage: AssessmentCoverage;
  /** True when the documents were folded into an already completed run */
  reassessed: boolean;
  processedDocuments: string[];
  failedDocuments: ExtractionError[];
  judgementsMerged: number;
  rejectedEntries: number;
}

export interface OverrideResult {
  controlId: string;
  status: CoverageStatus;
  coveragePercentage: number;
  coverage: AssessmentCoverage;
}

/**
 * Assessment Orchestrator interface
 * Drives an assessment from applicability through evidence and overrides
 */
export interface IAssessmentOrchestrator {
  // Lifecycle
  startAssessment(request: StartAssessmentRequest): Promise<AssessmentRecord>;
  submitDocuments(assessmentId: string, documents: SubmittedDocument[], actor?: string): Promise<SubmissionResult>;
  purgeAssessment(assessmentId: string, actor?: string): Promise<void>;

  // Human overrides
  overrideControl(
    assessmentId: string,
    controlId: string,
    action: OverrideAction,
    reason: string | undefined,
    actor: string
  ): Promise<OverrideResult>;

  // Reads
  getAssessment(assessmentId: string): AssessmentRecord;
  getCoverage(assessmentId: string): AssessmentCoverage;
  exportCoverage(assessmentId: string): AssessmentCoverageWire;
  getGapAnalysis(assessmentId: string): GapAnalysisResult;
  getHistory(assessmentId: string): CoverageSnapshot[];
  getAuditTrail(assessmentId: string, controlId?: string): AuditEntry[];
}
