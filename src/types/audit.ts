/**
 * Audit trail types for the Control Coverage Engine
 */

import { ActorType, CoverageStatus } from './common.js';

export type CoverageAuditAction =
  | 'assessment_started'
  | 'applicability_degraded'
  | 'evidence_merged'
  | 'extraction_failed'
  | 'override_mark_not_applicable'
  | 'override_reject_evidence'
  | 'override_restore'
  | 'reassessment_completed'
  | 'assessment_purged';

/**
 * Represents an entry in the audit log
 */
export interface AuditEntry {
  id: string;
  timestamp: Date;
  assessmentId: string;
  actor: string;
  actorType: ActorType;
  action: CoverageAuditAction;
  controlId?: string;
  previousStatus?: CoverageStatus;
  newStatus?: CoverageStatus;
  rationale?: string;
  coveragePercentage?: number;
  details?: Record<string, unknown>;
}

/**
 * Parameters for creating an audit entry
 */
export type CreateAuditEntryParams = Omit<AuditEntry, 'id' | 'timestamp'>;
