/**
 * Audit Trail Service for the Control Coverage Engine
 *
 * Records who changed which control and why, so every override and
 * reassessment can be traced after the fact.
 */

import { v4 as uuidv4 } from 'uuid';
import { AuditEntry, CoverageAuditAction, CreateAuditEntryParams } from '../types/audit.js';
import { ActorType, CoverageStatus } from '../types/common.js';

// ==================== Types ====================

/**
 * Configuration for the audit trail service
 */
export interface AuditTrailServiceConfig {
  /** Whether to record entries at all */
  enabled: boolean;
  /** Maximum entries to keep in memory; oldest are dropped first */
  maxInMemoryEntries: number;
}

export interface AuditQuery {
  assessmentId?: string;
  controlId?: string;
  action?: CoverageAuditAction;
  since?: Date;
}

/**
 * Details of a control override for the audit log
 */
export interface OverrideAuditParams {
  assessmentId: string;
  actor: string;
  actorType?: ActorType;
  controlId: string;
  action: 'override_mark_not_applicable' | 'override_reject_evidence' | 'override_restore';
  previousStatus: CoverageStatus;
  newStatus: CoverageStatus;
  rationale?: string;
  coveragePercentage: number;
}

// ==================== Default Configuration ====================

const DEFAULT_CONFIG: AuditTrailServiceConfig = {
  enabled: true,
  maxInMemoryEntries: 10000,
};

const SYSTEM_ACTOR = 'coverage-engine';

// ==================== Audit Trail Service ====================

export class AuditTrailService {
  private config: AuditTrailServiceConfig;
  private entries: AuditEntry[] = [];

  constructor(config: Partial<AuditTrailServiceConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  // ==================== Core Audit Methods ====================

  record(params: CreateAuditEntryParams): AuditEntry {
    const entry: AuditEntry = {
      id: uuidv4(),
      timestamp: new Date(),
      ...params,
    };

    if (this.config.enabled) {
      this.entries.push(entry);
      if (this.entries.length > this.config.maxInMemoryEntries) {
        this.entries = this.entries.slice(-this.config.maxInMemoryEntries);
      }
    }

    return entry;
  }

  recordOverride(params: OverrideAuditParams): AuditEntry {
    return this.record({
      assessmentId: params.assessmentId,
      actor: params.actor,
      actorType: params.actorType ?? 'human',
      action: params.action,
      controlId: params.controlId,
      previousStatus: params.previousStatus,
      newStatus: params.newStatus,
      rationale: params.rationale,
      coveragePercentage: params.coveragePercentage,
    });
  }

  /**
   * Entry written by the engine itself
   */
  recordSystemEvent(
    assessmentId: string,
    action: CoverageAuditAction,
    rationale: string,
    details?: Record<string, unknown>
  ): AuditEntry {
    return this.record({
      assessmentId,
      actor: SYSTEM_ACTOR,
      actorType: 'system',
      action,
      rationale,
      details,
    });
  }

  // ==================== Query Methods ====================

  query(filter: AuditQuery = {}): AuditEntry[] {
    return this.entries.filter(entry =>
      (filter.assessmentId === undefined || entry.assessmentId === filter.assessmentId) &&
      (filter.controlId === undefined || entry.controlId === filter.controlId) &&
      (filter.action === undefined || entry.action === filter.action) &&
      (filter.since === undefined || entry.timestamp >= filter.since)
    );
  }

  getEntriesForAssessment(assessmentId: string): AuditEntry[] {
    return this.query({ assessmentId });
  }

  getEntriesForControl(assessmentId: string, controlId: string): AuditEntry[] {
    return this.query({ assessmentId, controlId });
  }

  get size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
  }
}
