/**
 * Assessment Orchestrator for the Control Coverage Engine
 * Central coordinator that takes an assessment from applicability through
 * evidence extraction, reassessment and human overrides
 */

import { v4 as uuidv4 } from 'uuid';
import {
  AssessmentCoverage,
  AssessmentCoverageWire,
  AssessmentRecord,
  AuditEntry,
  Control,
  CoverageSnapshot,
  CorruptedStateError,
  DEFAULT_RETRY_CONFIG,
  EvidenceJudgement,
  ExtractionError,
  GapAnalysisResult,
  NotFoundError,
  OverrideAction,
  SecurityProfile,
  SubmittedDocument,
  ValidationError
} from '../types/index.js';
import {
  IApplicabilityClassifier,
  IAssessmentOrchestrator,
  IEvidenceExtractor,
  OverrideResult,
  StartAssessmentRequest,
  SubmissionResult
} from '../interfaces/index.js';
import { IAssessmentRepository } from '../repository/index.js';
import { EngineConfig, DEFAULT_ENGINE_CONFIG } from '../config/engine-config.js';
import { Logger } from '../services/logger.js';
import { AuditTrailService } from '../services/audit-trail-service.js';
import { ControlCatalogService, determineProfile, isSecurityProfile } from '../services/control-catalog-service.js';
import { ApplicabilityResolver, seedCoverage } from '../services/applicability-resolver.js';
import { evidenceMapFromCoverage, extractDocumentEvidence, mergeEvidence } from '../services/evidence-merger.js';
import { assertPartition, computeCoverage, recomputeCoverage } from '../services/coverage-calculator.js';
import { applyOverride, statusOf } from '../services/override-manager.js';
import { candidateControlIds, reassess } from '../services/reassessment-coordinator.js';
import { GapAnalysisService } from '../services/gap-analysis-service.js';
import { serializeCoverage } from '../services/coverage-serializer.js';
import { runWithConcurrency, withRetry } from '../services/error-handling-service.js';

/**
 * Collaborators and shared services the orchestrator works with
 */
export interface AssessmentOrchestratorDependencies {
  repository: IAssessmentRepository;
  classifier: IApplicabilityClassifier;
  extractor: IEvidenceExtractor;
  catalog?: ControlCatalogService;
  auditTrail?: AuditTrailService;
  logger?: Logger;
}

const OVERRIDE_AUDIT_ACTIONS = {
  mark_not_applicable: 'override_mark_not_applicable',
  reject_evidence: 'override_reject_evidence',
  restore: 'override_restore',
} as const;

/**
 * Assessment Orchestrator implementation
 */
export class AssessmentOrchestrator implements IAssessmentOrchestrator {
  private readonly repository: IAssessmentRepository;
  private readonly classifier: IApplicabilityClassifier;
  private readonly extractor: IEvidenceExtractor;
  private readonly catalog: ControlCatalogService;
  private readonly auditTrail: AuditTrailService;
  private readonly gapAnalysis: GapAnalysisService;
  private readonly logger: Logger;
  private readonly config: EngineConfig;

  constructor(dependencies: AssessmentOrchestratorDependencies, config: Partial<EngineConfig> = {}) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };
    this.repository = dependencies.repository;
    this.classifier = dependencies.classifier;
    this.extractor = dependencies.extractor;
    this.catalog = dependencies.catalog ?? new ControlCatalogService();
    this.auditTrail = dependencies.auditTrail ?? new AuditTrailService({ maxInMemoryEntries: this.config.auditMaxEntries });
    this.logger = dependencies.logger ?? new Logger('coverage-engine', this.config.logLevel);
    this.gapAnalysis = new GapAnalysisService(this.catalog);
  }

  // ==================== Lifecycle ====================

  /**
   * Opens an assessment: selects the profile baseline, resolves
   * applicability and stores the seeded coverage
   */
  async startAssessment(request: StartAssessmentRequest): Promise<AssessmentRecord> {
    if (request.clientId.trim() === '' || request.projectName.trim() === '') {
      throw new ValidationError('clientId and projectName are required');
    }
    const profile = this.resolveProfile(request);
    const requiredControls = this.catalog.getBaselineControls(profile);

    const assessmentId = uuidv4();
    const log = this.logger.child(assessmentId);
    const actor = request.actor ?? 'system';

    log.info('Starting assessment', {
      assessmentId,
      action: 'start_assessment',
      metadata: { profile, requiredControls: requiredControls.length },
    });

    const resolver = new ApplicabilityResolver(this.classifier, log, {
      timeoutMs: this.config.collaboratorTimeoutMs,
    });
    const resolution = await resolver.resolve(request.systemContext, requiredControls);
    const coverage = seedCoverage(resolution);
    const now = new Date();

    const record = this.repository.create({
      assessmentId,
      clientId: request.clientId,
      projectName: request.projectName,
      profile,
      status: 'in_progress',
      systemContext: request.systemContext,
      dataClassification: request.categorization?.dataClassification,
      requiredControlIds: requiredControls.map(control => control.id),
      coverage,
      documents: [],
      gaps: [],
      recommendations: [],
      version: 0,
      createdAt: now,
      updatedAt: now,
    });

    this.auditTrail.record({
      assessmentId,
      actor,
      actorType: request.actor ? 'human' : 'system',
      action: 'assessment_started',
      rationale: `Profile ${profile} baseline with ${requiredControls.length} controls`,
      details: {
        profile,
        applicable: resolution.applicable.length,
        notApplicable: resolution.notApplicable.length,
      },
    });
    if (resolution.degraded) {
      this.auditTrail.recordSystemEvent(assessmentId, 'applicability_degraded', resolution.notes.join('; '));
    }

    return record;
  }

  /**
   * Extracts evidence from the documents and folds it into the assessment.
   * The first submission classifies the applicable controls; later ones
   * reassess the completed coverage and keep the replaced one in history.
   */
  async submitDocuments(
    assessmentId: string,
    documents: SubmittedDocument[],
    actor: string = 'system'
  ): Promise<SubmissionResult> {
    if (documents.length === 0) {
      throw new ValidationError('At least one document is required', 'INVALID_INPUT', { assessmentId });
    }
    const snapshot = this.requireRecord(assessmentId);
    const coverageAtStart = this.requireCoverage(snapshot);
    const log = this.logger.child(assessmentId);
    const candidates = this.toControls(candidateControlIds(coverageAtStart));

    const outcomes = await runWithConcurrency(
      documents.map(document => () =>
        extractDocumentEvidence(this.extractor, document, candidates, {
          timeoutMs: this.config.collaboratorTimeoutMs,
        })
      ),
      this.config.extractionConcurrency
    );

    const judgements: EvidenceJudgement[] = [];
    const failedDocuments: ExtractionError[] = [];
    const processedDocuments: string[] = [];
    let rejectedEntries = 0;
    for (const outcome of outcomes) {
      if (outcome.success) {
        judgements.push(...outcome.judgements);
        processedDocuments.push(outcome.sourceDocument);
        rejectedEntries += outcome.rejectedEntries.length;
        if (outcome.rejectedEntries.length > 0) {
          log.debug('Dropped extractor entries', {
            assessmentId,
            metadata: { document: outcome.sourceDocument, rejected: outcome.rejectedEntries },
          });
        }
      } else {
        failedDocuments.push(outcome.error);
        log.warn(`Evidence extraction failed for ${outcome.sourceDocument}: ${outcome.error.message}`, {
          assessmentId,
          action: 'extract_evidence',
          metadata: { kind: outcome.error.kind },
        });
        this.auditTrail.record({
          assessmentId,
          actor: 'evidence-extractor',
          actorType: 'collaborator',
          action: 'extraction_failed',
          rationale: outcome.error.message,
          details: { document: outcome.sourceDocument, kind: outcome.error.kind },
        });
      }
    }
    const failureNotes = failedDocuments.map(
      failure => `Evidence extraction failed for ${failure.sourceDocument}: ${failure.message}`
    );

    return this.repository.withLock(assessmentId, async () => {
      const current = this.requireRecord(assessmentId);
      const prior = this.requireCoverage(current);
      const reassessing = current.status === 'completed';

      let coverage: AssessmentCoverage;
      if (reassessing) {
        coverage = reassess(prior, judgements, {
          machineVerifiableMaxTier: this.config.machineVerifiableMaxTier,
          notes: [...prior.notes, ...failureNotes],
        }).coverage;
      } else {
        const applicable = this.toControls(candidateControlIds(prior));
        const evidenceMap = mergeEvidence(evidenceMapFromCoverage(prior), judgements);
        const classified = computeCoverage(applicable, evidenceMap, {
          machineVerifiableMaxTier: this.config.machineVerifiableMaxTier,
        });
        coverage = recomputeCoverage({
          ...classified,
          notApplicable: prior.notApplicable,
          notes: [...prior.notes, ...failureNotes],
        });
      }

      this.verifyPartition(current, coverage, log);
      const analysis = this.gapAnalysis.analyze(coverage, { dataSensitivity: current.dataClassification });

      if (reassessing) {
        this.repository.appendHistory(assessmentId, {
          assessmentId,
          version: current.version,
          recordedAt: new Date(),
          coverage: prior,
        });
      }

      this.repository.save(
        {
          ...current,
          status: 'completed',
          coverage,
          documents: [...current.documents, ...processedDocuments],
          gaps: analysis.gaps,
          recommendations: analysis.recommendations,
        },
        current.version
      );

      this.auditTrail.record({
        assessmentId,
        actor,
        actorType: actor === 'system' ? 'system' : 'human',
        action: reassessing ? 'reassessment_completed' : 'evidence_merged',
        coveragePercentage: coverage.summary.coveragePercentage,
        details: { documents: processedDocuments, judgements: judgements.length },
      });

      log.info(reassessing ? 'Reassessment completed' : 'Evidence merged', {
        assessmentId,
        action: 'submit_documents',
        metadata: {
          coveragePercentage: coverage.summary.coveragePercentage,
          judgements: judgements.length,
          failedDocuments: failedDocuments.length,
        },
      });

      return {
        assessmentId,
        coverage,
        reassessed: reassessing,
        processedDocuments,
        failedDocuments,
        judgementsMerged: judgements.length,
        rejectedEntries,
      };
    });
  }

  async purgeAssessment(assessmentId: string, actor: string = 'system'): Promise<void> {
    await this.repository.withLock(assessmentId, async () => {
      if (!this.repository.delete(assessmentId)) {
        throw new NotFoundError(`Assessment not found: ${assessmentId}`, { assessmentId });
      }
      this.auditTrail.record({
        assessmentId,
        actor,
        actorType: actor === 'system' ? 'system' : 'human',
        action: 'assessment_purged',
      });
      this.logger.child(assessmentId).info('Assessment purged', { assessmentId, action: 'purge_assessment' });
    });
  }

  // ==================== Human overrides ====================

  /**
   * Applies an override under the assessment lock. A stale write is re-read
   * and retried up to maxConflictRetries times.
   */
  async overrideControl(
    assessmentId: string,
    controlId: string,
    action: OverrideAction,
    reason: string | undefined,
    actor: string
  ): Promise<OverrideResult> {
    const log = this.logger.child(assessmentId);
    const retryConfig = { ...DEFAULT_RETRY_CONFIG, maxAttempts: this.config.maxConflictRetries + 1 };

    return this.repository.withLock(assessmentId, () =>
      withRetry(async attempt => {
        const current = this.requireRecord(assessmentId);
        const prior = this.requireCoverage(current);
        const previousStatus = statusOf(prior, controlId);
        const coverage = applyOverride(prior, controlId, action, reason);
        const status = statusOf(coverage, controlId);
        if (previousStatus === undefined || status === undefined) {
          throw new CorruptedStateError(`Control ${controlId} vanished during ${action}`, [controlId]);
        }

        this.verifyPartition(current, coverage, log);
        const analysis = this.gapAnalysis.analyze(coverage, { dataSensitivity: current.dataClassification });
        this.repository.save(
          { ...current, coverage, gaps: analysis.gaps, recommendations: analysis.recommendations },
          current.version
        );

        const coveragePercentage = coverage.summary.coveragePercentage;
        this.auditTrail.recordOverride({
          assessmentId,
          actor,
          controlId,
          action: OVERRIDE_AUDIT_ACTIONS[action],
          previousStatus,
          newStatus: status,
          rationale: reason,
          coveragePercentage,
        });
        log.info(`Control ${controlId} moved from ${previousStatus} to ${status}`, {
          assessmentId,
          controlId,
          action,
          metadata: { coveragePercentage, attempt },
        });

        return { controlId, status, coveragePercentage, coverage };
      }, retryConfig)
    );
  }

  // ==================== Reads ====================

  getAssessment(assessmentId: string): AssessmentRecord {
    return this.requireRecord(assessmentId);
  }

  getCoverage(assessmentId: string): AssessmentCoverage {
    return this.requireCoverage(this.requireRecord(assessmentId));
  }

  exportCoverage(assessmentId: string): AssessmentCoverageWire {
    return serializeCoverage(this.getCoverage(assessmentId));
  }

  getGapAnalysis(assessmentId: string): GapAnalysisResult {
    const record = this.requireRecord(assessmentId);
    return this.gapAnalysis.analyze(this.requireCoverage(record), { dataSensitivity: record.dataClassification });
  }

  getHistory(assessmentId: string): CoverageSnapshot[] {
    this.requireRecord(assessmentId);
    return this.repository.getHistory(assessmentId);
  }

  getAuditTrail(assessmentId: string, controlId?: string): AuditEntry[] {
    return controlId === undefined
      ? this.auditTrail.getEntriesForAssessment(assessmentId)
      : this.auditTrail.getEntriesForControl(assessmentId, controlId);
  }

  // ==================== Helpers ====================

  private resolveProfile(request: StartAssessmentRequest): SecurityProfile {
    if (request.profile !== undefined) {
      if (!isSecurityProfile(request.profile)) {
        throw new ValidationError(`Unknown security profile: ${request.profile}. Must be 1, 2 or 3`, 'INVALID_INPUT', {
          profile: request.profile,
        });
      }
      return request.profile;
    }
    if (request.categorization) {
      return determineProfile(request.categorization);
    }
    throw new ValidationError('Either a profile or a system categorization is required');
  }

  private requireRecord(assessmentId: string): AssessmentRecord {
    const record = this.repository.get(assessmentId);
    if (!record) {
      throw new NotFoundError(`Assessment not found: ${assessmentId}`, { assessmentId });
    }
    if (record.status === 'failed') {
      throw new CorruptedStateError(`Assessment ${assessmentId} is marked failed and needs manual repair`);
    }
    return record;
  }

  private requireCoverage(record: AssessmentRecord): AssessmentCoverage {
    if (!record.coverage) {
      throw new NotFoundError(`Assessment ${record.assessmentId} has no coverage yet`, {
        assessmentId: record.assessmentId,
      });
    }
    return record.coverage;
  }

  private toControls(controlIds: readonly string[]): Control[] {
    return controlIds.map(id => this.catalog.getControl(id));
  }

  /**
   * A broken partition stops the assessment: it is marked failed and the
   * error propagates
   */
  private verifyPartition(record: AssessmentRecord, coverage: AssessmentCoverage, log: Logger): void {
    try {
      assertPartition(coverage, record.requiredControlIds);
    } catch (error) {
      if (error instanceof CorruptedStateError) {
        log.error(error, { assessmentId: record.assessmentId, metadata: { violations: error.violations } });
        this.repository.save({ ...record, status: 'failed' }, record.version);
      }
      throw error;
    }
  }
}
