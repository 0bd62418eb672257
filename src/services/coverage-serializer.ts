/**
 * Coverage wire codec
 *
 * The wire shape is five named arrays, a summary and the notes, with
 * timestamps as ISO strings. Decoding validates everything, rebuilds the
 * tagged entries, recomputes the summary and checks the partition.
 */

import { z } from 'zod';
import {
  AssessedCoverageEntry,
  AssessmentCoverage,
  AssessmentCoverageWire,
  ControlCoverageEntry,
  CoverageEntryWire,
  EvidenceJudgementWire,
  NotApplicableEntry,
  RejectedEvidenceEntry,
} from '../types/coverage.js';
import { EvidenceJudgement } from '../types/evidence.js';
import { CorruptedStateError } from '../types/error-handling.js';
import { StrengthTier } from '../types/common.js';
import {
  DEFAULT_MACHINE_VERIFIABLE_MAX_TIER,
  assertPartition,
  classifyControl,
  recomputeCoverage,
} from './coverage-calculator.js';

// ==================== Encoding ====================

function judgementToWire(judgement: EvidenceJudgement): EvidenceJudgementWire {
  return {
    controlId: judgement.controlId,
    sourceDocument: judgement.sourceDocument,
    coverageLevel: judgement.coverageLevel,
    strengthTier: judgement.strengthTier,
    summary: judgement.summary,
    excerpt: judgement.excerpt,
    ...(judgement.evidenceType !== undefined ? { evidenceType: judgement.evidenceType } : {}),
  };
}

function entryToWire(entry: ControlCoverageEntry): CoverageEntryWire {
  const wire: CoverageEntryWire = {
    controlId: entry.controlId,
    status: entry.status,
    evidence: entry.evidence.map(judgementToWire),
    bestStrengthTier: entry.bestStrengthTier,
    bestEffectiveScore: entry.bestEffectiveScore,
    isMachineVerifiable: entry.isMachineVerifiable,
  };

  if (entry.status === 'not_applicable') {
    wire.reason = entry.override.reason;
    wire.timestamp = entry.override.timestamp.toISOString();
    wire.autoDetermined = entry.override.autoDetermined;
    if (!entry.override.autoDetermined) {
      wire.originStatus = entry.override.originStatus;
    }
  } else if (entry.status === 'rejected_evidence') {
    wire.reason = entry.rejection.reason;
    wire.timestamp = entry.rejection.timestamp.toISOString();
    wire.rejectedFrom = entry.rejection.rejectedFrom;
  }
  return wire;
}

export function serializeCoverage(coverage: AssessmentCoverage): AssessmentCoverageWire {
  return {
    fullCoverage: coverage.fullCoverage.map(entryToWire),
    partialCoverage: coverage.partialCoverage.map(entryToWire),
    noCoverage: coverage.noCoverage.map(entryToWire),
    notApplicable: coverage.notApplicable.map(entryToWire),
    rejectedEvidence: coverage.rejectedEvidence.map(entryToWire),
    summary: { ...coverage.summary },
    notes: [...coverage.notes],
  };
}

// ==================== Decoding ====================

const strengthTierSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
  z.literal(6),
  z.literal(7),
]);

const judgementSchema = z.object({
  controlId: z.string().min(1),
  sourceDocument: z.string(),
  coverageLevel: z.enum(['full', 'partial', 'mentions']),
  strengthTier: strengthTierSchema,
  summary: z.string(),
  excerpt: z.string(),
  evidenceType: z.string().optional(),
});

const entrySchema = z.object({
  controlId: z.string().min(1),
  status: z.enum(['full_coverage', 'partial_coverage', 'no_coverage', 'not_applicable', 'rejected_evidence']),
  evidence: z.array(judgementSchema).default([]),
  // Derived from the evidence on decode
  bestStrengthTier: strengthTierSchema.nullable().optional(),
  bestEffectiveScore: z.number().min(0).max(100).optional(),
  isMachineVerifiable: z.boolean().optional(),
  reason: z.string().optional(),
  timestamp: z.string().datetime({ offset: true }).optional(),
  autoDetermined: z.boolean().optional(),
  originStatus: z.enum(['full_coverage', 'partial_coverage', 'no_coverage', 'rejected_evidence']).optional(),
  rejectedFrom: z.enum(['full_coverage', 'partial_coverage']).optional(),
});

const coverageSchema = z.object({
  fullCoverage: z.array(entrySchema),
  partialCoverage: z.array(entrySchema),
  noCoverage: z.array(entrySchema),
  notApplicable: z.array(entrySchema),
  rejectedEvidence: z.array(entrySchema),
  notes: z.array(z.string()).default([]),
});

type EntryInput = z.infer<typeof entrySchema>;

export interface ParseCoverageOptions {
  /** Weakest tier still counted as machine-verifiable */
  machineVerifiableMaxTier?: StrengthTier;
}

function baseFromWire(entry: EntryInput, maxTier: StrengthTier) {
  const foreign = entry.evidence.find(judgement => judgement.controlId !== entry.controlId);
  if (foreign) {
    throw new CorruptedStateError(
      `Entry ${entry.controlId} holds evidence for control ${foreign.controlId}`,
      [entry.controlId]
    );
  }
  const derived = classifyControl(entry.controlId, entry.evidence, maxTier);
  return {
    controlId: derived.controlId,
    evidence: derived.evidence,
    bestStrengthTier: derived.bestStrengthTier,
    bestEffectiveScore: derived.bestEffectiveScore,
    isMachineVerifiable: derived.isMachineVerifiable,
  };
}

function evidenceMismatch(entry: EntryInput): string | undefined {
  const hasEvidence = entry.evidence.length > 0;
  switch (entry.status) {
    case 'full_coverage':
      return entry.evidence.some(j => j.coverageLevel === 'full') ? undefined : 'has no full-coverage evidence';
    case 'partial_coverage':
    case 'rejected_evidence':
      return hasEvidence ? undefined : 'has no evidence';
    case 'no_coverage':
      return hasEvidence ? 'holds evidence' : undefined;
    case 'not_applicable':
      return undefined;
  }
}

function overrideMetadata(entry: EntryInput, listName: string): { reason: string; timestamp: Date } {
  if (entry.reason === undefined || entry.timestamp === undefined) {
    throw new CorruptedStateError(`Entry ${entry.controlId} in ${listName} has no override reason or timestamp`, [
      entry.controlId,
    ]);
  }
  return { reason: entry.reason, timestamp: new Date(entry.timestamp) };
}

function checkEvidence(entry: EntryInput): void {
  const mismatch = evidenceMismatch(entry);
  if (mismatch !== undefined) {
    throw new CorruptedStateError(`Entry ${entry.controlId} in status ${entry.status} ${mismatch}`, [entry.controlId]);
  }
}

function assessedFromWire(entry: EntryInput, maxTier: StrengthTier): AssessedCoverageEntry {
  if (entry.status !== 'full_coverage' && entry.status !== 'partial_coverage' && entry.status !== 'no_coverage') {
    throw new CorruptedStateError(`Entry ${entry.controlId} has status ${entry.status} in an assessed list`, [
      entry.controlId,
    ]);
  }
  checkEvidence(entry);
  return { ...baseFromWire(entry, maxTier), status: entry.status };
}

function notApplicableFromWire(entry: EntryInput, maxTier: StrengthTier): NotApplicableEntry {
  const { reason, timestamp } = overrideMetadata(entry, 'notApplicable');
  if (entry.autoDetermined === true) {
    return {
      ...baseFromWire(entry, maxTier),
      status: 'not_applicable',
      override: { reason, timestamp, autoDetermined: true },
    };
  }
  const base = baseFromWire(entry, maxTier);
  return {
    ...base,
    status: 'not_applicable',
    // Older records omit the origin of a manual exclusion; it follows the evidence held
    override: {
      reason,
      timestamp,
      autoDetermined: false,
      originStatus: entry.originStatus ?? classifyControl(entry.controlId, base.evidence, maxTier).status,
    },
  };
}

function rejectedFromWire(entry: EntryInput, maxTier: StrengthTier): RejectedEvidenceEntry {
  const { reason, timestamp } = overrideMetadata(entry, 'rejectedEvidence');
  checkEvidence(entry);
  return {
    ...baseFromWire(entry, maxTier),
    status: 'rejected_evidence',
    rejection: { reason, timestamp, rejectedFrom: entry.rejectedFrom ?? 'partial_coverage' },
  };
}

/**
 * Decodes a wire coverage (object or JSON text). Best tier, score and the
 * machine-verifiable flag are derived from each entry's evidence. Anything
 * that does not describe a valid partition throws CorruptedStateError.
 */
export function parseCoverage(
  input: unknown,
  expectedControlIds?: Iterable<string>,
  options: ParseCoverageOptions = {}
): AssessmentCoverage {
  const maxTier = options.machineVerifiableMaxTier ?? DEFAULT_MACHINE_VERIFIABLE_MAX_TIER;
  let raw: unknown = input;
  if (typeof input === 'string') {
    try {
      raw = JSON.parse(input);
    } catch (error) {
      throw new CorruptedStateError(
        `Coverage is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  const parsed = coverageSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CorruptedStateError(
      'Coverage does not match the wire shape',
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const data = parsed.data;
  const coverage = recomputeCoverage({
    fullCoverage: data.fullCoverage.map(entry => assessedFromWire(entry, maxTier)),
    partialCoverage: data.partialCoverage.map(entry => assessedFromWire(entry, maxTier)),
    noCoverage: data.noCoverage.map(entry => assessedFromWire(entry, maxTier)),
    notApplicable: data.notApplicable.map(entry => notApplicableFromWire(entry, maxTier)),
    rejectedEvidence: data.rejectedEvidence.map(entry => rejectedFromWire(entry, maxTier)),
    notes: data.notes,
  });

  assertPartition(coverage, expectedControlIds);
  return coverage;
}
