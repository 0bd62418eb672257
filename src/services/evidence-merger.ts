/**
 * Evidence Merger
 *
 * Accumulates extractor judgements per control and validates raw extractor
 * output before it reaches the calculator.
 */

import { z } from 'zod';
import { Control } from '../types/controls.js';
import { AssessmentCoverage } from '../types/coverage.js';
import {
  EvidenceJudgement,
  EvidenceMap,
  ExtractionErrorKind,
  ExtractionOutcome,
  RejectedExtractionEntry,
  SubmittedDocument,
} from '../types/evidence.js';
import { CollaboratorTimeoutError, describeError } from '../types/error-handling.js';
import { IEvidenceExtractor } from '../interfaces/collaborators.js';
import { withTimeout } from './error-handling-service.js';
import { allEntries } from './coverage-calculator.js';

/**
 * Appends each judgement to its control's list. Repeated evidence is
 * additive; the input map is left untouched.
 */
export function mergeEvidence(
  evidenceMap: EvidenceMap,
  newJudgements: readonly EvidenceJudgement[]
): EvidenceMap {
  const merged = new Map<string, readonly EvidenceJudgement[]>(evidenceMap);
  for (const judgement of newJudgements) {
    merged.set(judgement.controlId, [...(merged.get(judgement.controlId) ?? []), judgement]);
  }
  return merged;
}

/**
 * Rebuilds an evidence map from the entries of a coverage
 */
export function evidenceMapFromCoverage(
  coverage: AssessmentCoverage,
  options: { includeNotApplicable?: boolean } = {}
): EvidenceMap {
  const map = new Map<string, readonly EvidenceJudgement[]>();
  for (const entry of allEntries(coverage)) {
    if (entry.status === 'not_applicable' && !options.includeNotApplicable) continue;
    if (entry.evidence.length > 0) {
      map.set(entry.controlId, [...entry.evidence]);
    }
  }
  return map;
}

export function countJudgements(evidenceMap: EvidenceMap): number {
  let total = 0;
  for (const judgements of evidenceMap.values()) total += judgements.length;
  return total;
}

const ExtractedControlSchema = z.object({
  coverageLevel: z.enum(['full', 'partial', 'mentions']),
  strengthTier: z.union([
    z.literal(1),
    z.literal(2),
    z.literal(3),
    z.literal(4),
    z.literal(5),
    z.literal(6),
    z.literal(7),
  ]),
  evidenceTypeCategory: z.string().optional(),
  summary: z.string().default(''),
  excerpt: z.string().default(''),
});

const ExtractorResponseSchema = z.record(z.string(), z.unknown());

export interface ExtractionOptions {
  timeoutMs: number;
}

/**
 * Validates raw extractor output against the candidate set. Entries that do
 * not validate or name a control outside the set are reported, not thrown.
 */
export function parseExtractorResponse(
  raw: unknown,
  sourceDocument: string,
  candidates: readonly Control[]
):
  | { success: true; judgements: EvidenceJudgement[]; rejectedEntries: RejectedExtractionEntry[] }
  | { success: false; message: string } {
  const parsed = ExtractorResponseSchema.safeParse(raw);
  if (!parsed.success) {
    return { success: false, message: 'Extractor response is not an object keyed by control id' };
  }

  const candidateIds = new Set(candidates.map(c => c.id));
  const judgements: EvidenceJudgement[] = [];
  const rejectedEntries: RejectedExtractionEntry[] = [];

  for (const [controlId, value] of Object.entries(parsed.data)) {
    if (!candidateIds.has(controlId)) {
      rejectedEntries.push({ controlId, reason: 'Control is not a candidate for this assessment' });
      continue;
    }
    const entry = ExtractedControlSchema.safeParse(value);
    if (!entry.success) {
      rejectedEntries.push({
        controlId,
        reason: entry.error.issues.map(issue => `${issue.path.join('.') || 'entry'}: ${issue.message}`).join('; '),
      });
      continue;
    }
    judgements.push({
      controlId,
      sourceDocument,
      coverageLevel: entry.data.coverageLevel,
      strengthTier: entry.data.strengthTier,
      summary: entry.data.summary,
      excerpt: entry.data.excerpt,
      ...(entry.data.evidenceTypeCategory !== undefined ? { evidenceType: entry.data.evidenceTypeCategory } : {}),
    });
  }

  return { success: true, judgements, rejectedEntries };
}

/**
 * Runs the extractor for one document. A failed document yields no
 * judgements and a typed error.
 */
export async function extractDocumentEvidence(
  extractor: IEvidenceExtractor,
  document: SubmittedDocument,
  candidates: readonly Control[],
  options: ExtractionOptions
): Promise<ExtractionOutcome> {
  let raw: unknown;
  try {
    raw = await withTimeout(
      () => extractor.extractEvidence(document, document.hints ?? [], candidates),
      options.timeoutMs,
      `Evidence extraction for ${document.name}`
    );
  } catch (error) {
    const kind: ExtractionErrorKind = error instanceof CollaboratorTimeoutError ? 'timeout' : 'collaborator_failed';
    return {
      success: false,
      sourceDocument: document.name,
      error: { kind, sourceDocument: document.name, message: describeError(error) },
    };
  }

  const result = parseExtractorResponse(raw, document.name, candidates);
  if (!result.success) {
    return {
      success: false,
      sourceDocument: document.name,
      error: { kind: 'malformed_response', sourceDocument: document.name, message: result.message },
    };
  }

  return {
    success: true,
    sourceDocument: document.name,
    judgements: result.judgements,
    rejectedEntries: result.rejectedEntries,
  };
}
