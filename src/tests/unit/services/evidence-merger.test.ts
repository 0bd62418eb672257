/**
 * Unit tests for the Evidence Merger
 *
 * Tests:
 * - Additive merging without mutation
 * - Validation of raw extractor output
 * - Per-document failure handling
 */

import { describe, it, expect } from 'vitest';
import {
  countJudgements,
  evidenceMapFromCoverage,
  extractDocumentEvidence,
  mergeEvidence,
  parseExtractorResponse,
} from '../../../services/evidence-merger.js';
import { computeCoverage } from '../../../services/coverage-calculator.js';
import { applyOverride } from '../../../services/override-manager.js';
import { Control, EvidenceJudgement } from '../../../types/index.js';
import { HangingExtractor, ScriptedExtractor, document } from '../../fixtures/collaborators.js';

const candidates: Control[] = [
  { id: 'AC-2', family: 'AC', name: 'Account Management', minProfile: 1 },
  { id: 'IA-2', family: 'IA', name: 'Identification and Authentication', minProfile: 1 },
];

const judgement = (controlId: string, sourceDocument: string): EvidenceJudgement => ({
  controlId,
  sourceDocument,
  coverageLevel: 'partial',
  strengthTier: 3,
  summary: 'summary',
  excerpt: 'excerpt',
});

describe('Evidence Merger', () => {
  describe('mergeEvidence', () => {
    it('appends judgements per control in arrival order', () => {
      const first = mergeEvidence(new Map(), [judgement('AC-2', 'a.pdf'), judgement('IA-2', 'a.pdf')]);
      const second = mergeEvidence(first, [judgement('AC-2', 'b.pdf')]);

      expect(second.get('AC-2')?.map(j => j.sourceDocument)).toEqual(['a.pdf', 'b.pdf']);
      expect(second.get('IA-2')).toHaveLength(1);
      expect(countJudgements(second)).toBe(3);
    });

    it('keeps repeated evidence', () => {
      const repeated = judgement('AC-2', 'a.pdf');
      const merged = mergeEvidence(new Map(), [repeated, repeated]);

      expect(merged.get('AC-2')).toEqual([repeated, repeated]);
    });

    it('leaves the input map untouched', () => {
      const original = mergeEvidence(new Map(), [judgement('AC-2', 'a.pdf')]);
      mergeEvidence(original, [judgement('AC-2', 'b.pdf'), judgement('IA-2', 'b.pdf')]);

      expect(original.get('AC-2')).toHaveLength(1);
      expect(original.has('IA-2')).toBe(false);
    });
  });

  describe('evidenceMapFromCoverage', () => {
    it('skips not-applicable entries unless asked', () => {
      const coverage = applyOverride(
        computeCoverage(candidates, mergeEvidence(new Map(), [judgement('AC-2', 'a.pdf'), judgement('IA-2', 'a.pdf')])),
        'IA-2',
        'mark_not_applicable',
        'no interactive users'
      );

      expect([...evidenceMapFromCoverage(coverage).keys()]).toEqual(['AC-2']);
      expect([...evidenceMapFromCoverage(coverage, { includeNotApplicable: true }).keys()]).toEqual(['AC-2', 'IA-2']);
    });
  });

  describe('parseExtractorResponse', () => {
    it('turns valid entries into judgements', () => {
      const result = parseExtractorResponse(
        {
          'AC-2': {
            coverageLevel: 'full',
            strengthTier: 2,
            evidenceTypeCategory: 'configuration',
            summary: 'Accounts reviewed quarterly',
            excerpt: 'review_interval: 90d',
          },
        },
        'iam-export.json',
        candidates
      );

      expect(result).toEqual({
        success: true,
        judgements: [
          {
            controlId: 'AC-2',
            sourceDocument: 'iam-export.json',
            coverageLevel: 'full',
            strengthTier: 2,
            summary: 'Accounts reviewed quarterly',
            excerpt: 'review_interval: 90d',
            evidenceType: 'configuration',
          },
        ],
        rejectedEntries: [],
      });
    });

    it('drops entries for non-candidate controls and invalid entries', () => {
      const result = parseExtractorResponse(
        {
          'SC-7': { coverageLevel: 'full', strengthTier: 1 },
          'IA-2': { coverageLevel: 'complete', strengthTier: 9 },
        },
        'notes.txt',
        candidates
      );

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.judgements).toEqual([]);
        expect(result.rejectedEntries.map(r => r.controlId)).toEqual(['SC-7', 'IA-2']);
        expect(result.rejectedEntries[0].reason).toBe('Control is not a candidate for this assessment');
      }
    });

    it('rejects a response that is not an object', () => {
      expect(parseExtractorResponse(['AC-2'], 'notes.txt', candidates).success).toBe(false);
      expect(parseExtractorResponse(null, 'notes.txt', candidates).success).toBe(false);
    });
  });

  describe('extractDocumentEvidence', () => {
    it('returns the judgements of a successful extraction', async () => {
      const extractor = new ScriptedExtractor({
        'policy.pdf': { 'IA-2': { coverageLevel: 'partial', strengthTier: 6, summary: 'MFA planned', excerpt: '' } },
      });

      const outcome = await extractDocumentEvidence(extractor, document('policy.pdf'), candidates, { timeoutMs: 1000 });

      expect(outcome.success).toBe(true);
      if (outcome.success) {
        expect(outcome.judgements.map(j => j.controlId)).toEqual(['IA-2']);
      }
      expect(extractor.seenCandidates).toEqual([['AC-2', 'IA-2']]);
    });

    it('reports a collaborator failure without throwing', async () => {
      const extractor = new ScriptedExtractor({ 'policy.pdf': new Error('model overloaded') });

      const outcome = await extractDocumentEvidence(extractor, document('policy.pdf'), candidates, { timeoutMs: 1000 });

      expect(outcome).toEqual({
        success: false,
        sourceDocument: 'policy.pdf',
        error: { kind: 'collaborator_failed', sourceDocument: 'policy.pdf', message: 'model overloaded' },
      });
    });

    it('reports a timeout', async () => {
      const outcome = await extractDocumentEvidence(new HangingExtractor(), document('scan.html'), candidates, {
        timeoutMs: 20,
      });

      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.error.kind).toBe('timeout');
        expect(outcome.error.message).toBe('Evidence extraction for scan.html timed out after 20ms');
      }
    });

    it('reports a malformed response', async () => {
      const extractor = new ScriptedExtractor({ 'policy.pdf': 'not json at all' });

      const outcome = await extractDocumentEvidence(extractor, document('policy.pdf'), candidates, { timeoutMs: 1000 });

      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.error.kind).toBe('malformed_response');
      }
    });
  });
});
