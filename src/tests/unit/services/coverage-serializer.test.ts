/**
 * Unit tests for the coverage wire codec
 */

import { describe, it, expect } from 'vitest';
import { parseCoverage, serializeCoverage } from '../../../services/coverage-serializer.js';
import { computeCoverage } from '../../../services/coverage-calculator.js';
import { mergeEvidence } from '../../../services/evidence-merger.js';
import { applyOverride } from '../../../services/override-manager.js';
import { AssessmentCoverage, Control, CorruptedStateError } from '../../../types/index.js';

const controls: Control[] = [
  { id: 'AC-2', family: 'AC', name: 'Account Management', minProfile: 1 },
  { id: 'AU-2', family: 'AU', name: 'Auditable Events', minProfile: 1 },
  { id: 'AC-18', family: 'AC', name: 'Wireless Access', minProfile: 1 },
];

const markedAt = new Date('2025-02-10T09:30:00.000Z');
const rejectedAt = new Date('2025-02-11T14:00:00.000Z');

function overriddenCoverage(): AssessmentCoverage {
  const classified = computeCoverage(
    controls,
    mergeEvidence(new Map(), [
      {
        controlId: 'AC-2',
        sourceDocument: 'iam-export.json',
        coverageLevel: 'full',
        strengthTier: 1,
        summary: 'Accounts provisioned through IdP',
        excerpt: 'provisioning: scim',
        evidenceType: 'configuration',
      },
    ])
  );
  const marked = applyOverride(classified, 'AC-18', 'mark_not_applicable', 'no wireless capability', {
    timestamp: markedAt,
  });
  return applyOverride(marked, 'AC-2', 'reject_evidence', 'stale policy doc', { timestamp: rejectedAt });
}

describe('Coverage wire codec', () => {
  it('writes the five arrays, summary and notes with ISO timestamps', () => {
    const wire = serializeCoverage(overriddenCoverage());

    expect(Object.keys(wire)).toEqual([
      'fullCoverage',
      'partialCoverage',
      'noCoverage',
      'notApplicable',
      'rejectedEvidence',
      'summary',
      'notes',
    ]);
    expect(wire.notApplicable[0]).toEqual({
      controlId: 'AC-18',
      status: 'not_applicable',
      evidence: [],
      bestStrengthTier: null,
      bestEffectiveScore: 0,
      isMachineVerifiable: false,
      reason: 'no wireless capability',
      timestamp: '2025-02-10T09:30:00.000Z',
      autoDetermined: false,
      originStatus: 'no_coverage',
    });
    expect(wire.rejectedEvidence[0].rejectedFrom).toBe('full_coverage');
    expect(wire.rejectedEvidence[0].timestamp).toBe('2025-02-11T14:00:00.000Z');
    expect(wire.summary.coveragePercentage).toBe(0);
  });

  it('decodes what it encodes', () => {
    const coverage = overriddenCoverage();

    expect(parseCoverage(JSON.stringify(serializeCoverage(coverage)))).toEqual(coverage);
  });

  it('recomputes the summary instead of trusting the wire', () => {
    const wire = serializeCoverage(overriddenCoverage());
    wire.summary.coveragePercentage = 88;

    expect(parseCoverage(wire).summary.coveragePercentage).toBe(0);
  });

  it('fills in defaults for older records', () => {
    const wire = serializeCoverage(overriddenCoverage());
    delete wire.rejectedEvidence[0].rejectedFrom;
    delete wire.notApplicable[0].originStatus;
    delete wire.notApplicable[0].autoDetermined;

    const coverage = parseCoverage(wire);

    expect(coverage.rejectedEvidence[0].rejection.rejectedFrom).toBe('partial_coverage');
    expect(coverage.notApplicable[0].override).toEqual({
      reason: 'no wireless capability',
      timestamp: markedAt,
      autoDetermined: false,
      originStatus: 'no_coverage',
    });
  });

  it('derives tier, score and machine verification from the evidence', () => {
    const coverage = overriddenCoverage();
    const wire = serializeCoverage(coverage);
    wire.rejectedEvidence[0].bestStrengthTier = 7;
    wire.rejectedEvidence[0].bestEffectiveScore = 3;
    wire.rejectedEvidence[0].isMachineVerifiable = false;

    const decoded = parseCoverage(wire);

    expect(decoded.rejectedEvidence[0].bestStrengthTier).toBe(1);
    expect(decoded.rejectedEvidence[0].bestEffectiveScore).toBe(coverage.rejectedEvidence[0].bestEffectiveScore);
    expect(decoded.rejectedEvidence[0].isMachineVerifiable).toBe(true);
  });

  it('rejects a fully covered entry without evidence', () => {
    const wire = serializeCoverage(overriddenCoverage());
    wire.fullCoverage.push({
      ...wire.noCoverage[0],
      status: 'full_coverage',
      bestStrengthTier: 1,
      bestEffectiveScore: 100,
      isMachineVerifiable: true,
    });
    wire.noCoverage = [];

    expect(() => parseCoverage(wire)).toThrow(CorruptedStateError);
    expect(() => parseCoverage(wire)).toThrow('Entry AU-2 in status full_coverage has no full-coverage evidence');
  });

  it('rejects an uncovered entry that holds evidence', () => {
    const wire = serializeCoverage(overriddenCoverage());
    wire.noCoverage[0].evidence = [{ ...wire.rejectedEvidence[0].evidence[0], controlId: 'AU-2' }];

    expect(() => parseCoverage(wire)).toThrow('Entry AU-2 in status no_coverage holds evidence');
  });

  it('rejects evidence filed under another control', () => {
    const wire = serializeCoverage(overriddenCoverage());
    wire.rejectedEvidence[0].evidence[0].controlId = 'AU-2';

    expect(() => parseCoverage(wire)).toThrow('Entry AC-2 holds evidence for control AU-2');
  });

  it('rejects a control that appears in two lists', () => {
    const wire = serializeCoverage(overriddenCoverage());
    wire.noCoverage.push({ ...wire.noCoverage[0], controlId: 'AC-18' });

    expect(() => parseCoverage(wire)).toThrow(CorruptedStateError);
  });

  it('rejects entries without override metadata', () => {
    const wire = serializeCoverage(overriddenCoverage());
    delete wire.rejectedEvidence[0].reason;

    expect(() => parseCoverage(wire)).toThrow('Entry AC-2 in rejectedEvidence has no override reason or timestamp');
  });

  it('rejects malformed input', () => {
    expect(() => parseCoverage('{not json')).toThrow(CorruptedStateError);
    expect(() => parseCoverage({ fullCoverage: [] })).toThrow('Coverage does not match the wire shape');
  });

  it('checks the partition against the expected controls', () => {
    const wire = serializeCoverage(overriddenCoverage());

    expect(() => parseCoverage(wire, ['AC-2', 'AU-2', 'AC-18'])).not.toThrow();
    expect(() => parseCoverage(wire, ['AC-2', 'AU-2'])).toThrow(CorruptedStateError);
  });
});
