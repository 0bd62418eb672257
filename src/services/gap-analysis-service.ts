/**
 * Gap Analysis Service
 *
 * Turns the uncovered, partially covered and rejected controls of a coverage
 * into prioritised gaps and recommendation lines.
 */

import {
  ComplianceStatus,
  ControlFamily,
  EffortEstimate,
  GapSeverity,
  GapType,
  RemediationTimeline,
} from '../types/common.js';
import { Control } from '../types/controls.js';
import { AssessmentCoverage, ControlCoverageEntry } from '../types/coverage.js';
import { Gap, GapAnalysisResult } from '../types/assessment.js';
import { ControlCatalogService } from './control-catalog-service.js';

export const CRITICAL_FAMILIES: readonly ControlFamily[] = ['AC', 'IA', 'AU', 'SC'];

const HIGH_SENSITIVITY = ['high', 'protected c', 'secret', 'top secret'];

const RAISE: Record<GapSeverity, GapSeverity> = {
  critical: 'critical',
  high: 'critical',
  medium: 'high',
  low: 'medium',
};

const CATEGORIZATION: Record<GapSeverity, { timeline: RemediationTimeline; priority: Gap['priority'] }> = {
  critical: { timeline: 'immediate', priority: 1 },
  high: { timeline: 'short_term', priority: 2 },
  medium: { timeline: 'medium_term', priority: 3 },
  low: { timeline: 'long_term', priority: 4 },
};

const EFFORT: Record<GapType, EffortEstimate> = {
  evidence: 'low',
  both: 'high',
  implementation: 'medium',
};

/**
 * Critical families raise the base severity one step. Otherwise highly
 * sensitive data does.
 */
export function calculateGapSeverity(
  family: ControlFamily,
  base: GapSeverity,
  dataSensitivity: string = ''
): GapSeverity {
  if (CRITICAL_FAMILIES.includes(family) && (base === 'high' || base === 'medium')) {
    return RAISE[base];
  }
  if (HIGH_SENSITIVITY.includes(dataSensitivity.trim().toLowerCase())) {
    return RAISE[base];
  }
  return base;
}

export function categorizeGap(severity: GapSeverity, gapType: GapType): {
  timeline: RemediationTimeline;
  priority: Gap['priority'];
  effort: EffortEstimate;
} {
  return { ...CATEGORIZATION[severity], effort: EFFORT[gapType] };
}

export function complianceStatus(percentage: number): ComplianceStatus {
  if (percentage >= 90) return 'excellent';
  if (percentage >= 75) return 'good';
  if (percentage >= 60) return 'acceptable';
  if (percentage >= 40) return 'needs_improvement';
  return 'critical';
}

export function aggregateGapsByFamily(gaps: readonly Gap[]): Map<ControlFamily, Gap[]> {
  const grouped = new Map<ControlFamily, Gap[]>();
  for (const gap of gaps) {
    const group = grouped.get(gap.family);
    if (group) {
      group.push(gap);
    } else {
      grouped.set(gap.family, [gap]);
    }
  }
  return grouped;
}

function buildGap(control: Control, entry: ControlCoverageEntry, dataSensitivity: string): Gap | undefined {
  let gapType: GapType;
  let base: GapSeverity;
  let description: string;
  let recommendation: string;

  switch (entry.status) {
    case 'no_coverage':
      gapType = 'both';
      base = 'high';
      description = `No evidence found for ${control.id} (${control.name})`;
      recommendation = `Implement ${control.name} and provide evidence of its operation`;
      break;
    case 'partial_coverage':
      gapType = 'implementation';
      base = 'medium';
      description = `Evidence only partially addresses ${control.id} (${control.name})`;
      recommendation = `Complete the implementation of ${control.name} and document the remaining requirements`;
      break;
    case 'rejected_evidence':
      gapType = 'evidence';
      base = 'medium';
      description = `Evidence for ${control.id} (${control.name}) was rejected: ${entry.rejection.reason}`;
      recommendation = `Provide replacement evidence for ${control.name}`;
      break;
    default:
      return undefined;
  }

  const severity = calculateGapSeverity(control.family, base, dataSensitivity);
  return {
    controlId: control.id,
    controlName: control.name,
    family: control.family,
    status: entry.status,
    gapType,
    severity,
    description,
    recommendation,
    ...categorizeGap(severity, gapType),
  };
}

/**
 * Prioritised recommendation lines: one per gap, then an evidence
 * strengthening line when human-curated evidence dominates, then one per
 * degradation note
 */
export function generateRecommendations(coverage: AssessmentCoverage, gaps: readonly Gap[]): string[] {
  const lines = gaps.map(gap => `[P${gap.priority}] ${gap.controlId}: ${gap.recommendation}`);

  const { humanCuratedCount, machineVerifiableCount } = coverage.summary;
  if (humanCuratedCount > machineVerifiableCount) {
    lines.push(
      `Strengthen evidence: ${humanCuratedCount} controls rely on human-curated evidence against ` +
        `${machineVerifiableCount} machine-verifiable; add configuration exports, logs or automated test results`
    );
  }

  for (const note of coverage.notes) {
    lines.push(`Review degraded input: ${note}`);
  }
  return lines;
}

export interface GapAnalysisOptions {
  /** Data classification of the system, e.g. "Protected B" */
  dataSensitivity?: string;
}

export class GapAnalysisService {
  constructor(private readonly catalog: ControlCatalogService) {}

  identifyGaps(coverage: AssessmentCoverage, options: GapAnalysisOptions = {}): Gap[] {
    const sensitivity = options.dataSensitivity ?? '';
    const gaps: Gap[] = [];
    for (const entry of [...coverage.noCoverage, ...coverage.partialCoverage, ...coverage.rejectedEvidence]) {
      const gap = buildGap(this.catalog.getControl(entry.controlId), entry, sensitivity);
      if (gap) gaps.push(gap);
    }
    // ties keep list order
    return gaps.sort((a, b) => a.priority - b.priority);
  }

  analyze(coverage: AssessmentCoverage, options: GapAnalysisOptions = {}): GapAnalysisResult {
    const gaps = this.identifyGaps(coverage, options);
    const bySeverity: Record<GapSeverity, number> = { critical: 0, high: 0, medium: 0, low: 0 };
    for (const gap of gaps) bySeverity[gap.severity]++;

    return {
      totalGaps: gaps.length,
      bySeverity,
      gaps,
      complianceStatus: complianceStatus(coverage.summary.coveragePercentage),
      recommendations: generateRecommendations(coverage, gaps),
    };
  }
}
