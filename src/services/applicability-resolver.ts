/**
 * Applicability Resolver
 *
 * Partitions the required controls into applicable and not-applicable using
 * the classifier. Any classifier trouble fails open: every control stays
 * applicable and the run carries a note.
 */

import { z } from 'zod';
import { Control } from '../types/controls.js';
import { ApplicabilityDecision, ApplicabilityResolution } from '../types/assessment.js';
import { AssessedCoverageEntry, AssessmentCoverage, NotApplicableEntry } from '../types/coverage.js';
import { describeError } from '../types/error-handling.js';
import { IApplicabilityClassifier } from '../interfaces/collaborators.js';
import { withTimeout } from './error-handling-service.js';
import { recomputeCoverage } from './coverage-calculator.js';
import { Logger } from './logger.js';

const DecisionSchema = z.object({
  controlId: z.string().min(1),
  reason: z.string(),
});

const SnakeCaseDecisionSchema = z
  .object({
    control_id: z.string().min(1),
    reason: z.string(),
  })
  .transform(decision => ({ controlId: decision.control_id, reason: decision.reason }));

// notApplicable is the verdict; a response without it carries no answer
const ClassifierResponseSchema = z.union([
  z.object({
    applicable: z.array(DecisionSchema).optional(),
    notApplicable: z.array(DecisionSchema),
  }),
  z
    .object({
      applicable: z.array(SnakeCaseDecisionSchema).optional(),
      not_applicable: z.array(SnakeCaseDecisionSchema),
    })
    .transform(response => ({ applicable: response.applicable, notApplicable: response.not_applicable })),
]);

export const APPLICABILITY_FAILURE_PREFIX = 'Applicability assessment failed';

export interface ApplicabilityResolverConfig {
  timeoutMs: number;
}

const DEFAULT_CONFIG: ApplicabilityResolverConfig = {
  timeoutMs: 60000,
};

export class ApplicabilityResolver {
  private config: ApplicabilityResolverConfig;

  constructor(
    private readonly classifier: IApplicabilityClassifier,
    private readonly logger: Logger,
    config: Partial<ApplicabilityResolverConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async resolve(systemContext: string, requiredControls: readonly Control[]): Promise<ApplicabilityResolution> {
    let raw: unknown;
    try {
      raw = await withTimeout(
        () => this.classifier.resolveApplicability(systemContext, requiredControls),
        this.config.timeoutMs,
        'Applicability classification'
      );
    } catch (error) {
      return this.failOpen(requiredControls, describeError(error));
    }

    const parsed = ClassifierResponseSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map(issue => `${issue.path.join('.') || 'response'}: ${issue.message}`)
        .join('; ');
      return this.failOpen(requiredControls, `malformed classifier response (${detail})`);
    }

    return partitionControls(requiredControls, parsed.data.notApplicable);
  }

  private failOpen(requiredControls: readonly Control[], detail: string): ApplicabilityResolution {
    const note = `${APPLICABILITY_FAILURE_PREFIX}: ${detail}`;
    this.logger.warn(note, { action: 'resolve_applicability', metadata: { controls: requiredControls.length } });
    return {
      applicable: [...requiredControls],
      notApplicable: [],
      notes: [note],
      degraded: true,
    };
  }
}

/**
 * Everything not explicitly excluded is applicable. Exclusions for controls
 * outside the required set are ignored; the first reason for a control wins.
 */
export function partitionControls(
  requiredControls: readonly Control[],
  exclusions: readonly ApplicabilityDecision[]
): ApplicabilityResolution {
  const reasons = new Map<string, string>();
  for (const decision of exclusions) {
    if (!reasons.has(decision.controlId)) reasons.set(decision.controlId, decision.reason);
  }

  const applicable: Control[] = [];
  const notApplicable: ApplicabilityDecision[] = [];
  for (const control of requiredControls) {
    const reason = reasons.get(control.id);
    if (reason === undefined) {
      applicable.push(control);
    } else {
      notApplicable.push({ controlId: control.id, reason });
    }
  }

  return { applicable, notApplicable, notes: [], degraded: false };
}

/**
 * Initial coverage: applicable controls uncovered, exclusions auto-determined
 */
export function seedCoverage(resolution: ApplicabilityResolution, timestamp: Date = new Date()): AssessmentCoverage {
  const noCoverage: AssessedCoverageEntry[] = resolution.applicable.map((control): AssessedCoverageEntry => ({
    controlId: control.id,
    status: 'no_coverage',
    evidence: [],
    bestStrengthTier: null,
    bestEffectiveScore: 0,
    isMachineVerifiable: false,
  }));

  const notApplicable: NotApplicableEntry[] = resolution.notApplicable.map((decision): NotApplicableEntry => ({
    controlId: decision.controlId,
    status: 'not_applicable',
    evidence: [],
    bestStrengthTier: null,
    bestEffectiveScore: 0,
    isMachineVerifiable: false,
    override: { reason: decision.reason, timestamp, autoDetermined: true },
  }));

  return recomputeCoverage({
    fullCoverage: [],
    partialCoverage: [],
    noCoverage,
    notApplicable,
    rejectedEvidence: [],
    notes: resolution.notes,
  });
}
