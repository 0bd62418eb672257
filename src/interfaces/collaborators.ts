/**
 * External collaborator interfaces
 *
 * Both collaborators produce natural-language judgements (typically a hosted
 * model behind them). Their answers are untrusted: the engine validates
 * every response before using it.
 */

import { Control } from '../types/controls.js';
import { SubmittedDocument } from '../types/evidence.js';

/**
 * Decides which required controls apply to the system under assessment.
 *
 * Expected shape of the resolved value:
 * `{ applicable: [{ controlId, reason }], notApplicable: [{ controlId, reason }] }`
 */
export interface IApplicabilityClassifier {
  resolveApplicability(systemContext: string, requiredControls: readonly Control[]): Promise<unknown>;
}

/**
 * Reads one document and judges which candidate controls it evidences.
 *
 * Expected shape of the resolved value: an object keyed by control id whose
 * values are `{ coverageLevel, strengthTier, evidenceTypeCategory, summary, excerpt }`.
 */
export interface IEvidenceExtractor {
  extractEvidence(
    document: SubmittedDocument,
    hints: readonly string[],
    candidateControls: readonly Control[]
  ): Promise<unknown>;
}
