/**
 * Evidence types for the Control Coverage Engine
 */

import { CoverageLevel, StrengthTier } from './common.js';

/**
 * A single judgement, produced by the extraction service, that a document
 * covers a control to some level with some strength
 */
export interface EvidenceJudgement {
  readonly controlId: string;
  readonly sourceDocument: string;
  readonly coverageLevel: CoverageLevel;
  readonly strengthTier: StrengthTier;
  readonly summary: string;
  readonly excerpt: string;
  readonly evidenceType?: string;
}

/**
 * Accumulated judgements keyed by control id
 */
export type EvidenceMap = ReadonlyMap<string, readonly EvidenceJudgement[]>;

/**
 * Document submitted for evidence extraction
 */
export interface SubmittedDocument {
  name: string;
  content: string;
  hints?: string[];
}

/**
 * Reasons an extraction can fail for a document
 */
export type ExtractionErrorKind = 'collaborator_failed' | 'timeout' | 'malformed_response';

export interface ExtractionError {
  kind: ExtractionErrorKind;
  sourceDocument: string;
  message: string;
}

/**
 * Raw entry dropped during validation of extractor output
 */
export interface RejectedExtractionEntry {
  controlId: string;
  reason: string;
}

/**
 * Result of extracting one document
 */
export type ExtractionOutcome =
  | {
      success: true;
      sourceDocument: string;
      judgements: EvidenceJudgement[];
      rejectedEntries: RejectedExtractionEntry[];
    }
  | {
      success: false;
      sourceDocument: string;
      error: ExtractionError;
    };
