/**
 * Common types and enums used across the Control Coverage Engine
 */

// Control families
export type ControlFamily =
  | 'AC'
  | 'AT'
  | 'AU'
  | 'CA'
  | 'CM'
  | 'CP'
  | 'IA'
  | 'IR'
  | 'MA'
  | 'MP'
  | 'PE'
  | 'PL'
  | 'PS'
  | 'RA'
  | 'SA'
  | 'SC'
  | 'SI';

export const CONTROL_FAMILIES: readonly ControlFamily[] = [
  'AC', 'AT', 'AU', 'CA', 'CM', 'CP', 'IA', 'IR', 'MA',
  'MP', 'PE', 'PL', 'PS', 'RA', 'SA', 'SC', 'SI'
];

// Security profiles: 1 low, 2 moderate, 3 high
export type SecurityProfile = 1 | 2 | 3;

// Impact levels used for system categorization
export type ImpactLevel = 'low' | 'moderate' | 'high';

// How completely one piece of evidence addresses a control
export type CoverageLevel = 'full' | 'partial' | 'mentions';

// 1 strongest (machine-verifiable) .. 7 weakest (narrative)
export type StrengthTier = 1 | 2 | 3 | 4 | 5 | 6 | 7;

// Coverage statuses
export type AssessedStatus = 'full_coverage' | 'partial_coverage' | 'no_coverage';
export type OverrideStatus = 'not_applicable' | 'rejected_evidence';
export type CoverageStatus = AssessedStatus | OverrideStatus;

// Statuses that can only be reached with evidence on record
export type EvidencedStatus = 'full_coverage' | 'partial_coverage';

// Override actions
export type OverrideAction = 'mark_not_applicable' | 'reject_evidence' | 'restore';

// Assessment lifecycle
export type AssessmentStatus = 'created' | 'in_progress' | 'completed' | 'failed';

// Actor types
export type ActorType = 'human' | 'system' | 'collaborator';

// Gap analysis
export type GapSeverity = 'critical' | 'high' | 'medium' | 'low';
export type GapType = 'implementation' | 'evidence' | 'both';
export type RemediationTimeline = 'immediate' | 'short_term' | 'medium_term' | 'long_term';
export type EffortEstimate = 'low' | 'medium' | 'high';
export type ComplianceStatus = 'excellent' | 'good' | 'acceptable' | 'needs_improvement' | 'critical';
