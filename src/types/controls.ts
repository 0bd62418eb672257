/**
 * Control catalog types for the Control Coverage Engine
 */

import { ControlFamily, ImpactLevel, SecurityProfile } from './common.js';

/**
 * Security control reference data, immutable for the life of an assessment
 */
export interface Control {
  readonly id: string;
  readonly family: ControlFamily;
  readonly name: string;
  readonly minProfile: SecurityProfile;
}

/**
 * Row of the bundled catalog file
 */
export interface CatalogControlRecord {
  id: string;
  name: string;
  minProfile: SecurityProfile;
}

/**
 * Confidentiality / integrity / availability categorization of a system
 */
export interface SystemCategorization {
  confidentiality: ImpactLevel;
  integrity: ImpactLevel;
  availability: ImpactLevel;
  dataClassification?: string;
  rationale?: string;
}
