/**
 * Control Catalog Service
 *
 * Loads the bundled control catalog and answers profile baseline queries.
 * Profiles are cumulative: profile 2 requires every profile 1 control plus
 * its own additions, and so on.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  CONTROL_FAMILIES,
  ControlFamily,
  ImpactLevel,
  SecurityProfile,
} from '../types/common.js';
import { CatalogControlRecord, Control, SystemCategorization } from '../types/controls.js';
import { CorruptedStateError, NotFoundError, ValidationError } from '../types/error-handling.js';

const CatalogFileSchema = z.object({
  families: z.record(z.string(), z.string()),
  controls: z.array(
    z.object({
      id: z.string().regex(/^[A-Z]{2}-\d+$/),
      name: z.string().min(1),
      minProfile: z.union([z.literal(1), z.literal(2), z.literal(3)]),
    })
  ),
});

export interface ControlCatalogData {
  families: Partial<Record<ControlFamily, string>>;
  controls: CatalogControlRecord[];
}

const DEFAULT_CATALOG_URL = new URL('../data/control-catalog.json', import.meta.url);

/**
 * Reads and validates the catalog file
 */
export function loadCatalogFile(fileUrl: URL = DEFAULT_CATALOG_URL): ControlCatalogData {
  const raw: unknown = JSON.parse(readFileSync(fileUrl, 'utf-8'));
  const parsed = CatalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CorruptedStateError(
      `Control catalog at ${fileUrl.pathname} is invalid`,
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const families: Partial<Record<ControlFamily, string>> = {};
  for (const [code, name] of Object.entries(parsed.data.families)) {
    const family = toControlFamily(code);
    if (family) families[family] = name;
  }
  return { families, controls: parsed.data.controls };
}

export function toControlFamily(code: string): ControlFamily | undefined {
  return CONTROL_FAMILIES.find(f => f === code.toUpperCase());
}

/**
 * Family code for a control id: the prefix before the dash, else the first
 * two characters
 */
export function getControlFamilyForId(controlId: string): string {
  return controlId.includes('-') ? controlId.split('-')[0] : controlId.slice(0, 2);
}

export function isSecurityProfile(value: number): value is SecurityProfile {
  return value === 1 || value === 2 || value === 3;
}

/**
 * Highest impact across confidentiality, integrity and availability decides
 * the profile
 */
export function determineProfile(categorization: SystemCategorization): SecurityProfile {
  const levels = [categorization.confidentiality, categorization.integrity, categorization.availability];
  if (levels.includes('high')) return 3;
  if (levels.includes('moderate')) return 2;
  return 1;
}

const HIGH_IMPACT_INDICATORS = [
  'life safety',
  'national security',
  'critical infrastructure',
  'secret',
  'top secret',
  'protected c',
];

const MODERATE_IMPACT_INDICATORS = [
  'protected b',
  'financial',
  'personal information',
  'privacy',
  'business critical',
];

/**
 * Rough impact level from free-text factors describing the system
 */
export function calculateImpactLevel(factors: string[]): ImpactLevel {
  const lowered = factors.map(f => f.toLowerCase());
  if (HIGH_IMPACT_INDICATORS.some(indicator => lowered.some(f => f.includes(indicator)))) {
    return 'high';
  }
  if (MODERATE_IMPACT_INDICATORS.some(indicator => lowered.some(f => f.includes(indicator)))) {
    return 'moderate';
  }
  return 'low';
}

export class ControlCatalogService {
  private readonly controls: Map<string, Control> = new Map();
  private readonly familyNames: Partial<Record<ControlFamily, string>>;

  constructor(data: ControlCatalogData = loadCatalogFile()) {
    this.familyNames = data.families;
    for (const record of data.controls) {
      const family = toControlFamily(getControlFamilyForId(record.id));
      if (!family) {
        throw new CorruptedStateError(`Control ${record.id} has an unknown family`, [record.id]);
      }
      if (this.controls.has(record.id)) {
        throw new CorruptedStateError(`Control ${record.id} is listed twice in the catalog`, [record.id]);
      }
      this.controls.set(record.id, Object.freeze({
        id: record.id,
        family,
        name: record.name,
        minProfile: record.minProfile,
      }));
    }
  }

  /**
   * Controls required for a profile, in catalog order
   */
  getBaselineControls(profile: number): Control[] {
    if (!isSecurityProfile(profile)) {
      throw new ValidationError(`Unknown security profile: ${profile}. Must be 1, 2 or 3`, 'INVALID_INPUT', {
        profile,
      });
    }
    return [...this.controls.values()].filter(control => control.minProfile <= profile);
  }

  getControl(controlId: string): Control {
    const control = this.controls.get(controlId);
    if (!control) {
      throw new NotFoundError(`Control not found in catalog: ${controlId}`, { controlId });
    }
    return control;
  }

  findControl(controlId: string): Control | undefined {
    return this.controls.get(controlId);
  }

  getFamilyName(family: ControlFamily): string {
    return this.familyNames[family] ?? family;
  }

  get size(): number {
    return this.controls.size;
  }
}
