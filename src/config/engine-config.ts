/**
 * Engine configuration
 *
 * Defaults can be overridden per instance with a partial config, or read
 * from the environment with loadEngineConfig().
 */

import { StrengthTier } from '../types/common.js';
import { ValidationError } from '../types/error-handling.js';
import { LogLevel } from '../services/logger.js';

export interface EngineConfig {
  /** Minimum level written by the logger */
  logLevel: LogLevel;
  /** Upper bound for a single classifier or extractor call */
  collaboratorTimeoutMs: number;
  /** Re-read-and-retry attempts for stale writes */
  maxConflictRetries: number;
  /** Documents extracted in parallel within one assessment */
  extractionConcurrency: number;
  /** Weakest tier still considered machine-verifiable */
  machineVerifiableMaxTier: StrengthTier;
  /** Audit entries kept in memory */
  auditMaxEntries: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  logLevel: 'INFO',
  collaboratorTimeoutMs: 60000,
  maxConflictRetries: 3,
  extractionConcurrency: 4,
  machineVerifiableMaxTier: 4,
  auditMaxEntries: 10000,
};

const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

function parsePositiveInt(name: string, raw: string | undefined, min: number, max: number): number | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(`${name} must be an integer between ${min} and ${max}, got "${raw}"`, 'INVALID_INPUT', {
      variable: name,
    });
  }
  return value;
}

function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const level = LOG_LEVELS.find(l => l === raw.trim().toUpperCase());
  if (!level) {
    throw new ValidationError(`COVERAGE_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`, 'INVALID_INPUT', {
      variable: 'COVERAGE_LOG_LEVEL',
    });
  }
  return level;
}

function toStrengthTier(value: number | undefined): StrengthTier | undefined {
  switch (value) {
    case 1: case 2: case 3: case 4: case 5: case 6: case 7:
      return value;
    default:
      return undefined;
  }
}

/**
 * Builds a config from environment variables on top of the defaults
 */
export function loadEngineConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<EngineConfig> = {}
): EngineConfig {
  const fromEnv: Partial<EngineConfig> = {};

  const logLevel = parseLogLevel(env.COVERAGE_LOG_LEVEL);
  if (logLevel) fromEnv.logLevel = logLevel;

  const timeout = parsePositiveInt('COVERAGE_COLLABORATOR_TIMEOUT_MS', env.COVERAGE_COLLABORATOR_TIMEOUT_MS, 1, 600000);
  if (timeout !== undefined) fromEnv.collaboratorTimeoutMs = timeout;

  const retries = parsePositiveInt('COVERAGE_MAX_CONFLICT_RETRIES', env.COVERAGE_MAX_CONFLICT_RETRIES, 0, 20);
  if (retries !== undefined) fromEnv.maxConflictRetries = retries;

  const concurrency = parsePositiveInt('COVERAGE_EXTRACTION_CONCURRENCY', env.COVERAGE_EXTRACTION_CONCURRENCY, 1, 64);
  if (concurrency !== undefined) fromEnv.extractionConcurrency = concurrency;

  const tier = toStrengthTier(
    parsePositiveInt('COVERAGE_MACHINE_VERIFIABLE_MAX_TIER', env.COVERAGE_MACHINE_VERIFIABLE_MAX_TIER, 1, 7)
  );
  if (tier !== undefined) fromEnv.machineVerifiableMaxTier = tier;

  const auditMax = parsePositiveInt('COVERAGE_AUDIT_MAX_ENTRIES', env.COVERAGE_AUDIT_MAX_ENTRIES, 1, 1000000);
  if (auditMax !== undefined) fromEnv.auditMaxEntries = auditMax;

  return { ...DEFAULT_ENGINE_CONFIG, ...fromEnv, ...overrides };
}
