/**
 * Control Coverage Engine
 *
 * Main entry point: tracks per-control coverage of a compliance assessment
 * against extracted evidence, with auditable human overrides
 */

// Export all types
export * from './types/index.js';

// Export all interfaces
export * from './interfaces/index.js';

// Export configuration
export * from './config/engine-config.js';

// Export services
export * from './services/index.js';

// Export repository
export * from './repository/index.js';

// Export orchestrator
export * from './orchestrator/index.js';
