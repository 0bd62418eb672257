/**
 * Service exports for the Control Coverage Engine
 */

export * from './logger.js';
export * from './error-handling-service.js';
export * from './control-catalog-service.js';
export * from './applicability-resolver.js';
export * from './evidence-merger.js';
export * from './coverage-calculator.js';
export * from './override-manager.js';
export * from './reassessment-coordinator.js';
export * from './gap-analysis-service.js';
export * from './coverage-serializer.js';
export * from './audit-trail-service.js';
