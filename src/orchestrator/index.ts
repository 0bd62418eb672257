/**
 * Orchestrator exports
 */

export * from './assessment-orchestrator.js';
