/**
 * Interface exports
 */

export * from './collaborators.js';
export * from './orchestrator.js';
