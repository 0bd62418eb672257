/**
 * Repository exports
 */

export * from './assessment-repository.js';
