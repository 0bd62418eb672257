/**
 * Main types export for the Control Coverage Engine
 */

// Common types and enums
export * from './common.js';

// Control catalog types
export * from './controls.js';

// Evidence types
export * from './evidence.js';

// Coverage state types
export * from './coverage.js';

// Assessment, applicability and gap types
export * from './assessment.js';

// Audit types
export * from './audit.js';

// Error handling types
export * from './error-handling.js';
