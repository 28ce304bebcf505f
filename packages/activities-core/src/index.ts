/**
 * @activity-signup/activities-core
 *
 * Core types and the in-memory activity registry
 * - Activity record types
 * - Registry errors
 * - Seed loading and validation
 */

// Re-export all types
export * from './types';

// Re-export errors
export * from './errors';

// Re-export registry
export * from './registry';
