/**
 * Activity Entity Types
 */

/**
 * Activity record as stored in the registry and returned by GET /activities.
 * Field names follow the wire format.
 */
export interface ActivityRecord {
  /** Human readable description */
  description: string;
  /** Free-form meeting schedule, e.g. "Fridays, 3:30 PM - 5:00 PM" */
  schedule: string;
  /** Roster capacity (positive integer) */
  max_participants: number;
  /** Participant emails in signup order, no duplicates */
  participants: string[];
}

/**
 * Activities keyed by their unique, case-sensitive name
 */
export type ActivityCatalog = Record<string, ActivityRecord>;

/**
 * Seed data loaded at process start
 */
export type ActivitySeed = ActivityCatalog;

/**
 * Confirmation returned by signup and removal
 */
export interface MessageResponse {
  message: string;
}

/**
 * Error body returned for rejected requests
 */
export interface ErrorResponse {
  detail: string;
  requestId?: string;
}
