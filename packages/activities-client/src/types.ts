/**
 * Client Types
 */

export type {
  ActivityCatalog,
  ActivityRecord,
  ErrorResponse,
  MessageResponse,
} from '@activity-signup/activities-core';

export interface ActivitiesClientConfig {
  /** Base URL of the activities API (e.g., http://localhost:3000) */
  baseUrl: string;
  /** Optional fetch implementation (defaults to global fetch) */
  fetch?: typeof fetch;
  /** Optional headers to include in all requests */
  headers?: Record<string, string>;
  /** Called with each request and response, for verbose logging */
  onRequest?: (info: { method: string; url: string; status: number; body: string }) => void;
}
