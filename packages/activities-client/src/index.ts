/**
 * @activity-signup/activities-client
 *
 * Typed client for the activities API.
 *
 * @example
 * ```typescript
 * import { createClient } from '@activity-signup/activities-client';
 *
 * const client = createClient({ baseUrl: 'http://localhost:3000' });
 * const activities = await client.listActivities();
 * await client.signup('Chess Club', 'student@mergington.edu');
 * ```
 */

export { ActivitiesApiError, ActivitiesClient, createClient } from './client';
export type * from './types';
