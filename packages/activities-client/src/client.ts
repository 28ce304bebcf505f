/**
 * Activities Client
 * Typed client for the activities REST API
 */

import type {
  ActivitiesClientConfig,
  ActivityCatalog,
  ActivityRecord,
  MessageResponse,
} from './types';

/**
 * Non-2xx reply from the API
 */
export class ActivitiesApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly detail: string
  ) {
    super(detail);
    this.name = 'ActivitiesApiError';
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export class ActivitiesClient {
  private baseUrl: string;
  private fetchFn: typeof fetch;
  private headers: Record<string, string>;
  private onRequest?: ActivitiesClientConfig['onRequest'];

  constructor(config: ActivitiesClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.fetchFn = config.fetch || globalThis.fetch.bind(globalThis);
    this.headers = {
      Accept: 'application/json',
      ...config.headers,
    };
    this.onRequest = config.onRequest;
  }

  private async request<T>(method: string, path: string): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const response = await this.fetchFn(url, { method, headers: this.headers });

    const responseText = await response.text();
    this.onRequest?.({ method, url, status: response.status, body: responseText });

    let result: unknown;
    try {
      result = JSON.parse(responseText);
    } catch {
      throw new ActivitiesApiError(response.status, `Invalid JSON response: ${responseText}`);
    }

    if (!response.ok) {
      const detail =
        isObject(result) && typeof result.detail === 'string'
          ? result.detail
          : `Request failed: ${response.status}`;
      throw new ActivitiesApiError(response.status, detail);
    }

    return result as T;
  }

  /**
   * List all activities keyed by name
   */
  async listActivities(): Promise<ActivityCatalog> {
    return this.request<ActivityCatalog>('GET', '/activities');
  }

  /**
   * Get one activity (read from the full listing)
   */
  async getActivity(activityName: string): Promise<ActivityRecord> {
    const activities = await this.listActivities();
    if (!Object.hasOwn(activities, activityName)) {
      throw new ActivitiesApiError(404, 'Activity not found');
    }
    return activities[activityName];
  }

  /**
   * Sign up a student for an activity
   */
  async signup(activityName: string, email: string): Promise<MessageResponse> {
    const query = new URLSearchParams({ email }).toString();
    return this.request<MessageResponse>(
      'POST',
      `/activities/${encodeURIComponent(activityName)}/signup?${query}`
    );
  }

  /**
   * Remove a student from an activity
   */
  async removeParticipant(activityName: string, email: string): Promise<MessageResponse> {
    return this.request<MessageResponse>(
      'DELETE',
      `/activities/${encodeURIComponent(activityName)}/participants/${encodeURIComponent(email)}`
    );
  }
}

/**
 * Create an activities client
 */
export function createClient(config: ActivitiesClientConfig): ActivitiesClient {
  return new ActivitiesClient(config);
}
