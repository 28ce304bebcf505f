/**
 * Activities API Lambda Handler
 *
 * Routes:
 * - GET    /                                         - Redirect to the front-end
 * - GET    /health                                   - Liveness check
 * - GET    /activities                               - List all activities
 * - POST   /activities/{activityName}/signup?email=  - Sign up a student
 * - DELETE /activities/{activityName}/participants/{email} - Remove a student
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import {
  ActivityRegistry,
  loadDefaultSeed,
  loadSeedFile,
} from '@activity-signup/activities-core';
import {
  handleListActivities,
  handleSignup,
  handleRemoveParticipant,
} from './handlers/activity-handlers';
import {
  ok,
  badRequest,
  notFound,
  methodNotAllowed,
  internalError,
  preflight,
  temporaryRedirect,
} from './utils/response-helpers';

export const FRONTEND_ENTRY = '/static/index.html';

type RouteHandler = 'redirectToFrontend' | 'health' | 'listActivities' | 'signup' | 'removeParticipant';

interface Route {
  pattern: RegExp;
  method: string;
  handler: RouteHandler;
  params?: string[];
}

// Route definitions
const routes: Route[] = [
  { pattern: /^\/$/, method: 'GET', handler: 'redirectToFrontend' },
  { pattern: /^\/health$/, method: 'GET', handler: 'health' },
  { pattern: /^\/activities$/, method: 'GET', handler: 'listActivities' },
  {
    pattern: /^\/activities\/([^/]+)\/signup$/,
    method: 'POST',
    handler: 'signup',
    params: ['activityName'],
  },
  {
    pattern: /^\/activities\/([^/]+)\/participants\/([^/]+)$/,
    method: 'DELETE',
    handler: 'removeParticipant',
    params: ['activityName', 'email'],
  },
];

/**
 * Route matcher for path patterns. Captured segments are URL-decoded;
 * a malformed escape throws URIError.
 */
export function matchRoute(
  path: string,
  method: string
): { handler: RouteHandler; params: Record<string, string> } | null {
  for (const route of routes) {
    if (route.method !== method) continue;

    const match = path.match(route.pattern);
    if (match) {
      const params: Record<string, string> = {};
      route.params?.forEach((name, idx) => {
        params[name] = decodeURIComponent(match[idx + 1]);
      });
      return { handler: route.handler, params };
    }
  }
  return null;
}

export type ActivitiesHandler = (
  event: APIGatewayProxyEvent,
  context: Context
) => Promise<APIGatewayProxyResult>;

/**
 * Create a handler bound to an explicitly owned registry
 */
export function createActivitiesHandler(registry: ActivityRegistry): ActivitiesHandler {
  return async (event, context) => {
    console.log('Request:', {
      method: event.httpMethod,
      path: event.path,
      requestId: context.awsRequestId,
    });

    const { httpMethod, path } = event;

    // Handle CORS preflight
    if (httpMethod === 'OPTIONS') {
      return preflight();
    }

    let matched: ReturnType<typeof matchRoute>;
    try {
      matched = matchRoute(path, httpMethod);
    } catch (error) {
      if (error instanceof URIError) {
        return badRequest('Malformed path parameter');
      }
      throw error;
    }

    if (!matched) {
      // Check if path exists but method is wrong
      const pathExists = routes.some((r) => r.pattern.test(path));
      if (pathExists) {
        return methodNotAllowed(httpMethod);
      }
      return notFound();
    }

    // Set path parameters from route matching
    event.pathParameters = { ...event.pathParameters, ...matched.params };

    try {
      switch (matched.handler) {
        case 'redirectToFrontend':
          return temporaryRedirect(FRONTEND_ENTRY);
        case 'health':
          return ok({ ok: true });
        case 'listActivities':
          return handleListActivities(event, registry);
        case 'signup':
          return handleSignup(event, registry);
        case 'removeParticipant':
          return handleRemoveParticipant(event, registry);
      }
    } catch (error) {
      console.error('Unhandled error:', error);
      return internalError('Internal server error', context.awsRequestId);
    }
  };
}

/**
 * 默认 registry（懒加载）
 * 在首次调用时读取环境变量，这样 dev-gateway 设置的环境变量能正确生效。
 */
let _defaultHandler: ActivitiesHandler | null = null;

function getDefaultHandler(): ActivitiesHandler {
  if (!_defaultHandler) {
    const seedFile = process.env.ACTIVITIES_SEED_FILE;
    const seed = seedFile ? loadSeedFile(seedFile) : loadDefaultSeed();
    const registry = new ActivityRegistry(seed, {
      enforceCapacity: process.env.ACTIVITIES_ENFORCE_CAPACITY !== 'false',
    });
    _defaultHandler = createActivitiesHandler(registry);
  }
  return _defaultHandler;
}

/**
 * Activities API Lambda Handler
 */
export const handler: ActivitiesHandler = (event, context) => getDefaultHandler()(event, context);
