/**
 * Activity API Handlers
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { RegistryError, type ActivityRegistry } from '@activity-signup/activities-core';
import { ok, badRequest, registryErrorResponse, unprocessable } from '../utils/response-helpers';

/**
 * Run a registry operation, turning rejections into error responses
 */
function withRegistryErrors(operation: () => unknown): APIGatewayProxyResult {
  try {
    return ok(operation());
  } catch (error) {
    if (error instanceof RegistryError) {
      console.log('Rejected:', { code: error.code, detail: error.message });
      return registryErrorResponse(error);
    }
    throw error;
  }
}

/**
 * GET /activities
 */
export function handleListActivities(
  _event: APIGatewayProxyEvent,
  registry: ActivityRegistry
): APIGatewayProxyResult {
  return ok(registry.list());
}

/**
 * POST /activities/{activityName}/signup?email={email}
 *
 * email is opaque: an empty value is accepted, only a missing parameter is 422.
 */
export function handleSignup(
  event: APIGatewayProxyEvent,
  registry: ActivityRegistry
): APIGatewayProxyResult {
  const activityName = event.pathParameters?.activityName;
  if (!activityName) {
    return badRequest('activityName is required');
  }

  const email = event.queryStringParameters?.email;
  if (email === undefined) {
    return unprocessable('Missing required query parameter: email');
  }

  return withRegistryErrors(() => registry.signup(activityName, email));
}

/**
 * DELETE /activities/{activityName}/participants/{email}
 */
export function handleRemoveParticipant(
  event: APIGatewayProxyEvent,
  registry: ActivityRegistry
): APIGatewayProxyResult {
  const activityName = event.pathParameters?.activityName;
  const email = event.pathParameters?.email;
  if (!activityName || !email) {
    return badRequest('activityName and email are required');
  }

  return withRegistryErrors(() => registry.removeParticipant(activityName, email));
}
