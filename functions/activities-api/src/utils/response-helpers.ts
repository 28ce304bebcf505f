/**
 * Response helpers for Lambda API Gateway responses
 *
 * Errors carry a single `detail` string; confirmations a `message`.
 */

import type { APIGatewayProxyResult } from 'aws-lambda';
import type { RegistryError } from '@activity-signup/activities-core';

const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,X-Request-Id',
};

const DEFAULT_HEADERS = {
  'Content-Type': 'application/json',
  ...CORS_HEADERS,
};

export const ALLOWED_METHODS = 'GET,POST,DELETE,OPTIONS';

/**
 * Create a JSON response
 */
export function jsonResponse(statusCode: number, body: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: DEFAULT_HEADERS,
    body: JSON.stringify(body),
  };
}

/**
 * Create a 200 OK response
 */
export function ok(body: unknown): APIGatewayProxyResult {
  return jsonResponse(200, body);
}

/**
 * Create a 307 Temporary Redirect response
 */
export function temporaryRedirect(location: string): APIGatewayProxyResult {
  return {
    statusCode: 307,
    headers: { ...CORS_HEADERS, Location: location },
    body: '',
  };
}

/**
 * CORS preflight response
 */
export function preflight(): APIGatewayProxyResult {
  return {
    statusCode: 200,
    headers: { ...CORS_HEADERS, 'Access-Control-Allow-Methods': ALLOWED_METHODS },
    body: '',
  };
}

/**
 * Create a 400 Bad Request response
 */
export function badRequest(detail: string): APIGatewayProxyResult {
  return jsonResponse(400, { detail });
}

/**
 * Create a 404 Not Found response
 */
export function notFound(detail = 'Not Found'): APIGatewayProxyResult {
  return jsonResponse(404, { detail });
}

/**
 * Create a 405 Method Not Allowed response
 */
export function methodNotAllowed(method: string): APIGatewayProxyResult {
  return jsonResponse(405, { detail: `Method ${method} not allowed` });
}

/**
 * Create a 422 Unprocessable Entity response
 */
export function unprocessable(detail: string): APIGatewayProxyResult {
  return jsonResponse(422, { detail });
}

/**
 * Create a 500 Internal Server Error response
 */
export function internalError(
  detail = 'Internal server error',
  requestId?: string
): APIGatewayProxyResult {
  return jsonResponse(500, { detail, requestId });
}

/**
 * Map a rejected registry operation to its HTTP response
 */
export function registryErrorResponse(error: RegistryError): APIGatewayProxyResult {
  switch (error.code) {
    case 'ACTIVITY_NOT_FOUND':
    case 'PARTICIPANT_NOT_FOUND':
      return notFound(error.message);
    case 'ALREADY_REGISTERED':
    case 'ACTIVITY_FULL':
      return badRequest(error.message);
  }
}
