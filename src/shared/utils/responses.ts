// JSON response helpers shared by the Lambda handlers
import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';

/**
 * Standard CORS headers for all API responses
 */
export const CORS_HEADERS = {
  'Access-Control-Allow-Origin': process.env.ALLOWED_ORIGIN || '*',
  'Access-Control-Allow-Headers': 'Content-Type, X-Amz-Date, Authorization, X-Api-Key, X-Amz-Security-Token',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Content-Type': 'application/json'
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: string;
  message: string;
  details?: unknown;
  timestamp: string;
  requestId?: string;
}

export function createErrorResponse(
  statusCode: number,
  error: string,
  message: string,
  details?: unknown,
  requestId?: string
): APIGatewayProxyResult {
  const errorResponse: ErrorResponse = {
    error,
    message,
    details,
    timestamp: new Date().toISOString(),
    requestId
  };

  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(errorResponse)
  };
}

export function createSuccessResponse(
  statusCode: number,
  data: object,
  requestId?: string
): APIGatewayProxyResult {
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify({
      ...data,
      timestamp: new Date().toISOString(),
      requestId
    })
  };
}

export type JsonBodyResult =
  | { ok: true; body: Record<string, unknown> }
  | { ok: false; response: APIGatewayProxyResult };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses a JSON object body, producing a 400 response for anything else
 */
export function parseJsonBody(event: APIGatewayProxyEvent): JsonBodyResult {
  const requestId = event.requestContext?.requestId;

  if (!event.body) {
    return {
      ok: false,
      response: createErrorResponse(400, 'Bad Request', 'Request body is required', undefined, requestId)
    };
  }

  const raw = event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf8') : event.body;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {
      ok: false,
      response: createErrorResponse(400, 'Bad Request', 'Request body must be valid JSON', undefined, requestId)
    };
  }

  if (!isRecord(parsed)) {
    return {
      ok: false,
      response: createErrorResponse(400, 'Bad Request', 'Request body must be a JSON object', undefined, requestId)
    };
  }

  return { ok: true, body: parsed };
}
