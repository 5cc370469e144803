/**
 * HTTP response helpers for API Gateway v2 handlers
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from "aws-lambda";

export type HttpResult = APIGatewayProxyStructuredResultV2;

export const CORS_ALLOW_ORIGIN = "*";
export const CORS_ALLOW_HEADERS = "Content-Type, Authorization";

/**
 * Uppercased request method
 */
export function getMethod(event: APIGatewayProxyEventV2): string {
  return event.requestContext.http.method.toUpperCase();
}

/**
 * JSON response with CORS origin header
 */
export function jsonResponse(statusCode: number, body: unknown): HttpResult {
  return {
    statusCode,
    headers: {
      "Content-Type": "application/json",
      "Access-Control-Allow-Origin": CORS_ALLOW_ORIGIN,
    },
    body: JSON.stringify(body),
  };
}

/**
 * Error response: { "error": message }
 */
export function errorResponse(statusCode: number, message: string): HttpResult {
  return jsonResponse(statusCode, { error: message });
}

/**
 * CORS preflight answer for an OPTIONS request
 */
export function preflightResponse(allowMethods: string): HttpResult {
  return {
    statusCode: 200,
    headers: {
      "Access-Control-Allow-Origin": CORS_ALLOW_ORIGIN,
      "Access-Control-Allow-Methods": allowMethods,
      "Access-Control-Allow-Headers": CORS_ALLOW_HEADERS,
    },
    body: "",
  };
}

export function methodNotAllowed(expected: string): HttpResult {
  return errorResponse(405, `Method not allowed. Use ${expected}.`);
}

export function internalError(): HttpResult {
  return errorResponse(500, "Internal server error");
}

/** Message returned when a body is not valid JSON */
export const INVALID_JSON_MESSAGE = "Request body must be valid JSON";
