/**
 * Share Link Create Handler
 * POST /share
 *
 * Stores { data } for a limited time and returns a short link to it.
 */

import type { APIGatewayProxyEventV2 } from "aws-lambda";
import { createShareLink, isJsonObject, parseJsonBody } from "@glucosmart/diabetes";
import {
  errorResponse,
  getMethod,
  internalError,
  INVALID_JSON_MESSAGE,
  jsonResponse,
  methodNotAllowed,
  preflightResponse,
  type HttpResult,
} from "../http";
import { getDefaultShareLinkDeps, type ShareLinkDeps } from "./deps";

export interface CreateShareLinkResponseBody {
  shortLink: string;
  expiresAt: string;
}

/**
 * Build the create handler around injected dependencies
 */
export function createShareLinkCreateHandler(resolveDeps: () => ShareLinkDeps) {
  return async (event: APIGatewayProxyEventV2): Promise<HttpResult> => {
    const method = getMethod(event);
    if (method === "OPTIONS") {
      return preflightResponse("POST, OPTIONS");
    }
    if (method !== "POST") {
      return methodNotAllowed("POST");
    }

    try {
      let body: unknown;
      try {
        body = parseJsonBody(event.body, event.isBase64Encoded);
      } catch (error) {
        if (error instanceof SyntaxError) {
          return errorResponse(400, INVALID_JSON_MESSAGE);
        }
        throw error;
      }

      if (!isJsonObject(body) || !isJsonObject(body.data)) {
        return errorResponse(400, 'Invalid payload: "data" must be a JSON object');
      }

      const deps = resolveDeps();
      const link = createShareLink(body.data, deps.now(), deps.ttlHours);
      await deps.repository.put(link);

      const baseUrl = deps.baseUrl ?? `https://${event.requestContext.domainName}`;
      const response: CreateShareLinkResponseBody = {
        shortLink: `${baseUrl}/share/${link.id}`,
        expiresAt: link.expiresAt,
      };

      console.log(`Share link created: ${link.id}, expires ${link.expiresAt}`);

      return jsonResponse(200, response);
    } catch (error) {
      console.error("Share link create error:", error);
      return internalError();
    }
  };
}

export const handler = createShareLinkCreateHandler(getDefaultShareLinkDeps);
