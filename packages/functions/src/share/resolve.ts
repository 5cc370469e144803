/**
 * Share Link Resolve Handler
 * GET /share/{id}
 *
 * 404 for unknown links, 410 for links past expiry that DynamoDB TTL
 * has not swept yet.
 */

import type { APIGatewayProxyEventV2 } from "aws-lambda";
import { isShareLinkExpired, type SharePayload } from "@glucosmart/diabetes";
import {
  errorResponse,
  getMethod,
  internalError,
  jsonResponse,
  methodNotAllowed,
  preflightResponse,
  type HttpResult,
} from "../http";
import { getDefaultShareLinkDeps, type ShareLinkDeps } from "./deps";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface ResolveShareLinkResponseBody {
  data: SharePayload;
  expiresAt: string;
}

/**
 * Build the resolve handler around injected dependencies
 */
export function createShareLinkResolveHandler(resolveDeps: () => ShareLinkDeps) {
  return async (event: APIGatewayProxyEventV2): Promise<HttpResult> => {
    const method = getMethod(event);
    if (method === "OPTIONS") {
      return preflightResponse("GET, OPTIONS");
    }
    if (method !== "GET") {
      return methodNotAllowed("GET");
    }

    const linkId = event.pathParameters?.id;
    if (!linkId || !UUID_PATTERN.test(linkId)) {
      return errorResponse(400, "Invalid share link id");
    }

    try {
      const deps = resolveDeps();
      const link = await deps.repository.get(linkId.toLowerCase());

      if (!link) {
        return errorResponse(404, "Share link not found");
      }
      if (isShareLinkExpired(link, deps.now())) {
        return errorResponse(410, "Share link has expired");
      }

      const response: ResolveShareLinkResponseBody = {
        data: link.data,
        expiresAt: link.expiresAt,
      };
      return jsonResponse(200, response);
    } catch (error) {
      console.error("Share link resolve error:", error);
      return internalError();
    }
  };
}

export const handler = createShareLinkResolveHandler(getDefaultShareLinkDeps);
