/**
 * Local request routing
 * Maps plain HTTP requests onto the same Lambda handlers production uses.
 */

import type { APIGatewayProxyEventV2 } from "aws-lambda";
import { SHARE_LINK_TTL_HOURS, type ShareLinkRepository } from "@glucosmart/diabetes";
import { handler as bolusSuggestHandler } from "@glucosmart/functions/bolus-suggest";
import { createHttpEvent } from "@glucosmart/functions/events";
import { errorResponse, type HttpResult } from "@glucosmart/functions/http";
import { createShareLinkCreateHandler } from "@glucosmart/functions/share/create";
import { createShareLinkResolveHandler } from "@glucosmart/functions/share/resolve";
import type { ShareLinkDeps } from "@glucosmart/functions/share/deps";

export type LambdaHttpHandler = (event: APIGatewayProxyEventV2) => Promise<HttpResult>;

export interface LocalRoute {
  /** Path template, "{name}" segments become path parameters */
  path: string;
  handler: LambdaHttpHandler;
}

export interface LocalRequest {
  method: string;
  /** Request target, may include a query string */
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface RouteMatch {
  route: LocalRoute;
  pathParameters?: Record<string, string>;
}

/**
 * Find the route for a path. Literal segments must match exactly.
 */
/** Percent-decodes one path segment; null when the escape sequence is malformed. */
function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) return null;
    throw error;
  }
}

export function matchRoute(routes: LocalRoute[], pathname: string): RouteMatch | null {
  const segments = pathname.split("/").filter(Boolean);

  for (const route of routes) {
    const templateSegments = route.path.split("/").filter(Boolean);
    if (templateSegments.length !== segments.length) continue;

    const params: Record<string, string> = {};
    const matches = templateSegments.every((template, i) => {
      const param = template.match(/^\{(\w+)\}$/);
      if (param) {
        const value = decodeSegment(segments[i]);
        if (value === null) return false;
        params[param[1]] = value;
        return true;
      }
      return template === segments[i];
    });

    if (matches) {
      return {
        route,
        pathParameters: Object.keys(params).length > 0 ? params : undefined,
      };
    }
  }

  return null;
}

export interface LocalRoutesOptions {
  repository: ShareLinkRepository;
  shareBaseUrl: string;
  shareLinkTtlHours?: number;
}

/**
 * Route table mirroring the deployed API
 */
export function createLocalRoutes(options: LocalRoutesOptions): LocalRoute[] {
  const deps: ShareLinkDeps = {
    repository: options.repository,
    baseUrl: options.shareBaseUrl,
    ttlHours: options.shareLinkTtlHours ?? SHARE_LINK_TTL_HOURS,
    now: Date.now,
  };

  return [
    { path: "/bolus-suggest", handler: bolusSuggestHandler },
    { path: "/share", handler: createShareLinkCreateHandler(() => deps) },
    { path: "/share/{id}", handler: createShareLinkResolveHandler(() => deps) },
  ];
}

/**
 * Dispatch a request to its handler as an API Gateway v2 event
 */
export async function dispatch(routes: LocalRoute[], request: LocalRequest): Promise<HttpResult> {
  const url = new URL(request.url, "http://localhost");
  const match = matchRoute(routes, url.pathname);

  if (!match) {
    return errorResponse(404, `No route for ${url.pathname}`);
  }

  const event = createHttpEvent({
    method: request.method,
    path: url.pathname,
    route: match.route.path,
    body: request.body,
    headers: request.headers,
    rawQueryString: url.search.replace(/^\?/, ""),
    pathParameters: match.pathParameters,
    domainName: request.headers.host?.split(":")[0],
  });

  return match.route.handler(event);
}
