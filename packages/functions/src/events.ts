/**
 * API Gateway v2 event construction
 * Used by the local dev server to drive the production handlers.
 */

import type { APIGatewayProxyEventV2 } from "aws-lambda";

export interface HttpEventOptions {
  method: string;
  /** Path without query string, e.g. "/share/abc" */
  path: string;
  /** Route pattern, e.g. "/share/{id}" */
  route?: string;
  body?: string;
  headers?: Record<string, string>;
  rawQueryString?: string;
  pathParameters?: Record<string, string>;
  isBase64Encoded?: boolean;
  domainName?: string;
  sourceIp?: string;
}

export function createHttpEvent(options: HttpEventOptions): APIGatewayProxyEventV2 {
  const now = Date.now();
  const method = options.method.toUpperCase();
  const routeKey = `${method} ${options.route ?? options.path}`;
  const domainName = options.domainName ?? "localhost";
  const headers = options.headers ?? {};
  const rawQueryString = options.rawQueryString ?? "";
  const query = new URLSearchParams(rawQueryString);
  const queryStringParameters = rawQueryString ? Object.fromEntries(query.entries()) : undefined;

  return {
    version: "2.0",
    routeKey,
    rawPath: options.path,
    rawQueryString,
    headers,
    queryStringParameters,
    pathParameters: options.pathParameters,
    body: options.body,
    isBase64Encoded: options.isBase64Encoded ?? false,
    requestContext: {
      accountId: "local",
      apiId: "local",
      domainName,
      domainPrefix: domainName.split(".")[0],
      http: {
        method,
        path: options.path,
        protocol: "HTTP/1.1",
        sourceIp: options.sourceIp ?? "127.0.0.1",
        userAgent: headers["user-agent"] ?? "",
      },
      requestId: `local-${now}`,
      routeKey,
      stage: "$default",
      time: new Date(now).toISOString(),
      timeEpoch: now,
    },
  };
}
