#!/usr/bin/env node
/**
 * Local Development Server
 * Serves the bolus and share-link API over plain HTTP.
 *
 * Uses the SAME handlers as production - only the transport layer
 * (Node HTTP server, in-memory share link store) is different.
 *
 * Usage:
 *   npm run dev:local
 */

import { createServer, type IncomingHttpHeaders, type IncomingMessage, type ServerResponse } from "http";
import { InMemoryShareLinkRepository } from "@glucosmart/diabetes";
import { internalError, type HttpResult } from "@glucosmart/functions/http";
import { createLocalRoutes, dispatch, type LocalRoute } from "./router.js";
import { loadConfig } from "./setup.js";

/**
 * Flatten Node's header map to single string values
 */
export function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    flat[name] = Array.isArray(value) ? value.join(", ") : value;
  }
  return flat;
}

async function readBody(req: IncomingMessage): Promise<string | undefined> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return chunks.length > 0 ? Buffer.concat(chunks).toString("utf-8") : undefined;
}

function writeResult(res: ServerResponse, result: HttpResult): void {
  res.statusCode = result.statusCode ?? 200;
  for (const [name, value] of Object.entries(result.headers ?? {})) {
    res.setHeader(name, String(value));
  }
  res.end(result.body ?? "");
}

async function handleRequest(routes: LocalRoute[], req: IncomingMessage, res: ServerResponse): Promise<void> {
  const started = Date.now();
  let result: HttpResult;

  try {
    result = await dispatch(routes, {
      method: req.method ?? "GET",
      url: req.url ?? "/",
      headers: flattenHeaders(req.headers),
      body: await readBody(req),
    });
  } catch (error) {
    console.error("Local request error:", error);
    result = internalError();
  }

  writeResult(res, result);
  console.log(`${req.method} ${req.url} -> ${result.statusCode} (${Date.now() - started}ms)`);
}

/**
 * Start the local development server
 */
function startServer(): void {
  const config = loadConfig();
  const routes = createLocalRoutes({
    repository: new InMemoryShareLinkRepository(),
    shareBaseUrl: config.shareBaseUrl,
    shareLinkTtlHours: config.shareLinkTtlHours,
  });

  const server = createServer((req, res) => {
    handleRequest(routes, req, res).catch((error: unknown) => {
      console.error("Failed to write response:", error);
      res.destroy();
    });
  });

  server.listen(config.port, () => {
    console.log(`\n───────────────────────────────────────────`);
    console.log(`Local Development Server started!`);
    console.log(`HTTP: http://localhost:${config.port}`);
    console.log(`───────────────────────────────────────────`);
    for (const route of routes) {
      console.log(`  ${route.path}`);
    }
    console.log(`\nShare links are kept in memory and lost on restart\n`);
  });

  const shutdown = (signal: string): void => {
    console.log(`Received ${signal}, shutting down...`);
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

startServer();
