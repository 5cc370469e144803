/**
 * Local Development Configuration
 * Reads .env.local at the repo root; process environment wins over the file.
 */

import { existsSync, readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

// Path to the env file (in repo root)
const ENV_FILE = join(dirname(fileURLToPath(import.meta.url)), "../../../.env.local");

export const DEFAULT_PORT = 8787;

export interface LocalConfig {
  port: number;
  /** Origin used in short links; defaults to http://localhost:{port} */
  shareBaseUrl: string;
  shareLinkTtlHours?: number;
}

/**
 * Parse KEY=VALUE lines, skipping blanks and # comments
 */
export function parseEnvFile(content: string): Record<string, string> {
  const values: Record<string, string> = {};

  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const [key, ...valueParts] = trimmed.split("=");
    if (valueParts.length === 0) continue;
    values[key.trim()] = valueParts.join("=").trim(); // Handle values with = in them
  }

  return values;
}

/**
 * Build the local config from env values
 */
export function resolveConfig(values: Record<string, string | undefined>): LocalConfig {
  const port = values.PORT ? Number(values.PORT) : DEFAULT_PORT;
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`PORT must be an integer between 1 and 65535, got "${values.PORT}"`);
  }

  const ttl = values.SHARE_LINK_TTL_HOURS ? Number(values.SHARE_LINK_TTL_HOURS) : undefined;
  if (ttl !== undefined && (!Number.isFinite(ttl) || ttl <= 0)) {
    throw new Error(`SHARE_LINK_TTL_HOURS must be a positive number, got "${values.SHARE_LINK_TTL_HOURS}"`);
  }

  return {
    port,
    shareBaseUrl: (values.SHARE_BASE_URL || `http://localhost:${port}`).replace(/\/+$/, ""),
    shareLinkTtlHours: ttl,
  };
}

/**
 * Load config from .env.local and the process environment
 */
export function loadConfig(): LocalConfig {
  const fileValues = existsSync(ENV_FILE) ? parseEnvFile(readFileSync(ENV_FILE, "utf-8")) : {};
  return resolveConfig({ ...fileValues, ...process.env });
}
