/**
 * Function configuration from environment variables
 * Read once per cold start; the Lambda runtime sets AWS_REGION.
 */

import { SHARE_LINK_TTL_HOURS } from "@glucosmart/diabetes";

export interface FunctionsConfig {
  /** AWS region for the DynamoDB client */
  region: string;
  /** DynamoDB table holding share links */
  shareTableName?: string;
  /** Public origin for short links, e.g. "https://api.glucosmart.example" */
  shareBaseUrl?: string;
  /** Share link lifetime in hours */
  shareLinkTtlHours: number;
}

/**
 * Load configuration from the environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): FunctionsConfig {
  return {
    region: env.AWS_REGION ?? "us-east-1",
    shareTableName: env.SHARE_TABLE_NAME || undefined,
    shareBaseUrl: env.SHARE_BASE_URL ? env.SHARE_BASE_URL.replace(/\/+$/, "") : undefined,
    shareLinkTtlHours: parseTtlHours(env.SHARE_LINK_TTL_HOURS),
  };
}

function parseTtlHours(raw: string | undefined): number {
  if (raw === undefined || raw === "") {
    return SHARE_LINK_TTL_HOURS;
  }
  const hours = Number(raw);
  if (!Number.isFinite(hours) || hours <= 0) {
    throw new Error(`SHARE_LINK_TTL_HOURS must be a positive number, got "${raw}"`);
  }
  return hours;
}

/**
 * Table name for share links; only the share handlers need it
 */
export function requireShareTableName(config: FunctionsConfig): string {
  if (!config.shareTableName) {
    throw new Error("SHARE_TABLE_NAME is not configured");
  }
  return config.shareTableName;
}
