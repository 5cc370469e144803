/**
 * Share link handler dependencies
 */

import {
  createDocClient,
  createDynamoShareLinkRepository,
  type ShareLinkRepository,
} from "@glucosmart/diabetes";
import { loadConfig, requireShareTableName } from "../config";

export interface ShareLinkDeps {
  repository: ShareLinkRepository;
  /** Origin for short links; defaults to the request's domain */
  baseUrl?: string;
  ttlHours: number;
  /** Clock, injectable for tests */
  now: () => number;
}

let defaultDeps: ShareLinkDeps | null = null;

/**
 * Production dependencies, built on first use and reused across warm invocations
 */
export function getDefaultShareLinkDeps(): ShareLinkDeps {
  if (!defaultDeps) {
    const config = loadConfig();
    defaultDeps = {
      repository: createDynamoShareLinkRepository(
        createDocClient(config.region),
        requireShareTableName(config)
      ),
      baseUrl: config.shareBaseUrl,
      ttlHours: config.shareLinkTtlHours,
      now: Date.now,
    };
  }
  return defaultDeps;
}

/** Forget cached dependencies (tests) */
export function resetDefaultShareLinkDeps(): void {
  defaultDeps = null;
}
