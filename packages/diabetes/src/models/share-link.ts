/**
 * Share link types
 */

/** JSON object payload published behind a share link */
export type SharePayload = Record<string, unknown>;

export interface ShareLink {
  /** UUID v4 */
  id: string;
  data: SharePayload;
  /** ISO-8601 */
  createdAt: string;
  /** ISO-8601, link resolves until this instant */
  expiresAt: string;
}

/** Default lifetime of a share link */
export const SHARE_LINK_TTL_HOURS = 24;
