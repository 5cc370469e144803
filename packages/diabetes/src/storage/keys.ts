/**
 * DynamoDB key generation
 *
 * Share links live in a single-table layout:
 * - PK: SHARE#{linkId}
 * - SK: LINK
 */

/**
 * DynamoDB key pair
 */
export interface ItemKeys {
  pk: string;
  sk: string;
}

/**
 * Generate keys for a share link item
 */
export function generateShareLinkKeys(linkId: string): ItemKeys {
  return {
    pk: `SHARE#${linkId}`,
    sk: "LINK",
  };
}

/**
 * Convert an ISO-8601 instant to the epoch-seconds value DynamoDB TTL expects
 */
export function toTtlSeconds(isoTimestamp: string): number {
  return Math.floor(new Date(isoTimestamp).getTime() / 1000);
}
