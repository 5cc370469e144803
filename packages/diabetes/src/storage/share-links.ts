/**
 * DynamoDB storage operations for share links
 */

import { DynamoDBDocumentClient, GetCommand, PutCommand } from "@aws-sdk/lib-dynamodb";
import { randomUUID } from "crypto";
import type { ShareLink, SharePayload } from "../models/index.js";
import { SHARE_LINK_TTL_HOURS } from "../models/index.js";
import { isJsonObject } from "../parsers/json.js";
import { generateShareLinkKeys, toTtlSeconds } from "./keys.js";

/**
 * Persistence for share links. Handlers receive one of these instead of
 * reaching for a global client.
 */
export interface ShareLinkRepository {
  /** Store a new link; rejects if the id already exists */
  put(link: ShareLink): Promise<void>;
  /** Fetch a link by id, or null if unknown */
  get(linkId: string): Promise<ShareLink | null>;
}

/**
 * Build a new share link expiring ttlHours after now
 */
export function createShareLink(
  data: SharePayload,
  now: number = Date.now(),
  ttlHours: number = SHARE_LINK_TTL_HOURS
): ShareLink {
  return {
    id: randomUUID(),
    data,
    createdAt: new Date(now).toISOString(),
    expiresAt: new Date(now + ttlHours * 60 * 60 * 1000).toISOString(),
  };
}

/**
 * DynamoDB deletes TTL-expired items lazily, so reads must check expiry too
 */
export function isShareLinkExpired(link: ShareLink, now: number = Date.now()): boolean {
  return new Date(link.expiresAt).getTime() <= now;
}

/**
 * Store a share link. The put is conditional so a colliding id never
 * overwrites another user's payload.
 */
export async function storeShareLink(
  docClient: DynamoDBDocumentClient,
  tableName: string,
  link: ShareLink
): Promise<void> {
  await docClient.send(
    new PutCommand({
      TableName: tableName,
      Item: {
        ...generateShareLinkKeys(link.id),
        ...link,
        ttl: toTtlSeconds(link.expiresAt),
      },
      ConditionExpression: "attribute_not_exists(pk)",
    })
  );
}

/**
 * Get a share link by id
 */
export async function getShareLink(
  docClient: DynamoDBDocumentClient,
  tableName: string,
  linkId: string
): Promise<ShareLink | null> {
  const result = await docClient.send(
    new GetCommand({
      TableName: tableName,
      Key: generateShareLinkKeys(linkId),
    })
  );

  if (!result.Item) {
    return null;
  }

  return toShareLink(result.Item);
}

/**
 * Convert a stored item back to a ShareLink
 */
function toShareLink(item: Record<string, unknown>): ShareLink {
  const { id, data, createdAt, expiresAt } = item;
  if (
    typeof id !== "string" ||
    !isJsonObject(data) ||
    typeof createdAt !== "string" ||
    typeof expiresAt !== "string" ||
    Number.isNaN(Date.parse(createdAt)) ||
    Number.isNaN(Date.parse(expiresAt))
  ) {
    throw new Error(`Malformed share link item: ${String(item.pk)}`);
  }
  return { id, data, createdAt, expiresAt };
}

/**
 * ShareLinkRepository backed by a DynamoDB table
 */
export function createDynamoShareLinkRepository(
  docClient: DynamoDBDocumentClient,
  tableName: string
): ShareLinkRepository {
  return {
    put: (link) => storeShareLink(docClient, tableName, link),
    get: (linkId) => getShareLink(docClient, tableName, linkId),
  };
}
