/**
 * @glucosmart/diabetes - Storage
 *
 * DynamoDB storage layer
 */

// Client
export { createDocClient } from "./client.js";

// Key generation
export { generateShareLinkKeys, toTtlSeconds, type ItemKeys } from "./keys.js";

// Share link operations
export {
  createShareLink,
  isShareLinkExpired,
  storeShareLink,
  getShareLink,
  createDynamoShareLinkRepository,
  type ShareLinkRepository,
} from "./share-links.js";

// In-memory repository
export { InMemoryShareLinkRepository } from "./memory.js";
