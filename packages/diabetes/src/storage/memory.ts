/**
 * In-memory ShareLinkRepository for local development and tests
 */

import type { ShareLink } from "../models/index.js";
import type { ShareLinkRepository } from "./share-links.js";

export class InMemoryShareLinkRepository implements ShareLinkRepository {
  private readonly links = new Map<string, ShareLink>();

  async put(link: ShareLink): Promise<void> {
    if (this.links.has(link.id)) {
      throw new Error(`Share link already exists: ${link.id}`);
    }
    this.links.set(link.id, link);
  }

  async get(linkId: string): Promise<ShareLink | null> {
    return this.links.get(linkId) ?? null;
  }

  get size(): number {
    return this.links.size;
  }
}
