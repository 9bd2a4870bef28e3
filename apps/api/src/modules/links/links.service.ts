/**
 * Links Service - Community users linked to Riot accounts
 *
 * @module links
 */

import { Injectable, NotFoundException } from "@nestjs/common";
import type { AccountLink } from "@spike-stats/types";
import { AccountLinkStore } from "../storage/account-link.store";
import type { LinkedAccount } from "../storage/account-link.store";
import type { LinkAccountDto } from "./dto/links.dto";

@Injectable()
export class LinksService {
  constructor(private readonly accountLinks: AccountLinkStore) {}

  async link(userId: string, dto: LinkAccountDto): Promise<AccountLink> {
    return this.accountLinks.link({
      userId,
      account: { name: dto.name, tag: dto.tag },
      displayName: dto.displayName,
      guildId: dto.guildId ?? null,
    });
  }

  /**
   * Remove a user's link
   *
   * @throws NotFoundException when the user has no link
   */
  async unlink(userId: string): Promise<AccountLink> {
    const removed = await this.accountLinks.unlink(userId);
    if (!removed) {
      throw new NotFoundException(`User ${userId} has no linked account`);
    }
    return removed;
  }

  async getLink(userId: string): Promise<AccountLink> {
    const link = await this.accountLinks.get(userId);
    if (!link) {
      throw new NotFoundException(`User ${userId} has no linked account`);
    }
    return link;
  }

  async listLinks(guildId?: string): Promise<LinkedAccount[]> {
    return this.accountLinks.list(guildId);
  }
}
