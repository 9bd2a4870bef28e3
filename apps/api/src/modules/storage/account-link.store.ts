/**
 * Account Link Store
 *
 * Maps community user ids to Riot accounts, in one JSON file keyed by user
 * id. A user has at most one linked account; linking again replaces it.
 *
 * @module storage/account-link
 */

import { Injectable, Logger } from "@nestjs/common";
import * as path from "path";
import { AccountLinksFileSchema, formatRiotId } from "@spike-stats/types";
import type { AccountLink, AccountLinksFile, RiotId } from "@spike-stats/types";
import { AppConfigService } from "../../common/config";
import { SerialQueue, readJsonFile, writeJsonFile } from "./json-file";

/**
 * A link together with the user it belongs to
 */
export interface LinkedAccount {
  readonly userId: string;
  readonly link: AccountLink;
}

export interface LinkRequest {
  readonly userId: string;
  readonly account: RiotId;
  readonly displayName: string;
  readonly guildId: string | null;
}

@Injectable()
export class AccountLinkStore {
  private readonly logger = new Logger(AccountLinkStore.name);
  private readonly file: string;
  private readonly writes = new SerialQueue();

  constructor(appConfig: AppConfigService) {
    this.file = path.resolve(appConfig.userLinksFile);
  }

  /**
   * Link (or relink) a user's account
   */
  link(request: LinkRequest, now: Date = new Date()): Promise<AccountLink> {
    return this.writes.run(async () => {
      const links = await this.readAll();
      const link: AccountLink = {
        username: request.account.name,
        tag: request.account.tag,
        riotId: formatRiotId(request.account.name, request.account.tag),
        displayName: request.displayName,
        linkedAt: now.toISOString(),
        guildId: request.guildId,
      };

      await writeJsonFile(this.file, { ...links, [request.userId]: link });
      this.logger.log(`Linked user ${request.userId} to ${link.riotId}`);
      return link;
    });
  }

  /**
   * Remove a user's link
   *
   * @returns the removed link, or null when the user had none
   */
  unlink(userId: string): Promise<AccountLink | null> {
    return this.writes.run(async () => {
      const links = await this.readAll();
      const existing = links[userId];
      if (!existing) return null;

      const remaining = Object.fromEntries(
        Object.entries(links).filter(([id]) => id !== userId),
      );
      await writeJsonFile(this.file, remaining);
      this.logger.log(`Unlinked user ${userId} from ${existing.riotId}`);
      return existing;
    });
  }

  async get(userId: string): Promise<AccountLink | null> {
    const links = await this.readAll();
    return links[userId] ?? null;
  }

  /**
   * Linked accounts, optionally restricted to one guild
   */
  async list(guildId?: string): Promise<LinkedAccount[]> {
    const links = await this.readAll();

    return Object.entries(links)
      .filter(([, link]) => guildId === undefined || link.guildId === guildId)
      .map(([userId, link]) => ({ userId, link }));
  }

  // ============================================================================
  // PRIVATE METHODS
  // ============================================================================

  /**
   * Stored links; a missing or invalid file reads as empty
   */
  private async readAll(): Promise<AccountLinksFile> {
    const result = await readJsonFile(this.file);

    if (result.status === "missing") return {};
    if (result.status === "invalid") {
      this.logger.warn(`Account links file is not valid JSON (${result.reason}); treating it as empty`);
      return {};
    }

    const parsed = AccountLinksFileSchema.safeParse(result.data);
    if (!parsed.success) {
      this.logger.warn("Account links file does not match the expected format; treating it as empty");
      return {};
    }
    return parsed.data;
  }
}
