/**
 * Server Aggregation Service
 *
 * Server-wide views over the match logs: leaderboards and overview, first
 * blood impact, and the most credit-efficient team loadouts. With
 * `serverOnly`, only accounts linked in the guild are counted.
 *
 * @module aggregation/services/server-aggregation
 */

import { Injectable, Logger } from "@nestjs/common";
import { sameRiotId } from "@spike-stats/types";
import type { MatchLogEntry, ProcessedPlayer, RiotId } from "@spike-stats/types";
import { AccountLinkStore, MatchLogStore } from "../../storage";
import { QUERY_WINDOWS, resolveWindow } from "../aggregation.config";
import {
  analyzeFirstBloodWinRate,
  analyzeLoadoutSignatures,
  calculateServerStats,
} from "../../analysis/calculators";
import type { PlayerFilter } from "../../analysis/calculators";
import type {
  FirstBloodWinRate,
  LoadoutSignatureStats,
  ServerStats,
} from "../../analysis/types";
import { normalizeLoggedMatch } from "../../analysis/utils";

// =============================================================================
// TYPES
// =============================================================================

export interface ServerQuery {
  readonly days?: number | undefined;

  /** Count only linked accounts; defaults to true */
  readonly serverOnly?: boolean | undefined;

  /** Guild whose links apply; all links when absent */
  readonly guildId?: string | undefined;
}

/**
 * What a server view was computed over
 */
export interface ServerScope {
  readonly days: number;
  readonly serverOnly: boolean;
  readonly guildId: string | null;

  /** Linked accounts in the guild; null when not restricted */
  readonly linkedAccounts: number | null;

  /** Logged matches the view was computed from */
  readonly matches: number;
}

export interface ServerStatsResult {
  readonly scope: ServerScope;
  readonly stats: ServerStats;
}

export interface FirstBloodResult {
  readonly scope: ServerScope;
  readonly firstBlood: FirstBloodWinRate;
}

export interface EconomyInsightsResult {
  readonly scope: ServerScope;
  readonly firstBlood: FirstBloodWinRate;

  /** Best win rate per credit first */
  readonly loadouts: readonly LoadoutSignatureStats[];
}

/**
 * Logged matches of the window, narrowed to the tracked accounts
 */
interface TrackedEntries {
  readonly scope: Omit<ServerScope, "matches">;
  readonly entries: readonly MatchLogEntry[];
  readonly isTracked: PlayerFilter;
}

// =============================================================================
// SERVICE
// =============================================================================

@Injectable()
export class ServerAggregationService {
  private readonly logger = new Logger(ServerAggregationService.name);

  constructor(
    private readonly matchLogs: MatchLogStore,
    private readonly accountLinks: AccountLinkStore,
  ) {}

  /**
   * Overview, map and agent tables, leaderboards and best games
   *
   * Every logged match counts toward the overview; player numbers only
   * include tracked accounts.
   */
  async getServerStats(query: ServerQuery, now: Date = new Date()): Promise<ServerStatsResult> {
    const { scope, entries, isTracked } = await this.loadEntries(query, now, "all");
    const stats = calculateServerStats(entries, isTracked);

    this.logger.debug(
      `Server stats over ${entries.length} matches (${stats.overview.uniquePlayers} players)`,
    );

    return { scope: { ...scope, matches: entries.length }, stats };
  }

  /**
   * How often the first-blood team wins the round
   */
  async getFirstBlood(query: ServerQuery, now: Date = new Date()): Promise<FirstBloodResult> {
    const { scope, entries } = await this.loadEntries(query, now, "with-tracked");

    return {
      scope: { ...scope, matches: entries.length },
      firstBlood: analyzeFirstBloodWinRate(entries.map(normalizeLoggedMatch)),
    };
  }

  /**
   * First blood impact and the most credit-efficient team loadouts
   */
  async getEconomyInsights(
    query: ServerQuery,
    now: Date = new Date(),
  ): Promise<EconomyInsightsResult> {
    const { scope, entries } = await this.loadEntries(query, now, "with-tracked");
    const matches = entries.map(normalizeLoggedMatch);

    return {
      scope: { ...scope, matches: entries.length },
      firstBlood: analyzeFirstBloodWinRate(matches),
      loadouts: analyzeLoadoutSignatures(matches),
    };
  }

  // ===========================================================================
  // PRIVATE METHODS
  // ===========================================================================

  /**
   * Read the window and build the tracked-player filter
   *
   * With `with-tracked`, matches without any tracked player are dropped.
   * Restricting to a guild without linked accounts yields no matches.
   */
  private async loadEntries(
    query: ServerQuery,
    now: Date,
    matchSelection: "all" | "with-tracked",
  ): Promise<TrackedEntries> {
    const days = resolveWindow(query.days, QUERY_WINDOWS.serverDays);
    const serverOnly = query.serverOnly ?? true;
    const guildId = query.guildId ?? null;

    if (!serverOnly) {
      return {
        scope: { days, serverOnly, guildId, linkedAccounts: null },
        entries: await this.matchLogs.readRecent(days, now),
        isTracked: () => true,
      };
    }

    const linked = await this.accountLinks.list(query.guildId);
    const accounts: RiotId[] = linked.map(({ link }) => ({ name: link.username, tag: link.tag }));
    const isTracked = (player: ProcessedPlayer): boolean =>
      accounts.some((account) => sameRiotId(player, account));
    const scope = { days, serverOnly, guildId, linkedAccounts: accounts.length };

    if (accounts.length === 0) {
      this.logger.debug(`No linked accounts${guildId ? ` in guild ${guildId}` : ""}`);
      return { scope, entries: [], isTracked };
    }

    const all = await this.matchLogs.readRecent(days, now);
    const entries =
      matchSelection === "all" ? all : all.filter((entry) => entry.players.some(isTracked));

    return { scope, entries, isTracked };
  }
}
