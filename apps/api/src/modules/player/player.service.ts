/**
 * Player Service - Statistics of one player over logged matches
 *
 * @module player
 */

import { Injectable, Logger } from "@nestjs/common";
import { formatRiotId, sameRiotId } from "@spike-stats/types";
import type { MatchLogEntry, RiotId } from "@spike-stats/types";
import { MatchLogStore } from "../storage";
import { QUERY_WINDOWS, resolveWindow } from "../aggregation/aggregation.config";
import {
  analyzeEconomy,
  calculateClutches,
  calculatePlayerHistory,
  mergeClutchMetrics,
  mergeEconomyTables,
} from "../analysis/calculators";
import type { ClutchMetrics, EconomyTable, PlayerHistoryStats } from "../analysis/types";
import { PlayerNotFoundError, normalizeLoggedMatch } from "../analysis/utils";

export interface PlayerStatsResult {
  readonly player: string;
  readonly days: number;
  readonly stats: PlayerHistoryStats;
}

export interface PlayerRoundAnalysis {
  readonly player: string;
  readonly days: number;
  readonly matches: number;
  readonly economy: EconomyTable;
  readonly clutches: ClutchMetrics;
}

@Injectable()
export class PlayerService {
  private readonly logger = new Logger(PlayerService.name);

  constructor(private readonly matchLogs: MatchLogStore) {}

  /**
   * Averages, totals and trend over the player's logged matches
   */
  async getStats(
    player: RiotId,
    requestedDays?: number,
    now: Date = new Date(),
  ): Promise<PlayerStatsResult> {
    const days = resolveWindow(requestedDays, QUERY_WINDOWS.playerDays);
    const riotId = formatRiotId(player.name, player.tag);

    const entries = await this.matchLogs.readRecent(days, now);
    const stats = calculatePlayerHistory(entries, player);
    if (!stats) {
      throw new PlayerNotFoundError(riotId, { days, reason: "no logged matches" });
    }

    return { player: riotId, days, stats };
  }

  /**
   * Economy and clutch tables summed over the player's logged matches
   */
  async getRoundAnalysis(
    player: RiotId,
    requestedDays?: number,
    now: Date = new Date(),
  ): Promise<PlayerRoundAnalysis> {
    const days = resolveWindow(requestedDays, QUERY_WINDOWS.playerDays);
    const riotId = formatRiotId(player.name, player.tag);

    const entries = await this.matchLogs.readRecent(days, now);
    const economyTables: EconomyTable[] = [];
    const clutches: ClutchMetrics[] = [];

    for (const entry of entries) {
      const playerId = playerIdIn(entry, player);
      if (playerId === null) continue;

      const match = normalizeLoggedMatch(entry);
      economyTables.push(analyzeEconomy(playerId, match).table);
      clutches.push(calculateClutches(playerId, match));
    }

    if (economyTables.length === 0) {
      throw new PlayerNotFoundError(riotId, { days, reason: "no logged matches" });
    }

    this.logger.debug(`Round analysis for ${riotId} over ${economyTables.length} matches`);

    return {
      player: riotId,
      days,
      matches: economyTables.length,
      economy: mergeEconomyTables(economyTables),
      clutches: mergeClutchMetrics(clutches),
    };
  }
}

function playerIdIn(entry: MatchLogEntry, player: RiotId): string | null {
  return entry.players.find((p) => sameRiotId(p, player))?.playerId ?? null;
}
