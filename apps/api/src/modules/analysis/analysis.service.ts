/**
 * Analysis Service - Fetch, analyze and log matches
 *
 * Matches come from the stats API and are stored as match-log entries with
 * every player's computed stats. KAST breakdowns are served from the logs
 * first and only fall back to the API for matches that were never logged.
 *
 * @module analysis/analysis
 */

import { Injectable, Logger } from "@nestjs/common";
import { formatRiotId, sameRiotId } from "@spike-stats/types";
import type {
  MatchDetails,
  MatchLogEntry,
  MatchSummary,
  Region,
  RiotId,
} from "@spike-stats/types";
import { HenrikApiService } from "../integrations/henrik.service";
import { MatchLogStore } from "../storage/match-log.store";
import { KAST_LOOKUP_DAYS, QUERY_WINDOWS } from "../aggregation/aggregation.config";
import { buildMatchLogEntry } from "./calculators/aggregation/match-log.builder";
import { calculateKast } from "./calculators/kast.calculator";
import type { KastMetrics } from "./types/kast.types";
import type { MatchRecord, PlayerRecord } from "./types/inputs.types";
import {
  AnalysisError,
  InvalidInputError,
  MatchNotFoundError,
  PlayerNotFoundError,
  UpstreamNotFoundError,
  err,
  isOk,
  ok,
} from "./utils/errors";
import type { Result } from "./utils/errors";
import { normalizeLoggedMatch, normalizeMatch } from "./utils/match-normalizer";

// =============================================================================
// RESULT TYPES
// =============================================================================

export interface LatestMatchResult {
  /** False when the match was already in today's log */
  readonly logged: boolean;
  readonly entry: MatchLogEntry;
}

export interface PullReport {
  readonly player: string;
  readonly requested: number;

  /** Matches the history returned, at most `requested` */
  readonly found: number;
  readonly logged: number;
  readonly skipped: number;

  /** One line per failed match, `Match <n>: <reason>` */
  readonly errors: readonly string[];
}

export interface KastBreakdownResult {
  readonly matchId: string;

  /** Where the match data came from */
  readonly source: "log" | "api";
  readonly player: {
    readonly name: string;
    readonly tag: string;
    readonly agent: string;
    readonly team: PlayerRecord["team"];
  };
  readonly kast: KastMetrics;
}

// =============================================================================
// SERVICE
// =============================================================================

@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(
    private readonly henrik: HenrikApiService,
    private readonly matchLogs: MatchLogStore,
  ) {}

  /**
   * Analyze a player's most recent match and log it
   */
  async analyzeLatestMatch(
    region: Region,
    player: RiotId,
    now: Date = new Date(),
  ): Promise<LatestMatchResult> {
    const riotId = formatRiotId(player.name, player.tag);
    const history = await this.henrik.getMatchHistory(region, player, 1);

    const latest = history[0];
    if (!latest) {
      throw new PlayerNotFoundError(riotId, { region, reason: "no recent matches" });
    }

    const details = await this.henrik.getMatchDetails(latest.metadata.matchid);
    const inMatch = (details.players?.all_players ?? []).some((p) => sameRiotId(p, player));
    if (!inMatch) {
      throw new PlayerNotFoundError(riotId, { matchId: latest.metadata.matchid });
    }

    const entry = buildMatchLogEntry({ details, requestedPlayer: player, region, loggedAt: now });
    const logged = await this.matchLogs.append(entry, now);

    this.logger.log(
      `Analyzed match ${entry.matchId} for ${riotId} (${entry.matchInfo.map}, ${entry.matchInfo.score})`,
    );

    return { logged, entry };
  }

  /**
   * Log up to `count` recent matches of a player
   *
   * Matches are fetched one at a time; a failure is reported for that match
   * and the pull moves on.
   */
  async pullMatches(
    region: Region,
    player: RiotId,
    count: number,
    now: Date = new Date(),
  ): Promise<PullReport> {
    const { min, max } = QUERY_WINDOWS.pullCount;
    if (!Number.isInteger(count) || count < min || count > max) {
      throw new InvalidInputError(`count must be between ${min} and ${max}`, "count", { count });
    }

    const riotId = formatRiotId(player.name, player.tag);
    const history = await this.henrik.getMatchHistory(region, player, count);
    const summaries = history.slice(0, count);

    let logged = 0;
    let skipped = 0;
    const errors: string[] = [];

    for (const [index, summary] of summaries.entries()) {
      const result = await this.pullOne(summary, region, player, now);

      if (isOk(result)) {
        if (result.data) logged++;
        else skipped++;
      } else {
        errors.push(`Match ${index + 1}: ${result.error.message}`);
      }
    }

    this.logger.log(
      `Pulled ${summaries.length} matches for ${riotId}: ${logged} logged, ${skipped} skipped, ${errors.length} errors`,
    );

    return {
      player: riotId,
      requested: count,
      found: summaries.length,
      logged,
      skipped,
      errors,
    };
  }

  /**
   * Per-round KAST decisions of one player in one match
   */
  async kastBreakdown(
    matchId: string,
    player: RiotId,
    now: Date = new Date(),
  ): Promise<KastBreakdownResult> {
    const logged = await this.matchLogs.findMatch(matchId, KAST_LOOKUP_DAYS, now);

    let match: MatchRecord;
    let source: KastBreakdownResult["source"];
    if (logged) {
      match = normalizeLoggedMatch(logged);
      source = "log";
    } else {
      this.logger.debug(`Match ${matchId} not in the logs, fetching it`);
      match = normalizeMatch(await this.fetchForBreakdown(matchId));
      source = "api";
    }

    const record = match.players.find((p) => sameRiotId(p, player));
    if (!record) {
      throw new PlayerNotFoundError(formatRiotId(player.name, player.tag), { matchId });
    }

    return {
      matchId: match.matchId,
      source,
      player: {
        name: record.name,
        tag: record.tag,
        agent: record.agent,
        team: record.team,
      },
      kast: calculateKast(record.playerId, match),
    };
  }

  // ===========================================================================
  // PRIVATE METHODS
  // ===========================================================================

  /**
   * A match missing on the stats API is reported as an unknown match id
   */
  private async fetchForBreakdown(matchId: string): Promise<MatchDetails> {
    try {
      return await this.henrik.getMatchDetails(matchId);
    } catch (error) {
      if (error instanceof UpstreamNotFoundError) {
        throw new MatchNotFoundError(matchId);
      }
      throw error;
    }
  }

  /**
   * Fetch and log one match of a pull
   *
   * @returns whether the match was newly logged, or the upstream failure
   */
  private async pullOne(
    summary: MatchSummary,
    region: Region,
    player: RiotId,
    now: Date,
  ): Promise<Result<boolean>> {
    let details: MatchDetails;
    try {
      details = await this.henrik.getMatchDetails(summary.metadata.matchid);
    } catch (error) {
      if (error instanceof AnalysisError) {
        this.logger.warn(`Could not fetch match ${summary.metadata.matchid}: ${error.message}`);
        return err(error);
      }
      throw error;
    }

    const entry = buildMatchLogEntry({ details, requestedPlayer: player, region, loggedAt: now });
    return ok(await this.matchLogs.append(entry, now));
  }
}
