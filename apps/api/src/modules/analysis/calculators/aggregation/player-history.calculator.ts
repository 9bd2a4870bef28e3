/**
 * Player History Calculator
 *
 * Folds logged matches into one player's statistics over a time window.
 * ACS is recomputed from raw score and rounds, as in the server stats.
 * The accumulator is an explicit value threaded through the fold; callers
 * may feed entries one at a time or use {@link calculatePlayerHistory}.
 *
 * @module analysis/calculators/aggregation/player-history
 */

import type { MatchLogEntry, ProcessedPlayer, RiotId } from "@spike-stats/types";
import { sameRiotId } from "@spike-stats/types";
import type {
  PlayerHistoryStats,
  RecentMatchSummary,
} from "../../types/aggregation.types";
import { AGGREGATION_MINIMUMS } from "../../types/constants";
import { kda, sanitizedAcs } from "../combat.calculator";
import {
  increment,
  mostFrequent,
  round1,
  safePercentage,
} from "./stats.calculator";

/**
 * Running totals of one player over the matches seen so far
 */
export interface PlayerHistoryAccumulator {
  readonly matches: number;
  readonly wins: number;
  readonly kills: number;
  readonly deaths: number;
  readonly assists: number;
  readonly damage: number;
  readonly firstBloods: number;
  readonly multikills: number;
  readonly acsTotal: number;
  readonly adrTotal: number;
  readonly headshotPctTotal: number;
  readonly kastTotal: number;
  readonly maps: Readonly<Record<string, number>>;
  readonly agents: Readonly<Record<string, number>>;
  readonly days: readonly string[];

  /** In the order entries were folded */
  readonly recent: readonly RecentMatchSummary[];
}

export function createPlayerHistoryAccumulator(): PlayerHistoryAccumulator {
  return {
    matches: 0,
    wins: 0,
    kills: 0,
    deaths: 0,
    assists: 0,
    damage: 0,
    firstBloods: 0,
    multikills: 0,
    acsTotal: 0,
    adrTotal: 0,
    headshotPctTotal: 0,
    kastTotal: 0,
    maps: {},
    agents: {},
    days: [],
    recent: [],
  };
}

/**
 * Fold one logged match into the accumulator
 *
 * Entries the player does not appear in leave the accumulator unchanged.
 */
export function accumulatePlayerHistory(
  acc: PlayerHistoryAccumulator,
  entry: MatchLogEntry,
  player: RiotId,
): PlayerHistoryAccumulator {
  const found = entry.players.find((p) => sameRiotId(p, player));
  if (!found) return acc;

  const { stats } = found;
  const won = wonMatch(found, entry);
  const acs = sanitizedAcs(stats.score, entry.matchInfo.roundsPlayed);
  const day = entry.timestamp.slice(0, 10);

  return {
    matches: acc.matches + 1,
    wins: acc.wins + (won ? 1 : 0),
    kills: acc.kills + stats.kills,
    deaths: acc.deaths + stats.deaths,
    assists: acc.assists + stats.assists,
    damage: acc.damage + stats.damage,
    firstBloods: acc.firstBloods + stats.firstBloods,
    multikills: acc.multikills + stats.multikills,
    acsTotal: acc.acsTotal + acs,
    adrTotal: acc.adrTotal + stats.adr,
    headshotPctTotal: acc.headshotPctTotal + stats.headshotPct,
    kastTotal: acc.kastTotal + stats.kast,
    maps: increment(acc.maps, entry.matchInfo.map),
    agents: increment(acc.agents, found.agent),
    days: acc.days.includes(day) ? acc.days : [...acc.days, day],
    recent: [
      ...acc.recent,
      {
        matchId: entry.matchId,
        result: won ? "W" : "L",
        map: entry.matchInfo.map,
        acs,
        kills: stats.kills,
        deaths: stats.deaths,
        assists: stats.assists,
      },
    ],
  };
}

/**
 * Turn the accumulator into the reported statistics
 *
 * @returns null when the player appeared in no match
 */
export function finalizePlayerHistory(acc: PlayerHistoryAccumulator): PlayerHistoryStats | null {
  if (acc.matches === 0) return null;

  const average = (total: number) => round1(total / acc.matches);

  return {
    matches: acc.matches,
    wins: acc.wins,
    losses: acc.matches - acc.wins,
    winRate: round1(safePercentage(acc.wins, acc.matches)),
    totals: {
      kills: acc.kills,
      deaths: acc.deaths,
      assists: acc.assists,
      damage: acc.damage,
      firstBloods: acc.firstBloods,
      multikills: acc.multikills,
    },
    averages: {
      kills: average(acc.kills),
      deaths: average(acc.deaths),
      assists: average(acc.assists),
      acs: average(acc.acsTotal),
      adr: average(acc.adrTotal),
      headshotPct: average(acc.headshotPctTotal),
      kast: average(acc.kastTotal),
    },
    overallKda: kda(acc.kills, acc.deaths, acc.assists),
    mostPlayedMap: mostFrequent(acc.maps),
    mostPlayedAgent: mostFrequent(acc.agents),
    daysActive: acc.days.length,
    recentTrend:
      acc.matches >= AGGREGATION_MINIMUMS.TREND_MATCHES
        ? acc.recent.slice(0, AGGREGATION_MINIMUMS.TREND_MATCHES)
        : [],
  };
}

/**
 * Statistics of one player over logged matches, most recent entry first
 */
export function calculatePlayerHistory(
  entries: readonly MatchLogEntry[],
  player: RiotId,
): PlayerHistoryStats | null {
  return finalizePlayerHistory(
    entries.reduce(
      (acc, entry) => accumulatePlayerHistory(acc, entry, player),
      createPlayerHistoryAccumulator(),
    ),
  );
}

/**
 * Whether the player's team won the logged match
 */
export function wonMatch(player: ProcessedPlayer, entry: MatchLogEntry): boolean {
  const { redRounds, blueRounds } = entry.matchInfo;
  const team = player.team.toLowerCase();
  return (team === "red" && redRounds > blueRounds) || (team === "blue" && blueRounds > redRounds);
}
