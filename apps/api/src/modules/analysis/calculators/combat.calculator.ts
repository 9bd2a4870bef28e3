/**
 * Combat Calculator - Derived per-player combat metrics
 *
 * Calculates:
 * - KDA, ADR, headshot percentage and ACS from match totals
 * - First bloods / first deaths from kill timing
 * - Multi-kill rounds from per-round kill counts
 *
 * All functions are total: missing or zero denominators yield 0.
 *
 * @module analysis/calculators/combat
 */

import type { MatchRecord, PlayerRecord } from "../types/inputs.types";
import type {
  FirstBloodCounts,
  MultiKillBuckets,
  MultiKillMetrics,
  PlayerCombatSummary,
} from "../types/combat.types";
import { ACS_RANGE, MULTI_KILL_THRESHOLD } from "../types/constants";
import { firstKillOfRound, indexKillsByRound } from "./round-index";

// =============================================================================
// RATIOS
// =============================================================================

/**
 * (kills + assists) / deaths, two decimals
 *
 * A deathless player with any contribution has an infinite KDA.
 */
export function kda(kills: number, deaths: number, assists: number): number {
  if (deaths === 0) {
    return kills + assists > 0 ? Number.POSITIVE_INFINITY : 0;
  }
  return round2((kills + assists) / deaths);
}

/**
 * Average damage per round, one decimal
 */
export function adr(damage: number, roundsPlayed: number): number {
  if (roundsPlayed === 0) return 0;
  return round1(damage / roundsPlayed);
}

/**
 * Headshot percentage of all body hits, one decimal
 */
export function headshotPct(headshots: number, totalShots: number): number {
  if (totalShots === 0) return 0;
  return round1((headshots / totalShots) * 100);
}

/**
 * Average combat score, truncated toward zero
 */
export function acs(totalScore: number, roundsPlayed: number): number {
  if (roundsPlayed === 0) return 0;
  return Math.trunc(totalScore / roundsPlayed);
}

/**
 * ACS recomputed from raw fields, 0 when outside the sane band
 *
 * Stored ACS values from older log entries may come from corrupted score or
 * round counts; aggregations use this instead of trusting them.
 */
export function sanitizedAcs(totalScore: number, roundsPlayed: number): number {
  const value = acs(totalScore, roundsPlayed);
  if (value < ACS_RANGE.MIN || value > ACS_RANGE.MAX) return 0;
  return value;
}

// =============================================================================
// ROUND-LEVEL COUNTS
// =============================================================================

/**
 * Count rounds a player opened (first kill) or died first in
 *
 * The first kill of each round is found through the same round lookup as
 * KAST, so a skewed kill numbering attributes it to the same round.
 */
export function firstBloodsAndDeaths(playerId: string, match: MatchRecord): FirstBloodCounts {
  const index = indexKillsByRound(match.kills);
  let firstBloods = 0;
  let firstDeaths = 0;

  for (const round of match.rounds) {
    const first = firstKillOfRound(index, round.roundNumber);
    if (!first) continue;

    if (first.killerId === playerId) firstBloods++;
    if (first.victimId === playerId) firstDeaths++;
  }

  return { firstBloods, firstDeaths };
}

/**
 * Count multi-kill rounds from per-round kill counts
 *
 * `multiKills` counts rounds with three or more kills; the buckets record
 * the exact count, with five or more in `5k`.
 */
export function multikillCount(playerId: string, match: MatchRecord): MultiKillMetrics {
  let multiKills = 0;
  const buckets = { "2k": 0, "3k": 0, "4k": 0, "5k": 0 };

  for (const round of match.rounds) {
    const stat = round.playerStats.find((s) => s.playerId === playerId);
    if (!stat) continue;

    if (stat.kills >= MULTI_KILL_THRESHOLD) multiKills++;

    const bucket = multiKillBucket(stat.kills);
    if (bucket) buckets[bucket]++;
  }

  return { multiKills, buckets };
}

/**
 * Headline numbers for one player from the match totals
 */
export function summarizePlayerCombat(
  player: PlayerRecord,
  roundsPlayed: number,
): PlayerCombatSummary {
  const { stats } = player;
  const totalShots = stats.headshots + stats.bodyshots + stats.legshots;

  return {
    kills: stats.kills,
    deaths: stats.deaths,
    assists: stats.assists,
    kda: kda(stats.kills, stats.deaths, stats.assists),
    acs: sanitizedAcs(stats.score, roundsPlayed),
    adr: adr(stats.damage, roundsPlayed),
    headshotPct: headshotPct(stats.headshots, totalShots),
    plusMinus: stats.kills - stats.deaths,
  };
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

function multiKillBucket(kills: number): keyof MultiKillBuckets | null {
  if (kills >= 5) return "5k";
  if (kills === 4) return "4k";
  if (kills === 3) return "3k";
  if (kills === 2) return "2k";
  return null;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
