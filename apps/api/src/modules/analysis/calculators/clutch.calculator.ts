/**
 * Clutch Calculator - 1vX situation analysis
 *
 * The match data carries no alive counts, so clutches are inferred from kill
 * density: a player who makes two or more kills in a round is treated as
 * having played a 1vN, N being their kill count (capped at 5). The clutch is
 * won when the player outlived all of their own kills.
 *
 * This is a proxy. It cannot tell a genuine clutch from a multi-kill made
 * while teammates were still alive, and a single kill is never a clutch.
 *
 * @module analysis/calculators/clutch
 */

import type { MatchRecord } from "../types/inputs.types";
import type {
  ClutchAttempt,
  ClutchMetrics,
  ClutchSituation,
  ClutchType,
} from "../types/clutch.types";
import { CLUTCH_TYPES } from "../types/clutch.types";
import { CLUTCH_DEFINITIONS } from "../types/constants";
import { indexKillsByRound, lookupRoundKills } from "./round-index";

/**
 * Calculate clutch metrics for a player over one match
 *
 * @example
 * ```typescript
 * const clutches = calculateClutches(playerId, match);
 * console.log(`${clutches.won}/${clutches.total} clutches won`);
 * ```
 */
export function calculateClutches(playerId: string, match: MatchRecord): ClutchMetrics {
  return summarizeClutches(detectClutchAttempts(playerId, match));
}

/**
 * Find the rounds of a match the heuristic treats as clutches
 */
export function detectClutchAttempts(playerId: string, match: MatchRecord): ClutchAttempt[] {
  const agent = match.players.find((p) => p.playerId === playerId)?.agent ?? "Unknown";
  const index = indexKillsByRound(match.kills);
  const attempts: ClutchAttempt[] = [];

  for (const round of match.rounds) {
    const roundKills = lookupRoundKills(index, round.roundNumber);
    const killTimes = roundKills
      .filter((kill) => kill.killerId === playerId)
      .map((kill) => kill.timeInRoundMs);

    if (killTimes.length < CLUTCH_DEFINITIONS.MIN_KILLS) continue;

    const opponents = Math.min(killTimes.length, CLUTCH_DEFINITIONS.MAX_OPPONENTS);
    const death = roundKills.find((kill) => kill.victimId === playerId);
    const won = !death || killTimes.every((time) => death.timeInRoundMs > time);

    attempts.push({
      matchId: match.matchId,
      roundNumber: round.roundNumber,
      type: clutchType(opponents),
      opponents,
      kills: killTimes.length,
      won,
      map: match.map,
      agent,
    });
  }

  return attempts;
}

/**
 * Fold clutch attempts into per-type, per-map and per-agent tables
 */
export function summarizeClutches(attempts: readonly ClutchAttempt[]): ClutchMetrics {
  const breakdown = createMutableBreakdown();
  const byMap: Record<string, { attempts: number; wins: number }> = {};
  const byAgent: Record<string, { attempts: number; wins: number }> = {};
  let won = 0;
  let best: ClutchAttempt | null = null;

  for (const attempt of attempts) {
    const win = attempt.won ? 1 : 0;
    won += win;

    breakdown[attempt.type].attempts++;
    breakdown[attempt.type].wins += win;

    const mapEntry = (byMap[attempt.map] ??= { attempts: 0, wins: 0 });
    mapEntry.attempts++;
    mapEntry.wins += win;

    const agentEntry = (byAgent[attempt.agent] ??= { attempts: 0, wins: 0 });
    agentEntry.attempts++;
    agentEntry.wins += win;

    if (attempt.won && (!best || attempt.opponents > best.opponents)) {
      best = attempt;
    }
  }

  return {
    total: attempts.length,
    won,
    lost: attempts.length - won,
    breakdown,
    best,
    byMap,
    byAgent,
    attempts: [...attempts],
  };
}

/**
 * Combine clutch metrics from several matches
 *
 * The best clutch of the earliest match wins ties.
 */
export function mergeClutchMetrics(metrics: readonly ClutchMetrics[]): ClutchMetrics {
  return summarizeClutches(metrics.flatMap((m) => m.attempts));
}

/**
 * Success rate of a clutch situation (0-100, one decimal)
 */
export function clutchSuccessRate(situation: ClutchSituation): number {
  if (situation.attempts === 0) return 0;
  return Math.round((situation.wins / situation.attempts) * 1000) / 10;
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

function clutchType(opponents: number): ClutchType {
  return CLUTCH_TYPES[opponents - 1] ?? "1v5";
}

function createMutableBreakdown(): Record<ClutchType, { attempts: number; wins: number }> {
  return {
    "1v1": { attempts: 0, wins: 0 },
    "1v2": { attempts: 0, wins: 0 },
    "1v3": { attempts: 0, wins: 0 },
    "1v4": { attempts: 0, wins: 0 },
    "1v5": { attempts: 0, wins: 0 },
  };
}
