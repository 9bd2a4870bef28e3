/**
 * KAST Calculator - Kill/Assist/Survived/Traded percentage
 *
 * KAST measures consistency: the percentage of rounds where a player
 * contributed in at least one way.
 *
 * A round is KAST-positive if ANY of the following is true:
 * - K: Player got at least one kill (round stats)
 * - A: Player got an assist (round stats, or named as assistant on a kill)
 * - S: Player survived (any survival flag, or no recorded death)
 * - T: Player's killer was killed within 5 seconds of the death
 *
 * Rounds without a stat block for the player are never KAST-positive but
 * still count toward the denominator.
 *
 * @module analysis/calculators/kast
 */

import type {
  KillEvent,
  MatchRecord,
  PlayerRoundStat,
  RoundKillIndex,
  RoundRecord,
  SurvivalFlags,
} from "../types/inputs.types";
import type { AssistSource, KastMetrics, RoundKastEvaluation } from "../types/kast.types";
import { TRADE_WINDOW_MS } from "../types/constants";
import { indexKillsByRound, lookupRoundKills } from "./round-index";

/**
 * Calculate KAST metrics for a player over a match
 *
 * @example
 * ```typescript
 * const kast = calculateKast(playerId, match);
 * console.log(`KAST: ${kast.kast}%`);
 * ```
 */
export function calculateKast(playerId: string, match: MatchRecord): KastMetrics {
  if (match.rounds.length === 0 || match.roundsPlayed === 0) {
    return createEmptyKastMetrics();
  }

  const index = indexKillsByRound(match.kills);
  const breakdown = match.rounds.map((round) =>
    evaluateRoundKast(playerId, round, index),
  );

  let kastRounds = 0;
  let roundsWithKill = 0;
  let roundsWithAssist = 0;
  let roundsWithSurvival = 0;
  let roundsWithTrade = 0;

  for (const round of breakdown) {
    if (round.isKastPositive) kastRounds++;
    if (round.hasKill) roundsWithKill++;
    if (round.hasAssist) roundsWithAssist++;
    if (round.survived) roundsWithSurvival++;
    if (round.wasTraded) roundsWithTrade++;
  }

  const totalRounds = Math.max(breakdown.length, match.roundsPlayed);

  return {
    kast: round1((kastRounds / totalRounds) * 100),
    kastRounds,
    roundsWithKill,
    roundsWithAssist,
    roundsWithSurvival,
    roundsWithTrade,
    roundsChecked: breakdown.length,
    totalRounds,
    breakdown,
  };
}

/**
 * KAST percentage (0-100, one decimal) of a player over a match
 */
export function kastPercentage(playerId: string, match: MatchRecord): number {
  return calculateKast(playerId, match).kast;
}

/**
 * Whether a single round counts toward the player's KAST
 */
export function roundCountsForKast(
  playerId: string,
  round: RoundRecord,
  index: RoundKillIndex,
): boolean {
  return evaluateRoundKast(playerId, round, index).isKastPositive;
}

/**
 * Evaluate each KAST criterion for one player in one round
 */
export function evaluateRoundKast(
  playerId: string,
  round: RoundRecord,
  index: RoundKillIndex,
): RoundKastEvaluation {
  const stat = round.playerStats.find((s) => s.playerId === playerId);

  if (!stat) {
    return {
      roundNumber: round.roundNumber,
      hasPlayerData: false,
      hasKill: false,
      hasAssist: false,
      assistSource: "none",
      survived: false,
      wasTraded: false,
      tradeGapMs: null,
      isKastPositive: false,
    };
  }

  const roundKills = lookupRoundKills(index, round.roundNumber);

  const hasKill = stat.kills > 0;
  const assistSource = findAssistSource(playerId, stat, roundKills);
  const hasAssist = assistSource !== "none";
  const survived =
    hasSurvivalFlag(stat.survival) ||
    !roundKills.some((kill) => kill.victimId === playerId);
  const tradeGapMs = findTradeGap(playerId, roundKills);
  const wasTraded = tradeGapMs !== null;

  return {
    roundNumber: round.roundNumber,
    hasPlayerData: true,
    hasKill,
    hasAssist,
    assistSource,
    survived,
    wasTraded,
    tradeGapMs,
    isKastPositive: hasKill || hasAssist || survived || wasTraded,
  };
}

/**
 * Detect whether the player's death in a round was traded
 *
 * The player's death is their first appearance as a victim in the
 * time-ordered kills. The trade is the first other kill whose victim is the
 * player's killer, made by someone other than the player, within the trade
 * window on either side of the death.
 *
 * @returns Gap in milliseconds between death and trade, or null if untraded
 */
export function findTradeGap(
  playerId: string,
  roundKills: readonly KillEvent[],
): number | null {
  const deathIndex = roundKills.findIndex((kill) => kill.victimId === playerId);
  if (deathIndex === -1) return null;

  const death = roundKills[deathIndex];
  if (!death || death.killerId === null) return null;

  for (let j = 0; j < roundKills.length; j++) {
    if (j === deathIndex) continue;

    const candidate = roundKills[j];
    if (!candidate) continue;

    const gap = Math.abs(candidate.timeInRoundMs - death.timeInRoundMs);
    if (
      candidate.victimId === death.killerId &&
      candidate.killerId !== playerId &&
      gap <= TRADE_WINDOW_MS
    ) {
      return gap;
    }
  }

  return null;
}

/**
 * Round survival from the source's flags alone
 *
 * Any truthy flag wins, even when another flag disagrees.
 */
export function hasSurvivalFlag(flags: SurvivalFlags): boolean {
  return (
    flags.alive === true ||
    flags.wasAlive === true ||
    flags.survived === true ||
    flags.diedInRound === false
  );
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

function findAssistSource(
  playerId: string,
  stat: PlayerRoundStat,
  roundKills: readonly KillEvent[],
): AssistSource {
  const fromStats = stat.assists > 0;
  const fromEvents = roundKills.some((kill) => kill.assistantIds.includes(playerId));

  if (fromStats && fromEvents) return "both";
  if (fromStats) return "round_stats";
  if (fromEvents) return "kill_events";
  return "none";
}

function createEmptyKastMetrics(): KastMetrics {
  return {
    kast: 0,
    kastRounds: 0,
    roundsWithKill: 0,
    roundsWithAssist: 0,
    roundsWithSurvival: 0,
    roundsWithTrade: 0,
    roundsChecked: 0,
    totalRounds: 0,
    breakdown: [],
  };
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}
