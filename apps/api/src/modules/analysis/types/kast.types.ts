/**
 * KAST Types - Kill/Assist/Survived/Traded
 *
 * @module analysis/types/kast
 */

/**
 * Source of an assist credit. Round stats and kill events are both
 * incomplete, so either may be the only one that has it.
 */
export type AssistSource = "round_stats" | "kill_events" | "both" | "none";

/**
 * KAST decision for one player in one round
 */
export interface RoundKastEvaluation {
  readonly roundNumber: number;

  /** False when the round carries no stat block for the player */
  readonly hasPlayerData: boolean;

  readonly hasKill: boolean;
  readonly hasAssist: boolean;
  readonly assistSource: AssistSource;
  readonly survived: boolean;
  readonly wasTraded: boolean;

  /** Gap between the death and the trade kill, when traded */
  readonly tradeGapMs: number | null;

  readonly isKastPositive: boolean;
}

/**
 * KAST Metrics
 *
 * Percentage of rounds with a Kill, Assist, Survival or Trade.
 */
export interface KastMetrics {
  /** KAST percentage (0-100), one decimal */
  readonly kast: number;

  readonly kastRounds: number;
  readonly roundsWithKill: number;
  readonly roundsWithAssist: number;
  readonly roundsWithSurvival: number;
  readonly roundsWithTrade: number;

  /** Rounds walked in the match data, with or without player data */
  readonly roundsChecked: number;

  /** Denominator: max(roundsChecked, roundsPlayed) */
  readonly totalRounds: number;

  readonly breakdown: readonly RoundKastEvaluation[];
}
