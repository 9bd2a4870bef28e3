/**
 * Input Types - Normalized match structures
 *
 * These types are the contract between the match normalizer and the
 * calculators. They are immutable snapshots: calculators never mutate them
 * and never return references into them.
 *
 * @module analysis/types/inputs
 */

import type { TeamColor, TeamSide } from "@spike-stats/types";

/**
 * One completed match
 */
export interface MatchRecord {
  readonly matchId: string;
  readonly map: string;
  readonly mode: string;
  readonly startedAt: string;

  /** Rounds reported by the match metadata; may disagree with `rounds.length` */
  readonly roundsPlayed: number;

  /** Rounds in API order */
  readonly rounds: readonly RoundRecord[];

  /** Kill events, each tagged with a (possibly skewed) round number */
  readonly kills: readonly KillEvent[];

  readonly players: readonly PlayerRecord[];

  readonly teams: {
    readonly red: { readonly roundsWon: number };
    readonly blue: { readonly roundsWon: number };
  };
}

/**
 * One round within a match
 */
export interface RoundRecord {
  /** 1-based */
  readonly roundNumber: number;
  readonly winningTeam: TeamSide;
  readonly playerStats: readonly PlayerRoundStat[];
}

/**
 * Survival as reported by the source. Each flag may be absent.
 */
export interface SurvivalFlags {
  readonly alive?: boolean | undefined;
  readonly wasAlive?: boolean | undefined;
  readonly survived?: boolean | undefined;
  readonly diedInRound?: boolean | undefined;
}

export interface PlayerRoundEconomy {
  /** Loadout value in credits, 0 when unknown */
  readonly loadoutValue: number;
  readonly weapon: string | null;
  readonly armor: string | null;
}

/**
 * Per-player state within one round
 */
export interface PlayerRoundStat {
  readonly playerId: string;
  readonly team: TeamSide;
  readonly kills: number;
  readonly assists: number;
  readonly survival: SurvivalFlags;
  readonly economy: PlayerRoundEconomy;
}

/**
 * One elimination
 */
export interface KillEvent {
  readonly roundNumber: number;
  readonly killerId: string | null;
  readonly killerTeam: TeamSide;
  readonly victimId: string | null;
  readonly victimTeam: TeamSide;
  readonly timeInRoundMs: number;
  readonly assistantIds: readonly string[];
}

/**
 * Match-scoped totals as reported by the API
 */
export interface PlayerAggregateStats {
  readonly kills: number;
  readonly deaths: number;
  readonly assists: number;
  readonly score: number;
  readonly damage: number;
  readonly headshots: number;
  readonly bodyshots: number;
  readonly legshots: number;
}

/**
 * Per-match identity and aggregate stats
 */
export interface PlayerRecord {
  readonly playerId: string;
  readonly name: string;
  readonly tag: string;
  readonly team: TeamColor | "unknown";
  readonly agent: string;
  readonly rank: string;
  readonly stats: PlayerAggregateStats;
}

/**
 * Round number to time-ordered kills
 */
export type RoundKillIndex = ReadonlyMap<number, readonly KillEvent[]>;
