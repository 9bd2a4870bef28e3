/**
 * Combat Types - Derived per-player metrics
 *
 * @module analysis/types/combat
 */

/**
 * First kill / first death counts over a match
 */
export interface FirstBloodCounts {
  /** Rounds where the player made the earliest kill */
  readonly firstBloods: number;

  /** Rounds where the player was the earliest victim */
  readonly firstDeaths: number;
}

/**
 * Rounds by exact kill count; 5 or more kills land in 5k
 */
export interface MultiKillBuckets {
  readonly "2k": number;
  readonly "3k": number;
  readonly "4k": number;
  readonly "5k": number;
}

export interface MultiKillMetrics {
  /** Rounds with at least three kills */
  readonly multiKills: number;
  readonly buckets: MultiKillBuckets;
}

/**
 * Headline numbers for one player in one match
 */
export interface PlayerCombatSummary {
  readonly kills: number;
  readonly deaths: number;
  readonly assists: number;
  readonly kda: number;
  readonly acs: number;
  readonly adr: number;
  readonly headshotPct: number;
  readonly plusMinus: number;
}
