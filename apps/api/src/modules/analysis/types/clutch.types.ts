/**
 * Clutch Types - 1vX situation analysis
 *
 * The source has no alive-count per round, so clutches are a proxy inferred
 * from how many kills one player made in a round. A player who makes three
 * kills while teammates are still alive is counted as a 1v3 all the same.
 *
 * @module analysis/types/clutch
 */

export type ClutchType = "1v1" | "1v2" | "1v3" | "1v4" | "1v5";

export const CLUTCH_TYPES: readonly ClutchType[] = ["1v1", "1v2", "1v3", "1v4", "1v5"];

export interface ClutchSituation {
  readonly attempts: number;
  readonly wins: number;
}

export type ClutchBreakdown = Readonly<Record<ClutchType, ClutchSituation>>;

/**
 * A single detected clutch
 */
export interface ClutchAttempt {
  readonly matchId: string;
  readonly roundNumber: number;
  readonly type: ClutchType;
  readonly opponents: number;
  readonly kills: number;
  readonly won: boolean;
  readonly map: string;
  readonly agent: string;
}

/**
 * Clutch Metrics
 *
 * Breakdown by situation, best clutch won, and per-map / per-agent tables.
 */
export interface ClutchMetrics {
  readonly total: number;
  readonly won: number;
  readonly lost: number;
  readonly breakdown: ClutchBreakdown;

  /** Hardest clutch won; the first one found wins ties */
  readonly best: ClutchAttempt | null;

  readonly byMap: Readonly<Record<string, ClutchSituation>>;
  readonly byAgent: Readonly<Record<string, ClutchSituation>>;
  readonly attempts: readonly ClutchAttempt[];
}
