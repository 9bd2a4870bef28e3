/**
 * Economy Types - Round economy classification
 *
 * The source has no authoritative round type, so each round is labeled by an
 * ordered rule table over round number, round history and loadout values.
 *
 * @module analysis/types/economy
 */

export type EconomyRoundType =
  | "pistol"
  | "anti-eco"
  | "eco"
  | "force-buy"
  | "full-buy";

export const ECONOMY_ROUND_TYPES: readonly EconomyRoundType[] = [
  "pistol",
  "anti-eco",
  "eco",
  "force-buy",
  "full-buy",
];

/**
 * Everything a classification rule may look at
 */
export interface EconomyRoundContext {
  readonly roundNumber: number;

  /**
   * Team results of the earlier rounds, oldest first.
   * `null` where the round winner is unknown.
   */
  readonly history: readonly (boolean | null)[];

  /** Mean non-zero loadout value of the team, `null` without loadout data */
  readonly averageLoadout: number | null;
}

/**
 * One row of the classification table
 */
export interface EconomyRule {
  readonly id: string;
  readonly label: EconomyRoundType;
  readonly matches: (context: EconomyRoundContext) => boolean;
}

/**
 * One classified round
 */
export interface RoundEconomyObservation {
  readonly roundNumber: number;
  readonly type: EconomyRoundType;
  readonly ruleId: string;
  readonly averageLoadout: number | null;
  readonly won: boolean;
}

export interface EconomyTypeStats {
  readonly attempts: number;
  readonly wins: number;

  /** wins / attempts * 100, one decimal */
  readonly winRate: number;
}

export type EconomyTable = Readonly<Record<EconomyRoundType, EconomyTypeStats>>;

export interface EconomyAnalysis {
  readonly table: EconomyTable;
  readonly rounds: readonly RoundEconomyObservation[];
}

/**
 * Win rate of one team loadout profile
 */
export interface LoadoutSignatureStats {
  readonly signature: string;
  readonly primaryWeapons: readonly string[];
  readonly armorCount: number;
  readonly totalValue: number;
  readonly wins: number;
  readonly totalRounds: number;

  /** One decimal */
  readonly winRate: number;
}
