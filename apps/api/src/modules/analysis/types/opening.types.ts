/**
 * Opening Types - First blood impact
 *
 * The team that draws first blood usually wins the round; this measures by
 * how much in the logged matches.
 *
 * @module analysis/types/opening
 */

export interface FirstBloodWinRate {
  /** Rounds with a known winner and at least one kill */
  readonly totalRounds: number;

  /** Rounds where the first killer's team is known */
  readonly firstBloodRounds: number;

  readonly firstBloodWins: number;
  readonly firstBloodLosses: number;

  /** firstBloodWins / firstBloodRounds * 100, one decimal */
  readonly winRate: number;
}
