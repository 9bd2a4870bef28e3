/**
 * Opening Calculator - First blood impact
 *
 * The first kill of a round strongly correlates with the round result.
 * This measures how strongly across a set of logged matches: among rounds
 * with a known winner, how often the team that drew first blood won.
 *
 * @module analysis/calculators/opening
 */

import type { MatchRecord } from "../types/inputs.types";
import type { FirstBloodWinRate } from "../types/opening.types";
import { firstKillOfRound, indexKillsByRound } from "./round-index";

/**
 * Win rate of the first-blood team over several matches
 *
 * Rounds count toward `totalRounds` when their winner is known and they
 * have at least one kill. Of those, only rounds whose first killer has a
 * known team count toward the win rate.
 */
export function analyzeFirstBloodWinRate(matches: readonly MatchRecord[]): FirstBloodWinRate {
  let totalRounds = 0;
  let firstBloodRounds = 0;
  let firstBloodWins = 0;

  for (const match of matches) {
    const index = indexKillsByRound(match.kills);

    for (const round of match.rounds) {
      if (round.winningTeam === "unknown") continue;

      const first = firstKillOfRound(index, round.roundNumber);
      if (!first) continue;

      totalRounds++;
      if (first.killerTeam === "unknown") continue;

      firstBloodRounds++;
      if (first.killerTeam === round.winningTeam) firstBloodWins++;
    }
  }

  return {
    totalRounds,
    firstBloodRounds,
    firstBloodWins,
    firstBloodLosses: firstBloodRounds - firstBloodWins,
    winRate:
      firstBloodRounds > 0
        ? Math.round((firstBloodWins / firstBloodRounds) * 1000) / 10
        : 0,
  };
}
