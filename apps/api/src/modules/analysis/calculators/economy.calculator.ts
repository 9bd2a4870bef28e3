/**
 * Economy Calculator - Round economy classification
 *
 * The source carries no round type, so it is inferred per team from:
 * - Round number (pistol and post-pistol rounds)
 * - The team's win/loss history in the match
 * - The team's mean loadout value, when reported
 *
 * The rules form an ordered decision table; the first matching rule labels
 * the round. Each round then contributes one (type, won) observation.
 *
 * Loadout signatures compare whole-team buys across matches.
 *
 * @module analysis/calculators/economy
 */

import type { TeamColor } from "@spike-stats/types";
import type { MatchRecord, PlayerRoundStat, RoundRecord } from "../types/inputs.types";
import type {
  EconomyAnalysis,
  EconomyRoundContext,
  EconomyRoundType,
  EconomyRule,
  EconomyTable,
  LoadoutSignatureStats,
  RoundEconomyObservation,
} from "../types/economy.types";
import { ECONOMY_ROUND_TYPES } from "../types/economy.types";
import {
  ECONOMY_THRESHOLDS,
  LOADOUT_ANALYSIS,
  ROUND_CONTEXT,
} from "../types/constants";

// =============================================================================
// DECISION TABLE
// =============================================================================

/**
 * Round classification rules, evaluated top-down
 *
 * Round-number rules come first so a pistol round is never relabeled by its
 * loadout. Loadout rules only apply when loadout data exists; the history
 * rules are the fallback for matches without economy data.
 */
export const ECONOMY_RULES: readonly EconomyRule[] = [
  {
    id: "pistol-round",
    label: "pistol",
    matches: (ctx) => isOneOf(ctx.roundNumber, ROUND_CONTEXT.PISTOL),
  },
  {
    id: "post-pistol-win",
    label: "anti-eco",
    matches: (ctx) =>
      isOneOf(ctx.roundNumber, ROUND_CONTEXT.POST_PISTOL) &&
      ctx.history[ctx.history.length - 1] === true,
  },
  {
    id: "loadout-eco",
    label: "eco",
    matches: (ctx) =>
      ctx.averageLoadout !== null && ctx.averageLoadout < ECONOMY_THRESHOLDS.ECO,
  },
  {
    id: "loadout-force",
    label: "force-buy",
    matches: (ctx) =>
      ctx.averageLoadout !== null && ctx.averageLoadout < ECONOMY_THRESHOLDS.FORCE_BUY,
  },
  {
    id: "loadout-full",
    label: "full-buy",
    matches: (ctx) => ctx.averageLoadout !== null,
  },
  {
    id: "loss-streak",
    label: "eco",
    matches: (ctx) =>
      ctx.history.length >= 2 &&
      ctx.history[ctx.history.length - 1] === false &&
      ctx.history[ctx.history.length - 2] === false,
  },
  {
    id: "early-round",
    label: "force-buy",
    matches: (ctx) => isOneOf(ctx.roundNumber, ROUND_CONTEXT.EARLY_BUY),
  },
  {
    id: "default",
    label: "full-buy",
    matches: () => true,
  },
];

/**
 * Label a round with the first matching rule
 */
export function classifyRound(
  context: EconomyRoundContext,
  rules: readonly EconomyRule[] = ECONOMY_RULES,
): { readonly type: EconomyRoundType; readonly ruleId: string } {
  for (const rule of rules) {
    if (rule.matches(context)) {
      return { type: rule.label, ruleId: rule.id };
    }
  }
  return { type: "full-buy", ruleId: "default" };
}

// =============================================================================
// MATCH ANALYSIS
// =============================================================================

/**
 * Classify every round of a match from one player's team perspective
 *
 * @returns Per-type attempts/wins and the per-round observations; an empty
 * table when the player is not in the match
 */
export function analyzeEconomy(playerId: string, match: MatchRecord): EconomyAnalysis {
  const player = match.players.find((p) => p.playerId === playerId);
  if (!player || player.team === "unknown") {
    return { table: createEmptyEconomyTable(), rounds: [] };
  }

  const team = player.team;
  const history: (boolean | null)[] = [];
  const observations: RoundEconomyObservation[] = [];

  for (const round of match.rounds) {
    const averageLoadout = averageTeamLoadout(round, team);
    const { type, ruleId } = classifyRound({
      roundNumber: round.roundNumber,
      history: [...history],
      averageLoadout,
    });

    observations.push({
      roundNumber: round.roundNumber,
      type,
      ruleId,
      averageLoadout,
      won: round.winningTeam === team,
    });

    history.push(round.winningTeam === "unknown" ? null : round.winningTeam === team);
  }

  return { table: buildEconomyTable(observations), rounds: observations };
}

/**
 * Aggregate observations into per-type attempts, wins and win rate
 */
export function buildEconomyTable(
  observations: readonly RoundEconomyObservation[],
): EconomyTable {
  const counts = createCounts();

  for (const observation of observations) {
    const entry = counts[observation.type];
    entry.attempts++;
    if (observation.won) entry.wins++;
  }

  return toTable(counts);
}

/**
 * Sum several economy tables, recomputing win rates
 */
export function mergeEconomyTables(tables: readonly EconomyTable[]): EconomyTable {
  const counts = createCounts();

  for (const table of tables) {
    for (const type of ECONOMY_ROUND_TYPES) {
      counts[type].attempts += table[type].attempts;
      counts[type].wins += table[type].wins;
    }
  }

  return toTable(counts);
}

/**
 * Mean loadout value of the team's players who reported a non-zero value
 *
 * @returns null when no player on the team reported loadout data
 */
export function averageTeamLoadout(round: RoundRecord, team: TeamColor): number | null {
  const values = round.playerStats
    .filter((stat) => stat.team === team && stat.economy.loadoutValue > 0)
    .map((stat) => stat.economy.loadoutValue);

  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

// =============================================================================
// LOADOUT SIGNATURES
// =============================================================================

interface SignatureAccumulator {
  readonly primaryWeapons: readonly string[];
  readonly armorCount: number;
  readonly totalValue: number;
  wins: number;
  totalRounds: number;
}

/**
 * Rank whole-team loadouts by win rate per credit spent
 *
 * Pistol and post-pistol rounds are skipped, as are rounds without a winner
 * and teams with fewer or more than five reporting players. Signatures seen
 * in fewer than five rounds are dropped.
 */
export function analyzeLoadoutSignatures(
  matches: readonly MatchRecord[],
): LoadoutSignatureStats[] {
  const signatures = new Map<string, SignatureAccumulator>();

  for (const match of matches) {
    for (const round of match.rounds) {
      if (isOneOf(round.roundNumber, ROUND_CONTEXT.LOADOUT_EXCLUDED)) continue;
      if (round.winningTeam === "unknown") continue;

      for (const team of ["red", "blue"] as const) {
        const teamStats = round.playerStats.filter((stat) => stat.team === team);
        if (teamStats.length !== LOADOUT_ANALYSIS.TEAM_SIZE) continue;

        const loadout = describeTeamLoadout(teamStats);
        const existing = signatures.get(loadout.signature);
        const entry = existing ?? {
          primaryWeapons: loadout.primaryWeapons,
          armorCount: loadout.armorCount,
          totalValue: loadout.totalValue,
          wins: 0,
          totalRounds: 0,
        };

        entry.totalRounds++;
        if (round.winningTeam === team) entry.wins++;
        if (!existing) signatures.set(loadout.signature, entry);
      }
    }
  }

  return [...signatures.entries()]
    .filter(([, entry]) => entry.totalRounds >= LOADOUT_ANALYSIS.MIN_ROUNDS)
    .map(([signature, entry]) => ({
      signature,
      primaryWeapons: entry.primaryWeapons,
      armorCount: entry.armorCount,
      totalValue: entry.totalValue,
      wins: entry.wins,
      totalRounds: entry.totalRounds,
      winRate: round1((entry.wins / entry.totalRounds) * 100),
    }))
    .sort((a, b) => efficiency(b) - efficiency(a))
    .slice(0, LOADOUT_ANALYSIS.TOP);
}

/**
 * Signature of one team's loadout in one round
 *
 * Format: `Weapon-Weapon-Weapon|A<armored players>|$<total value>`, with the
 * three most common weapons in alphabetical order.
 */
export function describeTeamLoadout(teamStats: readonly PlayerRoundStat[]): {
  readonly signature: string;
  readonly primaryWeapons: readonly string[];
  readonly armorCount: number;
  readonly totalValue: number;
} {
  const weaponCounts = new Map<string, number>();
  for (const stat of teamStats) {
    const weapon = stat.economy.weapon ?? "Unknown";
    weaponCounts.set(weapon, (weaponCounts.get(weapon) ?? 0) + 1);
  }

  const primaryWeapons = [...weaponCounts.entries()]
    .sort(([nameA, countA], [nameB, countB]) =>
      countB - countA || compareNames(nameA, nameB),
    )
    .slice(0, LOADOUT_ANALYSIS.PRIMARY_WEAPONS)
    .map(([name]) => name)
    .sort(compareNames);

  const armorCount = teamStats.filter(
    (stat) => stat.economy.armor !== null && stat.economy.armor !== "None",
  ).length;
  const totalValue = teamStats.reduce((sum, stat) => sum + stat.economy.loadoutValue, 0);

  return {
    signature: `${primaryWeapons.join("-")}|A${armorCount}|$${totalValue}`,
    primaryWeapons,
    armorCount,
    totalValue,
  };
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

type MutableCounts = Record<EconomyRoundType, { attempts: number; wins: number }>;

function createCounts(): MutableCounts {
  return {
    pistol: { attempts: 0, wins: 0 },
    "anti-eco": { attempts: 0, wins: 0 },
    eco: { attempts: 0, wins: 0 },
    "force-buy": { attempts: 0, wins: 0 },
    "full-buy": { attempts: 0, wins: 0 },
  };
}

function toTable(counts: MutableCounts): EconomyTable {
  const stats = (type: EconomyRoundType) => {
    const { attempts, wins } = counts[type];
    return {
      attempts,
      wins,
      winRate: attempts > 0 ? round1((wins / attempts) * 100) : 0,
    };
  };

  return {
    pistol: stats("pistol"),
    "anti-eco": stats("anti-eco"),
    eco: stats("eco"),
    "force-buy": stats("force-buy"),
    "full-buy": stats("full-buy"),
  };
}

export function createEmptyEconomyTable(): EconomyTable {
  return toTable(createCounts());
}

function efficiency(stats: LoadoutSignatureStats): number {
  return stats.winRate / Math.max(stats.totalValue, 1);
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

function isOneOf(roundNumber: number, rounds: readonly number[]): boolean {
  return rounds.includes(roundNumber);
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}
