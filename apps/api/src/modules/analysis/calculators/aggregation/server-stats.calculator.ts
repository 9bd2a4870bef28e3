/**
 * Server Stats Calculator
 *
 * Folds logged matches into community-wide statistics: overview totals,
 * map and agent tables, leaderboards and best games.
 *
 * Only tracked players contribute to player-level numbers; the caller
 * decides who is tracked (a guild's linked accounts, or everyone). ACS is
 * recomputed from raw score and rounds, ignoring stored values.
 *
 * @module analysis/calculators/aggregation/server-stats
 */

import type { MatchLogEntry, ProcessedPlayer } from "@spike-stats/types";
import { formatRiotId } from "@spike-stats/types";
import type {
  AgentPerformance,
  BestAgentEntry,
  BestGameEntry,
  LeaderboardEntry,
  MapWinRate,
  ServerStats,
} from "../../types/aggregation.types";
import { AGGREGATION_MINIMUMS, LEADERBOARD_SIZE } from "../../types/constants";
import { kda, sanitizedAcs } from "../combat.calculator";
import { wonMatch } from "./player-history.calculator";
import { increment, kdRatio, round1, safePercentage, topBy } from "./stats.calculator";

// =============================================================================
// ACCUMULATOR
// =============================================================================

export interface AgentTotals {
  readonly matches: number;
  readonly acsTotal: number;
}

export interface PlayerTotals {
  readonly matches: number;
  readonly kills: number;
  readonly deaths: number;
  readonly assists: number;
  readonly damage: number;
  readonly acsTotal: number;
  readonly kastTotal: number;
  readonly agents: Readonly<Record<string, AgentTotals>>;
  readonly bestGame: BestGameEntry | null;
}

export interface MapTotals {
  readonly matches: number;

  /** Tracked player appearances on the map */
  readonly results: number;
  readonly wins: number;
}

export interface AgentPoolTotals {
  readonly picks: number;
  readonly kills: number;
  readonly deaths: number;
  readonly acsTotal: number;
}

/**
 * Running server-wide totals
 */
export interface ServerStatsAccumulator {
  readonly matchesTracked: number;
  readonly kills: number;
  readonly deaths: number;
  readonly assists: number;
  readonly damage: number;
  readonly firstBloods: number;
  readonly multikills: number;
  readonly seenPlayers: Readonly<Record<string, true>>;
  readonly maps: Readonly<Record<string, MapTotals>>;
  readonly agents: Readonly<Record<string, AgentPoolTotals>>;
  readonly players: Readonly<Record<string, PlayerTotals>>;
}

export type PlayerFilter = (player: ProcessedPlayer) => boolean;

export function createServerStatsAccumulator(): ServerStatsAccumulator {
  return {
    matchesTracked: 0,
    kills: 0,
    deaths: 0,
    assists: 0,
    damage: 0,
    firstBloods: 0,
    multikills: 0,
    seenPlayers: {},
    maps: {},
    agents: {},
    players: {},
  };
}

// =============================================================================
// FOLD
// =============================================================================

/**
 * Fold one logged match into the accumulator
 *
 * Matches without a round count still count toward the overview and map
 * tables, but not toward ACS-based agent and player numbers.
 */
export function accumulateServerStats(
  acc: ServerStatsAccumulator,
  entry: MatchLogEntry,
  isTracked: PlayerFilter,
): ServerStatsAccumulator {
  const tracked = entry.players.filter(isTracked);
  const { map, roundsPlayed } = entry.matchInfo;

  let next: ServerStatsAccumulator = {
    ...acc,
    matchesTracked: acc.matchesTracked + 1,
    maps: { ...acc.maps, [map]: foldMap(acc.maps[map], entry, tracked) },
  };

  for (const player of tracked) {
    const id = formatRiotId(player.name, player.tag);
    const { stats } = player;

    next = {
      ...next,
      kills: next.kills + stats.kills,
      deaths: next.deaths + stats.deaths,
      assists: next.assists + stats.assists,
      damage: next.damage + stats.damage,
      firstBloods: next.firstBloods + stats.firstBloods,
      multikills: next.multikills + stats.multikills,
      seenPlayers: { ...next.seenPlayers, [id]: true },
    };

    if (roundsPlayed === 0) continue;

    const acs = sanitizedAcs(stats.score, roundsPlayed);
    next = {
      ...next,
      agents: { ...next.agents, [player.agent]: foldAgent(next.agents[player.agent], player, acs) },
      players: { ...next.players, [id]: foldPlayer(next.players[id], player, acs, entry, id) },
    };
  }

  return next;
}

/**
 * Turn the accumulator into the reported statistics
 */
export function finalizeServerStats(acc: ServerStatsAccumulator): ServerStats {
  const maps = Object.entries(acc.maps);
  const agents = Object.entries(acc.agents);
  const players = Object.entries(acc.players);
  const eligible = players.filter(
    ([, totals]) => totals.matches >= AGGREGATION_MINIMUMS.LEADERBOARD_MATCHES,
  );

  const mapWinRates: MapWinRate[] = maps
    .filter(([, totals]) => totals.results > 0)
    .map(([map, totals]) => ({
      map,
      matches: totals.matches,
      winRate: round1(safePercentage(totals.wins, totals.results)),
    }));

  const agentPerformance: AgentPerformance[] = agents.map(([agent, totals]) => ({
    agent,
    picks: totals.picks,
    averageAcs: round1(totals.acsTotal / totals.picks),
    kd: kdRatio(totals.kills, totals.deaths),
  }));

  const leaderboard = (value: (totals: PlayerTotals) => number): LeaderboardEntry[] =>
    topBy(
      eligible.map(([player, totals]) => ({ player, matches: totals.matches, value: value(totals) })),
      (entry) => entry.value,
      LEADERBOARD_SIZE,
    );

  const bestAgents = eligible
    .map(([player, totals]) => bestAgentOf(player, totals))
    .filter((entry): entry is BestAgentEntry => entry !== null);

  const bestGames = players
    .map(([, totals]) => totals.bestGame)
    .filter((game): game is BestGameEntry => game !== null);

  return {
    overview: {
      matchesTracked: acc.matchesTracked,
      uniquePlayers: Object.keys(acc.seenPlayers).length,
      kills: acc.kills,
      deaths: acc.deaths,
      assists: acc.assists,
      damage: acc.damage,
      firstBloods: acc.firstBloods,
      multikills: acc.multikills,
    },
    mostPlayedMaps: topBy(
      maps.map(([name, totals]) => ({ name, count: totals.matches })),
      (entry) => entry.count,
      LEADERBOARD_SIZE,
    ),
    bestMapWinRates: topBy(
      mapWinRates.filter((entry) => entry.matches >= AGGREGATION_MINIMUMS.MAP_WIN_RATE_MATCHES),
      (entry) => entry.winRate,
      LEADERBOARD_SIZE,
    ),
    agentPicks: topBy(
      agentPerformance.map((entry) => ({ name: entry.agent, count: entry.picks })),
      (entry) => entry.count,
      LEADERBOARD_SIZE,
    ),
    bestPerformingAgents: topBy(
      agentPerformance.filter((entry) => entry.averageAcs > 0),
      (entry) => entry.averageAcs,
      LEADERBOARD_SIZE,
    ),
    leaderboards: {
      acs: leaderboard((t) => round1(t.acsTotal / t.matches)),
      kd: leaderboard((t) => kdRatio(t.kills, t.deaths)),
      kast: leaderboard((t) => round1(t.kastTotal / t.matches)),
      damage: leaderboard((t) => t.damage),
    },
    bestAgentPerPlayer: topBy(bestAgents, (entry) => entry.averageAcs, LEADERBOARD_SIZE),
    bestGames: topBy(bestGames, (game) => game.acs, LEADERBOARD_SIZE),
  };
}

/**
 * Server statistics over a set of logged matches
 */
export function calculateServerStats(
  entries: readonly MatchLogEntry[],
  isTracked: PlayerFilter,
): ServerStats {
  return finalizeServerStats(
    entries.reduce(
      (acc, entry) => accumulateServerStats(acc, entry, isTracked),
      createServerStatsAccumulator(),
    ),
  );
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

function foldMap(
  totals: MapTotals | undefined,
  entry: MatchLogEntry,
  tracked: readonly ProcessedPlayer[],
): MapTotals {
  const base = totals ?? { matches: 0, results: 0, wins: 0 };
  return {
    matches: base.matches + 1,
    results: base.results + tracked.length,
    wins: base.wins + tracked.filter((player) => wonMatch(player, entry)).length,
  };
}

function foldAgent(
  totals: AgentPoolTotals | undefined,
  player: ProcessedPlayer,
  acs: number,
): AgentPoolTotals {
  const base = totals ?? { picks: 0, kills: 0, deaths: 0, acsTotal: 0 };
  return {
    picks: base.picks + 1,
    kills: base.kills + player.stats.kills,
    deaths: base.deaths + player.stats.deaths,
    acsTotal: base.acsTotal + acs,
  };
}

function foldPlayer(
  totals: PlayerTotals | undefined,
  player: ProcessedPlayer,
  acs: number,
  entry: MatchLogEntry,
  id: string,
): PlayerTotals {
  const base: PlayerTotals = totals ?? {
    matches: 0,
    kills: 0,
    deaths: 0,
    assists: 0,
    damage: 0,
    acsTotal: 0,
    kastTotal: 0,
    agents: {},
    bestGame: null,
  };
  const { stats } = player;
  const agent = base.agents[player.agent] ?? { matches: 0, acsTotal: 0 };
  const isBest = acs > (base.bestGame?.acs ?? 0);

  return {
    matches: base.matches + 1,
    kills: base.kills + stats.kills,
    deaths: base.deaths + stats.deaths,
    assists: base.assists + stats.assists,
    damage: base.damage + stats.damage,
    acsTotal: base.acsTotal + acs,
    kastTotal: base.kastTotal + stats.kast,
    agents: {
      ...base.agents,
      [player.agent]: { matches: agent.matches + 1, acsTotal: agent.acsTotal + acs },
    },
    bestGame: isBest
      ? {
          player: id,
          matchId: entry.matchId,
          map: entry.matchInfo.map,
          agent: player.agent,
          acs,
          kills: stats.kills,
          deaths: stats.deaths,
          assists: stats.assists,
          kda: kda(stats.kills, stats.deaths, stats.assists),
        }
      : base.bestGame,
  };
}

/**
 * Agent with the highest average ACS among those played often enough
 */
function bestAgentOf(player: string, totals: PlayerTotals): BestAgentEntry | null {
  let best: BestAgentEntry | null = null;

  for (const [agent, agentTotals] of Object.entries(totals.agents)) {
    if (agentTotals.matches < AGGREGATION_MINIMUMS.BEST_AGENT_MATCHES) continue;

    const averageAcs = agentTotals.acsTotal / agentTotals.matches;
    if (averageAcs > (best?.averageAcs ?? 0)) {
      best = { player, agent, averageAcs, matches: agentTotals.matches };
    }
  }

  return best ? { ...best, averageAcs: round1(best.averageAcs) } : null;
}
