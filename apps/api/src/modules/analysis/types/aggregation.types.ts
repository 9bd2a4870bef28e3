/**
 * Aggregation Types - Cross-match player and server statistics
 *
 * Outputs of the folds over logged matches. Every fold threads an explicit
 * accumulator; nothing is kept between calls.
 *
 * @module analysis/types/aggregation
 */

// =============================================================================
// PLAYER HISTORY
// =============================================================================

export interface NamedCount {
  readonly name: string;
  readonly count: number;
}

/**
 * One line of the recent-form trend
 */
export interface RecentMatchSummary {
  readonly matchId: string;
  readonly result: "W" | "L";
  readonly map: string;
  readonly acs: number;
  readonly kills: number;
  readonly deaths: number;
  readonly assists: number;
}

/**
 * Statistics of one player over the logged matches of a time window
 */
export interface PlayerHistoryStats {
  readonly matches: number;
  readonly wins: number;
  readonly losses: number;

  /** Percentage, one decimal */
  readonly winRate: number;

  readonly totals: {
    readonly kills: number;
    readonly deaths: number;
    readonly assists: number;
    readonly damage: number;
    readonly firstBloods: number;
    readonly multikills: number;
  };

  /** Per-match averages, one decimal */
  readonly averages: {
    readonly kills: number;
    readonly deaths: number;
    readonly assists: number;
    readonly acs: number;
    readonly adr: number;
    readonly headshotPct: number;
    readonly kast: number;
  };

  /** (kills + assists) / deaths over all matches; Infinity without deaths */
  readonly overallKda: number;

  readonly mostPlayedMap: NamedCount | null;
  readonly mostPlayedAgent: NamedCount | null;

  /** Distinct UTC days with a logged match */
  readonly daysActive: number;

  /** Most recent matches first; empty below the trend minimum */
  readonly recentTrend: readonly RecentMatchSummary[];
}

// =============================================================================
// SERVER STATS
// =============================================================================

export interface ServerOverview {
  /** Every logged match in the window, tracked players or not */
  readonly matchesTracked: number;
  readonly uniquePlayers: number;
  readonly kills: number;
  readonly deaths: number;
  readonly assists: number;
  readonly damage: number;
  readonly firstBloods: number;
  readonly multikills: number;
}

export interface MapWinRate {
  readonly map: string;
  readonly matches: number;

  /** Tracked player results on the map, one decimal */
  readonly winRate: number;
}

export interface AgentPerformance {
  readonly agent: string;
  readonly picks: number;

  /** Mean sanitized ACS, one decimal */
  readonly averageAcs: number;

  /** Two decimals, 0 without deaths */
  readonly kd: number;
}

export interface LeaderboardEntry {
  readonly player: string;
  readonly matches: number;
  readonly value: number;
}

export interface BestAgentEntry {
  readonly player: string;
  readonly agent: string;
  readonly averageAcs: number;
  readonly matches: number;
}

export interface BestGameEntry {
  readonly player: string;
  readonly matchId: string;
  readonly map: string;
  readonly agent: string;
  readonly acs: number;
  readonly kills: number;
  readonly deaths: number;
  readonly assists: number;
  readonly kda: number;
}

/**
 * Server-wide statistics over the logged matches of a time window
 */
export interface ServerStats {
  readonly overview: ServerOverview;
  readonly mostPlayedMaps: readonly NamedCount[];
  readonly bestMapWinRates: readonly MapWinRate[];
  readonly agentPicks: readonly NamedCount[];
  readonly bestPerformingAgents: readonly AgentPerformance[];
  readonly leaderboards: {
    readonly acs: readonly LeaderboardEntry[];
    readonly kd: readonly LeaderboardEntry[];
    readonly kast: readonly LeaderboardEntry[];
    readonly damage: readonly LeaderboardEntry[];
  };
  readonly bestAgentPerPlayer: readonly BestAgentEntry[];
  readonly bestGames: readonly BestGameEntry[];
}
