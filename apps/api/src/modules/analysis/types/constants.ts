/**
 * Analysis Constants - Magic numbers with documentation
 *
 * All configurable values and thresholds are centralized here.
 *
 * @module analysis/types/constants
 */

/**
 * Trade window in milliseconds
 *
 * A death is traded when the killer is killed within this window of the
 * death, on either side of it: the source does not always report the two
 * events in causal order.
 */
export const TRADE_WINDOW_MS = 5000;

/**
 * Round numbers with fixed economic context
 *
 * Rounds 1 and 13 open each half with a pistol buy. Rounds 2 and 14 follow
 * them, so a pistol winner plays them against a broken economy.
 */
export const ROUND_CONTEXT = {
  PISTOL: [1, 13],
  POST_PISTOL: [2, 14],
  /** Rounds where a team without loadout data most likely force-bought */
  EARLY_BUY: [2, 3, 14, 15],
  /** Rounds left out of loadout signature analysis */
  LOADOUT_EXCLUDED: [1, 2, 13, 14],
} as const;

/**
 * Economy thresholds (mean loadout value per player, in credits)
 */
export const ECONOMY_THRESHOLDS = {
  /** Below this = eco round */
  ECO: 1000,

  /** Below this but above ECO = force buy, otherwise full buy */
  FORCE_BUY: 2500,
} as const;

/**
 * Loadout signature analysis
 */
export const LOADOUT_ANALYSIS = {
  /** Only rounds where the whole team reported are comparable */
  TEAM_SIZE: 5,

  /** Weapons kept in a signature */
  PRIMARY_WEAPONS: 3,

  /** Signatures seen fewer times are dropped */
  MIN_ROUNDS: 5,

  /** Signatures returned */
  TOP: 10,
} as const;

/**
 * Sane Average Combat Score band. Values outside it come from corrupted
 * score or round data.
 */
export const ACS_RANGE = {
  MIN: 0,
  MAX: 1000,
} as const;

/** Kills in one round for the round to count as a multi-kill */
export const MULTI_KILL_THRESHOLD = 3;

/**
 * Clutch heuristic bounds
 */
export const CLUTCH_DEFINITIONS = {
  /** Fewer kills are indistinguishable from a normal trade */
  MIN_KILLS: 2,

  /** Maximum opponents for a clutch */
  MAX_OPPONENTS: 5,
} as const;

/**
 * Minimum samples for cross-match leaderboards
 */
export const AGGREGATION_MINIMUMS = {
  /** Matches before a player enters a leaderboard */
  LEADERBOARD_MATCHES: 3,

  /** Matches on an agent before it can be a player's best agent */
  BEST_AGENT_MATCHES: 2,

  /** Matches on a map before its win rate is ranked */
  MAP_WIN_RATE_MATCHES: 3,

  /** Matches before a recent-form trend is shown */
  TREND_MATCHES: 5,
} as const;

/** Entries in each leaderboard */
export const LEADERBOARD_SIZE = 5;
