/**
 * Aggregation Configuration
 *
 * Query windows of the read endpoints. A requested value outside its range
 * falls back to the window's default instead of being rejected.
 *
 * @module aggregation/config
 */

// =============================================================================
// QUERY WINDOWS
// =============================================================================

export interface QueryWindow {
  readonly min: number;
  readonly max: number;
  readonly default: number;
}

export const QUERY_WINDOWS = {
  /** Days of logs behind one player's statistics */
  playerDays: { min: 1, max: 30, default: 7 },

  /** Days of logs behind server-wide views */
  serverDays: { min: 1, max: 90, default: 30 },

  /** Recent matches fetched by a bulk pull */
  pullCount: { min: 1, max: 20, default: 5 },
} as const satisfies Record<string, QueryWindow>;

/**
 * Days of logs searched for a match before asking the stats API
 */
export const KAST_LOOKUP_DAYS = 30;

/**
 * Requested value if it is a whole number inside the window, default otherwise
 */
export function resolveWindow(
  requested: number | undefined,
  window: QueryWindow,
): number {
  if (requested === undefined || !Number.isInteger(requested)) {
    return window.default;
  }
  if (requested < window.min || requested > window.max) {
    return window.default;
  }
  return requested;
}
