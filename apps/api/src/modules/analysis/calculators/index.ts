/**
 * Calculators - Barrel exports
 *
 * Pure functions for Valorant match analytics.
 * All calculators are stateless and side-effect free: they take a
 * normalized MatchRecord (see utils/match-normalizer) and never throw on
 * incomplete data.
 *
 * Usage:
 * ```typescript
 * import { calculateKast, analyzeEconomy, calculateClutches } from './calculators';
 *
 * const match = normalizeMatch(details);
 * const kast = calculateKast(playerId, match);
 * ```
 *
 * @module analysis/calculators
 */

// ============================================================================
// EVENT INDEXER
// ============================================================================
export {
  resolveRoundNumber,
  resolveKillRoundNumber,
  indexKillsByRound,
  lookupRoundKills,
  firstKillOfRound,
  type RoundNumberFields,
} from "./round-index";

// ============================================================================
// PER-MATCH CALCULATORS
// ============================================================================

// KAST
export {
  calculateKast,
  kastPercentage,
  roundCountsForKast,
  evaluateRoundKast,
  findTradeGap,
  hasSurvivalFlag,
} from "./kast.calculator";

// Derived combat metrics (KDA, ADR, HS%, ACS, openings, multi-kills)
export {
  kda,
  adr,
  headshotPct,
  acs,
  sanitizedAcs,
  firstBloodsAndDeaths,
  multikillCount,
  summarizePlayerCombat,
} from "./combat.calculator";

// Round economy
export {
  ECONOMY_RULES,
  classifyRound,
  analyzeEconomy,
  buildEconomyTable,
  mergeEconomyTables,
  averageTeamLoadout,
  analyzeLoadoutSignatures,
  describeTeamLoadout,
  createEmptyEconomyTable,
} from "./economy.calculator";

// Clutches
export {
  calculateClutches,
  detectClutchAttempts,
  summarizeClutches,
  mergeClutchMetrics,
  clutchSuccessRate,
} from "./clutch.calculator";

// ============================================================================
// CROSS-MATCH CALCULATORS
// ============================================================================
export { analyzeFirstBloodWinRate } from "./opening.calculator";
export * from "./aggregation";
