/**
 * Aggregation Calculators - Barrel exports
 *
 * Pure folds over logged matches.
 *
 * @module analysis/calculators/aggregation
 */

// Core statistics functions
export * from "./stats.calculator";

// Match log entries
export * from "./match-log.builder";

// Per-player history
export * from "./player-history.calculator";

// Server-wide statistics
export * from "./server-stats.calculator";
