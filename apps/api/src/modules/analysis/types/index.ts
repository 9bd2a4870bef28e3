/**
 * Analysis Types - Barrel exports
 *
 * Central export point for all analysis type definitions.
 *
 * Usage:
 * ```typescript
 * import { KastMetrics, MatchRecord, EconomyAnalysis } from './types';
 * ```
 *
 * @module analysis/types
 */

// Input types (normalized match data)
export * from "./inputs.types";

// Constants and configuration
export * from "./constants";

// Core metric types
export * from "./kast.types";
export * from "./combat.types";
export * from "./economy.types";
export * from "./clutch.types";
export * from "./opening.types";

// Cross-match aggregation types
export * from "./aggregation.types";
