/**
 * Analysis Utilities - Barrel exports
 *
 * @module analysis/utils
 */

// Error handling
export * from "./errors";

// Payload normalization
export * from "./match-normalizer";
