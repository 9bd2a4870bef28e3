/**
 * Spike Stats - Shared Types
 *
 * This package contains the shared type definitions and Zod schemas
 * for match payloads, match logs and account links.
 */

export * from "./matches";
export * from "./match-log";
export * from "./common";
