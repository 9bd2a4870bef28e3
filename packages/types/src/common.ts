/**
 * Common types and enums used across the platform.
 */

import { z } from "zod";

// ============================================================================
// Enums
// ============================================================================

export const TeamColorSchema = z.enum(["red", "blue"]);
export type TeamColor = z.infer<typeof TeamColorSchema>;

/** Team attribution where the source may not say (round winner, per-round stat). */
export type TeamSide = TeamColor | "unknown";

export const RegionSchema = z.enum(["eu", "na", "ap", "kr"]);
export type Region = z.infer<typeof RegionSchema>;

// ============================================================================
// Common Schemas
// ============================================================================

/** Riot tag: letters and digits only, at most 10 characters */
export const RiotTagSchema = z
  .string()
  .regex(/^[A-Za-z0-9]{1,10}$/, "Tag should contain only letters and numbers (max 10 characters)");

export const RiotIdSchema = z.object({
  name: z.string().min(1),
  tag: RiotTagSchema,
});
export type RiotId = z.infer<typeof RiotIdSchema>;

/**
 * Format a Riot ID as `name#tag`
 */
export function formatRiotId(name: string, tag: string): string {
  return `${name}#${tag}`;
}

/**
 * Case-insensitive name match with exact tag, as the game client compares IDs
 */
export function sameRiotId(
  a: { name: string; tag: string },
  b: { name: string; tag: string },
): boolean {
  return a.name.toLowerCase() === b.name.toLowerCase() && a.tag === b.tag;
}

/**
 * Normalize a raw team string ("Red", "BLUE", "") into a team side
 */
export function toTeamSide(value: string | null | undefined): TeamSide {
  const parsed = TeamColorSchema.safeParse((value ?? "").toLowerCase());
  return parsed.success ? parsed.data : "unknown";
}

/** Numeric API field that may be missing or null; defaults to 0 */
export const CountSchema = z
  .number()
  .nullish()
  .transform((value) => value ?? 0);
