/**
 * Match log and account link type definitions and Zod schemas.
 *
 * Both are stored as flat JSON files; the schemas validate what is read back.
 */

import { z } from "zod";
import { RawKillEventSchema, RawRoundSchema } from "./matches";

// ============================================================================
// Match Log
// ============================================================================

export const ProcessedPlayerStatsSchema = z.object({
  kills: z.number(),
  deaths: z.number(),
  assists: z.number(),
  acs: z.number(),
  adr: z.number(),
  headshotPct: z.number(),
  // JSON has no Infinity: a deathless KDA is written as null
  kda: z
    .number()
    .nullable()
    .transform((value) => value ?? Number.POSITIVE_INFINITY),
  kast: z.number(),
  score: z.number(),
  damage: z.number(),
  firstBloods: z.number(),
  firstDeaths: z.number(),
  multikills: z.number(),
  plusMinus: z.number(),
});
export type ProcessedPlayerStats = z.infer<typeof ProcessedPlayerStatsSchema>;

export const ProcessedPlayerSchema = z.object({
  playerId: z.string(),
  name: z.string(),
  tag: z.string(),
  team: z.string(),
  rank: z.string(),
  agent: z.string(),
  stats: ProcessedPlayerStatsSchema,
  isRequestedPlayer: z.boolean(),
});
export type ProcessedPlayer = z.infer<typeof ProcessedPlayerSchema>;

export const MatchInfoSchema = z.object({
  map: z.string(),
  mode: z.string(),
  startedAt: z.string(),
  roundsPlayed: z.number().int().min(0),
  score: z.string(),
  redRounds: z.number().int().min(0),
  blueRounds: z.number().int().min(0),
});
export type MatchInfo = z.infer<typeof MatchInfoSchema>;

export const MatchLogEntrySchema = z.object({
  timestamp: z.string(),
  matchId: z.string(),
  requestedPlayer: z.string(),
  region: z.string(),
  matchInfo: MatchInfoSchema,
  players: z.array(ProcessedPlayerSchema),
  rounds: z.array(RawRoundSchema).default([]),
  kills: z.array(RawKillEventSchema).default([]),
});
export type MatchLogEntry = z.infer<typeof MatchLogEntrySchema>;

// ============================================================================
// Account Links
// ============================================================================

export const AccountLinkSchema = z.object({
  username: z.string(),
  tag: z.string(),
  riotId: z.string(),
  displayName: z.string(),
  linkedAt: z.string(),
  guildId: z.string().nullable(),
});
export type AccountLink = z.infer<typeof AccountLinkSchema>;

export const AccountLinksFileSchema = z.record(z.string(), AccountLinkSchema);
export type AccountLinksFile = z.infer<typeof AccountLinksFileSchema>;
