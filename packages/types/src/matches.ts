/**
 * Match payload type definitions and Zod schemas.
 *
 * Mirrors the Henrik v2 match endpoint. Every field the analytics core can
 * default is optional: historical matches are frequently incomplete.
 * Unknown keys are dropped.
 */

import { z } from "zod";
import { CountSchema } from "./common";

// ============================================================================
// Kill Events
// ============================================================================

export const KillAssistantSchema = z.object({
  assistant_puuid: z.string().nullish(),
  assistant_display_name: z.string().nullish(),
  assistant_team: z.string().nullish(),
});
export type KillAssistant = z.infer<typeof KillAssistantSchema>;

export const RawKillEventSchema = z.object({
  kill_time_in_round: z.number().nullish(),
  kill_time_in_match: z.number().nullish(),

  // Round numbering differs between API versions
  round: z.number().int().nullish(),
  round_num: z.number().int().nullish(),
  round_number: z.number().int().nullish(),

  killer_puuid: z.string().nullish(),
  killer_display_name: z.string().nullish(),
  killer_team: z.string().nullish(),

  victim_puuid: z.string().nullish(),
  victim_display_name: z.string().nullish(),
  victim_team: z.string().nullish(),

  damage_weapon_name: z.string().nullish(),
  assistants: z.array(KillAssistantSchema).nullish(),
});
export type RawKillEvent = z.infer<typeof RawKillEventSchema>;

// ============================================================================
// Rounds
// ============================================================================

export const RoundEconomySchema = z.object({
  loadout_value: z.number().nullish(),
  remaining: z.number().nullish(),
  spent: z.number().nullish(),
  weapon: z.object({ name: z.string().nullish() }).nullish(),
  armor: z.object({ name: z.string().nullish() }).nullish(),
});
export type RoundEconomy = z.infer<typeof RoundEconomySchema>;

export const RawRoundPlayerStatsSchema = z.object({
  player_puuid: z.string(),
  player_display_name: z.string().nullish(),
  player_team: z.string().nullish(),

  kills: CountSchema,
  assists: CountSchema,
  score: CountSchema,
  damage: CountSchema,

  // Survival is reported inconsistently; absent and false are different
  alive: z.boolean().nullish(),
  was_alive: z.boolean().nullish(),
  survived: z.boolean().nullish(),
  died_in_round: z.boolean().nullish(),

  economy: RoundEconomySchema.nullish(),
});
export type RawRoundPlayerStats = z.infer<typeof RawRoundPlayerStatsSchema>;

export const RawRoundSchema = z.object({
  round_num: z.number().int().nullish(),
  round: z.number().int().nullish(),
  round_number: z.number().int().nullish(),

  winning_team: z.string().nullish(),
  end_type: z.string().nullish(),
  player_stats: z.array(RawRoundPlayerStatsSchema).nullish(),
});
export type RawRound = z.infer<typeof RawRoundSchema>;

// ============================================================================
// Players
// ============================================================================

export const MatchPlayerStatsSchema = z.object({
  score: CountSchema,
  kills: CountSchema,
  deaths: CountSchema,
  assists: CountSchema,
  headshots: CountSchema,
  bodyshots: CountSchema,
  legshots: CountSchema,
});
export type MatchPlayerStats = z.infer<typeof MatchPlayerStatsSchema>;

export const MatchPlayerSchema = z.object({
  puuid: z.string(),
  name: z.string(),
  tag: z.string(),
  team: z.string().nullish(),
  character: z.string().nullish(),
  currenttier_patched: z.string().nullish(),
  damage_made: CountSchema,
  stats: MatchPlayerStatsSchema.nullish(),
});
export type MatchPlayer = z.infer<typeof MatchPlayerSchema>;

// ============================================================================
// Match
// ============================================================================

export const MatchMetadataSchema = z.object({
  matchid: z.string(),
  map: z.string().nullish(),
  mode: z.string().nullish(),
  rounds_played: CountSchema,
  game_start_patched: z.string().nullish(),
  region: z.string().nullish(),
});
export type MatchMetadata = z.infer<typeof MatchMetadataSchema>;

export const TeamResultSchema = z.object({
  has_won: z.boolean().nullish(),
  rounds_won: CountSchema,
  rounds_lost: CountSchema,
});
export type TeamResult = z.infer<typeof TeamResultSchema>;

export const MatchDetailsSchema = z.object({
  metadata: MatchMetadataSchema,
  players: z
    .object({ all_players: z.array(MatchPlayerSchema).default([]) })
    .nullish(),
  // Deathmatch payloads carry an array here; treat anything else as absent
  teams: z
    .object({
      red: TeamResultSchema.nullish(),
      blue: TeamResultSchema.nullish(),
    })
    .nullish()
    .catch(null),
  rounds: z.array(RawRoundSchema).nullish(),
  kills: z.array(RawKillEventSchema).nullish(),
});
export type MatchDetails = z.infer<typeof MatchDetailsSchema>;

// ============================================================================
// Response Envelopes
// ============================================================================

export const MatchDetailsResponseSchema = z.object({
  status: z.number().optional(),
  data: MatchDetailsSchema,
});
export type MatchDetailsResponse = z.infer<typeof MatchDetailsResponseSchema>;

export const MatchSummarySchema = z.object({
  metadata: z.object({
    matchid: z.string(),
    map: z.string().nullish(),
    mode: z.string().nullish(),
  }),
});
export type MatchSummary = z.infer<typeof MatchSummarySchema>;

export const MatchHistoryResponseSchema = z.object({
  status: z.number().optional(),
  data: z.array(MatchSummarySchema),
});
export type MatchHistoryResponse = z.infer<typeof MatchHistoryResponseSchema>;
