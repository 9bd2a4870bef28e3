/**
 * Match Normalizer - Wire payloads to calculator inputs
 *
 * Converts a validated Henrik match payload, or a match-log entry read back
 * from disk, into the immutable {@link MatchRecord} the calculators consume.
 * All defaulting of missing fields happens here, once:
 * - Round numbers through the shared round-number accessors
 * - Team strings folded to red / blue / unknown
 * - Per-round and per-kill teams falling back to the player's match team
 * - Missing economy and counters as 0 or null
 *
 * @module analysis/utils/match-normalizer
 */

import type {
  MatchDetails,
  MatchLogEntry,
  MatchPlayer,
  RawKillEvent,
  RawRound,
  RawRoundPlayerStats,
  TeamSide,
} from "@spike-stats/types";
import { toTeamSide } from "@spike-stats/types";
import { resolveKillRoundNumber, resolveRoundNumber } from "../calculators/round-index";
import type {
  KillEvent,
  MatchRecord,
  PlayerRecord,
  PlayerRoundStat,
  RoundRecord,
} from "../types/inputs.types";

const UNKNOWN = "Unknown";
const UNRATED = "Unrated";

/** Player id to match team */
type TeamLookup = ReadonlyMap<string, TeamSide>;

// =============================================================================
// ENTRY POINTS
// =============================================================================

/**
 * Normalize a match payload from the stats API
 */
export function normalizeMatch(details: MatchDetails): MatchRecord {
  const players = (details.players?.all_players ?? []).map(normalizePlayer);
  const teams = teamLookup(players);

  return {
    matchId: details.metadata.matchid,
    map: details.metadata.map ?? UNKNOWN,
    mode: details.metadata.mode ?? UNKNOWN,
    startedAt: details.metadata.game_start_patched ?? "",
    roundsPlayed: details.metadata.rounds_played,
    rounds: normalizeRounds(details.rounds ?? [], teams),
    kills: normalizeKills(details.kills ?? [], teams),
    players,
    teams: {
      red: { roundsWon: details.teams?.red?.rounds_won ?? 0 },
      blue: { roundsWon: details.teams?.blue?.rounds_won ?? 0 },
    },
  };
}

/**
 * Rebuild a match from a logged entry
 *
 * Rounds and kills come from the raw arrays embedded in the entry; player
 * totals come from the processed stats. Shot breakdowns are not logged and
 * read back as 0.
 */
export function normalizeLoggedMatch(entry: MatchLogEntry): MatchRecord {
  const players: PlayerRecord[] = entry.players.map((player) => ({
    playerId: player.playerId,
    name: player.name,
    tag: player.tag,
    team: toTeamSide(player.team),
    agent: player.agent,
    rank: player.rank,
    stats: {
      kills: player.stats.kills,
      deaths: player.stats.deaths,
      assists: player.stats.assists,
      score: player.stats.score,
      damage: player.stats.damage,
      headshots: 0,
      bodyshots: 0,
      legshots: 0,
    },
  }));
  const teams = teamLookup(players);

  return {
    matchId: entry.matchId,
    map: entry.matchInfo.map,
    mode: entry.matchInfo.mode,
    startedAt: entry.matchInfo.startedAt,
    roundsPlayed: entry.matchInfo.roundsPlayed,
    rounds: normalizeRounds(entry.rounds, teams),
    kills: normalizeKills(entry.kills, teams),
    players,
    teams: {
      red: { roundsWon: entry.matchInfo.redRounds },
      blue: { roundsWon: entry.matchInfo.blueRounds },
    },
  };
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

function normalizePlayer(player: MatchPlayer): PlayerRecord {
  const stats = player.stats;

  return {
    playerId: player.puuid,
    name: player.name,
    tag: player.tag,
    team: toTeamSide(player.team),
    agent: player.character ?? UNKNOWN,
    rank: player.currenttier_patched ?? UNRATED,
    stats: {
      kills: stats?.kills ?? 0,
      deaths: stats?.deaths ?? 0,
      assists: stats?.assists ?? 0,
      score: stats?.score ?? 0,
      damage: player.damage_made,
      headshots: stats?.headshots ?? 0,
      bodyshots: stats?.bodyshots ?? 0,
      legshots: stats?.legshots ?? 0,
    },
  };
}

function teamLookup(players: readonly PlayerRecord[]): TeamLookup {
  return new Map(players.map((player) => [player.playerId, player.team]));
}

/**
 * Reported team, or the player's match team when the report is missing
 */
function resolveTeam(
  reported: string | null | undefined,
  playerId: string | null | undefined,
  teams: TeamLookup,
): TeamSide {
  const side = toTeamSide(reported);
  if (side !== "unknown" || !playerId) return side;
  return teams.get(playerId) ?? "unknown";
}

function normalizeRounds(rounds: readonly RawRound[], teams: TeamLookup): RoundRecord[] {
  return rounds.map((raw, position) => ({
    roundNumber: resolveRoundNumber(raw, position),
    winningTeam: toTeamSide(raw.winning_team),
    playerStats: (raw.player_stats ?? []).map((stat) => normalizeRoundStat(stat, teams)),
  }));
}

function normalizeRoundStat(stat: RawRoundPlayerStats, teams: TeamLookup): PlayerRoundStat {
  return {
    playerId: stat.player_puuid,
    team: resolveTeam(stat.player_team, stat.player_puuid, teams),
    kills: stat.kills,
    assists: stat.assists,
    survival: {
      alive: stat.alive ?? undefined,
      wasAlive: stat.was_alive ?? undefined,
      survived: stat.survived ?? undefined,
      diedInRound: stat.died_in_round ?? undefined,
    },
    economy: {
      loadoutValue: stat.economy?.loadout_value ?? 0,
      weapon: stat.economy?.weapon?.name ?? null,
      armor: stat.economy?.armor?.name ?? null,
    },
  };
}

function normalizeKills(kills: readonly RawKillEvent[], teams: TeamLookup): KillEvent[] {
  return kills.map((raw) => ({
    roundNumber: resolveKillRoundNumber(raw),
    killerId: raw.killer_puuid || null,
    killerTeam: resolveTeam(raw.killer_team, raw.killer_puuid, teams),
    victimId: raw.victim_puuid || null,
    victimTeam: resolveTeam(raw.victim_team, raw.victim_puuid, teams),
    timeInRoundMs: raw.kill_time_in_round ?? 0,
    assistantIds: (raw.assistants ?? [])
      .map((assistant) => assistant.assistant_puuid)
      .filter((id): id is string => typeof id === "string" && id.length > 0),
  }));
}
