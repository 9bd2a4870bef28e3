/**
 * Match payload fixture shared by service and e2e tests
 *
 * Three rounds on Ascent, red wins 2-1:
 * - Round 1: Alpha (red) kills Bravo at 30s; red wins
 * - Round 2: Bravo (blue) kills Alpha at 15s; blue wins
 * - Round 3: Alpha kills Bravo at 10s and Charlie at 20s; red wins
 *
 * No round reports loadout values or survival flags.
 */

import { MatchDetailsSchema } from "@spike-stats/types";
import type { MatchDetails } from "@spike-stats/types";

export const ALPHA = { name: "Alpha", tag: "EU1" };
export const BRAVO = { name: "Bravo", tag: "NA1" };

/**
 * The payload as the stats API sends it
 */
export function createRawMatchDetails(matchId: string) {
  const stat = (puuid: string, team: string, kills: number) => ({
    player_puuid: puuid,
    player_team: team,
    kills,
    assists: 0,
    score: kills * 200,
    damage: kills * 150,
  });
  const kill = (round: number, time: number, killer: string, killerTeam: string, victim: string, victimTeam: string) => ({
    round,
    kill_time_in_round: time,
    killer_puuid: killer,
    killer_team: killerTeam,
    victim_puuid: victim,
    victim_team: victimTeam,
  });

  return {
    metadata: {
      matchid: matchId,
      map: "Ascent",
      mode: "Competitive",
      rounds_played: 3,
      game_start_patched: "Saturday, May 4, 2024 9:00 PM",
      region: "eu",
    },
    players: {
      all_players: [
        {
          puuid: "p-alpha",
          name: "Alpha",
          tag: "EU1",
          team: "Red",
          character: "Jett",
          currenttier_patched: "Gold 2",
          damage_made: 450,
          stats: { score: 600, kills: 3, deaths: 1, assists: 0, headshots: 1, bodyshots: 3, legshots: 0 },
        },
        {
          puuid: "p-bravo",
          name: "Bravo",
          tag: "NA1",
          team: "Blue",
          character: "Sage",
          currenttier_patched: "Gold 1",
          damage_made: 200,
          stats: { score: 300, kills: 1, deaths: 2, assists: 0, headshots: 0, bodyshots: 2, legshots: 0 },
        },
        {
          puuid: "p-charlie",
          name: "Charlie",
          tag: "NA2",
          team: "Blue",
          character: "Omen",
          currenttier_patched: "Silver 3",
          damage_made: 50,
          stats: { score: 0, kills: 0, deaths: 1, assists: 0, headshots: 0, bodyshots: 1, legshots: 0 },
        },
      ],
    },
    teams: {
      red: { has_won: true, rounds_won: 2, rounds_lost: 1 },
      blue: { has_won: false, rounds_won: 1, rounds_lost: 2 },
    },
    rounds: [
      {
        round_num: 1,
        winning_team: "Red",
        player_stats: [stat("p-alpha", "Red", 1), stat("p-bravo", "Blue", 0), stat("p-charlie", "Blue", 0)],
      },
      {
        round_num: 2,
        winning_team: "Blue",
        player_stats: [stat("p-alpha", "Red", 0), stat("p-bravo", "Blue", 1), stat("p-charlie", "Blue", 0)],
      },
      {
        round_num: 3,
        winning_team: "Red",
        player_stats: [stat("p-alpha", "Red", 2), stat("p-bravo", "Blue", 0), stat("p-charlie", "Blue", 0)],
      },
    ],
    kills: [
      kill(1, 30000, "p-alpha", "Red", "p-bravo", "Blue"),
      kill(2, 15000, "p-bravo", "Blue", "p-alpha", "Red"),
      kill(3, 10000, "p-alpha", "Red", "p-bravo", "Blue"),
      kill(3, 20000, "p-alpha", "Red", "p-charlie", "Blue"),
    ],
  };
}

/**
 * The payload after response validation
 */
export function createMatchDetails(matchId: string): MatchDetails {
  return MatchDetailsSchema.parse(createRawMatchDetails(matchId));
}
