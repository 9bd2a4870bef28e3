/**
 * Match Log Builder Unit Tests
 */

import { MatchDetailsSchema, MatchLogEntrySchema } from "@spike-stats/types";
import { buildMatchLogEntry } from "./match-log.builder";

describe("Match Log Builder", () => {
  const loggedAt = new Date("2024-05-04T21:30:00.000Z");

  describe("buildMatchLogEntry", () => {
    it("should fill the entry header and match info", () => {
      const entry = buildMatchLogEntry({
        details: createDetails(),
        requestedPlayer: { name: "alpha", tag: "EU1" },
        region: "eu",
        loggedAt,
      });

      expect(entry.timestamp).toBe("2024-05-04T21:30:00.000Z");
      expect(entry.matchId).toBe("match-7");
      expect(entry.requestedPlayer).toBe("alpha#EU1");
      expect(entry.region).toBe("eu");
      expect(entry.matchInfo).toEqual({
        map: "Bind",
        mode: "Competitive",
        startedAt: "Saturday, May 4, 2024 9:00 PM",
        roundsPlayed: 2,
        score: "1-1",
        redRounds: 1,
        blueRounds: 1,
      });
    });

    it("should compute per-player stats", () => {
      const entry = buildMatchLogEntry({
        details: createDetails(),
        requestedPlayer: { name: "alpha", tag: "EU1" },
        region: "eu",
        loggedAt,
      });

      expect(entry.players[0]).toEqual({
        playerId: "p1",
        name: "Alpha",
        tag: "EU1",
        team: "red",
        rank: "Silver 1",
        agent: "Raze",
        stats: {
          kills: 3,
          deaths: 1,
          assists: 1,
          acs: 250,
          adr: 150,
          headshotPct: 25,
          kda: 4,
          kast: 50,
          score: 500,
          damage: 300,
          firstBloods: 1,
          firstDeaths: 1,
          multikills: 1,
          plusMinus: 2,
        },
        isRequestedPlayer: true,
      });
      expect(entry.players[1]?.isRequestedPlayer).toBe(false);
      expect(entry.players[1]?.stats.kast).toBe(50);
    });

    it("should embed the raw rounds and kills", () => {
      const details = createDetails();

      const entry = buildMatchLogEntry({
        details,
        requestedPlayer: { name: "Alpha", tag: "EU1" },
        region: "eu",
        loggedAt,
      });

      expect(entry.rounds).toHaveLength(2);
      expect(entry.kills).toHaveLength(2);
      expect(entry.rounds[0]?.round_num).toBe(1);
    });

    it("should keep an infinite KDA through JSON storage", () => {
      const entry = buildMatchLogEntry({
        details: createDetails(),
        requestedPlayer: { name: "Alpha", tag: "EU1" },
        region: "eu",
        loggedAt,
      });
      expect(entry.players[1]?.stats.kda).toBe(Number.POSITIVE_INFINITY);

      const stored = MatchLogEntrySchema.parse(JSON.parse(JSON.stringify(entry)));

      expect(stored.players[1]?.stats.kda).toBe(Number.POSITIVE_INFINITY);
      expect(stored.players[0]?.stats.kda).toBe(4);
    });
  });
});

// =============================================================================
// TEST HELPERS
// =============================================================================

function createDetails() {
  return MatchDetailsSchema.parse({
    metadata: {
      matchid: "match-7",
      map: "Bind",
      mode: "Competitive",
      rounds_played: 2,
      game_start_patched: "Saturday, May 4, 2024 9:00 PM",
    },
    players: {
      all_players: [
        {
          puuid: "p1",
          name: "Alpha",
          tag: "EU1",
          team: "Red",
          character: "Raze",
          currenttier_patched: "Silver 1",
          damage_made: 300,
          stats: { score: 500, kills: 3, deaths: 1, assists: 1, headshots: 2, bodyshots: 6, legshots: 0 },
        },
        {
          puuid: "p2",
          name: "Bravo",
          tag: "NA1",
          team: "Blue",
          character: "Sage",
          currenttier_patched: "Silver 2",
          damage_made: 100,
          stats: { score: 300, kills: 1, deaths: 0, assists: 0, headshots: 0, bodyshots: 1, legshots: 0 },
        },
      ],
    },
    teams: {
      red: { rounds_won: 1, rounds_lost: 1 },
      blue: { rounds_won: 1, rounds_lost: 1 },
    },
    rounds: [
      {
        round_num: 1,
        winning_team: "Red",
        player_stats: [
          { player_puuid: "p1", kills: 3 },
          { player_puuid: "p2", kills: 0, died_in_round: true },
        ],
      },
      {
        round_num: 2,
        winning_team: "Blue",
        player_stats: [
          { player_puuid: "p1", kills: 0 },
          { player_puuid: "p2", kills: 1 },
        ],
      },
    ],
    kills: [
      { round: 1, kill_time_in_round: 1000, killer_puuid: "p1", victim_puuid: "p2" },
      { round: 2, kill_time_in_round: 2000, killer_puuid: "p2", victim_puuid: "p1" },
    ],
  });
}
