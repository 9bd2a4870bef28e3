/**
 * Server Stats Calculator Unit Tests
 */

import type { MatchLogEntry, ProcessedPlayer, ProcessedPlayerStats } from "@spike-stats/types";
import { calculateServerStats } from "./server-stats.calculator";
import type { PlayerFilter } from "./server-stats.calculator";

describe("Server Stats Calculator", () => {
  const notCharlie: PlayerFilter = (player) => player.name !== "Charlie";

  const entries: MatchLogEntry[] = [
    createEntry("m1", "Ascent", 13, 5, [
      createPlayer("Alpha", "red", "Jett", {
        score: 4500, kills: 20, deaths: 10, assists: 4, damage: 3000, kast: 80, firstBloods: 2, multikills: 1,
      }),
      createPlayer("Bravo", "blue", "Sage", {
        score: 2700, kills: 10, deaths: 15, assists: 6, damage: 1800, kast: 60, firstBloods: 1,
      }),
      createPlayer("Charlie", "red", "Omen", { score: 3600, kills: 15, deaths: 12 }),
    ]),
    createEntry("m2", "Ascent", 7, 13, [
      createPlayer("Alpha", "blue", "Jett", {
        score: 6000, kills: 25, deaths: 12, assists: 3, damage: 4000, kast: 85, firstBloods: 3, multikills: 2,
      }),
      createPlayer("Bravo", "red", "Sage", {
        score: 2000, kills: 8, deaths: 16, assists: 5, damage: 1500, kast: 55,
      }),
    ]),
    createEntry("m3", "Bind", 13, 11, [
      createPlayer("Alpha", "red", "Reyna", {
        score: 4800, kills: 18, deaths: 14, assists: 2, damage: 3100, kast: 75, firstBloods: 1, multikills: 1,
      }),
      createPlayer("Bravo", "blue", "Sage", {
        score: 3600, kills: 12, deaths: 18, assists: 7, damage: 2400, kast: 65, firstBloods: 1,
      }),
    ]),
    // Remade match: no rounds recorded
    createEntry("m4", "Ascent", 0, 0, [createPlayer("Alpha", "red", "Jett", { kills: 1 })]),
  ];

  describe("calculateServerStats", () => {
    it("should total tracked players only", () => {
      const stats = calculateServerStats(entries, notCharlie);

      expect(stats.overview).toEqual({
        matchesTracked: 4,
        uniquePlayers: 2,
        kills: 94,
        deaths: 85,
        assists: 27,
        damage: 15800,
        firstBloods: 8,
        multikills: 4,
      });
    });

    it("should count Charlie when everyone is tracked", () => {
      const stats = calculateServerStats(entries, () => true);

      expect(stats.overview.uniquePlayers).toBe(3);
      expect(stats.overview.kills).toBe(109);
    });

    it("should rank maps by matches and by win rate", () => {
      const stats = calculateServerStats(entries, notCharlie);

      expect(stats.mostPlayedMaps).toEqual([
        { name: "Ascent", count: 3 },
        { name: "Bind", count: 1 },
      ]);
      expect(stats.bestMapWinRates).toEqual([{ map: "Ascent", matches: 3, winRate: 40 }]);
    });

    it("should aggregate agents over matches with rounds", () => {
      const stats = calculateServerStats(entries, notCharlie);

      expect(stats.agentPicks).toEqual([
        { name: "Sage", count: 3 },
        { name: "Jett", count: 2 },
        { name: "Reyna", count: 1 },
      ]);
      expect(stats.bestPerformingAgents).toEqual([
        { agent: "Jett", picks: 2, averageAcs: 275, kd: 2.05 },
        { agent: "Reyna", picks: 1, averageAcs: 200, kd: 1.29 },
        { agent: "Sage", picks: 3, averageAcs: 133.3, kd: 0.61 },
      ]);
    });

    it("should build leaderboards", () => {
      const { leaderboards } = calculateServerStats(entries, notCharlie);

      expect(leaderboards.acs).toEqual([
        { player: "Alpha#EU1", matches: 3, value: 250 },
        { player: "Bravo#EU1", matches: 3, value: 133.3 },
      ]);
      expect(leaderboards.kd.map((entry) => entry.value)).toEqual([1.75, 0.61]);
      expect(leaderboards.kast.map((entry) => entry.value)).toEqual([80, 60]);
      expect(leaderboards.damage.map((entry) => entry.value)).toEqual([10100, 5700]);
    });

    it("should leave players with fewer than three matches off the leaderboards", () => {
      const stats = calculateServerStats(entries.slice(0, 2), notCharlie);

      expect(stats.leaderboards.acs).toEqual([]);
      expect(stats.bestAgentPerPlayer).toEqual([]);
    });

    it("should find each player's best agent and best game", () => {
      const stats = calculateServerStats(entries, notCharlie);

      expect(stats.bestAgentPerPlayer).toEqual([
        { player: "Alpha#EU1", agent: "Jett", averageAcs: 275, matches: 2 },
        { player: "Bravo#EU1", agent: "Sage", averageAcs: 133.3, matches: 3 },
      ]);
      expect(stats.bestGames).toEqual([
        {
          player: "Alpha#EU1",
          matchId: "m2",
          map: "Ascent",
          agent: "Jett",
          acs: 300,
          kills: 25,
          deaths: 12,
          assists: 3,
          kda: 2.33,
        },
        {
          player: "Bravo#EU1",
          matchId: "m1",
          map: "Ascent",
          agent: "Sage",
          acs: 150,
          kills: 10,
          deaths: 15,
          assists: 6,
          kda: 1.07,
        },
      ]);
    });

    it("should zero out an implausible ACS", () => {
      const corrupted = createEntry("bad", "Lotus", 1, 0, [
        createPlayer("Alpha", "red", "Jett", { score: 5000, acs: 5000 }),
      ]);

      const stats = calculateServerStats([corrupted], () => true);

      expect(stats.agentPicks).toEqual([{ name: "Jett", count: 1 }]);
      expect(stats.bestPerformingAgents).toEqual([]);
      expect(stats.bestGames).toEqual([]);
    });

    it("should return an empty report for no matches", () => {
      const stats = calculateServerStats([], () => true);

      expect(stats.overview.matchesTracked).toBe(0);
      expect(stats.mostPlayedMaps).toEqual([]);
      expect(stats.leaderboards.damage).toEqual([]);
    });
  });
});

// =============================================================================
// TEST HELPERS
// =============================================================================

function createPlayer(
  name: string,
  team: string,
  agent: string,
  stats: Partial<ProcessedPlayerStats> = {},
): ProcessedPlayer {
  return {
    playerId: `${name.toLowerCase()}-id`,
    name,
    tag: "EU1",
    team,
    rank: "Gold 1",
    agent,
    stats: {
      kills: 0,
      deaths: 0,
      assists: 0,
      acs: 0,
      adr: 0,
      headshotPct: 0,
      kda: 0,
      kast: 0,
      score: 0,
      damage: 0,
      firstBloods: 0,
      firstDeaths: 0,
      multikills: 0,
      plusMinus: 0,
      ...stats,
    },
    isRequestedPlayer: false,
  };
}

function createEntry(
  matchId: string,
  map: string,
  redRounds: number,
  blueRounds: number,
  players: ProcessedPlayer[],
): MatchLogEntry {
  return {
    timestamp: "2024-05-04T20:00:00.000Z",
    matchId,
    requestedPlayer: "Alpha#EU1",
    region: "eu",
    matchInfo: {
      map,
      mode: "Competitive",
      startedAt: "",
      roundsPlayed: redRounds + blueRounds,
      score: `${redRounds}-${blueRounds}`,
      redRounds,
      blueRounds,
    },
    players,
    rounds: [],
    kills: [],
  };
}
