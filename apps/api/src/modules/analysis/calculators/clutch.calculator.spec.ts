/**
 * Clutch Calculator Unit Tests
 *
 * The detector is a kill-density proxy: these tests pin the heuristic as
 * implemented, including the cases where it disagrees with a true clutch.
 */

import {
  calculateClutches,
  clutchSuccessRate,
  detectClutchAttempts,
  mergeClutchMetrics,
} from "./clutch.calculator";
import type { KillEvent, MatchRecord, RoundRecord } from "../types/inputs.types";

const PLAYER = "player-x";

describe("Clutch Calculator", () => {
  describe("detectClutchAttempts", () => {
    it("should ignore rounds with a single kill", () => {
      const match = createMatch({
        rounds: [createRound(1)],
        kills: [createKill({ killerId: PLAYER, timeInRoundMs: 5000 })],
      });

      expect(detectClutchAttempts(PLAYER, match)).toEqual([]);
    });

    it("should classify two kills without a death as a won 1v2", () => {
      const match = createMatch({
        rounds: [createRound(1)],
        kills: [
          createKill({ killerId: PLAYER, victimId: "e1", timeInRoundMs: 5000 }),
          createKill({ killerId: PLAYER, victimId: "e2", timeInRoundMs: 7000 }),
        ],
      });

      expect(detectClutchAttempts(PLAYER, match)).toEqual([
        {
          matchId: "match-1",
          roundNumber: 1,
          type: "1v2",
          opponents: 2,
          kills: 2,
          won: true,
          map: "Split",
          agent: "Reyna",
        },
      ]);
    });

    it("should count the clutch as won when the player died after every kill", () => {
      const match = createMatch({
        rounds: [createRound(1)],
        kills: [
          createKill({ killerId: PLAYER, victimId: "e1", timeInRoundMs: 5000 }),
          createKill({ killerId: PLAYER, victimId: "e2", timeInRoundMs: 6000 }),
          createKill({ killerId: PLAYER, victimId: "e3", timeInRoundMs: 8000 }),
          createKill({ killerId: "e4", victimId: PLAYER, timeInRoundMs: 8001 }),
        ],
      });

      const [attempt] = detectClutchAttempts(PLAYER, match);

      expect(attempt?.type).toBe("1v3");
      expect(attempt?.won).toBe(true);
    });

    it("should count the clutch as lost when a kill was not before the death", () => {
      const match = createMatch({
        rounds: [createRound(1)],
        kills: [
          createKill({ killerId: PLAYER, victimId: "e1", timeInRoundMs: 5000 }),
          createKill({ killerId: "e2", victimId: PLAYER, timeInRoundMs: 6000 }),
          createKill({ killerId: PLAYER, victimId: "e3", timeInRoundMs: 6000 }),
        ],
      });

      expect(detectClutchAttempts(PLAYER, match)[0]?.won).toBe(false);
    });

    it("should cap the situation at 1v5", () => {
      const kills = [1, 2, 3, 4, 5, 6].map((i) =>
        createKill({ killerId: PLAYER, victimId: `e${i}`, timeInRoundMs: i * 1000 }),
      );
      const match = createMatch({ rounds: [createRound(1)], kills });

      const [attempt] = detectClutchAttempts(PLAYER, match);

      expect(attempt?.type).toBe("1v5");
      expect(attempt?.opponents).toBe(5);
      expect(attempt?.kills).toBe(6);
    });

    it("should find kills tagged one round off", () => {
      const match = createMatch({
        rounds: [createRound(4)],
        kills: [
          createKill({ roundNumber: 5, killerId: PLAYER, victimId: "e1", timeInRoundMs: 1000 }),
          createKill({ roundNumber: 5, killerId: PLAYER, victimId: "e2", timeInRoundMs: 2000 }),
        ],
      });

      expect(detectClutchAttempts(PLAYER, match)[0]?.roundNumber).toBe(4);
    });

    it("should still count a multi-kill made with teammates alive", () => {
      const match = createMatch({
        rounds: [createRound(1)],
        kills: [
          createKill({ killerId: PLAYER, victimId: "e1", timeInRoundMs: 1000 }),
          createKill({ killerId: PLAYER, victimId: "e2", timeInRoundMs: 2000 }),
          createKill({ killerId: "ally", victimId: "e3", timeInRoundMs: 3000 }),
        ],
      });

      expect(detectClutchAttempts(PLAYER, match)).toHaveLength(1);
    });
  });

  describe("calculateClutches", () => {
    it("should build the breakdown and keep the hardest won clutch", () => {
      const match = createMatch({
        rounds: [createRound(1), createRound(2), createRound(3)],
        kills: [
          // round 1: won 1v2
          createKill({ roundNumber: 1, killerId: PLAYER, timeInRoundMs: 1000 }),
          createKill({ roundNumber: 1, killerId: PLAYER, timeInRoundMs: 2000 }),
          // round 2: lost 1v3
          createKill({ roundNumber: 2, killerId: PLAYER, timeInRoundMs: 1000 }),
          createKill({ roundNumber: 2, killerId: PLAYER, timeInRoundMs: 2000 }),
          createKill({ roundNumber: 2, killerId: "e5", victimId: PLAYER, timeInRoundMs: 2500 }),
          createKill({ roundNumber: 2, killerId: PLAYER, timeInRoundMs: 3000 }),
          // round 3: won 1v2
          createKill({ roundNumber: 3, killerId: PLAYER, timeInRoundMs: 1000 }),
          createKill({ roundNumber: 3, killerId: PLAYER, timeInRoundMs: 1500 }),
        ],
      });

      const result = calculateClutches(PLAYER, match);

      expect(result.total).toBe(3);
      expect(result.won).toBe(2);
      expect(result.lost).toBe(1);
      expect(result.breakdown).toEqual({
        "1v1": { attempts: 0, wins: 0 },
        "1v2": { attempts: 2, wins: 2 },
        "1v3": { attempts: 1, wins: 0 },
        "1v4": { attempts: 0, wins: 0 },
        "1v5": { attempts: 0, wins: 0 },
      });
      expect(result.best?.roundNumber).toBe(1);
      expect(result.byMap).toEqual({ Split: { attempts: 3, wins: 2 } });
      expect(result.byAgent).toEqual({ Reyna: { attempts: 3, wins: 2 } });
    });

    it("should return empty metrics for a match without kills", () => {
      const result = calculateClutches(PLAYER, createMatch({ rounds: [createRound(1)] }));

      expect(result.total).toBe(0);
      expect(result.best).toBeNull();
      expect(result.byMap).toEqual({});
    });
  });

  describe("mergeClutchMetrics", () => {
    it("should combine matches and prefer the harder clutch", () => {
      const first = calculateClutches(
        PLAYER,
        createMatch({
          rounds: [createRound(1)],
          kills: [
            createKill({ killerId: PLAYER, timeInRoundMs: 1000 }),
            createKill({ killerId: PLAYER, timeInRoundMs: 2000 }),
          ],
        }),
      );
      const second = calculateClutches(
        PLAYER,
        createMatch({
          matchId: "match-2",
          map: "Lotus",
          rounds: [createRound(7)],
          kills: [1, 2, 3, 4].map((i) =>
            createKill({ roundNumber: 7, killerId: PLAYER, timeInRoundMs: i * 1000 }),
          ),
        }),
      );

      const merged = mergeClutchMetrics([first, second]);

      expect(merged.total).toBe(2);
      expect(merged.best?.matchId).toBe("match-2");
      expect(merged.best?.type).toBe("1v4");
      expect(merged.byMap).toEqual({
        Split: { attempts: 1, wins: 1 },
        Lotus: { attempts: 1, wins: 1 },
      });
    });
  });

  describe("clutchSuccessRate", () => {
    it("should compute a one-decimal percentage", () => {
      expect(clutchSuccessRate({ attempts: 3, wins: 1 })).toBe(33.3);
      expect(clutchSuccessRate({ attempts: 0, wins: 0 })).toBe(0);
    });
  });
});

// =============================================================================
// TEST HELPERS
// =============================================================================

function createMatch(overrides: Partial<MatchRecord> = {}): MatchRecord {
  return {
    matchId: "match-1",
    map: "Split",
    mode: "Competitive",
    startedAt: "2024-05-03T21:00:00Z",
    roundsPlayed: 1,
    rounds: [],
    kills: [],
    players: [
      {
        playerId: PLAYER,
        name: "Clutch Queen",
        tag: "EUW",
        team: "blue",
        agent: "Reyna",
        rank: "Platinum 1",
        stats: {
          kills: 0,
          deaths: 0,
          assists: 0,
          score: 0,
          damage: 0,
          headshots: 0,
          bodyshots: 0,
          legshots: 0,
        },
      },
    ],
    teams: { red: { roundsWon: 0 }, blue: { roundsWon: 0 } },
    ...overrides,
  };
}

function createRound(roundNumber: number): RoundRecord {
  return { roundNumber, winningTeam: "blue", playerStats: [] };
}

function createKill(overrides: Partial<KillEvent> = {}): KillEvent {
  return {
    roundNumber: 1,
    killerId: "killer",
    killerTeam: "blue",
    victimId: "victim",
    victimTeam: "red",
    timeInRoundMs: 1000,
    assistantIds: [],
    ...overrides,
  };
}
