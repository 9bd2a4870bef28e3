/**
 * Economy Calculator Unit Tests
 *
 * Covers the classification table rule by rule, then whole-match
 * classification and loadout signature ranking.
 */

import {
  analyzeEconomy,
  analyzeLoadoutSignatures,
  averageTeamLoadout,
  buildEconomyTable,
  classifyRound,
  describeTeamLoadout,
  ECONOMY_RULES,
  mergeEconomyTables,
} from "./economy.calculator";
import type { TeamSide } from "@spike-stats/types";
import type {
  MatchRecord,
  PlayerRecord,
  PlayerRoundStat,
  RoundRecord,
} from "../types/inputs.types";
import type { EconomyRoundContext } from "../types/economy.types";

const PLAYER = "player-x";

describe("Economy Calculator", () => {
  describe("classifyRound", () => {
    it("should label round 1 as pistol regardless of loadout", () => {
      expect(classifyRound(context({ roundNumber: 1, averageLoadout: 4500 }))).toEqual({
        type: "pistol",
        ruleId: "pistol-round",
      });
    });

    it("should label round 13 as pistol", () => {
      expect(classifyRound(context({ roundNumber: 13, averageLoadout: 0 })).type).toBe("pistol");
    });

    it("should label a post-pistol round as anti-eco after a pistol win", () => {
      const result = classifyRound(
        context({ roundNumber: 14, history: Array<boolean>(12).fill(false).concat([true]) }),
      );

      expect(result).toEqual({ type: "anti-eco", ruleId: "post-pistol-win" });
    });

    it("should fall through to loadout after a pistol loss", () => {
      const result = classifyRound(
        context({ roundNumber: 2, history: [false], averageLoadout: 800 }),
      );

      expect(result).toEqual({ type: "eco", ruleId: "loadout-eco" });
    });

    it("should not treat an unknown pistol result as a win", () => {
      const result = classifyRound(context({ roundNumber: 2, history: [null] }));

      expect(result).toEqual({ type: "force-buy", ruleId: "early-round" });
    });

    it("should apply the loadout thresholds at their boundaries", () => {
      const label = (averageLoadout: number) =>
        classifyRound(context({ roundNumber: 8, averageLoadout })).type;

      expect(label(999)).toBe("eco");
      expect(label(1000)).toBe("force-buy");
      expect(label(2499)).toBe("force-buy");
      expect(label(2500)).toBe("full-buy");
    });

    it("should prefer loadout data over round history", () => {
      const result = classifyRound(
        context({ roundNumber: 8, history: [false, false], averageLoadout: 3900 }),
      );

      expect(result).toEqual({ type: "full-buy", ruleId: "loadout-full" });
    });

    it("should infer eco from two straight losses without loadout data", () => {
      const result = classifyRound(
        context({ roundNumber: 8, history: [true, false, false] }),
      );

      expect(result).toEqual({ type: "eco", ruleId: "loss-streak" });
    });

    it("should not count unknown results toward a loss streak", () => {
      const result = classifyRound(
        context({ roundNumber: 8, history: [false, null] }),
      );

      expect(result).toEqual({ type: "full-buy", ruleId: "default" });
    });

    it("should default early rounds to force-buy without loadout data", () => {
      expect(classifyRound(context({ roundNumber: 3, history: [true, false] })).type).toBe(
        "force-buy",
      );
      expect(classifyRound(context({ roundNumber: 15, history: [false, true] })).type).toBe(
        "force-buy",
      );
    });

    it("should default other rounds to full-buy", () => {
      expect(classifyRound(context({ roundNumber: 9, history: [false, true] }))).toEqual({
        type: "full-buy",
        ruleId: "default",
      });
    });

    it("should evaluate a custom rule list top-down", () => {
      const rules = [
        { id: "always-eco", label: "eco" as const, matches: () => true },
        ...ECONOMY_RULES,
      ];

      expect(classifyRound(context({ roundNumber: 1 }), rules).ruleId).toBe("always-eco");
    });
  });

  describe("averageTeamLoadout", () => {
    it("should average non-zero values of the team only", () => {
      const round = createRound(5, "red", [
        createStat({ playerId: "a", team: "red", loadoutValue: 3000 }),
        createStat({ playerId: "b", team: "red", loadoutValue: 1000 }),
        createStat({ playerId: "c", team: "red", loadoutValue: 0 }),
        createStat({ playerId: "d", team: "blue", loadoutValue: 9000 }),
      ]);

      expect(averageTeamLoadout(round, "red")).toBe(2000);
      expect(averageTeamLoadout(round, "blue")).toBe(9000);
    });

    it("should return null without loadout data", () => {
      const round = createRound(5, "red", [createStat({ team: "red", loadoutValue: 0 })]);

      expect(averageTeamLoadout(round, "red")).toBeNull();
    });
  });

  describe("analyzeEconomy", () => {
    it("should classify a 24-round match with one observation per round", () => {
      const { table, rounds } = analyzeEconomy(PLAYER, createTwentyFourRoundMatch());

      expect(rounds).toHaveLength(24);
      expect(rounds.map((r) => r.roundNumber)).toEqual(
        Array.from({ length: 24 }, (_, i) => i + 1),
      );
      expect(table).toEqual({
        pistol: { attempts: 2, wins: 1, winRate: 50 },
        "anti-eco": { attempts: 1, wins: 1, winRate: 100 },
        eco: { attempts: 4, wins: 3, winRate: 75 },
        "force-buy": { attempts: 4, wins: 3, winRate: 75 },
        "full-buy": { attempts: 13, wins: 7, winRate: 53.8 },
      });

      const totalAttempts = Object.values(table).reduce((sum, s) => sum + s.attempts, 0);
      expect(totalAttempts).toBe(24);
    });

    it("should only grant anti-eco after the team won the pistol round", () => {
      const { rounds } = analyzeEconomy(PLAYER, createTwentyFourRoundMatch());

      expect(rounds[1]?.type).toBe("anti-eco");
      expect(rounds[13]?.type).toBe("eco");
    });

    it("should fall back to round history without loadout data", () => {
      const match = createMatch(
        (["blue", "blue", "red", "red"] as const).map((winner, i) =>
          createRound(i + 1, winner, [createStat({ team: "red" })]),
        ),
      );

      const { rounds } = analyzeEconomy(PLAYER, match);

      expect(rounds.map((r) => [r.type, r.ruleId, r.won])).toEqual([
        ["pistol", "pistol-round", false],
        ["force-buy", "early-round", false],
        ["eco", "loss-streak", true],
        ["full-buy", "default", true],
      ]);
    });

    it("should count a round with an unknown winner as not won", () => {
      const match = createMatch([
        createRound(1, "unknown", [createStat({ team: "red" })]),
        createRound(2, "red", [createStat({ team: "red" })]),
      ]);

      const { rounds, table } = analyzeEconomy(PLAYER, match);

      expect(rounds[0]?.won).toBe(false);
      expect(rounds[1]?.type).toBe("force-buy");
      expect(table.pistol).toEqual({ attempts: 1, wins: 0, winRate: 0 });
    });

    it("should return an empty table when the player is not in the match", () => {
      const { table, rounds } = analyzeEconomy("nobody", createTwentyFourRoundMatch());

      expect(rounds).toEqual([]);
      expect(table.eco).toEqual({ attempts: 0, wins: 0, winRate: 0 });
      expect(table["full-buy"].attempts).toBe(0);
    });
  });

  describe("mergeEconomyTables", () => {
    it("should sum attempts and wins and recompute win rates", () => {
      const first = buildEconomyTable([
        { roundNumber: 1, type: "eco", ruleId: "loadout-eco", averageLoadout: 500, won: true },
        { roundNumber: 2, type: "eco", ruleId: "loadout-eco", averageLoadout: 600, won: false },
      ]);
      const second = buildEconomyTable([
        { roundNumber: 1, type: "eco", ruleId: "loss-streak", averageLoadout: null, won: false },
        { roundNumber: 2, type: "pistol", ruleId: "pistol-round", averageLoadout: null, won: true },
      ]);

      const merged = mergeEconomyTables([first, second]);

      expect(merged.eco).toEqual({ attempts: 3, wins: 1, winRate: 33.3 });
      expect(merged.pistol).toEqual({ attempts: 1, wins: 1, winRate: 100 });
      expect(merged["anti-eco"]).toEqual({ attempts: 0, wins: 0, winRate: 0 });
    });
  });

  describe("describeTeamLoadout", () => {
    it("should keep the three most common weapons in alphabetical order", () => {
      const result = describeTeamLoadout([
        createStat({ weapon: "Vandal", armor: "Heavy Shields", loadoutValue: 3900 }),
        createStat({ weapon: "Vandal", armor: "Heavy Shields", loadoutValue: 3900 }),
        createStat({ weapon: "Spectre", armor: "Light Shields", loadoutValue: 2000 }),
        createStat({ weapon: "Sheriff", armor: "None", loadoutValue: 800 }),
        createStat({ weapon: "Phantom", armor: null, loadoutValue: 2900 }),
      ]);

      expect(result).toEqual({
        signature: "Phantom-Sheriff-Vandal|A3|$13500",
        primaryWeapons: ["Phantom", "Sheriff", "Vandal"],
        armorCount: 3,
        totalValue: 13500,
      });
    });

    it("should name missing weapons Unknown", () => {
      const result = describeTeamLoadout([createStat({ weapon: null, armor: null, loadoutValue: 0 })]);

      expect(result.signature).toBe("Unknown|A0|$0");
    });
  });

  describe("analyzeLoadoutSignatures", () => {
    it("should rank signatures by win rate per credit", () => {
      const result = analyzeLoadoutSignatures(createSignatureMatches());

      expect(result).toEqual([
        {
          signature: "Spectre|A5|$9000",
          primaryWeapons: ["Spectre"],
          armorCount: 5,
          totalValue: 9000,
          wins: 2,
          totalRounds: 5,
          winRate: 40,
        },
        {
          signature: "Phantom-Sheriff-Vandal|A4|$15000",
          primaryWeapons: ["Phantom", "Sheriff", "Vandal"],
          armorCount: 4,
          totalValue: 15000,
          wins: 3,
          totalRounds: 5,
          winRate: 60,
        },
      ]);
    });

    it("should return nothing for matches without full teams", () => {
      const match = createMatch([
        createRound(5, "red", [createStat({ team: "red", weapon: "Vandal", loadoutValue: 3900 })]),
      ]);

      expect(analyzeLoadoutSignatures([match])).toEqual([]);
    });
  });
});

// =============================================================================
// TEST HELPERS
// =============================================================================

function context(overrides: Partial<EconomyRoundContext> = {}): EconomyRoundContext {
  return { roundNumber: 5, history: [], averageLoadout: null, ...overrides };
}

/** Winner and red mean loadout of rounds 1-24 */
const TWENTY_FOUR_ROUNDS: readonly (readonly [TeamSide, number])[] = [
  ["red", 800], ["red", 0], ["blue", 3900], ["blue", 2000],
  ["red", 500], ["red", 4200], ["blue", 4400], ["red", 1500],
  ["red", 4000], ["blue", 3900], ["red", 800], ["blue", 4100],
  ["blue", 800], ["blue", 600], ["red", 2200], ["red", 4300],
  ["red", 4300], ["blue", 4300], ["red", 1800], ["red", 4500],
  ["blue", 4500], ["red", 900], ["red", 4100], ["red", 4100],
];

function createTwentyFourRoundMatch(): MatchRecord {
  const rounds = TWENTY_FOUR_ROUNDS.map(([winner, loadout], i) =>
    createRound(i + 1, winner, [
      createStat({ playerId: PLAYER, team: "red", loadoutValue: loadout }),
      createStat({ playerId: "teammate", team: "red", loadoutValue: loadout }),
      createStat({ playerId: "broke-teammate", team: "red", loadoutValue: 0 }),
      createStat({ playerId: "opponent", team: "blue", loadoutValue: 9000 }),
    ]),
  );
  return createMatch(rounds);
}

/**
 * Rounds 3-7 have full teams on both sides; red wins 3, 4 and 5.
 * Rounds 1, 2, 13 and 14 repeat the loadouts but are excluded, round 8 has
 * no winner. A second match gives red a different loadout in only 4 rounds.
 */
function createSignatureMatches(): MatchRecord[] {
  const red = () => [
    createStat({ playerId: "r1", team: "red", weapon: "Vandal", armor: "Heavy Shields", loadoutValue: 3000 }),
    createStat({ playerId: "r2", team: "red", weapon: "Vandal", armor: "Heavy Shields", loadoutValue: 3000 }),
    createStat({ playerId: "r3", team: "red", weapon: "Phantom", armor: "Heavy Shields", loadoutValue: 3000 }),
    createStat({ playerId: "r4", team: "red", weapon: "Spectre", armor: "Light Shields", loadoutValue: 3000 }),
    createStat({ playerId: "r5", team: "red", weapon: "Sheriff", armor: null, loadoutValue: 3000 }),
  ];
  const blue = () =>
    ["b1", "b2", "b3", "b4", "b5"].map((playerId) =>
      createStat({ playerId, team: "blue", weapon: "Spectre", armor: "Light Shields", loadoutValue: 1800 }),
    );

  const winners: Record<number, TeamSide> = {
    1: "red", 2: "red", 3: "red", 4: "red", 5: "red",
    6: "blue", 7: "blue", 8: "unknown", 13: "blue", 14: "blue",
  };
  const first = createMatch(
    Object.entries(winners).map(([n, winner]) =>
      createRound(Number(n), winner, [...red(), ...blue()]),
    ),
  );

  const second = createMatch(
    [3, 4, 5, 6].map((n) =>
      createRound(n, "red", [
        ...["s1", "s2", "s3", "s4", "s5"].map((playerId) =>
          createStat({ playerId, team: "red", weapon: "Operator", armor: "Heavy Shields", loadoutValue: 5700 }),
        ),
        ...blue().slice(0, 4),
      ]),
    ),
  );

  return [first, second];
}

function createMatch(rounds: RoundRecord[]): MatchRecord {
  const player: PlayerRecord = {
    playerId: PLAYER,
    name: "Eco Fragger",
    tag: "NA1",
    team: "red",
    agent: "Jett",
    rank: "Silver 3",
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
  };

  return {
    matchId: "match-eco",
    map: "Haven",
    mode: "Competitive",
    startedAt: "2024-05-02T20:00:00Z",
    roundsPlayed: rounds.length,
    rounds,
    kills: [],
    players: [player],
    teams: { red: { roundsWon: 0 }, blue: { roundsWon: 0 } },
  };
}

function createRound(
  roundNumber: number,
  winningTeam: TeamSide,
  playerStats: PlayerRoundStat[],
): RoundRecord {
  return { roundNumber, winningTeam, playerStats };
}

function createStat(
  overrides: {
    playerId?: string;
    team?: TeamSide;
    loadoutValue?: number;
    weapon?: string | null;
    armor?: string | null;
  } = {},
): PlayerRoundStat {
  return {
    playerId: overrides.playerId ?? PLAYER,
    team: overrides.team ?? "red",
    kills: 0,
    assists: 0,
    survival: {},
    economy: {
      loadoutValue: overrides.loadoutValue ?? 0,
      weapon: overrides.weapon === undefined ? "Vandal" : overrides.weapon,
      armor: overrides.armor === undefined ? "Heavy Shields" : overrides.armor,
    },
  };
}
