/**
 * Match Log Builder
 *
 * Turns one fetched match into the entry persisted in the match logs:
 * computed stats for every player, the match header, and the raw rounds and
 * kills so that round-level analyses can be rerun from the logs later.
 *
 * @module analysis/calculators/aggregation/match-log
 */

import type {
  MatchDetails,
  MatchLogEntry,
  ProcessedPlayer,
  RiotId,
} from "@spike-stats/types";
import { formatRiotId, sameRiotId } from "@spike-stats/types";
import type { MatchRecord, PlayerRecord } from "../../types/inputs.types";
import { normalizeMatch } from "../../utils/match-normalizer";
import {
  firstBloodsAndDeaths,
  multikillCount,
  summarizePlayerCombat,
} from "../combat.calculator";
import { kastPercentage } from "../kast.calculator";

export interface MatchLogInput {
  readonly details: MatchDetails;

  /** Player the match was fetched for */
  readonly requestedPlayer: RiotId;
  readonly region: string;
  readonly loggedAt: Date;
}

/**
 * Build the log entry of a match
 */
export function buildMatchLogEntry(input: MatchLogInput): MatchLogEntry {
  const { details, requestedPlayer, region, loggedAt } = input;
  const match = normalizeMatch(details);
  const { red, blue } = match.teams;

  return {
    timestamp: loggedAt.toISOString(),
    matchId: match.matchId,
    requestedPlayer: formatRiotId(requestedPlayer.name, requestedPlayer.tag),
    region,
    matchInfo: {
      map: match.map,
      mode: match.mode,
      startedAt: match.startedAt,
      roundsPlayed: match.roundsPlayed,
      score: `${red.roundsWon}-${blue.roundsWon}`,
      redRounds: red.roundsWon,
      blueRounds: blue.roundsWon,
    },
    players: match.players.map((player) =>
      processPlayer(player, match, sameRiotId(player, requestedPlayer)),
    ),
    rounds: details.rounds ?? [],
    kills: details.kills ?? [],
  };
}

/**
 * Computed stats of one player for the match log
 */
export function processPlayer(
  player: PlayerRecord,
  match: MatchRecord,
  isRequestedPlayer: boolean,
): ProcessedPlayer {
  const combat = summarizePlayerCombat(player, match.roundsPlayed);
  const openings = firstBloodsAndDeaths(player.playerId, match);

  return {
    playerId: player.playerId,
    name: player.name,
    tag: player.tag,
    team: player.team,
    rank: player.rank,
    agent: player.agent,
    stats: {
      kills: combat.kills,
      deaths: combat.deaths,
      assists: combat.assists,
      acs: combat.acs,
      adr: combat.adr,
      headshotPct: combat.headshotPct,
      kda: combat.kda,
      kast: kastPercentage(player.playerId, match),
      score: player.stats.score,
      damage: player.stats.damage,
      firstBloods: openings.firstBloods,
      firstDeaths: openings.firstDeaths,
      multikills: multikillCount(player.playerId, match).multiKills,
      plusMinus: combat.plusMinus,
    },
    isRequestedPlayer,
  };
}
