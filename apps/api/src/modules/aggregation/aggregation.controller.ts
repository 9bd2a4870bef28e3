/**
 * Aggregation Controller - REST API for server-wide statistics
 *
 * Endpoints:
 * - GET /v1/server/stats       - Overview, leaderboards and best games
 * - GET /v1/server/economy     - First blood impact and effective loadouts
 * - GET /v1/server/first-blood - First blood win rate
 *
 * @module aggregation/controller
 */

import { Controller, Get, Query } from "@nestjs/common";
import { ApiOperation, ApiTags } from "@nestjs/swagger";
import { ServerQueryDto } from "./dto/server.dto";
import { ServerAggregationService } from "./services/server-aggregation.service";
import type {
  EconomyInsightsResult,
  FirstBloodResult,
  ServerQuery,
  ServerStatsResult,
} from "./services/server-aggregation.service";

@ApiTags("server")
@Controller({ path: "server", version: "1" })
export class AggregationController {
  constructor(private readonly serverAggregation: ServerAggregationService) {}

  @Get("stats")
  @ApiOperation({ summary: "Server-wide statistics from logged matches" })
  async getServerStats(@Query() query: ServerQueryDto): Promise<ServerStatsResult> {
    return this.serverAggregation.getServerStats(toServerQuery(query));
  }

  @Get("economy")
  @ApiOperation({ summary: "First blood impact and most effective team loadouts" })
  async getEconomyInsights(@Query() query: ServerQueryDto): Promise<EconomyInsightsResult> {
    return this.serverAggregation.getEconomyInsights(toServerQuery(query));
  }

  @Get("first-blood")
  @ApiOperation({ summary: "How often the first-blood team wins the round" })
  async getFirstBlood(@Query() query: ServerQueryDto): Promise<FirstBloodResult> {
    return this.serverAggregation.getFirstBlood(toServerQuery(query));
  }
}

function toServerQuery(query: ServerQueryDto): ServerQuery {
  return {
    days: query.days,
    serverOnly: query.serverOnly === undefined ? undefined : query.serverOnly === "true",
    guildId: query.guildId,
  };
}
