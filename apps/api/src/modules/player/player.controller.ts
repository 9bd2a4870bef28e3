/**
 * Player Controller - REST API endpoints for player statistics
 */

import { Controller, Get, Param, Query } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { RiotIdParamsDto } from "../../common/dto";
import { PlayerDaysQueryDto } from "./dto/player.dto";
import { PlayerService } from "./player.service";
import type { PlayerRoundAnalysis, PlayerStatsResult } from "./player.service";

@ApiTags("players")
@Controller({ path: "players", version: "1" })
export class PlayerController {
  constructor(private readonly playerService: PlayerService) {}

  @Get(":name/:tag/stats")
  @ApiOperation({ summary: "Get a player's statistics over logged matches" })
  @ApiResponse({ status: 404, description: "No logged matches in the window" })
  async getStats(
    @Param() params: RiotIdParamsDto,
    @Query() query: PlayerDaysQueryDto,
  ): Promise<PlayerStatsResult> {
    return this.playerService.getStats({ name: params.name, tag: params.tag }, query.days);
  }

  @Get(":name/:tag/rounds")
  @ApiOperation({ summary: "Get a player's economy and clutch tables" })
  @ApiResponse({ status: 404, description: "No logged matches in the window" })
  async getRoundAnalysis(
    @Param() params: RiotIdParamsDto,
    @Query() query: PlayerDaysQueryDto,
  ): Promise<PlayerRoundAnalysis> {
    return this.playerService.getRoundAnalysis({ name: params.name, tag: params.tag }, query.days);
  }
}
