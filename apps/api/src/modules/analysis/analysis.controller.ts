/**
 * Analysis Controller - REST API endpoints for match analysis
 *
 * Endpoints:
 * - POST /v1/matches/:region/:name/:tag/latest - Analyze and log the latest match
 * - POST /v1/matches/:region/:name/:tag/pull   - Log several recent matches
 * - GET  /v1/matches/:matchId/kast             - Per-round KAST breakdown
 */

import { Controller, Get, HttpCode, HttpStatus, Param, Post, Query } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { RegionRiotIdParamsDto } from "../../common/dto";
import { QUERY_WINDOWS } from "../aggregation/aggregation.config";
import { AnalysisService } from "./analysis.service";
import type { KastBreakdownResult, LatestMatchResult, PullReport } from "./analysis.service";
import { KastQueryDto, MatchIdParamsDto, PullMatchesQueryDto } from "./dto/analysis.dto";

@ApiTags("matches")
@Controller({ path: "matches", version: "1" })
export class AnalysisController {
  constructor(private readonly analysisService: AnalysisService) {}

  @Post(":region/:name/:tag/latest")
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: "Analyze a player's latest match and log it" })
  @ApiResponse({ status: 404, description: "Player has no recent match" })
  @ApiResponse({ status: 503, description: "Stats API unavailable" })
  async analyzeLatest(@Param() params: RegionRiotIdParamsDto): Promise<LatestMatchResult> {
    return this.analysisService.analyzeLatestMatch(params.region, {
      name: params.name,
      tag: params.tag,
    });
  }

  @Post(":region/:name/:tag/pull")
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: "Log a player's recent matches" })
  async pullMatches(
    @Param() params: RegionRiotIdParamsDto,
    @Query() query: PullMatchesQueryDto,
  ): Promise<PullReport> {
    return this.analysisService.pullMatches(
      params.region,
      { name: params.name, tag: params.tag },
      query.count ?? QUERY_WINDOWS.pullCount.default,
    );
  }

  @Get(":matchId/kast")
  @ApiOperation({ summary: "Per-round KAST breakdown of a player in a match" })
  @ApiResponse({ status: 404, description: "Match or player not found" })
  async kastBreakdown(
    @Param() params: MatchIdParamsDto,
    @Query() query: KastQueryDto,
  ): Promise<KastBreakdownResult> {
    return this.analysisService.kastBreakdown(params.matchId, {
      name: query.name,
      tag: query.tag,
    });
  }
}
