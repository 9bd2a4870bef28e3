/**
 * Analysis DTOs - Data Transfer Objects for match endpoints
 */

import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { IsInt, IsNotEmpty, IsOptional, IsString, Max, Min } from "class-validator";
import { Type } from "class-transformer";
import { RiotIdParamsDto } from "../../../common/dto";
import { QUERY_WINDOWS } from "../../aggregation/aggregation.config";

// Pull query DTO
export class PullMatchesQueryDto {
  @ApiPropertyOptional({
    description: "Number of recent matches to log",
    minimum: QUERY_WINDOWS.pullCount.min,
    maximum: QUERY_WINDOWS.pullCount.max,
    default: QUERY_WINDOWS.pullCount.default,
  })
  @IsInt()
  @Min(QUERY_WINDOWS.pullCount.min)
  @Max(QUERY_WINDOWS.pullCount.max)
  @IsOptional()
  @Type(() => Number)
  count?: number;
}

export class MatchIdParamsDto {
  @ApiProperty({ description: "Match ID" })
  @IsString()
  @IsNotEmpty()
  matchId!: string;
}

// The KAST breakdown takes the Riot ID as query parameters
export class KastQueryDto extends RiotIdParamsDto {}
