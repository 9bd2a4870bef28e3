/**
 * Shared request DTOs for Riot accounts
 *
 * @module common/dto
 */

import { ApiProperty } from "@nestjs/swagger";
import { IsIn, IsNotEmpty, IsString, Matches } from "class-validator";
import { RegionSchema } from "@spike-stats/types";
import type { Region } from "@spike-stats/types";

/** Letters and digits, at most 10 */
export const RIOT_TAG_PATTERN = /^[A-Za-z0-9]{1,10}$/;
export const RIOT_TAG_MESSAGE = "tag should contain only letters and numbers (max 10 characters)";

/**
 * Riot ID path parameters (`:name/:tag`)
 */
export class RiotIdParamsDto {
  @ApiProperty({ description: "In-game name", example: "Player" })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiProperty({ description: "Riot tag", example: "EUW" })
  @Matches(RIOT_TAG_PATTERN, { message: RIOT_TAG_MESSAGE })
  tag!: string;
}

/**
 * Region and Riot ID path parameters (`:region/:name/:tag`)
 */
export class RegionRiotIdParamsDto extends RiotIdParamsDto {
  @ApiProperty({ description: "Account region", enum: RegionSchema.options })
  @IsIn(RegionSchema.options)
  region!: Region;
}
