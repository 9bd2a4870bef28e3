/**
 * Account link DTOs
 */

import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { IsNotEmpty, IsOptional, IsString, Matches, MaxLength } from "class-validator";
import { RIOT_TAG_MESSAGE, RIOT_TAG_PATTERN } from "../../../common/dto";

export class UserIdParamsDto {
  @ApiProperty({ description: "Community user ID" })
  @IsString()
  @IsNotEmpty()
  userId!: string;
}

// Link account DTO
export class LinkAccountDto {
  @ApiProperty({ description: "In-game name", example: "Player" })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiProperty({ description: "Riot tag", example: "EUW" })
  @Matches(RIOT_TAG_PATTERN, { message: RIOT_TAG_MESSAGE })
  tag!: string;

  @ApiProperty({ description: "Display name of the community user" })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  displayName!: string;

  @ApiPropertyOptional({ description: "Guild the link belongs to" })
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  guildId?: string;
}

export class ListLinksQueryDto {
  @ApiPropertyOptional({ description: "Only links of this guild" })
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  guildId?: string;
}
