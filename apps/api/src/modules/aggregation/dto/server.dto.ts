/**
 * Server statistics DTOs
 */

import { ApiPropertyOptional } from "@nestjs/swagger";
import { IsIn, IsInt, IsNotEmpty, IsOptional, IsString } from "class-validator";
import { Type } from "class-transformer";
import { QUERY_WINDOWS } from "../aggregation.config";

export class ServerQueryDto {
  @ApiPropertyOptional({
    description: `Days of logs to include; outside ${QUERY_WINDOWS.serverDays.min}-${QUERY_WINDOWS.serverDays.max} the default is used`,
    default: QUERY_WINDOWS.serverDays.default,
  })
  @IsInt()
  @IsOptional()
  @Type(() => Number)
  days?: number;

  @ApiPropertyOptional({
    description: "Count only linked accounts",
    enum: ["true", "false"],
    default: "true",
  })
  @IsIn(["true", "false"])
  @IsOptional()
  serverOnly?: "true" | "false";

  @ApiPropertyOptional({ description: "Guild whose linked accounts are counted" })
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  guildId?: string;
}
