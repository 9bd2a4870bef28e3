/**
 * Player DTOs
 */

import { ApiPropertyOptional } from "@nestjs/swagger";
import { IsInt, IsOptional } from "class-validator";
import { Type } from "class-transformer";
import { QUERY_WINDOWS } from "../../aggregation/aggregation.config";

export class PlayerDaysQueryDto {
  @ApiPropertyOptional({
    description: `Days of logs to include; outside ${QUERY_WINDOWS.playerDays.min}-${QUERY_WINDOWS.playerDays.max} the default is used`,
    default: QUERY_WINDOWS.playerDays.default,
  })
  @IsInt()
  @IsOptional()
  @Type(() => Number)
  days?: number;
}
