/**
 * Aggregation Module - Server-wide statistics
 *
 * Architecture:
 * - Controller: REST API endpoints
 * - ServerAggregationService: reads the match logs and account links, and
 *   folds them through the aggregation calculators
 *
 * @module aggregation
 */

import { Module } from "@nestjs/common";
import { AggregationController } from "./aggregation.controller";
import { ServerAggregationService } from "./services/server-aggregation.service";

@Module({
  controllers: [AggregationController],
  providers: [ServerAggregationService],
  exports: [ServerAggregationService],
})
export class AggregationModule {}
