/**
 * Analysis Module - Match analysis and logging
 *
 * Architecture:
 * - Controller: REST API endpoints
 * - AnalysisService: fetch, analyze and log matches
 * - Calculators: Pure functions for metric calculations
 *
 * The stats API client and the stores come from the global
 * IntegrationsModule and StorageModule.
 *
 * @module analysis
 */

import { Module } from "@nestjs/common";
import { AnalysisController } from "./analysis.controller";
import { AnalysisService } from "./analysis.service";

@Module({
  controllers: [AnalysisController],
  providers: [AnalysisService],
  exports: [AnalysisService],
})
export class AnalysisModule {}
