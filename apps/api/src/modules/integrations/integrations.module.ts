/**
 * Integrations Module
 *
 * Provides third-party integration services for the API.
 *
 * Current integrations:
 * - Henrik stats API: match history and match details
 *
 * All integration services implement resilience patterns:
 * - Circuit breaker for fault tolerance
 * - Retry with exponential backoff
 * - Schema validation of responses
 *
 * @module integrations
 */

import { Module, Global } from "@nestjs/common";

import { HenrikApiService } from "./henrik.service";

@Global()
@Module({
  providers: [HenrikApiService],
  exports: [HenrikApiService],
})
export class IntegrationsModule {}
