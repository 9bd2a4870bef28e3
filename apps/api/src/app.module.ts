/**
 * Spike Stats API - Root Application Module
 */

import { Module, MiddlewareConsumer, NestModule } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { ThrottlerModule, ThrottlerGuard } from "@nestjs/throttler";
import { APP_GUARD } from "@nestjs/core";

import { AppConfigModule, validateEnv } from "./common/config";
import { CorrelationIdMiddleware } from "./common/middleware";
import { IntegrationsModule } from "./modules/integrations";
import { StorageModule } from "./modules/storage";
import { AnalysisModule } from "./modules/analysis/analysis.module";
import { PlayerModule } from "./modules/player/player.module";
import { AggregationModule } from "./modules/aggregation/aggregation.module";
import { LinksModule } from "./modules/links";
import { HealthController } from "./health.controller";

@Module({
  imports: [
    // Configuration, validated once at startup
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [".env.local", ".env"],
      validate: validateEnv,
    }),
    AppConfigModule,

    // Rate limiting - every analysis request may fan out to the stats API
    ThrottlerModule.forRoot([
      {
        name: "short",
        ttl: 1000, // 1 second
        limit: 10, // 10 requests per second
      },
      {
        name: "long",
        ttl: 60000, // 1 minute
        limit: 100, // 100 requests per minute
      },
    ]),

    // Stats API client
    IntegrationsModule,

    // Match logs and account links
    StorageModule,

    // Feature modules
    AnalysisModule,
    PlayerModule,
    AggregationModule,
    LinksModule,
  ],
  controllers: [HealthController],
  providers: [
    // Apply rate limiting globally
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule implements NestModule {
  /**
   * Configure global middleware
   */
  configure(consumer: MiddlewareConsumer) {
    // Apply correlation ID middleware to all routes
    consumer.apply(CorrelationIdMiddleware).forRoutes("*");
  }
}
