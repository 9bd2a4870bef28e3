/**
 * Spike Stats API - Main Entry Point
 *
 * Features:
 * - Fastify adapter
 * - Graceful shutdown handling
 * - API versioning and validation
 * - Swagger documentation
 */

import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import {
  FastifyAdapter,
  NestFastifyApplication,
} from "@nestjs/platform-fastify";
import { Logger } from "@nestjs/common";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";
import { AppConfigService } from "./common/config";

const logger = new Logger("Bootstrap");

async function bootstrap() {
  const fastifyAdapter = new FastifyAdapter({
    logger: process.env.NODE_ENV === "production",
    // Pulls fetch up to 20 matches one after another
    keepAliveTimeout: 5 * 60 * 1000,
  });

  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    fastifyAdapter,
  );

  const appConfig = app.get(AppConfigService);
  configureApp(app);

  // Swagger documentation
  const swaggerConfig = new DocumentBuilder()
    .setTitle("Spike Stats API")
    .setDescription(
      `
## Overview
Valorant match analytics built on the public stats API: per-player KAST,
ACS, ADR and multi-kills, round economy and clutch tables, and server-wide
leaderboards over logged matches.

## Match logs
Analyzed matches are logged to one JSON file per UTC day. Player and server
statistics are computed from those logs, not fetched live.

## Rate Limiting
- 10 requests per second
- 100 requests per minute
      `,
    )
    .setVersion("1.0.0")
    .setLicense("MIT", "https://opensource.org/licenses/MIT")
    .addTag("health", "Health check endpoints")
    .addTag("matches", "Fetch, analyze and log matches")
    .addTag("players", "Player statistics over logged matches")
    .addTag("server", "Server-wide statistics")
    .addTag("links", "Community users linked to Riot accounts")
    .build();

  const document = SwaggerModule.createDocument(app, swaggerConfig, {
    operationIdFactory: (_controllerKey: string, methodKey: string) =>
      methodKey,
  });

  SwaggerModule.setup("docs", app, document, {
    swaggerOptions: {
      tagsSorter: "alpha",
      operationsSorter: "alpha",
    },
    customSiteTitle: "Spike Stats API Documentation",
  });

  // Enable graceful shutdown hooks
  app.enableShutdownHooks();

  const { port, host } = appConfig;

  await app.listen(port, host);
  logger.log(`Spike Stats API running at http://${host}:${port}`);
  logger.log(`Swagger docs available at http://${host}:${port}/docs`);

  // Graceful shutdown handling
  const shutdownTimeout = appConfig.shutdownTimeoutMs;

  const gracefulShutdown = async (signal: string) => {
    logger.log(`Received ${signal}, starting graceful shutdown...`);

    // Set a timeout for forced shutdown
    const forceShutdownTimer = setTimeout(() => {
      logger.error("Forced shutdown due to timeout");
      process.exit(1);
    }, shutdownTimeout);

    try {
      await app.close();
      clearTimeout(forceShutdownTimer);
      logger.log("Graceful shutdown completed");
      process.exit(0);
    } catch (error) {
      logger.error(`Error during shutdown: ${error}`);
      clearTimeout(forceShutdownTimer);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
}

bootstrap().catch((error) => {
  logger.error(`Failed to start application: ${error}`);
  process.exit(1);
});
