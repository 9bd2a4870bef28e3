/**
 * Application setup shared by the server entry point and the e2e tests
 *
 * - API versioning (`/v1`)
 * - Validation of params, queries and bodies through class-validator DTOs
 * - Standardized error responses
 */

import { ValidationPipe, VersioningType } from "@nestjs/common";
import type { NestFastifyApplication } from "@nestjs/platform-fastify";
import { AppConfigService } from "./common/config";
import { GlobalExceptionFilter } from "./common/filters";

export function configureApp(app: NestFastifyApplication): void {
  const appConfig = app.get(AppConfigService);

  // Enable CORS
  app.enableCors({
    origin: appConfig.corsOrigins,
  });

  // API versioning
  app.enableVersioning({
    type: VersioningType.URI,
    defaultVersion: "1",
  });

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  // Global exception filter for standardized error responses
  app.useGlobalFilters(new GlobalExceptionFilter(appConfig.isProduction));
}
