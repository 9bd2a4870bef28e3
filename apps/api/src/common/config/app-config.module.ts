/**
 * App Config Module
 *
 * Global provider of {@link AppConfigService}. Expects `ConfigModule.forRoot`
 * with `validateEnv` to be registered by the root module.
 */

import { Global, Module } from "@nestjs/common";
import { AppConfigService } from "./app.config";

@Global()
@Module({
  providers: [AppConfigService],
  exports: [AppConfigService],
})
export class AppConfigModule {}
