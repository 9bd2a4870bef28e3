export { AppConfigService, EnvSchema, validateEnv } from "./app.config";
export type { Env, HenrikApiConfig } from "./app.config";
export { AppConfigModule } from "./app-config.module";
