/**
 * Integrations module exports
 *
 * @module integrations
 */

export { IntegrationsModule } from "./integrations.module";
export { HenrikApiService } from "./henrik.service";
