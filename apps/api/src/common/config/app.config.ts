/**
 * Application Configuration
 *
 * Environment variables are validated once at startup against {@link EnvSchema}
 * (wired through `ConfigModule.forRoot({ validate })`); services read typed
 * values through {@link AppConfigService} instead of raw strings.
 *
 * Configuration Hierarchy (lower overrides higher):
 * 1. Schema defaults
 * 2. `.env` then `.env.local`
 * 3. Process environment
 */

import { Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { z } from "zod";

export const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default("0.0.0.0"),

  // Stats API
  HENRIK_API_KEY: z.string().optional(),
  HENRIK_API_BASE_URL: z.string().url().default("https://api.henrikdev.xyz/valorant"),
  HENRIK_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  HENRIK_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  HENRIK_RETRY_BASE_MS: z.coerce.number().int().min(0).default(1000),

  // Storage
  MATCH_LOGS_DIR: z.string().min(1).default("match_logs"),
  USER_LINKS_FILE: z.string().min(1).default("user_links.json"),

  CORS_ORIGINS: z.string().default("*"),
  SHUTDOWN_TIMEOUT: z.coerce.number().int().positive().default(30000),
});
export type Env = z.infer<typeof EnvSchema>;

/**
 * Validate the raw environment; fails startup on a bad value
 */
export function validateEnv(config: Record<string, unknown>): Env {
  const result = EnvSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}

/**
 * Stats API client settings
 */
export interface HenrikApiConfig {
  /** Sent as-is in the Authorization header; requests go unauthenticated without it */
  readonly apiKey: string | null;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly maxRetries: number;

  /** First backoff delay; doubles on each retry */
  readonly retryBaseMs: number;
}

@Injectable()
export class AppConfigService {
  constructor(private readonly configService: ConfigService<Env, true>) {}

  get isProduction(): boolean {
    return this.configService.get("NODE_ENV", { infer: true }) === "production";
  }

  get port(): number {
    return this.configService.get("PORT", { infer: true });
  }

  get host(): string {
    return this.configService.get("HOST", { infer: true });
  }

  get henrik(): HenrikApiConfig {
    const apiKey = this.configService.get("HENRIK_API_KEY", { infer: true });

    return {
      apiKey: apiKey ? apiKey : null,
      baseUrl: this.configService.get("HENRIK_API_BASE_URL", { infer: true }).replace(/\/+$/, ""),
      timeoutMs: this.configService.get("HENRIK_TIMEOUT_MS", { infer: true }),
      maxRetries: this.configService.get("HENRIK_MAX_RETRIES", { infer: true }),
      retryBaseMs: this.configService.get("HENRIK_RETRY_BASE_MS", { infer: true }),
    };
  }

  get matchLogsDir(): string {
    return this.configService.get("MATCH_LOGS_DIR", { infer: true });
  }

  get userLinksFile(): string {
    return this.configService.get("USER_LINKS_FILE", { infer: true });
  }

  get corsOrigins(): string[] {
    return this.configService
      .get("CORS_ORIGINS", { infer: true })
      .split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0);
  }

  get shutdownTimeoutMs(): number {
    return this.configService.get("SHUTDOWN_TIMEOUT", { infer: true });
  }
}
