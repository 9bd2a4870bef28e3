/**
 * Henrik Stats API Integration Service
 *
 * Provides resilient access to the unofficial Valorant stats API with:
 * - Circuit breaker pattern for fault tolerance
 * - Retry with exponential backoff on transient failures
 * - Deduplication of concurrent identical requests
 * - Schema validation of every response
 *
 * Failures surface as distinct errors: not found, transient (retry later),
 * rejected request, malformed response.
 *
 * API Documentation: https://docs.henrikdev.xyz/valorant
 *
 * @module integrations/henrik
 */

import { Injectable, Logger } from "@nestjs/common";
import type { z } from "zod";
import {
  MatchDetailsResponseSchema,
  MatchHistoryResponseSchema,
} from "@spike-stats/types";
import type { MatchDetails, MatchSummary, Region, RiotId } from "@spike-stats/types";
import { AppConfigService } from "../../common/config";
import type { HenrikApiConfig } from "../../common/config";
import {
  CircuitBreaker,
  CircuitBreakerOpenError,
} from "../../common/resilience/circuit-breaker";
import type { CircuitStatus } from "../../common/resilience/circuit-breaker";
import {
  AnalysisError,
  MalformedUpstreamResponseError,
  UpstreamNotFoundError,
  UpstreamRequestError,
  UpstreamTransientError,
} from "../analysis/utils/errors";

// ============================================================================
// TYPES
// ============================================================================

/**
 * Raw HTTP outcome of a call that did not fail transiently
 */
interface UpstreamResponse {
  readonly status: number;
  readonly text: string;
}

// ============================================================================
// SERVICE
// ============================================================================

@Injectable()
export class HenrikApiService {
  private readonly logger = new Logger(HenrikApiService.name);
  private readonly config: HenrikApiConfig;

  private readonly circuitBreaker: CircuitBreaker;
  private readonly inFlight: Map<string, Promise<unknown>> = new Map();

  constructor(appConfig: AppConfigService) {
    this.config = appConfig.henrik;

    this.circuitBreaker = new CircuitBreaker({
      name: "henrik-api",
      failureThreshold: 5,
      failureWindowMs: 60_000,
      coolDownMs: 30_000,
      successThreshold: 2,
    });

    if (!this.config.apiKey) {
      this.logger.warn(
        "HENRIK_API_KEY not configured. Requests will be heavily rate limited.",
      );
    }
  }

  // ============================================================================
  // PUBLIC API METHODS
  // ============================================================================

  /**
   * Most recent matches of a player, newest first
   */
  async getMatchHistory(
    region: Region,
    player: RiotId,
    size: number,
  ): Promise<MatchSummary[]> {
    const path =
      `/v3/matches/${region}/${encodeURIComponent(player.name)}/` +
      `${encodeURIComponent(player.tag)}?size=${size}`;

    const body = await this.request(path, MatchHistoryResponseSchema);
    return body.data;
  }

  /**
   * Full details of one match
   */
  async getMatchDetails(matchId: string): Promise<MatchDetails> {
    const body = await this.request(
      `/v2/match/${encodeURIComponent(matchId)}`,
      MatchDetailsResponseSchema,
    );
    return body.data;
  }

  hasApiKey(): boolean {
    return this.config.apiKey !== null;
  }

  getCircuitStatus(): CircuitStatus {
    return this.circuitBreaker.getStatus();
  }

  // ============================================================================
  // PRIVATE METHODS
  // ============================================================================

  /**
   * Fetch and validate a response body
   */
  private async request<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const body = await this.fetchJson(path);
    const result = schema.safeParse(body);

    if (!result.success) {
      const issues = result.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      );
      throw new MalformedUpstreamResponseError(
        "Stats API response did not match the expected format",
        issues,
        { path },
      );
    }

    return result.data;
  }

  /**
   * Deduplicate concurrent requests for the same path
   */
  private async fetchJson(path: string): Promise<unknown> {
    const existingRequest = this.inFlight.get(path);
    if (existingRequest) {
      this.logger.debug(`Deduplicating request: ${path}`);
      return existingRequest;
    }

    const requestPromise = this.executeRequest(path);
    this.inFlight.set(path, requestPromise);

    try {
      return await requestPromise;
    } finally {
      this.inFlight.delete(path);
    }
  }

  /**
   * Execute the request with retries on transient failures
   */
  private async executeRequest(path: string): Promise<unknown> {
    const { maxRetries, retryBaseMs } = this.config;
    let lastError: UpstreamTransientError | null = null;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        const response = await this.circuitBreaker.execute(() =>
          this.fetchOnce(path, attempt),
        );
        return this.readBody(path, response);
      } catch (error) {
        if (error instanceof CircuitBreakerOpenError) {
          throw new UpstreamTransientError("Stats API temporarily disabled after repeated failures", null, {
            path,
            retryAfterMs: error.retryAfterMs,
          });
        }

        // Not found, rejected or malformed: retrying cannot help
        if (error instanceof AnalysisError && !(error instanceof UpstreamTransientError)) {
          throw error;
        }

        lastError =
          error instanceof UpstreamTransientError
            ? error
            : new UpstreamTransientError(
                `Stats API unreachable: ${error instanceof Error ? error.message : String(error)}`,
                null,
                { path },
              );

        if (attempt < maxRetries) {
          const backoffMs = Math.max(
            retryBaseMs * Math.pow(2, attempt - 1),
            retryAfterOf(lastError),
          );
          this.logger.debug(
            `Request failed, retrying in ${backoffMs}ms (attempt ${attempt}/${maxRetries})`,
          );
          await this.sleep(backoffMs);
        }
      }
    }

    this.logger.error(
      `Stats API request ${path} failed after ${maxRetries} attempts`,
      lastError?.message,
    );
    throw lastError ?? new UpstreamTransientError("Stats API request failed", null, { path });
  }

  /**
   * One HTTP call. Throws only for failures worth retrying, so that the
   * circuit breaker counts nothing else.
   */
  private async fetchOnce(path: string, attempt: number): Promise<UpstreamResponse> {
    this.logger.debug(`Stats API request: ${path} (attempt ${attempt})`);

    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.config.apiKey) {
      headers.Authorization = this.config.apiKey;
    }

    const response = await fetch(`${this.config.baseUrl}${path}`, {
      headers,
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (response.status === 429) {
      const retryAfter = Number.parseInt(response.headers.get("Retry-After") ?? "", 10);
      this.logger.warn(`Stats API rate limited on ${path}`);
      throw new UpstreamTransientError("Stats API rate limit reached", 429, {
        path,
        retryAfterMs: Number.isNaN(retryAfter) ? 0 : retryAfter * 1000,
      });
    }

    if (response.status >= 500) {
      throw new UpstreamTransientError(
        `Stats API error: ${response.status} ${response.statusText}`,
        response.status,
        { path },
      );
    }

    return { status: response.status, text: await response.text() };
  }

  /**
   * Classify a non-transient response and parse its JSON
   */
  private readBody(path: string, response: UpstreamResponse): unknown {
    if (response.status === 404) {
      throw new UpstreamNotFoundError("Player or match not found on the stats API", { path });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new UpstreamRequestError(
        `Stats API rejected the request (${response.status})`,
        response.status,
        { path },
      );
    }

    try {
      const body: unknown = JSON.parse(response.text);
      return body;
    } catch {
      throw new MalformedUpstreamResponseError("Stats API returned invalid JSON", ["(root): not JSON"], {
        path,
      });
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Server-requested wait carried by a rate-limit error, 0 otherwise
 */
function retryAfterOf(error: UpstreamTransientError): number {
  const value = error.context?.retryAfterMs;
  return typeof value === "number" ? value : 0;
}
