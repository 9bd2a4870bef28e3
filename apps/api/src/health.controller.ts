/**
 * Health check controller with detailed diagnostics
 *
 * Features:
 * - Basic health check for load balancers
 * - Detailed status of the stats API client (circuit state, API key)
 * - Ready endpoint for container orchestrators
 */

import { Controller, Get, HttpCode, HttpStatus, Version, VERSION_NEUTRAL } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse } from "@nestjs/swagger";
import { CircuitState } from "./common/resilience/circuit-breaker";
import { HenrikApiService } from "./modules/integrations/henrik.service";

export interface HealthStatus {
  status: "healthy" | "degraded";
  service: string;
  timestamp: string;
  uptime: number;
  version: string;
  checks: {
    statsApi: {
      status: "healthy" | "degraded";
      apiKeyConfigured: boolean;
      circuitBreaker: { state: CircuitState; failures: number; nextAttemptTime: string | null };
    };
  };
}

@ApiTags("health")
@Controller()
export class HealthController {
  private readonly startTime = Date.now();

  constructor(private readonly henrik: HenrikApiService) {}

  @Get("health")
  @Version([VERSION_NEUTRAL, "1"])
  @ApiOperation({ summary: "Basic health check for load balancers" })
  @ApiResponse({ status: 200, description: "Service is healthy" })
  @HttpCode(HttpStatus.OK)
  health(): { status: string; timestamp: string } {
    return {
      status: "ok",
      timestamp: new Date().toISOString(),
    };
  }

  @Get("health/ready")
  @Version([VERSION_NEUTRAL, "1"])
  @ApiOperation({ summary: "Readiness check, false while the stats API circuit is open" })
  ready(): { ready: boolean; checks: Record<string, boolean> } {
    const checks = {
      statsApi: this.henrik.getCircuitStatus().state !== CircuitState.OPEN,
    };
    return { ready: Object.values(checks).every((v) => v), checks };
  }

  @Get("health/detailed")
  @Version([VERSION_NEUTRAL, "1"])
  @ApiOperation({ summary: "Detailed health status of the stats API client" })
  @ApiResponse({ status: 200, description: "Detailed health information" })
  detailedHealth(): HealthStatus {
    const circuit = this.henrik.getCircuitStatus();
    const statsApiStatus = circuit.state === CircuitState.OPEN ? "degraded" : "healthy";

    return {
      status: statsApiStatus,
      service: "spike-stats-api",
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      version: process.env.npm_package_version || "0.1.0",
      checks: {
        statsApi: {
          status: statsApiStatus,
          apiKeyConfigured: this.henrik.hasApiKey(),
          circuitBreaker: {
            state: circuit.state,
            failures: circuit.failures,
            nextAttemptTime:
              circuit.nextAttemptTime === null ? null : new Date(circuit.nextAttemptTime).toISOString(),
          },
        },
      },
    };
  }

  @Get()
  @ApiOperation({ summary: "API root - service info" })
  root() {
    return {
      name: "Spike Stats API",
      version: "0.1.0",
      description: "Valorant match analytics: KAST, economy, clutches and server leaderboards",
      documentation: "/docs",
      endpoints: {
        matches: "/v1/matches",
        players: "/v1/players",
        server: "/v1/server",
        links: "/v1/links",
        health: "/health",
        healthReady: "/health/ready",
        healthDetailed: "/health/detailed",
      },
    };
  }
}
