/**
 * Correlation ID Middleware
 *
 * Adds a correlation ID to each request so that its log lines and error
 * response can be tied together. An ID sent by the caller is kept.
 *
 * @module common/middleware
 */

import { Injectable, NestMiddleware, Logger } from "@nestjs/common";
import type { IncomingHttpHeaders } from "http";
import { FastifyRequest, FastifyReply } from "fastify";

const CORRELATION_HEADER = "x-correlation-id";

/**
 * Correlation ID sent with a request, if any
 */
export function correlationIdOf(headers: IncomingHttpHeaders): string | undefined {
  const value = headers[CORRELATION_HEADER] ?? headers["x-request-id"];
  const id = Array.isArray(value) ? value[0] : value;
  return id ? id : undefined;
}

/**
 * Generate a unique correlation ID
 * Format: timestamp-random (e.g., "lq2x5kv-a1b2c3d")
 */
export function generateCorrelationId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 9);
  return `${timestamp}-${random}`;
}

@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  private readonly logger = new Logger(CorrelationIdMiddleware.name);

  use(req: FastifyRequest["raw"], res: FastifyReply["raw"], next: () => void): void {
    const correlationId = correlationIdOf(req.headers) ?? generateCorrelationId();

    // Add to request headers for downstream use
    req.headers[CORRELATION_HEADER] = correlationId;

    // Add to response headers for client tracking
    res.setHeader(CORRELATION_HEADER, correlationId);

    this.logger.debug(`[${correlationId}] ${req.method} ${req.url}`);

    next();
  }
}
