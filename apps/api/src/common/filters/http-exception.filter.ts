/**
 * Global HTTP Exception Filter
 *
 * Standardizes all error responses across the API:
 * - NestJS HTTP exceptions (validation, not found)
 * - Analysis errors, which carry their own status and code
 * - Anything else as a 500
 *
 * @module common/filters
 */

import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import { FastifyReply, FastifyRequest } from "fastify";
import {
  AnalysisError,
  MalformedUpstreamResponseError,
} from "../../modules/analysis/utils/errors";
import { correlationIdOf, generateCorrelationId } from "../middleware";

/**
 * Standardized API error response
 */
export interface ApiErrorResponse {
  /** HTTP status code */
  statusCode: number;
  /** Error type/code for programmatic handling */
  error: string;
  /** Human-readable error message */
  message: string;
  /** Detailed error messages (validation errors, schema issues) */
  details?: string[];
  /** Request path that caused the error */
  path: string;
  /** ISO timestamp of when error occurred */
  timestamp: string;
  /** Correlation ID for request tracing */
  correlationId: string;
}

interface ErrorInfo {
  statusCode: number;
  code?: string | undefined;
  message: string;
  details?: string[] | undefined;
}

/**
 * Error code mapping for consistent error types
 */
const ERROR_CODES: Record<number, string> = {
  400: "BAD_REQUEST",
  404: "NOT_FOUND",
  409: "CONFLICT",
  422: "UNPROCESSABLE_ENTITY",
  429: "TOO_MANY_REQUESTS",
  500: "INTERNAL_SERVER_ERROR",
  502: "BAD_GATEWAY",
  503: "SERVICE_UNAVAILABLE",
  504: "GATEWAY_TIMEOUT",
};

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  constructor(private readonly isProduction: boolean = false) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();

    const correlationId = correlationIdOf(request.headers) ?? generateCorrelationId();
    const { statusCode, code, message, details } = this.extractErrorInfo(exception);

    const errorResponse: ApiErrorResponse = {
      statusCode,
      error: code ?? ERROR_CODES[statusCode] ?? "UNKNOWN_ERROR",
      message: this.sanitizeMessage(message),
      path: request.url,
      timestamp: new Date().toISOString(),
      correlationId,
    };

    // Add details if available (e.g., validation errors)
    if (details && details.length > 0) {
      errorResponse.details = details;
    }

    this.logError(exception, errorResponse, request);

    response.status(statusCode).send(errorResponse);
  }

  /**
   * Extract error information from various exception types
   */
  private extractErrorInfo(exception: unknown): ErrorInfo {
    if (exception instanceof AnalysisError) {
      return {
        statusCode: exception.statusCode,
        code: exception.code,
        message: exception.message,
        details:
          exception instanceof MalformedUpstreamResponseError ? [...exception.issues] : undefined,
      };
    }

    // Handle NestJS HTTP exceptions
    if (exception instanceof HttpException) {
      const statusCode = exception.getStatus();
      const body = exception.getResponse();

      if (typeof body === "string") {
        return { statusCode, message: body };
      }

      if (typeof body === "object" && body !== null && "message" in body) {
        const { message } = body;
        if (Array.isArray(message)) {
          return {
            statusCode,
            message: "Validation failed",
            details: message.filter((item): item is string => typeof item === "string"),
          };
        }
        if (typeof message === "string") {
          return { statusCode, message };
        }
      }

      return { statusCode, message: exception.message };
    }

    if (exception instanceof Error) {
      return {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        message: this.isProduction ? "An unexpected error occurred" : exception.message,
      };
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: "An unexpected error occurred",
    };
  }

  /**
   * Sanitize error message for production
   */
  private sanitizeMessage(message: string): string {
    if (this.isProduction) {
      // Remove stack traces and internal details
      return message
        .replace(/at .+:\d+:\d+/g, "")
        .replace(/\n/g, " ")
        .trim()
        .substring(0, 200);
    }
    return message;
  }

  /**
   * Log error with appropriate level and context
   */
  private logError(
    exception: unknown,
    errorResponse: ApiErrorResponse,
    request: FastifyRequest,
  ): void {
    const logContext = {
      correlationId: errorResponse.correlationId,
      path: errorResponse.path,
      method: request.method,
      statusCode: errorResponse.statusCode,
      ...(exception instanceof AnalysisError ? { context: exception.context } : {}),
    };

    if (errorResponse.statusCode >= 500) {
      this.logger.error(
        `[${errorResponse.correlationId}] ${errorResponse.error}: ${errorResponse.message}`,
        exception instanceof Error ? exception.stack : undefined,
        JSON.stringify(logContext),
      );
    } else if (errorResponse.statusCode >= 400) {
      this.logger.warn(
        `[${errorResponse.correlationId}] ${errorResponse.error}: ${errorResponse.message}`,
        JSON.stringify(logContext),
      );
    }
  }
}
