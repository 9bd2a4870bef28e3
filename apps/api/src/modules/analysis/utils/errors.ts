/**
 * Analysis Errors - Custom error types for analysis module
 *
 * Provides structured error handling with:
 * - Specific error types for different failure modes
 * - Error codes for programmatic handling
 * - Contextual information for debugging
 *
 * The calculators never throw; these errors come from the collaborators
 * around them (upstream API, log store, request validation). Upstream
 * failures are split into not-found, transient and malformed so callers can
 * decide whether a retry makes sense.
 *
 * @module analysis/utils/errors
 */

/**
 * Base error for all analysis errors
 */
export abstract class AnalysisError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly timestamp: Date;
  readonly context: Record<string, unknown> | undefined;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
    };
  }
}

/**
 * Invalid input data error
 */
export class InvalidInputError extends AnalysisError {
  readonly code = "INVALID_INPUT";
  readonly statusCode = 400;
  readonly field: string | undefined;

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
    this.field = field;
  }
}

/**
 * Match found neither in the logs nor on the stats API
 */
export class MatchNotFoundError extends AnalysisError {
  readonly code = "MATCH_NOT_FOUND";
  readonly statusCode = 404;
  readonly matchId: string;

  constructor(matchId: string) {
    super(`Match not found: ${matchId}`, { matchId });
    this.matchId = matchId;
  }
}

/**
 * Player not found in a match or in the logs
 */
export class PlayerNotFoundError extends AnalysisError {
  readonly code = "PLAYER_NOT_FOUND";
  readonly statusCode = 404;
  readonly player: string;

  constructor(player: string, context?: Record<string, unknown>) {
    super(`Player ${player} not found`, { ...context, player });
    this.player = player;
  }
}

// =============================================================================
// UPSTREAM API ERRORS
// =============================================================================

/**
 * The stats API has no such player or match
 */
export class UpstreamNotFoundError extends AnalysisError {
  readonly code = "UPSTREAM_NOT_FOUND";
  readonly statusCode = 404;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
  }
}

/**
 * Rate limit, server error, timeout, network failure or open circuit.
 * Retrying later may succeed.
 */
export class UpstreamTransientError extends AnalysisError {
  readonly code = "UPSTREAM_UNAVAILABLE";
  readonly statusCode = 503;
  readonly upstreamStatus: number | null;

  constructor(message: string, upstreamStatus: number | null, context?: Record<string, unknown>) {
    super(message, { ...context, upstreamStatus });
    this.upstreamStatus = upstreamStatus;
  }
}

/**
 * The stats API answered with a body that does not match its schema
 */
export class MalformedUpstreamResponseError extends AnalysisError {
  readonly code = "UPSTREAM_MALFORMED";
  readonly statusCode = 502;
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[], context?: Record<string, unknown>) {
    super(message, { ...context, issues });
    this.issues = issues;
  }
}

/**
 * The stats API rejected the request (bad request, missing or invalid key)
 */
export class UpstreamRequestError extends AnalysisError {
  readonly code = "UPSTREAM_REJECTED";
  readonly statusCode = 502;
  readonly upstreamStatus: number;

  constructor(message: string, upstreamStatus: number, context?: Record<string, unknown>) {
    super(message, { ...context, upstreamStatus });
    this.upstreamStatus = upstreamStatus;
  }
}

// =============================================================================
// RESULT TYPE
// =============================================================================

/**
 * Result type for operations that can fail
 */
export type Result<T, E extends AnalysisError = AnalysisError> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Create a success result
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Create a failure result
 */
export function err<E extends AnalysisError>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Check if result is success
 */
export function isOk<T, E extends AnalysisError>(
  result: Result<T, E>
): result is { success: true; data: T } {
  return result.success;
}
