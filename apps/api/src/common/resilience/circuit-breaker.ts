/**
 * Circuit Breaker
 *
 * Stops calling the stats API after repeated failures and lets a few trial
 * calls through once the cool-down is over.
 *
 * - CLOSED: calls pass; failures inside the window are counted
 * - OPEN: calls are rejected until the cool-down ends
 * - HALF_OPEN: calls pass; enough successes close the circuit, one failure
 *   opens it again
 *
 * Only errors thrown by the wrapped call count as failures, so callers decide
 * what a failure is by what they throw.
 */

import { Logger } from "@nestjs/common";

export enum CircuitState {
  CLOSED = "CLOSED",
  OPEN = "OPEN",
  HALF_OPEN = "HALF_OPEN",
}

export interface CircuitBreakerOptions {
  /** Used in log messages */
  name: string;

  /** Failures inside `failureWindowMs` that open the circuit */
  failureThreshold: number;

  /** Failures older than this no longer count */
  failureWindowMs: number;

  /** How long the circuit stays open */
  coolDownMs: number;

  /** Half-open successes needed to close */
  successThreshold: number;

  /** Clock, in epoch milliseconds */
  now: () => number;
}

export interface CircuitStatus {
  readonly state: CircuitState;
  readonly failures: number;
  readonly successCount: number;

  /** Epoch ms when an open circuit lets the next call through */
  readonly nextAttemptTime: number | null;
}

type Phase =
  | { readonly state: CircuitState.CLOSED; readonly failures: readonly number[] }
  | { readonly state: CircuitState.OPEN; readonly failures: number; readonly reopensAt: number }
  | { readonly state: CircuitState.HALF_OPEN; readonly successes: number };

const DEFAULTS: Omit<CircuitBreakerOptions, "name"> = {
  failureThreshold: 5,
  failureWindowMs: 60_000,
  coolDownMs: 30_000,
  successThreshold: 2,
  now: () => Date.now(),
};

export class CircuitBreaker {
  private readonly logger: Logger;
  private readonly options: CircuitBreakerOptions;
  private phase: Phase = { state: CircuitState.CLOSED, failures: [] };

  constructor(options: Partial<CircuitBreakerOptions> & { name: string }) {
    this.options = { ...DEFAULTS, ...options };
    this.logger = new Logger(`CircuitBreaker:${this.options.name}`);
  }

  /**
   * Run `fn` unless the circuit is open
   *
   * @throws CircuitBreakerOpenError while open; otherwise whatever `fn` throws
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.admit();

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.recordFailure(error);
      throw error;
    }

    this.recordSuccess();
    return result;
  }

  getStatus(): CircuitStatus {
    const phase = this.currentPhase();

    switch (phase.state) {
      case CircuitState.CLOSED:
        return { state: phase.state, failures: phase.failures.length, successCount: 0, nextAttemptTime: null };
      case CircuitState.OPEN:
        return { state: phase.state, failures: phase.failures, successCount: 0, nextAttemptTime: phase.reopensAt };
      case CircuitState.HALF_OPEN:
        return { state: phase.state, failures: 0, successCount: phase.successes, nextAttemptTime: null };
    }
  }

  reset(): void {
    this.phase = { state: CircuitState.CLOSED, failures: [] };
    this.logger.log("Circuit reset");
  }

  // ==========================================================================
  // PRIVATE METHODS
  // ==========================================================================

  /**
   * Phase with expired failures dropped and a finished cool-down applied
   */
  private currentPhase(): Phase {
    const now = this.options.now();

    if (this.phase.state === CircuitState.CLOSED) {
      const cutoff = now - this.options.failureWindowMs;
      this.phase = { state: CircuitState.CLOSED, failures: this.phase.failures.filter((t) => t > cutoff) };
    } else if (this.phase.state === CircuitState.OPEN && now >= this.phase.reopensAt) {
      this.phase = { state: CircuitState.HALF_OPEN, successes: 0 };
      this.logger.log("Circuit half-open, trying the service again");
    }

    return this.phase;
  }

  private admit(): void {
    const phase = this.currentPhase();
    if (phase.state === CircuitState.OPEN) {
      throw new CircuitBreakerOpenError(
        `Circuit breaker is open for ${this.options.name}`,
        phase.reopensAt - this.options.now(),
      );
    }
  }

  private recordSuccess(): void {
    const phase = this.currentPhase();

    if (phase.state === CircuitState.HALF_OPEN) {
      const successes = phase.successes + 1;
      if (successes >= this.options.successThreshold) {
        this.phase = { state: CircuitState.CLOSED, failures: [] };
        this.logger.log("Circuit closed, service recovered");
      } else {
        this.phase = { state: CircuitState.HALF_OPEN, successes };
      }
    } else if (phase.state === CircuitState.CLOSED) {
      this.phase = { state: CircuitState.CLOSED, failures: [] };
    }
  }

  private recordFailure(error: unknown): void {
    const phase = this.currentPhase();
    const now = this.options.now();

    this.logger.warn(`Failure recorded: ${error instanceof Error ? error.message : String(error)}`);

    if (phase.state === CircuitState.HALF_OPEN) {
      this.open(1, now);
    } else if (phase.state === CircuitState.CLOSED) {
      const failures = [...phase.failures, now];
      if (failures.length >= this.options.failureThreshold) {
        this.open(failures.length, now);
      } else {
        this.phase = { state: CircuitState.CLOSED, failures };
      }
    }
  }

  private open(failures: number, now: number): void {
    this.phase = { state: CircuitState.OPEN, failures, reopensAt: now + this.options.coolDownMs };
    this.logger.warn(`Circuit opened after ${failures} failures, retrying in ${this.options.coolDownMs}ms`);
  }
}

/**
 * Thrown instead of calling through while the circuit is open
 */
export class CircuitBreakerOpenError extends Error {
  constructor(
    message: string,
    public readonly retryAfterMs: number,
  ) {
    super(message);
    this.name = "CircuitBreakerOpenError";
  }
}
