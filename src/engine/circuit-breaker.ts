/**
 * Circuit breaker for one operation class.
 *
 * closed ──(failureThreshold consecutive retryable failures)──▶ open
 * open ──(recoveryTimeoutMs elapsed, next caller)──▶ half_open (one trial at a time)
 * half_open ──(successThreshold consecutive trial successes)──▶ closed
 * half_open ──(trial failure)──▶ open
 *
 * All state changes happen synchronously between awaits, so concurrent
 * operations on the event loop never observe a half-applied update and the
 * fast-fail read path takes no lock.
 */

import { Logger, logger as rootLogger } from '../logger';

export enum CircuitState {
  Closed = 'closed',
  Open = 'open',
  HalfOpen = 'half_open',
}

export interface CircuitBreakerConfig {
  /** Consecutive retryable failures that open the circuit. */
  failureThreshold: number;
  /** Time the circuit stays open before a trial is allowed. */
  recoveryTimeoutMs: number;
  /** Consecutive trial successes needed to close again. */
  successThreshold: number;
  /** Rolling window for the reported failure/success counters. */
  monitoringWindowMs: number;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeoutMs: 60_000,
  successThreshold: 3,
  monitoringWindowMs: 300_000,
};

export type Clock = () => number;

/** Outcome of asking the breaker for permission to attempt. */
export type CircuitPermit =
  | { permitted: true; trial: boolean }
  | { permitted: false; retryAfterMs: number };

export interface CircuitStatus {
  operationClass: string;
  state: CircuitState;
  consecutiveFailures: number;
  halfOpenSuccesses: number;
  openedAt: string | null;
  failuresInWindow: number;
  successesInWindow: number;
}

export class CircuitBreaker {
  private state = CircuitState.Closed;
  private consecutiveFailures = 0;
  private halfOpenSuccesses = 0;
  private openedAt: number | null = null;
  private trialInFlight = false;
  private failureTimes: number[] = [];
  private successTimes: number[] = [];
  private readonly log: Logger;

  constructor(
    readonly operationClass: string,
    private readonly config: CircuitBreakerConfig,
    private readonly clock: Clock = Date.now,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ operationClass });
  }

  /** Ask for permission to make one attempt. */
  tryAcquire(): CircuitPermit {
    const now = this.clock();

    if (this.state === CircuitState.Open) {
      const reopensAt = (this.openedAt ?? now) + this.config.recoveryTimeoutMs;
      if (now < reopensAt) {
        return { permitted: false, retryAfterMs: reopensAt - now };
      }
      this.state = CircuitState.HalfOpen;
      this.halfOpenSuccesses = 0;
      this.log.info('Circuit half-open; allowing trial attempt');
    }

    if (this.state === CircuitState.HalfOpen) {
      if (this.trialInFlight) {
        return { permitted: false, retryAfterMs: 0 };
      }
      this.trialInFlight = true;
      return { permitted: true, trial: true };
    }

    return { permitted: true, trial: false };
  }

  recordSuccess(trial: boolean): void {
    const now = this.clock();
    this.successTimes.push(now);
    this.prune(now);

    if (trial) {
      this.trialInFlight = false;
      if (this.state !== CircuitState.HalfOpen) return;
      this.halfOpenSuccesses += 1;
      if (this.halfOpenSuccesses >= this.config.successThreshold) {
        this.close();
        this.log.info('Circuit closed after successful recovery');
      }
      return;
    }

    this.consecutiveFailures = 0;
  }

  recordFailure(trial: boolean): void {
    const now = this.clock();
    this.failureTimes.push(now);
    this.prune(now);
    this.consecutiveFailures += 1;

    if (trial) {
      this.trialInFlight = false;
      this.open(now);
      this.log.warn('Circuit reopened after failed trial');
      return;
    }

    if (this.state === CircuitState.Closed && this.consecutiveFailures >= this.config.failureThreshold) {
      this.open(now);
      this.log.warn('Circuit opened', { consecutiveFailures: this.consecutiveFailures });
    }
  }

  /** Give back a trial slot without counting the outcome (fatal errors, cancellation). */
  release(trial: boolean): void {
    if (trial) this.trialInFlight = false;
  }

  isOpen(): boolean {
    return this.state === CircuitState.Open;
  }

  /** Administrative reset to closed with all counters cleared. */
  reset(): void {
    this.close();
    this.failureTimes = [];
    this.successTimes = [];
    this.trialInFlight = false;
    this.log.info('Circuit manually reset');
  }

  status(): CircuitStatus {
    this.prune(this.clock());
    return {
      operationClass: this.operationClass,
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      halfOpenSuccesses: this.halfOpenSuccesses,
      openedAt: this.openedAt === null ? null : new Date(this.openedAt).toISOString(),
      failuresInWindow: this.failureTimes.length,
      successesInWindow: this.successTimes.length,
    };
  }

  private open(now: number): void {
    this.state = CircuitState.Open;
    this.openedAt = now;
    this.halfOpenSuccesses = 0;
  }

  private close(): void {
    this.state = CircuitState.Closed;
    this.consecutiveFailures = 0;
    this.halfOpenSuccesses = 0;
    this.openedAt = null;
  }

  private prune(now: number): void {
    const cutoff = now - this.config.monitoringWindowMs;
    this.failureTimes = this.failureTimes.filter((t) => t > cutoff);
    this.successTimes = this.successTimes.filter((t) => t > cutoff);
  }
}
