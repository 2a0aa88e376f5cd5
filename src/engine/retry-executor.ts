/**
 * Retry/Circuit-Breaker Executor.
 *
 * Runs fallible operations with per-class retry policy and one circuit
 * breaker per operation class. Every outcome is returned as a value; the
 * executor never throws to its caller.
 *
 * Operations signal a non-retryable failure by throwing FatalOperationError
 * (or via the `classifyError` option). Fatal failures end the operation
 * immediately and are not counted against the breaker.
 */

import { v4 as uuid } from 'uuid';
import { Logger, logger as rootLogger } from '../logger';
import {
  CircuitBreaker,
  CircuitBreakerConfig,
  CircuitStatus,
  Clock,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
} from './circuit-breaker';

export enum RetryStrategy {
  Exponential = 'exponential',
  Linear = 'linear',
  Fixed = 'fixed',
  Immediate = 'immediate',
  /** Exactly one attempt. */
  None = 'none',
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Randomize each delay by ±10%. */
  jitter: boolean;
  strategy: RetryStrategy;
  /** Overall budget for one execute() call, sleeps included. */
  deadlineMs?: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 300_000,
  backoffMultiplier: 2,
  jitter: true,
  strategy: RetryStrategy.Exponential,
};

export interface OperationClassConfig {
  retry: RetryPolicy;
  breaker: CircuitBreakerConfig;
}

export type OperationClassOverrides = {
  retry?: Partial<RetryPolicy>;
  breaker?: Partial<CircuitBreakerConfig>;
};

export type ErrorKind = 'retryable' | 'fatal';

/** Handed to the operation on every attempt. */
export interface RetryContext {
  operationId: string;
  operationClass: string;
  attemptNumber: number;
  lastErrorKind: ErrorKind | null;
  /** Delay slept before this attempt; 0 for the first. */
  nextDelayMs: number;
}

export interface AttemptRecord {
  attempt: number;
  startedAt: string;
  durationMs: number;
  success: boolean;
  errorKind?: ErrorKind;
  error?: string;
  /** Delay scheduled after this attempt, when one was. */
  delayMs?: number;
}

export type FailureKind = 'fatal' | 'attempts_exhausted' | 'circuit_open' | 'deadline_exceeded' | 'canceled';

export interface ExecutionFailure {
  kind: FailureKind;
  operationId: string;
  operationClass: string;
  message: string;
  attempts: AttemptRecord[];
  /** The error thrown by the last attempt, when there was one. */
  cause?: unknown;
}

export type ExecutionResult<T> =
  | { success: true; value: T; attempts: AttemptRecord[] }
  | { success: false; error: ExecutionFailure };

export interface ExecuteOptions {
  signal?: AbortSignal;
  classifyError?: (err: unknown) => ErrorKind;
}

/** Thrown by an operation to stop retrying at once. */
export class FatalOperationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FatalOperationError';
  }
}

/** Resolves true after `ms`, false as soon as `signal` aborts. */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<boolean>;

export const abortableSleep: Sleeper = (ms, signal) =>
  new Promise<boolean>((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Delay slept before retry number `retryNumber` (1 = before the second
 * attempt). The strategy's base value is capped at maxDelayMs, then jitter
 * of ±10% is applied and the result clamped at zero.
 */
export function computeDelay(policy: RetryPolicy, retryNumber: number, random: () => number = Math.random): number {
  let delay: number;
  switch (policy.strategy) {
    case RetryStrategy.Exponential:
      delay = policy.baseDelayMs * Math.pow(policy.backoffMultiplier, retryNumber - 1);
      break;
    case RetryStrategy.Linear:
      delay = policy.baseDelayMs * retryNumber;
      break;
    case RetryStrategy.Fixed:
      delay = policy.baseDelayMs;
      break;
    default:
      delay = 0;
  }
  delay = Math.min(delay, policy.maxDelayMs);
  if (policy.jitter && delay > 0) {
    delay += delay * 0.1 * (2 * random() - 1);
  }
  return Math.max(0, delay);
}

/** Executor-wide counters. */
export interface ExecutorStatistics {
  totalOperations: number;
  successfulOperations: number;
  failedOperations: number;
  successRate: number;
  averageAttempts: number;
  activeOperations: number;
  failuresByKind: Partial<Record<FailureKind, number>>;
  circuits: CircuitStatus[];
}

interface OperationSummary {
  operationId: string;
  operationClass: string;
  success: boolean;
  attempts: number;
  failureKind?: FailureKind;
}

const HISTORY_LIMIT = 1000;
const HISTORY_KEEP = 500;

export interface RetryExecutorOptions {
  defaults?: OperationClassOverrides;
  classes?: Record<string, OperationClassOverrides>;
  clock?: Clock;
  random?: () => number;
  sleep?: Sleeper;
  logger?: Logger;
}

export class RetryExecutor {
  private readonly defaults: OperationClassConfig;
  private readonly overrides: Record<string, OperationClassOverrides>;
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly sleep: Sleeper;
  private readonly log: Logger;
  private history: OperationSummary[] = [];
  private active = 0;

  constructor(options: RetryExecutorOptions = {}) {
    this.defaults = {
      retry: { ...DEFAULT_RETRY_POLICY, ...options.defaults?.retry },
      breaker: { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...options.defaults?.breaker },
    };
    this.overrides = { ...options.classes };
    this.clock = options.clock ?? Date.now;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? abortableSleep;
    this.log = (options.logger ?? rootLogger).child({ module: 'retry-executor' });
  }

  /** Effective configuration for an operation class. */
  configFor(operationClass: string): OperationClassConfig {
    const override = this.overrides[operationClass];
    return {
      retry: { ...this.defaults.retry, ...override?.retry },
      breaker: { ...this.defaults.breaker, ...override?.breaker },
    };
  }

  async execute<T>(
    operationClass: string,
    operation: (context: RetryContext) => Promise<T>,
    options: ExecuteOptions = {},
  ): Promise<ExecutionResult<T>> {
    const operationId = `op_${uuid()}`;
    const policy = this.configFor(operationClass).retry;
    const breaker = this.breaker(operationClass);
    const maxAttempts = policy.strategy === RetryStrategy.None ? 1 : Math.max(1, policy.maxAttempts);
    const startedAt = this.clock();
    const attempts: AttemptRecord[] = [];
    let lastErrorKind: ErrorKind | null = null;
    let lastError: unknown;
    let delayMs = 0;

    const fail = (kind: FailureKind, message: string): ExecutionResult<T> => {
      this.finish({ operationId, operationClass, success: false, attempts: attempts.length, failureKind: kind });
      this.log.warn('Operation failed', { operationClass, operationId, kind, attempts: attempts.length });
      return {
        success: false,
        error: { kind, operationId, operationClass, message, attempts, cause: lastError },
      };
    };
    const deadlinePassed = (extraMs = 0): boolean =>
      policy.deadlineMs !== undefined && this.clock() - startedAt + extraMs >= policy.deadlineMs;

    this.active += 1;
    try {
      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        if (options.signal?.aborted) {
          return fail('canceled', 'Operation canceled');
        }
        if (deadlinePassed()) {
          return fail('deadline_exceeded', `Deadline of ${policy.deadlineMs}ms exceeded`);
        }
        const permit = breaker.tryAcquire();
        if (!permit.permitted) {
          return fail('circuit_open', `Circuit for "${operationClass}" is open`);
        }

        const attemptStart = this.clock();
        try {
          const value = await operation({
            operationId,
            operationClass,
            attemptNumber: attempt,
            lastErrorKind,
            nextDelayMs: delayMs,
          });
          breaker.recordSuccess(permit.trial);
          attempts.push({
            attempt,
            startedAt: new Date(attemptStart).toISOString(),
            durationMs: this.clock() - attemptStart,
            success: true,
          });
          this.finish({ operationId, operationClass, success: true, attempts: attempts.length });
          return { success: true, value, attempts };
        } catch (err) {
          lastError = err;
          lastErrorKind = this.classify(err, options);
          const record: AttemptRecord = {
            attempt,
            startedAt: new Date(attemptStart).toISOString(),
            durationMs: this.clock() - attemptStart,
            success: false,
            errorKind: lastErrorKind,
            error: err instanceof Error ? err.message : String(err),
          };
          attempts.push(record);

          if (lastErrorKind === 'fatal') {
            breaker.release(permit.trial);
            return fail('fatal', record.error ?? 'Fatal error');
          }
          breaker.recordFailure(permit.trial);
          this.log.debug('Attempt failed', { operationClass, operationId, attempt, error: record.error });

          if (attempt === maxAttempts) break;
          // An open circuit fails the next iteration without sleeping.
          if (breaker.isOpen()) continue;

          delayMs = computeDelay(policy, attempt, this.random);
          record.delayMs = delayMs;
          if (deadlinePassed(delayMs)) {
            return fail('deadline_exceeded', `Deadline of ${policy.deadlineMs}ms would be exceeded by the next retry`);
          }
          if (delayMs > 0) {
            const slept = await this.sleep(delayMs, options.signal);
            if (!slept) return fail('canceled', 'Operation canceled while waiting to retry');
          }
        }
      }

      return fail('attempts_exhausted', `All ${maxAttempts} attempts failed`);
    } finally {
      this.active -= 1;
    }
  }

  getCircuitStatus(operationClass: string): CircuitStatus {
    return this.breaker(operationClass).status();
  }

  listCircuits(): CircuitStatus[] {
    return [...this.breakers.values()].map((b) => b.status());
  }

  /** Force a class's circuit back to closed. */
  resetCircuit(operationClass: string): CircuitStatus {
    const breaker = this.breaker(operationClass);
    breaker.reset();
    return breaker.status();
  }

  getStatistics(): ExecutorStatistics {
    const total = this.history.length;
    const successful = this.history.filter((h) => h.success).length;
    const failuresByKind: Partial<Record<FailureKind, number>> = {};
    let attemptSum = 0;
    for (const entry of this.history) {
      attemptSum += entry.attempts;
      if (entry.failureKind) {
        failuresByKind[entry.failureKind] = (failuresByKind[entry.failureKind] ?? 0) + 1;
      }
    }
    return {
      totalOperations: total,
      successfulOperations: successful,
      failedOperations: total - successful,
      successRate: total === 0 ? 0 : successful / total,
      averageAttempts: total === 0 ? 0 : attemptSum / total,
      activeOperations: this.active,
      failuresByKind,
      circuits: this.listCircuits(),
    };
  }

  private breaker(operationClass: string): CircuitBreaker {
    let breaker = this.breakers.get(operationClass);
    if (!breaker) {
      breaker = new CircuitBreaker(operationClass, this.configFor(operationClass).breaker, this.clock, this.log);
      this.breakers.set(operationClass, breaker);
    }
    return breaker;
  }

  private classify(err: unknown, options: ExecuteOptions): ErrorKind {
    if (err instanceof FatalOperationError) return 'fatal';
    if (!options.classifyError) return 'retryable';
    try {
      return options.classifyError(err);
    } catch (classifyErr) {
      this.log.warn('classifyError threw; treating the failure as retryable', {
        error: classifyErr instanceof Error ? classifyErr.message : String(classifyErr),
      });
      return 'retryable';
    }
  }

  private finish(summary: OperationSummary): void {
    this.history.push(summary);
    if (this.history.length > HISTORY_LIMIT) {
      this.history = this.history.slice(-HISTORY_KEEP);
    }
  }
}
