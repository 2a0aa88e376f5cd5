/**
 * Runtime configuration.
 *
 * Defaults overridden by environment variables. Per-class executor settings
 * use the prefixes ORCH_PERSISTENCE_, ORCH_NOTIFICATION_ and ORCH_AUDIT_
 * followed by MAX_ATTEMPTS, BASE_DELAY_MS, MAX_DELAY_MS, BACKOFF_MULTIPLIER,
 * STRATEGY, JITTER, DEADLINE_MS, FAILURE_THRESHOLD, RECOVERY_TIMEOUT_MS,
 * SUCCESS_THRESHOLD or MONITORING_WINDOW_MS.
 */

import { LogLevel, parseLogLevel } from './logger';
import { ConfigurationError, TypedError, validationError } from './domain/errors';
import { OperationClassOverrides, RetryPolicy, RetryStrategy } from './engine/retry-executor';
import { CircuitBreakerConfig } from './engine/circuit-breaker';
import { DEFAULT_PERMISSION_MATRIX_PATH } from './engine/permission-engine';
import { PERSISTENCE_WRITE } from './engine/state-machine';
import { NOTIFICATION_DISPATCH } from './notifications/dispatcher';
import { AUDIT_WRITE } from './audit/audit-ledger';

export interface WebhookConfig {
  url: string;
  signingSecret?: string;
}

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  permissionMatrixPath: string;
  /** Absent means notifications go to the log. */
  webhook?: WebhookConfig;
  /** Seed for reproducible retry jitter. */
  jitterSeed?: number;
  operationClasses: Record<string, OperationClassOverrides>;
}

export const DEFAULT_OPERATION_CLASSES: Readonly<Record<string, OperationClassOverrides>> = {
  [PERSISTENCE_WRITE]: {
    retry: { maxAttempts: 3, baseDelayMs: 200, maxDelayMs: 5_000, deadlineMs: 15_000 },
    breaker: { failureThreshold: 5, recoveryTimeoutMs: 30_000 },
  },
  [NOTIFICATION_DISPATCH]: {
    retry: { maxAttempts: 4, baseDelayMs: 1_000, maxDelayMs: 30_000 },
    breaker: { failureThreshold: 3, recoveryTimeoutMs: 60_000 },
  },
  [AUDIT_WRITE]: {
    retry: { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 2_000, deadlineMs: 10_000 },
    breaker: { failureThreshold: 5, recoveryTimeoutMs: 30_000 },
  },
};

export const DEFAULT_CONFIG: AppConfig = {
  port: 5000,
  logLevel: LogLevel.Info,
  permissionMatrixPath: DEFAULT_PERMISSION_MATRIX_PATH,
  operationClasses: DEFAULT_OPERATION_CLASSES,
};

const CLASS_PREFIXES: ReadonlyArray<[string, string]> = [
  [PERSISTENCE_WRITE, 'ORCH_PERSISTENCE_'],
  [NOTIFICATION_DISPATCH, 'ORCH_NOTIFICATION_'],
  [AUDIT_WRITE, 'ORCH_AUDIT_'],
];

type Env = Record<string, string | undefined>;

class EnvReader {
  readonly errors: TypedError[] = [];

  constructor(private readonly env: Env) {}

  string(name: string): string | undefined {
    const value = this.env[name]?.trim();
    return value ? value : undefined;
  }

  integer(name: string, min: number): number | undefined {
    const raw = this.string(name);
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      this.errors.push(validationError(`${name} must be an integer >= ${min}, got "${raw}"`, { variable: name }));
      return undefined;
    }
    return value;
  }

  number(name: string, min: number): number | undefined {
    const raw = this.string(name);
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (!Number.isFinite(value) || value < min) {
      this.errors.push(validationError(`${name} must be a number >= ${min}, got "${raw}"`, { variable: name }));
      return undefined;
    }
    return value;
  }

  boolean(name: string): boolean | undefined {
    const raw = this.string(name)?.toLowerCase();
    if (raw === undefined) return undefined;
    if (raw === 'true' || raw === '1') return true;
    if (raw === 'false' || raw === '0') return false;
    this.errors.push(validationError(`${name} must be true or false, got "${raw}"`, { variable: name }));
    return undefined;
  }

  strategy(name: string): RetryStrategy | undefined {
    const raw = this.string(name)?.toLowerCase();
    if (raw === undefined) return undefined;
    const strategy = Object.values(RetryStrategy).find((s) => s === raw);
    if (!strategy) {
      this.errors.push(validationError(`${name} must be one of ${Object.values(RetryStrategy).join(', ')}`, { variable: name }));
    }
    return strategy;
  }

  logLevel(name: string): LogLevel | undefined {
    const raw = this.string(name);
    if (raw === undefined) return undefined;
    const level = parseLogLevel(raw);
    if (!level) {
      this.errors.push(validationError(`${name} must be one of ${Object.values(LogLevel).join(', ')}`, { variable: name }));
    }
    return level;
  }
}

function assign<T, K extends keyof T>(target: Partial<T>, key: K, value: T[K] | undefined): void {
  if (value !== undefined) target[key] = value;
}

function classOverrides(reader: EnvReader, prefix: string, base: OperationClassOverrides): OperationClassOverrides {
  const retry: Partial<RetryPolicy> = { ...base.retry };
  assign(retry, 'maxAttempts', reader.integer(`${prefix}MAX_ATTEMPTS`, 1));
  assign(retry, 'baseDelayMs', reader.number(`${prefix}BASE_DELAY_MS`, 0));
  assign(retry, 'maxDelayMs', reader.number(`${prefix}MAX_DELAY_MS`, 0));
  assign(retry, 'backoffMultiplier', reader.number(`${prefix}BACKOFF_MULTIPLIER`, 1));
  assign(retry, 'strategy', reader.strategy(`${prefix}STRATEGY`));
  assign(retry, 'jitter', reader.boolean(`${prefix}JITTER`));
  assign(retry, 'deadlineMs', reader.number(`${prefix}DEADLINE_MS`, 1));

  const breaker: Partial<CircuitBreakerConfig> = { ...base.breaker };
  assign(breaker, 'failureThreshold', reader.integer(`${prefix}FAILURE_THRESHOLD`, 1));
  assign(breaker, 'recoveryTimeoutMs', reader.number(`${prefix}RECOVERY_TIMEOUT_MS`, 0));
  assign(breaker, 'successThreshold', reader.integer(`${prefix}SUCCESS_THRESHOLD`, 1));
  assign(breaker, 'monitoringWindowMs', reader.number(`${prefix}MONITORING_WINDOW_MS`, 1));

  return { retry, breaker };
}

/** Build the configuration from `env`. Throws ConfigurationError on invalid values. */
export function loadConfig(env: Env = process.env): AppConfig {
  const reader = new EnvReader(env);

  const operationClasses: Record<string, OperationClassOverrides> = {};
  for (const [operationClass, prefix] of CLASS_PREFIXES) {
    operationClasses[operationClass] = classOverrides(reader, prefix, DEFAULT_OPERATION_CLASSES[operationClass] ?? {});
  }

  const webhookUrl = reader.string('ORCH_WEBHOOK_URL');
  const config: AppConfig = {
    port: reader.integer('PORT', 0) ?? DEFAULT_CONFIG.port,
    logLevel: reader.logLevel('LOG_LEVEL') ?? DEFAULT_CONFIG.logLevel,
    permissionMatrixPath: reader.string('ORCH_PERMISSION_MATRIX_PATH') ?? DEFAULT_CONFIG.permissionMatrixPath,
    webhook: webhookUrl ? { url: webhookUrl, signingSecret: reader.string('ORCH_WEBHOOK_SECRET') } : undefined,
    jitterSeed: reader.integer('ORCH_JITTER_SEED', 0),
    operationClasses,
  };

  if (reader.errors.length > 0) {
    throw new ConfigurationError(
      validationError('Invalid configuration', { errors: reader.errors.map((e) => e.message) }),
    );
  }
  return config;
}
