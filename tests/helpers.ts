/**
 * Shared test fixtures: a controllable clock, instant sleeps, log capture
 * and an application context wired with fast retry policies.
 */

import express from 'express';
import { AppConfig, DEFAULT_CONFIG } from '../src/config';
import { AppContext, AppContextOverrides, createAppContext } from '../src/server';
import { Sleeper } from '../src/engine/retry-executor';
import { PERSISTENCE_WRITE } from '../src/engine/state-machine';
import { NOTIFICATION_DISPATCH } from '../src/notifications/dispatcher';
import { AUDIT_WRITE } from '../src/audit/audit-ledger';
import { NotificationMessage, Notifier } from '../src/notifications/notifier';
import { LogEntry, setLogHandler } from '../src/logger';
import { Actor, Role } from '../src/domain/request';
import { isRecord } from '../src/util/guards';

export const START = Date.parse('2026-03-02T09:00:00.000Z');

export class FakeClock {
  constructor(public current: number = START) {}

  now = (): number => this.current;

  tick(ms: number): void {
    this.current += ms;
  }
}

/** Resolves immediately; reports an abort the way the real sleeper does. */
export const instantSleep: Sleeper = async (_ms, signal) => !(signal?.aborted ?? false);

/** Route log output into an array for the rest of the test file. */
export function captureLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  setLogHandler((entry) => {
    entries.push(entry);
  });
  return entries;
}

export const TEST_CONFIG: AppConfig = {
  ...DEFAULT_CONFIG,
  operationClasses: {
    [PERSISTENCE_WRITE]: {
      retry: { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 100, jitter: false },
      breaker: { failureThreshold: 5, recoveryTimeoutMs: 1_000, successThreshold: 1 },
    },
    [NOTIFICATION_DISPATCH]: {
      retry: { maxAttempts: 4, baseDelayMs: 10, maxDelayMs: 100, jitter: false },
      breaker: { failureThreshold: 3, recoveryTimeoutMs: 1_000, successThreshold: 1 },
    },
    [AUDIT_WRITE]: {
      retry: { maxAttempts: 2, baseDelayMs: 10, maxDelayMs: 100, jitter: false },
      breaker: { failureThreshold: 5, recoveryTimeoutMs: 1_000, successThreshold: 1 },
    },
  },
};

/** Notifier that records every message it is given. */
export class RecordingNotifier implements Notifier {
  readonly sent: NotificationMessage[] = [];

  async send(message: NotificationMessage): Promise<void> {
    this.sent.push(message);
  }
}

export function buildContext(overrides: AppContextOverrides = {}, config: AppConfig = TEST_CONFIG): AppContext {
  return createAppContext(config, { sleep: instantSleep, notifier: new RecordingNotifier(), ...overrides });
}

export function actor(role: Role, actorId = `${role}_1`): Actor {
  return { actorId, actorRole: role };
}

export interface HttpResponse {
  status: number;
  /** Parsed JSON; read it with `field` or match it with `toMatchObject`. */
  body: unknown;
}

export interface HttpRequestOptions {
  actor?: Actor;
  headers?: Record<string, string>;
  body?: unknown;
  /** Sent as-is instead of JSON-encoding `body`. */
  rawBody?: string;
}

/** One HTTP round trip against `app` on an ephemeral loopback port. */
export function httpRequest(
  app: express.Application,
  method: string,
  path: string,
  options: HttpRequestOptions = {},
): Promise<HttpResponse> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        server.close();
        reject(new Error('Server is not listening on a TCP port'));
        return;
      }
      const headers: Record<string, string> = { 'Content-Type': 'application/json' };
      if (options.actor) {
        headers['x-actor-id'] = options.actor.actorId;
        headers['x-actor-role'] = options.actor.actorRole;
      }
      Object.assign(headers, options.headers);
      const body = options.rawBody ?? (options.body === undefined ? undefined : JSON.stringify(options.body));

      fetch(`http://127.0.0.1:${address.port}${path}`, { method, headers, body })
        .then(async (res) => {
          const json: unknown = await res.json();
          server.close();
          resolve({ status: res.status, body: json });
        })
        .catch((err: unknown) => {
          server.close();
          reject(err);
        });
    });
  });
}

/** Walk `path` through parsed JSON; undefined as soon as a step is missing. */
export function field(value: unknown, ...path: Array<string | number>): unknown {
  let current = value;
  for (const key of path) {
    if (typeof key === 'number') {
      if (!Array.isArray(current)) return undefined;
      current = current[key];
    } else {
      if (!isRecord(current)) return undefined;
      current = current[key];
    }
  }
  return current;
}
