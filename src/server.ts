/**
 * Express server configuration.
 *
 * Assembles the orchestration core and its collaborators, and mounts the
 * API surface with middleware and routes.
 */

import express from 'express';
import { AppConfig, DEFAULT_CONFIG } from './config';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { PermissionMatrix } from './domain/rbac';
import { WorkflowDefinitionTable } from './domain/workflow';
import { PermissionEngine, loadPermissionMatrix } from './engine/permission-engine';
import { DEFAULT_WORKFLOW_DEFINITIONS } from './engine/workflow-definitions';
import { RetryExecutor, Sleeper } from './engine/retry-executor';
import { CircuitState } from './engine/circuit-breaker';
import { WorkflowStateMachine } from './engine/state-machine';
import { OrchestrationService } from './engine/orchestrator';
import { AuditLedger } from './audit/audit-ledger';
import { NotificationDispatcher } from './notifications/dispatcher';
import { LogNotifier, Notifier, WebhookNotifier } from './notifications/notifier';
import { SeededRandom } from './util/seeded-random';
import { errorHandler, identityMiddleware } from './api/middleware';
import { createRequestRoutes } from './api/requests';
import { createAuditRoutes } from './api/audit';
import { createAdminRoutes } from './api/admin';
import { createWorkflowRoutes } from './api/workflows';
import { Logger, logger } from './logger';

const VERSION = '0.1.0';

/** Application context containing all services. */
export interface AppContext {
  config: AppConfig;
  store: Store;
  permissions: PermissionEngine;
  executor: RetryExecutor;
  ledger: AuditLedger;
  notifications: NotificationDispatcher;
  stateMachine: WorkflowStateMachine;
  orchestrator: OrchestrationService;
  clock: () => number;
  startedAt: number;
}

/** Collaborators and tables a caller may substitute (tests, embedding). */
export interface AppContextOverrides {
  store?: Store;
  matrix?: PermissionMatrix;
  definitions?: WorkflowDefinitionTable;
  notifier?: Notifier;
  clock?: () => number;
  random?: () => number;
  sleep?: Sleeper;
  logger?: Logger;
}

/** Create the application context with all services. */
export function createAppContext(config: AppConfig = DEFAULT_CONFIG, overrides: AppContextOverrides = {}): AppContext {
  const log = overrides.logger ?? logger;
  const clock = overrides.clock ?? Date.now;
  const store = overrides.store ?? createMemoryStore();
  const permissions = new PermissionEngine(overrides.matrix ?? loadPermissionMatrix(config.permissionMatrixPath));
  const random =
    overrides.random ?? (config.jitterSeed !== undefined ? new SeededRandom(config.jitterSeed).source() : undefined);

  const executor = new RetryExecutor({
    classes: config.operationClasses,
    clock,
    random,
    sleep: overrides.sleep,
    logger: log,
  });
  const ledger = new AuditLedger(store.audit, executor, log, clock);
  const notifier =
    overrides.notifier ??
    (config.webhook
      ? new WebhookNotifier({ url: config.webhook.url, signingSecret: config.webhook.signingSecret, clock })
      : new LogNotifier(log));
  const notifications = new NotificationDispatcher(notifier, executor, log);
  const stateMachine = new WorkflowStateMachine({
    definitions: overrides.definitions ?? DEFAULT_WORKFLOW_DEFINITIONS,
    permissions,
    requests: store.requests,
    executor,
    ledger,
    notifications,
    clock,
    logger: log,
  });
  const orchestrator = new OrchestrationService({
    store,
    permissions,
    stateMachine,
    executor,
    ledger,
    notifications,
    clock,
    logger: log,
  });

  return {
    config,
    store,
    permissions,
    executor,
    ledger,
    notifications,
    stateMachine,
    orchestrator,
    clock,
    startedAt: clock(),
  };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    const health = ctx.orchestrator.getHealth();
    const degraded = health.circuits.some((c) => c.state !== CircuitState.Closed) || health.auditFallbackSize > 0;
    res.json({
      status: degraded ? 'degraded' : 'ok',
      version: VERSION,
      uptimeMs: ctx.clock() - ctx.startedAt,
      ...health,
    });
  });

  app.use('/api', identityMiddleware());
  app.use('/api/workflows', createWorkflowRoutes(ctx.orchestrator));
  app.use('/api/requests', createRequestRoutes(ctx.orchestrator));
  app.use('/api/audit', createAuditRoutes(ctx.orchestrator));
  app.use('/api/admin', createAdminRoutes(ctx.orchestrator));

  app.use(errorHandler);

  return app;
}
