/**
 * Request Orchestrator — role-based service request workflows with
 * permission gating, an audit ledger and retry/circuit-breaker execution.
 *
 * Run directly to start the HTTP server; import to embed the core.
 */

import { loadConfig } from './config';
import { createApp, createAppContext } from './server';
import { logger, setLogLevel } from './logger';

function main(): void {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const context = createAppContext(config);
  const app = createApp(context);
  const server = app.listen(config.port, () => {
    logger.info('Request orchestrator listening', { port: config.port });
  });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    server.close();
    context.orchestrator
      .flushNotifications()
      .then(() => context.orchestrator.flushAuditFallback())
      .then((replayed) => logger.info('Shutdown complete', { replayedAuditEntries: replayed }))
      .catch((err: unknown) => {
        logger.error('Shutdown flush failed', { error: err instanceof Error ? err.message : String(err) });
        process.exitCode = 1;
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

if (require.main === module) {
  main();
}

// Public exports for programmatic use
export { createApp, createAppContext } from './server';
export type { AppContext, AppContextOverrides } from './server';
export { loadConfig, DEFAULT_CONFIG, DEFAULT_OPERATION_CLASSES } from './config';
export type { AppConfig, WebhookConfig } from './config';
export * from './domain';
export * from './engine/permission-engine';
export * from './engine/workflow-definitions';
export * from './engine/state-machine';
export * from './engine/retry-executor';
export * from './engine/circuit-breaker';
export * from './engine/orchestrator';
export * from './engine/request-lock';
export * from './storage/store';
export * from './storage/memory-store';
export * from './audit/audit-ledger';
export * from './notifications/notifier';
export * from './notifications/dispatcher';
export * from './util/seeded-random';
export * from './logger';
