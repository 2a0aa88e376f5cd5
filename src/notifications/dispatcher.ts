/**
 * Fire-and-forget notification dispatch.
 *
 * Each message is sent through the retry executor under the
 * "notification-dispatch" class. Callers never wait and never see a
 * failure; failures are logged and counted. flush() waits for everything
 * currently in flight.
 */

import { RetryExecutor } from '../engine/retry-executor';
import { TypedError, notificationError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { NotificationMessage, Notifier } from './notifier';

export const NOTIFICATION_DISPATCH = 'notification-dispatch';

export class NotificationDispatcher {
  private readonly inFlight = new Set<Promise<void>>();
  private failures = 0;
  private delivered = 0;
  private lastError: TypedError | null = null;
  private readonly log: Logger;

  constructor(
    private readonly notifier: Notifier,
    private readonly executor: RetryExecutor,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ module: 'notification-dispatcher' });
  }

  /** Queue messages for delivery and return immediately. */
  dispatch(messages: NotificationMessage[]): void {
    for (const message of messages) {
      const task = this.deliver(message);
      this.inFlight.add(task);
      void task.finally(() => this.inFlight.delete(task));
    }
  }

  /** Wait until every dispatched message has settled. */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  get failureCount(): number {
    return this.failures;
  }

  get deliveredCount(): number {
    return this.delivered;
  }

  get pendingCount(): number {
    return this.inFlight.size;
  }

  /** The most recent delivery failure, if any. */
  get lastFailure(): TypedError | null {
    return this.lastError;
  }

  private async deliver(message: NotificationMessage): Promise<void> {
    const result = await this.executor.execute(NOTIFICATION_DISPATCH, () => this.notifier.send(message));
    if (result.success) {
      this.delivered += 1;
      return;
    }
    this.failures += 1;
    const details = {
      recipientId: message.recipientId,
      templateKey: message.templateKey,
      kind: result.error.kind,
      attempts: result.error.attempts.length,
    };
    this.lastError = notificationError(result.error.message, details);
    this.log.warn('Notification not delivered', details);
  }
}
