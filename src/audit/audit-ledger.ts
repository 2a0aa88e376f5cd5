/**
 * Audit Ledger.
 *
 * Records one immutable entry per creation or transition attempt. Writes go
 * through the retry executor under the "audit-write" class; a write that
 * still fails is logged, kept in a fallback buffer and counted, and never
 * changes the outcome reported to the caller.
 */

import { v4 as uuid } from 'uuid';
import { AuditEntry, AuditFilter, AuditInput } from '../domain/audit';
import { AuditStore } from '../storage/store';
import { RetryExecutor } from '../engine/retry-executor';
import { Logger, logger as rootLogger } from '../logger';

export const AUDIT_WRITE = 'audit-write';

export class AuditLedger {
  private fallback: AuditEntry[] = [];
  private failures = 0;
  private readonly log: Logger;

  constructor(
    private readonly store: AuditStore,
    private readonly executor: RetryExecutor,
    log: Logger = rootLogger,
    private readonly clock: () => number = Date.now,
  ) {
    this.log = log.child({ module: 'audit-ledger' });
  }

  /**
   * Record an entry. Resolves to the entry whether or not it reached the
   * store; `persisted` says which.
   */
  async record(input: AuditInput): Promise<{ entry: AuditEntry; persisted: boolean }> {
    const entry: AuditEntry = {
      ...input,
      id: `aud_${uuid()}`,
      timestamp: input.timestamp ?? new Date(this.clock()).toISOString(),
    };

    const result = await this.executor.execute(AUDIT_WRITE, () => this.store.append(entry));
    if (result.success) {
      return { entry, persisted: true };
    }

    this.failures += 1;
    this.fallback.push(entry);
    this.log.error('Audit write failed; entry kept in fallback buffer', {
      auditId: entry.id,
      requestId: entry.requestId,
      action: entry.action,
      outcome: entry.outcome,
      failure: result.error.kind,
      message: result.error.message,
    });
    return { entry, persisted: false };
  }

  query(filter?: AuditFilter): Promise<AuditEntry[]> {
    return this.store.query(filter);
  }

  /** Trail of one request, oldest first. */
  trail(requestId: string, filter: Omit<AuditFilter, 'requestId'> = {}): Promise<AuditEntry[]> {
    return this.store.query({ ...filter, requestId });
  }

  /** Entries that could not be written yet. */
  getFallbackEntries(): AuditEntry[] {
    return [...this.fallback];
  }

  /** Total failed writes since startup. */
  get failureCount(): number {
    return this.failures;
  }

  /**
   * Retry every buffered entry once more. Entries that fail again stay
   * buffered. Resolves to the number written.
   */
  async flushFallback(): Promise<number> {
    const pending = this.fallback;
    this.fallback = [];
    let written = 0;
    for (const entry of pending) {
      const result = await this.executor.execute(AUDIT_WRITE, () => this.store.append(entry));
      if (result.success) {
        written += 1;
      } else {
        this.fallback.push(entry);
      }
    }
    if (written > 0) {
      this.log.info('Replayed buffered audit entries', { written, remaining: this.fallback.length });
    }
    return written;
  }
}
