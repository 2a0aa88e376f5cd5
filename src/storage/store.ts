/**
 * Storage layer interfaces.
 *
 * The core depends only on these contracts; the in-memory store is the
 * reference backend. Every read returns a copy the caller may mutate freely.
 */

import { AuditEntry, AuditFilter } from '../domain/audit';
import { Action, ServiceRequest } from '../domain/request';

/** Outcome of an optimistic save. A version mismatch is a value, not an error. */
export type SaveResult =
  | { saved: true; request: ServiceRequest }
  | { saved: false; conflict: true; actualVersion: number | null };

/** Store interface for service requests. */
export interface RequestStore {
  /** Insert a new request; the stored copy carries version 1. */
  create(request: ServiceRequest): Promise<ServiceRequest>;
  load(id: string): Promise<ServiceRequest | null>;
  /**
   * Replace the stored request if its version still equals
   * `expectedVersion`. The saved copy carries `expectedVersion + 1`.
   */
  save(request: ServiceRequest, expectedVersion: number): Promise<SaveResult>;
}

/** Append-only store for audit entries. */
export interface AuditStore {
  append(entry: AuditEntry): Promise<AuditEntry>;
  /**
   * Matching entries in timestamp order. Every match is returned unless the
   * filter sets `limit`.
   */
  query(filter?: AuditFilter): Promise<AuditEntry[]>;
}

/** One counted use of a rate-limited action. */
export interface ActionLogRecord {
  actorId: string;
  action: Action;
  timestamp: string;
}

/** Log of counted actions, read to enforce daily limits. */
export interface ActionLogStore {
  record(entry: ActionLogRecord): Promise<void>;
  /** Number of records for (actor, action) with timestamp >= `since`. */
  countSince(actorId: string, action: Action, since: string): Promise<number>;
}

/** Composite store interface. */
export interface Store {
  requests: RequestStore;
  audit: AuditStore;
  actionLog: ActionLogStore;
}
