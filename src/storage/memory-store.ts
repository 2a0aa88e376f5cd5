/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Values are deep
 * copied on the way in and out, so callers never share memory with the
 * store's internal state.
 */

import { AuditEntry, AuditFilter } from '../domain/audit';
import { Action, ServiceRequest } from '../domain/request';
import {
  ActionLogRecord,
  ActionLogStore,
  AuditStore,
  RequestStore,
  SaveResult,
  Store,
} from './store';

function deepCopy<T>(value: T): T {
  return structuredClone(value);
}

class MemoryRequestStore implements RequestStore {
  private data = new Map<string, ServiceRequest>();

  async create(request: ServiceRequest): Promise<ServiceRequest> {
    const copy = { ...deepCopy(request), version: 1 };
    this.data.set(copy.id, copy);
    return deepCopy(copy);
  }

  async load(id: string): Promise<ServiceRequest | null> {
    const request = this.data.get(id);
    return request ? deepCopy(request) : null;
  }

  async save(request: ServiceRequest, expectedVersion: number): Promise<SaveResult> {
    const current = this.data.get(request.id);
    if (!current || current.version !== expectedVersion) {
      return { saved: false, conflict: true, actualVersion: current ? current.version : null };
    }
    const next = { ...deepCopy(request), version: expectedVersion + 1 };
    this.data.set(next.id, next);
    return { saved: true, request: deepCopy(next) };
  }
}

class MemoryAuditStore implements AuditStore {
  private entries: AuditEntry[] = [];

  async append(entry: AuditEntry): Promise<AuditEntry> {
    this.entries.push(deepCopy(entry));
    return deepCopy(entry);
  }

  /** Matching entries oldest first; entries with equal timestamps keep insertion order. */
  async query(filter: AuditFilter = {}): Promise<AuditEntry[]> {
    const offset = filter.offset ?? 0;
    const end = filter.limit === undefined ? undefined : offset + filter.limit;
    return this.entries
      .filter((e) => filter.requestId === undefined || e.requestId === filter.requestId)
      .filter((e) => filter.actorId === undefined || e.actorId === filter.actorId)
      .filter((e) => filter.from === undefined || e.timestamp >= filter.from)
      .filter((e) => filter.to === undefined || e.timestamp <= filter.to)
      .sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp))
      .slice(offset, end)
      .map(deepCopy);
  }
}

class MemoryActionLogStore implements ActionLogStore {
  private records: ActionLogRecord[] = [];

  async record(entry: ActionLogRecord): Promise<void> {
    this.records.push(deepCopy(entry));
  }

  async countSince(actorId: string, action: Action, since: string): Promise<number> {
    return this.records.filter((r) => r.actorId === actorId && r.action === action && r.timestamp >= since).length;
  }
}

/** Create a complete in-memory store. */
export function createMemoryStore(): Store {
  return {
    requests: new MemoryRequestStore(),
    audit: new MemoryAuditStore(),
    actionLog: new MemoryActionLogStore(),
  };
}
