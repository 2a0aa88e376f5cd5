/**
 * Orchestration Service.
 *
 * The public operations of the core: create_request, transition,
 * get_request_status, get_audit_trail and reset_circuit. It loads requests,
 * reads daily counts from the action log, serializes transitions per
 * request id and delegates the rest to the state machine.
 */

import {
  Action,
  Actor,
  CreateRequestInput,
  Role,
  ServiceRequest,
  StateData,
  WorkflowType,
  isAction,
} from '../domain/request';
import { AuditEntry, AuditFilter } from '../domain/audit';
import { StageTransition, WorkflowDefinition } from '../domain/workflow';
import { TypedError, forbiddenError, requestNotFoundError } from '../domain/errors';
import { Store } from '../storage/store';
import { AuditLedger } from '../audit/audit-ledger';
import { NotificationDispatcher } from '../notifications/dispatcher';
import { CircuitStatus } from './circuit-breaker';
import { ExecutorStatistics, RetryExecutor } from './retry-executor';
import { PermissionEngine } from './permission-engine';
import { KeyedLock } from './request-lock';
import {
  CreateResult,
  TransitionResult,
  WorkflowStateMachine,
} from './state-machine';
import { Logger, logger as rootLogger } from '../logger';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface TransitionRequestOptions {
  expectedVersion?: number;
  signal?: AbortSignal;
}

/** A request with what can happen next and how it got here. */
export interface RequestStatusView {
  request: ServiceRequest;
  workflowName: string;
  availableActions: StageTransition[];
  nextStages: Role[];
  history: AuditEntry[];
}

export type StatusResult =
  | { success: true; status: RequestStatusView }
  | { success: false; error: TypedError };

export interface OrchestratorHealth {
  circuits: CircuitStatus[];
  auditWriteFailures: number;
  auditFallbackSize: number;
  notificationFailures: number;
  lastNotificationFailure: TypedError | null;
  pendingNotifications: number;
}

export interface OrchestrationDeps {
  store: Store;
  permissions: PermissionEngine;
  stateMachine: WorkflowStateMachine;
  executor: RetryExecutor;
  ledger: AuditLedger;
  notifications: NotificationDispatcher;
  clock?: () => number;
  logger?: Logger;
}

export class OrchestrationService {
  private readonly locks = new KeyedLock();
  /** Held from reading an actor's daily count until the use is recorded. */
  private readonly actorLocks = new KeyedLock();
  private readonly clock: () => number;
  private readonly log: Logger;

  constructor(private readonly deps: OrchestrationDeps) {
    this.clock = deps.clock ?? Date.now;
    this.log = (deps.logger ?? rootLogger).child({ module: 'orchestrator' });
  }

  async createRequest(input: CreateRequestInput, options: { signal?: AbortSignal } = {}): Promise<CreateResult> {
    const actorId = input.creator.actorId;
    return this.actorLocks.run(actorId, async () => {
      const [create, selectClient] = await Promise.all([
        this.dailyCount(actorId, Action.Create),
        this.dailyCount(actorId, Action.SelectClient),
      ]);
      const result = await this.deps.stateMachine.create(input, {
        dailyCounts: { create, selectClient },
        signal: options.signal,
      });
      if (result.success) {
        await this.countUse(actorId, Action.Create);
        if (input.creator.onBehalfOfClient) {
          await this.countUse(actorId, Action.SelectClient);
        }
      }
      return result;
    });
  }

  /**
   * Apply `action` to a request. Calls for the same request id run one at a
   * time, as do one actor's counted actions; the storage version check
   * rejects writers from other processes.
   */
  async transition(
    requestId: string,
    actor: Actor,
    action: string,
    payload: StateData = {},
    options: TransitionRequestOptions = {},
  ): Promise<TransitionResult> {
    return this.locks.run(requestId, async () => {
      const request = await this.deps.store.requests.load(requestId);
      if (!request) {
        const error = requestNotFoundError(requestId);
        const { entry } = await this.deps.ledger.record({
          requestId,
          actorId: actor.actorId,
          actorRole: actor.actorRole,
          action,
          fromRole: null,
          toRole: null,
          outcome: 'denied',
          reason: 'not_found',
          details: { code: error.code },
        });
        this.log.warn('Transition on unknown request', { requestId, actorId: actor.actorId, action });
        return { success: false, error, auditId: entry.id };
      }

      // Request lock first, then actor lock; creation takes only the actor lock.
      return this.actorLocks.run(actor.actorId, async () => {
        const countedAction = isAction(action) ? action : undefined;
        const dailyCount = countedAction ? await this.dailyCount(actor.actorId, countedAction) : 0;
        const result = await this.deps.stateMachine.transition(request, actor, action, payload, {
          dailyCount,
          expectedVersion: options.expectedVersion,
          signal: options.signal,
        });
        if (result.success && countedAction) {
          await this.countUse(actor.actorId, countedAction);
        }
        return result;
      });
    });
  }

  /** The request, what its stage offers, and its audit history. Requires `view`. */
  async getRequestStatus(requestId: string, actor: Actor): Promise<StatusResult> {
    const request = await this.deps.store.requests.load(requestId);
    if (!request) {
      return { success: false, error: requestNotFoundError(requestId) };
    }
    const isOwnRequest = actor.actorId === request.clientId || actor.actorId === request.creator.actorId;
    if (!isOwnRequest) {
      const decision = this.deps.permissions.authorize(actor.actorRole, Action.View, request.workflowType);
      if (!decision.allowed) {
        return { success: false, error: forbiddenError(requestId, actor.actorRole, Action.View, decision.reason) };
      }
    }

    const definition = this.deps.stateMachine.definitionFor(request);
    const availableActions = this.deps.stateMachine.availableTransitions(request);
    const nextStages = [...new Set(availableActions.map((t) => t.to))].filter((role) => role !== request.currentRole);
    const history = await this.deps.ledger.trail(requestId);
    return {
      success: true,
      status: { request, workflowName: definition.name, availableActions, nextStages, history },
    };
  }

  /** Audit entries ordered by timestamp ascending. */
  getAuditTrail(filter: AuditFilter = {}): Promise<AuditEntry[]> {
    return this.deps.ledger.query(filter);
  }

  /** Workflow types `role` may create, with their definitions. */
  listCreatableWorkflows(role: Role): WorkflowDefinition[] {
    return this.deps.permissions
      .creatableWorkflowTypes(role)
      .map((type: WorkflowType) => this.deps.stateMachine.definitionFor({ workflowType: type }));
  }

  resetCircuit(operationClass: string): CircuitStatus {
    const status = this.deps.executor.resetCircuit(operationClass);
    this.log.info('Circuit reset by administrator', { operationClass });
    return status;
  }

  listCircuits(): CircuitStatus[] {
    return this.deps.executor.listCircuits();
  }

  getStatistics(): ExecutorStatistics {
    return this.deps.executor.getStatistics();
  }

  getHealth(): OrchestratorHealth {
    return {
      circuits: this.deps.executor.listCircuits(),
      auditWriteFailures: this.deps.ledger.failureCount,
      auditFallbackSize: this.deps.ledger.getFallbackEntries().length,
      notificationFailures: this.deps.notifications.failureCount,
      lastNotificationFailure: this.deps.notifications.lastFailure,
      pendingNotifications: this.deps.notifications.pendingCount,
    };
  }

  /** Wait for notifications dispatched so far. */
  flushNotifications(): Promise<void> {
    return this.deps.notifications.flush();
  }

  /** Replay audit entries whose write failed. */
  flushAuditFallback(): Promise<number> {
    return this.deps.ledger.flushFallback();
  }

  private dailyCount(actorId: string, action: Action): Promise<number> {
    const since = new Date(this.clock() - DAY_MS).toISOString();
    return this.deps.store.actionLog.countSince(actorId, action, since);
  }

  private async countUse(actorId: string, action: Action): Promise<void> {
    try {
      await this.deps.store.actionLog.record({ actorId, action, timestamp: new Date(this.clock()).toISOString() });
    } catch (err) {
      // The state change is already applied; the count is best-effort.
      this.log.error('Failed to record action use', {
        actorId,
        action,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
