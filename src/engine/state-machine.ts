/**
 * Workflow State Machine.
 *
 * Owns the lifecycle of one request: creation at the workflow's first stage
 * and every transition after that. evaluate() is the pure decision (terminal
 * check, definition lookup, permission, payload merge); create() and
 * transition() add the persistence write, the audit entry and the
 * notifications around it.
 *
 * Callers serialize transitions per request id; see OrchestrationService.
 */

import { v4 as uuid } from 'uuid';
import {
  Action,
  Actor,
  CreateRequestInput,
  RESERVED_STATE_KEYS,
  RequestStatus,
  Role,
  ServiceRequest,
  StateData,
  isTerminalStatus,
  isTransitionAction,
  raisePriority,
  Priority,
} from '../domain/request';
import { StageTransition, WorkflowDefinition, WorkflowDefinitionTable, WorkflowStage } from '../domain/workflow';
import {
  ConfigurationError,
  TypedError,
  canceledError,
  forbiddenError,
  invalidActionError,
  keyExistsError,
  missingDataError,
  persistenceError,
  reservedKeyError,
  staleVersionError,
  terminalError,
  validationError,
} from '../domain/errors';
import { AuditInput } from '../domain/audit';
import { RequestStore, SaveResult } from '../storage/store';
import { AuditLedger } from '../audit/audit-ledger';
import { NotificationDispatcher } from '../notifications/dispatcher';
import { NotificationMessage } from '../notifications/notifier';
import { ExecutionFailure, RetryExecutor } from './retry-executor';
import { PermissionEngine } from './permission-engine';
import { validateWorkflowDefinitions } from './workflow-definitions';
import { Logger, logger as rootLogger } from '../logger';

export const PERSISTENCE_WRITE = 'persistence-write';

/** Actions that only the role holding the request may perform. */
const STAGE_WORK: ReadonlySet<string> = new Set([Action.Advance, Action.AssignDirectly, Action.Return]);

/** Pure outcome of evaluating a transition. */
export type Evaluation =
  | { allowed: true; next: ServiceRequest; transition: StageTransition }
  | { allowed: false; error: TypedError; reason: string };

export type TransitionResult =
  | { success: true; request: ServiceRequest; fromRole: Role; toRole: Role; auditId: string }
  | { success: false; error: TypedError; auditId: string };

export type CreateResult =
  | { success: true; request: ServiceRequest; auditId: string }
  | { success: false; error: TypedError; auditId: string };

export interface TransitionOptions {
  /** Uses of `action` by this actor in the trailing day. */
  dailyCount?: number;
  /** Version the caller last saw; defaults to the loaded version. */
  expectedVersion?: number;
  signal?: AbortSignal;
}

export interface CreateOptions {
  dailyCounts?: { create?: number; selectClient?: number };
  signal?: AbortSignal;
}

export interface StateMachineDeps {
  definitions: WorkflowDefinitionTable;
  permissions: PermissionEngine;
  requests: RequestStore;
  executor: RetryExecutor;
  ledger: AuditLedger;
  notifications: NotificationDispatcher;
  clock?: () => number;
  logger?: Logger;
}

export class WorkflowStateMachine {
  private readonly definitions: WorkflowDefinitionTable;
  private readonly permissions: PermissionEngine;
  private readonly requests: RequestStore;
  private readonly executor: RetryExecutor;
  private readonly ledger: AuditLedger;
  private readonly notifications: NotificationDispatcher;
  private readonly clock: () => number;
  private readonly log: Logger;

  constructor(deps: StateMachineDeps) {
    const validation = validateWorkflowDefinitions(deps.definitions);
    if (!validation.valid) {
      throw new ConfigurationError(
        validationError('Workflow definitions are invalid', {
          errors: validation.errors.map((e) => e.message),
        }),
      );
    }
    this.definitions = deps.definitions;
    this.permissions = deps.permissions;
    this.requests = deps.requests;
    this.executor = deps.executor;
    this.ledger = deps.ledger;
    this.notifications = deps.notifications;
    this.clock = deps.clock ?? Date.now;
    this.log = (deps.logger ?? rootLogger).child({ module: 'state-machine' });
  }

  definitionFor(request: Pick<ServiceRequest, 'workflowType'>): WorkflowDefinition {
    return this.definitions[request.workflowType];
  }

  /** Transitions the request's current stage offers; none once terminal. */
  availableTransitions(request: ServiceRequest): StageTransition[] {
    if (isTerminalStatus(request.status)) return [];
    return this.stageOf(request)?.transitions ?? [];
  }

  /** Pure decision for one transition. Never mutates `request`. */
  evaluate(request: ServiceRequest, actor: Actor, action: string, payload: StateData, dailyCount = 0): Evaluation {
    if (isTerminalStatus(request.status)) {
      return { allowed: false, error: terminalError(request.id, request.status), reason: 'terminal' };
    }

    const stage = this.stageOf(request);
    const available = stage ? stage.transitions.map((t) => t.action) : [];
    const transition = stage?.transitions.find((t) => t.action === action);
    if (!transition || !isTransitionAction(action)) {
      return {
        allowed: false,
        error: invalidActionError(request.id, request.currentRole, action, available),
        reason: 'invalid_action',
      };
    }

    const decision = this.permissions.authorize(actor.actorRole, action, request.workflowType, dailyCount);
    if (!decision.allowed) {
      return {
        allowed: false,
        error: forbiddenError(request.id, actor.actorRole, action, decision.reason),
        reason: decision.reason,
      };
    }
    if (STAGE_WORK.has(action) && actor.actorRole !== request.currentRole) {
      return {
        allowed: false,
        error: forbiddenError(request.id, actor.actorRole, action, 'not_stage_owner'),
        reason: 'not_stage_owner',
      };
    }

    const merged = mergeStateData(request.id, request.stateData, payload);
    if (!merged.success) {
      return { allowed: false, error: merged.error, reason: merged.reason };
    }
    const missing = (transition.requiredData ?? []).filter((key) => !Object.hasOwn(merged.stateData, key));
    if (missing.length > 0) {
      return { allowed: false, error: missingDataError(request.id, missing), reason: 'missing_data' };
    }

    const next: ServiceRequest = {
      ...request,
      currentRole: transition.to,
      status: transition.status,
      priority: action === Action.Escalate ? raisePriority(request.priority) : request.priority,
      stateData: merged.stateData,
      updatedAt: this.now(),
    };
    return { allowed: true, next, transition };
  }

  /**
   * Apply a transition: evaluate, persist through the executor, audit and
   * notify. Exactly one audit entry is written per call.
   */
  async transition(
    request: ServiceRequest,
    actor: Actor,
    action: string,
    payload: StateData,
    options: TransitionOptions = {},
  ): Promise<TransitionResult> {
    const audit = (outcome: AuditInput['outcome'], toRole: Role | null, reason?: string, details?: Record<string, unknown>) =>
      this.ledger.record({
        requestId: request.id,
        actorId: actor.actorId,
        actorRole: actor.actorRole,
        action,
        fromRole: request.currentRole,
        toRole,
        outcome,
        reason,
        details,
      });
    const deny = async (error: TypedError, reason: string): Promise<TransitionResult> => {
      const { entry } = await audit('denied', null, reason, { code: error.code });
      this.log.warn('Transition denied', { requestId: request.id, actorId: actor.actorId, action, reason });
      return { success: false, error, auditId: entry.id };
    };

    const expectedVersion = options.expectedVersion ?? request.version;
    if (expectedVersion !== request.version) {
      return deny(staleVersionError(request.id, expectedVersion, request.version), 'stale_version');
    }

    const evaluation = this.evaluate(request, actor, action, payload, options.dailyCount);
    if (!evaluation.allowed) {
      return deny(evaluation.error, evaluation.reason);
    }
    if (options.signal?.aborted) {
      return deny(canceledError(request.id), 'canceled');
    }

    const write = await this.executor.execute<SaveResult>(
      PERSISTENCE_WRITE,
      () => this.requests.save(evaluation.next, expectedVersion),
      { signal: options.signal },
    );
    if (!write.success) {
      const { error, reason } = this.persistenceFailure(request.id, write.error);
      const { entry } = await audit('denied', evaluation.transition.to, reason, {
        code: error.code,
        kind: write.error.kind,
        attempts: write.error.attempts.length,
      });
      this.log.error('Transition not persisted', { requestId: request.id, action, kind: write.error.kind });
      return { success: false, error, auditId: entry.id };
    }
    if (!write.value.saved) {
      const actual = write.value.actualVersion ?? undefined;
      return deny(staleVersionError(request.id, expectedVersion, actual), 'stale_version');
    }

    const saved = write.value.request;
    const { entry } = await audit('granted', saved.currentRole, undefined, {
      fromStatus: request.status,
      toStatus: saved.status,
      version: saved.version,
    });
    this.log.info('Transition applied', {
      requestId: saved.id,
      action,
      fromRole: request.currentRole,
      toRole: saved.currentRole,
      status: saved.status,
    });
    this.notifications.dispatch(transitionNotifications(request, saved, actor, action));
    return { success: true, request: saved, fromRole: request.currentRole, toRole: saved.currentRole, auditId: entry.id };
  }

  /**
   * Create a request at the first stage of its workflow. Gated by the
   * `create` grant (and `select_client` for staff creating on a client's
   * behalf); writes one audit entry either way.
   */
  async create(input: CreateRequestInput, options: CreateOptions = {}): Promise<CreateResult> {
    const requestId = `req_${uuid()}`;
    const definition = this.definitions[input.workflowType];
    const firstStage = definition.stages[0].role;
    const { creator } = input;
    const audit = (outcome: AuditInput['outcome'], reason?: string, details?: Record<string, unknown>) =>
      this.ledger.record({
        requestId,
        actorId: creator.actorId,
        actorRole: creator.actorRole,
        action: Action.Create,
        fromRole: null,
        toRole: firstStage,
        outcome,
        reason,
        details,
      });
    const deny = async (error: TypedError, reason: string): Promise<CreateResult> => {
      const { entry } = await audit('denied', reason, { code: error.code, workflowType: input.workflowType });
      this.log.warn('Creation denied', { actorId: creator.actorId, workflowType: input.workflowType, reason });
      return { success: false, error: { ...error, requestId }, auditId: entry.id };
    };

    const createDecision = this.permissions.authorize(
      creator.actorRole,
      Action.Create,
      input.workflowType,
      options.dailyCounts?.create ?? 0,
    );
    if (!createDecision.allowed) {
      return deny(forbiddenError(requestId, creator.actorRole, Action.Create, createDecision.reason), createDecision.reason);
    }
    if (creator.onBehalfOfClient) {
      const selectDecision = this.permissions.authorize(
        creator.actorRole,
        Action.SelectClient,
        input.workflowType,
        options.dailyCounts?.selectClient ?? 0,
      );
      if (!selectDecision.allowed) {
        return deny(
          forbiddenError(requestId, creator.actorRole, Action.SelectClient, selectDecision.reason),
          selectDecision.reason,
        );
      }
    }

    if (input.clientId.trim() === '') {
      return deny(validationError('clientId is required', { field: 'clientId' }), 'invalid_input');
    }
    if (!creator.onBehalfOfClient && creator.actorRole === Role.Client && input.clientId !== creator.actorId) {
      return deny(
        validationError('A client may only create requests for themselves', { field: 'clientId' }),
        'invalid_input',
      );
    }
    const merged = mergeStateData(requestId, {}, input.initialPayload ?? {});
    if (!merged.success) {
      return deny(merged.error, merged.reason);
    }
    if (options.signal?.aborted) {
      return deny(canceledError(requestId), 'canceled');
    }

    const now = this.now();
    const request: ServiceRequest = {
      id: requestId,
      workflowType: input.workflowType,
      currentRole: firstStage,
      status: RequestStatus.Open,
      creator: { ...creator },
      clientId: input.clientId,
      priority: input.priority ?? Priority.Medium,
      stateData: merged.stateData,
      version: 1,
      createdAt: now,
      updatedAt: now,
    };

    const write = await this.executor.execute(PERSISTENCE_WRITE, () => this.requests.create(request), {
      signal: options.signal,
    });
    if (!write.success) {
      const { error, reason } = this.persistenceFailure(requestId, write.error);
      const { entry } = await audit('denied', reason, { code: error.code, kind: write.error.kind });
      this.log.error('Request not persisted', { requestId, kind: write.error.kind });
      return { success: false, error, auditId: entry.id };
    }

    const saved = write.value;
    const { entry } = await audit('granted', undefined, { workflowType: saved.workflowType, version: saved.version });
    this.log.info('Request created', { requestId, workflowType: saved.workflowType, stage: firstStage });
    this.notifications.dispatch(creationNotifications(saved));
    return { success: true, request: saved, auditId: entry.id };
  }

  private stageOf(request: ServiceRequest): WorkflowStage | undefined {
    return this.definitions[request.workflowType].stages.find((s) => s.role === request.currentRole);
  }

  private persistenceFailure(requestId: string, failure: ExecutionFailure): { error: TypedError; reason: string } {
    const details = { attempts: failure.attempts, operationId: failure.operationId };
    switch (failure.kind) {
      case 'canceled':
        return { error: canceledError(requestId), reason: 'canceled' };
      case 'deadline_exceeded':
        return { error: persistenceError(requestId, failure.kind, failure.message, details), reason: 'deadline_exceeded' };
      default:
        return { error: persistenceError(requestId, failure.kind, failure.message, details), reason: 'persistence_failed' };
    }
  }

  private now(): string {
    return new Date(this.clock()).toISOString();
  }
}

type MergeResult =
  | { success: true; stateData: StateData }
  | { success: false; error: TypedError; reason: string };

/** Append `payload` to `existing`; reserved and already-present keys are rejected. */
export function mergeStateData(requestId: string, existing: StateData, payload: StateData): MergeResult {
  const keys = Object.keys(payload);
  const reserved = keys.filter((key) => RESERVED_STATE_KEYS.has(key));
  if (reserved.length > 0) {
    return { success: false, error: reservedKeyError(requestId, reserved), reason: 'reserved_key' };
  }
  const taken = keys.filter((key) => Object.hasOwn(existing, key));
  if (taken.length > 0) {
    return { success: false, error: keyExistsError(requestId, taken), reason: 'key_exists' };
  }
  return { success: true, stateData: { ...existing, ...structuredClone(payload) } };
}

function transitionNotifications(
  before: ServiceRequest,
  after: ServiceRequest,
  actor: Actor,
  action: string,
): NotificationMessage[] {
  const parameters = {
    requestId: after.id,
    workflowType: after.workflowType,
    action,
    actorId: actor.actorId,
    fromRole: before.currentRole,
    toRole: after.currentRole,
    status: after.status,
    priority: after.priority,
  };
  switch (after.status) {
    case RequestStatus.Completed:
      return [{ recipientId: after.clientId, templateKey: 'request.completed', parameters }];
    case RequestStatus.Cancelled:
      return [{ recipientId: after.clientId, templateKey: 'request.cancelled', parameters }];
  }
  if (action === Action.Escalate) {
    return [{ recipientId: `role:${after.currentRole}`, templateKey: 'request.escalated', parameters }];
  }
  if (action === Action.Return) {
    return [{ recipientId: `role:${after.currentRole}`, templateKey: 'request.returned', parameters }];
  }
  if (after.currentRole !== before.currentRole) {
    return [{ recipientId: `role:${after.currentRole}`, templateKey: 'request.assigned', parameters }];
  }
  return [];
}

function creationNotifications(request: ServiceRequest): NotificationMessage[] {
  const parameters = {
    requestId: request.id,
    workflowType: request.workflowType,
    priority: request.priority,
    stage: request.currentRole,
  };
  const messages: NotificationMessage[] = [
    { recipientId: `role:${request.currentRole}`, templateKey: 'request.assigned', parameters },
  ];
  if (request.creator.onBehalfOfClient) {
    messages.push(
      { recipientId: request.clientId, templateKey: 'request.created_for_client', parameters },
      { recipientId: request.creator.actorId, templateKey: 'request.creation_confirmed', parameters },
    );
  }
  return messages;
}
