/**
 * Service request domain model.
 *
 * A client service request ("application") routed through the role-owned
 * stages of its workflow type.
 */

/** Organisation roles. Each workflow stage is owned by one of these. */
export enum Role {
  Client = 'client',
  Manager = 'manager',
  JuniorManager = 'junior_manager',
  Controller = 'controller',
  Technician = 'technician',
  Warehouse = 'warehouse',
  CallCenter = 'call_center',
  CallCenterSupervisor = 'call_center_supervisor',
  Admin = 'admin',
}

/** Workflow categories, fixed at creation. */
export enum WorkflowType {
  ConnectionRequest = 'connection_request',
  TechnicalService = 'technical_service',
  CallCenterDirect = 'call_center_direct',
}

export enum RequestStatus {
  Open = 'open',
  InProgress = 'in_progress',
  Blocked = 'blocked',
  Completed = 'completed',
  Cancelled = 'cancelled',
}

export enum Priority {
  Low = 'low',
  Medium = 'medium',
  High = 'high',
}

/**
 * Actions known to the permission matrix. The first five are the transition
 * actions a workflow definition may offer at a stage.
 */
export enum Action {
  Advance = 'advance',
  AssignDirectly = 'assign_directly',
  Return = 'return',
  Escalate = 'escalate',
  Cancel = 'cancel',
  Create = 'create',
  View = 'view',
  SelectClient = 'select_client',
}

export type TransitionAction =
  | Action.Advance
  | Action.AssignDirectly
  | Action.Return
  | Action.Escalate
  | Action.Cancel;

export const TRANSITION_ACTIONS: readonly TransitionAction[] = [
  Action.Advance,
  Action.AssignDirectly,
  Action.Return,
  Action.Escalate,
  Action.Cancel,
];

export const TERMINAL_STATUSES: readonly RequestStatus[] = [
  RequestStatus.Completed,
  RequestStatus.Cancelled,
];

/** Who created the request. */
export interface Creator {
  actorId: string;
  actorRole: Role;
  /** True when a staff member created the request for a client. */
  onBehalfOfClient: boolean;
}

/** Opaque data collected across stages. Keys are append-only. */
export type StateData = Record<string, unknown>;

/** Keys owned by the core; payloads may never write them. */
export const RESERVED_STATE_KEYS: ReadonlySet<string> = new Set([
  'id',
  'creator',
  'client_id',
  'clientId',
  'workflow_type',
  'workflowType',
  'current_role',
  'currentRole',
  'status',
  'priority',
  'version',
  'created_at',
  'createdAt',
  'updated_at',
  'updatedAt',
]);

/** The unit of work. */
export interface ServiceRequest {
  id: string;
  workflowType: WorkflowType;
  currentRole: Role;
  status: RequestStatus;
  creator: Creator;
  clientId: string;
  priority: Priority;
  stateData: StateData;
  /** Optimistic concurrency version, bumped by every successful save. */
  version: number;
  createdAt: string;
  updatedAt: string;
}

/** Input for creating a new request. */
export interface CreateRequestInput {
  workflowType: WorkflowType;
  creator: Creator;
  clientId: string;
  priority?: Priority;
  initialPayload?: StateData;
}

/** Authenticated identity handed to the core by the identity collaborator. */
export interface Actor {
  actorId: string;
  actorRole: Role;
}

export function isTerminalStatus(status: RequestStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function isRole(value: unknown): value is Role {
  return Object.values(Role).some((role) => role === value);
}

export function isWorkflowType(value: unknown): value is WorkflowType {
  return Object.values(WorkflowType).some((type) => type === value);
}

export function isAction(value: unknown): value is Action {
  return Object.values(Action).some((action) => action === value);
}

export function isTransitionAction(value: unknown): value is TransitionAction {
  return TRANSITION_ACTIONS.some((action) => action === value);
}

export function isPriority(value: unknown): value is Priority {
  return Object.values(Priority).some((priority) => priority === value);
}

/** One level up, saturating at high. */
export function raisePriority(priority: Priority): Priority {
  switch (priority) {
    case Priority.Low:
      return Priority.Medium;
    default:
      return Priority.High;
  }
}
