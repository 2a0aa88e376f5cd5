/**
 * Workflow definition domain model.
 *
 * A workflow type is an ordered list of role stages; each stage declares the
 * transition actions it offers, where each one leads, and the status the
 * request takes afterwards.
 */

import { RequestStatus, Role, TransitionAction, WorkflowType } from './request';

/** One permitted outgoing action of a stage. */
export interface StageTransition {
  action: TransitionAction;
  /** Destination stage. Equal to the current stage for in-place actions. */
  to: Role;
  /** Status after the transition; never inferred from the action. */
  status: RequestStatus;
  /** Keys that must be present in payload or existing state data. */
  requiredData?: string[];
}

export interface WorkflowStage {
  role: Role;
  transitions: StageTransition[];
}

export interface WorkflowDefinition {
  type: WorkflowType;
  name: string;
  /** Stages in routing order; the first one receives new requests. */
  stages: WorkflowStage[];
}

/** Read-only table of definitions, keyed by workflow type. */
export type WorkflowDefinitionTable = Readonly<Record<WorkflowType, WorkflowDefinition>>;
