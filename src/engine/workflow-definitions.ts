/**
 * Built-in workflow definitions and their load-time validation.
 *
 * Definitions are validated once when the state machine is constructed;
 * an invalid table never reaches runtime.
 */

import { RequestStatus, Role, TransitionAction, WorkflowType, Action } from '../domain/request';
import { StageTransition, WorkflowDefinition, WorkflowDefinitionTable } from '../domain/workflow';
import { TypedError, validationError } from '../domain/errors';

function step(
  action: TransitionAction,
  to: Role,
  status: RequestStatus,
  requiredData?: string[],
): StageTransition {
  return requiredData ? { action, to, status, requiredData } : { action, to, status };
}

const CONNECTION_REQUEST: WorkflowDefinition = {
  type: WorkflowType.ConnectionRequest,
  name: 'Connection Request',
  stages: [
    {
      role: Role.Manager,
      transitions: [
        step(Action.Advance, Role.JuniorManager, RequestStatus.InProgress),
        step(Action.AssignDirectly, Role.Technician, RequestStatus.InProgress, ['technician_id']),
        step(Action.Escalate, Role.Manager, RequestStatus.InProgress),
        step(Action.Cancel, Role.Manager, RequestStatus.Cancelled),
      ],
    },
    {
      role: Role.JuniorManager,
      transitions: [
        step(Action.Advance, Role.Controller, RequestStatus.InProgress, ['call_notes']),
        step(Action.Return, Role.Manager, RequestStatus.Blocked),
        step(Action.Escalate, Role.JuniorManager, RequestStatus.InProgress),
        step(Action.Cancel, Role.JuniorManager, RequestStatus.Cancelled),
      ],
    },
    {
      role: Role.Controller,
      transitions: [
        step(Action.Advance, Role.Technician, RequestStatus.InProgress, ['technician_id']),
        step(Action.Return, Role.JuniorManager, RequestStatus.Blocked),
        step(Action.Escalate, Role.Controller, RequestStatus.InProgress),
        step(Action.Cancel, Role.Controller, RequestStatus.Cancelled),
      ],
    },
    {
      role: Role.Technician,
      transitions: [
        step(Action.Advance, Role.Warehouse, RequestStatus.InProgress, ['equipment_used']),
        step(Action.Return, Role.Controller, RequestStatus.Blocked),
        step(Action.Escalate, Role.Technician, RequestStatus.InProgress),
        step(Action.Cancel, Role.Technician, RequestStatus.Cancelled),
      ],
    },
    {
      role: Role.Warehouse,
      transitions: [
        step(Action.Advance, Role.Warehouse, RequestStatus.Completed, ['inventory_updates']),
        step(Action.Return, Role.Technician, RequestStatus.Blocked),
      ],
    },
  ],
};

const TECHNICAL_SERVICE: WorkflowDefinition = {
  type: WorkflowType.TechnicalService,
  name: 'Technical Service',
  stages: [
    {
      role: Role.Controller,
      transitions: [
        step(Action.Advance, Role.Technician, RequestStatus.InProgress, ['technician_id']),
        step(Action.Escalate, Role.Controller, RequestStatus.InProgress),
        step(Action.Cancel, Role.Controller, RequestStatus.Cancelled),
      ],
    },
    {
      role: Role.Technician,
      transitions: [
        step(Action.Advance, Role.Warehouse, RequestStatus.InProgress, ['diagnostics_notes']),
        step(Action.Return, Role.Controller, RequestStatus.Blocked),
        step(Action.Escalate, Role.Technician, RequestStatus.InProgress),
        step(Action.Cancel, Role.Technician, RequestStatus.Cancelled),
      ],
    },
    {
      role: Role.Warehouse,
      transitions: [
        step(Action.Advance, Role.Warehouse, RequestStatus.Completed, ['equipment_prepared']),
        step(Action.Return, Role.Technician, RequestStatus.Blocked),
      ],
    },
  ],
};

const CALL_CENTER_DIRECT: WorkflowDefinition = {
  type: WorkflowType.CallCenterDirect,
  name: 'Call Center Direct Resolution',
  stages: [
    {
      role: Role.CallCenterSupervisor,
      transitions: [
        step(Action.Advance, Role.CallCenter, RequestStatus.InProgress, ['operator_id']),
        step(Action.Escalate, Role.CallCenterSupervisor, RequestStatus.InProgress),
        step(Action.Cancel, Role.CallCenterSupervisor, RequestStatus.Cancelled),
      ],
    },
    {
      role: Role.CallCenter,
      transitions: [
        step(Action.Advance, Role.CallCenter, RequestStatus.Completed, ['resolution_notes']),
        step(Action.Return, Role.CallCenterSupervisor, RequestStatus.Blocked),
      ],
    },
  ],
};

/** Definitions shipped with the service. */
export const DEFAULT_WORKFLOW_DEFINITIONS: WorkflowDefinitionTable = {
  [WorkflowType.ConnectionRequest]: CONNECTION_REQUEST,
  [WorkflowType.TechnicalService]: TECHNICAL_SERVICE,
  [WorkflowType.CallCenterDirect]: CALL_CENTER_DIRECT,
};

/** Validation result. */
export interface DefinitionValidationResult {
  valid: boolean;
  errors: TypedError[];
}

/**
 * Check the structural rules every definition must satisfy:
 * - at least one stage, no stage listed twice;
 * - every stage offers at least one action, each action at most once;
 * - every destination is a stage of the same workflow;
 * - only `advance` may complete a request and only `cancel` may cancel it;
 * - a completing or cancelling action stays on its stage.
 */
export function validateWorkflowDefinitions(table: WorkflowDefinitionTable): DefinitionValidationResult {
  const errors: TypedError[] = [];

  for (const type of Object.values(WorkflowType)) {
    const definition = table[type];
    if (!definition) {
      errors.push(validationError(`No workflow definition for "${type}"`, { workflowType: type }));
      continue;
    }
    if (definition.type !== type) {
      errors.push(validationError(`Definition keyed "${type}" declares type "${definition.type}"`, { workflowType: type }));
    }
    if (definition.stages.length === 0) {
      errors.push(validationError(`Workflow "${type}" has no stages`, { workflowType: type }));
      continue;
    }

    const stageRoles = new Set<Role>();
    for (const stage of definition.stages) {
      if (stageRoles.has(stage.role)) {
        errors.push(validationError(`Workflow "${type}" lists stage "${stage.role}" twice`, { workflowType: type, stage: stage.role }));
      }
      stageRoles.add(stage.role);
    }

    for (const stage of definition.stages) {
      const context = { workflowType: type, stage: stage.role };
      if (stage.transitions.length === 0) {
        errors.push(validationError(`Stage "${stage.role}" of "${type}" has no outgoing action`, context));
      }
      const seen = new Set<TransitionAction>();
      for (const transition of stage.transitions) {
        if (seen.has(transition.action)) {
          errors.push(validationError(`Stage "${stage.role}" of "${type}" defines "${transition.action}" twice`, context));
        }
        seen.add(transition.action);

        if (!stageRoles.has(transition.to)) {
          errors.push(validationError(
            `Action "${transition.action}" at "${stage.role}" leads to "${transition.to}", which is not a stage of "${type}"`,
            { ...context, to: transition.to },
          ));
        }
        if (transition.status === RequestStatus.Open) {
          errors.push(validationError(`Action "${transition.action}" at "${stage.role}" may not reopen a request`, context));
        }
        if (transition.status === RequestStatus.Completed && transition.action !== Action.Advance) {
          errors.push(validationError(`Only "advance" may complete a request (stage "${stage.role}" of "${type}")`, context));
        }
        if ((transition.action === Action.Cancel) !== (transition.status === RequestStatus.Cancelled)) {
          errors.push(validationError(`"cancel" and status "cancelled" must go together (stage "${stage.role}" of "${type}")`, context));
        }
        const terminal = transition.status === RequestStatus.Completed || transition.status === RequestStatus.Cancelled;
        if (terminal && transition.to !== stage.role) {
          errors.push(validationError(`Terminal action "${transition.action}" at "${stage.role}" must stay on its stage`, context));
        }
      }
    }
  }

  return { valid: errors.length === 0, errors };
}
