import {
  DEFAULT_WORKFLOW_DEFINITIONS,
  validateWorkflowDefinitions,
} from '../../src/engine/workflow-definitions';
import { Action, RequestStatus, Role, WorkflowType } from '../../src/domain/request';
import { StageTransition, WorkflowDefinitionTable } from '../../src/domain/workflow';

function withConnectionStages(stages: WorkflowDefinitionTable[WorkflowType.ConnectionRequest]['stages']): WorkflowDefinitionTable {
  return {
    ...DEFAULT_WORKFLOW_DEFINITIONS,
    [WorkflowType.ConnectionRequest]: { ...DEFAULT_WORKFLOW_DEFINITIONS[WorkflowType.ConnectionRequest], stages },
  };
}

describe('DEFAULT_WORKFLOW_DEFINITIONS', () => {
  test('are valid', () => {
    expect(validateWorkflowDefinitions(DEFAULT_WORKFLOW_DEFINITIONS)).toEqual({ valid: true, errors: [] });
  });

  test('connection requests pass through five stages in order', () => {
    const stages = DEFAULT_WORKFLOW_DEFINITIONS[WorkflowType.ConnectionRequest].stages.map((s) => s.role);
    expect(stages).toEqual([Role.Manager, Role.JuniorManager, Role.Controller, Role.Technician, Role.Warehouse]);
  });

  test('only the last stage of each workflow completes', () => {
    for (const definition of Object.values(DEFAULT_WORKFLOW_DEFINITIONS)) {
      const completing = definition.stages.filter((stage) =>
        stage.transitions.some((t) => t.status === RequestStatus.Completed),
      );
      expect(completing.map((s) => s.role)).toEqual([definition.stages[definition.stages.length - 1].role]);
    }
  });
});

describe('validateWorkflowDefinitions', () => {
  test('rejects a stage without outgoing actions', () => {
    const table = withConnectionStages([
      { role: Role.Manager, transitions: [{ action: Action.Advance, to: Role.Technician, status: RequestStatus.InProgress }] },
      { role: Role.Technician, transitions: [] },
    ]);
    const result = validateWorkflowDefinitions(table);
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.message)).toEqual([
      'Stage "technician" of "connection_request" has no outgoing action',
    ]);
  });

  test('rejects destinations outside the workflow', () => {
    const table = withConnectionStages([
      {
        role: Role.Manager,
        transitions: [{ action: Action.Advance, to: Role.Warehouse, status: RequestStatus.Completed }],
      },
    ]);
    const result = validateWorkflowDefinitions(table);
    expect(result.errors.map((e) => e.message)).toEqual([
      'Action "advance" at "manager" leads to "warehouse", which is not a stage of "connection_request"',
      'Terminal action "advance" at "manager" must stay on its stage',
    ]);
  });

  test('rejects cancel without the cancelled status and completion by other actions', () => {
    const table = withConnectionStages([
      {
        role: Role.Manager,
        transitions: [
          { action: Action.Cancel, to: Role.Manager, status: RequestStatus.Blocked },
          { action: Action.Return, to: Role.Manager, status: RequestStatus.Completed },
        ],
      },
    ]);
    const result = validateWorkflowDefinitions(table);
    expect(result.errors.map((e) => e.message)).toEqual([
      '"cancel" and status "cancelled" must go together (stage "manager" of "connection_request")',
      'Only "advance" may complete a request (stage "manager" of "connection_request")',
    ]);
  });

  test('rejects duplicate stages and actions', () => {
    const advance: StageTransition = { action: Action.Advance, to: Role.Manager, status: RequestStatus.Completed };
    const table = withConnectionStages([
      { role: Role.Manager, transitions: [advance, advance] },
      { role: Role.Manager, transitions: [advance] },
    ]);
    const messages = validateWorkflowDefinitions(table).errors.map((e) => e.message);
    expect(messages).toContain('Workflow "connection_request" lists stage "manager" twice');
    expect(messages).toContain('Stage "manager" of "connection_request" defines "advance" twice');
  });
});
