import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import {
  PermissionEngine,
  buildPermissionMatrix,
  loadPermissionMatrix,
} from '../../src/engine/permission-engine';
import { Action, Role, WorkflowType } from '../../src/domain/request';
import { ConfigurationError } from '../../src/domain/errors';

describe('PermissionEngine with the shipped matrix', () => {
  const engine = new PermissionEngine(loadPermissionMatrix());

  test('junior manager may not create technical service requests', () => {
    const decision = engine.authorize(Role.JuniorManager, Action.Create, WorkflowType.TechnicalService, 0);
    expect(decision).toEqual({ allowed: false, reason: 'no_matching_grant', dailyLimit: null });
  });

  test('manager may create connection requests without a limit', () => {
    const decision = engine.authorize(Role.Manager, Action.Create, WorkflowType.ConnectionRequest, 10_000);
    expect(decision).toEqual({ allowed: true, reason: 'granted', dailyLimit: null });
  });

  test('junior manager daily limit denies at 50 uses', () => {
    expect(engine.authorize(Role.JuniorManager, Action.Create, WorkflowType.ConnectionRequest, 49).allowed).toBe(true);
    expect(engine.authorize(Role.JuniorManager, Action.Create, WorkflowType.ConnectionRequest, 50)).toEqual({
      allowed: false,
      reason: 'daily_limit_exceeded',
      dailyLimit: 50,
    });
  });

  test('call center daily limit is 100', () => {
    expect(engine.authorize(Role.CallCenter, Action.Create, WorkflowType.CallCenterDirect, 99).allowed).toBe(true);
    expect(engine.authorize(Role.CallCenter, Action.Create, WorkflowType.CallCenterDirect, 100).reason).toBe(
      'daily_limit_exceeded',
    );
  });

  test('every combination absent from the matrix is denied', () => {
    for (const role of Object.values(Role)) {
      for (const action of Object.values(Action)) {
        for (const type of Object.values(WorkflowType)) {
          const decision = engine.authorize(role, action, type, 0);
          if (!decision.allowed) {
            expect(decision.reason).toBe('no_matching_grant');
          }
        }
      }
    }
    expect(engine.authorize(Role.Client, Action.Advance, WorkflowType.ConnectionRequest).allowed).toBe(false);
    expect(engine.authorize(Role.Warehouse, Action.Cancel, WorkflowType.TechnicalService).allowed).toBe(false);
  });

  test('decisions are deterministic', () => {
    const first = engine.authorize(Role.Controller, Action.Advance, WorkflowType.TechnicalService, 3);
    const second = engine.authorize(Role.Controller, Action.Advance, WorkflowType.TechnicalService, 3);
    expect(second).toEqual(first);
  });

  test('lists creatable workflow types per role', () => {
    expect(engine.creatableWorkflowTypes(Role.JuniorManager)).toEqual([WorkflowType.ConnectionRequest]);
    expect(engine.creatableWorkflowTypes(Role.Technician)).toEqual([]);
    expect(engine.creatableWorkflowTypes(Role.CallCenter)).toEqual([
      WorkflowType.ConnectionRequest,
      WorkflowType.TechnicalService,
      WorkflowType.CallCenterDirect,
    ]);
  });
});

describe('buildPermissionMatrix', () => {
  test('expands rows per workflow type and freezes the grants', () => {
    const result = buildPermissionMatrix({
      grants: [{ role: 'manager', action: 'advance', workflowTypes: ['connection_request', 'technical_service'], dailyLimit: 3 }],
    });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.matrix.grants.size).toBe(2);
    const grant = result.matrix.grants.get('manager|advance|technical_service');
    expect(grant).toEqual({ role: 'manager', action: 'advance', workflowType: 'technical_service', dailyLimit: 3 });
    expect(Object.isFrozen(grant)).toBe(true);
    expect(Object.isFrozen(result.matrix)).toBe(true);
  });

  test('rejects unknown roles, actions and workflow types', () => {
    const result = buildPermissionMatrix({
      grants: [
        { role: 'janitor', action: 'advance', workflowTypes: ['connection_request'] },
        { role: 'manager', action: 'teleport', workflowTypes: ['connection_request'] },
        { role: 'manager', action: 'advance', workflowTypes: ['space_launch'] },
      ],
    });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errors).toHaveLength(3);
    expect(result.errors.every((e) => e.code === 'VALIDATION.SCHEMA')).toBe(true);
  });

  test('rejects duplicate grants and negative limits', () => {
    const result = buildPermissionMatrix({
      grants: [
        { role: 'manager', action: 'advance', workflowTypes: ['connection_request'] },
        { role: 'manager', action: 'advance', workflowTypes: ['connection_request'] },
        { role: 'client', action: 'create', workflowTypes: ['connection_request'], dailyLimit: -1 },
      ],
    });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errors.map((e) => e.message)).toEqual([
      'Duplicate grant for manager|advance|connection_request',
      'grants[2].dailyLimit must be a non-negative integer or null',
    ]);
  });

  test('rejects a document without a grants array', () => {
    const result = buildPermissionMatrix({ rules: [] });
    expect(result.success).toBe(false);
  });
});

describe('loadPermissionMatrix', () => {
  test('throws ConfigurationError for unreadable or invalid files', () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'matrix-'));
    const invalid = path.join(dir, 'invalid.json');
    writeFileSync(invalid, JSON.stringify({ grants: [{ role: 'nobody' }] }));

    expect(() => loadPermissionMatrix(path.join(dir, 'missing.json'))).toThrow(ConfigurationError);
    expect(() => loadPermissionMatrix(invalid)).toThrow('is invalid');
  });
});
