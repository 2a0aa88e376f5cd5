/**
 * Permission Engine.
 *
 * Pure lookup of (role, action, workflow type) against an immutable matrix.
 * Anything not in the matrix is denied. No I/O happens here except the
 * one-time file read in loadPermissionMatrix() at startup.
 */

import { readFileSync } from 'fs';
import path from 'path';
import {
  Decision,
  PermissionGrant,
  PermissionMatrix,
  grantKey,
} from '../domain/rbac';
import { Action, Role, WorkflowType, isAction, isRole, isWorkflowType } from '../domain/request';
import { ConfigurationError, TypedError, validationError } from '../domain/errors';
import { isNonNegativeInteger, isRecord, isStringArray } from '../util/guards';

/** Default location of the shipped matrix, relative to src/ or dist/. */
export const DEFAULT_PERMISSION_MATRIX_PATH = path.resolve(__dirname, '../../data/permission-matrix.json');

export type MatrixBuildResult =
  | { success: true; matrix: PermissionMatrix }
  | { success: false; errors: TypedError[] };

/**
 * Validate a matrix document and expand it into one frozen grant per
 * (role, action, workflow type). Duplicate rows are rejected.
 */
export function buildPermissionMatrix(document: unknown): MatrixBuildResult {
  const errors: TypedError[] = [];
  if (!isRecord(document) || !Array.isArray(document.grants)) {
    return {
      success: false,
      errors: [validationError('Permission matrix must be an object with a "grants" array')],
    };
  }

  const grants = new Map<string, Readonly<PermissionGrant>>();
  document.grants.forEach((row: unknown, index: number) => {
    if (!isRecord(row)) {
      errors.push(validationError(`grants[${index}] must be an object`, { index }));
      return;
    }
    const { role, action, workflowTypes, dailyLimit } = row;
    if (!isRole(role)) {
      errors.push(validationError(`grants[${index}].role is not a known role`, { index, role }));
      return;
    }
    if (!isAction(action)) {
      errors.push(validationError(`grants[${index}].action is not a known action`, { index, action }));
      return;
    }
    if (!isStringArray(workflowTypes) || workflowTypes.length === 0) {
      errors.push(validationError(`grants[${index}].workflowTypes must be a non-empty string array`, { index }));
      return;
    }
    if (dailyLimit !== undefined && dailyLimit !== null && !isNonNegativeInteger(dailyLimit)) {
      errors.push(validationError(`grants[${index}].dailyLimit must be a non-negative integer or null`, { index, dailyLimit }));
      return;
    }

    for (const workflowType of workflowTypes) {
      if (!isWorkflowType(workflowType)) {
        errors.push(validationError(`grants[${index}] names unknown workflow type "${workflowType}"`, { index, workflowType }));
        continue;
      }
      const key = grantKey(role, action, workflowType);
      if (grants.has(key)) {
        errors.push(validationError(`Duplicate grant for ${key}`, { index, key }));
        continue;
      }
      grants.set(key, Object.freeze({
        role,
        action,
        workflowType,
        dailyLimit: isNonNegativeInteger(dailyLimit) ? dailyLimit : null,
      }));
    }
  });

  if (errors.length > 0) {
    return { success: false, errors };
  }
  return { success: true, matrix: Object.freeze({ grants }) };
}

/** Read, validate and freeze the matrix file. Throws ConfigurationError on failure. */
export function loadPermissionMatrix(filePath: string = DEFAULT_PERMISSION_MATRIX_PATH): PermissionMatrix {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new ConfigurationError(
      validationError(`Cannot read permission matrix at ${filePath}: ${err instanceof Error ? err.message : String(err)}`, {
        filePath,
      }),
    );
  }

  const result = buildPermissionMatrix(document);
  if (!result.success) {
    throw new ConfigurationError(
      validationError(`Permission matrix at ${filePath} is invalid`, {
        filePath,
        errors: result.errors.map((e) => e.message),
      }),
    );
  }
  return result.matrix;
}

/** The permission engine. Stateless apart from its read-only matrix. */
export class PermissionEngine {
  constructor(private readonly matrix: PermissionMatrix) {}

  /**
   * Decide whether `role` may perform `action` on `workflowType`.
   *
   * `dailyCountSoFar` is how many times the actor already performed the
   * action in the trailing day; the caller reads it from storage.
   */
  authorize(role: Role, action: Action, workflowType: WorkflowType, dailyCountSoFar = 0): Decision {
    const grant = this.matrix.grants.get(grantKey(role, action, workflowType));
    if (!grant) {
      return { allowed: false, reason: 'no_matching_grant', dailyLimit: null };
    }
    if (grant.dailyLimit !== null && dailyCountSoFar >= grant.dailyLimit) {
      return { allowed: false, reason: 'daily_limit_exceeded', dailyLimit: grant.dailyLimit };
    }
    return { allowed: true, reason: 'granted', dailyLimit: grant.dailyLimit };
  }

  /** Workflow types a role may create requests for. */
  creatableWorkflowTypes(role: Role): WorkflowType[] {
    return Object.values(WorkflowType).filter((type) =>
      this.matrix.grants.has(grantKey(role, Action.Create, type)),
    );
  }
}
