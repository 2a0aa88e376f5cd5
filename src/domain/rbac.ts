/**
 * Permission domain model.
 *
 * A grant allows one role to perform one action on one workflow type,
 * optionally capped by a daily limit. The matrix is loaded once at startup
 * and never mutated afterwards.
 */

import { Action, Role, WorkflowType } from './request';
import { DenialReason } from './errors';

/** One entry of the permission matrix. */
export interface PermissionGrant {
  role: Role;
  action: Action;
  workflowType: WorkflowType;
  /** Maximum uses per trailing 24 hours; null means unlimited. */
  dailyLimit: number | null;
}

/** Immutable lookup of grants by (role, action, workflow type). */
export interface PermissionMatrix {
  readonly grants: ReadonlyMap<string, Readonly<PermissionGrant>>;
}

/** Result of an authorization check. */
export type Decision =
  | { allowed: true; reason: 'granted'; dailyLimit: number | null }
  | { allowed: false; reason: DenialReason; dailyLimit: number | null };

export function grantKey(role: string, action: string, workflowType: string): string {
  return `${role}|${action}|${workflowType}`;
}
