/**
 * Domain model exports.
 */

export * from './audit';
export * from './errors';
export * from './rbac';
export * from './request';
export * from './workflow';
