/**
 * Typed error model.
 *
 * Errors are returned as typed values rather than thrown exceptions so that
 * callers can branch on a stable, namespaced code and apply the suggested
 * remediation.
 */

/** Typed suggested fix a caller can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned by the orchestration API. */
export interface TypedError {
  /** Namespaced error code (e.g., "TRANSITION.TERMINAL"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated request if applicable. */
  requestId?: string;
  /** Whether the same call is expected to succeed later without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/**
 * Authorization denial reasons. The permission engine produces the first two;
 * the state machine adds `not_stage_owner` for stage work attempted by a role
 * that does not hold the request.
 */
export type DenialReason = 'no_matching_grant' | 'daily_limit_exceeded' | 'not_stage_owner';

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  requestId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    requestId: params.requestId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

// --- Validation ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function reservedKeyError(requestId: string, keys: string[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.RESERVED_KEY',
    message: `Payload writes reserved keys: ${keys.join(', ')}`,
    requestId,
    details: { keys },
    suggestedFixes: [
      { type: 'RENAME_PAYLOAD_KEYS', params: { keys }, description: 'Use keys the core does not own' },
    ],
  });
}

export function keyExistsError(requestId: string, keys: string[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.KEY_EXISTS',
    message: `State data is append-only; keys already present: ${keys.join(', ')}`,
    requestId,
    details: { keys },
    suggestedFixes: [
      { type: 'RENAME_PAYLOAD_KEYS', params: { keys }, description: 'Write new keys instead of overwriting' },
    ],
  });
}

export function missingDataError(requestId: string, keys: string[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.MISSING_DATA',
    message: `Transition requires data that was not provided: ${keys.join(', ')}`,
    requestId,
    details: { keys },
    suggestedFixes: [
      { type: 'PROVIDE_DATA', params: { keys }, description: 'Include the required keys in the payload' },
    ],
  });
}

// --- Lookup and structure ---

export function requestNotFoundError(requestId: string): TypedError {
  return createTypedError({
    code: 'REQUEST.NOT_FOUND',
    message: `Request not found: ${requestId}`,
    requestId,
  });
}

export function terminalError(requestId: string, status: string): TypedError {
  return createTypedError({
    code: 'TRANSITION.TERMINAL',
    message: `Request is ${status} and accepts no further transitions`,
    requestId,
    details: { status },
  });
}

export function invalidActionError(
  requestId: string,
  stage: string,
  action: string,
  availableActions: string[],
): TypedError {
  return createTypedError({
    code: 'TRANSITION.INVALID_ACTION',
    message: `Action "${action}" is not defined at stage "${stage}"`,
    requestId,
    details: { stage, action, availableActions },
  });
}

export function canceledError(requestId: string): TypedError {
  return createTypedError({
    code: 'TRANSITION.CANCELED',
    message: 'Transition canceled before persistence started',
    requestId,
  });
}

// --- Authorization ---

export function forbiddenError(
  requestId: string | undefined,
  role: string,
  action: string,
  reason: DenialReason,
): TypedError {
  const message =
    reason === 'daily_limit_exceeded'
      ? `Role "${role}" has reached its daily limit for "${action}"`
      : reason === 'not_stage_owner'
        ? `Role "${role}" does not hold this request and may not "${action}" it`
        : `Role "${role}" may not perform "${action}"`;
  return createTypedError({
    code: 'AUTH.FORBIDDEN',
    message,
    requestId,
    details: { role, action, reason },
  });
}

// --- Concurrency ---

export function staleVersionError(requestId: string, expectedVersion: number, actualVersion?: number): TypedError {
  return createTypedError({
    code: 'CONFLICT.STALE_VERSION',
    message: `Request changed concurrently (expected version ${expectedVersion})`,
    requestId,
    details: { expectedVersion, actualVersion },
    suggestedFixes: [
      { type: 'RELOAD_AND_RETRY', params: { requestId }, description: 'Reload the request and retry the transition' },
    ],
  });
}

// --- Infrastructure ---

export function persistenceError(
  requestId: string,
  kind: string,
  message: string,
  details?: Record<string, unknown>,
): TypedError {
  const code =
    kind === 'circuit_open'
      ? 'PERSISTENCE.CIRCUIT_OPEN'
      : kind === 'deadline_exceeded'
        ? 'PERSISTENCE.DEADLINE_EXCEEDED'
        : 'PERSISTENCE.FAILED';
  return createTypedError({
    code,
    message,
    requestId,
    retryable: kind !== 'fatal',
    details: { kind, ...details },
    suggestedFixes:
      kind === 'circuit_open'
        ? [{ type: 'BACK_OFF', params: {}, description: 'Storage is failing; retry after the recovery timeout' }]
        : [],
  });
}

export function notificationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'NOTIFICATION.FAILED',
    message,
    retryable: true,
    details,
  });
}

export function internalError(message: string): TypedError {
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
    retryable: false,
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}

/** Thrown at startup when static configuration cannot be loaded. */
export class ConfigurationError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ConfigurationError';
  }
}
