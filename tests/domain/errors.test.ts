import {
  apiError,
  createTypedError,
  forbiddenError,
  persistenceError,
  staleVersionError,
  terminalError,
  validationError,
} from '../../src/domain/errors';
import { getHttpStatus } from '../../src/api/middleware';

describe('Typed Error Model', () => {
  test('createTypedError fills defaults', () => {
    const error = createTypedError({ code: 'TEST.ERROR', message: 'test error' });
    expect(error).toEqual({
      code: 'TEST.ERROR',
      message: 'test error',
      requestId: undefined,
      retryable: false,
      details: undefined,
      suggestedFixes: [],
    });
  });

  test('forbiddenError words each denial reason', () => {
    expect(forbiddenError('req_1', 'client', 'cancel', 'no_matching_grant').message).toBe(
      'Role "client" may not perform "cancel"',
    );
    expect(forbiddenError('req_1', 'junior_manager', 'create', 'daily_limit_exceeded').message).toBe(
      'Role "junior_manager" has reached its daily limit for "create"',
    );
    expect(forbiddenError('req_1', 'controller', 'advance', 'not_stage_owner').message).toBe(
      'Role "controller" does not hold this request and may not "advance" it',
    );
  });

  test('persistenceError codes follow the failure kind', () => {
    expect(persistenceError('req_1', 'circuit_open', 'open').code).toBe('PERSISTENCE.CIRCUIT_OPEN');
    expect(persistenceError('req_1', 'deadline_exceeded', 'late').code).toBe('PERSISTENCE.DEADLINE_EXCEEDED');
    expect(persistenceError('req_1', 'attempts_exhausted', 'gave up')).toMatchObject({
      code: 'PERSISTENCE.FAILED',
      retryable: true,
      details: { kind: 'attempts_exhausted' },
    });
    expect(persistenceError('req_1', 'fatal', 'bad').retryable).toBe(false);
  });

  test('staleVersionError suggests reloading', () => {
    const error = staleVersionError('req_1', 1, 2);
    expect(error.details).toEqual({ expectedVersion: 1, actualVersion: 2 });
    expect(error.suggestedFixes.map((f) => f.type)).toEqual(['RELOAD_AND_RETRY']);
  });

  test('apiError wraps the error', () => {
    const error = validationError('bad input');
    expect(apiError(error)).toEqual({ error });
  });

  test('HTTP status mapping', () => {
    expect(getHttpStatus(createTypedError({ code: 'AUTH.UNAUTHENTICATED', message: '' }))).toBe(401);
    expect(getHttpStatus(forbiddenError('req_1', 'client', 'cancel', 'no_matching_grant'))).toBe(403);
    expect(getHttpStatus(createTypedError({ code: 'REQUEST.NOT_FOUND', message: '' }))).toBe(404);
    expect(getHttpStatus(validationError('bad'))).toBe(400);
    expect(getHttpStatus(staleVersionError('req_1', 1))).toBe(409);
    expect(getHttpStatus(terminalError('req_1', 'completed'))).toBe(409);
    expect(getHttpStatus(persistenceError('req_1', 'circuit_open', 'open'))).toBe(503);
    expect(getHttpStatus(persistenceError('req_1', 'attempts_exhausted', 'failed'))).toBe(502);
    expect(getHttpStatus(createTypedError({ code: 'SYSTEM.INTERNAL', message: '' }))).toBe(500);
  });
});
