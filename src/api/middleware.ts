/**
 * API Middleware — identity, role checks, and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { Actor, Role, isRole } from '../domain/request';
import { TypedError, apiError, createTypedError, internalError } from '../domain/errors';
import { logger } from '../logger';

const log = logger.child({ module: 'http' });

/** Request carrying the authenticated actor. */
export interface AuthenticatedRequest extends Request {
  actor?: Actor;
}

function unauthenticated(message: string): TypedError {
  return createTypedError({ code: 'AUTH.UNAUTHENTICATED', message, retryable: false });
}

/**
 * Identity middleware. Authentication happens upstream; the verified actor
 * arrives in the `x-actor-id` and `x-actor-role` headers.
 */
export function identityMiddleware() {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    const actorId = req.header('x-actor-id')?.trim();
    const actorRole = req.header('x-actor-role')?.trim();

    if (!actorId || !actorRole) {
      res.status(401).json(apiError(unauthenticated('x-actor-id and x-actor-role headers are required')));
      return;
    }
    if (!isRole(actorRole)) {
      res.status(401).json(apiError(unauthenticated(`Unknown role "${actorRole}"`)));
      return;
    }

    req.actor = { actorId, actorRole };
    next();
  };
}

/** Allow only the listed roles. */
export function requireRole(...roles: Role[]) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    if (!req.actor) {
      res.status(401).json(apiError(unauthenticated('Authentication required')));
      return;
    }
    if (!roles.includes(req.actor.actorRole)) {
      res.status(403).json(
        apiError(
          createTypedError({
            code: 'AUTH.FORBIDDEN',
            message: `Role "${req.actor.actorRole}" may not access this endpoint`,
            details: { requiredRoles: roles },
          }),
        ),
      );
      return;
    }
    next();
  };
}

/** The actor set by identityMiddleware, or a 401 sent and undefined. */
export function requireActor(req: AuthenticatedRequest, res: Response): Actor | undefined {
  if (!req.actor) {
    res.status(401).json(apiError(unauthenticated('Authentication required')));
    return undefined;
  }
  return req.actor;
}

/** Map an error code to its HTTP status. */
export function getHttpStatus(error: TypedError): number {
  if (error.code.startsWith('AUTH.UNAUTHENTICATED')) return 401;
  if (error.code.startsWith('AUTH.')) return 403;
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.startsWith('CONFLICT.')) return 409;
  if (error.code.startsWith('TRANSITION.')) return 409;
  if (error.code === 'PERSISTENCE.CIRCUIT_OPEN') return 503;
  if (error.code.startsWith('PERSISTENCE.')) return 502;
  return 500;
}

/** Send a typed error with its mapped status. */
export function sendError(res: Response, error: TypedError): void {
  res.status(getHttpStatus(error)).json(apiError(error));
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (isSyntaxError(err)) {
    sendError(res, createTypedError({ code: 'VALIDATION.SCHEMA', message: 'Request body is not valid JSON' }));
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  log.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });
  sendError(res, internalError(message));
}

function isSyntaxError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}
