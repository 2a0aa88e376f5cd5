/**
 * Service request API routes.
 *
 * POST /requests — Create a request
 * GET /requests/:requestId — Request status, available actions, history
 * POST /requests/:requestId/transitions — Apply a workflow action
 */

import { NextFunction, Response, Router } from 'express';
import { Role, isPriority, isWorkflowType } from '../domain/request';
import { validationError } from '../domain/errors';
import { OrchestrationService } from '../engine/orchestrator';
import { isNonNegativeInteger, isRecord } from '../util/guards';
import { AuthenticatedRequest, requireActor, sendError } from './middleware';

/** Abort signal that fires if the client goes away before the response is sent. */
function disconnectSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller.signal;
}

export function createRequestRoutes(orchestrator: OrchestrationService): Router {
  const router = Router();

  /**
   * POST /requests
   * Body: { workflowType, clientId?, onBehalfOfClient?, priority?, initialPayload? }.
   * A client creating for themselves may omit clientId.
   */
  router.post('/', async (req: AuthenticatedRequest, res, next: NextFunction) => {
    try {
      const actor = requireActor(req, res);
      if (!actor) return;
      const body: unknown = req.body;
      if (!isRecord(body)) {
        sendError(res, validationError('Request body must be a JSON object'));
        return;
      }

      const { workflowType, clientId, onBehalfOfClient, priority, initialPayload } = body;
      if (!isWorkflowType(workflowType)) {
        sendError(res, validationError('workflowType is missing or unknown', { field: 'workflowType' }));
        return;
      }
      if (priority !== undefined && !isPriority(priority)) {
        sendError(res, validationError('priority must be low, medium or high', { field: 'priority' }));
        return;
      }
      if (initialPayload !== undefined && !isRecord(initialPayload)) {
        sendError(res, validationError('initialPayload must be an object', { field: 'initialPayload' }));
        return;
      }
      if (onBehalfOfClient !== undefined && typeof onBehalfOfClient !== 'boolean') {
        sendError(res, validationError('onBehalfOfClient must be a boolean', { field: 'onBehalfOfClient' }));
        return;
      }
      const resolvedClientId =
        typeof clientId === 'string' ? clientId : actor.actorRole === Role.Client ? actor.actorId : undefined;
      if (resolvedClientId === undefined) {
        sendError(res, validationError('clientId is required', { field: 'clientId' }));
        return;
      }

      const result = await orchestrator.createRequest(
        {
          workflowType,
          clientId: resolvedClientId,
          priority,
          initialPayload,
          creator: {
            actorId: actor.actorId,
            actorRole: actor.actorRole,
            onBehalfOfClient: onBehalfOfClient ?? false,
          },
        },
        { signal: disconnectSignal(res) },
      );
      if (!result.success) {
        sendError(res, result.error);
        return;
      }
      res.status(201).json({ request: result.request, auditId: result.auditId });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /requests/:requestId
   */
  router.get('/:requestId', async (req: AuthenticatedRequest, res, next: NextFunction) => {
    try {
      const actor = requireActor(req, res);
      if (!actor) return;
      const result = await orchestrator.getRequestStatus(req.params.requestId, actor);
      if (!result.success) {
        sendError(res, result.error);
        return;
      }
      res.json(result.status);
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /requests/:requestId/transitions
   * Body: { action, payload?, expectedVersion? }.
   */
  router.post('/:requestId/transitions', async (req: AuthenticatedRequest, res, next: NextFunction) => {
    try {
      const actor = requireActor(req, res);
      if (!actor) return;
      const body: unknown = req.body;
      if (!isRecord(body) || typeof body.action !== 'string' || body.action === '') {
        sendError(res, validationError('action is required', { field: 'action' }));
        return;
      }
      const action = body.action;
      const { payload, expectedVersion } = body;
      if (payload !== undefined && !isRecord(payload)) {
        sendError(res, validationError('payload must be an object', { field: 'payload' }));
        return;
      }
      if (expectedVersion !== undefined && !isNonNegativeInteger(expectedVersion)) {
        sendError(res, validationError('expectedVersion must be a non-negative integer', { field: 'expectedVersion' }));
        return;
      }

      const result = await orchestrator.transition(req.params.requestId, actor, action, payload ?? {}, {
        expectedVersion,
        signal: disconnectSignal(res),
      });
      if (!result.success) {
        sendError(res, result.error);
        return;
      }
      res.json({
        request: result.request,
        fromRole: result.fromRole,
        toRole: result.toRole,
        auditId: result.auditId,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
