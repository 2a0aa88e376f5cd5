/**
 * Workflow API routes.
 *
 * GET /workflows — Workflow types the caller's role may create, with stages.
 */

import { Router } from 'express';
import { OrchestrationService } from '../engine/orchestrator';
import { AuthenticatedRequest, requireActor } from './middleware';

export function createWorkflowRoutes(orchestrator: OrchestrationService): Router {
  const router = Router();

  router.get('/', (req: AuthenticatedRequest, res) => {
    const actor = requireActor(req, res);
    if (!actor) return;
    const workflows = orchestrator.listCreatableWorkflows(actor.actorRole).map((definition) => ({
      type: definition.type,
      name: definition.name,
      stages: definition.stages.map((stage) => ({
        role: stage.role,
        actions: stage.transitions.map((t) => t.action),
      })),
    }));
    res.json({ workflows });
  });

  return router;
}
