/**
 * Administrative API routes (admin only).
 *
 * GET /admin/circuits — Circuit breaker state per operation class
 * POST /admin/circuits/:operationClass/reset — Force a circuit closed
 * GET /admin/statistics — Executor statistics
 * POST /admin/audit/flush — Replay buffered audit entries
 */

import { NextFunction, Router } from 'express';
import { Role } from '../domain/request';
import { OrchestrationService } from '../engine/orchestrator';
import { AuthenticatedRequest, requireRole } from './middleware';

export function createAdminRoutes(orchestrator: OrchestrationService): Router {
  const router = Router();
  router.use(requireRole(Role.Admin));

  router.get('/circuits', (_req: AuthenticatedRequest, res) => {
    res.json({ circuits: orchestrator.listCircuits() });
  });

  router.post('/circuits/:operationClass/reset', (req: AuthenticatedRequest, res) => {
    const circuit = orchestrator.resetCircuit(req.params.operationClass);
    res.json({ circuit });
  });

  router.get('/statistics', (_req: AuthenticatedRequest, res) => {
    res.json(orchestrator.getStatistics());
  });

  router.post('/audit/flush', async (_req: AuthenticatedRequest, res, next: NextFunction) => {
    try {
      const written = await orchestrator.flushAuditFallback();
      res.json({ written, remaining: orchestrator.getHealth().auditFallbackSize });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
