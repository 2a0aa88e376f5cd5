/**
 * Audit API routes.
 *
 * GET /audit — Query audit entries (admin only).
 * Query: requestId, actorId, from, to (ISO-8601), limit, offset.
 */

import { NextFunction, Response, Router } from 'express';
import { AuditFilter } from '../domain/audit';
import { Role } from '../domain/request';
import { validationError } from '../domain/errors';
import { OrchestrationService } from '../engine/orchestrator';
import { AuthenticatedRequest, requireRole, sendError } from './middleware';

const MAX_LIMIT = 1000;

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function parseFilter(query: Record<string, unknown>, res: Response): AuditFilter | undefined {
  const filter: AuditFilter = {
    requestId: queryString(query.requestId),
    actorId: queryString(query.actorId),
  };

  for (const bound of ['from', 'to'] as const) {
    const raw = queryString(query[bound]);
    if (raw === undefined) continue;
    const time = Date.parse(raw);
    if (Number.isNaN(time)) {
      sendError(res, validationError(`${bound} must be an ISO-8601 timestamp`, { field: bound }));
      return undefined;
    }
    filter[bound] = new Date(time).toISOString();
  }

  for (const field of ['limit', 'offset'] as const) {
    const raw = queryString(query[field]);
    if (raw === undefined) continue;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0 || value > (field === 'limit' ? MAX_LIMIT : Number.MAX_SAFE_INTEGER)) {
      sendError(res, validationError(`${field} must be a non-negative integer`, { field }));
      return undefined;
    }
    filter[field] = value;
  }
  return filter;
}

export function createAuditRoutes(orchestrator: OrchestrationService): Router {
  const router = Router();

  router.get('/', requireRole(Role.Admin), async (req: AuthenticatedRequest, res, next: NextFunction) => {
    try {
      const filter = parseFilter(req.query, res);
      if (!filter) return;
      const entries = await orchestrator.getAuditTrail(filter);
      res.json({ entries });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
