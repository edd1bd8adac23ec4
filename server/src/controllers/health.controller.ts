/**
 * Health, Readiness & Stats Endpoints
 *
 * - /healthz: liveness (is the process alive?)
 * - /ready:   readiness (is the broker accepting changes?)
 * - /stats:   connection and subscription counters
 */

import { Router, type Request, type Response } from 'express';
import type { BackendIngest } from '../services/broker/backend-ingest.js';
import type { ConnectionManager } from '../services/broker/connection-manager.js';

export interface HealthControllerDeps {
  ingest: BackendIngest;
  manager: ConnectionManager;
}

export function livenessHandler(_req: Request, res: Response): void {
  res.status(200).json({
    status: 'UP',
    timestamp: new Date().toISOString(),
  });
}

export function createReadinessHandler({ ingest }: Pick<HealthControllerDeps, 'ingest'>) {
  return (_req: Request, res: Response): void => {
    const ready = ingest.isAccepting;
    res.status(ready ? 200 : 503).json({
      status: ready ? 'UP' : 'DRAINING',
      ready,
      timestamp: new Date().toISOString(),
    });
  };
}

export function createStatsRouter({ ingest, manager }: HealthControllerDeps): Router {
  const router = Router();

  router.get('/stats', (_req: Request, res: Response) => {
    res.status(200).json({
      ...manager.getStats(),
      changesReceived: ingest.receivedCount,
      changesPending: ingest.pendingCount,
    });
  });

  return router;
}
