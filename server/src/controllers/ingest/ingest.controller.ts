/**
 * Backend Ingest Controller
 * HTTP surface of BackendIngest.reportChange
 *
 * POST /changes  {"uri","payload"?} | {"changes":[...]} | {"message":"update","data":{"uri"}}
 *   202 {"accepted": n, "coalesced": m}
 *   400 VALIDATION_ERROR, 401 UNAUTHORIZED, 503 BACKEND_UNAVAILABLE
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { BackendIngest } from '../../services/broker/backend-ingest.js';
import { parseChangeRequest } from '../../services/broker/protocol/change-schemas.js';
import { ingestAuthMiddleware } from '../../middleware/ingest-auth.middleware.js';
import { toAppError } from '../../middleware/error.middleware.js';

export interface IngestControllerDeps {
  ingest: BackendIngest;
  ingestToken: string | undefined;
}

export function createIngestRouter({ ingest, ingestToken }: IngestControllerDeps): Router {
  const router = Router();

  router.post('/changes', ingestAuthMiddleware(ingestToken), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = parseChangeRequest(req.body);
      if (!parsed.ok) {
        throw parsed.error;
      }

      let coalesced = 0;
      let recipients = 0;
      for (const change of parsed.changes) {
        const ack = await ingest.reportChange(change.uri, change.payload);
        if (ack.coalesced) coalesced++;
        recipients += ack.summary?.enqueued ?? 0;
      }

      req.log.info({
        accepted: parsed.changes.length,
        coalesced,
        recipients,
        event: 'changes_ingested'
      }, 'Changes ingested');

      res.status(202).json({ accepted: parsed.changes.length, coalesced });
    } catch (err) {
      next(toAppError(err));
    }
  });

  return router;
}
