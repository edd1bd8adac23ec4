import express from 'express';
import helmet from 'helmet';
import type { BackendIngest } from './services/broker/backend-ingest.js';
import type { ConnectionManager } from './services/broker/connection-manager.js';
import { createIngestRouter } from './controllers/ingest/ingest.controller.js';
import { createReadinessHandler, createStatsRouter, livenessHandler } from './controllers/health.controller.js';
import { requestContextMiddleware } from './middleware/requestContext.middleware.js';
import { httpLoggingMiddleware } from './middleware/httpLogging.middleware.js';
import { AppError, errorMiddleware } from './middleware/error.middleware.js';

export interface AppDeps {
    ingest: BackendIngest;
    manager: ConnectionManager;
    ingestToken?: string | undefined;
    bodyLimit?: string;
}

export function createApp({ ingest, manager, ingestToken, bodyLimit = '1mb' }: AppDeps) {
    const app = express();
    app.disable('x-powered-by');
    app.use(helmet());

    // Request context & logging (BEFORE body parsing so parse errors carry a traceId)
    app.use(requestContextMiddleware);
    app.use(httpLoggingMiddleware);
    app.use(express.json({ limit: bodyLimit }));

    app.get('/healthz', livenessHandler);
    app.get('/ready', createReadinessHandler({ ingest }));

    app.use('/api/v1', createIngestRouter({ ingest, ingestToken }));
    app.use('/api/v1', createStatsRouter({ ingest, manager }));

    app.use((req, _res, next) => {
        next(new AppError(`No route for ${req.method} ${req.path}`, 404, 'NOT_FOUND', undefined, true));
    });
    app.use(errorMiddleware);

    return app;
}
