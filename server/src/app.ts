import express from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import { createBridgeRouter, type BridgeRouterDeps } from './controllers/bridge/bridge.controller.js';
import { requestContextMiddleware } from './middleware/requestContext.middleware.js';
import { httpLoggingMiddleware } from './middleware/httpLogging.middleware.js';

export type AppDeps = BridgeRouterDeps;

export function createApp(deps: AppDeps) {
    const app = express();
    app.use(helmet());
    app.use(compression());
    app.use(express.json({ limit: '1mb' }));
    app.use(cors());

    // Request context & logging (BEFORE routes)
    app.use(requestContextMiddleware);
    app.use(httpLoggingMiddleware);

    app.use(createBridgeRouter(deps));

    app.get('/healthz', (_req, res) => res.status(200).send('ok'));

    return app;
}
