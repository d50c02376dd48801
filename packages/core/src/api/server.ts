import express, { Express, Request, Response } from 'express';
import type { Server } from 'node:http';
import { logger } from '@token-engine/shared';
import type { TokenEngine } from '../di/bootstrap.js';
import { HealthController } from './controllers/health.controller.js';
import { createTokenRoutes } from './routes/token.routes.js';
import { globalErrorHandler, notFoundHandler } from './middleware/error.middleware.js';
import { requestIdMiddleware } from './middleware/request-id.middleware.js';
import { securityHeaders, createCorsMiddleware, requestSizeLimits } from './middleware/security.middleware.js';
import { initMetrics, getMetrics, metricsContentType, httpRequestsTotal, httpRequestDuration } from '../observability/metrics.js';
import { gracefulShutdown, readyCheck } from '../shutdown/graceful-shutdown.js';

export interface ApiOptions {
    host: string;
    port: number;
    corsOrigin: string;
}

export function createApp(engine: TokenEngine, corsOrigin: string = '*'): Express {
    const app = express();

    // Initialize metrics
    initMetrics();

    // Security middleware (must be early)
    app.use(securityHeaders);
    app.use(createCorsMiddleware(corsOrigin));

    // Request parsing with size limits
    app.use(express.json(requestSizeLimits.json));

    // Request tracking
    app.use(requestIdMiddleware);

    // Metrics tracking middleware
    app.use((req, res, next) => {
        const start = Date.now();
        res.on('finish', () => {
            const labels = {
                method: req.method,
                route: req.route?.path ? `${req.baseUrl}${req.route.path}` : req.path,
                status_code: res.statusCode.toString(),
            };
            httpRequestsTotal.inc(labels);
            httpRequestDuration.observe(labels, (Date.now() - start) / 1000);
        });
        next();
    });

    const health = new HealthController(engine);

    app.get('/', (req: Request, res: Response) => health.root(req, res));
    app.get('/health', (req: Request, res: Response) => health.health(req, res));

    /**
     * Metrics Endpoint (Prometheus-compatible)
     */
    app.get('/metrics', async (req: Request, res: Response) => {
        try {
            const metrics = await getMetrics();
            res.set('Content-Type', metricsContentType());
            res.send(metrics);
        } catch (error) {
            logger.error({ err: error }, 'Failed to get metrics');
            res.status(500).send('Error generating metrics');
        }
    });

    // Ready check (503 during shutdown)
    app.use('/token', readyCheck(), createTokenRoutes(engine));

    // 404 handler (after all routes)
    app.use(notFoundHandler);

    // Global error handler (must be last)
    app.use(globalErrorHandler);

    return app;
}

/**
 * Start API Server
 */
export function startAPI(engine: TokenEngine, options: ApiOptions): Server {
    const app = createApp(engine, options.corsOrigin);
    const { host, port } = options;

    const server = app.listen(port, host, () => {
        logger.info(`🌐 API server listening on ${host}:${port}`);
        logger.info(`   Token: POST http://localhost:${port}/token`);
        logger.info(`   Health: http://localhost:${port}/health`);
        logger.info(`   Metrics: http://localhost:${port}/metrics`);
        logger.info(`   🛡️  Security: Helmet + CORS enabled`);
    });

    // Token requests may legitimately run for the whole request budget
    server.requestTimeout = 0;
    server.headersTimeout = 65_000;

    gracefulShutdown.attach({
        server,
        drain: timeoutMs => engine.orchestrator.drain(timeoutMs),
        closeEngine: () => engine.shutdown(),
        drainTimeoutMs: engine.config.requestTimeoutMs,
    });
    gracefulShutdown.init();

    return server;
}
