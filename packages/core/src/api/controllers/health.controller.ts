import { Request, Response } from 'express';
import { successResponse } from '@token-engine/shared';
import type { TokenEngine } from '../../di/bootstrap.js';

export type HealthSource = Pick<TokenEngine, 'orchestrator' | 'supervisor' | 'gate' | 'config'>;

export class HealthController {
    private readonly startedAt = Date.now();

    constructor(private readonly engine: HealthSource) { }

    /**
     * Service descriptor
     * GET /
     */
    root(req: Request, res: Response): void {
        res.json(successResponse({
            service: 'token-engine',
            description: 'reCAPTCHA v3 token issuance over one supervised browser',
            endpoints: {
                token: 'POST /token',
                health: 'GET /health',
                metrics: 'GET /metrics'
            }
        }, { requestId: req.id }));
    }

    /**
     * Health Check
     * GET /health
     */
    health(req: Request, res: Response): void {
        const { orchestrator, supervisor, gate, config } = this.engine;
        const healthy = orchestrator.healthStatus() === 'ready';

        res.status(healthy ? 200 : 503).json({
            status: healthy ? 'healthy' : 'unhealthy',
            timestamp: new Date().toISOString(),
            uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000),
            mode: {
                localSolving: config.localSolvingEnabled,
                fallback: config.fallback.enabled
            },
            browser: config.localSolvingEnabled ? supervisor.getStats() : undefined,
            admission: gate.getStats()
        });
    }
}
