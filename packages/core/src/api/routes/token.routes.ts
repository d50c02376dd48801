import { Router } from 'express';
import { TokenController } from '../controllers/token.controller.js';
import type { TokenEngine } from '../../di/bootstrap.js';

export function createTokenRoutes(engine: Pick<TokenEngine, 'orchestrator'>): Router {
    const router = Router();
    const controller = new TokenController(engine.orchestrator);

    router.post('/', (req, res, next) => {
        controller.issue(req, res).catch(next);
    });

    return router;
}
