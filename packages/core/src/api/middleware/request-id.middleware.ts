import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { contextStorage } from '@token-engine/shared';
import type { LogContextKey } from '@token-engine/shared';

// Extend Express Request to include request and correlation IDs
declare global {
    namespace Express {
        interface Request {
            id?: string;
            correlationId?: string;
        }
    }
}

function headerValue(value: string | string[] | undefined): string | undefined {
    const first = Array.isArray(value) ? value[0] : value;
    return first && first.trim().length > 0 ? first.trim() : undefined;
}

/**
 * Request ID Middleware
 * Accepts or generates request and correlation IDs and sets up the AsyncLocalStorage context
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction) {
    req.id = headerValue(req.headers['x-request-id']) ?? uuidv4();
    req.correlationId = headerValue(req.headers['x-correlation-id']) ?? req.id;

    res.setHeader('X-Request-ID', req.id);
    res.setHeader('X-Correlation-ID', req.correlationId);

    const store = new Map<LogContextKey, string>();
    store.set('requestId', req.id);
    store.set('correlationId', req.correlationId);

    // Run the rest of the request in this context
    contextStorage.run(store, () => next());
}
