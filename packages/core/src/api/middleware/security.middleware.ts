import type { RequestHandler } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { logger } from '@token-engine/shared';

/**
 * Security headers middleware using Helmet
 * The API only serves JSON, so the CSP is locked down completely.
 */
export const securityHeaders = helmet({
    contentSecurityPolicy: {
        directives: {
            defaultSrc: ["'none'"],
            frameAncestors: ["'none'"],
        },
    },
    hsts: {
        maxAge: 31536000, // 1 year
        includeSubDomains: true,
    },
    frameguard: { action: 'deny' },
    noSniff: true,
});

/**
 * CORS configuration from a comma separated origin list; `*` allows any origin
 */
export function createCorsMiddleware(corsOrigin: string): RequestHandler {
    const allowedOrigins = corsOrigin.split(',').map(origin => origin.trim()).filter(Boolean);

    return cors({
        origin: (origin, callback) => {
            // Allow requests with no origin (like curl or server-to-server calls)
            if (!origin) return callback(null, true);

            if (allowedOrigins.includes('*') || allowedOrigins.includes(origin)) {
                callback(null, true);
            } else {
                logger.warn({ origin }, 'CORS request from unauthorized origin');
                callback(null, false);
            }
        },
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'X-Request-ID', 'X-Correlation-ID'],
        maxAge: 86400, // 24 hours
    });
}

/**
 * Request size limits
 */
export const requestSizeLimits = {
    json: { limit: '16kb' },
};
