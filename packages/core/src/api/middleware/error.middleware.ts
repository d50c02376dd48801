import { Request, Response, NextFunction } from 'express';
import { NotFoundError, toApplicationError, logError, errorResponse, logger } from '@token-engine/shared';

/**
 * Body parser failures carry a status and type but are not ApplicationErrors
 */
function isBodyParserError(error: unknown): error is Error & { status: number; type: string } {
    return error instanceof Error
        && 'status' in error && typeof error.status === 'number'
        && 'type' in error && typeof error.type === 'string';
}

/**
 * Global error handler middleware
 * Must be registered last in middleware chain
 */
export function globalErrorHandler(
    error: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    if (isBodyParserError(error) && error.status < 500) {
        logger.warn({ requestId: req.id, type: error.type }, 'Rejected malformed request body');
        res.status(error.status).json(errorResponse('INVALID_BODY', error.message, undefined, req.id));
        return;
    }

    // Log the error with context
    logError(error, {
        requestId: req.id,
        method: req.method,
        path: req.path,
        ip: req.ip,
        userAgent: req.get('user-agent')
    });

    const appError = toApplicationError(error);
    const isServerError = appError.statusCode >= 500;

    res.status(appError.statusCode).json(errorResponse(
        appError.code,
        appError.message,
        isServerError ? undefined : appError.context,
        req.id
    ));
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(req: Request, res: Response): void {
    logger.warn({
        requestId: req.id,
        method: req.method,
        path: req.path
    }, 'Route not found');

    const error = new NotFoundError('Route', `${req.method} ${req.path}`);
    res.status(error.statusCode).json(errorResponse(error.code, error.message, undefined, req.id));
}
