/**
 * Error hierarchy for the token engine.
 * Typed errors with retry hints, HTTP status, context and classification.
 */

import type { TokenErrorKind } from './token.interface.js';

/**
 * Error Category - High-level classification for errors
 */
export enum ErrorCategory {
    TRANSIENT = 'transient',        // Retry likely helps (timeout, saturation)
    PERMANENT = 'permanent',        // Retry won't help (validation)
    OPERATIONAL = 'operational',    // System issue (browser down, provider down)
    CANCELLED = 'cancelled'         // Caller went away
}

/**
 * Failure Point - Where in the issuance pipeline the error occurred
 */
export enum FailurePoint {
    API_VALIDATION = 'api_validation',
    CONFIGURATION = 'configuration',
    ADMISSION = 'admission',
    BROWSER_LAUNCH = 'browser_launch',
    CONTEXT_ACQUISITION = 'context_acquisition',
    SCRIPT_EXECUTION = 'script_execution',
    FALLBACK_DISPATCH = 'fallback_dispatch',
    UNKNOWN = 'unknown'
}

export type ErrorContext = Record<string, unknown>;

/**
 * Base Application Error - All custom errors extend this
 */
export class ApplicationError extends Error {
    public readonly timestamp: Date;
    public readonly context?: ErrorContext;
    public readonly category: ErrorCategory;
    public readonly failurePoint: FailurePoint;

    constructor(
        message: string,
        public readonly code: string,
        public readonly statusCode: number = 500,
        public readonly retryable: boolean = false,
        context?: ErrorContext,
        category?: ErrorCategory,
        failurePoint?: FailurePoint
    ) {
        super(message);
        this.name = this.constructor.name;
        this.timestamp = new Date();
        this.context = context;

        // Auto-classify if not provided
        this.category = category || this.autoClassifyCategory();
        this.failurePoint = failurePoint || FailurePoint.UNKNOWN;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    private autoClassifyCategory(): ErrorCategory {
        if (this.retryable) {
            return this.statusCode >= 500 ? ErrorCategory.OPERATIONAL : ErrorCategory.TRANSIENT;
        }
        if (this.statusCode >= 400 && this.statusCode < 500) {
            return ErrorCategory.PERMANENT;
        }
        return ErrorCategory.OPERATIONAL;
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            statusCode: this.statusCode,
            retryable: this.retryable,
            category: this.category,
            failurePoint: this.failurePoint,
            timestamp: this.timestamp.toISOString(),
            context: this.context,
            stack: this.stack
        };
    }

    /**
     * Get a unique fingerprint for error grouping
     */
    getFingerprint(): string {
        return `${this.code}:${this.failurePoint}:${this.statusCode}`;
    }
}

// ==========================================
// Client Errors (4xx - Not Retryable)
// ==========================================

export class ValidationError extends ApplicationError {
    constructor(message: string, public readonly validationErrors?: Array<{ field: string; message: string }>, context?: ErrorContext) {
        super(
            message,
            'VALIDATION_ERROR',
            400,
            false,
            { validationErrors, ...context },
            ErrorCategory.PERMANENT,
            FailurePoint.API_VALIDATION
        );
    }
}

export class NotFoundError extends ApplicationError {
    constructor(resource: string, identifier?: string, context?: ErrorContext) {
        const message = identifier
            ? `${resource} not found: ${identifier}`
            : `${resource} not found`;
        super(message, 'NOT_FOUND', 404, false, { resource, identifier, ...context });
    }
}

// ==========================================
// Service Errors (5xx)
// ==========================================

export class ConfigurationError extends ApplicationError {
    constructor(message: string, context?: ErrorContext) {
        super(
            message,
            'CONFIGURATION_ERROR',
            500,
            false,
            context,
            ErrorCategory.PERMANENT,
            FailurePoint.CONFIGURATION
        );
    }
}

export class InternalServerError extends ApplicationError {
    constructor(message: string = 'Internal server error', context?: ErrorContext) {
        super(
            message,
            'INTERNAL_SERVER_ERROR',
            500,
            false,
            context,
            ErrorCategory.OPERATIONAL
        );
    }
}

// ==========================================
// Token Issuance Errors
// ==========================================

/**
 * Every failure the issuance pipeline can classify. `kind` is what ends up
 * in `TokenResult.error`.
 */
export abstract class TokenIssuanceError extends ApplicationError {
    abstract readonly kind: TokenErrorKind;
}

export class AdmissionTimeoutError extends TokenIssuanceError {
    readonly kind = 'AdmissionTimeout';

    constructor(timeoutMs: number, context?: ErrorContext) {
        super(
            `Admission gate saturated for ${timeoutMs}ms`,
            'ADMISSION_TIMEOUT',
            503,
            true,
            { timeoutMs, ...context },
            ErrorCategory.TRANSIENT,
            FailurePoint.ADMISSION
        );
    }
}

export class BrowserUnavailableError extends TokenIssuanceError {
    readonly kind = 'BrowserUnavailable';

    constructor(message: string, cause?: unknown, context?: ErrorContext, failurePoint?: FailurePoint) {
        super(
            message,
            'BROWSER_UNAVAILABLE',
            503,
            true,
            { cause: describeCause(cause), ...context },
            ErrorCategory.OPERATIONAL,
            failurePoint || FailurePoint.CONTEXT_ACQUISITION
        );
    }
}

export class SolveFailedError extends TokenIssuanceError {
    readonly kind = 'SolveFailed';

    constructor(message: string, context?: ErrorContext, failurePoint?: FailurePoint) {
        super(
            message,
            'SOLVE_FAILED',
            502,
            true,
            context,
            ErrorCategory.TRANSIENT,
            failurePoint || FailurePoint.SCRIPT_EXECUTION
        );
    }
}

export class SolveTimeoutError extends TokenIssuanceError {
    readonly kind = 'SolveTimeout';

    constructor(timeoutMs: number, context?: ErrorContext) {
        super(
            `Challenge solving timed out after ${timeoutMs}ms`,
            'SOLVE_TIMEOUT',
            504,
            true,
            { timeoutMs, ...context },
            ErrorCategory.TRANSIENT,
            FailurePoint.SCRIPT_EXECUTION
        );
    }
}

export class ProviderFailedError extends TokenIssuanceError {
    readonly kind = 'ProviderFailed';

    constructor(message: string, public readonly providerStatus?: number, cause?: unknown) {
        super(
            message,
            'PROVIDER_FAILED',
            502,
            true,
            { providerStatus, cause: describeCause(cause) },
            ErrorCategory.OPERATIONAL,
            FailurePoint.FALLBACK_DISPATCH
        );
    }
}

export class RequestCancelledError extends TokenIssuanceError {
    readonly kind = 'Cancelled';

    constructor(stage: string) {
        super(
            `Request cancelled during ${stage}`,
            'REQUEST_CANCELLED',
            499,
            false,
            { stage },
            ErrorCategory.CANCELLED
        );
    }
}

// ==========================================
// Error Utilities
// ==========================================

function describeCause(cause: unknown): string | undefined {
    if (cause === undefined) return undefined;
    return cause instanceof Error ? cause.message : String(cause);
}

export function toApplicationError(error: unknown): ApplicationError {
    if (error instanceof ApplicationError) {
        return error;
    }
    if (error instanceof Error) {
        return new InternalServerError(error.message, { originalError: error.name, stack: error.stack });
    }
    return new InternalServerError('Unknown error occurred', { error: String(error) });
}

/**
 * Classify anything thrown inside the local stage. Unclassified errors count
 * as a failed solve.
 */
export function toTokenFailure(error: unknown): { kind: TokenErrorKind; message: string } {
    if (error instanceof TokenIssuanceError) {
        return { kind: error.kind, message: error.message };
    }
    if (error instanceof Error) {
        return { kind: 'SolveFailed', message: error.message };
    }
    return { kind: 'SolveFailed', message: String(error) };
}

// ==========================================
// Error Logger
// ==========================================

import logger from '../utils/logger.js';

export function logError(error: unknown, context?: ErrorContext): void {
    const appError = toApplicationError(error);
    const logData = {
        error: {
            name: appError.name,
            message: appError.message,
            code: appError.code,
            statusCode: appError.statusCode,
            retryable: appError.retryable,
            category: appError.category,
            failurePoint: appError.failurePoint,
            fingerprint: appError.getFingerprint(),
            context: appError.context,
            stack: appError.stack
        },
        ...context
    };

    if (appError.statusCode >= 500) {
        logger.error(logData, 'Server error occurred');
    } else if (appError.statusCode >= 400) {
        logger.warn(logData, 'Client error occurred');
    } else {
        logger.info(logData, 'Error occurred');
    }
}
