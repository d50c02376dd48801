import { describe, it, expect, vi } from 'vitest';
import logger from '../../../packages/shared/src/utils/logger.js';
import {
    AdmissionTimeoutError,
    ApplicationError,
    BrowserUnavailableError,
    ErrorCategory,
    FailurePoint,
    InternalServerError,
    NotFoundError,
    ProviderFailedError,
    RequestCancelledError,
    SolveFailedError,
    SolveTimeoutError,
    ValidationError,
    logError,
    toApplicationError,
    toTokenFailure,
} from '../../../packages/shared/src/types/errors.js';

describe('Error Classes', () => {
    describe('ApplicationError', () => {
        it('should create error with correct properties', () => {
            const error = new ApplicationError('Test error', 'TEST_CODE', 500);

            expect(error.message).toBe('Test error');
            expect(error.code).toBe('TEST_CODE');
            expect(error.statusCode).toBe(500);
            expect(error.name).toBe('ApplicationError');
            expect(error.getFingerprint()).toBe('TEST_CODE:unknown:500');
        });

        it('should classify client errors as permanent', () => {
            const error = new ApplicationError('Bad input', 'BAD_INPUT', 422);
            expect(error.category).toBe(ErrorCategory.PERMANENT);
        });
    });

    describe('ValidationError', () => {
        it('should create validation error with details', () => {
            const validationErrors = [
                { field: 'targetId', message: 'targetId is required' }
            ];
            const error = new ValidationError('Validation failed', validationErrors);

            expect(error.statusCode).toBe(400);
            expect(error.code).toBe('VALIDATION_ERROR');
            expect(error.validationErrors).toEqual(validationErrors);
            expect(error.failurePoint).toBe(FailurePoint.API_VALIDATION);
        });
    });

    describe('NotFoundError', () => {
        it('should name the missing resource', () => {
            const error = new NotFoundError('Route', 'GET /nowhere');

            expect(error.statusCode).toBe(404);
            expect(error.message).toBe('Route not found: GET /nowhere');
        });
    });

    describe('token issuance errors', () => {
        it('should carry the error kind and HTTP status of each failure', () => {
            const cases = [
                [new AdmissionTimeoutError(100), 'AdmissionTimeout', 503],
                [new BrowserUnavailableError('down'), 'BrowserUnavailable', 503],
                [new SolveFailedError('no token'), 'SolveFailed', 502],
                [new SolveTimeoutError(500), 'SolveTimeout', 504],
                [new ProviderFailedError('provider down', 502), 'ProviderFailed', 502],
                [new RequestCancelledError('solve'), 'Cancelled', 499],
            ] as const;

            for (const [error, kind, status] of cases) {
                expect(error.kind).toBe(kind);
                expect(error.statusCode).toBe(status);
            }
        });

        it('should record the underlying cause message', () => {
            const error = new BrowserUnavailableError('Failed to create browser context', new Error('Target closed'));

            expect(error.context).toMatchObject({ cause: 'Target closed' });
            expect(error.failurePoint).toBe(FailurePoint.CONTEXT_ACQUISITION);
        });
    });

    describe('toTokenFailure', () => {
        it('should keep the kind of classified errors', () => {
            expect(toTokenFailure(new SolveTimeoutError(500))).toEqual({
                kind: 'SolveTimeout',
                message: 'Challenge solving timed out after 500ms',
            });
        });

        it('should classify anything else as a failed solve', () => {
            expect(toTokenFailure(new Error('boom'))).toEqual({ kind: 'SolveFailed', message: 'boom' });
            expect(toTokenFailure('plain string')).toEqual({ kind: 'SolveFailed', message: 'plain string' });
        });
    });

    describe('toApplicationError', () => {
        it('should return ApplicationError as is', () => {
            const original = new ValidationError('Test');
            expect(toApplicationError(original)).toBe(original);
        });

        it('should wrap plain errors as internal server errors', () => {
            const converted = toApplicationError(new Error('Standard error'));

            expect(converted).toBeInstanceOf(InternalServerError);
            expect(converted.message).toBe('Standard error');
            expect(converted.statusCode).toBe(500);
        });

        it('should handle non-error values', () => {
            expect(toApplicationError('string error').message).toBe('Unknown error occurred');
        });
    });

    describe('logError', () => {
        it('should log server errors with their failure point and fingerprint', () => {
            const spy = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
            const error = new BrowserUnavailableError('Browser failed to launch after 3 attempts', undefined, undefined, FailurePoint.BROWSER_LAUNCH);

            logError(error, { requestId: 'req-1' });

            expect(spy).toHaveBeenCalledWith(
                expect.objectContaining({
                    requestId: 'req-1',
                    error: expect.objectContaining({
                        code: 'BROWSER_UNAVAILABLE',
                        failurePoint: 'browser_launch',
                        fingerprint: 'BROWSER_UNAVAILABLE:browser_launch:503',
                    }),
                }),
                'Server error occurred'
            );
        });
    });
});
