import { request } from 'undici';
import { z } from 'zod';
import type { FallbackOptions, TokenRequest } from '../types/token.interface.js';
import { ProviderFailedError, RequestCancelledError } from '../types/errors.js';
import { fallbackRequestsTotal } from '../observability/metrics.js';
import logger from '../utils/logger.js';

const log = logger.child({ component: 'fallback-dispatcher' });

const ProviderResponseSchema = z.object({
    token: z.string().min(1),
});

export interface IFallbackDispatcher {
    isConfigured(): boolean;
    solveExternally(request: TokenRequest, signal?: AbortSignal): Promise<string>;
}

/**
 * Forwards a token request to the paid solving provider. One attempt, no retries.
 */
export class ExternalFallbackDispatcher implements IFallbackDispatcher {
    constructor(private readonly options: FallbackOptions) { }

    isConfigured(): boolean {
        return Boolean(this.options.providerUrl && this.options.credential);
    }

    async solveExternally(tokenRequest: TokenRequest, signal?: AbortSignal): Promise<string> {
        const { providerUrl, credential, timeoutMs } = this.options;
        if (!providerUrl || !credential) {
            fallbackRequestsTotal.inc({ status: 'failure' });
            throw new ProviderFailedError('Fallback provider is not configured');
        }
        if (signal?.aborted) {
            throw new RequestCancelledError('fallback');
        }

        try {
            const token = await this.performRequest(providerUrl, credential, timeoutMs, tokenRequest.targetId, signal);
            fallbackRequestsTotal.inc({ status: 'success' });
            log.info({ targetId: tokenRequest.targetId }, 'Fallback provider issued a token');
            return token;
        } catch (error) {
            if (signal?.aborted) {
                throw new RequestCancelledError('fallback');
            }

            fallbackRequestsTotal.inc({ status: 'failure' });
            if (error instanceof ProviderFailedError) {
                log.warn({ providerStatus: error.providerStatus, reason: error.message }, 'Fallback provider failed');
                throw error;
            }

            log.warn({ err: error }, 'Fallback provider request failed');
            const message = error instanceof Error ? error.message : String(error);
            throw new ProviderFailedError(`Fallback provider request failed: ${message}`, undefined, error);
        }
    }

    private async performRequest(
        url: string,
        credential: string,
        timeoutMs: number,
        targetId: string,
        signal?: AbortSignal
    ): Promise<string> {
        const { statusCode, body } = await request(url, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                'Accept': 'application/json',
            },
            body: JSON.stringify({ targetId, credential }),
            headersTimeout: timeoutMs,
            bodyTimeout: timeoutMs,
            signal,
        });

        if (statusCode < 200 || statusCode >= 300) {
            // Drain so the socket goes back to the pool
            await body.text().catch((drainError: unknown) =>
                log.debug({ err: drainError }, 'Failed to drain provider response body')
            );
            throw new ProviderFailedError(`Fallback provider responded with status ${statusCode}`, statusCode);
        }

        let payload: unknown;
        try {
            payload = await body.json();
        } catch (error) {
            throw new ProviderFailedError('Fallback provider returned a non-JSON body', statusCode, error);
        }

        const parsed = ProviderResponseSchema.safeParse(payload);
        if (!parsed.success) {
            throw new ProviderFailedError('Fallback provider response has no token', statusCode);
        }
        return parsed.data.token;
    }
}
