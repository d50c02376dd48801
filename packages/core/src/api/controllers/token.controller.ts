import { Request, Response } from 'express';
import {
    TokenRequestSchema,
    ValidationError,
    createTokenRequest,
    errorResponse,
    logger,
    withLogContext,
} from '@token-engine/shared';
import type { TokenOrchestrator } from '@token-engine/shared';

const log = logger.child({ component: 'token-controller' });

export class TokenController {
    constructor(private readonly orchestrator: Pick<TokenOrchestrator, 'issueToken'>) { }

    /**
     * Issue a reCAPTCHA token
     * POST /token
     */
    async issue(req: Request, res: Response): Promise<void> {
        const parsed = TokenRequestSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            const error = new ValidationError(
                'Invalid request parameters',
                parsed.error.issues.map(issue => ({
                    field: issue.path.join('.'),
                    message: issue.message
                }))
            );
            res.status(error.statusCode).json(errorResponse(error.code, error.message, error.validationErrors, req.id));
            return;
        }

        const { targetId, timeoutMs } = parsed.data;

        // A client that hangs up cancels the work done on its behalf
        const abort = new AbortController();
        const onClose = () => {
            if (!res.writableEnded) abort.abort();
        };
        res.on('close', onClose);

        try {
            const result = await withLogContext({ targetId }, () =>
                this.orchestrator.issueToken(createTokenRequest(targetId, timeoutMs), abort.signal)
            );

            if (abort.signal.aborted) {
                log.info({ requestId: req.id }, 'Client disconnected before the token was ready');
                return;
            }
            res.json(result);
        } finally {
            res.off('close', onClose);
        }
    }
}
