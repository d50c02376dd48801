import { z } from 'zod';
import type { ChallengePage, IsolatedContext } from '../types/browser.interface.js';
import type { SolverOptions, TokenRequest } from '../types/token.interface.js';
import { FailurePoint, RequestCancelledError, SolveFailedError, SolveTimeoutError } from '../types/errors.js';
import { withDeadline } from '../utils/timeout.js';
import {
    GRECAPTCHA_READY_EXPRESSION,
    SCRIPT_TAG_PRESENT_EXPRESSION,
    buildExecuteScript,
    buildInjectScript,
    buildScriptUrl,
} from './page-scripts.js';
import logger from '../utils/logger.js';

const log = logger.child({ component: 'challenge-solver' });

const PageResultSchema = z.union([
    z.object({ token: z.string() }),
    z.object({ error: z.string() }),
]);

export interface SolveOptions {
    timeoutMs: number;
    signal?: AbortSignal;
}

export interface IChallengeSolver {
    solve(context: IsolatedContext, request: TokenRequest, options: SolveOptions): Promise<string>;
}

/**
 * Drives one isolated page through the reCAPTCHA v3 flow and returns the
 * token. One attempt per call; the context is never reused.
 */
export class ChallengeSolver implements IChallengeSolver {
    constructor(private readonly options: SolverOptions) { }

    buildTargetUrl(targetId: string): string {
        return this.options.targetUrlTemplate.replaceAll('{targetId}', encodeURIComponent(targetId));
    }

    async solve(context: IsolatedContext, request: TokenRequest, { timeoutMs, signal }: SolveOptions): Promise<string> {
        return withDeadline(this.run(context.page, request.targetId), {
            timeoutMs,
            onTimeout: () => new SolveTimeoutError(timeoutMs, { targetId: request.targetId, contextId: context.id }),
            signal,
            onAbort: () => new RequestCancelledError('solve'),
        });
    }

    private async run(page: ChallengePage, targetId: string): Promise<string> {
        const url = this.buildTargetUrl(targetId);
        log.debug({ url }, 'Loading challenge page');

        await this.loadPage(page, url);
        await this.ensureScriptLoaded(page);
        await this.waitForScriptReady(page);

        return this.execute(page);
    }

    private async loadPage(page: ChallengePage, url: string): Promise<void> {
        const { pageLoadTimeoutMs, domReadyTimeoutMs } = this.options;
        try {
            await page.goto(url, { waitUntil: 'commit', timeout: pageLoadTimeoutMs });
            await page.waitForLoadState('domcontentloaded', domReadyTimeoutMs);
        } catch (error) {
            // The challenge script can still be usable on a partially loaded page
            log.warn({ err: error, url }, 'Page load timed out or failed, continuing');
        }
    }

    private async ensureScriptLoaded(page: ChallengePage): Promise<void> {
        try {
            if (await page.evaluate(GRECAPTCHA_READY_EXPRESSION) === true) return;

            if (await page.evaluate(SCRIPT_TAG_PRESENT_EXPRESSION) === true) {
                log.debug('reCAPTCHA script tag already present, skipping injection');
                return;
            }

            const injected = await page.evaluate(buildInjectScript(buildScriptUrl(this.options.siteKey)));
            if (injected !== true) {
                log.warn('reCAPTCHA script injection may have failed');
            }
        } catch (error) {
            log.warn({ err: error }, 'Checking or injecting the reCAPTCHA script failed');
        }
    }

    private async waitForScriptReady(page: ChallengePage): Promise<void> {
        try {
            await page.waitForFunction(GRECAPTCHA_READY_EXPRESSION, this.options.scriptReadyTimeoutMs);
        } catch (error) {
            log.warn({ err: error }, 'grecaptcha.execute did not appear in time, attempting execution anyway');
        }
    }

    private async execute(page: ChallengePage): Promise<string> {
        const { siteKey, action, readyCallbackTimeoutMs } = this.options;

        let raw: unknown;
        try {
            raw = await page.evaluate(buildExecuteScript(siteKey, action, readyCallbackTimeoutMs));
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new SolveFailedError(`Execution error: ${message}`, undefined, FailurePoint.SCRIPT_EXECUTION);
        }

        const parsed = PageResultSchema.safeParse(raw);
        if (!parsed.success) {
            throw new SolveFailedError('Challenge page returned an unexpected result', { issues: parsed.error.issues });
        }

        const result = parsed.data;
        if ('token' in result) {
            if (result.token.length > 0) return result.token;
            throw new SolveFailedError('Challenge page returned an empty token');
        }
        throw new SolveFailedError(`reCAPTCHA execution failed: ${result.error}`);
    }
}
