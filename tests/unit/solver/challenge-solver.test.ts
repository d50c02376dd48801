import { describe, it, expect } from 'vitest';
import { ChallengeSolver } from '../../../packages/shared/src/solver/challenge-solver.js';
import {
    GRECAPTCHA_READY_EXPRESSION,
    SCRIPT_TAG_PRESENT_EXPRESSION,
    buildExecuteScript,
    buildInjectScript,
    buildScriptUrl,
} from '../../../packages/shared/src/solver/page-scripts.js';
import {
    RequestCancelledError,
    SolveFailedError,
    SolveTimeoutError,
} from '../../../packages/shared/src/types/errors.js';
import type { IsolatedContext } from '../../../packages/shared/src/types/browser.interface.js';
import { createTokenRequest } from '../../../packages/shared/src/types/token.interface.js';
import type { SolverOptions } from '../../../packages/shared/src/types/token.interface.js';
import { createFakePage } from '../../utils/test-helpers.js';

const OPTIONS: SolverOptions = {
    siteKey: 'test-site-key',
    action: 'TEST_ACTION',
    targetUrlTemplate: 'https://example.test/project/{targetId}',
    pageLoadTimeoutMs: 15000,
    domReadyTimeoutMs: 5000,
    scriptReadyTimeoutMs: 10000,
    readyCallbackTimeoutMs: 8000,
};

const EXECUTE_SCRIPT = buildExecuteScript(OPTIONS.siteKey, OPTIONS.action, OPTIONS.readyCallbackTimeoutMs);
const INJECT_SCRIPT = buildInjectScript(buildScriptUrl(OPTIONS.siteKey));

interface PageBehaviour {
    ready?: boolean;
    tagPresent?: boolean;
    execute?: () => Promise<unknown>;
}

function scriptedPage(behaviour: PageBehaviour = {}) {
    const page = createFakePage();
    page.evaluate.mockImplementation(async (expression: string) => {
        if (expression === GRECAPTCHA_READY_EXPRESSION) return behaviour.ready ?? true;
        if (expression === SCRIPT_TAG_PRESENT_EXPRESSION) return behaviour.tagPresent ?? false;
        if (expression === INJECT_SCRIPT) return true;
        if (expression === EXECUTE_SCRIPT) {
            return behaviour.execute ? behaviour.execute() : { token: 'test-token' };
        }
        throw new Error(`Unexpected expression: ${expression.slice(0, 40)}`);
    });
    return page;
}

function contextFor(page: ReturnType<typeof createFakePage>): IsolatedContext {
    return { id: 'ctx-1-1', generation: 1, createdAt: 0, page };
}

const request = createTokenRequest('project-1', undefined, 0);

describe('ChallengeSolver', () => {
    const solver = new ChallengeSolver(OPTIONS);

    it('substitutes the URL-encoded target id into the template', () => {
        expect(solver.buildTargetUrl('a b/c')).toBe('https://example.test/project/a%20b%2Fc');
    });

    it('loads the page, runs the challenge and returns the token', async () => {
        const page = scriptedPage();

        const token = await solver.solve(contextFor(page), request, { timeoutMs: 1000 });

        expect(token).toBe('test-token');
        expect(page.goto).toHaveBeenCalledWith('https://example.test/project/project-1', { waitUntil: 'commit', timeout: 15000 });
        expect(page.waitForLoadState).toHaveBeenCalledWith('domcontentloaded', 5000);
        expect(page.waitForFunction).toHaveBeenCalledWith(GRECAPTCHA_READY_EXPRESSION, 10000);
        expect(page.evaluate).not.toHaveBeenCalledWith(SCRIPT_TAG_PRESENT_EXPRESSION);
        expect(page.evaluate).toHaveBeenLastCalledWith(EXECUTE_SCRIPT);
    });

    it('injects the api script when neither grecaptcha nor its tag is present', async () => {
        const page = scriptedPage({ ready: false, tagPresent: false });

        await solver.solve(contextFor(page), request, { timeoutMs: 1000 });

        expect(page.evaluate).toHaveBeenCalledWith(INJECT_SCRIPT);
    });

    it('does not inject when the script tag already exists', async () => {
        const page = scriptedPage({ ready: false, tagPresent: true });

        await solver.solve(contextFor(page), request, { timeoutMs: 1000 });

        expect(page.evaluate).not.toHaveBeenCalledWith(INJECT_SCRIPT);
    });

    it('keeps going when navigation or readiness waits fail', async () => {
        const page = scriptedPage();
        page.goto.mockRejectedValueOnce(new Error('Timeout 15000ms exceeded'));
        page.waitForFunction.mockRejectedValueOnce(new Error('Timeout 10000ms exceeded'));

        await expect(solver.solve(contextFor(page), request, { timeoutMs: 1000 })).resolves.toBe('test-token');
    });

    it('fails with the page error when execution reports one', async () => {
        const page = scriptedPage({ execute: async () => ({ error: 'invalid site key' }) });

        const error = await solver.solve(contextFor(page), request, { timeoutMs: 1000 }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(SolveFailedError);
        expect(error).toHaveProperty('message', 'reCAPTCHA execution failed: invalid site key');
    });

    it('treats an empty token as a failure', async () => {
        const page = scriptedPage({ execute: async () => ({ token: '' }) });

        await expect(solver.solve(contextFor(page), request, { timeoutMs: 1000 }))
            .rejects.toThrow('Challenge page returned an empty token');
    });

    it('rejects a result of the wrong shape', async () => {
        const page = scriptedPage({ execute: async () => null });

        await expect(solver.solve(contextFor(page), request, { timeoutMs: 1000 }))
            .rejects.toThrow('Challenge page returned an unexpected result');
    });

    it('reports a thrown evaluation as a failed solve', async () => {
        const page = scriptedPage({
            execute: async () => {
                throw new Error('Execution context was destroyed');
            },
        });

        await expect(solver.solve(contextFor(page), request, { timeoutMs: 1000 }))
            .rejects.toThrow('Execution error: Execution context was destroyed');
    });

    it('fails with SolveTimeout when the page never answers', async () => {
        const page = scriptedPage({ execute: () => new Promise<unknown>(() => undefined) });

        const error = await solver.solve(contextFor(page), request, { timeoutMs: 20 }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(SolveTimeoutError);
        expect(error).toHaveProperty('message', 'Challenge solving timed out after 20ms');
    });

    it('stops waiting as soon as the request is cancelled', async () => {
        const page = scriptedPage({ execute: () => new Promise<unknown>(() => undefined) });
        const controller = new AbortController();

        const solving = solver.solve(contextFor(page), request, { timeoutMs: 5000, signal: controller.signal });
        controller.abort();

        await expect(solving).rejects.toBeInstanceOf(RequestCancelledError);
    });
});
