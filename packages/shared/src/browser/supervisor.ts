import type {
    BrowserContextHandle,
    BrowserLaunchOptions,
    ContextOptions,
    IBrowserAdapter,
    IsolatedContext,
    ManagedBrowser,
    SupervisorState,
    SupervisorStats,
} from '../types/browser.interface.js';
import type { HealthStatus, SupervisorOptions } from '../types/token.interface.js';
import { BrowserUnavailableError, FailurePoint } from '../types/errors.js';
import { sleep, withDeadline } from '../utils/timeout.js';
import { browserLaunchFailuresTotal, browserRestartsTotal, recordSupervisorState } from '../observability/metrics.js';
import logger from '../utils/logger.js';

const log = logger.child({ component: 'browser-supervisor' });

export interface BrowserSupervisorDeps {
    adapter: IBrowserAdapter;
    launchOptions: BrowserLaunchOptions;
    options: SupervisorOptions;
    contextOptions?: ContextOptions;
    now?: () => number;
    delay?: (ms: number) => Promise<void>;
}

interface TrackedContext {
    handle: BrowserContextHandle;
    context: IsolatedContext;
}

/** A browser handle paired with the generation it was launched as */
interface LiveBrowser {
    browser: ManagedBrowser;
    generation: number;
}

/**
 * Owns the single shared browser process. Launches it lazily, hands out one
 * isolated context per request, and restarts the process when it disconnects
 * or keeps failing. At most one launch is ever in flight.
 */
export class BrowserSupervisor {
    private readonly adapter: IBrowserAdapter;
    private readonly launchOptions: BrowserLaunchOptions;
    private readonly options: SupervisorOptions;
    private readonly contextOptions: ContextOptions;
    private readonly now: () => number;
    private readonly delay: (ms: number) => Promise<void>;

    private state: SupervisorState = 'uninitialized';
    private closed = false;
    private browser: ManagedBrowser | null = null;
    private browserCreatedAt: number | null = null;
    private generation = 0;
    private launching: Promise<LiveBrowser> | null = null;

    private readonly contexts = new Map<string, TrackedContext>();
    private failureTimestamps: number[] = [];
    private contextSeq = 0;

    private launches = 0;
    private restarts = 0;
    private contextsCreated = 0;
    private contextsDestroyed = 0;
    private lastError: string | null = null;

    constructor(deps: BrowserSupervisorDeps) {
        this.adapter = deps.adapter;
        this.launchOptions = deps.launchOptions;
        this.options = deps.options;
        this.contextOptions = deps.contextOptions ?? {};
        this.now = deps.now ?? Date.now;
        this.delay = deps.delay ?? sleep;
        recordSupervisorState(this.state);
    }

    /**
     * Launch the browser ahead of the first request.
     */
    async warmUp(): Promise<void> {
        this.assertOpen();
        await this.ensureBrowser();
    }

    /**
     * Create a fresh context on the live browser, launching or restarting it first if needed.
     */
    async acquireContext(): Promise<IsolatedContext> {
        this.assertOpen();
        const live = await this.ensureBrowser();

        let context: IsolatedContext | null;
        try {
            context = await this.openContext(live);
        } catch (error) {
            if (live.browser.isConnected()) {
                this.recordFailure(live.generation);
                throw new BrowserUnavailableError('Failed to create browser context', error);
            }
            this.markCrashed(live.generation, 'Browser disconnected during context creation', error);
            context = null;
        }
        if (context) return context;

        // The browser died or was replaced under us: retry once on the current one
        this.assertOpen();
        const current = await this.ensureBrowser();
        let retried: IsolatedContext | null;
        try {
            retried = await this.openContext(current);
        } catch (retryError) {
            this.recordFailure(current.generation);
            throw new BrowserUnavailableError('Failed to create browser context after restart', retryError);
        }
        if (!retried) {
            throw new BrowserUnavailableError('Browser was replaced while the context was being created');
        }
        return retried;
    }

    /**
     * Destroy a context. Safe to call more than once for the same context.
     */
    async releaseContext(context: IsolatedContext): Promise<void> {
        const tracked = this.contexts.get(context.id);
        if (!tracked) return;

        this.contexts.delete(context.id);
        this.contextsDestroyed++;

        try {
            await tracked.handle.close();
        } catch (error) {
            // Contexts of a crashed browser cannot be closed cleanly
            log.debug({ err: error, contextId: context.id }, 'Context close failed');
        }
    }

    /**
     * Record a failure observed while using a context. Enough failures within
     * the window, or a dead process, mark the browser as crashed.
     */
    reportFailure(context: IsolatedContext): void {
        if (this.closed || context.generation !== this.generation || this.state !== 'ready') {
            return;
        }

        if (this.browser && !this.browser.isConnected()) {
            this.markCrashed(context.generation, 'Liveness check failed after a solve failure');
            return;
        }

        this.recordFailure(context.generation);
    }

    healthStatus(): HealthStatus {
        if (this.closed) return 'unhealthy';

        switch (this.state) {
            case 'uninitialized':
            case 'starting':
                return 'ready';
            case 'ready':
                return this.browser?.isConnected() ? 'ready' : 'unhealthy';
            default:
                return 'unhealthy';
        }
    }

    getStats(): SupervisorStats {
        const now = this.now();
        return {
            state: this.state,
            closed: this.closed,
            generation: this.generation,
            launches: this.launches,
            restarts: this.restarts,
            activeContexts: this.contexts.size,
            contextsCreated: this.contextsCreated,
            contextsDestroyed: this.contextsDestroyed,
            recentFailures: this.failureTimestamps.filter(t => now - t < this.options.crashWindowMs).length,
            browserAgeSeconds: this.browserCreatedAt === null ? null : Math.floor((now - this.browserCreatedAt) / 1000),
            lastError: this.lastError,
        };
    }

    /**
     * Close every context and the browser. Further acquisitions fail.
     */
    async shutdown(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        log.info({ activeContexts: this.contexts.size }, '🛑 Shutting down browser supervisor');

        const pending = [...this.contexts.values()];
        this.contexts.clear();
        this.contextsDestroyed += pending.length;

        const results = await Promise.allSettled(pending.map(tracked => tracked.handle.close()));
        for (const result of results) {
            if (result.status === 'rejected') {
                log.warn({ err: result.reason }, 'Failed to close context during shutdown');
            }
        }

        if (this.launching) {
            await this.launching.then(
                () => undefined,
                (error: unknown) => log.debug({ err: error }, 'Launch in flight ended during shutdown')
            );
        }

        const browser = this.browser;
        this.browser = null;
        this.browserCreatedAt = null;
        this.setState('uninitialized');

        if (browser) {
            try {
                await browser.close();
            } catch (error) {
                log.warn({ err: error }, 'Failed to close browser during shutdown');
            }
        }
    }

    private assertOpen(): void {
        if (this.closed) {
            throw new BrowserUnavailableError('Browser supervisor has been shut down');
        }
    }

    private async ensureBrowser(): Promise<LiveBrowser> {
        if (this.state === 'ready' && this.browser) {
            if (this.browser.isConnected()) {
                return { browser: this.browser, generation: this.generation };
            }
            this.markCrashed(this.generation, 'Liveness check failed');
        }

        if (this.launching) {
            if (this.options.restartWaitPolicy === 'fail-fast') {
                throw new BrowserUnavailableError(
                    this.state === 'restarting' ? 'Browser is restarting' : 'Browser is starting'
                );
            }
            const grace = this.options.restartGraceMs;
            return withDeadline(this.launching, {
                timeoutMs: grace,
                onTimeout: () => new BrowserUnavailableError(`Browser did not become ready within ${grace}ms`),
            });
        }

        const launch = this.launchWithRetries().finally(() => {
            this.launching = null;
        });
        this.launching = launch;
        return launch;
    }

    private async launchWithRetries(): Promise<LiveBrowser> {
        const isRestart = this.launches > 0 || this.state === 'crashed';
        const maxAttempts = this.options.restartMaxAttempts;
        let lastFailure: unknown;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            this.setState(isRestart ? 'restarting' : 'starting');
            this.assertOpen();

            try {
                log.info({ attempt, maxAttempts, adapter: this.adapter.name }, isRestart ? '🔄 Restarting browser' : '🚀 Launching browser');
                const browser = await this.adapter.launch(this.launchOptions);

                if (this.closed) {
                    await browser.close();
                    throw new BrowserUnavailableError('Browser supervisor shut down during launch');
                }

                const live = this.attach(browser);
                if (isRestart) {
                    this.restarts++;
                    browserRestartsTotal.inc();
                }
                log.info({ generation: live.generation }, '✅ Browser ready');
                return live;
            } catch (error) {
                if (error instanceof BrowserUnavailableError) throw error;

                lastFailure = error;
                this.lastError = error instanceof Error ? error.message : String(error);
                browserLaunchFailuresTotal.inc();
                log.error({ err: error, attempt, maxAttempts }, 'Browser launch failed');

                if (attempt < maxAttempts) {
                    await this.delay(this.backoffFor(attempt));
                }
            }
        }

        this.setState('crashed');
        throw new BrowserUnavailableError(
            `Browser failed to launch after ${maxAttempts} attempts`,
            lastFailure,
            { attempts: maxAttempts },
            FailurePoint.BROWSER_LAUNCH
        );
    }

    private attach(browser: ManagedBrowser): LiveBrowser {
        this.launches++;
        this.generation++;
        const generation = this.generation;

        browser.onDisconnected(() => {
            if (this.closed) return;
            log.warn({ generation }, '⚠️ Browser disconnected');
            this.markCrashed(generation, 'Browser disconnected');
        });

        this.browser = browser;
        this.browserCreatedAt = this.now();
        this.failureTimestamps = [];
        this.lastError = null;
        this.setState('ready');
        return { browser, generation };
    }

    /**
     * Open a context on `live`. Resolves to null, after closing what was
     * opened, when that browser stopped being the current one meanwhile.
     */
    private async openContext(live: LiveBrowser): Promise<IsolatedContext | null> {
        const handle = await live.browser.newContext(this.contextOptions);

        if (this.closed || this.browser !== live.browser || this.generation !== live.generation) {
            log.warn({ generation: live.generation, current: this.generation }, 'Discarding context of a replaced browser');
            await handle.close().catch((error: unknown) =>
                log.debug({ err: error, generation: live.generation }, 'Context close failed')
            );
            return null;
        }

        const context: IsolatedContext = {
            id: `ctx-${live.generation}-${++this.contextSeq}`,
            generation: live.generation,
            createdAt: this.now(),
            page: handle.page,
        };

        this.contexts.set(context.id, { handle, context });
        this.contextsCreated++;
        return context;
    }

    private recordFailure(generation: number): void {
        if (generation !== this.generation || this.state !== 'ready') return;

        const now = this.now();
        const windowMs = this.options.crashWindowMs;
        this.failureTimestamps = this.failureTimestamps.filter(t => now - t < windowMs);
        this.failureTimestamps.push(now);

        if (this.failureTimestamps.length >= this.options.crashFailureThreshold) {
            this.markCrashed(generation, `${this.failureTimestamps.length} failures within ${windowMs}ms`);
        }
    }

    /**
     * Move a ready browser to `crashed`. Reports about an older generation,
     * or about a browser already being replaced, are ignored.
     */
    private markCrashed(generation: number, reason: string, cause?: unknown): void {
        if (generation !== this.generation || this.state !== 'ready') return;

        log.error({ err: cause, generation, reason }, '💥 Browser marked as crashed');
        this.lastError = reason;

        const dead = this.browser;
        this.browser = null;
        this.browserCreatedAt = null;
        this.failureTimestamps = [];
        this.setState('crashed');

        if (dead) {
            void dead.close().catch((error: unknown) =>
                log.debug({ err: error, generation }, 'Closing crashed browser failed')
            );
        }
    }

    private backoffFor(attempt: number): number {
        const { restartBackoffMs, restartBackoffMaxMs } = this.options;
        return Math.min(restartBackoffMs * 2 ** (attempt - 1), restartBackoffMaxMs);
    }

    private setState(state: SupervisorState): void {
        this.state = state;
        recordSupervisorState(state);
    }
}
