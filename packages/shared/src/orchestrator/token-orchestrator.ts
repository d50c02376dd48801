import type { AdmissionGate, AdmissionTicket } from '../concurrency/admission-gate.js';
import type { BrowserSupervisor } from '../browser/supervisor.js';
import type { IsolatedContext } from '../types/browser.interface.js';
import type { IChallengeSolver } from '../solver/challenge-solver.js';
import type { IFallbackDispatcher } from '../fallback/external-dispatcher.js';
import type {
    HealthStatus,
    TokenErrorKind,
    TokenRequest,
    TokenResult,
    TokenSource,
} from '../types/token.interface.js';
import { BrowserUnavailableError, RequestCancelledError, toTokenFailure } from '../types/errors.js';
import { remainingMs, withDeadline } from '../utils/timeout.js';
import { tokenIssueDurationSeconds, tokenRequestsTotal } from '../observability/metrics.js';
import logger, { withLogContext } from '../utils/logger.js';

const log = logger.child({ component: 'token-orchestrator' });

export type ContextProvider = Pick<BrowserSupervisor, 'acquireContext' | 'releaseContext' | 'reportFailure' | 'healthStatus'>;
export type Admitter = Pick<AdmissionGate, 'admit'>;

export interface OrchestratorSettings {
    requestTimeoutMs: number;
    solverTimeoutMs: number;
    localSolvingEnabled: boolean;
    fallbackEnabled: boolean;
}

export interface TokenOrchestratorDeps {
    settings: OrchestratorSettings;
    supervisor: ContextProvider;
    gate: Admitter;
    solver: IChallengeSolver;
    dispatcher: IFallbackDispatcher;
    now?: () => number;
}

type StageOutcome =
    | { ok: true; token: string }
    | { ok: false; kind: TokenErrorKind; message: string };

type LocalOutcome = StageOutcome & { admittedAt?: number };

/**
 * Turns a token request into a result: local browser solve first, external
 * provider as the fallback. `issueToken` resolves on every path.
 */
export class TokenOrchestrator {
    private readonly settings: OrchestratorSettings;
    private readonly supervisor: ContextProvider;
    private readonly gate: Admitter;
    private readonly solver: IChallengeSolver;
    private readonly dispatcher: IFallbackDispatcher;
    private readonly now: () => number;
    private readonly inFlight = new Set<Promise<TokenResult>>();

    constructor(deps: TokenOrchestratorDeps) {
        this.settings = deps.settings;
        this.supervisor = deps.supervisor;
        this.gate = deps.gate;
        this.solver = deps.solver;
        this.dispatcher = deps.dispatcher;
        this.now = deps.now ?? Date.now;
    }

    async issueToken(request: TokenRequest, signal?: AbortSignal): Promise<TokenResult> {
        const work = this.issue(request, signal);
        this.inFlight.add(work);
        try {
            return await work;
        } finally {
            this.inFlight.delete(work);
        }
    }

    /** Token requests currently being issued */
    get activeRequests(): number {
        return this.inFlight.size;
    }

    /**
     * Wait for the requests already in flight. Resolves false if some were
     * still running after `timeoutMs`.
     */
    async drain(timeoutMs: number): Promise<boolean> {
        if (this.inFlight.size === 0) return true;

        let timer: NodeJS.Timeout | undefined;
        const settled = Promise.allSettled([...this.inFlight]).then(() => true);
        const expired = new Promise<boolean>(resolve => {
            timer = setTimeout(() => resolve(false), timeoutMs);
        });

        try {
            return await Promise.race([settled, expired]);
        } finally {
            clearTimeout(timer);
        }
    }

    private issue(request: TokenRequest, signal?: AbortSignal): Promise<TokenResult> {
        return withLogContext({ targetId: request.targetId }, async () => {
            let admittedAt: number | undefined;
            let outcome: StageOutcome;
            let source: TokenSource = 'local';

            try {
                if (!this.settings.localSolvingEnabled) {
                    source = 'fallback';
                    outcome = await this.runFallback(request, signal);
                } else {
                    const local = await this.runLocal(request, signal);
                    admittedAt = local.admittedAt;
                    outcome = local;

                    if (!local.ok && local.kind !== 'Cancelled' && this.settings.fallbackEnabled) {
                        log.info({ localError: local.kind }, 'Local solve failed, trying fallback provider');
                        source = 'fallback';
                        outcome = await this.runFallback(request, signal);
                    }
                }
            } catch (error) {
                // Stages classify their own errors; this only guards against a bug in them
                log.error({ err: error }, 'Unexpected error while issuing token');
                const failure = toTokenFailure(error);
                outcome = { ok: false, kind: failure.kind, message: failure.message };
            }

            return this.finish(request, outcome, source, admittedAt);
        });
    }

    healthStatus(): HealthStatus {
        if (this.settings.localSolvingEnabled) {
            return this.supervisor.healthStatus();
        }
        return this.settings.fallbackEnabled && this.dispatcher.isConfigured() ? 'ready' : 'unhealthy';
    }

    private budgetFor(request: TokenRequest): number {
        return request.timeoutOverrideMs ?? this.settings.requestTimeoutMs;
    }

    /**
     * admit → acquire → solve. The context and the ticket are given back
     * before this returns, whatever happened.
     */
    private async runLocal(request: TokenRequest, signal?: AbortSignal): Promise<LocalOutcome> {
        const deadline = request.arrivedAt + this.budgetFor(request);
        let ticket: AdmissionTicket | undefined;
        let context: IsolatedContext | undefined;

        try {
            ticket = await this.gate.admit(remainingMs(deadline, this.now()), signal);
            context = await this.acquireWithin(remainingMs(deadline, this.now()), signal);

            const solveTimeoutMs = Math.min(this.settings.solverTimeoutMs, remainingMs(deadline, this.now()));
            const token = await this.solveOn(context, request, solveTimeoutMs, signal);

            return { ok: true, token, admittedAt: ticket.admittedAt };
        } catch (error) {
            const failure = toTokenFailure(error);
            log.warn({ kind: failure.kind, reason: failure.message }, 'Local token issuance failed');
            return { ok: false, kind: failure.kind, message: failure.message, admittedAt: ticket?.admittedAt };
        } finally {
            if (context) {
                await this.supervisor.releaseContext(context);
            }
            ticket?.release();
        }
    }

    private async solveOn(
        context: IsolatedContext,
        request: TokenRequest,
        timeoutMs: number,
        signal?: AbortSignal
    ): Promise<string> {
        try {
            return await this.solver.solve(context, request, { timeoutMs, signal });
        } catch (error) {
            if (!(error instanceof RequestCancelledError)) {
                this.supervisor.reportFailure(context);
            }
            throw error;
        }
    }

    /**
     * Bound the acquisition by what is left of the request budget. A context
     * that shows up after the bound is released straight away.
     */
    private async acquireWithin(timeoutMs: number, signal?: AbortSignal): Promise<IsolatedContext> {
        const pending = this.supervisor.acquireContext();

        try {
            return await withDeadline(pending, {
                timeoutMs,
                onTimeout: () => new BrowserUnavailableError(`No browser context within ${timeoutMs}ms`),
                signal,
                onAbort: () => new RequestCancelledError('context acquisition'),
            });
        } catch (error) {
            void pending.then(
                late => {
                    log.debug({ contextId: late.id }, 'Releasing context that arrived after its deadline');
                    return this.supervisor.releaseContext(late);
                },
                (lateError: unknown) => log.debug({ err: lateError }, 'Context acquisition failed after its deadline')
            );
            throw error;
        }
    }

    private async runFallback(request: TokenRequest, signal?: AbortSignal): Promise<StageOutcome> {
        if (!this.settings.fallbackEnabled) {
            return {
                ok: false,
                kind: 'ProviderFailed',
                message: 'Local solving is disabled and no fallback provider is enabled',
            };
        }

        try {
            const token = await this.dispatcher.solveExternally(request, signal);
            return { ok: true, token };
        } catch (error) {
            const failure = toTokenFailure(error);
            return { ok: false, kind: failure.kind, message: failure.message };
        }
    }

    private finish(request: TokenRequest, outcome: StageOutcome, source: TokenSource, admittedAt?: number): TokenResult {
        const finishedAt = this.now();
        const durationMs = Math.max(0, finishedAt - (admittedAt ?? request.arrivedAt));
        const queuedMs = admittedAt === undefined ? 0 : Math.max(0, admittedAt - request.arrivedAt);

        if (outcome.ok) {
            tokenRequestsTotal.inc({ source, outcome: 'success' });
            tokenIssueDurationSeconds.observe({ outcome: 'success' }, durationMs / 1000);
            log.info({ source, durationMs, queuedMs }, '✅ Token issued');
            return { success: true, token: outcome.token, source, durationMs, queuedMs };
        }

        tokenRequestsTotal.inc({ source: 'none', outcome: outcome.kind });
        tokenIssueDurationSeconds.observe({ outcome: outcome.kind }, durationMs / 1000);
        log.warn({ error: outcome.kind, reason: outcome.message, durationMs, queuedMs }, '❌ Token issuance failed');
        return { success: false, error: outcome.kind, message: outcome.message, durationMs, queuedMs };
    }
}
