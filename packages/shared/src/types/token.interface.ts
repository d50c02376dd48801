export type TokenErrorKind =
    | 'AdmissionTimeout'
    | 'BrowserUnavailable'
    | 'SolveFailed'
    | 'SolveTimeout'
    | 'ProviderFailed'
    | 'Cancelled';

export type TokenSource = 'local' | 'fallback';

export type HealthStatus = 'ready' | 'unhealthy';

export interface TokenRequest {
    readonly targetId: string;
    /** Overrides the configured request timeout for this call only */
    readonly timeoutOverrideMs?: number;
    /** Epoch millis */
    readonly arrivedAt: number;
}

interface TokenTiming {
    /** Admission to completion, or arrival to completion when never admitted */
    durationMs: number;
    /** Arrival to admission; 0 when the request was never admitted */
    queuedMs: number;
}

export interface TokenSuccess extends TokenTiming {
    success: true;
    token: string;
    source: TokenSource;
}

export interface TokenFailure extends TokenTiming {
    success: false;
    error: TokenErrorKind;
    message: string;
}

export type TokenResult = TokenSuccess | TokenFailure;

export function createTokenRequest(targetId: string, timeoutOverrideMs?: number, now: number = Date.now()): TokenRequest {
    return Object.freeze({ targetId, timeoutOverrideMs, arrivedAt: now });
}

export interface SupervisorOptions {
    crashFailureThreshold: number;
    crashWindowMs: number;
    restartMaxAttempts: number;
    restartBackoffMs: number;
    restartBackoffMaxMs: number;
    /** How acquisitions behave while a launch is already in flight */
    restartWaitPolicy: 'wait' | 'fail-fast';
    restartGraceMs: number;
}

export interface SolverOptions {
    siteKey: string;
    action: string;
    /** `{targetId}` is replaced with the URL-encoded target identifier */
    targetUrlTemplate: string;
    pageLoadTimeoutMs: number;
    domReadyTimeoutMs: number;
    scriptReadyTimeoutMs: number;
    readyCallbackTimeoutMs: number;
}

export interface FallbackOptions {
    enabled: boolean;
    providerUrl?: string;
    credential?: string;
    timeoutMs: number;
}

export interface EngineConfig {
    headlessMode: boolean;
    maxConcurrency: number;
    requestTimeoutMs: number;
    solverTimeoutMs: number;
    localSolvingEnabled: boolean;
    blockHeavyResources: boolean;
    wsEndpoint?: string;
    executablePath?: string;
    supervisor: SupervisorOptions;
    solver: SolverOptions;
    fallback: FallbackOptions;
}
