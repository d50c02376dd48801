import {
    AdmissionGate,
    BrowserSupervisor,
    ChallengeSolver,
    ExternalFallbackDispatcher,
    PlaywrightAdapter,
    TokenOrchestrator,
    logger,
} from '@token-engine/shared';
import type {
    EngineConfig,
    IBrowserAdapter,
    IChallengeSolver,
    IFallbackDispatcher,
} from '@token-engine/shared';

/**
 * Everything one process needs to issue tokens, wired once and passed by reference
 */
export interface TokenEngine {
    readonly config: EngineConfig;
    readonly supervisor: BrowserSupervisor;
    readonly gate: AdmissionGate;
    readonly solver: IChallengeSolver;
    readonly dispatcher: IFallbackDispatcher;
    readonly orchestrator: TokenOrchestrator;
    warmUp(): Promise<void>;
    shutdown(): Promise<void>;
}

/**
 * Swap points for tests and alternative runtimes
 */
export interface TokenEngineOverrides {
    adapter?: IBrowserAdapter;
    solver?: IChallengeSolver;
    dispatcher?: IFallbackDispatcher;
}

export function createTokenEngine(config: EngineConfig, overrides: TokenEngineOverrides = {}): TokenEngine {
    logger.info({
        maxConcurrency: config.maxConcurrency,
        localSolvingEnabled: config.localSolvingEnabled,
        fallbackEnabled: config.fallback.enabled,
        remoteBrowser: Boolean(config.wsEndpoint),
    }, '🔧 Wiring token engine');

    const supervisor = new BrowserSupervisor({
        adapter: overrides.adapter ?? new PlaywrightAdapter(),
        launchOptions: {
            headless: config.headlessMode,
            wsEndpoint: config.wsEndpoint,
            executablePath: config.executablePath,
        },
        options: config.supervisor,
        contextOptions: { blockHeavyResources: config.blockHeavyResources },
    });
    const gate = new AdmissionGate(config.maxConcurrency);
    const solver = overrides.solver ?? new ChallengeSolver(config.solver);
    const dispatcher = overrides.dispatcher ?? new ExternalFallbackDispatcher(config.fallback);

    const orchestrator = new TokenOrchestrator({
        settings: {
            requestTimeoutMs: config.requestTimeoutMs,
            solverTimeoutMs: Math.min(config.solverTimeoutMs, config.requestTimeoutMs),
            localSolvingEnabled: config.localSolvingEnabled,
            fallbackEnabled: config.fallback.enabled,
        },
        supervisor,
        gate,
        solver,
        dispatcher,
    });

    return {
        config,
        supervisor,
        gate,
        solver,
        dispatcher,
        orchestrator,
        async warmUp() {
            if (!config.localSolvingEnabled) return;
            await supervisor.warmUp();
        },
        async shutdown() {
            await supervisor.shutdown();
        },
    };
}
