import { z } from 'zod';
import logger from './logger.js';
import { ConfigurationError } from '../types/errors.js';
import type { EngineConfig } from '../types/token.interface.js';

/**
 * Environment validation schema.
 * Validates every variable the service reads at startup and fails fast
 * when something is missing or malformed.
 */

// Helper validators
const portValidator = z.coerce.number().int().min(1).max(65535);
const positiveInt = z.coerce.number().int().positive();

// z.coerce.boolean() turns the string "false" into true, so flags are parsed explicitly
const booleanFlag = (fallback: 'true' | 'false') =>
    z.enum(['true', 'false', '1', '0'])
        .default(fallback)
        .transform(value => value === 'true' || value === '1');

const optionalString = z.string().trim().min(1).optional().or(z.literal('').transform(() => undefined));

const EnvironmentSchema = z.object({
    // ==========================================
    // Core Application
    // ==========================================
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    HOST: z.string().default('0.0.0.0'),
    PORT: portValidator.default(8001),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    CORS_ORIGIN: z.string().default('*'),

    // ==========================================
    // Browser
    // ==========================================
    HEADLESS: booleanFlag('true'),
    BROWSER_WS_ENDPOINT: optionalString,
    PLAYWRIGHT_CHROMIUM_EXECUTABLE_PATH: optionalString,
    BLOCK_HEAVY_RESOURCES: booleanFlag('true'),
    WARM_BROWSER_ON_START: booleanFlag('true'),

    // ==========================================
    // Concurrency & Timeouts
    // ==========================================
    MAX_CONCURRENCY: positiveInt.default(10),
    REQUEST_TIMEOUT_MS: positiveInt.default(30000),
    SOLVER_TIMEOUT_MS: positiveInt.default(25000),
    PAGE_LOAD_TIMEOUT_MS: positiveInt.default(15000),
    DOM_READY_TIMEOUT_MS: positiveInt.default(5000),
    SCRIPT_READY_TIMEOUT_MS: positiveInt.default(10000),
    READY_CALLBACK_TIMEOUT_MS: positiveInt.default(8000),

    // ==========================================
    // Supervisor (crash detection & restart)
    // ==========================================
    CRASH_FAILURE_THRESHOLD: positiveInt.default(3),
    CRASH_WINDOW_MS: positiveInt.default(60000),
    RESTART_MAX_ATTEMPTS: positiveInt.default(3),
    RESTART_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
    RESTART_BACKOFF_MAX_MS: z.coerce.number().int().min(0).default(8000),
    RESTART_WAIT_POLICY: z.enum(['wait', 'fail-fast']).default('wait'),
    RESTART_GRACE_MS: z.coerce.number().int().min(0).default(10000),

    // ==========================================
    // Challenge
    // ==========================================
    RECAPTCHA_SITE_KEY: z.string().min(1).default('6LdsFiUsAAAAAIjVDZcuLhaHiDn5nnHVXVRQGeMV'),
    RECAPTCHA_ACTION: z.string().min(1).default('FLOW_GENERATION'),
    TARGET_URL_TEMPLATE: z.string()
        .url()
        .refine(value => value.includes('{targetId}'), { message: 'Must contain the {targetId} placeholder' })
        .default('https://labs.google/fx/tools/flow/project/{targetId}'),

    // ==========================================
    // Solving modes & fallback provider
    // ==========================================
    LOCAL_SOLVING_ENABLED: booleanFlag('true'),
    FALLBACK_ENABLED: booleanFlag('false'),
    FALLBACK_PROVIDER_URL: z.string().url().optional().or(z.literal('').transform(() => undefined)),
    FALLBACK_API_KEY: optionalString,
    FALLBACK_TIMEOUT_MS: positiveInt.default(60000),
});

// Infer TypeScript type from schema
export type Environment = z.infer<typeof EnvironmentSchema>;

/**
 * Parse and check an environment source. Pure apart from logging warnings;
 * throws ConfigurationError listing every offending variable.
 */
export function parseEnvironment(source: NodeJS.ProcessEnv = process.env): Environment {
    const result = EnvironmentSchema.safeParse(source);
    if (!result.success) {
        const issues = result.error.issues.map(issue => ({
            field: issue.path.join('.'),
            message: issue.message
        }));
        throw new ConfigurationError(
            `Invalid environment: ${issues.map(i => `${i.field}: ${i.message}`).join('; ')}`,
            { issues }
        );
    }

    validateBusinessRules(result.data);
    return result.data;
}

/**
 * Validate environment variables on startup.
 * Exits the process with a readable report if validation fails.
 */
export function validateEnvironment(source: NodeJS.ProcessEnv = process.env): Environment {
    try {
        const env = parseEnvironment(source);

        logger.info('✅ Environment validation passed');
        logger.info(`📦 Running in ${env.NODE_ENV} mode`);

        return env;
    } catch (error) {
        console.error('❌ ENVIRONMENT VALIDATION FAILED\n');
        if (error instanceof ConfigurationError && Array.isArray(error.context?.issues)) {
            error.context.issues.forEach((issue: unknown, index: number) => {
                console.error(`${index + 1}. ${JSON.stringify(issue)}`);
            });
        } else {
            console.error(error);
        }
        console.error('\n📝 Please check your .env file or environment variables.\n');

        process.exit(1);
    }
}

/**
 * Cross-field rules the schema cannot express
 */
function validateBusinessRules(env: Environment): void {
    // Rule 1: something must be able to produce a token
    if (!env.LOCAL_SOLVING_ENABLED && !env.FALLBACK_ENABLED) {
        throw new ConfigurationError(
            'LOCAL_SOLVING_ENABLED and FALLBACK_ENABLED are both false; no token source is available'
        );
    }

    // Rule 2: an enabled fallback needs somewhere to go
    if (env.FALLBACK_ENABLED && (!env.FALLBACK_PROVIDER_URL || !env.FALLBACK_API_KEY)) {
        logger.warn(
            '⚠️  FALLBACK_ENABLED is true but FALLBACK_PROVIDER_URL or FALLBACK_API_KEY is missing. ' +
            'Fallback requests will fail with ProviderFailed.'
        );
    }

    // Rule 3: the solver bound never exceeds the request bound
    if (env.SOLVER_TIMEOUT_MS > env.REQUEST_TIMEOUT_MS) {
        logger.warn(
            { solverTimeoutMs: env.SOLVER_TIMEOUT_MS, requestTimeoutMs: env.REQUEST_TIMEOUT_MS },
            '⚠️  SOLVER_TIMEOUT_MS exceeds REQUEST_TIMEOUT_MS; clamping to the request timeout'
        );
        env.SOLVER_TIMEOUT_MS = env.REQUEST_TIMEOUT_MS;
    }

    if (env.RESTART_BACKOFF_MAX_MS < env.RESTART_BACKOFF_MS) {
        env.RESTART_BACKOFF_MAX_MS = env.RESTART_BACKOFF_MS;
    }
}

/**
 * Map validated variables onto the engine's typed configuration
 */
export function toEngineConfig(env: Environment): EngineConfig {
    return {
        headlessMode: env.HEADLESS,
        maxConcurrency: env.MAX_CONCURRENCY,
        requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
        solverTimeoutMs: env.SOLVER_TIMEOUT_MS,
        localSolvingEnabled: env.LOCAL_SOLVING_ENABLED,
        blockHeavyResources: env.BLOCK_HEAVY_RESOURCES,
        wsEndpoint: env.BROWSER_WS_ENDPOINT,
        executablePath: env.PLAYWRIGHT_CHROMIUM_EXECUTABLE_PATH,
        supervisor: {
            crashFailureThreshold: env.CRASH_FAILURE_THRESHOLD,
            crashWindowMs: env.CRASH_WINDOW_MS,
            restartMaxAttempts: env.RESTART_MAX_ATTEMPTS,
            restartBackoffMs: env.RESTART_BACKOFF_MS,
            restartBackoffMaxMs: env.RESTART_BACKOFF_MAX_MS,
            restartWaitPolicy: env.RESTART_WAIT_POLICY,
            restartGraceMs: env.RESTART_GRACE_MS,
        },
        solver: {
            siteKey: env.RECAPTCHA_SITE_KEY,
            action: env.RECAPTCHA_ACTION,
            targetUrlTemplate: env.TARGET_URL_TEMPLATE,
            pageLoadTimeoutMs: env.PAGE_LOAD_TIMEOUT_MS,
            domReadyTimeoutMs: env.DOM_READY_TIMEOUT_MS,
            scriptReadyTimeoutMs: env.SCRIPT_READY_TIMEOUT_MS,
            readyCallbackTimeoutMs: env.READY_CALLBACK_TIMEOUT_MS,
        },
        fallback: {
            enabled: env.FALLBACK_ENABLED,
            providerUrl: env.FALLBACK_PROVIDER_URL,
            credential: env.FALLBACK_API_KEY,
            timeoutMs: env.FALLBACK_TIMEOUT_MS,
        },
    };
}
