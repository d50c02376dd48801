import { describe, it, expect, vi } from 'vitest';
import { parseEnvironment, toEngineConfig, validateEnvironment } from '../../../packages/shared/src/utils/env-validator.js';
import { ConfigurationError } from '../../../packages/shared/src/types/errors.js';

describe('parseEnvironment', () => {
    it('applies defaults to an empty environment', () => {
        const env = parseEnvironment({});

        expect(env).toMatchObject({
            PORT: 8001,
            HEADLESS: true,
            MAX_CONCURRENCY: 10,
            REQUEST_TIMEOUT_MS: 30000,
            SOLVER_TIMEOUT_MS: 25000,
            LOCAL_SOLVING_ENABLED: true,
            FALLBACK_ENABLED: false,
            CRASH_FAILURE_THRESHOLD: 3,
            RESTART_MAX_ATTEMPTS: 3,
            RESTART_WAIT_POLICY: 'wait',
            RECAPTCHA_ACTION: 'FLOW_GENERATION',
        });
        expect(env.FALLBACK_PROVIDER_URL).toBeUndefined();
    });

    it('parses boolean flags without treating "false" as true', () => {
        const env = parseEnvironment({ HEADLESS: 'false', BLOCK_HEAVY_RESOURCES: '0', FALLBACK_ENABLED: '1' });

        expect(env.HEADLESS).toBe(false);
        expect(env.BLOCK_HEAVY_RESOURCES).toBe(false);
        expect(env.FALLBACK_ENABLED).toBe(true);
    });

    it('coerces numeric variables', () => {
        const env = parseEnvironment({ MAX_CONCURRENCY: '4', REQUEST_TIMEOUT_MS: '12000', SOLVER_TIMEOUT_MS: '9000' });

        expect(env.MAX_CONCURRENCY).toBe(4);
        expect(env.REQUEST_TIMEOUT_MS).toBe(12000);
        expect(env.SOLVER_TIMEOUT_MS).toBe(9000);
    });

    it('lists every offending variable', () => {
        const error = (() => {
            try {
                parseEnvironment({ MAX_CONCURRENCY: '0', RESTART_WAIT_POLICY: 'sometimes' });
            } catch (e) {
                return e;
            }
            return undefined;
        })();

        expect(error).toBeInstanceOf(ConfigurationError);
        const fields = error instanceof ConfigurationError && Array.isArray(error.context?.issues)
            ? error.context.issues.map((issue: { field: string }) => issue.field)
            : [];
        expect(fields).toEqual(['MAX_CONCURRENCY', 'RESTART_WAIT_POLICY']);
    });

    it('requires the target URL template to contain the placeholder', () => {
        expect(() => parseEnvironment({ TARGET_URL_TEMPLATE: 'https://example.test/project' }))
            .toThrow('Must contain the {targetId} placeholder');
    });

    it('refuses a configuration with no token source', () => {
        expect(() => parseEnvironment({ LOCAL_SOLVING_ENABLED: 'false', FALLBACK_ENABLED: 'false' }))
            .toThrow('LOCAL_SOLVING_ENABLED and FALLBACK_ENABLED are both false; no token source is available');
    });

    it('clamps the solver timeout to the request timeout', () => {
        const env = parseEnvironment({ REQUEST_TIMEOUT_MS: '10000', SOLVER_TIMEOUT_MS: '20000' });

        expect(env.SOLVER_TIMEOUT_MS).toBe(10000);
    });

    it('treats empty optional strings as unset', () => {
        const env = parseEnvironment({ FALLBACK_PROVIDER_URL: '', FALLBACK_API_KEY: '', BROWSER_WS_ENDPOINT: '' });

        expect(env.FALLBACK_PROVIDER_URL).toBeUndefined();
        expect(env.FALLBACK_API_KEY).toBeUndefined();
        expect(env.BROWSER_WS_ENDPOINT).toBeUndefined();
    });
});

describe('validateEnvironment', () => {
    it('returns the parsed environment without keeping a module-level copy', () => {
        const first = validateEnvironment({ MAX_CONCURRENCY: '2' });
        const second = validateEnvironment({ MAX_CONCURRENCY: '5' });

        expect(first.MAX_CONCURRENCY).toBe(2);
        expect(second.MAX_CONCURRENCY).toBe(5);
    });

    it('exits with status 1 when the environment is invalid', () => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const exit = vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
            throw new Error(`exit ${String(code)}`);
        });

        expect(() => validateEnvironment({ PORT: 'not-a-port' })).toThrow('exit 1');
        expect(exit).toHaveBeenCalledWith(1);
    });
});

describe('toEngineConfig', () => {
    it('maps variables onto the engine configuration', () => {
        const config = toEngineConfig(parseEnvironment({
            MAX_CONCURRENCY: '2',
            FALLBACK_ENABLED: 'true',
            FALLBACK_PROVIDER_URL: 'https://provider.example.test/solve',
            FALLBACK_API_KEY: 'test-secret',
            RESTART_WAIT_POLICY: 'fail-fast',
            BROWSER_WS_ENDPOINT: 'ws://127.0.0.1:3000',
        }));

        expect(config.maxConcurrency).toBe(2);
        expect(config.wsEndpoint).toBe('ws://127.0.0.1:3000');
        expect(config.supervisor.restartWaitPolicy).toBe('fail-fast');
        expect(config.fallback).toEqual({
            enabled: true,
            providerUrl: 'https://provider.example.test/solve',
            credential: 'test-secret',
            timeoutMs: 60000,
        });
        expect(config.solver.targetUrlTemplate).toBe('https://labs.google/fx/tools/flow/project/{targetId}');
    });
});
