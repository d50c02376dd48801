import pino from 'pino';
import { AsyncLocalStorage } from 'node:async_hooks';

export type LogContextKey = 'requestId' | 'correlationId' | 'targetId';

export const contextStorage = new AsyncLocalStorage<Map<LogContextKey, string>>();

const CONTEXT_KEYS: readonly LogContextKey[] = ['requestId', 'correlationId', 'targetId'];

const logger = pino({
    name: 'token-engine',
    level: process.env.LOG_LEVEL || 'info',
    transport: process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        }
        : undefined,
    redact: {
        paths: [
            'authorization',
            'headers.authorization',
            'credential',
            'apiKey',
            'api_key',
            'token',
            'FALLBACK_API_KEY',
            'fallback.credential',
            '*.credential',
            '*.apiKey',
            '*.token'
        ],
        censor: '[REDACTED]'
    },
    mixin() {
        const store = contextStorage.getStore();
        const context: Partial<Record<LogContextKey, string>> = {};

        // Auto-inject request scoped identifiers
        if (store) {
            for (const key of CONTEXT_KEYS) {
                const value = store.get(key);
                if (value) {
                    context[key] = value;
                }
            }
        }

        return context;
    }
});

/**
 * Run `fn` with extra identifiers attached to every log line it emits.
 */
export function withLogContext<T>(values: Partial<Record<LogContextKey, string>>, fn: () => T): T {
    const parent = contextStorage.getStore();
    const store = new Map<LogContextKey, string>(parent ?? []);
    for (const key of CONTEXT_KEYS) {
        const value = values[key];
        if (value) store.set(key, value);
    }
    return contextStorage.run(store, fn);
}

export default logger;
