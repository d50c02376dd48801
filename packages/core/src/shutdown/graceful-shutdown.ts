import type { Request, Response, NextFunction } from 'express';
import { logger, errorResponse } from '@token-engine/shared';

const log = logger.child({ component: 'graceful-shutdown' });

/** The part of `http.Server` shutdown needs */
export interface ClosableServer {
    close(callback: (err?: Error) => void): unknown;
}

export interface ShutdownTargets {
    server: ClosableServer;
    /** Resolves false when requests were still running after `timeoutMs` */
    drain: (timeoutMs: number) => Promise<boolean>;
    /** Closes every context and the browser process */
    closeEngine: () => Promise<void>;
    /** Longest a token request may run; the drain waits at most this long */
    drainTimeoutMs: number;
}

/**
 * Stops the service in order: refuse new token requests, stop accepting
 * connections, let in-flight requests finish within their budget, then close
 * the browser. A second signal, or a shutdown that overruns, exits at once.
 */
export class GracefulShutdown {
    private shuttingDown = false;
    private initialized = false;
    private targets: ShutdownTargets | null = null;

    constructor(
        private readonly exit: (code: number) => void = code => process.exit(code),
        private readonly forceExitGraceMs: number = 10_000
    ) { }

    attach(targets: ShutdownTargets): void {
        this.targets = targets;
    }

    /**
     * Install signal and crash handlers once per process
     */
    init(): void {
        if (this.initialized) return;
        this.initialized = true;

        process.on('SIGTERM', () => void this.shutdown('SIGTERM'));
        process.on('SIGINT', () => void this.shutdown('SIGINT'));

        process.on('uncaughtException', (error) => {
            log.error({ err: error }, 'Uncaught exception');
            void this.shutdown('uncaughtException');
        });

        process.on('unhandledRejection', (reason) => {
            log.error({ reason }, 'Unhandled promise rejection');
            void this.shutdown('unhandledRejection');
        });
    }

    isInProgress(): boolean {
        return this.shuttingDown;
    }

    async shutdown(signal: string): Promise<void> {
        if (this.shuttingDown) {
            log.warn({ signal }, 'Shutdown already in progress, forcing exit');
            this.exit(1);
            return;
        }
        this.shuttingDown = true;
        log.info({ signal }, '🛑 Shutting down, refusing new token requests');

        const targets = this.targets;
        if (!targets) {
            this.exit(0);
            return;
        }

        const { drainTimeoutMs } = targets;
        const forceExit = setTimeout(() => {
            log.error({ drainTimeoutMs }, 'Shutdown overran its budget, forcing exit');
            this.exit(1);
        }, drainTimeoutMs + this.forceExitGraceMs);

        try {
            // Open connections stay up until their requests are answered
            const serverClosed = this.closeServer(targets.server);

            const drained = await targets.drain(drainTimeoutMs);
            if (!drained) {
                log.warn({ drainTimeoutMs }, 'Token requests still running after the request budget, closing the browser under them');
            }

            await targets.closeEngine();

            const closeError = await serverClosed;
            if (closeError) throw closeError;

            clearTimeout(forceExit);
            log.info('Graceful shutdown completed');
            this.exit(0);
        } catch (error) {
            clearTimeout(forceExit);
            log.error({ err: error }, 'Error during graceful shutdown');
            this.exit(1);
        }
    }

    private closeServer(server: ClosableServer): Promise<Error | undefined> {
        return new Promise(resolve => {
            server.close(err => resolve(err));
        });
    }
}

export const gracefulShutdown = new GracefulShutdown();

/**
 * Refuse new token requests with 503 once shutdown has begun
 */
export function readyCheck(shutdown: GracefulShutdown = gracefulShutdown) {
    return (req: Request, res: Response, next: NextFunction): void => {
        if (shutdown.isInProgress()) {
            res.status(503).json(errorResponse('SHUTTING_DOWN', 'Server is shutting down', undefined, req.id));
            return;
        }
        next();
    };
}
