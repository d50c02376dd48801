export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export interface DeadlineOptions {
    timeoutMs: number;
    onTimeout: () => Error;
    signal?: AbortSignal;
    onAbort?: () => Error;
}

/**
 * Race `work` against a timer and an optional abort signal.
 * The timer and the abort listener are always cleared once the race settles;
 * `work` itself keeps running and is the caller's to clean up.
 */
export function withDeadline<T>(work: Promise<T>, options: DeadlineOptions): Promise<T> {
    const { timeoutMs, onTimeout, signal, onAbort } = options;

    if (signal?.aborted) {
        return Promise.reject(onAbort ? onAbort() : new Error('Aborted'));
    }

    return new Promise<T>((resolve, reject) => {
        let settled = false;

        const finish = () => {
            settled = true;
            clearTimeout(timer);
            signal?.removeEventListener('abort', abortListener);
        };

        const timer = setTimeout(() => {
            if (settled) return;
            finish();
            reject(onTimeout());
        }, Math.max(0, timeoutMs));

        const abortListener = () => {
            if (settled) return;
            finish();
            reject(onAbort ? onAbort() : new Error('Aborted'));
        };
        signal?.addEventListener('abort', abortListener, { once: true });

        work.then(
            value => {
                if (settled) return;
                finish();
                resolve(value);
            },
            (error: unknown) => {
                if (settled) return;
                finish();
                reject(error);
            }
        );
    });
}

/**
 * Milliseconds left before `deadline`, never negative.
 */
export function remainingMs(deadline: number, now: number = Date.now()): number {
    return Math.max(0, deadline - now);
}
