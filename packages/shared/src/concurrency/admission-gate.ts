import { AdmissionTimeoutError, ConfigurationError, RequestCancelledError } from '../types/errors.js';
import { admissionInFlight, admissionQueueDepth } from '../observability/metrics.js';
import logger from '../utils/logger.js';

const log = logger.child({ component: 'admission-gate' });

export interface AdmissionTicket {
    readonly id: number;
    readonly admittedAt: number;
    readonly released: boolean;
    release(): void;
}

export interface AdmissionStats {
    limit: number;
    inFlight: number;
    queued: number;
    issued: number;
    released: number;
}

interface Waiter {
    resolve: (ticket: AdmissionTicket) => void;
    reject: (error: Error) => void;
    cleanup: () => void;
}

/**
 * Counting semaphore in front of the browser. Waiters are served in arrival
 * order and a freed slot goes straight to the head of the queue.
 */
export class AdmissionGate {
    private inFlight = 0;
    private issued = 0;
    private releasedCount = 0;
    private readonly waiters: Waiter[] = [];

    constructor(
        private readonly limit: number,
        private readonly now: () => number = Date.now
    ) {
        if (!Number.isInteger(limit) || limit < 1) {
            throw new ConfigurationError(`Admission limit must be a positive integer, got ${limit}`);
        }
    }

    /**
     * Wait for a ticket. `timeoutMs` undefined waits indefinitely.
     */
    admit(timeoutMs?: number, signal?: AbortSignal): Promise<AdmissionTicket> {
        if (signal?.aborted) {
            return Promise.reject(new RequestCancelledError('admission'));
        }

        if (this.inFlight < this.limit && this.waiters.length === 0) {
            this.inFlight++;
            return Promise.resolve(this.issue());
        }

        return new Promise<AdmissionTicket>((resolve, reject) => {
            let timer: NodeJS.Timeout | undefined;

            const onAbort = () => {
                if (this.remove(waiter)) {
                    reject(new RequestCancelledError('admission'));
                }
            };

            const waiter: Waiter = {
                resolve,
                reject,
                cleanup: () => {
                    if (timer) clearTimeout(timer);
                    signal?.removeEventListener('abort', onAbort);
                },
            };

            if (timeoutMs !== undefined) {
                timer = setTimeout(() => {
                    if (this.remove(waiter)) {
                        log.warn({ timeoutMs, queued: this.waiters.length }, 'Admission wait timed out');
                        reject(new AdmissionTimeoutError(timeoutMs));
                    }
                }, Math.max(0, timeoutMs));
            }
            signal?.addEventListener('abort', onAbort, { once: true });

            this.waiters.push(waiter);
            this.updateGauges();
        });
    }

    getStats(): AdmissionStats {
        return {
            limit: this.limit,
            inFlight: this.inFlight,
            queued: this.waiters.length,
            issued: this.issued,
            released: this.releasedCount,
        };
    }

    private issue(): AdmissionTicket {
        const id = ++this.issued;
        const admittedAt = this.now();
        let released = false;

        this.updateGauges();

        return {
            id,
            admittedAt,
            get released() {
                return released;
            },
            release: () => {
                if (released) return;
                released = true;
                this.releasedCount++;
                this.handOff();
            },
        };
    }

    /**
     * A released slot either passes to the next waiter or returns to the pool
     */
    private handOff(): void {
        const next = this.waiters.shift();
        if (!next) {
            this.inFlight--;
            this.updateGauges();
            return;
        }

        next.cleanup();
        next.resolve(this.issue());
    }

    private remove(waiter: Waiter): boolean {
        const index = this.waiters.indexOf(waiter);
        if (index === -1) return false;

        this.waiters.splice(index, 1);
        waiter.cleanup();
        this.updateGauges();
        return true;
    }

    private updateGauges(): void {
        admissionInFlight.set(this.inFlight);
        admissionQueueDepth.set(this.waiters.length);
    }
}
