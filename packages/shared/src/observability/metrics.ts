import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import logger from '../utils/logger.js';
import type { SupervisorState } from '../types/browser.interface.js';

// One registry shared by the engine and the HTTP layer
export const register = new Registry();

// Prevent multiple initializations
let initialized = false;

export function initMetrics(): void {
    if (initialized) return;

    collectDefaultMetrics({ register });
    logger.info('📊 Metrics registry initialized');
    initialized = true;
}

export async function getMetrics(): Promise<string> {
    return register.metrics();
}

// ============================================
// Token Issuance Metrics
// ============================================

export const tokenRequestsTotal = new Counter({
    name: 'token_requests_total',
    help: 'Token issuance attempts by source and outcome',
    labelNames: ['source', 'outcome'], // source: local/fallback/none, outcome: success or error kind
    registers: [register],
});

export const tokenIssueDurationSeconds = new Histogram({
    name: 'token_issue_duration_seconds',
    help: 'Duration of token issuance from admission to completion',
    labelNames: ['outcome'],
    buckets: [0.5, 1, 2, 5, 10, 20, 30, 60],
    registers: [register],
});

export const fallbackRequestsTotal = new Counter({
    name: 'fallback_requests_total',
    help: 'Calls made to the external fallback provider',
    labelNames: ['status'], // success/failure
    registers: [register],
});

// ============================================
// Admission Metrics
// ============================================

export const admissionInFlight = new Gauge({
    name: 'admission_in_flight',
    help: 'Admission tickets currently held',
    registers: [register],
});

export const admissionQueueDepth = new Gauge({
    name: 'admission_queue_depth',
    help: 'Requests waiting for an admission ticket',
    registers: [register],
});

// ============================================
// Browser Supervisor Metrics
// ============================================

export const browserRestartsTotal = new Counter({
    name: 'browser_restarts_total',
    help: 'Successful browser restarts after a detected crash',
    registers: [register],
});

export const browserLaunchFailuresTotal = new Counter({
    name: 'browser_launch_failures_total',
    help: 'Failed browser launch attempts',
    registers: [register],
});

const SUPERVISOR_STATES: readonly SupervisorState[] = ['uninitialized', 'starting', 'ready', 'crashed', 'restarting'];

export const browserSupervisorState = new Gauge({
    name: 'browser_supervisor_state',
    help: 'Current supervisor state (1 for the active state)',
    labelNames: ['state'],
    registers: [register],
});

export function recordSupervisorState(current: SupervisorState): void {
    for (const state of SUPERVISOR_STATES) {
        browserSupervisorState.set({ state }, state === current ? 1 : 0);
    }
}
