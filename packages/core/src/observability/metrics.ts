import { Counter, Histogram } from 'prom-client';
import { logger, register, initMetrics as initSharedMetrics } from '@token-engine/shared';

// ============================================
// HTTP Metrics
// ============================================

/**
 * HTTP request counter
 */
export const httpRequestsTotal = new Counter({
    name: 'http_requests_total',
    help: 'Total number of HTTP requests',
    labelNames: ['method', 'route', 'status_code'],
    registers: [register],
});

/**
 * HTTP request duration histogram
 */
export const httpRequestDuration = new Histogram({
    name: 'http_request_duration_seconds',
    help: 'Duration of HTTP requests in seconds',
    labelNames: ['method', 'route', 'status_code'],
    buckets: [0.1, 0.3, 0.5, 1, 3, 5, 10, 30, 60],
    registers: [register],
});

/**
 * Initialize default metrics collection
 */
export function initMetrics(): void {
    // Collect default Node.js metrics via shared module
    initSharedMetrics();

    logger.info('Metrics collection initialized (via Shared Registry)');
}

/**
 * Get all metrics for Prometheus scraping
 */
export async function getMetrics(): Promise<string> {
    return register.metrics();
}

export function metricsContentType(): string {
    return register.contentType;
}
