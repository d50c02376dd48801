// Types
export * from './types/token.interface.js';
export * from './types/browser.interface.js';
export * from './types/errors.js';
export * from './types/api-response.js';
export * from './types/api-schemas.js';

// Utils
export { default as logger, contextStorage, withLogContext } from './utils/logger.js';
export type { LogContextKey } from './utils/logger.js';
export * from './utils/env-validator.js';
export * from './utils/timeout.js';

// Browser
export * from './browser/request-filter.js';
export * from './browser/adapters/playwright-adapter.js';
export * from './browser/supervisor.js';

// Concurrency
export * from './concurrency/admission-gate.js';

// Solving
export * from './solver/page-scripts.js';
export * from './solver/challenge-solver.js';
export * from './fallback/external-dispatcher.js';
export * from './orchestrator/token-orchestrator.js';

// Observability
export * from './observability/metrics.js';
