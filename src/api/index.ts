/**
 * API Layer Exports
 *
 * API layer is thin: the conversation runs over the socket gateway.
 */

export { createApp } from './app.js';
export { createHealthRoutes } from './routes/health.js';
export { createRequestIdMiddleware } from './middleware/request-id.js';
export { ERROR_STATUS_MAP, getErrorStatus } from './types.js';
export type { ErrorResponse, HealthStats } from './types.js';
