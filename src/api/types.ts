/**
 * API Layer Types
 * Types specific to the HTTP layer
 */

import type { ErrorCode } from '@/types/index.js';

/**
 * Extended Hono context with the request id
 */
declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    requestId: string;
  };
}

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<ErrorCode, 400 | 404 | 500 | 502> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  UPSTREAM_ERROR: 502,
  INTERNAL_ERROR: 500,
};

export function getErrorStatus(code: ErrorCode): 400 | 404 | 500 | 502 {
  return ERROR_STATUS_MAP[code];
}

/**
 * Live numbers reported by the health route
 */
export interface HealthStats {
  connections(): number;
}
