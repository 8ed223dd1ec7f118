/**
 * Application errors
 *
 * Thrown by collaborators and handlers, converted at the tool and event
 * boundaries into `{ error }` payloads or `error` events.
 */

import type { ErrorCode } from '@/types/index.js';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Missing required field or invalid enumerated value
 */
export class ValidationError extends AppError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

/**
 * Unknown chat, place or image index
 */
export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

/**
 * Failure while calling an external provider
 */
export class UpstreamError extends AppError {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super('UPSTREAM_ERROR', message);
    this.name = 'UpstreamError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
