/**
 * Shared Library Exports
 * Common utilities used across the application
 */

export { createSupabaseAdmin } from './supabase.js';
export type { SupabaseConfig } from './supabase.js';
export { createLogger, createNoopLogger } from './logger.js';
export type { Logger } from './logger.js';
export { loadConfig, ConfigValidationError } from './config.js';
export type { AppConfig, Env } from './config.js';
export {
  AppError,
  ValidationError,
  NotFoundError,
  UpstreamError,
  errorMessage,
} from './errors.js';
export { createKeyedMutex } from './keyed-mutex.js';
export type { KeyedMutex } from './keyed-mutex.js';
