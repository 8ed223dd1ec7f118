/**
 * Worker exports
 */

export { runPool } from './pool.js';
export type { PoolResult, PoolOptions } from './pool.js';
export {
  createImageBatchAnalyzer,
  DESCRIBE_IMAGE_PROMPT,
  IMAGE_POOL_SIZE,
} from './image-batch.js';
export type {
  ImageBatchAnalyzer,
  ImageBatchAnalyzerDeps,
} from './image-batch.js';
