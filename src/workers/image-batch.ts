/**
 * Image Batch Analyzer
 *
 * Describes a batch of images with a fixed pool of workers. Every input gets
 * exactly one outcome, in input order: a description, the worker's error, or
 * a timeout marker when the batch deadline passed first.
 */

import type { Logger } from '@/lib/logger.js';
import { errorMessage } from '@/lib/errors.js';
import type { ImageSource, VisionClient } from '@/tools/providers/index.js';
import type { ImageDescriptor, ImageOutcome } from '@/types/index.js';

import { runPool } from './pool.js';

export const DESCRIBE_IMAGE_PROMPT = 'Provide describe this image succinctly.';
export const IMAGE_POOL_SIZE = 5;

export interface ImageBatchAnalyzer {
  describeBatch(
    images: readonly ImageDescriptor[],
    options?: { timeoutMs?: number }
  ): Promise<ImageOutcome[]>;

  /** Describe one image with a custom prompt and model */
  describeOne(url: string, prompt: string, model?: string): Promise<string>;
}

export interface ImageBatchAnalyzerDeps {
  images: ImageSource;
  vision: VisionClient;
  model: string;
  defaultTimeoutMs: number;
  logger: Logger;
  concurrency?: number;
  prompt?: string;
}

export function createImageBatchAnalyzer(
  deps: ImageBatchAnalyzerDeps
): ImageBatchAnalyzer {
  const { images, vision, logger } = deps;
  const concurrency = deps.concurrency ?? IMAGE_POOL_SIZE;
  const batchPrompt = deps.prompt ?? DESCRIBE_IMAGE_PROMPT;

  async function describeOne(
    url: string,
    prompt: string,
    model: string = deps.model
  ): Promise<string> {
    const raw = await images.download(url);
    const base64Jpeg = await images.toJpegBase64(raw);
    return vision.describeImage({ base64Jpeg, prompt, model });
  }

  return {
    describeOne,

    async describeBatch(
      batch: readonly ImageDescriptor[],
      options?: { timeoutMs?: number }
    ): Promise<ImageOutcome[]> {
      const timeoutMs = options?.timeoutMs ?? deps.defaultTimeoutMs;
      logger.info({ count: batch.length, timeoutMs }, 'Describing image batch');

      const results = await runPool(
        batch,
        (image) => describeOne(image.url, batchPrompt),
        { concurrency, timeoutMs }
      );

      return batch.map((image, position): ImageOutcome => {
        const result = results[position];
        if (result?.status === 'fulfilled') {
          return {
            index: image.index,
            name: image.name,
            status: 'success',
            description: result.value,
          };
        }

        const error =
          result?.status === 'rejected'
            ? errorMessage(result.reason)
            : `Timed out after ${timeoutMs}ms`;
        logger.warn({ index: image.index, error }, 'Image not described');
        return { index: image.index, name: image.name, status: 'error', error };
      });
    },
  };
}
