/**
 * Image download and re-encoding for the vision model
 */

import sharp from 'sharp';

import { UpstreamError } from '@/lib/errors.js';

const DOWNLOAD_TIMEOUT_MS = 10000;

export interface ImageSource {
  /** Download the image bytes */
  download(url: string): Promise<Buffer>;
  /** Convert any supported image to JPEG, base64-encoded */
  toJpegBase64(image: Buffer): Promise<string>;
}

export function createImageSource(): ImageSource {
  return {
    async download(url: string): Promise<Buffer> {
      let response: Response;
      try {
        response = await fetch(url, {
          signal: AbortSignal.timeout(DOWNLOAD_TIMEOUT_MS),
        });
      } catch (error) {
        const reason = error instanceof Error ? error.message : 'network error';
        throw new UpstreamError(`Image download failed: ${reason}`);
      }

      if (!response.ok) {
        throw new UpstreamError(
          `Image download failed with status ${response.status}`,
          response.status
        );
      }

      return Buffer.from(await response.arrayBuffer());
    },

    async toJpegBase64(image: Buffer): Promise<string> {
      const jpeg = await sharp(image).jpeg().toBuffer();
      return jpeg.toString('base64');
    },
  };
}
