/**
 * Image tools: batch description of a place's photos, targeted extraction
 */

import { z } from 'zod';

import { NotFoundError, ValidationError } from '@/lib/errors.js';
import type {
  DescribedPhoto,
  ImageDescriptor,
  PlacePhoto,
} from '@/types/index.js';

import { defineTool } from '../executor.js';
import type { RegisteredTool } from '../types.js';

import type { ToolHandlerDeps } from './deps.js';

export function createImageTools(deps: ToolHandlerDeps): RegisteredTool[] {
  const { places, placesClient, images } = deps;

  const describeImages = defineTool({
    name: 'describe_images',
    schema: z.object({ place_id: z.string().min(1) }),
    async handler(args, context): Promise<DescribedPhoto[]> {
      const place = await places.getPlace(args.place_id);
      if (place === null) {
        throw new NotFoundError(
          `No place data found for place_id: ${args.place_id}`
        );
      }

      const photos: PlacePhoto[] = (place.photos ?? []).map((photo) => ({
        ...photo,
      }));

      // Photos described on an earlier call are kept as they are
      const pending: ImageDescriptor[] = [];
      photos.forEach((photo, index) => {
        if (!photo.description && photo.name) {
          pending.push({
            url: placesClient.photoMediaUrl(photo.name),
            index,
            name: photo.name,
          });
        }
      });

      if (pending.length > 0) {
        const outcomes = await images.describeBatch(pending, {
          timeoutMs: deps.imageBatchTimeoutMs,
        });
        for (const outcome of outcomes) {
          const photo = photos[outcome.index];
          if (photo) {
            photo.description =
              outcome.status === 'success' ? outcome.description : outcome.error;
          }
        }
        await places.setField(args.place_id, 'photos', photos);
      }
      context.logger.info(
        { described: pending.length, total: photos.length },
        'Place photos described'
      );

      return photos.map((photo, index) => ({
        uri: photo.googleMapsUri ?? null,
        description: photo.description ?? null,
        index,
      }));
    },
  });

  const extractImageInfo = defineTool({
    name: 'extract_image_info',
    schema: z.object({
      image_index: z.number().int().min(0),
      place_id: z.string().min(1),
      query: z.string().min(1),
    }),
    async handler(args) {
      const place = await places.getPlace(args.place_id);
      if (place === null) {
        throw new NotFoundError(`Place not found for place_id: ${args.place_id}`);
      }

      const photos = place.photos ?? [];
      if (photos.length === 0) {
        throw new NotFoundError(
          `No photo data found for place_id: ${args.place_id}`
        );
      }

      const photo = photos[args.image_index];
      if (photo === undefined) {
        throw new ValidationError(`Invalid image index: ${args.image_index}`);
      }

      const info = await images.describeOne(
        placesClient.photoMediaUrl(photo.name),
        args.query,
        deps.visionDetailModel
      );
      return { info };
    },
  });

  return [describeImages, extractImageInfo];
}
