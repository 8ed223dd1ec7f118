/**
 * Review lookup for a cached place
 *
 * Matches the place against the review provider by name near its
 * coordinates, stores the match and its reviews on the place document.
 */

import { z } from 'zod';

import { NotFoundError, ValidationError } from '@/lib/errors.js';

import { defineTool } from '../executor.js';
import type { RegisteredTool } from '../types.js';

import type { ToolHandlerDeps } from './deps.js';

export interface ReviewSummary {
  yelp_rating: number | null;
  yelp_review_count: number | null;
  yelp_reviews: string[];
}

export function createReviewTools(deps: ToolHandlerDeps): RegisteredTool[] {
  const { places, yelp } = deps;

  const getYelpReviews = defineTool({
    name: 'get_yelp_reviews',
    schema: z.object({ place_id: z.string().min(1) }),
    async handler(args, context): Promise<ReviewSummary> {
      const place = await places.getPlace(args.place_id);
      if (place === null) {
        throw new NotFoundError(
          `No place data found for place_id: ${args.place_id}`
        );
      }

      const location = place.location;
      if (!location) {
        throw new ValidationError('Invalid place data: Place has no location data');
      }
      const name = place.displayName?.text;
      if (!name) {
        throw new ValidationError('Invalid place data: Place has no display name');
      }

      const business = await yelp.findBusiness({
        term: name,
        latitude: location.latitude,
        longitude: location.longitude,
      });
      if (business === null) {
        throw new NotFoundError('No businesses found in review search');
      }
      await places.setField(args.place_id, 'yelpData', business);

      const reviews = await yelp.getReviews(business.id);
      if (reviews.length > 0) {
        await places.setField(args.place_id, 'yelpReviews', reviews);
      } else {
        context.logger.warn({ businessId: business.id }, 'No reviews found');
      }

      return {
        yelp_rating: business.rating ?? null,
        yelp_review_count: business.review_count ?? null,
        yelp_reviews: reviews.map((review) => review.text),
      };
    },
  });

  return [getYelpReviews];
}
