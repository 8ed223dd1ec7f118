/**
 * Review provider client (Yelp Fusion)
 */

import { z } from 'zod';

import { requestJson } from './http.js';

const YELP_BASE_URL = 'https://api.yelp.com/v3';

export interface YelpClientConfig {
  apiKey: string;
  baseUrl?: string;
}

const businessSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    rating: z.number().optional(),
    review_count: z.number().optional(),
  })
  .passthrough();

const reviewSchema = z
  .object({
    id: z.string().optional(),
    text: z.string(),
    rating: z.number().optional(),
  })
  .passthrough();

export type YelpBusiness = z.infer<typeof businessSchema>;
export type YelpReview = z.infer<typeof reviewSchema>;

export interface BusinessSearchParams {
  term: string;
  latitude: number;
  longitude: number;
}

export interface YelpClient {
  /** Best match near the coordinates, or null */
  findBusiness(params: BusinessSearchParams): Promise<YelpBusiness | null>;
  getReviews(businessId: string): Promise<YelpReview[]>;
}

export function createYelpClient(config: YelpClientConfig): YelpClient {
  const baseUrl = config.baseUrl ?? YELP_BASE_URL;
  const headers = { Authorization: `Bearer ${config.apiKey}` };

  return {
    async findBusiness(
      params: BusinessSearchParams
    ): Promise<YelpBusiness | null> {
      const query = new URLSearchParams({
        term: params.term,
        sort_by: 'best_match',
        limit: '1',
        latitude: String(params.latitude),
        longitude: String(params.longitude),
      });
      const raw = await requestJson(
        'Review search',
        `${baseUrl}/businesses/search?${query.toString()}`,
        { headers }
      );
      const parsed = z
        .object({ businesses: z.array(businessSchema).optional() })
        .parse(raw);

      return parsed.businesses?.[0] ?? null;
    },

    async getReviews(businessId: string): Promise<YelpReview[]> {
      const raw = await requestJson(
        'Review lookup',
        `${baseUrl}/businesses/${encodeURIComponent(businessId)}/reviews`,
        { headers }
      );
      const parsed = z
        .object({ reviews: z.array(reviewSchema).optional() })
        .parse(raw);

      return parsed.reviews ?? [];
    },
  };
}
