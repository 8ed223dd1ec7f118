/**
 * Place search provider client (Google Places API v1)
 */

import { z } from 'zod';

import type { ProviderPlace } from '@/services/index.js';
import type { GeoLocation } from '@/types/index.js';

import { requestJson } from './http.js';

const PLACES_BASE_URL = 'https://places.googleapis.com/v1';

export interface PlacesClientConfig {
  apiKey: string;
  baseUrl?: string;
}

export interface TextSearchParams {
  query: string;
  pageSize: number;
  fields: readonly string[];
  locationBias?: { center: GeoLocation; radius: number };
  pageToken?: string;
}

export interface TextSearchPage {
  places: ProviderPlace[];
  nextPageToken: string | null;
}

export interface PlacesClient {
  searchText(params: TextSearchParams): Promise<TextSearchPage>;
  getPlaceDetails(
    placeId: string,
    fields: readonly string[]
  ): Promise<Record<string, unknown>>;
  /** Downloadable media URL for a photo resource name */
  photoMediaUrl(photoName: string, maxPx?: number): string;
}

const providerPlaceSchema = z.object({ id: z.string().optional() }).passthrough();

const textSearchResponseSchema = z.object({
  places: z.array(providerPlaceSchema).optional(),
  nextPageToken: z.string().optional(),
});

export function createPlacesClient(config: PlacesClientConfig): PlacesClient {
  const baseUrl = config.baseUrl ?? PLACES_BASE_URL;

  function headers(fieldMask: string): Record<string, string> {
    return {
      'X-Goog-Api-Key': config.apiKey,
      'X-Goog-FieldMask': fieldMask,
    };
  }

  return {
    async searchText(params: TextSearchParams): Promise<TextSearchPage> {
      const body: Record<string, unknown> = {
        textQuery: params.query,
        pageSize: params.pageSize,
      };
      if (params.locationBias) {
        body.locationBias = {
          circle: {
            center: params.locationBias.center,
            radius: params.locationBias.radius,
          },
        };
      }
      if (params.pageToken) {
        body.pageToken = params.pageToken;
      }

      const fieldMask = [
        ...params.fields.map((field) => `places.${field}`),
        'nextPageToken',
      ].join(',');

      const raw = await requestJson('Place search', `${baseUrl}/places:searchText`, {
        method: 'POST',
        headers: headers(fieldMask),
        body,
      });
      const parsed = textSearchResponseSchema.parse(raw);

      return {
        places: parsed.places ?? [],
        nextPageToken: parsed.nextPageToken ?? null,
      };
    },

    async getPlaceDetails(
      placeId: string,
      fields: readonly string[]
    ): Promise<Record<string, unknown>> {
      const raw = await requestJson(
        'Place details',
        `${baseUrl}/places/${encodeURIComponent(placeId)}`,
        { headers: headers(fields.join(',')) }
      );
      return z.record(z.unknown()).parse(raw);
    },

    photoMediaUrl(photoName: string, maxPx = 400): string {
      const query = new URLSearchParams({
        maxHeightPx: String(maxPx),
        maxWidthPx: String(maxPx),
        key: config.apiKey,
      });
      return `${baseUrl}/${photoName}/media?${query.toString()}`;
    },
  };
}
