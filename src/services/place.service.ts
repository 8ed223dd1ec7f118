/**
 * PlaceService Implementation
 *
 * SCOPE: Cache of provider places (the document store contract for places)
 *
 * Places are inserted once and never overwritten by later searches;
 * only individual fields (photo descriptions, review data) are updated,
 * one update per place at a time.
 */

import { createKeyedMutex } from '@/lib/keyed-mutex.js';
import type { KeyedMutex } from '@/lib/keyed-mutex.js';
import type { Logger } from '@/lib/logger.js';
import type { Place, PlaceSummary } from '@/types/index.js';

/**
 * Database abstraction interface for PlaceService
 */
export interface PlaceServiceDb {
  getPlace: (placeId: string) => Promise<Place | null>;
  savePlace: (place: Place) => Promise<void>;
  /** Inserts places whose place_id is not stored yet, leaves the rest untouched */
  insertMissing: (places: Place[]) => Promise<void>;
}

/**
 * Place as returned by the search provider, keyed by `id`
 */
export interface ProviderPlace {
  id?: string;
  [key: string]: unknown;
}

/**
 * PlaceService interface
 */
export interface PlaceService {
  getPlace(placeId: string): Promise<Place | null>;
  setField(placeId: string, field: string, value: unknown): Promise<Place>;
  appendPlaces(places: ProviderPlace[]): Promise<void>;
  getPlaceSummary(placeId: string): Promise<PlaceSummary | null>;
}

export interface PlaceServiceDeps {
  db: PlaceServiceDb;
  logger: Logger;
  /** Per-place lock around field updates */
  mutex?: KeyedMutex;
}

/**
 * Create PlaceService instance
 */
export function createPlaceService(deps: PlaceServiceDeps): PlaceService {
  const { db, logger } = deps;
  const mutex = deps.mutex ?? createKeyedMutex();

  return {
    async getPlace(placeId: string): Promise<Place | null> {
      return db.getPlace(placeId);
    },

    async setField(
      placeId: string,
      field: string,
      value: unknown
    ): Promise<Place> {
      const updated = await mutex.runExclusive(placeId, async () => {
        const existing = await db.getPlace(placeId);
        const place: Place = {
          ...(existing ?? { place_id: placeId }),
          [field]: value,
          place_id: placeId,
        };
        await db.savePlace(place);
        return place;
      });
      logger.debug({ placeId, field }, 'Updated place field');

      return updated;
    },

    async appendPlaces(places: ProviderPlace[]): Promise<void> {
      const documents: Place[] = [];
      for (const place of places) {
        if (typeof place.id !== 'string' || place.id === '') {
          logger.warn('Skipping provider place without id');
          continue;
        }
        documents.push({ ...place, place_id: place.id });
      }

      if (documents.length === 0) {
        return;
      }

      await db.insertMissing(documents);
      logger.debug({ count: documents.length }, 'Cached places');
    },

    async getPlaceSummary(placeId: string): Promise<PlaceSummary | null> {
      const place = await db.getPlace(placeId);
      if (place === null) {
        return null;
      }

      const summary: PlaceSummary = { place_id: place.place_id };
      if (place.displayName !== undefined) {
        summary.displayName = place.displayName;
      }
      if (place.editorialSummary !== undefined) {
        summary.editorialSummary = place.editorialSummary;
      }
      return summary;
    },
  };
}
