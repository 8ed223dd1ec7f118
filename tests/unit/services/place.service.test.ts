/**
 * PlaceService Unit Tests
 *
 * SCOPE: Place cache
 *
 * POLICY:
 * - Searches never overwrite a cached place
 * - Field updates create the document when it is missing
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { createNoopLogger } from '@/lib/logger.js';
import { createPlaceService } from '@/services/place.service.js';
import type { PlaceService } from '@/services/place.service.js';
import type { Place } from '@/types/index.js';

import { createInMemoryPlaceDb } from '../../mocks/index.js';
import type { InMemoryPlaceDb } from '../../mocks/index.js';

const cachedPlace: Place = {
  place_id: 'place-1',
  id: 'place-1',
  displayName: { text: 'Corner Bistro', languageCode: 'en' },
  editorialSummary: { text: 'Burgers and beer.' },
  formattedAddress: '1 Main St',
};

describe('PlaceService', () => {
  let db: InMemoryPlaceDb;
  let service: PlaceService;

  beforeEach(() => {
    db = createInMemoryPlaceDb([cachedPlace]);
    service = createPlaceService({ db, logger: createNoopLogger() });
  });

  describe('appendPlaces', () => {
    it('should key new places by provider id', async () => {
      await service.appendPlaces([{ id: 'place-2', formattedAddress: '2 Main St' }]);

      expect(db.records.get('place-2')).toEqual({
        id: 'place-2',
        formattedAddress: '2 Main St',
        place_id: 'place-2',
      });
    });

    it('should leave cached places untouched', async () => {
      await service.appendPlaces([{ id: 'place-1', formattedAddress: 'Elsewhere' }]);

      expect(db.records.get('place-1')?.formattedAddress).toBe('1 Main St');
    });

    it('should skip places without an id', async () => {
      await service.appendPlaces([{ formattedAddress: 'Nowhere' }, { id: '' }]);

      expect(db.records.size).toBe(1);
    });
  });

  describe('setField', () => {
    it('should update one field and keep the rest', async () => {
      const updated = await service.setField('place-1', 'yelpRating', 4.5);

      expect(updated).toEqual({ ...cachedPlace, yelpRating: 4.5 });
      expect(db.records.get('place-1')).toEqual(updated);
    });

    it('should create the document for an unknown place', async () => {
      await service.setField('place-9', 'photos', []);

      expect(db.records.get('place-9')).toEqual({ place_id: 'place-9', photos: [] });
    });

    it('should never let a field rename the place', async () => {
      const updated = await service.setField('place-1', 'place_id', 'other');

      expect(updated.place_id).toBe('place-1');
    });
  });

  describe('concurrent updates', () => {
    it('should keep both fields when two updates hit one place at once', async () => {
      await Promise.all([
        service.setField('place-1', 'photos', [{ name: 'p/a', description: 'Menu' }]),
        service.setField('place-1', 'yelpData', { rating: 4 }),
      ]);

      expect(db.records.get('place-1')).toEqual({
        ...cachedPlace,
        photos: [{ name: 'p/a', description: 'Menu' }],
        yelpData: { rating: 4 },
      });
    });
  });

  describe('getPlaceSummary', () => {
    it('should return only the id, name and summary', async () => {
      await expect(service.getPlaceSummary('place-1')).resolves.toEqual({
        place_id: 'place-1',
        displayName: { text: 'Corner Bistro', languageCode: 'en' },
        editorialSummary: { text: 'Burgers and beer.' },
      });
    });

    it('should omit missing fields', async () => {
      db.records.set('place-3', { place_id: 'place-3' });

      await expect(service.getPlaceSummary('place-3')).resolves.toEqual({
        place_id: 'place-3',
      });
    });

    it('should return null for an unknown place', async () => {
      await expect(service.getPlaceSummary('ghost')).resolves.toBeNull();
    });
  });
});
