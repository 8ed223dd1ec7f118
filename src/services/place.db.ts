/**
 * PlaceService Database Adapter
 * Implements PlaceServiceDb interface using Supabase
 *
 * Table: places (place_id primary key, data jsonb)
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { Place } from '@/types/index.js';

import type { PlaceServiceDb } from './place.service.js';

interface PlaceRow {
  place_id: string;
  data: Place;
}

export function createPlaceServiceDb(supabase: SupabaseClient): PlaceServiceDb {
  return {
    async getPlace(placeId: string): Promise<Place | null> {
      const { data, error } = await supabase
        .from('places')
        .select('place_id, data')
        .eq('place_id', placeId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get place: ${error.message}`);
      }
      if (data === null) {
        return null;
      }

      const row = data as PlaceRow;
      return { ...row.data, place_id: row.place_id };
    },

    async savePlace(place: Place): Promise<void> {
      const { error } = await supabase
        .from('places')
        .upsert({ place_id: place.place_id, data: place });

      if (error !== null) {
        throw new Error(`Failed to save place: ${error.message}`);
      }
    },

    async insertMissing(places: Place[]): Promise<void> {
      const rows: PlaceRow[] = places.map((place) => ({
        place_id: place.place_id,
        data: place,
      }));

      const { error } = await supabase
        .from('places')
        .upsert(rows, { onConflict: 'place_id', ignoreDuplicates: true });

      if (error !== null) {
        throw new Error(`Failed to cache places: ${error.message}`);
      }
    },
  };
}
