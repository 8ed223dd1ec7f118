/**
 * Place Domain Types
 *
 * Places come from the place-search provider and are cached by the document
 * store. This service only attaches descriptions and review data to them.
 */

import type { GeoLocation } from './chat.js';

/**
 * Photo reference as returned by the place-search provider
 */
export interface PlacePhoto {
  /** Provider resource name, e.g. "places/abc/photos/xyz" */
  name: string;
  googleMapsUri?: string;
  widthPx?: number;
  heightPx?: number;
  /** Generated description, or the error text of a failed attempt */
  description?: string;
  [key: string]: unknown;
}

/**
 * Localized text as returned by the provider
 */
export interface LocalizedText {
  text: string;
  languageCode?: string;
}

/**
 * Cached place document
 */
export interface Place {
  place_id: string;
  id?: string;
  displayName?: LocalizedText;
  formattedAddress?: string;
  websiteUri?: string;
  location?: GeoLocation;
  editorialSummary?: LocalizedText;
  photos?: PlacePhoto[];
  [key: string]: unknown;
}

/**
 * Minimal place view used when listing the places of a chat
 */
export interface PlaceSummary {
  place_id: string;
  displayName?: LocalizedText;
  editorialSummary?: LocalizedText;
}

/**
 * Image slated for description: url to download, position in the place's
 * photo list, provider resource name
 */
export interface ImageDescriptor {
  url: string;
  index: number;
  name: string;
}

/**
 * Outcome of describing one image
 */
export type ImageOutcome =
  | { index: number; name: string; status: 'success'; description: string }
  | { index: number; name: string; status: 'error'; error: string };

/**
 * Photo entry returned to the assistant after a batch describe
 */
export interface DescribedPhoto {
  uri: string | null;
  description: string | null;
  index: number;
}
