/**
 * Human-readable labels broadcast while a tool runs.
 * Clients never see raw tool names.
 */

import type { ToolName } from '@/types/index.js';

export const TOOL_LABELS: Record<ToolName, string> = {
  search_google_maps: 'Searching Google Maps',
  describe_images: 'Analyzing images from Google Maps',
  extract_image_info: 'Extracting information from Google Maps images',
  fetch_chat_data: 'Recollecting information from historical chat data',
  describe_place: 'Getting more information from Google Maps',
  get_stored_places_for_chat: 'Retrieving all the places we have talked about',
  get_yelp_reviews: 'Fetching Yelp reviews',
  get_user_location: 'Getting your location',
  search_website: 'Searching website content',
};

export const FALLBACK_TOOL_LABEL = 'Working on your request';

function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOL_LABELS, name);
}

export function toolLabel(name: string): string {
  return isToolName(name) ? TOOL_LABELS[name] : FALLBACK_TOOL_LABEL;
}
