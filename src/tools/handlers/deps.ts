/**
 * Collaborators shared by the tool handlers
 */

import type { ChatService, PlaceService } from '@/services/index.js';
import type { ImageBatchAnalyzer } from '@/workers/index.js';

import type { PlaceFieldConfig } from '../definitions.js';
import type {
  ContentSearchClient,
  PlacesClient,
  YelpClient,
} from '../providers/index.js';

export interface ToolHandlerDeps {
  chats: ChatService;
  places: PlaceService;
  placesClient: PlacesClient;
  yelp: YelpClient;
  contentSearch: ContentSearchClient;
  images: ImageBatchAnalyzer;
  placeFields: PlaceFieldConfig;
  imageBatchTimeoutMs: number;
  /** Model used for targeted single-image questions */
  visionDetailModel: string;
  /** Pause between result pages of a place search */
  pageDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}
