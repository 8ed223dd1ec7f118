/**
 * External provider clients used by tool handlers
 */

export { createPlacesClient } from './places.client.js';
export type {
  PlacesClient,
  PlacesClientConfig,
  TextSearchParams,
  TextSearchPage,
} from './places.client.js';
export { createYelpClient } from './yelp.client.js';
export type {
  YelpClient,
  YelpClientConfig,
  YelpBusiness,
  YelpReview,
  BusinessSearchParams,
} from './yelp.client.js';
export { createExaClient } from './exa.client.js';
export type { ContentSearchClient, ExaClientConfig } from './exa.client.js';
export { createVisionClient, NO_DESCRIPTION } from './vision.client.js';
export type { VisionClient, DescribeImageRequest } from './vision.client.js';
export { createImageSource } from './image-source.js';
export type { ImageSource } from './image-source.js';
export { requestJson } from './http.js';
