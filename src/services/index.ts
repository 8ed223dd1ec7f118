/**
 * Service Layer Exports
 *
 * Services are the only gateway to the document store.
 */

// ChatService
export type {
  ChatService,
  ChatServiceDb,
  ChatServiceDeps,
} from './chat.service.js';
export { createChatService } from './chat.service.js';
export { createChatServiceDb } from './chat.db.js';

// PlaceService
export type {
  PlaceService,
  PlaceServiceDb,
  PlaceServiceDeps,
  ProviderPlace,
} from './place.service.js';
export { createPlaceService } from './place.service.js';
export { createPlaceServiceDb } from './place.db.js';
