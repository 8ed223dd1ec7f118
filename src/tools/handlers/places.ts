/**
 * Place tools: search, detail lookup, places of the current chat
 */

import { setTimeout as delay } from 'timers/promises';

import { z } from 'zod';

import { NotFoundError, ValidationError } from '@/lib/errors.js';
import type { ProviderPlace } from '@/services/index.js';
import type { PlaceSummary } from '@/types/index.js';

import { defineTool } from '../executor.js';
import type { RegisteredTool } from '../types.js';

import type { ToolHandlerDeps } from './deps.js';

const DEFAULT_PAGE_DELAY_MS = 2000;

const MAX_RADIUS_M = 50000;
const MAX_PAGE_SIZE = 20;

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function withoutPhotos(place: ProviderPlace): Record<string, unknown> {
  const copy: Record<string, unknown> = { ...place };
  delete copy.photos;
  return copy;
}

/**
 * Quoted list as shown to the assistant, e.g. ['a', 'b']
 */
export function formatFieldList(fields: readonly string[]): string {
  return `[${fields.map((field) => `'${field}'`).join(', ')}]`;
}

const searchArgs = z.object({
  query: z.string().min(1),
  radius: z.number().default(5000),
  limit: z.number().default(5),
  page: z.number().int().min(0).default(0),
});

const describePlaceArgs = z.object({
  place_id: z.string().min(1),
  fields: z.array(z.string()).min(1),
});

export function createPlaceTools(deps: ToolHandlerDeps): RegisteredTool[] {
  const { chats, places, placesClient, placeFields } = deps;
  const pageDelayMs = deps.pageDelayMs ?? DEFAULT_PAGE_DELAY_MS;
  const sleep = deps.sleep ?? ((ms: number) => delay(ms));

  const searchGoogleMaps = defineTool({
    name: 'search_google_maps',
    schema: searchArgs,
    async handler(args, context) {
      const location = await chats.getField(context.chatId, 'location');
      const radius = clamp(args.radius, 0, MAX_RADIUS_M);
      const pageSize = clamp(Math.trunc(args.limit), 1, MAX_PAGE_SIZE);

      let found: ProviderPlace[] = [];
      let pageToken: string | undefined;
      for (let current = 0; current <= args.page; current += 1) {
        const page = await placesClient.searchText({
          query: args.query,
          pageSize,
          fields: placeFields.search,
          ...(location ? { locationBias: { center: location, radius } } : {}),
          ...(pageToken ? { pageToken } : {}),
        });
        found = page.places;
        context.logger.debug(
          { page: current, count: found.length },
          'Place search page'
        );

        if (current === args.page) {
          break;
        }
        if (page.nextPageToken === null) {
          context.logger.warn({ page: current }, 'No further result pages');
          break;
        }
        pageToken = page.nextPageToken;
        await sleep(pageDelayMs);
      }

      if (found.length > 0) {
        await places.appendPlaces(found);
        const ids = found
          .map((place) => place.id)
          .filter((id): id is string => typeof id === 'string' && id !== '');
        await chats.appendPlaces(context.chatId, ids);
      }

      return found.map(withoutPhotos);
    },
  });

  const describePlace = defineTool({
    name: 'describe_place',
    schema: describePlaceArgs,
    async handler(args) {
      const invalid = args.fields.filter(
        (field) => !placeFields.available.has(field)
      );
      if (invalid.length > 0) {
        throw new ValidationError(`Invalid fields: ${formatFieldList(invalid)}`);
      }

      const details = await placesClient.getPlaceDetails(
        args.place_id,
        args.fields
      );
      if (Object.keys(details).length === 0) {
        throw new NotFoundError(`No data returned for ${args.place_id}`);
      }
      return details;
    },
  });

  const storedPlaces = defineTool({
    name: 'get_stored_places_for_chat',
    schema: z.object({}),
    async handler(_args, context) {
      const chat = await chats.getChat(context.chatId);
      if (chat === null) {
        throw new NotFoundError(`No chat data for ${context.chatId}`);
      }

      const summaries = await Promise.all(
        chat.places.map((placeId) => places.getPlaceSummary(placeId))
      );
      return summaries.filter(
        (summary): summary is PlaceSummary => summary !== null
      );
    },
  });

  return [searchGoogleMaps, describePlace, storedPlaces];
}
