/**
 * Assistant resolution
 *
 * The assistant (instructions + tool schema) is resolved once at start-up:
 * a configured id wins, then an id cached on disk, otherwise a new assistant
 * is created and its id cached.
 */

import { readFile, writeFile } from 'fs/promises';

import { z } from 'zod';

import type { Logger } from '@/lib/logger.js';
import type {
  AssistantClient,
  ToolFunctionDefinition,
} from '@/types/index.js';

export const ASSISTANT_NAME = 'Meal Finder';

/**
 * Fixed instructions for the meal-finding assistant
 */
export const ASSISTANT_INSTRUCTIONS = [
  'You are a meal finding assistant. Your goal is to take all the information you have to help the user find meals.',
  'Avoid naming the services you use to look things up. Provide links as citations.',
  'Avoid saying that there were issues with a service. Instead say there was no information available.',
  'Unless requested, give an opinionated choice of a single restaurant instead of listing every restaurant you found.',
  'When showing place images, provide a link instead of displaying them inline.',
  'Common requests:',
  '1. To find restaurants use search_google_maps',
  '2. To get menus use search_website and describe_images to see if any images show a menu',
  '3. To look at ratings, use describe_place with rating fields and get_yelp_reviews',
  '4. Use extract_image_info to learn more about an image after describe_images',
  '5. Use fetch_chat_data if you need a reminder of what happened earlier in the conversation',
].join('\n');

const cacheSchema = z.object({ assistant_id: z.string().min(1) });

export interface ResolveAssistantParams {
  client: AssistantClient;
  /** Configured assistant id, used as is */
  configuredId: string | null;
  cacheFile: string;
  model: string;
  tools: ToolFunctionDefinition[];
  logger: Logger;
}

async function readCachedId(
  cacheFile: string,
  logger: Logger
): Promise<string | null> {
  let raw: string;
  try {
    raw = await readFile(cacheFile, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    logger.error({ err: error, cacheFile }, 'Failed to read assistant cache');
    return null;
  }

  try {
    const parsed = cacheSchema.safeParse(JSON.parse(raw));
    if (parsed.success) {
      return parsed.data.assistant_id;
    }
  } catch (error) {
    logger.warn({ err: error, cacheFile }, 'Assistant cache is not JSON');
    return null;
  }
  logger.warn({ cacheFile }, 'Assistant cache has no assistant_id');
  return null;
}

export async function resolveAssistantId(
  params: ResolveAssistantParams
): Promise<string> {
  const { client, cacheFile, logger } = params;

  if (params.configuredId) {
    logger.info({ assistantId: params.configuredId }, 'Using configured assistant');
    return params.configuredId;
  }

  const cachedId = await readCachedId(cacheFile, logger);
  if (cachedId) {
    const existing = await client.findAssistant(cachedId);
    if (existing) {
      logger.info({ assistantId: existing }, 'Loaded cached assistant');
      return existing;
    }
    logger.warn({ assistantId: cachedId }, 'Cached assistant no longer exists');
  }

  const assistantId = await client.createAssistant({
    name: ASSISTANT_NAME,
    instructions: ASSISTANT_INSTRUCTIONS,
    model: params.model,
    tools: params.tools,
  });
  logger.info({ assistantId }, 'Created assistant');

  try {
    await writeFile(cacheFile, JSON.stringify({ assistant_id: assistantId }));
  } catch (error) {
    logger.error({ err: error, cacheFile }, 'Failed to cache assistant id');
  }

  return assistantId;
}
