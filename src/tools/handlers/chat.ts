/**
 * Chat tools: history and shared location of the current chat
 */

import { z } from 'zod';

import { NotFoundError } from '@/lib/errors.js';

import { defineTool } from '../executor.js';
import type { RegisteredTool } from '../types.js';

import type { ToolHandlerDeps } from './deps.js';

export function createChatTools(deps: ToolHandlerDeps): RegisteredTool[] {
  const { chats } = deps;

  const fetchChatData = defineTool({
    name: 'fetch_chat_data',
    schema: z.object({}),
    async handler(_args, context) {
      return (await chats.getChat(context.chatId)) ?? {};
    },
  });

  const getUserLocation = defineTool({
    name: 'get_user_location',
    schema: z.object({}),
    async handler(_args, context) {
      const location = await chats.getField(context.chatId, 'location');
      if (location === null) {
        throw new NotFoundError('No location has been shared for this chat');
      }
      return location;
    },
  });

  return [fetchChatData, getUserLocation];
}
