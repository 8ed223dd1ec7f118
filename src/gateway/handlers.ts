/**
 * Socket event handlers
 *
 * Each inbound frame is a JSON envelope `{ event, data }`. Handlers return a
 * Result; a failure becomes an `error` event on the originating connection.
 * Replies to `send_message` go to every member of the chat, everything else
 * only to the requester.
 */

import { z } from 'zod';

import { AppError, errorMessage } from '@/lib/errors.js';
import type { Logger } from '@/lib/logger.js';
import type { Orchestrator } from '@/orchestrator/orchestrator.js';
import type { ChatService } from '@/services/index.js';
import type { ClientEventName, Result } from '@/types/index.js';
import { failure, success } from '@/types/index.js';

import type { BroadcastGateway } from './broadcast.js';
import type { ConnectionRegistry } from './registry.js';

const GENERIC_ERROR = 'An unexpected error occurred';

const envelopeSchema = z.object({
  event: z.string().min(1),
  data: z.unknown().optional(),
});

const locationSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
});

const chatIdSchema = z
  .string({ required_error: 'chat_id is required' })
  .min(1, 'chat_id is required');

export const sendMessageSchema = z.object({
  chat_id: z.string().min(1).optional(),
  content: z
    .string({ required_error: 'Message content is required' })
    .min(1, 'Message content is required'),
  location: locationSchema.optional(),
});

export const chatLookupSchema = z.object({ chat_id: chatIdSchema });

type EventHandler = (
  connectionId: string,
  data: unknown
) => Promise<Result<void>>;

export interface EventHandlers {
  /** Parse and dispatch one raw frame; never rejects */
  handleFrame(connectionId: string, raw: string): Promise<void>;
  dispatch(
    connectionId: string,
    event: string,
    data: unknown
  ): Promise<Result<void>>;
}

export interface EventHandlerDeps {
  registry: ConnectionRegistry;
  broadcast: BroadcastGateway;
  chats: ChatService;
  orchestrator: Orchestrator;
  logger: Logger;
}

function parsePayload<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): Result<z.output<T>> {
  const parsed = schema.safeParse(data ?? {});
  if (!parsed.success) {
    const message = parsed.error.issues[0]?.message ?? 'Invalid payload';
    return failure('VALIDATION_ERROR', message);
  }
  return success(parsed.data);
}

export function createEventHandlers(deps: EventHandlerDeps): EventHandlers {
  const { registry, broadcast, chats, orchestrator, logger } = deps;

  const handlers: Record<ClientEventName, EventHandler> = {
    async send_message(connectionId, data) {
      const payload = parsePayload(sendMessageSchema, data);
      if (!payload.success) {
        return payload;
      }
      const { content, location } = payload.data;

      let chatId = payload.data.chat_id;
      if (chatId === undefined) {
        const chat = await chats.createChat(location ?? null);
        chatId = chat.chatId;
        logger.info({ chatId, connectionId }, 'Created chat');
      } else if ((await chats.getChat(chatId)) === null) {
        return failure('NOT_FOUND', `Chat not found: ${chatId}`);
      }

      registry.joinChat(connectionId, chatId);

      const reply = await orchestrator.runTurn(chatId, content);
      broadcast.emitToChat(chatId, 'message', { chat_id: chatId, content: reply });
      return success(undefined);
    },

    async get_chats(connectionId) {
      const list = await chats.listChats();
      broadcast.emitToConnection(connectionId, 'chats', { chats: list });
      return success(undefined);
    },

    async get_messages(connectionId, data) {
      const payload = parsePayload(chatLookupSchema, data);
      if (!payload.success) {
        return payload;
      }
      const chatId = payload.data.chat_id;

      const chat = await chats.getChat(chatId);
      if (chat === null) {
        return failure('NOT_FOUND', `Chat not found: ${chatId}`);
      }
      broadcast.emitToConnection(connectionId, 'messages', {
        chat_id: chatId,
        messages: chat.messages,
      });
      return success(undefined);
    },

    async get_chat_data(connectionId, data) {
      const payload = parsePayload(chatLookupSchema, data);
      if (!payload.success) {
        return payload;
      }
      const chatId = payload.data.chat_id;

      const chat = await chats.getChat(chatId);
      if (chat === null) {
        return failure('NOT_FOUND', `Chat not found: ${chatId}`);
      }
      broadcast.emitToConnection(connectionId, 'chat_data', {
        chat_id: chatId,
        chat_data: chat,
      });
      return success(undefined);
    },
  };

  function isClientEvent(event: string): event is ClientEventName {
    return Object.prototype.hasOwnProperty.call(handlers, event);
  }

  async function dispatch(
    connectionId: string,
    event: string,
    data: unknown
  ): Promise<Result<void>> {
    if (!isClientEvent(event)) {
      return failure('VALIDATION_ERROR', `Unknown event: ${event}`);
    }

    logger.info({ connectionId, event }, 'Received event');
    try {
      return await handlers[event](connectionId, data);
    } catch (error) {
      if (error instanceof AppError) {
        return failure(error.code, error.message);
      }
      logger.error({ err: error, connectionId, event }, 'Event handler failed');
      return failure('INTERNAL_ERROR', GENERIC_ERROR);
    }
  }

  return {
    dispatch,

    async handleFrame(connectionId: string, raw: string): Promise<void> {
      let envelope: z.infer<typeof envelopeSchema>;
      try {
        const parsed = envelopeSchema.safeParse(JSON.parse(raw));
        if (!parsed.success) {
          broadcast.emitError(connectionId, 'Malformed frame: missing event');
          return;
        }
        envelope = parsed.data;
      } catch (error) {
        logger.debug({ connectionId, error: errorMessage(error) }, 'Bad frame');
        broadcast.emitError(connectionId, 'Malformed frame: invalid JSON');
        return;
      }

      const result = await dispatch(connectionId, envelope.event, envelope.data);
      if (!result.success) {
        logger.warn(
          { connectionId, event: envelope.event, code: result.error.code },
          result.error.message
        );
        broadcast.emitError(connectionId, result.error.message);
      }
    },
  };
}
