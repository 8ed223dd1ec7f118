/**
 * Broadcast Gateway
 *
 * Emits server events to every member of a chat or to one connection.
 * A failed send is logged and skipped; the rest of the fan-out proceeds.
 */

import type { Logger } from '@/lib/logger.js';
import { errorMessage } from '@/lib/errors.js';
import { toolLabel } from '@/tools/labels.js';
import type {
  ConnectionTransport,
  ServerEventMap,
  ServerEventName,
} from '@/types/index.js';

import type { ConnectionRegistry } from './registry.js';

export interface BroadcastGateway {
  emitToChat<E extends ServerEventName>(
    chatId: string,
    event: E,
    payload: ServerEventMap[E]
  ): void;
  emitToConnection<E extends ServerEventName>(
    connectionId: string,
    event: E,
    payload: ServerEventMap[E]
  ): void;
  /** `tool_call` with the tool's human-readable label */
  emitToolCall(chatId: string, toolName: string): void;
  /** `error` scoped to the connection, tagged with its current chat */
  emitError(connectionId: string, message: string): void;
}

export interface BroadcastGatewayDeps {
  registry: ConnectionRegistry;
  transport: ConnectionTransport;
  logger: Logger;
}

export function createBroadcastGateway(
  deps: BroadcastGatewayDeps
): BroadcastGateway {
  const { registry, transport, logger } = deps;

  function send<E extends ServerEventName>(
    connectionId: string,
    event: E,
    payload: ServerEventMap[E]
  ): void {
    try {
      transport.send(connectionId, event, payload);
    } catch (error) {
      logger.warn(
        { connectionId, event, error: errorMessage(error) },
        'Send failed'
      );
    }
  }

  function emitToChat<E extends ServerEventName>(
    chatId: string,
    event: E,
    payload: ServerEventMap[E]
  ): void {
    const members = registry.membersOf(chatId);
    logger.debug({ chatId, event, members: members.size }, 'Broadcasting');
    for (const connectionId of members) {
      send(connectionId, event, payload);
    }
  }

  return {
    emitToChat,
    emitToConnection: send,

    emitToolCall(chatId: string, toolName: string): void {
      emitToChat(chatId, 'tool_call', {
        chat_id: chatId,
        tool_data: toolLabel(toolName),
      });
    },

    emitError(connectionId: string, message: string): void {
      send(connectionId, 'error', {
        chat_id: registry.chatOf(connectionId),
        error: message,
      });
    },
  };
}
