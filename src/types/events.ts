/**
 * Real-time Protocol Types
 *
 * Frames are JSON envelopes `{ event, data }` in both directions.
 */

import type { ChatMessage, ChatRecord } from './chat.js';

/**
 * Events a client may send
 */
export type ClientEventName =
  | 'send_message'
  | 'get_chats'
  | 'get_messages'
  | 'get_chat_data';

/**
 * Payloads of events the server emits, keyed by event name
 */
export interface ServerEventMap {
  message: { chat_id: string; content: string };
  chats: { chats: ChatRecord[] };
  messages: { chat_id: string; messages: ChatMessage[] };
  chat_data: { chat_id: string; chat_data: ChatRecord };
  tool_call: { chat_id: string; tool_data: string };
  error: { chat_id: string | null; error: string };
}

export type ServerEventName = keyof ServerEventMap;

/**
 * Wire envelope
 */
export interface EventEnvelope<TEvent extends string = string, TData = unknown> {
  event: TEvent;
  data: TData;
}

/**
 * Sends one event to one live connection
 */
export interface ConnectionTransport {
  send<E extends ServerEventName>(
    connectionId: string,
    event: E,
    payload: ServerEventMap[E]
  ): void;
}
