/**
 * Chat Domain Types
 *
 * SCOPE: Chat records as held by the document store.
 * The orchestrator reads and mutates them through the store contract only.
 *
 * Messages are append-only.
 */

/**
 * Geolocation shared by the client when a chat is created
 */
export interface GeoLocation {
  latitude: number;
  longitude: number;
}

/**
 * Message role in the stored log
 */
export type MessageRole = 'user' | 'assistant';

/**
 * One entry of a chat's message log
 */
export interface ChatMessage {
  role: MessageRole;
  content: string;
}

/**
 * Chat record
 */
export interface ChatRecord {
  chatId: string;
  messages: ChatMessage[];
  /** Place ids surfaced by searches in this chat, in discovery order */
  places: string[];
  /** Opaque assistant thread handle, created lazily on the first turn */
  thread: string | null;
  location: GeoLocation | null;
  /** Unix epoch seconds */
  createdAt: number;
}

/**
 * Fields that may be read or written individually
 */
export type ChatField = Exclude<keyof ChatRecord, 'chatId' | 'createdAt'>;
