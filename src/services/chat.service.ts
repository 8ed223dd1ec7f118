/**
 * ChatService Implementation
 *
 * SCOPE: Chat record persistence (the document store contract for chats)
 * NOT IN SCOPE: AI orchestration, routing, tool execution
 *
 * POLICY: Messages are append-only
 * - Read-then-write updates of one chat are serialized
 * - Reads return null on absence, never throw for a missing chat
 * - Writes to a missing chat throw NotFoundError
 */

import { randomUUID } from 'crypto';

import { NotFoundError } from '@/lib/errors.js';
import { createKeyedMutex } from '@/lib/keyed-mutex.js';
import type { KeyedMutex } from '@/lib/keyed-mutex.js';
import type { Logger } from '@/lib/logger.js';
import type {
  ChatField,
  ChatMessage,
  ChatRecord,
  GeoLocation,
} from '@/types/index.js';

/**
 * Database abstraction interface for ChatService
 */
export interface ChatServiceDb {
  insertChat: (record: ChatRecord) => Promise<void>;
  getChat: (chatId: string) => Promise<ChatRecord | null>;
  updateField: <K extends ChatField>(
    chatId: string,
    field: K,
    value: ChatRecord[K]
  ) => Promise<void>;
  /** Newest first */
  listChats: () => Promise<ChatRecord[]>;
}

/**
 * ChatService interface
 */
export interface ChatService {
  createChat(location: GeoLocation | null): Promise<ChatRecord>;
  getChat(chatId: string): Promise<ChatRecord | null>;
  getField<K extends ChatField>(
    chatId: string,
    field: K
  ): Promise<ChatRecord[K] | null>;
  setField<K extends ChatField>(
    chatId: string,
    field: K,
    value: ChatRecord[K]
  ): Promise<void>;
  appendMessage(chatId: string, message: ChatMessage): Promise<void>;
  appendPlaces(chatId: string, placeIds: string[]): Promise<void>;
  listChats(): Promise<ChatRecord[]>;
}

export interface ChatServiceDeps {
  db: ChatServiceDb;
  logger: Logger;
  /** Chat id generator, injectable for tests */
  generateId?: () => string;
  /** Clock in epoch seconds, injectable for tests */
  now?: () => number;
  /** Per-chat lock around read-then-write updates */
  mutex?: KeyedMutex;
}

/**
 * Create ChatService instance
 */
export function createChatService(deps: ChatServiceDeps): ChatService {
  const { db, logger } = deps;
  const generateId = deps.generateId ?? (() => randomUUID());
  const now = deps.now ?? (() => Math.floor(Date.now() / 1000));
  const mutex = deps.mutex ?? createKeyedMutex();

  async function requireChat(chatId: string): Promise<ChatRecord> {
    const chat = await db.getChat(chatId);
    if (chat === null) {
      throw new NotFoundError(`Chat not found: ${chatId}`);
    }
    return chat;
  }

  return {
    async createChat(location: GeoLocation | null): Promise<ChatRecord> {
      const record: ChatRecord = {
        chatId: generateId(),
        messages: [],
        places: [],
        thread: null,
        location,
        createdAt: now(),
      };

      await db.insertChat(record);
      logger.info({ chatId: record.chatId }, 'Created chat');

      return record;
    },

    async getChat(chatId: string): Promise<ChatRecord | null> {
      const chat = await db.getChat(chatId);
      if (chat === null) {
        logger.warn({ chatId }, 'No chat found');
      }
      return chat;
    },

    async getField<K extends ChatField>(
      chatId: string,
      field: K
    ): Promise<ChatRecord[K] | null> {
      const chat = await db.getChat(chatId);
      if (chat === null) {
        return null;
      }
      return chat[field];
    },

    async setField<K extends ChatField>(
      chatId: string,
      field: K,
      value: ChatRecord[K]
    ): Promise<void> {
      await mutex.runExclusive(chatId, async () => {
        await requireChat(chatId);
        await db.updateField(chatId, field, value);
      });
      logger.debug({ chatId, field }, 'Updated chat field');
    },

    async appendMessage(chatId: string, message: ChatMessage): Promise<void> {
      await mutex.runExclusive(chatId, async () => {
        const chat = await requireChat(chatId);
        await db.updateField(chatId, 'messages', [...chat.messages, message]);
      });
      logger.debug({ chatId, role: message.role }, 'Appended message');
    },

    async appendPlaces(chatId: string, placeIds: string[]): Promise<void> {
      if (placeIds.length === 0) {
        return;
      }
      await mutex.runExclusive(chatId, async () => {
        const chat = await requireChat(chatId);
        await db.updateField(chatId, 'places', [...chat.places, ...placeIds]);
      });
    },

    async listChats(): Promise<ChatRecord[]> {
      return db.listChats();
    },
  };
}
