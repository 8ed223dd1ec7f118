/**
 * ChatService Database Adapter
 * Implements ChatServiceDb interface using Supabase
 *
 * Table: chats (supabase/migrations)
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type {
  ChatField,
  ChatMessage,
  ChatRecord,
  GeoLocation,
} from '@/types/index.js';

import type { ChatServiceDb } from './chat.service.js';

/**
 * Database row type
 */
interface ChatRow {
  chat_id: string;
  messages: ChatMessage[] | null;
  places: string[] | null;
  thread_id: string | null;
  location: GeoLocation | null;
  created_at: number;
}

const FIELD_COLUMNS: Record<ChatField, keyof ChatRow> = {
  messages: 'messages',
  places: 'places',
  thread: 'thread_id',
  location: 'location',
};

/**
 * Map database row to ChatRecord
 */
function mapRowToChat(row: ChatRow): ChatRecord {
  return {
    chatId: row.chat_id,
    messages: row.messages ?? [],
    places: row.places ?? [],
    thread: row.thread_id,
    location: row.location,
    createdAt: Number(row.created_at),
  };
}

/**
 * Create ChatServiceDb implementation using Supabase
 */
export function createChatServiceDb(supabase: SupabaseClient): ChatServiceDb {
  return {
    async insertChat(record: ChatRecord): Promise<void> {
      const { error } = await supabase.from('chats').insert({
        chat_id: record.chatId,
        messages: record.messages,
        places: record.places,
        thread_id: record.thread,
        location: record.location,
        created_at: record.createdAt,
      });

      if (error !== null) {
        throw new Error(`Failed to create chat: ${error.message}`);
      }
    },

    async getChat(chatId: string): Promise<ChatRecord | null> {
      const { data, error } = await supabase
        .from('chats')
        .select('*')
        .eq('chat_id', chatId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get chat: ${error.message}`);
      }
      if (data === null) {
        return null;
      }

      return mapRowToChat(data as ChatRow);
    },

    async updateField<K extends ChatField>(
      chatId: string,
      field: K,
      value: ChatRecord[K]
    ): Promise<void> {
      const { error } = await supabase
        .from('chats')
        .update({ [FIELD_COLUMNS[field]]: value })
        .eq('chat_id', chatId);

      if (error !== null) {
        throw new Error(`Failed to update chat ${field}: ${error.message}`);
      }
    },

    async listChats(): Promise<ChatRecord[]> {
      const { data, error } = await supabase
        .from('chats')
        .select('*')
        .order('created_at', { ascending: false });

      if (error !== null) {
        throw new Error(`Failed to list chats: ${error.message}`);
      }

      return (data as ChatRow[]).map(mapRowToChat);
    },
  };
}
