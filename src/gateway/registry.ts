/**
 * Connection Registry
 *
 * Tracks live connections and the chat each one currently belongs to.
 * A connection is in at most one chat, and it is in a chat's member set
 * exactly when that chat is its current chat.
 *
 * All operations are synchronous, so each read-modify-write completes
 * within one event-loop turn and no handler sees a partial update.
 */

export interface ConnectionRegistry {
  /** Add with no chat. Re-registering keeps the current chat. */
  register(connectionId: string): void;
  unregister(connectionId: string): void;
  /** Move the connection into `chatId`, leaving its previous chat */
  joinChat(connectionId: string, chatId: string): void;
  /** Copy of the chat's member set */
  membersOf(chatId: string): Set<string>;
  chatOf(connectionId: string): string | null;
  /** Registered connections */
  size(): number;
  /** Chats with at least one member */
  chatCount(): number;
}

export function createConnectionRegistry(): ConnectionRegistry {
  const sessions = new Map<string, string | null>();
  const members = new Map<string, Set<string>>();

  function leave(connectionId: string, chatId: string): void {
    const set = members.get(chatId);
    if (!set) {
      return;
    }
    set.delete(connectionId);
    if (set.size === 0) {
      members.delete(chatId);
    }
  }

  return {
    register(connectionId: string): void {
      if (!sessions.has(connectionId)) {
        sessions.set(connectionId, null);
      }
    },

    unregister(connectionId: string): void {
      const chatId = sessions.get(connectionId);
      if (chatId) {
        leave(connectionId, chatId);
      }
      sessions.delete(connectionId);
    },

    joinChat(connectionId: string, chatId: string): void {
      const previous = sessions.get(connectionId);
      if (previous && previous !== chatId) {
        leave(connectionId, previous);
      }

      sessions.set(connectionId, chatId);
      const set = members.get(chatId) ?? new Set<string>();
      set.add(connectionId);
      members.set(chatId, set);
    },

    membersOf(chatId: string): Set<string> {
      return new Set(members.get(chatId));
    },

    chatOf(connectionId: string): string | null {
      return sessions.get(connectionId) ?? null;
    },

    size(): number {
      return sessions.size;
    },

    chatCount(): number {
      return members.size;
    },
  };
}
